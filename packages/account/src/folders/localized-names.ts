/**
 * @mailroot/account - Localized folder names
 *
 * Administrators can rename default folders to localized names, which hides
 * them from purely structural lookups. The table is neither complete nor
 * authoritative; it only breaks ties when the distinguished lookup fails.
 */

import defaultTable from './localized-names.json';

import type { WellKnownFolderType } from '../interfaces/types';

/**
 * Locale tag (e.g. `da_DK`) to accepted display names per folder type
 */
export type LocalizedNameTable = Record<
  string,
  Partial<Record<WellKnownFolderType, readonly string[]>>
>;

export interface LocalizedNameLookup {
  namesFor(locale: string, folderType: WellKnownFolderType): readonly string[];
}

export const DEFAULT_LOCALIZED_NAMES: LocalizedNameTable = defaultTable;

/**
 * Upper-case the first letter of every word and lower-case the rest.
 * Any non-letter separates words, so `e-mail` becomes `E-Mail`.
 */
export function toTitleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, separator: string, letter: string) => {
      return separator + letter.toUpperCase();
    });
}

export function createLocalizedNameLookup(
  table: LocalizedNameTable = DEFAULT_LOCALIZED_NAMES
): LocalizedNameLookup {
  return {
    namesFor(locale, folderType) {
      return table[locale]?.[folderType] ?? [];
    },
  };
}

/**
 * Whether a folder name is one of the accepted localized names, comparing
 * both sides in title case
 */
export function matchesLocalizedName(
  lookup: LocalizedNameLookup,
  locale: string,
  folderType: WellKnownFolderType,
  name: string
): boolean {
  const normalized = toTitleCase(name);
  return lookup.namesFor(locale, folderType).some((candidate) => {
    return toTitleCase(candidate) === normalized;
  });
}
