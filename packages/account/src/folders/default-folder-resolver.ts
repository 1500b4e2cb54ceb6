/**
 * @mailroot/account - Default Folder Resolver
 *
 * Finds the one folder that serves a well-known role for the account:
 *
 * 1. Fetch the distinguished folder. Authoritative when it works.
 * 2. On ACCESS_DENIED, address the folder by distinguished id and probe it
 *    with an empty query. Some permission models allow queries but not fetches.
 * 3. On FOLDER_NOT_FOUND, scan the folder directory: a folder with a localized
 *    default name, else a folder flagged distinguished. More than one
 *    surviving candidate is an error, never a guess.
 *
 * Any other error from step 1 reaches the caller unchanged.
 */

import { getLogger } from '@mailroot/logger';

import {
  AccountError,
  AmbiguousDefaultFolderError,
  hasErrorCode,
} from '../interfaces/mailbox-protocol';
import { DISTINGUISHED_FOLDER_IDS, isDistinguishedFolderType } from '../interfaces/types';

import { classifyFolder } from './folder-tree';
import { matchesLocalizedName } from './localized-names';

import type { FolderDirectoryCache } from './folder-cache';
import type { LocalizedNameLookup } from './localized-names';
import type { MailboxProtocol } from '../interfaces/mailbox-protocol';
import type {
  AccountContext,
  DistinguishedFolderType,
  FolderDirectory,
  FolderNode,
  WellKnownFolderType,
} from '../interfaces/types';
import type { ILogger } from '@mailroot/logger';

export interface DefaultFolderResolverOptions {
  protocol: MailboxProtocol;
  ctx: AccountContext;
  cache: FolderDirectoryCache;
  /** Supplies the folder directory for the scan fallback */
  loadDirectory: () => Promise<FolderDirectory>;
  localizedNames: LocalizedNameLookup;
  locale: string;
  logger?: ILogger;
}

export class DefaultFolderResolver {
  private readonly protocol: MailboxProtocol;
  private readonly ctx: AccountContext;
  private readonly cache: FolderDirectoryCache;
  private readonly loadDirectory: () => Promise<FolderDirectory>;
  private readonly localizedNames: LocalizedNameLookup;
  private readonly locale: string;
  private readonly logger: ILogger;

  constructor(options: DefaultFolderResolverOptions) {
    this.protocol = options.protocol;
    this.ctx = options.ctx;
    this.cache = options.cache;
    this.loadDirectory = options.loadDirectory;
    this.localizedNames = options.localizedNames;
    this.locale = options.locale;
    this.logger = (options.logger ?? getLogger()).child({ component: 'default-folder-resolver' });
  }

  /**
   * Resolve the default folder for a role. Resolved folders are cached, so
   * repeated calls return the same object without another remote call.
   */
  resolve(folderType: WellKnownFolderType): Promise<FolderNode> {
    if (!isDistinguishedFolderType(folderType)) {
      return Promise.reject(
        new AccountError(`${folderType} folders have no default folder`, 'INVALID_ARGUMENT')
      );
    }
    return this.cache.getDefaultFolder(folderType, () => this.lookup(folderType));
  }

  private async lookup(folderType: DistinguishedFolderType): Promise<FolderNode> {
    try {
      this.logger.debug('Fetching distinguished folder', { folderType });
      const remote = await this.protocol.getFolderByDistinguishedId(this.ctx, folderType);
      return { ...classifyFolder(remote), folderType };
    } catch (error) {
      if (hasErrorCode(error, 'ACCESS_DENIED')) {
        return this.probe(folderType);
      }
      // The directory scan starts from the root, so the root has no fallback
      if (hasErrorCode(error, 'FOLDER_NOT_FOUND') && folderType !== 'Root') {
        return this.scanDirectory(folderType, error);
      }
      throw error;
    }
  }

  private async probe(folderType: DistinguishedFolderType): Promise<FolderNode> {
    this.logger.debug('Distinguished folder not fetchable, probing with empty query', {
      folderType,
    });
    const handle: FolderNode = {
      distinguishedId: DISTINGUISHED_FOLDER_IDS[folderType],
      name: folderType,
      isDistinguished: true,
      folderType,
    };
    await this.protocol.probeQuery(this.ctx, handle);
    return handle;
  }

  private async scanDirectory(
    folderType: DistinguishedFolderType,
    notFound: AccountError
  ): Promise<FolderNode> {
    this.logger.debug('Searching folder directory for default folder', { folderType });
    const directory = await this.loadDirectory();
    const candidates = directory.get(folderType) ?? [];

    let matches = candidates.filter((folder) =>
      matchesLocalizedName(this.localizedNames, this.locale, folderType, folder.name)
    );
    if (matches.length === 0) {
      matches = candidates.filter((folder) => folder.isDistinguished);
    }

    const [match, ...others] = matches;
    if (!match) {
      throw new AccountError(
        `No usable default ${folderType} folder`,
        'NO_USABLE_DEFAULT',
        notFound
      );
    }
    if (others.length > 0) {
      throw new AmbiguousDefaultFolderError(folderType, matches);
    }
    return match;
  }
}
