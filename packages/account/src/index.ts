/**
 * @mailroot/account
 *
 * Mailbox account abstraction over a remote mailbox protocol.
 *
 * This package provides:
 * - Account facade with lazily resolved well-known folders
 * - Folder tree discovery grouped by well-known type
 * - Default folder resolution with localized-name fallback
 * - Bulk update/delete, export/upload and pull subscriptions
 *
 * @example
 * ```typescript
 * import { Account } from '@mailroot/account';
 *
 * const account = await Account.create({
 *   primarySmtpAddress: 'anna@example.com',
 *   credentials,
 *   autodiscover: true,
 *   discover,
 * });
 *
 * const calendar = await account.getCalendar();
 * ```
 */

// Interfaces and Types
export * from './interfaces';

// Account
export { Account } from './account';
export type { AccountOptions } from './account';
export { Subscription, DEFAULT_SUBSCRIPTION_TIMEOUT_MINUTES } from './subscription';

// Folders
export { FolderDirectoryCache, AsyncMemo } from './folders/folder-cache';
export {
  FolderTreeDiscoverer,
  INFORMATION_STORE_CONTAINER,
  classifyFolder,
  createEmptyDirectory,
} from './folders/folder-tree';
export { DefaultFolderResolver } from './folders/default-folder-resolver';
export type { DefaultFolderResolverOptions } from './folders/default-folder-resolver';
export {
  DEFAULT_LOCALIZED_NAMES,
  createLocalizedNameLookup,
  matchesLocalizedName,
  toTitleCase,
} from './folders/localized-names';
export type { LocalizedNameLookup, LocalizedNameTable } from './folders/localized-names';

// Configuration
export { loadAccountSettings, DEFAULT_LOCALE } from './config';
export type { AccountSettings } from './config';
