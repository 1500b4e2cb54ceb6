/**
 * @mailroot/account - Account
 *
 * A mailbox account on top of one MailboxProtocol handle. The primary key of
 * an account is its primary SMTP address.
 *
 * @example
 * ```typescript
 * const account = await Account.create({
 *   primarySmtpAddress: 'anna@example.com',
 *   config: { protocol },
 *   locale: 'da_DK',
 * });
 *
 * const inbox = await account.getInbox();
 * ```
 */

import { createLogger } from '@mailroot/logger';

import { loadAccountSettings } from './config';
import { FolderDirectoryCache } from './folders/folder-cache';
import { DefaultFolderResolver } from './folders/default-folder-resolver';
import { FolderTreeDiscoverer } from './folders/folder-tree';
import { createLocalizedNameLookup } from './folders/localized-names';
import { AccountError } from './interfaces/mailbox-protocol';
import {
  ACCESS_TYPES,
  AFFECTED_TASK_OCCURRENCES_CHOICES,
  CONFLICT_RESOLUTION_CHOICES,
  DEFAULT_BULK_DELETE_OPTIONS,
  DEFAULT_BULK_UPDATE_OPTIONS,
  DELETE_TYPE_CHOICES,
  MESSAGE_DISPOSITION_CHOICES,
  SEND_MEETING_CANCELLATIONS_CHOICES,
  SEND_MEETING_INVITATIONS_AND_CANCELLATIONS_CHOICES,
} from './interfaces/types';

import type { AccountSettings } from './config';
import type { LocalizedNameLookup } from './folders/localized-names';
import type {
  AutodiscoverFn,
  MailboxProtocol,
  ProtocolConfiguration,
} from './interfaces/mailbox-protocol';
import type {
  AccessType,
  AccountContext,
  BulkDeleteOptions,
  BulkUpdateOptions,
  Credentials,
  DeleteResult,
  FolderDirectory,
  FolderNode,
  ItemChange,
  ItemId,
  UploadEntry,
  WellKnownFolderType,
} from './interfaces/types';
import type { ILogger } from '@mailroot/logger';

// =============================================================================
// Options
// =============================================================================

export interface AccountOptions {
  primarySmtpAddress: string;
  fullname?: string;
  /** Defaults to delegate when credentials are given, else impersonation */
  accessType?: AccessType;
  /** Locate the server through autodiscovery. Excludes `config`. */
  autodiscover?: boolean;
  /** Autodiscovery implementation, required with `autodiscover` */
  discover?: AutodiscoverFn;
  credentials?: Credentials;
  /** Resolved protocol configuration. Excludes `autodiscover`. */
  config?: ProtocolConfiguration;
  verifySsl?: boolean;
  /** Locale of localized default folder names */
  locale?: string;
  localizedNames?: LocalizedNameLookup;
  logger?: ILogger;
  /** Defaults for omitted options (default: loaded from the environment) */
  settings?: AccountSettings;
}

interface ResolvedAccount {
  primarySmtpAddress: string;
  fullname?: string;
  accessType: AccessType;
  locale: string;
  protocol: MailboxProtocol;
  localizedNames: LocalizedNameLookup;
  logger: ILogger;
}

// =============================================================================
// Helpers
// =============================================================================

function assertChoice<T extends string>(name: string, value: unknown, choices: readonly T[]): void {
  if (!choices.some((choice) => choice === value)) {
    throw new AccountError(
      `Invalid ${name} '${String(value)}', expected one of: ${choices.join(', ')}`,
      'INVALID_ARGUMENT'
    );
  }
}

function assertBoolean(name: string, value: unknown): void {
  if (typeof value !== 'boolean') {
    throw new AccountError(`Invalid ${name} '${String(value)}', expected a boolean`, 'INVALID_ARGUMENT');
  }
}

function assertAddress(address: string): void {
  if (!address.includes('@')) {
    throw new AccountError(`primarySmtpAddress '${address}' is not an email address`, 'INVALID_IDENTITY');
  }
}

function getDomain(address: string): string {
  return address.slice(address.lastIndexOf('@') + 1).toLowerCase();
}

// =============================================================================
// Account
// =============================================================================

export class Account {
  readonly primarySmtpAddress: string;
  readonly fullname: string | undefined;
  readonly accessType: AccessType;
  readonly locale: string;
  readonly protocol: MailboxProtocol;

  private readonly ctx: AccountContext;
  private readonly logger: ILogger;
  private readonly cache = new FolderDirectoryCache();
  private readonly discoverer: FolderTreeDiscoverer;
  private readonly resolver: DefaultFolderResolver;

  private constructor(resolved: ResolvedAccount) {
    this.primarySmtpAddress = resolved.primarySmtpAddress;
    this.fullname = resolved.fullname;
    this.accessType = resolved.accessType;
    this.locale = resolved.locale;
    this.protocol = resolved.protocol;

    this.ctx = { primarySmtpAddress: this.primarySmtpAddress, accessType: this.accessType };
    this.logger = resolved.logger.child({ component: 'account', account: this.primarySmtpAddress });
    this.discoverer = new FolderTreeDiscoverer(this.protocol, this.ctx, this.logger);
    this.resolver = new DefaultFolderResolver({
      protocol: this.protocol,
      ctx: this.ctx,
      cache: this.cache,
      loadDirectory: () => this.loadDirectory(),
      localizedNames: resolved.localizedNames,
      locale: this.locale,
      logger: this.logger,
    });
  }

  /**
   * Validate the identity, settle the protocol source and build the account.
   * Configuration errors are raised before any remote call.
   */
  static async create(options: AccountOptions): Promise<Account> {
    assertAddress(options.primarySmtpAddress);

    const settings = options.settings ?? loadAccountSettings();
    const logger = options.logger ?? createLogger({ minLevel: settings.logLevel });
    // MAILBOX_ACCESS_TYPE only replaces the impersonation default
    const accessType =
      options.accessType ??
      (options.credentials ? 'delegate' : settings.accessType ?? 'impersonation');
    assertChoice('accessType', accessType, ACCESS_TYPES);

    let primarySmtpAddress = options.primarySmtpAddress;
    let protocol: MailboxProtocol;

    if (options.autodiscover) {
      if (options.config) {
        throw new AccountError(
          'config cannot be combined with autodiscover',
          'CONFIGURATION_CONFLICT'
        );
      }
      if (!options.credentials) {
        throw new AccountError('autodiscover requires credentials', 'CONFIGURATION_CONFLICT');
      }
      if (!options.discover) {
        throw new AccountError(
          'autodiscover requires a discover implementation',
          'CONFIGURATION_CONFLICT'
        );
      }

      const discovered = await options.discover(primarySmtpAddress, options.credentials, {
        verifySsl: options.verifySsl ?? settings.verifySsl,
      });
      assertAddress(discovered.primarySmtpAddress);
      primarySmtpAddress = discovered.primarySmtpAddress;
      protocol = discovered.protocol;
    } else {
      if (!options.config) {
        throw new AccountError(
          'an account without autodiscover requires a config',
          'CONFIGURATION_CONFLICT'
        );
      }
      protocol = options.config.protocol;
    }

    const account = new Account({
      primarySmtpAddress,
      ...(options.fullname !== undefined && { fullname: options.fullname }),
      accessType,
      locale: options.locale ?? settings.locale,
      protocol,
      localizedNames: options.localizedNames ?? createLocalizedNameLookup(),
      logger,
    });
    account.logger.debug('Added account', { accessType, version: protocol.version });
    return account;
  }

  /** Server version of the protocol handle */
  get version(): string {
    return this.protocol.version;
  }

  get domain(): string {
    return getDomain(this.primarySmtpAddress);
  }

  /**
   * Identity passed to the protocol on every call
   */
  getContext(): AccountContext {
    return { ...this.ctx };
  }

  // ===========================================================================
  // Folders
  // ===========================================================================

  /**
   * All folders of the account grouped by well-known type. Discovered once;
   * each call returns a fresh copy of the directory holding the cached folders.
   */
  async getFolders(): Promise<FolderDirectory> {
    const directory = await this.loadDirectory();
    return new Map(
      Array.from(directory, ([folderType, folders]): [WellKnownFolderType, FolderNode[]] => [
        folderType,
        [...folders],
      ])
    );
  }

  /**
   * Default folder for a role. Resolved once per role.
   */
  getDefaultFolder(folderType: WellKnownFolderType): Promise<FolderNode> {
    return this.resolver.resolve(folderType);
  }

  private loadDirectory(): Promise<FolderDirectory> {
    return this.cache.getDirectory(async () => {
      const root = await this.getRoot();
      return this.discoverer.discover(root);
    });
  }

  getRoot(): Promise<FolderNode> {
    return this.getDefaultFolder('Root');
  }

  /**
   * Shared calendars of other users appear in the folder list as well; this is
   * the account's own calendar, possibly under a localized name.
   */
  getCalendar(): Promise<FolderNode> {
    return this.getDefaultFolder('Calendar');
  }

  getTrash(): Promise<FolderNode> {
    return this.getDefaultFolder('DeletedItems');
  }

  getDrafts(): Promise<FolderNode> {
    return this.getDefaultFolder('Drafts');
  }

  getInbox(): Promise<FolderNode> {
    return this.getDefaultFolder('Inbox');
  }

  getOutbox(): Promise<FolderNode> {
    return this.getDefaultFolder('Outbox');
  }

  getSent(): Promise<FolderNode> {
    return this.getDefaultFolder('SentItems');
  }

  getJunk(): Promise<FolderNode> {
    return this.getDefaultFolder('JunkEmail');
  }

  getTasks(): Promise<FolderNode> {
    return this.getDefaultFolder('Tasks');
  }

  getContacts(): Promise<FolderNode> {
    return this.getDefaultFolder('Contacts');
  }

  getRecoverableItemsRoot(): Promise<FolderNode> {
    return this.getDefaultFolder('RecoverableItemsRoot');
  }

  getRecoverableDeletedItems(): Promise<FolderNode> {
    return this.getDefaultFolder('RecoverableItemsDeletions');
  }

  // ===========================================================================
  // Bulk Operations
  // ===========================================================================

  /**
   * Update items. Each change names the fields that changed on its item.
   * An empty input returns `[]` without a remote call.
   */
  async bulkUpdate(
    items: Iterable<ItemChange>,
    options: Partial<BulkUpdateOptions> = {}
  ): Promise<ItemId[]> {
    const resolved: BulkUpdateOptions = { ...DEFAULT_BULK_UPDATE_OPTIONS, ...options };
    assertChoice('conflictResolution', resolved.conflictResolution, CONFLICT_RESOLUTION_CHOICES);
    assertChoice('messageDisposition', resolved.messageDisposition, MESSAGE_DISPOSITION_CHOICES);
    assertChoice(
      'sendMeetingInvitationsOrCancellations',
      resolved.sendMeetingInvitationsOrCancellations,
      SEND_MEETING_INVITATIONS_AND_CANCELLATIONS_CHOICES
    );
    assertBoolean('suppressReadReceipts', resolved.suppressReadReceipts);

    const changes = Array.from(items);
    if (changes.length === 0) {
      return [];
    }

    this.logger.debug('Updating items', { count: changes.length, ...resolved });
    return this.protocol.updateItems(this.ctx, changes, resolved);
  }

  /**
   * Delete items. An empty input returns `[]` without a remote call.
   */
  async bulkDelete(
    ids: Iterable<ItemId>,
    options: Partial<BulkDeleteOptions> = {}
  ): Promise<DeleteResult[]> {
    const resolved: BulkDeleteOptions = { ...DEFAULT_BULK_DELETE_OPTIONS, ...options };
    assertChoice('deleteType', resolved.deleteType, DELETE_TYPE_CHOICES);
    assertChoice(
      'sendMeetingCancellations',
      resolved.sendMeetingCancellations,
      SEND_MEETING_CANCELLATIONS_CHOICES
    );
    assertChoice(
      'affectedTaskOccurrences',
      resolved.affectedTaskOccurrences,
      AFFECTED_TASK_OCCURRENCES_CHOICES
    );
    assertBoolean('suppressReadReceipts', resolved.suppressReadReceipts);

    const itemIds = Array.from(ids);
    if (itemIds.length === 0) {
      return [];
    }

    this.logger.debug('Deleting items', { count: itemIds.length, ...resolved });
    return this.protocol.deleteItems(this.ctx, itemIds, resolved);
  }

  // ===========================================================================
  // Export / Upload
  // ===========================================================================

  /**
   * Export items, pairing each id with its exported payload
   */
  async export(ids: Iterable<ItemId>): Promise<Array<[ItemId, string]>> {
    const itemIds = Array.from(ids);
    if (itemIds.length === 0) {
      return [];
    }

    const payloads = await this.protocol.exportItems(this.ctx, itemIds);
    return itemIds.map((id, index): [ItemId, string] => {
      const payload = payloads[index];
      if (payload === undefined) {
        throw new AccountError(`export returned no payload for item ${id.id}`, 'TRANSPORT');
      }
      return [id, payload];
    });
  }

  /**
   * Upload exported payloads.
   *
   * Either pass entries that each name their folder, or payloads with one
   * folder for all of them or one folder per payload.
   */
  upload(entries: Iterable<UploadEntry>): Promise<ItemId[]>;
  upload(data: Iterable<string>, folders: FolderNode | FolderNode[]): Promise<ItemId[]>;
  async upload(
    data: Iterable<UploadEntry> | Iterable<string>,
    folders?: FolderNode | FolderNode[]
  ): Promise<ItemId[]> {
    const entries = this.toUploadEntries(data, folders);
    if (entries.length === 0) {
      return [];
    }

    this.logger.debug('Uploading items', { count: entries.length });
    return this.protocol.uploadItems(this.ctx, entries);
  }

  private toUploadEntries(
    data: Iterable<UploadEntry> | Iterable<string>,
    folders?: FolderNode | FolderNode[]
  ): UploadEntry[] {
    const values = Array.from<UploadEntry | string>(data);

    if (folders === undefined) {
      return values.map((value) => {
        if (typeof value === 'string') {
          throw new AccountError('upload of raw payloads requires a folder', 'INVALID_ARGUMENT');
        }
        return value;
      });
    }

    const payloads = values.map((value) => (typeof value === 'string' ? value : value.data));
    if (!Array.isArray(folders)) {
      return payloads.map((payload) => ({ folder: folders, data: payload }));
    }

    if (folders.length !== payloads.length) {
      throw new AccountError(
        `upload got ${payloads.length} payloads but ${folders.length} folders`,
        'INVALID_ARGUMENT'
      );
    }
    const entries: UploadEntry[] = [];
    folders.forEach((folder, index) => {
      const payload = payloads[index];
      if (payload !== undefined) {
        entries.push({ folder, data: payload });
      }
    });
    return entries;
  }

  toString(): string {
    return this.fullname
      ? `${this.primarySmtpAddress} (${this.fullname})`
      : this.primarySmtpAddress;
  }
}
