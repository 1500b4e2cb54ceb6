/**
 * @mailroot/account - MailboxProtocol Interface
 *
 * Contract of the service-call layer the account is built on. Implementations
 * own the wire format, retries and timeouts; the account only interprets
 * ACCESS_DENIED and FOLDER_NOT_FOUND from distinguished folder lookups.
 */

import type {
  AccountContext,
  BulkDeleteOptions,
  BulkUpdateOptions,
  Credentials,
  DeleteResult,
  DistinguishedFolderType,
  FolderNode,
  ItemChange,
  ItemId,
  MailboxEvent,
  MailboxEventType,
  RemoteFolder,
  SubscriptionState,
  TraversalDepth,
  UploadEntry,
  WellKnownFolderType,
} from './types';

// =============================================================================
// MailboxProtocol Interface
// =============================================================================

export interface MailboxProtocol {
  /** Server version the protocol negotiated */
  readonly version: string;

  /**
   * Fetch the canonical folder for a role.
   * Rejects with ACCESS_DENIED or FOLDER_NOT_FOUND, or a transport error.
   */
  getFolderByDistinguishedId(
    ctx: AccountContext,
    folderType: DistinguishedFolderType
  ): Promise<RemoteFolder>;

  /**
   * List the immediate children (`shallow`) or the whole subtree (`deep`) of a folder
   */
  listChildFolders(
    ctx: AccountContext,
    parent: FolderNode,
    depth: TraversalDepth
  ): Promise<RemoteFolder[]>;

  /**
   * Run a query that matches nothing, to check the folder can be queried
   */
  probeQuery(ctx: AccountContext, folder: FolderNode): Promise<void>;

  updateItems(
    ctx: AccountContext,
    items: ItemChange[],
    options: BulkUpdateOptions
  ): Promise<ItemId[]>;

  deleteItems(
    ctx: AccountContext,
    ids: ItemId[],
    options: BulkDeleteOptions
  ): Promise<DeleteResult[]>;

  /**
   * Export items as opaque payloads, one per id in input order
   */
  exportItems(ctx: AccountContext, ids: ItemId[]): Promise<string[]>;

  /**
   * Upload exported payloads into folders, one id per entry in input order
   */
  uploadItems(ctx: AccountContext, entries: UploadEntry[]): Promise<ItemId[]>;

  subscribe(
    ctx: AccountContext,
    folder: FolderNode,
    events: MailboxEventType[],
    timeoutMinutes: number
  ): Promise<SubscriptionState>;

  getEvents(
    ctx: AccountContext,
    state: SubscriptionState
  ): Promise<{ events: MailboxEvent[]; state: SubscriptionState }>;

  unsubscribe(ctx: AccountContext, state: SubscriptionState): Promise<void>;
}

/**
 * Resolved protocol configuration injected instead of autodiscovery
 */
export interface ProtocolConfiguration {
  protocol: MailboxProtocol;
}

/**
 * Autodiscovery collaborator. The server may report a different primary
 * address than the one asked for.
 */
export type AutodiscoverFn = (
  email: string,
  credentials: Credentials,
  options: { verifySsl: boolean }
) => Promise<{ primarySmtpAddress: string; protocol: MailboxProtocol }>;

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes raised by the account and understood from the protocol
 */
export type AccountErrorCode =
  | 'INVALID_IDENTITY' // Primary address is not an email address
  | 'CONFIGURATION_CONFLICT' // Both or neither of autodiscover and config
  | 'ACCESS_DENIED' // Account may not fetch the folder by id
  | 'FOLDER_NOT_FOUND' // No such distinguished folder on the server
  | 'AMBIGUOUS_DEFAULT' // Several folders qualify as the default
  | 'NO_USABLE_DEFAULT' // No folder qualifies as the default
  | 'INVALID_ARGUMENT' // Option outside its choice set, or similar
  | 'TRANSPORT'; // Anything the protocol could not complete

export class AccountError extends Error {
  constructor(
    message: string,
    public readonly code: AccountErrorCode,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'AccountError';
  }
}

/**
 * Raised when more than one folder could be the default for a role
 */
export class AmbiguousDefaultFolderError extends AccountError {
  constructor(
    public readonly folderType: WellKnownFolderType,
    public readonly candidates: FolderNode[]
  ) {
    super(
      `Multiple possible default ${folderType} folders: ${candidates
        .map((c) => describeFolder(c))
        .join(', ')}`,
      'AMBIGUOUS_DEFAULT'
    );
    this.name = 'AmbiguousDefaultFolderError';
  }
}

export function isAccountError(error: unknown): error is AccountError {
  return error instanceof AccountError;
}

export function hasErrorCode(error: unknown, code: AccountErrorCode): error is AccountError {
  return isAccountError(error) && error.code === code;
}

/**
 * Short human-readable folder description for logs and error messages
 */
export function describeFolder(folder: FolderNode): string {
  const ref = folder.id ?? folder.distinguishedId ?? '?';
  return `${folder.folderType}(${folder.name}, ${ref})`;
}
