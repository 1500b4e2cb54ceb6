/**
 * @mailroot/account - Type Definitions
 *
 * Folder, identity and bulk-operation types shared by the account facade and
 * the mailbox protocol collaborator.
 */

// =============================================================================
// Well-known Folders
// =============================================================================

export const WELL_KNOWN_FOLDER_TYPES = [
  'Root',
  'Calendar',
  'DeletedItems',
  'Drafts',
  'Inbox',
  'Outbox',
  'SentItems',
  'JunkEmail',
  'Tasks',
  'Contacts',
  'RecoverableItemsRoot',
  'RecoverableItemsDeletions',
  'Other',
] as const;

/**
 * Mailbox role of a folder. `Other` covers every folder without a known role.
 */
export type WellKnownFolderType = (typeof WELL_KNOWN_FOLDER_TYPES)[number];

/**
 * Folder roles the server can address by distinguished id
 */
export type DistinguishedFolderType = Exclude<WellKnownFolderType, 'Other'>;

export const DISTINGUISHED_FOLDER_IDS: Record<DistinguishedFolderType, string> = {
  Root: 'root',
  Calendar: 'calendar',
  DeletedItems: 'deleteditems',
  Drafts: 'drafts',
  Inbox: 'inbox',
  Outbox: 'outbox',
  SentItems: 'sentitems',
  JunkEmail: 'junkemail',
  Tasks: 'tasks',
  Contacts: 'contacts',
  RecoverableItemsRoot: 'recoverableitemsroot',
  RecoverableItemsDeletions: 'recoverableitemsdeletions',
};

export function isWellKnownFolderType(value: unknown): value is WellKnownFolderType {
  return (
    typeof value === 'string' && (WELL_KNOWN_FOLDER_TYPES as readonly string[]).includes(value)
  );
}

export function isDistinguishedFolderType(value: unknown): value is DistinguishedFolderType {
  return isWellKnownFolderType(value) && value !== 'Other';
}

// =============================================================================
// Folder Types
// =============================================================================

/**
 * Folder as returned by the mailbox protocol, before classification
 */
export interface RemoteFolder {
  id: string;
  changeKey: string;
  /** Display name (may be localized or renamed by the server) */
  name: string;
  /** Server marks the folder as the canonical default for its role */
  isDistinguished: boolean;
  /** Raw well-known-type tag reported by the server, if any */
  folderType?: string;
  parentId?: string;
}

/**
 * Classified folder handle
 *
 * A handle addressed by distinguished id (returned when the account may query
 * a folder but not fetch it) carries `distinguishedId` and no `id`.
 */
export interface FolderNode {
  id?: string;
  changeKey?: string;
  distinguishedId?: string;
  name: string;
  isDistinguished: boolean;
  folderType: WellKnownFolderType;
  parentId?: string;
}

/**
 * Folders of an account grouped by role, in discovery order.
 * Every well-known type is present as a key.
 */
export type FolderDirectory = Map<WellKnownFolderType, FolderNode[]>;

export type TraversalDepth = 'shallow' | 'deep';

// =============================================================================
// Identity
// =============================================================================

export type AccessType = 'delegate' | 'impersonation';

export const ACCESS_TYPES: readonly AccessType[] = ['delegate', 'impersonation'];

/**
 * Identity the protocol acts on behalf of, passed with every remote call
 */
export interface AccountContext {
  primarySmtpAddress: string;
  accessType: AccessType;
}

export interface Credentials {
  username: string;
  password: string;
}

// =============================================================================
// Items
// =============================================================================

export interface ItemId {
  id: string;
  changeKey: string;
}

/**
 * An item together with the names of the fields that changed on it
 */
export interface ItemChange {
  item: ItemId;
  fieldNames: string[];
}

/**
 * Per-item outcome of a bulk delete
 */
export type DeleteResult = { success: true } | { success: false; error: string };

export interface UploadEntry {
  folder: FolderNode;
  /** Exported item payload */
  data: string;
}

// =============================================================================
// Bulk Operation Options
// =============================================================================

export const CONFLICT_RESOLUTION_CHOICES = [
  'NeverOverwrite',
  'AutoResolve',
  'AlwaysOverwrite',
] as const;
export type ConflictResolution = (typeof CONFLICT_RESOLUTION_CHOICES)[number];

export const MESSAGE_DISPOSITION_CHOICES = ['SaveOnly', 'SendOnly', 'SendAndSaveCopy'] as const;
export type MessageDisposition = (typeof MESSAGE_DISPOSITION_CHOICES)[number];

export const SEND_MEETING_INVITATIONS_AND_CANCELLATIONS_CHOICES = [
  'SendToNone',
  'SendOnlyToAll',
  'SendOnlyToChanged',
  'SendToAllAndSaveCopy',
  'SendToChangedAndSaveCopy',
] as const;
export type SendMeetingInvitationsOrCancellations =
  (typeof SEND_MEETING_INVITATIONS_AND_CANCELLATIONS_CHOICES)[number];

export const SEND_MEETING_CANCELLATIONS_CHOICES = [
  'SendToNone',
  'SendOnlyToAll',
  'SendToAllAndSaveCopy',
] as const;
export type SendMeetingCancellations = (typeof SEND_MEETING_CANCELLATIONS_CHOICES)[number];

export const DELETE_TYPE_CHOICES = ['HardDelete', 'SoftDelete', 'MoveToDeletedItems'] as const;
export type DeleteType = (typeof DELETE_TYPE_CHOICES)[number];

export const AFFECTED_TASK_OCCURRENCES_CHOICES = [
  'AllOccurrences',
  'SpecifiedOccurrenceOnly',
] as const;
export type AffectedTaskOccurrences = (typeof AFFECTED_TASK_OCCURRENCES_CHOICES)[number];

export interface BulkUpdateOptions {
  conflictResolution: ConflictResolution;
  /** Only applies to messages */
  messageDisposition: MessageDisposition;
  /** Only applies to calendar items */
  sendMeetingInvitationsOrCancellations: SendMeetingInvitationsOrCancellations;
  suppressReadReceipts: boolean;
}

export interface BulkDeleteOptions {
  deleteType: DeleteType;
  /** Only applies to calendar items */
  sendMeetingCancellations: SendMeetingCancellations;
  /** Only applies to recurring tasks */
  affectedTaskOccurrences: AffectedTaskOccurrences;
  suppressReadReceipts: boolean;
}

export const DEFAULT_BULK_UPDATE_OPTIONS: BulkUpdateOptions = {
  conflictResolution: 'AutoResolve',
  messageDisposition: 'SaveOnly',
  sendMeetingInvitationsOrCancellations: 'SendToNone',
  suppressReadReceipts: true,
};

export const DEFAULT_BULK_DELETE_OPTIONS: BulkDeleteOptions = {
  deleteType: 'HardDelete',
  sendMeetingCancellations: 'SendToNone',
  affectedTaskOccurrences: 'SpecifiedOccurrenceOnly',
  suppressReadReceipts: true,
};

// =============================================================================
// Subscriptions
// =============================================================================

export const ALL_EVENT_TYPES = [
  'CopiedEvent',
  'CreatedEvent',
  'DeletedEvent',
  'ModifiedEvent',
  'MovedEvent',
  'NewMailEvent',
  'FreeBusyChangedEvent',
] as const;
export type MailboxEventType = (typeof ALL_EVENT_TYPES)[number];

/**
 * Server-side pull subscription cursor
 */
export interface SubscriptionState {
  subscriptionId: string;
  watermark: string;
}

export interface MailboxEvent {
  type: MailboxEventType;
  timestamp: string;
  itemId?: ItemId;
  folderId?: string;
  oldItemId?: ItemId;
  oldFolderId?: string;
}
