/**
 * @mailroot/account - Folder Tree Discoverer
 *
 * Walks the folder hierarchy below the account root and groups every folder
 * by its well-known type.
 */

import { getLogger } from '@mailroot/logger';

import { WELL_KNOWN_FOLDER_TYPES, isWellKnownFolderType } from '../interfaces/types';

import type { MailboxProtocol } from '../interfaces/mailbox-protocol';
import type {
  AccountContext,
  FolderDirectory,
  FolderNode,
  RemoteFolder,
  WellKnownFolderType,
} from '../interfaces/types';
import type { ILogger } from '@mailroot/logger';

/**
 * Container present in some mailboxes. It holds only the folders the account
 * owns; shared and delegated folders are mounted next to it at the top level.
 */
export const INFORMATION_STORE_CONTAINER = 'Top of Information Store';

/**
 * Tag a protocol folder with its well-known type. Unknown or missing tags
 * become `Other`.
 */
export function classifyFolder(remote: RemoteFolder): FolderNode {
  return {
    id: remote.id,
    changeKey: remote.changeKey,
    name: remote.name,
    isDistinguished: remote.isDistinguished,
    folderType: isWellKnownFolderType(remote.folderType) ? remote.folderType : 'Other',
    ...(remote.parentId !== undefined && { parentId: remote.parentId }),
  };
}

/**
 * Directory with an empty list for every well-known type
 */
export function createEmptyDirectory(): FolderDirectory {
  return new Map(
    WELL_KNOWN_FOLDER_TYPES.map((type): [WellKnownFolderType, FolderNode[]] => [type, []])
  );
}

export class FolderTreeDiscoverer {
  private readonly logger: ILogger;

  constructor(
    private readonly protocol: MailboxProtocol,
    private readonly ctx: AccountContext,
    logger: ILogger = getLogger()
  ) {
    this.logger = logger.child({ component: 'folder-tree' });
  }

  /**
   * Build the folder directory below `root`. Listing errors propagate as-is.
   */
  async discover(root: FolderNode): Promise<FolderDirectory> {
    const topLevel = await this.protocol.listChildFolders(this.ctx, root, 'shallow');
    const container = topLevel.find((folder) => folder.name === INFORMATION_STORE_CONTAINER);

    let workingSet: RemoteFolder[];
    if (container) {
      this.logger.debug('Listing folders below information store container');
      workingSet = await this.protocol.listChildFolders(
        this.ctx,
        classifyFolder(container),
        'shallow'
      );
    } else {
      // Default folders may sit anywhere in the tree
      this.logger.debug('No information store container, listing full folder tree');
      workingSet = await this.protocol.listChildFolders(this.ctx, root, 'deep');
    }

    const directory = createEmptyDirectory();
    for (const remote of workingSet) {
      const folder = classifyFolder(remote);
      directory.get(folder.folderType)?.push(folder);
    }

    this.logger.debug('Discovered folders', { count: workingSet.length });
    return directory;
  }
}
