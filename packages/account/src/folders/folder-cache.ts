/**
 * @mailroot/account - Folder Directory Cache
 *
 * Read-through memo for the per-account folder lookups. Entries hold the
 * in-flight promise, so concurrent callers for one key share a single remote
 * computation. A computation that rejects is evicted and runs again on the
 * next call; a settled value is kept for the lifetime of the account.
 */

import type { DistinguishedFolderType, FolderDirectory, FolderNode } from '../interfaces/types';

export class AsyncMemo<K, V> {
  private readonly entries = new Map<K, Promise<V>>();

  /**
   * Return the cached value for `key`, computing it on first use
   */
  get(key: K, compute: () => Promise<V>): Promise<V> {
    const cached = this.entries.get(key);
    if (cached) {
      return cached;
    }

    const pending = compute();
    this.entries.set(key, pending);
    pending.catch(() => {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
    });
    return pending;
  }
}

/**
 * Folder caches of one account: the discovered directory and each resolved
 * default folder
 */
export class FolderDirectoryCache {
  private readonly directory = new AsyncMemo<'directory', FolderDirectory>();
  private readonly defaults = new AsyncMemo<DistinguishedFolderType, FolderNode>();

  getDirectory(compute: () => Promise<FolderDirectory>): Promise<FolderDirectory> {
    return this.directory.get('directory', compute);
  }

  getDefaultFolder(
    folderType: DistinguishedFolderType,
    compute: () => Promise<FolderNode>
  ): Promise<FolderNode> {
    return this.defaults.get(folderType, compute);
  }
}
