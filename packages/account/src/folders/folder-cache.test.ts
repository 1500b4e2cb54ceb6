/**
 * Tests for the folder caches
 */

import { AsyncMemo, FolderDirectoryCache } from './folder-cache';
import { createEmptyDirectory } from './folder-tree';

import type { FolderNode } from '../interfaces/types';

const inbox: FolderNode = { id: 'in', name: 'Inbox', isDistinguished: true, folderType: 'Inbox' };

describe('AsyncMemo', () => {
  it('should compute once per key', async () => {
    const memo = new AsyncMemo<string, number>();
    const compute = jest.fn().mockResolvedValue(42);

    await expect(memo.get('a', compute)).resolves.toBe(42);
    await expect(memo.get('a', compute)).resolves.toBe(42);

    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('should share the in-flight computation between concurrent callers', async () => {
    const memo = new AsyncMemo<string, object>();
    const value = {};
    const compute = jest.fn(() => Promise.resolve(value));

    const [first, second] = await Promise.all([memo.get('a', compute), memo.get('a', compute)]);

    expect(first).toBe(value);
    expect(second).toBe(value);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('should keep keys apart', async () => {
    const memo = new AsyncMemo<string, string>();

    await memo.get('a', () => Promise.resolve('A'));
    const b = await memo.get('b', () => Promise.resolve('B'));

    expect(b).toBe('B');
  });

  it('should evict a rejected computation', async () => {
    const memo = new AsyncMemo<string, string>();
    const error = new Error('timeout');
    const compute = jest.fn().mockRejectedValueOnce(error).mockResolvedValueOnce('ok');

    await expect(memo.get('a', compute)).rejects.toBe(error);
    await expect(memo.get('a', compute)).resolves.toBe('ok');
    expect(compute).toHaveBeenCalledTimes(2);
  });
});

describe('FolderDirectoryCache', () => {
  it('should keep an empty directory once computed', async () => {
    const cache = new FolderDirectoryCache();
    const compute = jest.fn(() => Promise.resolve(createEmptyDirectory()));

    const directory = await cache.getDirectory(compute);
    await cache.getDirectory(compute);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(directory.get('Inbox')).toEqual([]);
  });

  it('should memoize default folders per type', async () => {
    const cache = new FolderDirectoryCache();
    const compute = jest.fn(() => Promise.resolve(inbox));

    const first = await cache.getDefaultFolder('Inbox', compute);
    const second = await cache.getDefaultFolder('Inbox', compute);

    expect(first).toBe(second);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('should compute each default folder type separately', async () => {
    const cache = new FolderDirectoryCache();
    const compute = jest.fn(() => Promise.resolve(inbox));

    await cache.getDefaultFolder('Inbox', compute);
    await cache.getDefaultFolder('Drafts', compute);

    expect(compute).toHaveBeenCalledTimes(2);
  });
});
