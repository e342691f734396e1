/**
 * Recursive directory walk
 */

import glob from 'fast-glob';
import { lookup as getMimeType } from 'mime-types';
import { join, sep } from 'node:path';
import type { IgnoredEntry, LocalFile, WalkOptions, WalkResult } from '../../types/sync.js';

/**
 * Content-Type used when the extension is unknown
 */
export const DEFAULT_CONTENT_TYPE = 'text/plain';

/**
 * Get Content-Type for an object key
 */
export function getContentType(key: string): string {
  return getMimeType(key) || DEFAULT_CONTENT_TYPE;
}

/**
 * Convert a relative path to an object key (forward slashes, no leading slash)
 */
export function toObjectKey(relativePath: string): string {
  return relativePath.split(sep).join('/').replace(/^(\.\/)+/, '').replace(/^\/+/, '');
}

/**
 * Lexical key order used for walk results and reports
 */
export function compareKeys(a: { key: string }, b: { key: string }): number {
  if (a.key < b.key) return -1;
  if (a.key > b.key) return 1;
  return 0;
}

/**
 * Walk a directory tree
 *
 * Symbolic links are not followed: a link (to a file or a directory) and any
 * other entry that is neither a regular file nor a directory ends up in
 * `ignored`. Dotfiles are included. Sizes come from the walk itself; a file
 * removed afterwards fails when it is read, not here.
 */
export async function walkDirectory(
  root: string,
  options: WalkOptions = {}
): Promise<WalkResult> {
  const { exclude = [] } = options;

  const entries = await glob(['**/*'], {
    cwd: root,
    absolute: false,
    ignore: exclude,
    onlyFiles: false,
    followSymbolicLinks: false,
    objectMode: true,
    dot: true,
    stats: true,
  });

  const files: LocalFile[] = [];
  const ignored: IgnoredEntry[] = [];

  for (const entry of entries) {
    if (entry.dirent.isDirectory()) {
      continue;
    }

    const absolutePath = join(root, entry.path);
    const key = toObjectKey(entry.path);

    if (!entry.dirent.isFile()) {
      ignored.push({ absolutePath, key, reason: 'not-a-regular-file' });
      continue;
    }

    files.push({
      absolutePath,
      relativePath: entry.path.split('/').join(sep),
      key,
      size: entry.stats?.size ?? 0,
      contentType: getContentType(key),
    });
  }

  files.sort(compareKeys);
  ignored.sort(compareKeys);

  return { files, ignored };
}
