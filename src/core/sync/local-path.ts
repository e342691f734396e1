/**
 * Local path validation
 */

import { existsSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { ValidationError } from '../errors.js';
import type { ObjectKind } from '../../types/sync.js';

const OBJECT_KINDS: readonly ObjectKind[] = ['file', 'dir'];

/**
 * Parse an object kind argument
 *
 * @throws ValidationError for anything but 'file' or 'dir'
 */
export function parseObjectKind(value: string): ObjectKind {
  const kind = OBJECT_KINDS.find((candidate) => candidate === value);

  if (!kind) {
    throw new ValidationError(
      `The object type ${chalk.cyan(value)} is not recognized (expected one of: ${OBJECT_KINDS.join(', ')})`
    );
  }

  return kind;
}

/**
 * Resolve a local path and check it is a file or a directory
 *
 * @param path - Path given by the caller, relative paths resolve against cwd
 * @param kind - What the path must point to
 * @param cwd - Base for relative paths
 * @returns Absolute path
 */
export function resolveLocalPath(
  path: string,
  kind: ObjectKind,
  cwd: string = process.cwd()
): string {
  const absolutePath = resolve(cwd, path);

  if (!existsSync(absolutePath)) {
    throw new ValidationError(`Local path not found: ${chalk.cyan(path)}`);
  }

  const stats = statSync(absolutePath);

  if (kind === 'dir' && !stats.isDirectory()) {
    throw new ValidationError(`Not a directory: ${chalk.cyan(path)}`);
  }

  if (kind === 'file' && !stats.isFile()) {
    throw new ValidationError(`Not a regular file: ${chalk.cyan(path)}`);
  }

  return absolutePath;
}
