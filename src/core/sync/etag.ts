/**
 * S3-compatible entity tag computation
 *
 * S3 reports the MD5 of the body for single-part uploads and, for multipart
 * uploads, the MD5 of the concatenated binary part digests followed by
 * `-<part count>`. Computing the same value locally lets a sync compare files
 * against a bucket listing without downloading anything.
 */

import hasha from 'hasha';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { ValidationError } from '../errors.js';

/**
 * Default chunk size (8 MiB), also used as the multipart part size
 */
export const DEFAULT_CHUNK_SIZE = 8 * 1024 * 1024;

/**
 * Digest options
 */
export interface DigestOptions {
  /** Chunk size in bytes (default: 8 MiB) */
  chunkSize?: number;
}

function md5(data: Buffer): Buffer {
  return hasha(data, { algorithm: 'md5', encoding: 'buffer' });
}

function assertChunkSize(chunkSize: number): void {
  if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }
}

/**
 * Turn per-chunk MD5 digests into an entity tag
 *
 * No chunks at all is treated as a single empty chunk.
 */
export function formatEntityTag(chunkDigests: Buffer[]): string {
  if (chunkDigests.length === 0) {
    return `"${md5(Buffer.alloc(0)).toString('hex')}"`;
  }

  if (chunkDigests.length === 1) {
    return `"${chunkDigests[0].toString('hex')}"`;
  }

  const combined = md5(Buffer.concat(chunkDigests)).toString('hex');
  return `"${combined}-${chunkDigests.length}"`;
}

/**
 * MD5 of one byte range, read from disk without holding the whole range in memory
 */
async function md5Range(filePath: string, start: number, length: number): Promise<Buffer> {
  const digest = await hasha.fromStream(
    createReadStream(filePath, { start, end: start + length - 1 }),
    { algorithm: 'md5', encoding: 'buffer' }
  );

  if (!digest) {
    throw new Error(`No digest produced for ${filePath} at offset ${start}`);
  }

  return digest;
}

/**
 * Compute the entity tag S3 would report for a file uploaded with this chunk size
 */
export async function computeContentDigest(
  filePath: string,
  options: DigestOptions = {}
): Promise<string> {
  const { chunkSize = DEFAULT_CHUNK_SIZE } = options;
  assertChunkSize(chunkSize);

  const { size } = await stat(filePath);
  const chunkDigests: Buffer[] = [];

  for (let offset = 0; offset < size; offset += chunkSize) {
    chunkDigests.push(await md5Range(filePath, offset, Math.min(chunkSize, size - offset)));
  }

  return formatEntityTag(chunkDigests);
}

/**
 * Compute the entity tag for in-memory content
 */
export function computeBufferDigest(data: Buffer, options: DigestOptions = {}): string {
  const { chunkSize = DEFAULT_CHUNK_SIZE } = options;
  assertChunkSize(chunkSize);

  const chunkDigests: Buffer[] = [];
  for (let offset = 0; offset < data.length; offset += chunkSize) {
    chunkDigests.push(md5(data.subarray(offset, offset + chunkSize)));
  }

  return formatEntityTag(chunkDigests);
}
