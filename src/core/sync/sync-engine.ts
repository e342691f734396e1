/**
 * Incremental directory sync
 *
 * Loads the bucket manifest once, walks the local tree and uploads only the
 * files whose locally computed entity tag differs from the one in the manifest.
 */

import type { S3Client } from '@aws-sdk/client-s3';
import pLimit from 'p-limit';
import { getErrorMessage } from '../errors.js';
import { computeContentDigest, DEFAULT_CHUNK_SIZE } from './etag.js';
import { compareKeys, walkDirectory } from './file-walker.js';
import { resolveLocalPath } from './local-path.js';
import { loadManifest, needsUpload, type Manifest } from './manifest.js';
import { summarizeResults, toIgnoredResult } from './report.js';
import { uploadFile } from './s3-uploader.js';
import type { FileResult, LocalFile, SyncOptions, SyncReport } from '../../types/sync.js';

/**
 * Digest one file and upload it if the manifest disagrees
 */
export async function syncFile(
  client: S3Client,
  bucketName: string,
  file: LocalFile,
  manifest: Manifest,
  options: { chunkSize?: number; dryRun?: boolean } = {}
): Promise<FileResult> {
  const { chunkSize = DEFAULT_CHUNK_SIZE, dryRun = false } = options;
  const startTime = Date.now();

  let digest: string;
  try {
    digest = await computeContentDigest(file.absolutePath, { chunkSize });
  } catch (error: unknown) {
    return {
      key: file.key,
      absolutePath: file.absolutePath,
      status: 'failed',
      size: 0,
      error: `Could not read file: ${getErrorMessage(error)}`,
      duration: Date.now() - startTime,
    };
  }

  if (!needsUpload(manifest, file.key, digest)) {
    return {
      key: file.key,
      absolutePath: file.absolutePath,
      status: 'skipped',
      size: 0,
      digest,
      reason: 'unchanged',
      duration: Date.now() - startTime,
    };
  }

  return uploadFile(client, bucketName, file, { chunkSize, digest, dryRun });
}

/**
 * Sync a local directory to the root of a bucket
 *
 * @throws ValidationError if `root` is not a directory (before any network call)
 * @throws RemoteCallError if the manifest cannot be loaded (before any upload)
 */
export async function syncDirectory(
  client: S3Client,
  options: SyncOptions
): Promise<SyncReport> {
  const startTime = Date.now();

  const {
    bucket,
    root,
    chunkSize = DEFAULT_CHUNK_SIZE,
    exclude = [],
    concurrency = 1,
    dryRun = false,
    onFile,
  } = options;

  const rootDir = resolveLocalPath(root, 'dir');

  const manifest = await loadManifest(client, bucket);
  const { files, ignored } = await walkDirectory(rootDir, { exclude });

  const limit = pLimit(concurrency);
  let completed = 0;

  const fileResults = await Promise.all(
    files.map((file) =>
      limit(async () => {
        const result = await syncFile(client, bucket, file, manifest, { chunkSize, dryRun });
        completed++;
        onFile?.(result, completed, files.length);
        return result;
      })
    )
  );

  const results = [...fileResults, ...ignored.map(toIgnoredResult)].sort(compareKeys);

  return {
    ...summarizeResults(bucket, results, startTime),
    root: rootDir,
    dryRun,
  };
}
