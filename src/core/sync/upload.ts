/**
 * Unconditional upload of a file or a directory
 */

import type { S3Client } from '@aws-sdk/client-s3';
import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { DEFAULT_CHUNK_SIZE } from './etag.js';
import { compareKeys, getContentType, walkDirectory } from './file-walker.js';
import { parseObjectKind, resolveLocalPath } from './local-path.js';
import { summarizeResults, toIgnoredResult } from './report.js';
import { uploadFiles } from './s3-uploader.js';
import type { FileResult, LocalFile, UploadPathOptions, UploadReport } from '../../types/sync.js';

/**
 * Object key for a walked file below a directory prefix
 *
 * An empty prefix (the base name of `/`) adds nothing.
 */
export function toUploadKey(prefix: string, key: string): string {
  return prefix ? `${prefix}/${key}` : key;
}

/**
 * Upload a file or directory without consulting the bucket
 *
 * A file is stored under its base name. A directory keeps its own name as the
 * key prefix: uploading `site/` stores `site/index.html`, `site/css/app.css`, ...
 *
 * @throws ValidationError for an unknown kind or a missing path (before any network call)
 */
export async function uploadPath(
  client: S3Client,
  options: UploadPathOptions
): Promise<UploadReport> {
  const startTime = Date.now();

  const {
    bucket,
    path,
    chunkSize = DEFAULT_CHUNK_SIZE,
    exclude = [],
    concurrency = 1,
    onFile,
  } = options;

  const kind = parseObjectKind(options.kind);
  const source = resolveLocalPath(path, kind);

  let files: LocalFile[];
  let ignoredResults: FileResult[] = [];

  if (kind === 'file') {
    const key = basename(source);
    const stats = await stat(source);
    files = [
      {
        absolutePath: source,
        relativePath: key,
        key,
        size: stats.size,
        contentType: getContentType(key),
      },
    ];
  } else {
    const prefix = basename(source);
    const walked = await walkDirectory(source, { exclude });
    files = walked.files.map((file) => ({ ...file, key: toUploadKey(prefix, file.key) }));
    ignoredResults = walked.ignored.map((entry) =>
      toIgnoredResult({ ...entry, key: toUploadKey(prefix, entry.key) })
    );
  }

  const fileResults = await uploadFiles(
    client,
    bucket,
    files,
    { chunkSize, concurrency },
    onFile
  );

  return {
    ...summarizeResults(bucket, [...fileResults, ...ignoredResults].sort(compareKeys), startTime),
    source,
    kind,
  };
}
