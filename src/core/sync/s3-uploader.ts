/**
 * S3 file uploader
 */

import { S3Client, PutObjectCommand } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { createReadStream } from 'node:fs';
import pLimit from 'p-limit';
import { getErrorMessage, RemoteCallError } from '../errors.js';
import { DEFAULT_CHUNK_SIZE } from './etag.js';
import type {
  FileProgressCallback,
  FileResult,
  LocalFile,
  UploadFileOptions,
} from '../../types/sync.js';

/**
 * Send one file to the bucket, throwing RemoteCallError on failure
 *
 * Files up to one chunk go up with a single PutObject. Larger files use a
 * multipart upload whose part size is the chunk size, so the entity tag S3
 * assigns matches the one computed locally with the same chunk size.
 */
export async function putFile(
  client: S3Client,
  bucketName: string,
  file: LocalFile,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): Promise<void> {
  try {
    if (file.size > chunkSize) {
      const upload = new Upload({
        client,
        params: {
          Bucket: bucketName,
          Key: file.key,
          Body: createReadStream(file.absolutePath),
          ContentType: file.contentType,
        },
        partSize: chunkSize,
        queueSize: 1,
      });

      await upload.done();
      return;
    }

    await client.send(
      new PutObjectCommand({
        Bucket: bucketName,
        Key: file.key,
        Body: createReadStream(file.absolutePath),
        ContentType: file.contentType,
        ContentLength: file.size,
      })
    );
  } catch (error: unknown) {
    throw RemoteCallError.from(error, `Upload ${file.key}`, bucketName);
  }
}

/**
 * Upload a single file, capturing any failure in the result
 */
export async function uploadFile(
  client: S3Client,
  bucketName: string,
  file: LocalFile,
  options: UploadFileOptions = {}
): Promise<FileResult> {
  const { chunkSize = DEFAULT_CHUNK_SIZE, digest, dryRun = false } = options;

  const startTime = Date.now();
  const base = {
    key: file.key,
    absolutePath: file.absolutePath,
    ...(digest && { digest }),
  };

  try {
    if (!dryRun) {
      await putFile(client, bucketName, file, chunkSize);
    }

    return {
      ...base,
      status: 'uploaded',
      size: file.size,
      duration: Date.now() - startTime,
    };
  } catch (error: unknown) {
    return {
      ...base,
      status: 'failed',
      size: 0,
      error: getErrorMessage(error),
      duration: Date.now() - startTime,
    };
  }
}

/**
 * Upload files unconditionally, at most `concurrency` at a time
 *
 * Results keep the order of `files`.
 */
export async function uploadFiles(
  client: S3Client,
  bucketName: string,
  files: LocalFile[],
  options: UploadFileOptions & { concurrency?: number } = {},
  onProgress?: FileProgressCallback
): Promise<FileResult[]> {
  const { concurrency = 1, ...uploadOptions } = options;

  const limit = pLimit(concurrency);
  let completed = 0;

  return Promise.all(
    files.map((file) =>
      limit(async () => {
        const result = await uploadFile(client, bucketName, file, uploadOptions);
        completed++;
        onProgress?.(result, completed, files.length);
        return result;
      })
    )
  );
}
