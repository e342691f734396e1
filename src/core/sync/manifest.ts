/**
 * Remote manifest: what the bucket already holds
 */

import type { S3Client } from '@aws-sdk/client-s3';
import { listBucketObjects } from '../aws/s3-bucket.js';

/**
 * Object key → entity tag as reported by the bucket listing
 */
export type Manifest = ReadonlyMap<string, string>;

/**
 * Load the manifest for a bucket
 *
 * Pages through the whole listing. A failed page rejects with RemoteCallError,
 * so an empty manifest always means the bucket is empty.
 */
export async function loadManifest(client: S3Client, bucketName: string): Promise<Manifest> {
  const objects = await listBucketObjects(client, bucketName);
  const manifest = new Map<string, string>();

  for (const object of objects) {
    if (object.etag) {
      manifest.set(object.key, object.etag);
    }
  }

  return manifest;
}

/**
 * Whether a file with this digest needs uploading under this key
 */
export function needsUpload(manifest: Manifest, key: string, digest: string): boolean {
  return manifest.get(key) !== digest;
}
