/**
 * S3 bucket operations
 *
 * One-shot calls around the sync: creating the bucket, switching on website
 * hosting, attaching the public-read policy and listing.
 */

import {
  S3Client,
  CreateBucketCommand,
  PutBucketWebsiteCommand,
  PutBucketPolicyCommand,
  GetBucketLocationCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  type BucketLocationConstraint,
} from '@aws-sdk/client-s3';
import { RemoteCallError, isAwsError, withRemoteCall } from '../errors.js';

/**
 * Region used by S3 when a bucket has no location constraint
 */
export const DEFAULT_REGION = 'us-east-1';

/**
 * Regions whose website endpoint is `s3-website-<region>` rather than `s3-website.<region>`
 */
const DASH_WEBSITE_REGIONS = new Set([
  'us-east-1',
  'us-west-1',
  'us-west-2',
  'ap-southeast-1',
  'ap-southeast-2',
  'ap-northeast-1',
  'eu-west-1',
  'sa-east-1',
  'us-gov-west-1',
]);

/**
 * Object summary from a bucket listing
 */
export interface BucketObject {
  key: string;
  size: number;
  etag?: string;
  lastModified?: Date;
}

/**
 * Bucket summary from ListBuckets
 */
export interface BucketSummary {
  name: string;
  creationDate?: Date;
}

/**
 * Create S3 bucket
 *
 * Without a region the client's configured region is used.
 */
export async function createBucket(
  client: S3Client,
  bucketName: string,
  region?: string
): Promise<{ created: boolean; region: string }> {
  const targetRegion = region ?? (await client.config.region());

  try {
    await client.send(
      new CreateBucketCommand({
        Bucket: bucketName,
        // us-east-1 rejects an explicit LocationConstraint
        ...(targetRegion !== DEFAULT_REGION && {
          CreateBucketConfiguration: {
            LocationConstraint: targetRegion as BucketLocationConstraint,
          },
        }),
      })
    );
    return { created: true, region: targetRegion };
  } catch (error: unknown) {
    if (isAwsError(error, 'BucketAlreadyOwnedByYou')) {
      return { created: false, region: targetRegion };
    }
    throw RemoteCallError.from(error, 'CreateBucket', bucketName);
  }
}

/**
 * Configure bucket for static website hosting
 */
export async function configureBucketWebsite(
  client: S3Client,
  bucketName: string,
  indexDocument: string = 'index.html',
  errorDocument: string = 'error.html'
): Promise<void> {
  await withRemoteCall('PutBucketWebsite', bucketName, () =>
    client.send(
      new PutBucketWebsiteCommand({
        Bucket: bucketName,
        WebsiteConfiguration: {
          ErrorDocument: {
            Key: errorDocument,
          },
          IndexDocument: {
            Suffix: indexDocument,
          },
        },
      })
    )
  );
}

/**
 * Build the public-read policy document for a bucket
 */
export function buildPublicReadPolicy(bucketName: string): string {
  return JSON.stringify({
    Version: '2012-10-17',
    Statement: [
      {
        Sid: 'PublicReadGetObject',
        Effect: 'Allow',
        Principal: '*',
        Action: ['s3:GetObject'],
        Resource: [`arn:aws:s3:::${bucketName}/*`],
      },
    ],
  });
}

/**
 * Attach a policy that lets anyone read the bucket's objects
 */
export async function setBucketPublicReadPolicy(
  client: S3Client,
  bucketName: string
): Promise<void> {
  await withRemoteCall('PutBucketPolicy', bucketName, () =>
    client.send(
      new PutBucketPolicyCommand({
        Bucket: bucketName,
        Policy: buildPublicReadPolicy(bucketName),
      })
    )
  );
}

/**
 * List all buckets owned by the caller
 */
export async function listBuckets(client: S3Client): Promise<BucketSummary[]> {
  const buckets: BucketSummary[] = [];
  let continuationToken: string | undefined;

  do {
    const page = await withRemoteCall('ListBuckets', undefined, () =>
      client.send(new ListBucketsCommand({ ContinuationToken: continuationToken }))
    );

    for (const bucket of page.Buckets ?? []) {
      if (bucket.Name) {
        buckets.push({ name: bucket.Name, creationDate: bucket.CreationDate });
      }
    }

    continuationToken = page.ContinuationToken;
  } while (continuationToken);

  return buckets;
}

/**
 * List every object in a bucket, following continuation tokens
 */
export async function listBucketObjects(
  client: S3Client,
  bucketName: string
): Promise<BucketObject[]> {
  const objects: BucketObject[] = [];
  let continuationToken: string | undefined;

  do {
    const page = await withRemoteCall('ListObjectsV2', bucketName, () =>
      client.send(
        new ListObjectsV2Command({
          Bucket: bucketName,
          ContinuationToken: continuationToken,
        })
      )
    );

    for (const object of page.Contents ?? []) {
      if (object.Key) {
        objects.push({
          key: object.Key,
          size: object.Size ?? 0,
          etag: object.ETag,
          lastModified: object.LastModified,
        });
      }
    }

    continuationToken = page.NextContinuationToken;
  } while (continuationToken);

  return objects;
}

/**
 * Get the region a bucket lives in
 */
export async function getBucketRegion(
  client: S3Client,
  bucketName: string
): Promise<string> {
  const result = await withRemoteCall('GetBucketLocation', bucketName, () =>
    client.send(new GetBucketLocationCommand({ Bucket: bucketName }))
  );

  const constraint: string | undefined = result.LocationConstraint;
  if (!constraint) {
    return DEFAULT_REGION;
  }
  // Legacy constraint for buckets created in Ireland before regional names
  if (constraint === 'EU') {
    return 'eu-west-1';
  }
  return constraint;
}

/**
 * Get the website endpoint host for a region
 */
export function getWebsiteEndpoint(region: string): string {
  return DASH_WEBSITE_REGIONS.has(region)
    ? `s3-website-${region}.amazonaws.com`
    : `s3-website.${region}.amazonaws.com`;
}

/**
 * Get bucket website URL
 */
export function getBucketWebsiteUrl(bucketName: string, region: string): string {
  return `http://${bucketName}.${getWebsiteEndpoint(region)}`;
}
