/**
 * AWS integration module
 */

// Client creation
export {
  createS3Client,
  createS3ClientFromConfig,
  type S3ClientOptions,
} from './client.js';

// S3 Bucket management
export {
  createBucket,
  configureBucketWebsite,
  buildPublicReadPolicy,
  setBucketPublicReadPolicy,
  listBuckets,
  listBucketObjects,
  getBucketRegion,
  getWebsiteEndpoint,
  getBucketWebsiteUrl,
  DEFAULT_REGION,
  type BucketObject,
  type BucketSummary,
} from './s3-bucket.js';
