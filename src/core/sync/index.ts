/**
 * Sync module
 *
 * Entity tag computation, directory walk, manifest diff and uploads
 */

// Entity tags
export {
  computeContentDigest,
  computeBufferDigest,
  formatEntityTag,
  DEFAULT_CHUNK_SIZE,
  type DigestOptions,
} from './etag.js';

// Directory walk
export {
  walkDirectory,
  getContentType,
  toObjectKey,
  DEFAULT_CONTENT_TYPE,
} from './file-walker.js';

export { parseObjectKind, resolveLocalPath } from './local-path.js';

// Manifest
export { loadManifest, needsUpload, type Manifest } from './manifest.js';

// Uploads
export { putFile, uploadFile, uploadFiles } from './s3-uploader.js';
export { syncDirectory, syncFile } from './sync-engine.js';
export { uploadPath } from './upload.js';

// Reports
export { summarizeResults, hasFailures, formatBytes } from './report.js';

// Re-export types
export type {
  LocalFile,
  IgnoredEntry,
  WalkResult,
  WalkOptions,
  FileStatus,
  FileResult,
  TransferReport,
  SyncReport,
  UploadReport,
  ObjectKind,
  FileProgressCallback,
  TransferOptions,
  SyncOptions,
  UploadPathOptions,
  UploadFileOptions,
} from '../../types/sync.js';
