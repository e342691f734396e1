/**
 * Sync and upload type definitions
 */

/**
 * Local file picked up by the directory walk
 */
export interface LocalFile {
  /** Absolute path to file */
  absolutePath: string;

  /** Path relative to the walked directory (platform separators) */
  relativePath: string;

  /** Object key (forward slashes, no leading slash) */
  key: string;

  /** File size in bytes */
  size: number;

  /** Content-Type sent with the upload */
  contentType: string;
}

/**
 * Entry found by the walk that is not a regular file (symlink, socket, FIFO, ...)
 */
export interface IgnoredEntry {
  absolutePath: string;
  key: string;
  reason: 'not-a-regular-file';
}

/**
 * Directory walk result
 */
export interface WalkResult {
  /** Regular files in lexical key order */
  files: LocalFile[];

  /** Entries that were not followed or uploaded */
  ignored: IgnoredEntry[];
}

/**
 * Walk options
 */
export interface WalkOptions {
  /** Glob patterns (relative to the walked directory) to leave out */
  exclude?: string[];
}

export type FileStatus = 'uploaded' | 'skipped' | 'failed' | 'ignored';

/**
 * Outcome for a single file
 */
export interface FileResult {
  key: string;
  absolutePath: string;
  status: FileStatus;

  /** Bytes sent (0 unless uploaded) */
  size: number;

  /** Locally computed entity tag, when one was computed */
  digest?: string;

  /** Why the file was skipped or ignored */
  reason?: 'unchanged' | 'not-a-regular-file';

  /** Error message if failed */
  error?: string;

  /** Duration in milliseconds */
  duration?: number;
}

/**
 * Aggregate result of a transfer
 */
export interface TransferReport {
  bucket: string;
  totalFiles: number;
  uploaded: number;
  skipped: number;
  failed: number;
  ignored: number;

  /** Bytes uploaded */
  uploadedBytes: number;

  /** Duration in milliseconds */
  duration: number;

  /** Per-file results in walk order */
  results: FileResult[];
}

export interface SyncReport extends TransferReport {
  /** Absolute sync root */
  root: string;

  /** When true, `uploaded` counts files that would have been uploaded */
  dryRun: boolean;
}

export interface UploadReport extends TransferReport {
  /** Absolute path of the uploaded file or directory */
  source: string;
  kind: ObjectKind;
}

export type ObjectKind = 'file' | 'dir';

/**
 * Called after each file is handled
 */
export type FileProgressCallback = (
  result: FileResult,
  completed: number,
  total: number
) => void;

/**
 * Options shared by transfers
 */
export interface TransferOptions {
  /** Digest / multipart part size in bytes (default 8 MiB) */
  chunkSize?: number;

  /** Glob patterns to exclude from directory walks */
  exclude?: string[];

  /** Files handled at once (default 1) */
  concurrency?: number;

  onFile?: FileProgressCallback;
}

export interface SyncOptions extends TransferOptions {
  bucket: string;

  /** Local directory whose contents mirror the bucket root */
  root: string;

  /** Compare and report without uploading */
  dryRun?: boolean;
}

export interface UploadPathOptions extends TransferOptions {
  bucket: string;

  /** Local file or directory */
  path: string;

  /** Unparsed object kind, checked before any network call */
  kind: string;
}

/**
 * Options for a single upload
 */
export interface UploadFileOptions {
  /** Files above this size go up as multipart with parts of this size */
  chunkSize?: number;

  /** Digest to record in the result */
  digest?: string;

  /** Report success without sending anything */
  dryRun?: boolean;
}
