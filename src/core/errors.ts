/**
 * Error types
 *
 * Validation problems are raised before any network call. Failed S3 calls are
 * wrapped in RemoteCallError. Per-file failures during a transfer are not thrown;
 * they show up as `failed` results in the transfer report.
 */

export type ErrorCode = 'VALIDATION' | 'REMOTE';

/**
 * Base class for every error sitepush raises on purpose
 */
export class SitePushError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SitePushError';
  }
}

/**
 * Bad input: unknown object kind, missing local path, invalid configuration
 */
export class ValidationError extends SitePushError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'VALIDATION', options);
    this.name = 'ValidationError';
  }
}

/**
 * Details pulled out of an AWS SDK error
 */
export interface AwsErrorDetails {
  message: string;
  name?: string;
  httpStatusCode?: number;
}

/**
 * A call to the object store failed
 */
export class RemoteCallError extends SitePushError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly bucket?: string,
    public readonly awsErrorName?: string,
    public readonly httpStatusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'REMOTE', options);
    this.name = 'RemoteCallError';
  }

  /**
   * Wrap whatever the SDK threw
   */
  static from(error: unknown, operation: string, bucket?: string): RemoteCallError {
    if (error instanceof RemoteCallError) {
      return error;
    }

    const details = describeAwsError(error);
    const target = bucket ? ` (bucket: ${bucket})` : '';
    const label = details.name && details.name !== 'Error' ? `${details.name}: ` : '';

    return new RemoteCallError(
      `${operation} failed${target}: ${label}${details.message}`,
      operation,
      bucket,
      details.name,
      details.httpStatusCode,
      { cause: error }
    );
  }
}

/**
 * Read name, message and HTTP status from an unknown thrown value
 */
export function describeAwsError(error: unknown): AwsErrorDetails {
  if (!error || typeof error !== 'object') {
    return { message: String(error) };
  }

  const details: AwsErrorDetails = {
    message: 'message' in error && typeof error.message === 'string' && error.message
      ? error.message
      : 'Unknown error',
  };

  if ('name' in error && typeof error.name === 'string') {
    details.name = error.name;
  }

  if (
    '$metadata' in error &&
    typeof error.$metadata === 'object' &&
    error.$metadata !== null &&
    'httpStatusCode' in error.$metadata &&
    typeof error.$metadata.httpStatusCode === 'number'
  ) {
    details.httpStatusCode = error.$metadata.httpStatusCode;
  }

  return details;
}

/**
 * Check for an SDK error by name (e.g. 'NoSuchBucket')
 */
export function isAwsError(error: unknown, name: string): boolean {
  return describeAwsError(error).name === name;
}

/**
 * Run an S3 call, rethrowing failures as RemoteCallError
 */
export async function withRemoteCall<T>(
  operation: string,
  bucket: string | undefined,
  call: () => Promise<T>
): Promise<T> {
  try {
    return await call();
  } catch (error: unknown) {
    throw RemoteCallError.from(error, operation, bucket);
  }
}

/**
 * Message of a thrown value
 *
 * Reads `message` by shape: errors from another realm (node:fs under a VM
 * context) are not instances of this realm's Error.
 */
export function getErrorMessage(error: unknown): string {
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
