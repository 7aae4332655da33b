export type RelayErrorCode =
  | 'ConfigurationError'
  | 'BucketNameExhausted'
  | 'NoSuffixConfigured'
  | 'ListingError'
  | 'SessionOpenFailed'
  | 'PartUploadFailed'
  | 'SessionCompleteFailed'
  | 'ObjectReadFailed'
  | 'ObjectWriteFailed'
  | 'ObjectTooLarge';

/**
 * Base class of every error the migration and sweep commands raise on purpose.
 * Transient storage failures never surface here: the S3 client retries them.
 */
export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/**
 * Invalid or missing configuration. Always halts the run.
 */
export class ConfigurationError extends RelayError {
  readonly code = 'ConfigurationError';
}

export type BucketConflictReason = 'suffix-exhausted' | 'no-suffix';

/**
 * The destination bucket name is owned by another account and no usable
 * alternative name is left.
 */
export class BucketConflictError extends RelayError {
  readonly code: 'BucketNameExhausted' | 'NoSuffixConfigured';

  constructor(
    readonly bucket: string,
    readonly reason: BucketConflictReason,
    readonly attemptedName: string = bucket
  ) {
    super(
      reason === 'no-suffix'
        ? `Bucket name "${bucket}" is taken at the destination and no bucket suffix is configured`
        : `Bucket names "${bucket}" and "${attemptedName}" are both taken at the destination`
    );
    this.code = reason === 'no-suffix' ? 'NoSuffixConfigured' : 'BucketNameExhausted';
  }
}

export class ListingError extends RelayError {
  readonly code = 'ListingError';

  constructor(
    readonly bucket: string,
    readonly side: 'source' | 'destination',
    cause: unknown
  ) {
    super(`Failed to list ${side} bucket "${bucket}": ${describeError(cause)}`, cause);
  }
}

export class SessionOpenFailedError extends RelayError {
  readonly code = 'SessionOpenFailed';

  constructor(
    readonly bucket: string,
    readonly key: string,
    cause: unknown
  ) {
    super(`Failed to open multipart upload for ${bucket}/${key}: ${describeError(cause)}`, cause);
  }
}

export class PartUploadFailedError extends RelayError {
  readonly code = 'PartUploadFailed';

  constructor(
    readonly bucket: string,
    readonly key: string,
    readonly uploadId: string,
    readonly failedParts: number[],
    cause: unknown,
    readonly abortError?: unknown
  ) {
    super(
      `Failed to upload part(s) ${failedParts.join(', ')} of ${bucket}/${key}: ${describeError(cause)}` +
        (abortError === undefined
          ? ''
          : ` (abort of upload ${uploadId} also failed: ${describeError(abortError)})`),
      cause
    );
  }
}

export class SessionCompleteFailedError extends RelayError {
  readonly code = 'SessionCompleteFailed';

  constructor(
    readonly bucket: string,
    readonly key: string,
    readonly uploadId: string,
    cause: unknown,
    readonly abortError?: unknown
  ) {
    super(
      `Failed to complete multipart upload of ${bucket}/${key}: ${describeError(cause)}` +
        (abortError === undefined
          ? ''
          : ` (abort of upload ${uploadId} also failed: ${describeError(abortError)})`),
      cause
    );
  }
}

export class ObjectReadError extends RelayError {
  readonly code = 'ObjectReadFailed';

  constructor(
    readonly bucket: string,
    readonly key: string,
    cause: unknown
  ) {
    super(`Failed to read source object ${bucket}/${key}: ${describeError(cause)}`, cause);
  }
}

export class ObjectWriteError extends RelayError {
  readonly code = 'ObjectWriteFailed';

  constructor(
    readonly bucket: string,
    readonly key: string,
    cause: unknown
  ) {
    super(`Failed to write destination object ${bucket}/${key}: ${describeError(cause)}`, cause);
  }
}

/**
 * The object would need more parts than a multipart upload accepts
 */
export class ObjectTooLargeError extends RelayError {
  readonly code = 'ObjectTooLarge';

  constructor(
    readonly bucket: string,
    readonly key: string,
    readonly size: number,
    readonly partCount: number,
    readonly maxParts: number
  ) {
    super(`Object ${bucket}/${key} (${size} bytes) needs ${partCount} parts, more than the limit of ${maxParts}`);
  }
}

export type BucketLevelError = BucketConflictError | ListingError;

export type ObjectLevelError =
  | SessionOpenFailedError
  | PartUploadFailedError
  | SessionCompleteFailedError
  | ObjectReadError
  | ObjectWriteError
  | ObjectTooLargeError;

export function isBucketLevelError(error: unknown): error is BucketLevelError {
  return error instanceof BucketConflictError || error instanceof ListingError;
}

export function isObjectLevelError(error: unknown): error is ObjectLevelError {
  return (
    error instanceof SessionOpenFailedError ||
    error instanceof PartUploadFailedError ||
    error instanceof SessionCompleteFailedError ||
    error instanceof ObjectReadError ||
    error instanceof ObjectWriteError ||
    error instanceof ObjectTooLargeError
  );
}

/**
 * Message of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
