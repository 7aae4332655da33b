import { describe, expect, it } from 'vitest';

import {
  BucketConflictError,
  ConfigurationError,
  ListingError,
  ObjectReadError,
  ObjectTooLargeError,
  PartUploadFailedError,
  SessionCompleteFailedError,
  describeError,
  isBucketLevelError,
  isObjectLevelError,
} from '../src/errors';

describe('errors', () => {
  it('names errors after their class and keeps the cause', () => {
    const cause = new Error('connection reset');
    const error = new ListingError('photos', 'destination', cause);

    expect(error.name).toBe('ListingError');
    expect(error.code).toBe('ListingError');
    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Failed to list destination bucket "photos": connection reset');
  });

  it('describes bucket name conflicts', () => {
    const exhausted = new BucketConflictError('photos', 'suffix-exhausted', 'photos-copy');
    const noSuffix = new BucketConflictError('photos', 'no-suffix');

    expect(exhausted.code).toBe('BucketNameExhausted');
    expect(exhausted.message).toBe('Bucket names "photos" and "photos-copy" are both taken at the destination');
    expect(noSuffix.code).toBe('NoSuffixConfigured');
    expect(noSuffix.attemptedName).toBe('photos');
  });

  it('mentions a failed abort', () => {
    const error = new SessionCompleteFailedError('b', 'k', 'upload-9', new Error('rejected'), 'timeout');

    expect(error.message).toBe(
      'Failed to complete multipart upload of b/k: rejected (abort of upload upload-9 also failed: timeout)'
    );
  });

  it('sorts errors into bucket and object levels', () => {
    const bucketLevel = new BucketConflictError('a', 'no-suffix');
    const objectLevel = new PartUploadFailedError('a', 'k', 'u', [1], new Error('x'));

    expect(isBucketLevelError(bucketLevel)).toBe(true);
    expect(isObjectLevelError(bucketLevel)).toBe(false);
    expect(isObjectLevelError(objectLevel)).toBe(true);
    expect(isObjectLevelError(new ObjectReadError('a', 'k', 'gone'))).toBe(true);
    expect(isObjectLevelError(new ObjectTooLargeError('a', 'k', 10, 10, 5))).toBe(true);
    expect(isBucketLevelError(new ConfigurationError('bad'))).toBe(false);
    expect(isObjectLevelError(new Error('plain'))).toBe(false);
  });

  it('describes any thrown value', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('text')).toBe('text');
    expect(describeError(42)).toBe('42');
  });
});
