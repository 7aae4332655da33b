// Third-party dependencies
import pLimit from 'p-limit';

// Local imports
import {
  ObjectTooLargeError,
  PartUploadFailedError,
  SessionCompleteFailedError,
  SessionOpenFailedError,
  describeError,
} from './errors';
import { logError, logVerbose, logWarning } from './logger';
import { CHUNK_SIZE, splitIntoChunks } from './transfer-strategy';
import { formatBytes } from './utils';

// Types
import type { StorageClient } from './storage-client';
import type { CompletedPart } from './types';

export const DEFAULT_PART_CONCURRENCY = 4;

// Most parts a multipart upload accepts, 50 GiB at the default part size
export const MAX_PARTS = 10_000;

export interface ChunkedTransferOptions {
  chunkSize?: number;
  partConcurrency?: number; // Upper bound of part uploads in flight for one session
  onPartUploaded?: (partNumber: number, bytes: number) => void;
}

export interface ChunkedTransferResult {
  uploadId: string;
  partCount: number;
}

/**
 * Reject an object whose size needs more than MAX_PARTS parts
 */
export function assertWithinPartLimit(bucket: string, key: string, size: number, chunkSize = CHUNK_SIZE): void {
  const partCount = Math.ceil(size / chunkSize);
  if (partCount > MAX_PARTS) {
    throw new ObjectTooLargeError(bucket, key, size, partCount, MAX_PARTS);
  }
}

interface PartFailure {
  partNumber: number;
  reason: unknown;
}

/**
 * Upload a payload through a multipart session.
 *
 * The session is opened, every chunk is uploaded on a bounded pool, and once
 * all uploads have settled the session is either completed with the parts in
 * part-number order or aborted. A session opened here is never left open when
 * this function returns or throws, unless the abort request itself fails, in
 * which case the thrown error carries `abortError` and the upload ID.
 *
 * @throws ObjectTooLargeError when the payload needs more than MAX_PARTS parts
 * @throws SessionOpenFailedError when no session could be opened
 * @throws PartUploadFailedError when at least one part failed (session aborted)
 * @throws SessionCompleteFailedError when completion was rejected (session aborted)
 */
export async function transferChunked(
  client: StorageClient,
  bucket: string,
  key: string,
  payload: Uint8Array,
  options: ChunkedTransferOptions = {}
): Promise<ChunkedTransferResult> {
  const chunkSize = options.chunkSize ?? CHUNK_SIZE;
  const partConcurrency = options.partConcurrency ?? DEFAULT_PART_CONCURRENCY;

  // Partition before opening the session so a bad chunk size cannot leave one open
  const chunks = splitIntoChunks(payload, chunkSize);
  assertWithinPartLimit(bucket, key, payload.byteLength, chunkSize);

  let uploadId: string;
  try {
    uploadId = await client.createMultipartUpload(bucket, key);
  } catch (error) {
    throw new SessionOpenFailedError(bucket, key, error);
  }

  logVerbose(`Uploading ${chunks.length} parts of ${formatBytes(chunkSize)} for ${key} (${partConcurrency} at a time)`);

  const limit = pLimit(partConcurrency);
  const settled = await Promise.allSettled(
    chunks.map((chunk) =>
      limit(async (): Promise<CompletedPart> => {
        const etag = await client.uploadPart(bucket, key, uploadId, chunk.partNumber, chunk.body);
        options.onPartUploaded?.(chunk.partNumber, chunk.body.byteLength);
        return { partNumber: chunk.partNumber, etag };
      })
    )
  );

  const parts: CompletedPart[] = [];
  const failures: PartFailure[] = [];
  settled.forEach((result, index) => {
    if (result.status === 'fulfilled') {
      parts.push(result.value);
    } else {
      failures.push({ partNumber: chunks[index].partNumber, reason: result.reason });
    }
  });

  if (failures.length > 0) {
    for (const failure of failures) {
      logError(`Error uploading part ${failure.partNumber} for ${key}: ${describeError(failure.reason)}`);
    }

    const abortError = await abortSession(client, bucket, key, uploadId);
    throw new PartUploadFailedError(
      bucket,
      key,
      uploadId,
      failures.map((failure) => failure.partNumber),
      failures[0].reason,
      abortError
    );
  }

  // Uploads finish in any order, completion needs ascending part numbers
  parts.sort((a, b) => a.partNumber - b.partNumber);

  try {
    await client.completeMultipartUpload(bucket, key, uploadId, parts);
  } catch (error) {
    logError(`Error completing multipart upload for ${key}: ${describeError(error)}`);
    const abortError = await abortSession(client, bucket, key, uploadId);
    throw new SessionCompleteFailedError(bucket, key, uploadId, error, abortError);
  }

  logVerbose(`Completed multipart upload for ${key} with ${parts.length} parts`);
  return { uploadId, partCount: parts.length };
}

/**
 * Abort a session, returning the abort failure instead of throwing it so the
 * caller can report it alongside the original error
 */
async function abortSession(
  client: StorageClient,
  bucket: string,
  key: string,
  uploadId: string
): Promise<unknown> {
  try {
    await client.abortMultipartUpload(bucket, key, uploadId);
    logWarning(`Aborted multipart upload for ${key}`);
    return undefined;
  } catch (abortError) {
    logError(`Failed to abort multipart upload ${uploadId} for ${key}: ${describeError(abortError)}`);
    return abortError;
  }
}
