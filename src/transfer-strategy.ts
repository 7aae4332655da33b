// Local imports
import { TransferStrategy } from './types';

// Transfer threshold and part size are the same value: 5 MiB, the smallest
// part size S3 accepts for every part but the last
export const CHUNK_SIZE = 5 * 1024 * 1024;

export interface Chunk {
  partNumber: number;
  body: Uint8Array;
}

/**
 * Select how an object of the given size is transferred.
 * Objects smaller than the threshold (including empty ones) go in a single request.
 */
export function selectTransferStrategy(size: number, threshold = CHUNK_SIZE): TransferStrategy {
  return size < threshold ? TransferStrategy.SINGLE_PART : TransferStrategy.CHUNKED;
}

/**
 * Cut a payload into consecutive chunks numbered from 1.
 * Every chunk is chunkSize bytes long except possibly the last one.
 * Chunks are views on the payload, no bytes are copied.
 */
export function splitIntoChunks(payload: Uint8Array, chunkSize = CHUNK_SIZE): Chunk[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }

  const chunks: Chunk[] = [];
  for (let offset = 0, partNumber = 1; offset < payload.byteLength; offset += chunkSize, partNumber++) {
    chunks.push({
      partNumber,
      body: payload.subarray(offset, Math.min(offset + chunkSize, payload.byteLength)),
    });
  }
  return chunks;
}
