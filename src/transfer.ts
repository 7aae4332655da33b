// Local imports
import { transferChunked } from './chunked-transfer';
import { ObjectWriteError } from './errors';
import { CHUNK_SIZE, selectTransferStrategy } from './transfer-strategy';
import { TransferStrategy } from './types';

// Types
import type { ChunkedTransferOptions } from './chunked-transfer';
import type { StorageClient } from './storage-client';

/**
 * Write one object payload to the destination with the strategy its size calls for
 */
export async function transferObject(
  destination: StorageClient,
  bucket: string,
  key: string,
  payload: Uint8Array,
  options: ChunkedTransferOptions = {}
): Promise<TransferStrategy> {
  const strategy = selectTransferStrategy(payload.byteLength, options.chunkSize ?? CHUNK_SIZE);

  if (strategy === TransferStrategy.CHUNKED) {
    await transferChunked(destination, bucket, key, payload, options);
    return strategy;
  }

  try {
    await destination.putObject(bucket, key, payload);
  } catch (error) {
    throw new ObjectWriteError(bucket, key, error);
  }
  return strategy;
}
