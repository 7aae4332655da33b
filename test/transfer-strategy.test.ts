import { describe, expect, it } from 'vitest';

import { CHUNK_SIZE, selectTransferStrategy, splitIntoChunks } from '../src/transfer-strategy';
import { TransferStrategy } from '../src/types';
import { bytes, sameBytes } from './helpers/memory-storage';

describe('selectTransferStrategy', () => {
  it('sends objects below 5 MiB in a single request', () => {
    expect(selectTransferStrategy(0)).toBe(TransferStrategy.SINGLE_PART);
    expect(selectTransferStrategy(1)).toBe(TransferStrategy.SINGLE_PART);
    expect(selectTransferStrategy(CHUNK_SIZE - 1)).toBe(TransferStrategy.SINGLE_PART);
  });

  it('chunks objects of exactly 5 MiB and above', () => {
    expect(selectTransferStrategy(CHUNK_SIZE)).toBe(TransferStrategy.CHUNKED);
    expect(selectTransferStrategy(CHUNK_SIZE + 1)).toBe(TransferStrategy.CHUNKED);
  });

  it('honours a custom threshold', () => {
    expect(selectTransferStrategy(99, 100)).toBe(TransferStrategy.SINGLE_PART);
    expect(selectTransferStrategy(100, 100)).toBe(TransferStrategy.CHUNKED);
  });
});

describe('splitIntoChunks', () => {
  it('cuts 8 MiB into a 5 MiB part and a 3 MiB part', () => {
    const chunks = splitIntoChunks(bytes(8 * 1024 * 1024));

    expect(chunks.map((chunk) => chunk.partNumber)).toEqual([1, 2]);
    expect(chunks.map((chunk) => chunk.body.byteLength)).toEqual([5 * 1024 * 1024, 3 * 1024 * 1024]);
  });

  it('numbers parts from 1 and leaves the remainder in the last part', () => {
    const chunks = splitIntoChunks(bytes(10), 4);

    expect(chunks.map((chunk) => chunk.partNumber)).toEqual([1, 2, 3]);
    expect(chunks.map((chunk) => chunk.body.byteLength)).toEqual([4, 4, 2]);
  });

  it('produces chunks whose concatenation is the payload', () => {
    const payload = bytes(1000, 7);
    const chunks = splitIntoChunks(payload, 300);

    const joined = new Uint8Array(payload.byteLength);
    let offset = 0;
    for (const chunk of chunks) {
      joined.set(chunk.body, offset);
      offset += chunk.body.byteLength;
    }

    expect(offset).toBe(1000);
    expect(sameBytes(joined, payload)).toBe(true);
  });

  it('does not add an empty trailing part when the size divides evenly', () => {
    expect(splitIntoChunks(bytes(8), 4).map((chunk) => chunk.body.byteLength)).toEqual([4, 4]);
  });

  it('returns no chunks for an empty payload', () => {
    expect(splitIntoChunks(new Uint8Array(0), 4)).toEqual([]);
  });

  it('rejects a chunk size that is not a positive integer', () => {
    expect(() => splitIntoChunks(bytes(4), 0)).toThrow(RangeError);
    expect(() => splitIntoChunks(bytes(4), 1.5)).toThrow(RangeError);
  });
});
