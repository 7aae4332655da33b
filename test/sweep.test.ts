import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { sweepAllBuckets, sweepBucket } from '../src/sweep';
import { MemoryStorage, bytes } from './helpers/memory-storage';

function manyObjects(count: number): Record<string, Uint8Array> {
  const objects: Record<string, Uint8Array> = {};
  for (let i = 0; i < count; i++) {
    objects[`object-${String(i).padStart(4, '0')}`] = bytes(1, i);
  }
  return objects;
}

describe('sweep', () => {
  let storage: MemoryStorage;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    storage = new MemoryStorage();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('sweepBucket', () => {
    it('follows every listing page, deletes every object and then the bucket', async () => {
      storage.seed('big', manyObjects(2500));

      const result = await sweepBucket(storage, 'big');

      expect(result).toEqual({
        bucket: 'big',
        objectsFound: 2500,
        deleted: 2500,
        failedKeys: [],
        uploadsAborted: 0,
        bucketDeleted: true,
      });
      expect(storage.calls.listObjects.map((call) => call.continuationToken)).toEqual([undefined, '1000', '2000']);
      expect(storage.buckets.has('big')).toBe(false);
    });

    it('keeps a bucket whose objects could not all be deleted', async () => {
      storage.seed('a', { k1: bytes(1), k2: bytes(1), k3: bytes(1) });
      storage.failures.deleteObjects.add('k2');

      const result = await sweepBucket(storage, 'a');

      expect(result).toMatchObject({
        deleted: 2,
        failedKeys: ['k2'],
        bucketDeleted: false,
        error: '1 objects could not be deleted, bucket kept',
      });
      expect(storage.keysOf('a')).toEqual(['k2']);
    });

    it('reports a listing failure and leaves the bucket alone', async () => {
      storage.seed('a', { k1: bytes(1) });
      storage.failures.listObjects.add('a');

      const result = await sweepBucket(storage, 'a');

      expect(result.error).toBe('Failed to list objects: Listing a is not allowed');
      expect(result.bucketDeleted).toBe(false);
      expect(storage.keysOf('a')).toEqual(['k1']);
    });

    it('deletes an empty bucket', async () => {
      storage.seed('empty');

      await expect(sweepBucket(storage, 'empty')).resolves.toMatchObject({ objectsFound: 0, bucketDeleted: true });
    });

    it('only counts objects in a dry run', async () => {
      storage.seed('a', { k1: bytes(1), k2: bytes(1) });

      const result = await sweepBucket(storage, 'a', { dryRun: true });

      expect(result).toMatchObject({ objectsFound: 2, deleted: 0, bucketDeleted: false });
      expect(storage.keysOf('a')).toEqual(['k1', 'k2']);
    });

    it('aborts incomplete multipart uploads when asked', async () => {
      storage.seed('a', { k1: bytes(1) });
      await storage.createMultipartUpload('a', 'unfinished.bin');

      const result = await sweepBucket(storage, 'a', { abortIncompleteUploads: true });

      expect(result).toMatchObject({ uploadsAborted: 1, bucketDeleted: true });
      expect(storage.openSessions).toBe(0);
    });

    it('calls the listing and deletion hooks', async () => {
      storage.seed('a', { k1: bytes(1), k2: bytes(1) });
      const onObjectsListed = vi.fn();
      const onObjectDeleted = vi.fn();

      await sweepBucket(storage, 'a', { onObjectsListed, onObjectDeleted });

      expect(onObjectsListed).toHaveBeenCalledWith('a', 2);
      expect(onObjectDeleted.mock.calls).toEqual([
        ['a', 'k1'],
        ['a', 'k2'],
      ]);
    });
  });

  describe('sweepAllBuckets', () => {
    it('sweeps only the listed buckets and reports each one as it finishes', async () => {
      storage.seed('a', { k1: bytes(1) }).seed('b', { k2: bytes(1), k3: bytes(1) }).seed('keep', { k4: bytes(1) });
      const swept: Array<[string, number]> = [];

      const report = await sweepAllBuckets(
        storage,
        { onBucketSwept: (result) => swept.push([result.bucket, result.deleted]) },
        ['b', 'a']
      );

      expect(swept).toEqual([
        ['b', 2],
        ['a', 1],
      ]);
      expect(report.buckets.map((bucket) => bucket.bucketDeleted)).toEqual([true, true]);
      await expect(storage.listBuckets()).resolves.toEqual(['keep']);
    });

    it('carries on after a bucket fails', async () => {
      storage.seed('a', { stuck: bytes(1) }).seed('b', { k1: bytes(1) }).seed('c');
      storage.failures.deleteObjects.add('stuck');

      const report = await sweepAllBuckets(storage);

      expect(report.buckets.map((bucket) => [bucket.bucket, bucket.bucketDeleted])).toEqual([
        ['a', false],
        ['b', true],
        ['c', true],
      ]);
      await expect(storage.listBuckets()).resolves.toEqual(['a']);
    });
  });
});
