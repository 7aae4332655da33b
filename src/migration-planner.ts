// Local imports
import { assertWithinPartLimit } from './chunked-transfer';
import {
  BucketConflictError,
  ListingError,
  ObjectReadError,
  describeError,
  isBucketLevelError,
  isObjectLevelError,
} from './errors';
import { logError, logInfo, logVerbose, logWarning } from './logger';
import { LIST_PAGE_SIZE, listAllObjects } from './storage-client';
import { transferObject } from './transfer';
import { CHUNK_SIZE, selectTransferStrategy } from './transfer-strategy';
import { TransferStrategy } from './types';
import { formatBytes } from './utils';

// Types
import type { ChunkedTransferOptions } from './chunked-transfer';
import type { BucketLevelError, ObjectLevelError } from './errors';
import type { StorageClient } from './storage-client';
import type { BucketErrorPolicy, BucketOwnership, ObjectErrorPolicy, ObjectSummary } from './types';

// Source listings stop after this many keys per bucket
export const MAX_KEYS = 1_000_000;

/**
 * Callbacks for following a migration as it runs
 */
export interface MigrationReporter {
  bucketStarted?(sourceBucket: string): void;
  bucketPlanned?(plan: BucketPlan): void;
  objectStarted?(plan: BucketPlan, object: ObjectSummary): void;
  objectTransferred?(plan: BucketPlan, object: ObjectSummary, strategy: TransferStrategy): void;
  objectFailed?(plan: BucketPlan, object: ObjectSummary, error: ObjectLevelError): void;
}

export interface PlannerOptions extends ChunkedTransferOptions {
  bucketSuffix?: string;
  buckets?: string[]; // Only these source buckets
  include?: RegExp[];
  exclude?: RegExp[];
  maxSourceKeys?: number;
  pageSize?: number;
  onObjectError?: ObjectErrorPolicy;
  onBucketError?: BucketErrorPolicy;
  dryRun?: boolean;
  reporter?: MigrationReporter;
}

export interface BucketPlan {
  sourceBucket: string;
  destinationBucket: string;
  listed: number;
  filteredOut: number;
  alreadyMigrated: number;
  truncated: boolean;
  pending: ObjectSummary[];
}

export interface ObjectFailure {
  key: string;
  error: ObjectLevelError;
}

export interface BucketMigrationResult {
  sourceBucket: string;
  destinationBucket?: string;
  listed: number;
  filteredOut: number;
  alreadyMigrated: number;
  pending: number;
  truncated: boolean;
  singlePart: number;
  chunked: number;
  planned: number; // Pending objects left untouched by a dry run
  bytesTransferred: number;
  failures: ObjectFailure[];
  error?: BucketLevelError;
}

export interface MigrationReport {
  buckets: BucketMigrationResult[];
  missingBuckets: string[]; // Requested buckets absent from the source
  dryRun: boolean;
}

/**
 * Create the destination bucket for a source bucket and return its name.
 *
 * The source name is kept when it is free or already ours. When another owner
 * holds it, the suffixed name is tried exactly once.
 */
export async function resolveDestinationBucket(
  destination: StorageClient,
  sourceBucket: string,
  bucketSuffix?: string
): Promise<string> {
  const outcome = await destination.createBucket(sourceBucket);
  if (outcome !== 'taken') {
    return sourceBucket;
  }

  if (!bucketSuffix) {
    throw new BucketConflictError(sourceBucket, 'no-suffix');
  }

  const suffixedName = sourceBucket + bucketSuffix;
  logWarning(`Bucket name ${sourceBucket} is taken at the destination, trying ${suffixedName}`);

  const suffixedOutcome = await destination.createBucket(suffixedName);
  if (suffixedOutcome === 'taken') {
    throw new BucketConflictError(sourceBucket, 'suffix-exhausted', suffixedName);
  }
  return suffixedName;
}

/**
 * Work out the destination bucket name without creating anything.
 *
 * Same rules as resolveDestinationBucket, answered from HeadBucket: a name held
 * by another account moves on to the suffixed name, which is inspected once.
 */
export async function previewDestinationBucket(
  destination: StorageClient,
  sourceBucket: string,
  bucketSuffix?: string
): Promise<{ name: string; exists: boolean }> {
  const ownership = await inspectDestinationBucket(destination, sourceBucket);
  if (ownership !== 'taken') {
    return { name: sourceBucket, exists: ownership === 'owned' };
  }

  if (!bucketSuffix) {
    throw new BucketConflictError(sourceBucket, 'no-suffix');
  }

  const suffixedName = sourceBucket + bucketSuffix;
  const suffixedOwnership = await inspectDestinationBucket(destination, suffixedName);
  if (suffixedOwnership === 'taken') {
    throw new BucketConflictError(sourceBucket, 'suffix-exhausted', suffixedName);
  }
  return { name: suffixedName, exists: suffixedOwnership === 'owned' };
}

async function inspectDestinationBucket(destination: StorageClient, bucket: string): Promise<BucketOwnership> {
  try {
    return await destination.inspectBucket(bucket);
  } catch (error) {
    throw new ListingError(bucket, 'destination', error);
  }
}

/**
 * List source objects in listing order, stopping after maxKeys keys
 */
export async function listSourceObjects(
  source: StorageClient,
  bucket: string,
  maxKeys = MAX_KEYS,
  pageSize = LIST_PAGE_SIZE
): Promise<{ objects: ObjectSummary[]; truncated: boolean }> {
  const objects: ObjectSummary[] = [];
  let continuationToken: string | undefined;
  let truncated = false;

  try {
    while (objects.length < maxKeys) {
      const room = maxKeys - objects.length;
      const page = await source.listObjects(bucket, {
        continuationToken,
        maxKeys: Math.min(pageSize, room),
      });

      for (const object of page.objects.slice(0, room)) {
        objects.push(object);
      }
      continuationToken = page.nextContinuationToken;

      if (objects.length >= maxKeys && (continuationToken !== undefined || page.objects.length > room)) {
        truncated = true;
      }
      if (!continuationToken) {
        break;
      }
    }
  } catch (error) {
    throw new ListingError(bucket, 'source', error);
  }

  return { objects, truncated };
}

/**
 * List every key of a destination bucket, following pagination to the end
 */
export async function listDestinationKeys(
  destination: StorageClient,
  bucket: string,
  pageSize = LIST_PAGE_SIZE
): Promise<Set<string>> {
  const keys = new Set<string>();

  try {
    for await (const page of listAllObjects(destination, bucket, { pageSize })) {
      for (const object of page) {
        keys.add(object.key);
      }
    }
  } catch (error) {
    throw new ListingError(bucket, 'destination', error);
  }

  return keys;
}

/**
 * Source objects whose key is not present at the destination, in source order.
 * Only key names are compared.
 */
export function computePendingObjects(
  sourceObjects: readonly ObjectSummary[],
  migratedKeys: ReadonlySet<string>
): ObjectSummary[] {
  return sourceObjects.filter((object) => !migratedKeys.has(object.key));
}

/**
 * Whether a key passes the include and exclude patterns
 */
export function matchesFilters(key: string, include?: readonly RegExp[], exclude?: readonly RegExp[]): boolean {
  if (include && include.length > 0 && !include.some((pattern) => pattern.test(key))) {
    return false;
  }
  if (exclude && exclude.length > 0 && exclude.some((pattern) => pattern.test(key))) {
    return false;
  }
  return true;
}

/**
 * Build the work list of one bucket
 */
export async function planBucket(
  source: StorageClient,
  destination: StorageClient,
  sourceBucket: string,
  options: PlannerOptions = {}
): Promise<BucketPlan> {
  let destinationBucket: string;
  let migratedKeys: Set<string>;

  if (options.dryRun) {
    const preview = await previewDestinationBucket(destination, sourceBucket, options.bucketSuffix);
    destinationBucket = preview.name;
    migratedKeys = preview.exists
      ? await listDestinationKeys(destination, destinationBucket, options.pageSize)
      : new Set<string>();
  } else {
    destinationBucket = await resolveDestinationBucket(destination, sourceBucket, options.bucketSuffix);
    migratedKeys = await listDestinationKeys(destination, destinationBucket, options.pageSize);
  }

  const { objects, truncated } = await listSourceObjects(
    source,
    sourceBucket,
    options.maxSourceKeys ?? MAX_KEYS,
    options.pageSize
  );

  const selected = objects.filter((object) => matchesFilters(object.key, options.include, options.exclude));
  const pending = computePendingObjects(selected, migratedKeys);

  return {
    sourceBucket,
    destinationBucket,
    listed: objects.length,
    filteredOut: objects.length - selected.length,
    alreadyMigrated: selected.length - pending.length,
    truncated,
    pending,
  };
}

/**
 * Copy one object from the source bucket to the destination bucket
 */
export async function migrateObject(
  source: StorageClient,
  destination: StorageClient,
  plan: BucketPlan,
  object: ObjectSummary,
  options: ChunkedTransferOptions = {}
): Promise<{ strategy: TransferStrategy; bytes: number }> {
  // Payloads are held in memory whole, so refuse oversized objects before reading them
  const chunkSize = options.chunkSize ?? CHUNK_SIZE;
  if (selectTransferStrategy(object.size, chunkSize) === TransferStrategy.CHUNKED) {
    assertWithinPartLimit(plan.sourceBucket, object.key, object.size, chunkSize);
  }

  let body: Uint8Array;
  try {
    ({ body } = await source.getObject(plan.sourceBucket, object.key));
  } catch (error) {
    throw new ObjectReadError(plan.sourceBucket, object.key, error);
  }

  const strategy = await transferObject(destination, plan.destinationBucket, object.key, body, options);
  return { strategy, bytes: body.byteLength };
}

/**
 * Migrate one source bucket: resolve its destination, compute the pending set
 * against what the destination already holds, then transfer pending objects in
 * listing order
 */
export async function migrateBucket(
  source: StorageClient,
  destination: StorageClient,
  sourceBucket: string,
  options: PlannerOptions = {}
): Promise<BucketMigrationResult> {
  options.reporter?.bucketStarted?.(sourceBucket);

  const plan = await planBucket(source, destination, sourceBucket, options);
  options.reporter?.bucketPlanned?.(plan);

  logInfo(`Bucket ${sourceBucket} -> ${plan.destinationBucket}: ${plan.pending.length} pending, ${plan.alreadyMigrated} already migrated`);
  if (plan.truncated) {
    logWarning(`Source bucket ${sourceBucket} holds more than ${plan.listed} objects, only the first ${plan.listed} were listed`);
  }

  const result: BucketMigrationResult = {
    sourceBucket,
    destinationBucket: plan.destinationBucket,
    listed: plan.listed,
    filteredOut: plan.filteredOut,
    alreadyMigrated: plan.alreadyMigrated,
    pending: plan.pending.length,
    truncated: plan.truncated,
    singlePart: 0,
    chunked: 0,
    planned: 0,
    bytesTransferred: 0,
    failures: [],
  };

  if (options.dryRun) {
    result.planned = plan.pending.length;
    for (const object of plan.pending) {
      logVerbose(`DRY RUN: would copy ${sourceBucket}/${object.key} (${formatBytes(object.size)})`);
    }
    return result;
  }

  for (const object of plan.pending) {
    options.reporter?.objectStarted?.(plan, object);
    logVerbose(`Copying ${sourceBucket}/${object.key} (${formatBytes(object.size)})`);

    try {
      const { strategy, bytes } = await migrateObject(source, destination, plan, object, options);

      if (strategy === TransferStrategy.CHUNKED) {
        result.chunked++;
      } else {
        result.singlePart++;
      }
      result.bytesTransferred += bytes;
      options.reporter?.objectTransferred?.(plan, object, strategy);
    } catch (error) {
      if (!isObjectLevelError(error)) {
        throw error;
      }

      result.failures.push({ key: object.key, error });
      options.reporter?.objectFailed?.(plan, object, error);
      logError(`Failed to copy ${sourceBucket}/${object.key}: ${error.message}`, error);

      if (options.onObjectError === 'halt') {
        throw error;
      }
    }
  }

  return result;
}

/**
 * Source buckets to migrate, limited to the requested names when any are given
 */
export async function selectSourceBuckets(
  source: StorageClient,
  requested?: readonly string[]
): Promise<{ buckets: string[]; missingBuckets: string[] }> {
  const sourceBuckets = await source.listBuckets();

  if (!requested || requested.length === 0) {
    return { buckets: sourceBuckets, missingBuckets: [] };
  }

  const wanted = new Set(requested);
  return {
    buckets: sourceBuckets.filter((bucket) => wanted.has(bucket)),
    missingBuckets: requested.filter((bucket) => !sourceBuckets.includes(bucket)),
  };
}

/**
 * Migrate the given source buckets, one after the other
 */
export async function migrateBuckets(
  source: StorageClient,
  destination: StorageClient,
  buckets: readonly string[],
  options: PlannerOptions = {}
): Promise<MigrationReport> {
  const report: MigrationReport = { buckets: [], missingBuckets: [], dryRun: options.dryRun ?? false };

  for (const bucket of buckets) {
    try {
      report.buckets.push(await migrateBucket(source, destination, bucket, options));
    } catch (error) {
      if (!isBucketLevelError(error) || !continuesAfter(error, options.onBucketError)) {
        throw error;
      }

      logError(`Skipping bucket ${bucket}: ${describeError(error)}`, error);
      report.buckets.push({
        sourceBucket: bucket,
        listed: 0,
        filteredOut: 0,
        alreadyMigrated: 0,
        pending: 0,
        truncated: false,
        singlePart: 0,
        chunked: 0,
        planned: 0,
        bytesTransferred: 0,
        failures: [],
        error,
      });
    }
  }

  return report;
}

/**
 * Migrate every source bucket (or the configured subset)
 */
export async function migrateAllBuckets(
  source: StorageClient,
  destination: StorageClient,
  options: PlannerOptions = {}
): Promise<MigrationReport> {
  const { buckets, missingBuckets } = await selectSourceBuckets(source, options.buckets);
  for (const bucket of missingBuckets) {
    logWarning(`Bucket ${bucket} does not exist at the source`);
  }

  const report = await migrateBuckets(source, destination, buckets, options);
  report.missingBuckets = missingBuckets;
  return report;
}

/**
 * Whether the run may move on to the next bucket after a bucket-level failure.
 * A missing suffix is a configuration problem and always stops the run.
 */
function continuesAfter(error: BucketLevelError, policy: BucketErrorPolicy = 'halt'): boolean {
  if (error instanceof BucketConflictError && error.reason === 'no-suffix') {
    return false;
  }
  return policy === 'continue';
}

/**
 * Totals across every bucket of a report
 */
export function summarizeReport(report: MigrationReport): {
  buckets: number;
  failedBuckets: number;
  listed: number;
  alreadyMigrated: number;
  transferred: number;
  singlePart: number;
  chunked: number;
  planned: number;
  failed: number;
  bytesTransferred: number;
} {
  const totals = {
    buckets: report.buckets.length,
    failedBuckets: 0,
    listed: 0,
    alreadyMigrated: 0,
    transferred: 0,
    singlePart: 0,
    chunked: 0,
    planned: 0,
    failed: 0,
    bytesTransferred: 0,
  };

  for (const bucket of report.buckets) {
    if (bucket.error) {
      totals.failedBuckets++;
    }
    totals.listed += bucket.listed;
    totals.alreadyMigrated += bucket.alreadyMigrated;
    totals.singlePart += bucket.singlePart;
    totals.chunked += bucket.chunked;
    totals.transferred += bucket.singlePart + bucket.chunked;
    totals.planned += bucket.planned;
    totals.failed += bucket.failures.length;
    totals.bytesTransferred += bucket.bytesTransferred;
  }

  return totals;
}
