// Third-party dependencies
import chalk from 'chalk';
import cliProgress from 'cli-progress';
import inquirer from 'inquirer';
import ora from 'ora';

// Local imports
import { endpointFor } from './config';
import { describeError } from './errors';
import {
  closeLogger,
  initLogger,
  log,
  LogLevel,
  logError,
  logInfo,
  logSuccess,
  logVerbose,
  logWarning,
} from './logger';
import { createStorageClient, listAllObjects } from './storage-client';
import { formatTime } from './utils';

// Types
import type { StorageClient } from './storage-client';
import type { EndpointRole, MigrationConfig } from './types';

export interface SweepOptions {
  dryRun?: boolean;
  abortIncompleteUploads?: boolean; // Abort in-progress multipart uploads before deleting the bucket
  pageSize?: number;
  onObjectsListed?: (bucket: string, count: number) => void;
  onObjectDeleted?: (bucket: string, key: string) => void;
  onBucketSwept?: (result: SweepBucketResult) => void;
}

export interface SweepBucketResult {
  bucket: string;
  objectsFound: number;
  deleted: number;
  failedKeys: string[];
  uploadsAborted: number;
  bucketDeleted: boolean;
  error?: string;
}

export interface SweepReport {
  buckets: SweepBucketResult[];
  dryRun: boolean;
}

export interface RunSweepOptions {
  side?: EndpointRole;
  abortIncompleteUploads?: boolean;
}

/**
 * Empty one bucket and delete it.
 *
 * Every key is listed first, following pagination to the end, then deleted one
 * by one. The bucket is only deleted when every object delete succeeded.
 * Failures are recorded on the result rather than thrown.
 */
export async function sweepBucket(
  client: StorageClient,
  bucket: string,
  options: SweepOptions = {}
): Promise<SweepBucketResult> {
  const result: SweepBucketResult = {
    bucket,
    objectsFound: 0,
    deleted: 0,
    failedKeys: [],
    uploadsAborted: 0,
    bucketDeleted: false,
  };

  const keys: string[] = [];
  try {
    for await (const page of listAllObjects(client, bucket, { pageSize: options.pageSize })) {
      for (const object of page) {
        keys.push(object.key);
      }
    }
  } catch (error) {
    result.error = `Failed to list objects: ${describeError(error)}`;
    logError(`Failed to list objects of ${bucket}`, error);
    return result;
  }

  result.objectsFound = keys.length;
  logVerbose(`Found ${keys.length} objects in ${bucket}`);
  options.onObjectsListed?.(bucket, keys.length);

  if (options.dryRun) {
    return result;
  }

  for (const key of keys) {
    try {
      await client.deleteObject(bucket, key);
      result.deleted++;
      logVerbose(`Deleted object: ${bucket}/${key}`);
      options.onObjectDeleted?.(bucket, key);
    } catch (error) {
      result.failedKeys.push(key);
      logError(`Failed to delete ${bucket}/${key}: ${describeError(error)}`);
    }
  }

  if (result.failedKeys.length > 0) {
    result.error = `${result.failedKeys.length} objects could not be deleted, bucket kept`;
    logWarning(`Bucket ${bucket} is not empty, skipping bucket deletion`);
    return result;
  }

  if (options.abortIncompleteUploads) {
    try {
      const uploads = await client.listMultipartUploads(bucket);
      for (const upload of uploads) {
        await client.abortMultipartUpload(bucket, upload.key, upload.uploadId);
        result.uploadsAborted++;
      }
    } catch (error) {
      result.error = `Failed to abort incomplete uploads: ${describeError(error)}`;
      logError(`Failed to abort incomplete multipart uploads of ${bucket}`, error);
      return result;
    }
  }

  try {
    await client.deleteBucket(bucket);
    result.bucketDeleted = true;
    logVerbose(`Deleted bucket: ${bucket}`);
  } catch (error) {
    result.error = `Failed to delete bucket: ${describeError(error)}`;
    logError(`Failed to delete bucket ${bucket}`, error);
  }

  return result;
}

/**
 * Sweep every bucket at an endpoint, or the given ones when the caller already
 * listed them. A failing bucket does not stop the others.
 */
export async function sweepAllBuckets(
  client: StorageClient,
  options: SweepOptions = {},
  buckets?: readonly string[]
): Promise<SweepReport> {
  const targets = buckets ?? (await client.listBuckets());
  const report: SweepReport = { buckets: [], dryRun: options.dryRun ?? false };

  for (const bucket of targets) {
    const result = await sweepBucket(client, bucket, options);
    report.buckets.push(result);
    options.onBucketSwept?.(result);
  }

  return report;
}

/**
 * Print the final sweep summary
 */
export function printSweepSummary(report: SweepReport, startTime: number): void {
  const elapsedTime = Math.floor((Date.now() - startTime) / 1000);
  const found = report.buckets.reduce((sum, bucket) => sum + bucket.objectsFound, 0);
  const deleted = report.buckets.reduce((sum, bucket) => sum + bucket.deleted, 0);
  const failed = report.buckets.reduce((sum, bucket) => sum + bucket.failedKeys.length, 0);
  const bucketsDeleted = report.buckets.filter((bucket) => bucket.bucketDeleted).length;

  logInfo('', chalk.white);
  logInfo(report.dryRun ? 'Sweep Summary (dry run)' : 'Sweep Summary', chalk.cyanBright.bold);
  logInfo('─'.repeat(50), chalk.white);
  logInfo(`Buckets found:      ${report.buckets.length.toString()}`, chalk.white);
  logInfo(`Objects found:      ${found.toString()}`, chalk.white);

  if (!report.dryRun) {
    logInfo(`Objects deleted:    ${deleted.toString()}`, chalk.green);
    logInfo(`Buckets deleted:    ${bucketsDeleted.toString()}`, chalk.green);
    if (failed > 0) {
      logInfo(`Failed deletes:     ${failed.toString()}`, chalk.red);
    }
  }
  logInfo(`Total time:         ${formatTime(elapsedTime)}`, chalk.white);
  logInfo('', chalk.white);

  log(
    LogLevel.INFO,
    `Sweep Summary - Buckets: ${report.buckets.length}, Objects: ${found}, Deleted: ${deleted}, Failed: ${failed}, Buckets deleted: ${bucketsDeleted}`,
    true
  );

  const failedBuckets = report.buckets.filter((bucket) => bucket.error !== undefined);
  for (const bucket of failedBuckets) {
    logError(`  ✗ ${bucket.bucket} (${bucket.error})`);
  }

  if (failedBuckets.length > 0) {
    logWarning('Sweep completed with some failures.');
  } else {
    logSuccess(report.dryRun ? 'Dry run completed.' : 'Sweep completed successfully!');
  }
}

/**
 * Delete every object and bucket at one endpoint of the configuration.
 * Returns undefined when the user declines a confirmation prompt.
 */
export async function runSweep(
  config: MigrationConfig,
  options: RunSweepOptions = {},
  client?: StorageClient
): Promise<SweepReport | undefined> {
  initLogger({ title: 'BUCKET SWEEP', verbose: config.verbose, logFile: config.logFile });

  const side = options.side ?? 'source';
  const endpoint = endpointFor(config, side);

  try {
    const target = client ?? createStorageClient(endpoint, { maxAttempts: config.maxAttempts });

    logInfo('Starting bucket sweep...', chalk.cyanBright);
    logInfo(`Target: ${side} ${endpoint.endpoint ?? 'AWS'} (${endpoint.region})`, chalk.cyan);

    if (config.dryRun) {
      logWarning('DRY RUN MODE - Nothing will be deleted');
    }

    const spinner = ora('Listing buckets...').start();
    let buckets: string[];
    try {
      buckets = await target.listBuckets();
      spinner.succeed(`Found ${chalk.bold(buckets.length.toString())} buckets`);
    } catch (error) {
      spinner.fail(`Failed to list buckets: ${describeError(error)}`);
      throw error;
    }

    if (buckets.length === 0) {
      logSuccess('No buckets found, nothing to sweep.');
      return { buckets: [], dryRun: config.dryRun ?? false };
    }

    logInfo('\nBuckets to sweep (showing first 10):', chalk.cyan);
    for (const bucket of buckets.slice(0, 10)) {
      logInfo(`  - ${bucket}`, chalk.white);
    }
    if (buckets.length > 10) {
      logInfo(`  ... and ${buckets.length - 10} more buckets`, chalk.white);
    }
    logInfo('', chalk.white);

    // Double confirmation, deleting is not reversible
    if (!config.skipConfirmation && !config.dryRun) {
      const { confirmSweep } = await inquirer.prompt<{ confirmSweep: boolean }>([
        {
          type: 'confirm',
          name: 'confirmSweep',
          message: `Do you want to delete every object in ${chalk.bold(buckets.length.toString())} buckets?`,
          default: false,
        },
      ]);

      if (!confirmSweep) {
        logWarning('Sweep cancelled by user.');
        return undefined;
      }

      const { confirmSweepAgain } = await inquirer.prompt<{ confirmSweepAgain: boolean }>([
        {
          type: 'confirm',
          name: 'confirmSweepAgain',
          message: chalk.red.bold(
            `WARNING: This will DELETE ${buckets.length} buckets and all their objects. Are you ABSOLUTELY sure?`
          ),
          default: false,
        },
      ]);

      if (!confirmSweepAgain) {
        logWarning('Sweep cancelled by user.');
        return undefined;
      }
    } else {
      log(LogLevel.INFO, `Proceeding with sweep of ${buckets.length} buckets (confirmation skipped)`, true);
    }

    const startTime = Date.now();
    const progressBar = new cliProgress.SingleBar(
      {
        format: ' {bar} | {percentage}% | {value}/{total} | Deleting objects in {bucket}',
        clearOnComplete: false,
        hideCursor: true,
      },
      cliProgress.Presets.shades_grey
    );
    let active = false;
    const stopProgress = (): void => {
      if (active) {
        progressBar.stop();
        active = false;
      }
    };

    let report: SweepReport;
    try {
      report = await sweepAllBuckets(
        target,
        {
          dryRun: config.dryRun,
          abortIncompleteUploads: options.abortIncompleteUploads,
          onObjectsListed: (bucket, count) => {
            if (!config.dryRun && count > 0) {
              progressBar.start(count, 0, { bucket });
              active = true;
            }
          },
          onObjectDeleted: () => {
            progressBar.increment();
          },
          onBucketSwept: stopProgress,
        },
        buckets
      );
    } finally {
      stopProgress();
    }

    printSweepSummary(report, startTime);
    return report;
  } catch (error) {
    logError('Error running bucket sweep', error);
    throw error;
  } finally {
    closeLogger();
  }
}
