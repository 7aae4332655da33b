// Third-party dependencies
import chalk from 'chalk';
import cliProgress from 'cli-progress';
import inquirer from 'inquirer';
import ora from 'ora';

// Local imports
import { compilePatterns } from './config';
import { DEFAULT_PART_CONCURRENCY } from './chunked-transfer';
import { describeError } from './errors';
import { closeLogger, initLogger, log, LogLevel, logError, logInfo, logSuccess, logWarning } from './logger';
import { migrateAllBuckets, selectSourceBuckets, summarizeReport } from './migration-planner';
import { createStorageClient } from './storage-client';
import { formatBytes, formatTime, truncateKey } from './utils';

// Types
import type { MigrationReport, MigrationReporter, PlannerOptions } from './migration-planner';
import type { StorageClient } from './storage-client';
import type { MigrationConfig } from './types';

export interface MigrationClients {
  source: StorageClient;
  destination: StorageClient;
}

/**
 * Progress bar driven by planner events, one run per bucket
 */
function createProgressReporter(): { reporter: MigrationReporter; stop: () => void } {
  const progressBar = new cliProgress.SingleBar(
    {
      format: ' {bar} | {percentage}% | {value}/{total} | {bucket} | {file}',
      clearOnComplete: false,
      hideCursor: true,
    },
    cliProgress.Presets.shades_grey
  );
  let active = false;

  const stop = (): void => {
    if (active) {
      progressBar.stop();
      active = false;
    }
  };

  const reporter: MigrationReporter = {
    bucketPlanned(plan) {
      stop();
      if (plan.pending.length > 0) {
        progressBar.start(plan.pending.length, 0, { bucket: plan.destinationBucket, file: '' });
        active = true;
      }
    },
    objectStarted(_plan, object) {
      progressBar.update({ file: truncateKey(object.key) });
    },
    objectTransferred() {
      progressBar.increment();
    },
    objectFailed(_plan, object) {
      progressBar.increment({ file: chalk.red(`failed: ${truncateKey(object.key)}`) });
    },
  };

  return { reporter, stop };
}

/**
 * Print the final migration summary
 */
export function printMigrationSummary(report: MigrationReport, startTime: number): void {
  const totals = summarizeReport(report);
  const elapsedTime = Math.floor((Date.now() - startTime) / 1000);

  logInfo('', chalk.white);
  logInfo(report.dryRun ? 'Migration Summary (dry run)' : 'Migration Summary', chalk.cyanBright.bold);
  logInfo('─'.repeat(50), chalk.white);
  logInfo(`Buckets:            ${totals.buckets.toString()}`, chalk.white);
  logInfo(`Objects listed:     ${totals.listed.toString()}`, chalk.white);
  logInfo(`Already migrated:   ${totals.alreadyMigrated.toString()}`, chalk.gray);

  if (report.dryRun) {
    logInfo(`Would transfer:     ${totals.planned.toString()}`, chalk.yellow);
  } else {
    logInfo(`Transferred:        ${totals.transferred.toString()} (${totals.singlePart} single-part, ${totals.chunked} chunked)`, chalk.green);
    logInfo(`Bytes transferred:  ${formatBytes(totals.bytesTransferred)}`, chalk.white);
    logInfo(`Failed objects:     ${totals.failed.toString()}`, totals.failed > 0 ? chalk.redBright : chalk.white);
  }

  if (totals.failedBuckets > 0) {
    logInfo(`Failed buckets:     ${totals.failedBuckets.toString()}`, chalk.redBright);
  }
  logInfo(`Total time:         ${formatTime(elapsedTime)}`, chalk.white);

  log(
    LogLevel.INFO,
    `Migration Summary - Buckets: ${totals.buckets}, Listed: ${totals.listed}, Already migrated: ${totals.alreadyMigrated}, ` +
      `Transferred: ${totals.transferred}, Failed: ${totals.failed}, Failed buckets: ${totals.failedBuckets}, Time: ${formatTime(elapsedTime)}`,
    true
  );

  for (const bucket of report.buckets) {
    if (bucket.error) {
      logError(`  ✗ bucket ${bucket.sourceBucket} (${bucket.error.message})`);
    }
    for (const failure of bucket.failures) {
      logError(`  ✗ ${bucket.sourceBucket}/${failure.key} (${failure.error.code})`);
    }
    if (bucket.truncated) {
      logWarning(`  ! ${bucket.sourceBucket} listing stopped after ${bucket.listed} objects`);
    }
  }

  for (const bucket of report.missingBuckets) {
    logWarning(`  ! ${bucket} was requested but does not exist at the source`);
  }

  logInfo('', chalk.white);

  if (totals.failed === 0 && totals.failedBuckets === 0) {
    logSuccess(report.dryRun ? '✓ Dry run completed.' : '✓ Migration completed successfully!');
  } else {
    logWarning('⚠ Migration completed with some issues. Run it again to retry the failed objects.');
  }
}

/**
 * Whether a report holds any failed object or bucket
 */
export function hasFailures(report: MigrationReport): boolean {
  return report.buckets.some((bucket) => bucket.error !== undefined || bucket.failures.length > 0);
}

/**
 * Run the migration process.
 * Returns undefined when the user declines the confirmation prompt.
 */
export async function runMigration(
  config: MigrationConfig,
  clients?: MigrationClients
): Promise<MigrationReport | undefined> {
  initLogger({ title: 'BUCKET MIGRATION', verbose: config.verbose, logFile: config.logFile });

  try {
    const source = clients?.source ?? createStorageClient(config.source, { maxAttempts: config.maxAttempts });
    const destination =
      clients?.destination ?? createStorageClient(config.destination, { maxAttempts: config.maxAttempts });

    logInfo('Starting bucket migration...', chalk.cyan);
    logInfo(`Source: ${config.source.endpoint ?? 'AWS'} (${config.source.region})`, chalk.cyan);
    logInfo(`Destination: ${config.destination.endpoint ?? 'AWS'} (${config.destination.region})`, chalk.cyan);
    logInfo(`Part concurrency: ${config.partConcurrency ?? DEFAULT_PART_CONCURRENCY}`, chalk.white);
    logInfo(`On object error: ${config.onObjectError ?? 'continue'}`, chalk.white);
    logInfo(`On bucket error: ${config.onBucketError ?? 'halt'}`, chalk.white);

    if (config.bucketSuffix) {
      logInfo(`Bucket suffix: ${config.bucketSuffix}`, chalk.cyan);
    }
    if (config.include && config.include.length > 0) {
      logInfo(`Include patterns: ${config.include.join(', ')}`, chalk.cyan);
    }
    if (config.exclude && config.exclude.length > 0) {
      logInfo(`Exclude patterns: ${config.exclude.join(', ')}`, chalk.cyan);
    }
    if (config.dryRun) {
      logWarning('DRY RUN MODE - No buckets will be created and no objects transferred');
    }

    const spinner = ora('Listing source buckets...').start();
    let buckets: string[];
    let missingBuckets: string[];

    try {
      ({ buckets, missingBuckets } = await selectSourceBuckets(source, config.buckets));

      for (const bucket of missingBuckets) {
        logWarning(`Bucket ${bucket} does not exist at the source`);
      }
      spinner.succeed(`Found ${chalk.bold(buckets.length.toString())} buckets to migrate`);
      logSuccess(`Found ${buckets.length} buckets to migrate`);
    } catch (error) {
      spinner.fail(`Failed to list source buckets: ${describeError(error)}`);
      throw error;
    }

    if (buckets.length === 0) {
      logWarning('No buckets to migrate. Exiting.');
      return { buckets: [], missingBuckets, dryRun: config.dryRun ?? false };
    }

    logInfo('\nBuckets to migrate (showing first 10):', chalk.cyan);
    for (const bucket of buckets.slice(0, 10)) {
      logInfo(`  - ${bucket}`, chalk.white);
    }
    if (buckets.length > 10) {
      logInfo(`  ... and ${buckets.length - 10} more buckets`, chalk.white);
    }
    logInfo('', chalk.white);

    if (!config.skipConfirmation && !config.dryRun) {
      const { confirmMigration } = await inquirer.prompt<{ confirmMigration: boolean }>([
        {
          type: 'confirm',
          name: 'confirmMigration',
          message: `Do you want to proceed with migrating ${chalk.bold(buckets.length.toString())} buckets?`,
          default: false,
        },
      ]);

      if (!confirmMigration) {
        logWarning('Migration cancelled by user.');
        return undefined;
      }
    } else {
      log(LogLevel.INFO, `Proceeding with migration of ${buckets.length} buckets (confirmation skipped)`, true);
    }

    const startTime = Date.now();
    const progress = createProgressReporter();
    const plannerOptions: PlannerOptions = {
      bucketSuffix: config.bucketSuffix,
      buckets,
      include: compilePatterns(config.include, 'include'),
      exclude: compilePatterns(config.exclude, 'exclude'),
      partConcurrency: config.partConcurrency,
      onObjectError: config.onObjectError,
      onBucketError: config.onBucketError,
      dryRun: config.dryRun,
      reporter: progress.reporter,
    };

    let report: MigrationReport;
    try {
      report = await migrateAllBuckets(source, destination, plannerOptions);
    } finally {
      progress.stop();
    }

    // Buckets removed at the source since the preview show up in the report as well
    report.missingBuckets = [...missingBuckets, ...report.missingBuckets];
    printMigrationSummary(report, startTime);
    return report;
  } catch (error) {
    logError('Error running migration', error);
    throw error;
  } finally {
    closeLogger();
  }
}
