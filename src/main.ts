#!/usr/bin/env node

// Third-party dependencies
import chalk from 'chalk';
import { Command, InvalidArgumentError, Option } from 'commander';

// Local imports
import { loadConfig } from './config';
import { describeError } from './errors';
import { displayHelp } from './help';
import { hasFailures, runMigration } from './migration';
import { runSweep } from './sweep';

// Package info
import { name, version } from '../package.json';

// Types
import type { EndpointRole, MigrationConfig } from './types';

interface CommonOptions {
  dryRun?: boolean;
  yes?: boolean;
  verbose?: boolean;
  logFile?: string;
}

interface MigrateOptions extends CommonOptions {
  suffix?: string;
  bucket?: string[];
  partConcurrency?: number;
  haltOnObjectError?: boolean;
  continueOnBucketError?: boolean;
}

interface SweepCommandOptions extends CommonOptions {
  side: EndpointRole;
  abortUploads?: boolean;
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Apply the flags shared by every command over the loaded configuration
 */
function applyCommonOptions(config: MigrationConfig, options: CommonOptions): void {
  if (options.dryRun) {
    config.dryRun = true;
  }

  if (options.yes) {
    config.skipConfirmation = true;
  }

  if (options.verbose) {
    config.verbose = true;
  }

  if (options.logFile) {
    config.logFile = options.logFile;
  }
}

function exitWithError(error: unknown): never {
  console.error(chalk.red.bold('Error:'), chalk.red(describeError(error)));
  process.exit(1);
}

// Create the command line program
const program = new Command();

// Main command
program
  .name(name)
  .version(version)
  .description('Migrate every bucket and object from one S3 compatible endpoint to another')
  .argument('<config-file>', 'Path to the migration configuration file (YAML or JSON)')
  .option('-d, --dry-run', 'Plan the migration without creating buckets or transferring objects')
  .option('-s, --suffix <suffix>', 'Suffix for destination bucket names taken by another owner')
  .option('-b, --bucket <name...>', 'Only migrate these source buckets')
  .option('--part-concurrency <number>', 'Parallel part uploads per large object', parsePositiveInteger)
  .option('--halt-on-object-error', 'Stop the run at the first object that fails to transfer')
  .option('--continue-on-bucket-error', 'Move on to the next bucket when a bucket cannot be created or listed')
  .option('-y, --yes', 'Skip confirmation prompts and proceed with migration')
  .option('-v, --verbose', 'Enable verbose logging with detailed error messages')
  .option('-l, --log-file <path>', 'Save logs to the specified file')
  .action(async (configFile: string, options: MigrateOptions) => {
    try {
      // Load configuration
      const config = loadConfig(configFile);

      // Override config with command line options
      applyCommonOptions(config, options);

      if (options.suffix) {
        config.bucketSuffix = options.suffix;
      }

      if (options.bucket && options.bucket.length > 0) {
        config.buckets = options.bucket;
      }

      if (options.partConcurrency) {
        config.partConcurrency = options.partConcurrency;
      }

      if (options.haltOnObjectError) {
        config.onObjectError = 'halt';
      }

      if (options.continueOnBucketError) {
        config.onBucketError = 'continue';
      }

      // Run migration
      const report = await runMigration(config);
      if (report && hasFailures(report)) {
        process.exitCode = 1;
      }
    } catch (error) {
      exitWithError(error);
    }
  });

// Sweep command
program
  .command('sweep')
  .description('Delete every object and every bucket at one endpoint of the configuration')
  .argument('<config-file>', 'Path to the migration configuration file (YAML or JSON)')
  .addOption(
    new Option('--side <side>', 'Endpoint to sweep').choices(['source', 'destination']).default('source')
  )
  .option('--abort-uploads', 'Abort incomplete multipart uploads before deleting each bucket')
  .option('-d, --dry-run', 'List what would be deleted without deleting anything')
  .option('-y, --yes', 'Skip confirmation prompts and proceed with the sweep')
  .option('-v, --verbose', 'Enable verbose logging with detailed error messages')
  .option('-l, --log-file <path>', 'Save logs to the specified file')
  .action(async (configFile: string, options: SweepCommandOptions) => {
    try {
      const config = loadConfig(configFile);
      applyCommonOptions(config, options);

      const report = await runSweep(config, {
        side: options.side,
        abortIncompleteUploads: options.abortUploads,
      });
      if (report && report.buckets.some((bucket) => bucket.error !== undefined)) {
        process.exitCode = 1;
      }
    } catch (error) {
      exitWithError(error);
    }
  });

// Help command
program
  .command('help')
  .description('Display help information about specific topics')
  .argument('[topic]', 'Help topic (config, process, sweep)')
  .action((topic?: string) => {
    displayHelp(topic, name);
  });

program.addHelpText(
  'after',
  `
Examples:
  $ ${name} config.yaml
  $ ${name} config.yaml --dry-run
  $ ${name} config.yaml --suffix -migrated --bucket photos backups
  $ ${name} sweep config.yaml --side destination --abort-uploads
  $ ${name} help config
`
);

program.parseAsync(process.argv).catch(exitWithError);
