// Third-party dependencies
import chalk from 'chalk';

// Define help topic interface
export interface HelpTopic {
  title: string;
  content: string;
}

// Define help topics
export const helpTopics: Record<string, HelpTopic> = {
  config: {
    title: 'Configuration File Format',
    content: `
Configuration File (YAML or JSON):
  source:
    region: 'us-east-1'                    # Defaults to us-east-1
    endpoint: 'https://s3.wasabisys.com'   # Optional, for non-AWS providers
    accessKey: 'YOUR_SOURCE_ACCESS_KEY'
    secretKey: 'YOUR_SOURCE_SECRET_KEY'

  destination:
    region: 'ap-northeast-1'
    endpoint: 'https://minio.example.com'
    profile: 'default'                     # Instead of accessKey/secretKey
    credentialsFile: '.new.credentials'    # Shared credentials file

  # Optional parameters
  bucketSuffix: '-migrated'   # Used when a bucket name is taken at the destination
  buckets:                    # Only migrate these buckets
    - 'photos'
  include:
    - "\\.jpg$"
  exclude:
    - '^tmp/'
  partConcurrency: 4          # Parallel part uploads per large object
  maxAttempts: 10             # Attempts per request (default: retry until it succeeds)
  onObjectError: 'continue'   # 'continue' or 'halt'
  onBucketError: 'halt'       # 'halt' or 'continue'
  dryRun: false
  skipConfirmation: false
  verbose: false
  logFile: './logs/migration.log'

Environment overrides:
  SOURCE_AWS_REGION, SOURCE_AWS_ENDPOINT_URL,
  DESTINATION_AWS_REGION, DESTINATION_AWS_ENDPOINT_URL,
  DESTINATION_BUCKET_SUFFIX

Path-style addressing is always used, so any S3 compatible provider works.
    `,
  },
  process: {
    title: 'Migration Process',
    content: `
Migration Process (for every source bucket):
  1. Create the bucket at the destination
     - If the name belongs to another account, create name + bucketSuffix instead
     - If that name is taken as well, the bucket fails (see onBucketError)
  2. List the objects already present in the destination bucket
  3. List the source bucket (up to 1,000,000 objects)
  4. Transfer every source object whose key is not at the destination yet
     - Objects smaller than 5 MiB: single upload
     - Larger objects: multipart upload in 5 MiB parts, uploaded in parallel

Resuming:
  Objects are matched by key only. Running the migration again after an
  interruption skips every object that already arrived and retries the rest.
  A multipart upload whose parts failed is aborted, so no partial object is
  left behind.

Error Handling:
  - Network errors and throttling are retried automatically
  - A failed object is reported and the migration moves on (onObjectError)
  - A bucket that cannot be created or listed stops the run (onBucketError)
    `,
  },
  sweep: {
    title: 'Sweeping an Endpoint',
    content: `
The sweep command deletes every object and then every bucket at one endpoint
of the configuration file (the source by default, --side destination for the
other one).

  - Object listings are followed page by page until the end
  - A bucket is only deleted once all of its objects were deleted
  - A failing bucket is reported and the sweep continues with the next one
  - --abort-uploads also aborts incomplete multipart uploads before the
    bucket is deleted

Two confirmations are required unless --yes is given.
    `,
  },
};

/**
 * Display help information for a specific topic or list all available topics
 * @param topic Optional topic to display help for
 * @param programName Name of the program for display in help text
 */
export function displayHelp(topic: string | undefined, programName: string): void {
  if (!topic) {
    console.log(chalk.blue.bold(`${programName} Help`));
    console.log(chalk.blue('─'.repeat(50)));
    console.log('Available help topics:');
    for (const [key, helpTopic] of Object.entries(helpTopics)) {
      console.log(`  ${chalk.yellow(key)}: ${helpTopic.title}`);
    }
    console.log('\nUse:', chalk.yellow(`${programName} help <topic>`), 'for detailed information');
    return;
  }

  const helpTopic = helpTopics[topic];
  if (helpTopic) {
    console.log(chalk.blue.bold(helpTopic.title));
    console.log(chalk.blue('─'.repeat(50)));
    console.log(helpTopic.content);
  } else {
    console.log(chalk.red(`Unknown help topic: ${topic}`));
    console.log('Available topics:', Object.keys(helpTopics).join(', '));
  }
}
