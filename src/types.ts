export interface EndpointConfig {
  region: string;
  // Optional parameters
  endpoint?: string; // Custom endpoint URL for non-AWS providers (MinIO, Wasabi, ...)
  accessKey?: string;
  secretKey?: string;
  profile?: string; // Profile name inside a shared credentials file
  credentialsFile?: string; // Path to a shared credentials file
}

export type EndpointRole = 'source' | 'destination';

// What to do when a single object fails to transfer
export type ObjectErrorPolicy = 'continue' | 'halt';

// What to do when a bucket cannot be resolved or listed
export type BucketErrorPolicy = 'continue' | 'halt';

export interface MigrationConfig {
  source: EndpointConfig;
  destination: EndpointConfig;
  // Optional parameters
  bucketSuffix?: string; // Appended to a destination bucket name taken by another owner
  buckets?: string[]; // Only migrate these source buckets
  include?: string[];
  exclude?: string[];
  partConcurrency?: number; // Parallel part uploads per chunked transfer
  maxAttempts?: number; // Attempts per storage request, including the first one
  onObjectError?: ObjectErrorPolicy;
  onBucketError?: BucketErrorPolicy;
  dryRun?: boolean;
  skipConfirmation?: boolean;
  verbose?: boolean;
  logFile?: string;
}

// Transfer strategy enumeration
export enum TransferStrategy {
  SINGLE_PART = 'single-part', // One put-object request
  CHUNKED = 'chunked', // Multipart session with parallel part uploads
}

export interface ObjectSummary {
  key: string;
  size: number;
}

export interface ObjectPayload {
  body: Uint8Array;
  size: number;
}

export interface ObjectListingPage {
  objects: ObjectSummary[];
  nextContinuationToken?: string;
}

export interface ListObjectsOptions {
  continuationToken?: string;
  maxKeys?: number;
  prefix?: string;
}

export interface CompletedPart {
  partNumber: number;
  etag: string;
}

export interface IncompleteUpload {
  key: string;
  uploadId: string;
  initiated?: Date;
}

// 'owned' means the caller already owns the bucket, 'taken' means another account does
export type CreateBucketOutcome = 'created' | 'owned' | 'taken';

// What HeadBucket says about a name: ours, free, or held by another account
export type BucketOwnership = 'owned' | 'missing' | 'taken';
