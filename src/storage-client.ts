// Third-party dependencies
import {
  AbortMultipartUploadCommand,
  BucketAlreadyExists,
  BucketAlreadyOwnedByYou,
  BucketLocationConstraint,
  CompleteMultipartUploadCommand,
  CreateBucketCommand,
  CreateMultipartUploadCommand,
  DeleteBucketCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  ListBucketsCommand,
  ListMultipartUploadsCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  UploadPartCommand,
} from '@aws-sdk/client-s3';
import { fromIni } from '@aws-sdk/credential-providers';

// Local imports
import { logVerbose } from './logger';

// Types
import type { S3ClientConfig } from '@aws-sdk/client-s3';
import type {
  BucketOwnership,
  CompletedPart,
  CreateBucketOutcome,
  EndpointConfig,
  IncompleteUpload,
  ListObjectsOptions,
  ObjectListingPage,
  ObjectPayload,
  ObjectSummary,
} from './types';

// Objects per listing request, the S3 default and maximum
export const LIST_PAGE_SIZE = 1000;

// Retries are left to the SDK's standard strategy: transient and throttling
// errors back off exponentially, modelled service errors are never retried.
export const DEFAULT_MAX_ATTEMPTS = Number.MAX_SAFE_INTEGER;

/**
 * Access to one object-storage endpoint
 */
export interface StorageClient {
  readonly region: string;
  listBuckets(): Promise<string[]>;
  inspectBucket(bucket: string): Promise<BucketOwnership>;
  createBucket(bucket: string): Promise<CreateBucketOutcome>;
  deleteBucket(bucket: string): Promise<void>;
  listObjects(bucket: string, options?: ListObjectsOptions): Promise<ObjectListingPage>;
  getObject(bucket: string, key: string): Promise<ObjectPayload>;
  putObject(bucket: string, key: string, body: Uint8Array): Promise<void>;
  createMultipartUpload(bucket: string, key: string): Promise<string>;
  uploadPart(bucket: string, key: string, uploadId: string, partNumber: number, body: Uint8Array): Promise<string>;
  completeMultipartUpload(bucket: string, key: string, uploadId: string, parts: CompletedPart[]): Promise<void>;
  abortMultipartUpload(bucket: string, key: string, uploadId: string): Promise<void>;
  listMultipartUploads(bucket: string): Promise<IncompleteUpload[]>;
  deleteObject(bucket: string, key: string): Promise<void>;
}

export interface StorageClientOptions {
  maxAttempts?: number;
}

/**
 * Build the S3 client configuration for an endpoint
 */
export function buildS3ClientConfig(endpoint: EndpointConfig, options: StorageClientOptions = {}): S3ClientConfig {
  const clientConfig: S3ClientConfig = {
    region: endpoint.region,
    // Most non-AWS providers only understand bucket-in-path addressing
    forcePathStyle: true,
    retryMode: 'standard',
    maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
  };

  if (endpoint.endpoint) {
    clientConfig.endpoint = endpoint.endpoint;
  }

  if (endpoint.accessKey && endpoint.secretKey) {
    clientConfig.credentials = {
      accessKeyId: endpoint.accessKey,
      secretAccessKey: endpoint.secretKey,
    };
  } else if (endpoint.profile || endpoint.credentialsFile) {
    clientConfig.credentials = fromIni({
      profile: endpoint.profile,
      filepath: endpoint.credentialsFile,
    });
  }
  // Otherwise the SDK default credential chain applies

  return clientConfig;
}

/**
 * Location constraint to send with CreateBucket, if any.
 * us-east-1 and regions unknown to AWS (custom providers) send none.
 */
export function toLocationConstraint(region: string): BucketLocationConstraint | undefined {
  if (region === 'us-east-1') {
    return undefined;
  }
  return Object.values(BucketLocationConstraint).find((constraint) => constraint === region);
}

/**
 * Map a CreateBucket failure to a name-resolution outcome.
 * Returns undefined for errors that are not name conflicts.
 */
export function classifyCreateBucketError(error: unknown): CreateBucketOutcome | undefined {
  if (error instanceof BucketAlreadyOwnedByYou) {
    return 'owned';
  }
  if (error instanceof BucketAlreadyExists) {
    return 'taken';
  }
  // Some providers answer with an unmodelled exception carrying the same code
  if (error instanceof Error) {
    if (error.name === 'BucketAlreadyOwnedByYou') {
      return 'owned';
    }
    if (error.name === 'BucketAlreadyExists') {
      return 'taken';
    }
  }
  return undefined;
}

/**
 * Whether an error means the bucket does not exist
 */
export function isNotFoundError(error: unknown): boolean {
  if (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404) {
    return true;
  }
  return error instanceof Error && (error.name === 'NotFound' || error.name === 'NoSuchBucket');
}

/**
 * Whether an error means the bucket exists but belongs to another account
 */
export function isForbiddenError(error: unknown): boolean {
  if (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 403) {
    return true;
  }
  return error instanceof Error && (error.name === 'Forbidden' || error.name === 'AccessDenied');
}

/**
 * Map a HeadBucket failure to an ownership answer.
 * Returns undefined for errors that say nothing about ownership.
 */
export function classifyHeadBucketError(error: unknown): BucketOwnership | undefined {
  if (isNotFoundError(error)) {
    return 'missing';
  }
  if (isForbiddenError(error)) {
    return 'taken';
  }
  return undefined;
}

/**
 * Create a storage client backed by the AWS SDK S3 client
 */
export function createStorageClient(endpoint: EndpointConfig, options: StorageClientOptions = {}): StorageClient {
  const client = new S3Client(buildS3ClientConfig(endpoint, options));
  const locationConstraint = toLocationConstraint(endpoint.region);

  return {
    region: endpoint.region,

    async listBuckets(): Promise<string[]> {
      const response = await client.send(new ListBucketsCommand({}));
      return (response.Buckets ?? [])
        .map((bucket) => bucket.Name)
        .filter((name): name is string => typeof name === 'string' && name.length > 0);
    },

    async inspectBucket(bucket: string): Promise<BucketOwnership> {
      try {
        await client.send(new HeadBucketCommand({ Bucket: bucket }));
        return 'owned';
      } catch (error) {
        const ownership = classifyHeadBucketError(error);
        if (ownership === undefined) {
          throw error;
        }
        return ownership;
      }
    },

    async createBucket(bucket: string): Promise<CreateBucketOutcome> {
      try {
        await client.send(
          new CreateBucketCommand({
            Bucket: bucket,
            CreateBucketConfiguration: locationConstraint ? { LocationConstraint: locationConstraint } : undefined,
          })
        );
        logVerbose(`Created bucket ${bucket} in ${endpoint.region}`);
        return 'created';
      } catch (error) {
        const outcome = classifyCreateBucketError(error);
        if (outcome === undefined) {
          throw error;
        }
        return outcome;
      }
    },

    async deleteBucket(bucket: string): Promise<void> {
      await client.send(new DeleteBucketCommand({ Bucket: bucket }));
    },

    async listObjects(bucket: string, listOptions: ListObjectsOptions = {}): Promise<ObjectListingPage> {
      const response = await client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: listOptions.prefix || undefined,
          ContinuationToken: listOptions.continuationToken,
          MaxKeys: listOptions.maxKeys ?? LIST_PAGE_SIZE,
        })
      );

      const objects: ObjectSummary[] = [];
      for (const item of response.Contents ?? []) {
        if (item.Key) {
          objects.push({ key: item.Key, size: item.Size ?? 0 });
        }
      }

      return {
        objects,
        nextContinuationToken: response.IsTruncated ? response.NextContinuationToken : undefined,
      };
    },

    async getObject(bucket: string, key: string): Promise<ObjectPayload> {
      const response = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));

      if (!response.Body) {
        throw new Error(`Empty response body for ${bucket}/${key}`);
      }

      const body = await response.Body.transformToByteArray();
      return { body, size: body.byteLength };
    },

    async putObject(bucket: string, key: string, body: Uint8Array): Promise<void> {
      await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentLength: body.byteLength,
        })
      );
    },

    async createMultipartUpload(bucket: string, key: string): Promise<string> {
      const response = await client.send(new CreateMultipartUploadCommand({ Bucket: bucket, Key: key }));

      if (!response.UploadId) {
        throw new Error(`No upload ID returned for ${bucket}/${key}`);
      }

      logVerbose(`Initiated multipart upload with ID: ${response.UploadId} for ${key}`);
      return response.UploadId;
    },

    async uploadPart(
      bucket: string,
      key: string,
      uploadId: string,
      partNumber: number,
      body: Uint8Array
    ): Promise<string> {
      const response = await client.send(
        new UploadPartCommand({
          Bucket: bucket,
          Key: key,
          UploadId: uploadId,
          PartNumber: partNumber,
          Body: body,
          ContentLength: body.byteLength,
        })
      );

      if (!response.ETag) {
        throw new Error(`Missing ETag for part ${partNumber} of ${key}`);
      }

      return response.ETag;
    },

    async completeMultipartUpload(
      bucket: string,
      key: string,
      uploadId: string,
      parts: CompletedPart[]
    ): Promise<void> {
      await client.send(
        new CompleteMultipartUploadCommand({
          Bucket: bucket,
          Key: key,
          UploadId: uploadId,
          MultipartUpload: {
            Parts: parts.map((part) => ({ ETag: part.etag, PartNumber: part.partNumber })),
          },
        })
      );
    },

    async abortMultipartUpload(bucket: string, key: string, uploadId: string): Promise<void> {
      await client.send(new AbortMultipartUploadCommand({ Bucket: bucket, Key: key, UploadId: uploadId }));
      logVerbose(`Aborted multipart upload for ${key} (UploadId: ${uploadId})`);
    },

    async listMultipartUploads(bucket: string): Promise<IncompleteUpload[]> {
      const uploads: IncompleteUpload[] = [];
      let keyMarker: string | undefined;
      let uploadIdMarker: string | undefined;

      do {
        const response = await client.send(
          new ListMultipartUploadsCommand({
            Bucket: bucket,
            KeyMarker: keyMarker,
            UploadIdMarker: uploadIdMarker,
          })
        );

        for (const upload of response.Uploads ?? []) {
          if (upload.Key && upload.UploadId) {
            uploads.push({ key: upload.Key, uploadId: upload.UploadId, initiated: upload.Initiated });
          }
        }

        if (response.IsTruncated) {
          keyMarker = response.NextKeyMarker;
          uploadIdMarker = response.NextUploadIdMarker;
        } else {
          keyMarker = undefined;
          uploadIdMarker = undefined;
        }
      } while (keyMarker);

      return uploads;
    },

    async deleteObject(bucket: string, key: string): Promise<void> {
      await client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
    },
  };
}

/**
 * List all objects in a bucket with pagination, one yielded array per page
 */
export async function* listAllObjects(
  client: StorageClient,
  bucket: string,
  options: { pageSize?: number; prefix?: string } = {}
): AsyncGenerator<ObjectSummary[]> {
  let continuationToken: string | undefined;

  do {
    const page = await client.listObjects(bucket, {
      continuationToken,
      maxKeys: options.pageSize ?? LIST_PAGE_SIZE,
      prefix: options.prefix,
    });

    if (page.objects.length > 0) {
      yield page.objects;
    }

    continuationToken = page.nextContinuationToken;
  } while (continuationToken);
}
