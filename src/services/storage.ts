import { createHash } from 'crypto';
import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  HeadBucketCommand,
  CreateBucketCommand,
  ListObjectsV2Command,
} from '@aws-sdk/client-s3';
import { logger } from '../utils/logger.js';
import {
  isIngestError,
  objectNotFoundError,
  storageUnavailableError,
} from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import type { ObjectStat, ObjectStore, StorageObjectRef, StoredObject } from '../types/index.js';

export interface StorageConfig {
  endpoint: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
}

export interface StorageMirrorOptions {
  bucket: string;
  timeoutMs: number;
}

const CSV_CONTENT_TYPE = 'text/csv';
const BUCKET_EXISTS_ERRORS = new Set(['BucketAlreadyOwnedByYou', 'BucketAlreadyExists']);

/**
 * S3 client for a MinIO (or any S3-compatible) endpoint
 */
export function createS3Client(config: StorageConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: true,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  });
}

/**
 * S3 returns ETags wrapped in double quotes; notifications carry them bare.
 */
export function normalizeEtag(etag: string): string {
  return etag.trim().replace(/^"+|"+$/g, '');
}

function isNotFound(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if ('name' in error && (error.name === 'NotFound' || error.name === 'NoSuchKey' || error.name === 'NoSuchBucket')) {
    return true;
  }
  if ('$metadata' in error && typeof error.$metadata === 'object' && error.$metadata !== null) {
    return 'httpStatusCode' in error.$metadata && error.$metadata.httpStatusCode === 404;
  }
  return false;
}

function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

/**
 * UTC timestamp in the compact form used for object keys, e.g. 20260118T093015Z
 */
export function compactTimestamp(at: Date): string {
  return at.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
}

export class StorageMirror implements ObjectStore {
  readonly bucket: string;
  private timeoutMs: number;
  private knownBuckets = new Set<string>();

  constructor(private client: S3Client, options: StorageMirrorOptions) {
    this.bucket = options.bucket;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Object key for an upload: upload time, a content hash prefix and the
   * original basename. Re-uploading a file of the same name never lands on
   * an existing key unless both the second and the content match.
   */
  deriveKey(filename: string, body: Uint8Array, at: Date = new Date()): string {
    const basename = filename.split(/[\\/]/).pop() || 'upload.csv';
    const hash = createHash('sha256').update(body).digest('hex').slice(0, 12);
    return `${compactTimestamp(at)}_${hash}_${basename}`;
  }

  /**
   * Upload the original file bytes, creating the bucket on first use
   */
  async store(filename: string, body: Uint8Array, key = this.deriveKey(filename, body)): Promise<StorageObjectRef> {
    await this.ensureBucket(this.bucket);

    const response = await this.call('upload', () => this.client.send(new PutObjectCommand({
      Bucket: this.bucket,
      Key: key,
      Body: body,
      ContentType: CSV_CONTENT_TYPE,
      Metadata: { 'original-filename': encodeURIComponent(filename) },
    })));

    const ref: StorageObjectRef = {
      bucket: this.bucket,
      key,
      size: body.byteLength,
      etag: normalizeEtag(response.ETag ?? ''),
    };

    logger.info({ bucket: ref.bucket, key, size: ref.size }, 'File mirrored to object storage');

    return ref;
  }

  /**
   * Download an object's bytes
   */
  async fetch(bucket: string, key: string): Promise<StoredObject> {
    const response = await this.call(
      'download',
      () => this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key })),
      { bucket, key }
    );

    if (!response.Body) {
      throw storageUnavailableError('download', new Error(`Empty body for ${bucket}/${key}`));
    }

    const stream = response.Body;
    const body = await this.call('download', () => stream.transformToByteArray(), { bucket, key });

    logger.debug({ bucket, key, size: body.byteLength }, 'Object downloaded');

    return {
      body,
      etag: normalizeEtag(response.ETag ?? ''),
      size: body.byteLength,
    };
  }

  /**
   * Check if an object exists
   */
  async exists(bucket: string, key: string): Promise<boolean> {
    return (await this.stat(bucket, key)) !== null;
  }

  /**
   * ETag and size of an object, or null when it does not exist
   */
  async stat(bucket: string, key: string): Promise<ObjectStat | null> {
    try {
      const response = await this.call(
        'stat',
        () => this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key })),
        { bucket, key }
      );
      return {
        etag: normalizeEtag(response.ETag ?? ''),
        size: response.ContentLength ?? 0,
      };
    } catch (error) {
      if (isIngestError(error) && error.code === 'OBJECT_NOT_FOUND') {
        return null;
      }
      throw error;
    }
  }

  /**
   * Health check for object storage
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.call('health check', () => this.client.send(new ListObjectsV2Command({ Bucket: this.bucket, MaxKeys: 1 })));
      return true;
    } catch (error) {
      logger.warn({ error, bucket: this.bucket }, 'Storage health check failed');
      return false;
    }
  }

  private async ensureBucket(bucket: string): Promise<void> {
    if (this.knownBuckets.has(bucket)) return;

    try {
      await this.call('bucket check', () => this.client.send(new HeadBucketCommand({ Bucket: bucket })), { bucket, key: '' });
    } catch (error) {
      if (!(isIngestError(error) && error.code === 'OBJECT_NOT_FOUND')) throw error;

      logger.info({ bucket }, 'Bucket does not exist, creating');
      try {
        await this.call('bucket creation', () => this.client.send(new CreateBucketCommand({ Bucket: bucket })));
      } catch (createError) {
        const name = isIngestError(createError) ? errorName(createError.cause) : undefined;
        if (!name || !BUCKET_EXISTS_ERRORS.has(name)) throw createError;
      }
    }

    this.knownBuckets.add(bucket);
  }

  /**
   * Run a storage request with the storage timeout. Missing objects become
   * OBJECT_NOT_FOUND when a target is given; every other failure is
   * STORAGE_UNAVAILABLE.
   */
  private async call<T>(
    operation: string,
    run: () => Promise<T>,
    target?: { bucket: string; key: string }
  ): Promise<T> {
    try {
      return await withTimeout(run(), this.timeoutMs, `Storage ${operation}`);
    } catch (error) {
      if (isIngestError(error)) throw error;
      if (target && isNotFound(error)) {
        throw objectNotFoundError(target.bucket, target.key);
      }
      throw storageUnavailableError(operation, error);
    }
  }
}
