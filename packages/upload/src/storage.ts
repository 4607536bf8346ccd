/**
 * Log Storage
 *
 * Wraps the object store client: verify the bucket, push one local file to a
 * key, optionally make it publicly readable and hand back its URL.
 */

import { createReadStream, type ReadStream } from 'node:fs';
import { StorageError } from '@flightlog/core';
import { createLogger, errorMessage, getFileSizeBytes, isObject } from '@flightlog/utils';
import type { StorageCredentials } from './credentials.js';
import { createMinioClient, endpointBaseUrl, type ObjectStoreClient } from './targets/minio.js';
import { withPublicRead } from './policy.js';

const log = createLogger({ module: 'upload:storage' });

const LOG_CONTENT_TYPE = 'application/octet-stream';
const DEFAULT_PRESIGN_EXPIRY_SECONDS = 7 * 24 * 60 * 60;

export interface LogStorageOptions {
  /** Public URL prefix for objects, e.g. a CDN; defaults to the endpoint itself. */
  publicBaseUrl?: string;
  /** Create the bucket when it is missing instead of failing. */
  createBucket?: boolean;
  client?: ObjectStoreClient;
}

export interface UploadOptions {
  makePublic?: boolean;
}

export interface UploadOutcome {
  bucket: string;
  key: string;
  etag: string;
  size: number;
  url?: string;
}

/**
 * What the drivers need from storage
 */
export interface LogUploader {
  readonly bucket: string;
  upload(filePath: string, key: string, options?: UploadOptions): Promise<UploadOutcome>;
  healthCheck(): Promise<boolean>;
}

function isMissingPolicy(error: unknown): boolean {
  return isObject(error) && error['code'] === 'NoSuchBucketPolicy';
}

export class LogStorage implements LogUploader {
  private readonly baseUrl: string;

  private constructor(
    private readonly client: ObjectStoreClient,
    public readonly bucket: string,
    baseUrl: string
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /**
   * Build the client and make sure the bucket is there
   */
  static async initialize(
    credentials: StorageCredentials,
    bucket: string,
    options: LogStorageOptions = {}
  ): Promise<LogStorage> {
    const client = options.client ?? createMinioClient(credentials);

    let exists: boolean;
    try {
      exists = await client.bucketExists(bucket);
    } catch (error) {
      throw new StorageError(
        `Failed to reach storage at ${credentials.endPoint}: ${errorMessage(error)}`,
        { bucket, endPoint: credentials.endPoint },
        error
      );
    }

    if (!exists) {
      if (!options.createBucket) {
        throw new StorageError(`Storage bucket does not exist: ${bucket}`, { bucket });
      }
      try {
        await client.makeBucket(bucket, credentials.region);
        log.info({ bucket }, 'Created storage bucket');
      } catch (error) {
        throw new StorageError(
          `Failed to create bucket ${bucket}: ${errorMessage(error)}`,
          { bucket },
          error
        );
      }
    }

    log.info({ bucket, endPoint: credentials.endPoint }, 'Storage initialized');
    return new LogStorage(client, bucket, options.publicBaseUrl ?? endpointBaseUrl(credentials));
  }

  /**
   * Upload a local file to `key`
   */
  async upload(filePath: string, key: string, options: UploadOptions = {}): Promise<UploadOutcome> {
    let size: number;
    let etag: string;
    let stream: ReadStream | undefined;
    try {
      size = await getFileSizeBytes(filePath);
      stream = createReadStream(filePath);
      const result = await this.client.putObject(
        this.bucket,
        key,
        stream,
        size,
        { 'Content-Type': LOG_CONTENT_TYPE }
      );
      etag = result.etag;
    } catch (error) {
      stream?.destroy();
      throw new StorageError(
        `Failed to upload ${filePath} to ${key}: ${errorMessage(error)}`,
        { filePath, key, bucket: this.bucket },
        error
      );
    }

    log.info({ filePath, key, size }, `Successfully uploaded ${filePath} to ${key}`);

    const outcome: UploadOutcome = { bucket: this.bucket, key, etag, size };
    if (options.makePublic) {
      await this.makePublic(key);
      outcome.url = this.publicUrl(key);
      log.info({ key, url: outcome.url }, 'Download URL');
    }
    return outcome;
  }

  /**
   * Grant anonymous read on a single object
   */
  async makePublic(key: string): Promise<void> {
    try {
      let current: string | null;
      try {
        current = await this.client.getBucketPolicy(this.bucket);
      } catch (error) {
        if (!isMissingPolicy(error)) throw error;
        current = null;
      }

      const { policy, changed } = withPublicRead(current, this.bucket, key);
      if (changed) {
        await this.client.setBucketPolicy(this.bucket, JSON.stringify(policy));
      }
      log.debug({ key, changed }, 'Object is publicly readable');
    } catch (error) {
      throw new StorageError(
        `Failed to make ${key} public: ${errorMessage(error)}`,
        { key, bucket: this.bucket },
        error
      );
    }
  }

  publicUrl(key: string): string {
    const encodedKey = key.split('/').map((segment) => encodeURIComponent(segment)).join('/');
    return `${this.baseUrl}/${encodeURIComponent(this.bucket)}/${encodedKey}`;
  }

  /**
   * Time-limited download link that works without a public policy
   */
  async presignedUrl(key: string, expirySeconds: number = DEFAULT_PRESIGN_EXPIRY_SECONDS): Promise<string> {
    try {
      return await this.client.presignedGetObject(this.bucket, key, expirySeconds);
    } catch (error) {
      throw new StorageError(
        `Failed to sign download URL for ${key}: ${errorMessage(error)}`,
        { key, bucket: this.bucket },
        error
      );
    }
  }

  /**
   * Check if storage is accessible
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.client.listBuckets();
      return true;
    } catch (error) {
      log.warn({ error: errorMessage(error) }, 'Storage health check failed');
      return false;
    }
  }
}
