/**
 * MinIO target
 * 
 * S3-compatible object storage via the MinIO client.
 */

import { Client } from 'minio';
import type { Readable } from 'node:stream';
import type { StorageCredentials } from '../credentials.js';

/**
 * The part of the MinIO client this package relies on. `Client` satisfies it
 * structurally; tests substitute an in-memory store.
 */
export interface ObjectStoreClient {
  bucketExists(bucket: string): Promise<boolean>;
  makeBucket(bucket: string, region?: string): Promise<void>;
  putObject(
    bucket: string,
    key: string,
    stream: Readable,
    size?: number,
    metaData?: Record<string, string>
  ): Promise<{ etag: string }>;
  getBucketPolicy(bucket: string): Promise<string>;
  setBucketPolicy(bucket: string, policy: string): Promise<void>;
  presignedGetObject(bucket: string, key: string, expiry?: number): Promise<string>;
  listBuckets(): Promise<unknown[]>;
}

export function createMinioClient(credentials: StorageCredentials): ObjectStoreClient {
  return new Client({
    endPoint: credentials.endPoint,
    port: credentials.port,
    useSSL: credentials.useSSL,
    accessKey: credentials.accessKey,
    secretKey: credentials.secretKey,
    region: credentials.region,
  });
}

/**
 * Path-style base URL for objects on this endpoint
 */
export function endpointBaseUrl(credentials: StorageCredentials): string {
  const scheme = credentials.useSSL ? 'https' : 'http';
  const defaultPort = credentials.useSSL ? 443 : 80;
  const port = credentials.port !== undefined && credentials.port !== defaultPort
    ? `:${credentials.port}`
    : '';
  return `${scheme}://${credentials.endPoint}${port}`;
}
