/**
 * @flightlog/upload
 * 
 * Upload layer for flight logs.
 * 
 * Target: any S3-compatible store through the MinIO client.
 * 
 * Features:
 * - Bucket verification (optionally creation)
 * - Per-object public read via bucket policy
 * - Public and presigned download URLs
 */

export {
  LogStorage,
  type LogStorageOptions,
  type LogUploader,
  type UploadOptions,
  type UploadOutcome,
} from './storage.js';

export {
  loadCredentials,
  credentialsSchema,
  type StorageCredentials,
} from './credentials.js';

export {
  createMinioClient,
  endpointBaseUrl,
  type ObjectStoreClient,
} from './targets/minio.js';

export {
  objectArn,
  parsePolicy,
  grantsPublicRead,
  publicReadStatement,
  withPublicRead,
  type BucketPolicy,
  type PolicyStatement,
} from './policy.js';
