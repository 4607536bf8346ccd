/**
 * In-memory object store for tests
 */

import type { Readable } from 'node:stream';
import type { ObjectStoreClient } from './targets/minio.js';

export interface StoredObject {
  body: Buffer;
  size?: number;
  metaData?: Record<string, string>;
}

export class InMemoryObjectStore implements ObjectStoreClient {
  readonly buckets = new Set<string>();
  readonly objects = new Map<string, StoredObject>();
  policy: string | null = null;
  setPolicyCalls = 0;
  failWith: Partial<Record<keyof ObjectStoreClient, Error>> = {};

  constructor(buckets: string[] = []) {
    for (const bucket of buckets) this.buckets.add(bucket);
  }

  private check(method: keyof ObjectStoreClient): void {
    const error = this.failWith[method];
    if (error) throw error;
  }

  async bucketExists(bucket: string): Promise<boolean> {
    this.check('bucketExists');
    return this.buckets.has(bucket);
  }

  async makeBucket(bucket: string): Promise<void> {
    this.check('makeBucket');
    this.buckets.add(bucket);
  }

  async putObject(
    bucket: string,
    key: string,
    stream: Readable,
    size?: number,
    metaData?: Record<string, string>
  ): Promise<{ etag: string }> {
    this.check('putObject');
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    this.objects.set(`${bucket}/${key}`, { body: Buffer.concat(chunks), size, metaData });
    return { etag: `etag-${this.objects.size}` };
  }

  async getBucketPolicy(_bucket: string): Promise<string> {
    this.check('getBucketPolicy');
    if (this.policy === null) {
      throw Object.assign(new Error('The bucket policy does not exist'), { code: 'NoSuchBucketPolicy' });
    }
    return this.policy;
  }

  async setBucketPolicy(_bucket: string, policy: string): Promise<void> {
    this.check('setBucketPolicy');
    this.setPolicyCalls += 1;
    this.policy = policy;
  }

  async presignedGetObject(bucket: string, key: string, expiry?: number): Promise<string> {
    this.check('presignedGetObject');
    return `https://signed.test/${bucket}/${key}?expires=${expiry ?? 0}`;
  }

  async listBuckets(): Promise<unknown[]> {
    this.check('listBuckets');
    return [...this.buckets].map((name) => ({ name }));
  }
}
