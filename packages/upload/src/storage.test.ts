import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { StorageError } from '@flightlog/core';
import { createTempDir, removeDir } from '@flightlog/utils';
import { LogStorage } from './storage.js';
import { InMemoryObjectStore } from './testing.js';
import type { StorageCredentials } from './credentials.js';

const credentials: StorageCredentials = {
  endPoint: 's3.test.local',
  port: 9000,
  useSSL: true,
  accessKey: 'test-access',
  secretKey: 'test-secret',
};

describe('LogStorage', () => {
  let dir = '';
  let logPath = '';

  before(async () => {
    dir = await createTempDir('flightlog-storage');
    logPath = join(dir, '00000042.bin');
    await writeFile(logPath, Buffer.from('flight-data'));
  });

  after(async () => {
    await removeDir(dir);
  });

  describe('initialize', () => {
    it('fails when the bucket is missing', async () => {
      const client = new InMemoryObjectStore();
      await assert.rejects(
        LogStorage.initialize(credentials, 'flight-logs', { client }),
        { name: 'StorageError', message: 'Storage bucket does not exist: flight-logs' }
      );
    });

    it('creates the bucket when asked to', async () => {
      const client = new InMemoryObjectStore();
      const storage = await LogStorage.initialize(credentials, 'flight-logs', { client, createBucket: true });
      assert.equal(storage.bucket, 'flight-logs');
      assert.equal(client.buckets.has('flight-logs'), true);
    });

    it('wraps connection failures', async () => {
      const client = new InMemoryObjectStore(['flight-logs']);
      client.failWith.bucketExists = new Error('connect ECONNREFUSED');
      await assert.rejects(
        LogStorage.initialize(credentials, 'flight-logs', { client }),
        (error: unknown) => {
          assert.ok(error instanceof StorageError);
          assert.equal(error.message, 'Failed to reach storage at s3.test.local: connect ECONNREFUSED');
          assert.equal(error.cause, client.failWith.bucketExists);
          return true;
        }
      );
    });
  });

  describe('upload', () => {
    it('streams the file as an opaque blob', async () => {
      const client = new InMemoryObjectStore(['flight-logs']);
      const storage = await LogStorage.initialize(credentials, 'flight-logs', { client });

      const outcome = await storage.upload(logPath, 'logs/task-1.bin');

      assert.deepEqual(outcome, { bucket: 'flight-logs', key: 'logs/task-1.bin', etag: 'etag-1', size: 11 });
      const stored = client.objects.get('flight-logs/logs/task-1.bin');
      assert.equal(stored?.body.toString(), 'flight-data');
      assert.equal(stored?.size, 11);
      assert.deepEqual(stored?.metaData, { 'Content-Type': 'application/octet-stream' });
      assert.equal(client.setPolicyCalls, 0);
    });

    it('makes the object public and returns its URL', async () => {
      const client = new InMemoryObjectStore(['flight-logs']);
      const storage = await LogStorage.initialize(credentials, 'flight-logs', { client });

      const outcome = await storage.upload(logPath, 'logs/task-1.bin', { makePublic: true });

      assert.equal(outcome.url, 'https://s3.test.local:9000/flight-logs/logs/task-1.bin');
      assert.equal(client.setPolicyCalls, 1);
      assert.deepEqual(JSON.parse(client.policy ?? '{}'), {
        Version: '2012-10-17',
        Statement: [{
          Effect: 'Allow',
          Principal: { AWS: ['*'] },
          Action: ['s3:GetObject'],
          Resource: ['arn:aws:s3:::flight-logs/logs/task-1.bin'],
        }],
      });
    });

    it('reports a missing source file as a storage error', async () => {
      const client = new InMemoryObjectStore(['flight-logs']);
      const storage = await LogStorage.initialize(credentials, 'flight-logs', { client });
      await assert.rejects(storage.upload(join(dir, 'absent.bin'), 'logs/x.bin'), { name: 'StorageError' });
      assert.equal(client.objects.size, 0);
    });

    it('reports a rejected put', async () => {
      const client = new InMemoryObjectStore(['flight-logs']);
      const storage = await LogStorage.initialize(credentials, 'flight-logs', { client });
      client.failWith.putObject = new Error('Access Denied');
      await assert.rejects(storage.upload(logPath, 'logs/x.bin'), {
        name: 'StorageError',
        message: `Failed to upload ${logPath} to logs/x.bin: Access Denied`,
      });
    });
  });

  describe('makePublic', () => {
    it('does not rewrite the policy when the grant already exists', async () => {
      const client = new InMemoryObjectStore(['flight-logs']);
      const storage = await LogStorage.initialize(credentials, 'flight-logs', { client });
      await storage.makePublic('logs/a.bin');
      await storage.makePublic('logs/a.bin');
      assert.equal(client.setPolicyCalls, 1);
    });

    it('surfaces policy errors other than a missing policy', async () => {
      const client = new InMemoryObjectStore(['flight-logs']);
      const storage = await LogStorage.initialize(credentials, 'flight-logs', { client });
      client.failWith.getBucketPolicy = new Error('Access Denied');
      await assert.rejects(storage.makePublic('logs/a.bin'), {
        name: 'StorageError',
        message: 'Failed to make logs/a.bin public: Access Denied',
      });
    });
  });

  describe('urls', () => {
    it('encodes key segments under a custom base URL', async () => {
      const client = new InMemoryObjectStore(['flight-logs']);
      const storage = await LogStorage.initialize(credentials, 'flight-logs', {
        client,
        publicBaseUrl: 'https://cdn.test/',
      });
      assert.equal(storage.publicUrl('logs/task 1_a.bin'), 'https://cdn.test/flight-logs/logs/task%201_a.bin');
    });

    it('omits the default port', async () => {
      const client = new InMemoryObjectStore(['flight-logs']);
      const storage = await LogStorage.initialize(
        { ...credentials, port: 443 },
        'flight-logs',
        { client }
      );
      assert.equal(storage.publicUrl('logs/a.bin'), 'https://s3.test.local/flight-logs/logs/a.bin');
    });

    it('passes the expiry through when presigning', async () => {
      const client = new InMemoryObjectStore(['flight-logs']);
      const storage = await LogStorage.initialize(credentials, 'flight-logs', { client });
      assert.equal(
        await storage.presignedUrl('logs/a.bin', 3600),
        'https://signed.test/flight-logs/logs/a.bin?expires=3600'
      );
    });
  });

  describe('healthCheck', () => {
    it('reports availability from listBuckets', async () => {
      const client = new InMemoryObjectStore(['flight-logs']);
      const storage = await LogStorage.initialize(credentials, 'flight-logs', { client });
      assert.equal(await storage.healthCheck(), true);
      client.failWith.listBuckets = new Error('timeout');
      assert.equal(await storage.healthCheck(), false);
    });
  });
});
