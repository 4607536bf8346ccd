import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { LocateResult, LogFile } from '@flightlog/locator';
import type { LogUploader, UploadOptions, UploadOutcome } from '@flightlog/upload';
import type { BatchConfig } from '../config/index.js';
import { runBatchUpload, type BatchDependencies, type BatchStep } from './batchUpload.js';

const config: BatchConfig = {
  credentialsPath: '/etc/flightlog/credentials.json',
  bucket: 'flight-logs',
  logsDir: '/home/pi/logs',
  taskId: 'survey-42',
  extension: '.bin',
  createBucket: false,
};

const latest: LogFile = {
  path: '/home/pi/logs/00000042.bin',
  source: 'configured',
  sourceDir: '/home/pi/logs',
  size: 2048,
  modifiedAt: new Date('2024-05-05T10:00:00Z'),
};

class RecordingUploader implements LogUploader {
  readonly bucket = 'flight-logs';
  readonly calls: Array<{ filePath: string; key: string; options?: UploadOptions }> = [];

  async upload(filePath: string, key: string, options?: UploadOptions): Promise<UploadOutcome> {
    this.calls.push({ filePath, key, options });
    return {
      bucket: this.bucket,
      key,
      etag: 'etag-1',
      size: 2048,
      url: options?.makePublic ? `https://s3.test/${key}` : undefined,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

function dependencies(result: LocateResult, uploader: LogUploader, steps: BatchStep[] = []): BatchDependencies & { opened: number } {
  const deps: BatchDependencies & { opened: number } = {
    opened: 0,
    locate: async () => result,
    openStorage: async () => {
      deps.opened += 1;
      return uploader;
    },
    onStep: (step) => {
      steps.push(step);
    },
  };
  return deps;
}

describe('runBatchUpload', () => {
  it('uploads the newest log under the task key', async () => {
    const uploader = new RecordingUploader();
    const steps: BatchStep[] = [];
    const deps = dependencies({ latest, candidates: [latest], searchedDirs: ['/home/pi/logs'] }, uploader, steps);

    const result = await runBatchUpload(config, {}, deps);

    assert.equal(result.key, 'logs/survey-42.bin');
    assert.equal(result.file, latest);
    assert.deepEqual(uploader.calls, [
      { filePath: '/home/pi/logs/00000042.bin', key: 'logs/survey-42.bin', options: { makePublic: undefined } },
    ]);
    assert.deepEqual(steps, ['locate', 'connect', 'upload']);
  });

  it('passes the public flag through and returns the URL', async () => {
    const uploader = new RecordingUploader();
    const deps = dependencies({ latest, candidates: [latest], searchedDirs: [] }, uploader);

    const result = await runBatchUpload(config, { makePublic: true }, deps);

    assert.equal(result.outcome?.url, 'https://s3.test/logs/survey-42.bin');
  });

  it('does not open storage when no log is found', async () => {
    const uploader = new RecordingUploader();
    const deps = dependencies({ latest: null, candidates: [], searchedDirs: ['/home/pi/logs'] }, uploader);

    await assert.rejects(runBatchUpload(config, {}, deps), {
      name: 'LogNotFoundError',
      message: 'No .bin log files found in any location',
    });
    assert.equal(deps.opened, 0);
  });

  it('stops before connecting on a dry run', async () => {
    const uploader = new RecordingUploader();
    const deps = dependencies({ latest, candidates: [latest], searchedDirs: [] }, uploader);

    const result = await runBatchUpload(config, { dryRun: true }, deps);

    assert.deepEqual(result, { file: latest, key: 'logs/survey-42.bin', outcome: null });
    assert.equal(deps.opened, 0);
    assert.equal(uploader.calls.length, 0);
  });

  it('forwards locator settings', async () => {
    const uploader = new RecordingUploader();
    let received: unknown;
    const deps: BatchDependencies = {
      locate: async (options) => {
        received = options;
        return { latest, candidates: [latest], searchedDirs: [] };
      },
      openStorage: async () => uploader,
    };

    await runBatchUpload({ ...config, extension: '.ulg' }, { includeMounts: false }, deps);

    assert.deepEqual(received, { logsDir: '/home/pi/logs', extension: '.ulg', includeMounts: false });
  });

  it('propagates storage failures', async () => {
    const deps: BatchDependencies = {
      locate: async () => ({ latest, candidates: [latest], searchedDirs: [] }),
      openStorage: async () => {
        throw new Error('Storage bucket does not exist: flight-logs');
      },
    };

    await assert.rejects(runBatchUpload(config, {}, deps), {
      message: 'Storage bucket does not exist: flight-logs',
    });
  });
});
