import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { resolve } from 'node:path';
import { WORKSPACE_ROOT } from '@flightlog/utils/env';
import { resolveBatchConfig, resolveLocatorConfig } from './index.js';

const completeEnv = {
  CREDENTIALS_PATH: '/etc/flightlog/credentials.json',
  STORAGE_BUCKET: 'flight-logs',
  LOGS_DIR: '/home/pi/logs',
  TASK_ID: 'survey-42',
};

describe('resolveBatchConfig', () => {
  it('builds the config from the environment', () => {
    assert.deepEqual(resolveBatchConfig(completeEnv), {
      ok: true,
      config: {
        credentialsPath: '/etc/flightlog/credentials.json',
        bucket: 'flight-logs',
        logsDir: '/home/pi/logs',
        taskId: 'survey-42',
        extension: '.bin',
        publicBaseUrl: undefined,
        createBucket: false,
      },
    });
  });

  it('lets flags override the environment', () => {
    const result = resolveBatchConfig(completeEnv, {
      taskId: 'survey-43',
      logsDir: 'relative/logs',
      extension: 'ulg',
    });
    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.equal(result.config.taskId, 'survey-43');
    assert.equal(result.config.logsDir, resolve('relative/logs'));
    assert.equal(result.config.extension, '.ulg');
  });

  it('treats a blank extension as the default, like the locator settings', () => {
    const env = { ...completeEnv, LOG_EXTENSION: '' };
    const result = resolveBatchConfig(env);
    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.equal(result.config.extension, '.bin');
    assert.equal(resolveLocatorConfig(env).extension, '.bin');
  });

  it('resolves relative env paths against the workspace root', () => {
    const result = resolveBatchConfig({
      ...completeEnv,
      CREDENTIALS_PATH: './credentials.json',
      LOGS_DIR: './logs',
    });
    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.equal(result.config.credentialsPath, resolve(WORKSPACE_ROOT, 'credentials.json'));
    assert.equal(result.config.logsDir, resolve(WORKSPACE_ROOT, 'logs'));
  });

  it('reports every missing setting', () => {
    assert.deepEqual(resolveBatchConfig({ STORAGE_BUCKET: 'flight-logs', LOGS_DIR: '  ' }), {
      ok: false,
      errors: [
        'CREDENTIALS_PATH environment variable is not set',
        'LOGS_DIR environment variable is not set',
        'TASK_ID environment variable is not set',
      ],
    });
  });

  it('rejects a task id that would escape the key prefix', () => {
    assert.deepEqual(resolveBatchConfig({ ...completeEnv, TASK_ID: 'a/b' }), {
      ok: false,
      errors: ['TASK_ID is invalid: Task id must not contain path separators'],
    });
  });

  it('parses storage flags', () => {
    const result = resolveBatchConfig({
      ...completeEnv,
      STORAGE_CREATE_BUCKET: 'true',
      STORAGE_PUBLIC_BASE_URL: 'https://cdn.test',
    });
    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.equal(result.config.createBucket, true);
    assert.equal(result.config.publicBaseUrl, 'https://cdn.test');
  });
});

describe('resolveLocatorConfig', () => {
  it('requires nothing', () => {
    assert.deepEqual(resolveLocatorConfig({}), { logsDir: undefined, extension: '.bin' });
  });

  it('prefers flags over the environment', () => {
    assert.deepEqual(
      resolveLocatorConfig({ LOGS_DIR: '/env/logs', LOG_EXTENSION: 'log' }, { logsDir: '/flag/logs' }),
      { logsDir: '/flag/logs', extension: '.log' }
    );
  });
});
