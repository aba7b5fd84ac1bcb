import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '..';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({ WORKER_COUNT: '3' });

    expect(config).toEqual({
      env: 'development',
      server: { host: '0.0.0.0', port: 8080, maxUploadBytes: 250 * 1024 * 1024 },
      fonts: { directory: './fonts' },
      scheduler: { workers: 3, queueCapacity: 12, jobTimeoutMs: 30_000 },
      pipeline: { maxDimension: 8192, maxOperations: 32, defaultQuality: 80 },
      logLevel: 'info',
    });
  });

  it('should default the worker count to the available parallelism', () => {
    const config = loadConfig({});
    expect(config.scheduler.workers).toBeGreaterThanOrEqual(1);
    expect(config.scheduler.queueCapacity).toBe(config.scheduler.workers * 4);
  });

  it('should read every override from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      HOST: '127.0.0.1',
      PORT: '9000',
      MAX_UPLOAD_BYTES: '2048',
      FONT_DIR: '/srv/fonts',
      WORKER_COUNT: '2',
      QUEUE_CAPACITY: '0',
      JOB_TIMEOUT_MS: '1500',
      MAX_DIMENSION: '4096',
      MAX_OPERATIONS: '8',
      DEFAULT_QUALITY: '90',
      LOG_LEVEL: 'warn',
    });

    expect(config).toEqual({
      env: 'production',
      server: { host: '127.0.0.1', port: 9000, maxUploadBytes: 2048 },
      fonts: { directory: '/srv/fonts' },
      scheduler: { workers: 2, queueCapacity: 0, jobTimeoutMs: 1500 },
      pipeline: { maxDimension: 4096, maxOperations: 8, defaultQuality: 90 },
      logLevel: 'warn',
    });
  });

  it('should treat empty values as unset', () => {
    const config = loadConfig({ WORKER_COUNT: '1', PORT: '', LOG_LEVEL: '' });
    expect(config.server.port).toBe(8080);
    expect(config.logLevel).toBe('info');
  });

  it.each([
    ['PORT', 'eighty'],
    ['PORT', '70000'],
    ['WORKER_COUNT', '0'],
    ['DEFAULT_QUALITY', '101'],
    ['LOG_LEVEL', 'loud'],
    ['NODE_ENV', 'staging'],
  ])('should reject %s=%s', (key, value) => {
    expect(() => loadConfig({ WORKER_COUNT: '1', [key]: value })).toThrow(ConfigError);
  });

  it('should name the offending key', () => {
    const error: unknown = (() => {
      try {
        return loadConfig({ WORKER_COUNT: '1', JOB_TIMEOUT_MS: '0' });
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ issues: [expect.stringMatching(/^scheduler\.jobTimeoutMs: /)] });
  });
});
