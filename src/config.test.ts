import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { resolve } from 'path';
import { loadConfig } from './config.js';

const KEYS = [
  'PORT',
  'API_PREFIX',
  'REDIS_URL',
  'PIPELINE_QUEUE',
  'PIPELINE_QUEUE_NAME',
  'PIPELINE_CONCURRENCY',
  'PROJECT_FILE_DIR',
  'FIXTURE_DIR',
] as const;

describe('loadConfig', () => {
  const saved: Partial<Record<(typeof KEYS)[number], string>> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('falls back to defaults', () => {
    expect(loadConfig()).toMatchObject({
      port: 8000,
      apiPrefix: '/api/v1',
      redisUrl: 'redis://127.0.0.1:6379',
      queueDriver: 'bullmq',
      queueName: 'urban-pipeline',
      concurrency: 2,
      projectFileDir: resolve('data/projects'),
      fixtureDir: resolve('fixtures'),
    });
  });

  it('reads the environment', () => {
    process.env.PORT = '9100';
    process.env.API_PREFIX = '/pipeline/';
    process.env.PIPELINE_QUEUE = 'INLINE';
    process.env.PIPELINE_CONCURRENCY = '5';
    process.env.PROJECT_FILE_DIR = '/srv/projects';

    expect(loadConfig()).toMatchObject({
      port: 9100,
      apiPrefix: '/pipeline',
      queueDriver: 'inline',
      concurrency: 5,
      projectFileDir: '/srv/projects',
    });
  });

  it('rejects unknown queue drivers', () => {
    process.env.PIPELINE_QUEUE = 'kafka';
    expect(() => loadConfig()).toThrow('PIPELINE_QUEUE must be "bullmq" or "inline", got "kafka"');
  });

  it.each(['0', '-2', '1.5', 'many'])('rejects a concurrency of %s', (value) => {
    process.env.PIPELINE_CONCURRENCY = value;
    expect(() => loadConfig()).toThrow(`PIPELINE_CONCURRENCY must be a positive integer, got "${value}"`);
  });
});
