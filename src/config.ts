import { resolve } from 'path';
import { config as loadEnv } from 'dotenv';

loadEnv();

export type QueueDriver = 'bullmq' | 'inline';

export interface PipelineConfig {
  port: number;
  apiPrefix: string;
  logLevel: string;
  redisUrl: string;
  /** `inline` runs pipeline jobs inside the API process without Redis. */
  queueDriver: QueueDriver;
  queueName: string;
  concurrency: number;
  /** Root of the per-project directories. */
  projectFileDir: string;
  /** Placeholder outputs, one `NN-step` directory per registry step. */
  fixtureDir: string;
}

const parseQueueDriver = (value: string | undefined): QueueDriver => {
  const driver = (value ?? 'bullmq').toLowerCase();
  if (driver !== 'bullmq' && driver !== 'inline') {
    throw new Error(`PIPELINE_QUEUE must be "bullmq" or "inline", got "${value}"`);
  }
  return driver;
};

const parseConcurrency = (value: string | undefined): number => {
  const concurrency = Number(value ?? 2);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`PIPELINE_CONCURRENCY must be a positive integer, got "${value}"`);
  }
  return concurrency;
};

export const loadConfig = (): PipelineConfig => {
  const {
    PORT,
    API_PREFIX,
    LOG_LEVEL,
    REDIS_URL,
    PIPELINE_QUEUE,
    PIPELINE_QUEUE_NAME,
    PIPELINE_CONCURRENCY,
    PROJECT_FILE_DIR,
    FIXTURE_DIR,
  } = process.env;

  return {
    port: Number(PORT ?? 8000),
    apiPrefix: (API_PREFIX ?? '/api/v1').replace(/\/$/, ''),
    logLevel: LOG_LEVEL ?? 'info',
    redisUrl: REDIS_URL ?? 'redis://127.0.0.1:6379',
    queueDriver: parseQueueDriver(PIPELINE_QUEUE),
    queueName: PIPELINE_QUEUE_NAME ?? 'urban-pipeline',
    concurrency: parseConcurrency(PIPELINE_CONCURRENCY),
    projectFileDir: resolve(PROJECT_FILE_DIR ?? 'data/projects'),
    fixtureDir: resolve(FIXTURE_DIR ?? 'fixtures'),
  };
};
