import { Queue, Worker, type Job, type JobsOptions } from 'bullmq';
import { Redis } from 'ioredis';
import { advanceJobSchema, toAdvanceJobData, type AdvanceJobData } from './jobs/advance-job.js';
import { logger } from './logger.js';
import type { PipelineConfig } from './config.js';
import type { AdvanceRequest, TaskQueue } from './pipeline/types.js';

export const ADVANCE_JOB_NAME = 'advance';

type QueueConfig = Pick<PipelineConfig, 'redisUrl' | 'queueName'>;

export const createRedisConnection = (redisUrl: string) =>
  new Redis(redisUrl, {
    maxRetriesPerRequest: null,
  });

export const DEFAULT_JOB_OPTIONS: JobsOptions = {
  removeOnComplete: {
    age: 300, // Keep completed jobs for 5 minutes
    count: 100, // Keep at most 100 completed jobs
  },
  removeOnFail: false,
  attempts: 1,
};

/** Pipeline work submitted to a BullMQ queue. */
export class BullTaskQueue implements TaskQueue {
  readonly queue: Queue<AdvanceJobData>;

  constructor(cfg: QueueConfig) {
    this.queue = new Queue<AdvanceJobData>(cfg.queueName, {
      connection: createRedisConnection(cfg.redisUrl),
      defaultJobOptions: DEFAULT_JOB_OPTIONS,
    });
  }

  async submit(request: AdvanceRequest): Promise<string> {
    const job = await this.queue.add(ADVANCE_JOB_NAME, toAdvanceJobData(request));
    if (!job.id) {
      throw new Error('Queue accepted a pipeline job without assigning an id');
    }
    logger.info(
      { jobId: job.id, projectUuid: request.projectUuid, stepIndex: request.stepIndex },
      'Queued pipeline job',
    );
    return job.id;
  }

  async close() {
    await this.queue.close();
  }
}

export type PipelineJobProcessor = (request: AdvanceJobData, taskId: string) => Promise<unknown>;

export const createPipelineWorker = (
  cfg: QueueConfig & Pick<PipelineConfig, 'concurrency'>,
  processor: PipelineJobProcessor,
) => {
  const worker = new Worker<AdvanceJobData>(
    cfg.queueName,
    async (job: Job<AdvanceJobData>) => {
      const data = advanceJobSchema.parse(job.data);
      return processor(data, job.id ?? `${cfg.queueName}:${job.name}:${job.timestamp}`);
    },
    {
      connection: createRedisConnection(cfg.redisUrl),
      concurrency: cfg.concurrency,
    },
  );

  worker.on('completed', (job) => {
    logger.info({ jobId: job.id }, 'Pipeline job completed');
  });

  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err }, 'Pipeline job failed');
  });

  return { worker };
};
