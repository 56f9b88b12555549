import type { PipelineConfig } from './config.js';
import { logger } from './logger.js';
import { describeOutcome } from './pipeline/driver.js';
import { createPipelineWorker } from './queue.js';
import type { PipelineRuntime } from './runtime.js';

/** Consume pipeline jobs from Redis. The inline queue runs its own units. */
export const startPipelineWorker = (config: PipelineConfig, runtime: PipelineRuntime) => {
  if (config.queueDriver !== 'bullmq') {
    logger.info('Inline queue in use, no Redis worker started');
    return null;
  }

  const { worker } = createPipelineWorker(config, async (data, taskId) =>
    describeOutcome(await runtime.driver.advance(data, { taskId })),
  );

  worker
    .waitUntilReady()
    .then(() => logger.info({ queue: config.queueName }, 'Pipeline worker ready'))
    .catch((err) => {
      logger.error({ err }, 'Pipeline worker failed to initialize');
      process.exitCode = 1;
    });

  return worker;
};
