import type { PipelineConfig } from './config.js';
import { PipelineDriver } from './pipeline/driver.js';
import { StepExecutor } from './pipeline/executor.js';
import { createGenerators } from './pipeline/generators/index.js';
import { InProcessTaskQueue } from './pipeline/in-process-queue.js';
import { ArtifactLocator } from './pipeline/locator.js';
import { createDefaultRegistry, type StepRegistry } from './pipeline/registry.js';
import { TaskStatusTracker } from './pipeline/status-store.js';
import type { Generator, TaskQueue } from './pipeline/types.js';
import { BullTaskQueue } from './queue.js';
import { PipelineService } from './services/pipeline-service.js';
import { FileProjectStore, type ProjectStore } from './services/project-store.js';

export interface PipelineRuntime {
  registry: StepRegistry;
  locator: ArtifactLocator;
  statuses: TaskStatusTracker;
  projects: ProjectStore;
  executor: StepExecutor;
  driver: PipelineDriver;
  queue: TaskQueue;
  service: PipelineService;
  close(): Promise<void>;
}

export interface RuntimeOverrides {
  registry?: StepRegistry;
  generators?: ReadonlyMap<string, Generator>;
  queue?: TaskQueue;
}

type RuntimeConfig = Pick<
  PipelineConfig,
  'projectFileDir' | 'fixtureDir' | 'queueDriver' | 'redisUrl' | 'queueName'
>;

const createQueue = (config: RuntimeConfig): TaskQueue =>
  config.queueDriver === 'inline' ? new InProcessTaskQueue({ autoRun: true }) : new BullTaskQueue(config);

/**
 * Wires the pipeline components together. The registry is built once here
 * and passed to everything that needs it.
 */
export function createRuntime(config: RuntimeConfig, overrides: RuntimeOverrides = {}): PipelineRuntime {
  const registry = overrides.registry ?? createDefaultRegistry();
  const locator = new ArtifactLocator(config.projectFileDir, registry);
  const statuses = new TaskStatusTracker(locator);
  const projects = new FileProjectStore(locator);
  const generators = overrides.generators ?? createGenerators(registry, config.fixtureDir);
  const executor = new StepExecutor({ registry, locator, statuses, generators });
  const queue = overrides.queue ?? createQueue(config);
  const driver = new PipelineDriver({ registry, projects, executor, queue });
  const service = new PipelineService({ registry, locator, projects, statuses, queue });

  if (queue instanceof InProcessTaskQueue) {
    queue.bind((request, taskId) => driver.advance(request, { taskId }));
  }

  return {
    registry,
    locator,
    statuses,
    projects,
    executor,
    driver,
    queue,
    service,
    close: async () => {
      if (queue instanceof BullTaskQueue) {
        await queue.close();
      }
    },
  };
}
