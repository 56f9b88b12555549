import { logger } from '../logger.js';
import type { ProjectStore } from '../services/project-store.js';
import type { StepExecutor } from './executor.js';
import type { StepRegistry } from './registry.js';
import type { AdvanceRequest, StepResult, TaskQueue } from './types.js';

export type AdvanceOutcome =
  | { state: 'terminated'; reason: 'out-of-range' | 'max-step-reached' }
  | { state: 'failed'; result: StepResult }
  | { state: 'advanced'; result: StepResult; next: AdvanceRequest; nextTaskId: string };

export interface PipelineDriverDeps {
  registry: StepRegistry;
  projects: ProjectStore;
  executor: StepExecutor;
  queue: TaskQueue;
}

/**
 * Chains pipeline steps. Each call runs one step and, when it succeeds,
 * submits the next one as a separate unit of work without waiting for it.
 */
export class PipelineDriver {
  constructor(private readonly deps: PipelineDriverDeps) {}

  async advance(request: AdvanceRequest, context: { taskId: string }): Promise<AdvanceOutcome> {
    const { registry, projects, executor, queue } = this.deps;
    const { projectUuid, stepIndex } = request;
    const maxStepIndex = request.maxStepIndex ?? null;

    if (!registry.has(stepIndex)) {
      logger.debug({ projectUuid, stepIndex }, 'Pipeline finished: step outside registry');
      return { state: 'terminated', reason: 'out-of-range' };
    }
    if (maxStepIndex !== null && stepIndex === maxStepIndex) {
      logger.debug({ projectUuid, stepIndex, maxStepIndex }, 'Pipeline finished: bound reached');
      return { state: 'terminated', reason: 'max-step-reached' };
    }

    const project = await projects.get(projectUuid);
    const result = await executor.runStep(project, stepIndex, {
      taskId: context.taskId,
      inputs: await projects.inputPaths(projectUuid),
    });

    if (result.status === 'failed') {
      logger.warn({ projectUuid, step: result.step.name }, 'Pipeline stopped at failed step');
      return { state: 'failed', result };
    }

    const next: AdvanceRequest = { projectUuid, stepIndex: stepIndex + 1, maxStepIndex };
    const nextTaskId = await queue.submit(next);
    logger.info({ projectUuid, nextStepIndex: next.stepIndex, nextTaskId }, 'Queued next pipeline step');

    return { state: 'advanced', result, next, nextTaskId };
  }
}

/** JSON-safe summary of an outcome, stored as the job's return value. */
export function describeOutcome(outcome: AdvanceOutcome) {
  switch (outcome.state) {
    case 'terminated':
      return { state: outcome.state, reason: outcome.reason };
    case 'failed':
      return { state: outcome.state, step: outcome.result.step.name, message: outcome.result.message };
    case 'advanced':
      return {
        state: outcome.state,
        step: outcome.result.step.name,
        nextStepIndex: outcome.next.stepIndex,
        nextTaskId: outcome.nextTaskId,
      };
  }
}
