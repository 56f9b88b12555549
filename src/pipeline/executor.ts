import { mkdir, rm } from 'fs/promises';
import { ComputationError, MissingPrerequisiteError } from '../errors.js';
import { isFile, writeFileAtomic } from '../infra/files.js';
import { logger } from '../logger.js';
import type { Project, ProjectInputPaths } from '../types/project.js';
import type { ArtifactLocator } from './locator.js';
import type { StepRegistry } from './registry.js';
import type { TaskStatusTracker } from './status-store.js';
import type { Generator, StepDefinition, StepResult } from './types.js';

export interface StepExecutorDeps {
  registry: StepRegistry;
  locator: ArtifactLocator;
  statuses: TaskStatusTracker;
  generators: ReadonlyMap<string, Generator>;
}

export interface RunStepOptions {
  taskId: string;
  inputs: ProjectInputPaths;
}

/**
 * Runs a single step: records intent, checks the previous step's output,
 * computes, writes artifacts, records the outcome.
 *
 * Generator failures end up in the step's task file and in the returned
 * result. A missing prerequisite is recorded as FAILED and then thrown.
 */
export class StepExecutor {
  private readonly registry: StepRegistry;
  private readonly locator: ArtifactLocator;
  private readonly statuses: TaskStatusTracker;
  private readonly generators: ReadonlyMap<string, Generator>;

  constructor(deps: StepExecutorDeps) {
    this.registry = deps.registry;
    this.locator = deps.locator;
    this.statuses = deps.statuses;
    this.generators = deps.generators;
  }

  async runStep(project: Project, stepIndex: number, options: RunStepOptions): Promise<StepResult> {
    const step = this.registry.get(stepIndex);
    const { taskId } = options;
    const logContext = { projectUuid: project.uuid, step: step.name, taskId };

    const outputDir = this.locator.stepDirectory(project.uuid, step.index);
    await mkdir(outputDir, { recursive: true });
    await this.statuses.write(project.uuid, step.index, { task_id: taskId, status: 'pending', message: '' });

    const previous = step.index > 0 ? this.registry.get(step.index - 1) : null;
    if (previous && !(await this.hasArtifacts(project.uuid, previous))) {
      const error = new MissingPrerequisiteError(this.registry.folderName(previous.index));
      await this.statuses.write(project.uuid, step.index, {
        task_id: taskId,
        status: 'failed',
        message: error.message,
      });
      logger.warn({ ...logContext, missing: previous.name }, 'Step prerequisite missing');
      throw error;
    }

    await this.statuses.write(project.uuid, step.index, { task_id: taskId, status: 'running', message: '' });
    logger.info(logContext, 'Step started');

    let artifacts: string[];
    try {
      artifacts = await this.compute(project, step, {
        outputDir,
        previousStepDir: previous ? this.locator.stepDirectory(project.uuid, previous.index) : null,
        inputs: options.inputs,
      });
    } catch (err) {
      const error = new ComputationError(step.name, err);
      await this.statuses.write(project.uuid, step.index, {
        task_id: taskId,
        status: 'failed',
        message: error.message,
      });
      logger.error({ ...logContext, err }, 'Step failed');
      return { status: 'failed', step, taskId, message: error.message, error };
    }

    const message = `STEP ${this.registry.folderName(step.index)}`;
    await this.statuses.write(project.uuid, step.index, { task_id: taskId, status: 'success', message });
    logger.info({ ...logContext, artifacts: artifacts.length }, 'Step completed');

    return { status: 'success', step, taskId, message, artifacts };
  }

  private async hasArtifacts(projectUuid: string, step: StepDefinition): Promise<boolean> {
    for (const path of this.locator.artifactPaths(projectUuid, step.index)) {
      if (await isFile(path)) {
        return true;
      }
    }
    return false;
  }

  /** Generate the step's outputs and write them where the locator says. */
  private async compute(
    project: Project,
    step: StepDefinition,
    paths: { outputDir: string; previousStepDir: string | null; inputs: ProjectInputPaths },
  ): Promise<string[]> {
    const generator = this.generators.get(step.name);
    if (!generator) {
      throw new Error(`No generator registered for step "${step.name}"`);
    }

    const generated = await generator.generate({ project, step, ...paths });
    if (generated.length === 0) {
      throw new Error(`Generator "${generator.name}" produced no artifacts for step "${step.name}"`);
    }

    // All targets resolve before the first write: an unexpected kind writes nothing.
    const targets = generated.map((artifact) => ({
      path: this.locator.locate(project.uuid, step.index, artifact.extension),
      data: artifact.data,
    }));

    const written: string[] = [];
    try {
      for (const target of targets) {
        await writeFileAtomic(target.path, target.data);
        written.push(target.path);
      }
    } catch (error) {
      // A partial step must not satisfy the next step's prerequisite check.
      await Promise.all(written.map((path) => rm(path, { force: true })));
      throw error;
    }
    return written;
  }
}
