import { ArtifactNotFoundError, InvalidStepError, ProjectNotFoundError, ValidationError } from '../errors.js';
import { isFile } from '../infra/files.js';
import { logger } from '../logger.js';
import type { ArtifactLocator, LocatedArtifact } from '../pipeline/locator.js';
import type { StepRegistry } from '../pipeline/registry.js';
import type { TaskStatusTracker, TaskStatusView } from '../pipeline/status-store.js';
import type { TaskQueue } from '../pipeline/types.js';
import { validateFeatureCollection } from '../schemas/geojson.js';
import { createProjectSchema, type CreateProjectInput } from '../schemas/project.js';
import type { Project } from '../types/project.js';
import type { ProjectStore } from './project-store.js';

export interface PipelineServiceDeps {
  registry: StepRegistry;
  locator: ArtifactLocator;
  projects: ProjectStore;
  statuses: TaskStatusTracker;
  queue: TaskQueue;
}

export interface StartPipelineOptions {
  fromStep?: number | string;
  /** Exclusive bound: the pipeline stops before running this step. */
  maxStep?: number | string;
}

export interface CreatedProject {
  project: Project;
  /** Id of the first pipeline task, null when the pipeline was not started. */
  taskId: string | null;
}

export interface StepStatusEntry {
  index: number;
  step: string;
  label: string;
  task: TaskStatusView;
}

/**
 * Operations the API layer calls: project creation, pipeline start and
 * read access to artifacts and step statuses.
 */
export class PipelineService {
  constructor(private readonly deps: PipelineServiceDeps) {}

  get registry() {
    return this.deps.registry;
  }

  async createProject(
    input: CreateProjectInput,
    options: { autoStart?: boolean } = {},
  ): Promise<CreatedProject> {
    const parse = createProjectSchema.safeParse(input);
    if (!parse.success) {
      throw new ValidationError('Invalid project definition', parse.error.flatten());
    }
    const { name, description, metadata, parameters, site, roads } = parse.data;

    const project = await this.deps.projects.create({
      name,
      description: description ?? '',
      metadata: metadata ?? {},
      parameters: parameters ?? null,
      site: site == null ? null : validateFeatureCollection(site, 'Polygon'),
      roads: roads == null ? null : validateFeatureCollection(roads, 'LineString'),
    });
    logger.info({ projectUuid: project.uuid, name: project.name }, 'Project created');

    const taskId = options.autoStart === false ? null : await this.startPipeline(project.uuid);
    return { project, taskId };
  }

  getProject(projectUuid: string): Promise<Project> {
    return this.deps.projects.get(projectUuid);
  }

  /** Submit the first unit of work; returns its task id without waiting. */
  async startPipeline(projectUuid: string, options: StartPipelineOptions = {}): Promise<string> {
    const { registry, queue } = this.deps;
    await this.requireProject(projectUuid);

    const stepIndex = registry.get(options.fromStep ?? 0).index;
    const maxStepIndex = options.maxStep === undefined ? null : this.resolveBound(options.maxStep);

    const taskId = await queue.submit({ projectUuid, stepIndex, maxStepIndex });
    logger.info({ projectUuid, stepIndex, maxStepIndex, taskId }, 'Pipeline started');
    return taskId;
  }

  /** Path of an existing artifact; ArtifactNotFoundError when not generated yet. */
  async getArtifactPath(
    projectUuid: string,
    step: string | number,
    extension: string,
  ): Promise<LocatedArtifact> {
    const { locator } = this.deps;
    await this.requireProject(projectUuid);

    const artifact = locator.artifact(projectUuid, step, extension);
    if (!(await isFile(artifact.path))) {
      throw new ArtifactNotFoundError(artifact.fileName);
    }
    return artifact;
  }

  async getStepStatus(projectUuid: string, step: string | number): Promise<TaskStatusView> {
    const { registry, statuses } = this.deps;
    await this.requireProject(projectUuid);
    return statuses.view(projectUuid, registry.get(step).index);
  }

  async getPipelineStatus(projectUuid: string): Promise<StepStatusEntry[]> {
    const { registry, statuses } = this.deps;
    await this.requireProject(projectUuid);
    return Promise.all(
      registry.list().map(async (step) => ({
        index: step.index,
        step: step.name,
        label: step.label,
        task: await statuses.view(projectUuid, step.index),
      })),
    );
  }

  private async requireProject(projectUuid: string) {
    if (!(await this.deps.projects.exists(projectUuid))) {
      throw new ProjectNotFoundError(projectUuid);
    }
  }

  private resolveBound(ref: number | string): number {
    if (typeof ref === 'string') {
      return this.deps.registry.get(ref).index;
    }
    if (!Number.isInteger(ref) || ref < 0 || ref > this.deps.registry.length) {
      throw new InvalidStepError(ref);
    }
    return ref;
  }
}
