import type { Project, ProjectInputPaths } from '../types/project.js';

export const TASK_STATUSES = ['pending', 'running', 'success', 'failed'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export type ArtifactExtension = 'geojson' | 'gltf';

export interface StepDefinition {
  /** 0-based position; defines execution order. */
  index: number;
  name: string;
  label: string;
  /** File kinds the step writes, primary kind first. */
  extensions: readonly ArtifactExtension[];
}

/** Contents of a step's `task.json`. */
export interface TaskStatusRecord {
  task_id: string;
  status: TaskStatus;
  message: string;
  updated_at: string;
}

export interface GeneratedArtifact {
  extension: ArtifactExtension;
  data: string | Uint8Array;
}

export interface GeneratorContext {
  project: Project;
  step: StepDefinition;
  /** Directory of the step being generated. */
  outputDir: string;
  /** Directory of the preceding step, null for the first step. */
  previousStepDir: string | null;
  inputs: ProjectInputPaths;
}

/** Produces the artifacts of one step. Any thrown error fails the step. */
export interface Generator {
  readonly name: string;
  generate(context: GeneratorContext): Promise<GeneratedArtifact[]>;
}

export type StepResult =
  | {
      status: 'success';
      step: StepDefinition;
      taskId: string;
      message: string;
      artifacts: string[];
    }
  | {
      status: 'failed';
      step: StepDefinition;
      taskId: string;
      message: string;
      error: Error;
    };

/** One unit of pipeline work: run `stepIndex` for a project, then chain. */
export interface AdvanceRequest {
  projectUuid: string;
  stepIndex: number;
  maxStepIndex?: number | null;
}

/**
 * Fire-and-forget submission of pipeline work. Delivery is at-least-once;
 * the returned id identifies the unit for status records.
 */
export interface TaskQueue {
  submit(request: AdvanceRequest): Promise<string>;
}
