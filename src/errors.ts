/**
 * Error taxonomy for the pipeline. `statusCode` is what the HTTP layer answers
 * with; code running inside a worker only cares about the class.
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly statusCode = 500,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

/** Malformed client input. Generation never starts. */
export class ValidationError extends PipelineError {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message, 400);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends PipelineError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

export class ProjectNotFoundError extends NotFoundError {
  constructor(public readonly projectUuid: string) {
    super(`Project ${projectUuid} does not exist`);
    this.name = 'ProjectNotFoundError';
  }
}

export class InvalidStepError extends NotFoundError {
  constructor(public readonly step: string | number) {
    super(`Unknown pipeline step: ${step}`);
    this.name = 'InvalidStepError';
  }
}

export class InvalidExtensionError extends NotFoundError {
  constructor(
    public readonly step: string,
    public readonly extension: string,
  ) {
    super(`Step "${step}" does not produce ".${extension}" files`);
    this.name = 'InvalidExtensionError';
  }
}

export class ArtifactNotFoundError extends NotFoundError {
  constructor(public readonly fileName: string) {
    super(`File '${fileName}' not found.`);
    this.name = 'ArtifactNotFoundError';
  }
}

/** Step N was attempted before step N-1 produced its artifacts. */
export class MissingPrerequisiteError extends PipelineError {
  constructor(public readonly missingStep: string) {
    super(`Missing previous process output: ${missingStep}`, 409);
    this.name = 'MissingPrerequisiteError';
  }
}

/** Wraps whatever a generator threw. Recorded as FAILED, never re-thrown. */
export class ComputationError extends PipelineError {
  constructor(
    public readonly step: string,
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause), 500, { cause });
    this.name = 'ComputationError';
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}
