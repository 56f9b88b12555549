import { join } from 'path';
import { InvalidExtensionError } from '../errors.js';
import type { StepRegistry } from './registry.js';
import type { ArtifactExtension } from './types.js';

export type ProjectInputKind = 'site' | 'roads';

const TASK_FILE = 'task.json';
const PROJECT_FILE = 'project.json';

export interface LocatedArtifact {
  path: string;
  fileName: string;
  extension: ArtifactExtension;
  mediaType: string;
}

const MEDIA_TYPES: Record<ArtifactExtension, string> = {
  geojson: 'application/geo+json',
  gltf: 'model/gltf+json',
};

/**
 * Maps (project, step, extension) to storage paths:
 * `<root>/<project>/<NN>-<step>/<step>.<ext>`.
 *
 * Pure: no I/O, no counters. The same arguments always give the same path.
 */
export class ArtifactLocator {
  constructor(
    private readonly root: string,
    private readonly registry: StepRegistry,
  ) {}

  projectsRoot(): string {
    return this.root;
  }

  projectDirectory(projectUuid: string): string {
    return join(this.root, projectUuid);
  }

  projectFile(projectUuid: string): string {
    return join(this.projectDirectory(projectUuid), PROJECT_FILE);
  }

  inputPath(projectUuid: string, kind: ProjectInputKind): string {
    return join(this.projectDirectory(projectUuid), `${kind}.geojson`);
  }

  stepDirectory(projectUuid: string, step: number | string): string {
    return join(this.projectDirectory(projectUuid), this.registry.folderName(step));
  }

  taskFile(projectUuid: string, step: number | string): string {
    return join(this.stepDirectory(projectUuid, step), TASK_FILE);
  }

  locate(projectUuid: string, step: number | string, extension: string): string {
    return this.artifact(projectUuid, step, extension).path;
  }

  /** Like `locate`, also returning the resolved kind and file name. */
  artifact(projectUuid: string, step: number | string, extension: string): LocatedArtifact {
    const definition = this.registry.get(step);
    const kind = definition.extensions.find((candidate) => candidate === extension);
    if (!kind) {
      throw new InvalidExtensionError(definition.name, extension);
    }
    const fileName = `${definition.name}.${kind}`;
    return {
      path: join(this.stepDirectory(projectUuid, definition.index), fileName),
      fileName,
      extension: kind,
      mediaType: MEDIA_TYPES[kind],
    };
  }

  /** Every artifact path a step is expected to write, primary kind first. */
  artifactPaths(projectUuid: string, step: number | string): string[] {
    const definition = this.registry.get(step);
    return definition.extensions.map((extension) => this.locate(projectUuid, definition.index, extension));
  }
}
