import { readFile } from 'fs/promises';
import { join } from 'path';
import { isNodeError } from '../../errors.js';
import type { StepRegistry } from '../registry.js';
import type {
  ArtifactExtension,
  GeneratedArtifact,
  Generator,
  GeneratorContext,
  StepDefinition,
} from '../types.js';

/**
 * Placeholder for steps whose geometry algorithm is not wired in yet: serves
 * the pre-computed outputs stored under `<fixtureDir>/<NN>-<step>/`.
 */
export class FixtureGenerator implements Generator {
  readonly name = 'fixture';

  constructor(
    private readonly fixtureDir: string,
    private readonly registry: StepRegistry,
  ) {}

  async read(step: StepDefinition, extension: ArtifactExtension): Promise<Buffer> {
    const path = join(this.fixtureDir, this.registry.folderName(step.index), `${step.name}.${extension}`);
    try {
      return await readFile(path);
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        throw new Error(`No fixture output for step "${step.name}" at ${path}`, { cause: error });
      }
      throw error;
    }
  }

  async generate({ step }: GeneratorContext): Promise<GeneratedArtifact[]> {
    return Promise.all(
      step.extensions.map(async (extension) => ({
        extension,
        data: await this.read(step, extension),
      })),
    );
  }
}
