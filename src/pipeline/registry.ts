import { InvalidStepError } from '../errors.js';
import type { ArtifactExtension, StepDefinition } from './types.js';

const DEFAULT_EXTENSIONS: readonly ArtifactExtension[] = ['geojson', 'gltf'];

const DEFAULT_STEPS: ReadonlyArray<Omit<StepDefinition, 'index' | 'extensions'>> = [
  { name: 'site', label: 'Site boundary' },
  { name: 'streets', label: 'Street network' },
  { name: 'clusters', label: 'Off-grid clusters' },
  { name: 'public', label: 'Public spaces' },
  { name: 'subdivision', label: 'Parcel subdivision' },
  { name: 'footprint', label: 'Building footprints' },
  { name: 'building_start', label: 'Starter buildings' },
  { name: 'building_max', label: 'Maximum buildings' },
];

/**
 * The ordered, global list of pipeline stages. Built once at start-up and
 * handed to everything that needs it.
 */
export class StepRegistry {
  private readonly steps: readonly StepDefinition[];
  private readonly byName: ReadonlyMap<string, StepDefinition>;

  constructor(steps: ReadonlyArray<Omit<StepDefinition, 'index'>>) {
    this.steps = Object.freeze(
      steps.map((step, index) =>
        Object.freeze({ ...step, index, extensions: Object.freeze([...step.extensions]) }),
      ),
    );
    this.byName = new Map(this.steps.map((step) => [step.name, step]));
    if (this.byName.size !== this.steps.length) {
      throw new Error('Pipeline step names must be unique');
    }
  }

  get length() {
    return this.steps.length;
  }

  list(): readonly StepDefinition[] {
    return this.steps;
  }

  has(index: number) {
    return Number.isInteger(index) && index >= 0 && index < this.steps.length;
  }

  at(index: number): StepDefinition | undefined {
    return this.has(index) ? this.steps[index] : undefined;
  }

  find(name: string): StepDefinition | undefined {
    return this.byName.get(name);
  }

  /** Resolve a step by index or name; throws InvalidStepError when unknown. */
  get(ref: number | string): StepDefinition {
    const step = typeof ref === 'number' ? this.at(ref) : this.find(ref);
    if (!step) {
      throw new InvalidStepError(ref);
    }
    return step;
  }

  /** Directory name of a step, e.g. `01-streets`. */
  folderName(ref: number | string): string {
    const step = this.get(ref);
    return `${String(step.index).padStart(2, '0')}-${step.name}`;
  }
}

export function createDefaultRegistry(): StepRegistry {
  return new StepRegistry(DEFAULT_STEPS.map((step) => ({ ...step, extensions: DEFAULT_EXTENSIONS })));
}
