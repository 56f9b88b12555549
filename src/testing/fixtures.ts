import { readFileSync } from 'fs';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { createGenerators } from '../pipeline/generators/index.js';
import { InProcessTaskQueue } from '../pipeline/in-process-queue.js';
import { createDefaultRegistry, type StepRegistry } from '../pipeline/registry.js';
import type { Generator } from '../pipeline/types.js';
import { createRuntime, type PipelineRuntime } from '../runtime.js';
import { projectParametersSchema, type ProjectParameters } from '../schemas/parameters.js';
import type { NewProjectFields } from '../services/project-store.js';
import type { RoadCollection, SiteCollection } from '../types/geojson.js';

export const FIXTURE_DIR = fileURLToPath(new URL('../../fixtures', import.meta.url));

/** Empty projects root under the OS temp dir. */
export const createProjectsRoot = (label: string) => mkdtemp(join(tmpdir(), `urban-pipeline-${label}-`));

export const removeProjectsRoot = (dir: string) => rm(dir, { recursive: true, force: true });

export const loadExampleParameters = (): ProjectParameters =>
  projectParametersSchema.parse(
    JSON.parse(readFileSync(join(FIXTURE_DIR, 'parameters.example.json'), 'utf8')),
  );

export const squareSite = (): SiteCollection => ({
  type: 'FeatureCollection',
  features: [
    {
      type: 'Feature',
      properties: { name: 'test-site' },
      geometry: {
        type: 'Polygon',
        coordinates: [
          [
            [0, 0],
            [100, 0],
            [100, 100],
            [0, 100],
            [0, 0],
          ],
        ],
      },
    },
  ],
});

export const twoRoads = (): RoadCollection => ({
  type: 'FeatureCollection',
  features: [
    {
      type: 'Feature',
      properties: { road_class: 'artery' },
      geometry: { type: 'LineString', coordinates: [[0, 50], [100, 50]] },
    },
    {
      type: 'Feature',
      properties: {},
      geometry: { type: 'LineString', coordinates: [[50, 0], [50, 100]] },
    },
  ],
});

export const projectFields = (overrides: Partial<NewProjectFields> = {}): NewProjectFields => ({
  name: 'Test Project',
  description: '',
  metadata: {},
  parameters: null,
  site: squareSite(),
  roads: null,
  ...overrides,
});

/** Default generators with some steps replaced. */
export const generatorsWith = (
  registry: StepRegistry,
  replacements: Record<string, Generator>,
): Map<string, Generator> => {
  const generators = createGenerators(registry, FIXTURE_DIR);
  for (const [step, generator] of Object.entries(replacements)) {
    generators.set(step, generator);
  }
  return generators;
};

export const failingGenerator = (message: string): Generator => ({
  name: 'failing',
  generate: async () => {
    throw new Error(message);
  },
});

export interface TestRuntime {
  dir: string;
  queue: InProcessTaskQueue;
  runtime: PipelineRuntime;
  cleanup(): Promise<void>;
}

/** Runtime over a fresh temp directory and a manually drained queue. */
export const createTestRuntime = async (
  options: { registry?: StepRegistry; generators?: Record<string, Generator> } = {},
): Promise<TestRuntime> => {
  const dir = await createProjectsRoot('runtime');
  const queue = new InProcessTaskQueue();
  const registry = options.registry ?? createDefaultRegistry();
  const runtime = createRuntime(
    {
      projectFileDir: dir,
      fixtureDir: FIXTURE_DIR,
      queueDriver: 'inline',
      redisUrl: 'redis://127.0.0.1:6379',
      queueName: 'urban-pipeline-test',
    },
    {
      registry,
      queue,
      generators: generatorsWith(registry, options.generators ?? {}),
    },
  );
  return { dir, queue, runtime, cleanup: () => removeProjectsRoot(dir) };
};
