import type { StepRegistry } from '../registry.js';
import type { Generator } from '../types.js';
import { FixtureGenerator } from './fixture.js';
import { SiteGenerator } from './site.js';
import { StreetsGenerator } from './streets.js';

export { FixtureGenerator } from './fixture.js';
export { SiteGenerator } from './site.js';
export { StreetsGenerator } from './streets.js';

/**
 * One generator per registry step. Steps without a dedicated algorithm map
 * to the fixture generator explicitly.
 */
export function createGenerators(registry: StepRegistry, fixtureDir: string): Map<string, Generator> {
  const fixtures = new FixtureGenerator(fixtureDir, registry);
  const dedicated = new Map<string, Generator>([
    ['site', new SiteGenerator(fixtures)],
    ['streets', new StreetsGenerator(fixtures)],
  ]);

  return new Map(registry.list().map((step) => [step.name, dedicated.get(step.name) ?? fixtures]));
}
