import type { GeneratedArtifact, Generator, GeneratorContext } from '../types.js';
import type { FixtureGenerator } from './fixture.js';

/**
 * The site step publishes the submitted site boundary. Projects created
 * without one fall back to the fixture site.
 */
export class SiteGenerator implements Generator {
  readonly name = 'site';

  constructor(private readonly fixtures: FixtureGenerator) {}

  async generate({ project, step }: GeneratorContext): Promise<GeneratedArtifact[]> {
    const geojson = project.site
      ? JSON.stringify(project.site, null, 2)
      : await this.fixtures.read(step, 'geojson');

    return [
      { extension: 'geojson', data: geojson },
      { extension: 'gltf', data: await this.fixtures.read(step, 'gltf') },
    ];
  }
}
