import { validateFeatureCollection } from '../../schemas/geojson.js';
import type { ProjectParameters } from '../../schemas/parameters.js';
import type { Feature, RoadCollection } from '../../types/geojson.js';
import type { GeneratedArtifact, Generator, GeneratorContext } from '../types.js';
import type { FixtureGenerator } from './fixture.js';

export const ROAD_CLASSES = ['artery', 'secondary', 'local'] as const;
export type RoadClass = (typeof ROAD_CLASSES)[number];

export const roadClassOf = (feature: Feature): RoadClass =>
  ROAD_CLASSES.find((roadClass) => roadClass === feature.properties?.road_class) ?? 'local';

export const roadWidthFor = (parameters: ProjectParameters, roadClass: RoadClass): number => {
  const roads = parameters.neighbourhood.public_roads;
  switch (roadClass) {
    case 'artery':
      return roads.width_of_arteries_m;
    case 'secondary':
      return roads.width_of_secondaries_m;
    case 'local':
      return roads.width_of_locals_m;
  }
};

/**
 * Builds the street network from the submitted road centrelines (or the
 * fixture network) and sizes every road from the project's public road widths.
 */
export class StreetsGenerator implements Generator {
  readonly name = 'streets';

  constructor(private readonly fixtures: FixtureGenerator) {}

  async generate({ project, step }: GeneratorContext): Promise<GeneratedArtifact[]> {
    const centrelines: RoadCollection =
      project.roads ??
      validateFeatureCollection(
        JSON.parse((await this.fixtures.read(step, 'geojson')).toString('utf8')),
        'LineString',
      );

    const { parameters } = project;
    const sidewalk = parameters?.neighbourhood.public_spaces.street_section.sidewalk_width_m;

    const streets: RoadCollection = {
      ...centrelines,
      features: centrelines.features.map((feature) => {
        const roadClass = roadClassOf(feature);
        return {
          ...feature,
          properties: {
            ...(feature.properties ?? {}),
            road_class: roadClass,
            ...(parameters && {
              width_m: roadWidthFor(parameters, roadClass),
              sidewalk_width_m: sidewalk,
            }),
          },
        };
      }),
    };

    return [
      { extension: 'geojson', data: JSON.stringify(streets, null, 2) },
      { extension: 'gltf', data: await this.fixtures.read(step, 'gltf') },
    ];
  }
}
