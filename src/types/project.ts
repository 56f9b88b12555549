import type { ProjectParameters } from '../schemas/parameters.js';
import type { RoadCollection, SiteCollection } from './geojson.js';

export interface Project {
  /** Assigned at creation, never reassigned. */
  uuid: string;
  name: string;
  description: string;
  metadata: Record<string, unknown>;
  parameters: ProjectParameters | null;
  site: SiteCollection | null;
  roads: RoadCollection | null;
  createdAt: string;
}

/** Raw input files handed to generators alongside the project record. */
export interface ProjectInputPaths {
  site: string | null;
  roads: string | null;
}
