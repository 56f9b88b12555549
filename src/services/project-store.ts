import { randomUUID } from 'crypto';
import { mkdir } from 'fs/promises';
import { z } from 'zod';
import { ProjectNotFoundError } from '../errors.js';
import { pathExists, readJsonFile, writeJsonAtomic } from '../infra/files.js';
import type { ArtifactLocator } from '../pipeline/locator.js';
import { validateFeatureCollection } from '../schemas/geojson.js';
import type { ProjectParameters } from '../schemas/parameters.js';
import { storedProjectSchema, type StoredProject } from '../schemas/project.js';
import type { RoadCollection, SiteCollection } from '../types/geojson.js';
import type { Project, ProjectInputPaths } from '../types/project.js';

export interface NewProjectFields {
  name: string;
  description: string;
  metadata: Record<string, unknown>;
  parameters: ProjectParameters | null;
  site: SiteCollection | null;
  roads: RoadCollection | null;
}

/** Durable project records addressed by UUID. */
export interface ProjectStore {
  /** Resolves once every field is durable. */
  create(fields: NewProjectFields): Promise<Project>;
  /** Throws ProjectNotFoundError for unknown or malformed UUIDs. */
  get(projectUuid: string): Promise<Project>;
  exists(projectUuid: string): Promise<boolean>;
  inputPaths(projectUuid: string): Promise<ProjectInputPaths>;
}

const uuidSchema = z.string().uuid();

/**
 * One directory per project: raw inputs as `site.geojson` / `roads.geojson`,
 * the record as `project.json`. `project.json` is written last and marks the
 * project as existing.
 */
export class FileProjectStore implements ProjectStore {
  constructor(private readonly locator: ArtifactLocator) {}

  async create(fields: NewProjectFields): Promise<Project> {
    const uuid = randomUUID();
    const dir = this.locator.projectDirectory(uuid);
    await mkdir(this.locator.projectsRoot(), { recursive: true });
    // Non-recursive: an existing directory means a UUID collision and must fail.
    await mkdir(dir);

    if (fields.site) {
      await writeJsonAtomic(this.locator.inputPath(uuid, 'site'), fields.site);
    }
    if (fields.roads) {
      await writeJsonAtomic(this.locator.inputPath(uuid, 'roads'), fields.roads);
    }

    const record: StoredProject = {
      uuid,
      name: fields.name,
      description: fields.description,
      metadata: fields.metadata,
      parameters: fields.parameters,
      created_at: new Date().toISOString(),
    };
    await writeJsonAtomic(this.locator.projectFile(uuid), record);

    return { ...fields, uuid, createdAt: record.created_at };
  }

  async get(projectUuid: string): Promise<Project> {
    if (!uuidSchema.safeParse(projectUuid).success) {
      throw new ProjectNotFoundError(projectUuid);
    }

    const path = this.locator.projectFile(projectUuid);
    const raw = await readJsonFile(path);
    if (raw === null) {
      throw new ProjectNotFoundError(projectUuid);
    }
    const parsed = storedProjectSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Malformed project file at ${path}`, { cause: parsed.error });
    }

    const site = await readJsonFile(this.locator.inputPath(projectUuid, 'site'));
    const roads = await readJsonFile(this.locator.inputPath(projectUuid, 'roads'));

    return {
      uuid: parsed.data.uuid,
      name: parsed.data.name,
      description: parsed.data.description,
      metadata: parsed.data.metadata,
      parameters: parsed.data.parameters,
      site: site === null ? null : validateFeatureCollection(site, 'Polygon'),
      roads: roads === null ? null : validateFeatureCollection(roads, 'LineString'),
      createdAt: parsed.data.created_at,
    };
  }

  async exists(projectUuid: string): Promise<boolean> {
    return uuidSchema.safeParse(projectUuid).success && pathExists(this.locator.projectFile(projectUuid));
  }

  async inputPaths(projectUuid: string): Promise<ProjectInputPaths> {
    const site = this.locator.inputPath(projectUuid, 'site');
    const roads = this.locator.inputPath(projectUuid, 'roads');
    return {
      site: (await pathExists(site)) ? site : null,
      roads: (await pathExists(roads)) ? roads : null,
    };
  }
}
