import { z } from 'zod';
import { projectParametersSchema } from './parameters.js';

/**
 * Body of a project-creation request. `site` and `roads` stay `unknown` here:
 * their GeoJSON shape is checked separately so the error can name the feature.
 */
export const createProjectSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().nullish(),
  metadata: z.record(z.unknown()).nullish(),
  parameters: projectParametersSchema.nullish(),
  site: z.unknown().optional(),
  roads: z.unknown().optional(),
});

export type CreateProjectInput = z.input<typeof createProjectSchema>;

/** A step given either by index or by name. */
export const stepRefSchema = z.union([z.number().int(), z.string().min(1)]);

export const startPipelineSchema = z.object({
  from_step: stepRefSchema.optional(),
  max_step: stepRefSchema.optional(),
});

/** `project.json` as persisted in the project directory. */
export const storedProjectSchema = z.object({
  uuid: z.string().uuid(),
  name: z.string(),
  description: z.string(),
  metadata: z.record(z.unknown()),
  parameters: projectParametersSchema.nullable(),
  created_at: z.string(),
});

export type StoredProject = z.infer<typeof storedProjectSchema>;
