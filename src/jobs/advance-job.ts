import { z } from 'zod';
import type { AdvanceRequest } from '../pipeline/types.js';

/** Payload of a queued pipeline job, parsed again by the worker. */
export const advanceJobSchema = z.object({
  projectUuid: z.string().uuid(),
  stepIndex: z.number().int(),
  maxStepIndex: z.number().int().nullable().default(null),
});

export type AdvanceJobData = z.infer<typeof advanceJobSchema>;

export const toAdvanceJobData = (request: AdvanceRequest): AdvanceJobData => ({
  projectUuid: request.projectUuid,
  stepIndex: request.stepIndex,
  maxStepIndex: request.maxStepIndex ?? null,
});

/** True when `data` is a well-formed advance job for `projectUuid`. */
export const isJobForProject = (data: unknown, projectUuid: string): boolean => {
  const parsed = advanceJobSchema.safeParse(data);
  return parsed.success && parsed.data.projectUuid === projectUuid;
};
