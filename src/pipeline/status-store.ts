import { z } from 'zod';
import { readJsonFile, writeJsonAtomic } from '../infra/files.js';
import type { ArtifactLocator } from './locator.js';
import { TASK_STATUSES, type TaskStatus, type TaskStatusRecord } from './types.js';

const taskStatusRecordSchema = z.object({
  task_id: z.string(),
  status: z.enum(TASK_STATUSES),
  message: z.string(),
  updated_at: z.string().optional(),
});

/** Status fields as exposed to readers; blank when the step never ran. */
export interface TaskStatusView {
  task_id: string;
  status: TaskStatus | '';
  message: string;
}

export const EMPTY_TASK_STATUS: TaskStatusView = Object.freeze({
  task_id: '',
  status: '',
  message: '',
});

/**
 * Per-step `task.json` records. Last write wins; each write replaces the
 * whole file atomically.
 */
export class TaskStatusTracker {
  constructor(private readonly locator: ArtifactLocator) {}

  async write(
    projectUuid: string,
    step: number | string,
    record: Omit<TaskStatusRecord, 'updated_at'>,
  ): Promise<TaskStatusRecord> {
    const stored: TaskStatusRecord = { ...record, updated_at: new Date().toISOString() };
    await writeJsonAtomic(this.locator.taskFile(projectUuid, step), stored);
    return stored;
  }

  async read(projectUuid: string, step: number | string): Promise<TaskStatusRecord | null> {
    const path = this.locator.taskFile(projectUuid, step);
    const raw = await readJsonFile(path);
    if (raw === null) {
      return null;
    }
    const parsed = taskStatusRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Malformed task status file at ${path}`, { cause: parsed.error });
    }
    return { ...parsed.data, updated_at: parsed.data.updated_at ?? '' };
  }

  async view(projectUuid: string, step: number | string): Promise<TaskStatusView> {
    const record = await this.read(projectUuid, step);
    if (!record) {
      return { ...EMPTY_TASK_STATUS };
    }
    return { task_id: record.task_id, status: record.status, message: record.message };
  }
}
