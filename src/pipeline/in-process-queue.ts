import { randomUUID } from 'crypto';
import { logger } from '../logger.js';
import type { AdvanceRequest, TaskQueue } from './types.js';

export type UnitHandler = (request: AdvanceRequest, taskId: string) => Promise<unknown>;

export interface QueuedUnit {
  taskId: string;
  request: AdvanceRequest;
}

/**
 * Task queue living inside the current process.
 *
 * With `autoRun`, submitted units start on the next tick and failures are
 * logged, as a worker would. Without it nothing runs until `drain()`.
 */
export class InProcessTaskQueue implements TaskQueue {
  /** Every unit ever submitted, in submission order. */
  readonly submitted: QueuedUnit[] = [];
  private readonly pending: QueuedUnit[] = [];
  private handler: UnitHandler | null = null;
  private active: Promise<void> | null = null;

  constructor(private readonly options: { autoRun?: boolean } = {}) {}

  bind(handler: UnitHandler) {
    this.handler = handler;
  }

  get size() {
    return this.pending.length;
  }

  async submit(request: AdvanceRequest): Promise<string> {
    const unit: QueuedUnit = { taskId: randomUUID(), request: { ...request } };
    this.submitted.push(unit);
    this.pending.push(unit);
    if (this.options.autoRun) {
      this.schedule();
    }
    return unit.taskId;
  }

  /**
   * Run pending units in FIFO order, including those they submit, until the
   * queue is empty. Rejects with the first error; later units stay pending.
   */
  async drain(): Promise<void> {
    const handler = this.requireHandler();
    for (let unit = this.pending.shift(); unit; unit = this.pending.shift()) {
      await handler(unit.request, unit.taskId);
    }
  }

  /** Resolves once auto-run work has settled. */
  async onIdle(): Promise<void> {
    while (this.active) {
      await this.active;
    }
  }

  private schedule() {
    if (this.active) return;
    this.active = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.runLogged())
      .catch((err) => {
        logger.error({ err }, 'In-process queue stopped');
      })
      .finally(() => {
        this.active = null;
        if (this.pending.length > 0 && this.handler) {
          this.schedule();
        }
      });
  }

  private async runLogged() {
    const handler = this.requireHandler();
    for (let unit = this.pending.shift(); unit; unit = this.pending.shift()) {
      try {
        await handler(unit.request, unit.taskId);
        logger.info({ taskId: unit.taskId }, 'Pipeline job completed');
      } catch (err) {
        logger.error({ taskId: unit.taskId, err }, 'Pipeline job failed');
      }
    }
  }

  private requireHandler(): UnitHandler {
    if (!this.handler) {
      throw new Error('No handler bound to the in-process queue');
    }
    return this.handler;
  }
}
