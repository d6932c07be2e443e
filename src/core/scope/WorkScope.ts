import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type pino from 'pino';
import { JobCancelledError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

/**
 * Serial job queue owned by one state holder.
 *
 * Jobs launched on a scope run one after another in launch order. Inside a
 * job, store access goes through {@link WorkScope.io}, which is the only place
 * a job suspends. Cancelling the scope drops every job that has not started
 * and makes any in-flight `io` call throw {@link JobCancelledError} once its
 * store call settles, so a cancelled job never publishes.
 */
export class WorkScope {
  private readonly controller = new AbortController();
  private readonly logger: pino.Logger;
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly name: string) {
    this.logger = createLogger({ scope: name });
  }

  get isActive(): boolean {
    return !this.controller.signal.aborted;
  }

  /**
   * Queues a job. The returned promise settles when the job has finished or
   * been dropped; it never rejects.
   */
  launch(job: string, block: () => Promise<void>): Promise<void> {
    const logger = this.logger.child({ job });

    const run = async (): Promise<void> => {
      if (!this.isActive) {
        logger.debug('Dropping job queued before cancellation');
        return;
      }
      try {
        await block();
        logger.debug('Job completed');
      } catch (error) {
        if (error instanceof JobCancelledError) {
          logger.debug('Job cancelled before publishing');
          return;
        }
        logger.error({ error }, 'Job failed');
      }
    };

    const next = this.tail.then(run);
    this.tail = next;
    return next;
  }

  /** Background phase of a job: runs one store call off the owning turn. */
  async io<T>(call: () => Promise<T>): Promise<T> {
    this.ensureActive();
    await yieldToEventLoop();
    this.ensureActive();
    const result = await call();
    this.ensureActive();
    return result;
  }

  /** Resolves once the queue is empty, including jobs queued while waiting. */
  async whenIdle(): Promise<void> {
    let observed: Promise<void>;
    do {
      observed = this.tail;
      await observed;
    } while (observed !== this.tail);
  }

  cancel(): void {
    if (!this.isActive) return;
    this.logger.debug('Cancelling work scope');
    this.controller.abort();
  }

  private ensureActive(): void {
    if (!this.isActive) {
      throw new JobCancelledError(this.name);
    }
  }
}
