/**
 * Serialized update scheduler (no inline execution, explicit flush)
 *
 * Key ideas:
 * - Never execute a task inline from `enqueue`.
 * - `flush()` is explicit and non-reentrant.
 * - Enqueues outside an event handler kick a microtask flush; enqueues
 *   inside a handler wait for the handler to finish so its writes coalesce.
 * - `waitForFlush()` is race-free with a monotonic `flushVersion`.
 * - The loop guard counts generations of re-entrant enqueues, not tasks.
 */

import { assertSchedulingPrecondition, invariant } from '../dev/invariant';
import { isProduction } from '../dev/config';
import { logger } from '../dev/logger';

const MAX_FLUSH_DEPTH = 50;

export type Task = () => void;

export interface SchedulerState {
  queueLength: number;
  running: boolean;
  depth: number;
  flushVersion: number;
  inHandler: boolean;
}

export class Scheduler {
  private q: Task[] = [];
  private head = 0;

  private running = false;
  private inHandler = false;
  private depth = 0;

  // Monotonic flush version increments at end of each flush
  private flushVersion = 0;

  private kickScheduled = false;

  // Queued occurrences per task.
  private queued = new Map<Task, number>();

  private waiters: Array<{
    target: number;
    resolve: () => void;
    timer: ReturnType<typeof setTimeout>;
  }> = [];

  enqueue(task: Task): void {
    assertSchedulingPrecondition(
      typeof task === 'function',
      'enqueue() requires a function'
    );

    this.q.push(task);
    this.queued.set(task, (this.queued.get(task) ?? 0) + 1);

    if (!this.running && !this.kickScheduled && !this.inHandler) {
      this.scheduleKick();
    }
  }

  /**
   * Run every queued task. Tasks enqueued while flushing run in the same
   * flush as a later generation; more than MAX_FLUSH_DEPTH generations is
   * treated as an update loop and the rest of the queue is dropped.
   */
  flush(): void {
    invariant(
      !this.running,
      '[Scheduler] flush() called while already running'
    );

    this.running = true;
    this.depth = 0;
    let fatal: unknown = null;
    let failed = false;

    try {
      while (this.head < this.q.length) {
        this.depth++;
        if (!isProduction() && this.depth > MAX_FLUSH_DEPTH) {
          this.drop();
          throw new Error(
            `[Scheduler] exceeded MAX_FLUSH_DEPTH (${MAX_FLUSH_DEPTH}). Likely infinite update loop.`
          );
        }

        const end = this.q.length;
        while (this.head < end) {
          const task = this.q[this.head++];
          this.release(task);
          try {
            task();
          } catch (err) {
            fatal = err;
            failed = true;
            break;
          }
        }
        if (failed) break;
      }
    } finally {
      this.running = false;
      this.depth = 0;
      this.compact();

      this.flushVersion++;
      this.resolveWaiters();

      // Tasks behind a failed one still run, on the next kick.
      if (failed && this.q.length > 0 && !this.inHandler) {
        this.scheduleKick();
      }
    }

    if (failed) throw fatal;
  }

  /** Whether `task` is waiting in the queue. */
  isQueued(task: Task): boolean {
    return this.queued.has(task);
  }

  waitForFlush(targetVersion?: number, timeoutMs = 2000): Promise<void> {
    const target =
      typeof targetVersion === 'number' ? targetVersion : this.flushVersion + 1;
    if (this.flushVersion >= target) return Promise.resolve();

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w.timer !== timer);
        reject(
          new Error(
            `waitForFlush timeout ${timeoutMs}ms: ${JSON.stringify(this.getState())}`
          )
        );
      }, timeoutMs);

      this.waiters.push({ target, resolve, timer });
    });
  }

  getState(): SchedulerState {
    return {
      queueLength: this.q.length - this.head,
      running: this.running,
      depth: this.depth,
      flushVersion: this.flushVersion,
      inHandler: this.inHandler,
    };
  }

  setInHandler(v: boolean): void {
    this.inHandler = v;
  }

  isInHandler(): boolean {
    return this.inHandler;
  }

  isExecuting(): boolean {
    return this.running;
  }

  /**
   * Run `fn` as an event handler: enqueues made inside it are flushed in one
   * microtask once it returns. Errors are logged, not rethrown, so one bad
   * handler cannot break event dispatch.
   */
  runHandler(fn: () => void): void {
    const prev = this.inHandler;
    this.inHandler = true;
    try {
      fn();
    } catch (error) {
      logger.error('[Trellis] Event handler error:', error);
    } finally {
      this.inHandler = prev;
      if (!prev && this.q.length - this.head > 0 && !this.running) {
        this.scheduleKick();
      }
    }
  }

  private scheduleKick(): void {
    if (this.kickScheduled) return;
    this.kickScheduled = true;
    queueMicrotask(() => {
      this.kickScheduled = false;
      if (this.running || this.inHandler) return;
      if (this.q.length - this.head === 0) return;
      try {
        this.flush();
      } catch (err) {
        logger.error('[Trellis] Scheduled flush failed:', err);
      }
    });
  }

  private release(task: Task): void {
    const count = this.queued.get(task) ?? 0;
    if (count <= 1) this.queued.delete(task);
    else this.queued.set(task, count - 1);
  }

  private drop(): void {
    this.q.length = 0;
    this.head = 0;
    this.queued.clear();
  }

  private compact(): void {
    if (this.head >= this.q.length) {
      this.q.length = 0;
      this.head = 0;
    } else if (this.head > 0) {
      this.q = this.q.slice(this.head);
      this.head = 0;
    }
  }

  private resolveWaiters(): void {
    if (this.waiters.length === 0) return;
    const ready: Array<() => void> = [];
    const remaining: typeof this.waiters = [];

    for (const w of this.waiters) {
      if (this.flushVersion >= w.target) {
        clearTimeout(w.timer);
        ready.push(w.resolve);
      } else {
        remaining.push(w);
      }
    }

    this.waiters = remaining;
    for (const r of ready) r();
  }
}

export const globalScheduler = new Scheduler();
