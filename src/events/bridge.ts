/**
 * Event bridge
 *
 * Routes event records that arrive from outside the engine (a worker, a
 * socket, an embedding runtime) to registered handlers. Dispatch runs inside
 * the scheduler's handler window, so every store write a handler makes is
 * coalesced into one render.
 */

import { createLogger } from '../dev/logger';
import { globalScheduler, type Scheduler } from '../runtime/scheduler';
import type { ErrorReporter } from '../runtime/error-reporter';

const log = createLogger('events');

export interface BridgeTarget {
  readonly id?: string;
  readonly value?: string;
  readonly checked?: boolean;
  readonly dataset?: Readonly<Record<string, string>>;
}

export interface BridgeEventRecord {
  readonly handlerId: string;
  readonly type: string;
  readonly target: BridgeTarget;
  /** Milliseconds since the epoch on the sending side. */
  readonly timestamp: number;
  /** Extra fields the sender attached (pointer coordinates, keys, ...). */
  readonly detail?: Readonly<Record<string, unknown>>;
}

export type BridgeHandler = (event: BridgeEventRecord) => void;

export interface EventBridgeOptions {
  scheduler?: Scheduler;
  /** Handler errors are reported here as well as logged. */
  reporter?: ErrorReporter;
  /** Id source; defaults to `h1`, `h2`, ... */
  generateId?: () => string;
}

export class EventBridge {
  private handlers = new Map<string, BridgeHandler>();
  private readonly scheduler: Scheduler;
  private readonly reporter?: ErrorReporter;
  private readonly generateId: () => string;
  private counter = 0;

  constructor(options: EventBridgeOptions = {}) {
    this.scheduler = options.scheduler ?? globalScheduler;
    this.reporter = options.reporter;
    this.generateId = options.generateId ?? (() => `h${++this.counter}`);
  }

  register(handler: BridgeHandler): string {
    const id = this.generateId();
    if (this.handlers.has(id)) {
      throw new Error(`[Trellis] Event handler id "${id}" is already registered`);
    }
    this.handlers.set(id, handler);
    return id;
  }

  /** Returns whether a handler was removed. */
  remove(handlerId: string): boolean {
    return this.handlers.delete(handlerId);
  }

  has(handlerId: string): boolean {
    return this.handlers.has(handlerId);
  }

  get size(): number {
    return this.handlers.size;
  }

  /**
   * Deliver `record` to its handler. Returns false for an unknown handler
   * id, which is logged rather than thrown.
   */
  dispatch(record: BridgeEventRecord): boolean {
    const handler = this.handlers.get(record.handlerId);
    if (!handler) {
      log.warn(
        `No handler registered for "${record.handlerId}" (event "${record.type}")`
      );
      return false;
    }

    this.scheduler.runHandler(() => {
      try {
        handler(record);
      } catch (err) {
        if (this.reporter) {
          this.reporter.report(err, {
            phase: 'event',
            handlerId: record.handlerId,
            type: record.type,
          });
        } else {
          log.error(`Handler "${record.handlerId}" failed:`, err);
        }
      }
    });
    return true;
  }

  /** Dispatch several records in one handler window. */
  dispatchAll(records: readonly BridgeEventRecord[]): number {
    let delivered = 0;
    this.scheduler.runHandler(() => {
      for (const record of records) {
        if (this.dispatch(record)) delivered++;
      }
    });
    return delivered;
  }

  clear(): void {
    this.handlers.clear();
  }
}
