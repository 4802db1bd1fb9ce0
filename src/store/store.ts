/**
 * Reactive store
 *
 * Values live in a nested tree addressed by dot paths. Every write produces a
 * frozen change record that is routed to the subscribers of the written path
 * (and, under the default policy, of its ancestors).
 *
 * Delivery runs through a single queue. A write issued from inside a
 * subscriber lands its value immediately but its record waits until the
 * current round finishes, so subscribers never observe nested delivery.
 */

import { assertStorePrecondition } from '../dev/invariant';
import { isDebugEnabled } from '../dev/config';
import { logger } from '../dev/logger';
import {
  ancestorsOf,
  cloneValue,
  hasOwn,
  isDescendantOf,
  isPlainObject,
  parsePath,
  type Branch,
} from './path';
import type {
  BatchingPolicy,
  ChangeRecord,
  FlatState,
  PropagationPolicy,
  StoreOptions,
  Subscriber,
  SubscriptionHandle,
} from './types';

/**
 * Rounds of re-entrant writes allowed inside one drain before it is treated
 * as a loop. Records delivered together count as one round.
 */
const MAX_ROUNDS = 100;

interface Subscription {
  readonly id: number;
  readonly path: string;
  readonly callback: Subscriber;
  active: boolean;
}

interface PendingChange {
  oldValue: unknown;
  newValue: unknown;
}

export interface TrackResult<T> {
  result: T;
  /** Paths read through `get`/`has`, in first-read order. */
  paths: string[];
}

export class Store {
  protected readonly propagation: PropagationPolicy;
  protected readonly batching: BatchingPolicy;
  private readonly clock: () => number;
  private readonly onError?: (error: unknown) => void;

  private root: Branch = {};
  private expiries = new Map<string, number>();

  private subscriptions = new Map<string, Subscription[]>();
  private handles = new Map<number, Subscription>();
  private nextId = 1;

  private queue: ChangeRecord[] = [];
  private delivering = false;

  private coalesced = new Map<string, PendingChange>();
  private batchDepth = 0;
  private microtaskScheduled = false;

  private readers: Set<string>[] = [];
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private disposed = false;

  constructor(options: StoreOptions = {}) {
    this.propagation = options.propagation ?? 'ancestors';
    this.batching = options.batching ?? 'sync';
    this.clock = options.clock ?? (() => Date.now());
    this.onError = options.onError;

    if (options.sweepIntervalMs !== undefined) {
      assertStorePrecondition(
        Number.isFinite(options.sweepIntervalMs) && options.sweepIntervalMs > 0,
        'sweepIntervalMs must be a positive number'
      );
      const timer = setInterval(() => {
        this.sweep();
      }, options.sweepIntervalMs);
      unrefTimer(timer);
      this.sweepTimer = timer;
    }
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  /**
   * Value at `path`, or `defaultValue` when unset or expired. Branches are
   * returned as copies.
   */
  get(path: string, defaultValue?: unknown): unknown {
    const segments = parsePath(path);
    this.recordRead(path);
    this.evictExpiredAlong(segments);
    const found = this.lookup(segments);
    if (!found.exists) return defaultValue;
    return this.exportValue(path, found.value);
  }

  has(path: string): boolean {
    const segments = parsePath(path);
    this.recordRead(path);
    this.evictExpiredAlong(segments);
    return this.lookup(segments).exists;
  }

  /** Flat dot-path map of every live leaf. */
  snapshot(): FlatState {
    const out: Record<string, unknown> = {};
    const now = this.clock();
    const walk = (branch: Branch, prefix: string) => {
      for (const key of Object.keys(branch)) {
        const path = prefix ? `${prefix}.${key}` : key;
        if (this.isExpiredAt(path, now)) continue;
        const value = branch[key];
        if (isPlainObject(value)) walk(value, path);
        else out[path] = value;
      }
    };
    walk(this.root, '');
    return Object.freeze(out);
  }

  /**
   * Run `fn` and report every path it read through `get` or `has`.
   * Nested `track` calls only see their own reads.
   */
  track<T>(fn: () => T): TrackResult<T> {
    const reads = new Set<string>();
    this.readers.push(reads);
    try {
      const result = fn();
      return { result, paths: Array.from(reads) };
    } finally {
      this.readers.pop();
    }
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  /**
   * Write `value` at `path`. With `ttl` (milliseconds) the entry expires once
   * the clock reaches `now + ttl`. Writing `undefined` deletes the entry.
   */
  set(path: string, value: unknown, ttl?: number): void {
    this.assertLive();
    const segments = parsePath(path);
    if (ttl !== undefined) {
      assertStorePrecondition(
        Number.isFinite(ttl) && ttl >= 0,
        `ttl for "${path}" must be a non-negative number of milliseconds`
      );
    }
    if (value === undefined) {
      this.delete(path);
      return;
    }

    this.evictExpiredAlong(segments);
    const previous = this.lookup(segments);
    const oldValue = previous.exists ? cloneValue(previous.value) : undefined;

    const stored = cloneValue(value);
    this.writeAt(segments, stored);
    this.clearExpiries(path);
    if (ttl !== undefined) this.expiries.set(path, this.clock() + ttl);

    this.onCommit();
    this.enqueue(path, oldValue, cloneValue(stored));
  }

  /** Remove `path` and everything under it. Returns whether it existed. */
  delete(path: string): boolean {
    this.assertLive();
    const segments = parsePath(path);
    this.evictExpiredAlong(segments);
    const previous = this.lookup(segments);
    if (!previous.exists) return false;

    const oldValue = cloneValue(previous.value);
    this.removeAt(segments);
    this.clearExpiries(path);

    this.onCommit();
    this.enqueue(path, oldValue, undefined);
    return true;
  }

  /**
   * Evict every expired entry now. Eviction is silent: expiry is not a
   * write and produces no change record. Returns the number evicted.
   */
  sweep(): number {
    const now = this.clock();
    let evicted = 0;
    for (const [path, expiresAt] of Array.from(this.expiries)) {
      if (now < expiresAt) continue;
      if (!this.expiries.has(path)) continue;
      this.removeAt(path.split('.'));
      this.clearExpiries(path);
      evicted++;
    }
    if (evicted > 0 && isDebugEnabled()) {
      logger.debug(`[Trellis] store sweep evicted ${evicted} entries`);
    }
    return evicted;
  }

  // ---------------------------------------------------------------------------
  // Subscriptions
  // ---------------------------------------------------------------------------

  subscribe(path: string, callback: Subscriber): SubscriptionHandle {
    this.assertLive();
    parsePath(path);
    assertStorePrecondition(
      typeof callback === 'function',
      'subscribe() requires a callback function'
    );

    const sub: Subscription = {
      id: this.nextId++,
      path,
      callback,
      active: true,
    };
    const list = this.subscriptions.get(path);
    if (list) list.push(sub);
    else this.subscriptions.set(path, [sub]);
    this.handles.set(sub.id, sub);

    return Object.freeze({
      id: sub.id,
      path,
      unsubscribe: () => this.unsubscribe(sub.id),
    });
  }

  /** Idempotent; unknown handles are ignored. */
  unsubscribe(handle: SubscriptionHandle | number): void {
    const id = typeof handle === 'number' ? handle : handle.id;
    const sub = this.handles.get(id);
    if (!sub) return;
    sub.active = false;
    this.handles.delete(id);
    const list = this.subscriptions.get(sub.path);
    if (!list) return;
    const idx = list.indexOf(sub);
    if (idx !== -1) list.splice(idx, 1);
    if (list.length === 0) this.subscriptions.delete(sub.path);
  }

  /** Number of live subscriptions, optionally for one path. */
  subscriberCount(path?: string): number {
    if (path === undefined) return this.handles.size;
    return this.subscriptions.get(path)?.length ?? 0;
  }

  // ---------------------------------------------------------------------------
  // Batching
  // ---------------------------------------------------------------------------

  /**
   * Run `fn` with notifications held back, then deliver one record per
   * written path.
   */
  batch<T>(fn: () => T): T {
    this.batchDepth++;
    try {
      return fn();
    } finally {
      this.batchDepth--;
      if (this.batchDepth === 0) this.flush();
    }
  }

  /** Deliver coalesced notifications now instead of waiting for the microtask. */
  flush(): void {
    if (this.coalesced.size === 0) return;
    this.takeCoalesced();
    this.drain();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const sub of this.handles.values()) sub.active = false;
    this.handles.clear();
    this.subscriptions.clear();
    this.coalesced.clear();
    this.queue = [];
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ---------------------------------------------------------------------------
  // Hooks for subclasses
  // ---------------------------------------------------------------------------

  /** Called after every successful write, before notification. */
  protected onCommit(): void {}

  /** Load a flat mapping without notifying or committing. */
  protected hydrate(state: FlatState): void {
    for (const path of Object.keys(state)) {
      const value = state[path];
      if (value === undefined) continue;
      this.writeAt(parsePath(path), cloneValue(value));
    }
  }

  // ---------------------------------------------------------------------------
  // Delivery
  // ---------------------------------------------------------------------------

  private enqueue(path: string, oldValue: unknown, newValue: unknown): void {
    if (this.batchDepth > 0 || this.batching === 'microtask') {
      const existing = this.coalesced.get(path);
      if (existing) existing.newValue = newValue;
      else this.coalesced.set(path, { oldValue, newValue });
      if (this.batchDepth === 0) this.scheduleMicrotaskFlush();
      return;
    }
    this.queue.push(freezeRecord(path, oldValue, newValue));
    this.drain();
  }

  private scheduleMicrotaskFlush(): void {
    if (this.microtaskScheduled) return;
    this.microtaskScheduled = true;
    queueMicrotask(() => {
      this.microtaskScheduled = false;
      if (this.disposed) return;
      try {
        this.flush();
      } catch (err) {
        logger.error('[Trellis] Store subscriber failed during batched delivery:', err);
        this.reportDeferred(err);
      }
    });
  }

  /**
   * Deliver queued records until the queue is empty. The records present
   * when a round starts make up that round; records queued by re-entrant
   * writes form the next one. A drain already in progress picks them up.
   */
  private drain(): void {
    if (this.delivering) return;
    this.delivering = true;
    const errors: unknown[] = [];
    let rounds = 0;

    try {
      while (this.queue.length > 0) {
        if (++rounds > MAX_ROUNDS) {
          const stuck = this.queue[0]?.path;
          this.queue = [];
          throw new Error(
            `[Trellis] Store notification loop exceeded ${MAX_ROUNDS} rounds` +
              (stuck ? ` (last path "${stuck}")` : '') +
              '. A subscriber is probably writing to the path it observes.',
            errors.length > 0 ? { cause: collectErrors(errors) } : undefined
          );
        }
        const round = this.queue;
        this.queue = [];
        for (const record of round) this.deliver(record, errors);
        // Coalesced re-entrant writes join the next round instead of
        // waiting for another microtask, so loops stay bounded.
        if (this.batchDepth === 0) this.takeCoalesced();
      }
    } finally {
      this.delivering = false;
    }

    if (errors.length > 0) throw collectErrors(errors);
  }

  private reportDeferred(err: unknown): void {
    if (!this.onError) return;
    try {
      this.onError(err);
    } catch (hookError) {
      logger.error('[Trellis] Store onError hook threw:', hookError);
    }
  }

  private takeCoalesced(): void {
    if (this.coalesced.size === 0) return;
    for (const [path, change] of this.coalesced) {
      this.queue.push(freezeRecord(path, change.oldValue, change.newValue));
    }
    this.coalesced.clear();
  }

  private deliver(record: ChangeRecord, errors: unknown[]): void {
    const targets =
      this.propagation === 'ancestors'
        ? [record.path, ...ancestorsOf(record.path)]
        : [record.path];

    for (const target of targets) {
      const list = this.subscriptions.get(target);
      if (!list || list.length === 0) continue;
      // Subscribers added during this round wait for the next one.
      for (const sub of list.slice()) {
        if (!sub.active) continue;
        try {
          sub.callback(record);
        } catch (err) {
          errors.push(err);
        }
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Tree access
  // ---------------------------------------------------------------------------

  private lookup(segments: string[]): { exists: boolean; value: unknown } {
    let node: unknown = this.root;
    for (const seg of segments) {
      if (!isPlainObject(node) || !hasOwn(node, seg)) {
        return { exists: false, value: undefined };
      }
      node = node[seg];
    }
    return { exists: true, value: node };
  }

  private writeAt(segments: string[], value: unknown): void {
    let branch = this.root;
    for (let i = 0; i < segments.length - 1; i++) {
      const seg = segments[i];
      const next = hasOwn(branch, seg) ? branch[seg] : undefined;
      if (isPlainObject(next)) {
        branch = next;
      } else {
        // A leaf in the way becomes a branch.
        const created: Branch = {};
        branch[seg] = created;
        branch = created;
      }
    }
    branch[segments[segments.length - 1]] = value;
  }

  private removeAt(segments: string[]): void {
    let branch = this.root;
    for (let i = 0; i < segments.length - 1; i++) {
      const next = hasOwn(branch, segments[i]) ? branch[segments[i]] : undefined;
      if (!isPlainObject(next)) return;
      branch = next;
    }
    delete branch[segments[segments.length - 1]];
  }

  /** Drop the expiry of `path` and of everything beneath it. */
  private clearExpiries(path: string): void {
    this.expiries.delete(path);
    for (const key of Array.from(this.expiries.keys())) {
      if (isDescendantOf(key, path)) this.expiries.delete(key);
    }
  }

  private isExpiredAt(path: string, now: number): boolean {
    const expiresAt = this.expiries.get(path);
    return expiresAt !== undefined && now >= expiresAt;
  }

  /** Lazily evict any expired entry on the way to `segments`. */
  private evictExpiredAlong(segments: string[]): void {
    if (this.expiries.size === 0) return;
    const now = this.clock();
    let path = '';
    for (const seg of segments) {
      path = path ? `${path}.${seg}` : seg;
      if (this.isExpiredAt(path, now)) {
        this.removeAt(path.split('.'));
        this.clearExpiries(path);
        return;
      }
    }
  }

  /** Copy a value for a caller, leaving out expired descendants. */
  private exportValue(path: string, value: unknown): unknown {
    if (!isPlainObject(value)) return value;
    const now = this.clock();
    const out: Branch = {};
    for (const key of Object.keys(value)) {
      const child = `${path}.${key}`;
      if (this.isExpiredAt(child, now)) continue;
      out[key] = this.exportValue(child, value[key]);
    }
    return out;
  }

  private recordRead(path: string): void {
    const top = this.readers[this.readers.length - 1];
    if (top) top.add(path);
  }

  private assertLive(): void {
    assertStorePrecondition(!this.disposed, 'store has been disposed');
  }
}

/** One error as-is, several as an AggregateError. */
function collectErrors(errors: unknown[]): unknown {
  if (errors.length === 1) return errors[0];
  return new AggregateError(
    errors,
    `[Trellis] ${errors.length} store subscribers threw`
  );
}

function freezeRecord(
  path: string,
  oldValue: unknown,
  newValue: unknown
): ChangeRecord {
  return Object.freeze({ path, oldValue, newValue });
}

/** Keep a periodic sweep from holding a Node process open. */
function unrefTimer(timer: unknown): void {
  if (
    typeof timer === 'object' &&
    timer !== null &&
    'unref' in timer &&
    typeof timer.unref === 'function'
  ) {
    timer.unref();
  }
}
