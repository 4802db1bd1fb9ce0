import type { SerializationWarning } from '../common/errors';

/** Frozen record handed to subscribers. */
export interface ChangeRecord {
  readonly path: string;
  readonly oldValue: unknown;
  readonly newValue: unknown;
}

export type Subscriber = (change: ChangeRecord) => void;

export interface SubscriptionHandle {
  readonly id: number;
  readonly path: string;
  unsubscribe(): void;
}

/**
 * `ancestors`: a write to `a.b.c` notifies `a.b.c`, then `a.b`, then `a`.
 * `exact`: only `a.b.c`.
 */
export type PropagationPolicy = 'ancestors' | 'exact';

/**
 * `sync`: every write notifies before `set` returns.
 * `microtask`: writes in the same tick collapse into one notification per
 * path, delivered from a microtask (or an explicit `flush()`).
 */
export type BatchingPolicy = 'sync' | 'microtask';

export interface StoreOptions {
  propagation?: PropagationPolicy;
  batching?: BatchingPolicy;
  /** Evict expired entries on a timer as well as on read. */
  sweepIntervalMs?: number;
  /** Time source in milliseconds; defaults to `Date.now()`. */
  clock?: () => number;
  /**
   * Receives subscriber errors from microtask deliveries, which have no
   * caller to rethrow to. The error is logged either way.
   */
  onError?: (error: unknown) => void;
}

export interface PersistentStoreOptions extends StoreOptions {
  onWarning?: (warning: SerializationWarning) => void;
}

/** Flat dot-path -> value layout written by persistent stores. */
export type FlatState = Readonly<Record<string, unknown>>;

export interface PersistenceSink {
  /** Previously saved state, or null when nothing was saved yet. */
  load(): FlatState | null;
  save(state: FlatState): void;
}
