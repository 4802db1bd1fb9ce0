import { SerializationWarning } from '../common/errors';
import { logger } from '../dev/logger';
import { Store } from './store';
import type {
  PersistenceSink,
  PersistentStoreOptions,
  FlatState,
} from './types';

/**
 * Store that mirrors its flat state into a sink after every write.
 *
 * Persistence never fails a write: a sink error becomes a
 * `SerializationWarning` that is logged and handed to `onWarning`.
 */
export class PersistentStore extends Store {
  private readonly sink: PersistenceSink;
  private readonly onWarning?: (warning: SerializationWarning) => void;

  constructor(sink: PersistenceSink, options: PersistentStoreOptions = {}) {
    super(options);
    this.sink = sink;
    this.onWarning = options.onWarning;

    try {
      const saved: FlatState | null = sink.load();
      if (saved) this.hydrate(saved);
    } catch (err) {
      this.warn('Could not load persisted state', err);
    }
  }

  protected override onCommit(): void {
    try {
      this.sink.save(this.snapshot());
    } catch (err) {
      this.warn('Could not persist store state', err);
    }
  }

  private warn(message: string, cause: unknown): void {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const warning = new SerializationWarning(`${message}: ${detail}`, {
      cause,
    });
    logger.warn(`[Trellis] ${warning.message}`);
    this.onWarning?.(warning);
  }
}
