import { SerializationWarning } from '../common/errors';
import { isPlainObject } from './path';
import type { FlatState, PersistenceSink } from './types';

/**
 * Parse a saved flat mapping. Anything other than a JSON object is rejected.
 */
export function parseFlatState(text: string): FlatState {
  const parsed: unknown = JSON.parse(text);
  if (!isPlainObject(parsed)) {
    throw new SerializationWarning('persisted state is not a JSON object');
  }
  return parsed;
}

/**
 * In-memory sink. State is kept as serialized JSON so values that cannot
 * survive a round trip fail here the same way they would on disk.
 */
export class MemorySink implements PersistenceSink {
  private data: string | null;

  constructor(initial?: FlatState) {
    this.data = initial ? JSON.stringify(initial) : null;
  }

  load(): FlatState | null {
    return this.data === null ? null : parseFlatState(this.data);
  }

  save(state: FlatState): void {
    this.data = JSON.stringify(state);
  }

  /** Last saved JSON text. */
  get raw(): string | null {
    return this.data;
  }
}
