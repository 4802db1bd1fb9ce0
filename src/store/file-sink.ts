import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { parseFlatState } from './sinks';
import type { FlatState, PersistenceSink } from './types';

/** JSON file on disk. A missing file loads as "nothing saved yet". */
export class FileSink implements PersistenceSink {
  constructor(readonly filePath: string) {}

  load(): FlatState | null {
    if (!existsSync(this.filePath)) return null;
    return parseFlatState(readFileSync(this.filePath, 'utf8'));
  }

  save(state: FlatState): void {
    writeFileSync(this.filePath, JSON.stringify(state, null, 2), 'utf8');
  }
}
