/**
 * Output targets for the string renderer. The renderer writes many small
 * fragments (one per tag, attribute run and text node) and calls `end()`
 * exactly once.
 */
export interface RenderSink {
  write(html: string): void;
  end(): void;
}

// Fragments are joined into chunks of at least this many characters.
const CHUNK_SIZE = 8 * 1024;

/** Collects the whole document; read it back with `toString()`. */
export class StringSink implements RenderSink {
  private chunks: string[] = [];
  private pending: string[] = [];
  private pendingLength = 0;
  private ended = false;

  write(html: string): void {
    if (html === '') return;
    this.pending.push(html);
    this.pendingLength += html.length;
    if (this.pendingLength >= CHUNK_SIZE) this.compact();
  }

  end(): void {
    this.compact();
    this.ended = true;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  toString(): string {
    this.compact();
    return this.chunks.join('');
  }

  private compact(): void {
    if (this.pendingLength === 0) return;
    this.chunks.push(this.pending.join(''));
    this.pending = [];
    this.pendingLength = 0;
  }
}

/** Forwards every non-empty fragment to a callback as it is produced. */
export class StreamSink implements RenderSink {
  constructor(
    private readonly onChunk: (html: string) => void,
    private readonly onComplete: () => void
  ) {}

  write(html: string): void {
    if (html !== '') this.onChunk(html);
  }

  end(): void {
    this.onComplete();
  }
}
