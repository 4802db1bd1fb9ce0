/**
 * Engine error taxonomy
 *
 * Every error carries a stable `code` so callers can branch without relying
 * on `instanceof` across bundle boundaries.
 */

export type TrellisErrorCode =
  | 'INVALID_NODE'
  | 'MALFORMED_TREE'
  | 'PATCH_APPLICATION'
  | 'SERIALIZATION_WARNING';

/**
 * Raised synchronously by `createNode` when construction input is unusable
 * (empty tag, bad key, unsupported child).
 */
export class InvalidNodeError extends Error {
  readonly code = 'INVALID_NODE';
  constructor(message: string) {
    super(message);
    this.name = 'InvalidNodeError';
    Object.setPrototypeOf(this, InvalidNodeError.prototype);
  }
}

/**
 * A tree handed to the differ or a renderer breaks the tree invariants:
 * foreign objects, cycles, shared sub-nodes or duplicate sibling keys.
 */
export class MalformedTreeError extends Error {
  readonly code = 'MALFORMED_TREE';
  readonly path: readonly number[];
  constructor(message: string, path: readonly number[] = []) {
    super(path.length ? `${message} (at [${path.join(', ')}])` : message);
    this.name = 'MalformedTreeError';
    this.path = path;
    Object.setPrototypeOf(this, MalformedTreeError.prototype);
  }
}

/**
 * A patch could not be applied to the live tree. Fatal to the diff cycle;
 * callers rebuild from scratch.
 */
export class PatchApplicationError extends Error {
  readonly code = 'PATCH_APPLICATION';
  /** Index of the offending patch in the list, -1 when not tied to one. */
  readonly patchIndex: number;
  constructor(message: string, patchIndex = -1, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PatchApplicationError';
    this.patchIndex = patchIndex;
    Object.setPrototypeOf(this, PatchApplicationError.prototype);
  }
}

/**
 * Persistence failed. Never thrown by the store: it is logged and handed to
 * the `onWarning` option instead.
 */
export class SerializationWarning extends Error {
  readonly code = 'SERIALIZATION_WARNING';
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SerializationWarning';
    Object.setPrototypeOf(this, SerializationWarning.prototype);
  }
}

export type TrellisError =
  | InvalidNodeError
  | MalformedTreeError
  | PatchApplicationError
  | SerializationWarning;

export function isTrellisError(error: unknown): error is TrellisError {
  return (
    error instanceof InvalidNodeError ||
    error instanceof MalformedTreeError ||
    error instanceof PatchApplicationError ||
    error instanceof SerializationWarning
  );
}
