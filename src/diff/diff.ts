/**
 * Tree differ
 *
 * Produces the ordered patch list that turns `prev` into `next`. Paths are
 * computed so that replaying the list front to back stays valid: removals run
 * from the highest index down, creations from the lowest index up, and child
 * recursion addresses children by their final position.
 */

import { logger } from '../dev/logger';
import { isDebugEnabled } from '../dev/config';
import { equals, isTextNode } from '../vdom/create';
import { assertTree } from '../vdom/validate';
import type { VNode } from '../vdom/types';
import { diffProps } from './props';
import { hasKeyedChild, isIdentityOrder, matchChildren } from './keyed';
import type { Patch, PatchPath, PatchType } from './types';

/**
 * Compute the patch list transforming `prev` into `next`.
 *
 * Never fails on incompatible trees (the worst case is a root `replace`);
 * only malformed input is rejected.
 *
 * @throws MalformedTreeError
 */
export function diff(prev: VNode | null, next: VNode | null): Patch[] {
  if (prev !== null) assertTree(prev);
  if (next !== null) assertTree(next);

  const patches: Patch[] = [];
  diffNode(prev, next, [], patches);

  if (isDebugEnabled()) {
    logger.debug('[Trellis][diff]', countPatches(patches));
  }
  return patches;
}

function diffNode(
  prev: VNode | null,
  next: VNode | null,
  path: PatchPath,
  out: Patch[]
): void {
  // Same object: immutable, so nothing below it can differ.
  if (prev === next) return;

  if (prev === null) {
    if (next !== null) out.push({ type: 'create', path, node: next });
    return;
  }
  if (next === null) {
    out.push({ type: 'remove', path });
    return;
  }

  if (!equals(prev, next)) {
    out.push({ type: 'replace', path, node: next });
    return;
  }

  if (isTextNode(prev) || isTextNode(next)) {
    if (isTextNode(prev) && isTextNode(next) && prev.text !== next.text) {
      out.push({ type: 'set-text', path, text: next.text });
    }
    return;
  }

  const delta = diffProps(prev.props, next.props);
  if (delta) {
    out.push({
      type: 'update-props',
      path,
      added: delta.added,
      removed: delta.removed,
    });
  }

  diffChildren(prev.children, next.children, path, out);
}

function diffChildren(
  prev: readonly VNode[],
  next: readonly VNode[],
  path: PatchPath,
  out: Patch[]
): void {
  if (prev === next) return;
  if (prev.length === 0 && next.length === 0) return;

  if (hasKeyedChild(prev) || hasKeyedChild(next)) {
    diffKeyedChildren(prev, next, path, out);
  } else {
    diffPositionalChildren(prev, next, path, out);
  }
}

function diffPositionalChildren(
  prev: readonly VNode[],
  next: readonly VNode[],
  path: PatchPath,
  out: Patch[]
): void {
  const common = Math.min(prev.length, next.length);

  for (let i = 0; i < common; i++) {
    diffNode(prev[i], next[i], [...path, i], out);
  }
  for (let i = prev.length - 1; i >= common; i--) {
    out.push({ type: 'remove', path: [...path, i] });
  }
  for (let i = common; i < next.length; i++) {
    out.push({ type: 'create', path: [...path, i], node: next[i] });
  }
}

function diffKeyedChildren(
  prev: readonly VNode[],
  next: readonly VNode[],
  path: PatchPath,
  out: Patch[]
): void {
  const { sources, claimed } = matchChildren(prev, next);

  // 1. Drop unmatched old children, highest index first.
  for (let i = prev.length - 1; i >= 0; i--) {
    if (!claimed[i]) out.push({ type: 'remove', path: [...path, i] });
  }

  // 2. Survivors are now packed in old order; permute them into new order.
  const packed: number[] = new Array<number>(prev.length).fill(-1);
  let survivors = 0;
  for (let i = 0; i < prev.length; i++) {
    if (claimed[i]) packed[i] = survivors++;
  }
  const order: number[] = [];
  for (const source of sources) {
    if (source !== -1) order.push(packed[source]);
  }
  if (!isIdentityOrder(order)) {
    out.push({ type: 'reorder', path, order });
  }

  // 3. Insert new children at their final index, lowest first.
  for (let j = 0; j < next.length; j++) {
    if (sources[j] === -1) {
      out.push({ type: 'create', path: [...path, j], node: next[j] });
    }
  }

  // 4. Recurse into matched pairs at their final index.
  for (let j = 0; j < next.length; j++) {
    const source = sources[j];
    if (source !== -1) diffNode(prev[source], next[j], [...path, j], out);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export function isEmptyDiff(patches: readonly Patch[]): boolean {
  return patches.length === 0;
}

export function countPatches(
  patches: readonly Patch[]
): Record<PatchType, number> {
  const counts: Record<PatchType, number> = {
    create: 0,
    remove: 0,
    replace: 0,
    'update-props': 0,
    'set-text': 0,
    reorder: 0,
  };
  for (const patch of patches) counts[patch.type]++;
  return counts;
}
