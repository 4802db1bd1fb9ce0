/**
 * Keyed child matching helpers shared by the differ and the live renderer.
 */

import type { Key, VNode } from '../vdom/types';

export interface ChildMatch {
  /** For every new child, the index of its old counterpart or -1. */
  readonly sources: readonly number[];
  /** For every old child, whether a new child claimed it. */
  readonly claimed: readonly boolean[];
}

export function hasKeyedChild(children: readonly VNode[]): boolean {
  for (const child of children) {
    if (child.key !== null) return true;
  }
  return false;
}

/**
 * Match new children to old ones by key. Unkeyed children take their ordinal
 * among unkeyed siblings as identity, so a keyed list with a static header
 * still lines the header up with itself.
 */
export function matchChildren(
  prev: readonly VNode[],
  next: readonly VNode[]
): ChildMatch {
  const byKey = new Map<Key, number>();
  const unkeyed: number[] = [];
  for (let i = 0; i < prev.length; i++) {
    const key = prev[i].key;
    if (key === null) unkeyed.push(i);
    else byKey.set(key, i);
  }

  const sources: number[] = new Array<number>(next.length).fill(-1);
  const claimed: boolean[] = new Array<boolean>(prev.length).fill(false);
  let cursor = 0;

  for (let j = 0; j < next.length; j++) {
    const key = next[j].key;
    let source = -1;
    if (key === null) {
      if (cursor < unkeyed.length) source = unkeyed[cursor++];
    } else {
      source = byKey.get(key) ?? -1;
    }
    if (source !== -1) {
      sources[j] = source;
      claimed[source] = true;
    }
  }

  return { sources, claimed };
}

/**
 * Indices (into `seq`) of one longest strictly increasing subsequence.
 * Entries that sit on it keep their place during a reorder; everything else
 * moves.
 */
export function longestIncreasingSubsequence(
  seq: readonly number[]
): number[] {
  const tails: number[] = [];
  const prevIndex: number[] = new Array<number>(seq.length).fill(-1);

  for (let i = 0; i < seq.length; i++) {
    const value = seq[i];
    let lo = 0;
    let hi = tails.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (seq[tails[mid]] < value) lo = mid + 1;
      else hi = mid;
    }
    if (lo > 0) prevIndex[i] = tails[lo - 1];
    if (lo === tails.length) tails.push(i);
    else tails[lo] = i;
  }

  const result: number[] = new Array<number>(tails.length);
  let k = tails.length ? tails[tails.length - 1] : -1;
  for (let i = tails.length - 1; i >= 0; i--) {
    result[i] = k;
    k = prevIndex[k];
  }
  return result;
}

export function isIdentityOrder(order: readonly number[]): boolean {
  for (let i = 0; i < order.length; i++) {
    if (order[i] !== i) return false;
  }
  return true;
}
