import type { Prop, PropMap, StyleMap } from '../vdom/types';

export interface PropDelta {
  added: Record<string, Prop>;
  removed: string[];
}

function shallowEqualStyle(a: StyleMap, b: StyleMap): boolean {
  if (a === b) return true;
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  for (const k of aKeys) {
    if (!Object.prototype.hasOwnProperty.call(b, k)) return false;
    if (!Object.is(a[k], b[k])) return false;
  }
  return true;
}

/**
 * Handlers only match by reference; a fresh closure on every render is a
 * change.
 */
export function propsEqual(a: Prop, b: Prop): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case 'attribute':
      return b.kind === 'attribute' && Object.is(a.value, b.value);
    case 'style':
      return b.kind === 'style' && shallowEqualStyle(a.value, b.value);
    case 'handler':
      return b.kind === 'handler' && a.value === b.value;
  }
}

/**
 * Order-independent delta between two prop maps: `added` holds new and
 * changed entries, `removed` the names missing from `next`. Returns null
 * when nothing changed.
 */
export function diffProps(prev: PropMap, next: PropMap): PropDelta | null {
  if (prev === next) return null;

  let added: Record<string, Prop> | null = null;
  let removed: string[] | null = null;

  for (const name of Object.keys(next)) {
    const before = Object.prototype.hasOwnProperty.call(prev, name)
      ? prev[name]
      : undefined;
    const after = next[name];
    if (before === undefined || !propsEqual(before, after)) {
      if (!added) added = {};
      added[name] = after;
    }
  }

  for (const name of Object.keys(prev)) {
    if (!Object.prototype.hasOwnProperty.call(next, name)) {
      if (!removed) removed = [];
      removed.push(name);
    }
  }

  if (!added && !removed) return null;
  return { added: added ?? {}, removed: removed ?? [] };
}
