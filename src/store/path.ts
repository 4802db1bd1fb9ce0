import { assertStorePrecondition } from '../dev/invariant';

export type Branch = { [segment: string]: unknown };

const FORBIDDEN_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

/**
 * Split a dot path into segments. Empty segments and prototype keys are
 * rejected.
 */
export function parsePath(path: string): string[] {
  assertStorePrecondition(
    typeof path === 'string' && path.length > 0,
    'store paths must be non-empty strings'
  );
  const segments = path.split('.');
  for (const seg of segments) {
    assertStorePrecondition(
      seg.length > 0,
      `store path "${path}" contains an empty segment`
    );
    assertStorePrecondition(
      !FORBIDDEN_SEGMENTS.has(seg),
      `store path "${path}" uses the reserved segment "${seg}"`
    );
  }
  return segments;
}

/** `a.b.c` -> [`a.b`, `a`] (nearest first). */
export function ancestorsOf(path: string): string[] {
  const out: string[] = [];
  let idx = path.lastIndexOf('.');
  while (idx > 0) {
    path = path.slice(0, idx);
    out.push(path);
    idx = path.lastIndexOf('.');
  }
  return out;
}

export function isDescendantOf(path: string, ancestor: string): boolean {
  return path.length > ancestor.length && path.startsWith(`${ancestor}.`);
}

export function isPlainObject(value: unknown): value is Branch {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function hasOwn(branch: Branch, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(branch, key);
}

/**
 * Deep-copy plain-object branches; leaves (arrays, dates, class instances,
 * primitives) are shared.
 */
export function cloneValue(value: unknown): unknown {
  if (!isPlainObject(value)) return value;
  const out: Branch = {};
  for (const key of Object.keys(value)) out[key] = cloneValue(value[key]);
  return out;
}
