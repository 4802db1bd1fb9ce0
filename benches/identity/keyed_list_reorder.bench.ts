/**
 * Keyed list reorder benchmark
 *
 * Diff and apply cost of rotating and reversing a 1k-row keyed list.
 */

import { bench, describe } from 'vitest';
import { diff } from '../../src/diff';
import { createDomHost, createRenderer } from '../../src/renderer';
import { h } from '../../src/vdom';
import type { VNode } from '../../src/vdom';

const ROWS = 1_000;

function rows(ids: number[]): VNode {
  return h(
    'ul',
    null,
    ids.map((id) => h('li', { key: id, class: 'row' }, `Row ${id}`))
  );
}

const ids = Array.from({ length: ROWS }, (_, i) => i);
const rotated = [...ids.slice(1), ids[0]];
const reversed = [...ids].reverse();

describe('keyed list reorder', () => {
  bench('diff: rotate by one', () => {
    diff(rows(ids), rows(rotated));
  });

  bench('diff: reverse', () => {
    diff(rows(ids), rows(reversed));
  });

  bench('diff + apply: reverse', () => {
    const container = document.createElement('div');
    const renderer = createRenderer(createDomHost());
    const prev = rows(ids);
    const handle = renderer.mount(container, prev);
    renderer.applyPatches(handle, diff(prev, rows(reversed)));
  });
});
