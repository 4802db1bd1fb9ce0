/**
 * String rendering benchmark
 */

import { bench, describe } from 'vitest';
import { renderToString } from '../../src/ssr';
import { h } from '../../src/vdom';

const table = h(
  'table',
  { class: 'grid' },
  Array.from({ length: 200 }, (_, r) =>
    h(
      'tr',
      { key: r },
      Array.from({ length: 10 }, (_, c) =>
        h('td', { style: { textAlign: 'right' }, title: `r${r}c${c}` }, `<${r * c}>`)
      )
    )
  )
);

describe('renderToString', () => {
  bench('200x10 table with escaping', () => {
    renderToString(table);
  });
});
