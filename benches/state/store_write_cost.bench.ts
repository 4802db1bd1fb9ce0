/**
 * Store write cost
 *
 * Per-write overhead with ancestor propagation versus exact delivery.
 */

import { bench, describe } from 'vitest';
import { Store } from '../../src/store';

function seeded(propagation: 'ancestors' | 'exact'): Store {
  const store = new Store({ propagation });
  for (let i = 0; i < 50; i++) {
    store.subscribe(`app.items.${i}.label`, () => {});
  }
  store.subscribe('app.items', () => {});
  store.subscribe('app', () => {});
  return store;
}

const ancestors = seeded('ancestors');
const exact = seeded('exact');
let n = 0;

describe('store write', () => {
  bench('ancestors propagation', () => {
    ancestors.set(`app.items.${n++ % 50}.label`, n);
  });

  bench('exact propagation', () => {
    exact.set(`app.items.${n++ % 50}.label`, n);
  });

  bench('batch of 50 writes', () => {
    ancestors.batch(() => {
      for (let i = 0; i < 50; i++) ancestors.set(`app.items.${i}.label`, i);
    });
  });
});
