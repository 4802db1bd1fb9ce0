/**
 * tests/store/store.test.ts
 *
 * Path reads and writes, subscription delivery order, propagation policies,
 * batching and re-entrant writes.
 */

import { describe, it, expect, vi } from 'vitest';
import { Store } from '../../src/store';
import type { ChangeRecord } from '../../src/store';

const changes = (calls: ChangeRecord[]) =>
  calls.map((c) => [c.path, c.oldValue, c.newValue]);

describe('Store', () => {
  describe('get / set', () => {
    it('should return the default for unset paths', () => {
      const store = new Store();
      expect(store.get('missing')).toBeUndefined();
      expect(store.get('missing', 5)).toBe(5);
    });

    it('should read nested values through dot paths', () => {
      const store = new Store();
      store.set('user.profile.name', 'Ada');

      expect(store.get('user.profile.name')).toBe('Ada');
      expect(store.get('user')).toEqual({ profile: { name: 'Ada' } });
      expect(store.has('user.profile')).toBe(true);
      expect(store.has('user.email')).toBe(false);
    });

    it('should hand out copies of branches', () => {
      const store = new Store();
      store.set('user', { name: 'Ada' });

      const copy = store.get('user');
      if (copy && typeof copy === 'object') Reflect.set(copy, 'name', 'Eve');

      expect(store.get('user.name')).toBe('Ada');
    });

    it('should not keep a reference to the written object', () => {
      const store = new Store();
      const input = { name: 'Ada' };
      store.set('user', input);
      input.name = 'Eve';

      expect(store.get('user.name')).toBe('Ada');
    });

    it('should reject empty segments and prototype keys', () => {
      const store = new Store();
      expect(() => store.set('a..b', 1)).toThrow(/empty segment/);
      expect(() => store.set('', 1)).toThrow(/non-empty/);
      expect(() => store.set('__proto__.polluted', 1)).toThrow(/reserved/);
    });

    it('should not resolve inherited properties as stored values', () => {
      const store = new Store();
      expect(store.has('toString')).toBe(false);
    });

    it('should turn a leaf into a branch when writing below it', () => {
      const store = new Store();
      store.set('a', 1);
      store.set('a.b', 2);
      expect(store.get('a')).toEqual({ b: 2 });
    });

    it('should delete a path and report whether it existed', () => {
      const store = new Store();
      store.set('a.b', 1);

      expect(store.delete('a.b')).toBe(true);
      expect(store.delete('a.b')).toBe(false);
      expect(store.has('a.b')).toBe(false);
    });

    it('should treat writing undefined as a delete', () => {
      const store = new Store();
      store.set('x', 1);
      store.set('x', undefined);
      expect(store.has('x')).toBe(false);
    });

    it('should list live leaves in snapshot()', () => {
      const store = new Store();
      store.set('a.b', 1);
      store.set('a.c', 'two');
      store.set('d', [1, 2]);

      expect(store.snapshot()).toEqual({ 'a.b': 1, 'a.c': 'two', d: [1, 2] });
    });
  });

  describe('subscriptions', () => {
    it('should deliver frozen change records', () => {
      const store = new Store();
      store.set('count', 0);
      const seen: ChangeRecord[] = [];
      store.subscribe('count', (c) => seen.push(c));

      store.set('count', 1);

      expect(seen).toEqual([{ path: 'count', oldValue: 0, newValue: 1 }]);
      expect(Object.isFrozen(seen[0])).toBe(true);
    });

    it('should notify subscribers of one path in registration order', () => {
      const store = new Store();
      const order: string[] = [];
      store.subscribe('x', () => order.push('first'));
      store.subscribe('x', () => order.push('second'));
      store.subscribe('x', () => order.push('third'));

      store.set('x', 1);

      expect(order).toEqual(['first', 'second', 'third']);
    });

    it('should notify on every write even when the value is unchanged', () => {
      const store = new Store();
      const spy = vi.fn();
      store.set('x', 1);
      store.subscribe('x', spy);

      store.set('x', 1);

      expect(spy).toHaveBeenCalledTimes(1);
    });

    it('should make unsubscribe idempotent', () => {
      const store = new Store();
      const spy = vi.fn();
      const handle = store.subscribe('x', spy);

      handle.unsubscribe();
      store.unsubscribe(handle);
      handle.unsubscribe();
      store.set('x', 1);

      expect(spy).not.toHaveBeenCalled();
      expect(store.subscriberCount('x')).toBe(0);
    });

    it('should skip a subscriber removed earlier in the same round', () => {
      const store = new Store();
      const late = vi.fn();
      let lateHandle: { unsubscribe(): void } | null = null;
      store.subscribe('x', () => lateHandle?.unsubscribe());
      lateHandle = store.subscribe('x', late);

      store.set('x', 1);

      expect(late).not.toHaveBeenCalled();
    });

    it('should not deliver the current round to a subscriber added during it', () => {
      const store = new Store();
      const added = vi.fn();
      store.subscribe('x', () => {
        store.subscribe('x', added);
      });

      store.set('x', 1);
      expect(added).not.toHaveBeenCalled();

      store.set('x', 2);
      expect(added).toHaveBeenCalledTimes(1);
    });
  });

  describe('propagation', () => {
    it('should notify the path and then its ancestors by default', () => {
      const store = new Store();
      const order: string[] = [];
      for (const path of ['a', 'a.b', 'a.b.c', 'a.x']) {
        store.subscribe(path, (c) => order.push(`${path}<-${c.path}`));
      }

      store.set('a.b.c', 1);

      expect(order).toEqual(['a.b.c<-a.b.c', 'a.b<-a.b.c', 'a<-a.b.c']);
    });

    it('should not notify descendants of the written path', () => {
      const store = new Store();
      const child = vi.fn();
      store.subscribe('a.b', child);

      store.set('a', { b: 2 });

      expect(child).not.toHaveBeenCalled();
    });

    it('should notify only the exact path under the exact policy', () => {
      const store = new Store({ propagation: 'exact' });
      const parent = vi.fn();
      const leaf = vi.fn();
      store.subscribe('a', parent);
      store.subscribe('a.b', leaf);

      store.set('a.b', 1);

      expect(leaf).toHaveBeenCalledTimes(1);
      expect(parent).not.toHaveBeenCalled();
    });
  });

  describe('batching', () => {
    it('should notify once per write under the sync policy', () => {
      const store = new Store();
      store.set('count', 0);
      const seen: ChangeRecord[] = [];
      store.subscribe('count', (c) => seen.push(c));

      store.set('count', 1);
      store.set('count', 1);
      store.set('count', 1);

      expect(changes(seen)).toEqual([
        ['count', 0, 1],
        ['count', 1, 1],
        ['count', 1, 1],
      ]);
    });

    it('should coalesce writes in one tick under the microtask policy', async () => {
      const store = new Store({ batching: 'microtask' });
      store.set('count', 0);
      store.flush();
      const seen: ChangeRecord[] = [];
      store.subscribe('count', (c) => seen.push(c));

      store.set('count', 1);
      store.set('count', 1);
      store.set('count', 1);
      expect(seen).toEqual([]);

      await Promise.resolve();

      expect(changes(seen)).toEqual([['count', 0, 1]]);
    });

    it('should coalesce inside batch() and flush when it returns', () => {
      const store = new Store();
      const seen: ChangeRecord[] = [];
      store.subscribe('a', (c) => seen.push(c));
      store.subscribe('b', (c) => seen.push(c));

      const result = store.batch(() => {
        store.set('a', 1);
        store.set('b', 1);
        store.set('a', 2);
        expect(seen).toEqual([]);
        return 'done';
      });

      expect(result).toBe('done');
      expect(changes(seen)).toEqual([
        ['a', undefined, 2],
        ['b', undefined, 1],
      ]);
    });

    it('should only flush when the outermost batch returns', () => {
      const store = new Store();
      const spy = vi.fn();
      store.subscribe('a', spy);

      store.batch(() => {
        store.batch(() => store.set('a', 1));
        expect(spy).not.toHaveBeenCalled();
      });

      expect(spy).toHaveBeenCalledTimes(1);
    });
  });

  describe('batching at scale', () => {
    it('should deliver every path written inside one batch', () => {
      const store = new Store();
      const seen = new Set<string>();
      for (let i = 0; i < 150; i++) {
        store.subscribe(`k${i}`, (c) => seen.add(c.path));
      }

      store.batch(() => {
        for (let i = 0; i < 150; i++) store.set(`k${i}`, i);
      });

      expect(seen.size).toBe(150);
    });

    it('should deliver every path written in one tick under the microtask policy', async () => {
      const store = new Store({ batching: 'microtask' });
      const spy = vi.fn();
      for (let i = 0; i < 150; i++) store.subscribe(`k${i}`, spy);

      for (let i = 0; i < 150; i++) store.set(`k${i}`, i);
      await Promise.resolve();

      expect(spy).toHaveBeenCalledTimes(150);
    });
  });

  describe('re-entrant writes', () => {
    it('should land the value at once and notify after the current round', () => {
      const store = new Store();
      const log: string[] = [];
      store.subscribe('a', (c) => {
        log.push(`a1:${String(c.newValue)}`);
        if (c.newValue === 1) {
          store.set('b', 'from-a');
          log.push(`b is ${String(store.get('b'))}`);
        }
      });
      store.subscribe('a', () => log.push('a2'));
      store.subscribe('b', (c) => log.push(`b:${String(c.newValue)}`));

      store.set('a', 1);

      expect(log).toEqual(['a1:1', 'b is from-a', 'a2', 'b:from-a']);
    });

    it('should throw when subscribers keep writing to what they observe', () => {
      const store = new Store();
      store.subscribe('n', (c) => {
        store.set('n', Number(c.newValue) + 1);
      });

      expect(() => store.set('n', 0)).toThrow(/exceeded 100 rounds/);
    });

    it('should allow a chain of writes that ends before the limit', () => {
      const store = new Store();
      const seen: unknown[] = [];
      store.subscribe('hop', (c) => {
        seen.push(c.newValue);
        const n = Number(c.newValue);
        if (n < 99) store.set('hop', n + 1);
      });

      store.set('hop', 0);

      expect(seen).toHaveLength(100);
      expect(store.get('hop')).toBe(99);
    });

    it('should keep subscriber errors as the cause of a loop error', () => {
      const store = new Store();
      const bad = new Error('bad subscriber');
      store.subscribe('n', (c) => {
        if (c.newValue === 0) throw bad;
      });
      store.subscribe('n', (c) => {
        store.set('n', Number(c.newValue) + 1);
      });

      try {
        store.set('n', 0);
        expect.unreachable('the loop must be stopped');
      } catch (err) {
        expect(err).toBeInstanceOf(Error);
        if (err instanceof Error) {
          expect(err.message).toMatch(/exceeded 100 rounds/);
          expect(err.cause).toBe(bad);
        }
      }
    });

    it('should bound loops under the microtask policy too', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const onError = vi.fn();
      const store = new Store({ batching: 'microtask', onError });
      store.subscribe('n', (c) => {
        store.set('n', Number(c.newValue) + 1);
      });

      store.set('n', 0);
      await Promise.resolve();

      expect(onError).toHaveBeenCalledTimes(1);
      expect(String(onError.mock.calls[0][0])).toMatch(/exceeded 100 rounds/);
      expect(store.get('n')).toBe(100);
      vi.restoreAllMocks();
    });
  });

  describe('subscriber errors', () => {
    it('should finish the round and rethrow a single error', () => {
      const store = new Store();
      const after = vi.fn();
      store.subscribe('x', () => {
        throw new Error('boom');
      });
      store.subscribe('x', after);

      expect(() => store.set('x', 1)).toThrow('boom');
      expect(after).toHaveBeenCalledTimes(1);
      expect(store.get('x')).toBe(1);
    });

    it('should aggregate several errors', () => {
      const store = new Store();
      store.subscribe('x', () => {
        throw new Error('one');
      });
      store.subscribe('x', () => {
        throw new Error('two');
      });

      try {
        store.set('x', 1);
        expect.unreachable('errors must surface');
      } catch (err) {
        expect(err).toBeInstanceOf(AggregateError);
        if (err instanceof AggregateError) {
          expect(err.errors.map((e: Error) => e.message)).toEqual(['one', 'two']);
        }
      }
    });

    it('should hand microtask delivery errors to onError', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const onError = vi.fn();
      const store = new Store({ batching: 'microtask', onError });
      const boom = new Error('boom');
      store.subscribe('x', () => {
        throw boom;
      });

      store.set('x', 1);
      await Promise.resolve();

      expect(onError).toHaveBeenCalledWith(boom);
      vi.restoreAllMocks();
    });
  });

  describe('track', () => {
    it('should report paths read through get and has', () => {
      const store = new Store();
      store.set('a', 1);

      const { result, paths } = store.track(() => {
        store.get('a');
        store.has('b.c');
        store.get('a');
        return 'r';
      });

      expect(result).toBe('r');
      expect(paths).toEqual(['a', 'b.c']);
    });

    it('should not record reads made outside track', () => {
      const store = new Store();
      store.get('outside');
      const { paths } = store.track(() => store.get('inside'));
      expect(paths).toEqual(['inside']);
    });
  });

  describe('dispose', () => {
    it('should drop subscriptions and refuse further writes', () => {
      const store = new Store();
      const spy = vi.fn();
      store.subscribe('x', spy);

      store.dispose();

      expect(store.isDisposed).toBe(true);
      expect(store.subscriberCount()).toBe(0);
      expect(() => store.set('x', 1)).toThrow(/disposed/);
      expect(spy).not.toHaveBeenCalled();
    });
  });
});
