/**
 * tests/diff/keyed.test.ts
 */

import { describe, it, expect } from 'vitest';
import {
  isIdentityOrder,
  longestIncreasingSubsequence,
  matchChildren,
} from '../../src/diff/keyed';
import { h } from '../../src/vdom';

describe('matchChildren', () => {
  it('should map new children to old indices by key', () => {
    const prev = [h('li', { key: 'a' }), h('li', { key: 'b' }), h('li', { key: 'c' })];
    const next = [h('li', { key: 'c' }), h('li', { key: 'z' }), h('li', { key: 'a' })];

    expect(matchChildren(prev, next)).toEqual({
      sources: [2, -1, 0],
      claimed: [true, false, true],
    });
  });

  it('should pair unkeyed children in order of appearance', () => {
    const prev = [h('hr'), h('li', { key: 'a' }), h('br')];
    const next = [h('li', { key: 'a' }), h('hr'), h('br'), h('p')];

    expect(matchChildren(prev, next).sources).toEqual([1, 0, 2, -1]);
  });
});

describe('longestIncreasingSubsequence', () => {
  it('should return indices of one longest increasing run', () => {
    expect(longestIncreasingSubsequence([2, 0, 1])).toEqual([1, 2]);
    expect(longestIncreasingSubsequence([0, 1, 2, 3])).toEqual([0, 1, 2, 3]);
  });

  it('should handle an empty sequence', () => {
    expect(longestIncreasingSubsequence([])).toEqual([]);
  });

  it('should handle a strictly decreasing sequence', () => {
    expect(longestIncreasingSubsequence([3, 2, 1, 0])).toHaveLength(1);
  });
});

describe('isIdentityOrder', () => {
  it('should detect the identity permutation', () => {
    expect(isIdentityOrder([0, 1, 2])).toBe(true);
    expect(isIdentityOrder([1, 0])).toBe(false);
    expect(isIdentityOrder([])).toBe(true);
  });
});
