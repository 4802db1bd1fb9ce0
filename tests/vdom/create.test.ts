/**
 * tests/vdom/create.test.ts
 *
 * Node construction: normalization, key lifting, immutability and rejection
 * of unusable input.
 */

import { describe, it, expect } from 'vitest';
import {
  createNode,
  createText,
  equals,
  h,
  isVNode,
  getKey,
  isTextNode,
} from '../../src/vdom';
import { InvalidNodeError } from '../../src/common/errors';
import type { ChildInput, PropsInput } from '../../src/vdom';

describe('createNode', () => {
  it('should build an element with tagged props', () => {
    const onClick = () => {};
    const node = createNode('button', {
      class: 'primary',
      disabled: true,
      style: { fontSize: 12 },
      onClick,
    });

    expect(node.tag).toBe('button');
    expect(node.props).toEqual({
      class: { kind: 'attribute', value: 'primary' },
      disabled: { kind: 'attribute', value: true },
      style: { kind: 'style', value: { fontSize: 12 } },
      onClick: { kind: 'handler', value: onClick },
    });
    expect(node.children).toEqual([]);
    expect(node.key).toBeNull();
  });

  it('should lift a key out of props', () => {
    const node = createNode('li', { key: 'row-1', class: 'row' });

    expect(node.key).toBe('row-1');
    expect(getKey(node)).toBe('row-1');
    expect(Object.keys(node.props)).toEqual(['class']);
  });

  it('should prefer the explicit key argument', () => {
    const node = createNode('li', { key: 'a' }, [], 7);
    expect(node.key).toBe(7);
  });

  it('should skip props whose value is undefined', () => {
    const node = createNode('div', { id: undefined, title: 'x' });
    expect(Object.keys(node.props)).toEqual(['title']);
  });

  it('should flatten children and turn strings and numbers into text nodes', () => {
    const node = createNode('p', null, [
      'a',
      [1, [null, false, 'b']],
      undefined,
      true,
    ]);

    expect(node.children.map((c) => (isTextNode(c) ? c.text : c.tag))).toEqual([
      'a',
      '1',
      'b',
    ]);
  });

  it('should freeze the node, its props and its children', () => {
    const node = createNode('ul', { class: 'x' }, [h('li', null, 'one')]);

    expect(Object.isFrozen(node)).toBe(true);
    expect(Object.isFrozen(node.props)).toBe(true);
    expect(Object.isFrozen(node.props.class)).toBe(true);
    expect(Object.isFrozen(node.children)).toBe(true);
  });

  it('should copy style maps so later mutation of the input has no effect', () => {
    const style: Record<string, string> = { color: 'red' };
    const node = createNode('div', { style });
    style.color = 'blue';

    expect(node.props.style).toEqual({ kind: 'style', value: { color: 'red' } });
  });

  it('should reject an empty tag', () => {
    expect(() => createNode('')).toThrow(InvalidNodeError);
  });

  it('should reject the reserved text tag', () => {
    expect(() => createNode('#text')).toThrow(InvalidNodeError);
  });

  it('should reject a non-finite numeric key', () => {
    expect(() => createNode('li', null, [], Number.NaN)).toThrow(
      InvalidNodeError
    );
  });

  it('should reject a prop that is neither primitive, style map nor handler', () => {
    const props: PropsInput = JSON.parse('{"data":{"nested":{"deep":1}}}');
    expect(() => createNode('div', props)).toThrow(InvalidNodeError);
  });

  it('should reject children that are not nodes, strings or numbers', () => {
    const lookalike: ChildInput = JSON.parse('{"tag":"div"}');
    expect(() => createNode('div', null, [lookalike])).toThrow(
      InvalidNodeError
    );
  });
});

describe('createText', () => {
  it('should create a keyless text node', () => {
    const text = createText(42);

    expect(text.tag).toBe('#text');
    expect(text.text).toBe('42');
    expect(text.key).toBeNull();
    expect(isVNode(text)).toBe(true);
  });
});

describe('h', () => {
  it('should take children as rest arguments', () => {
    const node = h('ul', { class: 'list' }, h('li', null, 'a'), h('li', null, 'b'));

    expect(node.children).toHaveLength(2);
    expect(node.children[0].tag).toBe('li');
  });
});

describe('isVNode', () => {
  it('should reject look-alike plain objects', () => {
    expect(isVNode({ tag: 'div', props: {}, children: [], key: null })).toBe(
      false
    );
    expect(isVNode(null)).toBe(false);
  });
});

describe('equals', () => {
  it('should match on tag and key only', () => {
    expect(equals(createNode('li', { class: 'a' }), createNode('li', null, 'x'))).toBe(true);
    expect(equals(createNode('li', null, null, 'a'), createNode('li', null, null, 'a'))).toBe(true);
  });

  it('should not match a different tag or a different key', () => {
    expect(equals(createNode('li'), createNode('p'))).toBe(false);
    expect(equals(createNode('li', null, null, 1), createNode('li', null, null, 2))).toBe(false);
    expect(equals(createNode('li', null, null, 'a'), createNode('li'))).toBe(false);
  });

  it('should treat two text nodes as a match', () => {
    expect(equals(createText('a'), createText('b'))).toBe(true);
  });
});
