import { InvalidNodeError } from '../common/errors';
import {
  TEXT_TAG,
  VNODE_TYPE,
  type ChildInput,
  type Key,
  type Prop,
  type PropInput,
  type PropMap,
  type PropsInput,
  type StyleMap,
  type VElement,
  type VNode,
  type VText,
} from './types';

const EMPTY_PROPS: PropMap = Object.freeze({});
const EMPTY_CHILDREN: readonly VNode[] = Object.freeze([]);

// ─────────────────────────────────────────────────────────────────────────────
// Guards
// ─────────────────────────────────────────────────────────────────────────────

export function isVNode(value: unknown): value is VNode {
  return (
    typeof value === 'object' &&
    value !== null &&
    '$$typeof' in value &&
    value.$$typeof === VNODE_TYPE
  );
}

export function isTextNode(node: VNode): node is VText {
  return node.tag === TEXT_TAG;
}

export function isKey(value: unknown): value is Key {
  return (
    typeof value === 'string' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

export function getKey(node: VNode): Key | null {
  return node.key;
}

/**
 * Identity check used before any deep comparison: same tag, same key.
 * Two keyless nodes match; whether they sit at the same position is the
 * caller's concern.
 */
export function equals(a: VNode, b: VNode): boolean {
  return a.tag === b.tag && a.key === b.key;
}

// ─────────────────────────────────────────────────────────────────────────────
// Normalization
// ─────────────────────────────────────────────────────────────────────────────

function isStyleMap(value: object): value is StyleMap {
  if (Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return false;
  for (const entry of Object.values(value)) {
    if (typeof entry !== 'string' && typeof entry !== 'number') return false;
  }
  return true;
}

function normalizeProp(
  tag: string,
  name: string,
  value: Exclude<PropInput, undefined>
): Prop {
  if (typeof value === 'function') {
    return Object.freeze({ kind: 'handler', value });
  }
  if (value === null || typeof value !== 'object') {
    return Object.freeze({ kind: 'attribute', value });
  }
  if (isStyleMap(value)) {
    return Object.freeze({ kind: 'style', value: Object.freeze({ ...value }) });
  }
  throw new InvalidNodeError(
    `<${tag}> prop "${name}" must be a primitive, a style map of strings/numbers or a handler function`
  );
}

function normalizeProps(tag: string, props: PropsInput | null | undefined) {
  let key: Key | null = null;
  if (!props) return { props: EMPTY_PROPS, key };

  const out: Record<string, Prop> = {};
  let count = 0;
  for (const name of Object.keys(props)) {
    const value = props[name];
    if (name === 'key') {
      if (value === undefined || value === null) continue;
      if (!isKey(value)) {
        throw new InvalidNodeError(
          `<${tag}> key must be a string or a finite number`
        );
      }
      key = value;
      continue;
    }
    if (value === undefined) continue;
    out[name] = normalizeProp(tag, name, value);
    count++;
  }
  return { props: count ? Object.freeze(out) : EMPTY_PROPS, key };
}

function isChildList(value: unknown): value is readonly ChildInput[] {
  return Array.isArray(value);
}

function pushChildren(tag: string, input: ChildInput, out: VNode[]): void {
  if (input === null || input === undefined || typeof input === 'boolean') {
    return;
  }
  if (typeof input === 'string' || typeof input === 'number') {
    out.push(createText(input));
    return;
  }
  if (isVNode(input)) {
    out.push(input);
    return;
  }
  if (isChildList(input)) {
    for (const item of input) pushChildren(tag, item, out);
    return;
  }
  throw new InvalidNodeError(
    `<${tag}> received a child that is not a node, string or number`
  );
}

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

export function createText(text: string | number): VText {
  if (typeof text !== 'string' && typeof text !== 'number') {
    throw new InvalidNodeError('Text nodes take a string or a number');
  }
  return Object.freeze({
    $$typeof: VNODE_TYPE,
    tag: TEXT_TAG,
    text: String(text),
    props: EMPTY_PROPS,
    children: EMPTY_CHILDREN,
    key: null,
  });
}

/**
 * Build an immutable element node.
 *
 * A `key` entry in `props` is lifted onto the node when no explicit `key`
 * argument is given. Children are flattened; strings and numbers become text
 * nodes; `null`, `undefined` and booleans are dropped.
 *
 * @throws InvalidNodeError on an empty tag, a bad key or an unsupported child
 */
export function createNode(
  tag: string,
  props?: PropsInput | null,
  children?: ChildInput,
  key?: Key | null
): VElement {
  if (typeof tag !== 'string' || tag.length === 0) {
    throw new InvalidNodeError('Element nodes require a non-empty tag');
  }
  if (tag === TEXT_TAG) {
    throw new InvalidNodeError(
      `"${TEXT_TAG}" is reserved for text nodes; use createText()`
    );
  }

  const normalized = normalizeProps(tag, props);
  let resolvedKey = normalized.key;
  if (key !== undefined && key !== null) {
    if (!isKey(key)) {
      throw new InvalidNodeError(
        `<${tag}> key must be a string or a finite number`
      );
    }
    resolvedKey = key;
  }

  const kids: VNode[] = [];
  if (children !== undefined) pushChildren(tag, children, kids);

  return Object.freeze({
    $$typeof: VNODE_TYPE,
    tag,
    props: normalized.props,
    children: kids.length ? Object.freeze(kids) : EMPTY_CHILDREN,
    key: resolvedKey,
  });
}

/**
 * Variadic shorthand for `createNode`.
 *
 * @example
 * ```ts
 * h('ul', { class: 'list' }, items.map((i) => h('li', { key: i.id }, i.label)));
 * ```
 */
export function h(
  tag: string,
  props?: PropsInput | null,
  ...children: ChildInput[]
): VElement {
  return createNode(tag, props, children);
}
