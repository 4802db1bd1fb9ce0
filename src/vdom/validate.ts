import { MalformedTreeError } from '../common/errors';
import { isKey, isVNode } from './create';
import { TEXT_TAG, type Key, type VNode } from './types';

// Trees are immutable once built, so a root that passed validation stays valid.
const validatedRoots = new WeakSet<VNode>();

function checkShape(node: VNode, path: readonly number[]): void {
  if (typeof node.tag !== 'string' || node.tag.length === 0) {
    throw new MalformedTreeError('Node is missing its tag', path);
  }
  if (typeof node.props !== 'object' || node.props === null) {
    throw new MalformedTreeError(`<${node.tag}> is missing its props`, path);
  }
  if (!Array.isArray(node.children)) {
    throw new MalformedTreeError(`<${node.tag}> is missing its children`, path);
  }
  if (node.key !== null && !isKey(node.key)) {
    throw new MalformedTreeError(`<${node.tag}> has an invalid key`, path);
  }
  if (node.tag === TEXT_TAG) {
    if (!('text' in node) || typeof node.text !== 'string') {
      throw new MalformedTreeError('Text node is missing its text', path);
    }
    if (node.children.length > 0) {
      throw new MalformedTreeError('Text nodes cannot have children', path);
    }
  }
}

/**
 * Walk a tree and check the structural invariants: every entry is a branded
 * node with its fields present, no node is reached twice (which also rules
 * out cycles) and sibling keys are unique.
 *
 * @throws MalformedTreeError
 */
export function assertTree(root: unknown): asserts root is VNode {
  if (!isVNode(root)) {
    throw new MalformedTreeError('Expected a virtual node at the tree root');
  }
  if (validatedRoots.has(root)) return;

  const seen = new Set<VNode>();
  const stack: Array<{ node: unknown; path: number[] }> = [
    { node: root, path: [] },
  ];

  while (stack.length) {
    const entry = stack.pop();
    if (!entry) break;
    const { node, path } = entry;

    if (!isVNode(node)) {
      throw new MalformedTreeError('Child is not a virtual node', path);
    }
    if (seen.has(node)) {
      throw new MalformedTreeError(
        'Node appears more than once in the tree (shared sub-node or cycle)',
        path
      );
    }
    seen.add(node);
    checkShape(node, path);

    const keys = new Set<Key>();
    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      const child: unknown = children[i];
      if (isVNode(child) && child.key !== null) {
        if (keys.has(child.key)) {
          throw new MalformedTreeError(
            `Duplicate key "${String(child.key)}" among children of <${node.tag}>`,
            path
          );
        }
        keys.add(child.key);
      }
      stack.push({ node: child, path: [...path, i] });
    }
  }

  validatedRoots.add(root);
}
