/**
 * Live renderer
 *
 * Builds host nodes from virtual trees and replays patch lists against them.
 * `applyPatches` runs in two phases: a planning pass checks every patch
 * against a lazily materialized shadow of the live tree, then a commit pass
 * mutates the host. A list that cannot apply is rejected before the first
 * mutation.
 */

import { PatchApplicationError } from '../common/errors';
import { isDebugEnabled } from '../dev/config';
import { logger } from '../dev/logger';
import type { Patch, PatchPath } from '../diff/types';
import { globalScheduler, type Scheduler } from '../runtime/scheduler';
import { styleToCss } from '../ssr/attrs';
import { isTextNode } from '../vdom/create';
import type { EventHandler, Prop, VNode } from '../vdom/types';
import { assertTree } from '../vdom/validate';
import { longestIncreasingSubsequence } from '../diff/keyed';
import type { HostOps } from './host';
import { now, parseEventName } from './utils';

/**
 * A mounted live tree. `root` is owned by the renderer: it changes when a
 * root-level create/remove/replace patch is applied.
 */
export class LiveHandle<N extends object> {
  constructor(
    readonly container: N | null,
    public root: N | null
  ) {}
}

export interface RendererOptions {
  /** Scheduler whose handler window wraps event listeners. */
  scheduler?: Scheduler;
}

export interface Renderer<N extends object> {
  readonly host: HostOps<N>;
  instantiate(node: VNode): LiveHandle<N>;
  mount(container: N, node: VNode): LiveHandle<N>;
  applyPatches(handle: LiveHandle<N>, patches: readonly Patch[]): void;
  unmount(handle: LiveHandle<N>): void;
}

interface BoundListener {
  event: string;
  wrapped: (event: Event) => void;
}

interface Shadow<N> {
  host: N | null;
  vnode: VNode | null;
  text: boolean;
  children: Shadow<N>[] | null;
}

function describePatch(patch: Patch, index: number): string {
  return `Patch #${index} (${patch.type} at [${patch.path.join(', ')}])`;
}

function isPermutation(order: readonly number[], size: number): boolean {
  if (order.length !== size) return false;
  const seen = new Array<boolean>(size).fill(false);
  for (const i of order) {
    if (!Number.isInteger(i) || i < 0 || i >= size || seen[i]) return false;
    seen[i] = true;
  }
  return true;
}

export function createRenderer<N extends object>(
  host: HostOps<N>,
  options: RendererOptions = {}
): Renderer<N> {
  const scheduler = options.scheduler ?? globalScheduler;
  // prop name -> bound listener, per element
  const listeners = new WeakMap<N, Map<string, BoundListener>>();
  const busy = new WeakSet<LiveHandle<N>>();

  // ───────────────────────────────────────────────────────────────────────────
  // Props
  // ───────────────────────────────────────────────────────────────────────────

  function bindHandler(el: N, name: string, handler: EventHandler): void {
    const event = parseEventName(name) ?? name;
    const wrapped = (e: Event) => scheduler.runHandler(() => handler(e));
    host.addListener(el, event, wrapped);
    let map = listeners.get(el);
    if (!map) {
      map = new Map();
      listeners.set(el, map);
    }
    map.set(name, { event, wrapped });
  }

  function unbindHandler(el: N, name: string): boolean {
    const map = listeners.get(el);
    const entry = map?.get(name);
    if (!map || !entry) return false;
    host.removeListener(el, entry.event, entry.wrapped);
    map.delete(name);
    return true;
  }

  function setProp(el: N, name: string, prop: Prop): void {
    switch (prop.kind) {
      case 'handler':
        bindHandler(el, name, prop.value);
        return;
      case 'style': {
        const css = styleToCss(prop.value);
        if (css) host.setAttribute(el, name, css);
        else host.removeAttribute(el, name);
        return;
      }
      case 'attribute': {
        const value = prop.value;
        if (value === false || value === null) host.removeAttribute(el, name);
        else host.setAttribute(el, name, value);
        return;
      }
    }
  }

  function clearProp(el: N, name: string): void {
    if (!unbindHandler(el, name)) host.removeAttribute(el, name);
  }

  // A name may switch between handler and attribute; drop the old binding
  // before the new one lands.
  function replaceProp(el: N, name: string, prop: Prop): void {
    const hadHandler = unbindHandler(el, name);
    if (!hadHandler && prop.kind === 'handler') host.removeAttribute(el, name);
    setProp(el, name, prop);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Build / release
  // ───────────────────────────────────────────────────────────────────────────

  function build(node: VNode): N {
    if (isTextNode(node)) return host.createText(node.text);
    const el = host.createElement(node.tag);
    for (const name of Object.keys(node.props)) {
      setProp(el, name, node.props[name]);
    }
    for (const child of node.children) host.insert(build(child), el, null);
    return el;
  }

  function release(node: N): void {
    const map = listeners.get(node);
    if (map) {
      for (const entry of map.values()) {
        host.removeListener(node, entry.event, entry.wrapped);
      }
      listeners.delete(node);
    }
    if (host.isText(node)) return;
    for (const child of host.childNodes(node)) release(child);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Planning
  // ───────────────────────────────────────────────────────────────────────────

  function shadowOfHost(node: N): Shadow<N> {
    return { host: node, vnode: null, text: host.isText(node), children: null };
  }

  function shadowOfVNode(node: VNode): Shadow<N> {
    return { host: null, vnode: node, text: isTextNode(node), children: null };
  }

  function childrenOf(shadow: Shadow<N>): Shadow<N>[] {
    if (!shadow.children) {
      if (shadow.host) {
        shadow.children = host.childNodes(shadow.host).map(shadowOfHost);
      } else if (shadow.vnode) {
        shadow.children = shadow.vnode.children.map(shadowOfVNode);
      } else {
        shadow.children = [];
      }
    }
    return shadow.children;
  }

  function plan(handle: LiveHandle<N>, patches: readonly Patch[]): void {
    let root: Shadow<N> | null = handle.root ? shadowOfHost(handle.root) : null;

    patches.forEach((patch, index) => {
      const fail = (reason: string): never => {
        throw new PatchApplicationError(
          `${describePatch(patch, index)}: ${reason}`,
          index
        );
      };

      const walk = (path: PatchPath): Shadow<N> => {
        if (!root) return fail('there is no live root');
        let current: Shadow<N> = root;
        for (let depth = 0; depth < path.length; depth++) {
          const seg = path[depth];
          const kids = current.text ? [] : childrenOf(current);
          if (!Number.isInteger(seg) || seg < 0 || seg >= kids.length) {
            return fail(`no live node at depth ${depth} (index ${seg})`);
          }
          current = kids[seg];
        }
        return current;
      };

      if (patch.type === 'create' || patch.type === 'replace') {
        assertTree(patch.node);
      }

      switch (patch.type) {
        case 'update-props': {
          if (walk(patch.path).text) fail('cannot set props on a text node');
          return;
        }
        case 'set-text': {
          if (!walk(patch.path).text) fail('target is not a text node');
          return;
        }
        case 'reorder': {
          const target = walk(patch.path);
          if (target.text) fail('text nodes have no children to reorder');
          const kids = childrenOf(target);
          if (!isPermutation(patch.order, kids.length)) {
            fail(`order does not permute the ${kids.length} live children`);
          }
          target.children = patch.order.map((i) => kids[i]);
          return;
        }
        default:
          break;
      }

      // create / remove / replace
      if (patch.path.length === 0) {
        if (patch.type === 'create') {
          if (root) fail('a live root already exists');
          root = shadowOfVNode(patch.node);
        } else {
          walk(patch.path);
          root = patch.type === 'replace' ? shadowOfVNode(patch.node) : null;
        }
        return;
      }

      const parent = walk(patch.path.slice(0, -1));
      if (parent.text) fail('parent is a text node');
      const kids = childrenOf(parent);
      const idx = patch.path[patch.path.length - 1];
      const limit = patch.type === 'create' ? kids.length : kids.length - 1;
      if (!Number.isInteger(idx) || idx < 0 || idx > limit) {
        fail(`index ${idx} is out of range (${kids.length} live children)`);
      }

      if (patch.type === 'create') {
        kids.splice(idx, 0, shadowOfVNode(patch.node));
      } else if (patch.type === 'replace') {
        kids[idx] = shadowOfVNode(patch.node);
      } else {
        kids.splice(idx, 1);
      }
    });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Commit
  // ───────────────────────────────────────────────────────────────────────────

  function resolve(handle: LiveHandle<N>, path: PatchPath): N {
    let current = handle.root;
    if (!current) throw new PatchApplicationError('There is no live root');
    for (const seg of path) {
      const kids = host.childNodes(current);
      if (seg >= kids.length) {
        throw new PatchApplicationError(
          `Live tree changed underneath the patch list at index ${seg}`
        );
      }
      current = kids[seg];
    }
    return current;
  }

  function reorderChildren(parent: N, order: readonly number[]): void {
    const kids = host.childNodes(parent);
    const target = order.map((i) => kids[i]);
    const stable = new Set(longestIncreasingSubsequence(order));
    for (let j = target.length - 1; j >= 0; j--) {
      if (stable.has(j)) continue;
      const anchor = j + 1 < target.length ? target[j + 1] : null;
      host.insert(target[j], parent, anchor);
    }
  }

  function commit(handle: LiveHandle<N>, patch: Patch): void {
    const path = patch.path;
    switch (patch.type) {
      case 'create': {
        const node = build(patch.node);
        if (path.length === 0) {
          if (handle.container) host.insert(node, handle.container, null);
          handle.root = node;
          return;
        }
        const parent = resolve(handle, path.slice(0, -1));
        const kids = host.childNodes(parent);
        const idx = path[path.length - 1];
        host.insert(node, parent, idx < kids.length ? kids[idx] : null);
        return;
      }
      case 'remove': {
        const target = resolve(handle, path);
        release(target);
        host.remove(target);
        if (path.length === 0) handle.root = null;
        return;
      }
      case 'replace': {
        const previous = resolve(handle, path);
        const node = build(patch.node);
        const parent = host.parentNode(previous);
        if (parent) host.insert(node, parent, previous);
        release(previous);
        host.remove(previous);
        if (path.length === 0) handle.root = node;
        return;
      }
      case 'update-props': {
        const el = resolve(handle, path);
        for (const name of patch.removed) clearProp(el, name);
        for (const name of Object.keys(patch.added)) {
          replaceProp(el, name, patch.added[name]);
        }
        return;
      }
      case 'set-text':
        host.setText(resolve(handle, path), patch.text);
        return;
      case 'reorder':
        reorderChildren(resolve(handle, path), patch.order);
        return;
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Public API
  // ───────────────────────────────────────────────────────────────────────────

  function applyPatches(handle: LiveHandle<N>, patches: readonly Patch[]): void {
    if (busy.has(handle)) {
      throw new PatchApplicationError(
        'applyPatches() re-entered while a patch list is being applied to the same tree'
      );
    }
    if (patches.length === 0) return;

    busy.add(handle);
    const started = now();
    try {
      plan(handle, patches);
      patches.forEach((patch, index) => {
        try {
          commit(handle, patch);
        } catch (error) {
          if (error instanceof PatchApplicationError) throw error;
          throw new PatchApplicationError(
            `${describePatch(patch, index)}: host rejected the mutation`,
            index,
            { cause: error }
          );
        }
      });
    } finally {
      busy.delete(handle);
    }

    if (isDebugEnabled()) {
      logger.debug(
        `[Trellis][patch] applied ${patches.length} patch(es) in ${(now() - started).toFixed(2)}ms`
      );
    }
  }

  return {
    host,

    instantiate(node) {
      assertTree(node);
      return new LiveHandle<N>(null, build(node));
    },

    mount(container, node) {
      assertTree(node);
      const root = build(node);
      host.insert(root, container, null);
      return new LiveHandle<N>(container, root);
    },

    applyPatches,

    unmount(handle) {
      const root = handle.root;
      if (!root) return;
      release(root);
      host.remove(root);
      handle.root = null;
    },
  };
}
