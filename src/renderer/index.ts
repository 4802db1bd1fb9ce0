import type { Patch } from '../diff/types';
import type { VNode } from '../vdom/types';
import { createDomHost } from './dom-host';
import { createRenderer, type LiveHandle, type Renderer } from './live';

export {
  createRenderer,
  LiveHandle,
  type Renderer,
  type RendererOptions,
} from './live';
export { createDomHost, getPassiveOptions } from './dom-host';
export type { HostOps } from './host';
export { parseEventName } from './utils';

let domRenderer: Renderer<Node> | null = null;

/**
 * Renderer bound to the global `document`, created on first use.
 */
export function getDomRenderer(): Renderer<Node> {
  if (!domRenderer) domRenderer = createRenderer(createDomHost());
  return domRenderer;
}

export function instantiate(node: VNode): LiveHandle<Node> {
  return getDomRenderer().instantiate(node);
}

export function mount(container: Node, node: VNode): LiveHandle<Node> {
  return getDomRenderer().mount(container, node);
}

export function applyPatches(
  handle: LiveHandle<Node>,
  patches: readonly Patch[]
): void {
  getDomRenderer().applyPatches(handle, patches);
}

export function unmount(handle: LiveHandle<Node>): void {
  getDomRenderer().unmount(handle);
}
