/**
 * Host operations: everything the live renderer needs from a presentation
 * target. The DOM implementation lives in `dom-host.ts`; tests and other
 * targets can supply their own.
 */

export interface HostOps<N extends object> {
  createElement(tag: string): N;
  createText(text: string): N;
  setText(node: N, text: string): void;
  isText(node: N): boolean;

  /** Insert `child` into `parent` before `anchor` (append when null). */
  insert(child: N, parent: N, anchor: N | null): void;
  /** Detach `child` from its parent, if any. */
  remove(child: N): void;
  parentNode(node: N): N | null;
  childNodes(parent: N): readonly N[];

  /** `true` sets an empty attribute; callers never pass false/null. */
  setAttribute(el: N, name: string, value: string | number | true): void;
  removeAttribute(el: N, name: string): void;

  addListener(el: N, event: string, listener: (event: Event) => void): void;
  removeListener(el: N, event: string, listener: (event: Event) => void): void;
}
