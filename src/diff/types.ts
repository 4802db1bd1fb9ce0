import type { Prop, VNode } from '../vdom/types';

/**
 * Child-index path from the root to the patched node. Resolved against the
 * live tree as it stands after every earlier patch of the same list.
 */
export type PatchPath = readonly number[];

export interface CreatePatch {
  readonly type: 'create';
  readonly path: PatchPath;
  readonly node: VNode;
}

export interface RemovePatch {
  readonly type: 'remove';
  readonly path: PatchPath;
}

/** Also serves as ReplaceChild: the child index is the last path segment. */
export interface ReplacePatch {
  readonly type: 'replace';
  readonly path: PatchPath;
  readonly node: VNode;
}

export interface UpdatePropsPatch {
  readonly type: 'update-props';
  readonly path: PatchPath;
  readonly added: Readonly<Record<string, Prop>>;
  readonly removed: readonly string[];
}

export interface SetTextPatch {
  readonly type: 'set-text';
  readonly path: PatchPath;
  readonly text: string;
}

/** `order[i]` is the current index of the child that must end up at `i`. */
export interface ReorderPatch {
  readonly type: 'reorder';
  readonly path: PatchPath;
  readonly order: readonly number[];
}

export type Patch =
  | CreatePatch
  | RemovePatch
  | ReplacePatch
  | UpdatePropsPatch
  | SetTextPatch
  | ReorderPatch;

export type PatchType = Patch['type'];
