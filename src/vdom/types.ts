/**
 * Virtual node model
 *
 * Nodes are plain frozen objects branded with `VNODE_TYPE`. Props are stored
 * as tagged values so serializers and live renderers can branch exhaustively
 * on what a prop is instead of sniffing its runtime type again.
 */

export const VNODE_TYPE: unique symbol = Symbol.for('trellis.vnode');

/** Tag sentinel for text nodes. */
export const TEXT_TAG = '#text';

export type Key = string | number;

export type Primitive = string | number | boolean | null;

export type StyleMap = Readonly<Record<string, string | number>>;

export type EventHandler = (event: Event) => void;

export interface AttributeProp {
  readonly kind: 'attribute';
  readonly value: Primitive;
}

export interface StyleProp {
  readonly kind: 'style';
  readonly value: StyleMap;
}

export interface HandlerProp {
  readonly kind: 'handler';
  readonly value: EventHandler;
}

export type Prop = AttributeProp | StyleProp | HandlerProp;

export type PropKind = Prop['kind'];

export type PropMap = Readonly<Record<string, Prop>>;

export interface VElement {
  readonly $$typeof: typeof VNODE_TYPE;
  readonly tag: string;
  readonly props: PropMap;
  readonly children: readonly VNode[];
  readonly key: Key | null;
}

export interface VText {
  readonly $$typeof: typeof VNODE_TYPE;
  readonly tag: typeof TEXT_TAG;
  readonly text: string;
  readonly props: PropMap;
  readonly children: readonly VNode[];
  readonly key: null;
}

export type VNode = VElement | VText;

/** Raw prop value accepted by `createNode`; normalized into a `Prop`. */
export type PropInput = Primitive | undefined | StyleMap | EventHandler;

export type PropsInput = Readonly<Record<string, PropInput>>;

/** Raw child accepted by `createNode`; strings and numbers become text nodes. */
export type ChildInput =
  | VNode
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly ChildInput[];
