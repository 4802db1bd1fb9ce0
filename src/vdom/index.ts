export {
  createNode,
  createText,
  h,
  isVNode,
  isTextNode,
  isKey,
  getKey,
  equals,
} from './create';
export { assertTree } from './validate';
export {
  VNODE_TYPE,
  TEXT_TAG,
  type Key,
  type Primitive,
  type StyleMap,
  type EventHandler,
  type AttributeProp,
  type StyleProp,
  type HandlerProp,
  type Prop,
  type PropKind,
  type PropMap,
  type VElement,
  type VText,
  type VNode,
  type PropInput,
  type PropsInput,
  type ChildInput,
} from './types';
