export { renderToString, renderToSink, renderToStream } from './render';
export { renderAttrs, styleToCss } from './attrs';
export {
  VOID_ELEMENTS,
  isVoidElement,
  escapeText,
  escapeAttr,
} from './escape';
export { StringSink, StreamSink, type RenderSink } from './sink';
