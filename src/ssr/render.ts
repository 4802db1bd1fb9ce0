import { logger } from '../dev/logger';
import { isTextNode } from '../vdom/create';
import { assertTree } from '../vdom/validate';
import type { VNode } from '../vdom/types';
import { renderAttrs } from './attrs';
import { escapeText, isVoidElement } from './escape';
import { StreamSink, StringSink, type RenderSink } from './sink';

function renderNodeToSink(node: VNode, sink: RenderSink): void {
  if (isTextNode(node)) {
    sink.write(escapeText(node.text));
    return;
  }

  const tag = node.tag;
  const attrs = renderAttrs(node.props);

  if (isVoidElement(tag)) {
    if (node.children.length > 0) {
      logger.warn(
        `[Trellis] <${tag}> is a void element; its ${node.children.length} child node(s) were not rendered`
      );
    }
    sink.write(`<${tag}${attrs} />`);
    return;
  }

  sink.write(`<${tag}${attrs}>`);
  for (const child of node.children) renderNodeToSink(child, sink);
  sink.write(`</${tag}>`);
}

/**
 * Serialize a tree into a sink. The sink is ended once the tree is written.
 *
 * @throws MalformedTreeError
 */
export function renderToSink(node: VNode, sink: RenderSink): void {
  assertTree(node);
  renderNodeToSink(node, sink);
  sink.end();
}

/**
 * Serialize a tree to markup.
 *
 * @example
 * ```ts
 * renderToString(h('p', { class: 'lead', hidden: false }, 'Hi'));
 * // '<p class="lead">Hi</p>'
 * ```
 */
export function renderToString(node: VNode): string {
  const sink = new StringSink();
  renderToSink(node, sink);
  return sink.toString();
}

/**
 * Serialize a tree chunk by chunk, e.g. into an HTTP response.
 */
export function renderToStream(
  node: VNode,
  onChunk: (html: string) => void,
  onComplete: () => void
): void {
  renderToSink(node, new StreamSink(onChunk, onComplete));
}
