import type { HostOps } from './host';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

function isElementNode(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isInput(el: Element): el is HTMLInputElement {
  return el.tagName.toLowerCase() === 'input';
}

function isFormControl(
  el: Element
): el is HTMLInputElement | HTMLTextAreaElement | HTMLSelectElement {
  const tag = el.tagName.toLowerCase();
  return tag === 'input' || tag === 'textarea' || tag === 'select';
}

function expectElement(node: Node, op: string): Element {
  if (!isElementNode(node)) {
    throw new TypeError(
      `${op}: expected an element, got node type ${node.nodeType}`
    );
  }
  return node;
}

/**
 * Apply value/checked to the live property as well as the attribute, so a
 * re-render actually changes what a form control shows.
 */
function applyFormControlProp(
  el: Element,
  name: string,
  value: string | number | true
): void {
  if (name === 'value' && isFormControl(el)) {
    el.value = value === true ? '' : String(value);
  } else if (name === 'checked' && isInput(el)) {
    el.checked = true;
  }
}

export function createDomHost(doc: Document = document): HostOps<Node> {
  return {
    createElement: (tag) => doc.createElement(tag),

    createText: (text) => doc.createTextNode(text),

    setText: (node, text) => {
      node.nodeValue = text;
    },

    isText: (node) => node.nodeType === TEXT_NODE,

    insert: (child, parent, anchor) => {
      parent.insertBefore(child, anchor);
    },

    remove: (child) => {
      const parent = child.parentNode;
      if (parent) parent.removeChild(child);
    },

    parentNode: (node) => node.parentNode,

    childNodes: (parent) => Array.from(parent.childNodes),

    setAttribute: (node, name, value) => {
      const el = expectElement(node, 'setAttribute');
      el.setAttribute(name, value === true ? '' : String(value));
      if (name === 'value' || name === 'checked') {
        applyFormControlProp(el, name, value);
      }
    },

    removeAttribute: (node, name) => {
      const el = expectElement(node, 'removeAttribute');
      el.removeAttribute(name);
      if (name === 'checked' && isInput(el)) el.checked = false;
    },

    addListener: (node, event, listener) => {
      node.addEventListener(event, listener, getPassiveOptions(event));
    },

    removeListener: (node, event, listener) => {
      node.removeEventListener(event, listener);
    },
  };
}

/**
 * Scroll, wheel and touch listeners are registered passive.
 */
export function getPassiveOptions(
  eventName: string
): AddEventListenerOptions | undefined {
  if (
    eventName === 'wheel' ||
    eventName === 'scroll' ||
    eventName.startsWith('touch')
  ) {
    return { passive: true };
  }
  return undefined;
}
