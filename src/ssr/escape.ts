/**
 * Escaping for markup produced by the string renderer.
 */

/** Elements written as `<tag>` with no closing tag and no children. */
export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr',
]);

export function isVoidElement(tag: string): boolean {
  return VOID_ELEMENTS.has(tag.toLowerCase());
}

const ENTITIES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

const TEXT_RE = /[&<>]/g;
const ATTR_RE = /[&"'<>]/g;

const entityFor = (ch: string): string => ENTITIES[ch] ?? ch;

export function escapeText(text: string): string {
  return text.replace(TEXT_RE, entityFor);
}

export function escapeAttr(value: string): string {
  return value.replace(ATTR_RE, entityFor);
}

const CSS_BREAKOUT_RE = /[{}<>\\;]/g;
const CSS_ACTIVE_FN_RE = /(?:url|expression|javascript)\s*\(/i;

/**
 * CSS declaration value with breakout characters removed. Values that call
 * url(), expression() or javascript() render as nothing.
 */
export function escapeCssValue(value: string): string {
  if (CSS_ACTIVE_FN_RE.test(value)) return '';
  return value.replace(CSS_BREAKOUT_RE, '');
}

/** `backgroundColor` -> `background-color`. */
export function toKebabCase(prop: string): string {
  return prop.replace(/[A-Z]/g, (m) => `-${m.toLowerCase()}`);
}
