/**
 * Attribute serialization
 */

import type { PropMap, StyleMap } from '../vdom/types';
import { escapeAttr, escapeCssValue, toKebabCase } from './escape';

/**
 * Style map to a single `key:value;` string. camelCase names become
 * kebab-case; custom properties (`--x`) are kept as written.
 */
export function styleToCss(style: StyleMap): string {
  let out = '';
  for (const name of Object.keys(style)) {
    const value = escapeCssValue(String(style[name]));
    if (!value) continue;
    const prop = name.startsWith('--') ? name : toKebabCase(name);
    out += `${prop}:${value};`;
  }
  return out;
}

/**
 * Render props to an attribute string with a leading space per attribute.
 * Handlers have no markup form and are skipped; `true` renders bare,
 * `false`/`null` are omitted.
 */
export function renderAttrs(props: PropMap): string {
  let result = '';
  for (const name of Object.keys(props)) {
    const prop = props[name];
    switch (prop.kind) {
      case 'handler':
        continue;
      case 'style': {
        const css = styleToCss(prop.value);
        if (css) result += ` ${name}="${escapeAttr(css)}"`;
        continue;
      }
      case 'attribute': {
        const value = prop.value;
        if (value === true) result += ` ${name}`;
        else if (value === false || value === null) continue;
        else result += ` ${name}="${escapeAttr(String(value))}"`;
        continue;
      }
    }
  }
  return result;
}
