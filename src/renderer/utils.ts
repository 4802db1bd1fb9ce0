/**
 * Shared utilities for the renderer module.
 */

/**
 * Parse an event prop name (e.g., 'onClick') to its DOM event name (e.g., 'click')
 */
export function parseEventName(propName: string): string | null {
  if (!propName.startsWith('on') || propName.length <= 2) return null;
  return (
    propName.slice(2).charAt(0).toLowerCase() + propName.slice(3).toLowerCase()
  );
}

/**
 * Get current high-resolution timestamp
 */
export function now(): number {
  return typeof performance !== 'undefined' && performance.now
    ? performance.now()
    : Date.now();
}
