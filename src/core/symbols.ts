/**
 * treepatch Core - Shared Symbols and Constants
 *
 * Constants used across the node model, differ and patcher.
 * Centralizing these keeps the discriminants and namespaces consistent.
 */

// === NODE KINDS ===
export const ELEMENT = 'element';
export const KEYED = 'keyed';
export const TEXT = 'text';
export const THUNK = 'thunk';

// === NAMESPACES ===
export const SVG_NS = 'http://www.w3.org/2000/svg';
export const XLINK_NS = 'http://www.w3.org/1999/xlink';
export const XML_NS = 'http://www.w3.org/XML/1998/namespace';

// === FACT KEY PREFIXES ===
// A fact key is `${prefix}:${name}`; namespaced attributes use `${namespace}|${name}` as name.
export const ATTRIBUTE_KEY = 'attribute';
export const ATTRIBUTE_NS_KEY = 'attribute-ns';
export const PROPERTY_KEY = 'property';
export const STYLE_KEY = 'style';
export const EVENT_KEY = 'event';

// === PROPERTIES ROUTED THROUGH THE HTML SANITIZER ===
export const HTML_PROPERTIES: ReadonlySet<string> = new Set(['innerHTML', 'outerHTML']);

// === SCHEDULER LIMITS ===
/** Maximum messages delivered by one drain before yielding to a new microtask */
export const MAX_DRAIN_BATCH = 1000;

/**
 * Development mode check. Warnings are printed unless NODE_ENV is 'production'.
 */
export function isDev(): boolean {
  return typeof process === 'undefined' || process.env?.NODE_ENV !== 'production';
}
