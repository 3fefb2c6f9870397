/**
 * treepatch Renderers - Pluggable host surfaces
 *
 * @example
 * // Web target
 * import { View } from 'treepatch';
 * import { DOMRenderer } from 'treepatch/renderers';
 * const view = new View(document.getElementById('app'), new DOMRenderer(), { onMessage });
 *
 * @example
 * // Tests and server-side rendering
 * import { VirtualRenderer } from 'treepatch/renderers';
 * const renderer = new VirtualRenderer({ debug: true });
 *
 * @module treepatch/renderers
 */

// Type exports
export type {
  HostEvent,
  HostListener,
  IRendererAdapter,
  RendererOptions
} from './types.js';

// DOM Renderer (web target)
export { DOMRenderer } from './dom.js';
export type { DOMRendererOptions } from './dom.js';

// Virtual Renderer (tests, SSR, bridges)
export { VirtualRenderer, createVirtualRenderer } from './virtual.js';
export type { VirtualEvent, VirtualJSON, VirtualNode } from './virtual.js';

// Undo journal used by the patcher
export { Journal } from './journal.js';

export { SafeHTML } from '../core/safe-html.js';
export type { HTMLSanitizer } from '../core/safe-html.js';
