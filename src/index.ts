/**
 * treepatch - Virtual tree diffing and patching
 *
 * Describe the UI as an immutable tree on every update; treepatch computes
 * the minimal edit script against the previous tree and applies it to a
 * host surface (the DOM, or an in-memory tree).
 *
 * @example
 * import { View, element, text, on } from 'treepatch';
 * import { DOMRenderer } from 'treepatch/renderers';
 *
 * const view = new View(document.body, new DOMRenderer(), { onMessage });
 * view.mount(element('button', [on('click', () => ok('clicked'))], [text('Go')]));
 *
 * @module treepatch
 */

// Node model
export {
  element,
  elementNS,
  keyed,
  keyedNS,
  text,
  lazy,
  lazyWith,
  map,
  force,
  resolve,
  subtreeSize
} from './core/node.js';
export type {
  VNode,
  VElement,
  VKeyed,
  VText,
  VThunk,
  KeyedChild,
  KeyedEntry,
  ConcreteNode,
  ThunkEquality
} from './core/node.js';

// Property model
export {
  attribute,
  attributeNS,
  property,
  style,
  on,
  className,
  organizeFacts,
  mapDecoder
} from './core/properties.js';
export type {
  Property,
  Fact,
  Facts,
  Decoder,
  ListenerOptions,
  StyleDeclaration
} from './core/properties.js';

// Diff / patch / render
export { diff } from './core/diff.js';
export { applyPatch } from './core/patcher.js';
export { render, renderNode } from './core/render.js';
export { EMPTY_PATCH, isEmptyPatch, countOps, flattenPatch } from './core/patch.js';
export type { Patch, PatchOp, Move } from './core/patch.js';
export { computeLIS, planKeyed, planMoves, applyMoves } from './core/reconcile.js';

// Events, messages and the view driver
export { EventBinder } from './core/events.js';
export type { MessageSink, DecodeErrorHandler } from './core/events.js';
export { MessageQueue } from './core/scheduler.js';
export type { MessageHandler, MessageQueueOptions } from './core/scheduler.js';
export { View } from './core/view.js';
export type { ViewConfig, ViewOptions } from './core/view.js';

// Errors and results
export {
  TreepatchError,
  DecodeError,
  ConstructionError,
  PatchIndexError,
  isTreepatchError
} from './core/errors.js';
export type { ErrorCode } from './core/errors.js';
export { ok, err, mapResult } from './core/result.js';
export type { Result } from './core/result.js';

export { SafeHTML } from './core/safe-html.js';
export { structuralEqual } from './core/equality.js';

// Constants
export { SVG_NS, XLINK_NS, XML_NS, MAX_DRAIN_BATCH } from './core/symbols.js';
