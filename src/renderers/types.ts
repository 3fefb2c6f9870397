/**
 * treepatch Renderer Types
 *
 * Defines the interface for pluggable host surfaces.
 * This lets the engine run against different targets:
 * - Web (Direct DOM via DOMRenderer)
 * - Native or terminal bridges (Virtual/Abstract tree via VirtualRenderer)
 * - Test environments (fast, deterministic in-memory trees)
 *
 * The engine never inspects a handle itself: every read or write goes
 * through the adapter.
 */

/**
 * The part of a host event the engine touches. Everything else is handed
 * to the listener's decoder untouched.
 */
export interface HostEvent {
  stopPropagation(): void;
  preventDefault(): void;
}

export type HostListener = (event: HostEvent) => void;

/**
 * Host Adapter Interface
 *
 * The contract any rendering surface must fulfill. `H` is the host's handle
 * type (a DOM `Node`, a virtual node, a native view id, ...).
 *
 * Methods throw when the host rejects an operation (an invalid tag name,
 * an invalid attribute name). The renderer and patcher turn those
 * exceptions into ConstructionError results.
 */
export interface IRendererAdapter<H> {
  /**
   * Create an element node
   * @param namespace - Namespace URI, or null for the host default
   */
  createElement(tagName: string, namespace: string | null): H;

  createTextNode(text: string): H;

  /** Set the content of a text node */
  setTextContent(node: H, text: string): void;

  getTextContent(node: H): string;

  getAttribute(node: H, name: string): string | null;
  setAttribute(node: H, name: string, value: string): void;
  removeAttribute(node: H, name: string): void;

  getAttributeNS(node: H, namespace: string, name: string): string | null;
  setAttributeNS(node: H, namespace: string, name: string, value: string): void;
  removeAttributeNS(node: H, namespace: string, name: string): void;

  /** Read a host property (e.g. `value`, `checked`) */
  getProperty(node: H, name: string): unknown;
  setProperty(node: H, name: string, value: unknown): void;
  /** Reset a host property to its blank state */
  removeProperty(node: H, name: string): void;

  /** Read one inline style declaration; empty string when unset */
  getStyle(node: H, name: string): string;
  setStyle(node: H, name: string, value: string): void;
  removeStyle(node: H, name: string): void;

  /** Snapshot of a node's children in order */
  childNodes(node: H): readonly H[];
  parentNode(node: H): H | null;
  nextSibling(node: H): H | null;

  /**
   * Insert a node before a reference node
   * @param refNode - Reference node (insert before this), or null to append
   */
  insertBefore(parent: H, newNode: H, refNode: H | null): void;
  appendChild(parent: H, child: H): void;

  /** Remove a node from its parent; no-op for detached nodes */
  removeChild(node: H): void;

  /** Put `newNode` where `oldNode` is; no-op for a detached `oldNode` */
  replaceWith(oldNode: H, newNode: H): void;

  addEventListener(node: H, event: string, handler: HostListener): void;
  removeEventListener(node: H, event: string, handler: HostListener): void;

  /** Check if running against a browser DOM */
  readonly isBrowser: boolean;
}

/**
 * Renderer configuration options
 */
export interface RendererOptions {
  /** Trace host operations with console.log */
  debug?: boolean;
}
