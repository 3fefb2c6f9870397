/**
 * Virtual Renderer - In-memory host surface
 *
 * A small node tree that mimics the parts of the DOM the engine uses. It
 * enables treepatch to run in:
 * - Test environments (fast, deterministic trees)
 * - Server-side rendering (via `serialize`)
 * - Native or terminal bridges (via `toJSON` snapshots)
 *
 * Behaves like the DOM where it matters to the engine: invalid tag and
 * attribute names throw, inserting a node that already has a parent moves
 * it, and dispatched events bubble up the parent chain.
 */

import { SafeHTML } from '../core/safe-html.js';
import type { HostListener, IRendererAdapter, RendererOptions } from './types.js';

/** Node type constants (matching DOM) */
const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

/** Self-closing HTML tags */
const VOID_ELEMENTS = new Set([
  'area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input',
  'link', 'meta', 'param', 'source', 'track', 'wbr'
]);

/** XML Name production, restricted to what the engine needs to accept */
const VALID_NAME = /^[A-Za-z_:\u00C0-\uFFEF][\w.:\-\u00B7\u00C0-\uFFEF]*$/;

/** Counter for unique node IDs */
let nodeIdCounter = 0;

interface NamespacedAttribute {
  readonly namespace: string;
  /** Qualified name as set, e.g. `xlink:href` */
  readonly name: string;
  readonly value: string;
}

export interface VirtualNode {
  readonly id: number;
  readonly nodeType: typeof ELEMENT_NODE | typeof TEXT_NODE;
  /** Tag name as created; null for text */
  readonly tagName: string | null;
  readonly namespace: string | null;
  /** Text content; null for elements */
  nodeValue: string | null;
  readonly attributes: Map<string, string>;
  /** Keyed by `${namespace}|${localName}` */
  readonly attributesNS: Map<string, NamespacedAttribute>;
  readonly props: Map<string, unknown>;
  readonly style: Map<string, string>;
  readonly listeners: Map<string, HostListener[]>;
  childNodes: VirtualNode[];
  parentNode: VirtualNode | null;
}

/** Event object handed to listeners by `dispatchEvent` */
export interface VirtualEvent {
  readonly type: string;
  readonly target: VirtualNode;
  currentTarget: VirtualNode;
  readonly detail: unknown;
  readonly defaultPrevented: boolean;
  readonly propagationStopped: boolean;
  stopPropagation(): void;
  preventDefault(): void;
}

export type VirtualJSON =
  | { readonly type: 'text'; readonly value: string }
  | {
      readonly type: 'element';
      readonly tag: string;
      readonly namespace: string | null;
      readonly attributes: Record<string, string>;
      readonly props: Record<string, unknown>;
      readonly style: Record<string, string>;
      readonly listeners: string[];
      readonly children: VirtualJSON[];
    };

function createVirtualNode(
  nodeType: typeof ELEMENT_NODE | typeof TEXT_NODE,
  tagName: string | null,
  namespace: string | null,
  nodeValue: string | null
): VirtualNode {
  return {
    id: ++nodeIdCounter,
    nodeType,
    tagName,
    namespace,
    nodeValue,
    attributes: new Map(),
    attributesNS: new Map(),
    props: new Map(),
    style: new Map(),
    listeners: new Map(),
    childNodes: [],
    parentNode: null
  };
}

function assertValidName(name: string, what: string): void {
  if (!VALID_NAME.test(name)) {
    throw new DOMException(`The ${what} "${name}" is not a valid name.`, 'InvalidCharacterError');
  }
}

function localName(name: string): string {
  const colon = name.indexOf(':');
  return colon === -1 ? name : name.slice(colon + 1);
}

function detach(node: VirtualNode): void {
  const parent = node.parentNode;
  if (!parent) return;
  const index = parent.childNodes.indexOf(node);
  if (index !== -1) parent.childNodes.splice(index, 1);
  node.parentNode = null;
}

function contains(ancestor: VirtualNode, node: VirtualNode): boolean {
  let current: VirtualNode | null = node;
  while (current) {
    if (current === ancestor) return true;
    current = current.parentNode;
  }
  return false;
}

/**
 * Escape HTML special characters for serialized output.
 */
function escapeHTML(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function describe(node: VirtualNode): string {
  return node.tagName ?? JSON.stringify(node.nodeValue);
}

/**
 * Serialize a virtual node to an HTML string. No formatting is added.
 * An `innerHTML` property is emitted only when it holds SafeHTML; any other
 * value is escaped as text.
 */
function serializeNode(node: VirtualNode): string {
  if (node.nodeType === TEXT_NODE) {
    return escapeHTML(node.nodeValue ?? '');
  }

  const tag = (node.tagName ?? '').toLowerCase();

  let attrs = '';
  for (const [name, value] of node.attributes) {
    attrs += ` ${name}="${escapeHTML(value)}"`;
  }
  for (const { name, value } of node.attributesNS.values()) {
    attrs += ` ${name}="${escapeHTML(value)}"`;
  }
  if (node.style.size > 0 && !node.attributes.has('style')) {
    const css = [...node.style].map(([name, value]) => `${name}: ${value}`).join('; ');
    attrs += ` style="${escapeHTML(css)}"`;
  }

  if (VOID_ELEMENTS.has(tag)) {
    return `<${tag}${attrs} />`;
  }

  let inner = node.childNodes.map(serializeNode).join('');
  if (node.childNodes.length === 0 && node.props.has('innerHTML')) {
    const html = node.props.get('innerHTML');
    inner = SafeHTML.isSafeHTML(html) ? html.toString() : escapeHTML(String(html ?? ''));
  }

  return `<${tag}${attrs}>${inner}</${tag}>`;
}

function sortedRecord<T>(entries: Iterable<readonly [string, T]>): Record<string, T> {
  const record: Record<string, T> = {};
  for (const [key, value] of [...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    record[key] = value;
  }
  return record;
}

/**
 * Virtual Renderer implementation.
 */
export class VirtualRenderer implements IRendererAdapter<VirtualNode> {
  readonly isBrowser = false;

  /** Root container, standing in for `document.body` */
  private root: VirtualNode;

  /** Debug mode flag */
  private readonly debug: boolean;

  constructor(options: RendererOptions = {}) {
    this.debug = options.debug ?? false;
    this.root = createVirtualNode(ELEMENT_NODE, 'body', null, null);
  }

  createElement(tagName: string, namespace: string | null): VirtualNode {
    assertValidName(tagName, 'tag name');
    if (this.debug) console.log('[VirtualRenderer] createElement:', tagName, namespace ?? '');
    return createVirtualNode(ELEMENT_NODE, tagName, namespace, null);
  }

  createTextNode(text: string): VirtualNode {
    return createVirtualNode(TEXT_NODE, null, null, text);
  }

  setTextContent(node: VirtualNode, text: string): void {
    if (node.nodeType !== TEXT_NODE) {
      // Same as textContent on an element: the children are replaced
      for (const child of node.childNodes) child.parentNode = null;
      node.childNodes = text === '' ? [] : [this.createTextNode(text)];
      for (const child of node.childNodes) child.parentNode = node;
    } else {
      node.nodeValue = text;
    }

    if (this.debug) {
      console.log('[VirtualRenderer] setTextContent:', text);
    }
  }

  getTextContent(node: VirtualNode): string {
    if (node.nodeType === TEXT_NODE) return node.nodeValue ?? '';
    return node.childNodes.map((child) => this.getTextContent(child)).join('');
  }

  getAttribute(node: VirtualNode, name: string): string | null {
    return node.attributes.get(name) ?? null;
  }

  setAttribute(node: VirtualNode, name: string, value: string): void {
    this.assertElement(node, 'setAttribute');
    assertValidName(name, 'attribute name');
    node.attributes.set(name, String(value));

    if (this.debug) {
      console.log('[VirtualRenderer] setAttribute:', node.tagName, name, '=', value);
    }
  }

  removeAttribute(node: VirtualNode, name: string): void {
    node.attributes.delete(name);

    if (this.debug) {
      console.log('[VirtualRenderer] removeAttribute:', node.tagName, name);
    }
  }

  getAttributeNS(node: VirtualNode, namespace: string, name: string): string | null {
    return node.attributesNS.get(`${namespace}|${localName(name)}`)?.value ?? null;
  }

  setAttributeNS(node: VirtualNode, namespace: string, name: string, value: string): void {
    this.assertElement(node, 'setAttributeNS');
    assertValidName(name, 'attribute name');
    node.attributesNS.set(`${namespace}|${localName(name)}`, { namespace, name, value: String(value) });

    if (this.debug) {
      console.log('[VirtualRenderer] setAttributeNS:', node.tagName, namespace, name, '=', value);
    }
  }

  removeAttributeNS(node: VirtualNode, namespace: string, name: string): void {
    node.attributesNS.delete(`${namespace}|${localName(name)}`);
  }

  getProperty(node: VirtualNode, name: string): unknown {
    return node.props.get(name);
  }

  setProperty(node: VirtualNode, name: string, value: unknown): void {
    this.assertElement(node, 'setProperty');
    node.props.set(name, value);

    if (this.debug) {
      console.log('[VirtualRenderer] setProperty:', node.tagName, name);
    }
  }

  removeProperty(node: VirtualNode, name: string): void {
    node.props.delete(name);
  }

  getStyle(node: VirtualNode, name: string): string {
    return node.style.get(name) ?? '';
  }

  setStyle(node: VirtualNode, name: string, value: string): void {
    this.assertElement(node, 'setStyle');
    if (value === '') node.style.delete(name);
    else node.style.set(name, value);
  }

  removeStyle(node: VirtualNode, name: string): void {
    node.style.delete(name);
  }

  childNodes(node: VirtualNode): readonly VirtualNode[] {
    return node.childNodes.slice();
  }

  parentNode(node: VirtualNode): VirtualNode | null {
    return node.parentNode;
  }

  nextSibling(node: VirtualNode): VirtualNode | null {
    const parent = node.parentNode;
    if (!parent) return null;
    return parent.childNodes[parent.childNodes.indexOf(node) + 1] ?? null;
  }

  insertBefore(parent: VirtualNode, newNode: VirtualNode, refNode: VirtualNode | null): void {
    if (parent.nodeType !== ELEMENT_NODE || contains(newNode, parent)) {
      throw new DOMException('The new child cannot be inserted here.', 'HierarchyRequestError');
    }
    if (refNode !== null && refNode.parentNode !== parent) {
      throw new DOMException('The reference node is not a child of this node.', 'NotFoundError');
    }
    if (refNode === newNode) return;

    detach(newNode);
    const index = refNode === null ? parent.childNodes.length : parent.childNodes.indexOf(refNode);
    parent.childNodes.splice(index, 0, newNode);
    newNode.parentNode = parent;

    if (this.debug) {
      console.log('[VirtualRenderer] insertBefore:', describe(newNode), refNode ? describe(refNode) : 'end');
    }
  }

  appendChild(parent: VirtualNode, child: VirtualNode): void {
    this.insertBefore(parent, child, null);
  }

  removeChild(node: VirtualNode): void {
    if (this.debug && node.parentNode) {
      console.log('[VirtualRenderer] removeChild:', describe(node));
    }
    detach(node);
  }

  replaceWith(oldNode: VirtualNode, newNode: VirtualNode): void {
    const parent = oldNode.parentNode;
    if (!parent || oldNode === newNode) return;
    if (contains(newNode, parent)) {
      throw new DOMException('The new child cannot be inserted here.', 'HierarchyRequestError');
    }

    detach(newNode);
    const index = parent.childNodes.indexOf(oldNode);
    parent.childNodes[index] = newNode;
    newNode.parentNode = parent;
    oldNode.parentNode = null;

    if (this.debug) {
      console.log('[VirtualRenderer] replaceWith:', describe(oldNode), '->', describe(newNode));
    }
  }

  addEventListener(node: VirtualNode, event: string, handler: HostListener): void {
    let handlers = node.listeners.get(event);
    if (!handlers) {
      handlers = [];
      node.listeners.set(event, handlers);
    }
    if (!handlers.includes(handler)) handlers.push(handler);
  }

  removeEventListener(node: VirtualNode, event: string, handler: HostListener): void {
    const handlers = node.listeners.get(event);
    if (!handlers) return;

    const index = handlers.indexOf(handler);
    if (index !== -1) handlers.splice(index, 1);
    if (handlers.length === 0) node.listeners.delete(event);
  }

  /**
   * Fire a synthetic event at `node`. It bubbles through the ancestors until
   * a listener stops propagation.
   */
  dispatchEvent(node: VirtualNode, type: string, detail?: unknown): VirtualEvent {
    let propagationStopped = false;
    let defaultPrevented = false;
    const event: VirtualEvent = {
      type,
      target: node,
      currentTarget: node,
      detail,
      get defaultPrevented() { return defaultPrevented; },
      get propagationStopped() { return propagationStopped; },
      stopPropagation: () => { propagationStopped = true; },
      preventDefault: () => { defaultPrevented = true; }
    };

    let current: VirtualNode | null = node;
    while (current && !propagationStopped) {
      const handlers = current.listeners.get(type);
      if (handlers) {
        event.currentTarget = current;
        for (const handler of handlers.slice()) handler(event);
      }
      current = current.parentNode;
    }

    if (this.debug) {
      console.log('[VirtualRenderer] dispatchEvent:', describe(node), type);
    }
    return event;
  }

  serialize(node?: VirtualNode): string {
    return serializeNode(node ?? this.root);
  }

  getRoot(): VirtualNode {
    return this.root;
  }

  /**
   * Snapshot of a subtree as plain data, with attributes, properties and
   * styles in sorted key order. Namespaced attributes are listed under
   * `{namespace}name`.
   */
  toJSON(node?: VirtualNode): VirtualJSON {
    const n = node ?? this.root;

    if (n.nodeType === TEXT_NODE) {
      return { type: 'text', value: n.nodeValue ?? '' };
    }

    const attributes: Array<readonly [string, string]> = [...n.attributes];
    for (const { namespace, name, value } of n.attributesNS.values()) {
      attributes.push([`{${namespace}}${name}`, value]);
    }

    return {
      type: 'element',
      tag: n.tagName ?? '',
      namespace: n.namespace,
      attributes: sortedRecord(attributes),
      props: sortedRecord(n.props),
      style: sortedRecord(n.style),
      listeners: [...n.listeners.keys()].sort(),
      children: n.childNodes.map((child) => this.toJSON(child))
    };
  }

  /**
   * Reset the virtual tree to an empty root.
   */
  reset(): void {
    for (const child of this.root.childNodes) child.parentNode = null;
    this.root = createVirtualNode(ELEMENT_NODE, 'body', null, null);
  }

  private assertElement(node: VirtualNode, operation: string): void {
    if (node.nodeType !== ELEMENT_NODE) {
      throw new TypeError(`${operation} needs an element, got a text node`);
    }
  }
}

/**
 * Create a new VirtualRenderer instance.
 */
export function createVirtualRenderer(options?: RendererOptions): VirtualRenderer {
  return new VirtualRenderer(options);
}
