/**
 * DOM Renderer - Browser DOM Adapter
 *
 * A thin layer over the DOM APIs. Works against the global `document` in a
 * browser, or any `Document` passed in (jsdom in tests and on the server).
 *
 * `innerHTML` / `outerHTML` property values are sanitized with DOMPurify
 * before they reach the DOM, unless they are SafeHTML instances.
 */

import DOMPurify from 'dompurify';
import { SafeHTML } from '../core/safe-html.js';
import type { HTMLSanitizer } from '../core/safe-html.js';
import { HTML_PROPERTIES } from '../core/symbols.js';
import type { HostListener, IRendererAdapter, RendererOptions } from './types.js';

export interface DOMRendererOptions extends RendererOptions {
  /** Document to create nodes in (defaults to the global `document`) */
  document?: Document;
  /** Sanitizer for raw HTML strings (defaults to DOMPurify bound to the document's window) */
  sanitizer?: HTMLSanitizer;
}

const ELEMENT_NODE = 1;

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function hasInlineStyle(node: Node): node is Element & ElementCSSInlineStyle {
  return isElement(node) && 'style' in node;
}

/** `xlink:href` -> `href`; namespaced reads and removals take the local name */
function localName(name: string): string {
  const colon = name.indexOf(':');
  return colon === -1 ? name : name.slice(colon + 1);
}

export class DOMRenderer implements IRendererAdapter<Node> {
  readonly isBrowser = true;

  private readonly doc: Document;
  private readonly sanitizer: HTMLSanitizer;
  private readonly debug: boolean;

  constructor(options: DOMRendererOptions = {}) {
    const doc = options.document ?? (typeof document === 'undefined' ? undefined : document);
    if (doc === undefined) {
      throw new TypeError(
        'treepatch: DOMRenderer needs a Document.\n' +
        'Outside a browser, pass one explicitly: new DOMRenderer({ document: new JSDOM().window.document })'
      );
    }
    this.doc = doc;
    this.debug = options.debug ?? false;
    this.sanitizer = options.sanitizer ?? createPurifier(doc);
  }

  createElement(tagName: string, namespace: string | null): Node {
    this.trace('createElement', tagName, namespace ?? '');
    return namespace === null
      ? this.doc.createElement(tagName)
      : this.doc.createElementNS(namespace, tagName);
  }

  createTextNode(text: string): Node {
    return this.doc.createTextNode(text);
  }

  setTextContent(node: Node, text: string): void {
    node.nodeValue = text;
  }

  getTextContent(node: Node): string {
    return node.nodeValue ?? '';
  }

  getAttribute(node: Node, name: string): string | null {
    return isElement(node) ? node.getAttribute(name) : null;
  }

  setAttribute(node: Node, name: string, value: string): void {
    this.trace('setAttribute', name, value);
    this.element(node, 'setAttribute').setAttribute(name, value);
  }

  removeAttribute(node: Node, name: string): void {
    this.element(node, 'removeAttribute').removeAttribute(name);
  }

  getAttributeNS(node: Node, namespace: string, name: string): string | null {
    return isElement(node) ? node.getAttributeNS(namespace, localName(name)) : null;
  }

  setAttributeNS(node: Node, namespace: string, name: string, value: string): void {
    this.trace('setAttributeNS', namespace, name, value);
    this.element(node, 'setAttributeNS').setAttributeNS(namespace, name, value);
  }

  removeAttributeNS(node: Node, namespace: string, name: string): void {
    this.element(node, 'removeAttributeNS').removeAttributeNS(namespace, localName(name));
  }

  getProperty(node: Node, name: string): unknown {
    return Reflect.get(node, name);
  }

  setProperty(node: Node, name: string, value: unknown): void {
    this.trace('setProperty', name);
    const next = HTML_PROPERTIES.has(name) ? this.html(value) : value;
    if (!Reflect.set(node, name, next)) {
      throw new TypeError(`treepatch: property "${name}" is read-only on <${node.nodeName.toLowerCase()}>`);
    }
  }

  removeProperty(node: Node, name: string): void {
    // Expandos live on the node itself; DOM properties are prototype accessors
    if (Object.hasOwn(node, name)) {
      Reflect.deleteProperty(node, name);
      return;
    }
    const blank = typeof Reflect.get(node, name) === 'string' ? '' : null;
    if (!Reflect.set(node, name, blank)) {
      throw new TypeError(`treepatch: property "${name}" is read-only on <${node.nodeName.toLowerCase()}>`);
    }
  }

  getStyle(node: Node, name: string): string {
    return hasInlineStyle(node) ? node.style.getPropertyValue(name) : '';
  }

  setStyle(node: Node, name: string, value: string): void {
    this.trace('setStyle', name, value);
    if (!hasInlineStyle(node)) {
      throw new TypeError(`treepatch: cannot style a ${node.nodeName} node`);
    }
    node.style.setProperty(name, value);
  }

  removeStyle(node: Node, name: string): void {
    if (hasInlineStyle(node)) node.style.removeProperty(name);
  }

  childNodes(node: Node): readonly Node[] {
    return Array.from(node.childNodes);
  }

  parentNode(node: Node): Node | null {
    return node.parentNode;
  }

  nextSibling(node: Node): Node | null {
    return node.nextSibling;
  }

  insertBefore(parent: Node, newNode: Node, refNode: Node | null): void {
    this.trace('insertBefore', newNode.nodeName, refNode?.nodeName ?? 'end');
    parent.insertBefore(newNode, refNode);
  }

  appendChild(parent: Node, child: Node): void {
    parent.appendChild(child);
  }

  removeChild(node: Node): void {
    this.trace('removeChild', node.nodeName);
    node.parentNode?.removeChild(node);
  }

  replaceWith(oldNode: Node, newNode: Node): void {
    this.trace('replaceWith', oldNode.nodeName, newNode.nodeName);
    oldNode.parentNode?.replaceChild(newNode, oldNode);
  }

  addEventListener(node: Node, event: string, handler: HostListener): void {
    this.trace('addEventListener', event);
    node.addEventListener(event, handler);
  }

  removeEventListener(node: Node, event: string, handler: HostListener): void {
    this.trace('removeEventListener', event);
    node.removeEventListener(event, handler);
  }

  private element(node: Node, operation: string): Element {
    if (!isElement(node)) {
      throw new TypeError(`treepatch: ${operation} needs an element, got ${node.nodeName}`);
    }
    return node;
  }

  /** SafeHTML passes through; anything else is sanitized */
  private html(value: unknown): string {
    if (SafeHTML.isSafeHTML(value)) return value.toString();
    return this.sanitizer.sanitize(value === null || value === undefined ? '' : String(value));
  }

  private trace(...args: string[]): void {
    if (this.debug) console.log('[DOMRenderer]', ...args);
  }
}

function createPurifier(doc: Document): HTMLSanitizer {
  const view = doc.defaultView;
  const purify = view === null ? DOMPurify : DOMPurify(view);
  return { sanitize: (html) => purify.sanitize(html) };
}
