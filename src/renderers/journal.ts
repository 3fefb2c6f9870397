/**
 * Undo journal for host mutations.
 *
 * The patcher commits through a journaled view of the host. Every mutation
 * records how to put things back; if a later host call throws, `rollback()`
 * replays the undo steps in reverse so a failed cycle never leaves the live
 * tree half-patched.
 */

import type { HostListener, IRendererAdapter } from './types.js';

export class Journal<H> {
  private readonly undo: Array<() => void> = [];

  /** Journaled view of the host; reads pass through */
  readonly host: IRendererAdapter<H>;

  constructor(private readonly target: IRendererAdapter<H>) {
    this.host = createJournaledHost(target, (step) => this.undo.push(step));
  }

  /** Record an undo step for a change made outside the host (e.g. listener records) */
  record(step: () => void): void {
    this.undo.push(step);
  }

  get size(): number {
    return this.undo.length;
  }

  /**
   * Revert every recorded change, newest first. Undo steps that fail are
   * collected and rethrown together once every other step has run.
   */
  rollback(): void {
    const failures: unknown[] = [];
    while (this.undo.length > 0) {
      const step = this.undo.pop();
      if (step === undefined) break;
      try {
        step();
      } catch (error) {
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      throw new AggregateError(failures, 'treepatch: rollback could not restore the live tree');
    }
  }

  /** Forget the recorded steps once the cycle succeeded */
  commit(): void {
    this.undo.length = 0;
  }
}

function createJournaledHost<H>(
  target: IRendererAdapter<H>,
  record: (step: () => void) => void
): IRendererAdapter<H> {
  /** Undo step putting `node` back where it is now */
  const restorePosition = (node: H): (() => void) => {
    const parent = target.parentNode(node);
    const next = parent === null ? null : target.nextSibling(node);
    return () => {
      if (parent === null) target.removeChild(node);
      else target.insertBefore(parent, node, next);
    };
  };

  return {
    isBrowser: target.isBrowser,

    createElement: (tagName, namespace) => target.createElement(tagName, namespace),
    createTextNode: (text) => target.createTextNode(text),
    getTextContent: (node) => target.getTextContent(node),
    getAttribute: (node, name) => target.getAttribute(node, name),
    getAttributeNS: (node, namespace, name) => target.getAttributeNS(node, namespace, name),
    getProperty: (node, name) => target.getProperty(node, name),
    getStyle: (node, name) => target.getStyle(node, name),
    childNodes: (node) => target.childNodes(node),
    parentNode: (node) => target.parentNode(node),
    nextSibling: (node) => target.nextSibling(node),

    setTextContent(node, text) {
      const previous = target.getTextContent(node);
      target.setTextContent(node, text);
      record(() => target.setTextContent(node, previous));
    },

    setAttribute(node, name, value) {
      const previous = target.getAttribute(node, name);
      target.setAttribute(node, name, value);
      record(() => restoreAttribute(target, node, name, previous));
    },

    removeAttribute(node, name) {
      const previous = target.getAttribute(node, name);
      target.removeAttribute(node, name);
      record(() => restoreAttribute(target, node, name, previous));
    },

    setAttributeNS(node, namespace, name, value) {
      const previous = target.getAttributeNS(node, namespace, name);
      target.setAttributeNS(node, namespace, name, value);
      record(() => restoreAttributeNS(target, node, namespace, name, previous));
    },

    removeAttributeNS(node, namespace, name) {
      const previous = target.getAttributeNS(node, namespace, name);
      target.removeAttributeNS(node, namespace, name);
      record(() => restoreAttributeNS(target, node, namespace, name, previous));
    },

    setProperty(node, name, value) {
      const previous = target.getProperty(node, name);
      target.setProperty(node, name, value);
      record(() => restoreProperty(target, node, name, previous));
    },

    removeProperty(node, name) {
      const previous = target.getProperty(node, name);
      target.removeProperty(node, name);
      record(() => restoreProperty(target, node, name, previous));
    },

    setStyle(node, name, value) {
      const previous = target.getStyle(node, name);
      target.setStyle(node, name, value);
      record(() => restoreStyle(target, node, name, previous));
    },

    removeStyle(node, name) {
      const previous = target.getStyle(node, name);
      target.removeStyle(node, name);
      record(() => restoreStyle(target, node, name, previous));
    },

    insertBefore(parent, newNode, refNode) {
      const undo = restorePosition(newNode);
      target.insertBefore(parent, newNode, refNode);
      record(undo);
    },

    appendChild(parent, child) {
      const undo = restorePosition(child);
      target.appendChild(parent, child);
      record(undo);
    },

    removeChild(node) {
      const undo = restorePosition(node);
      target.removeChild(node);
      record(undo);
    },

    replaceWith(oldNode, newNode) {
      const undoNew = restorePosition(newNode);
      const undoOld = restorePosition(oldNode);
      target.replaceWith(oldNode, newNode);
      record(() => {
        // Put the old node back first, then return the new one to where it came from
        undoOld();
        undoNew();
      });
    },

    addEventListener(node, event, handler: HostListener) {
      target.addEventListener(node, event, handler);
      record(() => target.removeEventListener(node, event, handler));
    },

    removeEventListener(node, event, handler: HostListener) {
      target.removeEventListener(node, event, handler);
      record(() => target.addEventListener(node, event, handler));
    }
  };
}

function restoreAttribute<H>(host: IRendererAdapter<H>, node: H, name: string, value: string | null): void {
  if (value === null) host.removeAttribute(node, name);
  else host.setAttribute(node, name, value);
}

function restoreAttributeNS<H>(
  host: IRendererAdapter<H>,
  node: H,
  namespace: string,
  name: string,
  value: string | null
): void {
  if (value === null) host.removeAttributeNS(node, namespace, name);
  else host.setAttributeNS(node, namespace, name, value);
}

function restoreProperty<H>(host: IRendererAdapter<H>, node: H, name: string, value: unknown): void {
  if (value === undefined) host.removeProperty(node, name);
  else host.setProperty(node, name, value);
}

function restoreStyle<H>(host: IRendererAdapter<H>, node: H, name: string, value: string): void {
  if (value === '') host.removeStyle(node, name);
  else host.setStyle(node, name, value);
}
