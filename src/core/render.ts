/**
 * treepatch Core - Renderer
 *
 * Builds a host tree from a node tree in a single top-down pass: thunks are
 * forced, elements created (namespaced when asked), facts applied,
 * listeners attached and children appended.
 *
 * The fact appliers are shared with the patcher. They return an undo step
 * for the listener bookkeeping they change; host-side changes are undone by
 * whatever journal wraps the host.
 */

import { ConstructionError } from './errors.js';
import type { EventBinder } from './events.js';
import { childNodes, resolve } from './node.js';
import type { VNode } from './node.js';
import type { Fact } from './properties.js';
import { err, ok } from './result.js';
import type { Result } from './result.js';
import { ELEMENT, KEYED } from './symbols.js';
import type { IRendererAdapter } from '../renderers/types.js';

const noop = (): void => {};

/**
 * Render `node` into a fresh, detached host tree.
 */
export function render<H extends object, Msg>(
  host: IRendererAdapter<H>,
  node: VNode<Msg>,
  binder: EventBinder<H, Msg>
): Result<H, ConstructionError> {
  try {
    return ok(renderNode(host, node, binder));
  } catch (error) {
    if (error instanceof ConstructionError) return err(error);
    throw error;
  }
}

/**
 * Throwing variant of `render`, for callers that collect failures themselves.
 * @throws ConstructionError when the host rejects an operation
 */
export function renderNode<H extends object, Msg>(
  host: IRendererAdapter<H>,
  node: VNode<Msg>,
  binder: EventBinder<H, Msg>
): H {
  const concrete = resolve(node);

  if (concrete.kind !== ELEMENT && concrete.kind !== KEYED) {
    return hostCall('createTextNode', () => host.createTextNode(concrete.content));
  }

  const handle = hostCall(`createElement(${describeTag(concrete.tag, concrete.namespace)})`, () =>
    host.createElement(concrete.tag, concrete.namespace)
  );

  for (const fact of concrete.facts.values()) {
    applyFact(host, binder, handle, fact);
  }

  for (const child of childNodes(concrete)) {
    const childHandle = renderNode(host, child, binder);
    hostCall(`appendChild(${describeTag(concrete.tag, concrete.namespace)})`, () =>
      host.appendChild(handle, childHandle)
    );
  }

  return handle;
}

// === FACT APPLIERS ===

export function applyFact<H extends object, Msg>(
  host: IRendererAdapter<H>,
  binder: EventBinder<H, Msg>,
  handle: H,
  fact: Fact<Msg>
): () => void {
  return hostCall(`set ${fact.key}`, () => {
    switch (fact.kind) {
      case 'attribute':
        host.setAttribute(handle, fact.name, fact.value);
        return noop;
      case 'attribute-ns':
        host.setAttributeNS(handle, fact.namespace, fact.name, fact.value);
        return noop;
      case 'property':
        host.setProperty(handle, fact.name, fact.value);
        return noop;
      case 'style':
        host.setStyle(handle, fact.name, fact.value);
        return noop;
      case 'event':
        return binder.attach(host, handle, fact);
    }
  });
}

export function removeFact<H extends object, Msg>(
  host: IRendererAdapter<H>,
  binder: EventBinder<H, Msg>,
  handle: H,
  fact: Fact<Msg>
): () => void {
  return hostCall(`remove ${fact.key}`, () => {
    switch (fact.kind) {
      case 'attribute':
        host.removeAttribute(handle, fact.name);
        return noop;
      case 'attribute-ns':
        host.removeAttributeNS(handle, fact.namespace, fact.name);
        return noop;
      case 'property':
        host.removeProperty(handle, fact.name);
        return noop;
      case 'style':
        host.removeStyle(handle, fact.name);
        return noop;
      case 'event':
        return binder.detach(host, handle, fact.name);
    }
  });
}

/**
 * Replace `previous` by `fact` (same key). Listeners keep their host
 * registration; only the decoder and options are swapped.
 */
export function updateFact<H extends object, Msg>(
  host: IRendererAdapter<H>,
  binder: EventBinder<H, Msg>,
  handle: H,
  previous: Fact<Msg>,
  fact: Fact<Msg>
): () => void {
  if (fact.kind === 'event' && previous.kind === 'event') {
    return binder.update(handle, fact);
  }
  return applyFact(host, binder, handle, fact);
}

// === HELPERS ===

/**
 * Run a host operation, wrapping whatever it throws in a ConstructionError.
 */
export function hostCall<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof ConstructionError) throw error;
    throw new ConstructionError(operation, { cause: error });
  }
}

function describeTag(tag: string, namespace: string | null): string {
  return namespace === null ? `<${tag}>` : `<${tag}> in ${namespace}`;
}
