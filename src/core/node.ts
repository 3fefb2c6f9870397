/**
 * treepatch Core - Node Model
 *
 * Immutable description of a UI tree. Application view code builds a fresh
 * tree on every update; the differ compares it with the previous one.
 *
 * Node kinds:
 * - element: tag, properties, ordered children
 * - keyed: like element, but each child carries a stable key
 * - text: text content
 * - thunk: deferred construction guarded by a fingerprint
 *
 * @example
 * const view = (model: Model) =>
 *   element('ul', [className('todos')],
 *     model.items.map((item) => element('li', [], [text(item.title)])));
 */

import { structuralEqual } from './equality.js';
import { organizeFacts, mapProperty } from './properties.js';
import type { Facts, Property } from './properties.js';
import { ELEMENT, KEYED, TEXT, THUNK, isDev } from './symbols.js';

export interface VElement<Msg> {
  readonly kind: typeof ELEMENT;
  readonly tag: string;
  readonly namespace: string | null;
  readonly properties: readonly Property<Msg>[];
  readonly facts: Facts<Msg>;
  readonly children: readonly VNode<Msg>[];
}

export interface KeyedChild<Msg> {
  readonly key: string;
  readonly node: VNode<Msg>;
}

export interface VKeyed<Msg> {
  readonly kind: typeof KEYED;
  readonly tag: string;
  readonly namespace: string | null;
  readonly properties: readonly Property<Msg>[];
  readonly facts: Facts<Msg>;
  readonly children: readonly KeyedChild<Msg>[];
}

export interface VText {
  readonly kind: typeof TEXT;
  readonly content: string;
}

export type ThunkEquality = 'reference' | 'structural';

/** Memo cell filled the first time a thunk is forced */
interface ThunkCell<Msg> {
  node: VNode<Msg> | undefined;
}

export interface VThunk<Msg> {
  readonly kind: typeof THUNK;
  readonly fingerprint: readonly unknown[];
  readonly equality: ThunkEquality;
  readonly builder: () => VNode<Msg>;
  /** @internal */
  readonly cell: ThunkCell<Msg>;
}

export type VNode<Msg> = VElement<Msg> | VKeyed<Msg> | VText | VThunk<Msg>;

/** A node with thunks resolved away */
export type ConcreteNode<Msg> = VElement<Msg> | VKeyed<Msg> | VText;

export type KeyedEntry<Msg> = KeyedChild<Msg> | readonly [key: string, node: VNode<Msg>];

// === CONSTRUCTORS ===

export function element<Msg>(
  tag: string,
  properties: readonly Property<Msg>[] = [],
  children: readonly VNode<Msg>[] = []
): VElement<Msg> {
  return createElementNode(tag, null, properties, children);
}

export function elementNS<Msg>(
  namespace: string,
  tag: string,
  properties: readonly Property<Msg>[] = [],
  children: readonly VNode<Msg>[] = []
): VElement<Msg> {
  return createElementNode(tag, namespace, properties, children);
}

/**
 * Element whose children carry keys. Keys identify children across renders
 * so that reordering a list moves nodes instead of rebuilding them.
 *
 * Duplicate keys: the last entry wins. Earlier entries with the same key are
 * dropped and a warning is printed in development.
 */
export function keyed<Msg>(
  tag: string,
  properties: readonly Property<Msg>[] = [],
  children: readonly KeyedEntry<Msg>[] = []
): VKeyed<Msg> {
  return createKeyedNode(tag, null, properties, children);
}

export function keyedNS<Msg>(
  namespace: string,
  tag: string,
  properties: readonly Property<Msg>[] = [],
  children: readonly KeyedEntry<Msg>[] = []
): VKeyed<Msg> {
  return createKeyedNode(tag, namespace, properties, children);
}

export function text(content: string): VText {
  const node: VText = { kind: TEXT, content };
  return Object.freeze(node);
}

/**
 * Deferred node. The differ skips the subtree entirely when the previous
 * render used the same function with the same arguments (by reference).
 *
 * @example
 * lazy(viewRow, row)  // rebuilt only when `row` is a different object
 */
export function lazy<Msg, Args extends unknown[]>(
  fn: (...args: Args) => VNode<Msg>,
  ...args: Args
): VThunk<Msg> {
  return createThunk([fn, ...args], 'reference', () => fn(...args));
}

/**
 * Deferred node with configurable fingerprint equality. With
 * `equality: 'structural'`, arguments are compared by content.
 */
export function lazyWith<Msg, Args extends unknown[]>(
  options: { equality: ThunkEquality },
  fn: (...args: Args) => VNode<Msg>,
  ...args: Args
): VThunk<Msg> {
  return createThunk([fn, ...args], options.equality, () => fn(...args));
}

function createElementNode<Msg>(
  tag: string,
  namespace: string | null,
  properties: readonly Property<Msg>[],
  children: readonly VNode<Msg>[]
): VElement<Msg> {
  const node: VElement<Msg> = {
    kind: ELEMENT,
    tag,
    namespace,
    properties: Object.freeze(properties.slice()),
    facts: organizeFacts(properties),
    children: Object.freeze(children.slice())
  };
  return Object.freeze(node);
}

function createKeyedNode<Msg>(
  tag: string,
  namespace: string | null,
  properties: readonly Property<Msg>[],
  entries: readonly KeyedEntry<Msg>[]
): VKeyed<Msg> {
  const node: VKeyed<Msg> = {
    kind: KEYED,
    tag,
    namespace,
    properties: Object.freeze(properties.slice()),
    facts: organizeFacts(properties),
    children: Object.freeze(dedupeKeys(tag, entries.map(toKeyedChild)))
  };
  return Object.freeze(node);
}

function toKeyedChild<Msg>(entry: KeyedEntry<Msg>): KeyedChild<Msg> {
  if ('key' in entry) return Object.freeze({ key: entry.key, node: entry.node });
  const [key, node] = entry;
  return Object.freeze({ key, node });
}

/**
 * Last-write-wins: keep only the final occurrence of every key, each at its
 * own position.
 */
function dedupeKeys<Msg>(tag: string, children: KeyedChild<Msg>[]): KeyedChild<Msg>[] {
  const lastIndex = new Map<string, number>();
  for (let i = 0; i < children.length; i++) {
    lastIndex.set(children[i].key, i);
  }
  if (lastIndex.size === children.length) return children;

  if (isDev()) {
    const duplicates = new Set<string>();
    children.forEach((child, i) => {
      if (lastIndex.get(child.key) !== i) duplicates.add(child.key);
    });
    console.warn(
      `treepatch: duplicate key(s) ${[...duplicates].map((k) => `"${k}"`).join(', ')} in keyed <${tag}>.\n` +
      'Only the last child with each key is kept.'
    );
  }

  return children.filter((child, i) => lastIndex.get(child.key) === i);
}

function createThunk<Msg>(
  fingerprint: readonly unknown[],
  equality: ThunkEquality,
  builder: () => VNode<Msg>
): VThunk<Msg> {
  const node: VThunk<Msg> = {
    kind: THUNK,
    fingerprint: Object.freeze(fingerprint.slice()),
    equality,
    builder,
    cell: { node: undefined }
  };
  return Object.freeze(node);
}

// === THUNKS ===

/**
 * Build a thunk's node once and remember it.
 */
export function force<Msg>(thunk: VThunk<Msg>): VNode<Msg> {
  if (thunk.cell.node === undefined) {
    thunk.cell.node = thunk.builder();
  }
  return thunk.cell.node;
}

/**
 * Resolve thunks (including thunks returning thunks) to a concrete node.
 */
export function resolve<Msg>(node: VNode<Msg>): ConcreteNode<Msg> {
  let current = node;
  while (current.kind === THUNK) {
    current = force(current);
  }
  return current;
}

/**
 * Whether two thunks are guaranteed to build the same node.
 */
export function sameFingerprint<Msg>(a: VThunk<Msg>, b: VThunk<Msg>): boolean {
  if (a.equality !== b.equality) return false;
  if (a.fingerprint.length !== b.fingerprint.length) return false;
  if (a.equality === 'structural') return structuralEqual(a.fingerprint, b.fingerprint);
  for (let i = 0; i < a.fingerprint.length; i++) {
    if (a.fingerprint[i] !== b.fingerprint[i]) return false;
  }
  return true;
}

/**
 * Let `next` reuse what `previous` has already built.
 */
export function adoptCell<Msg>(previous: VThunk<Msg>, next: VThunk<Msg>): void {
  if (next.cell.node === undefined && previous.cell.node !== undefined) {
    next.cell.node = previous.cell.node;
  }
}

// === TRAVERSAL ===

/** Child nodes of an element in order; empty for text nodes */
export function childNodes<Msg>(node: ConcreteNode<Msg>): readonly VNode<Msg>[] {
  switch (node.kind) {
    case ELEMENT:
      return node.children;
    case KEYED:
      return node.children.map((child) => child.node);
    case TEXT:
      return [];
  }
}

const sizeCache = new WeakMap<object, number>();

/**
 * Number of concrete nodes in a subtree, counting the node itself.
 * Thunks are transparent: they count as the node they build.
 */
export function subtreeSize<Msg>(node: VNode<Msg>): number {
  const cached = sizeCache.get(node);
  if (cached !== undefined) return cached;

  const concrete = resolve(node);
  let size = 1;
  for (const child of childNodes(concrete)) {
    size += subtreeSize(child);
  }
  sizeCache.set(node, size);
  return size;
}

// === MAP ===

/**
 * Relabel every message a tree can produce. The result has the same tags,
 * namespaces, child counts, order and keys as `node`; only listener
 * decoders change, each composed with `f`.
 *
 * A mapped thunk stays lazy: its fingerprint is prefixed by `f`, so it is
 * reused only when the same mapping function is applied again.
 */
export function map<A, B>(f: (msg: A) => B, node: VNode<A>): VNode<B> {
  switch (node.kind) {
    case TEXT:
      return node;
    case ELEMENT:
      return createElementNode(
        node.tag,
        node.namespace,
        node.properties.map((prop) => mapProperty(f, prop)),
        node.children.map((child) => map(f, child))
      );
    case KEYED:
      return createKeyedNode(
        node.tag,
        node.namespace,
        node.properties.map((prop) => mapProperty(f, prop)),
        node.children.map((child) => ({ key: child.key, node: map(f, child.node) }))
      );
    case THUNK: {
      const inner = node;
      return createThunk([f, ...inner.fingerprint], inner.equality, () => map(f, force(inner)));
    }
  }
}
