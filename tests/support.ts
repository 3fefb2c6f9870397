/**
 * Shared fixtures for the test suite: a virtual host harness and a seeded
 * random tree generator.
 */

import { EventBinder } from '../src/core/events.js';
import type { DecodeError } from '../src/core/errors.js';
import { element, elementNS, keyed, text } from '../src/core/node.js';
import type { VNode } from '../src/core/node.js';
import { attribute, attributeNS, on, property, style } from '../src/core/properties.js';
import type { Decoder, Property } from '../src/core/properties.js';
import { render } from '../src/core/render.js';
import { ok } from '../src/core/result.js';
import { SVG_NS, XLINK_NS } from '../src/core/symbols.js';
import { VirtualRenderer } from '../src/renderers/virtual.js';
import type { VirtualJSON, VirtualNode } from '../src/renderers/virtual.js';
import type { IRendererAdapter } from '../src/renderers/types.js';

export interface Harness<Msg> {
  renderer: VirtualRenderer;
  binder: EventBinder<VirtualNode, Msg>;
  container: VirtualNode;
  messages: Msg[];
  decodeErrors: DecodeError[];
}

export function createHarness<Msg>(): Harness<Msg> {
  const renderer = new VirtualRenderer();
  const messages: Msg[] = [];
  const decodeErrors: DecodeError[] = [];
  const binder = new EventBinder<VirtualNode, Msg>(
    { send: (msg) => messages.push(msg) },
    (error) => decodeErrors.push(error)
  );
  return { renderer, binder, container: renderer.getRoot(), messages, decodeErrors };
}

/**
 * Render `tree` and append it to the harness container.
 */
export function mountTree<Msg>(harness: Harness<Msg>, tree: VNode<Msg>): VirtualNode {
  return mountWith(harness.renderer, harness.container, harness.binder, tree);
}

export function mountWith<H extends object, Msg>(
  renderer: IRendererAdapter<H>,
  container: H,
  binder: EventBinder<H, Msg>,
  tree: VNode<Msg>
): H {
  const result = render(renderer, tree, binder);
  if (!result.ok) throw result.error;
  renderer.appendChild(container, result.value);
  return result.value;
}

/** toJSON of a fresh render of `tree` */
export function snapshot<Msg>(tree: VNode<Msg>): VirtualJSON {
  const harness = createHarness<Msg>();
  return harness.renderer.toJSON(mountTree(harness, tree));
}

// === RANDOM TREES ===

/** mulberry32 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const clickA: Decoder<string> = () => ok('a');
const clickB: Decoder<string> = () => ok('b');

export interface RandomTreeOptions {
  /** Include inline styles and properties (off for DOM comparisons) */
  styles?: boolean;
}

function pick<T>(rand: () => number, items: readonly T[]): T {
  return items[Math.floor(rand() * items.length)];
}

function randomProperties(rand: () => number, options: RandomTreeOptions): Property<string>[] {
  const props: Property<string>[] = [];
  if (rand() < 0.5) props.push(attribute('id', pick(rand, ['a', 'b', 'c'])));
  if (rand() < 0.5) props.push(attribute('class', pick(rand, ['x', 'y'])));
  if (rand() < 0.3) props.push(attribute('title', pick(rand, ['t1', 't2'])));
  if (rand() < 0.2) props.push(attributeNS(XLINK_NS, 'xlink:href', pick(rand, ['#p', '#q'])));
  if (rand() < 0.3) props.push(on('click', pick(rand, [clickA, clickB])));
  if (options.styles) {
    if (rand() < 0.3) props.push(style([['color', pick(rand, ['red', 'blue'])]]));
    if (rand() < 0.2) props.push(property('value', pick(rand, ['v1', 'v2'])));
  }
  return props;
}

function shuffled<T>(rand: () => number, items: readonly T[]): T[] {
  const copy = items.slice();
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(rand() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

const KEY_POOL = ['k0', 'k1', 'k2', 'k3', 'k4', 'k5'];

export function randomTree(
  rand: () => number,
  depth: number,
  options: RandomTreeOptions = {}
): VNode<string> {
  const roll = rand();
  if (depth === 0 || roll < 0.25) {
    return text(pick(rand, ['one', 'two', 'three']));
  }

  const tag = pick(rand, ['div', 'span', 'p']);
  const props = randomProperties(rand, options);
  const count = Math.floor(rand() * 5);

  if (roll < 0.55) {
    const keys = shuffled(rand, KEY_POOL).slice(0, count);
    return keyed(tag, props, keys.map((key) => [key, randomTree(rand, depth - 1, options)] as const));
  }

  const children: VNode<string>[] = [];
  for (let i = 0; i < count; i++) {
    children.push(randomTree(rand, depth - 1, options));
  }
  return roll < 0.6
    ? elementNS(SVG_NS, 'g', props, children)
    : element(tag, props, children);
}
