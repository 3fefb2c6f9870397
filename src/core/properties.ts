/**
 * treepatch Core - Property Model
 *
 * Properties describe what gets attached to an element: attributes,
 * namespaced attributes, DOM properties, inline styles and event listeners.
 *
 * A property list is normalized into *facts*: one entry per key, where a
 * later property overrides an earlier one with the same key. Facts are what
 * the differ compares and what patches carry.
 *
 * @example
 * element('input', [
 *   attribute('type', 'text'),
 *   property('value', model.name),
 *   style([['width', '10em']]),
 *   on('input', (event) => readValue(event))
 * ]);
 */

import type { DecodeError } from './errors.js';
import type { Result } from './result.js';
import {
  ATTRIBUTE_KEY,
  ATTRIBUTE_NS_KEY,
  EVENT_KEY,
  PROPERTY_KEY,
  STYLE_KEY
} from './symbols.js';

/**
 * Turns a raw host event into a message. The event is opaque to the engine.
 */
export type Decoder<Msg> = (event: unknown) => Result<Msg, DecodeError>;

export interface ListenerOptions {
  readonly stopPropagation: boolean;
  readonly preventDefault: boolean;
}

export type StyleDeclaration = readonly [property: string, value: string];

export interface AttributeProperty {
  readonly kind: 'attribute';
  readonly name: string;
  readonly value: string;
}

export interface AttributeNSProperty {
  readonly kind: 'attribute-ns';
  readonly namespace: string;
  readonly name: string;
  readonly value: string;
}

export interface ValueProperty {
  readonly kind: 'property';
  readonly name: string;
  readonly value: unknown;
}

export interface StyleProperty {
  readonly kind: 'style';
  readonly declarations: readonly StyleDeclaration[];
}

export interface EventProperty<Msg> {
  readonly kind: 'event';
  readonly name: string;
  readonly options: ListenerOptions;
  readonly decoder: Decoder<Msg>;
}

export type Property<Msg> =
  | AttributeProperty
  | AttributeNSProperty
  | ValueProperty
  | StyleProperty
  | EventProperty<Msg>;

// === FACTS ===

export interface AttributeFact {
  readonly kind: 'attribute';
  readonly key: string;
  readonly name: string;
  readonly value: string;
}

export interface AttributeNSFact {
  readonly kind: 'attribute-ns';
  readonly key: string;
  readonly namespace: string;
  readonly name: string;
  readonly value: string;
}

export interface ValueFact {
  readonly kind: 'property';
  readonly key: string;
  readonly name: string;
  readonly value: unknown;
}

export interface StyleFact {
  readonly kind: 'style';
  readonly key: string;
  readonly name: string;
  readonly value: string;
}

export interface EventFact<Msg> {
  readonly kind: 'event';
  readonly key: string;
  readonly name: string;
  readonly options: ListenerOptions;
  readonly decoder: Decoder<Msg>;
}

export type Fact<Msg> = AttributeFact | AttributeNSFact | ValueFact | StyleFact | EventFact<Msg>;

export type Facts<Msg> = ReadonlyMap<string, Fact<Msg>>;

// === CONSTRUCTORS ===

export function attribute(name: string, value: string): AttributeProperty {
  const prop: AttributeProperty = { kind: 'attribute', name, value };
  return Object.freeze(prop);
}

export function attributeNS(namespace: string, name: string, value: string): AttributeNSProperty {
  const prop: AttributeNSProperty = { kind: 'attribute-ns', namespace, name, value };
  return Object.freeze(prop);
}

export function property(name: string, value: unknown): ValueProperty {
  const prop: ValueProperty = { kind: 'property', name, value };
  return Object.freeze(prop);
}

export function style(declarations: readonly StyleDeclaration[]): StyleProperty {
  const prop: StyleProperty = { kind: 'style', declarations: Object.freeze(declarations.slice()) };
  return Object.freeze(prop);
}

export function on<Msg>(
  name: string,
  decoder: Decoder<Msg>,
  options: Partial<ListenerOptions> = {}
): EventProperty<Msg> {
  const listenerOptions: ListenerOptions = {
    stopPropagation: options.stopPropagation ?? false,
    preventDefault: options.preventDefault ?? false
  };
  const prop: EventProperty<Msg> = { kind: 'event', name, decoder, options: Object.freeze(listenerOptions) };
  return Object.freeze(prop);
}

/** Shorthand for the `class` attribute */
export function className(value: string): AttributeProperty {
  return attribute('class', value);
}

// === NORMALIZATION ===

/**
 * Normalize a property list into facts keyed by kind and name.
 * Insertion order follows the first occurrence of each key; the value is
 * taken from the last occurrence.
 */
export function organizeFacts<Msg>(properties: readonly Property<Msg>[]): Facts<Msg> {
  const facts = new Map<string, Fact<Msg>>();

  for (const prop of properties) {
    switch (prop.kind) {
      case 'attribute': {
        const key = `${ATTRIBUTE_KEY}:${prop.name}`;
        facts.set(key, { kind: 'attribute', key, name: prop.name, value: prop.value });
        break;
      }
      case 'attribute-ns': {
        const key = `${ATTRIBUTE_NS_KEY}:${prop.namespace}|${prop.name}`;
        facts.set(key, {
          kind: 'attribute-ns',
          key,
          namespace: prop.namespace,
          name: prop.name,
          value: prop.value
        });
        break;
      }
      case 'property': {
        const key = `${PROPERTY_KEY}:${prop.name}`;
        facts.set(key, { kind: 'property', key, name: prop.name, value: prop.value });
        break;
      }
      case 'style':
        for (const [name, value] of prop.declarations) {
          const key = `${STYLE_KEY}:${name}`;
          facts.set(key, { kind: 'style', key, name, value });
        }
        break;
      case 'event': {
        const key = `${EVENT_KEY}:${prop.name}`;
        facts.set(key, {
          kind: 'event',
          key,
          name: prop.name,
          options: prop.options,
          decoder: prop.decoder
        });
        break;
      }
    }
  }

  return facts;
}

/**
 * Whether two facts with the same key describe the same host state.
 * Decoders are compared by identity; they are not assumed comparable.
 */
export function factsEqual<Msg>(a: Fact<Msg>, b: Fact<Msg>): boolean {
  switch (a.kind) {
    case 'attribute':
    case 'attribute-ns':
    case 'style':
      return b.kind === a.kind && a.value === b.value;
    case 'property':
      return b.kind === 'property' && Object.is(a.value, b.value);
    case 'event':
      return b.kind === 'event' &&
        a.decoder === b.decoder &&
        sameListenerOptions(a.options, b.options);
  }
}

export function sameListenerOptions(a: ListenerOptions, b: ListenerOptions): boolean {
  return a.stopPropagation === b.stopPropagation && a.preventDefault === b.preventDefault;
}

/**
 * Compose `f` onto a decoder's output. Failures pass through unchanged.
 */
export function mapDecoder<A, B>(decoder: Decoder<A>, f: (msg: A) => B): Decoder<B> {
  return (event) => {
    const result = decoder(event);
    return result.ok ? { ok: true, value: f(result.value) } : result;
  };
}

/**
 * Relabel the messages produced by a property. Non-event properties carry
 * no message and are returned as they are.
 */
export function mapProperty<A, B>(f: (msg: A) => B, prop: Property<A>): Property<B> {
  if (prop.kind !== 'event') return prop;
  const mapped: EventProperty<B> = {
    kind: 'event',
    name: prop.name,
    options: prop.options,
    decoder: mapDecoder(prop.decoder, f)
  };
  return Object.freeze(mapped);
}
