import { describe, it, expect, vi } from 'vitest';
import { DecodeError } from '../src/core/errors.js';
import { element, text } from '../src/core/node.js';
import { on } from '../src/core/properties.js';
import type { Decoder } from '../src/core/properties.js';
import { err, ok } from '../src/core/result.js';
import { EventBinder } from '../src/core/events.js';
import { VirtualRenderer } from '../src/renderers/virtual.js';
import type { VirtualNode } from '../src/renderers/virtual.js';
import { createHarness, mountTree, mountWith } from './support.js';

const readDetail: Decoder<string> = (event) => {
  if (typeof event === 'object' && event !== null && 'detail' in event && typeof event.detail === 'string') {
    return ok(event.detail);
  }
  return err(new DecodeError('expected a string detail', { event: 'input' }));
};

describe('EventBinder', () => {
  it('sends decoded messages to the sink', () => {
    const harness = createHarness<string>();
    const root = mountTree(harness, element('input', [on('input', readDetail)]));

    harness.renderer.dispatchEvent(root, 'input', 'hello');
    harness.renderer.dispatchEvent(root, 'input', 'world');

    expect(harness.messages).toEqual(['hello', 'world']);
    expect(harness.decodeErrors).toEqual([]);
  });

  it('reports a failed decode and sends nothing', () => {
    const harness = createHarness<string>();
    const root = mountTree(harness, element('input', [on('input', readDetail)]));

    harness.renderer.dispatchEvent(root, 'input', 42);

    expect(harness.messages).toEqual([]);
    expect(harness.decodeErrors).toHaveLength(1);
    expect(harness.decodeErrors[0].message).toBe('expected a string detail');
    expect(harness.decodeErrors[0].event).toBe('input');
  });

  it('treats a throwing decoder as a decode failure', () => {
    const boom = new Error('boom');
    const harness = createHarness<string>();
    const root = mountTree(harness, element('button', [on<string>('click', () => { throw boom; })]));

    harness.renderer.dispatchEvent(root, 'click');

    expect(harness.messages).toEqual([]);
    expect(harness.decodeErrors).toHaveLength(1);
    const [error] = harness.decodeErrors;
    expect(error).toBeInstanceOf(DecodeError);
    expect(error.message).toBe('Decoder for "click" threw');
    expect(error.cause).toBe(boom);
  });

  it('keeps a throwing error handler out of the host dispatch', () => {
    const print = vi.spyOn(console, 'error').mockImplementation(() => {});
    const handlerFailure = new Error('onError failed');
    const renderer = new VirtualRenderer();
    const binder = new EventBinder<VirtualNode, string>({ send: () => {} }, () => { throw handlerFailure; });
    const root = mountWith(renderer, renderer.getRoot(), binder, element('input', [on('input', readDetail)]));

    expect(() => renderer.dispatchEvent(root, 'input', 42)).not.toThrow();
    expect(print).toHaveBeenCalledWith(
      'treepatch: decode error handler threw:', handlerFailure, 'while reporting:', expect.any(DecodeError)
    );
  });

  it('applies stopPropagation and preventDefault after a successful decode', () => {
    const harness = createHarness<string>();
    const root = mountTree(harness, element('div', [on('click', () => ok('outer'))], [
      element('button', [on('click', () => ok('inner'), { stopPropagation: true, preventDefault: true })])
    ]));
    const button = root.childNodes[0];

    const event = harness.renderer.dispatchEvent(button, 'click');

    expect(harness.messages).toEqual(['inner']);
    expect(event.propagationStopped).toBe(true);
    expect(event.defaultPrevented).toBe(true);
  });

  it('leaves the event alone when decoding fails', () => {
    const harness = createHarness<string>();
    const root = mountTree(harness, element('div', [on('click', () => ok('outer'))], [
      element('a', [on('click', readDetail, { stopPropagation: true, preventDefault: true })])
    ]));

    const event = harness.renderer.dispatchEvent(root.childNodes[0], 'click');

    expect(event.propagationStopped).toBe(false);
    expect(event.defaultPrevented).toBe(false);
    expect(harness.messages).toEqual(['outer']);
    expect(harness.decodeErrors).toHaveLength(1);
  });

  it('uses the swapped decoder on the next firing', () => {
    const harness = createHarness<string>();
    const root = mountTree(harness, element('button', [on('click', () => ok('first'))]));
    const addListener = vi.spyOn(harness.renderer, 'addEventListener');

    const undo = harness.binder.update(root, {
      kind: 'event',
      key: 'event:click',
      name: 'click',
      decoder: () => ok('second'),
      options: { stopPropagation: false, preventDefault: false }
    });
    harness.renderer.dispatchEvent(root, 'click');
    undo();
    harness.renderer.dispatchEvent(root, 'click');

    expect(harness.messages).toEqual(['second', 'first']);
    expect(addListener).not.toHaveBeenCalled();
  });

  it('refuses to update a listener that was never attached', () => {
    const harness = createHarness<string>();
    const root = mountTree(harness, element('button'));

    expect(() =>
      harness.binder.update(root, {
        kind: 'event',
        key: 'event:click',
        name: 'click',
        decoder: () => ok('x'),
        options: { stopPropagation: false, preventDefault: false }
      })
    ).toThrow('treepatch: no "click" listener is attached to this node');
  });

  it('detaches a whole subtree and can undo it', () => {
    const harness = createHarness<string>();
    const root = mountTree(harness, element('div', [on('click', () => ok('div'))], [
      text('label'),
      element('span', [on('focus', () => ok('span'))])
    ]));
    const span = root.childNodes[1];

    const undo = harness.binder.detachSubtree(harness.renderer, root);
    expect(harness.binder.listenersOf(root)).toEqual([]);
    expect(harness.binder.listenersOf(span)).toEqual([]);
    expect(root.listeners.size).toBe(0);

    undo();
    expect(harness.binder.listenersOf(root)).toEqual(['click']);
    expect(harness.binder.listenersOf(span)).toEqual(['focus']);
  });
});
