/**
 * treepatch Core - Event binding
 *
 * One host listener per (handle, event name). The host listener reads the
 * current decoder and options from a mutable record, so an updated decoder
 * is swapped in place without touching the host.
 *
 * Firing:
 *   raw event -> decoder -> ok: apply options, send message
 *                        -> error: report DecodeError, drop the firing
 * A decoder that throws is treated as a failed decode. An error handler that
 * throws is printed with console.error.
 */

import { DecodeError } from './errors.js';
import type { Decoder, EventFact, ListenerOptions } from './properties.js';
import type { Result } from './result.js';
import type { HostEvent, HostListener, IRendererAdapter } from '../renderers/types.js';

/**
 * Outbound message channel. `send` must not block.
 */
export interface MessageSink<Msg> {
  send(msg: Msg): void;
}

export type DecodeErrorHandler = (error: DecodeError) => void;

interface ListenerRecord<Msg> {
  decoder: Decoder<Msg>;
  options: ListenerOptions;
  readonly handler: HostListener;
}

export class EventBinder<H extends object, Msg> {
  /** handle -> event name -> record */
  private readonly records = new WeakMap<H, Map<string, ListenerRecord<Msg>>>();

  constructor(
    private readonly sink: MessageSink<Msg>,
    private readonly onDecodeError: DecodeErrorHandler
  ) {}

  /**
   * Register a listener for `fact` on `node`.
   * Returns an undo step removing the record again.
   */
  attach(host: IRendererAdapter<H>, node: H, fact: EventFact<Msg>): () => void {
    const byEvent = this.recordsFor(node, true);
    const existing = byEvent.get(fact.name);
    if (existing) {
      // Same event twice on one node: the record is reused
      return this.update(node, fact);
    }

    const record: ListenerRecord<Msg> = {
      decoder: fact.decoder,
      options: fact.options,
      handler: (event) => this.fire(fact.name, record, event)
    };
    byEvent.set(fact.name, record);
    host.addEventListener(node, fact.name, record.handler);

    return () => {
      byEvent.delete(fact.name);
    };
  }

  /**
   * Swap the decoder and options of an existing listener.
   * Returns an undo step restoring the previous ones.
   */
  update(node: H, fact: EventFact<Msg>): () => void {
    const record = this.recordsFor(node, false)?.get(fact.name);
    if (!record) {
      throw new Error(`treepatch: no "${fact.name}" listener is attached to this node`);
    }
    const { decoder, options } = record;
    record.decoder = fact.decoder;
    record.options = fact.options;
    return () => {
      record.decoder = decoder;
      record.options = options;
    };
  }

  /**
   * Remove the listener for `eventName` from `node`.
   * Returns an undo step putting the record back (the host side is undone by the journal).
   */
  detach(host: IRendererAdapter<H>, node: H, eventName: string): () => void {
    const byEvent = this.recordsFor(node, false);
    const record = byEvent?.get(eventName);
    if (!byEvent || !record) return () => {};

    host.removeEventListener(node, eventName, record.handler);
    byEvent.delete(eventName);
    return () => {
      byEvent.set(eventName, record);
    };
  }

  /**
   * Remove every listener in a live subtree.
   */
  detachSubtree(host: IRendererAdapter<H>, root: H): () => void {
    const undo: Array<() => void> = [];
    const stack: H[] = [root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (node === undefined) break;
      const byEvent = this.recordsFor(node, false);
      if (byEvent) {
        for (const eventName of [...byEvent.keys()]) {
          undo.push(this.detach(host, node, eventName));
        }
      }
      stack.push(...host.childNodes(node));
    }
    return () => {
      for (let i = undo.length - 1; i >= 0; i--) undo[i]();
    };
  }

  /** Event names with a listener on `node`, for inspection in tests and devtools */
  listenersOf(node: H): string[] {
    return [...(this.recordsFor(node, false)?.keys() ?? [])];
  }

  private fire(eventName: string, record: ListenerRecord<Msg>, event: HostEvent): void {
    let result: Result<Msg, DecodeError>;
    try {
      result = record.decoder(event);
    } catch (error) {
      this.report(new DecodeError(`Decoder for "${eventName}" threw`, { event: eventName, cause: error }));
      return;
    }

    if (!result.ok) {
      this.report(result.error);
      return;
    }

    if (record.options.stopPropagation) event.stopPropagation();
    if (record.options.preventDefault) event.preventDefault();
    this.sink.send(result.value);
  }

  /** Decode errors never reach the host's event dispatch */
  private report(error: DecodeError): void {
    try {
      this.onDecodeError(error);
    } catch (failure) {
      console.error('treepatch: decode error handler threw:', failure, 'while reporting:', error);
    }
  }

  private recordsFor(node: H, create: true): Map<string, ListenerRecord<Msg>>;
  private recordsFor(node: H, create: false): Map<string, ListenerRecord<Msg>> | undefined;
  private recordsFor(node: H, create: boolean): Map<string, ListenerRecord<Msg>> | undefined {
    let byEvent = this.records.get(node);
    if (!byEvent && create) {
      byEvent = new Map();
      this.records.set(node, byEvent);
    }
    return byEvent;
  }
}
