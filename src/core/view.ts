/**
 * treepatch Core - View driver
 *
 * Owns one live tree inside a container: renders the first tree, diffs and
 * patches every following one, and routes listener messages to the
 * application through a MessageQueue.
 *
 * @example
 * const view = new View(document.getElementById('app'), new DOMRenderer(), {
 *   onMessage: (msg) => {
 *     model = update(model, msg);
 *     view.update(render(model));
 *   }
 * });
 * view.mount(render(model));
 */

import { diff } from './diff.js';
import { ConstructionError } from './errors.js';
import { EventBinder } from './events.js';
import type { VNode } from './node.js';
import { countOps } from './patch.js';
import type { Patch } from './patch.js';
import { applyPatch } from './patcher.js';
import { hostCall, render } from './render.js';
import { err, ok } from './result.js';
import type { Result } from './result.js';
import { MessageQueue } from './scheduler.js';
import type { IRendererAdapter } from '../renderers/types.js';

export interface ViewConfig<Msg> {
  /** Receives every message produced by a listener, in order */
  onMessage: (msg: Msg) => void;
  /**
   * Receives decode errors and exceptions thrown by `onMessage`.
   * When null they are printed with console.error.
   */
  onError: ((error: unknown) => void) | null;
  /** Log every cycle with console.log */
  debug: boolean;
}

export type ViewOptions<Msg> = Pick<ViewConfig<Msg>, 'onMessage'> & Partial<ViewConfig<Msg>>;

export class View<H extends object, Msg> {
  readonly cfg: ViewConfig<Msg>;

  private readonly queue: MessageQueue<Msg>;
  private readonly binder: EventBinder<H, Msg>;
  private current: VNode<Msg> | null = null;
  private live: H | null = null;
  private busy = false;

  constructor(
    private readonly container: H,
    private readonly renderer: IRendererAdapter<H>,
    options: ViewOptions<Msg>
  ) {
    this.cfg = {
      onMessage: options.onMessage,
      onError: options.onError ?? null,
      debug: options.debug ?? false
    };
    this.queue = new MessageQueue((msg) => this.cfg.onMessage(msg), {
      onError: (error) => this.reportError(error)
    });
    this.binder = new EventBinder(this.queue, (error) => this.reportError(error));
  }

  /**
   * Change options after construction.
   */
  configure(opts: Partial<ViewConfig<Msg>>): this {
    if (opts.onMessage !== undefined) this.cfg.onMessage = opts.onMessage;
    if (opts.onError !== undefined) this.cfg.onError = opts.onError;
    if (opts.debug !== undefined) this.cfg.debug = opts.debug;
    return this;
  }

  /** Tree currently on screen, or null before mount */
  get tree(): VNode<Msg> | null {
    return this.current;
  }

  /** Live root handle, or null before mount */
  get root(): H | null {
    return this.live;
  }

  /** Listener bookkeeping, for inspection */
  get listeners(): EventBinder<H, Msg> {
    return this.binder;
  }

  /**
   * Resolves once every queued message has been delivered.
   */
  settled(): Promise<void> {
    return this.queue.settled();
  }

  /**
   * Render `tree` and append it to the container.
   */
  mount(tree: VNode<Msg>): Result<H, ConstructionError> {
    return this.cycle('mount', () => {
      if (this.current !== null) {
        throw new Error('treepatch: view is already mounted; use update()');
      }

      const rendered = render(this.renderer, tree, this.binder);
      if (!rendered.ok) return rendered;

      const handle = rendered.value;
      try {
        hostCall('appendChild(container)', () => this.renderer.appendChild(this.container, handle));
      } catch (error) {
        if (error instanceof ConstructionError) return err(error);
        throw error;
      }

      this.current = tree;
      this.live = handle;
      this.trace('mounted');
      return ok(handle);
    });
  }

  /**
   * Bring the live tree in line with `tree`. On failure the live tree and
   * the current tree stay as they were.
   *
   * @returns the patch that was applied
   * @throws PatchIndexError when the live tree was changed behind the view's back
   */
  update(tree: VNode<Msg>): Result<Patch<Msg>, ConstructionError> {
    return this.cycle('update', () => {
      const previous = this.current;
      const live = this.live;
      if (previous === null || live === null) {
        throw new Error('treepatch: update() called before mount()');
      }

      const patch = diff(previous, tree);
      const patched = applyPatch(this.renderer, live, previous, patch, this.binder);
      if (!patched.ok) return patched;

      this.current = tree;
      this.live = patched.value;
      this.trace('updated', `${countOps(patch.ops)} op(s)`);
      return ok(patch);
    });
  }

  /**
   * Remove the live tree and its listeners. Queued messages are still delivered.
   */
  unmount(): void {
    this.cycle('unmount', () => {
      const live = this.live;
      if (live === null) return;
      this.binder.detachSubtree(this.renderer, live);
      this.renderer.removeChild(live);
      this.current = null;
      this.live = null;
      this.trace('unmounted');
    });
  }

  /** One cycle at a time: a cycle started from inside another one throws */
  private cycle<T>(name: string, run: () => T): T {
    if (this.busy) {
      throw new Error(`treepatch: ${name}() called while another render cycle is in progress`);
    }
    this.busy = true;
    try {
      return run();
    } finally {
      this.busy = false;
    }
  }

  private reportError(error: unknown): void {
    if (this.cfg.onError) {
      this.cfg.onError(error);
    } else {
      console.error('treepatch:', error);
    }
  }

  private trace(...args: string[]): void {
    if (this.cfg.debug) console.log('[View]', ...args);
  }
}
