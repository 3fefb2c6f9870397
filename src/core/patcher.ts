/**
 * treepatch Core - Patcher
 *
 * Applies a Patch to the live host tree that was rendered from the patch's
 * old tree. Either every operation lands or none does:
 *
 * 1. Resolve: walk the patch alongside the old tree and the live tree,
 *    resolving target handles and checking every index. A patch that does
 *    not fit throws PatchIndexError before anything is touched.
 * 2. Prepare: render the nodes needed by replace-node and insert-child into
 *    detached handles. A host failure here returns a ConstructionError.
 * 3. Commit: run the operations through a Journal. If the host throws, the
 *    journal is rolled back and a ConstructionError is returned.
 */

import { ConstructionError, PatchIndexError } from './errors.js';
import type { EventBinder } from './events.js';
import { childNodes, resolve } from './node.js';
import type { VNode } from './node.js';
import type { Move, Patch, PatchOp } from './patch.js';
import type { Fact } from './properties.js';
import { applyFact, hostCall, removeFact, renderNode, updateFact } from './render.js';
import { err, ok } from './result.js';
import type { Result } from './result.js';
import { TEXT } from './symbols.js';
import { Journal } from '../renderers/journal.js';
import type { IRendererAdapter } from '../renderers/types.js';

interface ReplaceStep<H, Msg> {
  readonly type: 'replace';
  readonly target: H;
  readonly node: VNode<Msg>;
  prepared?: H;
}

interface TextStep<H> {
  readonly type: 'text';
  readonly target: H;
  readonly text: string;
}

interface FactStep<H, Msg> {
  readonly type: 'fact';
  readonly target: H;
  readonly op: 'add' | 'remove' | 'update';
  readonly previous: Fact<Msg> | null;
  readonly fact: Fact<Msg>;
}

interface InsertPlan<H, Msg> {
  readonly index: number;
  readonly node: VNode<Msg>;
  prepared?: H;
}

interface ChildrenStep<H, Msg> {
  readonly type: 'children';
  readonly target: H;
  readonly removed: H[];
  readonly moves: Move[];
  readonly inserts: InsertPlan<H, Msg>[];
}

type Step<H, Msg> = ReplaceStep<H, Msg> | TextStep<H> | FactStep<H, Msg> | ChildrenStep<H, Msg>;

/**
 * Apply `patch` to `liveRoot`.
 *
 * @returns the live root afterwards (a new handle when the root itself was replaced)
 * @throws PatchIndexError when the patch does not fit the old tree or the live tree
 */
export function applyPatch<H extends object, Msg>(
  host: IRendererAdapter<H>,
  liveRoot: H,
  oldTree: VNode<Msg>,
  patch: Patch<Msg>,
  binder: EventBinder<H, Msg>
): Result<H, ConstructionError> {
  if (patch.ops.length === 0) return ok(liveRoot);

  const steps: Step<H, Msg>[] = [];
  resolveOps(host, binder, patch.ops, oldTree, liveRoot, [], steps);

  try {
    prepare(host, binder, steps);
  } catch (error) {
    if (error instanceof ConstructionError) return err(error);
    throw error;
  }

  return commit(host, binder, liveRoot, steps);
}

// === RESOLVE ===

function resolveOps<H extends object, Msg>(
  host: IRendererAdapter<H>,
  binder: EventBinder<H, Msg>,
  ops: readonly PatchOp<Msg>[],
  oldNode: VNode<Msg>,
  live: H,
  path: readonly number[],
  steps: Step<H, Msg>[]
): void {
  const concrete = resolve(oldNode);

  if (ops.some((op) => op.type === 'replace-node')) {
    const [op] = ops;
    if (ops.length !== 1 || op.type !== 'replace-node') {
      throw new PatchIndexError('replace-node must be the only operation for its node', path);
    }
    steps.push({ type: 'replace', target: live, node: op.node });
    return;
  }

  let children: ChildrenStep<H, Msg> | null = null;
  const liveChildren = () => {
    const handles = host.childNodes(live);
    const expected = childNodes(concrete).length;
    if (handles.length !== expected) {
      throw new PatchIndexError(
        `Live node has ${handles.length} children, the old tree has ${expected}`,
        path
      );
    }
    return handles;
  };
  const childrenStep = (): ChildrenStep<H, Msg> => {
    if (children === null) {
      children = { type: 'children', target: live, removed: [], moves: [], inserts: [] };
      steps.push(children);
    }
    return children;
  };

  // Children bookkeeping for bounds checks
  const removedIndices = new Set<number>();
  let lastRemoved = -1;
  let survivors = -1;
  let lastInserted = -1;
  const countSurvivors = () => {
    if (survivors < 0) survivors = childNodes(concrete).length - removedIndices.size;
    return survivors;
  };

  for (const op of ops) {
    switch (op.type) {
      case 'replace-node':
        // Handled above
        break;

      case 'set-text':
        if (concrete.kind !== TEXT) {
          throw new PatchIndexError(`set-text applied to a <${concrete.tag}> element`, path);
        }
        steps.push({ type: 'text', target: live, text: op.text });
        break;

      case 'add-property':
      case 'remove-property':
      case 'update-property': {
        if (concrete.kind === TEXT) {
          throw new PatchIndexError(`${op.type} applied to a text node`, path);
        }
        const known = concrete.facts.has(op.fact.key);
        if (op.type === 'add-property' ? known : !known) {
          throw new PatchIndexError(
            `${op.type} for "${op.fact.key}" does not match the old properties`,
            path
          );
        }
        if (op.type === 'update-property') {
          if (op.previous.key !== op.fact.key) {
            throw new PatchIndexError(
              `update-property changes key "${op.previous.key}" to "${op.fact.key}"`,
              path
            );
          }
          if (op.fact.kind === 'event' && !binder.listenersOf(live).includes(op.fact.name)) {
            throw new PatchIndexError(`No "${op.fact.name}" listener on the live node`, path);
          }
        }
        steps.push({
          type: 'fact',
          target: live,
          op: op.type === 'add-property' ? 'add' : op.type === 'remove-property' ? 'remove' : 'update',
          previous: op.type === 'update-property' ? op.previous : null,
          fact: op.fact
        });
        break;
      }

      case 'remove-child': {
        const handles = liveChildren();
        if (survivors >= 0 || op.index <= lastRemoved || op.index >= handles.length) {
          throw new PatchIndexError(`remove-child index ${op.index} out of order or range`, path);
        }
        lastRemoved = op.index;
        removedIndices.add(op.index);
        const step = childrenStep();
        step.removed.push(handles[op.index]);
        break;
      }

      case 'reorder-children': {
        liveChildren();
        const count = countSurvivors();
        if (lastInserted >= 0) {
          throw new PatchIndexError('reorder-children after insert-child', path);
        }
        for (const move of op.moves) {
          if (!inRange(move.from, count) || !inRange(move.to, count)) {
            throw new PatchIndexError(
              `Move ${move.from} -> ${move.to} out of range for ${count} children`,
              path
            );
          }
        }
        const step = childrenStep();
        step.moves.push(...op.moves);
        break;
      }

      case 'insert-child': {
        liveChildren();
        const count = countSurvivors();
        if (op.index <= lastInserted || op.index > count) {
          throw new PatchIndexError(`insert-child index ${op.index} out of order or range`, path);
        }
        lastInserted = op.index;
        survivors = count + 1;
        childrenStep().inserts.push({ index: op.index, node: op.node });
        break;
      }

      case 'recurse-into': {
        const handles = liveChildren();
        const oldChildren = childNodes(concrete);
        if (!inRange(op.childIndex, oldChildren.length) || removedIndices.has(op.childIndex)) {
          throw new PatchIndexError(`recurse-into child ${op.childIndex} does not exist`, path);
        }
        resolveOps(
          host,
          binder,
          op.ops,
          oldChildren[op.childIndex],
          handles[op.childIndex],
          [...path, op.childIndex],
          steps
        );
        break;
      }
    }
  }
}

function inRange(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length;
}

// === PREPARE ===

function prepare<H extends object, Msg>(
  host: IRendererAdapter<H>,
  binder: EventBinder<H, Msg>,
  steps: readonly Step<H, Msg>[]
): void {
  for (const step of steps) {
    if (step.type === 'replace') {
      step.prepared = renderNode(host, step.node, binder);
    } else if (step.type === 'children') {
      for (const insert of step.inserts) {
        insert.prepared = renderNode(host, insert.node, binder);
      }
    }
  }
}

// === COMMIT ===

function commit<H extends object, Msg>(
  host: IRendererAdapter<H>,
  binder: EventBinder<H, Msg>,
  liveRoot: H,
  steps: readonly Step<H, Msg>[]
): Result<H, ConstructionError> {
  const journal = new Journal(host);
  const target = journal.host;
  let root = liveRoot;

  try {
    for (const step of steps) {
      switch (step.type) {
        case 'replace': {
          const replacement = preparedHandle(step.prepared);
          journal.record(binder.detachSubtree(target, step.target));
          hostCall('replaceWith', () => target.replaceWith(step.target, replacement));
          if (step.target === root) root = replacement;
          break;
        }

        case 'text':
          hostCall('setTextContent', () => target.setTextContent(step.target, step.text));
          break;

        case 'fact':
          journal.record(commitFact(target, binder, step));
          break;

        case 'children':
          commitChildren(target, binder, journal, step);
          break;
      }
    }
  } catch (error) {
    journal.rollback();
    if (error instanceof ConstructionError) return err(error);
    return err(new ConstructionError('patch commit', { cause: error }));
  }

  journal.commit();
  return ok(root);
}

function commitFact<H extends object, Msg>(
  host: IRendererAdapter<H>,
  binder: EventBinder<H, Msg>,
  step: FactStep<H, Msg>
): () => void {
  switch (step.op) {
    case 'add':
      return applyFact(host, binder, step.target, step.fact);
    case 'remove':
      return removeFact(host, binder, step.target, step.fact);
    case 'update':
      return updateFact(host, binder, step.target, step.previous ?? step.fact, step.fact);
  }
}

function commitChildren<H extends object, Msg>(
  host: IRendererAdapter<H>,
  binder: EventBinder<H, Msg>,
  journal: Journal<H>,
  step: ChildrenStep<H, Msg>
): void {
  for (const child of step.removed) {
    journal.record(binder.detachSubtree(host, child));
    hostCall('removeChild', () => host.removeChild(child));
  }

  const current = host.childNodes(step.target).slice();

  for (const { from, to } of step.moves) {
    const [moved] = current.splice(from, 1);
    const ref = current[to] ?? null;
    hostCall('insertBefore (move)', () => host.insertBefore(step.target, moved, ref));
    current.splice(to, 0, moved);
  }

  for (const insert of step.inserts) {
    const handle = preparedHandle(insert.prepared);
    const ref = current[insert.index] ?? null;
    hostCall('insertBefore', () => host.insertBefore(step.target, handle, ref));
    current.splice(insert.index, 0, handle);
  }
}

function preparedHandle<H>(handle: H | undefined): H {
  if (handle === undefined) {
    throw new Error('treepatch: node was not prepared before commit');
  }
  return handle;
}
