/**
 * treepatch Core - Edit script
 *
 * A patch is the list of operations for the root of the old tree.
 * `recurse-into` nests the operations for one child, so the patch mirrors
 * the shape of the part of the tree that changed and nothing else.
 *
 * Within one node, operations come in this order:
 *   replace-node (alone)
 *   | set-text, property operations, remove-child, reorder-children,
 *     insert-child, recurse-into
 *
 * Children structure: removals first (by old index); the survivors keep
 * their old relative order; every move takes the child at `from` out and
 * puts it back at `to` of the shortened list; every insert then places a
 * new child at `index` of the current list.
 */

import type { Fact } from './properties.js';
import type { VNode } from './node.js';

export interface Move {
  readonly from: number;
  readonly to: number;
}

export interface ReplaceNodeOp<Msg> {
  readonly type: 'replace-node';
  readonly node: VNode<Msg>;
}

export interface SetTextOp {
  readonly type: 'set-text';
  readonly text: string;
}

export interface AddPropertyOp<Msg> {
  readonly type: 'add-property';
  readonly fact: Fact<Msg>;
}

export interface RemovePropertyOp<Msg> {
  readonly type: 'remove-property';
  readonly fact: Fact<Msg>;
}

export interface UpdatePropertyOp<Msg> {
  readonly type: 'update-property';
  readonly previous: Fact<Msg>;
  readonly fact: Fact<Msg>;
}

export interface ReorderChildrenOp {
  readonly type: 'reorder-children';
  readonly moves: readonly Move[];
}

export interface InsertChildOp<Msg> {
  readonly type: 'insert-child';
  /** Position in the new child list */
  readonly index: number;
  readonly node: VNode<Msg>;
}

export interface RemoveChildOp {
  readonly type: 'remove-child';
  /** Position in the old child list */
  readonly index: number;
}

export interface RecurseIntoOp<Msg> {
  readonly type: 'recurse-into';
  /** Position in the old child list */
  readonly childIndex: number;
  /** Pre-order position of the child in the old tree (root = 0) */
  readonly index: number;
  readonly ops: readonly PatchOp<Msg>[];
}

export type PatchOp<Msg> =
  | ReplaceNodeOp<Msg>
  | SetTextOp
  | AddPropertyOp<Msg>
  | RemovePropertyOp<Msg>
  | UpdatePropertyOp<Msg>
  | ReorderChildrenOp
  | InsertChildOp<Msg>
  | RemoveChildOp
  | RecurseIntoOp<Msg>;

export interface Patch<Msg> {
  readonly ops: readonly PatchOp<Msg>[];
}

export const EMPTY_PATCH: Patch<never> = Object.freeze({ ops: Object.freeze([]) });

export function isEmptyPatch<Msg>(patch: Patch<Msg>): boolean {
  return patch.ops.length === 0;
}

/**
 * Total number of operations, nested ones included, `recurse-into` excluded.
 */
export function countOps<Msg>(ops: readonly PatchOp<Msg>[]): number {
  let count = 0;
  for (const op of ops) {
    count += op.type === 'recurse-into' ? countOps(op.ops) : 1;
  }
  return count;
}

/**
 * Flatten a patch into `[preOrderIndex, op]` pairs in traversal order.
 * Useful for logging and assertions.
 */
export function flattenPatch<Msg>(patch: Patch<Msg>): Array<readonly [number, PatchOp<Msg>]> {
  const out: Array<readonly [number, PatchOp<Msg>]> = [];
  const walk = (index: number, ops: readonly PatchOp<Msg>[]) => {
    for (const op of ops) {
      if (op.type === 'recurse-into') walk(op.index, op.ops);
      else out.push([index, op]);
    }
  };
  walk(0, patch.ops);
  return out;
}
