/**
 * treepatch Core - Differ
 *
 * Pure, deterministic comparison of two node trees. The result is a Patch
 * addressed by child positions of the old tree. The live tree is never
 * consulted.
 *
 * Rules, per pair of nodes:
 * - identical node objects: nothing to do
 * - two thunks with equal fingerprints: nothing to do, builder not called
 * - different kind, tag or namespace: replace-node
 * - raw HTML (innerHTML / outerHTML) on either side: replace-node, unless
 *   both sides set only innerHTML and have no children
 * - text: set-text when the content differs
 * - elements: fact diff, then children (positional or keyed)
 */

import {
  adoptCell,
  resolve,
  sameFingerprint,
  subtreeSize
} from './node.js';
import type { ConcreteNode, VElement, VKeyed, VNode } from './node.js';
import { factsEqual } from './properties.js';
import type { Facts } from './properties.js';
import { planKeyed } from './reconcile.js';
import type { Patch, PatchOp } from './patch.js';
import { ELEMENT, HTML_PROPERTIES, KEYED, PROPERTY_KEY, TEXT, THUNK } from './symbols.js';

/**
 * Compute the edit script turning `oldTree` into `newTree`.
 */
export function diff<Msg>(oldTree: VNode<Msg>, newTree: VNode<Msg>): Patch<Msg> {
  return { ops: diffNode(oldTree, newTree, () => 0) };
}

/**
 * Pre-order position of a node in the old tree, computed on demand.
 * Sizing a subtree forces its thunks, so positions are only computed for
 * nodes that actually receive operations.
 */
type Position = () => number;

/**
 * Positions of a parent's children, each derived from its preceding
 * siblings' subtree sizes and memoized.
 */
function childPositions<Msg>(parent: Position, children: readonly VNode<Msg>[]): (i: number) => number {
  const positions: number[] = [];
  return (i) => {
    if (positions.length === 0) positions.push(parent() + 1);
    while (positions.length <= i) {
      const last = positions.length - 1;
      positions.push(positions[last] + subtreeSize(children[last]));
    }
    return positions[i];
  };
}

function diffNode<Msg>(a: VNode<Msg>, b: VNode<Msg>, index: Position): PatchOp<Msg>[] {
  if (a === b) return [];

  if (a.kind === THUNK && b.kind === THUNK && sameFingerprint(a, b)) {
    adoptCell(a, b);
    return [];
  }

  const x = resolve(a);
  const y = resolve(b);
  if (x === y) return [];

  if (x.kind !== y.kind) {
    return [{ type: 'replace-node', node: b }];
  }

  switch (x.kind) {
    case TEXT:
      if (y.kind !== TEXT) return [{ type: 'replace-node', node: b }];
      return x.content === y.content ? [] : [{ type: 'set-text', text: y.content }];

    case ELEMENT:
      if (y.kind !== ELEMENT || !sameElementType(x, y) || rawHTMLConflict(x, y)) {
        return [{ type: 'replace-node', node: b }];
      }
      return [
        ...diffFacts(x.facts, y.facts),
        ...diffChildren(x, y, index)
      ];

    case KEYED:
      if (y.kind !== KEYED || !sameElementType(x, y) || rawHTMLConflict(x, y)) {
        return [{ type: 'replace-node', node: b }];
      }
      return [
        ...diffFacts(x.facts, y.facts),
        ...diffKeyedChildren(x, y, index)
      ];
  }
}

function sameElementType<Msg>(x: ConcreteNode<Msg>, y: ConcreteNode<Msg>): boolean {
  if (x.kind === TEXT || y.kind === TEXT) return false;
  return x.tag === y.tag && x.namespace === y.namespace;
}

/** Raw HTML property names set on a node */
function rawHTML<Msg>(node: VElement<Msg> | VKeyed<Msg>): string[] {
  return [...HTML_PROPERTIES].filter((name) => node.facts.has(`${PROPERTY_KEY}:${name}`));
}

/**
 * Raw HTML puts children on the host that the tree does not list, so the
 * children of such a node cannot be patched by position.
 */
function rawHTMLConflict<Msg>(x: VElement<Msg> | VKeyed<Msg>, y: VElement<Msg> | VKeyed<Msg>): boolean {
  const before = rawHTML(x);
  const after = rawHTML(y);
  if (before.length === 0 && after.length === 0) return false;
  const innerOnly = (names: string[]) => names.length === 1 && names[0] === 'innerHTML';
  return !(innerOnly(before) && innerOnly(after) && x.children.length === 0 && y.children.length === 0);
}

/**
 * Old keys in order (remove / update), then new keys in order (add).
 */
export function diffFacts<Msg>(oldFacts: Facts<Msg>, newFacts: Facts<Msg>): PatchOp<Msg>[] {
  const ops: PatchOp<Msg>[] = [];

  for (const [key, previous] of oldFacts) {
    const fact = newFacts.get(key);
    if (fact === undefined) {
      ops.push({ type: 'remove-property', fact: previous });
    } else if (!factsEqual(previous, fact)) {
      ops.push({ type: 'update-property', previous, fact });
    }
  }

  for (const [key, fact] of newFacts) {
    if (!oldFacts.has(key)) {
      ops.push({ type: 'add-property', fact });
    }
  }

  return ops;
}

/**
 * Positional children: recurse pairwise, then trim or extend the tail.
 */
function diffChildren<Msg>(x: VElement<Msg>, y: VElement<Msg>, index: Position): PatchOp<Msg>[] {
  const oldChildren = x.children;
  const newChildren = y.children;
  const common = Math.min(oldChildren.length, newChildren.length);

  const structure: PatchOp<Msg>[] = [];
  for (let i = common; i < oldChildren.length; i++) {
    structure.push({ type: 'remove-child', index: i });
  }
  for (let i = common; i < newChildren.length; i++) {
    structure.push({ type: 'insert-child', index: i, node: newChildren[i] });
  }

  const nested: PatchOp<Msg>[] = [];
  const positionOf = childPositions(index, oldChildren);
  for (let i = 0; i < common; i++) {
    const ops = diffNode(oldChildren[i], newChildren[i], () => positionOf(i));
    if (ops.length > 0) {
      nested.push({ type: 'recurse-into', childIndex: i, index: positionOf(i), ops });
    }
  }

  return [...structure, ...nested];
}

/**
 * Keyed children: match by key, recurse into matched pairs wherever they
 * moved, remove what disappeared, move what changed order, insert what is new.
 */
function diffKeyedChildren<Msg>(x: VKeyed<Msg>, y: VKeyed<Msg>, index: Position): PatchOp<Msg>[] {
  const oldChildren = x.children;
  const newChildren = y.children;
  const plan = planKeyed(
    oldChildren.map((child) => child.key),
    newChildren.map((child) => child.key)
  );

  const ops: PatchOp<Msg>[] = [];
  for (const oldIndex of plan.removed) {
    ops.push({ type: 'remove-child', index: oldIndex });
  }
  if (plan.moves.length > 0) {
    ops.push({ type: 'reorder-children', moves: plan.moves });
  }
  for (const newIndex of plan.inserted) {
    ops.push({ type: 'insert-child', index: newIndex, node: newChildren[newIndex].node });
  }

  const positionOf = childPositions(index, oldChildren.map((child) => child.node));
  for (const [oldIndex, newIndex] of plan.matched) {
    const nested = diffNode(oldChildren[oldIndex].node, newChildren[newIndex].node, () => positionOf(oldIndex));
    if (nested.length > 0) {
      ops.push({ type: 'recurse-into', childIndex: oldIndex, index: positionOf(oldIndex), ops: nested });
    }
  }

  return ops;
}
