/**
 * treepatch Core - Keyed child reconciliation
 *
 * Computes the structural edits for a keyed child list using the Longest
 * Increasing Subsequence (LIS) of old positions.
 *
 * ## Algorithm Overview
 *
 * Children present in both lists are *matched*. After removing unmatched old
 * children, the matched ones sit in their old relative order. Those forming
 * the LIS of old positions (taken in new order) are already correctly placed
 * relative to each other; only the others move.
 *
 * Example:
 *   Old: [A, B, C, D, E]
 *   New: [C, A, B, E, D]
 *   Old indices of new items: [2, 0, 1, 4, 3]
 *   LIS: A, B, D stay. Only C and E move.
 *
 * ## Complexity
 * - LIS: O(n log n) using binary search
 * - Moves: O(n * m) for m moved children (array splicing)
 */

import type { Move } from './patch.js';

/**
 * Compute the Longest Increasing Subsequence (LIS) of an array.
 *
 * @param arr - Old indices (-1 for new nodes, which are skipped)
 * @returns Indices in arr that form the LIS
 *
 * @example
 * computeLIS([2, 0, 1, 4, 3])  // [1, 2, 4] (indices of 0, 1, 3)
 * computeLIS([-1, 0, 1, -1])   // [1, 2]
 */
export function computeLIS(arr: readonly number[]): number[] {
  const n = arr.length;
  if (n === 0) return [];

  // result[i] = index in arr of smallest tail of LIS of length i+1
  const result: number[] = [];
  // predecessors[i] = previous index in LIS ending at i
  const predecessors = new Array<number>(n).fill(-1);

  for (let i = 0; i < n; i++) {
    const val = arr[i];
    if (val < 0) continue;

    // First position where arr[result[pos]] >= val
    let lo = 0;
    let hi = result.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (arr[result[mid]] < val) lo = mid + 1;
      else hi = mid;
    }

    if (lo > 0) predecessors[i] = result[lo - 1];
    result[lo] = i;
  }

  let len = result.length;
  const lis = new Array<number>(len);
  let idx = result[len - 1];
  while (len-- > 0) {
    lis[len] = idx;
    idx = predecessors[idx];
  }

  return lis;
}

export interface KeyedPlan {
  /** Old indices of children whose key is gone, ascending */
  readonly removed: readonly number[];
  /** Matched pairs as [oldIndex, newIndex], ascending by old index */
  readonly matched: ReadonlyArray<readonly [oldIndex: number, newIndex: number]>;
  /** Moves turning the survivors' old order into their new order */
  readonly moves: readonly Move[];
  /** New indices of children whose key is new, ascending */
  readonly inserted: readonly number[];
}

/**
 * Plan the structural edits between two key sequences. Keys are unique
 * within each sequence.
 */
export function planKeyed(oldKeys: readonly string[], newKeys: readonly string[]): KeyedPlan {
  const newIndexByKey = new Map<string, number>();
  for (let i = 0; i < newKeys.length; i++) {
    newIndexByKey.set(newKeys[i], i);
  }

  const removed: number[] = [];
  const matched: Array<readonly [number, number]> = [];
  // Rank among survivors, i.e. position after removals
  const rankByKey = new Map<string, number>();

  for (let i = 0; i < oldKeys.length; i++) {
    const key = oldKeys[i];
    const newIndex = newIndexByKey.get(key);
    if (newIndex === undefined) {
      removed.push(i);
    } else {
      rankByKey.set(key, rankByKey.size);
      matched.push([i, newIndex]);
    }
  }

  // Survivors in new order, as ranks; unmatched new keys are inserts
  const target: number[] = [];
  const inserted: number[] = [];
  for (let i = 0; i < newKeys.length; i++) {
    const rank = rankByKey.get(newKeys[i]);
    if (rank === undefined) inserted.push(i);
    else target.push(rank);
  }

  return { removed, matched, moves: planMoves(target), inserted };
}

/**
 * Moves that turn [0, 1, ..., n-1] into `target` (a permutation of it).
 *
 * Members of the LIS stay put. The others are placed right to left, each
 * immediately before its successor in the target order (or at the end).
 */
export function planMoves(target: readonly number[]): Move[] {
  const lis = computeLIS(target);
  if (lis.length === target.length) return [];

  const stays = new Set<number>();
  for (const position of lis) stays.add(target[position]);

  const current = target.slice().sort((a, b) => a - b);
  const moves: Move[] = [];

  for (let t = target.length - 1; t >= 0; t--) {
    const item = target[t];
    if (stays.has(item)) continue;

    const from = current.indexOf(item);
    current.splice(from, 1);
    const to = t === target.length - 1 ? current.length : current.indexOf(target[t + 1]);
    current.splice(to, 0, item);

    if (from !== to) moves.push({ from, to });
  }

  return moves;
}

/**
 * Apply moves to a list the way the patcher applies them to a parent's
 * children: take out at `from`, put back at `to` of the shortened list.
 */
export function applyMoves<T>(items: readonly T[], moves: readonly Move[]): T[] {
  const result = items.slice();
  for (const { from, to } of moves) {
    const [item] = result.splice(from, 1);
    result.splice(to, 0, item);
  }
  return result;
}
