/**
 * treepatch Core - Error taxonomy
 *
 * - DecodeError: a listener's decoder rejected a raw event. Recovered locally.
 * - ConstructionError: the host surface rejected a primitive operation.
 *   Returned from render/patch, aborts that cycle only.
 * - PatchIndexError: a patch does not fit the tree it is applied to.
 *   Thrown; it means the differ and patcher disagree.
 */

export type ErrorCode = 'DECODE' | 'CONSTRUCTION' | 'PATCH_INDEX';

export abstract class TreepatchError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DecodeError extends TreepatchError {
  readonly code = 'DECODE';

  /** Name of the event whose decoder failed, when known */
  readonly event: string | null;

  constructor(message: string, options: { event?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.event = options.event ?? null;
  }
}

export class ConstructionError extends TreepatchError {
  readonly code = 'CONSTRUCTION';

  /** Host operation that failed, e.g. "createElement(di v)" */
  readonly operation: string;

  constructor(operation: string, options: { cause?: unknown } = {}) {
    super(`Host rejected ${operation}${describeCause(options.cause)}`, options);
    this.operation = operation;
  }
}

export class PatchIndexError extends TreepatchError {
  readonly code = 'PATCH_INDEX';

  /** Child index path from the root to the offending node */
  readonly path: readonly number[];

  constructor(message: string, path: readonly number[]) {
    super(`${message} (at path [${path.join(', ')}])`);
    this.path = path;
  }
}

export function isTreepatchError(value: unknown): value is TreepatchError {
  return value instanceof TreepatchError;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return `: ${cause.message}`;
  if (cause === undefined) return '';
  return `: ${String(cause)}`;
}
