export type GenericTreeErrorCode = "invalid_state" | "invalid_operation" | "invariant_violation";

export abstract class GenericTreeError extends Error {
  abstract readonly code: GenericTreeErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The tree is in a state that forbids the operation (a root already exists, the node was
 * already destroyed).
 */
export class InvalidStateError extends GenericTreeError {
  readonly code = "invalid_state";
}

/**
 * The argument is outside the operation's contract, e.g. a node owned by another tree.
 */
export class InvalidOperationError extends GenericTreeError {
  readonly code = "invalid_operation";
}

/**
 * Internal linkage is inconsistent. Never folded into a `TreeResult`; the tree should be
 * discarded once one of these surfaces.
 */
export class InvariantViolationError extends GenericTreeError {
  readonly code = "invariant_violation";
}

export type RecoverableTreeError = InvalidStateError | InvalidOperationError;

export type TreeResult<V> = { ok: true; value: V } | { ok: false; error: RecoverableTreeError };

export function isRecoverableTreeError(err: unknown): err is RecoverableTreeError {
  return err instanceof InvalidStateError || err instanceof InvalidOperationError;
}
