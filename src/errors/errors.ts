/**
 * Engine error taxonomy.
 *
 * These never cross the public surface: the engine facade turns them into
 * degraded results. They exist so internal layers can tell the cases apart.
 */

export type StoreDependency = 'semantic_store' | 'identity_directory' | 'embedding';

/** A store did not answer within its timeout, or failed after one retry. */
export class StoreUnavailableError extends Error {
  readonly name = 'StoreUnavailableError';

  constructor(
    readonly dependency: StoreDependency,
    readonly operation: string,
    cause?: unknown,
  ) {
    super(`${dependency}.${operation} unavailable`, { cause });
  }
}

/** A fragment (or identity record) whose timestamp or payload cannot be parsed. */
export class MalformedRecordError extends Error {
  readonly name = 'MalformedRecordError';

  constructor(
    readonly recordId: string,
    readonly reason: string,
  ) {
    super(`Malformed record ${recordId}: ${reason}`);
  }
}

/** The caller aborted the request. */
export class OperationCancelledError extends Error {
  readonly name = 'OperationCancelledError';

  constructor(operation: string) {
    super(`${operation} cancelled`);
  }
}

export function isStoreUnavailable(err: unknown): err is StoreUnavailableError {
  return err instanceof StoreUnavailableError;
}

export function isCancelled(err: unknown): err is OperationCancelledError {
  return err instanceof OperationCancelledError;
}

/** Throw if the signal is already aborted. */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) throw new OperationCancelledError(operation);
}
