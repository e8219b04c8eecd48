/**
 * Usage errors
 *
 * Raised immediately when a task, continuation or awaitable is used in a way
 * the await protocol forbids. Failures of the computation itself are never
 * wrapped in this type: they are forwarded as thrown.
 */

export type InvalidOperationCode =
  | 'EMPTY_TASK'
  | 'ALREADY_AWAITED'
  | 'RESULT_TAKEN'
  | 'NOT_FINISHED'
  | 'ALREADY_COMPLETED'
  | 'CONTINUATION_REUSED'
  | 'LOCK_CONTENDED'
  | 'ALREADY_SETTLED'
  | 'MISSING_BODY';

export class InvalidOperationError extends Error {
  readonly code: InvalidOperationCode;

  constructor(code: InvalidOperationCode, message: string) {
    super(message);
    this.name = 'InvalidOperationError';
    this.code = code;
  }
}

export function isInvalidOperation(error: unknown): error is InvalidOperationError {
  return error instanceof InvalidOperationError;
}

/**
 * Rethrow errors gathered while resuming several continuations
 */
export function throwCollected(errors: readonly unknown[]): void {
  if (errors.length === 1) {
    throw errors[0];
  }
  if (errors.length > 1) {
    throw new AggregateError(errors, `${errors.length} continuations failed to resume`);
  }
}
