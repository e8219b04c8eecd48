/**
 * Awaitables that complete from a later turn of the event loop
 */

import type { Awaitable, Operation } from './core';
import type { Continuation } from './continuation';
import { InvalidOperationError, throwCollected } from './errors';
import { Mutex } from './lock';
import { debugAwaitable, misuse } from './log';
import type { Outcome } from './state';

/**
 * Suspend on any awaitable and evaluate to its result
 *
 * @example
 * const body = yield* wait(fromPromise(fetch(url)));
 */
export function* wait<T>(awaitable: Awaitable<T>): Generator<Awaitable<unknown>, T, unknown> {
  yield awaitable;
  return awaitable.resume();
}

/**
 * A value settled by hand, possibly from a timer or I/O callback
 *
 * Any number of continuations may wait on it; settling resumes each of them
 * once, in registration order.
 */
export class Deferred<T> implements Awaitable<T>, Operation<T> {
  private readonly lock: Mutex;
  private outcome: Outcome<T> | undefined;
  private waiters: Continuation[] = [];

  constructor(readonly label: string = 'deferred') {
    this.lock = new Mutex(`lock:${label}`);
  }

  get settled(): boolean {
    return this.ready();
  }

  ready(): boolean {
    return this.lock.runExclusive(() => this.outcome !== undefined);
  }

  suspend(continuation: Continuation): boolean {
    return this.lock.runExclusive(() => {
      if (this.outcome) {
        return false;
      }
      this.waiters.push(continuation);
      return true;
    });
  }

  resume(): T {
    const outcome = this.outcome;
    if (!outcome) {
      throw misuse(this.label, new InvalidOperationError('NOT_FINISHED', `"${this.label}" has not settled`));
    }
    if (outcome.status === 'rejected') {
      throw outcome.error;
    }
    return outcome.value;
  }

  resolve = (value: T): void => {
    this.settle({ status: 'resolved', value });
  };

  reject = (error: unknown): void => {
    this.settle({ status: 'rejected', error });
  };

  [Symbol.iterator](): Iterator<Awaitable<unknown>, T, unknown> {
    return wait(this);
  }

  private settle(outcome: Outcome<T>): void {
    const waiters = this.lock.runExclusive(() => {
      if (this.outcome) {
        throw misuse(this.label, new InvalidOperationError('ALREADY_SETTLED', `"${this.label}" has already settled`));
      }
      this.outcome = outcome;
      const pending = this.waiters;
      this.waiters = [];
      return pending;
    });

    debugAwaitable('[%s] %s, resuming %d waiter(s)', this.label, outcome.status, waiters.length);
    const errors: unknown[] = [];
    for (const waiter of waiters) {
      try {
        waiter.resume();
      } catch (error) {
        errors.push(error);
      }
    }
    throwCollected(errors);
  }
}

/**
 * Adapt a promise to the await protocol
 *
 * A promise's state cannot be read synchronously, so the result is never
 * ready before the promise's reaction has run.
 */
export function fromPromise<T>(promise: PromiseLike<T>, label = 'promise'): Deferred<T> {
  const deferred = new Deferred<T>(label);
  promise.then(deferred.resolve, deferred.reject);
  return deferred;
}

/**
 * Suspend for `duration` milliseconds
 */
export function sleep(duration: number): Operation<void> {
  const deferred = new Deferred<void>(`sleep(${duration})`);
  setTimeout(() => deferred.resolve(), duration);
  return deferred;
}
