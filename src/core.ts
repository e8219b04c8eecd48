/**
 * Task - Eager single-waiter computations
 *
 * Core types shared by the task state, the driver and the awaitables
 * a task body can suspend on.
 */

import type { Continuation } from './continuation';

/**
 * Result of a computation that can succeed or fail
 */
export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E = unknown> = Ok<T> | Err<E>;

/**
 * Anything a task body can suspend on
 *
 * - `ready()` is true when no suspension is needed
 * - `suspend(continuation)` registers the continuation; false means the
 *   awaitable completed in the meantime and the caller must not suspend
 * - `resume()` produces the value or re-throws the failure
 */
export interface Awaitable<T> {
  ready(): boolean;
  suspend(continuation: Continuation): boolean;
  resume(): T;
}

/**
 * Something a task body consumes with `yield*`
 *
 * The iterator yields the awaitables it waits on and returns the final value,
 * so `const user = yield* fetchUser;` evaluates to the user.
 *
 * @template T - Value produced once the operation completes
 */
export interface Operation<T> {
  [Symbol.iterator](): Iterator<Awaitable<unknown>, T, unknown>;
}

export type Body<T> = () => Operation<T>;

/**
 * A link in the chain of waiters a completion will resume
 */
export interface ChainNode {
  readonly label: string;
  waiting(): Continuation | undefined;
}

export type TaskValue<TTask> = TTask extends Awaitable<infer U> ? U : never;

export type UnwrapTasks<T extends readonly Awaitable<unknown>[]> = {
  -readonly [K in keyof T]: TaskValue<T[K]>;
};

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
