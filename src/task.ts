/**
 * Task handle
 *
 * The single owner of one eagerly-started computation. A task is itself an
 * awaitable, so task bodies wait on each other with `yield*`.
 */

import type { Awaitable, Body, Operation } from './core';
import type { Continuation } from './continuation';
import { start } from './dispatcher';
import { InvalidOperationError } from './errors';
import { debugTask, misuse } from './log';
import { TaskState } from './state';

export class Task<T> implements Awaitable<T>, Operation<T> {
  private state: TaskState<T> | undefined;

  /**
   * An empty handle unless bound to `state`. Use `task()` to start one.
   */
  constructor(state?: TaskState<T>) {
    this.state = state;
  }

  get empty(): boolean {
    return this.state === undefined;
  }

  get label(): string {
    return this.bound().label;
  }

  /**
   * Whether the computation has finished entirely
   */
  get done(): boolean {
    return this.bound().isDone();
  }

  /**
   * Lock-free when the body never suspended
   */
  ready(): boolean {
    return this.bound().isDone();
  }

  suspend(continuation: Continuation): boolean {
    return this.bound().registerContinuation(continuation);
  }

  /**
   * The produced value, moved out of the task. Throws the body's failure
   * as it was thrown. Works once.
   */
  resume(): T {
    return this.bound().take();
  }

  /**
   * Mark this task as awaited. A second claim is rejected.
   */
  claim(): void {
    this.bound().claim();
  }

  *[Symbol.iterator](): Iterator<Awaitable<unknown>, T, unknown> {
    this.claim();
    yield this;
    return this.resume();
  }

  /**
   * Transfer ownership to a new handle, leaving this one empty
   */
  move(): Task<T> {
    const moved = new Task(this.state);
    this.state = undefined;
    return moved;
  }

  /**
   * Move `other` into this handle, which must be empty or finished
   */
  assign(other: Task<T>): this {
    if (other === this) {
      return this;
    }
    this.destroy();
    this.state = other.state;
    other.state = undefined;
    return this;
  }

  /**
   * Release the computation. Fails if it is still running, since a stored
   * continuation could otherwise resume it after release.
   */
  destroy(): void {
    const state = this.state;
    if (!state) {
      return;
    }
    if (!state.isDone()) {
      throw misuse(state.label, new InvalidOperationError('NOT_FINISHED', `task "${state.label}" must be finished before it is destroyed`));
    }
    this.state = undefined;
    debugTask('[%s] destroyed%s', state.label, state.consumed ? '' : ' with an unclaimed result');
  }

  /** @internal */
  boundState(): TaskState<T> | undefined {
    return this.state;
  }

  private bound(): TaskState<T> {
    if (!this.state) {
      throw misuse('task', new InvalidOperationError('EMPTY_TASK', 'cannot use an empty task'));
    }
    return this.state;
  }
}

/**
 * Create a task and start running it immediately
 *
 * The body runs on the current call stack until its first real suspension,
 * so a body that never suspends has finished by the time `task()` returns.
 *
 * @example
 * const user = task('fetch-user', function* () {
 *   return yield* fromPromise(db.user(id));
 * });
 *
 * const streams = task('fetch-streams', function* () {
 *   const { id } = yield* user;
 *   return yield* fromPromise(db.streams(id));
 * });
 */
export function task<T>(label: string, body: Body<T>): Task<T>;
export function task<T>(body: Body<T>): Task<T>;
export function task<T>(labelOrBody: string | Body<T>, maybeBody?: Body<T>): Task<T> {
  let label: string;
  let body: Body<T> | undefined;
  if (typeof labelOrBody === 'string') {
    label = labelOrBody;
    body = maybeBody;
  } else {
    label = labelOrBody.name || 'anonymous';
    body = labelOrBody;
  }
  if (!body) {
    throw misuse(label, new InvalidOperationError('MISSING_BODY', `task "${label}" has no body`));
  }

  const state = new TaskState<T>(label);
  const handle = new Task(state);
  start(state, body);
  return handle;
}
