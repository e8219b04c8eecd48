/**
 * Task - Eager single-waiter computations
 *
 * Start work now, suspend until it is done. A task begins running the moment
 * it is created and finishes with exactly one value or failure, handed to at
 * most one waiter.
 *
 * @example
 * import { task, run, fromPromise } from 'eager-task';
 *
 * const userTask = task('user', function* () {
 *   return yield* fromPromise(dbUser(id));
 * });
 *
 * const streamsTask = task('streams', function* () {
 *   const user = yield* userTask;
 *   return yield* fromPromise(dbStreams(user.id));
 * });
 *
 * const result = await run(streamsTask);
 */

export type { Awaitable, Operation, Body, Result, Ok, Err, TaskValue, UnwrapTasks, ChainNode } from './core.js';
export { ok, err } from './core.js';
export { Task, task } from './task.js';
export { Continuation } from './continuation.js';
export { Mutex } from './lock.js';
export { TaskState } from './state.js';
export type { Slot, Outcome } from './state.js';
export { InvalidOperationError, isInvalidOperation } from './errors.js';
export type { InvalidOperationCode } from './errors.js';
export { Deferred, wait, fromPromise, sleep } from './awaitables.js';
export { run, toPromise } from './run.js';
export { all } from './all.js';
export { inspect, getResumeChain } from './trace.js';
export type { TaskSnapshot, TaskStatus } from './trace.js';
