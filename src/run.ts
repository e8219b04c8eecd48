/**
 * Promise bridge
 *
 * Lets code outside any task body wait for a task with `await`.
 */

import { err, ok, type Result } from './core';
import { Continuation } from './continuation';
import type { Task } from './task';

/**
 * Wait for a task and collect its outcome
 *
 * - Resolves synchronously-finished tasks without taking the lock
 * - Failures of the body resolve to `{ ok: false, error }`
 * - Misuse (empty handle, second await) rejects
 *
 * @example
 * const result = await run(myTask);
 * if (result.ok) {
 *   console.log(result.value);
 * } else {
 *   console.error(result.error);
 * }
 */
export function run<T>(task: Task<T>): Promise<Result<T>> {
  return new Promise<Result<T>>((resolve) => {
    const settle = () => {
      let result: Result<T>;
      try {
        result = ok(task.resume());
      } catch (error) {
        result = err(error);
      }
      resolve(result);
    };

    task.claim();

    // Fast path: finished before anyone asked
    if (task.ready()) {
      settle();
      return;
    }

    const continuation = new Continuation(`run(${task.label})`, settle);
    if (!task.suspend(continuation)) {
      continuation.expire();
      settle();
    }
  });
}

/**
 * Wait for a task, rejecting with its failure as thrown
 */
export async function toPromise<T>(task: Task<T>): Promise<T> {
  const result = await run(task);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
