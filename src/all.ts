/**
 * Combine multiple tasks into a single task.
 *
 * Every input task is already running, so they make progress concurrently;
 * the combined task only collects their results. Results come back as a tuple
 * in input order, and the first failure in that order becomes the combined
 * failure.
 *
 * This is the task equivalent of Promise.all(), without its early rejection:
 * there is no cancellation, so a later task that fails while an earlier one is
 * still running is only observed once the earlier one has finished.
 */

import type { UnwrapTasks } from './core';
import { task, type Task } from './task';

/**
 * Await tasks in order and collect their values
 *
 * Each input is claimed by the combined task and must not be awaited
 * elsewhere. Value types are inferred per position.
 *
 * @param label - Label of the combined task
 * @param tasks - Tasks to wait for
 * @returns Task that resolves to a tuple of results
 *
 * @example
 * const [profile, settings] = yield* all('user-data', [profileTask, settingsTask]);
 */
export function all<const TTasks extends readonly Task<unknown>[]>(
  label: string,
  tasks: TTasks
): Task<UnwrapTasks<TTasks>> {
  return task(label, function* () {
    const results: unknown[] = [];
    for (const t of tasks) {
      results.push(yield* t);
    }
    // Collected in input order, one value per task
    return results as UnwrapTasks<TTasks>;
  });
}
