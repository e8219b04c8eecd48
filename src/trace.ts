/**
 * Task introspection utilities
 *
 * Read-only views of a task for debugging. Nothing here claims, resumes or
 * extracts anything.
 */

import type { ChainNode } from './core';
import type { Task } from './task';

export type TaskStatus = 'empty' | 'running' | 'finished' | 'consumed';

export interface TaskSnapshot {
  label: string | undefined;
  status: TaskStatus;
  synchronous: boolean;
  awaited: boolean;
  /** Label of the registered continuation, if any */
  waiter: string | undefined;
  lockAcquisitions: number;
}

/**
 * Describe the current state of a task
 *
 * Reading a suspended task's status and waiter takes its lock, so
 * `lockAcquisitions` is read first.
 */
export function inspect<T>(task: Task<T>): TaskSnapshot {
  const state = task.boundState();
  if (!state) {
    return { label: undefined, status: 'empty', synchronous: false, awaited: false, waiter: undefined, lockAcquisitions: 0 };
  }

  const lockAcquisitions = state.lock.acquisitions;
  let status: TaskStatus = 'running';
  if (state.consumed) {
    status = 'consumed';
  } else if (state.isDone()) {
    status = 'finished';
  }

  return {
    label: state.label,
    status,
    synchronous: state.synchronous,
    awaited: state.awaited,
    waiter: state.waiting()?.label,
    lockAcquisitions,
  };
}

/**
 * Get the chain of waiters a completion will resume
 *
 * Starts at the task itself and follows each registered continuation back to
 * the task waiting on it. A continuation with no owning task (such as `run`)
 * ends the chain.
 *
 * @example
 * const chain = getResumeChain(fetchUser);
 * // ['fetch-user', 'load-profile', 'run(load-profile)']
 */
export function getResumeChain<T>(task: Task<T>): string[] {
  const start = task.boundState();
  if (!start) return [];

  const visited = new Set<ChainNode>();
  const chain: string[] = [];

  let node: ChainNode | undefined = start;
  while (node && !visited.has(node)) {
    visited.add(node);
    chain.push(node.label);

    const next = node.waiting();
    if (!next) break;
    if (!next.owner) {
      chain.push(next.label);
      break;
    }
    node = next.owner;
  }

  return chain;
}
