/**
 * Task driver and completion dispatcher
 *
 * Steps a task body from creation to its first real suspension, back in from
 * every continuation, and finalizes it exactly once.
 */

import type { Awaitable, Body } from './core';
import { Continuation } from './continuation';
import { throwCollected } from './errors';
import { debugTask } from './log';
import type { Outcome, TaskState } from './state';

type Frame<T> = {
  state: TaskState<T>;
  iterator: Iterator<Awaitable<unknown>, T, unknown>;
};

type Input = { type: 'next' } | { type: 'throw'; error: unknown };

const NEXT: Input = { type: 'next' };

/**
 * Begin running `body` on the current call stack
 */
export function start<T>(state: TaskState<T>, body: Body<T>): void {
  debugTask('[%s] starting', state.label);

  let iterator: Iterator<Awaitable<unknown>, T, unknown>;
  try {
    iterator = body()[Symbol.iterator]();
  } catch (error) {
    finalize(state, { status: 'rejected', error });
    return;
  }

  step({ state, iterator }, NEXT);
}

function step<T>(frame: Frame<T>, first: Input): void {
  const { state, iterator } = frame;
  let input = first;

  for (;;) {
    let result: IteratorResult<Awaitable<unknown>, T>;
    try {
      result = advance(iterator, input);
    } catch (error) {
      finalize(state, { status: 'rejected', error });
      return;
    }

    if (result.done) {
      finalize(state, { status: 'resolved', value: result.value });
      return;
    }

    const awaitable = result.value;
    try {
      if (awaitable.ready()) {
        input = NEXT;
        continue;
      }

      state.markSuspended();
      const continuation = new Continuation(state.label, () => step(frame, NEXT), state);
      if (awaitable.suspend(continuation)) {
        debugTask('[%s] suspended', state.label);
        return;
      }

      // Completed between ready() and suspend(): carry on without suspending.
      continuation.expire();
      input = NEXT;
    } catch (error) {
      input = { type: 'throw', error };
    }
  }
}

function advance<T>(iterator: Iterator<Awaitable<unknown>, T, unknown>, input: Input): IteratorResult<Awaitable<unknown>, T> {
  if (input.type === 'next') {
    return iterator.next();
  }
  if (!iterator.throw) {
    throw input.error;
  }
  return iterator.throw(input.error);
}

// Waiters of completed tasks, resumed in completion order by the
// outermost finalize so the stack stays flat however deep the chain is.
const resumable: Continuation[] = [];
let draining = false;

/**
 * Runs once per task, after the body's iterator has closed
 */
function finalize<T>(state: TaskState<T>, outcome: Outcome<T>): void {
  const next = state.complete(outcome);
  debugTask('[%s] %s%s', state.label, outcome.status, next ? `, resuming ${next.label}` : '');
  if (!next) {
    return;
  }

  resumable.push(next);
  if (draining) {
    return;
  }

  draining = true;
  const errors: unknown[] = [];
  try {
    for (let continuation = resumable.shift(); continuation; continuation = resumable.shift()) {
      try {
        continuation.resume();
      } catch (error) {
        errors.push(error);
      }
    }
  } finally {
    draining = false;
  }
  throwCollected(errors);
}
