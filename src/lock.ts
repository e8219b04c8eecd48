/**
 * Mutual exclusion for task state
 *
 * Critical sections are synchronous and never span an await, so a second
 * acquisition while the lock is held can only come from re-entrance inside
 * the critical section itself. That is reported rather than waited on.
 */

import { InvalidOperationError } from './errors';
import { misuse } from './log';

export class Mutex {
  private held = false;
  private count = 0;

  constructor(readonly name: string = 'mutex') {}

  /** Number of times the lock has been acquired */
  get acquisitions(): number {
    return this.count;
  }

  get locked(): boolean {
    return this.held;
  }

  lock(): void {
    if (this.held) {
      throw misuse(
        this.name,
        new InvalidOperationError('LOCK_CONTENDED', `${this.name} is already held by this critical section`)
      );
    }
    this.held = true;
    this.count++;
  }

  unlock(): void {
    this.held = false;
  }

  /**
   * Run `fn` while holding the lock
   *
   * @example
   * const done = state.lock.runExclusive(() => state.done);
   */
  runExclusive<T>(fn: () => T): T {
    this.lock();
    try {
      return fn();
    } finally {
      this.unlock();
    }
  }
}
