/**
 * Shared task state
 *
 * The record behind one task: completion flag, result slot, the waiter to
 * resume and the lock that arbitrates between the waiter registering and the
 * body completing.
 */

import type { ChainNode } from './core';
import type { Continuation } from './continuation';
import { InvalidOperationError } from './errors';
import { Mutex } from './lock';
import { debugState, misuse } from './log';

export type Slot<T> =
  | { status: 'pending' }
  | { status: 'resolved'; value: T }
  | { status: 'rejected'; error: unknown }
  | { status: 'taken' };

export type Outcome<T> = Extract<Slot<T>, { status: 'resolved' | 'rejected' }>;

export class TaskState<T> implements ChainNode {
  readonly lock: Mutex;

  private finished = false;
  private slot: Slot<T> = { status: 'pending' };
  private continuation: Continuation | undefined;
  private claimed = false;

  // Written only by the task's own driver.
  private sync = true;

  constructor(readonly label: string) {
    this.lock = new Mutex(`lock:${label}`);
  }

  get synchronous(): boolean {
    return this.sync;
  }

  get awaited(): boolean {
    return this.claimed;
  }

  get consumed(): boolean {
    return this.slot.status === 'taken';
  }

  /**
   * True iff the body never suspended and has finished. Takes no lock.
   */
  isFastPathReady(): boolean {
    return this.sync && this.finished;
  }

  isDone(): boolean {
    if (this.isFastPathReady()) {
      return true;
    }
    return this.lock.runExclusive(() => this.finished);
  }

  markSuspended(): void {
    if (this.sync) {
      debugState('[%s] no longer synchronous', this.label);
    }
    this.sync = false;
  }

  claim(): void {
    if (this.claimed) {
      throw misuse(this.label, new InvalidOperationError('ALREADY_AWAITED', `task "${this.label}" can only be awaited once`));
    }
    this.claimed = true;
  }

  /**
   * Store `continuation` to be resumed on completion
   *
   * @returns false when the task has already completed and the caller must not suspend
   */
  registerContinuation(continuation: Continuation): boolean {
    return this.lock.runExclusive(() => {
      if (this.finished) {
        debugState('[%s] %s arrived after completion', this.label, continuation.label);
        return false;
      }
      if (this.continuation) {
        throw misuse(
          this.label,
          new InvalidOperationError('ALREADY_AWAITED', `task "${this.label}" is already awaited by "${this.continuation.label}"`)
        );
      }
      this.continuation = continuation;
      debugState('[%s] %s registered', this.label, continuation.label);
      return true;
    });
  }

  /**
   * Record the outcome and detach whoever must be resumed
   */
  complete(outcome: Outcome<T>): Continuation | undefined {
    return this.lock.runExclusive(() => {
      if (this.finished) {
        throw misuse(this.label, new InvalidOperationError('ALREADY_COMPLETED', `task "${this.label}" has already completed`));
      }
      this.slot = outcome;
      this.finished = true;
      const next = this.continuation;
      this.continuation = undefined;
      return next;
    });
  }

  waiting(): Continuation | undefined {
    if (this.isFastPathReady()) {
      return undefined;
    }
    return this.lock.runExclusive(() => this.continuation);
  }

  /**
   * Move the result out of the slot. The failure is re-thrown as captured.
   */
  take(): T {
    if (!this.isDone()) {
      throw misuse(this.label, new InvalidOperationError('NOT_FINISHED', `task "${this.label}" has not finished`));
    }
    const slot = this.slot;
    switch (slot.status) {
      case 'resolved':
        this.slot = { status: 'taken' };
        return slot.value;
      case 'rejected':
        this.slot = { status: 'taken' };
        throw slot.error;
      default:
        throw misuse(this.label, new InvalidOperationError('RESULT_TAKEN', `result of task "${this.label}" was already taken`));
    }
  }
}
