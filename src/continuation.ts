import type { ChainNode } from './core';
import { InvalidOperationError } from './errors';
import { misuse } from './log';

/**
 * One-shot "resume here" handle given to an awaitable.
 *
 * `owner` points back at the waiter's state for introspection only; it is
 * never used to keep the waiter alive or to drive it.
 */
export class Continuation {
  private resumed = false;
  private expired = false;

  constructor(
    readonly label: string,
    private readonly onResume: () => void,
    readonly owner?: ChainNode
  ) {}

  get spent(): boolean {
    return this.resumed || this.expired;
  }

  resume(): void {
    if (this.resumed) {
      throw misuse(this.label, new InvalidOperationError('CONTINUATION_REUSED', `continuation of "${this.label}" was already resumed`));
    }
    if (this.expired) {
      throw misuse(
        this.label,
        new InvalidOperationError('CONTINUATION_REUSED', `continuation of "${this.label}" was refused by the awaitable and cannot be resumed`)
      );
    }
    this.resumed = true;
    this.onResume();
  }

  /**
   * Called by the driver when `suspend()` returned false
   */
  expire(): void {
    this.expired = true;
  }
}
