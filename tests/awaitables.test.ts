/**
 * Tests for the awaitables task bodies suspend on
 */

import { describe, it, expect, vi } from 'vitest';
import { Continuation, Deferred, InvalidOperationError, fromPromise, sleep, task, toPromise } from '../src/index';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('Deferred', () => {
  it('should resume every waiter once, in registration order', () => {
    const deferred = new Deferred<number>('d');
    const order: string[] = [];

    const first = task('first', function* () {
      const value = yield* deferred;
      order.push('first');
      return value;
    });
    const second = task('second', function* () {
      const value = yield* deferred;
      order.push('second');
      return value + 1;
    });

    deferred.resolve(10);

    expect(order).toEqual(['first', 'second']);
    expect(first.resume()).toBe(10);
    expect(second.resume()).toBe(11);
  });

  it('should complete synchronously once settled', () => {
    const deferred = new Deferred<string>();
    deferred.resolve('now');

    const t = task('t', function* () {
      return yield* deferred;
    });

    expect(deferred.settled).toBe(true);
    expect(t.done).toBe(true);
    expect(t.resume()).toBe('now');
  });

  it('should refuse a continuation after settling', () => {
    const deferred = new Deferred<void>();
    deferred.resolve();

    const onResume = vi.fn();
    expect(deferred.suspend(new Continuation('late', onResume))).toBe(false);
    expect(onResume).not.toHaveBeenCalled();
  });

  it('should reject settling twice', () => {
    const deferred = new Deferred<number>('twice');
    deferred.resolve(1);

    expect(() => deferred.reject(new Error('late'))).toThrow(InvalidOperationError);
    expect(deferred.resume()).toBe(1);
  });

  it('should refuse to produce a result before settling', () => {
    const deferred = new Deferred<number>('early');

    expect(() => deferred.resume()).toThrow('"early" has not settled');
  });

  it('should resume the remaining waiters when one of them throws', () => {
    const deferred = new Deferred<number>('d');
    deferred.suspend(
      new Continuation('listener', () => {
        throw new Error('listener failed');
      })
    );
    const t = task('t', function* () {
      return (yield* deferred) * 2;
    });

    expect(() => deferred.resolve(4)).toThrow('listener failed');
    expect(t.done).toBe(true);
    expect(t.resume()).toBe(8);
  });

  it('should report every waiter that throws', () => {
    const deferred = new Deferred<void>('d');
    const failing = (label: string) =>
      new Continuation(label, () => {
        throw new Error(`${label} failed`);
      });
    deferred.suspend(failing('one'));
    deferred.suspend(failing('two'));

    let caught: unknown;
    try {
      deferred.resolve();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AggregateError);
    if (caught instanceof AggregateError) {
      expect(caught.errors).toEqual([new Error('one failed'), new Error('two failed')]);
    }
  });
});

describe('fromPromise', () => {
  it('should only become ready after the promise reaction runs', async () => {
    const deferred = fromPromise(Promise.resolve(3));

    expect(deferred.ready()).toBe(false);
    await delay(0);

    expect(deferred.ready()).toBe(true);
    expect(deferred.resume()).toBe(3);
  });

  it('should feed a promise rejection into the task body', async () => {
    const t = task('fetch', function* () {
      try {
        return yield* fromPromise(Promise.reject(new Error('offline')));
      } catch (error) {
        return error instanceof Error ? `recovered: ${error.message}` : 'unknown';
      }
    });

    expect(t.done).toBe(false);
    await expect(toPromise(t)).resolves.toBe('recovered: offline');
  });
});

describe('sleep', () => {
  it('should suspend until the timer fires', async () => {
    const t = task('nap', function* () {
      yield* sleep(10);
      return 'awake';
    });

    expect(t.done).toBe(false);
    await delay(30);

    expect(t.done).toBe(true);
    expect(t.resume()).toBe('awake');
  });
});
