/**
 * Tests for task introspection
 */

import { describe, it, expect } from 'vitest';
import { Deferred, getResumeChain, inspect, run, Task, task } from '../src/index';

describe('inspect', () => {
  it('should describe an empty handle', () => {
    expect(inspect(new Task<number>())).toEqual({
      label: undefined,
      status: 'empty',
      synchronous: false,
      awaited: false,
      waiter: undefined,
      lockAcquisitions: 0,
    });
  });

  it('should describe a synchronously finished task', () => {
    const t = task('s', function* () {
      return 1;
    });

    expect(inspect(t)).toEqual({
      label: 's',
      status: 'finished',
      synchronous: true,
      awaited: false,
      waiter: undefined,
      lockAcquisitions: 1,
    });
  });

  it('should describe a suspended task and its waiter', () => {
    const gate = new Deferred<number>('gate');
    const child = task('child', function* () {
      return yield* gate;
    });
    task('parent', function* () {
      return (yield* child) + 1;
    });

    // parent's readiness check and registration
    expect(inspect(child)).toEqual({
      label: 'child',
      status: 'running',
      synchronous: false,
      awaited: true,
      waiter: 'parent',
      lockAcquisitions: 2,
    });
  });
});

describe('getResumeChain', () => {
  it('should follow waiters from the innermost task outwards', async () => {
    const gate = new Deferred<number>('gate');
    const child = task('child', function* () {
      return yield* gate;
    });
    const parent = task('parent', function* () {
      return (yield* child) + 1;
    });

    expect(getResumeChain(child)).toEqual(['child', 'parent']);

    const pending = run(parent);
    expect(getResumeChain(child)).toEqual(['child', 'parent', 'run(parent)']);

    gate.resolve(41);

    expect(await pending).toEqual({ ok: true, value: 42 });
    expect(getResumeChain(child)).toEqual(['child']);
    expect(inspect(child).status).toBe('consumed');
  });

  it('should be empty for an empty handle', () => {
    expect(getResumeChain(new Task<string>())).toEqual([]);
  });
});
