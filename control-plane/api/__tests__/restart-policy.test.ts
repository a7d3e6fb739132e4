import { describe, it, expect } from 'vitest';

import { WorkerRestartPolicy } from '../restart-policy';

describe('WorkerRestartPolicy', () => {
  it('replaces a worker that ran for a while after the base delay', () => {
    const policy = new WorkerRestartPolicy();

    expect(policy.onExit(60000)).toEqual({ restart: true, delayMs: 1000 });
    expect(policy.onExit(60000)).toEqual({ restart: true, delayMs: 1000 });
  });

  it('backs off on workers that die at startup and then gives up', () => {
    const policy = new WorkerRestartPolicy();

    expect([1, 2, 3, 4].map(() => policy.onExit(50))).toEqual([
      { restart: true, delayMs: 1000 },
      { restart: true, delayMs: 2000 },
      { restart: true, delayMs: 4000 },
      { restart: true, delayMs: 8000 },
    ]);
    expect(policy.onExit(50)).toEqual({ restart: false, rapidExits: 5 });
  });

  it('caps the delay', () => {
    const policy = new WorkerRestartPolicy({ baseDelayMs: 1000, maxDelayMs: 3000, maxRapidExits: 10 });

    const delays = [1, 2, 3, 4].map(() => {
      const decision = policy.onExit(0);
      return decision.restart ? decision.delayMs : -1;
    });

    expect(delays).toEqual([1000, 2000, 3000, 3000]);
  });

  it('forgets early exits once a worker has run long enough', () => {
    const policy = new WorkerRestartPolicy({ maxRapidExits: 3 });

    policy.onExit(10);
    policy.onExit(10);
    expect(policy.onExit(10000)).toEqual({ restart: true, delayMs: 1000 });
    expect(policy.onExit(10)).toEqual({ restart: true, delayMs: 1000 });
  });
});
