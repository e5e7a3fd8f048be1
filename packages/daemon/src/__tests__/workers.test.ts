/**
 * BackgroundWorkers: scheduling, overlap prevention, error isolation, stop.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { BackgroundWorkers } from '../lifecycle/index.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('BackgroundWorkers', () => {
  it('runs a registered handler on its interval', async () => {
    vi.useFakeTimers();
    const workers = new BackgroundWorkers();
    const handler = vi.fn();
    workers.register('tick', { interval: 1000, handler });
    workers.startAll();

    await vi.advanceTimersByTimeAsync(3000);
    expect(handler).toHaveBeenCalledTimes(3);

    await workers.stopAll();
    await vi.advanceTimersByTimeAsync(3000);
    expect(handler).toHaveBeenCalledTimes(3);
  });

  it('skips a tick while the previous run is still in progress', async () => {
    vi.useFakeTimers();
    const workers = new BackgroundWorkers();
    let calls = 0;
    workers.register('slow', {
      interval: 100,
      handler: async () => {
        calls++;
        await new Promise((r) => setTimeout(r, 250));
      },
    });
    workers.startAll();

    await vi.advanceTimersByTimeAsync(300);
    expect(calls).toBe(1);
    expect(workers.isRunning('slow')).toBe(true);

    await vi.advanceTimersByTimeAsync(100);
    expect(calls).toBe(2);
    await workers.stopAll(0);
  });

  it('reports handler errors and keeps running', async () => {
    const onError = vi.fn();
    const workers = new BackgroundWorkers({ onError });
    const boom = new Error('boom');
    workers.register('fail', {
      interval: 1000,
      handler: () => {
        throw boom;
      },
    });

    expect(await workers.runNow('fail')).toBe(true);
    expect(onError).toHaveBeenCalledWith('fail', boom);
    expect(workers.isRunning('fail')).toBe(false);
  });

  it('runNow returns false for unknown or busy workers', async () => {
    const workers = new BackgroundWorkers();
    let release: () => void = () => undefined;
    workers.register('busy', {
      interval: 1000,
      handler: () => new Promise<void>((r) => {
        release = r;
      }),
    });

    expect(await workers.runNow('missing')).toBe(false);
    const first = workers.runNow('busy');
    expect(await workers.runNow('busy')).toBe(false);
    release();
    expect(await first).toBe(true);
  });

  it('rejects a non-positive interval', () => {
    const workers = new BackgroundWorkers();
    expect(() => workers.register('bad', { interval: 0, handler: () => undefined })).toThrow(
      'Worker bad: interval must be a positive number of ms',
    );
  });
});
