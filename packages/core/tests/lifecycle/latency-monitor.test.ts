import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LatencyMonitor, resetWarnings } from '../../src/index.js';

beforeEach(() => {
  resetWarnings();
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('LatencyMonitor', () => {
  it('starts empty', () => {
    expect(new LatencyMonitor(1).snapshot()).toEqual({ count: 0, meanMs: 0, maxMs: 0, overBudget: 0, budgetMs: 1 });
  });

  it('tracks count, mean, max and overruns', () => {
    const monitor = new LatencyMonitor(1);
    monitor.record(0.5, 'evt_001');
    monitor.record(3, 'evt_002');
    monitor.record(2.5, 'evt_003');

    expect(monitor.snapshot()).toEqual({ count: 3, meanMs: 2, maxMs: 3, overBudget: 2, budgetMs: 1 });
  });

  it('warns about the first overrun only', () => {
    const monitor = new LatencyMonitor(1);
    monitor.record(3, 'evt_001');
    monitor.record(4, 'evt_002');

    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Logging evt_001 took 3.000ms (budget 1ms)'),
    );
  });
});
