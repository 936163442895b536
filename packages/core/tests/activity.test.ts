import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  configureActivityLogger,
  getActivityLogger,
  getEventCount,
  getSessionId,
  logToolUsage,
  resetActivityLogger,
  shutdown,
  withToolUsage,
} from '../src/index.js';
import { MemorySink } from './helpers/memory-sink.js';

afterEach(async () => {
  await resetActivityLogger();
  vi.restoreAllMocks();
});

describe('process-wide activity logger', () => {
  it('returns the same instance until reset', async () => {
    const first = getActivityLogger();
    expect(getActivityLogger()).toBe(first);
    await resetActivityLogger();
    expect(getActivityLogger()).not.toBe(first);
  });

  it('delegates to the configured logger', async () => {
    const sink = new MemorySink();
    await configureActivityLogger(
      { installExitHook: false, rotateOnStart: false },
      { sinkFactory: () => sink },
    );

    expect(getSessionId()).toBeNull();
    const parent = logToolUsage({ agent: 'a', tool: 'Read', description: 'x' });
    withToolUsage({ agent: 'a', tool: 'Edit', description: 'y' }, () => undefined);
    expect(getEventCount()).toBe(2);
    expect(getSessionId()).toMatch(/^session_/);

    const report = await shutdown();
    expect(report.written).toBe(2);
    expect(parent).toBe('evt_001');
    expect(sink.ids()).toEqual(['evt_001', 'evt_002']);
  });

  it('lets overrides win over the environment', async () => {
    vi.stubEnv('ACTIVITY_TRAIL_STRICT_MODE', 'false');
    const log = await configureActivityLogger({ strictMode: true, installExitHook: false });
    expect(log.config.strictMode).toBe(true);
    vi.unstubAllEnvs();
  });
});
