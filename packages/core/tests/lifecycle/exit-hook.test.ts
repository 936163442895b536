import { describe, it, expect, vi } from 'vitest';
import { installExitHook } from '../../src/index.js';

function lastListener(event: 'beforeExit' | 'exit'): (code: number) => void {
  const listeners = event === 'exit' ? process.listeners('exit') : process.listeners('beforeExit');
  const listener = listeners[listeners.length - 1];
  if (!listener) throw new Error(`no ${event} listener`);
  return listener;
}

describe('installExitHook', () => {
  it('drains once on beforeExit and reports on exit', () => {
    const beforeExit = vi.fn(() => Promise.resolve());
    const exit = vi.fn();
    const hook = installExitHook({ beforeExit, exit });

    try {
      const onBeforeExit = lastListener('beforeExit');
      onBeforeExit(0);
      onBeforeExit(0);
      lastListener('exit')(0);

      expect(beforeExit).toHaveBeenCalledTimes(1);
      expect(exit).toHaveBeenCalledTimes(1);
    } finally {
      hook.uninstall();
    }
  });

  it('warns when the exit drain fails', async () => {
    const printed = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const hook = installExitHook({
      beforeExit: () => Promise.reject(new Error('Drain did not finish within 2000ms; 4 event(s) were not flushed')),
      exit: () => undefined,
    });

    try {
      lastListener('beforeExit')(0);
      await vi.waitFor(() =>
        expect(printed).toHaveBeenCalledWith(
          expect.stringContaining('Warning: Exit drain failed: Drain did not finish within 2000ms; 4 event(s) were not flushed'),
        ),
      );
    } finally {
      hook.uninstall();
      printed.mockRestore();
    }
  });

  it('removes both listeners on uninstall', () => {
    const before = [process.listenerCount('beforeExit'), process.listenerCount('exit')];
    const hook = installExitHook({ beforeExit: () => Promise.resolve(), exit: () => undefined });
    expect([process.listenerCount('beforeExit'), process.listenerCount('exit')]).toEqual([before[0] + 1, before[1] + 1]);
    hook.uninstall();
    expect([process.listenerCount('beforeExit'), process.listenerCount('exit')]).toEqual(before);
  });
});
