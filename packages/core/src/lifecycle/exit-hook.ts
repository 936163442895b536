/**
 * Process exit integration. `beforeExit` fires while the event loop can
 * still run work, so the drain happens there; `exit` is synchronous and can
 * only report what was left behind.
 */

import { logger } from '../utils/logger.js';

export interface ExitHandlers {
  /** Runs once, on the first `beforeExit`. */
  beforeExit(): Promise<unknown>;
  /** Runs on `exit`; must not start async work. */
  exit(): void;
}

export interface ExitHook {
  uninstall(): void;
}

export function installExitHook(handlers: ExitHandlers): ExitHook {
  let fired = false;

  const onBeforeExit = (): void => {
    if (fired) return;
    fired = true;
    handlers.beforeExit().catch((err: unknown) => {
      logger.warn(`Exit drain failed: ${err instanceof Error ? err.message : String(err)}`);
    });
  };
  const onExit = (): void => {
    handlers.exit();
  };

  process.on('beforeExit', onBeforeExit);
  process.on('exit', onExit);

  return {
    uninstall(): void {
      process.off('beforeExit', onBeforeExit);
      process.off('exit', onExit);
    },
  };
}
