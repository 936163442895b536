import chalk from 'chalk';

/**
 * Fallback channel for the pipeline's own diagnostics. Everything goes to
 * stderr so it never interleaves with a host's stdout.
 */

let verbose = process.env['ACTIVITY_TRAIL_VERBOSE'] === '1';
const warned = new Set<string>();

/** Enable or disable verbose logging. */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

/** Returns whether verbose mode is active. */
export function isVerbose(): boolean {
  return verbose;
}

/** Forget which `warnOnce` keys have fired. */
export function resetWarnings(): void {
  warned.clear();
}

function describe(err: unknown): string {
  if (err instanceof Error) {
    return verbose ? (err.stack ?? err.message) : err.message;
  }
  return String(err);
}

export const logger = {
  debug(message: string): void {
    if (verbose) {
      console.error(chalk.gray(`[activity-trail] ${message}`));
    }
  },

  info(message: string): void {
    console.error(`[activity-trail] ${message}`);
  },

  warn(message: string): void {
    console.error(chalk.yellow(`[activity-trail] Warning: ${message}`));
  },

  /** Emit a warning the first time `key` is seen; later calls only reach debug. */
  warnOnce(key: string, message: string): void {
    if (warned.has(key)) {
      logger.debug(message);
      return;
    }
    warned.add(key);
    logger.warn(message);
  },

  error(message: string, err?: unknown): void {
    const suffix = err === undefined ? '' : `: ${describe(err)}`;
    console.error(chalk.red(`[activity-trail] Error: ${message}${suffix}`));
  },
};
