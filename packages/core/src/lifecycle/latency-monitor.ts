import { logger } from '../utils/logger.js';

export interface LatencySnapshot {
  /** Submissions measured. */
  count: number;
  meanMs: number;
  maxMs: number;
  /** Submissions slower than the budget. */
  overBudget: number;
  budgetMs: number;
}

/**
 * Tracks how long producer calls take end to end. A call over budget is
 * reported through the fallback logger, once per monitor; it is never
 * thrown into the caller.
 */
export class LatencyMonitor {
  private count = 0;
  private totalMs = 0;
  private maxMs = 0;
  private overBudget = 0;

  constructor(private readonly budgetMs: number) {}

  record(elapsedMs: number, eventId: string): void {
    this.count += 1;
    this.totalMs += elapsedMs;
    this.maxMs = Math.max(this.maxMs, elapsedMs);
    if (elapsedMs <= this.budgetMs) return;

    this.overBudget += 1;
    logger.warnOnce(
      'submit-latency',
      `Logging ${eventId} took ${elapsedMs.toFixed(3)}ms (budget ${this.budgetMs}ms)`,
    );
  }

  snapshot(): LatencySnapshot {
    return {
      count: this.count,
      meanMs: this.count === 0 ? 0 : this.totalMs / this.count,
      maxMs: this.maxMs,
      overBudget: this.overBudget,
      budgetMs: this.budgetMs,
    };
  }
}
