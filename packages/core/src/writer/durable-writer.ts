/**
 * The single background consumer that owns a session's sink.
 *
 * Producers call {@link DurableWriter.submit}, which only pushes onto a
 * bounded in-memory queue and returns. One consumer loop drains the queue in
 * FIFO batches, serializes each event to one JSON line and appends the batch
 * to the sink.
 *
 * State machine: UNINITIALIZED → RUNNING → DRAINING → STOPPED. The writer
 * reaches STOPPED once the consumer has closed the sink, which after a drain
 * timeout may be later than the rejection of `drain()`.
 */

import fs from 'graceful-fs';
import path from 'node:path';
import { NotInitializedError, ShutdownTimeoutError, SinkLockError, SinkWriteError, StoppedError } from '../errors.js';
import type { OverflowPolicy } from '../config/types.js';
import type { RecordedEvent } from '../events/types.js';
import { acquireFileLock } from '../utils/file-lock.js';
import type { ReleaseLock } from '../utils/file-lock.js';
import { logger } from '../utils/logger.js';
import { BoundedQueue } from './bounded-queue.js';
import type { PushResult } from './bounded-queue.js';
import type { Sink } from './sink.js';

export type WriterState = 'UNINITIALIZED' | 'RUNNING' | 'DRAINING' | 'STOPPED';

/** A validated event waiting for the consumer. */
export interface QueueEntry {
  readonly event: RecordedEvent;
  /** `Date.now()` at submission. */
  readonly enqueuedAt: number;
}

export interface DurableWriterOptions {
  sink: Sink;
  capacity: number;
  overflowPolicy: OverflowPolicy;
  /** Longest the consumer sleeps before re-checking queue and state. */
  pollIntervalMs: number;
  /** Most events appended per sink write (default: 256). */
  batchSize?: number;
  /** Hold a proper-lockfile lock on this path while running. */
  lockPath?: string;
}

export interface WriterStats {
  state: WriterState;
  /** Entries waiting in the queue. */
  queued: number;
  capacity: number;
  /** Events appended to the sink. */
  written: number;
  /** Events lost to sink or serialization failures. */
  failed: number;
  /** Events lost to the overflow policy. */
  dropped: number;
  /** Events handed to the sink whose write has not returned yet. */
  pending: number;
  /** Uncompressed bytes appended. */
  bytesWritten: number;
  /** Longest time an event waited between submission and append. */
  maxQueueLatencyMs: number;
}

/** Outcome of a completed drain. */
export interface DrainReport {
  written: number;
  failed: number;
  dropped: number;
  /** Queued events discarded when the drain gave up. */
  unflushed: number;
  /** Events still in a sink write when the drain gave up; they reach the sink if that write completes. */
  pending: number;
  durationMs: number;
}

const DEFAULT_BATCH_SIZE = 256;

export class DurableWriter {
  private readonly queue: BoundedQueue<QueueEntry>;
  private readonly sink: Sink;
  private readonly pollIntervalMs: number;
  private readonly batchSize: number;
  private readonly lockPath: string | undefined;

  private currentState: WriterState = 'UNINITIALIZED';
  private consumer: Promise<void> | null = null;
  private draining: Promise<DrainReport> | null = null;
  private lastReport: DrainReport | null = null;
  private wakeUp: (() => void) | null = null;
  private writableWaiters: Array<() => void> = [];
  private releaseLock: ReleaseLock | null = null;
  private sinkOpen = false;
  private sinkUnavailable: Error | null = null;
  private abandoned = false;
  private saturated = false;
  private inFlight = 0;
  private written = 0;
  private failed = 0;
  private maxQueueLatencyMs = 0;

  constructor(options: DurableWriterOptions) {
    this.sink = options.sink;
    this.queue = new BoundedQueue<QueueEntry>(options.capacity, options.overflowPolicy);
    this.pollIntervalMs = options.pollIntervalMs;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.lockPath = options.lockPath;
  }

  get state(): WriterState {
    return this.currentState;
  }

  /** Start the consumer. Calling it again while running has no effect. */
  start(): void {
    if (this.currentState !== 'UNINITIALIZED') return;
    this.currentState = 'RUNNING';
    this.consumer = this.consume();
  }

  /**
   * Queue an event for the consumer. Never waits.
   *
   * @returns false when the event was discarded by the `drop-newest` policy
   * @throws {StoppedError} Once draining or stopped
   * @throws {NotInitializedError} Before `start()`
   * @throws {QueueSaturationError} Under the `reject` policy when the queue is full
   */
  submit(event: RecordedEvent): boolean {
    if (this.currentState === 'UNINITIALIZED') {
      throw new NotInitializedError('Writer has not been started');
    }
    if (this.currentState !== 'RUNNING') {
      throw new StoppedError(`Writer is ${this.currentState.toLowerCase()}; event ${event.event_id} was not accepted`);
    }

    let result: PushResult;
    try {
      result = this.queue.push({ event, enqueuedAt: Date.now() });
    } catch (err) {
      this.reportSaturation();
      throw err;
    }
    if (!result.accepted || result.evicted > 0) {
      this.reportSaturation();
    }
    this.wake();
    return result.accepted;
  }

  /** Resolves once the queue has room for at least one more entry. */
  whenWritable(): Promise<void> {
    if (!this.queue.isFull() || this.currentState !== 'RUNNING') return Promise.resolve();
    return new Promise((resolve) => {
      this.writableWaiters.push(resolve);
    });
  }

  stats(): WriterStats {
    return {
      state: this.currentState,
      queued: this.queue.length,
      capacity: this.queue.capacity,
      written: this.written,
      failed: this.failed,
      dropped: this.queue.dropped,
      pending: this.inFlight,
      bytesWritten: this.sink.bytesWritten,
      maxQueueLatencyMs: this.maxQueueLatencyMs,
    };
  }

  /**
   * Stop accepting events, write everything queued, close the sink.
   * Concurrent calls share one drain.
   *
   * @throws {ShutdownTimeoutError} If the queue is not empty after `timeoutMs`;
   *   the remaining entries are discarded and counted in `unflushed`, and a
   *   batch still being written is counted in `pending`. The state stays
   *   DRAINING until that write returns and the sink is closed.
   */
  drain(timeoutMs: number): Promise<DrainReport> {
    if (this.draining) return this.draining;
    if (this.currentState === 'STOPPED') {
      return Promise.resolve(this.lastReport ?? this.report(0, 0, 0));
    }
    if (this.currentState === 'UNINITIALIZED') {
      this.currentState = 'STOPPED';
      this.lastReport = this.report(0, 0, 0);
      return Promise.resolve(this.lastReport);
    }

    this.currentState = 'DRAINING';
    this.releaseWritableWaiters();
    this.wake();
    this.draining = this.runDrain(timeoutMs);
    return this.draining;
  }

  private async runDrain(timeoutMs: number): Promise<DrainReport> {
    const startedAt = Date.now();
    const consumer = this.consumer ?? Promise.resolve();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });
    const outcome = await Promise.race([consumer.then(() => 'done' as const), timedOut]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      // The consumer closes the sink and moves to STOPPED when its current write returns.
      this.abandoned = true;
      const unflushed = this.queue.clear();
      const pending = this.inFlight;
      this.wake();
      this.lastReport = this.report(unflushed, pending, Date.now() - startedAt);
      logger.warn(
        `Writer drain timed out after ${timeoutMs}ms; ${unflushed} event(s) discarded, ` +
        `${pending} still being written`,
      );
      throw new ShutdownTimeoutError(
        `Drain did not finish within ${timeoutMs}ms; ${unflushed} event(s) were not flushed ` +
        `and ${pending} were still being written`,
        timeoutMs,
        unflushed,
        pending,
      );
    }

    this.currentState = 'STOPPED';
    this.lastReport = this.report(0, 0, Date.now() - startedAt);
    return this.lastReport;
  }

  private report(unflushed: number, pending: number, durationMs: number): DrainReport {
    return {
      written: this.written,
      failed: this.failed,
      dropped: this.queue.dropped,
      unflushed,
      pending,
      durationMs,
    };
  }

  // ── Consumer ────────────────────────────────────────────────────────

  private async consume(): Promise<void> {
    try {
      await this.acquireSink();
      for (;;) {
        if (this.abandoned) break;
        if (this.queue.isEmpty()) {
          if (this.currentState !== 'RUNNING') break;
          await this.waitForWork();
          continue;
        }

        const batch = this.queue.takeBatch(this.batchSize);
        this.saturated = false;
        this.releaseWritableWaiters();
        this.inFlight = batch.length;
        await this.writeBatch(batch);
        this.inFlight = 0;
      }
    } catch (err) {
      logger.error('Writer consumer stopped unexpectedly', err);
    } finally {
      await this.releaseSink();
      if (this.currentState === 'DRAINING') this.currentState = 'STOPPED';
    }
  }

  private waitForWork(): Promise<void> {
    return new Promise((resolve) => {
      const finish = (): void => {
        clearTimeout(timer);
        this.wakeUp = null;
        resolve();
      };
      const timer = setTimeout(finish, this.pollIntervalMs);
      // An idle consumer must not keep the host process alive.
      timer.unref();
      this.wakeUp = finish;
    });
  }

  private wake(): void {
    this.wakeUp?.();
  }

  private releaseWritableWaiters(): void {
    const waiters = this.writableWaiters;
    this.writableWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private reportSaturation(): void {
    if (this.saturated) return;
    this.saturated = true;
    logger.warn(
      `Event queue full (${this.queue.capacity} entries, policy ${this.queue.policy}); ` +
      `${this.queue.dropped} event(s) lost so far`,
    );
  }

  /**
   * Take the sink lock, then open the sink. A lock held elsewhere means
   * another writer owns the file, so the session stops persisting. A failed
   * open is retried by the next batch.
   */
  private async acquireSink(): Promise<void> {
    try {
      if (this.lockPath) {
        await fs.promises.mkdir(path.dirname(this.lockPath), { recursive: true });
        this.releaseLock = await acquireFileLock(this.lockPath);
      }
    } catch (err) {
      const lockPath = this.lockPath ?? this.sink.path;
      const reason = err instanceof Error ? err.message : String(err);
      this.sinkUnavailable = err instanceof SinkLockError
        ? err
        : new SinkLockError(`Could not prepare lock on ${lockPath}: ${reason}`, lockPath);
      logger.error(`Sink ${this.sink.path} is locked; events will not be persisted`, err);
      return;
    }

    try {
      await this.sink.open();
      this.sinkOpen = true;
    } catch (err) {
      logger.error(`Could not open sink ${this.sink.path}; retrying with the next batch`, err);
    }
  }

  private async releaseSink(): Promise<void> {
    if (this.sinkOpen) {
      this.sinkOpen = false;
      try {
        await this.sink.close();
      } catch (err) {
        logger.error(`Failed to close sink ${this.sink.path}`, err);
      }
    }
    if (this.releaseLock) {
      const release = this.releaseLock;
      this.releaseLock = null;
      try {
        await release();
      } catch (err) {
        logger.error(`Failed to release lock on ${this.lockPath ?? this.sink.path}`, err);
      }
    }
  }

  private serialize(batch: QueueEntry[]): { chunk: string; count: number } {
    let chunk = '';
    let count = 0;
    for (const entry of batch) {
      try {
        chunk += `${JSON.stringify(entry.event)}\n`;
        count += 1;
      } catch (err) {
        this.failed += 1;
        logger.error(`Event ${entry.event.event_id} could not be serialized and was skipped`, err);
      }
    }
    return { chunk, count };
  }

  private async writeBatch(batch: QueueEntry[]): Promise<void> {
    const { chunk, count } = this.serialize(batch);
    if (count === 0) return;

    if (this.sinkUnavailable) {
      this.failed += count;
      logger.warnOnce(
        `sink-unavailable:${this.sink.path}`,
        `Discarding events: sink ${this.sink.path} is unavailable (${this.sinkUnavailable.message})`,
      );
      return;
    }

    try {
      if (!this.sinkOpen) {
        await this.sink.open();
        this.sinkOpen = true;
      }
      await this.sink.write(chunk);
      await this.sink.flush();
    } catch (err) {
      this.failed += count;
      const error = new SinkWriteError(
        `Failed to append ${count} event(s) to ${this.sink.path}`,
        this.sink.path,
        err,
      );
      logger.error(error.message, err);
      await this.resetSink();
      return;
    }

    this.written += count;
    const now = Date.now();
    for (const entry of batch) {
      this.maxQueueLatencyMs = Math.max(this.maxQueueLatencyMs, now - entry.enqueuedAt);
    }
  }

  /** Close a sink that failed mid-write so the next batch reopens it. */
  private async resetSink(): Promise<void> {
    if (!this.sinkOpen) return;
    this.sinkOpen = false;
    try {
      await this.sink.close();
    } catch (err) {
      logger.debug(`Closing failed sink ${this.sink.path}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
