/**
 * ActivityLogger: one object owning a session's configuration, id
 * allocator, hierarchy tracker and writer.
 *
 * Producer calls build, stamp and validate an event on the caller's turn of
 * the event loop, hand it to the writer's queue and return the event id.
 * Disk I/O happens on the writer's consumer, never in the producer call.
 */

import { performance } from 'node:perf_hooks';
import { loadConfig } from '../config/loader.js';
import type { ActivityLoggerConfig, ActivityLoggerConfigInput } from '../config/types.js';
import { ConfigurationError, SchemaError, StoppedError } from '../errors.js';
import { annotateInvalid, validateEvent } from '../events/registry.js';
import type { ActivityEvent, RecordedEvent } from '../events/types.js';
import { rotateLogs } from '../files/log-files.js';
import type { RotationReport } from '../files/log-files.js';
import {
  buildAgentInvocation,
  buildContextSnapshot,
  buildDecision,
  buildError,
  buildFileOperation,
  buildToolUsage,
  buildValidation,
} from '../producer/build.js';
import type {
  AgentInvocationInput,
  ContextSnapshotInput,
  DecisionInput,
  ErrorInput,
  EventStamp,
  FileOperationInput,
  ToolUsageInput,
  ValidationInput,
} from '../producer/types.js';
import { HierarchyTracker } from '../session/hierarchy.js';
import type { ScopeToken } from '../session/hierarchy.js';
import { EventIdAllocator, isoTimestamp, newSessionId, parseEventSequence } from '../session/ids.js';
import { logger } from '../utils/logger.js';
import { getSinkPath } from '../utils/paths.js';
import { DurableWriter } from '../writer/durable-writer.js';
import type { DrainReport, WriterStats } from '../writer/durable-writer.js';
import { FileSink } from '../writer/sink.js';
import type { Sink } from '../writer/sink.js';
import { installExitHook } from './exit-hook.js';
import type { ExitHook } from './exit-hook.js';
import { LatencyMonitor } from './latency-monitor.js';
import type { LatencySnapshot } from './latency-monitor.js';

export type LoggerState = 'idle' | 'running' | 'stopping' | 'stopped';

export interface ActivityLoggerOptions {
  /** Build the sink for a new session. Defaults to a {@link FileSink} under `logsDir`. */
  sinkFactory?: (sessionId: string, config: ActivityLoggerConfig) => Sink;
}

export interface ActivityLoggerStats {
  state: LoggerState;
  sessionId: string | null;
  /** Ids allocated in the current (or last) session. */
  eventCount: number;
  /** Null when logging is disabled or no session has started. */
  writer: WriterStats | null;
  latency: LatencySnapshot;
  /** Outcome of the retention pass at session start, once it has run. */
  lastRotation: RotationReport | null;
}

interface ActiveSession {
  readonly sessionId: string;
  readonly writer: DurableWriter | null;
}

/** An allocated event id and the parent it was given, not yet submitted. */
interface Reservation {
  readonly session: ActiveSession;
  readonly eventId: string;
  readonly parentEventId: string | null;
  readonly explicitParent: boolean;
}

function emptyReport(): DrainReport {
  return { written: 0, failed: 0, dropped: 0, unflushed: 0, pending: 0, durationMs: 0 };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function elapsedSince(startedAt: number): number {
  return Math.max(Math.round(performance.now() - startedAt), 0);
}

/** Literal text before the first format token, e.g. `session_`. */
function sessionPrefix(format: string): string {
  const index = format.indexOf('%');
  return index === -1 ? format : format.slice(0, index);
}

export class ActivityLogger {
  readonly config: ActivityLoggerConfig;

  private readonly allocator: EventIdAllocator;
  private readonly tracker = new HierarchyTracker();
  private readonly latency: LatencyMonitor;
  private readonly sinkFactory: ((sessionId: string, config: ActivityLoggerConfig) => Sink) | undefined;

  private state: LoggerState = 'idle';
  private active: ActiveSession | null = null;
  private stopping: Promise<DrainReport> | null = null;
  private lastReport: DrainReport | null = null;
  private retention: Promise<void> = Promise.resolve();
  private lastRotation: RotationReport | null = null;
  private exitHook: ExitHook | null = null;

  /**
   * @param config - Explicit settings; anything omitted takes its default.
   *   The environment and config file are not consulted here (see `loadConfig`).
   * @throws {ConfigurationError} If a setting is invalid
   */
  constructor(config: ActivityLoggerConfigInput = {}, options: ActivityLoggerOptions = {}) {
    this.config = loadConfig({ env: {}, overrides: config });
    this.allocator = new EventIdAllocator(this.config.eventIdWidth);
    this.latency = new LatencyMonitor(this.config.maxSubmitLatencyMs);
    this.sinkFactory = options.sinkFactory;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────

  /**
   * Start a session. Idempotent: while running, returns the current session
   * id and ignores `sessionId`. After a shutdown, starts a new session.
   *
   * @throws {StoppedError} While a shutdown is in progress
   * @throws {ConfigurationError} If `sessionId` cannot name a log file
   */
  initialize(sessionId?: string): string {
    if (this.state === 'running' && this.active) {
      if (sessionId !== undefined && sessionId !== this.active.sessionId) {
        logger.debug(`Already running session ${this.active.sessionId}; ignoring ${sessionId}`);
      }
      return this.active.sessionId;
    }
    if (this.state === 'stopping') {
      throw new StoppedError('Activity logger is shutting down; cannot start a new session yet');
    }
    if (sessionId !== undefined && (sessionId.trim() === '' || /[\\/]/.test(sessionId))) {
      throw new ConfigurationError(`Invalid session id "${sessionId}"`, [
        { path: 'sessionId', message: 'must be non-empty and contain no path separators' },
      ]);
    }

    const id = sessionId ?? newSessionId(this.config.sessionIdFormat);
    this.allocator.reset();
    this.tracker.reset();
    this.lastReport = null;
    this.lastRotation = null;

    let writer: DurableWriter | null = null;
    if (this.config.enabled) {
      writer = this.createWriter(id);
      writer.start();
      if (this.config.rotateOnStart) {
        this.retention = this.applyRetention(id);
      }
      if (this.config.installExitHook && !this.exitHook) {
        this.exitHook = installExitHook({
          beforeExit: () => this.shutdown(this.config.exitTimeoutMs),
          exit: () => this.reportLostAtExit(),
        });
      }
    }

    this.active = { sessionId: id, writer };
    this.state = 'running';
    logger.debug(`Activity logging started for ${id}${this.config.enabled ? '' : ' (disabled)'}`);
    return id;
  }

  /**
   * Stop accepting events and drain the queue to disk. Concurrent calls
   * share one drain; calling it when nothing is running resolves with the
   * last report.
   *
   * @throws {ShutdownTimeoutError} If the drain does not finish in time
   */
  shutdown(timeoutMs: number = this.config.shutdownTimeoutMs): Promise<DrainReport> {
    if (this.stopping) return this.stopping;
    const active = this.active;
    if (this.state !== 'running' || !active) {
      return Promise.resolve(this.lastReport ?? emptyReport());
    }

    this.state = 'stopping';
    this.exitHook?.uninstall();
    this.exitHook = null;

    this.stopping = this.stop(active, timeoutMs).finally(() => {
      this.stopping = null;
      this.state = 'stopped';
      this.tracker.reset();
    });
    return this.stopping;
  }

  isInitialized(): boolean {
    return this.state === 'running';
  }

  getState(): LoggerState {
    return this.state;
  }

  /** Current (or last) session id; null before the first session. */
  getSessionId(): string | null {
    return this.active?.sessionId ?? null;
  }

  /** Event ids allocated in the current (or last) session. */
  getEventCount(): number {
    return this.allocator.count();
  }

  getStats(): ActivityLoggerStats {
    return {
      state: this.state,
      sessionId: this.getSessionId(),
      eventCount: this.allocator.count(),
      writer: this.active?.writer?.stats() ?? null,
      latency: this.latency.snapshot(),
      lastRotation: this.lastRotation,
    };
  }

  /** Resolves once the writer's queue can take another event. */
  whenWritable(): Promise<void> {
    return this.active?.writer?.whenWritable() ?? Promise.resolve();
  }

  // ── Hierarchy ───────────────────────────────────────────────────────

  scopeBegin(eventId: string): ScopeToken {
    return this.tracker.scopeBegin(eventId);
  }

  /** @throws {ScopeOrderError} If `token` is not the innermost open scope */
  scopeEnd(token?: ScopeToken): string {
    return this.tracker.scopeEnd(token);
  }

  currentParent(): string | null {
    return this.tracker.currentParent();
  }

  /** Run `fn` with `eventId` as the default parent of everything it logs. */
  runInScope<T>(eventId: string, fn: () => Promise<T>): Promise<T>;
  runInScope<T>(eventId: string, fn: () => T): T;
  runInScope<T>(eventId: string, fn: () => T | Promise<T>): T | Promise<T> {
    return this.tracker.runInScope(eventId, fn);
  }

  // ── Producers ───────────────────────────────────────────────────────

  logAgentInvocation(input: AgentInvocationInput): string {
    return this.produce((stamp) => buildAgentInvocation(stamp, input), input.parentEventId);
  }

  logToolUsage(input: ToolUsageInput): string {
    return this.produce((stamp) => buildToolUsage(stamp, input), input.parentEventId);
  }

  logFileOperation(input: FileOperationInput): string {
    return this.produce((stamp) => buildFileOperation(stamp, input), input.parentEventId);
  }

  logDecision(input: DecisionInput): string {
    return this.produce((stamp) => buildDecision(stamp, input), input.parentEventId);
  }

  logError(input: ErrorInput): string {
    return this.produce((stamp) => buildError(stamp, input), input.parentEventId);
  }

  /** Snapshots are top-level unless a parent is given explicitly. */
  logContextSnapshot(input: ContextSnapshotInput): string {
    return this.produce(
      (stamp) => buildContextSnapshot(stamp, input, this.config.defaultTokenBudget),
      input.parentEventId ?? null,
    );
  }

  logValidation(input: ValidationInput): string {
    return this.produce((stamp) => buildValidation(stamp, input), input.parentEventId);
  }

  /**
   * Log an agent invocation and run `fn` inside its scope, so everything
   * `fn` logs links to the invocation. Failures of `fn` are re-thrown.
   */
  withAgentInvocation<T>(input: AgentInvocationInput, fn: (eventId: string) => Promise<T>): Promise<T>;
  withAgentInvocation<T>(input: AgentInvocationInput, fn: (eventId: string) => T): T;
  withAgentInvocation<T>(
    input: AgentInvocationInput,
    fn: (eventId: string) => T | Promise<T>,
  ): T | Promise<T> {
    const eventId = this.logAgentInvocation(input);
    return this.tracker.runInScope(eventId, () => fn(eventId));
  }

  /**
   * Run `fn` as one tool call and log a single `tool_usage` event for it
   * once it settles, with duration, success and any error message. The id
   * is allocated before `fn` runs so events nested inside can link to it.
   */
  withToolUsage<T>(input: ToolUsageInput, fn: (eventId: string) => Promise<T>): Promise<T>;
  withToolUsage<T>(input: ToolUsageInput, fn: (eventId: string) => T): T;
  withToolUsage<T>(input: ToolUsageInput, fn: (eventId: string) => T | Promise<T>): T | Promise<T> {
    const reservation = this.reserve(this.ensureSession(), input.parentEventId);
    const startedAt = performance.now();

    return this.runScoped(reservation.eventId, fn, (error) => {
      const submittedAt = performance.now();
      this.emit(
        reservation,
        (stamp) => buildToolUsage(stamp, {
          ...input,
          durationMs: elapsedSince(startedAt),
          success: error === undefined ? (input.success ?? true) : false,
          errorMessage: error === undefined ? input.errorMessage : describeError(error),
        }),
        submittedAt,
      );
    });
  }

  // ── Internals ───────────────────────────────────────────────────────

  private createWriter(sessionId: string): DurableWriter {
    const { config } = this;
    const sink = this.sinkFactory
      ? this.sinkFactory(sessionId, config)
      : new FileSink({
        logsDir: config.logsDir,
        sessionId,
        compressed: config.compression,
        maxFileSizeBytes: config.maxFileSizeBytes,
      });
    const lockPath = config.lockSink && !this.sinkFactory
      ? getSinkPath(config.logsDir, sessionId, config.compression)
      : undefined;

    return new DurableWriter({
      sink,
      capacity: config.queueCapacity,
      overflowPolicy: config.overflowPolicy,
      pollIntervalMs: config.pollIntervalMs,
      lockPath,
    });
  }

  private async stop(active: ActiveSession, timeoutMs: number): Promise<DrainReport> {
    const report = active.writer ? await active.writer.drain(timeoutMs) : emptyReport();
    await this.retention;
    this.lastReport = report;
    logger.debug(
      `Activity logging stopped for ${active.sessionId}: ${report.written} written, ` +
      `${report.failed} failed, ${report.dropped} dropped`,
    );
    return report;
  }

  private async applyRetention(currentSession: string): Promise<void> {
    try {
      this.lastRotation = await rotateLogs(this.config.logsDir, {
        retentionCount: this.config.retentionCount,
        currentSession,
        sessionPrefix: sessionPrefix(this.config.sessionIdFormat),
      });
      if (this.lastRotation.filesDeleted > 0) {
        logger.debug(
          `Removed ${this.lastRotation.filesDeleted} old log file(s) ` +
          `(${this.lastRotation.sessionsDeleted.join(', ')})`,
        );
      }
    } catch (err) {
      logger.warn(`Log retention failed: ${describeError(err)}`);
    }
  }

  private reportLostAtExit(): void {
    const stats = this.active?.writer?.stats();
    const unwritten = stats ? stats.queued + stats.pending : 0;
    if (unwritten > 0) {
      logger.warn(`Process exiting with ${unwritten} unwritten event(s); they are lost`);
    }
  }

  private ensureSession(): ActiveSession {
    if (this.state === 'stopping') {
      throw new StoppedError('Activity logger is shutting down; event was not accepted');
    }
    if (this.state !== 'running' || !this.active) {
      this.initialize();
    }
    if (!this.active) {
      throw new StoppedError('Activity logger has no active session');
    }
    return this.active;
  }

  /**
   * The shared producer pipeline: id, parent, build, validate, submit.
   * In strict mode an invalid event throws after its id was allocated.
   */
  private produce(
    build: (stamp: EventStamp) => ActivityEvent,
    parentEventId: string | null | undefined,
  ): string {
    const session = this.ensureSession();
    const startedAt = performance.now();
    return this.emit(this.reserve(session, parentEventId), build, startedAt);
  }

  /** Allocate the next id and settle its parent from the current scope. */
  private reserve(session: ActiveSession, parentEventId: string | null | undefined): Reservation {
    return {
      session,
      eventId: this.allocator.next(),
      parentEventId: parentEventId === undefined ? this.tracker.currentParent() : parentEventId,
      explicitParent: parentEventId !== undefined,
    };
  }

  private emit(
    reservation: Reservation,
    build: (stamp: EventStamp) => ActivityEvent,
    startedAt: number,
  ): string {
    const { session, eventId } = reservation;
    const writer = session.writer;
    if (!writer) return eventId;

    const event = build({
      timestamp: isoTimestamp(),
      session_id: session.sessionId,
      event_id: eventId,
      parent_event_id: reservation.parentEventId,
    });

    writer.submit(this.check(event, reservation.explicitParent));
    this.latency.record(performance.now() - startedAt, eventId);
    return eventId;
  }

  private check(event: ActivityEvent, explicitParent: boolean): RecordedEvent {
    if (!this.config.validateSchemas) return event;

    const result = validateEvent(event);
    const error = result.ok
      ? (explicitParent ? parentOrderError(event) : null)
      : result.error;
    if (!error) return event;

    if (this.config.strictMode) throw error;
    logger.warnOnce(`invalid-event:${event.event_type}`, error.message);
    return annotateInvalid(event, error);
  }

  /** Run `fn` in the scope of `eventId`, then report completion with its failure, if any. */
  private runScoped<T>(
    eventId: string,
    fn: (eventId: string) => T | Promise<T>,
    complete: (error?: unknown) => void,
  ): T | Promise<T> {
    const finish = (error?: unknown): void => {
      try {
        complete(error);
      } catch (err) {
        logger.error(`Could not record completion of ${eventId}`, err);
      }
    };

    let result: T | Promise<T>;
    try {
      result = this.tracker.runInScope(eventId, () => fn(eventId));
    } catch (err) {
      finish(err);
      throw err;
    }
    if (result instanceof Promise) {
      return result.then(
        (value) => {
          finish();
          return value;
        },
        (err: unknown) => {
          finish(err);
          throw err;
        },
      );
    }
    finish();
    return result;
  }
}

/** An explicit parent must name an event allocated earlier in the session. */
function parentOrderError(event: ActivityEvent): SchemaError | null {
  const parent = event.parent_event_id;
  if (parent === null) return null;
  const parentSeq = parseEventSequence(parent);
  const ownSeq = parseEventSequence(event.event_id);
  if (parentSeq === null || ownSeq === null || parentSeq < ownSeq) return null;

  const message = `must reference an earlier event (got ${parent} for ${event.event_id})`;
  return new SchemaError(`Invalid ${event.event_type} event: parent_event_id: ${message}`, event.event_type, [
    { path: 'parent_event_id', message },
  ]);
}
