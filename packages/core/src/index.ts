/**
 * @activity-trail/core — structured event logging for multi-agent workflows.
 *
 * Producers record typed events (agent invocations, tool usage, file
 * operations, decisions, errors, context snapshots, validations) into a
 * per-session JSON Lines file, written by a background consumer.
 */

// ── Process-wide logger ──────────────────────────────────────────────
export {
  getActivityLogger,
  configureActivityLogger,
  resetActivityLogger,
  initialize,
  shutdown,
  getSessionId,
  getEventCount,
  getStats,
  logAgentInvocation,
  logToolUsage,
  logFileOperation,
  logDecision,
  logError,
  logContextSnapshot,
  logValidation,
  withAgentInvocation,
  withToolUsage,
} from './activity.js';

// ── Lifecycle ────────────────────────────────────────────────────────
export { ActivityLogger, LatencyMonitor, installExitHook } from './lifecycle/index.js';
export type {
  ActivityLoggerOptions,
  ActivityLoggerStats,
  LoggerState,
  LatencySnapshot,
  ExitHandlers,
  ExitHook,
} from './lifecycle/index.js';

// ── Producer inputs ──────────────────────────────────────────────────
export * from './producer/index.js';

// ── Event schemas ────────────────────────────────────────────────────
export * from './events/index.js';

// ── Sessions and hierarchy ───────────────────────────────────────────
export {
  DEFAULT_SESSION_ID_FORMAT,
  DEFAULT_EVENT_ID_WIDTH,
  formatSessionId,
  newSessionId,
  isoTimestamp,
  parseEventSequence,
  EventIdAllocator,
} from './session/ids.js';
export { HierarchyTracker } from './session/hierarchy.js';
export type { ScopeToken } from './session/hierarchy.js';

// ── Writer ───────────────────────────────────────────────────────────
export * from './writer/index.js';

// ── Log files ────────────────────────────────────────────────────────
export * from './files/index.js';

// ── Configuration ────────────────────────────────────────────────────
export * from './config/index.js';

// ── Errors ───────────────────────────────────────────────────────────
export {
  ActivityTrailError,
  SchemaError,
  QueueSaturationError,
  SinkWriteError,
  SinkLockError,
  ShutdownTimeoutError,
  NotInitializedError,
  StoppedError,
  ScopeOrderError,
  ConfigurationError,
} from './errors.js';
export type { Issue } from './errors.js';

// ── Utilities ────────────────────────────────────────────────────────
export { logger, setVerbose, isVerbose, resetWarnings } from './utils/logger.js';
export { getProjectRoot, getLogsDir, getConfigPath, getSinkPath, parseSinkFileName } from './utils/paths.js';
export { acquireFileLock } from './utils/file-lock.js';
export type { LockOptions, ReleaseLock } from './utils/file-lock.js';
