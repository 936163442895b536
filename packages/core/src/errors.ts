/**
 * Custom error classes for @activity-trail/core operations.
 */

/** A single schema or configuration problem, addressed by field path. */
export interface Issue {
  path: string;
  message: string;
}

/** Base class for every error raised by the activity trail. */
export class ActivityTrailError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ActivityTrailError';
  }
}

/** Thrown when a candidate event does not satisfy its kind's schema. */
export class SchemaError extends ActivityTrailError {
  constructor(
    message: string,
    public readonly eventType: string | null,
    public readonly issues: Issue[] = [],
  ) {
    super(message);
    this.name = 'SchemaError';
  }
}

/** Thrown by enqueue under the `reject` overflow policy when the queue is full. */
export class QueueSaturationError extends ActivityTrailError {
  constructor(
    message: string,
    public readonly capacity: number,
    public readonly dropped: number,
  ) {
    super(message);
    this.name = 'QueueSaturationError';
  }
}

/** An I/O failure inside the writer. Reported on the fallback channel, never thrown to producers. */
export class SinkWriteError extends ActivityTrailError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'SinkWriteError';
  }
}

/** Thrown when the session's sink file is already owned by another writer. */
export class SinkLockError extends ActivityTrailError {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
    this.name = 'SinkLockError';
  }
}

/** Thrown when a drain does not complete before its timeout. */
export class ShutdownTimeoutError extends ActivityTrailError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    public readonly unflushed: number,
    /** Events in a sink write that had not returned; they may still land. */
    public readonly pending = 0,
  ) {
    super(message);
    this.name = 'ShutdownTimeoutError';
  }
}

/** Thrown when an operation needs a running pipeline and there is none. */
export class NotInitializedError extends ActivityTrailError {
  constructor(message = 'Activity logger is not initialized') {
    super(message);
    this.name = 'NotInitializedError';
  }
}

/** Thrown when an event is submitted to a writer that has stopped. */
export class StoppedError extends ActivityTrailError {
  constructor(message = 'Writer is stopped; event was not accepted') {
    super(message);
    this.name = 'StoppedError';
  }
}

/** Thrown when hierarchy scopes are closed out of LIFO order. */
export class ScopeOrderError extends ActivityTrailError {
  constructor(
    message: string,
    public readonly expected: string | null,
    public readonly actual: string | null,
  ) {
    super(message);
    this.name = 'ScopeOrderError';
  }
}

/** Thrown when configuration from file, env or overrides fails validation. */
export class ConfigurationError extends ActivityTrailError {
  constructor(
    message: string,
    public readonly issues: Issue[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
