import { z } from 'zod';
import { getLogsDir } from '../utils/paths.js';
import { DEFAULT_EVENT_ID_WIDTH, DEFAULT_SESSION_ID_FORMAT } from '../session/ids.js';

/**
 * What the writer does with a submission that finds the queue full.
 *
 * - `drop-newest`: the incoming event is discarded and counted.
 * - `drop-oldest`: the oldest queued event is discarded and counted.
 * - `reject`: the producer call throws `QueueSaturationError`.
 */
export const OverflowPolicySchema = z.enum(['drop-newest', 'drop-oldest', 'reject']);
export type OverflowPolicy = z.infer<typeof OverflowPolicySchema>;

/** Zod schema for activity logger configuration. */
export const ActivityLoggerConfigSchema = z.object({
  /** Master switch. When false, ids are still allocated but nothing is written. */
  enabled: z.boolean().default(true),
  /** Directory holding one sink file per session. */
  logsDir: z.string().min(1).default(() => getLogsDir(process.cwd())),
  /** Gzip the sink stream. */
  compression: z.boolean().default(true),
  /** Run schema validation on every event. */
  validateSchemas: z.boolean().default(true),
  /** Reject invalid events (true) or write them with a warning annotation (false). */
  strictMode: z.boolean().default(false),
  sessionIdFormat: z.string().min(1).default(DEFAULT_SESSION_ID_FORMAT),
  eventIdWidth: z.number().int().min(1).max(12).default(DEFAULT_EVENT_ID_WIDTH),
  /** Submission latency budget in ms; overruns are reported, not enforced. */
  maxSubmitLatencyMs: z.number().min(0.01).default(1),
  queueCapacity: z.number().int().min(1).default(10_000),
  overflowPolicy: OverflowPolicySchema.default('drop-newest'),
  /** Longest the consumer sleeps before re-checking queue and state. */
  pollIntervalMs: z.number().int().min(1).default(100),
  /** Default drain timeout for an explicit shutdown. */
  shutdownTimeoutMs: z.number().int().min(0).default(5_000),
  /** Drain timeout used by the process-exit hook. */
  exitTimeoutMs: z.number().int().min(0).default(2_000),
  /** Roll to a new segment once a sink file would exceed this many uncompressed bytes. 0 disables. */
  maxFileSizeBytes: z.number().int().min(0).default(0),
  /** Sessions to keep on disk, counting the current one. */
  retentionCount: z.number().int().min(1).default(2),
  /** Apply the retention policy when a session starts. */
  rotateOnStart: z.boolean().default(true),
  /** Hold a lock file on the sink while the writer runs. */
  lockSink: z.boolean().default(true),
  /** Drain automatically when the process is about to exit. */
  installExitHook: z.boolean().default(true),
  /** Token budget assumed by context snapshots that do not state one. */
  defaultTokenBudget: z.number().int().min(0).default(200_000),
}).strict();

/** Fully resolved configuration. */
export type ActivityLoggerConfig = z.output<typeof ActivityLoggerConfigSchema>;

/** Configuration as callers may supply it; every field is optional. */
export type ActivityLoggerConfigInput = z.input<typeof ActivityLoggerConfigSchema>;
