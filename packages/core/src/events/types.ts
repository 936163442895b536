import { z } from 'zod';

/** The seven event kinds recorded in a session's trail. */
export const EventType = {
  AgentInvocation: 'agent_invocation',
  ToolUsage: 'tool_usage',
  FileOperation: 'file_operation',
  Decision: 'decision',
  Error: 'error',
  ContextSnapshot: 'context_snapshot',
  Validation: 'validation',
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

export const EVENT_TYPES: readonly EventType[] = Object.values(EventType);

export const AgentStatusSchema = z.enum(['started', 'completed', 'failed']);
export type AgentStatus = z.infer<typeof AgentStatusSchema>;

export const FileOperationKindSchema = z.enum(['create', 'modify', 'delete', 'rename', 'read']);
export type FileOperationKind = z.infer<typeof FileOperationKindSchema>;

export const ErrorSeveritySchema = z.enum(['low', 'medium', 'high', 'critical']);
export type ErrorSeverity = z.infer<typeof ErrorSeveritySchema>;

export const ValidationStatusSchema = z.enum(['pass', 'fail', 'warning', 'skipped']);
export type ValidationStatus = z.infer<typeof ValidationStatusSchema>;

/** ISO-8601 UTC with millisecond precision, e.g. 2025-11-02T15:30:45.123Z */
const TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;
const EVENT_ID = /^evt_\d+$/;

const jsonRecord = z.record(z.unknown());

/** Fields present on every event. */
export const BaseEventSchema = z.object({
  event_type: z.enum([
    'agent_invocation', 'tool_usage', 'file_operation', 'decision',
    'error', 'context_snapshot', 'validation',
  ]),
  timestamp: z.string().regex(TIMESTAMP, 'must be an ISO-8601 UTC timestamp with milliseconds'),
  session_id: z.string().min(1),
  event_id: z.string().regex(EVENT_ID, "must look like 'evt_<digits>'"),
  parent_event_id: z.string().regex(EVENT_ID).nullable(),
});

export type BaseEvent = z.infer<typeof BaseEventSchema>;

export const AgentInvocationEventSchema = BaseEventSchema.extend({
  event_type: z.literal('agent_invocation'),
  agent: z.string().min(1),
  invoked_by: z.string().min(1),
  reason: z.string(),
  status: AgentStatusSchema,
  context: jsonRecord.optional(),
  metadata: jsonRecord.optional(),
  result: jsonRecord.optional(),
  duration_ms: z.number().int().nonnegative().optional(),
  tokens_consumed: z.number().int().nonnegative().optional(),
}).passthrough();

export const ToolUsageEventSchema = BaseEventSchema.extend({
  event_type: z.literal('tool_usage'),
  agent: z.string().min(1),
  tool: z.string().min(1),
  description: z.string(),
  success: z.boolean(),
  operation: z.string().optional(),
  parameters: jsonRecord.optional(),
  duration_ms: z.number().int().nonnegative().optional(),
  error_message: z.string().optional(),
  result_summary: z.string().optional(),
}).passthrough();

export const FileOperationEventSchema = BaseEventSchema.extend({
  event_type: z.literal('file_operation'),
  agent: z.string().min(1),
  operation: FileOperationKindSchema,
  file_path: z.string().min(1),
  file_size_bytes: z.number().int().nonnegative().optional(),
  lines_changed: z.number().int().nonnegative().optional(),
  diff: z.string().optional(),
  git_hash_before: z.string().optional(),
  git_hash_after: z.string().optional(),
  language: z.string().optional(),
}).passthrough();

export const DecisionEventSchema = BaseEventSchema.extend({
  event_type: z.literal('decision'),
  agent: z.string().min(1),
  question: z.string(),
  options: z.array(z.string()),
  selected: z.string(),
  rationale: z.string().optional(),
  confidence: z.number().min(0).max(1).optional(),
  alternative_considered: z.string().optional(),
}).passthrough();

export const ErrorEventSchema = BaseEventSchema.extend({
  event_type: z.literal('error'),
  agent: z.string().min(1),
  error_type: z.string().min(1),
  error_message: z.string(),
  severity: ErrorSeveritySchema,
  recoverable: z.boolean(),
  context: jsonRecord,
  stack_trace: z.string().optional(),
  attempted_fix: z.string().optional(),
  fix_successful: z.boolean().optional(),
  recovery_time_ms: z.number().int().nonnegative().optional(),
}).passthrough();

export const ContextSnapshotEventSchema = BaseEventSchema.extend({
  event_type: z.literal('context_snapshot'),
  trigger: z.string().min(1),
  tokens_before: z.number().int().nonnegative(),
  tokens_after: z.number().int().nonnegative(),
  tokens_consumed: z.number().int().nonnegative(),
  tokens_remaining: z.number().int().nonnegative(),
  tokens_total_budget: z.number().int().nonnegative(),
  files_in_context: z.array(z.string()),
  files_in_context_count: z.number().int().nonnegative(),
  snapshot: jsonRecord.optional(),
  memory_mb: z.number().nonnegative().optional(),
  agent: z.string().optional(),
}).passthrough();

export const ValidationEventSchema = BaseEventSchema.extend({
  event_type: z.literal('validation'),
  agent: z.string().min(1),
  validation_type: z.string().min(1),
  result: ValidationStatusSchema,
  checks: z.record(ValidationStatusSchema),
  task: z.string().optional(),
  failures: z.array(z.string()).optional(),
  warnings: z.array(z.string()).optional(),
  metrics: jsonRecord.optional(),
}).passthrough();

/** Any persisted event, discriminated on `event_type`. */
export const ActivityEventSchema = z.discriminatedUnion('event_type', [
  AgentInvocationEventSchema,
  ToolUsageEventSchema,
  FileOperationEventSchema,
  DecisionEventSchema,
  ErrorEventSchema,
  ContextSnapshotEventSchema,
  ValidationEventSchema,
]);

export type AgentInvocationEvent = z.infer<typeof AgentInvocationEventSchema>;
export type ToolUsageEvent = z.infer<typeof ToolUsageEventSchema>;
export type FileOperationEvent = z.infer<typeof FileOperationEventSchema>;
export type DecisionEvent = z.infer<typeof DecisionEventSchema>;
export type ErrorEvent = z.infer<typeof ErrorEventSchema>;
export type ContextSnapshotEvent = z.infer<typeof ContextSnapshotEventSchema>;
export type ValidationEvent = z.infer<typeof ValidationEventSchema>;

export type ActivityEvent = z.infer<typeof ActivityEventSchema>;

/** The event of one particular kind. */
export type EventOfType<T extends EventType> = Extract<ActivityEvent, { event_type: T }>;

/**
 * An event as handed to the writer: a built event, possibly carrying a
 * lenient-mode validation warning.
 */
export type RecordedEvent = ActivityEvent & { _validation_warning?: string };
