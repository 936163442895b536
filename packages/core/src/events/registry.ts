/**
 * Schemas for each event kind, and the validation entry points.
 *
 * Events built through the producer API are typed at compile time; the
 * runtime check here catches values the types cannot (empty names,
 * out-of-range numbers) and anything read back from disk.
 */

import type { z } from 'zod';
import { SchemaError } from '../errors.js';
import type { Issue } from '../errors.js';
import {
  ActivityEventSchema,
  AgentInvocationEventSchema,
  ContextSnapshotEventSchema,
  DecisionEventSchema,
  ErrorEventSchema,
  EVENT_TYPES,
  FileOperationEventSchema,
  ToolUsageEventSchema,
  ValidationEventSchema,
} from './types.js';
import type { ActivityEvent, EventType, RecordedEvent } from './types.js';

export const EVENT_SCHEMAS = {
  agent_invocation: AgentInvocationEventSchema,
  tool_usage: ToolUsageEventSchema,
  file_operation: FileOperationEventSchema,
  decision: DecisionEventSchema,
  error: ErrorEventSchema,
  context_snapshot: ContextSnapshotEventSchema,
  validation: ValidationEventSchema,
} as const satisfies Record<EventType, z.AnyZodObject>;

function requiredKeys(shape: z.ZodRawShape): string[] {
  return Object.entries(shape)
    .filter(([, field]) => !field.isOptional())
    .map(([key]) => key);
}

/** Required field names (common fields first) for each event kind. */
export const REQUIRED_FIELDS: Readonly<Record<EventType, readonly string[]>> = {
  agent_invocation: requiredKeys(EVENT_SCHEMAS.agent_invocation.shape),
  tool_usage: requiredKeys(EVENT_SCHEMAS.tool_usage.shape),
  file_operation: requiredKeys(EVENT_SCHEMAS.file_operation.shape),
  decision: requiredKeys(EVENT_SCHEMAS.decision.shape),
  error: requiredKeys(EVENT_SCHEMAS.error.shape),
  context_snapshot: requiredKeys(EVENT_SCHEMAS.context_snapshot.shape),
  validation: requiredKeys(EVENT_SCHEMAS.validation.shape),
};

export type ValidationResult =
  | { ok: true; event: ActivityEvent }
  | { ok: false; error: SchemaError };

export function isEventType(value: unknown): value is EventType {
  return EVENT_TYPES.some((type) => type === value);
}

function toIssues(error: z.ZodError): Issue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '/',
    message: issue.message,
  }));
}

function candidateType(candidate: unknown): string | null {
  if (typeof candidate !== 'object' || candidate === null) return null;
  const type: unknown = Reflect.get(candidate, 'event_type');
  return typeof type === 'string' ? type : null;
}

/**
 * Validate a candidate event against its kind's schema. Never throws.
 */
export function validateEvent(candidate: unknown): ValidationResult {
  const parsed = ActivityEventSchema.safeParse(candidate);
  if (parsed.success) {
    return { ok: true, event: parsed.data };
  }

  const eventType = candidateType(candidate);
  const issues = toIssues(parsed.error);
  const summary = issues.map((i) => `${i.path}: ${i.message}`).join('; ');
  return {
    ok: false,
    error: new SchemaError(
      `Invalid ${eventType ?? 'unknown'} event: ${summary}`,
      eventType,
      issues,
    ),
  };
}

/**
 * Validate a candidate event and return it typed.
 *
 * @throws {SchemaError} If validation fails
 */
export function parseEvent(candidate: unknown): ActivityEvent {
  const result = validateEvent(candidate);
  if (!result.ok) throw result.error;
  return result.event;
}

/** Lenient-mode form of an invalid event: kept, with the failure recorded on it. */
export function annotateInvalid(event: ActivityEvent, error: SchemaError): RecordedEvent {
  return { ...event, _validation_warning: error.message };
}
