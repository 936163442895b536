/**
 * Pure event builders: producer input plus stamp in, typed event out.
 */

import type {
  AgentInvocationEvent,
  ContextSnapshotEvent,
  DecisionEvent,
  ErrorEvent,
  FileOperationEvent,
  ToolUsageEvent,
  ValidationEvent,
} from '../events/types.js';
import { normalizeChecks, normalizeValidationStatus } from '../events/normalize.js';
import type {
  AgentInvocationInput,
  ContextSnapshotInput,
  DecisionInput,
  ErrorInput,
  EventStamp,
  FileOperationInput,
  ToolUsageInput,
  ValidationInput,
} from './types.js';

export function buildAgentInvocation(stamp: EventStamp, input: AgentInvocationInput): AgentInvocationEvent {
  return {
    ...input.extra,
    event_type: 'agent_invocation',
    ...stamp,
    agent: input.agent,
    invoked_by: input.invokedBy,
    reason: input.reason,
    status: input.status ?? 'started',
    context: input.context,
    metadata: input.metadata,
    result: input.result,
    duration_ms: input.durationMs,
    tokens_consumed: input.tokensConsumed,
  };
}

export function buildToolUsage(stamp: EventStamp, input: ToolUsageInput): ToolUsageEvent {
  return {
    ...input.extra,
    event_type: 'tool_usage',
    ...stamp,
    agent: input.agent,
    tool: input.tool,
    description: input.description,
    success: input.success ?? true,
    operation: input.operation,
    parameters: input.parameters,
    duration_ms: input.durationMs,
    error_message: input.errorMessage,
    result_summary: input.resultSummary,
  };
}

export function buildFileOperation(stamp: EventStamp, input: FileOperationInput): FileOperationEvent {
  return {
    ...input.extra,
    event_type: 'file_operation',
    ...stamp,
    agent: input.agent,
    operation: input.operation,
    file_path: input.filePath,
    file_size_bytes: input.sizeBytes,
    lines_changed: input.lineCount,
    diff: input.diff,
    git_hash_before: input.gitHashBefore,
    git_hash_after: input.gitHashAfter,
    language: input.language,
  };
}

export function buildDecision(stamp: EventStamp, input: DecisionInput): DecisionEvent {
  return {
    ...input.extra,
    event_type: 'decision',
    ...stamp,
    agent: input.agent,
    question: input.question,
    options: [...input.options],
    selected: input.selected,
    rationale: input.rationale,
    confidence: input.confidence,
    alternative_considered: input.alternativeConsidered,
  };
}

export function buildError(stamp: EventStamp, input: ErrorInput): ErrorEvent {
  return {
    ...input.extra,
    event_type: 'error',
    ...stamp,
    agent: input.agent,
    error_type: input.errorType,
    error_message: input.message,
    severity: input.severity ?? 'medium',
    recoverable: input.recoverable ?? true,
    context: input.context ?? {},
    stack_trace: input.stackTrace,
    attempted_fix: input.attemptedFix,
    fix_successful: input.fixSuccessful,
    recovery_time_ms: input.recoveryTimeMs,
  };
}

function numberFrom(snapshot: Record<string, unknown> | undefined, ...keys: string[]): number | undefined {
  if (!snapshot) return undefined;
  for (const key of keys) {
    const value = snapshot[key];
    if (typeof value === 'number' && value > 0) return value;
  }
  return undefined;
}

function filesFrom(snapshot: Record<string, unknown> | undefined): string[] | undefined {
  const value = snapshot?.['files_in_context'];
  if (!Array.isArray(value) || value.length === 0) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Context snapshots fill missing token counts:
 * `after = before + consumed`, `remaining = max(budget - after, 0)`.
 */
export function buildContextSnapshot(
  stamp: EventStamp,
  input: ContextSnapshotInput,
  defaultTokenBudget: number,
): ContextSnapshotEvent {
  const snap = input.snapshot;
  const budget = input.tokensTotalBudget ?? defaultTokenBudget;
  const before = input.tokensBefore ?? numberFrom(snap, 'tokens_before', 'tokens_used') ?? 0;
  const consumed = input.tokensConsumed ?? numberFrom(snap, 'tokens_consumed') ?? 0;
  const after = input.tokensAfter ?? numberFrom(snap, 'tokens_after') ?? before + consumed;
  const remaining = input.tokensRemaining ?? numberFrom(snap, 'tokens_remaining') ?? Math.max(budget - after, 0);
  const files = input.filesInContext ?? filesFrom(snap) ?? [];

  return {
    ...input.extra,
    event_type: 'context_snapshot',
    ...stamp,
    trigger: input.trigger,
    tokens_before: before,
    tokens_after: after,
    tokens_consumed: consumed,
    tokens_remaining: remaining,
    tokens_total_budget: budget,
    files_in_context: [...files],
    files_in_context_count: files.length,
    snapshot: snap,
    memory_mb: input.memoryMb,
    agent: input.agent,
  };
}

export function buildValidation(stamp: EventStamp, input: ValidationInput): ValidationEvent {
  return {
    ...input.extra,
    event_type: 'validation',
    ...stamp,
    agent: input.agent,
    validation_type: input.validationType,
    result: normalizeValidationStatus(input.result),
    checks: normalizeChecks(input.checks),
    task: input.task,
    failures: input.failures,
    warnings: input.warnings,
    metrics: input.metrics,
  };
}
