import type {
  AgentStatus,
  ErrorSeverity,
  FileOperationKind,
} from '../events/types.js';
import type { CheckInput, NamedCheck } from '../events/normalize.js';

/** Options accepted by every producer call. */
export interface ProducerOptions {
  /**
   * Parent to record. `undefined` (the default) uses the innermost open
   * scope; `null` records a top-level event regardless of scope.
   */
  parentEventId?: string | null;
  /** Extra top-level fields. Never overrides a field the producer sets. */
  extra?: Record<string, unknown>;
}

export interface AgentInvocationInput extends ProducerOptions {
  agent: string;
  invokedBy: string;
  reason: string;
  status?: AgentStatus;
  context?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
  result?: Record<string, unknown>;
  durationMs?: number;
  tokensConsumed?: number;
}

export interface ToolUsageInput extends ProducerOptions {
  agent: string;
  tool: string;
  description: string;
  durationMs?: number;
  /** Defaults to true. */
  success?: boolean;
  operation?: string;
  parameters?: Record<string, unknown>;
  errorMessage?: string;
  resultSummary?: string;
}

export interface FileOperationInput extends ProducerOptions {
  agent: string;
  operation: FileOperationKind;
  filePath: string;
  sizeBytes?: number;
  lineCount?: number;
  diff?: string;
  gitHashBefore?: string;
  gitHashAfter?: string;
  language?: string;
}

export interface DecisionInput extends ProducerOptions {
  agent: string;
  question: string;
  options: string[];
  selected: string;
  rationale?: string;
  /** 0.0 – 1.0 */
  confidence?: number;
  alternativeConsidered?: string;
}

export interface ErrorInput extends ProducerOptions {
  agent: string;
  errorType: string;
  message: string;
  /** Defaults to `medium`. */
  severity?: ErrorSeverity;
  /** Defaults to true. */
  recoverable?: boolean;
  context?: Record<string, unknown>;
  stackTrace?: string;
  attemptedFix?: string;
  fixSuccessful?: boolean;
  recoveryTimeMs?: number;
}

/**
 * Token accounting carried by a context snapshot. Older callers pass a
 * `snapshot` map using `tokens_used` for the starting count; those keys are
 * honoured when the explicit fields are absent.
 */
export interface ContextSnapshotInput extends ProducerOptions {
  trigger: string;
  snapshot?: Record<string, unknown>;
  tokensBefore?: number;
  tokensAfter?: number;
  tokensConsumed?: number;
  tokensRemaining?: number;
  tokensTotalBudget?: number;
  filesInContext?: string[];
  memoryMb?: number;
  agent?: string;
}

export interface ValidationInput extends ProducerOptions {
  agent: string;
  validationType: string;
  result: CheckInput;
  checks?: Record<string, CheckInput> | Array<NamedCheck | CheckInput>;
  task?: string;
  failures?: string[];
  warnings?: string[];
  metrics?: Record<string, unknown>;
}

/** Fields stamped onto every event before its payload. */
export interface EventStamp {
  timestamp: string;
  session_id: string;
  event_id: string;
  parent_event_id: string | null;
}
