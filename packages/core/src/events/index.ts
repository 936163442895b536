export {
  EventType,
  EVENT_TYPES,
  AgentStatusSchema,
  FileOperationKindSchema,
  ErrorSeveritySchema,
  ValidationStatusSchema,
  BaseEventSchema,
  AgentInvocationEventSchema,
  ToolUsageEventSchema,
  FileOperationEventSchema,
  DecisionEventSchema,
  ErrorEventSchema,
  ContextSnapshotEventSchema,
  ValidationEventSchema,
  ActivityEventSchema,
} from './types.js';
export type {
  AgentStatus,
  FileOperationKind,
  ErrorSeverity,
  ValidationStatus,
  BaseEvent,
  AgentInvocationEvent,
  ToolUsageEvent,
  FileOperationEvent,
  DecisionEvent,
  ErrorEvent,
  ContextSnapshotEvent,
  ValidationEvent,
  ActivityEvent,
  EventOfType,
  RecordedEvent,
} from './types.js';

export {
  EVENT_SCHEMAS,
  REQUIRED_FIELDS,
  isEventType,
  validateEvent,
  parseEvent,
  annotateInvalid,
} from './registry.js';
export type { ValidationResult } from './registry.js';

export { normalizeValidationStatus, normalizeChecks } from './normalize.js';
export type { CheckInput, NamedCheck } from './normalize.js';
