export {
  buildAgentInvocation,
  buildToolUsage,
  buildFileOperation,
  buildDecision,
  buildError,
  buildContextSnapshot,
  buildValidation,
} from './build.js';
export type {
  ProducerOptions,
  AgentInvocationInput,
  ToolUsageInput,
  FileOperationInput,
  DecisionInput,
  ErrorInput,
  ContextSnapshotInput,
  ValidationInput,
  EventStamp,
} from './types.js';
