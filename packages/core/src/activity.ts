/**
 * Process-wide activity logger. Most hosts only need the functions here:
 * the first producer call starts a session with configuration from
 * `.activity-trail/config.yaml` and `ACTIVITY_TRAIL_*` variables.
 */

import { loadConfig } from './config/loader.js';
import type { ActivityLoggerConfigInput } from './config/types.js';
import { ActivityLogger } from './lifecycle/activity-logger.js';
import type { ActivityLoggerOptions, ActivityLoggerStats } from './lifecycle/activity-logger.js';
import type {
  AgentInvocationInput,
  ContextSnapshotInput,
  DecisionInput,
  ErrorInput,
  FileOperationInput,
  ToolUsageInput,
  ValidationInput,
} from './producer/types.js';
import { getConfigPath } from './utils/paths.js';
import type { DrainReport } from './writer/durable-writer.js';

let instance: ActivityLogger | null = null;

function createDefault(overrides?: ActivityLoggerConfigInput, options?: ActivityLoggerOptions): ActivityLogger {
  const config = loadConfig({ file: getConfigPath(process.cwd()), overrides });
  return new ActivityLogger(config, options);
}

/** The shared logger, created on first use. */
export function getActivityLogger(): ActivityLogger {
  instance ??= createDefault();
  return instance;
}

/**
 * Replace the shared logger with one built from `overrides` on top of the
 * file and environment configuration. A running predecessor is shut down.
 */
export async function configureActivityLogger(
  overrides: ActivityLoggerConfigInput = {},
  options: ActivityLoggerOptions = {},
): Promise<ActivityLogger> {
  await resetActivityLogger();
  instance = createDefault(overrides, options);
  return instance;
}

/** Shut down and forget the shared logger. */
export async function resetActivityLogger(): Promise<void> {
  const previous = instance;
  instance = null;
  if (previous) await previous.shutdown();
}

export function initialize(sessionId?: string): string {
  return getActivityLogger().initialize(sessionId);
}

export function shutdown(timeoutMs?: number): Promise<DrainReport> {
  return getActivityLogger().shutdown(timeoutMs);
}

export function getSessionId(): string | null {
  return getActivityLogger().getSessionId();
}

export function getEventCount(): number {
  return getActivityLogger().getEventCount();
}

export function getStats(): ActivityLoggerStats {
  return getActivityLogger().getStats();
}

export function logAgentInvocation(input: AgentInvocationInput): string {
  return getActivityLogger().logAgentInvocation(input);
}

export function logToolUsage(input: ToolUsageInput): string {
  return getActivityLogger().logToolUsage(input);
}

export function logFileOperation(input: FileOperationInput): string {
  return getActivityLogger().logFileOperation(input);
}

export function logDecision(input: DecisionInput): string {
  return getActivityLogger().logDecision(input);
}

export function logError(input: ErrorInput): string {
  return getActivityLogger().logError(input);
}

export function logContextSnapshot(input: ContextSnapshotInput): string {
  return getActivityLogger().logContextSnapshot(input);
}

export function logValidation(input: ValidationInput): string {
  return getActivityLogger().logValidation(input);
}

export function withAgentInvocation<T>(input: AgentInvocationInput, fn: (eventId: string) => T): T {
  return getActivityLogger().withAgentInvocation(input, fn);
}

export function withToolUsage<T>(input: ToolUsageInput, fn: (eventId: string) => T): T {
  return getActivityLogger().withToolUsage(input, fn);
}
