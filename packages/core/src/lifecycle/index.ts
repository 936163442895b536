export { ActivityLogger } from './activity-logger.js';
export type { ActivityLoggerOptions, ActivityLoggerStats, LoggerState } from './activity-logger.js';
export { LatencyMonitor } from './latency-monitor.js';
export type { LatencySnapshot } from './latency-monitor.js';
export { installExitHook } from './exit-hook.js';
export type { ExitHandlers, ExitHook } from './exit-hook.js';
