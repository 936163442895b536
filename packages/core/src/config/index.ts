export { ActivityLoggerConfigSchema, OverflowPolicySchema } from './types.js';
export type { ActivityLoggerConfig, ActivityLoggerConfigInput, OverflowPolicy } from './types.js';
export { loadConfig, ENV_VARIABLES } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
