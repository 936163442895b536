/**
 * Configuration loading: defaults, then config.yaml, then environment,
 * then explicit overrides. The merged result is validated once.
 */

import fs from 'graceful-fs';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from '../errors.js';
import type { Issue } from '../errors.js';
import { logger } from '../utils/logger.js';
import { ActivityLoggerConfigSchema } from './types.js';
import type { ActivityLoggerConfig, ActivityLoggerConfigInput } from './types.js';

type EnvKind = 'boolean' | 'number' | 'string';

/** Environment variables recognised by {@link loadConfig}. */
export const ENV_VARIABLES: Readonly<Record<string, { key: keyof ActivityLoggerConfigInput; kind: EnvKind }>> = {
  ACTIVITY_TRAIL_ENABLED: { key: 'enabled', kind: 'boolean' },
  ACTIVITY_TRAIL_LOGS_DIR: { key: 'logsDir', kind: 'string' },
  ACTIVITY_TRAIL_COMPRESSION: { key: 'compression', kind: 'boolean' },
  ACTIVITY_TRAIL_VALIDATE: { key: 'validateSchemas', kind: 'boolean' },
  ACTIVITY_TRAIL_STRICT_MODE: { key: 'strictMode', kind: 'boolean' },
  ACTIVITY_TRAIL_SESSION_FORMAT: { key: 'sessionIdFormat', kind: 'string' },
  ACTIVITY_TRAIL_LOG_LATENCY_MS: { key: 'maxSubmitLatencyMs', kind: 'number' },
  ACTIVITY_TRAIL_QUEUE_CAPACITY: { key: 'queueCapacity', kind: 'number' },
  ACTIVITY_TRAIL_OVERFLOW_POLICY: { key: 'overflowPolicy', kind: 'string' },
  ACTIVITY_TRAIL_RETENTION_COUNT: { key: 'retentionCount', kind: 'number' },
  ACTIVITY_TRAIL_TOKEN_BUDGET: { key: 'defaultTokenBudget', kind: 'number' },
};

export interface LoadConfigOptions {
  /** Path to a YAML file. A missing file is skipped. */
  file?: string;
  /** Environment to read; defaults to `process.env`. Pass `{}` to ignore it. */
  env?: Record<string, string | undefined>;
  overrides?: ActivityLoggerConfigInput;
}

const TRUE_VALUES = new Set(['true', '1', 'yes']);
const FALSE_VALUES = new Set(['false', '0', 'no']);

function camelCase(key: string): string {
  return key.replace(/_([a-z])/g, (_m, c: string) => c.toUpperCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFileLayer(file: string): Record<string, unknown> {
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      logger.debug(`No config file at ${file}; using defaults`);
      return {};
    }
    throw new ConfigurationError(
      `Could not read config file ${file}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigurationError(
      `Config file ${file} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file ${file} must contain a mapping`, [
      { path: '/', message: 'expected a mapping' },
    ]);
  }

  const layer: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parsed)) {
    layer[camelCase(key)] = value;
  }
  return layer;
}

function readEnvLayer(env: Record<string, string | undefined>): {
  layer: Record<string, unknown>;
  issues: Issue[];
} {
  const layer: Record<string, unknown> = {};
  const issues: Issue[] = [];

  for (const [name, { key, kind }] of Object.entries(ENV_VARIABLES)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const value = raw.trim();

    switch (kind) {
      case 'boolean': {
        const lower = value.toLowerCase();
        if (TRUE_VALUES.has(lower)) layer[key] = true;
        else if (FALSE_VALUES.has(lower)) layer[key] = false;
        else issues.push({ path: name, message: `expected true/false, got "${raw}"` });
        break;
      }
      case 'number': {
        const num = Number(value);
        if (Number.isFinite(num)) layer[key] = num;
        else issues.push({ path: name, message: `expected a number, got "${raw}"` });
        break;
      }
      case 'string':
        layer[key] = value;
        break;
    }
  }
  return { layer, issues };
}

/**
 * Resolve configuration from all layers.
 *
 * @throws {ConfigurationError} Listing every invalid field
 */
export function loadConfig(options: LoadConfigOptions = {}): ActivityLoggerConfig {
  const fileLayer = options.file ? readFileLayer(options.file) : {};
  const { layer: envLayer, issues: envIssues } = readEnvLayer(options.env ?? process.env);

  const merged = { ...fileLayer, ...envLayer, ...options.overrides };
  const result = ActivityLoggerConfigSchema.safeParse(merged);

  const issues: Issue[] = [...envIssues];
  if (!result.success) {
    for (const issue of result.error.issues) {
      issues.push({
        path: issue.path.length > 0 ? issue.path.join('.') : '/',
        message: issue.message,
      });
    }
  }
  if (issues.length > 0 || !result.success) {
    const summary = issues.map((i) => `${i.path}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid activity logger configuration: ${summary}`, issues);
  }
  return result.data;
}
