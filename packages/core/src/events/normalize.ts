import type { ValidationStatus } from './types.js';

const PASS = new Set(['PASS', 'PASSED', 'SUCCESS', 'SUCCESSFUL', 'OK', 'TRUE', '1', 'YES']);
const FAIL = new Set(['FAIL', 'FAILED', 'FAILURE', 'ERROR', 'FALSE', '0', 'NO']);
const WARNING = new Set(['WARN', 'WARNING', 'WARNINGS', 'ALERT', 'CAUTION']);

/** A check result as callers tend to supply it. */
export type CheckInput = ValidationStatus | string | boolean | null | undefined;

/** One entry of a list-shaped `checks` argument. */
export interface NamedCheck {
  name?: string;
  pass?: CheckInput;
  status?: CheckInput;
}

/**
 * Map loose status spellings onto a {@link ValidationStatus}.
 * Unrecognised values, null and undefined count as skipped.
 */
export function normalizeValidationStatus(value: CheckInput): ValidationStatus {
  if (value === null || value === undefined) return 'skipped';
  if (typeof value === 'boolean') return value ? 'pass' : 'fail';

  const upper = value.trim().toUpperCase();
  if (PASS.has(upper)) return 'pass';
  if (FAIL.has(upper)) return 'fail';
  if (WARNING.has(upper)) return 'warning';
  return 'skipped';
}

/**
 * Normalise `checks` given either as a name → status record or as a list of
 * `{ name, pass | status }` entries. Unnamed list entries become `check_<index>`.
 */
export function normalizeChecks(
  checks: Record<string, CheckInput> | Array<NamedCheck | CheckInput> | undefined,
): Record<string, ValidationStatus> {
  const normalized: Record<string, ValidationStatus> = {};
  if (checks === undefined) return normalized;

  if (Array.isArray(checks)) {
    checks.forEach((item: NamedCheck | CheckInput, index) => {
      if (typeof item === 'object' && item !== null) {
        const name = item.name || `check_${index}`;
        normalized[name] = normalizeValidationStatus('pass' in item ? item.pass : item.status);
      } else {
        normalized[`check_${index}`] = normalizeValidationStatus(item);
      }
    });
    return normalized;
  }

  for (const [name, status] of Object.entries(checks)) {
    normalized[name] = normalizeValidationStatus(status);
  }
  return normalized;
}
