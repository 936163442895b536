import path from 'node:path';

/**
 * Path resolution utilities for the .activity-trail directory structure.
 * All paths are resolved relative to a project root.
 */

/** @returns Root .activity-trail directory path */
export function getProjectRoot(projectPath: string): string {
  return path.join(projectPath, '.activity-trail');
}

/** @returns Default directory holding session log files */
export function getLogsDir(projectPath: string): string {
  return path.join(getProjectRoot(projectPath), 'logs');
}

/** @returns Path to config.yaml */
export function getConfigPath(projectPath: string): string {
  return path.join(getProjectRoot(projectPath), 'config.yaml');
}

/**
 * Path of one sink file. The first segment of a session is
 * `<sessionId>.jsonl`; later segments are `<sessionId>.<n>.jsonl`.
 * Compressed sinks add `.gz`.
 */
export function getSinkPath(
  logsDir: string,
  sessionId: string,
  compressed: boolean,
  segment = 1,
): string {
  const base = segment > 1 ? `${sessionId}.${segment}.jsonl` : `${sessionId}.jsonl`;
  return path.join(logsDir, compressed ? `${base}.gz` : base);
}

const SINK_FILE = /^(.+?)(?:\.(\d+))?\.jsonl(\.gz)?$/;

/** Inverse of {@link getSinkPath} for a bare file name; null for anything else. */
export function parseSinkFileName(
  fileName: string,
): { sessionId: string; segment: number; compressed: boolean } | null {
  const match = SINK_FILE.exec(fileName);
  if (!match) return null;
  const [, sessionId, segment, gz] = match;
  if (sessionId === undefined) return null;
  return {
    sessionId,
    segment: segment === undefined ? 1 : Number(segment),
    compressed: gz !== undefined,
  };
}
