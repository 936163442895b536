/**
 * Session log files on disk: listing, totals and retention.
 */

import fs from 'graceful-fs';
import type { Stats } from 'node:fs';
import path from 'node:path';
import { parseSinkFileName } from '../utils/paths.js';
import { logger } from '../utils/logger.js';

const fsPromises = fs.promises;

export const DEFAULT_SESSION_PREFIX = 'session_';

export interface LogFileInfo {
  filePath: string;
  sessionId: string;
  /** 1 for `<session>.jsonl`, n for `<session>.<n>.jsonl`. */
  segment: number;
  sizeBytes: number;
  /** Last write to the file. */
  modifiedAt: Date;
  compressed: boolean;
}

export interface ListLogFilesOptions {
  /** Only session ids starting with this are listed (default `session_`). */
  sessionPrefix?: string;
}

export interface LogFileStats {
  totalFiles: number;
  totalSizeBytes: number;
  sessionCount: number;
  oldest: LogFileInfo | null;
  newest: LogFileInfo | null;
  currentSession: string | null;
  currentSessionFiles: LogFileInfo[];
}

export interface RotateLogsOptions extends ListLogFilesOptions {
  /** Sessions to keep, counting the current one. */
  retentionCount: number;
  /** Never deleted, whatever its age. */
  currentSession?: string | null;
}

export interface RotationReport {
  filesDeleted: number;
  filesKept: number;
  bytesFreed: number;
  sessionsDeleted: string[];
  /** One `<file>: <reason>` entry per file that could not be removed. */
  errors: string[];
}

function newestFirst(a: LogFileInfo, b: LogFileInfo): number {
  const byTime = b.modifiedAt.getTime() - a.modifiedAt.getTime();
  if (byTime !== 0) return byTime;
  if (a.sessionId !== b.sessionId) return a.sessionId < b.sessionId ? 1 : -1;
  return b.segment - a.segment;
}

/**
 * Session log files in `logsDir`, newest first. Names that do not parse as
 * a sink file, or whose session id lacks the prefix or any digit, are
 * skipped. A missing directory lists as empty.
 */
export async function listLogFiles(
  logsDir: string,
  options: ListLogFilesOptions = {},
): Promise<LogFileInfo[]> {
  const prefix = options.sessionPrefix ?? DEFAULT_SESSION_PREFIX;

  let names: string[];
  try {
    names = await fsPromises.readdir(logsDir);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
    throw err;
  }

  const files: LogFileInfo[] = [];
  for (const name of names) {
    const parsed = parseSinkFileName(name);
    if (!parsed) continue;
    if (!parsed.sessionId.startsWith(prefix) || !/\d/.test(parsed.sessionId)) continue;

    const filePath = path.join(logsDir, name);
    let stat: Stats;
    try {
      stat = await fsPromises.stat(filePath);
    } catch (err) {
      // Removed between readdir and stat.
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') continue;
      throw err;
    }
    if (!stat.isFile()) continue;

    files.push({
      filePath,
      sessionId: parsed.sessionId,
      segment: parsed.segment,
      sizeBytes: stat.size,
      modifiedAt: stat.mtime,
      compressed: parsed.compressed,
    });
  }

  return files.sort(newestFirst);
}

export async function getLogFileStats(
  logsDir: string,
  currentSession: string | null = null,
  options: ListLogFilesOptions = {},
): Promise<LogFileStats> {
  const files = await listLogFiles(logsDir, options);
  return {
    totalFiles: files.length,
    totalSizeBytes: files.reduce((sum, file) => sum + file.sizeBytes, 0),
    sessionCount: new Set(files.map((file) => file.sessionId)).size,
    oldest: files[files.length - 1] ?? null,
    newest: files[0] ?? null,
    currentSession,
    currentSessionFiles: files.filter((file) => file.sessionId === currentSession),
  };
}

/**
 * Delete the files of every session beyond the retention count. The
 * current session always survives and takes one of the slots.
 */
export async function rotateLogs(logsDir: string, options: RotateLogsOptions): Promise<RotationReport> {
  const current = options.currentSession ?? null;
  const files = await listLogFiles(logsDir, options);

  // Sessions in order of their newest file.
  const sessions: string[] = [];
  for (const file of files) {
    if (file.sessionId !== current && !sessions.includes(file.sessionId)) {
      sessions.push(file.sessionId);
    }
  }
  const othersToKeep = Math.max(options.retentionCount - (current === null ? 0 : 1), 0);
  const doomed = new Set(sessions.slice(othersToKeep));

  const report: RotationReport = {
    filesDeleted: 0,
    filesKept: 0,
    bytesFreed: 0,
    sessionsDeleted: [...doomed],
    errors: [],
  };

  for (const file of files) {
    if (!doomed.has(file.sessionId)) {
      report.filesKept += 1;
      continue;
    }
    try {
      await fsPromises.unlink(file.filePath);
      report.filesDeleted += 1;
      report.bytesFreed += file.sizeBytes;
      logger.debug(`Removed old log file ${file.filePath}`);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      report.errors.push(`${file.filePath}: ${reason}`);
      logger.warn(`Could not remove old log file ${file.filePath}: ${reason}`);
    }
  }

  return report;
}
