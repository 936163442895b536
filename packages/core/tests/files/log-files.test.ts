import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { getLogFileStats, listLogFiles, rotateLogs } from '../../src/index.js';

let logsDir: string;

async function writeLog(name: string, bytes: number, modified: string): Promise<void> {
  const filePath = path.join(logsDir, name);
  await fs.writeFile(filePath, 'x'.repeat(bytes));
  const time = new Date(modified);
  await fs.utimes(filePath, time, time);
}

beforeEach(async () => {
  logsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'activity-trail-files-test-'));
  await writeLog('session_20250101_100000.jsonl', 10, '2025-01-01T10:00:00Z');
  await writeLog('session_20250102_100000.jsonl.gz', 20, '2025-01-02T10:00:00Z');
  await writeLog('session_20250102_100000.2.jsonl.gz', 30, '2025-01-02T10:00:00Z');
  await writeLog('session_20250103_100000.jsonl', 40, '2025-01-03T10:00:00Z');
  // Not session logs.
  await writeLog('notes.txt', 5, '2025-01-04T10:00:00Z');
  await writeLog('session_draft.jsonl', 5, '2025-01-04T10:00:00Z');
  await writeLog('other_20250104.jsonl', 5, '2025-01-04T10:00:00Z');
  await fs.mkdir(path.join(logsDir, 'session_20250104_100000.jsonl.gz.lock'));
});

afterEach(async () => {
  await fs.rm(logsDir, { recursive: true, force: true });
});

describe('listLogFiles', () => {
  it('lists session files newest first', async () => {
    const files = await listLogFiles(logsDir);
    expect(files.map((file) => path.basename(file.filePath))).toEqual([
      'session_20250103_100000.jsonl',
      'session_20250102_100000.2.jsonl.gz',
      'session_20250102_100000.jsonl.gz',
      'session_20250101_100000.jsonl',
    ]);
    expect(files[1]).toMatchObject({
      sessionId: 'session_20250102_100000',
      segment: 2,
      sizeBytes: 30,
      compressed: true,
    });
    expect(files[0].modifiedAt.toISOString()).toBe('2025-01-03T10:00:00.000Z');
  });

  it('honours a custom session prefix', async () => {
    const files = await listLogFiles(logsDir, { sessionPrefix: 'other_' });
    expect(files.map((file) => file.sessionId)).toEqual(['other_20250104']);
  });

  it('lists a missing directory as empty', async () => {
    expect(await listLogFiles(path.join(logsDir, 'missing'))).toEqual([]);
  });
});

describe('getLogFileStats', () => {
  it('totals files and sessions', async () => {
    const stats = await getLogFileStats(logsDir, 'session_20250102_100000');
    expect(stats.totalFiles).toBe(4);
    expect(stats.totalSizeBytes).toBe(100);
    expect(stats.sessionCount).toBe(3);
    expect(stats.newest?.sessionId).toBe('session_20250103_100000');
    expect(stats.oldest?.sessionId).toBe('session_20250101_100000');
    expect(stats.currentSessionFiles).toHaveLength(2);
  });
});

describe('rotateLogs', () => {
  it('keeps the current session plus the newest others', async () => {
    const report = await rotateLogs(logsDir, {
      retentionCount: 2,
      currentSession: 'session_20250101_100000',
    });

    expect(report).toEqual({
      filesDeleted: 2,
      filesKept: 2,
      bytesFreed: 50,
      sessionsDeleted: ['session_20250102_100000'],
      errors: [],
    });
    const left = (await listLogFiles(logsDir)).map((file) => file.sessionId);
    expect(left).toEqual(['session_20250103_100000', 'session_20250101_100000']);
  });

  it('keeps the newest sessions when there is no current one', async () => {
    const report = await rotateLogs(logsDir, { retentionCount: 1 });
    expect(report.sessionsDeleted).toEqual(['session_20250102_100000', 'session_20250101_100000']);
    expect(report.filesDeleted).toBe(3);
    expect(report.filesKept).toBe(1);
  });

  it('leaves other files alone', async () => {
    await rotateLogs(logsDir, { retentionCount: 1 });
    const names = (await fs.readdir(logsDir)).sort();
    expect(names).toEqual([
      'notes.txt',
      'other_20250104.jsonl',
      'session_20250103_100000.jsonl',
      'session_20250104_100000.jsonl.gz.lock',
      'session_draft.jsonl',
    ]);
  });

  it('does nothing when under the limit', async () => {
    const report = await rotateLogs(logsDir, { retentionCount: 5 });
    expect(report.filesDeleted).toBe(0);
    expect(report.filesKept).toBe(4);
  });
});
