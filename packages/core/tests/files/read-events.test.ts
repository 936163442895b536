import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import zlib from 'node:zlib';
import { SchemaError, readSessionEvents } from '../../src/index.js';
import { makeEvent } from '../helpers/memory-sink.js';

let logsDir: string;

function line(n: number): string {
  return `${JSON.stringify(makeEvent(n))}\n`;
}

beforeEach(async () => {
  logsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'activity-trail-read-test-'));
});

afterEach(async () => {
  await fs.rm(logsDir, { recursive: true, force: true });
});

describe('readSessionEvents', () => {
  it('reads a plain file in order, skipping blank lines', async () => {
    const filePath = path.join(logsDir, 'session_20250101_000000.jsonl');
    await fs.writeFile(filePath, `${line(1)}\n${line(2)}`);

    const events = await readSessionEvents(filePath);
    expect(events.map((event) => event.event_id)).toEqual(['evt_001', 'evt_002']);
  });

  it('reads every member of a gzip file', async () => {
    const filePath = path.join(logsDir, 'session_20250101_000000.jsonl.gz');
    await fs.writeFile(filePath, Buffer.concat([zlib.gzipSync(line(1)), zlib.gzipSync(line(2))]));

    const events = await readSessionEvents(filePath);
    expect(events.map((event) => event.event_id)).toEqual(['evt_001', 'evt_002']);
  });

  it('names the line that is not JSON', async () => {
    const filePath = path.join(logsDir, 'session_20250101_000000.jsonl');
    await fs.writeFile(filePath, `${line(1)}{"event_type":\n`);

    await expect(readSessionEvents(filePath)).rejects.toThrow(`Line 2 of ${filePath} is not valid JSON`);
  });

  it('names the line that fails validation', async () => {
    const filePath = path.join(logsDir, 'session_20250101_000000.jsonl');
    await fs.writeFile(filePath, `${JSON.stringify({ ...makeEvent(1), tool: '' })}\n`);

    const error: unknown = await readSessionEvents(filePath).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SchemaError);
    if (error instanceof SchemaError) {
      expect(error.eventType).toBe('tool_usage');
      expect(error.issues.map((issue) => issue.path)).toEqual(['tool']);
      expect(error.message.startsWith(`Line 1 of ${filePath}: Invalid tool_usage event: tool: `)).toBe(true);
    }
  });
});
