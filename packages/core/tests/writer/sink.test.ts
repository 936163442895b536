import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import zlib from 'node:zlib';
import { FileSink, getSinkPath } from '../../src/index.js';

const SESSION = 'session_20250101_120000';
let logsDir: string;

beforeEach(async () => {
  logsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'activity-trail-sink-test-'));
});

afterEach(async () => {
  await fs.rm(logsDir, { recursive: true, force: true });
});

describe('FileSink', () => {
  it('appends plain JSON lines', async () => {
    const sink = new FileSink({ logsDir, sessionId: SESSION, compressed: false });
    await sink.open();
    await sink.write('{"n":1}\n');
    await sink.write('{"n":2}\n');
    await sink.close();

    const content = await fs.readFile(path.join(logsDir, `${SESSION}.jsonl`), 'utf-8');
    expect(content).toBe('{"n":1}\n{"n":2}\n');
    expect(sink.bytesWritten).toBe(16);
  });

  it('creates the logs directory on open', async () => {
    const nested = path.join(logsDir, 'a', 'b');
    const sink = new FileSink({ logsDir: nested, sessionId: SESSION, compressed: false });
    await sink.open();
    await sink.close();
    await expect(fs.stat(path.join(nested, `${SESSION}.jsonl`))).resolves.toBeTruthy();
  });

  it('writes a gzip stream', async () => {
    const sink = new FileSink({ logsDir, sessionId: SESSION, compressed: true });
    await sink.open();
    await sink.write('{"n":1}\n');
    await sink.flush();
    await sink.close();

    const raw = await fs.readFile(getSinkPath(logsDir, SESSION, true));
    expect(zlib.gunzipSync(raw).toString('utf-8')).toBe('{"n":1}\n');
  });

  it('appends a new gzip member when reopened', async () => {
    const first = new FileSink({ logsDir, sessionId: SESSION, compressed: true });
    await first.open();
    await first.write('a\n');
    await first.close();

    const second = new FileSink({ logsDir, sessionId: SESSION, compressed: true });
    await second.open();
    await second.write('b\n');
    await second.close();

    const raw = await fs.readFile(getSinkPath(logsDir, SESSION, true));
    expect(zlib.gunzipSync(raw).toString('utf-8')).toBe('a\nb\n');
  });

  it('rolls to a new segment past the size limit', async () => {
    const sink = new FileSink({ logsDir, sessionId: SESSION, compressed: false, maxFileSizeBytes: 20 });
    await sink.open();
    await sink.write(`${'x'.repeat(15)}\n`);
    await sink.write(`${'y'.repeat(15)}\n`);
    await sink.close();

    expect(sink.currentSegment).toBe(2);
    expect(sink.path).toBe(path.join(logsDir, `${SESSION}.2.jsonl`));
    expect(await fs.readFile(path.join(logsDir, `${SESSION}.jsonl`), 'utf-8')).toBe(`${'x'.repeat(15)}\n`);
    expect(await fs.readFile(path.join(logsDir, `${SESSION}.2.jsonl`), 'utf-8')).toBe(`${'y'.repeat(15)}\n`);
    expect(sink.bytesWritten).toBe(32);
  });

  it('counts an existing plain file toward the segment limit', async () => {
    await fs.writeFile(path.join(logsDir, `${SESSION}.jsonl`), `${'z'.repeat(15)}\n`);
    const sink = new FileSink({ logsDir, sessionId: SESSION, compressed: false, maxFileSizeBytes: 20 });
    await sink.open();
    await sink.write('{"n":1}\n');
    await sink.close();
    expect(sink.currentSegment).toBe(2);
  });
});
