/**
 * Sinks receive the writer's serialized lines.
 *
 * FileSink appends to `<logsDir>/<sessionId>.jsonl`, optionally through a
 * gzip stream (`.jsonl.gz`). Reopening a compressed file appends a new gzip
 * member, which standard tools decompress as one stream.
 */

import fs from 'graceful-fs';
import { once } from 'node:events';
import type { Writable } from 'node:stream';
import { finished, pipeline } from 'node:stream/promises';
import { createGzip } from 'node:zlib';
import type { Gzip } from 'node:zlib';
import { getSinkPath } from '../utils/paths.js';

const fsPromises = fs.promises;

/** Append-only destination owned by a single writer. */
export interface Sink {
  /** File (or label) currently written to. */
  readonly path: string;
  /** Uncompressed bytes accepted since the sink was created. */
  readonly bytesWritten: number;
  open(): Promise<void>;
  write(chunk: string): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export interface FileSinkOptions {
  logsDir: string;
  sessionId: string;
  compressed: boolean;
  /** Roll to a new segment once a file would exceed this many uncompressed bytes. 0 disables. */
  maxFileSizeBytes?: number;
}

async function existingSize(filePath: string): Promise<number> {
  try {
    return (await fsPromises.stat(filePath)).size;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return 0;
    throw err;
  }
}

function writeChunk(output: Writable, chunk: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(chunk, 'utf-8', (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

export class FileSink implements Sink {
  private output: Writable | null = null;
  private gzip: Gzip | null = null;
  private done: Promise<void> | null = null;
  private failure: Error | null = null;
  private segment = 1;
  private segmentBytes = 0;
  private totalBytes = 0;

  constructor(private readonly options: FileSinkOptions) {}

  get path(): string {
    return getSinkPath(this.options.logsDir, this.options.sessionId, this.options.compressed, this.segment);
  }

  get bytesWritten(): number {
    return this.totalBytes;
  }

  /** Current segment number, starting at 1. */
  get currentSegment(): number {
    return this.segment;
  }

  async open(): Promise<void> {
    if (this.output) return;
    await fsPromises.mkdir(this.options.logsDir, { recursive: true });

    const filePath = this.path;
    // A gzip file's size says nothing about its uncompressed length.
    this.segmentBytes = this.options.compressed ? 0 : await existingSize(filePath);
    this.failure = null;

    const file = fs.createWriteStream(filePath, { flags: 'a' });
    await once(file, 'open');

    if (this.options.compressed) {
      const gzip = createGzip();
      this.gzip = gzip;
      this.output = gzip;
      this.done = pipeline(gzip, file);
    } else {
      this.output = file;
      this.done = finished(file);
    }
    this.done.catch((err: unknown) => {
      this.failure = err instanceof Error ? err : new Error(String(err));
    });
  }

  async write(chunk: string): Promise<void> {
    if (this.failure) throw this.failure;
    const size = Buffer.byteLength(chunk, 'utf-8');
    const limit = this.options.maxFileSizeBytes ?? 0;
    if (limit > 0 && this.segmentBytes > 0 && this.segmentBytes + size > limit) {
      await this.roll();
    }

    const output = this.output;
    if (!output) throw new Error(`Sink ${this.path} is not open`);
    await writeChunk(output, chunk);
    this.segmentBytes += size;
    this.totalBytes += size;
  }

  async flush(): Promise<void> {
    if (this.failure) throw this.failure;
    const gzip = this.gzip;
    if (!gzip) return;
    await new Promise<void>((resolve) => {
      gzip.flush(() => resolve());
    });
  }

  async close(): Promise<void> {
    const output = this.output;
    const done = this.done;
    this.output = null;
    this.gzip = null;
    this.done = null;
    if (!output || !done) return;
    output.end();
    await done;
  }

  private async roll(): Promise<void> {
    await this.close();
    this.segment += 1;
    await this.open();
  }
}
