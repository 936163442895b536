import fs from 'graceful-fs';
import { promisify } from 'node:util';
import zlib from 'node:zlib';
import { SchemaError } from '../errors.js';
import { validateEvent } from '../events/registry.js';
import type { ActivityEvent } from '../events/types.js';

const gunzip = promisify(zlib.gunzip);

async function readText(filePath: string): Promise<string> {
  const raw = await fs.promises.readFile(filePath);
  // Concatenated gzip members (one per reopen) decompress as one stream.
  const bytes = filePath.endsWith('.gz') ? await gunzip(raw) : raw;
  return bytes.toString('utf-8');
}

/**
 * Read back a session log file, validating every line.
 *
 * @returns Events in file order
 * @throws {SchemaError} On the first line that is not valid JSON or not a valid event
 */
export async function readSessionEvents(filePath: string): Promise<ActivityEvent[]> {
  const lines = (await readText(filePath)).split('\n');
  const events: ActivityEvent[] = [];

  lines.forEach((line, index) => {
    if (line.trim() === '') return;
    const lineNumber = index + 1;

    let candidate: unknown;
    try {
      candidate = JSON.parse(line);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new SchemaError(`Line ${lineNumber} of ${filePath} is not valid JSON: ${message}`, null, [
        { path: `line ${lineNumber}`, message },
      ]);
    }

    const result = validateEvent(candidate);
    if (!result.ok) {
      throw new SchemaError(
        `Line ${lineNumber} of ${filePath}: ${result.error.message}`,
        result.error.eventType,
        result.error.issues,
      );
    }
    events.push(result.event);
  });

  return events;
}
