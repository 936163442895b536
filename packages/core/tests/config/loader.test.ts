import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { ConfigurationError, loadConfig } from '../../src/index.js';

let tmpDir: string;
let configFile: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'activity-trail-config-test-'));
  configFile = path.join(tmpDir, 'config.yaml');
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('returns defaults when nothing is configured', () => {
    const config = loadConfig({ file: configFile, env: {} });
    expect(config.enabled).toBe(true);
    expect(config.compression).toBe(true);
    expect(config.strictMode).toBe(false);
    expect(config.queueCapacity).toBe(10_000);
    expect(config.overflowPolicy).toBe('drop-newest');
    expect(config.retentionCount).toBe(2);
    expect(config.sessionIdFormat).toBe('session_%Y%m%d_%H%M%S');
    expect(config.logsDir).toBe(path.join(process.cwd(), '.activity-trail', 'logs'));
  });

  it('reads snake_case keys from the YAML file', async () => {
    await fs.writeFile(configFile, 'queue_capacity: 50\ncompression: false\nstrict_mode: true\n');
    const config = loadConfig({ file: configFile, env: {} });
    expect(config.queueCapacity).toBe(50);
    expect(config.compression).toBe(false);
    expect(config.strictMode).toBe(true);
  });

  it('lets the environment override the file, and overrides win over both', async () => {
    await fs.writeFile(configFile, 'compression: false\nretention_count: 5\n');
    const config = loadConfig({
      file: configFile,
      env: { ACTIVITY_TRAIL_COMPRESSION: 'yes', ACTIVITY_TRAIL_RETENTION_COUNT: '3' },
      overrides: { retentionCount: 7 },
    });
    expect(config.compression).toBe(true);
    expect(config.retentionCount).toBe(7);
  });

  it('reports unparseable environment values', () => {
    try {
      loadConfig({ env: { ACTIVITY_TRAIL_QUEUE_CAPACITY: 'lots', ACTIVITY_TRAIL_ENABLED: 'perhaps' } });
      expect.unreachable('loadConfig should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.issues.map((issue) => issue.path).sort()).toEqual([
          'ACTIVITY_TRAIL_ENABLED',
          'ACTIVITY_TRAIL_QUEUE_CAPACITY',
        ]);
      }
    }
  });

  it('rejects unknown keys and out-of-range values', async () => {
    await fs.writeFile(configFile, 'queue_capacity: 0\nflush_every: 10\n');
    expect(() => loadConfig({ file: configFile, env: {} })).toThrow(ConfigurationError);
  });

  it('rejects a file that is not a mapping', async () => {
    await fs.writeFile(configFile, '- one\n- two\n');
    expect(() => loadConfig({ file: configFile, env: {} })).toThrow('must contain a mapping');
  });

  it('treats an empty file as no settings', async () => {
    await fs.writeFile(configFile, '');
    expect(loadConfig({ file: configFile, env: {} }).enabled).toBe(true);
  });

  it('rejects an unknown overflow policy', () => {
    expect(() => loadConfig({ env: { ACTIVITY_TRAIL_OVERFLOW_POLICY: 'block' } })).toThrow(ConfigurationError);
  });
});
