/**
 * Configuration Loading Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_SLOTCAST_CONFIG, loadSlotcastConfig, resolvePaths } from '../config/slotcast-config.js';
import { ConfigError } from '../errors.js';
import { makeTempDir, removeTempDir } from './test-helpers.js';

function configErrorIssues(fn: () => unknown): string[] {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigError) return e.issues;
    throw e;
  }
  throw new Error('expected a ConfigError');
}

describe('loadSlotcastConfig', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
    configPath = path.join(tempDir, 'slotcast.yaml');
    await fs.promises.writeFile(
      configPath,
      [
        'dataDir: ./state',
        'retry:',
        '  maxAttempts: 5',
        'publisher:',
        '  endpoint: https://cms.example.test/posts',
        '  token: test-token',
        '',
      ].join('\n')
    );
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should use defaults with dataDir resolved against the working directory', () => {
    const config = loadSlotcastConfig({ env: {}, cwd: '/srv/slotcast' });

    expect(config).toEqual({ ...DEFAULT_SLOTCAST_CONFIG, dataDir: '/srv/slotcast/data' });
  });

  it('should merge a YAML file over the defaults', () => {
    const config = loadSlotcastConfig({ configPath, env: {} });

    expect(config.dataDir).toBe(path.join(tempDir, 'state'));
    expect(config.retry).toEqual({ maxAttempts: 5, maxRecoveryRounds: 2, batchSize: 3 });
    expect(config.publisher).toEqual({ endpoint: 'https://cms.example.test/posts', token: 'test-token' });
    expect(config.cadenceMinutes).toBe(15);
  });

  it('should find the file through SLOTCAST_CONFIG', () => {
    const config = loadSlotcastConfig({ env: { SLOTCAST_CONFIG: configPath } });

    expect(config.retry.maxAttempts).toBe(5);
  });

  it('should let environment variables win over the file', () => {
    const config = loadSlotcastConfig({
      configPath,
      env: {
        SLOTCAST_MAX_ATTEMPTS: '4',
        SLOTCAST_VERBOSE: '1',
        SLOTCAST_PUBLISH_TIMEOUT_MS: '2500',
        SLOTCAST_INBOX_PATH: '/var/spool/slotcast/inbox.json',
      },
    });

    expect(config.retry.maxAttempts).toBe(4);
    expect(config.verbose).toBe(true);
    expect(config.timeouts).toEqual({ publishMs: 2500, runMs: 300_000 });
    expect(config.discovery.inboxPath).toBe('/var/spool/slotcast/inbox.json');
  });

  it('should report values that fail validation by path', () => {
    const issues = configErrorIssues(() =>
      loadSlotcastConfig({ env: { SLOTCAST_MAX_ATTEMPTS: 'lots', SLOTCAST_HEALTH_THRESHOLD: '1.5' } })
    );

    expect(issues.some((issue) => issue.startsWith('/retry/maxAttempts: '))).toBe(true);
    expect(issues.some((issue) => issue.startsWith('/health/threshold: '))).toBe(true);
  });

  it('should reject a cadence that does not divide a day', () => {
    expect(configErrorIssues(() => loadSlotcastConfig({ env: { SLOTCAST_CADENCE_MINUTES: '7' } }))).toEqual([
      '/cadenceMinutes: 7 does not divide a day evenly',
    ]);
  });

  it('should reject a missing config file', () => {
    const missing = path.join(tempDir, 'missing.yaml');

    expect(configErrorIssues(() => loadSlotcastConfig({ configPath: missing, env: {} }))).toEqual([
      `config file not found: ${missing}`,
    ]);
  });

  it('should reject a file that is not a mapping', async () => {
    await fs.promises.writeFile(configPath, '- one\n- two\n');

    expect(configErrorIssues(() => loadSlotcastConfig({ configPath, env: {} }))).toEqual([
      `${configPath}: expected a mapping at the top level`,
    ]);
  });

  it('should treat an empty file as no overrides', async () => {
    await fs.promises.writeFile(configPath, '');

    expect(loadSlotcastConfig({ configPath, env: {}, cwd: '/srv/slotcast' }).dataDir).toBe('/srv/slotcast/data');
  });
});

describe('resolvePaths', () => {
  it('should place the lock and inbox under dataDir by default', () => {
    expect(resolvePaths({ ...DEFAULT_SLOTCAST_CONFIG, dataDir: '/srv/slotcast/data' })).toEqual({
      dataDir: '/srv/slotcast/data',
      lockPath: '/srv/slotcast/data/slotcast.lock',
      inboxPath: '/srv/slotcast/data/inbox.json',
    });
  });

  it('should honour explicit paths', () => {
    const paths = resolvePaths({
      ...DEFAULT_SLOTCAST_CONFIG,
      dataDir: '/srv/slotcast/data',
      lockPath: '/run/slotcast.lock',
      discovery: { inboxPath: '/srv/inbox.json' },
    });

    expect(paths.lockPath).toBe('/run/slotcast.lock');
    expect(paths.inboxPath).toBe('/srv/inbox.json');
  });
});
