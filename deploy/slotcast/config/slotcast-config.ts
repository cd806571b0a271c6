/**
 * Configuration - defaults, then an optional YAML file, then SLOTCAST_*
 * environment overrides, validated as a whole.
 *
 * @module deploy/slotcast/config/slotcast-config
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import * as yaml from 'yaml';
import { ConfigError, errorMessage } from '../errors.js';

// =============================================================================
// Schema
// =============================================================================

export const SlotcastConfigSchema = Type.Object(
  {
    dataDir: Type.String({ minLength: 1 }),
    /** Default: <dataDir>/slotcast.lock */
    lockPath: Type.Optional(Type.String({ minLength: 1 })),
    verbose: Type.Boolean(),
    cadenceMinutes: Type.Integer({ minimum: 1, maximum: 1440 }),
    frontloadLeadMinutes: Type.Number({ minimum: 0 }),
    checkpointEvery: Type.Integer({ minimum: 1 }),
    retry: Type.Object(
      {
        maxAttempts: Type.Integer({ minimum: 1 }),
        maxRecoveryRounds: Type.Integer({ minimum: 0 }),
        batchSize: Type.Integer({ minimum: 1 }),
      },
      { additionalProperties: false }
    ),
    timeouts: Type.Object(
      {
        publishMs: Type.Integer({ minimum: 1 }),
        runMs: Type.Integer({ minimum: 1 }),
      },
      { additionalProperties: false }
    ),
    catchUp: Type.Object(
      {
        defaultMax: Type.Integer({ minimum: 1 }),
        cap: Type.Integer({ minimum: 1, maximum: 96 }),
      },
      { additionalProperties: false }
    ),
    health: Type.Object(
      {
        windowHours: Type.Number({ exclusiveMinimum: 0 }),
        threshold: Type.Number({ minimum: 0, maximum: 1 }),
        minSamples: Type.Integer({ minimum: 1 }),
      },
      { additionalProperties: false }
    ),
    discovery: Type.Object(
      {
        /** Default: <dataDir>/inbox.json */
        inboxPath: Type.Optional(Type.String({ minLength: 1 })),
      },
      { additionalProperties: false }
    ),
    publisher: Type.Object(
      {
        endpoint: Type.Optional(Type.String({ minLength: 1 })),
        token: Type.Optional(Type.String()),
      },
      { additionalProperties: false }
    ),
  },
  { additionalProperties: false }
);

export type SlotcastConfig = Static<typeof SlotcastConfigSchema>;

export const DEFAULT_SLOTCAST_CONFIG: SlotcastConfig = {
  dataDir: './data',
  verbose: false,
  cadenceMinutes: 15,
  frontloadLeadMinutes: 2,
  checkpointEvery: 50,
  retry: { maxAttempts: 3, maxRecoveryRounds: 2, batchSize: 3 },
  timeouts: { publishMs: 180_000, runMs: 300_000 },
  catchUp: { defaultMax: 4, cap: 96 },
  health: { windowHours: 24, threshold: 0.9, minSamples: 10 },
  discovery: {},
  publisher: {},
};

export interface LoadConfigOptions {
  /** YAML file; falls back to SLOTCAST_CONFIG */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface ResolvedPaths {
  dataDir: string;
  lockPath: string;
  inboxPath: string;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * @throws ConfigError listing every invalid path
 */
export function loadSlotcastConfig(options: LoadConfigOptions = {}): SlotcastConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath ?? env.SLOTCAST_CONFIG;

  let merged: unknown = DEFAULT_SLOTCAST_CONFIG;

  if (configPath) {
    const absolute = resolve(cwd, configPath);
    const fromFile = readConfigFile(absolute);
    // Relative data paths in a file are relative to that file
    if (isRecord(fromFile) && typeof fromFile.dataDir === 'string') {
      fromFile.dataDir = resolve(dirname(absolute), fromFile.dataDir);
    }
    merged = deepMerge(merged, fromFile);
  }

  merged = deepMerge(merged, envOverrides(env));

  if (!Value.Check(SlotcastConfigSchema, merged)) {
    const issues = [...Value.Errors(SlotcastConfigSchema, merged)].map(
      (error) => `${error.path || '/'}: ${error.message}`
    );
    throw new ConfigError(issues);
  }
  if (1440 % merged.cadenceMinutes !== 0) {
    throw new ConfigError([`/cadenceMinutes: ${merged.cadenceMinutes} does not divide a day evenly`]);
  }

  return { ...merged, dataDir: resolve(cwd, merged.dataDir) };
}

export function resolvePaths(config: SlotcastConfig): ResolvedPaths {
  return {
    dataDir: config.dataDir,
    lockPath: config.lockPath ?? join(config.dataDir, 'slotcast.lock'),
    inboxPath: config.discovery.inboxPath ?? join(config.dataDir, 'inbox.json'),
  };
}

function readConfigFile(path: string): unknown {
  if (!existsSync(path)) {
    throw new ConfigError([`config file not found: ${path}`]);
  }
  let parsed: unknown;
  try {
    parsed = yaml.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    throw new ConfigError([`${path}: ${errorMessage(e)}`]);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError([`${path}: expected a mapping at the top level`]);
  }
  return parsed;
}

/**
 * SLOTCAST_* variables. Numeric values that do not parse are passed through
 * as strings so validation reports them.
 */
function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const set = (path: string[], value: unknown) => {
    let target = overrides;
    for (const key of path.slice(0, -1)) {
      const next = target[key];
      if (isRecord(next)) {
        target = next;
      } else {
        const created: Record<string, unknown> = {};
        target[key] = created;
        target = created;
      }
    }
    target[path[path.length - 1]] = value;
  };

  const strings: Array<[string, string[]]> = [
    ['SLOTCAST_DATA_DIR', ['dataDir']],
    ['SLOTCAST_LOCK_PATH', ['lockPath']],
    ['SLOTCAST_INBOX_PATH', ['discovery', 'inboxPath']],
    ['SLOTCAST_PUBLISH_ENDPOINT', ['publisher', 'endpoint']],
    ['SLOTCAST_PUBLISH_TOKEN', ['publisher', 'token']],
  ];
  const numbers: Array<[string, string[]]> = [
    ['SLOTCAST_CADENCE_MINUTES', ['cadenceMinutes']],
    ['SLOTCAST_MAX_ATTEMPTS', ['retry', 'maxAttempts']],
    ['SLOTCAST_RECOVERY_BATCH_SIZE', ['retry', 'batchSize']],
    ['SLOTCAST_PUBLISH_TIMEOUT_MS', ['timeouts', 'publishMs']],
    ['SLOTCAST_RUN_TIMEOUT_MS', ['timeouts', 'runMs']],
    ['SLOTCAST_HEALTH_THRESHOLD', ['health', 'threshold']],
  ];

  for (const [name, path] of strings) {
    const raw = env[name];
    if (raw) set(path, raw);
  }
  for (const [name, path] of numbers) {
    const raw = env[name];
    if (!raw) continue;
    const parsed = Number(raw);
    set(path, Number.isNaN(parsed) ? raw : parsed);
  }
  if (env.SLOTCAST_VERBOSE) {
    set(['verbose'], env.SLOTCAST_VERBOSE === 'true' || env.SLOTCAST_VERBOSE === '1');
  }

  return overrides;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: unknown, override: unknown): unknown {
  if (isRecord(base) && isRecord(override)) {
    const out: Record<string, unknown> = { ...base };
    for (const [key, value] of Object.entries(override)) {
      out[key] = deepMerge(base[key], value);
    }
    return out;
  }
  return override === undefined ? base : override;
}
