import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ValidationError } from './lib/errors.js';

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m|h)$/;
const DURATION_UNITS: Record<string, number> = { ms: 1, s: 1000, m: 60_000, h: 3_600_000 };

/**
 * Parse "250ms", "30s", "5m", "1h" or a bare number of milliseconds.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(`Invalid duration: ${value}`);
    }
    return value;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }
  const match = DURATION_PATTERN.exec(trimmed);
  if (!match) {
    throw new ValidationError(`Invalid duration "${value}" (expected e.g. 30s, 5m, 1h)`);
  }
  return Math.round(Number(match[1]) * DURATION_UNITS[match[2]]);
}

const DurationSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  try {
    return parseDuration(value);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
    return z.NEVER;
  }
});

const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

const FileConfigSchema = z
  .object({
    dataDir: z.string().min(1).default('/opt/dockhand/data'),
    databasePath: z.string().min(1).optional(),
    logLevel: LogLevelSchema.default('info'),
    encryptionKey: z.string().default(''),
    previousEncryptionKeys: z.array(z.string().min(1)).default([]),
    git: z
      .object({
        timeout: DurationSchema.default('5m'),
      })
      .default({}),
    watcher: z
      .object({
        enabled: z.boolean().default(true),
        pollInterval: DurationSchema.default('5m'),
        syncStatus: z.boolean().default(true),
        fetchAttempts: z.number().int().min(1).default(3),
      })
      .default({}),
    compose: z
      .object({
        binary: z.string().min(1).default('docker'),
        stopGracePeriod: DurationSchema.default('10s'),
        streamBufferSize: z.number().int().min(1).default(100),
      })
      .default({}),
  })
  .strict();

export interface Config {
  dataDir: string;
  workspaceDir: string;
  tmpDir: string;
  databasePath: string;
  logLevel: z.infer<typeof LogLevelSchema>;
  encryptionKey: string;
  previousEncryptionKeys: string[];
  git: {
    timeoutMs: number;
  };
  watcher: {
    enabled: boolean;
    pollIntervalMs: number;
    syncStatus: boolean;
    fetchAttempts: number;
  };
  compose: {
    binary: string;
    stopGracePeriodMs: number;
    streamBufferSize: number;
  };
}

export interface LoadConfigOptions {
  /** YAML file to read. Falls back to DOCKHAND_CONFIG; a missing default file is not an error. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ValidationError(`${name} must be a boolean, got "${value}"`);
}

function readConfigFile(path: string): Record<string, unknown> {
  const content = readFileSync(path, 'utf-8');
  const parsed: unknown = parseYaml(content);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ValidationError(`Config file ${path} must contain a mapping`);
  }
  return { ...parsed };
}

function section(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {};
}

/**
 * Layer environment overrides on top of the file contents.
 */
function applyEnvOverrides(file: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...file };
  const git = section(file.git);
  const watcher = section(file.watcher);
  const compose = section(file.compose);

  if (env.DOCKHAND_DATA_DIR) merged.dataDir = env.DOCKHAND_DATA_DIR;
  if (env.DOCKHAND_DATABASE_PATH) merged.databasePath = env.DOCKHAND_DATABASE_PATH;
  if (env.DOCKHAND_LOG_LEVEL) merged.logLevel = env.DOCKHAND_LOG_LEVEL;
  if (env.DOCKHAND_ENCRYPTION_KEY) merged.encryptionKey = env.DOCKHAND_ENCRYPTION_KEY;
  if (env.DOCKHAND_PREVIOUS_ENCRYPTION_KEYS) {
    merged.previousEncryptionKeys = env.DOCKHAND_PREVIOUS_ENCRYPTION_KEYS.split(',')
      .map((key) => key.trim())
      .filter((key) => key.length > 0);
  }
  if (env.DOCKHAND_GIT_TIMEOUT) git.timeout = env.DOCKHAND_GIT_TIMEOUT;
  if (env.DOCKHAND_WATCHER_ENABLED) {
    watcher.enabled = parseBoolean('DOCKHAND_WATCHER_ENABLED', env.DOCKHAND_WATCHER_ENABLED);
  }
  if (env.DOCKHAND_WATCHER_POLL_INTERVAL) watcher.pollInterval = env.DOCKHAND_WATCHER_POLL_INTERVAL;
  if (env.DOCKHAND_WATCHER_SYNC_STATUS) {
    watcher.syncStatus = parseBoolean('DOCKHAND_WATCHER_SYNC_STATUS', env.DOCKHAND_WATCHER_SYNC_STATUS);
  }
  if (env.DOCKHAND_COMPOSE_BINARY) compose.binary = env.DOCKHAND_COMPOSE_BINARY;

  merged.git = git;
  merged.watcher = watcher;
  merged.compose = compose;
  return merged;
}

/**
 * Resolve configuration from defaults, an optional YAML file and the
 * environment, in that order of precedence.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const explicitPath = options.configPath ?? env.DOCKHAND_CONFIG;

  let file: Record<string, unknown> = {};
  if (explicitPath) {
    if (!existsSync(explicitPath)) {
      throw new ValidationError(`Config file not found: ${explicitPath}`);
    }
    file = readConfigFile(explicitPath);
  }

  const result = FileConfigSchema.safeParse(applyEnvOverrides(file, env));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const parsed = result.data;
  if (parsed.encryptionKey === '') {
    throw new ValidationError(
      'An encryption key is required. Set DOCKHAND_ENCRYPTION_KEY (generate one with: openssl rand -base64 32)'
    );
  }
  if (parsed.watcher.pollInterval <= 0) {
    throw new ValidationError('watcher.pollInterval must be greater than zero');
  }

  const dataDir = resolve(parsed.dataDir);
  return {
    dataDir,
    workspaceDir: join(dataDir, 'projects'),
    tmpDir: join(dataDir, 'tmp'),
    databasePath: parsed.databasePath ?? join(dataDir, 'dockhand.db'),
    logLevel: parsed.logLevel,
    encryptionKey: parsed.encryptionKey,
    previousEncryptionKeys: parsed.previousEncryptionKeys,
    git: {
      timeoutMs: parsed.git.timeout,
    },
    watcher: {
      enabled: parsed.watcher.enabled,
      pollIntervalMs: parsed.watcher.pollInterval,
      syncStatus: parsed.watcher.syncStatus,
      fetchAttempts: parsed.watcher.fetchAttempts,
    },
    compose: {
      binary: parsed.compose.binary,
      stopGracePeriodMs: parsed.compose.stopGracePeriod,
      streamBufferSize: parsed.compose.streamBufferSize,
    },
  };
}
