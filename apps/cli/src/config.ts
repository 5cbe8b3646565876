/**
 * CLI configuration: ~/.pulse/config.json layered over built-in defaults.
 *
 * Load order: defaults, then the user's config file (deep-merged, arrays
 * replace), then `${VAR}` references resolved from the environment, then
 * explicit environment overrides. The result is validated into a typed
 * PulseConfig; any problem surfaces as a ConfigLoadError naming the key.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import {
  ConfigError,
  DEFAULT_WORKER_CONFIG,
  type LogLevel,
  type PulseConfig,
  type WorkerConfig,
} from '@pulse/core';
import { validateWorkerConfig } from '@pulse/supervisor';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ConfigLoadError extends ConfigError {
  /** Dotted config key (or environment variable) at fault, when known. */
  readonly key?: string;

  constructor(message: string, key?: string) {
    super(message, key ? { key } : undefined);
    this.name = 'ConfigLoadError';
    this.key = key;
  }
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function getPulseDir(): string {
  return resolve(homedir(), '.pulse');
}

export function getConfigPath(): string {
  return join(getPulseDir(), 'config.json');
}

export function ensureConfigDir(): void {
  mkdirSync(getPulseDir(), { recursive: true });
}

export function configExists(): boolean {
  return existsSync(getConfigPath());
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function getDefaultConfig(): PulseConfig {
  return {
    server: {
      host: '127.0.0.1',
      port: 8000,
    },
    worker: {
      ...DEFAULT_WORKER_CONFIG,
      args: [...DEFAULT_WORKER_CONFIG.args],
      healthCheck: { ...DEFAULT_WORKER_CONFIG.healthCheck },
    },
    observability: {
      observers: ['console'],
      logLevel: 'info',
    },
  };
}

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

type OverrideKind = 'string' | 'number' | 'script';

const ENV_OVERRIDES: ReadonlyArray<{ env: string; path: readonly string[]; kind: OverrideKind }> = [
  { env: 'SERVER_HOST', path: ['server', 'host'], kind: 'string' },
  { env: 'SERVER_PORT', path: ['server', 'port'], kind: 'number' },
  { env: 'PULSE_WORKER_COMMAND', path: ['worker', 'command'], kind: 'string' },
  { env: 'PULSE_WORKER_SCRIPT', path: ['worker', 'args'], kind: 'script' },
  { env: 'PULSE_WORKER_MAX_RESTARTS', path: ['worker', 'maxRestarts'], kind: 'number' },
  { env: 'PULSE_WORKER_RESTART_DELAY_MS', path: ['worker', 'initialRestartDelayMs'], kind: 'number' },
  { env: 'PULSE_WORKER_HEALTH_URL', path: ['worker', 'healthCheck', 'url'], kind: 'string' },
  { env: 'PULSE_WORKER_HEALTH_TIMEOUT_MS', path: ['worker', 'healthCheck', 'timeoutMs'], kind: 'number' },
  { env: 'PULSE_WORKER_HEALTH_MAX_RETRIES', path: ['worker', 'healthCheck', 'maxRetries'], kind: 'number' },
  { env: 'PULSE_WORKER_HEALTH_RETRY_DELAY_MS', path: ['worker', 'healthCheck', 'retryDelayMs'], kind: 'number' },
  { env: 'PULSE_LOG_LEVEL', path: ['observability', 'logLevel'], kind: 'string' },
];

function applyEnvOverrides(target: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  for (const { env: name, path, kind } of ENV_OVERRIDES) {
    const raw = env[name];
    if (raw === undefined || raw === '') continue;

    let value: unknown = raw;
    if (kind === 'number') {
      value = Number(raw);
      if (Number.isNaN(value)) {
        throw new ConfigLoadError(`Environment variable ${name} must be a number, got "${raw}"`, name);
      }
    } else if (kind === 'script') {
      value = [raw];
    }
    setPath(target, path, value);
  }
}

function setPath(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
  const [head, ...rest] = path;
  if (head === undefined) return;
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const existing = target[head];
  const next: Record<string, unknown> = isRecord(existing) ? existing : {};
  target[head] = next;
  setPath(next, rest, value);
}

// ---------------------------------------------------------------------------
// Load / save
// ---------------------------------------------------------------------------

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PulseConfig {
  let merged: Record<string, unknown> = { ...getDefaultConfig() };

  const configPath = getConfigPath();
  if (existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, 'utf8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigLoadError(`Failed to parse ${configPath}: ${message}`);
    }
    if (!isRecord(parsed)) {
      throw new ConfigLoadError(`${configPath} must contain a JSON object`);
    }
    merged = deepMerge(merged, parsed);
  }

  const resolved = resolveEnvVars(merged, env);
  if (!isRecord(resolved)) {
    throw new ConfigLoadError('Configuration must be an object');
  }
  applyEnvOverrides(resolved, env);

  return toPulseConfig(resolved);
}

export function saveConfig(config: PulseConfig): void {
  ensureConfigDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2) + '\n', 'utf8');
}

// ---------------------------------------------------------------------------
// Merge and variable resolution
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Recursive merge; arrays and scalars from `override` replace `base`. */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }
  return result;
}

const ENV_REF = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Replace `${VAR}` in every string; unset variables become ''. */
export function resolveEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_REF, (_match, name: string) => env[name] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => resolveEnvVars(item, env));
  }
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = resolveEnvVars(item, env);
    }
    return out;
  }
  return value;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (!isRecord(value)) {
    throw new ConfigLoadError(`Invalid config: ${key} must be an object`, key);
  }
  return value;
}

function readString(obj: Record<string, unknown>, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new ConfigLoadError(`Invalid config: ${path} must be a string`, path);
  }
  return value;
}

function readNumber(obj: Record<string, unknown>, key: string, path: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ConfigLoadError(`Invalid config: ${path} must be a number`, path);
  }
  return value;
}

function readBoolean(obj: Record<string, unknown>, key: string, path: string): boolean {
  const value = obj[key];
  if (typeof value !== 'boolean') {
    throw new ConfigLoadError(`Invalid config: ${path} must be a boolean`, path);
  }
  return value;
}

function readStringArray(obj: Record<string, unknown>, key: string, path: string): string[] {
  const value = obj[key];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigLoadError(`Invalid config: ${path} must be an array of strings`, path);
  }
  return value;
}

function readStringRecord(
  obj: Record<string, unknown>,
  key: string,
  path: string,
): Record<string, string> | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ConfigLoadError(`Invalid config: ${path} must be an object of strings`, path);
  }
  const out: Record<string, string> = {};
  for (const [name, item] of Object.entries(value)) {
    if (typeof item !== 'string') {
      throw new ConfigLoadError(`Invalid config: ${path}.${name} must be a string`, `${path}.${name}`);
    }
    out[name] = item;
  }
  return out;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function toPulseConfig(raw: Record<string, unknown>): PulseConfig {
  const server = section(raw, 'server');
  const host = readString(server, 'host', 'server.host');
  const port = readNumber(server, 'port', 'server.port');
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new ConfigLoadError(
      'Invalid config: server.port must be an integer between 0 and 65535',
      'server.port',
    );
  }

  const observability = section(raw, 'observability');
  const logLevel = readString(observability, 'logLevel', 'observability.logLevel');
  if (!isLogLevel(logLevel)) {
    throw new ConfigLoadError(
      `Invalid config: observability.logLevel must be one of ${LOG_LEVELS.join(', ')}`,
      'observability.logLevel',
    );
  }

  return {
    server: { host, port },
    worker: toWorkerConfig(section(raw, 'worker')),
    observability: {
      observers: readStringArray(observability, 'observers', 'observability.observers'),
      logLevel,
    },
  };
}

function toWorkerConfig(worker: Record<string, unknown>): WorkerConfig {
  const health = section(worker, 'healthCheck');
  const cwd = worker['cwd'];
  if (cwd !== undefined && typeof cwd !== 'string') {
    throw new ConfigLoadError('Invalid config: worker.cwd must be a string', 'worker.cwd');
  }

  const config: WorkerConfig = {
    command: readString(worker, 'command', 'worker.command'),
    args: readStringArray(worker, 'args', 'worker.args'),
    cwd,
    extraEnv: readStringRecord(worker, 'extraEnv', 'worker.extraEnv'),
    maxRestarts: readNumber(worker, 'maxRestarts', 'worker.maxRestarts'),
    initialRestartDelayMs: readNumber(worker, 'initialRestartDelayMs', 'worker.initialRestartDelayMs'),
    pollIntervalMs: readNumber(worker, 'pollIntervalMs', 'worker.pollIntervalMs'),
    healthCheck: {
      url: readString(health, 'url', 'worker.healthCheck.url'),
      timeoutMs: readNumber(health, 'timeoutMs', 'worker.healthCheck.timeoutMs'),
      maxRetries: readNumber(health, 'maxRetries', 'worker.healthCheck.maxRetries'),
      retryDelayMs: readNumber(health, 'retryDelayMs', 'worker.healthCheck.retryDelayMs'),
    },
    adoptExisting: readBoolean(worker, 'adoptExisting', 'worker.adoptExisting'),
    resetRestartsAfterMs: readNumber(worker, 'resetRestartsAfterMs', 'worker.resetRestartsAfterMs'),
  };

  try {
    validateWorkerConfig(config);
  } catch (err) {
    if (err instanceof ConfigError) {
      const field = err.context?.['field'];
      throw new ConfigLoadError(
        `Invalid config: ${err.message}`,
        typeof field === 'string' ? `worker.${field}` : undefined,
      );
    }
    throw err;
  }

  return config;
}
