/**
 * Worker configuration resolution.
 *
 * Callers pass a partial configuration; missing fields fall back to
 * DEFAULT_WORKER_CONFIG. The result is validated once and frozen so the
 * supervisor never sees an out-of-range value at run time.
 */

import {
  ConfigError,
  DEFAULT_WORKER_CONFIG,
  MAX_RESTARTS_LIMIT,
  type HealthCheckConfig,
  type WorkerConfig,
} from '@pulse/core';

export type WorkerConfigInput = Partial<Omit<WorkerConfig, 'healthCheck'>> & {
  healthCheck?: Partial<HealthCheckConfig>;
};

export function resolveWorkerConfig(input: WorkerConfigInput = {}): Readonly<WorkerConfig> {
  const config: WorkerConfig = {
    ...DEFAULT_WORKER_CONFIG,
    ...input,
    args: [...(input.args ?? DEFAULT_WORKER_CONFIG.args)],
    healthCheck: { ...DEFAULT_WORKER_CONFIG.healthCheck, ...input.healthCheck },
  };

  validateWorkerConfig(config);

  Object.freeze(config.args);
  Object.freeze(config.healthCheck);
  if (config.extraEnv) Object.freeze(config.extraEnv);
  return Object.freeze(config);
}

export function validateWorkerConfig(config: WorkerConfig): void {
  if (config.command.trim() === '') {
    throw new ConfigError('worker.command must not be empty', { field: 'command' });
  }

  if (
    !Number.isInteger(config.maxRestarts) ||
    config.maxRestarts < 0 ||
    config.maxRestarts > MAX_RESTARTS_LIMIT
  ) {
    throw new ConfigError(
      `worker.maxRestarts must be an integer between 0 and ${MAX_RESTARTS_LIMIT}`,
      { field: 'maxRestarts', value: config.maxRestarts },
    );
  }

  requireNonNegative('initialRestartDelayMs', config.initialRestartDelayMs);
  requireNonNegative('resetRestartsAfterMs', config.resetRestartsAfterMs);
  requirePositive('pollIntervalMs', config.pollIntervalMs);

  const health = config.healthCheck;
  let protocol: string;
  try {
    protocol = new URL(health.url).protocol;
  } catch {
    throw new ConfigError(`worker.healthCheck.url is not a valid URL: ${health.url}`, {
      field: 'healthCheck.url',
      value: health.url,
    });
  }
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new ConfigError('worker.healthCheck.url must use http or https', {
      field: 'healthCheck.url',
      value: health.url,
    });
  }

  requirePositive('healthCheck.timeoutMs', health.timeoutMs);
  requireNonNegative('healthCheck.retryDelayMs', health.retryDelayMs);
  if (!Number.isInteger(health.maxRetries) || health.maxRetries < 1) {
    throw new ConfigError('worker.healthCheck.maxRetries must be a positive integer', {
      field: 'healthCheck.maxRetries',
      value: health.maxRetries,
    });
  }
}

function requireNonNegative(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`worker.${field} must be a non-negative number`, { field, value });
  }
}

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`worker.${field} must be a positive number`, { field, value });
  }
}
