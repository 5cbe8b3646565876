/**
 * Error taxonomy for the worker supervisor.
 *
 * Every error carries a stable `code` and an optional `context` record so
 * observers can log it structurally without parsing messages.
 */

export class PulseError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'PulseError';
    this.code = code;
    this.context = context;
  }
}

/** The OS could not create the worker process. Fatal to `start()`. */
export class SpawnError extends PulseError {
  readonly command: string;

  constructor(message: string, command: string, context?: Record<string, unknown>) {
    super(message, 'SPAWN_ERROR', { ...context, command });
    this.name = 'SpawnError';
    this.command = command;
  }
}

/** A single health probe failed. Retried by the readiness wait. */
export class HealthCheckFailedError extends PulseError {
  readonly url: string;
  readonly status?: number;

  constructor(
    message: string,
    url: string,
    status?: number,
    context?: Record<string, unknown>,
  ) {
    super(message, 'HEALTH_CHECK_FAILED', {
      ...context,
      url,
      ...(status !== undefined ? { status } : {}),
    });
    this.name = 'HealthCheckFailedError';
    this.url = url;
    this.status = status;
  }
}

/** The worker never became ready within the retry budget. */
export class HealthCheckTimeoutError extends PulseError {
  readonly attempts: number;

  constructor(message: string, attempts: number, context?: Record<string, unknown>) {
    super(message, 'HEALTH_CHECK_TIMEOUT', { ...context, attempts });
    this.name = 'HealthCheckTimeoutError';
    this.attempts = attempts;
  }
}

/** A wait or restart was interrupted because shutdown was requested. */
export class ShutdownRaceError extends PulseError {
  constructor(message = 'Supervisor is shutting down', context?: Record<string, unknown>) {
    super(message, 'SHUTDOWN_RACE', context);
    this.name = 'ShutdownRaceError';
  }
}

/** Terminating the worker process failed. */
export class ShutdownError extends PulseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SHUTDOWN_ERROR', context);
    this.name = 'ShutdownError';
  }
}

export class ConfigError extends PulseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/** Normalise an unknown thrown value into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
