/**
 * Observer registry — factory that builds observers from config.
 *
 * Reads the `observability` section of PulseConfig and returns a
 * ready-to-use IObserver (potentially a MultiObserver wrapping several
 * children).
 */

import type { IObserver, LogLevel } from '@pulse/core';

import { ConsoleObserver } from './console-observer.js';
import { MultiObserver } from './multi-observer.js';
import { NoopObserver } from './noop-observer.js';

// ---------------------------------------------------------------------------
// Public config shape (mirrors the observability section of PulseConfig)
// ---------------------------------------------------------------------------

export interface ObservabilityConfig {
  /** Observer names to activate (e.g. ["console"]). */
  observers: string[];
  /** Minimum log level for console output. */
  logLevel?: LogLevel;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Build an IObserver from configuration.
 *
 * - If `observers` is empty, returns a NoopObserver.
 * - If a single observer is listed, returns it directly.
 * - If multiple observers are listed, wraps them in a MultiObserver.
 */
export function createObserver(config: ObservabilityConfig): IObserver {
  const { observers, logLevel = 'info' } = config;

  if (observers.length === 0) {
    return new NoopObserver();
  }

  const children: IObserver[] = [];

  for (const name of observers) {
    switch (name) {
      case 'console':
        children.push(new ConsoleObserver(logLevel));
        break;
      case 'noop':
        children.push(new NoopObserver());
        break;
      default:
        console.warn(`[observability] unknown observer "${name}", skipping`);
        break;
    }
  }

  const [first] = children;
  if (first === undefined) {
    return new NoopObserver();
  }

  if (children.length === 1) {
    return first;
  }

  return new MultiObserver(children);
}
