/**
 * @pulse/observability — structured observability for the worker supervisor.
 *
 * Re-exports every observer implementation and the factory registry.
 */

export { ConsoleObserver } from './console-observer.js';

export { MultiObserver } from './multi-observer.js';
export { NoopObserver } from './noop-observer.js';

export { createObserver } from './registry.js';
export type { ObservabilityConfig } from './registry.js';
