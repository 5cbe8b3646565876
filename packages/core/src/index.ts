/**
 * @pulse/core — shared contracts for the worker supervisor.
 *
 * Configuration types, the observer contract, the supervisor interface
 * exposed to the rest of the application, the error taxonomy, and small
 * async utilities.
 */

export * from './types/config.js';
export * from './interfaces/observer.js';
export * from './interfaces/supervisor.js';
export * from './errors/index.js';
export * from './utils/sleep.js';
