/**
 * @pulse/supervisor — supervision of the external analysis worker.
 *
 * Restart policy, health checking, output forwarding and the process
 * supervisor that ties them together.
 */

export * from './restart-policy.js';
export * from './health.js';
export * from './log-forwarder.js';
export * from './config.js';
export * from './process-supervisor.js';
