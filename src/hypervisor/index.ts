/**
 * Hypervisor Module
 *
 * Exports host command types, executors, builders and parsers.
 */

export * from './types.js';
export * from './executor.js';
export * from './commands.js';
export * from './queries.js';
export * from './verbose.js';
