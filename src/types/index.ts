/**
 * @fileoverview Type exports for taskpilot.
 *
 * @module taskpilot/types
 */

export * from './core.types.js';
export * from './tools.types.js';
export * from './errors.js';
