/**
 * Shared utilities
 */

export * from './hex.js';
export * from './log.js';
