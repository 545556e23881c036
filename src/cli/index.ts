/**
 * CLI Utilities
 */

export * from './progress.js';
