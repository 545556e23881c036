/**
 * Fetch Module
 */

export * from './types.js';
export * from './errors.js';
export * from './trust.js';
export * from './client.js';
