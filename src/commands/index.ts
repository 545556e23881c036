/**
 * Command re-exports
 */

export { fetchCommand, runFetch } from './fetch.js';
export type { FetchCommandDeps } from './fetch.js';
