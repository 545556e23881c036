/**
 * Fetch Types
 */

/** Outcome of a successful fetch */
export interface FetchResult {
  /** Final URL, after redirects */
  url: string;
  /** HTTP status; any status is measured */
  status: number;
  /** Body length in bytes */
  bytes: number;
}

/** Trust roots loaded from a system bundle */
export interface TrustRoots {
  /** Bundle file the roots came from, or null when none was found */
  path: string | null;
  /** PEM-encoded certificates */
  certificates: string[];
}

/**
 * Failure kinds. They shape the message only; every kind exits 1.
 */
export type FailureKind = 'network' | 'trust' | 'read';

/** Stage of the request an error surfaced in */
export type FetchStage = 'request' | 'read';
