/**
 * Fetch Errors
 *
 * One error type for every way the fetch can fail. The innermost cause
 * decides whether a failure is a trust failure; the stage decides the rest.
 */

import type { FailureKind, FetchStage } from './types.js';

/** TLS error codes that mean the peer certificate was not trusted */
export const TRUST_ERROR_CODES: ReadonlySet<string> = new Set([
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_DECRYPT_CERT_SIGNATURE',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'CERT_SIGNATURE_FAILURE',
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_UNTRUSTED',
  'CERT_REJECTED',
  'INVALID_CA',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

const MAX_CAUSE_DEPTH = 10;

export interface FetchFailureOptions {
  cause?: unknown;
  code?: string;
}

export class FetchFailure extends Error {
  readonly kind: FailureKind;
  readonly code?: string;

  constructor(kind: FailureKind, message: string, options: FetchFailureOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchFailure';
    this.kind = kind;
    this.code = options.code;
  }
}

/**
 * Follow `cause` links down to the innermost error.
 */
export function rootCause(error: unknown): unknown {
  let current = error;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH; depth++) {
    if (!(current instanceof Error) || current.cause === undefined) break;
    current = current.cause;
  }
  return current;
}

/**
 * Read a string `code` property, as Node's system and TLS errors carry.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Message plus code, unless the message already names the code.
 */
export function describeCause(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const code = errorCode(error);
  if (code && !message.includes(code)) {
    return message ? `${message} (${code})` : code;
  }
  return message;
}

export function isTrustError(error: unknown): boolean {
  const code = errorCode(rootCause(error));
  return code !== undefined && TRUST_ERROR_CODES.has(code);
}

/**
 * Wrap whatever the HTTP client threw into a FetchFailure.
 */
export function toFetchFailure(error: unknown, url: string, stage: FetchStage): FetchFailure {
  if (error instanceof FetchFailure) return error;

  const root = rootCause(error);
  const detail = describeCause(root);
  const code = errorCode(root);

  if (isTrustError(error)) {
    return new FetchFailure('trust', `GET ${url}: certificate verification failed: ${detail}`, { cause: error, code });
  }
  if (stage === 'read') {
    return new FetchFailure('read', `GET ${url}: reading body: ${detail}`, { cause: error, code });
  }
  return new FetchFailure('network', `GET ${url}: ${detail}`, { cause: error, code });
}

/**
 * The one line printed when the program fails.
 */
export function describeFailure(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}
