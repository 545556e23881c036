/**
 * Body Length Client
 *
 * One GET, the whole body read into memory, its length measured.
 */

import { Agent, fetch, type Dispatcher, type Response } from 'undici';
import { toFetchFailure } from './errors.js';
import type { FetchResult, TrustRoots } from './types.js';

export interface FetchOptions {
  /** Connection pool the request goes through */
  dispatcher: Dispatcher;
}

/**
 * Agent that verifies servers against the given roots only.
 */
export function createTrustedAgent(roots: TrustRoots): Agent {
  return new Agent({
    connect: { ca: roots.certificates },
  });
}

export async function fetchBodyLength(url: string, options: FetchOptions): Promise<FetchResult> {
  let response: Response;
  try {
    response = await fetch(url, { dispatcher: options.dispatcher });
  } catch (err) {
    throw toFetchFailure(err, url, 'request');
  }

  let body: ArrayBuffer;
  try {
    body = await response.arrayBuffer();
  } catch (err) {
    throw toFetchFailure(err, url, 'read');
  }

  return {
    url: response.url || url,
    status: response.status,
    bytes: body.byteLength,
  };
}
