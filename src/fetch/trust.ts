/**
 * Trust Roots
 *
 * Loads CA certificates from the first system bundle that exists, or else
 * from the `*.pem` and `*.crt` files of a certificate directory. The
 * runtime's compiled-in root store is never consulted, so an image without
 * a bundle has no trusted roots at all.
 */

import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { TRUST_BUNDLE_PATHS, TRUST_CERT_DIRECTORIES } from '../config.js';
import { FetchFailure, describeCause, errorCode } from './errors.js';
import type { TrustRoots } from './types.js';

export type BundleReader = (path: string) => Promise<string>;
export type DirectoryLister = (directory: string) => Promise<string[]>;

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

const CERT_FILE = /\.(pem|crt)$/;

const readBundle: BundleReader = (path) => readFile(path, 'utf-8');
const listDirectory: DirectoryLister = (directory) => readdir(directory);

/**
 * Extract the CERTIFICATE blocks of a PEM bundle. Other block types are dropped.
 */
export function splitPemBundle(pem: string): string[] {
  return pem.match(PEM_CERTIFICATE) ?? [];
}

export interface TrustSearchOptions {
  /** Bundle files, searched in order */
  files?: readonly string[];
  /** Certificate directories, searched when no bundle file exists */
  directories?: readonly string[];
  read?: BundleReader;
  list?: DirectoryLister;
}

export async function loadTrustRoots(options: TrustSearchOptions = {}): Promise<TrustRoots> {
  const {
    files = TRUST_BUNDLE_PATHS,
    directories = TRUST_CERT_DIRECTORIES,
    read = readBundle,
    list = listDirectory,
  } = options;
  let firstError: unknown;
  const remember = (err: unknown): void => {
    if (firstError === undefined && errorCode(err) !== 'ENOENT') {
      firstError = err;
    }
  };

  for (const path of files) {
    let pem: string;
    try {
      pem = await read(path);
    } catch (err) {
      remember(err);
      continue;
    }
    return { path, certificates: splitPemBundle(pem) };
  }

  for (const directory of directories) {
    let names: string[];
    try {
      names = await list(directory);
    } catch (err) {
      remember(err);
      continue;
    }

    const certificates = new Set<string>();
    for (const name of names.filter((entry) => CERT_FILE.test(entry)).sort()) {
      try {
        for (const cert of splitPemBundle(await read(join(directory, name)))) {
          certificates.add(cert);
        }
      } catch (err) {
        remember(err);
      }
    }
    if (certificates.size > 0) {
      return { path: directory, certificates: [...certificates] };
    }
  }

  if (firstError !== undefined) {
    throw new FetchFailure('trust', `failed to load trust roots: ${describeCause(firstError)}`, {
      cause: firstError,
      code: errorCode(firstError),
    });
  }

  return { path: null, certificates: [] };
}
