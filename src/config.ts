/**
 * scratch-fetch Configuration
 *
 * Fixed settings for the fetch program and the scratch image build.
 * Nothing here is read from the environment.
 */

/** Program version, reported by `--version` */
export const VERSION = '0.1.0';

/** The one address the program fetches */
export const TARGET_URL = 'https://example.com/';

/**
 * Trust bundle locations, searched in order. The first readable file wins.
 */
export const TRUST_BUNDLE_PATHS: readonly string[] = [
  '/etc/ssl/certs/ca-certificates.crt', // Debian, Ubuntu, Alpine
  '/etc/pki/tls/certs/ca-bundle.crt', // Fedora, RHEL 6
  '/etc/ssl/ca-bundle.pem', // OpenSUSE
  '/etc/pki/tls/cacert.pem', // OpenELEC
  '/etc/pki/ca-trust/extracted/pem/tls-ca-bundle.pem', // CentOS, RHEL 7
  '/etc/ssl/cert.pem', // Alpine (older)
];

/**
 * Certificate directories, searched in order when no bundle file exists.
 * The first one holding any certificates wins.
 */
export const TRUST_CERT_DIRECTORIES: readonly string[] = [
  '/etc/ssl/certs', // Debian, Ubuntu, SLES
  '/etc/pki/tls/certs', // Fedora, RHEL
];

// ─── Build Defaults ──────────────────────────────────────────

/** Program entry point handed to the bundler */
export const DEFAULT_ENTRY = 'src/cli.ts';

/** Single-file bundle copied into the image */
export const DEFAULT_OUTFILE = 'dist/main.mjs';

/** Image tag used when none is given */
export const DEFAULT_IMAGE_TAG = 'example-scratch';

/** Image definition file */
export const DEFAULT_DOCKERFILE = 'Dockerfile.scratch';

/** Supported image platforms; the first is the default */
export const IMAGE_PLATFORMS = ['linux/amd64', 'linux/arm64'] as const;

/** Node.js release the bundle targets */
export const BUNDLE_TARGET = 'node20';
