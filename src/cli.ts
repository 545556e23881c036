#!/usr/bin/env node

/**
 * scratch-fetch CLI
 *
 * Fetches a fixed HTTPS address and prints the response body length.
 *
 * Usage:
 *   scratch-fetch        Print the body length in bytes, exit 0
 *                        On any failure print the error, exit 1
 */

import { createProgram } from './program.js';

// ─── Parse & run ─────────────────────────────────────────────

await createProgram().parseAsync();
