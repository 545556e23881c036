/**
 * scratch-fetch — Fetch the target and print the body length
 *
 * stdout carries exactly one line: the byte count on success, the error
 * description on failure. The spinner only ever draws on an interactive stderr.
 */

import chalk from 'chalk';
import ora from 'ora';
import type { Dispatcher } from 'undici';
import { TARGET_URL } from '../config.js';
import {
  createTrustedAgent,
  describeFailure,
  fetchBodyLength,
  loadTrustRoots,
} from '../fetch/index.js';
import type { TrustRoots } from '../fetch/index.js';

export interface FetchCommandDeps {
  /** Address to fetch */
  url?: string;
  /** Use this dispatcher instead of an agent built from the system trust roots */
  dispatcher?: Dispatcher;
  /** Trust root loader */
  loadRoots?: () => Promise<TrustRoots>;
  /** Agent factory for the loaded roots */
  createAgent?: (roots: TrustRoots) => Dispatcher;
  /** Line writer for stdout */
  write?: (line: string) => void;
}

/**
 * Run the fetch and report. Resolves to the process exit status.
 */
export async function runFetch(deps: FetchCommandDeps = {}): Promise<number> {
  const url = deps.url ?? TARGET_URL;
  const write = deps.write ?? ((line: string) => console.log(line));
  const loadRoots = deps.loadRoots ?? (() => loadTrustRoots());
  const createAgent = deps.createAgent ?? createTrustedAgent;

  const spinner = ora({
    text: `GET ${url}`,
    stream: process.stderr,
    isSilent: !process.stderr.isTTY,
  }).start();

  let ownedAgent: Dispatcher | undefined;

  try {
    let dispatcher = deps.dispatcher;
    if (!dispatcher) {
      ownedAgent = createAgent(await loadRoots());
      dispatcher = ownedAgent;
    }

    const result = await fetchBodyLength(url, { dispatcher });
    spinner.stop();
    write(String(result.bytes));
    return 0;
  } catch (err) {
    spinner.stop();
    write(chalk.red(describeFailure(err)));
    return 1;
  } finally {
    // The status is already decided; a failed close goes to stderr and leaves it alone.
    await ownedAgent?.close().catch((err: unknown) => {
      console.error(chalk.dim(`closing agent: ${describeFailure(err)}`));
    });
  }
}

export async function fetchCommand(deps: FetchCommandDeps = {}): Promise<void> {
  const status = await runFetch(deps);
  process.exit(status);
}
