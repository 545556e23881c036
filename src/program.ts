/**
 * Program definition, kept apart from the entry so it can be parsed in tests.
 */

import { Command } from 'commander';
import { VERSION } from './config.js';
import { fetchCommand } from './commands/index.js';

export function createProgram(action: () => Promise<void> | void = () => fetchCommand()): Command {
  return new Command()
    .name('scratch-fetch')
    .description('Fetch a fixed HTTPS address and print the response body length.')
    .version(VERSION)
    .allowExcessArguments(false)
    .action(() => action());
}
