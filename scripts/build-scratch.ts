#!/usr/bin/env node

/**
 * Build the scratch image.
 *
 * Step 1 bundles src/cli.ts into a single self-contained file.
 * Step 2 packages that file into an image built from an empty base.
 *
 * Usage:
 *   npm run build:image -- [--tag <name>] [--platform linux/arm64] [--no-certs] [--skip-image] [--no-color]
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { BuildPipeline, parseBuildOptions, type BuildOptions } from '../src/build/index.js';
import { ProgressDisplay } from '../src/cli/index.js';
import {
  DEFAULT_DOCKERFILE,
  DEFAULT_ENTRY,
  DEFAULT_IMAGE_TAG,
  DEFAULT_OUTFILE,
  IMAGE_PLATFORMS,
} from '../src/config.js';

interface BuildScratchOptions {
  entry: string;
  outfile: string;
  tag: string;
  file: string;
  platform: string;
  certs: boolean;
  skipImage?: boolean;
  color: boolean;
}

async function buildScratch(options: BuildScratchOptions): Promise<void> {
  if (!options.color) {
    chalk.level = 0;
  }

  let buildOptions: BuildOptions;
  try {
    buildOptions = parseBuildOptions({
      entry: options.entry,
      outfile: options.outfile,
      tag: options.tag,
      dockerfile: options.file,
      platform: options.platform,
      withCerts: options.certs,
      skipImage: options.skipImage ?? false,
    });
  } catch (err) {
    console.log(chalk.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
  }

  const pipeline = new BuildPipeline(buildOptions);
  const progress = new ProgressDisplay({ noColor: !options.color });
  pipeline.on(progress.handleEvent);

  try {
    await pipeline.run();
  } catch {
    // Reported through the error event
    progress.stop();
    process.exit(1);
  }
}

const program = new Command();

program
  .name('build-scratch')
  .description('Bundle the program and package it into a scratch image')
  .option('--entry <file>', 'Program entry point', DEFAULT_ENTRY)
  .option('--outfile <file>', 'Bundle output file', DEFAULT_OUTFILE)
  .option('-t, --tag <name>', 'Image tag', DEFAULT_IMAGE_TAG)
  .option('-f, --file <dockerfile>', 'Image definition file', DEFAULT_DOCKERFILE)
  .option('--platform <os/arch>', `Target platform (${IMAGE_PLATFORMS.join(', ')})`, IMAGE_PLATFORMS[0])
  .option('--no-certs', 'Leave the trust bundle out of the image')
  .option('--skip-image', 'Only build the bundle')
  .option('--no-color', 'Print without colors')
  .action(buildScratch);

await program.parseAsync();
