/**
 * Build Pipeline
 *
 * Runs the two build steps strictly in order:
 * Bundle → Package
 *
 * There is no partial recovery. The first failing step ends the run and the
 * whole pipeline has to be started again.
 */

import { bundleProgram, type Bundler } from './bundle.js';
import { createImageBuilder, type ImageBuilder } from './image.js';
import type { BuildOptions } from './options.js';
import type {
  BuildEvent,
  BuildEventHandler,
  BuildPhase,
  BuildReport,
  ImageResult,
} from './types.js';

export interface BuildPipelineDeps {
  bundler?: Bundler;
  imageBuilder?: ImageBuilder;
  /** Docker build context */
  context?: string;
}

export class BuildPipeline {
  private readonly options: BuildOptions;
  private readonly bundler: Bundler;
  private readonly imageBuilder: ImageBuilder;
  private readonly context: string;
  private eventHandlers: BuildEventHandler[] = [];
  private phase: BuildPhase = 'pending';

  constructor(options: BuildOptions, deps: BuildPipelineDeps = {}) {
    this.options = options;
    this.bundler = deps.bundler ?? bundleProgram;
    this.imageBuilder = deps.imageBuilder ?? createImageBuilder();
    this.context = deps.context ?? '.';
  }

  // ─── Public API ────────────────────────────────────────────

  /**
   * Run both steps.
   */
  async run(): Promise<BuildReport> {
    try {
      // Step 1: Bundle
      this.enter('bundling', `Bundling ${this.options.entry}...`);
      const bundle = await this.bundler({
        entry: this.options.entry,
        outfile: this.options.outfile,
      });
      this.emit({
        type: 'phase:complete',
        phase: 'bundling',
        message: `Bundled ${bundle.inputs} files into ${bundle.outfile}`,
      });

      // Step 2: Package
      let image: ImageResult | null = null;
      if (this.options.skipImage) {
        this.emit({ type: 'phase:skip', phase: 'packaging', message: 'Image step skipped' });
      } else {
        this.enter('packaging', `Building image ${this.options.tag}...`);
        image = await this.imageBuilder({
          tag: this.options.tag,
          dockerfile: this.options.dockerfile,
          platform: this.options.platform,
          withCerts: this.options.withCerts,
          outfile: this.options.outfile,
          context: this.context,
        });
        this.emit({
          type: 'phase:complete',
          phase: 'packaging',
          message: `Built ${image.tag} (${image.platform}, ${image.target})`,
        });
      }

      const report: BuildReport = { bundle, image };
      this.phase = 'complete';
      this.emit({ type: 'complete', phase: 'complete', data: report });
      return report;
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.emit({ type: 'phase:error', phase: this.phase, error: failure });
      this.phase = 'failed';
      this.emit({ type: 'error', phase: 'failed', error: failure });
      throw error;
    }
  }

  /**
   * Subscribe to build events.
   */
  on(handler: BuildEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      const index = this.eventHandlers.indexOf(handler);
      if (index >= 0) this.eventHandlers.splice(index, 1);
    };
  }

  getPhase(): BuildPhase {
    return this.phase;
  }

  // ─── Helpers ───────────────────────────────────────────────

  private enter(phase: BuildPhase, message: string): void {
    this.phase = phase;
    this.emit({ type: 'phase:start', phase, message });
  }

  private emit(event: BuildEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch {
        // Display handlers never stop the build
      }
    }
  }
}
