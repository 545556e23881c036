/**
 * Progress Display
 *
 * Spinners for the build steps, one per phase, driven by pipeline events.
 */

import ora, { type Ora } from 'ora';
import chalk, { Chalk, type ChalkInstance, type ForegroundColorName } from 'chalk';
import type { BuildEvent, BuildPhase, BuildReport } from '../build/index.js';

// ─── Types ───────────────────────────────────────────────────

export interface ProgressDisplayOptions {
  /** Disable colors */
  noColor?: boolean;
}

// ─── Phase Icons & Colors ────────────────────────────────────

const PHASE_CONFIG: Record<BuildPhase, { icon: string; color: ForegroundColorName; label: string }> = {
  pending: { icon: '○', color: 'gray', label: 'Pending' },
  bundling: { icon: '📦', color: 'blue', label: 'Bundling' },
  packaging: { icon: '🐳', color: 'magenta', label: 'Packaging' },
  complete: { icon: '✓', color: 'green', label: 'Complete' },
  failed: { icon: '✗', color: 'red', label: 'Failed' },
};

// ─── Progress Display Class ──────────────────────────────────

export class ProgressDisplay {
  private spinner: Ora | null = null;
  private phaseStartTime = 0;
  private noColor: boolean;
  private paint: ChalkInstance;

  constructor(options: ProgressDisplayOptions = {}) {
    this.noColor = options.noColor ?? false;
    this.paint = new Chalk({ level: this.noColor ? 0 : chalk.level });
  }

  /**
   * Handle build events
   */
  handleEvent = (event: BuildEvent): void => {
    switch (event.type) {
      case 'phase:start':
        if (event.phase) this.startPhase(event.phase, event.message);
        break;
      case 'phase:complete':
        if (event.phase) this.completePhase(event.phase, event.message);
        break;
      case 'phase:skip':
        this.log(this.paint.dim(`  ↷ ${event.message ?? 'Skipped'}`));
        break;
      case 'phase:error':
        this.failPhase(event.error?.message ?? 'Unknown error');
        break;
      case 'complete':
        if (event.data) this.showComplete(event.data);
        break;
      case 'error':
        this.showError(event.error);
        break;
    }
  };

  startPhase(phase: BuildPhase, message?: string): void {
    if (this.spinner) {
      this.spinner.stop();
    }

    this.phaseStartTime = Date.now();

    const config = PHASE_CONFIG[phase];
    const text = message || `${config.label}...`;

    this.spinner = ora({
      text: `${config.icon} ${text}`,
      color: this.noColor ? undefined : 'cyan',
    }).start();
  }

  completePhase(phase: BuildPhase, message?: string): void {
    const elapsed = this.formatElapsed(Date.now() - this.phaseStartTime);
    const config = PHASE_CONFIG[phase];

    if (this.spinner) {
      const text = message || config.label;
      this.spinner.succeed(`${config.icon} ${this.paint[config.color](text)} ${this.paint.dim(`(${elapsed})`)}`);
      this.spinner = null;
    }
  }

  failPhase(errorMessage: string): void {
    if (this.spinner) {
      this.spinner.fail(this.paint[PHASE_CONFIG.failed.color](`Failed: ${errorMessage}`));
      this.spinner = null;
    }
  }

  showComplete(report: BuildReport): void {
    console.log();
    console.log(this.paint.green.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
    console.log(this.paint.green.bold('  ✓ Build Complete'));
    console.log(this.paint.green.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
    console.log();
    console.log(`  ${this.paint.dim('Bundle:')}   ${this.paint.cyan(report.bundle.outfile)} (${formatBytes(report.bundle.bytes)})`);
    console.log(`  ${this.paint.dim('Built-ins:')} ${report.bundle.builtins.join(', ') || 'none'}`);
    if (report.image) {
      console.log(`  ${this.paint.dim('Image:')}    ${this.paint.cyan(report.image.tag)} (${report.image.platform})`);
      if (report.image.target === 'bare') {
        console.log(this.paint.yellow('  ⚠ Trust bundle omitted: HTTPS requests will fail certificate verification'));
      }
    }
    console.log();
  }

  showError(error?: Error): void {
    console.log();
    console.log(this.paint.red.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
    console.log(this.paint.red.bold('  ✗ Build Failed'));
    console.log(this.paint.red.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
    if (error) {
      console.log();
      console.log(this.paint.red(`  ${error.message}`));
    }
    console.log();
  }

  /**
   * Log a message (preserving spinner)
   */
  log(message: string): void {
    if (this.spinner) {
      this.spinner.stop();
      console.log(message);
      this.spinner.start();
    } else {
      console.log(message);
    }
  }

  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  // ─── Helpers ─────────────────────────────────────────────────

  private formatElapsed(ms: number): string {
    if (ms < 1000) return `${ms}ms`;
    if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
    const minutes = Math.floor(ms / 60000);
    const seconds = Math.round((ms % 60000) / 1000);
    return `${minutes}m ${seconds}s`;
  }
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
