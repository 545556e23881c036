/**
 * Build Types
 *
 * Shapes shared by the bundle step, the image step and the pipeline that
 * runs them in order.
 */

// ─── Steps ───────────────────────────────────────────────────

export type BuildStep = 'options' | 'bundle' | 'image';

export type BuildPhase = 'pending' | 'bundling' | 'packaging' | 'complete' | 'failed';

export class BuildError extends Error {
  readonly step: BuildStep;

  constructor(step: BuildStep, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'BuildError';
    this.step = step;
  }
}

// ─── Results ─────────────────────────────────────────────────

export interface BundleResult {
  /** Path of the single output file */
  outfile: string;
  /** Size of the output file in bytes */
  bytes: number;
  /** Number of source files folded into the bundle */
  inputs: number;
  /** Built-in modules the bundle still imports at run time */
  builtins: string[];
}

export interface ImageResult {
  tag: string;
  platform: string;
  /** Stage built: `image` carries the trust bundle, `bare` does not */
  target: ImageTarget;
}

export type ImageTarget = 'image' | 'bare';

export interface BuildReport {
  bundle: BundleResult;
  /** Null when the image step was skipped */
  image: ImageResult | null;
}

// ─── Events ──────────────────────────────────────────────────

export type BuildEventType =
  | 'phase:start'
  | 'phase:complete'
  | 'phase:skip'
  | 'phase:error'
  | 'complete'
  | 'error';

export interface BuildEvent {
  type: BuildEventType;
  phase?: BuildPhase;
  message?: string;
  error?: Error;
  data?: BuildReport;
}

export type BuildEventHandler = (event: BuildEvent) => void;
