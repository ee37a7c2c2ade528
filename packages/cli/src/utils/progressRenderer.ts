/**
 * ProgressRenderer - Shows which resource is being reconciled.
 *
 * Consumes ProgressInfo events from the Reconciler and keeps a single
 * spinner line updated on an interactive terminal. The final report is
 * printed separately, so finish() erases the line.
 *
 * @example
 * ```typescript
 * const renderer = new ProgressRenderer();
 * await new Reconciler({ ..., onProgress: (info) => renderer.update(info) }).run(registry);
 * renderer.finish();
 * ```
 */

import type { ProgressInfo } from '@provision/core';

export interface ProgressRendererOptions {
  /** Custom write function for output (default: process.stderr.write) */
  write?: (text: string) => void;
}

const CLEAR_LINE = '\r\x1b[K';

export class ProgressRenderer {
  private readonly write: (text: string) => void;
  private readonly spinnerFrames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  private spinnerIndex = 0;
  private active = false;

  constructor(options?: ProgressRendererOptions) {
    this.write = options?.write ?? ((text: string) => {
      process.stderr.write(text);
    });
  }

  update(info: ProgressInfo): void {
    if (info.phase !== 'start') return;
    const frame = this.spinnerFrames[this.spinnerIndex % this.spinnerFrames.length];
    this.spinnerIndex++;
    this.write(`${CLEAR_LINE}${frame} [${info.index + 1}/${info.total}] ${info.resourceId}`);
    this.active = true;
  }

  finish(): void {
    if (!this.active) return;
    this.write(CLEAR_LINE);
    this.active = false;
  }
}
