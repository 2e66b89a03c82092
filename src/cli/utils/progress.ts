// Single-line progress indicator for multi-resource runs

import type { CheckOutcome } from '../../services/runner/drift-runner.js';

/**
 * Where progress is written; process.stderr satisfies this
 */
export interface ProgressStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface ProgressOptions {
  stream?: ProgressStream;
  /** When false nothing is written */
  enabled?: boolean;
}

/**
 * Rewrites one status line as outcomes arrive. Writes nothing unless
 * the stream is a terminal, so redirected output stays clean.
 */
export class ProgressReporter {
  private stream: ProgressStream;
  private active: boolean;
  private total = 0;
  private done = 0;
  private failed = 0;
  private cancelled = 0;

  constructor(options: ProgressOptions = {}) {
    this.stream = options.stream ?? process.stderr;
    this.active = (options.enabled ?? true) && this.stream.isTTY === true;
  }

  isActive(): boolean {
    return this.active;
  }

  start(total: number): void {
    this.total = total;
    this.done = 0;
    this.failed = 0;
    this.cancelled = 0;
    this.render(`Checking ${total} resource(s)...`);
  }

  update(outcome: CheckOutcome): void {
    this.done++;
    if (outcome.status === 'failed') this.failed++;
    if (outcome.status === 'cancelled') this.cancelled++;
    this.render(`[${this.done}/${this.total}] ${outcome.resourceId} ${outcome.status}${this.tally()}`);
  }

  /**
   * Clear the status line
   */
  finish(): void {
    if (this.active) {
      this.stream.write('\r\x1b[2K');
    }
  }

  private tally(): string {
    const parts: string[] = [];
    if (this.failed > 0) parts.push(`${this.failed} failed`);
    if (this.cancelled > 0) parts.push(`${this.cancelled} cancelled`);
    return parts.length > 0 ? ` (${parts.join(', ')})` : '';
  }

  private render(line: string): void {
    if (this.active) {
      this.stream.write(`\r\x1b[2K${line}`);
    }
  }
}
