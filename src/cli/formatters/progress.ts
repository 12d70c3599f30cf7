/**
 * Progress Formatters
 *
 * Spinner for the running category and duration formatting.
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora from 'ora';
import chalk from 'chalk';

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Force the spinner off (e.g. verbose logging) */
  enabled?: boolean;
}

/**
 * Progress spinner wrapper with consistent styling.
 *
 * Outside a TTY the spinner renders nothing and only the final
 * succeed/fail lines are printed.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('restaurant: page 1');
 * spinner.start();
 * spinner.update('restaurant: 12 saved');
 * spinner.succeed('restaurant: 20 saved');
 * ```
 */
export class ProgressSpinner {
  private spinner: ora.Ora;
  private startTime: number = 0;

  /**
   * Create a new progress spinner.
   *
   * @param text - Initial spinner text
   * @param options - Spinner options
   */
  constructor(text: string, options: SpinnerOptions = {}) {
    const isTTY = process.stdout.isTTY === true;

    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: isTTY && options.enabled !== false,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state and elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  warn(text?: string): this {
    this.spinner.warn(text);
    return this;
  }
}

/**
 * Format a duration in milliseconds for display.
 *
 * @example
 * ```typescript
 * formatDuration(500);    // '500ms'
 * formatDuration(2500);   // '2.5s'
 * formatDuration(154000); // '2m 34s'
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a spinner for a single operation.
 */
export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
