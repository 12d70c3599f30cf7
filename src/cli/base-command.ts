/**
 * Base Command
 *
 * Provides common functionality for the CLI:
 * - Global option handling (verbose, quiet, no-color)
 * - Consistent exit codes
 * - Output utilities; doubles as the pipeline Logger
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Logger } from '../logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution, including a run stopped by the target count */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid usage, arguments or configuration */
  USAGE_ERROR: 2,
  /** Fatal provider error (authentication, quota denial) */
  API_ERROR: 4,
  /** Database connection or write failure */
  STORE_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * Implements Logger so the same instance is handed to every pipeline
 * component.
 */
export class BaseCommand implements Logger {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  /**
   * Create a new BaseCommand instance.
   *
   * @param options - Global CLI options
   */
  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Logger
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message (always visible). Does not exit.
   */
  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`Error: ${message}`), ...args);
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Print an error with its stack in verbose mode.
   */
  failure(message: string, error?: unknown): void {
    this.error(message);
    if (this.options.verbose && error instanceof Error && error.stack) {
      console.error(chalk.dim(error.stack));
    }
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  /**
   * Exit with specific code.
   */
  exitWith(code: ExitCode): never {
    process.exit(code);
  }
}
