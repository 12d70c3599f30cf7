/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  createSpinner,
  formatDuration,
  type SpinnerOptions,
} from './progress.js';

// Run summary formatters
export {
  formatRunSummary,
  formatCategoryLine,
  formatErrorSummary,
  exitCodeFor,
  type RunSummaryOptions,
} from './run-summary.js';
