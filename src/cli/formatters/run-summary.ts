/**
 * Run Summary Formatters
 *
 * Terminal output for a finished ingestion run and for fatal errors.
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import { ConfigError } from '../../config/errors.js';
import type { CategoryStats, IngestionSummary } from '../../pipeline/orchestrator.js';
import { isProviderApiError } from '../../providers/errors.js';
import { StoreError } from '../../store/types.js';
import { EXIT_CODES, type ExitCode } from '../base-command.js';
import { formatDuration } from './progress.js';

export interface RunSummaryOptions {
  /** Writes went to the in-memory store */
  dryRun?: boolean;
}

/**
 * One line per category.
 */
export function formatCategoryLine(stats: CategoryStats, nameWidth = 14): string {
  const icon = stats.error ? chalk.red('✘') : chalk.green('✔');
  const name = stats.category.padEnd(nameWidth);
  const parts = [`${stats.persisted} saved`];
  if (stats.duplicates > 0) {
    parts.push(`${stats.duplicates} duplicate(s)`);
  }
  if (stats.degraded > 0) {
    parts.push(`${stats.degraded} search-only`);
  }
  parts.push(`${stats.pages} page(s)`);

  const line = `  ${icon} ${name} ${parts.join(', ')}`;
  return stats.error ? `${line} ${chalk.red(`(search failed: ${stats.error})`)}` : line;
}

/**
 * Format a complete run summary.
 *
 * @example
 * ```
 * === Ingestion Complete ===
 * Mode:     database
 * Duration: 2m 34s
 * Stopped:  target of 200 reached
 *
 * Categories:
 *   ✔ restaurant     60 saved, 3 page(s)
 *   ✔ cafe           41 saved, 4 duplicate(s), 3 page(s)
 *
 * Records:
 *   Enriched:            88
 *   Website extras:      35
 *   Reviews stored:      470
 *   Duplicates skipped:  4
 *   Search-only:         2
 *
 * API calls: Places 310 | Yelp 200
 *
 * Inserted 200 businesses successfully.
 * ```
 */
export function formatRunSummary(summary: IngestionSummary, options: RunSummaryOptions = {}): string {
  const lines: string[] = [];

  lines.push(chalk.bold('=== Ingestion Complete ==='));
  lines.push(`Mode:     ${options.dryRun ? chalk.yellow('dry run (nothing written)') : 'database'}`);
  lines.push(`Duration: ${formatDuration(summary.durationMs)}`);
  lines.push(
    `Stopped:  ${summary.truncated ? `target of ${summary.persisted} reached` : 'all categories processed'}`
  );
  lines.push('');

  if (summary.categories.length > 0) {
    const width = Math.max(14, ...summary.categories.map((c) => c.category.length));
    lines.push('Categories:');
    for (const stats of summary.categories) {
      lines.push(formatCategoryLine(stats, width));
    }
    lines.push('');
  }

  lines.push('Records:');
  lines.push(`  Enriched:            ${summary.enriched}`);
  lines.push(`  Website extras:      ${summary.scraped}`);
  lines.push(`  Reviews stored:      ${summary.reviewsStored}`);
  lines.push(`  Duplicates skipped:  ${summary.duplicatesSkipped}`);
  if (summary.degraded > 0) {
    lines.push(chalk.yellow(`  Search-only:         ${summary.degraded}`));
  } else {
    lines.push(`  Search-only:         ${summary.degraded}`);
  }
  lines.push('');

  lines.push(`API calls: Places ${summary.providerCalls.places} | Yelp ${summary.providerCalls.yelp}`);
  lines.push('');
  lines.push(chalk.green(`Inserted ${summary.persisted} businesses successfully.`));

  return lines.join('\n');
}

/**
 * Map a fatal error to the process exit code.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (isProviderApiError(error)) {
    return EXIT_CODES.API_ERROR;
  }
  if (error instanceof StoreError) {
    return EXIT_CODES.STORE_ERROR;
  }
  return EXIT_CODES.ERROR;
}

/**
 * One-line description of a fatal error.
 */
export function formatErrorSummary(error: unknown): string {
  if (error instanceof ConfigError) {
    return `Configuration error: ${error.message}`;
  }
  if (isProviderApiError(error)) {
    return `Provider ${error.provider} failed (${error.status}): ${error.message}`;
  }
  if (error instanceof StoreError) {
    return `Database error: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
