#!/usr/bin/env node
/**
 * POI Ingestion CLI
 *
 * Main entry point for the ingestion tool.
 * Uses commander for option parsing; there are no subcommands.
 *
 * Usage:
 *   poi-ingest --help
 *   poi-ingest --target 50 --categories cafe,bakery
 *   poi-ingest --dry-run -v
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION, getVersionInfo } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { exitCodeFor, formatErrorSummary, formatRunSummary } from './formatters/index.js';
import { runIngestion, type IngestCommandOptions, type IngestionRunResult } from './run.js';

type ProgramOptions = GlobalOptions & IngestCommandOptions;

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the CLI program.
 *
 * @returns Configured commander Program instance
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('poi-ingest')
    .description('Collect businesses around a point, reconcile two providers and persist them')
    .version(VERSION, '-V, --version', 'Display version number');

  program
    .option('--target <n>', 'Stop after this many businesses are persisted')
    .option('--radius <meters>', 'Search radius around the configured center')
    .option('--categories <list>', 'Comma-separated category list, in visiting order')
    .option('--settings <path>', 'Run settings JSON file')
    .option('--dry-run', 'Keep records in memory instead of writing to the database')
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output');

  program.action(async (options: ProgramOptions) => {
    const base: BaseCommand = new BaseCommand(options);

    if (options.verbose && options.quiet) {
      base.error('Cannot use both --verbose and --quiet flags');
      base.exitWith(EXIT_CODES.USAGE_ERROR);
    }
    base.debug(getVersionInfo());

    let result: IngestionRunResult;
    try {
      result = await runIngestion(options, base);
    } catch (error) {
      base.failure(formatErrorSummary(error), error);
      base.exitWith(exitCodeFor(error));
    }

    if (!base.isQuiet()) {
      console.log('');
      console.log(formatRunSummary(result.summary, { dryRun: result.dryRun }));
    }
    base.exitWith(EXIT_CODES.SUCCESS);
  });

  return program;
}

/**
 * Main CLI entry point.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.ERROR);
  });
}
