/**
 * CLI Tests
 *
 * Tests cover:
 * - Program creation and options
 * - BaseCommand output levels
 * - Formatter utilities
 * - Option parsing, exit codes and a dry run end to end
 *
 * @module cli/cli.test
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import chalk from 'chalk';
import { createProgram } from './index.js';
import { BaseCommand, EXIT_CODES } from './base-command.js';
import { VERSION, getVersionInfo } from './version.js';
import { formatDuration } from './formatters/progress.js';
import { exitCodeFor, formatErrorSummary, formatRunSummary } from './formatters/run-summary.js';
import { parseOverrides, runIngestion } from './run.js';
import { ConfigError } from '../config/errors.js';
import type { IngestionSummary } from '../pipeline/orchestrator.js';
import type { PhotoStore } from '../photos/store.js';
import { ProviderApiError } from '../providers/errors.js';
import { InMemoryBusinessStore } from '../store/memory-store.js';
import { StoreError } from '../store/types.js';

// ============================================================================
// Program Tests
// ============================================================================

describe('CLI Program', () => {
  it('should create a program with correct name and version', () => {
    const program = createProgram();

    expect(program.name()).toBe('poi-ingest');
    expect(program.version()).toBe(VERSION);
    expect(getVersionInfo()).toBe(`poi-ingest v${VERSION}`);
  });

  it('should have run and global options configured', () => {
    const optionNames = createProgram().options.map((o) => o.long);

    expect(optionNames).toEqual([
      '--version',
      '--target',
      '--radius',
      '--categories',
      '--settings',
      '--dry-run',
      '--verbose',
      '--quiet',
      '--no-color',
    ]);
  });

  it('should have no subcommands', () => {
    expect(createProgram().commands).toHaveLength(0);
  });
});

// ============================================================================
// BaseCommand Tests
// ============================================================================

describe('BaseCommand', () => {
  let log: jest.SpiedFunction<typeof console.log>;
  let warn: jest.SpiedFunction<typeof console.warn>;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should print debug only in verbose mode', () => {
    new BaseCommand({ color: false }).debug('hidden');
    expect(log).not.toHaveBeenCalled();

    new BaseCommand({ verbose: true, color: false }).debug('shown');
    expect(log).toHaveBeenCalledWith('[DEBUG] shown');
  });

  it('should suppress info in quiet mode but keep warnings', () => {
    const base = new BaseCommand({ quiet: true, color: false });

    base.info('progress');
    base.warn('careful');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('Warning: careful');
    expect(base.isQuiet()).toBe(true);
  });
});

// ============================================================================
// Formatter Tests
// ============================================================================

describe('formatDuration', () => {
  it('should format milliseconds, seconds and minutes', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(2500)).toBe('2.5s');
    expect(formatDuration(154000)).toBe('2m 34s');
  });
});

describe('formatRunSummary', () => {
  const summary: IngestionSummary = {
    persisted: 3,
    duplicatesSkipped: 1,
    degraded: 0,
    enriched: 2,
    scraped: 1,
    reviewsStored: 7,
    pagesFetched: 2,
    truncated: true,
    categories: [
      { category: 'cafe', persisted: 2, duplicates: 0, degraded: 0, pages: 1 },
      { category: 'bakery', persisted: 1, duplicates: 1, degraded: 0, pages: 1 },
    ],
    providerCalls: { places: 9, yelp: 3 },
    startedAt: '2026-03-10T12:00:00.000Z',
    completedAt: '2026-03-10T12:00:02.500Z',
    durationMs: 2500,
  };

  beforeEach(() => {
    chalk.level = 0;
  });

  it('should list categories and totals', () => {
    const lines = formatRunSummary(summary).split('\n');

    expect(lines.slice(0, 4)).toEqual([
      '=== Ingestion Complete ===',
      'Mode:     database',
      'Duration: 2.5s',
      'Stopped:  target of 3 reached',
    ]);
    expect(lines).toContain(`  ✔ ${'cafe'.padEnd(14)} 2 saved, 1 page(s)`);
    expect(lines).toContain(`  ✔ ${'bakery'.padEnd(14)} 1 saved, 1 duplicate(s), 1 page(s)`);
    expect(lines).toContain('  Reviews stored:      7');
    expect(lines).toContain('API calls: Places 9 | Yelp 3');
  });

  it('should end with the persisted count', () => {
    const lines = formatRunSummary(summary, { dryRun: true }).split('\n');

    expect(lines[1]).toBe('Mode:     dry run (nothing written)');
    expect(lines[lines.length - 1]).toBe('Inserted 3 businesses successfully.');
  });

  it('should flag abandoned categories', () => {
    const text = formatRunSummary({
      ...summary,
      truncated: false,
      categories: [{ category: 'spa', persisted: 0, duplicates: 0, degraded: 0, pages: 0, error: 'busy' }],
    });

    expect(text).toContain(`  ✘ ${'spa'.padEnd(14)} 0 saved, 0 page(s) (search failed: busy)`);
    expect(text).toContain('Stopped:  all categories processed');
  });
});

describe('exit codes and error summaries', () => {
  it('should map error types to exit codes', () => {
    expect(exitCodeFor(new ConfigError('bad'))).toBe(EXIT_CODES.USAGE_ERROR);
    expect(exitCodeFor(new ProviderApiError('denied', 'places', 'fatal', 403, 'REQUEST_DENIED'))).toBe(
      EXIT_CODES.API_ERROR
    );
    expect(exitCodeFor(new StoreError('down'))).toBe(EXIT_CODES.STORE_ERROR);
    expect(exitCodeFor(new Error('other'))).toBe(EXIT_CODES.ERROR);
  });

  it('should describe each error type', () => {
    expect(formatErrorSummary(new ConfigError('bad'))).toBe('Configuration error: bad');
    expect(
      formatErrorSummary(new ProviderApiError('denied', 'places', 'fatal', 403, 'REQUEST_DENIED'))
    ).toBe('Provider places failed (REQUEST_DENIED): denied');
    expect(formatErrorSummary(new StoreError('down'))).toBe('Database error: down');
    expect(formatErrorSummary('plain')).toBe('plain');
  });
});

// ============================================================================
// Run Tests
// ============================================================================

describe('parseOverrides', () => {
  it('should parse numbers and category lists', () => {
    expect(parseOverrides({ target: '25', radius: '1500', categories: 'cafe, bakery,,gym' })).toEqual({
      targetCount: 25,
      radiusMeters: 1500,
      categories: ['cafe', 'bakery', 'gym'],
    });
  });

  it('should leave unset options out', () => {
    expect(parseOverrides({})).toEqual({});
  });

  it('should reject malformed values', () => {
    expect(() => parseOverrides({ target: 'abc' })).toThrow('--target must be a positive integer, got "abc"');
    expect(() => parseOverrides({ radius: '0' })).toThrow(ConfigError);
    expect(() => parseOverrides({ categories: ' , ' })).toThrow('--categories must name at least one category');
  });
});

describe('runIngestion', () => {
  const photoStore: PhotoStore = {
    exists: async () => false,
    write: async () => undefined,
  };
  const sleep = async (): Promise<void> => undefined;

  function jsonResponse(body: unknown): Response {
    return new Response(JSON.stringify(body), {
      status: 200,
      headers: { 'content-type': 'application/json' },
    });
  }

  function placesFetch(): jest.Mock<typeof fetch> {
    return jest.fn<typeof fetch>().mockImplementation(async (input) => {
      const url = String(input);
      if (url.includes('/nearbysearch/')) {
        return jsonResponse({
          status: 'OK',
          results: [
            { place_id: 'p1', name: 'Cafe One', vicinity: '1 Main St', types: ['cafe'] },
            { place_id: 'p2', name: 'Cafe Two', vicinity: '2 Main St', types: ['cafe'] },
          ],
        });
      }
      if (url.includes('/details/')) {
        return jsonResponse({ status: 'OK', result: { formatted_address: '1 Main St, Kirkland, WA' } });
      }
      return new Response('', { status: 404 });
    });
  }

  it('should run a dry run against the in-memory store', async () => {
    const store = new InMemoryBusinessStore();
    const fetchMock = placesFetch();

    const result = await runIngestion(
      { target: '1', categories: 'cafe', dryRun: true },
      new BaseCommand({ quiet: true, color: false }),
      {
        env: { PRIMARY_API_KEY: 'test-key' },
        fetch: fetchMock,
        photoStore,
        openStore: async (_config, dryRun) => {
          expect(dryRun).toBe(true);
          return store;
        },
        sleep,
      }
    );

    expect(result.dryRun).toBe(true);
    expect(result.settings.targetCount).toBe(1);
    expect(result.summary.persisted).toBe(1);
    expect(result.summary.truncated).toBe(true);
    expect(store.listBusinesses().map((b) => b.externalPrimaryId)).toEqual(['p1']);
    expect(store.isClosed()).toBe(true);
    expect(result.summary.providerCalls).toEqual({ places: 2, yelp: 0 });
  });

  it('should require a database unless dry running', async () => {
    const openStore = jest.fn(async () => new InMemoryBusinessStore());

    await expect(
      runIngestion({}, new BaseCommand({ quiet: true, color: false }), {
        env: { PRIMARY_API_KEY: 'test-key' },
        openStore,
      })
    ).rejects.toThrow('Invalid environment: STORE_CONNECTION_STRING is required');
    expect(openStore).not.toHaveBeenCalled();
  });

  it('should close the store when the run fails', async () => {
    const store = new InMemoryBusinessStore();
    const fetchMock = jest.fn<typeof fetch>().mockImplementation(async () => new Response('denied', { status: 403 }));

    await expect(
      runIngestion({ categories: 'cafe', dryRun: true }, new BaseCommand({ quiet: true, color: false }), {
        env: { PRIMARY_API_KEY: 'test-key' },
        fetch: fetchMock,
        photoStore,
        openStore: async () => store,
        sleep,
      })
    ).rejects.toMatchObject({ kind: 'fatal', provider: 'places' });
    expect(store.isClosed()).toBe(true);
  });
});
