/**
 * Ingestion Run
 *
 * Wires configuration, providers, photo cache, scraper and store into an
 * orchestrator and runs it once.
 *
 * @module cli/run
 */

import { loadConfig, type AppConfig } from '../config/index.js';
import { ConfigError } from '../config/errors.js';
import {
  applyOverrides,
  loadRunSettings,
  type RunSettings,
  type RunSettingsOverrides,
} from '../config/settings.js';
import { FsPhotoStore, PhotoCache, type PhotoStore } from '../photos/index.js';
import { createRunContext, IngestionOrchestrator, type IngestionSummary } from '../pipeline/index.js';
import { PlacesClient, RateLimiter, YelpClient, type FetchFn } from '../providers/index.js';
import { PageScraper } from '../scraper/index.js';
import { connectPgStore, InMemoryBusinessStore, type BusinessStore } from '../store/index.js';
import type { BaseCommand } from './base-command.js';
import { createSpinner, type ProgressSpinner } from './formatters/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Raw command-line options as commander hands them over.
 */
export interface IngestCommandOptions {
  target?: string;
  radius?: string;
  categories?: string;
  settings?: string;
  dryRun?: boolean;
}

/**
 * Seams for tests; production uses the defaults.
 */
export interface RunIngestionDeps {
  env?: NodeJS.ProcessEnv;
  fetch?: FetchFn;
  photoStore?: PhotoStore;
  openStore?: (config: AppConfig, dryRun: boolean) => Promise<BusinessStore>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface IngestionRunResult {
  summary: IngestionSummary;
  settings: RunSettings;
  dryRun: boolean;
}

// ============================================================================
// Option parsing
// ============================================================================

function parsePositiveInt(value: string, flag: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) <= 0) {
    throw new ConfigError(`${flag} must be a positive integer, got "${value}"`);
  }
  return Number(trimmed);
}

/**
 * Turn command-line strings into settings overrides.
 *
 * @throws ConfigError on malformed numbers or an empty category list
 */
export function parseOverrides(options: IngestCommandOptions): RunSettingsOverrides {
  const overrides: RunSettingsOverrides = {};

  if (options.target !== undefined) {
    overrides.targetCount = parsePositiveInt(options.target, '--target');
  }
  if (options.radius !== undefined) {
    overrides.radiusMeters = parsePositiveInt(options.radius, '--radius');
  }
  if (options.categories !== undefined) {
    const categories = options.categories
      .split(',')
      .map((c) => c.trim())
      .filter((c) => c.length > 0);
    if (categories.length === 0) {
      throw new ConfigError('--categories must name at least one category');
    }
    overrides.categories = categories;
  }

  return overrides;
}

async function defaultOpenStore(config: AppConfig, dryRun: boolean): Promise<BusinessStore> {
  if (dryRun) {
    return new InMemoryBusinessStore();
  }
  const connectionString = config.storeConnectionString;
  if (!connectionString) {
    throw new ConfigError('STORE_CONNECTION_STRING is required unless --dry-run is set');
  }
  return connectPgStore(connectionString);
}

// ============================================================================
// Run
// ============================================================================

/**
 * Execute one ingestion run.
 *
 * @param options - Parsed command-line options
 * @param base - Output and logging
 * @param deps - Injected collaborators
 * @throws ConfigError, ProviderApiError (fatal) or StoreError
 */
export async function runIngestion(
  options: IngestCommandOptions,
  base: BaseCommand,
  deps: RunIngestionDeps = {}
): Promise<IngestionRunResult> {
  const dryRun = options.dryRun === true;
  const overrides = parseOverrides(options);
  const config = loadConfig(deps.env ?? process.env, { requireStore: !dryRun });

  const fileSettings = await loadRunSettings(options.settings ?? config.settingsPath);
  const settings = applyOverrides(fileSettings, overrides);

  base.debug(
    `Settings: ${settings.categories.length} categories, target ${settings.targetCount}, radius ${settings.radiusMeters}m`
  );

  const primary = new PlacesClient({
    apiKey: config.apiKeys.primary,
    rateLimiter: new RateLimiter(settings.rateLimits.primaryMs, { sleep: deps.sleep }),
    fetch: deps.fetch,
  });

  let secondary: YelpClient | undefined;
  if (config.apiKeys.secondary) {
    secondary = new YelpClient({
      apiKey: config.apiKeys.secondary,
      rateLimiter: new RateLimiter(settings.rateLimits.secondaryMs, { sleep: deps.sleep }),
      fetch: deps.fetch,
      logger: base,
    });
  } else {
    base.info('SECONDARY_API_KEY not set; enrichment lookups disabled');
  }

  const photos = new PhotoCache({
    cacheDir: config.photoCacheDir,
    photos: primary,
    store: deps.photoStore ?? new FsPhotoStore(),
    logger: base,
  });
  const scraper = new PageScraper({ fetch: deps.fetch, logger: base });

  const store = await (deps.openStore ?? defaultOpenStore)(config, dryRun);
  if (dryRun) {
    base.info('Dry run: records are kept in memory only');
  }

  const progress: { spinner?: ProgressSpinner } = {};
  const showSpinner = !base.isVerbose() && !base.isQuiet();

  const orchestrator = new IngestionOrchestrator({
    primary,
    secondary,
    photos,
    scraper,
    store,
    logger: base,
    sleep: deps.sleep,
    callbacks: showSpinner
      ? {
          onCategoryStart: (category, index, total) => {
            progress.spinner = createSpinner(`${category} (${index + 1}/${total})`, { enabled: true }).start();
          },
          onRecordPersisted: (outcome, persistedSoFar) => {
            progress.spinner?.update(`${outcome.business.category ?? 'business'}: ${persistedSoFar} saved`);
          },
          onCategoryComplete: (stats) => {
            const text = `${stats.category}: ${stats.persisted} saved`;
            if (stats.error) {
              progress.spinner?.warn(`${text} (search failed)`);
            } else {
              progress.spinner?.succeed(text);
            }
            progress.spinner = undefined;
          },
        }
      : undefined,
  });

  try {
    const summary = await orchestrator.run(createRunContext(settings, deps.now));
    return { summary, settings, dryRun };
  } catch (error) {
    progress.spinner?.fail();
    throw error;
  } finally {
    await store.close();
  }
}
