/**
 * Ingestion Orchestrator
 *
 * Drives the category × page loop:
 *
 * ```
 * for each category (configured order)
 *   Fetching(pageToken?) → Processing(results) → next page? → Fetching(next) | done
 * ```
 *
 * Each new result goes through details (with retry) → photo → enrichment
 * lookup → website scrape → merge → persist, one record at a time. The run
 * stops as soon as `targetCount` businesses are persisted.
 *
 * Failure policy:
 * - detail retries exhausted: record persisted from bare search fields
 * - enrichment, scrape or photo failure: field left empty, run continues
 * - search failure after retries: category abandoned, run continues
 * - fatal provider error or store error: run aborts, earlier writes stay
 *
 * @module pipeline/orchestrator
 */

import { silentLogger, type Logger } from '../logger.js';
import { isFatalError } from '../providers/errors.js';
import { fetchDetailsWithRetry } from '../providers/places/details.js';
import { sleep as defaultSleep, withRetry } from '../providers/retry.js';
import type {
  PrimaryProvider,
  RawResult,
  SearchPage,
  SecondaryProvider,
} from '../providers/types.js';
import { merge, selectName, selectPhotoReference, type CanonicalBusiness } from '../reconcile/index.js';
import type { ScrapeResult } from '../scraper/page-scraper.js';
import { buildOffer } from '../store/offers.js';
import type { BusinessStore } from '../store/types.js';
import type { RunContext } from './run-context.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Per-category counters
 */
export interface CategoryStats {
  category: string;
  persisted: number;
  duplicates: number;
  degraded: number;
  pages: number;
  /** Set when the category was abandoned after a search failure */
  error?: string;
}

/**
 * Result of one ingestion run
 */
export interface IngestionSummary {
  /** Canonical businesses upserted */
  persisted: number;
  duplicatesSkipped: number;
  /** Records persisted from bare search fields only */
  degraded: number;
  /** Records with an enrichment match */
  enriched: number;
  /** Records with scraped website extras */
  scraped: number;
  reviewsStored: number;
  pagesFetched: number;
  /** True when the target count stopped the run */
  truncated: boolean;
  categories: CategoryStats[];
  providerCalls: { places: number; yelp: number };
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

/**
 * Outcome of processing a single search result
 */
export interface RecordOutcome {
  businessId: number;
  business: CanonicalBusiness;
  degraded: boolean;
  enriched: boolean;
  scraped: boolean;
  reviewsStored: number;
}

/**
 * Progress hooks for the CLI
 */
export interface OrchestratorCallbacks {
  onCategoryStart?: (category: string, index: number, total: number) => void;
  onCategoryComplete?: (stats: CategoryStats) => void;
  onRecordPersisted?: (outcome: RecordOutcome, persistedSoFar: number) => void;
  onRecordSkipped?: (placeId: string, reason: string) => void;
}

export interface OrchestratorDeps {
  primary: PrimaryProvider;
  /** Absent: enrichment disabled */
  secondary?: SecondaryProvider;
  photos: { fetch(photoReference: string | undefined, externalId: string): Promise<string> };
  scraper: { fetch(url: string | undefined | null): Promise<ScrapeResult | undefined> };
  store: BusinessStore;
  logger?: Logger;
  callbacks?: OrchestratorCallbacks;
  /** Attempts per search page (default: 3) */
  searchAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_SEARCH_ATTEMPTS = 3;

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * @example
 * ```typescript
 * const orchestrator = new IngestionOrchestrator({ primary, secondary, photos, scraper, store, logger });
 * const summary = await orchestrator.run(createRunContext(settings));
 * console.log(`Inserted ${summary.persisted} businesses`);
 * ```
 */
export class IngestionOrchestrator {
  private readonly primary: PrimaryProvider;
  private readonly secondary?: SecondaryProvider;
  private readonly photos: OrchestratorDeps['photos'];
  private readonly scraper: OrchestratorDeps['scraper'];
  private readonly store: BusinessStore;
  private readonly logger: Logger;
  private readonly callbacks: OrchestratorCallbacks;
  private readonly searchAttempts: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(deps: OrchestratorDeps) {
    this.primary = deps.primary;
    this.secondary = deps.secondary;
    this.photos = deps.photos;
    this.scraper = deps.scraper;
    this.store = deps.store;
    this.logger = deps.logger ?? silentLogger;
    this.callbacks = deps.callbacks ?? {};
    this.searchAttempts = deps.searchAttempts ?? DEFAULT_SEARCH_ATTEMPTS;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Run ingestion over every category until done or the target is reached.
   *
   * @throws ProviderApiError (fatal) or StoreError; writes made so far remain
   */
  async run(ctx: RunContext): Promise<IngestionSummary> {
    const startMs = Date.now();
    const summary: IngestionSummary = {
      persisted: 0,
      duplicatesSkipped: 0,
      degraded: 0,
      enriched: 0,
      scraped: 0,
      reviewsStored: 0,
      pagesFetched: 0,
      truncated: false,
      categories: [],
      providerCalls: { places: 0, yelp: 0 },
      startedAt: ctx.startedAt.toISOString(),
      completedAt: '',
      durationMs: 0,
    };

    try {
      for (let i = 0; i < ctx.categories.length; i++) {
        if (this.targetReached(ctx, summary)) {
          break;
        }

        const category = ctx.categories[i];
        this.callbacks.onCategoryStart?.(category, i, ctx.categories.length);
        this.logger.info(`Category ${i + 1}/${ctx.categories.length}: ${category}`);

        const stats = await this.ingestCategory(ctx, category, summary);
        summary.categories.push(stats);
        this.callbacks.onCategoryComplete?.(stats);
      }
    } finally {
      summary.providerCalls = {
        places: this.primary.getCallCount(),
        yelp: this.secondary?.getCallCount() ?? 0,
      };
      summary.completedAt = ctx.now().toISOString();
      summary.durationMs = Date.now() - startMs;
    }

    return summary;
  }

  /**
   * Walk every page of one category.
   */
  private async ingestCategory(
    ctx: RunContext,
    category: string,
    summary: IngestionSummary
  ): Promise<CategoryStats> {
    const stats: CategoryStats = { category, persisted: 0, duplicates: 0, degraded: 0, pages: 0 };
    let pageToken: string | undefined;

    do {
      if (this.targetReached(ctx, summary)) {
        break;
      }
      if (pageToken) {
        // Page tokens need a moment before the provider accepts them
        await this.sleep(ctx.pageTokenDelayMs);
      }

      let page: SearchPage;
      try {
        page = await this.fetchPage(ctx, category, pageToken);
      } catch (error) {
        if (isFatalError(error)) {
          throw error;
        }
        stats.error = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Search for ${category} failed, skipping rest of category: ${stats.error}`);
        break;
      }

      stats.pages++;
      summary.pagesFetched++;
      this.logger.debug(`${category}: page ${stats.pages} with ${page.results.length} result(s)`);

      for (const bare of page.results) {
        if (ctx.seen.has(bare.placeId)) {
          stats.duplicates++;
          summary.duplicatesSkipped++;
          this.callbacks.onRecordSkipped?.(bare.placeId, 'already ingested in this run');
          this.logger.debug(`Skip ${bare.placeId}: already ingested in this run`);
          continue;
        }
        ctx.seen.add(bare.placeId);

        const outcome = await this.processRecord(ctx, bare, category);

        stats.persisted++;
        summary.persisted++;
        summary.reviewsStored += outcome.reviewsStored;
        if (outcome.degraded) {
          stats.degraded++;
          summary.degraded++;
        }
        if (outcome.enriched) {
          summary.enriched++;
        }
        if (outcome.scraped) {
          summary.scraped++;
        }
        this.callbacks.onRecordPersisted?.(outcome, summary.persisted);

        if (this.targetReached(ctx, summary)) {
          summary.truncated = true;
          this.logger.info(`Target of ${ctx.targetCount} reached`);
          return stats;
        }
      }

      pageToken = page.nextPageToken;
    } while (pageToken);

    return stats;
  }

  private async fetchPage(ctx: RunContext, category: string, pageToken: string | undefined): Promise<SearchPage> {
    return withRetry(
      () =>
        this.primary.search({
          center: ctx.center,
          radiusMeters: ctx.radiusMeters,
          categoryHint: category,
          pageToken,
        }),
      {
        maxAttempts: this.searchAttempts,
        delayMs: pageToken ? ctx.pageTokenDelayMs : undefined,
        sleep: this.sleep,
        onRetry: (error, attempt) => {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.debug(`Search ${category}: attempt ${attempt} failed (${message}), retrying`);
        },
      }
    );
  }

  /**
   * Fully process and persist one search result.
   */
  async processRecord(ctx: RunContext, bare: RawResult, category: string): Promise<RecordOutcome> {
    const { detail, complete } = await fetchDetailsWithRetry(this.primary, bare.placeId, {
      maxAttempts: ctx.detailRetry.maxAttempts,
      delayMs: ctx.detailRetry.delayMs,
      sleep: this.sleep,
      logger: this.logger,
    });

    const photoPath = await this.photos.fetch(selectPhotoReference(detail, bare), bare.placeId);

    const name = selectName(bare, detail);
    const location = detail.location ?? bare.location;
    const match =
      this.secondary && name && location ? await this.secondary.lookup(name, location) : undefined;

    const extras = await this.scraper.fetch(detail.website);

    const business = merge({ bare, detail, match, extras, photoPath, categoryHint: category });

    const businessId = await this.store.upsertBusiness(business);
    const reviewsStored = await this.store.appendReviews(businessId, detail.reviews);
    await this.store.appendOffer(businessId, buildOffer(business.category, ctx.offers, ctx.now()));
    if (extras) {
      await this.store.upsertExtras(businessId, {
        description: extras.description ?? null,
        menuLinks: extras.menuLinks,
      });
    }

    this.logger.debug(
      `Saved ${business.name ?? bare.placeId} (#${businessId})${complete ? '' : ' [search fields only]'}`
    );

    return {
      businessId,
      business,
      degraded: !complete,
      enriched: match !== undefined,
      scraped: extras !== undefined,
      reviewsStored,
    };
  }

  private targetReached(ctx: RunContext, summary: IngestionSummary): boolean {
    return summary.persisted >= ctx.targetCount;
  }
}
