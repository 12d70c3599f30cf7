/**
 * Run Context
 *
 * Everything one ingestion run needs to know, built once per run and owned
 * by the orchestrator: search area, category order, target count, pacing,
 * offer table and the seen-id set.
 *
 * @module pipeline/run-context
 */

import type { RunSettings } from '../config/settings.js';
import type { LatLng } from '../providers/types.js';
import type { OfferTable } from '../store/offers.js';

export interface RunContext {
  readonly center: LatLng;
  readonly radiusMeters: number;
  /** Visited in this order */
  readonly categories: readonly string[];
  readonly targetCount: number;
  /** Wait before re-submitting a page token */
  readonly pageTokenDelayMs: number;
  readonly detailRetry: { readonly maxAttempts: number; readonly delayMs: number };
  readonly offers: OfferTable;
  /** External primary ids already handled in this run */
  readonly seen: Set<string>;
  readonly startedAt: Date;
  readonly now: () => Date;
}

/**
 * Build a fresh context from validated settings.
 *
 * @param settings - Run settings
 * @param now - Clock (default: system time)
 */
export function createRunContext(settings: RunSettings, now: () => Date = () => new Date()): RunContext {
  return {
    center: { lat: settings.center.lat, lng: settings.center.lng },
    radiusMeters: settings.radiusMeters,
    categories: [...settings.categories],
    targetCount: settings.targetCount,
    pageTokenDelayMs: settings.pageTokenDelayMs,
    detailRetry: {
      maxAttempts: settings.detailRetry.maxAttempts,
      delayMs: settings.detailRetry.delayMs,
    },
    offers: {
      fallback: settings.offers.fallback,
      byCategory: { ...settings.offers.byCategory },
    },
    seen: new Set<string>(),
    startedAt: now(),
    now,
  };
}
