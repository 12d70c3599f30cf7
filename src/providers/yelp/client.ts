/**
 * Yelp Fusion Client (enrichment provider)
 *
 * Looks up a business by name and coordinates and returns the top hit as
 * a normalized match. The top hit is accepted without any similarity
 * threshold, which can attach the wrong business to a record.
 *
 * Lookup is best-effort: every failure is logged and reported as "no match".
 *
 * @module providers/yelp/client
 */

import { z } from 'zod';
import { silentLogger, type Logger } from '../../logger.js';
import { ProviderApiError, errorFromResponse } from '../errors.js';
import { RateLimiter } from '../rate-limiter.js';
import { withTimeout } from '../timeout.js';
import type { FetchFn, LatLng, MatchResult, SecondaryProvider } from '../types.js';

// ============================================================================
// Response Schema
// ============================================================================

const YelpBusinessSchema = z.object({
  id: z.string().min(1),
  alias: z.string().optional(),
  name: z.string().optional(),
  url: z.string().optional(),
  phone: z.string().optional(),
  display_phone: z.string().optional(),
  price: z.string().optional(),
  location: z
    .object({
      address1: z.string().nullable().optional(),
    })
    .optional(),
});

const YelpSearchResponseSchema = z.object({
  businesses: z.array(YelpBusinessSchema).default([]),
});

type YelpBusiness = z.infer<typeof YelpBusinessSchema>;

// ============================================================================
// Client
// ============================================================================

export interface YelpClientOptions {
  apiKey: string;
  rateLimiter?: RateLimiter;
  fetch?: FetchFn;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  logger?: Logger;
}

const BASE_URL = 'https://api.yelp.com/v3';
const DEFAULT_TIMEOUT_MS = 10000;

/**
 * Convert a `$$`-style price string to a 1-4 tier.
 */
export function parsePriceTier(price: string | undefined): number | undefined {
  if (!price) {
    return undefined;
  }
  const tier = price.trim().length;
  return tier > 0 && /^\$+$/.test(price.trim()) ? tier : undefined;
}

/**
 * Map a Yelp business to a match record.
 */
export function mapYelpBusiness(business: YelpBusiness): MatchResult {
  return {
    kind: 'match',
    externalId: business.id,
    phone: business.display_phone || business.phone || undefined,
    website: business.url || undefined,
    priceTier: parsePriceTier(business.price),
    streetAddress: business.location?.address1 || undefined,
    reviewProfileId: business.alias,
  };
}

export class YelpClient implements SecondaryProvider {
  private readonly apiKey: string;
  private readonly rateLimiter?: RateLimiter;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private callCount = 0;

  constructor(options: YelpClientOptions) {
    if (!options.apiKey) {
      throw new Error('Yelp client requires an API key');
    }
    this.apiKey = options.apiKey;
    this.rateLimiter = options.rateLimiter;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Find the top-ranked business for a name near a location.
   *
   * @returns The match, or undefined when nothing was found or the call failed
   */
  async lookup(name: string, location: LatLng): Promise<MatchResult | undefined> {
    try {
      const business = await this.searchTopHit(name, location);
      if (!business) {
        this.logger.debug(`Yelp: no match for "${name}"`);
        return undefined;
      }
      return mapYelpBusiness(business);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Yelp lookup failed for "${name}": ${message}`);
      return undefined;
    }
  }

  getCallCount(): number {
    return this.callCount;
  }

  private async searchTopHit(name: string, location: LatLng): Promise<YelpBusiness | undefined> {
    const params = new URLSearchParams({
      term: name,
      latitude: String(location.lat),
      longitude: String(location.lng),
      limit: '1',
    });
    const url = `${BASE_URL}/businesses/search?${params.toString()}`;

    const send = async () => {
      try {
        return await withTimeout(this.timeoutMs, (signal) => this.fetchTopHit(url, signal));
      } finally {
        this.callCount++;
      }
    };
    return this.rateLimiter ? this.rateLimiter.run(send) : send();
  }

  private async fetchTopHit(url: string, signal: AbortSignal): Promise<YelpBusiness | undefined> {
    const response = await this.fetchFn(url, {
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        Accept: 'application/json',
      },
      signal,
    });

    if (response.status === 404) {
      return undefined;
    }
    if (!response.ok) {
      throw await errorFromResponse('yelp', response);
    }

    const parsed = YelpSearchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderApiError(
        'Business search returned an unexpected payload',
        'yelp',
        'transient',
        502,
        'INVALID_RESPONSE'
      );
    }
    return parsed.data.businesses[0];
  }
}
