/**
 * Page Scraper
 *
 * Best-effort fetch of a business's own website to pick up the meta
 * description and a few menu links. Any failure yields `undefined`.
 *
 * @module scraper/page-scraper
 */

import * as cheerio from 'cheerio';
import { silentLogger, type Logger } from '../logger.js';
import { withTimeout } from '../providers/timeout.js';
import type { FetchFn } from '../providers/types.js';
import { UNKNOWN_MARKER } from '../reconcile/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * What a scrape extracts from a page
 */
export interface ScrapeResult {
  description?: string;
  /** Up to MAX_MENU_LINKS hrefs, document order */
  menuLinks: string[];
}

export interface PageScraperOptions {
  fetch?: FetchFn;
  /** Request timeout in milliseconds (default: 6000) */
  timeoutMs?: number;
  logger?: Logger;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_TIMEOUT_MS = 6000;

export const MAX_MENU_LINKS = 3;

const USER_AGENT = 'Mozilla/5.0 (compatible; poi-reconciler/1.0)';

// ============================================================================
// Extraction
// ============================================================================

/**
 * Extract description and menu links from an HTML document.
 */
export function extractPageExtras(html: string): ScrapeResult {
  const $ = cheerio.load(html);

  const description = $('meta[name="description"]').first().attr('content')?.trim();

  const menuLinks: string[] = [];
  $('a[href]').each((_, element) => {
    if (menuLinks.length >= MAX_MENU_LINKS) {
      return false;
    }
    const href = $(element).attr('href');
    if (href && href.toLowerCase().includes('menu')) {
      menuLinks.push(href);
    }
    return undefined;
  });

  return {
    description: description ? description : undefined,
    menuLinks,
  };
}

/**
 * True for URLs worth fetching: http(s) and not the unknown marker.
 */
export function isScrapableUrl(url: string | undefined | null): url is string {
  if (!url || url === UNKNOWN_MARKER) {
    return false;
  }
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

// ============================================================================
// Scraper
// ============================================================================

export class PageScraper {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: PageScraperOptions = {}) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Scrape a business website.
   *
   * @param url - Website URL, possibly missing or the unknown marker
   * @returns Extracted extras, or undefined when nothing could be fetched
   */
  async fetch(url: string | undefined | null): Promise<ScrapeResult | undefined> {
    if (!isScrapableUrl(url)) {
      return undefined;
    }

    try {
      return await withTimeout(this.timeoutMs, async (signal) => {
        const response = await this.fetchFn(url, {
          headers: { 'User-Agent': USER_AGENT },
          signal,
        });
        if (!response.ok) {
          this.logger.debug(`Scrape ${url}: HTTP ${response.status}`);
          return undefined;
        }
        return extractPageExtras(await response.text());
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Scrape ${url}: ${message}`);
      return undefined;
    }
  }
}
