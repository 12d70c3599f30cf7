/**
 * Website scraper
 *
 * @module scraper
 */

export {
  PageScraper,
  extractPageExtras,
  isScrapableUrl,
  MAX_MENU_LINKS,
  type ScrapeResult,
  type PageScraperOptions,
} from './page-scraper.js';
