/**
 * Yelp provider (secondary, best-effort enrichment)
 *
 * @module providers/yelp
 */

export { YelpClient, mapYelpBusiness, parsePriceTier, type YelpClientOptions } from './client.js';
