/**
 * Google Places Response Mapper
 *
 * Validates raw Nearby Search and Place Details payloads with zod and
 * converts them into the tagged `bare` and `detail` records.
 *
 * @module providers/places/mapper
 */

import { z } from 'zod';
import type { LatLng, RawDetail, RawResult, RawReview } from '../types.js';

// ============================================================================
// Response Schemas
// ============================================================================

const LocationSchema = z.object({
  lat: z.number(),
  lng: z.number(),
});

const GeometrySchema = z.object({
  location: LocationSchema.optional(),
});

const PhotoSchema = z.object({
  photo_reference: z.string(),
});

/**
 * One entry of a Nearby Search `results` array
 */
export const SearchResultSchema = z.object({
  place_id: z.string().min(1),
  name: z.string().optional(),
  vicinity: z.string().optional(),
  geometry: GeometrySchema.optional(),
  rating: z.number().optional(),
  user_ratings_total: z.number().optional(),
  price_level: z.number().optional(),
  types: z.array(z.string()).optional(),
  photos: z.array(PhotoSchema).optional(),
});

export const NearbySearchResponseSchema = z.object({
  status: z.string(),
  results: z.array(SearchResultSchema).default([]),
  next_page_token: z.string().optional(),
  error_message: z.string().optional(),
});

const ReviewSchema = z.object({
  author_name: z.string().default(''),
  rating: z.number().nullable().default(null),
  text: z.string().default(''),
  relative_time_description: z.string().default(''),
});

export const DetailsResultSchema = z.object({
  place_id: z.string().optional(),
  name: z.string().optional(),
  formatted_address: z.string().optional(),
  geometry: GeometrySchema.optional(),
  formatted_phone_number: z.string().optional(),
  website: z.string().optional(),
  types: z.array(z.string()).optional(),
  rating: z.number().optional(),
  user_ratings_total: z.number().optional(),
  price_level: z.number().optional(),
  opening_hours: z.unknown().optional(),
  editorial_summary: z.object({ overview: z.string().optional() }).optional(),
  photos: z.array(PhotoSchema).optional(),
  url: z.string().optional(),
  reviews: z.array(ReviewSchema).optional(),
});

export const PlaceDetailsResponseSchema = z.object({
  status: z.string(),
  result: DetailsResultSchema.optional(),
  error_message: z.string().optional(),
});

export type NearbySearchResponse = z.infer<typeof NearbySearchResponseSchema>;
export type PlaceDetailsResponse = z.infer<typeof PlaceDetailsResponseSchema>;
type SearchResultPayload = z.infer<typeof SearchResultSchema>;
type DetailsResultPayload = z.infer<typeof DetailsResultSchema>;

// ============================================================================
// Mapping
// ============================================================================

function toLatLng(geometry: { location?: LatLng } | undefined): LatLng | undefined {
  const location = geometry?.location;
  return location ? { lat: location.lat, lng: location.lng } : undefined;
}

/**
 * Map a Nearby Search result to a bare record.
 */
export function mapSearchResult(result: SearchResultPayload): RawResult {
  return {
    kind: 'bare',
    placeId: result.place_id,
    name: result.name,
    vicinity: result.vicinity,
    location: toLatLng(result.geometry),
    rating: result.rating,
    userRatingsTotal: result.user_ratings_total,
    priceLevel: result.price_level,
    types: result.types,
    photoReference: result.photos?.[0]?.photo_reference,
  };
}

/**
 * Map a Place Details result to a detail record.
 */
export function mapDetailsResult(result: DetailsResultPayload): RawDetail {
  const reviews: RawReview[] = (result.reviews ?? []).map((review) => ({
    authorName: review.author_name,
    rating: review.rating,
    text: review.text,
    relativeTimeDescription: review.relative_time_description,
  }));

  return {
    kind: 'detail',
    placeId: result.place_id,
    name: result.name,
    formattedAddress: result.formatted_address,
    location: toLatLng(result.geometry),
    formattedPhoneNumber: result.formatted_phone_number,
    website: result.website,
    types: result.types,
    rating: result.rating,
    userRatingsTotal: result.user_ratings_total,
    priceLevel: result.price_level,
    openingHours: result.opening_hours,
    editorialSummary: result.editorial_summary?.overview,
    photoReference: result.photos?.[0]?.photo_reference,
    url: result.url,
    reviews,
  };
}
