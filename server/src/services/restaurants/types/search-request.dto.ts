/**
 * Search Request DTO and Zod schema
 * Input of GET /restaurants/search (query string, snake_case)
 */

import { z } from 'zod';

// ============================================================================
// Domain type
// ============================================================================

export const MAX_RADIUS_METERS = 50_000;
export const MIN_RADIUS_METERS = 1;

export interface SearchRequest {
  /** Free text ("New York, NY") or a "lat,lng" pair */
  location: string;
  cuisine?: string;
  /** 0-5 */
  minRating?: number;
  minReviews?: number;
  /** 0 (free) - 4 (very expensive) */
  priceLevel?: number;
  openNow?: boolean;
  radiusMeters?: number;
  /** ISO 3166-1 alpha-2, lower-cased */
  country?: string;
}

// ============================================================================
// Zod Schemas
// ============================================================================

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const parseBooleanParam = (value: unknown): unknown => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (normalized === '') return undefined;
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
};

export const searchQuerySchema = z.object({
  location: z
    .string({ required_error: 'Location is required' })
    .trim()
    .min(1, 'Location cannot be empty'),
  cuisine: z.preprocess(blankToUndefined, z.string().trim().optional()),
  min_rating: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(5).optional()),
  min_reviews: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).optional()),
  price_level: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(4).optional()),
  open_now: z.preprocess(parseBooleanParam, z.boolean().optional()),
  // Upper bound is not enforced here: the query builder clamps to MAX_RADIUS_METERS
  radius: z.preprocess(blankToUndefined, z.coerce.number().int().min(MIN_RADIUS_METERS).optional()),
  country: z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(/^[A-Za-z]{2}$/, 'Country must be an ISO 3166-1 alpha-2 code')
      .transform((c) => c.toLowerCase())
      .optional()
  )
});

export type SearchQueryParams = z.infer<typeof searchQuerySchema>;

// ============================================================================
// Helper Functions
// ============================================================================

export function toSearchRequest(params: SearchQueryParams): SearchRequest {
  const request: SearchRequest = { location: params.location };
  if (params.cuisine !== undefined) request.cuisine = params.cuisine;
  if (params.min_rating !== undefined) request.minRating = params.min_rating;
  if (params.min_reviews !== undefined) request.minReviews = params.min_reviews;
  if (params.price_level !== undefined) request.priceLevel = params.price_level;
  if (params.open_now !== undefined) request.openNow = params.open_now;
  if (params.radius !== undefined) request.radiusMeters = params.radius;
  if (params.country !== undefined) request.country = params.country;
  return request;
}

export type SearchQueryParseResult =
  | { success: true; data: SearchRequest }
  | { success: false; error: string };

/**
 * Safely validates raw query parameters
 */
export function safeParseSearchQuery(data: unknown): SearchQueryParseResult {
  const result = searchQuerySchema.safeParse(data);

  if (result.success) {
    return { success: true, data: toSearchRequest(result.data) };
  }

  return {
    success: false,
    error: result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')
  };
}
