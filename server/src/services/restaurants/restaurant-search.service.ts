/**
 * Restaurant Search Service
 *
 * builder -> provider call -> normalizer -> post-filter
 *
 * Request-scoped and stateless: nothing is cached, every search hits the provider.
 */

import type { SearchQueryEcho, SearchResponse } from '@api';
import { logger } from '../../lib/logger/structured-logger.js';
import { ConfigurationError } from '../../lib/errors/search-errors.js';
import { buildTextSearchQuery, isCoordinateLocation } from './query/text-query.builder.js';
import { normalizePlaces } from './normalize/result-mapper.js';
import { applyPostFilters } from './post-filters/post-results.filter.js';
import type { PlacesTextSearchClient, TextSearchQuery } from './types/place.types.js';
import type { SearchRequest } from './types/search-request.dto.js';

export interface SearchContext {
  requestId?: string;
  /** Aborted when the client goes away */
  signal?: AbortSignal;
}

export interface RestaurantSearchServiceOptions {
  nativeOpenNow?: boolean;
}

/**
 * Echo of the effective parameters, in HTTP surface names.
 * radius reports the clamped value actually sent to the provider.
 */
export function buildQueryEcho(request: SearchRequest, query: TextSearchQuery): SearchQueryEcho {
  const echo: SearchQueryEcho = { location: request.location.trim() };
  const cuisine = request.cuisine?.trim();
  if (cuisine) echo.cuisine = cuisine;
  if (request.minRating !== undefined) echo.min_rating = request.minRating;
  if (request.minReviews !== undefined) echo.min_reviews = request.minReviews;
  if (request.priceLevel !== undefined) echo.price_level = request.priceLevel;
  if (request.openNow !== undefined) echo.open_now = request.openNow;
  if (query.options.radiusMeters !== undefined) echo.radius = query.options.radiusMeters;
  if (query.options.region !== undefined) echo.country = query.options.region;
  return echo;
}

export class RestaurantSearchService {
  constructor(
    private readonly client: PlacesTextSearchClient | null,
    private readonly options: RestaurantSearchServiceOptions = {}
  ) {}

  get isConfigured(): boolean {
    return this.client !== null;
  }

  async search(request: SearchRequest, ctx: SearchContext = {}): Promise<SearchResponse> {
    const { requestId, signal } = ctx;
    const startTime = Date.now();

    // Validation first: an invalid request never reaches the provider
    const query = buildTextSearchQuery(request, { nativeOpenNow: this.options.nativeOpenNow });

    if (!this.client) {
      throw new ConfigurationError(
        'Google Maps API is not configured. Please set GOOGLE_MAPS_API_KEY environment variable.'
      );
    }

    const rawPlaces = await this.client.textSearch(query, { requestId, signal });

    const normalized = normalizePlaces(rawPlaces, requestId);
    const filtered = applyPostFilters(normalized.results, {
      minRating: request.minRating,
      minReviews: request.minReviews,
      priceLevel: request.priceLevel,
      openNow: request.openNow
    });

    const restaurants = filtered.resultsFiltered;

    logger.info({
      requestId,
      event: 'restaurant_search_completed',
      locationKind: isCoordinateLocation(request.location) ? 'coordinates' : 'text',
      textQuery: query.textQuery,
      providerCount: rawPlaces.length,
      droppedMalformed: normalized.dropped,
      postFilter: filtered.stats,
      resultCount: restaurants.length,
      durationMs: Date.now() - startTime
    }, '[SEARCH] Restaurant search completed');

    return {
      restaurants,
      total_results: restaurants.length,
      query: buildQueryEcho(request, query)
    };
  }
}
