/**
 * Google Places Text Search (legacy JSON API) response shapes
 *
 * A place is an open record: fields come and go per place and per API revision,
 * so it is kept as `Record<string, unknown>` and read through typed accessors
 * in the result mapper.
 */

import { z } from 'zod';

export type RawPlace = Record<string, unknown>;

export const TEXT_SEARCH_OK_STATUSES = ['OK', 'ZERO_RESULTS'] as const;

export const textSearchEnvelopeSchema = z
  .object({
    status: z.string(),
    // Entries are checked one by one in the result mapper
    results: z.array(z.unknown()).optional(),
    error_message: z.string().optional(),
    next_page_token: z.string().optional()
  })
  .passthrough();

export type TextSearchEnvelope = z.infer<typeof textSearchEnvelopeSchema>;

/** Structured provider options (never encoded into the text query) */
export interface TextSearchOptions {
  radiusMeters?: number;
  priceLevel?: number;
  region?: string;
  openNowHint?: boolean;
}

export interface TextSearchQuery {
  textQuery: string;
  options: TextSearchOptions;
}

export interface TextSearchCallContext {
  requestId?: string;
  signal?: AbortSignal;
}

/**
 * The single outbound dependency of the search pipeline.
 * Implemented by GooglePlacesClient; tests supply in-process fakes.
 * Entries are unvalidated provider records.
 */
export interface PlacesTextSearchClient {
  textSearch(query: TextSearchQuery, ctx?: TextSearchCallContext): Promise<unknown[]>;
}
