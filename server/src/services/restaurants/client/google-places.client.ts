/**
 * Google Places Text Search client (legacy JSON endpoint)
 *
 * One GET per search, no retries. Provider failures surface as UpstreamError.
 * The API key travels only in the query string and is never logged.
 */

import { logger } from '../../../lib/logger/structured-logger.js';
import { ConfigurationError, UpstreamError } from '../../../lib/errors/search-errors.js';
import { FetchError, fetchWithTimeout } from '../../../utils/fetch-with-timeout.js';
import {
  TEXT_SEARCH_OK_STATUSES,
  textSearchEnvelopeSchema,
  type PlacesTextSearchClient,
  type TextSearchCallContext,
  type TextSearchQuery
} from '../types/place.types.js';

export interface GooglePlacesClientConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

const REQUEST_DENIED_HINT =
  'Check that billing is enabled, the Places API is enabled for the project, ' +
  'and the API key restrictions allow this server.';

const PROVIDER = 'google_places';

function isOkStatus(status: string): boolean {
  return TEXT_SEARCH_OK_STATUSES.some((s) => s === status);
}

/**
 * Build Text Search URL parameters (without the key)
 */
export function buildTextSearchParams(query: TextSearchQuery): URLSearchParams {
  const params = new URLSearchParams({
    query: query.textQuery,
    type: 'restaurant'
  });

  const { radiusMeters, priceLevel, region, openNowHint } = query.options;

  if (radiusMeters !== undefined) {
    params.set('radius', String(radiusMeters));
  }
  if (priceLevel !== undefined) {
    params.set('minprice', String(priceLevel));
    params.set('maxprice', String(priceLevel));
  }
  if (region) {
    params.set('region', region);
  }
  if (openNowHint) {
    params.set('opennow', 'true');
  }

  return params;
}

export class GooglePlacesClient implements PlacesTextSearchClient {
  constructor(private readonly config: GooglePlacesClientConfig) {
    if (!config.apiKey) {
      throw new ConfigurationError('GOOGLE_MAPS_API_KEY is not configured');
    }
  }

  async textSearch(query: TextSearchQuery, ctx: TextSearchCallContext = {}): Promise<unknown[]> {
    const { requestId, signal } = ctx;
    const params = buildTextSearchParams(query);

    logger.info({
      requestId,
      provider: PROVIDER,
      method: 'textsearch',
      textQuery: query.textQuery,
      options: query.options,
      event: 'google_textsearch_request'
    }, '[GOOGLE] Calling Text Search API');

    params.set('key', this.config.apiKey);
    const url = `${this.config.baseUrl}/textsearch/json?${params.toString()}`;

    const startTime = Date.now();
    let response: Response;
    try {
      response = await fetchWithTimeout(url, {
        method: 'GET',
        headers: { Accept: 'application/json' }
      }, {
        timeoutMs: this.config.timeoutMs,
        requestId,
        provider: PROVIDER,
        signal
      });
    } catch (err) {
      if (err instanceof FetchError) {
        throw new UpstreamError(
          `Request error calling Google Maps API: ${err.message}`,
          err.errorKind,
          null,
          { cause: err }
        );
      }
      throw err;
    }

    if (!response.ok) {
      const errorBody = await response.text().catch(() => '');
      logger.error({
        requestId,
        provider: PROVIDER,
        status: response.status,
        errorKind: 'HTTP_ERROR',
        durationMs: Date.now() - startTime,
        errorBody: errorBody.substring(0, 200),
        event: 'google_textsearch_http_error'
      }, '[GOOGLE] Text Search API HTTP error');

      throw new UpstreamError(
        `HTTP error calling Google Maps API: ${response.status} ${response.statusText}`.trim(),
        'HTTP_ERROR'
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new UpstreamError('Google Maps API returned a non-JSON response', 'MALFORMED_PAYLOAD', null, {
        cause: err
      });
    }

    const envelope = textSearchEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new UpstreamError(
        'Google Maps API returned an unexpected response structure',
        'MALFORMED_PAYLOAD'
      );
    }

    const { status, error_message: errorMessage } = envelope.data;

    if (!isOkStatus(status)) {
      logger.error({
        requestId,
        provider: PROVIDER,
        providerStatus: status,
        errorMessage,
        durationMs: Date.now() - startTime,
        event: 'google_textsearch_status_error'
      }, '[GOOGLE] Text Search API returned error status');

      const detail = `Google Maps API error: ${status} - ${errorMessage ?? 'Unknown Google Maps API error'}`;
      throw new UpstreamError(
        status === 'REQUEST_DENIED' ? `${detail}. ${REQUEST_DENIED_HINT}` : detail,
        'PROVIDER_STATUS',
        status
      );
    }

    const results = envelope.data.results ?? [];
    if (status === 'OK' && envelope.data.results === undefined) {
      throw new UpstreamError('Google Maps API response is missing results', 'MALFORMED_PAYLOAD', status);
    }

    const durationMs = Date.now() - startTime;
    const isSlow = durationMs > 2000;
    logger[isSlow ? 'info' : 'debug']({
      requestId,
      provider: PROVIDER,
      providerStatus: status,
      durationMs,
      placesCount: results.length,
      event: 'google_textsearch_success',
      ...(isSlow && { slow: true })
    }, '[GOOGLE] Text Search API call succeeded');

    return results;
  }
}
