/**
 * Text Query Builder
 *
 * Turns a structured SearchRequest into the one free-text query the
 * Places Text Search API understands, plus structured call options.
 *
 * Rules:
 * - "<cuisine> restaurants in <location>" or "restaurants in <location>"
 * - cuisine is trimmed and lower-cased; location is only trimmed
 * - coordinate locations ("40.71,-74.00") pass through unchanged
 * - priceLevel / radius / region travel as options, never in the text
 * - openNow is enforced by the post-filter and at most sent as a provider hint
 */

import { InvalidRequestError } from '../../../lib/errors/search-errors.js';
import {
  MAX_RADIUS_METERS,
  MIN_RADIUS_METERS,
  type SearchRequest
} from '../types/search-request.dto.js';
import type { TextSearchOptions, TextSearchQuery } from '../types/place.types.js';

const COORDINATE_PATTERN = /^[-+]?\d{1,2}(?:\.\d+)?\s*,\s*[-+]?\d{1,3}(?:\.\d+)?$/;

export interface TextQueryBuilderOptions {
  /** Forward openNow to the provider as `opennow` (post-filter still applies) */
  nativeOpenNow?: boolean;
}

export function isCoordinateLocation(location: string): boolean {
  return COORDINATE_PATTERN.test(location.trim());
}

export function clampRadius(radiusMeters: number): number {
  return Math.min(MAX_RADIUS_METERS, Math.max(MIN_RADIUS_METERS, Math.round(radiusMeters)));
}

export function buildTextSearchQuery(
  request: SearchRequest,
  builderOptions: TextQueryBuilderOptions = {}
): TextSearchQuery {
  const location = typeof request.location === 'string' ? request.location.trim() : '';
  if (!location) {
    throw new InvalidRequestError('Location cannot be empty');
  }

  const cuisine = request.cuisine?.trim().toLowerCase();
  const subject = cuisine ? `${cuisine} restaurants` : 'restaurants';

  const options: TextSearchOptions = {};

  if (request.radiusMeters !== undefined && Number.isFinite(request.radiusMeters)) {
    options.radiusMeters = clampRadius(request.radiusMeters);
  }

  if (request.priceLevel !== undefined) {
    options.priceLevel = request.priceLevel;
  }

  if (request.country) {
    options.region = request.country.toLowerCase();
  }

  if (request.openNow === true && builderOptions.nativeOpenNow === true) {
    options.openNowHint = true;
  }

  return {
    textQuery: `${subject} in ${location}`,
    options
  };
}
