/**
 * Google Places Result Mapper
 * Maps a raw Text Search place into the RestaurantResult wire shape.
 *
 * - Unknown is null: a missing rating stays null, never 0
 * - Scalars are type-checked; anything of the wrong type becomes null
 * - Rich sub-objects (hours, payment, parking, reviews...) pass through as-is
 * - place_id is the only required field
 */

import type { Location, OpaqueObject, RestaurantResult } from '@api';
import { logger } from '../../../lib/logger/structured-logger.js';
import { MalformedUpstreamRecordError } from '../../../lib/errors/search-errors.js';
import type { RawPlace } from '../types/place.types.js';

// ============================================================================
// Typed accessors
// ============================================================================

function isObject(value: unknown): value is OpaqueObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(place: RawPlace, key: string): string | null {
  const value = place[key];
  return typeof value === 'string' ? value : null;
}

function readNumber(place: RawPlace, key: string): number | null {
  const value = place[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function readBoolean(place: RawPlace, key: string): boolean | null {
  const value = place[key];
  return typeof value === 'boolean' ? value : null;
}

function readObject(place: RawPlace, key: string): OpaqueObject | null {
  const value = place[key];
  return isObject(value) ? value : null;
}

function readObjectArray(place: RawPlace, key: string): OpaqueObject[] | null {
  const value = place[key];
  if (!Array.isArray(value)) return null;
  return value.filter(isObject);
}

function readStringArray(place: RawPlace, key: string): string[] {
  const value = place[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Summaries arrive either as plain text or as { overview } / { text } objects
 */
function readSummary(place: RawPlace, key: string): string | null {
  const value = place[key];
  if (typeof value === 'string') return value;
  if (isObject(value)) {
    if (typeof value.overview === 'string') return value.overview;
    if (typeof value.text === 'string') return value.text;
  }
  return null;
}

function readGeometry(place: RawPlace): OpaqueObject | null {
  return readObject(place, 'geometry');
}

/**
 * Both coordinates or nothing. 0 is a valid coordinate.
 */
function readLocation(place: RawPlace): Location | null {
  const geometry = readGeometry(place);
  const location = geometry ? readObject(geometry, 'location') : null;
  if (!location) return null;

  const lat = readNumber(location, 'lat');
  const lng = readNumber(location, 'lng');
  if (lat === null || lng === null) return null;

  return { lat, lng };
}

function readViewport(place: RawPlace): OpaqueObject | null {
  const geometry = readGeometry(place);
  return (geometry ? readObject(geometry, 'viewport') : null) ?? readObject(place, 'viewport');
}

function readPlaceId(place: RawPlace): string | null {
  const placeId = readString(place, 'place_id');
  return placeId && placeId.trim() ? placeId : null;
}

// ============================================================================
// Mapping
// ============================================================================

/**
 * Map one raw place to a RestaurantResult
 * @throws MalformedUpstreamRecordError when place_id is missing or blank
 */
export function normalizePlace(place: RawPlace, index: number | null = null): RestaurantResult {
  const placeId = readPlaceId(place);
  if (placeId === null) {
    throw new MalformedUpstreamRecordError('Place record is missing place_id', index);
  }

  return {
    place_id: placeId,
    name: readString(place, 'name'),
    address: readString(place, 'formatted_address'),
    location: readLocation(place),
    rating: readNumber(place, 'rating'),
    user_ratings_total: readNumber(place, 'user_ratings_total'),
    price_level: readNumber(place, 'price_level'),
    types: readStringArray(place, 'types'),
    opening_hours: readObject(place, 'opening_hours'),
    photos: readObjectArray(place, 'photos'),
    website: readString(place, 'website'),
    phone_number: readString(place, 'formatted_phone_number'),
    business_status: readString(place, 'business_status'),

    dine_in: readBoolean(place, 'dine_in'),
    takeout: readBoolean(place, 'takeout'),
    delivery: readBoolean(place, 'delivery'),
    curbside_pickup: readBoolean(place, 'curbside_pickup'),
    reservable: readBoolean(place, 'reservable'),

    serves_breakfast: readBoolean(place, 'serves_breakfast'),
    serves_lunch: readBoolean(place, 'serves_lunch'),
    serves_dinner: readBoolean(place, 'serves_dinner'),
    serves_brunch: readBoolean(place, 'serves_brunch'),

    serves_beer: readBoolean(place, 'serves_beer'),
    serves_wine: readBoolean(place, 'serves_wine'),
    serves_cocktails: readBoolean(place, 'serves_cocktails'),
    serves_coffee: readBoolean(place, 'serves_coffee'),

    serves_vegetarian_food: readBoolean(place, 'serves_vegetarian_food'),
    serves_dessert: readBoolean(place, 'serves_dessert'),

    outdoor_seating: readBoolean(place, 'outdoor_seating'),
    live_music: readBoolean(place, 'live_music'),
    good_for_children: readBoolean(place, 'good_for_children'),
    good_for_groups: readBoolean(place, 'good_for_groups'),
    good_for_watching_sports: readBoolean(place, 'good_for_watching_sports'),
    allows_dogs: readBoolean(place, 'allows_dogs'),
    restroom: readBoolean(place, 'restroom'),
    menu_for_children: readBoolean(place, 'menu_for_children'),

    parking_options: readObject(place, 'parking_options'),
    payment_options: readObject(place, 'payment_options'),

    google_maps_uri: readString(place, 'google_maps_uri') ?? readString(place, 'url'),
    icon_mask_base_uri: readString(place, 'icon_mask_base_uri'),
    utc_offset_minutes: readNumber(place, 'utc_offset_minutes') ?? readNumber(place, 'utc_offset'),
    current_opening_hours: readObject(place, 'current_opening_hours'),
    regular_opening_hours: readObject(place, 'regular_opening_hours'),
    generative_summary: readSummary(place, 'generative_summary'),
    editorial_summary: readSummary(place, 'editorial_summary'),

    reviews: readObjectArray(place, 'reviews'),
    review_summary: readObject(place, 'review_summary'),

    price_range: readString(place, 'price_range'),
    international_phone_number: readString(place, 'international_phone_number'),
    national_phone_number: readString(place, 'national_phone_number'),

    plus_code: readObject(place, 'plus_code'),
    viewport: readViewport(place),
    address_components: readObjectArray(place, 'address_components'),
    adr_format_address: readString(place, 'adr_format_address')
  };
}

export interface NormalizeOutput {
  results: RestaurantResult[];
  dropped: number;
}

/**
 * Map every raw place, dropping (and logging) entries that are not objects
 * or have no place_id. Provider order is preserved.
 */
export function normalizePlaces(places: readonly unknown[], requestId?: string): NormalizeOutput {
  const results: RestaurantResult[] = [];
  let dropped = 0;

  places.forEach((place, index) => {
    if (!isObject(place)) {
      dropped++;
      logger.warn({
        requestId,
        event: 'place_record_dropped',
        reason: 'not_an_object',
        index
      }, '[NORMALIZE] Dropped place record that is not an object');
      return;
    }

    try {
      results.push(normalizePlace(place, index));
    } catch (error) {
      if (!(error instanceof MalformedUpstreamRecordError)) {
        throw error;
      }
      dropped++;
      logger.warn({
        requestId,
        event: 'place_record_dropped',
        reason: 'missing_place_id',
        index,
        name: readString(place, 'name')
      }, '[NORMALIZE] Dropped place without place_id');
    }
  });

  return { results, dropped };
}
