/**
 * Restaurant search error taxonomy
 *
 * Each error carries the HTTP status and the short `error` category written
 * to the response body; `message` becomes the body's `detail`.
 */

export type SearchErrorKind =
  | 'INVALID_REQUEST'
  | 'UPSTREAM_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'MALFORMED_UPSTREAM_RECORD';

export abstract class RestaurantSearchError extends Error {
  abstract readonly kind: SearchErrorKind;
  abstract readonly statusCode: number;
  abstract readonly category: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Client-supplied filter failed validation (400) */
export class InvalidRequestError extends RestaurantSearchError {
  readonly kind = 'INVALID_REQUEST';
  readonly statusCode = 400;
  readonly category = 'Validation error';
}

export type UpstreamFailureKind =
  | 'HTTP_ERROR'
  | 'PROVIDER_STATUS'
  | 'MALFORMED_PAYLOAD'
  | 'TIMEOUT'
  | 'ABORT'
  | 'DNS_FAIL'
  | 'NETWORK_ERROR';

/** Places provider failed: non-2xx, denied request, bad payload, network (502) */
export class UpstreamError extends RestaurantSearchError {
  readonly kind = 'UPSTREAM_ERROR';
  readonly statusCode = 502;
  readonly category = 'Google Maps API error';

  constructor(
    message: string,
    public readonly failure: UpstreamFailureKind,
    public readonly providerStatus: string | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** No provider credential available (500) */
export class ConfigurationError extends RestaurantSearchError {
  readonly kind = 'CONFIGURATION_ERROR';
  readonly statusCode = 500;
  readonly category = 'Configuration error';
}

/**
 * A single provider place without an identifier.
 * Recovered locally: the record is dropped, never surfaced to the caller.
 */
export class MalformedUpstreamRecordError extends RestaurantSearchError {
  readonly kind = 'MALFORMED_UPSTREAM_RECORD';
  readonly statusCode = 502;
  readonly category = 'Google Maps API error';

  constructor(message: string, public readonly index: number | null = null) {
    super(message);
  }
}

export function isRestaurantSearchError(error: unknown): error is RestaurantSearchError {
  return error instanceof RestaurantSearchError;
}
