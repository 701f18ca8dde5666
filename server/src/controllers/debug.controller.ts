/**
 * Provider diagnostics
 * GET /debug/google-maps - runs one fixed Text Search query and reports the outcome.
 *
 * Reports only whether a key is configured; the key itself (or any part of it)
 * never appears in the response.
 */

import type { Request, Response, NextFunction } from 'express';
import { UpstreamError } from '../lib/errors/search-errors.js';
import type { PlacesTextSearchClient, TextSearchQuery } from '../services/restaurants/types/place.types.js';

export const DIAGNOSTIC_QUERY: TextSearchQuery = { textQuery: 'restaurants in New York', options: {} };

export interface ProviderDiagnostics {
  status: 'success' | 'error';
  api_key_configured: boolean;
  result_count?: number;
  provider_status?: string | null;
  error?: string;
}

export function createProviderDiagnosticsHandler(client: PlacesTextSearchClient | null) {
  return async function providerDiagnosticsHandler(req: Request, res: Response, next: NextFunction): Promise<void> {
    if (!client) {
      const body: ProviderDiagnostics = {
        status: 'error',
        api_key_configured: false,
        error: 'Google Maps service not initialized'
      };
      res.status(200).json(body);
      return;
    }

    try {
      const places = await client.textSearch(DIAGNOSTIC_QUERY, { requestId: req.traceId });
      const body: ProviderDiagnostics = {
        status: 'success',
        api_key_configured: true,
        result_count: places.length
      };
      res.status(200).json(body);
    } catch (error) {
      if (!(error instanceof UpstreamError)) {
        next(error);
        return;
      }
      const body: ProviderDiagnostics = {
        status: 'error',
        api_key_configured: true,
        provider_status: error.providerStatus,
        error: error.message
      };
      res.status(200).json(body);
    }
  };
}
