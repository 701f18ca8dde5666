/**
 * Search Request Validation
 * Validates and parses GET /restaurants/search query parameters
 */

import type { Request } from 'express';
import { InvalidRequestError } from '../../lib/errors/search-errors.js';
import {
  safeParseSearchQuery,
  type SearchRequest
} from '../../services/restaurants/types/search-request.dto.js';

/**
 * @throws InvalidRequestError listing every failing parameter
 */
export function validateSearchQuery(req: Request): SearchRequest {
  const validation = safeParseSearchQuery(req.query);
  if (!validation.success) {
    throw new InvalidRequestError(validation.error);
  }
  return validation.data;
}
