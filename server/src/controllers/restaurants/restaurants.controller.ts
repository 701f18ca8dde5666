/**
 * Restaurants Controller
 * GET /restaurants/search - filtered restaurant search
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { RestaurantSearchService } from '../../services/restaurants/restaurant-search.service.js';
import { validateSearchQuery } from './search.validation.js';

/**
 * Abort signal tied to the client connection.
 * `close` before the response finished means the client went away.
 */
function clientAbortSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

export function createRestaurantsRouter(searchService: RestaurantSearchService): Router {
  const router = Router();

  router.get('/restaurants/search', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const searchRequest = validateSearchQuery(req);

      const response = await searchService.search(searchRequest, {
        requestId: req.traceId,
        signal: clientAbortSignal(res)
      });

      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
