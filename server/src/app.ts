import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { getConfig, type AppConfig } from './config/env.js';
import { createRestaurantsRouter } from './controllers/restaurants/restaurants.controller.js';
import { createHealthHandler, rootHandler } from './controllers/health.controller.js';
import { createProviderDiagnosticsHandler } from './controllers/debug.controller.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { errorHandlerMiddleware, notFoundHandler } from './middleware/errorHandler.middleware.js';
import { GooglePlacesClient } from './services/restaurants/client/google-places.client.js';
import { RestaurantSearchService } from './services/restaurants/restaurant-search.service.js';
import type { PlacesTextSearchClient } from './services/restaurants/types/place.types.js';

export interface AppDependencies {
  config: AppConfig;
  /** null when no credential is configured */
  placesClient: PlacesTextSearchClient | null;
}

function createPlacesClient(config: AppConfig): PlacesTextSearchClient | null {
  if (!config.googleMapsApiKey) {
    return null;
  }
  return new GooglePlacesClient({
    apiKey: config.googleMapsApiKey,
    baseUrl: config.googleMapsApiBaseUrl,
    timeoutMs: config.placesTimeoutMs
  });
}

export function createApp(overrides: Partial<AppDependencies> = {}) {
  const config = overrides.config ?? getConfig();
  const placesClient = overrides.placesClient !== undefined ? overrides.placesClient : createPlacesClient(config);

  const searchService = new RestaurantSearchService(placesClient, { nativeOpenNow: config.nativeOpenNow });

  const app = express();
  app.disable('x-powered-by');
  // Request context & logging first: body parser failures go straight to the error handler
  app.use(requestContextMiddleware);
  app.use(httpLoggingMiddleware);

  app.use(helmet());
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));
  app.use(cors({ origin: config.corsOrigins, credentials: true }));

  app.get('/', rootHandler);
  app.get('/health', createHealthHandler(() => searchService.isConfigured));

  if (config.enableDebugRoutes) {
    app.get('/debug/google-maps', createProviderDiagnosticsHandler(placesClient));
  }

  app.use(createRestaurantsRouter(searchService));

  app.use(notFoundHandler);
  app.use(errorHandlerMiddleware);

  return app;
}
