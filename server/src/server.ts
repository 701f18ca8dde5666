import { createApp } from './app.js';
import { getConfig, isGoogleMapsConfigured } from './config/env.js';
import { logger } from './lib/logger/structured-logger.js';

const config = getConfig();

if (!isGoogleMapsConfigured(config)) {
  logger.warn('GOOGLE_MAPS_API_KEY is not set. /restaurants/search will fail until it is provided.');
}

const app = createApp({ config });
const server = app.listen(config.port, config.host, () => {
  logger.info(`Server listening on http://${config.host}:${config.port}`);
});

function shutdown(signal: NodeJS.Signals) {
  logger.info(`Received ${signal}. Shutting down gracefully...`);
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
