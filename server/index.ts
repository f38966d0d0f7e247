import express from 'express';
import dotenv from 'dotenv';
import { openTileCache } from './cache.js';
import { loadConfig, requireToken } from './config.js';
import { FlightExportService } from './export.js';
import { FlightDataClient } from './fr24.js';
import { createLogger } from './logger.js';
import { registerRoutes } from './routes.js';

dotenv.config({ path: '.env.local' });
dotenv.config();

const config = loadConfig();
const logger = createLogger({ level: config.logLevel, tag: 'Server' });

const client = new FlightDataClient({
  token: requireToken(config),
  baseUrl: config.baseUrl,
  maxRateLimitRetries: config.maxRateLimitRetries,
  maxServerRetries: config.maxServerRetries,
  baseDelayMs: config.retryBaseDelayMs,
  pageSize: config.summaryPageSize,
  maxPages: config.summaryMaxPages,
  logger: logger.child('FR24'),
});

const tileCache = config.tileCachePath ? openTileCache(config.tileCachePath) : null;
if (tileCache) {
  const expired = tileCache.cleanup();
  if (expired > 0) logger.info(`Removed ${expired} expired tiles from ${config.tileCachePath}`);
}

const exporter = new FlightExportService({
  source: client,
  exportRoot: config.exportRoot,
  logger: logger.child('Export'),
  tiles: { cache: tileCache, cacheTtlMs: config.tileCacheTtlMs },
});

const app = express();
app.use(express.json());
registerRoutes(app, { client, exporter, logger, corsOrigins: config.corsOrigins });

// =============================================================================
// Start server
// =============================================================================
const server = app.listen(config.port, () => {
  logger.info(`Flight export API running on http://localhost:${config.port}`);
  logger.info(`Exports written to ${config.exportRoot}`);
  logger.info('Endpoints:');
  logger.info('  GET  /api/health');
  logger.info('  GET  /api/flights/summary');
  logger.info('  GET  /api/flights/:flightId/tracks');
  logger.info('  POST /api/flights/:flightId/export');
  logger.info('  POST /api/flights/export');
  logger.info('  GET  /api/airlines/:icao');
  logger.info('  GET  /api/airports/:code');
  logger.info('  GET  /api/live/registration/:registration');
  logger.info('  GET  /api/live/positions');
});

function shutdown(): void {
  server.close(() => {
    tileCache?.close();
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
