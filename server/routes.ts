/**
 * HTTP route handlers over the API client and the export service.
 * Registered by index.ts; tests mount them on an in-process app.
 */
import { Express, Request, Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { parseExportOptions } from './config.js';
import { ValidationError, mapErrorToHttp } from './errors.js';
import type { FlightExportService } from './export.js';
import { parseSelector, type FlightDataClient } from './fr24.js';
import type { Logger } from './logger.js';
import { assertTimeZone } from './timezone.js';
import type { ExportOptions } from './types.js';

export type RouteDeps = {
  client: FlightDataClient;
  exporter: FlightExportService;
  logger: Logger;
  corsOrigins?: readonly string[];
};

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireParam(value: string | undefined, name: string): string {
  if (!value) throw new ValidationError(`${name} is required`);
  return value;
}

/** Export options from a request body. The HTTP surface always writes under EXPORT_ROOT. */
function exportOptionsFrom(body: unknown): ExportOptions {
  const input: Record<string, unknown> = isRecord(body) ? body : {};
  if (input.outputDir !== undefined) {
    throw new ValidationError('outputDir cannot be set over HTTP');
  }
  return parseExportOptions({
    background: input.background,
    orientation: input.orientation,
    timezone: input.timezone,
  });
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
  const { client, exporter } = deps;
  const log = deps.logger.child('API');

  function sendError(res: Response, route: string, err: unknown): void {
    const { status, body } = mapErrorToHttp(err);
    if (status >= 500) log.error(`${route} failed:`, err);
    else log.warn(`${route} -> ${status}: ${err instanceof Error ? err.message : String(err)}`);
    res.status(status).json(body);
  }

  // ---------------------------------------------------------------------------
  // CORS
  // ---------------------------------------------------------------------------
  const origins = deps.corsOrigins ?? [];
  const corsOptions: cors.CorsOptions = origins.length > 0 ? { origin: [...origins] } : { origin: false };

  app.use(cors(corsOptions));

  // ---------------------------------------------------------------------------
  // Rate limiting
  // ---------------------------------------------------------------------------
  const exportLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 10,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many export requests, please try again later.' },
  });

  const apiLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: 60,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later.' },
  });

  app.use('/api/', apiLimiter);

  // ---------------------------------------------------------------------------
  // Health check
  // ---------------------------------------------------------------------------
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // ---------------------------------------------------------------------------
  // Flight summary
  // GET /api/flights/summary?flight=UA1930&date=2025-08-02[&full=1]
  // GET /api/flights/summary?flight=UA1930&from=2025-08-01&to=2025-08-03
  // ---------------------------------------------------------------------------
  app.get('/api/flights/summary', async (req: Request, res: Response) => {
    try {
      const flight = requireParam(queryString(req.query.flight), 'flight');
      const date = queryString(req.query.date);
      const from = requireParam(queryString(req.query.from) ?? date, 'date (or from)');
      const to = queryString(req.query.to) ?? date ?? from;
      const query = { flights: flight, from, to };

      const result = queryString(req.query.full) === '1'
        ? await client.getFlightSummaryFull(query)
        : await client.getFlightSummaryLight(query);
      res.json({ ...result, timestamp: new Date().toISOString() });
    } catch (err) {
      sendError(res, 'GET /api/flights/summary', err);
    }
  });

  // ---------------------------------------------------------------------------
  // Normalized track
  // GET /api/flights/39f4007e/tracks[?timezone=America/New_York]
  // ---------------------------------------------------------------------------
  app.get('/api/flights/:flightId/tracks', async (req: Request, res: Response) => {
    try {
      const zone = queryString(req.query.timezone);
      const trackSet = await exporter.loadTrackSet(
        req.params.flightId,
        zone === undefined ? null : assertTimeZone(zone),
      );
      res.json({
        flightId: trackSet.flightId,
        timezone: trackSet.timezone,
        pointCount: trackSet.points.length,
        dropped: trackSet.dropped,
        points: trackSet.points.map(({ sequence: _sequence, ...point }) => point),
      });
    } catch (err) {
      sendError(res, 'GET /api/flights/:flightId/tracks', err);
    }
  });

  // ---------------------------------------------------------------------------
  // Export by flight number + date
  // POST /api/flights/export { flight, date, select?, background?, orientation?, timezone? }
  // ---------------------------------------------------------------------------
  app.post('/api/flights/export', exportLimiter, async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const input: Record<string, unknown> = isRecord(body) ? body : {};
      const flight = requireParam(queryString(input.flight), 'flight');
      const date = requireParam(queryString(input.date), 'date');
      const options = exportOptionsFrom(body);

      const summary = await client.resolveFlight(flight, date, parseSelector(input.select));
      const bundle = await exporter.exportFlight(summary.flightId, options, summary);
      res.status(201).json({ summary, bundle });
    } catch (err) {
      sendError(res, 'POST /api/flights/export', err);
    }
  });

  // ---------------------------------------------------------------------------
  // Export by flight ID
  // POST /api/flights/39f4007e/export { background?, orientation?, timezone? }
  // ---------------------------------------------------------------------------
  app.post('/api/flights/:flightId/export', exportLimiter, async (req: Request, res: Response) => {
    try {
      const options = exportOptionsFrom(req.body);
      const bundle = await exporter.exportFlight(req.params.flightId, options);
      res.status(201).json(bundle);
    } catch (err) {
      sendError(res, 'POST /api/flights/:flightId/export', err);
    }
  });

  // ---------------------------------------------------------------------------
  // Static reference data
  // GET /api/airlines/UAL
  // GET /api/airports/JFK[?full=1]
  // ---------------------------------------------------------------------------
  app.get('/api/airlines/:icao', async (req: Request, res: Response) => {
    try {
      res.json(await client.getAirlineLight(req.params.icao));
    } catch (err) {
      sendError(res, 'GET /api/airlines/:icao', err);
    }
  });

  app.get('/api/airports/:code', async (req: Request, res: Response) => {
    try {
      const airport = queryString(req.query.full) === '1'
        ? await client.getAirportFull(req.params.code)
        : await client.getAirportLight(req.params.code);
      res.json(airport);
    } catch (err) {
      sendError(res, 'GET /api/airports/:code', err);
    }
  });

  // ---------------------------------------------------------------------------
  // Live positions
  // GET /api/live/registration/N12345[?bounds=50,20,-130,-60]
  // GET /api/live/positions?bounds=42.5,40.0,-75.0,-72.0
  // ---------------------------------------------------------------------------
  app.get('/api/live/registration/:registration', async (req: Request, res: Response) => {
    try {
      const flights = await client.getLiveFlightsByRegistration(
        req.params.registration,
        queryString(req.query.bounds),
      );
      res.json({ flights, timestamp: new Date().toISOString() });
    } catch (err) {
      sendError(res, 'GET /api/live/registration/:registration', err);
    }
  });

  app.get('/api/live/positions', async (req: Request, res: Response) => {
    try {
      const bounds = requireParam(queryString(req.query.bounds), 'bounds');
      const flights = await client.getFlightPositionsLight(bounds);
      res.json({ flights, timestamp: new Date().toISOString() });
    } catch (err) {
      sendError(res, 'GET /api/live/positions', err);
    }
  });
}
