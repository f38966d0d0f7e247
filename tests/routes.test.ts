import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import express from 'express';
import fs from 'fs/promises';
import type { Server } from 'http';
import os from 'os';
import path from 'path';
import { FlightExportService } from '../server/export.js';
import { FlightDataClient } from '../server/fr24.js';
import { registerRoutes } from '../server/routes.js';
import type { FetchLike } from '../server/transport.js';
import { jsonResponse, makeRawTrack, makeSummaryRow, silentLogger } from './helpers.js';

const SUMMARY_ROWS: Record<string, Record<string, unknown>[]> = {
  UA1930: [makeSummaryRow()],
  AA100: [
    makeSummaryRow({ fr24_id: '3a0b1c2d', flight: 'AA100', datetime_takeoff: '2025-08-02T06:00:00' }),
    makeSummaryRow({ fr24_id: '39f4007e', flight: 'AA100' }),
  ],
};

/** Stand-in for the upstream API, routed by path. */
function upstream(url: URL): Response {
  const params = url.searchParams;
  switch (url.pathname) {
    case '/api/flight-summary/light': {
      const ids = params.get('flight_ids');
      const rows = ids
        ? SUMMARY_ROWS.UA1930.filter(r => r.fr24_id === ids)
        : SUMMARY_ROWS[params.get('flights') ?? ''] ?? [];
      return jsonResponse({ data: rows });
    }
    case '/api/flight-tracks':
      return params.get('flight_id') === '39f4007e'
        ? jsonResponse([{ fr24_id: '39f4007e', tracks: makeRawTrack(5) }])
        : jsonResponse({ message: 'Flight not found' }, 404);
    case '/api/static/airlines/UAL/light':
      return jsonResponse({ name: 'United Airlines', iata: 'UA', icao: 'UAL' });
    case '/api/static/airports/JFK/full':
      return jsonResponse({ name: 'John F Kennedy International', iata: 'JFK', icao: 'KJFK', city: 'New York' });
    case '/api/live/flight-positions/light':
      return jsonResponse({
        data: [
          { fr24_id: '39f4007e', callsign: 'UAL1930', lat: 40.7, lon: -73.9, alt: 3000, gspeed: 210 },
          { fr24_id: 'broken', lat: 'north' },
        ],
      });
    default:
      return jsonResponse({ message: 'Unknown endpoint' }, 404);
  }
}

describe('HTTP routes', () => {
  let server: Server;
  let base: string;
  let root: string;
  const fetchImpl = vi.fn<FetchLike>(async (input) => upstream(new URL(input)));

  const upstreamCalls = (pathname: string) => fetchImpl.mock.calls
    .map(([input]) => new URL(input))
    .filter(url => url.pathname === pathname);

  beforeAll(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'flight-routes-'));
    const client = new FlightDataClient({
      token: 'test-secret',
      baseUrl: 'https://api.test',
      fetchImpl,
      sleep: async () => {},
      logger: silentLogger(),
    });
    const exporter = new FlightExportService({ source: client, exportRoot: root, logger: silentLogger() });

    const app = express();
    app.use(express.json());
    registerRoutes(app, { client, exporter, logger: silentLogger() });

    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server has no TCP address');
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    await fs.rm(root, { recursive: true, force: true });
  });

  const get = (route: string) => fetch(`${base}${route}`);
  const post = (route: string, body: unknown) => fetch(`${base}${route}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });

  it('GET /api/health returns ok', async () => {
    const res = await get('/api/health');
    expect(res.status).toBe(200);
    expect((await res.json()).status).toBe('ok');
  });

  describe('GET /api/flights/summary', () => {
    it('returns the flights for one date', async () => {
      const res = await get('/api/flights/summary?flight=UA1930&date=2025-08-02');
      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.complete).toBe(true);
      expect(body.flights.map((f: { flightId: string }) => f.flightId)).toEqual(['39f4007e']);
    });

    it('requires a flight', async () => {
      const res = await get('/api/flights/summary?date=2025-08-02');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'flight is required' });
    });

    it('rejects malformed dates', async () => {
      const res = await get('/api/flights/summary?flight=UA1930&date=08/02/2025');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Invalid date format: 08/02/2025' });
    });
  });

  describe('GET /api/flights/:flightId/tracks', () => {
    it('returns converted points without internal fields', async () => {
      const res = await get('/api/flights/39f4007e/tracks?timezone=America/New_York');
      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.pointCount).toBe(5);
      expect(body.timezone).toBe('America/New_York');
      expect(body.points[0].timestamp).toBe('2025-08-02T10:00:00-04:00');
      expect(body.points[0]).not.toHaveProperty('sequence');
    });

    it('maps an upstream 404 to 404', async () => {
      const res = await get('/api/flights/deadbeef/tracks');
      expect(res.status).toBe(404);
    });

    it('rejects unknown timezones', async () => {
      const res = await get('/api/flights/39f4007e/tracks?timezone=Mars/Olympus');
      expect(res.status).toBe(400);
    });
  });

  describe('POST /api/flights/export', () => {
    it('resolves a flight number and exports it', async () => {
      const res = await post('/api/flights/export', { flight: 'UA1930', date: '2025-08-02', background: 'none' });
      expect(res.status).toBe(201);
      const body = await res.json();
      expect(body.summary.flightId).toBe('39f4007e');
      expect(body.bundle.outputDir).toBe(path.join(root, '39f4007e'));
      expect(body.bundle.toplines.origin).toBe('JFK');
      expect(await fs.readFile(path.join(root, '39f4007e', 'toplines.json'), 'utf8'))
        .toBe(`${JSON.stringify(body.bundle.toplines, null, 2)}\n`);
    });

    it('answers 409 with candidates when the flight number is ambiguous', async () => {
      const res = await post('/api/flights/export', { flight: 'AA100', date: '2025-08-02', background: 'none' });
      expect(res.status).toBe(409);
      const body = await res.json();
      expect(body.candidates.map((c: { index: number; flightId: string }) => [c.index, c.flightId])).toEqual([
        [0, '3a0b1c2d'],
        [1, '39f4007e'],
      ]);
    });

    it('exports the chosen candidate', async () => {
      const res = await post('/api/flights/export', {
        flight: 'AA100',
        date: '2025-08-02',
        select: 'latest',
        background: 'none',
      });
      expect(res.status).toBe(201);
      expect((await res.json()).summary.flightId).toBe('39f4007e');
    });

    it('requires a date', async () => {
      const res = await post('/api/flights/export', { flight: 'UA1930' });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'date is required' });
    });
  });

  describe('POST /api/flights/:flightId/export', () => {
    it('exports by ID under the export root', async () => {
      const res = await post('/api/flights/39f4007e/export', { background: 'none', timezone: 'America/Chicago' });
      expect(res.status).toBe(201);
      const bundle = await res.json();
      expect(bundle.files.csv).toBe(path.join(root, '39f4007e', 'data.csv'));
      expect(bundle.toplines.departure_time).toBe('2025-08-02T09:38:00-05:00');
      expect(upstreamCalls('/api/flight-summary/light').some(url => url.searchParams.get('flight_ids') === '39f4007e'))
        .toBe(true);
    });

    it('refuses caller-chosen output directories', async () => {
      const res = await post('/api/flights/39f4007e/export', { background: 'none', outputDir: '/etc' });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'outputDir cannot be set over HTTP' });
    });

    it('rejects unknown backgrounds', async () => {
      const res = await post('/api/flights/39f4007e/export', { background: 'watercolor' });
      expect(res.status).toBe(400);
    });
  });

  describe('Reference data', () => {
    it('GET /api/airlines/:icao', async () => {
      const res = await get('/api/airlines/ual');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ name: 'United Airlines', iata: 'UA', icao: 'UAL' });
    });

    it('rejects malformed airline codes before calling upstream', async () => {
      const before = fetchImpl.mock.calls.length;
      const res = await get('/api/airlines/U');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Invalid airline ICAO code: U' });
      expect(fetchImpl.mock.calls.length).toBe(before);
    });

    it('GET /api/airports/:code?full=1 keeps extra fields', async () => {
      const res = await get('/api/airports/JFK?full=1');
      expect(res.status).toBe(200);
      expect((await res.json()).city).toBe('New York');
    });
  });

  describe('CORS', () => {
    it('allows no cross-origin callers by default', async () => {
      const res = await fetch(`${base}/api/health`, { headers: { Origin: 'http://localhost:5173' } });
      expect(res.status).toBe(200);
      expect(res.headers.get('access-control-allow-origin')).toBeNull();
    });

    it('allows only the configured origins', async () => {
      const client = new FlightDataClient({ token: 'test-secret', fetchImpl, logger: silentLogger() });
      const app = express();
      registerRoutes(app, {
        client,
        exporter: new FlightExportService({ source: client, exportRoot: root, logger: silentLogger() }),
        logger: silentLogger(),
        corsOrigins: ['https://maps.example'],
      });
      const other = await new Promise<Server>(resolve => {
        const listening = app.listen(0, () => resolve(listening));
      });
      try {
        const address = other.address();
        if (address === null || typeof address === 'string') throw new Error('Server has no TCP address');
        const url = `http://127.0.0.1:${address.port}/api/health`;

        const allowed = await fetch(url, { headers: { Origin: 'https://maps.example' } });
        expect(allowed.headers.get('access-control-allow-origin')).toBe('https://maps.example');
        const denied = await fetch(url, { headers: { Origin: 'https://elsewhere.example' } });
        expect(denied.headers.get('access-control-allow-origin')).toBeNull();
      } finally {
        await new Promise<void>((resolve, reject) => other.close(err => (err ? reject(err) : resolve())));
      }
    });
  });

  describe('Live positions', () => {
    it('requires bounds', async () => {
      const res = await get('/api/live/positions');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'bounds is required' });
    });

    it('returns valid positions inside the bounds', async () => {
      const res = await get('/api/live/positions?bounds=42.5,40,-75,-72');
      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.flights.map((f: { fr24_id: string }) => f.fr24_id)).toEqual(['39f4007e']);
      expect(upstreamCalls('/api/live/flight-positions/light').at(-1)?.searchParams.get('bounds'))
        .toBe('42.500,40.000,-75.000,-72.000');
    });

    it('looks up a registration', async () => {
      const res = await get('/api/live/registration/n12345');
      expect(res.status).toBe(200);
      expect(upstreamCalls('/api/live/flight-positions/light').at(-1)?.searchParams.get('registrations')).toBe('N12345');
    });
  });
});
