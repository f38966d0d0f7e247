import { createLogger, type LogSink, type Logger } from '../server/logger.js';
import { normalize } from '../server/normalize.js';
import type { FlightSummary, TrackSet } from '../server/types.js';

export type RawPoint = {
  timestamp: string | number;
  lat: number | string | null;
  lon: number | string | null;
  alt?: number | null;
  gspeed?: number | null;
  vspeed?: number | null;
  track?: number | null;
  squawk?: string | null;
  callsign?: string | null;
  source?: string | null;
};

export function makeRawPoint(overrides: Partial<RawPoint> = {}): RawPoint {
  return {
    timestamp: '2025-08-02T14:38:00Z',
    lat: 40.6413,
    lon: -73.7781,
    alt: 12000,
    gspeed: 320,
    vspeed: 0,
    track: 90,
    squawk: '4521',
    callsign: 'UAL1930',
    source: 'ADSB',
    ...overrides,
  };
}

/** `count` points one minute apart heading east from JFK. */
export function makeRawTrack(count: number, startIso = '2025-08-02T14:00:00Z'): RawPoint[] {
  const start = Date.parse(startIso);
  return Array.from({ length: count }, (_, i) => makeRawPoint({
    timestamp: new Date(start + i * 60_000).toISOString().replace('.000Z', 'Z'),
    lat: 40.5 + i * 0.1,
    lon: -73.5 + i * 0.2,
    alt: 1000 * (i + 1),
    gspeed: 200 + i * 10,
  }));
}

export type CapturedLogs = {
  sink: LogSink;
  lines: string[];
};

export function captureLogs(): CapturedLogs {
  const lines: string[] = [];
  const push = (line: unknown) => { lines.push(String(line)); };
  return { lines, sink: { debug: push, log: push, warn: push, error: push } };
}

export function silentLogger(): Logger {
  return createLogger({ level: 'silent' });
}

export function makeTrackSet(count = 5, flightId = '39f4007e'): TrackSet {
  return normalize(makeRawTrack(count), { flightId, logger: silentLogger() });
}

export function makeSummary(overrides: Partial<FlightSummary> = {}): FlightSummary {
  return {
    flightId: '39f4007e',
    flightNumber: 'UA1930',
    callsign: 'UAL1930',
    operator: 'UAL',
    aircraftType: 'B738',
    registration: 'N12345',
    origin: 'JFK',
    destination: 'ORD',
    takeoff: '2025-08-02T14:38:00Z',
    landed: '2025-08-02T16:55:00Z',
    firstSeen: '2025-08-02T14:20:00Z',
    lastSeen: '2025-08-02T17:05:00Z',
    ended: true,
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

/** Raw FR24 summary row. */
export function makeSummaryRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    fr24_id: '39f4007e',
    flight: 'UA1930',
    callsign: 'UAL1930',
    operating_as: 'UAL',
    painted_as: 'UAL',
    type: 'B738',
    reg: 'N12345',
    orig_icao: 'KJFK',
    orig_iata: 'JFK',
    dest_icao: 'KORD',
    dest_iata: 'ORD',
    datetime_takeoff: '2025-08-02T14:38:00',
    datetime_landed: '2025-08-02T16:55:00',
    first_seen: '2025-08-02T14:20:00',
    last_seen: '2025-08-02T17:05:00',
    flight_ended: true,
    ...overrides,
  };
}
