import { describe, it, expect, vi } from 'vitest';
import {
  AmbiguousFlightError,
  NotFoundError,
  ServerError,
  ValidationError,
} from '../server/errors.js';
import {
  FlightDataClient,
  formatBounds,
  normalizeFlightNumbers,
  orderCandidates,
  parseApiDate,
  parseBounds,
  parseFlightSummary,
  parseSelector,
  resolveFlight,
  selectCandidate,
  type FlightDataSource,
} from '../server/fr24.js';
import type { FetchLike } from '../server/transport.js';
import type { FlightSummary } from '../server/types.js';
import { jsonResponse, makeRawTrack, makeSummary, makeSummaryRow, silentLogger } from './helpers.js';

function makeClient(handler: (url: URL) => Response, options: { pageSize?: number; maxPages?: number } = {}) {
  const fetchImpl = vi.fn<FetchLike>(async (input) => handler(new URL(input)));
  const client = new FlightDataClient({
    token: 'test-secret',
    baseUrl: 'https://api.test',
    fetchImpl,
    sleep: async () => {},
    logger: silentLogger(),
    pageSize: options.pageSize ?? 2,
    maxPages: options.maxPages ?? 2,
  });
  const urls = () => fetchImpl.mock.calls.map(([input]) => new URL(input));
  return { client, fetchImpl, urls };
}

const row = (id: string, takeoff: string) => makeSummaryRow({ fr24_id: id, datetime_takeoff: takeoff });

// =============================================================================
// Parsing and validation
// =============================================================================

describe('parseFlightSummary', () => {
  it('maps an API row to a FlightSummary with UTC instants', () => {
    expect(parseFlightSummary(makeSummaryRow())).toEqual({
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
    });
  });

  it('prefers the actual destination after a diversion', () => {
    const summary = parseFlightSummary(makeSummaryRow({ dest_iata_actual: 'MKE' }));
    expect(summary?.destination).toBe('MKE');
  });

  it('falls back to ICAO codes and handles string flags', () => {
    const summary = parseFlightSummary(makeSummaryRow({
      orig_iata: null,
      dest_iata: '',
      flight_ended: 'false',
      datetime_landed: null,
    }));
    expect(summary).toMatchObject({ origin: 'KJFK', destination: 'KORD', ended: false, landed: null });
  });

  it('rejects rows without a flight ID', () => {
    expect(parseFlightSummary({ flight: 'UA1930' })).toBeNull();
    expect(parseFlightSummary('UA1930')).toBeNull();
  });
});

describe('Input validation', () => {
  it('normalizes flight numbers', () => {
    expect(normalizeFlightNumbers('ua 1930, dl12')).toEqual(['UA1930', 'DL12']);
    expect(normalizeFlightNumbers(undefined)).toEqual([]);
  });

  it('rejects malformed or too many flight numbers', () => {
    expect(() => normalizeFlightNumbers('UA-1930')).toThrow('Invalid flight number or callsign: UA-1930');
    expect(() => normalizeFlightNumbers('U')).toThrow(ValidationError);
    const sixteen = Array.from({ length: 16 }, (_, i) => `UA${100 + i}`);
    expect(() => normalizeFlightNumbers(sixteen)).toThrow('At most 15 flights per query, got 16');
  });

  it('parses dates and datetimes', () => {
    expect(parseApiDate('2025-08-02')).toBe(Date.parse('2025-08-02T00:00:00Z'));
    expect(parseApiDate('2025-08-02', true)).toBe(Date.parse('2025-08-02T23:59:59Z'));
    expect(parseApiDate('2025-08-02T14:38:00')).toBe(Date.parse('2025-08-02T14:38:00Z'));
    expect(parseApiDate('2025-08-02T10:38:00-04:00')).toBe(Date.parse('2025-08-02T14:38:00Z'));
    expect(() => parseApiDate('08/02/2025')).toThrow('Invalid date format: 08/02/2025');
    expect(() => parseApiDate('tomorrow')).toThrow(ValidationError);
  });

  it('parses and formats bounding boxes', () => {
    const bounds = parseBounds('50, 20, -130, -60');
    expect(bounds).toEqual({ north: 50, south: 20, west: -130, east: -60 });
    expect(formatBounds(bounds)).toBe('50.000,20.000,-130.000,-60.000');
  });

  it('rejects malformed bounding boxes', () => {
    expect(() => parseBounds('1,2,3')).toThrow('Bounding box must be "north,south,west,east", got "1,2,3"');
    expect(() => parseBounds('20,50,0,1')).toThrow('Bounding box north edge must be greater than its south edge');
    expect(() => parseBounds('95,0,0,1')).toThrow('Bounding box latitudes must be within [-90, 90]');
    expect(() => parseBounds({ north: 10, south: 0, west: -200, east: 0 })).toThrow(/longitudes/);
    expect(() => parseBounds('a,b,c,d')).toThrow(ValidationError);
  });

  it('parses selectors', () => {
    expect(parseSelector(undefined)).toBeUndefined();
    expect(parseSelector('')).toBeUndefined();
    expect(parseSelector('latest')).toBe('latest');
    expect(parseSelector('2')).toBe(2);
    expect(parseSelector(0)).toBe(0);
    expect(() => parseSelector('-1')).toThrow(ValidationError);
    expect(() => parseSelector('newest')).toThrow(ValidationError);
  });
});

// =============================================================================
// Client
// =============================================================================

describe('FlightDataClient', () => {
  it('requires a token', () => {
    expect(() => new FlightDataClient({ token: ' ', logger: silentLogger() })).toThrow('An API token is required');
  });

  it('sends summary queries with the UTC day window', async () => {
    const { client, urls } = makeClient(() => jsonResponse({ data: [makeSummaryRow()] }));

    const result = await client.getFlightSummaryLight({ flights: 'ua1930', from: '2025-08-02', to: '2025-08-02' });

    expect(result.flights.map(f => f.flightId)).toEqual(['39f4007e']);
    expect(result.complete).toBe(true);
    const [url] = urls();
    expect(url.pathname).toBe('/api/flight-summary/light');
    expect(url.searchParams.get('flights')).toBe('UA1930');
    expect(url.searchParams.get('flight_datetime_from')).toBe('2025-08-02T00:00:00Z');
    expect(url.searchParams.get('flight_datetime_to')).toBe('2025-08-02T23:59:59Z');
    expect(url.searchParams.get('limit')).toBe('2');
    expect(url.searchParams.get('offset')).toBe('0');
    expect(url.searchParams.has('registrations')).toBe(false);
  });

  it('pages the full summary until the ceiling', async () => {
    const { client, urls } = makeClient((url) => {
      const offset = Number(url.searchParams.get('offset'));
      return jsonResponse({ data: [row(`a${offset}0000`, '2025-08-02T08:00:00'), row(`b${offset}0000`, '2025-08-02T09:00:00')] });
    });

    const result = await client.getFlightSummaryFull({ flights: ['UA1930'], from: '2025-08-01', to: '2025-08-03' });

    expect(urls().map(u => u.pathname)).toEqual(['/api/flight-summary/full', '/api/flight-summary/full']);
    expect(urls().map(u => u.searchParams.get('offset'))).toEqual(['0', '2']);
    expect(result).toMatchObject({ complete: false, pages: 2 });
    expect(result.flights.map(f => f.flightId)).toEqual(['a00000', 'b00000', 'a20000', 'b20000']);
  });

  it('skips malformed rows without cutting paging short', async () => {
    const { client, urls } = makeClient((url) => jsonResponse({
      data: url.searchParams.get('offset') === '0'
        ? [row('aaa111', '2025-08-02T08:00:00'), { broken: true }]
        : [row('bbb222', '2025-08-02T18:00:00')],
    }));

    const result = await client.getFlightSummaryLight({ flights: 'UA1930', from: '2025-08-02', to: '2025-08-02' });

    expect(urls()).toHaveLength(2);
    expect(result.flights.map(f => f.flightId)).toEqual(['aaa111', 'bbb222']);
    expect(result.complete).toBe(true);
  });

  it('validates summary queries before any request', async () => {
    const { client, fetchImpl } = makeClient(() => jsonResponse({ data: [] }));

    await expect(client.getFlightSummaryLight({ from: '2025-08-02', to: '2025-08-02' }))
      .rejects.toThrow('Provide at least one flight number, flight ID or registration');
    await expect(client.getFlightSummaryLight({ flights: 'UA1930', from: '2025-08-03', to: '2025-08-02' }))
      .rejects.toThrow('"from" must not be after "to"');
    await expect(client.getFlightSummaryLight({ flightIds: 'zz-top', from: '2025-08-02', to: '2025-08-02' }))
      .rejects.toThrow('Invalid flight ID: zz-top');
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('reports a malformed summary envelope as a server error', async () => {
    const { client } = makeClient(() => jsonResponse({ flights: [] }));
    await expect(client.getFlightSummaryLight({ flights: 'UA1930', from: '2025-08-02', to: '2025-08-02' }))
      .rejects.toBeInstanceOf(ServerError);
  });

  it('fetches and normalizes a track', async () => {
    const raw = makeRawTrack(3).reverse();
    const { client, urls } = makeClient(() => jsonResponse([{ fr24_id: '39f4007e', tracks: raw }]));

    const trackSet = await client.fetchTrackSet('39F4007E');

    expect(urls()[0].pathname).toBe('/api/flight-tracks');
    expect(urls()[0].searchParams.get('flight_id')).toBe('39f4007e');
    expect(trackSet.flightId).toBe('39f4007e');
    expect(trackSet.points.map(p => p.timestamp)).toEqual([
      '2025-08-02T14:00:00Z',
      '2025-08-02T14:01:00Z',
      '2025-08-02T14:02:00Z',
    ]);
  });

  it('looks up live positions by registration', async () => {
    const { client, urls } = makeClient(() => jsonResponse({
      data: [
        { fr24_id: '39f4007e', callsign: 'UAL1930', lat: 41.2, lon: -80.1, alt: 35000, timestamp: '2025-08-02T15:30:00Z' },
        { fr24_id: 'broken' },
      ],
    }));

    const flights = await client.getLiveFlightsByRegistration('n12345');

    expect(flights).toHaveLength(1);
    expect(flights[0]).toMatchObject({ fr24_id: '39f4007e', lat: 41.2, lon: -80.1 });
    expect(urls()[0].pathname).toBe('/api/live/flight-positions/light');
    expect(urls()[0].searchParams.get('registrations')).toBe('N12345');
    expect(urls()[0].searchParams.has('bounds')).toBe(false);
  });

  it('passes bounds and filters for live positions', async () => {
    const { client, urls } = makeClient(() => jsonResponse({ data: [] }));
    await client.getFlightPositionsLight('42.5,40,-75,-72', { altitude_ranges: '0-5000' });
    expect(urls()[0].searchParams.get('bounds')).toBe('42.500,40.000,-75.000,-72.000');
    expect(urls()[0].searchParams.get('altitude_ranges')).toBe('0-5000');
  });

  it('fetches static airline and airport data', async () => {
    const { client, urls } = makeClient((url) => jsonResponse(
      url.pathname.includes('airlines')
        ? { name: 'United Airlines', iata: 'UA', icao: 'UAL' }
        : { name: 'John F. Kennedy International Airport', iata: 'JFK', icao: 'KJFK' },
    ));

    await expect(client.getAirlineLight('ual')).resolves.toEqual({ name: 'United Airlines', iata: 'UA', icao: 'UAL' });
    await expect(client.getAirportFull('jfk')).resolves.toMatchObject({ iata: 'JFK' });
    await client.getAirportLight('KJFK');
    expect(urls().map(u => u.pathname)).toEqual([
      '/api/static/airlines/UAL/light',
      '/api/static/airports/JFK/full',
      '/api/static/airports/KJFK/light',
    ]);
    await expect(client.getAirlineLight('UNITED')).rejects.toThrow('Invalid airline ICAO code: UNITED');
    await expect(client.getAirportLight('J')).rejects.toThrow('Invalid airport code: J');
  });
});

// =============================================================================
// Flight resolution
// =============================================================================

function fakeSource(flights: FlightSummary[]) {
  const getFlightSummaryLight = vi.fn<FlightDataSource['getFlightSummaryLight']>(
    async () => ({ flights, complete: true, pages: 1 }),
  );
  return { getFlightSummaryLight };
}

describe('resolveFlight', () => {
  const morning = makeSummary({ flightId: 'aaa111', takeoff: '2025-08-02T08:00:00Z' });
  const evening = makeSummary({ flightId: 'bbb222', takeoff: '2025-08-02T18:00:00Z' });
  const noon = makeSummary({ flightId: 'ccc333', takeoff: null, firstSeen: '2025-08-02T12:00:00Z' });

  it('queries the UTC day for the flight number', async () => {
    const source = fakeSource([morning]);
    await expect(resolveFlight(source, 'ua1930', '2025-08-02')).resolves.toBe(morning);
    expect(source.getFlightSummaryLight).toHaveBeenCalledWith({ flights: ['UA1930'], from: '2025-08-02', to: '2025-08-02' });
  });

  it('raises NotFoundError with no candidates', async () => {
    await expect(resolveFlight(fakeSource([]), 'UA1930', '2025-08-02')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('raises AmbiguousFlightError with candidates in departure order', async () => {
    const err = await resolveFlight(fakeSource([evening, morning, noon]), 'UA1930', '2025-08-02')
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AmbiguousFlightError);
    if (!(err instanceof AmbiguousFlightError)) return;
    expect(err.candidates.map(c => c.flightId)).toEqual(['aaa111', 'ccc333', 'bbb222']);
    expect(err.message).toBe('3 flights match UA1930 on 2025-08-02; choose one by index, "latest" or "earliest"');
  });

  it('applies a selector', async () => {
    const source = fakeSource([evening, morning, noon]);
    await expect(resolveFlight(source, 'UA1930', '2025-08-02', 'latest')).resolves.toBe(evening);
    await expect(resolveFlight(source, 'UA1930', '2025-08-02', 'earliest')).resolves.toBe(morning);
    await expect(resolveFlight(source, 'UA1930', '2025-08-02', 1)).resolves.toBe(noon);
    await expect(resolveFlight(source, 'UA1930', '2025-08-02', 3)).rejects.toThrow('Candidate index 3 out of range (0-2)');
  });

  it('requires a YYYY-MM-DD date', async () => {
    await expect(resolveFlight(fakeSource([morning]), 'UA1930', '2025-08-02T10:00:00Z')).rejects.toBeInstanceOf(ValidationError);
  });

  it('orders undated candidates first, keeping their order', () => {
    const undatedA = makeSummary({ flightId: 'u1', takeoff: null, firstSeen: null });
    const undatedB = makeSummary({ flightId: 'u2', takeoff: null, firstSeen: null });
    expect(orderCandidates([evening, undatedA, morning, undatedB]).map(c => c.flightId))
      .toEqual(['u1', 'u2', 'aaa111', 'bbb222']);
    expect(() => selectCandidate([], 'latest')).toThrow(NotFoundError);
  });
});
