// =============================================================================
// Flightradar24 API client
//
// Thin typed wrappers over the REST endpoints. Every call goes through
// FlightDataTransport (auth header, error taxonomy, retry/backoff); responses
// are checked with zod before anything downstream sees them.
//
//   /api/flight-summary/{light,full}       — paged via limit/offset
//   /api/flight-tracks                     — ADS-B pings for one flight ID
//   /api/live/flight-positions/light       — live positions
//   /api/static/{airlines,airports}/...    — reference data
// =============================================================================

import { z } from 'zod';
import { AmbiguousFlightError, NotFoundError, ServerError, ValidationError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { extractTrackPoints, normalize, parseTimestamp } from './normalize.js';
import { fetchAllPages } from './pagination.js';
import { toIsoUtc } from './timezone.js';
import { FlightDataTransport, type QueryParams, type TransportOptions } from './transport.js';
import type { FlightSummary, TrackSet } from './types.js';

const MAX_FLIGHTS_PER_QUERY = 15;
const FLIGHT_NUMBER_PATTERN = /^[A-Z0-9]{2,8}$/;
const FLIGHT_ID_PATTERN = /^[0-9a-f]{6,16}$/i;
const REGISTRATION_PATTERN = /^[A-Z0-9-]{2,10}$/;

// =============================================================================
// Response schemas
// =============================================================================

const nullableText = z.string().nullish();

const FlightSummarySchema = z
  .object({
    fr24_id: z.string().min(1),
    flight: nullableText,
    callsign: nullableText,
    operating_as: nullableText,
    painted_as: nullableText,
    type: nullableText,
    reg: nullableText,
    orig_icao: nullableText,
    orig_iata: nullableText,
    dest_icao: nullableText,
    dest_iata: nullableText,
    dest_icao_actual: nullableText,
    dest_iata_actual: nullableText,
    datetime_takeoff: nullableText,
    datetime_landed: nullableText,
    first_seen: nullableText,
    last_seen: nullableText,
    flight_ended: z.union([z.boolean(), z.string()]).nullish(),
  })
  .passthrough();

const DataEnvelopeSchema = z.object({ data: z.array(z.unknown()) });

const LivePositionSchema = z
  .object({
    fr24_id: z.string(),
    hex: nullableText,
    callsign: nullableText,
    lat: z.number(),
    lon: z.number(),
    track: z.number().nullish(),
    alt: z.number().nullish(),
    gspeed: z.number().nullish(),
    vspeed: z.number().nullish(),
    squawk: z.union([z.string(), z.number()]).nullish(),
    timestamp: z.union([z.string(), z.number()]).nullish(),
    source: nullableText,
  })
  .passthrough();

export type LivePosition = z.infer<typeof LivePositionSchema>;

const AirlineSchema = z
  .object({
    name: z.string(),
    iata: nullableText,
    icao: nullableText,
  })
  .passthrough();

export type Airline = z.infer<typeof AirlineSchema>;

const AirportSchema = z
  .object({
    name: z.string(),
    iata: nullableText,
    icao: nullableText,
  })
  .passthrough();

export type Airport = z.infer<typeof AirportSchema>;

// =============================================================================
// Input validation
// =============================================================================

export type IdList = string | readonly string[];

function toList(value: IdList | undefined): string[] {
  if (value === undefined) return [];
  const raw = typeof value === 'string' ? value.split(',') : value;
  return raw.map(v => v.trim()).filter(v => v.length > 0);
}

export function normalizeFlightNumbers(value: IdList | undefined): string[] {
  const list = toList(value).map(v => v.replace(/\s+/g, '').toUpperCase());
  for (const flight of list) {
    if (!FLIGHT_NUMBER_PATTERN.test(flight)) {
      throw new ValidationError(`Invalid flight number or callsign: ${flight}`);
    }
  }
  if (list.length > MAX_FLIGHTS_PER_QUERY) {
    throw new ValidationError(`At most ${MAX_FLIGHTS_PER_QUERY} flights per query, got ${list.length}`);
  }
  return list;
}

export function normalizeFlightIds(value: IdList | undefined): string[] {
  const list = toList(value).map(v => v.toLowerCase());
  for (const id of list) {
    if (!FLIGHT_ID_PATTERN.test(id)) throw new ValidationError(`Invalid flight ID: ${id}`);
  }
  if (list.length > MAX_FLIGHTS_PER_QUERY) {
    throw new ValidationError(`At most ${MAX_FLIGHTS_PER_QUERY} flight IDs per query, got ${list.length}`);
  }
  return list;
}

/** One flight ID, lowercased. */
export function normalizeFlightId(value: string): string {
  const [id] = normalizeFlightIds(value);
  if (!id) throw new ValidationError('A flight ID is required');
  return id;
}

export function normalizeRegistration(value: string): string {
  const reg = value.trim().toUpperCase();
  if (!REGISTRATION_PATTERN.test(reg)) throw new ValidationError(`Invalid registration: ${value}`);
  return reg;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Accepts "YYYY-MM-DD" or an ISO datetime and returns epoch ms. Date-only
 * input is the start of that UTC day, or its last second with `endOfDay`.
 */
export function parseApiDate(value: string, endOfDay = false): number {
  const text = value.trim();
  if (DATE_ONLY.test(text)) {
    const ms = Date.parse(`${text}T${endOfDay ? '23:59:59' : '00:00:00'}Z`);
    if (Number.isNaN(ms) || toIsoUtc(ms).slice(0, 10) !== text) {
      throw new ValidationError(`Invalid date format: ${value}`);
    }
    return ms;
  }
  if (!/^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/.test(text)) {
    throw new ValidationError(`Invalid date format: ${value}`);
  }
  const ms = parseTimestamp(text);
  if (ms === null) throw new ValidationError(`Invalid date format: ${value}`);
  return ms;
}

/** Both ends of a search window as epoch ms; a date-only `to` covers that whole day. */
export function parseDateWindow(from: string, to: string): { from: number; to: number } {
  const window = { from: parseApiDate(from), to: parseApiDate(to, true) };
  if (window.from > window.to) throw new ValidationError('"from" must not be after "to"');
  return window;
}

/** API datetime parameter, seconds precision. */
export function formatApiDate(epochMs: number): string {
  return toIsoUtc(Math.floor(epochMs / 1000) * 1000);
}

export type Bounds = {
  north: number;
  south: number;
  west: number;
  east: number;
};

/** "north,south,west,east" or a Bounds object, checked for range and order. */
export function parseBounds(value: string | Bounds): Bounds {
  let bounds: Bounds;
  if (typeof value === 'string') {
    const parts = value.split(',').map(p => p.trim());
    const nums = parts.map(Number);
    if (parts.length !== 4 || parts.some(p => p === '') || nums.some(n => !Number.isFinite(n))) {
      throw new ValidationError(`Bounding box must be "north,south,west,east", got "${value}"`);
    }
    bounds = { north: nums[0], south: nums[1], west: nums[2], east: nums[3] };
  } else {
    bounds = value;
  }
  const { north, south, west, east } = bounds;
  if ([north, south].some(v => !Number.isFinite(v) || v < -90 || v > 90)) {
    throw new ValidationError('Bounding box latitudes must be within [-90, 90]');
  }
  if ([west, east].some(v => !Number.isFinite(v) || v < -180 || v > 180)) {
    throw new ValidationError('Bounding box longitudes must be within [-180, 180]');
  }
  if (north <= south) {
    throw new ValidationError('Bounding box north edge must be greater than its south edge');
  }
  return bounds;
}

export function formatBounds(b: Bounds): string {
  return [b.north, b.south, b.west, b.east].map(v => v.toFixed(3)).join(',');
}

function validateAirportCode(code: string): string {
  const upper = code.trim().toUpperCase();
  if (!/^[A-Z0-9]{3,4}$/.test(upper)) throw new ValidationError(`Invalid airport code: ${code}`);
  return upper;
}

function validateAirlineIcao(icao: string): string {
  const upper = icao.trim().toUpperCase();
  if (!/^[A-Z0-9]{3}$/.test(upper)) throw new ValidationError(`Invalid airline ICAO code: ${icao}`);
  return upper;
}

// =============================================================================
// Summary parsing
// =============================================================================

function isoOrNull(value: string | null | undefined): string | null {
  if (!value) return null;
  const ms = parseTimestamp(value);
  return ms === null ? null : toIsoUtc(ms);
}

const textOrNull = (value: string | null | undefined): string | null => {
  const t = value?.trim();
  return t ? t : null;
};

export function parseFlightSummary(raw: unknown): FlightSummary | null {
  const parsed = FlightSummarySchema.safeParse(raw);
  if (!parsed.success) return null;
  const s = parsed.data;
  const ended = typeof s.flight_ended === 'string'
    ? s.flight_ended.toLowerCase() === 'true'
    : s.flight_ended === true;
  return {
    flightId: s.fr24_id,
    flightNumber: textOrNull(s.flight),
    callsign: textOrNull(s.callsign),
    operator: textOrNull(s.operating_as) ?? textOrNull(s.painted_as),
    aircraftType: textOrNull(s.type),
    registration: textOrNull(s.reg),
    origin: textOrNull(s.orig_iata) ?? textOrNull(s.orig_icao),
    destination:
      textOrNull(s.dest_iata_actual) ?? textOrNull(s.dest_iata) ??
      textOrNull(s.dest_icao_actual) ?? textOrNull(s.dest_icao),
    takeoff: isoOrNull(s.datetime_takeoff),
    landed: isoOrNull(s.datetime_landed),
    firstSeen: isoOrNull(s.first_seen),
    lastSeen: isoOrNull(s.last_seen),
    ended,
  };
}

// =============================================================================
// Candidate selection
// =============================================================================

export type FlightSelector = number | 'latest' | 'earliest';

export function parseSelector(value: unknown): FlightSelector | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  if (value === 'latest' || value === 'earliest') return value;
  const n = typeof value === 'number' ? value : Number(value);
  if (Number.isInteger(n) && n >= 0) return n;
  throw new ValidationError(`Selector must be an index, "latest" or "earliest", got ${String(value)}`);
}

function sortKey(summary: FlightSummary): string {
  return summary.takeoff ?? summary.firstSeen ?? '';
}

/** Candidates in departure order; undated ones keep their relative order at the front. */
export function orderCandidates(candidates: readonly FlightSummary[]): FlightSummary[] {
  return [...candidates].sort((a, b) => sortKey(a).localeCompare(sortKey(b)));
}

export function selectCandidate(candidates: readonly FlightSummary[], selector: FlightSelector): FlightSummary {
  const ordered = orderCandidates(candidates);
  if (ordered.length === 0) throw new NotFoundError('No candidate flights to choose from');
  if (selector === 'earliest') return ordered[0];
  if (selector === 'latest') return ordered[ordered.length - 1];
  if (selector >= ordered.length) {
    throw new ValidationError(`Candidate index ${selector} out of range (0-${ordered.length - 1})`);
  }
  return ordered[selector];
}

/**
 * (flight number, UTC day) → one flight instance. Several candidates need a
 * selector; without one the caller gets an AmbiguousFlightError to choose from.
 */
export async function resolveFlight(
  source: Pick<FlightDataSource, 'getFlightSummaryLight'>,
  flightNumber: string,
  date: string,
  selector?: FlightSelector,
): Promise<FlightSummary> {
  if (!DATE_ONLY.test(date.trim())) {
    throw new ValidationError(`Date must be YYYY-MM-DD, got "${date}"`);
  }
  const [flight] = normalizeFlightNumbers(flightNumber);
  if (!flight) throw new ValidationError('A flight number is required');

  const { flights } = await source.getFlightSummaryLight({ flights: [flight], from: date, to: date });
  if (flights.length === 0) {
    throw new NotFoundError(`No flights found for ${flight} on ${date.trim()}`);
  }
  if (flights.length === 1) return flights[0];
  if (selector === undefined) {
    throw new AmbiguousFlightError(
      `${flights.length} flights match ${flight} on ${date.trim()}; choose one by index, "latest" or "earliest"`,
      orderCandidates(flights),
    );
  }
  return selectCandidate(flights, selector);
}

// =============================================================================
// Client
// =============================================================================

export type SummaryQuery = {
  flights?: IdList;
  flightIds?: IdList;
  registrations?: IdList;
  from: string;
  to: string;
};

export type SummaryResult = {
  flights: FlightSummary[];
  complete: boolean;
  pages: number;
};

/** What the export service needs from an upstream. */
export type FlightDataSource = {
  getFlightTracks(flightId: string): Promise<unknown>;
  getFlightSummaryLight(query: SummaryQuery): Promise<SummaryResult>;
};

export type FlightDataClientOptions = Omit<TransportOptions, 'logger'> & {
  pageSize?: number;
  maxPages?: number;
  logger?: Logger;
  transport?: FlightDataTransport;
};

export class FlightDataClient implements FlightDataSource {
  private readonly transport: FlightDataTransport;
  private readonly pageSize: number;
  private readonly maxPages: number;
  private readonly log: Logger;

  constructor(options: FlightDataClientOptions) {
    if (!options.token || !options.token.trim()) {
      throw new ValidationError('An API token is required');
    }
    const logger = options.logger ?? createLogger({ tag: 'FR24' });
    this.log = logger;
    this.transport = options.transport ?? new FlightDataTransport({
      ...options,
      logger: logger.child('Transport'),
    });
    this.pageSize = options.pageSize ?? 100;
    this.maxPages = options.maxPages ?? 10;
  }

  // ---------------------------------------------------------------------------
  // Flight summary
  // ---------------------------------------------------------------------------

  private buildSummaryParams(query: SummaryQuery): QueryParams {
    const flights = normalizeFlightNumbers(query.flights);
    const flightIds = normalizeFlightIds(query.flightIds);
    const registrations = toList(query.registrations).map(normalizeRegistration);
    if (flights.length + flightIds.length + registrations.length === 0) {
      throw new ValidationError('Provide at least one flight number, flight ID or registration');
    }
    const { from, to } = parseDateWindow(query.from, query.to);

    return {
      flights,
      flight_ids: flightIds,
      registrations,
      flight_datetime_from: formatApiDate(from),
      flight_datetime_to: formatApiDate(to),
    };
  }

  private async getFlightSummary(kind: 'light' | 'full', query: SummaryQuery): Promise<SummaryResult> {
    const endpoint = `/api/flight-summary/${kind}`;
    const params = this.buildSummaryParams(query);

    // Malformed rows stay in the page as null so page length still drives paging
    const result = await fetchAllPages<FlightSummary | null>(
      async (offset, limit) => {
        const body = DataEnvelopeSchema.safeParse(
          await this.transport.request(endpoint, { ...params, limit, offset }),
        );
        if (!body.success) {
          throw new ServerError(`Malformed response from ${endpoint}`, { endpoint });
        }
        return body.data.data.map(parseFlightSummary);
      },
      this.pageSize,
      this.maxPages,
    );

    const flights = result.items.filter((f): f is FlightSummary => f !== null);
    const skipped = result.items.length - flights.length;
    if (skipped > 0) this.log.warn(`${endpoint}: skipped ${skipped} malformed summary entries`);
    if (!result.complete) {
      this.log.warn(`${endpoint}: stopped after ${result.pages} pages; results may be incomplete`);
    }
    this.log.info(`${endpoint}: ${flights.length} flights in ${result.pages} page(s)`);
    return { flights, complete: result.complete, pages: result.pages };
  }

  getFlightSummaryLight(query: SummaryQuery): Promise<SummaryResult> {
    return this.getFlightSummary('light', query);
  }

  getFlightSummaryFull(query: SummaryQuery): Promise<SummaryResult> {
    return this.getFlightSummary('full', query);
  }

  resolveFlight(flightNumber: string, date: string, selector?: FlightSelector): Promise<FlightSummary> {
    return resolveFlight(this, flightNumber, date, selector);
  }

  // ---------------------------------------------------------------------------
  // Tracks
  // ---------------------------------------------------------------------------

  async getFlightTracks(flightId: string): Promise<unknown> {
    const id = normalizeFlightId(flightId);
    return this.transport.request('/api/flight-tracks', { flight_id: id });
  }

  async fetchTrackSet(flightId: string): Promise<TrackSet> {
    const id = normalizeFlightId(flightId);
    const payload = await this.getFlightTracks(id);
    return normalize(extractTrackPoints(payload), { flightId: id, logger: this.log.child('Normalize') });
  }

  // ---------------------------------------------------------------------------
  // Live positions
  // ---------------------------------------------------------------------------

  private async getLivePositions(params: QueryParams): Promise<LivePosition[]> {
    const endpoint = '/api/live/flight-positions/light';
    const body = DataEnvelopeSchema.safeParse(await this.transport.request(endpoint, params));
    if (!body.success) throw new ServerError(`Malformed response from ${endpoint}`, { endpoint });
    const positions: LivePosition[] = [];
    for (const raw of body.data.data) {
      const parsed = LivePositionSchema.safeParse(raw);
      if (parsed.success) positions.push(parsed.data);
    }
    return positions;
  }

  getLiveFlightsByRegistration(registration: string, bounds?: string | Bounds): Promise<LivePosition[]> {
    return this.getLivePositions({
      registrations: normalizeRegistration(registration),
      bounds: bounds === undefined ? undefined : formatBounds(parseBounds(bounds)),
    });
  }

  getFlightPositionsLight(
    bounds: string | Bounds,
    filters: Record<string, string | number> = {},
  ): Promise<LivePosition[]> {
    return this.getLivePositions({ ...filters, bounds: formatBounds(parseBounds(bounds)) });
  }

  // ---------------------------------------------------------------------------
  // Static reference data
  // ---------------------------------------------------------------------------

  async getAirlineLight(icao: string): Promise<Airline> {
    const endpoint = `/api/static/airlines/${validateAirlineIcao(icao)}/light`;
    const parsed = AirlineSchema.safeParse(await this.transport.request(endpoint));
    if (!parsed.success) throw new ServerError(`Malformed response from ${endpoint}`, { endpoint });
    return parsed.data;
  }

  private async getAirport(code: string, kind: 'light' | 'full'): Promise<Airport> {
    const endpoint = `/api/static/airports/${validateAirportCode(code)}/${kind}`;
    const parsed = AirportSchema.safeParse(await this.transport.request(endpoint));
    if (!parsed.success) throw new ServerError(`Malformed response from ${endpoint}`, { endpoint });
    return parsed.data;
  }

  getAirportLight(code: string): Promise<Airport> {
    return this.getAirport(code, 'light');
  }

  getAirportFull(code: string): Promise<Airport> {
    return this.getAirport(code, 'full');
  }
}
