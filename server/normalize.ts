// =============================================================================
// Track normalizer
//
// Raw ADS-B pings arrive unordered, sometimes duplicated, with missing or
// garbage fields. Bad points are dropped and counted; the set only fails when
// nothing usable is left.
// =============================================================================

import { ValidationError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { toIsoUtc } from './timezone.js';
import type { DroppedCounts, TrackPoint, TrackSet } from './types.js';

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the list of raw points out of a flight-tracks response. Accepts
 * `[{ fr24_id, tracks: [...] }]`, `{ tracks: [...] }` or a bare point list.
 */
export function extractTrackPoints(payload: unknown): unknown[] {
  if (Array.isArray(payload)) {
    if (payload.length === 1 && isRecord(payload[0]) && Array.isArray(payload[0].tracks)) {
      return payload[0].tracks;
    }
    return payload;
  }
  if (isRecord(payload)) {
    if (Array.isArray(payload.tracks)) return payload.tracks;
    if (Array.isArray(payload.data)) return extractTrackPoints(payload.data);
  }
  throw new ValidationError('Unexpected flight track payload: expected a list of points or a { tracks } object');
}

// Naive ISO strings ("2025-08-02T14:38:00") are UTC at ingestion
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

export function parseTimestamp(value: unknown): number | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) return null;
    // Seconds unless it is clearly already milliseconds
    return value < 1e11 ? Math.round(value * 1000) : Math.round(value);
  }
  if (typeof value !== 'string') return null;
  const text = value.trim();
  if (!text) return null;
  if (/^\d+(\.\d+)?$/.test(text)) return parseTimestamp(Number(text));
  const iso = HAS_ZONE.test(text) ? text : `${text.replace(' ', 'T')}Z`;
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? null : ms;
}

export function toNumberOrNull(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function toTextOrNull(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;
  const text = value.trim();
  return text ? text : null;
}

export function isValidCoordinate(lat: number | null, lon: number | null): boolean {
  return lat !== null && lon !== null && lat >= -90 && lat <= 90 && lon >= -180 && lon <= 180;
}

export type NormalizeOptions = {
  flightId?: string;
  logger?: Logger;
};

/**
 * Normalize raw points into an immutable TrackSet: parseable timestamps only,
 * valid coordinates only, stable-sorted by time, identical
 * (timestamp, lat, lon) tuples collapsed to their first occurrence.
 */
export function normalize(rawPoints: unknown, options: NormalizeOptions = {}): TrackSet {
  const log = options.logger ?? createLogger({ tag: 'Normalize' });
  const flightId = options.flightId ?? '';

  if (!Array.isArray(rawPoints)) {
    throw new ValidationError('Track input must be a list of points');
  }
  if (rawPoints.length === 0) {
    throw new ValidationError(`No track points returned${flightId ? ` for flight ${flightId}` : ''}`);
  }

  const dropped: DroppedCounts = { badTimestamp: 0, badCoordinate: 0, duplicate: 0 };
  const parsed: TrackPoint[] = [];

  rawPoints.forEach((raw, sequence) => {
    if (!isRecord(raw)) {
      dropped.badTimestamp++;
      return;
    }
    const epochMs = parseTimestamp(raw.timestamp);
    if (epochMs === null) {
      dropped.badTimestamp++;
      return;
    }
    const lat = toNumberOrNull(raw.lat);
    const lon = toNumberOrNull(raw.lon);
    if (lat === null || lon === null || !isValidCoordinate(lat, lon)) {
      dropped.badCoordinate++;
      return;
    }
    parsed.push({
      timestamp: toIsoUtc(epochMs),
      epochMs,
      utcOffset: '+00:00',
      lat,
      lon,
      alt: toNumberOrNull(raw.alt),
      gspeed: toNumberOrNull(raw.gspeed),
      vspeed: toNumberOrNull(raw.vspeed),
      track: toNumberOrNull(raw.track),
      squawk: toTextOrNull(raw.squawk),
      callsign: toTextOrNull(raw.callsign),
      source: toTextOrNull(raw.source),
      sequence,
    });
  });

  // Array.prototype.sort is stable; sequence breaks ties explicitly anyway
  parsed.sort((a, b) => a.epochMs - b.epochMs || a.sequence - b.sequence);

  const seen = new Set<string>();
  const points: TrackPoint[] = [];
  for (const point of parsed) {
    const key = `${point.epochMs}|${point.lat}|${point.lon}`;
    if (seen.has(key)) {
      dropped.duplicate++;
      continue;
    }
    seen.add(key);
    points.push(Object.freeze(point));
  }

  const totalDropped = dropped.badTimestamp + dropped.badCoordinate + dropped.duplicate;
  if (totalDropped > 0) {
    log.warn(
      `${flightId || 'track'}: dropped ${totalDropped} of ${rawPoints.length} points ` +
      `(timestamp=${dropped.badTimestamp}, coordinate=${dropped.badCoordinate}, duplicate=${dropped.duplicate})`,
    );
  }

  if (points.length === 0) {
    throw new ValidationError(`No usable track points${flightId ? ` for flight ${flightId}` : ''}`);
  }

  return Object.freeze({
    flightId,
    points: Object.freeze(points),
    timezone: null,
    dropped: Object.freeze(dropped),
  });
}

/** Milliseconds between the first and last point. */
export function trackDuration(trackSet: TrackSet): number {
  const { points } = trackSet;
  if (points.length < 2) return 0;
  return points[points.length - 1].epochMs - points[0].epochMs;
}
