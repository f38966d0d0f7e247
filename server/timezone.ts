// =============================================================================
// Timezone transformer
//
// Offsets are resolved per instant through Intl, so a flight crossing a DST
// transition gets the right offset on each side of it.
// =============================================================================

import { ValidationError } from './errors.js';
import type { TrackPoint, TrackSet } from './types.js';

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function wallClockFormatter(zone: string): Intl.DateTimeFormat {
  const key = `wall:${zone}`;
  let fmt = formatterCache.get(key);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone: zone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    formatterCache.set(key, fmt);
  }
  return fmt;
}

/** Throws ValidationError unless `zone` is an IANA zone Intl understands. */
export function assertTimeZone(zone: string): string {
  if (!zone.trim()) throw new ValidationError('Timezone must not be empty');
  try {
    return new Intl.DateTimeFormat('en-US', { timeZone: zone }).resolvedOptions().timeZone;
  } catch {
    throw new ValidationError(`Unknown timezone: ${zone}`);
  }
}

export function isValidTimeZone(zone: string): boolean {
  try {
    assertTimeZone(zone);
    return true;
  } catch {
    return false;
  }
}

type WallClock = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

function wallClock(epochMs: number, zone: string): WallClock {
  const parts = wallClockFormatter(zone).formatToParts(new Date(epochMs));
  const get = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find(p => p.type === type);
    return part ? Number(part.value) : 0;
  };
  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: get('hour') % 24,
    minute: get('minute'),
    second: get('second'),
  };
}

/** UTC offset in minutes at that instant (east positive). */
export function offsetMinutes(epochMs: number, zone: string): number {
  const wall = wallClock(epochMs, zone);
  const asUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
  const wholeSeconds = Math.floor(epochMs / 1000) * 1000;
  return Math.round((asUtc - wholeSeconds) / 60000);
}

export function formatOffset(minutes: number): string {
  const sign = minutes < 0 ? '-' : '+';
  const abs = Math.abs(minutes);
  const hh = String(Math.floor(abs / 60)).padStart(2, '0');
  const mm = String(abs % 60).padStart(2, '0');
  return `${sign}${hh}:${mm}`;
}

const pad2 = (n: number): string => String(n).padStart(2, '0');

function fractionSuffix(epochMs: number): string {
  const ms = ((epochMs % 1000) + 1000) % 1000;
  return ms === 0 ? '' : `.${String(ms).padStart(3, '0')}`;
}

/** "2025-08-02T14:38:00Z"; milliseconds only when non-zero. */
export function toIsoUtc(epochMs: number): string {
  return new Date(epochMs).toISOString().replace(/\.000Z$/, 'Z');
}

/** "2025-08-02T10:38:00-04:00" for the wall time in `zone`. */
export function toZonedIso(epochMs: number, zone: string): string {
  const w = wallClock(epochMs, zone);
  const date = `${String(w.year).padStart(4, '0')}-${pad2(w.month)}-${pad2(w.day)}`;
  const time = `${pad2(w.hour)}:${pad2(w.minute)}:${pad2(w.second)}${fractionSuffix(epochMs)}`;
  return `${date}T${time}${formatOffset(offsetMinutes(epochMs, zone))}`;
}

/** Local calendar date "YYYY-MM-DD" in `zone` (UTC when null). */
export function localDate(epochMs: number, zone: string | null): string {
  const w = wallClock(epochMs, zone ?? 'UTC');
  return `${String(w.year).padStart(4, '0')}-${pad2(w.month)}-${pad2(w.day)}`;
}

// =============================================================================
// Human-readable strings
// =============================================================================

/**
 * Short zone label. US zones collapse to the generic form used in print
 * (EDT/EST → ET, PDT → PT, AKST → AKT); anything else is Intl's short name.
 */
export function zoneAbbreviation(epochMs: number, zone: string | null): string {
  if (zone === null) return 'UTC';
  const part = new Intl.DateTimeFormat('en-US', { timeZone: zone, timeZoneName: 'short' })
    .formatToParts(new Date(epochMs))
    .find(p => p.type === 'timeZoneName');
  const name = part?.value ?? zone;
  const us = name.match(/^([A-Z]{1,2})[SD]T$/);
  return us ? `${us[1]}T` : name;
}

function twelveHourParts(epochMs: number, zone: string): { hour: string; minute: string; period: string } {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: zone,
    hour: 'numeric',
    minute: '2-digit',
    hour12: true,
  }).formatToParts(new Date(epochMs));
  const get = (type: Intl.DateTimeFormatPartTypes): string => parts.find(p => p.type === type)?.value ?? '';
  const period = get('dayPeriod').toUpperCase() === 'PM' ? 'p.m.' : 'a.m.';
  return { hour: get('hour'), minute: get('minute'), period };
}

/** "10:38 a.m." */
export function formatClockTime(epochMs: number, zone: string | null): string {
  const { hour, minute, period } = twelveHourParts(epochMs, zone ?? 'UTC');
  return `${hour}:${minute} ${period}`;
}

/** "August 2, 2025" */
export function formatLongDate(epochMs: number, zone: string | null): string {
  return new Intl.DateTimeFormat('en-US', {
    timeZone: zone ?? 'UTC',
    month: 'long',
    day: 'numeric',
    year: 'numeric',
  }).format(new Date(epochMs));
}

/** "August 2, 2025, at 10:38 a.m. ET" */
export function formatReadable(epochMs: number, zone: string | null): string {
  return `${formatLongDate(epochMs, zone)}, at ${formatClockTime(epochMs, zone)} ${zoneAbbreviation(epochMs, zone)}`;
}

// =============================================================================
// TrackSet conversion
// =============================================================================

export function convertPoint(point: TrackPoint, zone: string): TrackPoint {
  return {
    ...point,
    timestamp: toZonedIso(point.epochMs, zone),
    utcOffset: formatOffset(offsetMinutes(point.epochMs, zone)),
  };
}

/** Returns a new TrackSet whose timestamps are rendered in `zone`. */
export function convertTrackSet(trackSet: TrackSet, zone: string): TrackSet {
  const resolved = assertTimeZone(zone);
  return Object.freeze({
    flightId: trackSet.flightId,
    points: Object.freeze(trackSet.points.map(p => Object.freeze(convertPoint(p, resolved)))),
    timezone: resolved,
    dropped: trackSet.dropped,
  });
}
