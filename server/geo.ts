// =============================================================================
// Geometry helpers — bounding boxes, antimeridian handling, Web Mercator
// =============================================================================

import type { TrackPoint } from './types.js';

export const TILE_SIZE = 256;
const MAX_MERCATOR_LAT = 85.05112878;

export type Position = [number, number] | [number, number, number];

export type BoundingBox = {
  west: number;
  south: number;
  east: number;   // may exceed 180 when the track crosses the antimeridian
  north: number;
};

/**
 * The one place a point becomes a coordinate tuple. GeoJSON and KML both go
 * through here; altitude stays in feet like the CSV column and is omitted
 * when unknown.
 */
export function coordinateTuple(point: Pick<TrackPoint, 'lon' | 'lat' | 'alt'>): Position {
  if (point.alt === null) return [point.lon, point.lat];
  return [point.lon, point.lat, point.alt];
}

export function hasCoordinates(point: { lat: number | null; lon: number | null }): boolean {
  return (
    typeof point.lat === 'number' && Number.isFinite(point.lat) &&
    typeof point.lon === 'number' && Number.isFinite(point.lon)
  );
}

/**
 * Shift longitudes by ±360 wherever consecutive samples jump more than 180°,
 * so a date-line crossing stays continuous (e.g. 179.5 → -179.5 becomes
 * 179.5 → 180.5).
 */
export function unwrapLongitudes(lons: readonly number[]): number[] {
  const out: number[] = [];
  let shift = 0;
  for (let i = 0; i < lons.length; i++) {
    if (i > 0) {
      const delta = lons[i] - lons[i - 1];
      if (delta > 180) shift -= 360;
      else if (delta < -180) shift += 360;
    }
    out.push(lons[i] + shift);
  }
  return out;
}

export function crossesAntimeridian(points: readonly Pick<TrackPoint, 'lon'>[]): boolean {
  for (let i = 1; i < points.length; i++) {
    if (Math.abs(points[i].lon - points[i - 1].lon) > 180) return true;
  }
  return false;
}

export function computeBoundingBox(points: readonly Pick<TrackPoint, 'lat' | 'lon'>[]): BoundingBox {
  if (points.length === 0) throw new RangeError('Cannot bound an empty track');
  const lons = unwrapLongitudes(points.map(p => p.lon));
  let west = Infinity;
  let east = -Infinity;
  let south = Infinity;
  let north = -Infinity;
  points.forEach((p, i) => {
    west = Math.min(west, lons[i]);
    east = Math.max(east, lons[i]);
    south = Math.min(south, p.lat);
    north = Math.max(north, p.lat);
  });
  return { west, south, east, north };
}

// =============================================================================
// Web Mercator (EPSG:3857) in tile-pixel space
// =============================================================================

export function worldSize(zoom: number): number {
  return TILE_SIZE * 2 ** zoom;
}

/** Longitude → pixel x at `zoom`. Unwrapped longitudes beyond ±180 extend past the world edge. */
export function lonToPixelX(lon: number, zoom: number): number {
  return ((lon + 180) / 360) * worldSize(zoom);
}

export function latToPixelY(lat: number, zoom: number): number {
  const clamped = Math.max(-MAX_MERCATOR_LAT, Math.min(MAX_MERCATOR_LAT, lat));
  const rad = (clamped * Math.PI) / 180;
  const y = (1 - Math.log(Math.tan(rad) + 1 / Math.cos(rad)) / Math.PI) / 2;
  return y * worldSize(zoom);
}

/** Width / height of the box once projected. Infinity for a flat box, 1 for a point. */
export function projectedAspectRatio(bbox: BoundingBox): number {
  const width = lonToPixelX(bbox.east, 0) - lonToPixelX(bbox.west, 0);
  const height = latToPixelY(bbox.south, 0) - latToPixelY(bbox.north, 0);
  if (width <= 0 && height <= 0) return 1;
  if (height <= 0) return Infinity;
  return width / height;
}
