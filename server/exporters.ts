// =============================================================================
// Format exporters — CSV, GeoJSON (points + line) and KML
//
// All four are views of one TrackSet. The Nth row, feature and coordinate
// tuple always describe the Nth point; coordinates come from coordinateTuple()
// so GeoJSON and KML carry identical numbers.
// =============================================================================

import fs from 'fs/promises';
import path from 'path';
import { XMLBuilder } from 'fast-xml-parser';
import { ExportError } from './errors.js';
import { coordinateTuple, hasCoordinates, type Position } from './geo.js';
import type { TrackPoint, TrackSet } from './types.js';

// =============================================================================
// Atomic file writes
// =============================================================================

/** Write to a temp file beside the target, then rename over it. */
export async function writeFileAtomic(target: string, data: string | Buffer): Promise<string> {
  const tmp = path.join(
    path.dirname(target),
    `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`,
  );
  try {
    await fs.writeFile(tmp, data);
    await fs.rename(tmp, target);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw new ExportError(path.basename(target), err);
  }
  return target;
}

// =============================================================================
// CSV
// =============================================================================

export const CSV_COLUMNS = [
  'timestamp',
  'lat',
  'lon',
  'alt',
  'gspeed',
  'vspeed',
  'track',
  'squawk',
  'callsign',
  'source',
] as const satisfies readonly (keyof TrackPoint)[];

function csvCell(value: string | number | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) || text !== text.trim() ? `"${text.replace(/"/g, '""')}"` : text;
}

export function buildCsv(trackSet: TrackSet): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const point of trackSet.points) {
    lines.push(CSV_COLUMNS.map(column => csvCell(point[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export async function exportCsv(trackSet: TrackSet, target: string): Promise<string> {
  return writeFileAtomic(target, buildCsv(trackSet));
}

// =============================================================================
// GeoJSON
// =============================================================================

export type PointFeature = {
  type: 'Feature';
  geometry: { type: 'Point'; coordinates: Position };
  properties: {
    index: number;
    timestamp: string;
    alt: number | null;
    gspeed: number | null;
    vspeed: number | null;
    track: number | null;
    squawk: string | null;
    callsign: string | null;
    source: string | null;
  };
};

export type LineFeature = {
  type: 'Feature';
  geometry: { type: 'LineString'; coordinates: Position[] };
  properties: {
    flight_id: string;
    point_count: number;
    start_time: string | null;
    end_time: string | null;
  };
};

export type FeatureCollection<F> = {
  type: 'FeatureCollection';
  features: F[];
};

export function buildPointsGeoJson(trackSet: TrackSet): FeatureCollection<PointFeature> {
  return {
    type: 'FeatureCollection',
    features: trackSet.points.map((point, index) => ({
      type: 'Feature',
      geometry: { type: 'Point', coordinates: coordinateTuple(point) },
      properties: {
        index,
        timestamp: point.timestamp,
        alt: point.alt,
        gspeed: point.gspeed,
        vspeed: point.vspeed,
        track: point.track,
        squawk: point.squawk,
        callsign: point.callsign,
        source: point.source,
      },
    })),
  };
}

/** One LineString through every point that has coordinates, in order. */
export function buildLineGeoJson(trackSet: TrackSet): FeatureCollection<LineFeature> {
  const located = trackSet.points.filter(hasCoordinates);
  const coordinates = located.map(coordinateTuple);
  return {
    type: 'FeatureCollection',
    features: [
      {
        type: 'Feature',
        geometry: { type: 'LineString', coordinates },
        properties: {
          flight_id: trackSet.flightId,
          point_count: coordinates.length,
          start_time: located.length > 0 ? located[0].timestamp : null,
          end_time: located.length > 0 ? located[located.length - 1].timestamp : null,
        },
      },
    ],
  };
}

export async function exportGeoJSONPoints(trackSet: TrackSet, target: string): Promise<string> {
  return writeFileAtomic(target, `${JSON.stringify(buildPointsGeoJson(trackSet), null, 2)}\n`);
}

export async function exportGeoJSONLine(trackSet: TrackSet, target: string): Promise<string> {
  return writeFileAtomic(target, `${JSON.stringify(buildLineGeoJson(trackSet), null, 2)}\n`);
}

// =============================================================================
// KML
// =============================================================================

const kmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
});

/** "lon,lat" or "lon,lat,alt", no whitespace inside a tuple. */
export function kmlCoordinate(point: Pick<TrackPoint, 'lon' | 'lat' | 'alt'>): string {
  return coordinateTuple(point).join(',');
}

function describePoint(point: TrackPoint): string {
  const parts: string[] = [];
  if (point.alt !== null) parts.push(`Altitude: ${point.alt} ft`);
  if (point.gspeed !== null) parts.push(`Ground speed: ${point.gspeed} kts`);
  if (point.track !== null) parts.push(`Track: ${point.track}°`);
  if (point.squawk !== null) parts.push(`Squawk: ${point.squawk}`);
  return parts.join(', ');
}

export type KmlOptions = {
  name?: string;
};

export function buildKml(trackSet: TrackSet, options: KmlOptions = {}): string {
  const located = trackSet.points.filter(hasCoordinates);
  const anyAltitude = located.some(p => p.alt !== null);
  const name = options.name ?? `Flight ${trackSet.flightId}`;

  const doc = {
    kml: {
      '@_xmlns': 'http://www.opengis.net/kml/2.2',
      Document: {
        name,
        Style: [
          { '@_id': 'flightPath', LineStyle: { color: 'ff1f77b4', width: 3 } },
          { '@_id': 'trackPoint', IconStyle: { scale: 0.4 } },
        ],
        Placemark: {
          name: 'Flight path',
          styleUrl: '#flightPath',
          LineString: {
            tessellate: 1,
            altitudeMode: anyAltitude ? 'absolute' : 'clampToGround',
            coordinates: located.map(kmlCoordinate).join(' '),
          },
        },
        Folder: {
          name: 'Track points',
          Placemark: located.map((point, index) => ({
            name: point.timestamp,
            styleUrl: '#trackPoint',
            description: describePoint(point),
            ExtendedData: { Data: { '@_name': 'index', value: index } },
            TimeStamp: { when: point.timestamp },
            Point: {
              altitudeMode: point.alt !== null ? 'absolute' : 'clampToGround',
              coordinates: kmlCoordinate(point),
            },
          })),
        },
      },
    },
  };

  return `<?xml version="1.0" encoding="UTF-8"?>\n${kmlBuilder.build(doc)}`;
}

export async function exportKml(trackSet: TrackSet, target: string, options: KmlOptions = {}): Promise<string> {
  return writeFileAtomic(target, buildKml(trackSet, options));
}
