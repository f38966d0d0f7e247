// =============================================================================
// Shared domain types — track points, flight summaries, export bundles
// =============================================================================

/**
 * One telemetry sample after normalization.
 *
 * `timestamp` is ISO-8601: UTC (`Z`) at ingestion, offset-bearing after a
 * timezone conversion. `epochMs` is the instant and never changes.
 */
export type TrackPoint = {
  timestamp: string;
  epochMs: number;
  utcOffset: string;         // "+00:00", "-04:00"
  lat: number;
  lon: number;
  alt: number | null;        // feet, null = unknown
  gspeed: number | null;     // knots
  vspeed: number | null;     // feet per minute
  track: number | null;      // degrees
  squawk: string | null;
  callsign: string | null;
  source: string | null;
  sequence: number;          // position in the fetched payload
};

export type DroppedCounts = {
  badTimestamp: number;
  badCoordinate: number;
  duplicate: number;
};

export type TrackSet = {
  readonly flightId: string;
  readonly points: readonly TrackPoint[];
  readonly timezone: string | null;
  readonly dropped: Readonly<DroppedCounts>;
};

export type FlightSummary = {
  flightId: string;
  flightNumber: string | null;
  callsign: string | null;
  operator: string | null;
  aircraftType: string | null;
  registration: string | null;
  origin: string | null;
  destination: string | null;
  takeoff: string | null;    // ISO-8601 UTC
  landed: string | null;
  firstSeen: string | null;
  lastSeen: string | null;
  ended: boolean;
};

// -----------------------------------------------------------------------------
// Export configuration
// -----------------------------------------------------------------------------

export const BACKGROUNDS = [
  'cartodb-positron',
  'cartodb-dark',
  'osm',
  'esri-imagery',
  'esri-topo',
  'none',
] as const;

export type Background = (typeof BACKGROUNDS)[number];

export const ORIENTATIONS = ['horizontal', 'vertical', 'auto'] as const;

export type OrientationSetting = (typeof ORIENTATIONS)[number];
export type Orientation = Exclude<OrientationSetting, 'auto'>;

export type ExportOptions = {
  background: Background;
  orientation: OrientationSetting;
  timezone: string | null;
  outputDir?: string;
};

// -----------------------------------------------------------------------------
// Export bundle
// -----------------------------------------------------------------------------

export const ARTIFACT_FILES = {
  csv: 'data.csv',
  points: 'points.geojson',
  line: 'line.geojson',
  kml: 'track.kml',
  map: 'map.png',
  speed: 'speed.png',
  altitude: 'altitude.png',
  toplines: 'toplines.json',
} as const;

export type ArtifactName = keyof typeof ARTIFACT_FILES;

export type Toplines = {
  flight_number: string | null;
  flight_id: string;
  date: string | null;
  origin: string | null;
  destination: string | null;
  departure_time: string | null;
  arrival_time: string | null;
  departure_time_readable: string | null;
  arrival_time_readable: string | null;
  registration: string | null;
  aircraft_type: string | null;
};

export type ExportBundle = {
  flightId: string;
  outputDir: string;
  files: Partial<Record<ArtifactName, string>>;
  pointCount: number;
  dropped: DroppedCounts;
  summary: FlightSummary | null;
  toplines: Toplines;
  orientation: Orientation;
  mapDegraded: boolean;
  warnings: string[];
};
