// =============================================================================
// Export service — one flight ID in, one directory of artifacts out
//
//   fetch → normalize → (timezone) → CSV / GeoJSON / KML → charts + map → toplines
//
// Every artifact is built from the same frozen TrackSet. Data formats are
// fatal to the bundle when they cannot be written; charts and the map only
// add warnings.
// =============================================================================

import fs from 'fs/promises';
import path from 'path';
import { renderTrackChart, type ChartKind } from './charts.js';
import { ValidationError } from './errors.js';
import {
  exportCsv,
  exportGeoJSONLine,
  exportGeoJSONPoints,
  exportKml,
  writeFileAtomic,
} from './exporters.js';
import {
  formatApiDate,
  normalizeFlightId,
  normalizeFlightNumbers,
  parseDateWindow,
  type FlightDataSource,
} from './fr24.js';
import { computeBoundingBox, crossesAntimeridian } from './geo.js';
import { createLogger, type Logger } from './logger.js';
import { renderMap, selectOrientation } from './map.js';
import { extractTrackPoints, normalize, parseTimestamp } from './normalize.js';
import type { TileContext } from './tiles.js';
import {
  convertTrackSet,
  formatLongDate,
  formatReadable,
  localDate,
  toIsoUtc,
  toZonedIso,
} from './timezone.js';
import {
  ARTIFACT_FILES,
  type ArtifactName,
  type ExportBundle,
  type ExportOptions,
  type FlightSummary,
  type Toplines,
  type TrackSet,
} from './types.js';

const DAY = 24 * 60 * 60 * 1000;

// =============================================================================
// Toplines
// =============================================================================

function instantOrNull(iso: string | null | undefined): number | null {
  return iso ? parseTimestamp(iso) : null;
}

function renderInstant(epochMs: number, zone: string | null): string {
  return zone === null ? toIsoUtc(epochMs) : toZonedIso(epochMs, zone);
}

/**
 * Summary fields win; times fall back to the first and last track points
 * when the summary is missing or has no takeoff/landing.
 */
export function buildToplines(trackSet: TrackSet, summary: FlightSummary | null): Toplines {
  const { points, timezone } = trackSet;
  const first = points[0];
  const last = points[points.length - 1];
  const departure = instantOrNull(summary?.takeoff) ?? first.epochMs;
  const arrival = instantOrNull(summary?.landed) ?? last.epochMs;

  return {
    flight_number: summary?.flightNumber ?? summary?.callsign ?? first.callsign,
    flight_id: trackSet.flightId,
    date: localDate(departure, timezone),
    origin: summary?.origin ?? null,
    destination: summary?.destination ?? null,
    departure_time: renderInstant(departure, timezone),
    arrival_time: renderInstant(arrival, timezone),
    departure_time_readable: formatReadable(departure, timezone),
    arrival_time_readable: formatReadable(arrival, timezone),
    registration: summary?.registration ?? null,
    aircraft_type: summary?.aircraftType ?? null,
  };
}

function headlineFor(toplines: Toplines): string {
  return toplines.flight_number ?? toplines.flight_id;
}

function mapSubtitle(toplines: Toplines, trackSet: TrackSet): string {
  const date = formatLongDate(trackSet.points[0].epochMs, trackSet.timezone);
  return toplines.origin && toplines.destination
    ? `${toplines.origin} to ${toplines.destination}, ${date}`
    : date;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// =============================================================================
// Batch results
// =============================================================================

export type BatchItem =
  | { ok: true; flightId: string; bundle: ExportBundle }
  | { ok: false; flightId: string; error: string };

export type InvestigationResult = {
  flightNumber: string;
  /** False when the summary lookup hit its page ceiling. */
  complete: boolean;
  exports: BatchItem[];
  error?: string;
};

// =============================================================================
// Service
// =============================================================================

export type ExportServiceOptions = {
  source: FlightDataSource;
  exportRoot: string;
  logger?: Logger;
  tiles?: Omit<TileContext, 'logger'>;
};

export class FlightExportService {
  private readonly source: FlightDataSource;
  private readonly exportRoot: string;
  private readonly log: Logger;
  private readonly tiles: TileContext;

  constructor(options: ExportServiceOptions) {
    this.source = options.source;
    this.exportRoot = options.exportRoot;
    this.log = options.logger ?? createLogger({ tag: 'Export' });
    this.tiles = { ...options.tiles, logger: this.log.child('Tiles') };
  }

  /** Fetch and normalize a track, converted to `timezone` when one is given. */
  async loadTrackSet(flightId: string, timezone: string | null = null): Promise<TrackSet> {
    const id = normalizeFlightId(flightId);
    const payload = await this.source.getFlightTracks(id);
    const trackSet = normalize(extractTrackPoints(payload), {
      flightId: id,
      logger: this.log.child('Normalize'),
    });
    return timezone === null ? trackSet : convertTrackSet(trackSet, timezone);
  }

  private async lookupSummary(trackSet: TrackSet, warnings: string[]): Promise<FlightSummary | null> {
    const first = trackSet.points[0].epochMs;
    const last = trackSet.points[trackSet.points.length - 1].epochMs;
    try {
      const { flights } = await this.source.getFlightSummaryLight({
        flightIds: [trackSet.flightId],
        from: formatApiDate(first - DAY),
        to: formatApiDate(last + DAY),
      });
      const match = flights.find(f => f.flightId === trackSet.flightId) ?? null;
      if (!match) warnings.push(`No flight summary found for ${trackSet.flightId}`);
      return match;
    } catch (err) {
      const message = `Flight summary lookup failed: ${describeError(err)}`;
      this.log.warn(`${trackSet.flightId}: ${message}`);
      warnings.push(message);
      return null;
    }
  }

  /**
   * Runs the whole pipeline for one flight. `summary` skips the lookup;
   * pass null to export without one.
   */
  async exportFlight(
    flightId: string,
    options: ExportOptions,
    summary?: FlightSummary | null,
  ): Promise<ExportBundle> {
    const trackSet = await this.loadTrackSet(flightId, options.timezone);
    const warnings: string[] = [];
    const resolvedSummary = summary === undefined ? await this.lookupSummary(trackSet, warnings) : summary;

    const outputDir = options.outputDir ?? path.join(this.exportRoot, trackSet.flightId);
    await fs.mkdir(outputDir, { recursive: true });
    const target = (name: ArtifactName): string => path.join(outputDir, ARTIFACT_FILES[name]);

    const toplines = buildToplines(trackSet, resolvedSummary);
    const headline = headlineFor(toplines);
    const files: Partial<Record<ArtifactName, string>> = {};

    files.csv = await exportCsv(trackSet, target('csv'));
    files.points = await exportGeoJSONPoints(trackSet, target('points'));
    files.line = await exportGeoJSONLine(trackSet, target('line'));
    files.kml = await exportKml(trackSet, target('kml'), { name: `${headline} (${trackSet.flightId})` });

    if (crossesAntimeridian(trackSet.points)) {
      warnings.push('Track crosses the antimeridian; map framing uses unwrapped longitudes');
    }

    for (const kind of ['speed', 'altitude'] as const satisfies readonly ChartKind[]) {
      try {
        const png = await renderTrackChart(kind, trackSet, { headline });
        files[kind] = await writeFileAtomic(target(kind), png);
      } catch (err) {
        const message = `${kind} chart not rendered: ${describeError(err)}`;
        this.log.warn(`${trackSet.flightId}: ${message}`);
        warnings.push(message);
      }
    }

    let orientation = selectOrientation(options.orientation, computeBoundingBox(trackSet.points));
    let mapDegraded = false;
    try {
      const map = await renderMap(trackSet, {
        background: options.background,
        orientation: options.orientation,
        title: headline,
        subtitle: mapSubtitle(toplines, trackSet),
        tiles: this.tiles,
        logger: this.log.child('Map'),
      });
      orientation = map.orientation;
      mapDegraded = map.degraded;
      if (map.degraded) warnings.push(`Background "${options.background}" unavailable; map drawn without it`);
      files.map = await writeFileAtomic(target('map'), map.png);
    } catch (err) {
      const message = `map not rendered: ${describeError(err)}`;
      this.log.warn(`${trackSet.flightId}: ${message}`);
      warnings.push(message);
    }

    files.toplines = await writeFileAtomic(target('toplines'), `${JSON.stringify(toplines, null, 2)}\n`);

    this.log.info(`${trackSet.points.length} points written to ${outputDir}`);
    return {
      flightId: trackSet.flightId,
      outputDir,
      files,
      pointCount: trackSet.points.length,
      dropped: { ...trackSet.dropped },
      summary: resolvedSummary,
      toplines,
      orientation,
      mapDegraded,
      warnings,
    };
  }

  /**
   * Independent exports, one after another. An explicit outputDir becomes the
   * parent of per-flight directories.
   */
  async exportFlights(flightIds: readonly string[], options: ExportOptions): Promise<BatchItem[]> {
    const results: BatchItem[] = [];
    for (const flightId of flightIds) {
      results.push(await this.tryExport(flightId, () => {
        const perFlight: ExportOptions = options.outputDir
          ? { ...options, outputDir: path.join(options.outputDir, normalizeFlightId(flightId)) }
          : options;
        return this.exportFlight(flightId, perFlight);
      }));
    }
    const failed = results.filter(r => !r.ok).length;
    this.log.info(`Batch export: ${results.length - failed} succeeded, ${failed} failed`);
    return results;
  }

  /**
   * Every instance of each flight number between `from` and `to`, written to
   * `<root>/<flightNumber>_<flightId>`.
   */
  async investigateFlights(
    flightNumbers: readonly string[],
    from: string,
    to: string,
    options: ExportOptions,
  ): Promise<InvestigationResult[]> {
    const numbers = normalizeFlightNumbers(flightNumbers);
    if (numbers.length === 0) throw new ValidationError('Provide at least one flight number');
    parseDateWindow(from, to);
    const root = options.outputDir ?? this.exportRoot;
    const results: InvestigationResult[] = [];

    for (const flightNumber of numbers) {
      let flights: FlightSummary[];
      let complete: boolean;
      try {
        ({ flights, complete } = await this.source.getFlightSummaryLight({ flights: [flightNumber], from, to }));
      } catch (err) {
        this.log.warn(`${flightNumber}: summary lookup failed: ${describeError(err)}`);
        results.push({ flightNumber, complete: false, exports: [], error: describeError(err) });
        continue;
      }

      this.log.info(`${flightNumber}: ${flights.length} instance(s) between ${from} and ${to}`);
      const exports: BatchItem[] = [];
      for (const summary of flights) {
        exports.push(await this.tryExport(summary.flightId, () => this.exportFlight(
          summary.flightId,
          { ...options, outputDir: path.join(root, `${flightNumber}_${summary.flightId}`) },
          summary,
        )));
      }
      results.push({ flightNumber, complete, exports });
    }
    return results;
  }

  private async tryExport(flightId: string, run: () => Promise<ExportBundle>): Promise<BatchItem> {
    try {
      return { ok: true, flightId, bundle: await run() };
    } catch (err) {
      this.log.error(`${flightId}: export failed: ${describeError(err)}`);
      return { ok: false, flightId, error: describeError(err) };
    }
  }
}
