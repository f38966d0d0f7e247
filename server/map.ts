// =============================================================================
// Path map — Web Mercator view, background raster, SVG path overlay
// =============================================================================

import sharp from 'sharp';
import {
  computeBoundingBox,
  latToPixelY,
  lonToPixelX,
  projectedAspectRatio,
  unwrapLongitudes,
  type BoundingBox,
} from './geo.js';
import { createLogger, type Logger } from './logger.js';
import {
  fetchBackgroundRaster,
  getTileProvider,
  solidRaster,
  type MapView,
  type TileContext,
  type TileProvider,
} from './tiles.js';
import type { Background, Orientation, OrientationSetting, TrackPoint, TrackSet } from './types.js';

export const MAP_SIZES: Record<Orientation, { width: number; height: number }> = {
  horizontal: { width: 1920, height: 1080 },
  vertical: { width: 1080, height: 1920 },
};

const PAD_FACTOR = 0.2;
const SINGLE_POINT_ZOOM = 12;

/**
 * Explicit orientations pass through. `auto` picks whichever of 16:9 and 9:16
 * is closer to the box's projected aspect ratio (compared in log space, so a
 * square box lands on horizontal).
 */
export function selectOrientation(setting: OrientationSetting, bbox: BoundingBox): Orientation {
  if (setting !== 'auto') return setting;
  const aspect = projectedAspectRatio(bbox);
  if (aspect === 0) return 'vertical';
  if (aspect === Infinity) return 'horizontal';
  const toHorizontal = Math.abs(Math.log(aspect) - Math.log(16 / 9));
  const toVertical = Math.abs(Math.log(aspect) - Math.log(9 / 16));
  return toVertical < toHorizontal ? 'vertical' : 'horizontal';
}

/**
 * Highest zoom at which the padded box fits the canvas, centered on the box.
 */
export function computeMapView(
  bbox: BoundingBox,
  size: { width: number; height: number },
  maxZoom: number,
): MapView {
  let zoom = 0;
  const isPoint = bbox.east === bbox.west && bbox.north === bbox.south;
  if (isPoint) {
    zoom = Math.min(SINGLE_POINT_ZOOM, maxZoom);
  } else {
    for (let z = maxZoom; z >= 0; z--) {
      const spanX = (lonToPixelX(bbox.east, z) - lonToPixelX(bbox.west, z)) * (1 + 2 * PAD_FACTOR);
      const spanY = (latToPixelY(bbox.south, z) - latToPixelY(bbox.north, z)) * (1 + 2 * PAD_FACTOR);
      if (spanX <= size.width && spanY <= size.height) {
        zoom = z;
        break;
      }
    }
  }

  const centerX = (lonToPixelX(bbox.west, zoom) + lonToPixelX(bbox.east, zoom)) / 2;
  const centerY = (latToPixelY(bbox.north, zoom) + latToPixelY(bbox.south, zoom)) / 2;
  return {
    zoom,
    originX: Math.round(centerX - size.width / 2),
    originY: Math.round(centerY - size.height / 2),
    width: size.width,
    height: size.height,
  };
}

/** View-pixel coordinates of each point, continuous across the antimeridian. */
export function projectPath(points: readonly Pick<TrackPoint, 'lat' | 'lon'>[], view: MapView): [number, number][] {
  const lons = unwrapLongitudes(points.map(p => p.lon));
  return points.map((p, i) => [
    Math.round((lonToPixelX(lons[i], view.zoom) - view.originX) * 10) / 10,
    Math.round((latToPixelY(p.lat, view.zoom) - view.originY) * 10) / 10,
  ]);
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export type OverlayText = {
  title: string;
  subtitle?: string;
  attribution?: string;
};

const FONT = "DejaVu Sans, Helvetica, Arial, sans-serif";

export function buildMapOverlaySvg(
  path: readonly [number, number][],
  view: Pick<MapView, 'width' | 'height'>,
  text: OverlayText,
  pathColor: string,
): string {
  const { width, height } = view;
  const polyline = path.map(([x, y]) => `${x},${y}`).join(' ');
  const start = path[0];
  const end = path[path.length - 1];
  const parts: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<polyline points="${polyline}" fill="none" stroke="${pathColor}" stroke-width="5" stroke-linejoin="round" stroke-linecap="round"/>`,
  ];
  if (start) parts.push(`<circle cx="${start[0]}" cy="${start[1]}" r="11" fill="#2ca02c" stroke="#ffffff" stroke-width="3"/>`);
  if (end && path.length > 1) parts.push(`<circle cx="${end[0]}" cy="${end[1]}" r="11" fill="#d62728" stroke="#ffffff" stroke-width="3"/>`);

  const boxHeight = text.subtitle ? 96 : 64;
  parts.push(
    `<rect x="24" y="24" width="${Math.min(width - 48, 900)}" height="${boxHeight}" rx="8" fill="#ffffff" fill-opacity="0.85"/>`,
    `<text x="44" y="68" font-family="${FONT}" font-size="30" font-weight="bold" fill="#222222">${escapeXml(text.title)}</text>`,
  );
  if (text.subtitle) {
    parts.push(`<text x="44" y="102" font-family="${FONT}" font-size="20" fill="#444444">${escapeXml(text.subtitle)}</text>`);
  }
  if (text.attribution) {
    parts.push(
      `<text x="${width - 16}" y="${height - 14}" text-anchor="end" font-family="${FONT}" font-size="14" fill="#333333" fill-opacity="0.8">${escapeXml(text.attribution)}</text>`,
    );
  }
  parts.push('</svg>');
  return parts.join('\n');
}

export type MapRenderOptions = {
  background: Background;
  orientation: OrientationSetting;
  title: string;
  subtitle?: string;
  tiles?: TileContext;
  logger?: Logger;
};

export type MapRenderResult = {
  png: Buffer;
  orientation: Orientation;
  view: MapView;
  /** True when the background could not be fetched and the path was drawn on a plain canvas. */
  degraded: boolean;
};

export async function renderMap(trackSet: TrackSet, options: MapRenderOptions): Promise<MapRenderResult> {
  const log = options.logger ?? createLogger({ tag: 'Map' });
  const bbox = computeBoundingBox(trackSet.points);
  const orientation = selectOrientation(options.orientation, bbox);
  const provider: TileProvider = getTileProvider(options.background);
  const view = computeMapView(bbox, MAP_SIZES[orientation], provider.maxZoom);

  let background: Buffer;
  let degraded = false;
  try {
    background = await fetchBackgroundRaster(provider, view, { logger: log, ...options.tiles });
  } catch (err) {
    log.warn(`${provider.label} background unavailable, drawing path only: ${err instanceof Error ? err.message : String(err)}`);
    background = await solidRaster(view, getTileProvider('none').fillColor);
    degraded = true;
  }

  const overlay = buildMapOverlaySvg(
    projectPath(trackSet.points, view),
    view,
    {
      title: options.title,
      subtitle: options.subtitle,
      attribution: degraded ? undefined : provider.attribution || undefined,
    },
    degraded ? getTileProvider('none').pathColor : provider.pathColor,
  );

  const png = await sharp(background)
    .composite([{ input: Buffer.from(overlay), left: 0, top: 0 }])
    .png()
    .toBuffer();

  return { png, orientation, view, degraded };
}
