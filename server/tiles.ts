// =============================================================================
// Background tile providers
//
// Every provider answers the same question ("give me a raster for this map
// view") and differs only in where the pixels come from. XYZ providers are
// slippy-map tile servers; the solid provider paints a flat background and
// never touches the network.
// =============================================================================

import sharp from 'sharp';
import { ConnectionError } from './errors.js';
import { TILE_SIZE } from './geo.js';
import { createLogger, type Logger } from './logger.js';
import type { TileCache } from './cache.js';
import type { Background } from './types.js';

export type MapView = {
  zoom: number;
  originX: number;   // world-pixel x of the view's left edge
  originY: number;
  width: number;
  height: number;
};

type ProviderStyle = {
  label: string;
  attribution: string;
  pathColor: string;
  fillColor: string;
  maxZoom: number;
};

export type XyzProvider = ProviderStyle & {
  kind: 'xyz';
  id: Exclude<Background, 'none'>;
  template: string;           // {s} {z} {x} {y}
  subdomains: readonly string[];
};

export type SolidProvider = ProviderStyle & {
  kind: 'solid';
  id: 'none';
};

export type TileProvider = XyzProvider | SolidProvider;

const OSM_ATTRIBUTION = '© OpenStreetMap contributors';

export const TILE_PROVIDERS: Record<Background, TileProvider> = {
  'cartodb-positron': {
    kind: 'xyz',
    id: 'cartodb-positron',
    label: 'CARTO Positron',
    template: 'https://{s}.basemaps.cartocdn.com/light_all/{z}/{x}/{y}.png',
    subdomains: ['a', 'b', 'c', 'd'],
    attribution: `${OSM_ATTRIBUTION} © CARTO`,
    pathColor: '#d62728',
    fillColor: '#f2f2f0',
    maxZoom: 20,
  },
  'cartodb-dark': {
    kind: 'xyz',
    id: 'cartodb-dark',
    label: 'CARTO Dark Matter',
    template: 'https://{s}.basemaps.cartocdn.com/dark_all/{z}/{x}/{y}.png',
    subdomains: ['a', 'b', 'c', 'd'],
    attribution: `${OSM_ATTRIBUTION} © CARTO`,
    pathColor: '#ffd60a',
    fillColor: '#1b1b1d',
    maxZoom: 20,
  },
  osm: {
    kind: 'xyz',
    id: 'osm',
    label: 'OpenStreetMap',
    template: 'https://tile.openstreetmap.org/{z}/{x}/{y}.png',
    subdomains: [],
    attribution: OSM_ATTRIBUTION,
    pathColor: '#1f3fb4',
    fillColor: '#aad3df',
    maxZoom: 19,
  },
  'esri-imagery': {
    kind: 'xyz',
    id: 'esri-imagery',
    label: 'Esri World Imagery',
    template: 'https://server.arcgisonline.com/ArcGIS/rest/services/World_Imagery/MapServer/tile/{z}/{y}/{x}',
    subdomains: [],
    attribution: 'Tiles © Esri, Maxar, Earthstar Geographics',
    pathColor: '#ffea00',
    fillColor: '#0b1d2e',
    maxZoom: 18,
  },
  'esri-topo': {
    kind: 'xyz',
    id: 'esri-topo',
    label: 'Esri World Topographic',
    template: 'https://server.arcgisonline.com/ArcGIS/rest/services/World_Topo_Map/MapServer/tile/{z}/{y}/{x}',
    subdomains: [],
    attribution: 'Tiles © Esri',
    pathColor: '#c2185b',
    fillColor: '#e9efe4',
    maxZoom: 18,
  },
  none: {
    kind: 'solid',
    id: 'none',
    label: 'Plain',
    attribution: '',
    pathColor: '#d62728',
    fillColor: '#f4f4f2',
    maxZoom: 18,
  },
};

export function getTileProvider(background: Background): TileProvider {
  return TILE_PROVIDERS[background];
}

export function tileUrl(provider: XyzProvider, zoom: number, x: number, y: number): string {
  const sub = provider.subdomains.length > 0
    ? provider.subdomains[(x + y) % provider.subdomains.length]
    : '';
  return provider.template
    .replace('{s}', sub)
    .replace('{z}', String(zoom))
    .replace('{x}', String(x))
    .replace('{y}', String(y));
}

export type TileGridCell = {
  url: string;
  left: number;
  top: number;
};

export type TileGrid = {
  cells: TileGridCell[];
  width: number;
  height: number;
  extractLeft: number;
  extractTop: number;
};

/**
 * The tiles covering `view`, positioned on a mosaic canvas. Columns wrap
 * around the world; rows outside the world are left blank.
 */
export function planTileGrid(provider: XyzProvider, view: MapView): TileGrid {
  const n = 2 ** view.zoom;
  const firstX = Math.floor(view.originX / TILE_SIZE);
  const lastX = Math.floor((view.originX + view.width - 1) / TILE_SIZE);
  const firstY = Math.floor(view.originY / TILE_SIZE);
  const lastY = Math.floor((view.originY + view.height - 1) / TILE_SIZE);

  const cells: TileGridCell[] = [];
  for (let ty = firstY; ty <= lastY; ty++) {
    if (ty < 0 || ty >= n) continue;
    for (let tx = firstX; tx <= lastX; tx++) {
      const wrappedX = ((tx % n) + n) % n;
      cells.push({
        url: tileUrl(provider, view.zoom, wrappedX, ty),
        left: (tx - firstX) * TILE_SIZE,
        top: (ty - firstY) * TILE_SIZE,
      });
    }
  }

  return {
    cells,
    width: (lastX - firstX + 1) * TILE_SIZE,
    height: (lastY - firstY + 1) * TILE_SIZE,
    extractLeft: view.originX - firstX * TILE_SIZE,
    extractTop: view.originY - firstY * TILE_SIZE,
  };
}

// =============================================================================
// Fetching
// =============================================================================

export type TileFetcher = (url: string) => Promise<Buffer>;

export type TileContext = {
  fetchTile?: TileFetcher;
  cache?: TileCache | null;
  cacheTtlMs?: number;
  logger?: Logger;
};

const TILE_USER_AGENT = 'flightpath-export/1.0';

export const httpTileFetcher: TileFetcher = async (url) => {
  let res: Response;
  try {
    res = await fetch(url, {
      headers: { 'User-Agent': TILE_USER_AGENT, Accept: 'image/png,image/jpeg,image/*' },
      signal: AbortSignal.timeout(15000),
    });
  } catch (err) {
    throw new ConnectionError(`Tile request failed: ${url}`, { endpoint: url, cause: err });
  }
  if (!res.ok) {
    throw new ConnectionError(`Tile server returned HTTP ${res.status}`, { endpoint: url, statusCode: res.status });
  }
  return Buffer.from(await res.arrayBuffer());
};

const DEFAULT_TILE_TTL = 7 * 24 * 60 * 60 * 1000; // 7 days

/** Fetches a tile and re-encodes it as a TILE_SIZE PNG. Only decodable tiles reach the cache. */
export async function loadTile(url: string, ctx: TileContext): Promise<Buffer> {
  const cached = ctx.cache?.get(url) ?? null;
  if (cached) return cached;
  const data = await (ctx.fetchTile ?? httpTileFetcher)(url);
  let tile: Buffer;
  try {
    tile = await sharp(data).resize(TILE_SIZE, TILE_SIZE).png().toBuffer();
  } catch (err) {
    throw new ConnectionError(`Tile server sent an unreadable image: ${url}`, { endpoint: url, cause: err });
  }
  ctx.cache?.set(url, tile, ctx.cacheTtlMs ?? DEFAULT_TILE_TTL);
  return tile;
}

async function composeXyz(provider: XyzProvider, view: MapView, ctx: TileContext): Promise<Buffer> {
  const log = ctx.logger ?? createLogger({ tag: 'Tiles' });
  const grid = planTileGrid(provider, view);
  const layers: sharp.OverlayOptions[] = [];

  // One tile at a time
  for (const cell of grid.cells) {
    const tile = await loadTile(cell.url, ctx);
    layers.push({ input: tile, left: cell.left, top: cell.top });
  }
  log.debug(`${provider.label}: ${grid.cells.length} tiles at z${view.zoom}`);

  const mosaic = await sharp({
    create: { width: grid.width, height: grid.height, channels: 4, background: provider.fillColor },
  })
    .composite(layers)
    .png()
    .toBuffer();

  return sharp(mosaic)
    .extract({ left: grid.extractLeft, top: grid.extractTop, width: view.width, height: view.height })
    .png()
    .toBuffer();
}

export async function solidRaster(view: Pick<MapView, 'width' | 'height'>, color: string): Promise<Buffer> {
  return sharp({
    create: { width: view.width, height: view.height, channels: 4, background: color },
  })
    .png()
    .toBuffer();
}

/** Raster of exactly view.width × view.height for the given provider. */
export async function fetchBackgroundRaster(
  provider: TileProvider,
  view: MapView,
  ctx: TileContext = {},
): Promise<Buffer> {
  switch (provider.kind) {
    case 'solid':
      return solidRaster(view, provider.fillColor);
    case 'xyz':
      return composeXyz(provider, view, ctx);
  }
}
