// =============================================================================
// Time-series charts — ground speed and altitude
//
// echarts renders server-side to SVG; sharp rasterizes the SVG at 2× density.
// Tick spacing follows flight duration, tick labels use a 12-hour clock in the
// track's timezone, and missing telemetry is drawn as a gap, not as zero.
// =============================================================================

import * as echarts from 'echarts';
import sharp from 'sharp';
import { trackDuration } from './normalize.js';
import { formatClockTime, formatLongDate, zoneAbbreviation } from './timezone.js';
import type { TrackPoint, TrackSet } from './types.js';

export const CHART_SIZE = { width: 1600, height: 900 } as const;
export const CHART_DENSITY = 144; // 2× the 72 dpi SVG baseline → 3200 × 1800 PNG

const MINUTE = 60 * 1000;
export const SHORT_FLIGHT_THRESHOLD_MS = 3 * 60 * MINUTE;

export type ChartKind = 'speed' | 'altitude';

type ChartSpec = {
  metric: string;
  field: 'gspeed' | 'alt';
  unit: string;
  color: string;
};

const CHART_SPECS: Record<ChartKind, ChartSpec> = {
  speed: { metric: 'ground speed', field: 'gspeed', unit: 'kts', color: '#1f77b4' },
  altitude: { metric: 'altitude', field: 'alt', unit: 'ft', color: '#2ca02c' },
};

/** 30-minute ticks up to the short-flight threshold, hourly beyond it. */
export function selectTickInterval(durationMs: number): number {
  return durationMs <= SHORT_FLIGHT_THRESHOLD_MS ? 30 * MINUTE : 60 * MINUTE;
}

export function alignedTimeRange(startMs: number, endMs: number, intervalMs: number): { min: number; max: number } {
  const min = Math.floor(startMs / intervalMs) * intervalMs;
  const max = Math.max(Math.ceil(endMs / intervalMs) * intervalMs, min + intervalMs);
  return { min, max };
}

export function timeTicks(min: number, max: number, intervalMs: number): number[] {
  const ticks: number[] = [];
  for (let t = min; t <= max; t += intervalMs) ticks.push(t);
  return ticks;
}

const thousands = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** 35000 → "35,000" */
export function formatThousands(value: number): string {
  return thousands.format(value);
}

/** echarts treats "-" as a missing value, which breaks the line there. */
export function seriesData(points: readonly TrackPoint[], field: ChartSpec['field']): [number, number | '-'][] {
  return points.map(p => {
    const value = p[field];
    return [p.epochMs, value === null ? '-' : value];
  });
}

export type ChartContext = {
  /** Flight number, callsign or ID shown at the start of the title. */
  headline: string;
};

/**
 * "UA1930 altitude", with the zone abbreviation appended only when the
 * track was converted out of UTC.
 */
export function chartTitle(kind: ChartKind, headline: string, trackSet: TrackSet): string {
  const base = `${headline} ${CHART_SPECS[kind].metric}`;
  if (trackSet.timezone === null || trackSet.points.length === 0) return base;
  return `${base} (${zoneAbbreviation(trackSet.points[0].epochMs, trackSet.timezone)})`;
}

export function buildChartOption(kind: ChartKind, trackSet: TrackSet, ctx: ChartContext): echarts.EChartsOption {
  const spec = CHART_SPECS[kind];
  const { points, timezone } = trackSet;
  const first = points[0].epochMs;
  const last = points[points.length - 1].epochMs;
  const interval = selectTickInterval(trackDuration(trackSet));
  const { min, max } = alignedTimeRange(first, last, interval);
  const axisZone = timezone === null ? 'UTC' : zoneAbbreviation(first, timezone);

  return {
    animation: false,
    backgroundColor: '#ffffff',
    title: {
      text: chartTitle(kind, ctx.headline, trackSet),
      subtext: formatLongDate(first, timezone),
      left: 'center',
      top: 18,
      textStyle: { fontSize: 30, fontWeight: 'bold', color: '#222222' },
      subtextStyle: { fontSize: 18, color: '#555555' },
    },
    grid: { left: 130, right: 60, top: 120, bottom: 100 },
    xAxis: {
      type: 'value',
      min,
      max,
      interval,
      name: `Time (${axisZone})`,
      nameLocation: 'middle',
      nameGap: 50,
      nameTextStyle: { fontSize: 18 },
      axisLabel: {
        fontSize: 16,
        formatter: (value: number) => formatClockTime(value, timezone),
      },
      splitLine: { show: true, lineStyle: { color: '#e5e5e5' } },
    },
    yAxis: {
      type: 'value',
      min: 0,
      name: `${spec.metric[0].toUpperCase()}${spec.metric.slice(1)} (${spec.unit})`,
      nameLocation: 'middle',
      nameGap: 95,
      nameTextStyle: { fontSize: 18 },
      axisLabel: {
        fontSize: 16,
        formatter: (value: number) => `${formatThousands(value)} ${spec.unit}`,
      },
      splitLine: { lineStyle: { color: '#e5e5e5' } },
    },
    series: [
      {
        type: 'line',
        name: spec.metric,
        data: seriesData(points, spec.field),
        showSymbol: false,
        connectNulls: false,
        lineStyle: { width: 3, color: spec.color },
        itemStyle: { color: spec.color },
        areaStyle: { opacity: 0.08, color: spec.color },
      },
    ],
  };
}

export function renderChartSvg(
  option: echarts.EChartsOption,
  size: { width: number; height: number } = CHART_SIZE,
): string {
  const chart = echarts.init(null, null, {
    renderer: 'svg',
    ssr: true,
    width: size.width,
    height: size.height,
  });
  try {
    chart.setOption(option);
    return chart.renderToSVGString();
  } finally {
    chart.dispose();
  }
}

export async function rasterizeSvg(svg: string, density: number = CHART_DENSITY): Promise<Buffer> {
  return sharp(Buffer.from(svg), { density }).png().toBuffer();
}

export async function renderTrackChart(kind: ChartKind, trackSet: TrackSet, ctx: ChartContext): Promise<Buffer> {
  return rasterizeSvg(renderChartSvg(buildChartOption(kind, trackSet, ctx)));
}
