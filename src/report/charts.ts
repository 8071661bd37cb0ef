import { describeError } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import type { CorpusStatistics, CountBucket } from '../types/index.js';
import { writeTimestampedFile } from './sink.js';

export type ChartOutcome =
  | { status: 'written'; path: string }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; reason: string };

export type DashboardRenderer = (stats: CorpusStatistics, title: string) => string;

export interface DashboardOptions {
  outputDir: string;
  filePrefix: string;
  title: string;
  generatedAt: Date;
  render?: DashboardRenderer;
  logger?: Logger;
}

interface Frame {
  x: number;
  y: number;
  width: number;
  height: number;
}

interface HistogramBin {
  from: number;
  to: number;
  count: number;
}

const PANEL_WIDTH = 600;
const PANEL_HEIGHT = 450;
const TITLE_HEIGHT = 50;
const PLOT_MARGIN = { top: 50, right: 30, bottom: 90, left: 60 };
const MAX_PIE_SLICES = 8;
const HISTOGRAM_BINS = 20;
const PALETTE = ['#4c78a8', '#f58518', '#e45756', '#72b7b2', '#54a24b', '#eeca3b', '#b279a2', '#ff9da6'];

/**
 * Renders the 2×2 dashboard and writes it beside the report. Rendering or
 * writing problems are logged and reported as `failed`; they never reach the
 * caller as exceptions.
 */
export async function writeDashboard(stats: CorpusStatistics, options: DashboardOptions): Promise<ChartOutcome> {
  if (stats.totalPosts === 0) {
    options.logger?.('No data to visualize.');
    return { status: 'skipped', reason: 'empty corpus' };
  }

  try {
    const render = options.render ?? renderDashboardSvg;
    const svg = render(stats, options.title);
    const target = await writeTimestampedFile(
      options.outputDir,
      `${options.filePrefix}_dashboard`,
      'svg',
      svg,
      options.generatedAt,
    );
    options.logger?.(`Dashboard saved to ${target}`);
    return { status: 'written', path: target };
  } catch (error) {
    const reason = describeError(error);
    options.logger?.(`Dashboard rendering failed: ${reason}`);
    return { status: 'failed', reason };
  }
}

export function renderDashboardSvg(stats: CorpusStatistics, title: string): string {
  const width = PANEL_WIDTH * 2;
  const height = PANEL_HEIGHT * 2 + TITLE_HEIGHT;
  const cell = (column: number, row: number): Frame => ({
    x: column * PANEL_WIDTH,
    y: TITLE_HEIGHT + row * PANEL_HEIGHT,
    width: PANEL_WIDTH,
    height: PANEL_HEIGHT,
  });

  const categoryBars = stats.categories.map((category) => ({ key: category.label, count: category.percentage ?? 0 }));

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="sans-serif">`,
    `<rect width="${width}" height="${height}" fill="#ffffff"/>`,
    text(width / 2, 32, title, { size: 22, anchor: 'middle', weight: 'bold' }),
    barPanel(cell(0, 0), 'Problems by Frequency (%)', '% of Posts', categoryBars, PALETTE[0] ?? '#4c78a8'),
    piePanel(cell(1, 0), 'Posts by Source', stats.sourceCounts.slice(0, MAX_PIE_SLICES)),
    linePanel(cell(0, 1), 'Posts Over Time', stats.monthlyCounts),
    histogramPanel(cell(1, 1), 'Post Score Distribution', histogram(stats.scores, HISTOGRAM_BINS)),
    '</svg>',
    '',
  ].join('\n');
}

export function histogram(values: readonly number[], binCount: number): HistogramBin[] {
  if (values.length === 0) {
    return [];
  }
  const min = Math.min(...values);
  const max = Math.max(...values);
  if (min === max) {
    return [{ from: min, to: max, count: values.length }];
  }

  const step = (max - min) / binCount;
  const bins = Array.from({ length: binCount }, (_, index) => ({
    from: min + index * step,
    to: min + (index + 1) * step,
    count: 0,
  }));
  for (const value of values) {
    const index = Math.min(binCount - 1, Math.floor((value - min) / step));
    const bin = bins[index];
    if (bin) {
      bin.count += 1;
    }
  }
  return bins;
}

function plotArea(frame: Frame): Frame {
  return {
    x: frame.x + PLOT_MARGIN.left,
    y: frame.y + PLOT_MARGIN.top,
    width: frame.width - PLOT_MARGIN.left - PLOT_MARGIN.right,
    height: frame.height - PLOT_MARGIN.top - PLOT_MARGIN.bottom,
  };
}

function panelTitle(frame: Frame, title: string): string {
  return text(frame.x + frame.width / 2, frame.y + 30, title, { size: 16, anchor: 'middle', weight: 'bold' });
}

function axes(area: Frame, maxValue: number, yLabel: string): string {
  const parts = [
    `<line x1="${area.x}" y1="${area.y + area.height}" x2="${area.x + area.width}" y2="${area.y + area.height}" stroke="#333"/>`,
    `<line x1="${area.x}" y1="${area.y}" x2="${area.x}" y2="${area.y + area.height}" stroke="#333"/>`,
    text(area.x - 40, area.y + area.height / 2, yLabel, { size: 11, anchor: 'middle', rotate: -90 }),
  ];
  for (let tick = 0; tick <= 4; tick += 1) {
    const value = (maxValue * tick) / 4;
    const y = area.y + area.height - (area.height * tick) / 4;
    parts.push(`<line x1="${area.x}" y1="${round(y)}" x2="${area.x + area.width}" y2="${round(y)}" stroke="#eeeeee"/>`);
    parts.push(text(area.x - 6, y + 4, formatTick(value), { size: 10, anchor: 'end' }));
  }
  return parts.join('\n');
}

function barPanel(frame: Frame, title: string, yLabel: string, bars: readonly CountBucket[], color: string): string {
  const area = plotArea(frame);
  const maxValue = Math.max(1, ...bars.map((bar) => bar.count));
  const slot = bars.length > 0 ? area.width / bars.length : area.width;
  const parts = [panelTitle(frame, title), axes(area, maxValue, yLabel)];
  bars.forEach((bar, index) => {
    const barHeight = (bar.count / maxValue) * area.height;
    const x = area.x + index * slot + slot * 0.15;
    const y = area.y + area.height - barHeight;
    parts.push(`<rect x="${round(x)}" y="${round(y)}" width="${round(slot * 0.7)}" height="${round(barHeight)}" fill="${color}"/>`);
    parts.push(text(x + slot * 0.35, area.y + area.height + 14, bar.key, { size: 10, anchor: 'end', rotate: -40 }));
  });
  return parts.join('\n');
}

function piePanel(frame: Frame, title: string, slices: readonly CountBucket[]): string {
  const total = slices.reduce((sum, slice) => sum + slice.count, 0);
  const radius = Math.min(frame.width, frame.height) * 0.3;
  const cx = frame.x + frame.width * 0.38;
  const cy = frame.y + frame.height / 2 + 15;
  const parts = [panelTitle(frame, title)];

  let angle = -Math.PI / 2;
  slices.forEach((slice, index) => {
    const color = PALETTE[index % PALETTE.length] ?? '#999999';
    const share = total === 0 ? 0 : slice.count / total;
    if (share >= 1) {
      parts.push(`<circle cx="${round(cx)}" cy="${round(cy)}" r="${round(radius)}" fill="${color}"/>`);
    } else if (share > 0) {
      const end = angle + share * Math.PI * 2;
      const largeArc = share > 0.5 ? 1 : 0;
      parts.push(
        `<path d="M ${round(cx)} ${round(cy)} L ${round(cx + radius * Math.cos(angle))} ${round(cy + radius * Math.sin(angle))} A ${round(radius)} ${round(radius)} 0 ${largeArc} 1 ${round(cx + radius * Math.cos(end))} ${round(cy + radius * Math.sin(end))} Z" fill="${color}" stroke="#ffffff"/>`,
      );
      angle = end;
    }

    const legendY = frame.y + 90 + index * 22;
    const legendX = frame.x + frame.width * 0.7;
    parts.push(`<rect x="${round(legendX)}" y="${legendY - 10}" width="12" height="12" fill="${color}"/>`);
    parts.push(text(legendX + 18, legendY, `${slice.key} (${(share * 100).toFixed(1)}%)`, { size: 11 }));
  });
  return parts.join('\n');
}

function linePanel(frame: Frame, title: string, points: readonly CountBucket[]): string {
  const area = plotArea(frame);
  const maxValue = Math.max(1, ...points.map((point) => point.count));
  const step = points.length > 1 ? area.width / (points.length - 1) : 0;
  const coordinates = points.map((point, index) => ({
    key: point.key,
    x: points.length > 1 ? area.x + index * step : area.x + area.width / 2,
    y: area.y + area.height - (point.count / maxValue) * area.height,
  }));

  const parts = [panelTitle(frame, title), axes(area, maxValue, 'Number of Posts')];
  if (coordinates.length > 1) {
    const path = coordinates.map((point) => `${round(point.x)},${round(point.y)}`).join(' ');
    parts.push(`<polyline points="${path}" fill="none" stroke="${PALETTE[0] ?? '#4c78a8'}" stroke-width="2"/>`);
  }
  for (const point of coordinates) {
    parts.push(`<circle cx="${round(point.x)}" cy="${round(point.y)}" r="4" fill="${PALETTE[0] ?? '#4c78a8'}"/>`);
    parts.push(text(point.x, area.y + area.height + 14, point.key, { size: 10, anchor: 'end', rotate: -45 }));
  }
  parts.push(text(area.x + area.width / 2, frame.y + frame.height - 10, 'Month', { size: 11, anchor: 'middle' }));
  return parts.join('\n');
}

function histogramPanel(frame: Frame, title: string, bins: readonly HistogramBin[]): string {
  const area = plotArea(frame);
  const maxValue = Math.max(1, ...bins.map((bin) => bin.count));
  const width = bins.length > 0 ? area.width / bins.length : area.width;
  const color = PALETTE[2] ?? '#e45756';
  const parts = [panelTitle(frame, title), axes(area, maxValue, 'Number of Posts')];
  bins.forEach((bin, index) => {
    const barHeight = (bin.count / maxValue) * area.height;
    const x = area.x + index * width;
    parts.push(
      `<rect x="${round(x)}" y="${round(area.y + area.height - barHeight)}" width="${round(width)}" height="${round(barHeight)}" fill="${color}" fill-opacity="0.7" stroke="#ffffff"/>`,
    );
  });
  const first = bins[0];
  const last = bins[bins.length - 1];
  if (first && last) {
    parts.push(text(area.x, area.y + area.height + 16, formatTick(first.from), { size: 10, anchor: 'middle' }));
    parts.push(text(area.x + area.width, area.y + area.height + 16, formatTick(last.to), { size: 10, anchor: 'middle' }));
  }
  parts.push(text(area.x + area.width / 2, frame.y + frame.height - 10, 'Upvotes', { size: 11, anchor: 'middle' }));
  return parts.join('\n');
}

interface TextStyle {
  size: number;
  anchor?: 'start' | 'middle' | 'end';
  weight?: 'bold';
  rotate?: number;
}

function text(x: number, y: number, content: string, style: TextStyle): string {
  const transform = style.rotate ? ` transform="rotate(${style.rotate} ${round(x)} ${round(y)})"` : '';
  const weight = style.weight ? ` font-weight="${style.weight}"` : '';
  return `<text x="${round(x)}" y="${round(y)}" font-size="${style.size}" text-anchor="${style.anchor ?? 'start'}"${weight}${transform}>${escapeXml(content)}</text>`;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function formatTick(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(1);
}

function round(value: number): number {
  return Math.round(value * 10) / 10;
}
