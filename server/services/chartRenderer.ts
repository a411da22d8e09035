/**
 * Chart Renderer
 *
 * Turns the markdown tables of a model reply into PNG charts for
 * /chart-day and /chart-hr. A table with a numeric column is drawn as a bar,
 * line or pie chart (d3 computes the geometry, sharp rasterizes the SVG)
 * and replaced in the text by a `[Chart N: Type]` placeholder. Tables that
 * cannot be charted stay as text.
 */

import {
  arc as d3Arc,
  line as d3Line,
  max as d3Max,
  min as d3Min,
  pie as d3Pie,
  scaleBand,
  scaleLinear,
  type PieArcDatum,
  type ScaleLinear,
} from "d3";
import sharp from "sharp";
import { CHART_CONSTANTS } from "../config/constants";
import type { Visualization } from "../coordinator/types";
import { getErrorMessage } from "../utils/errorHandler";
import { logInfo, logWarn } from "../utils/logger";

export type ChartType = "bar" | "line" | "pie";

export interface ChartTable {
  headers: string[];
  rows: string[][];
}

export type RenderPng = (svg: string) => Promise<Uint8Array>;

export interface ExtractedCharts {
  text: string;
  visualizations: Visualization[];
}

// header row, separator row, then one or more data rows
const TABLE_PATTERN = /^\|.+\|[ \t]*\r?\n\|[ \t:|-]+\|[ \t]*(?:\r?\n\|.+\|[ \t]*)+/gm;

const TIME_LABEL =
  /\d{1,2}:\d{2}|\d{4}-\d{2}-\d{2}|\b\d{1,2}\s?(?:am|pm)\b|\b(?:mon|tues?|wed(?:nes)?|thu(?:rs)?|fri|sat(?:ur)?|sun)(?:day)?\b|\b(?:hour|day|week|month)s?\b/i;

const TYPE_LABELS: Record<ChartType, string> = { bar: "Bar", line: "Line", pie: "Pie" };

const BACKGROUND = "#000000";
const FOREGROUND = "#FCFCFA";
const PALETTE = ["#49CAE4", "#BCDF59", "#A093E2", "#FFCA58", "#FF7272", "#AEE8F4", "#64D2E8", "#C6E472"];

const MARGIN = { top: 48, right: 24, bottom: 72, left: 64 };

function splitRow(line: string): string[] {
  return line
    .trim()
    .replace(/^\|/, "")
    .replace(/\|$/, "")
    .split("|")
    .map((cell) => cell.trim());
}

export function parseMarkdownTable(text: string): ChartTable | null {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (lines.length < 3) {
    return null;
  }

  const headers = splitRow(lines[0]);
  if (headers.length < 2) {
    return null;
  }
  const rows = lines.slice(2).map(splitRow).filter((cells) => cells.length === headers.length);
  return rows.length > 0 ? { headers, rows } : null;
}

/**
 * Reads `1,234`, `45%`, `$3.50` or `**12**` directly, and the first number
 * of text such as `High (85)`.
 */
export function parseNumber(cell: string): number | null {
  const cleaned = cell.replace(/[%,$€£*]/g, "").trim();
  if (cleaned === "") {
    return null;
  }
  const direct = Number(cleaned);
  if (Number.isFinite(direct)) {
    return direct;
  }
  const match = /-?\d+(?:\.\d+)?/.exec(cleaned);
  return match ? Number(match[0]) : null;
}

/** Columns after the first where at least half the cells are numbers. */
function numericColumns(table: ChartTable): number[] {
  const columns: number[] = [];
  for (let i = 1; i < table.headers.length; i++) {
    const parsed = table.rows.filter((row) => parseNumber(row[i]) !== null).length;
    if (parsed * 2 >= table.rows.length) {
      columns.push(i);
    }
  }
  return columns;
}

function columnValues(table: ChartTable, column: number): number[] {
  return table.rows.map((row) => parseNumber(row[column]) ?? 0);
}

/**
 * @returns the chart that fits the table, or null when no column is numeric
 */
export function inferChartType(table: ChartTable): ChartType | null {
  const numeric = numericColumns(table);
  if (numeric.length === 0) {
    return null;
  }

  if (table.headers.length === 2) {
    const cells = table.rows.map((row) => row[1]);
    const total = columnValues(table, 1).reduce((sum, value) => sum + value, 0);
    if (cells.every((cell) => cell.includes("%")) && total >= 95 && total <= 105) {
      return "pie";
    }
    const timeRows = table.rows.filter((row) => TIME_LABEL.test(row[0])).length;
    if (timeRows * 2 > table.rows.length && table.rows.length >= 3) {
      return "line";
    }
    return "bar";
  }

  return numeric.length >= 2 ? "line" : "bar";
}

export function chartTitle(table: ChartTable, type: ChartType): string {
  const category = table.headers[0];
  const numeric = numericColumns(table);
  const value = table.headers[numeric[0] ?? 1];

  switch (type) {
    case "pie":
      return `${value} Distribution by ${category}`;
    case "line":
      return numeric.length >= 2 ? `Multi-Metric Trends Over ${category}` : `${value} Trends Over ${category}`;
    default:
      return `${value} by ${category}`;
  }
}

function escapeXml(text: string): string {
  return text.replace(/[<>&"']/g, (c) => `&#${c.charCodeAt(0)};`);
}

function truncate(label: string, max = 14): string {
  return label.length > max ? `${label.slice(0, max - 1)}…` : label;
}

function text(x: number, y: number, content: string, attrs = ""): string {
  return `<text x="${x}" y="${y}" fill="${FOREGROUND}" font-size="12" ${attrs}>${escapeXml(content)}</text>`;
}

function valueScale(values: number[]): ScaleLinear<number, number> {
  const low = Math.min(0, d3Min(values) ?? 0);
  const high = Math.max(0, d3Max(values) ?? 0);
  return scaleLinear()
    .domain([low, high === low ? low + 1 : high])
    .nice()
    .range([CHART_CONSTANTS.HEIGHT - MARGIN.bottom, MARGIN.top]);
}

function valueAxis(y: ScaleLinear<number, number>): string[] {
  const baseline = `<line x1="${MARGIN.left}" y1="${y(0)}" x2="${CHART_CONSTANTS.WIDTH - MARGIN.right}" y2="${y(0)}" stroke="${FOREGROUND}"/>`;
  const ticks = y.ticks(5).map((tick) => text(MARGIN.left - 8, y(tick) + 4, String(tick), `text-anchor="end"`));
  return [baseline, ...ticks];
}

function renderBars(table: ChartTable, column: number): string[] {
  const values = columnValues(table, column);
  const x = scaleBand<number>()
    .domain(values.map((_, i) => i))
    .range([MARGIN.left, CHART_CONSTANTS.WIDTH - MARGIN.right])
    .padding(0.2);
  const y = valueScale(values);
  const zero = y(0);
  const labelY = CHART_CONSTANTS.HEIGHT - MARGIN.bottom + 18;

  const bars = values.map((value, i) => {
    const left = x(i) ?? MARGIN.left;
    return `<rect x="${left}" y="${y(Math.max(0, value))}" width="${x.bandwidth()}" height="${Math.abs(y(value) - zero)}" fill="${PALETTE[i % PALETTE.length]}"/>`;
  });
  const labels = table.rows.map((row, i) =>
    text((x(i) ?? MARGIN.left) + x.bandwidth() / 2, labelY, truncate(row[0]), `text-anchor="middle"`),
  );
  return [...valueAxis(y), ...bars, ...labels];
}

function renderLines(table: ChartTable, columns: number[]): string[] {
  const series = columns.map((column) => ({ name: table.headers[column], values: columnValues(table, column) }));
  const x = scaleLinear()
    .domain([0, Math.max(1, table.rows.length - 1)])
    .range([MARGIN.left + 16, CHART_CONSTANTS.WIDTH - MARGIN.right - 16]);
  const y = valueScale(series.flatMap((s) => s.values));
  const path = d3Line<number>()
    .x((_, i) => x(i))
    .y((value) => y(value));
  const labelY = CHART_CONSTANTS.HEIGHT - MARGIN.bottom + 18;

  const body = valueAxis(y);
  series.forEach((s, index) => {
    const color = PALETTE[index % PALETTE.length];
    body.push(`<path d="${path(s.values) ?? ""}" fill="none" stroke="${color}" stroke-width="3"/>`);
    s.values.forEach((value, i) => body.push(`<circle cx="${x(i)}" cy="${y(value)}" r="4" fill="${color}"/>`));
    body.push(`<text x="${MARGIN.left + index * 160}" y="${CHART_CONSTANTS.HEIGHT - 16}" fill="${color}" font-size="13">${escapeXml(truncate(s.name, 18))}</text>`);
  });
  table.rows.forEach((row, i) => body.push(text(x(i), labelY, truncate(row[0], 10), `text-anchor="middle"`)));
  return body;
}

function renderPie(table: ChartTable, column: number): string[] {
  const values = columnValues(table, column).map((value) => Math.max(0, value));
  const radius = (CHART_CONSTANTS.HEIGHT - MARGIN.top - 40) / 2;
  const cx = CHART_CONSTANTS.WIDTH / 2 - 120;
  const cy = MARGIN.top + radius + 8;
  const slices = d3Pie<number>().sort(null)(values);
  const arc = d3Arc<PieArcDatum<number>>().innerRadius(0).outerRadius(radius);
  const legendX = cx + radius + 40;

  return slices.flatMap((slice, i) => {
    const color = PALETTE[i % PALETTE.length];
    const legendY = MARGIN.top + i * 24;
    return [
      `<path d="${arc(slice) ?? ""}" transform="translate(${cx},${cy})" fill="${color}" stroke="${BACKGROUND}"/>`,
      `<rect x="${legendX}" y="${legendY}" width="14" height="14" fill="${color}"/>`,
      text(legendX + 22, legendY + 12, `${truncate(table.rows[i][0], 24)} (${table.rows[i][column]})`),
    ];
  });
}

export function renderChartSvg(table: ChartTable, type: ChartType, title = chartTitle(table, type)): string {
  const numeric = numericColumns(table);
  const first = numeric[0] ?? 1;
  let body: string[];
  switch (type) {
    case "pie":
      body = renderPie(table, first);
      break;
    case "line":
      body = renderLines(table, numeric.length > 0 ? numeric : [first]);
      break;
    default:
      body = renderBars(table, first);
  }

  const { WIDTH, HEIGHT } = CHART_CONSTANTS;
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="DejaVu Sans Mono, monospace">`,
    `<rect width="100%" height="100%" fill="${BACKGROUND}"/>`,
    `<text x="${WIDTH / 2}" y="28" fill="${FOREGROUND}" font-size="18" text-anchor="middle">${escapeXml(title)}</text>`,
    ...body,
    "</svg>",
  ].join("\n");
}

export const svgToPng: RenderPng = (svg) => sharp(Buffer.from(svg)).png().toBuffer();

/**
 * Replace each chartable table with a placeholder and return the rendered
 * images in the same order. A table that fails to render stays as text.
 */
export async function extractCharts(content: string, renderPng: RenderPng = svgToPng): Promise<ExtractedCharts> {
  const tables = content.match(TABLE_PATTERN) ?? [];
  const visualizations: Visualization[] = [];
  let result = content;

  for (const tableText of tables) {
    if (visualizations.length >= CHART_CONSTANTS.MAX_CHARTS) break;
    const table = parseMarkdownTable(tableText);
    if (!table) continue;
    const type = inferChartType(table);
    if (!type) continue;

    const index = visualizations.length + 1;
    const title = chartTitle(table, type);
    try {
      const data = await renderPng(renderChartSvg(table, type, title));
      visualizations.push({ filename: `chart-${index}.png`, data, description: title });
      result = result.replace(tableText, `[Chart ${index}: ${TYPE_LABELS[type]}]`);
    } catch (err) {
      logWarn("[Charts] Failed to render table", { table: index, error: getErrorMessage(err) });
    }
  }

  if (visualizations.length > 0) {
    logInfo(`[Charts] Rendered ${visualizations.length} of ${tables.length} table(s)`);
  }
  return { text: result, visualizations };
}
