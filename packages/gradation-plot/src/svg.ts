import type { GradationCurve, KnownPoint, SieveScale } from "gradation-core";
import { colorFor } from "./palette";
import type { PlotOptions, PlotSeries } from "./types";

const MARGIN = { top: 56, right: 220, bottom: 64, left: 72 };
const Y_TICKS = [0, 10, 20, 30, 40, 50, 60, 70, 80, 90, 100];
const LEGEND_ROW = 22;
const SUMMARY_LINE = 15;

/** Geometric grid from scale.min to scale.max; endpoints are the exact sieve sizes. */
export function logGrid(scale: SieveScale, n: number): number[] {
  const lo = Math.log10(scale.min);
  const hi = Math.log10(scale.max);
  return Array.from({ length: n }, (_, k) => {
    if (k === 0) return scale.min;
    if (k === n - 1) return scale.max;
    return Math.pow(10, lo + (k * (hi - lo)) / (n - 1));
  });
}

export function sampleSeries(
  curves: readonly GradationCurve[],
  scale: SieveScale,
  opts: Pick<PlotOptions, "resolution" | "palette" | "palettes" | "indices" | "summaries">
): PlotSeries[] {
  if (opts.indices && opts.indices.length !== curves.length) {
    throw new Error(`Expected ${curves.length} curve indices, got ${opts.indices.length}`);
  }
  if (opts.summaries && opts.summaries.length !== curves.length) {
    throw new Error(`Expected ${curves.length} parameter summaries, got ${opts.summaries.length}`);
  }
  const grid = logGrid(scale, Math.max(2, opts.resolution));
  const palette = opts.palettes[opts.palette];
  return curves.map((curve, i) => {
    const index = opts.indices ? opts.indices[i] : i;
    return {
      index,
      name: curve.name,
      color: colorFor(index, palette),
      points: grid.map((size) => ({ size, percent: curve.percentPassingAt(size) })),
      markers: curve.filledPoints(),
      summary: opts.summaries?.[i],
    };
  });
}

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** 4.750 → "4.75", 10 → "10" */
export function formatSize(size: number): string {
  return String(Number(size.toFixed(3)));
}

/** null → "N/A" */
export function formatParameter(v: number | null): string {
  return v === null ? "N/A" : String(Number(v.toFixed(3)));
}

const fx = (v: number) => v.toFixed(2);

interface Frame {
  x: (size: number) => number;
  y: (percent: number) => number;
  left: number;
  right: number;
  top: number;
  bottom: number;
}

function frameFor(scale: SieveScale, width: number, height: number): Frame {
  const left = MARGIN.left;
  const right = width - MARGIN.right;
  const top = MARGIN.top;
  const bottom = height - MARGIN.bottom;
  const lo = Math.log10(scale.min);
  const hi = Math.log10(scale.max);
  return {
    // fine sizes on the left
    x: (size) => left + ((Math.log10(size) - lo) / (hi - lo)) * (right - left),
    y: (percent) => bottom - (percent / 100) * (bottom - top),
    left,
    right,
    top,
    bottom,
  };
}

function pathOf(points: readonly KnownPoint[], f: Frame): string {
  return points.map((p, i) => `${i === 0 ? "M" : "L"}${fx(f.x(p.size))},${fx(f.y(p.percent))}`).join(" ");
}

function axes(scale: SieveScale, f: Frame, opts: PlotOptions): string[] {
  const out: string[] = [];
  for (const t of Y_TICKS) {
    const y = fx(f.y(t));
    out.push(`<line class="grid" x1="${fx(f.left)}" y1="${y}" x2="${fx(f.right)}" y2="${y}" stroke="#d9d9d9" stroke-width="1"/>`);
    out.push(`<text x="${fx(f.left - 8)}" y="${y}" font-size="12" text-anchor="end" dominant-baseline="middle">${t}</text>`);
  }
  for (const size of scale.sizes) {
    const x = fx(f.x(size));
    out.push(`<line class="grid" x1="${x}" y1="${fx(f.top)}" x2="${x}" y2="${fx(f.bottom)}" stroke="#d9d9d9" stroke-width="1"/>`);
    out.push(
      `<text x="${x}" y="${fx(f.bottom + 18)}" font-size="11" text-anchor="middle">${formatSize(size)}</text>`
    );
  }
  out.push(
    `<rect x="${fx(f.left)}" y="${fx(f.top)}" width="${fx(f.right - f.left)}" height="${fx(f.bottom - f.top)}" fill="none" stroke="#333333" stroke-width="1"/>`
  );
  out.push(
    `<text x="${fx((f.left + f.right) / 2)}" y="${fx(f.bottom + 44)}" font-size="14" font-weight="bold" text-anchor="middle">Particle Size (${escapeXml(opts.units)})</text>`
  );
  out.push(
    `<text transform="translate(${fx(f.left - 48)},${fx((f.top + f.bottom) / 2)}) rotate(-90)" font-size="14" font-weight="bold" text-anchor="middle">Percent Passing (%)</text>`
  );
  out.push(
    `<text x="${fx((f.left + f.right) / 2)}" y="${fx(f.top - 20)}" font-size="16" font-weight="bold" text-anchor="middle">${escapeXml(opts.title)}</text>`
  );
  return out;
}

function markers(s: PlotSeries, f: Frame): string[] {
  return s.markers.map((m) => {
    const x = fx(f.x(m.size));
    const y = fx(f.y(m.percent));
    return m.measured
      ? `<circle cx="${x}" cy="${y}" r="4" fill="${s.color}"/>`
      : `<rect x="${fx(f.x(m.size) - 4)}" y="${fx(f.y(m.percent) - 4)}" width="8" height="8" fill="none" stroke="${s.color}" stroke-width="1.5"/>`;
  });
}

function legend(series: readonly PlotSeries[], f: Frame): string[] {
  const x0 = f.right + 20;
  return series.flatMap((s, i) => {
    const y = f.top + 12 + i * LEGEND_ROW;
    return [
      `<line x1="${fx(x0)}" y1="${fx(y)}" x2="${fx(x0 + 24)}" y2="${fx(y)}" stroke="${s.color}" stroke-width="2.5"/>`,
      `<text class="legend" x="${fx(x0 + 32)}" y="${fx(y)}" font-size="12" dominant-baseline="middle">${escapeXml(s.name)}</text>`,
    ];
  });
}

function summaryLines(s: PlotSeries, units: string): string[] {
  if (!s.summary) return [];
  const { parameters: p, grade } = s.summary;
  const u = escapeXml(units);
  const size = (v: number | null) => (v === null ? "N/A" : `${formatParameter(v)} ${u}`);
  return [
    `D10 = ${size(p.d10)}`,
    `D30 = ${size(p.d30)}`,
    `D60 = ${size(p.d60)}`,
    `Cu = ${formatParameter(p.cu)}, Cc = ${formatParameter(p.cc)}`,
    grade.replace(/-/g, " "),
  ];
}

/** Per-sample D-values, coefficients and grade, stacked under the legend. */
function summaries(series: readonly PlotSeries[], f: Frame, units: string): string[] {
  const x0 = f.right + 20;
  let y = f.top + 12 + series.length * LEGEND_ROW + 12;
  const out: string[] = [];
  for (const s of series) {
    const lines = summaryLines(s, units);
    if (lines.length === 0) continue;
    out.push(
      `<text class="summary" x="${fx(x0)}" y="${fx(y)}" font-size="12" font-weight="bold" fill="${s.color}">${escapeXml(s.name)}</text>`
    );
    for (const line of lines) {
      y += SUMMARY_LINE;
      out.push(`<text class="summary" x="${fx(x0 + 8)}" y="${fx(y)}" font-size="11">${line}</text>`);
    }
    y += SUMMARY_LINE + 8;
  }
  return out;
}

export function buildPlotSvg(series: readonly PlotSeries[], scale: SieveScale, opts: PlotOptions): string {
  const f = frameFor(scale, opts.width, opts.height);
  const body = [
    `<rect width="100%" height="100%" fill="#ffffff"/>`,
    ...axes(scale, f, opts),
    ...series.flatMap((s) => [
      `<path class="series" data-index="${s.index}" d="${pathOf(s.points, f)}" fill="none" stroke="${s.color}" stroke-width="2" stroke-linejoin="round"/>`,
      ...markers(s, f),
    ]),
    ...legend(series, f),
    ...summaries(series, f, opts.units),
  ];
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${opts.width}" height="${opts.height}" viewBox="0 0 ${opts.width} ${opts.height}" font-family="sans-serif">`,
    ...body.map((l) => `  ${l}`),
    `</svg>`,
  ].join("\n");
}
