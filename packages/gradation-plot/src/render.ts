import { Resvg } from "@resvg/resvg-js";
import { RenderError, type GradationCurve, type SieveScale } from "gradation-core";
import { DEFAULT_PALETTES } from "./palette";
import { buildPlotSvg, sampleSeries } from "./svg";
import type { PlotArtifact, PlotOptions } from "./types";

export const DEFAULT_PLOT_OPTIONS: PlotOptions = {
  format: "png",
  width: 1200,
  height: 800,
  resolution: 200,
  palette: "color",
  palettes: DEFAULT_PALETTES,
  title: "Particle Size Distribution",
  units: "mm",
};

export function rasterize(svg: string, width: number): Buffer {
  const resvg = new Resvg(svg, {
    fitTo: { mode: "width", value: width },
    background: "#ffffff",
    font: { loadSystemFonts: true, defaultFontFamily: "sans-serif" },
  });
  return resvg.render().asPng();
}

/**
 * Draw every curve on one semi-log chart. Colours follow input order, so the
 * same request always yields the same picture.
 */
export async function renderPlot(
  curves: readonly GradationCurve[],
  scale: SieveScale,
  options: Partial<PlotOptions> = {}
): Promise<PlotArtifact> {
  if (curves.length === 0) {
    throw new RenderError("No curves to plot");
  }
  const opts: PlotOptions = { ...DEFAULT_PLOT_OPTIONS, ...options };
  const series = sampleSeries(curves, scale, opts);
  const svg = buildPlotSvg(series, scale, opts);

  if (opts.format === "svg") {
    return {
      mimeType: "image/svg+xml",
      data: Buffer.from(svg, "utf8").toString("base64"),
      width: opts.width,
      height: opts.height,
      series,
    };
  }

  const png = rasterize(svg, opts.width);
  return {
    mimeType: "image/png",
    data: png.toString("base64"),
    width: opts.width,
    height: opts.height,
    series,
  };
}
