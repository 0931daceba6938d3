export { renderPlot, rasterize, DEFAULT_PLOT_OPTIONS } from "./render";
export { buildPlotSvg, sampleSeries, logGrid, escapeXml, formatSize, formatParameter } from "./svg";
export { colorFor, DEFAULT_PALETTES } from "./palette";
export type { PaletteName, Palettes } from "./palette";
export type { PlotArtifact, PlotFormat, PlotOptions, PlotSeries, SeriesSummary } from "./types";
