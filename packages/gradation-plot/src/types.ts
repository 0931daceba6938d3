import type { FilledPoint, Grade, GradationParameters, KnownPoint } from "gradation-core";
import type { PaletteName, Palettes } from "./palette";

export type PlotFormat = "png" | "svg";

export interface PlotOptions {
  format: PlotFormat;
  width: number;
  height: number;
  /** Points per curve across the axis */
  resolution: number;
  palette: PaletteName;
  palettes: Palettes;
  /** Input position of each curve; drives colour. Defaults to 0..n-1. */
  indices?: readonly number[];
  /** Parameter block per curve, same order as the curves. Omitted: no block. */
  summaries?: readonly SeriesSummary[];
  title: string;
  units: string;
}

export interface SeriesSummary {
  parameters: GradationParameters;
  grade: Grade;
}

export interface PlotSeries {
  index: number;
  name: string;
  color: string;
  /** Sampled curve, fine → coarse */
  points: KnownPoint[];
  /** One marker per sieve; hollow where the reading was absent */
  markers: FilledPoint[];
  summary?: SeriesSummary;
}

export interface PlotArtifact {
  mimeType: "image/png" | "image/svg+xml";
  /** base64 */
  data: string;
  width: number;
  height: number;
  series: PlotSeries[];
}
