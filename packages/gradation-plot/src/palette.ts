export type PaletteName = "color" | "grayscale";

export type Palettes = Record<PaletteName, readonly string[]>;

export const DEFAULT_PALETTES: Palettes = {
  color: [
    "#1f77b4", "#ff7f0e", "#2ca02c", "#d62728", "#9467bd",
    "#8c564b", "#e377c2", "#7f7f7f", "#bcbd22", "#17becf",
  ],
  grayscale: ["#000000", "#404040", "#808080", "#b0b0b0"],
};

/** Colour by input position; wraps when there are more samples than colours. */
export function colorFor(index: number, palette: readonly string[]): string {
  if (palette.length === 0) throw new Error("Palette must contain at least one colour");
  return palette[index % palette.length];
}
