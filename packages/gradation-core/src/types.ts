export type InterpolationMethod = "linear" | "cubic" | "nearest";

export const INTERPOLATION_METHODS = ["linear", "cubic", "nearest"] as const satisfies readonly InterpolationMethod[];

/** A sieve reading. Absent is its own variant, never a numeric sentinel. */
export type Reading =
  | { kind: "measured"; value: number }
  | { kind: "absent" };

export const measured = (value: number): Reading => ({ kind: "measured", value });
export const ABSENT: Reading = { kind: "absent" };

/** Wire form: `null` marks an absent reading. */
export function readingFromWire(v: number | null): Reading {
  return v === null ? ABSENT : measured(v);
}

export interface SampleInput {
  name: string;
  /** One reading per sieve, aligned to the scale (coarse → fine). */
  readings: readonly Reading[];
}

export interface KnownPoint {
  size: number;   // mm
  percent: number;
}

export interface FilledPoint extends KnownPoint {
  /** false when the reading was absent and the value comes from the interpolant */
  measured: boolean;
}

export interface GradationParameters {
  d10: number | null;
  d30: number | null;
  d60: number | null;
  cu: number | null;
  cc: number | null;
}

export type Grade = "well-graded" | "poorly-graded" | "insufficient-data";

export interface Classification {
  grade: Grade;
  reasons: string[];
}

export interface ClassificationThresholds {
  /** Cu must exceed this for a well-graded soil */
  minCu: number;
  minCc: number;
  maxCc: number;
}
