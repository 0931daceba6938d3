import { DEFAULT_THRESHOLDS } from "./constants";
import type { GradationCurve } from "./curve";
import { OutOfRangeError } from "./errors";
import type { Classification, ClassificationThresholds, GradationParameters } from "./types";

function sizeOrNull(curve: GradationCurve, percent: number): number | null {
  try {
    return curve.sizeAtPercent(percent);
  } catch (err) {
    if (err instanceof OutOfRangeError) return null;
    throw err;
  }
}

/**
 * D10/D30/D60 by inverse lookup, each independently; Cu and Cc only when all
 * three are defined.
 */
export function extractParameters(curve: GradationCurve): GradationParameters {
  const d10 = sizeOrNull(curve, 10);
  const d30 = sizeOrNull(curve, 30);
  const d60 = sizeOrNull(curve, 60);

  if (d10 === null || d30 === null || d60 === null) {
    return { d10, d30, d60, cu: null, cc: null };
  }
  return {
    d10,
    d30,
    d60,
    cu: d60 / d10,
    cc: (d30 * d30) / (d10 * d60),
  };
}

export function roundParameters(p: GradationParameters, decimals: number): GradationParameters {
  const f = 10 ** decimals;
  const r = (v: number | null) => (v === null ? null : Math.round(v * f) / f);
  return { d10: r(p.d10), d30: r(p.d30), d60: r(p.d60), cu: r(p.cu), cc: r(p.cc) };
}

export function classifyGradation(
  p: GradationParameters,
  t: ClassificationThresholds = DEFAULT_THRESHOLDS
): Classification {
  if (p.cu === null || p.cc === null) {
    return { grade: "insufficient-data", reasons: [] };
  }
  const reasons: string[] = [];
  if (p.cu <= t.minCu) reasons.push(`Cu <= ${t.minCu}`);
  if (p.cc < t.minCc || p.cc > t.maxCc) reasons.push(`Cc outside ${t.minCc}-${t.maxCc}`);
  return { grade: reasons.length === 0 ? "well-graded" : "poorly-graded", reasons };
}
