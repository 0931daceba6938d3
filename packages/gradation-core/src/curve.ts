import {
  BISECTION_MAX_ITER,
  BISECTION_TOL_LOG,
  INVERSE_STEPS_PER_SEGMENT,
  MIN_POINTS_ANY,
  MIN_POINTS_CUBIC,
  PERCENT_MAX,
  PERCENT_MIN,
} from "./constants";
import { InsufficientDataError, OutOfRangeError } from "./errors";
import { cubicSpline, linearInterp, nearestInterp, type Interpolant } from "./interp";
import type { SieveScale } from "./sieveScale";
import type { FilledPoint, InterpolationMethod, KnownPoint, SampleInput } from "./types";

const clampPercent = (p: number) => Math.max(PERCENT_MIN, Math.min(PERCENT_MAX, p));

/**
 * Pair measured readings with their sieve size, sort fine → coarse and
 * collapse duplicate sizes (the later reading in input order wins).
 */
export function collectKnownPoints(sample: SampleInput, sizes: readonly number[]): KnownPoint[] {
  const bySize = new Map<number, number>();
  sample.readings.forEach((r, i) => {
    if (r.kind === "measured") bySize.set(sizes[i], r.value);
  });
  return Array.from(bySize, ([size, percent]) => ({ size, percent })).sort((a, b) => a.size - b.size);
}

function makeInterpolant(method: InterpolationMethod, lx: number[], y: number[]): Interpolant {
  switch (method) {
    case "linear":
      return (xq) => linearInterp(lx, y, xq);
    case "nearest":
      return (xq) => nearestInterp(lx, y, xq);
    case "cubic":
      return cubicSpline(lx, y);
  }
}

/**
 * Continuous percent-passing function of one sample, interpolated in
 * log10(size). Immutable: a different method means a new curve.
 */
export class GradationCurve {
  readonly knownPoints: readonly KnownPoint[];
  /** Range of the clamped curve over the inverse-lookup grid, not just the measured values. */
  readonly minPercent: number;
  readonly maxPercent: number;

  private readonly interpolant: Interpolant;
  /** log10(size) grid, fine → coarse, with the clamped value at each node */
  private readonly scan: { lx: number; p: number }[];

  private constructor(
    readonly sample: SampleInput,
    readonly scale: SieveScale,
    readonly method: InterpolationMethod,
    points: KnownPoint[]
  ) {
    this.knownPoints = Object.freeze(points);
    const lx = points.map((p) => Math.log10(p.size));
    this.interpolant = makeInterpolant(method, lx, points.map((p) => p.percent));
    this.scan = scanGrid(lx).map((x) => ({ lx: x, p: clampPercent(this.interpolant(x)) }));
    const values = this.scan.map((n) => n.p);
    this.minPercent = Math.min(...values);
    this.maxPercent = Math.max(...values);
  }

  static build(sample: SampleInput, scale: SieveScale, method: InterpolationMethod): GradationCurve {
    scale.assertMatches(sample);
    const points = collectKnownPoints(sample, scale.sizes);

    if (points.length < MIN_POINTS_ANY) {
      throw new InsufficientDataError(
        `needs at least ${MIN_POINTS_ANY} measured values to interpolate, got ${points.length}`,
        points.length,
        MIN_POINTS_ANY
      );
    }
    if (method === "cubic" && points.length < MIN_POINTS_CUBIC) {
      throw new InsufficientDataError(
        `cubic interpolation needs at least ${MIN_POINTS_CUBIC} measured values, got ${points.length}`,
        points.length,
        MIN_POINTS_CUBIC
      );
    }
    return new GradationCurve(sample, scale, method, points);
  }

  get name(): string {
    return this.sample.name;
  }

  /** Smallest and largest measured size, mm. */
  get sizeRange(): [number, number] {
    return [this.knownPoints[0].size, this.knownPoints[this.knownPoints.length - 1].size];
  }

  percentPassingAt(size: number): number {
    if (!Number.isFinite(size) || size <= 0) {
      throw new RangeError(`Size must be a positive number, got ${size}`);
    }
    return clampPercent(this.interpolant(Math.log10(size)));
  }

  /**
   * Size (mm) at which the curve passes `percent`. Scans from the fine end,
   * so a non-monotonic curve reports its finest crossing.
   */
  sizeAtPercent(percent: number): number {
    if (!Number.isFinite(percent) || percent < this.minPercent || percent > this.maxPercent) {
      throw new OutOfRangeError(percent, this.minPercent, this.maxPercent);
    }

    const f = (lx: number) => clampPercent(this.interpolant(lx)) - percent;
    const scan = this.scan;

    for (let k = 0; k < scan.length - 1; k++) {
      const fa = scan[k].p - percent;
      const fb = scan[k + 1].p - percent;
      if (fa === 0) return Math.pow(10, scan[k].lx);
      if (fb === 0) return Math.pow(10, scan[k + 1].lx);
      if ((fa < 0) !== (fb < 0)) return Math.pow(10, bisect(f, scan[k].lx, scan[k + 1].lx, fa));
    }

    // the range comes from this same grid, so an in-range percent always crosses above
    throw new OutOfRangeError(percent, this.minPercent, this.maxPercent);
  }

  /** Value at every sieve of the scale; absent readings take the interpolated value. */
  filledPoints(): FilledPoint[] {
    return this.sample.readings.map((r, i) => {
      const size = this.scale.sizeAt(i);
      return r.kind === "measured"
        ? { size, percent: r.value, measured: true }
        : { size, percent: this.percentPassingAt(size), measured: false };
    });
  }
}

/** Every knot plus INVERSE_STEPS_PER_SEGMENT sub-steps between neighbours. */
function scanGrid(lx: readonly number[]): number[] {
  const grid = [lx[0]];
  for (let i = 0; i < lx.length - 1; i++) {
    const step = (lx[i + 1] - lx[i]) / INVERSE_STEPS_PER_SEGMENT;
    for (let j = 1; j < INVERSE_STEPS_PER_SEGMENT; j++) grid.push(lx[i] + j * step);
    grid.push(lx[i + 1]);
  }
  return grid;
}

function bisect(f: (x: number) => number, a: number, b: number, fa: number): number {
  let lo = a;
  let hi = b;
  let fLo = fa;
  for (let k = 0; k < BISECTION_MAX_ITER && hi - lo > BISECTION_TOL_LOG; k++) {
    const mid = 0.5 * (lo + hi);
    const fm = f(mid);
    if (fm === 0) return mid;
    if ((fLo < 0) !== (fm < 0)) {
      hi = mid;
    } else {
      lo = mid;
      fLo = fm;
    }
  }
  return 0.5 * (lo + hi);
}
