/**
 * 1-D interpolation kernels over ascending abscissae.
 * Every kernel clamps to the boundary ordinate outside [x[0], x[n-1]].
 */

export type Interpolant = (xq: number) => number;

function segmentIndex(x: readonly number[], xq: number): number {
  let lo = 0;
  let hi = x.length - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (x[mid] <= xq) lo = mid;
    else hi = mid;
  }
  return lo;
}

export function linearInterp(x: readonly number[], y: readonly number[], xq: number): number {
  const n = x.length;
  if (xq <= x[0]) return y[0];
  if (xq >= x[n - 1]) return y[n - 1];

  const i = segmentIndex(x, xq);
  const t = (xq - x[i]) / (x[i + 1] - x[i]);
  // (1-t)·y0 + t·y1 is exact at both knots
  return (1 - t) * y[i] + t * y[i + 1];
}

/** Nearest knot; a query equidistant from two knots takes the lower one. */
export function nearestInterp(x: readonly number[], y: readonly number[], xq: number): number {
  const n = x.length;
  if (xq <= x[0]) return y[0];
  if (xq >= x[n - 1]) return y[n - 1];

  const i = segmentIndex(x, xq);
  const dLo = xq - x[i];
  const dHi = x[i + 1] - xq;
  return dHi < dLo ? y[i + 1] : y[i];
}

/**
 * Second derivatives of the natural cubic spline (M[0] = M[n-1] = 0),
 * solved with the Thomas algorithm.
 */
export function naturalSplineMoments(x: readonly number[], y: readonly number[]): number[] {
  const n = x.length;
  const M = new Array<number>(n).fill(0);
  if (n < 3) return M;

  const h = Array.from({ length: n - 1 }, (_, i) => x[i + 1] - x[i]);
  const m = n - 2;
  const diag = new Array<number>(m);
  const rhs = new Array<number>(m);

  for (let k = 0; k < m; k++) {
    const i = k + 1;
    diag[k] = 2 * (h[i - 1] + h[i]);
    rhs[k] = 6 * ((y[i + 1] - y[i]) / h[i] - (y[i] - y[i - 1]) / h[i - 1]);
  }

  // forward sweep; sub- and super-diagonal at row k are h[k] and h[k+1]
  for (let k = 1; k < m; k++) {
    const w = h[k] / diag[k - 1];
    diag[k] -= w * h[k];
    rhs[k] -= w * rhs[k - 1];
  }

  M[m] = rhs[m - 1] / diag[m - 1];
  for (let k = m - 2; k >= 0; k--) {
    M[k + 1] = (rhs[k] - h[k + 1] * M[k + 2]) / diag[k];
  }
  return M;
}

export function cubicSpline(x: readonly number[], y: readonly number[]): Interpolant {
  const n = x.length;
  const M = naturalSplineMoments(x, y);

  return (xq: number) => {
    if (xq <= x[0]) return y[0];
    if (xq >= x[n - 1]) return y[n - 1];

    const i = segmentIndex(x, xq);
    const h = x[i + 1] - x[i];
    const A = (x[i + 1] - xq) / h;
    const B = 1 - A;
    return A * y[i] + B * y[i + 1] + ((A * A * A - A) * M[i] + (B * B * B - B) * M[i + 1]) * (h * h) / 6;
  };
}
