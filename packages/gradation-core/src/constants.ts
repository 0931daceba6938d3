// IS standard sieve openings, mm, coarse → fine
export const IS_SIEVE_SIZES_MM = [53, 40, 20, 10, 4.75, 2.36, 1.18, 0.6, 0.3, 0.15, 0.075] as const;

export const PERCENT_MIN = 0;
export const PERCENT_MAX = 100;

// Known points needed before a method can interpolate
export const MIN_POINTS_ANY = 2;
export const MIN_POINTS_CUBIC = 4;

// Inverse lookup: sub-intervals scanned per known-point segment, bisection stop (log10 mm)
export const INVERSE_STEPS_PER_SEGMENT = 64;
export const BISECTION_TOL_LOG = 1e-12;
export const BISECTION_MAX_ITER = 200;

// Well-graded criteria (Cu > 4 and 1 <= Cc <= 3)
export const DEFAULT_THRESHOLDS = { minCu: 4, minCc: 1, maxCc: 3 } as const;
