export * from "./types";
export * from "./errors";
export * from "./constants";
export { SieveScale } from "./sieveScale";
export { GradationCurve, collectKnownPoints } from "./curve";
export { linearInterp, nearestInterp, cubicSpline, naturalSplineMoments } from "./interp";
export type { Interpolant } from "./interp";
export { extractParameters, roundParameters, classifyGradation } from "./parameters";
