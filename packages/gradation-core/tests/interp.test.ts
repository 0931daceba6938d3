import { describe, it, expect } from "vitest";
import { cubicSpline, linearInterp, naturalSplineMoments, nearestInterp } from "../src/index";

describe("interpolation kernels", () => {
  const x = [0, 1, 2];
  const y = [0, 10, 30];

  it("linear interpolates inside and clamps outside", () => {
    expect(linearInterp(x, y, 1.5)).toBe(20);
    expect(linearInterp(x, y, 0.25)).toBe(2.5);
    expect(linearInterp(x, y, -1)).toBe(0);
    expect(linearInterp(x, y, 5)).toBe(30);
  });

  it("linear returns knots exactly", () => {
    const xs = [0.1, 0.7, 1.3];
    const ys = [3.3, 47.1, 99.9];
    xs.forEach((xi, i) => expect(linearInterp(xs, ys, xi)).toBe(ys[i]));
  });

  it("nearest picks the closer knot and breaks ties low", () => {
    expect(nearestInterp(x, y, 0.4)).toBe(0);
    expect(nearestInterp(x, y, 0.6)).toBe(10);
    expect(nearestInterp(x, y, 0.5)).toBe(0);
    expect(nearestInterp(x, y, 1.5)).toBe(10);
    expect(nearestInterp(x, y, 9)).toBe(30);
  });

  it("natural spline moments vanish on straight-line data", () => {
    const M = naturalSplineMoments([0, 1, 3, 4], [1, 3, 7, 9]);
    M.forEach((m) => expect(m).toBeCloseTo(0, 12));
  });

  it("natural spline matches the hand-solved three-knot case", () => {
    // M1 = -3 for y = [0, 1, 0] on unit spacing
    expect(naturalSplineMoments([0, 1, 2], [0, 1, 0])).toEqual([0, -3, 0]);
    const s = cubicSpline([0, 1, 2], [0, 1, 0]);
    expect(s(0.5)).toBeCloseTo(0.6875, 12);
    expect(s(1.5)).toBeCloseTo(0.6875, 12);
  });

  it("cubic passes through every knot and clamps outside", () => {
    const xs = [0, 0.4, 1.1, 1.5, 2.2];
    const ys = [0, 12, 55, 70, 100];
    const s = cubicSpline(xs, ys);
    xs.forEach((xi, i) => expect(s(xi)).toBe(ys[i]));
    expect(s(-3)).toBe(0);
    expect(s(4)).toBe(100);
  });
});
