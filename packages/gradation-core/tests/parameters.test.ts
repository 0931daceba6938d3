import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  GradationCurve,
  SieveScale,
  classifyGradation,
  extractParameters,
  readingFromWire,
  roundParameters,
} from "../src/index";

const scale = SieveScale.create([50, 25, 10, 4.75, 2, 0.075]);
const build = (values: (number | null)[]) =>
  GradationCurve.build({ name: "S", readings: values.map(readingFromWire) }, scale, "linear");

describe("extractParameters", () => {
  it("derives D-values and coefficients for a fully bracketed sample", () => {
    const p = extractParameters(build([100, 90, 70, 40, 10, 0]));
    expect(p.d10).toBeCloseTo(2, 9);
    expect(p.d30).toBeCloseTo(3.5601836794509962, 6);
    expect(p.d60).toBeCloseTo(7.802453753539424, 6);
    expect(p.cu).toBeCloseTo(3.901226876769712, 6);
    expect(p.cc).toBeCloseTo(0.8122385746714309, 6);
  });

  it("reads D-values off the interpolated curve, not just the measured range", () => {
    const dip = GradationCurve.build(
      { name: "Dip", readings: [100, 100, 100, 12, 12, 12].map(readingFromWire) },
      scale,
      "cubic"
    );
    const p = extractParameters(dip);
    expect(p.d10).not.toBeNull();
    expect(p.cu).not.toBeNull();
  });

  it("leaves D10 undefined without blocking D30 and D60", () => {
    const p = extractParameters(build([100, 90, 70, 40, 20, null]));
    expect(p.d10).toBeNull();
    expect(p.d30).toBeCloseTo(3.0822070014844885, 6);
    expect(p.d60).toBeCloseTo(7.802453753539424, 6);
    expect(p.cu).toBeNull();
    expect(p.cc).toBeNull();
  });

  it("leaves every value undefined when the curve sits above 60%", () => {
    expect(extractParameters(build([100, 95, 80, 70, null, null]))).toEqual({
      d10: null,
      d30: null,
      d60: null,
      cu: null,
      cc: null,
    });
  });

  it("never computes Cu or Cc from a partially undefined set", () => {
    const values = fc.array(fc.option(fc.double({ min: 0, max: 100, noNaN: true }), { nil: null }), {
      minLength: 6,
      maxLength: 6,
    });
    fc.assert(
      fc.property(values.filter((v) => v.filter((x) => x !== null).length >= 2), (v) => {
        const p = extractParameters(build(v));
        if (p.d10 === null || p.d30 === null || p.d60 === null) {
          return p.cu === null && p.cc === null;
        }
        return p.cu !== null && p.cc !== null;
      }),
      { numRuns: 300 }
    );
  });
});

describe("roundParameters", () => {
  it("rounds defined values and keeps nulls", () => {
    expect(roundParameters({ d10: 2.71828, d30: null, d60: 7.802453, cu: 3.9012, cc: 0.81224 }, 3)).toEqual({
      d10: 2.718,
      d30: null,
      d60: 7.802,
      cu: 3.901,
      cc: 0.812,
    });
  });
});

describe("classifyGradation", () => {
  it("marks Cu > 4 with Cc in 1-3 as well graded", () => {
    expect(classifyGradation({ d10: 0.1, d30: 0.5, d60: 1.2, cu: 12, cc: 2.08 })).toEqual({
      grade: "well-graded",
      reasons: [],
    });
  });

  it("lists every failed criterion for a poorly graded sample", () => {
    const p = extractParameters(build([100, 90, 70, 40, 10, 0]));
    expect(classifyGradation(p)).toEqual({
      grade: "poorly-graded",
      reasons: ["Cu <= 4", "Cc outside 1-3"],
    });
  });

  it("honours custom thresholds", () => {
    const p = { d10: 0.1, d30: 0.3, d60: 0.5, cu: 5, cc: 1.8 };
    expect(classifyGradation(p, { minCu: 6, minCc: 1, maxCc: 3 }).reasons).toEqual(["Cu <= 6"]);
  });

  it("reports insufficient data when a coefficient is undefined", () => {
    expect(classifyGradation({ d10: null, d30: 1, d60: 2, cu: null, cc: null })).toEqual({
      grade: "insufficient-data",
      reasons: [],
    });
  });
});
