import { afterAll, beforeAll, describe, it, expect } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildServer } from "../../src/server";
import { TEST_SIZES, testConfig } from "./fixtures";

describe("HTTP routes", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildServer(testConfig());
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it("answers health checks", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json().ok).toBe(true);
  });

  it("publishes the sieve sizes", async () => {
    const res = await app.inject({ method: "GET", url: "/sieve-sizes" });
    expect(res.json()).toEqual({ units: "mm", sizes: TEST_SIZES });
  });

  it("analyzes the mapping form with the default method", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/analyze",
      payload: {
        sieve_data: {
          A: [100, 90, 70, 40, 10, 0],
          B: [null, 95, 80, null, 30, 5],
        },
      },
    });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.success).toBe(true);
    expect(body.method).toBe("linear");
    expect(body.plot.mimeType).toBe("image/svg+xml");
    expect(body.samples.map((s: { name: string }) => s.name)).toEqual(["A", "B"]);
    expect(body.samples[0].parameters.d60).toBe(7.802);
    expect(body.warnings).toEqual([]);
  });

  it("analyzes the ordered form with method and palette", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/analyze",
      payload: {
        samples: [{ name: "", values: [100, 90, 70, 40, 10, 0] }],
        interpolation_method: "nearest",
        palette: "grayscale",
      },
    });
    const body = res.json();
    expect(body.success).toBe(true);
    expect(body.method).toBe("nearest");
    expect(body.samples[0].name).toBe("Sample 1");
    expect(body.samples[0].color).toBe("#000000");
  });

  it("keeps the exact input order of the samples form, integer-like names included", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/analyze",
      payload: {
        samples: [
          { name: "B", values: [100, 90, 70, 40, 10, 0] },
          { name: "1", values: [100, 80, 60, 30, 10, 2] },
        ],
      },
    });
    const body = res.json();
    expect(body.samples.map((s: { name: string; color: string }) => [s.name, s.color])).toEqual([
      ["B", "#1f77b4"],
      ["1", "#ff7f0e"],
    ]);
  });

  it("returns a request-level failure when nothing can be plotted", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/analyze",
      payload: { sieve_data: { Lonely: [null, null, 40, null, null, null] } },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      success: false,
      errorKind: "RenderError",
      error: "No sample could be analysed: Lonely: needs at least 2 measured values to interpolate, got 1",
    });
  });

  it("rejects an unknown interpolation method", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/analyze",
      payload: { sieve_data: { A: [100, 90, 70, 40, 10, 0] }, interpolation_method: "spline" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().success).toBe(false);
    expect(res.json().error).toContain("interpolation_method:");
  });

  it("requires exactly one sample form", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/analyze",
      payload: { sieve_data: {}, samples: [] },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("body: Provide exactly one of sieve_data or samples");
  });

  it("rejects non-numeric readings", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/analyze",
      payload: { sieve_data: { A: [100, "ninety", 70, 40, 10, 0] } },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toContain("sieve_data.A.1:");
  });
});
