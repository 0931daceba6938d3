import { parseConfig, type AppConfig } from "../../src/config";

export const TEST_SIZES = [50, 25, 10, 4.75, 2, 0.075];

export function testConfig(overrides: { format?: "png" | "svg" } = {}): AppConfig {
  return parseConfig({
    server: { host: "127.0.0.1", port: 0, logLevel: "silent" },
    sieve: { units: "mm", sizes: TEST_SIZES },
    analysis: {
      defaultMethod: "linear",
      decimals: 3,
      classification: { minCu: 4, minCc: 1, maxCc: 3 },
    },
    plot: {
      format: overrides.format ?? "svg",
      width: 600,
      height: 400,
      resolution: 50,
      title: "Test plot",
      palettes: {
        color: ["#1f77b4", "#ff7f0e", "#2ca02c"],
        grayscale: ["#000000", "#404040"],
      },
    },
  });
}
