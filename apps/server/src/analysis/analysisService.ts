// apps/server/src/analysis/analysisService.ts
/**
 * Request orchestration: one GradationCurve per sample, parameters per
 * curve, one plot for everything that built (with each sample's parameter
 * block drawn beside the curves).
 *
 * A sample that cannot be built is reported next to the others; the request
 * only fails when no sample builds at all.
 */

import {
  classifyGradation,
  extractParameters,
  GradationCurve,
  isGradationError,
  readingFromWire,
  roundParameters,
  ValidationError,
  type Classification,
  type GradationError,
  type GradationErrorKind,
  type GradationParameters,
  type InterpolationMethod,
  type SampleInput,
  type SieveScale,
} from "gradation-core";
import { renderPlot, type PaletteName, type PlotArtifact } from "gradation-plot";
import type { AppConfig } from "../config/schema";

export interface RawSample {
  name: string;
  /** Aligned to the sieve scale; `null` = not measured */
  values: readonly (number | null)[];
}

export interface AnalysisRequest {
  samples: readonly RawSample[];
  method: InterpolationMethod;
  palette?: PaletteName;
}

export interface SampleReport {
  index: number;
  name: string;
  color: string;
  parameters: GradationParameters;
  classification: Classification;
  knownPoints: number;
}

export interface SampleWarning {
  index: number;
  name: string;
  errorKind: GradationErrorKind;
  message: string;
}

export type FailureKind = GradationErrorKind | "InternalError";

export type AnalysisResponse =
  | {
      success: true;
      method: InterpolationMethod;
      plot: Omit<PlotArtifact, "series">;
      samples: SampleReport[];
      warnings: SampleWarning[];
    }
  | {
      success: false;
      errorKind: FailureKind;
      error: string;
      warnings: SampleWarning[];
    };

type SampleResult =
  | { ok: true; index: number; name: string; curve: GradationCurve }
  | { ok: false; index: number; name: string; error: GradationError };

/** Blank names become `Sample <n>` (1-based input position). */
export function sampleName(name: string, index: number): string {
  const trimmed = name.trim();
  return trimmed.length > 0 ? trimmed : `Sample ${index + 1}`;
}

/** Mapping form `{ name: values }`; order follows the object's key order. */
export function samplesFromMapping(data: Record<string, readonly (number | null)[]>): RawSample[] {
  return Object.entries(data).map(([name, values]) => ({ name, values }));
}

function shapeProblems(samples: readonly SampleInput[], scale: SieveScale): string[] {
  const problems: string[] = [];
  for (const s of samples) {
    if (!scale.matches(s.readings.length)) {
      problems.push(`${s.name}: expected ${scale.count} values (one per sieve), got ${s.readings.length}`);
      continue;
    }
    s.readings.forEach((r, i) => {
      if (r.kind === "measured" && !(Number.isFinite(r.value) && r.value >= 0 && r.value <= 100)) {
        problems.push(`${s.name}: value ${r.value} at sieve ${scale.sizeAt(i)} is outside 0-100`);
      }
    });
  }
  return problems;
}

function buildOne(sample: SampleInput, index: number, scale: SieveScale, method: InterpolationMethod): SampleResult {
  try {
    return { ok: true, index, name: sample.name, curve: GradationCurve.build(sample, scale, method) };
  } catch (err) {
    if (isGradationError(err)) return { ok: false, index, name: sample.name, error: err };
    throw err;
  }
}

export class AnalysisService {
  constructor(
    private readonly scale: SieveScale,
    private readonly config: AppConfig
  ) {}

  async analyze(request: AnalysisRequest): Promise<AnalysisResponse> {
    try {
      return await this.run(request);
    } catch (err) {
      if (isGradationError(err)) {
        return { success: false, errorKind: err.kind, error: err.message, warnings: [] };
      }
      return {
        success: false,
        errorKind: "InternalError",
        error: `Analysis failed: ${err instanceof Error ? err.message : String(err)}`,
        warnings: [],
      };
    }
  }

  private async run(request: AnalysisRequest): Promise<AnalysisResponse> {
    const { scale, config } = this;
    const inputs: SampleInput[] = request.samples.map((s, i) => ({
      name: sampleName(s.name, i),
      readings: s.values.map(readingFromWire),
    }));

    if (inputs.length === 0) {
      throw new ValidationError("Request contains no samples");
    }
    const problems = shapeProblems(inputs, scale);
    if (problems.length > 0) {
      throw new ValidationError(`Invalid sample data: ${problems.join("; ")}`);
    }

    const results = inputs.map((s, i) => buildOne(s, i, scale, request.method));
    const built = results.filter((r): r is Extract<SampleResult, { ok: true }> => r.ok);
    const warnings: SampleWarning[] = results.flatMap((r) =>
      r.ok ? [] : [{ index: r.index, name: r.name, errorKind: r.error.kind, message: r.error.message }]
    );

    if (built.length === 0) {
      return {
        success: false,
        errorKind: "RenderError",
        error: `No sample could be analysed: ${warnings.map((w) => `${w.name}: ${w.message}`).join("; ")}`,
        warnings,
      };
    }

    const reports = built.map((b) => {
      const raw = extractParameters(b.curve);
      return {
        parameters: roundParameters(raw, config.analysis.decimals),
        classification: classifyGradation(raw, config.analysis.classification),
      };
    });

    const artifact = await renderPlot(
      built.map((b) => b.curve),
      scale,
      {
        format: config.plot.format,
        width: config.plot.width,
        height: config.plot.height,
        resolution: config.plot.resolution,
        title: config.plot.title,
        units: config.sieve.units,
        palettes: config.plot.palettes,
        palette: request.palette ?? "color",
        indices: built.map((b) => b.index),
        summaries: reports.map((r) => ({ parameters: r.parameters, grade: r.classification.grade })),
      }
    );

    const samples: SampleReport[] = built.map((b, i) => ({
      index: b.index,
      name: b.name,
      color: artifact.series[i].color,
      parameters: reports[i].parameters,
      classification: reports[i].classification,
      knownPoints: b.curve.knownPoints.length,
    }));

    return {
      success: true,
      method: request.method,
      plot: { mimeType: artifact.mimeType, data: artifact.data, width: artifact.width, height: artifact.height },
      samples,
      warnings,
    };
  }
}
