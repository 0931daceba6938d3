import { FastifyInstance } from "fastify";
import { z } from "zod";
import { INTERPOLATION_METHODS, type SieveScale } from "gradation-core";
import { AnalysisService, samplesFromMapping, type RawSample } from "../../analysis/analysisService";
import type { AppConfig } from "../../config/schema";

const Values = z.array(z.number().finite().nullable());

export const AnalyzeBodySchema = z
  .object({
    sieve_data: z.record(Values).optional(),
    samples: z.array(z.object({ name: z.string().default(""), values: Values })).optional(),
    interpolation_method: z.enum(INTERPOLATION_METHODS).optional(),
    palette: z.enum(["color", "grayscale"]).optional(),
  })
  .refine((b) => (b.sieve_data === undefined) !== (b.samples === undefined), {
    message: "Provide exactly one of sieve_data or samples",
  });

export interface AnalyzeRouteDeps {
  service: AnalysisService;
  scale: SieveScale;
  config: AppConfig;
}

/**
 * `POST /analyze` takes either `sieve_data` (`{ name: values }`) or `samples`
 * (`[{ name, values }]`). The mapping follows JS key order, which puts
 * integer-like names such as "1" first; send `samples` when colour and
 * response order must match the input exactly.
 */
export function analyzeRoutes({ service, scale, config }: AnalyzeRouteDeps) {
  return async function (f: FastifyInstance) {
    f.get("/sieve-sizes", async () => ({ units: config.sieve.units, sizes: scale.sizes }));

    f.post("/analyze", async (req, rep) => {
      const parsed = AnalyzeBodySchema.safeParse(req.body);
      if (!parsed.success) {
        const error = parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
        return rep.status(400).send({ success: false, errorKind: "ValidationError", error });
      }

      const body = parsed.data;
      const samples: RawSample[] = body.samples ?? samplesFromMapping(body.sieve_data ?? {});
      const result = await service.analyze({
        samples,
        method: body.interpolation_method ?? config.analysis.defaultMethod,
        palette: body.palette,
      });

      for (const w of result.warnings) {
        req.log.warn({ sample: w.name, kind: w.errorKind }, w.message);
      }
      if (!result.success) {
        req.log.warn({ kind: result.errorKind }, result.error);
      }
      return result;
    });
  };
}
