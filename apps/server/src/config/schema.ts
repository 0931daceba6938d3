import { z } from "zod";
import { INTERPOLATION_METHODS } from "gradation-core";

export const ServerSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
});

export const SieveSchema = z.object({
  units: z.string().min(1),
  // ordering and positivity are checked by SieveScale.create
  sizes: z.array(z.number()),
});

export const AnalysisSchema = z.object({
  defaultMethod: z.enum(INTERPOLATION_METHODS),
  decimals: z.number().int().min(0).max(10),
  classification: z.object({
    minCu: z.number().positive(),
    minCc: z.number().nonnegative(),
    maxCc: z.number().positive(),
  }).refine((c) => c.minCc <= c.maxCc, { message: "minCc must not exceed maxCc" }),
});

const Palette = z.array(z.string().regex(/^#[0-9a-fA-F]{6}$/)).min(1);

export const PlotSchema = z.object({
  format: z.enum(["png", "svg"]),
  width: z.number().int().min(200).max(8000),
  height: z.number().int().min(200).max(8000),
  resolution: z.number().int().min(2).max(10_000),
  title: z.string(),
  palettes: z.object({
    color: Palette,
    grayscale: Palette,
  }),
});

export const AppConfigSchema = z.object({
  server: ServerSchema,
  sieve: SieveSchema,
  analysis: AnalysisSchema,
  plot: PlotSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
