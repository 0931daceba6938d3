import Fastify, { FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { AnalysisService } from "./analysis/analysisService";
import { analyzeRoutes } from "./api/routes/analyze";
import { sieveScaleFrom, type AppConfig } from "./config";

export async function buildServer(config: AppConfig): Promise<FastifyInstance> {
  const scale = sieveScaleFrom(config);
  const service = new AnalysisService(scale, config);

  const level = config.server.logLevel;
  const app = Fastify({ logger: level === "silent" ? false : { level } });
  await app.register(cors, { origin: true });

  // ------------------------
  // Health
  // ------------------------
  app.get("/health", async () => ({ ok: true, ts: Date.now() }));

  // ------------------------
  // Gradation analysis
  // ------------------------
  await app.register(analyzeRoutes({ service, scale, config }));

  return app;
}
