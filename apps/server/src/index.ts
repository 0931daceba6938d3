import "dotenv/config";
import { isGradationError } from "gradation-core";
import { loadConfig, type AppConfig } from "./config";
import { buildServer } from "./server";

export async function startServer() {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    const msg = isGradationError(err) ? `${err.kind}: ${err.message}` : String(err);
    console.error(`[config] ❌ ${msg}`);
    process.exit(1);
  }
  console.log(`[server] HOST=${config.server.host} PORT=${config.server.port} SIEVES=${config.sieve.sizes.length}`);

  const app = await buildServer(config);

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, closing`);
    app.close().then(
      () => process.exit(0),
      (err) => {
        console.error("[server] close failed:", err);
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await app.listen({ host: config.server.host, port: config.server.port });
  console.log(`[server] ✅ listening on http://${config.server.host}:${config.server.port}`);
}

startServer().catch((err) => {
  console.error("[server] ❌ startup failed:", err);
  process.exit(1);
});
