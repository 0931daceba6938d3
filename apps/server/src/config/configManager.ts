import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import YAML from "yaml";
import { ZodError } from "zod";
import { ConfigurationError, SieveScale } from "gradation-core";
import { AppConfigSchema, type AppConfig } from "./schema";

function deepFreeze<T>(obj: T): T {
  Object.freeze(obj);
  if (obj !== null && typeof obj === "object") {
    const values: unknown[] = Object.values(obj);
    for (const val of values) {
      if (val && typeof val === "object" && !Object.isFrozen(val)) {
        deepFreeze(val);
      }
    }
  }
  return obj;
}

let cached: AppConfig | null = null;

const HERE = path.dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = path.resolve(HERE, "..", "..", "..", "..");
const DEFAULT_CONFIG = "config/default.yaml";

function resolveConfigPath(preferred: string): string {
  const candidates = [
    preferred,
    path.resolve(process.cwd(), preferred),
    path.join(REPO_ROOT, preferred),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new ConfigurationError(
    `Unable to locate configuration file. Tried: ${candidates.join(", ")}`
  );
}

function formatZodError(err: ZodError): string {
  return err.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
}

/** Env overrides applied on top of the YAML document before validation. */
function applyEnv(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (raw === null || typeof raw !== "object" || !("server" in raw)) return raw;
  const server: Record<string, unknown> = typeof raw.server === "object" && raw.server !== null ? { ...raw.server } : {};
  if (env.PORT) server.port = Number(env.PORT);
  if (env.HOST) server.host = env.HOST;
  if (env.LOG_LEVEL) server.logLevel = env.LOG_LEVEL;
  return { ...raw, server };
}

export function parseConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatZodError(result.error)}`);
  }
  // fail at startup on a malformed scale, not on the first request
  SieveScale.create(result.data.sieve.sizes);
  return result.data;
}

export function loadConfig(
  configPath = process.env.GRADATION_CONFIG ?? DEFAULT_CONFIG,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  if (cached) return cached;

  const resolved = resolveConfigPath(configPath);
  const raw = fs.readFileSync(resolved, "utf-8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Could not parse ${resolved}: ${err instanceof Error ? err.message : String(err)}`);
  }
  cached = deepFreeze(parseConfig(applyEnv(parsed, env)));
  return cached;
}

export function resetConfigCache() {
  cached = null;
}

export function sieveScaleFrom(cfg: AppConfig): SieveScale {
  return SieveScale.create(cfg.sieve.sizes);
}
