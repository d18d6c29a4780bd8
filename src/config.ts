import * as dotenv from "dotenv";
import { z } from "zod";

export type EngineConfig = Readonly<{
  priceLowRatio: number;
  priceHighRatio: number;
  mathEpsilon: number;
  totalsEpsilon: number;
  vendorConfidenceThreshold: number;
  preferredObservationCount: number;
  validTaxRates: readonly number[];
  taxTolerance: number;
  maxQuestions: number;
}>;

export type AppConfig = Readonly<{
  dbPath: string;
  vendorHistoryPath: string;
  advisoryTimeoutMs: number;
  engine: EngineConfig;
}>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  priceLowRatio: 0.75,
  priceHighRatio: 1.5,
  mathEpsilon: 0.01,
  totalsEpsilon: 0.01,
  vendorConfidenceThreshold: 0.85,
  preferredObservationCount: 3,
  validTaxRates: Object.freeze([0, 0.075, 0.0825, 0.095]),
  taxTolerance: 0.005,
  maxQuestions: 3,
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const EnvSchema = z.object({
  INVOICE_DB_PATH: z.string().min(1).default("storage/learning.db"),
  VENDOR_HISTORY_PATH: z.string().min(1).default("data/vendor_history.json"),
  VENDOR_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
  MATH_EPSILON: z.coerce.number().nonnegative().default(0.01),
  ADVISORY_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  const e = parsed.data;
  return Object.freeze({
    dbPath: e.INVOICE_DB_PATH,
    vendorHistoryPath: e.VENDOR_HISTORY_PATH,
    advisoryTimeoutMs: e.ADVISORY_TIMEOUT_MS,
    engine: Object.freeze({
      ...DEFAULT_ENGINE_CONFIG,
      vendorConfidenceThreshold: e.VENDOR_CONFIDENCE_THRESHOLD,
      mathEpsilon: e.MATH_EPSILON,
    }),
  });
}

// Reads .env into process.env, then parses it. CLIs call this once at startup.
export function loadConfigFromDotenv(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
