import { config as loadDotenv } from "dotenv";
import { z } from "zod";

const EnvSchema = z.object({
  AMADEUS_HOST: z.string().url().default("https://test.api.amadeus.com"),
  AMADEUS_CLIENT_ID: z.string().default(""),
  AMADEUS_CLIENT_SECRET: z.string().default(""),
  DEFAULT_CURRENCY: z.string().length(3).default("EUR"),

  OPENAI_API_KEY: z.string().default(""),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),

  MAX_OFFERS: z.coerce.number().int().min(1).max(250).default(50),
  DISCOVER_CANDIDATES: z.coerce.number().int().min(1).default(25),
  DISCOVER_RESULTS: z.coerce.number().int().min(1).default(10),
  DISCOVER_CONCURRENCY: z.coerce.number().int().min(1).max(10).default(4),
  CLIMATE_REFERENCE_YEAR: z.coerce.number().int().min(1950).default(2023),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  amadeus: { host: string; clientId: string; clientSecret: string };
  currency: string;
  openai: { apiKey: string; model: string };
  search: { maxOffers: number };
  discover: { candidates: number; results: number; concurrency: number };
  climate: { referenceYear: number };
  logLevel: Env["LOG_LEVEL"];
}

export function parseConfig(source: NodeJS.ProcessEnv): AppConfig {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const env = result.data;

  return Object.freeze({
    amadeus: {
      host: env.AMADEUS_HOST.replace(/\/+$/, ""),
      clientId: env.AMADEUS_CLIENT_ID,
      clientSecret: env.AMADEUS_CLIENT_SECRET,
    },
    currency: env.DEFAULT_CURRENCY.toUpperCase(),
    openai: { apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL },
    search: { maxOffers: env.MAX_OFFERS },
    discover: {
      candidates: env.DISCOVER_CANDIDATES,
      results: env.DISCOVER_RESULTS,
      concurrency: env.DISCOVER_CONCURRENCY,
    },
    climate: { referenceYear: env.CLIMATE_REFERENCE_YEAR },
    logLevel: env.LOG_LEVEL,
  });
}

let cached: AppConfig | null = null;

/** Reads `.env` on first call, then returns the same parsed config. */
export function loadConfig(): AppConfig {
  if (cached) return cached;
  loadDotenv();
  cached = parseConfig(process.env);
  return cached;
}
