import { z } from "zod";

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .optional()
    .transform((v) =>
      v === undefined ? fallback : v === "true" || v === "1" || v === "yes"
    );

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_HOTKEY: z.string().min(1, "NODE_HOTKEY must name this node's identity"),
  REGISTRY_FILE: z.string().default("data/registry.json"),
  MARKETS_FILE: z.string().default("data/markets.csv"),
  AIRPORTS_FILE: z.string().default("data/airports.csv"),
  SCORES_FILE: z.string().default("state/scores.json"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  // validator
  BATCH_SIZE: positiveInt(10),
  SAMPLE_SIZE: z.coerce.number().int().positive().optional(),
  QUERY_TIMEOUT_MS: positiveInt(12_000),
  PROPAGATE_INTENT_FIELDS: flag(false),
  VPERMIT_STAKE_LIMIT: z.coerce.number().nonnegative().optional(),
  CYCLE_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0),

  // miner
  AXON_PORT: z.coerce.number().int().min(0).max(65535).default(8091),
  AXON_HOST: z.string().default("0.0.0.0"),
  RAPIDAPI_KEY: z.string().default(""),
  PROVIDER_TIMEOUT_MS: positiveInt(10_000),
  MAX_OFFERS_PER_QUERY: positiveInt(1),
  CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(300),
  ALLOW_NON_REGISTERED: flag(false),
  FORCE_VALIDATOR_PERMIT: flag(true),
  MAX_CONCURRENT_REQUESTS: positiveInt(4),
  MAX_PENDING_REQUESTS: positiveInt(64),
});

export type AppConfig = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

/** Empty strings count as unset, so `FOO=` in .env falls back to the default. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") cleaned[key] = value;
  }
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  return parsed.data;
}
