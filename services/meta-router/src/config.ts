import dotenv from "dotenv";
import { z } from "zod";

// Load environment variables
dotenv.config();

// ============================================================================
// Meta Router Configuration
// Validated with zod; fails fast on invalid values
// ============================================================================

const ConfigSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  HTTP_PORT: z.coerce.number().int().positive().default(3010),

  // Blockchain access: "ethereum=https://...,arbitrum=https://..."
  DEFAULT_NETWORK: z.string().min(1).default("ethereum"),
  RPC_URLS: z.string().default("ethereum=http://127.0.0.1:8545"),

  // Execution wallet (optional: without it the service is quote-only)
  PRIVATE_KEY: z.string().optional(),

  // Execution journal (SQLite)
  TRADE_DB_PATH: z.string().min(1).default("./data/meta-router.db"),

  // Source registry file
  SOURCES_CONFIG_PATH: z.string().default("services/meta-router/config/sources.json"),

  // Quote freshness and selection
  MAX_QUOTE_AGE_SECONDS: z.coerce.number().positive().default(30),
  MIN_CONFIRMATIONS: z.coerce.number().int().min(1).default(2),
  GLOBAL_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  MIN_SAVINGS_THRESHOLD_PERCENT: z.coerce.number().min(0).default(0.1),

  // Execution retries for transient submission failures
  MAX_EXECUTION_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  GAS_BUMP_PERCENT: z.coerce.number().min(0).max(100).default(15),
  RECEIPT_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(3000),
  RECEIPT_TIMEOUT_MS: z.coerce.number().int().positive().default(180000),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = ConfigSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  return result.data;
}

export function loadConfig(): Config {
  const result = ConfigSchema.safeParse(process.env);

  if (!result.success) {
    console.error("❌ FATAL: Invalid Configuration");
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

// "ethereum=https://a,arbitrum=https://b" -> { ethereum: "https://a", ... }
export function parseRpcUrls(value: string): Record<string, string> {
  const urls: Record<string, string> = {};

  for (const entry of value.split(",")) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf("=");
    if (separator <= 0) {
      throw new ConfigError(`RPC_URLS entry "${trimmed}" must look like network=url`);
    }

    const network = trimmed.slice(0, separator).trim().toLowerCase();
    const url = trimmed.slice(separator + 1).trim();
    if (!z.string().url().safeParse(url).success) {
      throw new ConfigError(`RPC_URLS entry for ${network} is not a valid URL`);
    }
    urls[network] = url;
  }

  return urls;
}
