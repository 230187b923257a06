import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace"]);

export const EnvSchema = z.object({
  RPC_PRIMARY: z.string().url(),

  LOG_LEVEL: LogLevelSchema.default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // JSON ledger keyed by mint address
  LEDGER_PATH: z.string().min(1).default("data/mint_ledger.json"),

  // Scan pacing: 15 mints per batch, ~15 requests per second
  SCAN_BATCH_SIZE: z.coerce.number().int().positive().default(15),
  SCAN_REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(67),
  SCAN_BATCH_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(0),

  FETCH_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  FETCH_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(250),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(injectedEnv?: Record<string, string | undefined>): Env {
  // Load dotenv only when env is actually needed
  if (!injectedEnv) {
    dotenvConfig();
  }

  const envToValidate = injectedEnv ?? process.env;
  const parsed = EnvSchema.safeParse(envToValidate);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid .env:\n${msg}`);
  }

  return parsed.data;
}

/**
 * Log level without requiring the rest of the environment to be valid.
 * Loads .env first unless an environment is injected.
 */
export function resolveLogLevel(injectedEnv?: Record<string, string | undefined>): z.infer<typeof LogLevelSchema> {
  if (!injectedEnv) {
    dotenvConfig();
  }

  const parsed = LogLevelSchema.safeParse((injectedEnv ?? process.env).LOG_LEVEL);
  return parsed.success ? parsed.data : "info";
}
