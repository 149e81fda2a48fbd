import { z } from "zod";

const envSchema = z.object({
  // GitHub App
  GITHUB_APP_ID: z.string().min(1),
  GITHUB_PRIVATE_KEY: z.string().min(1),
  GITHUB_WEBHOOK_SECRET: z.string().min(1),
  BOT_NAME: z.string().min(1).default("steward"),
  MENTION_TOKEN: z.string().min(1).optional(),

  // Anthropic (fallback key when an installation has not stored its own)
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  ANTHROPIC_MODEL: z.string().default("claude-sonnet-4-20250514"),

  // PostgreSQL (thread state, installation keys, activity log)
  POSTGRES_URL: z.string().optional(),

  // Limits
  MAX_CONTEXT_CHARS: z.coerce.number().int().positive().default(120_000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().positive().default(90_000),
  UNIT_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),
  MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(3),
  STATE_RETENTION_HOURS: z.coerce.number().min(0).default(168),

  // Server
  PORT: z.coerce.number().default(3000),
  PUBLIC_URL: z.string().url().optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function loadEnv(): Env {
  if (_env) return _env;

  const raw = { ...process.env };

  // Decode base64 private key if needed
  if (raw.GITHUB_PRIVATE_KEY && !raw.GITHUB_PRIVATE_KEY.includes("BEGIN")) {
    raw.GITHUB_PRIVATE_KEY = Buffer.from(
      raw.GITHUB_PRIVATE_KEY,
      "base64"
    ).toString("utf-8");
  }

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const missing = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid environment variables:\n${missing}`);
  }

  _env = result.data;
  return _env;
}
