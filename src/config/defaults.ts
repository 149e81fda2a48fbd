import type { Env } from "./env.js";

export const RULES_PATH = ".github/steward.yml";
export const BOT_TAG = "<!-- steward -->";

/** Paths whose changes get a thank-you note instead of a model review. */
export const TRIVIAL_PATH_PATTERN = /(\.md|\.txt)$|(^|\/)\.gitignore$/;

export interface BotSettings {
  botLogin: string;
  mentionToken: string;
  rulesPath: string;
  setupUrl: string | null;
  unitTimeoutMs: number;
  retryBaseDelayMs: number;
  /** Milliseconds a closed thread is kept. 0 evicts on closure. */
  retentionMs: number;
  context: {
    maxChars: number;
    fetchTimeoutMs: number;
    maxAttempts: number;
    excerptRadius: number;
  };
  conversation: {
    maxEntries: number;
    maxExcerptChars: number;
    maxAgeMs: number;
  };
  inference: {
    model: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
    maxAttempts: number;
  };
  publish: {
    maxAttempts: number;
  };
}

export const DEFAULT_SETTINGS: BotSettings = {
  botLogin: "steward[bot]",
  mentionToken: "@steward",
  rulesPath: RULES_PATH,
  setupUrl: null,
  unitTimeoutMs: 180_000,
  retryBaseDelayMs: 1000,
  retentionMs: 168 * 3_600_000,
  context: {
    maxChars: 120_000,
    fetchTimeoutMs: 15_000,
    maxAttempts: 3,
    excerptRadius: 20,
  },
  conversation: {
    maxEntries: 5,
    maxExcerptChars: 1500,
    maxAgeMs: 30 * 86_400_000,
  },
  inference: {
    model: "claude-sonnet-4-20250514",
    maxTokens: 4096,
    temperature: 0,
    timeoutMs: 90_000,
    maxAttempts: 3,
  },
  publish: {
    maxAttempts: 3,
  },
};

export function settingsFromEnv(env: Env): BotSettings {
  return {
    ...DEFAULT_SETTINGS,
    botLogin: `${env.BOT_NAME}[bot]`,
    mentionToken: env.MENTION_TOKEN ?? `@${env.BOT_NAME}`,
    setupUrl: env.PUBLIC_URL ? `${env.PUBLIC_URL.replace(/\/$/, "")}/setup` : null,
    unitTimeoutMs: env.UNIT_TIMEOUT_MS,
    retentionMs: env.STATE_RETENTION_HOURS * 3_600_000,
    context: {
      ...DEFAULT_SETTINGS.context,
      maxChars: env.MAX_CONTEXT_CHARS,
      fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
      maxAttempts: env.MAX_ATTEMPTS,
    },
    inference: {
      ...DEFAULT_SETTINGS.inference,
      model: env.ANTHROPIC_MODEL,
      timeoutMs: env.INFERENCE_TIMEOUT_MS,
      maxAttempts: env.MAX_ATTEMPTS,
    },
    publish: { maxAttempts: env.MAX_ATTEMPTS },
  };
}
