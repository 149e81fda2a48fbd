import { createChildLogger } from "./logger.js";

const log = createChildLogger({ module: "rate-limiter" });

interface RateLimitState {
  remaining: number;
  reset: number; // epoch seconds
}

const LOW_WATERMARK = 10;
const MAX_WAIT_MS = 120_000;

const state: Map<string, RateLimitState> = new Map();

export function updateRateLimit(
  key: string,
  headers: Record<string, string | number | undefined>
): void {
  const remaining = Number(headers["x-ratelimit-remaining"]);
  const reset = Number(headers["x-ratelimit-reset"]);
  if (Number.isFinite(remaining) && Number.isFinite(reset)) {
    state.set(key, { remaining, reset });
  }
}

/** Sleeps until the window resets when the remaining budget runs low. */
export async function waitIfNeeded(key: string): Promise<void> {
  const limit = state.get(key);
  if (!limit || limit.remaining > LOW_WATERMARK) return;

  const waitMs = Math.max(0, limit.reset * 1000 - Date.now()) + 1000;
  if (waitMs < MAX_WAIT_MS) {
    log.warn({ key, waitMs, remaining: limit.remaining }, "Rate limit low, waiting");
    await new Promise((r) => setTimeout(r, waitMs));
  }
}
