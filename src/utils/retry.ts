import { getLogger } from "./logger.js";

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  retryOn?: (error: unknown) => boolean;
  signal?: AbortSignal;
  label?: string;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelayMs = 1000,
    maxDelayMs = 30000,
    retryOn = () => true,
    signal,
    label,
  } = opts;
  const log = getLogger();

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || !retryOn(error) || signal?.aborted) {
        throw error;
      }

      const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      const jitter = delay * (0.5 + Math.random() * 0.5);
      log.warn(
        { attempt, maxAttempts, delayMs: Math.round(jitter), label, err: error },
        "Retrying after error"
      );
      await new Promise((r) => setTimeout(r, jitter));
    }
  }
}

/**
 * Runs `fn` with a signal that aborts after `timeoutMs` or when `parent`
 * aborts. Rejects with `onTimeout()` as soon as the deadline passes, even if
 * `fn` ignores the signal.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  onTimeout: () => Error,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let fire: (() => void) | undefined;

  const expired = new Promise<never>((_, reject) => {
    fire = () => {
      const err =
        parent?.aborted && parent.reason instanceof Error
          ? parent.reason
          : onTimeout();
      controller.abort(err);
      reject(err);
    };
    if (parent?.aborted) {
      fire();
      return;
    }
    timer = setTimeout(fire, timeoutMs);
    parent?.addEventListener("abort", fire, { once: true });
  });

  try {
    return await Promise.race([fn(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
    if (fire) parent?.removeEventListener("abort", fire);
  }
}
