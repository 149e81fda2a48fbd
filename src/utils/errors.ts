/**
 * Failure taxonomy for a unit of work. Only `PublishFailureError` and
 * `InferenceFailureError` are operator-visible; everything else resolves to
 * silence or a degraded comment.
 */
export abstract class StewardError extends Error {
  abstract readonly kind: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Event is missing required fields. Dropped without retry. */
export class MalformedEventError extends StewardError {
  readonly kind = "malformed_event";

  constructor(readonly issues: string[]) {
    super(`Malformed event: ${issues.join("; ")}`);
  }
}

/** The repository rules file exists but could not be used. */
export class RuleLoadError extends StewardError {
  readonly kind = "rule_load";

  constructor(
    readonly repositoryId: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Could not load rules for ${repositoryId}: ${reason}`, options);
  }
}

export class ContextFetchTimeoutError extends StewardError {
  readonly kind = "context_fetch_timeout";

  constructor(readonly path: string, readonly timeoutMs: number) {
    super(`Fetching ${path} exceeded ${timeoutMs}ms`);
  }
}

/** The whole unit of work ran past its deadline. */
export class UnitTimeoutError extends StewardError {
  readonly kind = "unit_timeout";

  constructor(readonly timeoutMs: number) {
    super(`Unit of work exceeded ${timeoutMs}ms`);
  }
}

export class InferenceFailureError extends StewardError {
  readonly kind = "inference_failure";
}

/** Lost the compare-and-set for a transition or a marker. Not a fault. */
export class PublishConflictError extends StewardError {
  readonly kind = "publish_conflict";
}

export class PublishFailureError extends StewardError {
  readonly kind = "publish_failure";
}

/** HTTP status carried by Octokit and Anthropic errors, when present. */
export function httpStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) {
    return undefined;
  }
  return typeof err.status === "number" ? err.status : undefined;
}

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "ENOTFOUND",
  "EPIPE",
  "UND_ERR_SOCKET",
]);

/** Network hiccups, rate limits and 5xx responses. Never our own timeouts. */
export function isTransient(err: unknown): boolean {
  if (err instanceof StewardError) return false;

  const status = httpStatus(err);
  if (status !== undefined) {
    return status === 408 || status === 429 || status >= 500;
  }

  if (typeof err === "object" && err !== null) {
    if ("code" in err && typeof err.code === "string") {
      return TRANSIENT_CODES.has(err.code);
    }
    if ("name" in err && typeof err.name === "string") {
      return err.name === "APIConnectionError" || err.name === "APIConnectionTimeoutError";
    }
  }
  return false;
}
