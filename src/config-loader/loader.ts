import yaml from "js-yaml";
import { ZodError } from "zod";
import { parseRulesFile } from "./schema.js";
import type { RepositoryContentProvider } from "../github/content.js";
import { emptyRuleSet, type RuleSet } from "../review/types.js";
import { ContextFetchTimeoutError, RuleLoadError, isTransient } from "../utils/errors.js";
import { withDeadline, withRetry } from "../utils/retry.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "rule-loader" });

export interface RuleLoadResult {
  ruleSet: RuleSet;
  /** Set when the file exists but could not be used; rules are then empty. */
  error: RuleLoadError | null;
}

export interface RuleFetchOptions {
  /** Deadline for one load, retries included. */
  fetchTimeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
}

const DEFAULT_FETCH: RuleFetchOptions = {
  fetchTimeoutMs: 15_000,
  maxAttempts: 3,
  retryBaseDelayMs: 1000,
};

interface FetchResult {
  result: RuleLoadResult;
  /** Fetch failures are retried by the next load instead of cached. */
  cacheable: boolean;
}

/**
 * Loads the repository's custom review rules from the default branch and
 * caches them per repository until `invalidate` is called.
 */
export class RuleLoader {
  private readonly cache = new Map<string, Promise<RuleLoadResult>>();

  constructor(
    private readonly rulesPath: string,
    private readonly fetchOpts: RuleFetchOptions = DEFAULT_FETCH
  ) {}

  load(provider: RepositoryContentProvider, repositoryId: string): Promise<RuleLoadResult> {
    const cached = this.cache.get(repositoryId);
    if (cached) return cached;

    const pending = this.fetch(provider, repositoryId);
    const result = pending.then((f) => f.result);
    this.cache.set(repositoryId, result);

    pending
      .then(({ cacheable }) => {
        if (!cacheable && this.cache.get(repositoryId) === result) {
          this.cache.delete(repositoryId);
        }
      })
      .catch((err: unknown) => log.error({ err, repositoryId }, "Rule cache bookkeeping failed"));

    return result;
  }

  /** Loads that start after this call re-read the file. */
  invalidate(repositoryId: string): void {
    if (this.cache.delete(repositoryId)) {
      log.info({ repositoryId }, "Invalidated cached rules");
    }
  }

  private async fetch(
    provider: RepositoryContentProvider,
    repositoryId: string
  ): Promise<FetchResult> {
    // The pending load is shared by every unit for the repository, so it runs
    // under its own deadline rather than any one caller's signal.
    const { fetchTimeoutMs, maxAttempts, retryBaseDelayMs } = this.fetchOpts;
    let content: string | null;
    try {
      content = await withDeadline(
        fetchTimeoutMs,
        (signal) =>
          withRetry(() => provider.getFileContent(repositoryId, this.rulesPath, undefined, signal), {
            maxAttempts,
            baseDelayMs: retryBaseDelayMs,
            retryOn: isTransient,
            signal,
            label: "getRulesFile",
          }),
        () => new ContextFetchTimeoutError(this.rulesPath, fetchTimeoutMs)
      );
    } catch (err) {
      log.warn({ err, repositoryId }, "Failed to fetch rules file, continuing without rules");
      return {
        result: {
          ruleSet: emptyRuleSet(repositoryId),
          error: new RuleLoadError(repositoryId, "file could not be fetched", { cause: err }),
        },
        cacheable: false,
      };
    }

    if (content === null) {
      log.debug({ repositoryId, path: this.rulesPath }, "No rules file, using empty rule set");
      return { result: { ruleSet: emptyRuleSet(repositoryId), error: null }, cacheable: true };
    }

    try {
      const { rules } = parseRulesFile(yaml.load(content));
      log.info({ repositoryId, ruleCount: rules.length }, "Loaded custom rules");
      return { result: { ruleSet: { repositoryId, rules }, error: null }, cacheable: true };
    } catch (err) {
      const reason =
        err instanceof ZodError
          ? err.issues.map((i) => `${i.path.join(".") || "document"}: ${i.message}`).join("; ")
          : err instanceof Error
            ? err.message
            : String(err);
      log.warn({ repositoryId, reason }, "Malformed rules file, continuing without rules");
      return {
        result: { ruleSet: emptyRuleSet(repositoryId), error: new RuleLoadError(repositoryId, reason) },
        cacheable: true,
      };
    }
  }
}
