import type { RepositoryContentProvider } from "../github/content.js";
import { formatHunks, newLineRanges, parsePatch, type ParsedFile } from "../utils/diff-parser.js";
import { ContextFetchTimeoutError, isTransient } from "../utils/errors.js";
import { withDeadline, withRetry } from "../utils/retry.js";
import type { ConversationEntry, ReviewContext, RuleSet, SubjectKey } from "./types.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "context-assembler" });

export interface ContextLimits {
  maxChars: number;
  fetchTimeoutMs: number;
  maxAttempts: number;
  /** Lines kept on each side of a hunk when a file is cut to an excerpt. */
  excerptRadius: number;
  retryBaseDelayMs: number;
}

export interface AssembleInput {
  provider: RepositoryContentProvider;
  subject: SubjectKey;
  revision: string;
  rules: RuleSet;
  conversation: ConversationEntry[];
  signal?: AbortSignal;
}

/**
 * Gathers the full current content of every changed file, the parsed diff and
 * the prior conversation, then fits the result into `maxChars`.
 *
 * A file that cannot be fetched in time is listed in `unavailablePaths` and
 * the review proceeds without it. Failing to list the changed files, or the
 * caller's signal aborting, rejects.
 */
export async function assembleContext(
  input: AssembleInput,
  limits: ContextLimits
): Promise<ReviewContext> {
  const { provider, subject, revision, signal } = input;

  const files = await withRetry(() => provider.listChangedFiles(subject, signal), {
    maxAttempts: limits.maxAttempts,
    baseDelayMs: limits.retryBaseDelayMs,
    retryOn: isTransient,
    signal,
    label: "listChangedFiles",
  });

  const diffHunks = files
    .map((f) => parsePatch(f.path, f.patch, f.status))
    .sort((a, b) => compareStrings(a.filename, b.filename));

  const live = diffHunks.filter((f) => f.status !== "removed");
  const fetched = await Promise.all(
    live.map(async (file) => ({
      path: file.filename,
      content: await fetchFile(input, file.filename, limits),
    }))
  );

  const contents = new Map<string, string>();
  const unavailablePaths: string[] = [];
  for (const { path, content } of fetched) {
    if (content === null) {
      unavailablePaths.push(path);
    } else {
      contents.set(path, content);
    }
  }

  const fitted = fitToBudget(contents, diffHunks, input.conversation, limits);

  log.info(
    {
      repo: subject.repositoryId,
      number: subject.subjectNumber,
      revision,
      files: diffHunks.length,
      withContent: fitted.contents.size,
      trimmed: fitted.trimmedPaths.length,
      omitted: fitted.omittedPaths.length,
      unavailable: unavailablePaths.length,
    },
    "Assembled review context"
  );

  return {
    changedFiles: Object.fromEntries(fitted.contents),
    diffHunks: fitted.diffHunks,
    rules: input.rules,
    conversationSummary: input.conversation,
    truncated: fitted.truncated,
    trimmedPaths: fitted.trimmedPaths,
    omittedPaths: fitted.omittedPaths,
    unavailablePaths,
  };
}

async function fetchFile(
  input: AssembleInput,
  path: string,
  limits: ContextLimits
): Promise<string | null> {
  const { provider, subject, revision, signal } = input;
  try {
    return await withDeadline(
      limits.fetchTimeoutMs,
      (fileSignal) =>
        withRetry(() => provider.getFileContent(subject.repositoryId, path, revision, fileSignal), {
          maxAttempts: limits.maxAttempts,
          baseDelayMs: limits.retryBaseDelayMs,
          retryOn: isTransient,
          signal: fileSignal,
          label: "getFileContent",
        }),
      () => new ContextFetchTimeoutError(path, limits.fetchTimeoutMs),
      signal
    );
  } catch (err) {
    if (signal?.aborted) throw err;
    log.warn({ err, path, repo: subject.repositoryId }, "File content unavailable, reviewing without it");
    return null;
  }
}

interface Fitted {
  contents: Map<string, string>;
  diffHunks: ParsedFile[];
  trimmedPaths: string[];
  omittedPaths: string[];
  truncated: boolean;
}

/**
 * Cuts material until the total fits: the conversation is never cut; the
 * largest files are first reduced to excerpts around their hunks, then
 * dropped; as a last resort the largest diffs lose their hunks.
 */
export function fitToBudget(
  original: Map<string, string>,
  diffHunks: ParsedFile[],
  conversation: ConversationEntry[],
  limits: Pick<ContextLimits, "maxChars" | "excerptRadius">
): Fitted {
  const contents = new Map(original);
  const hunksByPath = new Map(diffHunks.map((f) => [f.filename, f]));
  const diffSize = (f: ParsedFile) => formatHunks(f).length;

  let used =
    conversation.reduce((n, e) => n + e.excerpt.length, 0) +
    diffHunks.reduce((n, f) => n + diffSize(f), 0) +
    [...contents.values()].reduce((n, c) => n + c.length, 0);

  const trimmed = new Set<string>();
  const omitted = new Set<string>();
  const over = () => used > limits.maxChars;
  const largestFirst = () =>
    [...contents.entries()]
      .sort(([pa, a], [pb, b]) => b.length - a.length || compareStrings(pa, pb))
      .map(([path]) => path);

  for (const path of largestFirst()) {
    if (!over()) break;
    const content = contents.get(path) ?? "";
    const file = hunksByPath.get(path);
    const excerpt = file ? excerptAroundHunks(content, newLineRanges(file), limits.excerptRadius) : "";
    if (excerpt.length < content.length) {
      contents.set(path, excerpt);
      used -= content.length - excerpt.length;
      trimmed.add(path);
    }
  }

  for (const path of largestFirst()) {
    if (!over()) break;
    used -= contents.get(path)?.length ?? 0;
    contents.delete(path);
    trimmed.delete(path);
    omitted.add(path);
  }

  let fittedHunks = diffHunks;
  if (over()) {
    const bySize = [...diffHunks].sort(
      (a, b) => diffSize(b) - diffSize(a) || compareStrings(a.filename, b.filename)
    );
    const stripped = new Set<string>();
    for (const file of bySize) {
      if (!over()) break;
      used -= diffSize(file) - diffSize({ ...file, hunks: [] });
      stripped.add(file.filename);
      omitted.add(file.filename);
    }
    fittedHunks = diffHunks.map((f) => (stripped.has(f.filename) ? { ...f, hunks: [] } : f));
  }

  return {
    contents,
    diffHunks: fittedHunks,
    trimmedPaths: [...trimmed].sort(compareStrings),
    omittedPaths: [...omitted].sort(compareStrings),
    truncated: trimmed.size > 0 || omitted.size > 0,
  };
}

/**
 * Keeps `radius` lines around each range and replaces the gaps with a
 * marker naming the skipped lines.
 */
export function excerptAroundHunks(
  content: string,
  ranges: Array<[number, number]>,
  radius: number
): string {
  if (ranges.length === 0) return "";
  const lines = content.split("\n");

  const windows = ranges
    .map(([start, end]): [number, number] => [
      Math.max(1, start - radius),
      Math.min(lines.length, end + radius),
    ])
    .filter(([start, end]) => start <= end)
    .sort((a, b) => a[0] - b[0]);

  const merged: Array<[number, number]> = [];
  for (const w of windows) {
    const last = merged[merged.length - 1];
    if (last && w[0] <= last[1] + 1) {
      last[1] = Math.max(last[1], w[1]);
    } else {
      merged.push([w[0], w[1]]);
    }
  }

  const out: string[] = [];
  let next = 1;
  for (const [start, end] of merged) {
    if (start > next) out.push(`⋮ lines ${next}-${start - 1} omitted`);
    out.push(...lines.slice(start - 1, end));
    next = end + 1;
  }
  if (next <= lines.length) out.push(`⋮ lines ${next}-${lines.length} omitted`);
  return out.join("\n");
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
