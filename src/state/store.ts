import type { ConversationEntry, Phase, SubjectKey, ThreadState } from "../review/types.js";

/**
 * Keyed thread-state store. `compareAndSetPhase` and `claimMarker` are the
 * only synchronization the pipeline relies on; every other write happens
 * after one of them succeeded.
 */
export interface ThreadStateStore {
  get(key: SubjectKey): Promise<ThreadState | null>;
  /** An absent record is treated as phase NEW and created on success. */
  compareAndSetPhase(key: SubjectKey, expected: Phase, next: Phase): Promise<boolean>;
  markCommented(key: SubjectKey, entry?: ConversationEntry): Promise<ThreadState>;
  /** True for the first caller only. */
  claimMarker(key: SubjectKey, marker: string): Promise<boolean>;
  releaseMarker(key: SubjectKey, marker: string): Promise<void>;
  evict(key: SubjectKey): Promise<void>;
  /** Drops CLOSED and CLOSED_AS_CHATTER records last touched before `before`. */
  pruneClosed(before: Date): Promise<number>;
}

export interface ConversationLimits {
  maxEntries: number;
  maxExcerptChars: number;
  maxAgeMs: number;
}

export const TERMINAL_PHASES: readonly Phase[] = ["CLOSED", "CLOSED_AS_CHATTER"];

export function newThreadState(key: SubjectKey, now: Date): ThreadState {
  return {
    repositoryId: key.repositoryId,
    subjectNumber: key.subjectNumber,
    phase: "NEW",
    initialCommentPosted: false,
    lastReviewedRevision: null,
    conversation: [],
    updatedAt: now.toISOString(),
  };
}

/** Appends `entry`, clips its excerpt and ages out what no longer fits. */
export function appendConversation(
  history: ConversationEntry[],
  entry: ConversationEntry,
  limits: ConversationLimits,
  now: Date
): ConversationEntry[] {
  const clipped: ConversationEntry = {
    ...entry,
    excerpt:
      entry.excerpt.length > limits.maxExcerptChars
        ? `${entry.excerpt.slice(0, limits.maxExcerptChars)}…`
        : entry.excerpt,
  };
  const cutoff = now.getTime() - limits.maxAgeMs;
  return [...history, clipped]
    .filter((e) => Date.parse(e.at) >= cutoff)
    .slice(-limits.maxEntries);
}

export function keyString(key: SubjectKey): string {
  return `${key.repositoryId}#${key.subjectNumber}`;
}
