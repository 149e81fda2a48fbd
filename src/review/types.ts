import type { ParsedFile } from "../utils/diff-parser.js";

export type PlatformKind = "pull_request" | "issue" | "comment";

/** A webhook delivery reduced to what the pipeline needs. Frozen after parsing. */
export interface BotEvent {
  readonly deliveryId: string;
  readonly installationId: number;
  readonly platformKind: PlatformKind;
  readonly action: string;
  readonly repositoryId: string;
  readonly subjectNumber: number;
  readonly author: string;
  readonly rawBody: string;
  readonly isDraft: boolean;
  readonly title: string;
  readonly headSha?: string;
  readonly commentId?: number;
  /** Comment events only: the issue or PR description and its author. */
  readonly subjectBody?: string;
  readonly subjectAuthor?: string;
  /** Comment events only: whether the comment thread belongs to a pull request. */
  readonly onPullRequest: boolean;
}

/** Unvalidated event fields as read from a webhook payload. */
export type RawEvent = { [K in keyof BotEvent]?: unknown };

export type Intent =
  | "DEFER_DRAFT"
  | "REVIEW_PR"
  | "RE_REVIEW"
  | "TRIAGE_ISSUE"
  | "RESPOND_ISSUE_COMMENT"
  | "CLOSE_THREAD"
  | "REOPEN_THREAD"
  | "IGNORE";

export type Phase =
  | "NEW"
  | "AWAITING_READY"
  | "REVIEWED"
  | "CLOSED"
  | "AWAITING_IMPROVEMENT"
  | "CLOSED_AS_CHATTER";

export interface SubjectKey {
  repositoryId: string;
  subjectNumber: number;
}

export interface ConversationEntry {
  at: string;
  intent: Intent;
  revision: string | null;
  excerpt: string;
}

export interface ThreadState extends SubjectKey {
  phase: Phase;
  initialCommentPosted: boolean;
  lastReviewedRevision: string | null;
  conversation: ConversationEntry[];
  updatedAt: string;
}

export interface RuleSet {
  repositoryId: string;
  rules: string[];
}

export interface ReviewContext {
  /** Path to full current content (or an excerpt, see `trimmedPaths`). */
  changedFiles: Record<string, string>;
  diffHunks: ParsedFile[];
  rules: RuleSet;
  conversationSummary: ConversationEntry[];
  truncated: boolean;
  /** Files cut down to the lines around their hunks. */
  trimmedPaths: string[];
  /** Files whose content was dropped to fit the size limit. */
  omittedPaths: string[];
  /** Files that could not be fetched in time. */
  unavailablePaths: string[];
}

export type OutcomeStatus =
  | "posted"
  | "transitioned"
  | "noop"
  | "ignored"
  | "dropped"
  | "conflict"
  | "failed";

export interface Outcome {
  status: OutcomeStatus;
  intent: Intent | null;
  reason?: string;
  commentId?: number;
  phase?: Phase;
}

export function subjectKey(event: Pick<BotEvent, "repositoryId" | "subjectNumber">): SubjectKey {
  return { repositoryId: event.repositoryId, subjectNumber: event.subjectNumber };
}

export function emptyRuleSet(repositoryId: string): RuleSet {
  return { repositoryId, rules: [] };
}
