import { z } from "zod";
import { MalformedEventError } from "../utils/errors.js";
import type { BotEvent, Intent, RawEvent } from "./types.js";

const eventSchema = z
  .object({
    deliveryId: z.string().default(""),
    installationId: z.number().int().positive(),
    platformKind: z.enum(["pull_request", "issue", "comment"]),
    action: z.string().min(1),
    repositoryId: z.string().regex(/^[^/\s]+\/[^/\s]+$/, "expected owner/name"),
    subjectNumber: z.number().int().positive(),
    author: z.string().min(1),
    rawBody: z.string(),
    isDraft: z.boolean(),
    title: z.string().default(""),
    headSha: z.string().min(1).optional(),
    commentId: z.number().int().positive().optional(),
    subjectBody: z.string().optional(),
    subjectAuthor: z.string().min(1).optional(),
    onPullRequest: z.boolean().default(false),
  })
  .superRefine((e, ctx) => {
    if (e.platformKind === "comment" && e.commentId === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["commentId"],
        message: "comment events need a comment id",
      });
    }
  });

export function parseEvent(raw: RawEvent): BotEvent {
  const result = eventSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedEventError(
      result.error.issues.map((i) => `${i.path.join(".") || "event"}: ${i.message}`)
    );
  }
  return Object.freeze(result.data);
}

export interface ClassifierOptions {
  mentionToken: string;
  botLogin: string;
}

/**
 * Maps an event to the one thing the bot should do about it. Rules are
 * checked in priority order; anything unmatched is IGNORE.
 */
export function classifyEvent(event: BotEvent, opts: ClassifierOptions): Intent {
  const { platformKind, action } = event;

  if (platformKind === "pull_request") {
    if (action === "opened" && event.isDraft) return "DEFER_DRAFT";
    if (action === "ready_for_review") return "REVIEW_PR";
    if (action === "opened") return "REVIEW_PR";
    if (action === "closed") return "CLOSE_THREAD";
    if (action === "reopened") return "REOPEN_THREAD";
    return "IGNORE";
  }

  if (platformKind === "comment") {
    if (action !== "created") return "IGNORE";
    if (event.author === opts.botLogin) return "IGNORE";
    if (!event.rawBody.includes(opts.mentionToken)) return "IGNORE";
    return event.onPullRequest ? "RE_REVIEW" : "RESPOND_ISSUE_COMMENT";
  }

  if (action === "opened") return "TRIAGE_ISSUE";
  if (action === "closed") return "CLOSE_THREAD";
  if (action === "reopened") return "REOPEN_THREAD";
  return "IGNORE";
}
