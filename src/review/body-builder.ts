import { BOT_TAG } from "../config/defaults.js";
import type { ReviewContext } from "./types.js";

export type BodyKind = "review" | "follow-up" | "issue" | "plain";

const HEADINGS: Record<BodyKind, string | null> = {
  review: "## Steward Review",
  "follow-up": "## Steward Follow-up",
  issue: "## Steward Issue Helper",
  plain: null,
};

export interface BodyNotes {
  context?: Pick<ReviewContext, "trimmedPaths" | "omittedPaths" | "unavailablePaths">;
  /** Path of a rules file that could not be parsed. */
  rulesUnavailable?: string;
}

interface BodyOptions {
  kind: BodyKind;
  text: string;
  author?: string;
  notes?: BodyNotes;
}

/**
 * Wraps generated or fixed text in the bot's comment layout: hidden tag,
 * heading, greeting, text, then any caveats about partial context.
 */
export function buildCommentBody(options: BodyOptions): string {
  const { kind, text, author, notes } = options;
  const parts: string[] = [BOT_TAG];

  const heading = HEADINGS[kind];
  if (heading) parts.push(`${heading}\n`);
  if (author && kind !== "plain") parts.push(`Hey @${author}!\n`);
  parts.push(text.trim());

  const caveats = notes ? formatNotes(notes) : [];
  if (caveats.length > 0) {
    parts.push("");
    parts.push(...caveats);
  }

  return parts.join("\n");
}

function formatNotes(notes: BodyNotes): string[] {
  const lines: string[] = [];
  const ctx = notes.context;

  if (ctx) {
    const cut = [...ctx.trimmedPaths, ...ctx.omittedPaths];
    if (cut.length > 0) {
      lines.push(
        `> **Note:** ${codeList(cut)} ${cut.length === 1 ? "was" : "were"} too large to include in full, so parts of this review are partial.`
      );
    }
    if (ctx.unavailablePaths.length > 0) {
      lines.push(
        `> **Note:** I couldn't fetch ${codeList(ctx.unavailablePaths)}, so ${ctx.unavailablePaths.length === 1 ? "it was" : "they were"} reviewed from the diff only.`
      );
    }
  }

  if (notes.rulesUnavailable) {
    lines.push(
      `> **Note:** The custom rules in \`${notes.rulesUnavailable}\` could not be parsed, so they were not applied.`
    );
  }
  return lines;
}

function codeList(paths: string[]): string {
  return paths.map((p) => `\`${p}\``).join(", ");
}

// ─── Fixed messages ───

export function trivialChangeNote(author: string): string {
  return (
    `Thanks for the cleanup, @${author}! Appreciate you keeping the docs and project files tidy. ` +
    `Nothing here needs a code review, so I'll leave the merge to the maintainers.`
  );
}

export function setupNotice(setupUrl: string | null): string {
  const where = setupUrl
    ? `[finish the setup](${setupUrl})`
    : "finish the setup (re-install the app on this repository to reach the setup page)";
  return `👋 Hello! To get AI-powered reviews, please ${where} and add an API key.`;
}

export function questionRedirect(author: string): string {
  return (
    `Hey @${author}! It looks like you have a question. For general questions, the Discussions tab ` +
    `is the best place to ask, so I'm closing this issue to keep the tracker focused on bugs and features.`
  );
}
