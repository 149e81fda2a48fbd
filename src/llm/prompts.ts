import { formatHunks } from "../utils/diff-parser.js";
import type { ConversationEntry, Intent, ReviewContext } from "../review/types.js";

export type PromptIntent = Exclude<Intent, "IGNORE" | "CLOSE_THREAD" | "REOPEN_THREAD">;

export interface PromptSubject {
  repositoryId: string;
  number: number;
  title: string;
  author: string;
  /** PR description or issue body. */
  body: string;
}

export interface PromptInput {
  subject: PromptSubject;
  context: ReviewContext;
  /** The rules file existed but could not be parsed. */
  rulesUnavailable: boolean;
  previousRevision: string | null;
  currentRevision: string | null;
  /** The comment that mentioned the bot, for mention intents. */
  trigger?: string;
}

export type PromptPlan =
  | { kind: "fixed"; body: string }
  | { kind: "model"; system: string; user: string };

/**
 * Builds the instructions for one intent. Pure: the same input always yields
 * the same text, with files, hunks and history in a stable order.
 */
export function buildPrompt(intent: PromptIntent, input: PromptInput): PromptPlan {
  switch (intent) {
    case "DEFER_DRAFT":
      return { kind: "fixed", body: draftCourtesy(input.subject.author) };
    case "REVIEW_PR":
      return { kind: "model", system: reviewSystemPrompt(input), user: reviewUserPrompt(input) };
    case "RE_REVIEW":
      return { kind: "model", system: followUpSystemPrompt(input), user: followUpUserPrompt(input) };
    case "TRIAGE_ISSUE":
      return { kind: "model", system: TRIAGE_SYSTEM_PROMPT, user: issueUserPrompt(input) };
    case "RESPOND_ISSUE_COMMENT":
      return { kind: "model", system: COMMENT_SYSTEM_PROMPT, user: commentUserPrompt(input) };
  }
}

export function draftCourtesy(author: string): string {
  return (
    `Hey @${author}, thanks for starting this PR! I see it's still a draft, ` +
    `so I'll wait until you mark it as "Ready for review" before doing a full analysis. ` +
    `No pressure, just let me know when you're ready!`
  );
}

// ─── Pull requests ───

const REVIEW_GUIDELINES = `## Guidelines
- Start with a short summary of what the change does.
- Flag bugs, logic errors, security problems and missing edge cases.
- Apply every custom rule below and say which rule a finding comes from.
- Cite specific files and line numbers (use the L<number> markers from the diff).
- Praise good work briefly. Skip style nits that do not affect readability.
- Keep it friendly, concise and in GitHub-flavored markdown. Do not wrap the reply in a code block.`;

function reviewSystemPrompt(input: PromptInput): string {
  return [
    "You are Steward, an expert code reviewer for GitHub pull requests.",
    "You see the full content of every changed file, not only the diff, so judge changes in the context of the surrounding code.",
    "",
    REVIEW_GUIDELINES,
    caveatInstructions(input),
  ]
    .filter(Boolean)
    .join("\n");
}

function followUpSystemPrompt(input: PromptInput): string {
  return [
    "You are Steward, doing a follow-up review on a pull request you have commented on before.",
    "The author asked for another look.",
    "",
    "## Follow-up Task",
    "1. Acknowledge the author's request and any updates.",
    "2. Compare the current code with your previous comments. Say which suggestions were addressed and gently remind them of the ones that were not.",
    "3. Focus on what changed since your last review, then check the new code for new issues.",
    "4. Answer any question in the triggering comment.",
    "",
    REVIEW_GUIDELINES,
    caveatInstructions(input),
  ]
    .filter(Boolean)
    .join("\n");
}

function reviewUserPrompt(input: PromptInput): string {
  const { subject, context } = input;
  return [
    `# Pull Request #${subject.number} in ${subject.repositoryId}`,
    `**Title:** ${subject.title}`,
    `**Author:** @${subject.author}`,
    subject.body.trim() ? `**Description:**\n${subject.body.trim()}` : "",
    rulesSection(context),
    filesSection(context),
    diffSection(context),
    partialSection(input),
  ]
    .filter(Boolean)
    .join("\n\n");
}

function followUpUserPrompt(input: PromptInput): string {
  const revisions = [
    `**Last reviewed revision:** ${input.previousRevision ?? "unknown"}`,
    `**Current revision:** ${input.currentRevision ?? "unknown"}`,
  ].join("\n");

  return [
    reviewUserPrompt(input),
    conversationSection(input.context.conversationSummary),
    revisions,
    input.trigger ? `## Triggering Comment\n${input.trigger.trim()}` : "",
  ]
    .filter(Boolean)
    .join("\n\n");
}

// ─── Issues ───

const TRIAGE_SYSTEM_PROMPT = `You are Steward, a triage assistant for GitHub issues.

## Task
1. Classify the issue into exactly one category:
   - "bug_report": reports broken behavior
   - "feature_request": asks for new behavior
   - "question": a usage question better suited to Discussions
   - "social": greetings, thanks, jokes or other chatter with nothing to act on
   - "unclear": too vague to act on
2. Write the reply:
   - bug_report, feature_request, unclear: assess the report's quality. If it is vague (for example "it broke"), coach the author with specific, friendly suggestions: steps to reproduce, expected vs actual behavior, versions, logs. If it is clear and actionable, thank them for the good report.
   - social: a short, witty, friendly reply that says you are closing the issue to keep the tracker tidy.
   - question: a one-line acknowledgement.

Only pick "social" when there is nothing actionable. When unsure, pick "unclear".

## Output Format
Return a JSON object inside a \`\`\`json code block:
{
  "category": "bug_report | feature_request | question | social | unclear",
  "reply": "markdown reply to post on the issue"
}`;

const COMMENT_SYSTEM_PROMPT = `You are Steward, an assistant that answers mentions on GitHub issues.

## Task
1. Classify the triggering comment:
   - "chatter": social or non-actionable (greetings, thanks, jokes, "+1")
   - "substantive": a question, report or request that deserves a real answer
2. Write the reply:
   - chatter: a short, witty, friendly reply that says you are closing the issue to keep the tracker tidy.
   - substantive: a helpful answer grounded in the issue and the previous conversation. Ask for missing details if needed.

Only pick "chatter" when there is nothing to act on.

## Output Format
Return a JSON object inside a \`\`\`json code block:
{
  "category": "chatter | substantive",
  "reply": "markdown reply to post on the issue"
}`;

function issueUserPrompt(input: PromptInput): string {
  const { subject } = input;
  return [
    `# Issue #${subject.number} in ${subject.repositoryId}`,
    `**Title:** ${subject.title}`,
    `**Author:** @${subject.author}`,
    `**Body:**\n${subject.body.trim() || "No description provided."}`,
  ].join("\n\n");
}

function commentUserPrompt(input: PromptInput): string {
  return [
    issueUserPrompt(input),
    conversationSection(input.context.conversationSummary),
    `## Triggering Comment\n${input.trigger?.trim() || "(empty)"}`,
  ]
    .filter(Boolean)
    .join("\n\n");
}

// ─── Sections ───

function rulesSection(context: ReviewContext): string {
  const { rules } = context.rules;
  if (rules.length === 0) return "## Custom Rules\nNo custom rules provided.";
  return `## Custom Rules\n${rules.map((r) => `- ${r}`).join("\n")}`;
}

function filesSection(context: ReviewContext): string {
  const paths = Object.keys(context.changedFiles).sort();
  if (paths.length === 0) return "";

  const trimmed = new Set(context.trimmedPaths);
  const blocks = paths.map((path) => {
    const label = trimmed.has(path) ? `${path} (excerpt around the changes)` : path;
    return `### ${label}\n\`\`\`\n${context.changedFiles[path]}\n\`\`\``;
  });
  return `## Full File Contents\n\n${blocks.join("\n\n")}`;
}

function diffSection(context: ReviewContext): string {
  if (context.diffHunks.length === 0) return "";
  const blocks = context.diffHunks.map((file) => {
    const body = file.hunks.length > 0 ? formatHunks(file) : "(diff omitted)";
    return `### ${file.filename} (${file.status})\n\`\`\`diff\n${body}\n\`\`\``;
  });
  return `## Diff\n\n${blocks.join("\n\n")}`;
}

function conversationSection(entries: ConversationEntry[]): string {
  if (entries.length === 0) {
    return "## Your Previous Comments\nYou have no record of earlier comments on this thread; take a fresh look.";
  }
  const items = entries.map((e, i) => {
    const revision = e.revision ? ` at ${e.revision}` : "";
    return `${i + 1}. (${e.at}, ${e.intent}${revision})\n${e.excerpt}`;
  });
  return `## Your Previous Comments\n${items.join("\n\n")}`;
}

function partialSection(input: PromptInput): string {
  const { context } = input;
  const lines: string[] = [];
  if (context.omittedPaths.length > 0) {
    lines.push(`- Left out to fit the size limit: ${context.omittedPaths.join(", ")}`);
  }
  if (context.trimmedPaths.length > 0) {
    lines.push(`- Shown only around the changes: ${context.trimmedPaths.join(", ")}`);
  }
  if (context.unavailablePaths.length > 0) {
    lines.push(`- Could not be fetched: ${context.unavailablePaths.join(", ")}`);
  }
  return lines.length > 0 ? `## Partial Context\n${lines.join("\n")}` : "";
}

function caveatInstructions(input: PromptInput): string {
  const notes: string[] = [];
  const { context } = input;
  if (context.truncated || context.unavailablePaths.length > 0) {
    notes.push(
      "- Some file content was left out (see Partial Context). Say briefly that the review of those files is partial."
    );
  }
  if (input.rulesUnavailable) {
    notes.push(
      "- The repository's custom rules file could not be parsed. Say briefly that custom rules were not applied."
    );
  }
  return notes.length > 0 ? `\n## Caveats\n${notes.join("\n")}` : "";
}
