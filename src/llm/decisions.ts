import { z } from "zod";

const triageDecisionSchema = z.object({
  category: z.enum(["bug_report", "feature_request", "question", "social", "unclear"]),
  reply: z.string().trim().min(1),
});

const commentDecisionSchema = z.object({
  category: z.enum(["chatter", "substantive"]),
  reply: z.string().trim().min(1),
});

export type TriageDecision = z.infer<typeof triageDecisionSchema>;
export type CommentDecision = z.infer<typeof commentDecisionSchema>;

/**
 * Reads a triage decision from model output. Output that is not the expected
 * JSON becomes an "unclear" decision carrying the raw text, so a misformatted
 * answer never closes an issue.
 */
export function parseTriageDecision(text: string): TriageDecision {
  const parsed = triageDecisionSchema.safeParse(extractJson(text));
  return parsed.success ? parsed.data : { category: "unclear", reply: text.trim() };
}

/** Same fallback rule: anything unparseable is treated as substantive. */
export function parseCommentDecision(text: string): CommentDecision {
  const parsed = commentDecisionSchema.safeParse(extractJson(text));
  return parsed.success ? parsed.data : { category: "substantive", reply: text.trim() };
}

function extractJson(text: string): unknown {
  const fenced = text.match(/```(?:json)?\s*\n([\s\S]*?)```/);
  const candidate = fenced?.[1] ?? text.slice(text.indexOf("{"), text.lastIndexOf("}") + 1);
  try {
    return JSON.parse(candidate);
  } catch {
    return null;
  }
}
