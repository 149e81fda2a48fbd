import { describe, it, expect } from "vitest";
import { parseCommentDecision, parseTriageDecision } from "../../src/llm/decisions.js";

describe("parseTriageDecision", () => {
  it("reads a fenced JSON block", () => {
    const text = 'Here you go:\n```json\n{"category": "social", "reply": "Ha! Closing this one."}\n```';

    expect(parseTriageDecision(text)).toEqual({ category: "social", reply: "Ha! Closing this one." });
  });

  it("reads bare JSON surrounded by prose", () => {
    const text = 'Sure. {"category": "bug_report", "reply": " Thanks for the report. "} Done.';

    expect(parseTriageDecision(text)).toEqual({ category: "bug_report", reply: "Thanks for the report." });
  });

  it("falls back to unclear for plain text", () => {
    expect(parseTriageDecision("  Could you add steps to reproduce?  ")).toEqual({
      category: "unclear",
      reply: "Could you add steps to reproduce?",
    });
  });

  it("falls back to unclear for an unknown category", () => {
    const text = '{"category": "spam", "reply": "bye"}';

    expect(parseTriageDecision(text)).toEqual({ category: "unclear", reply: text });
  });
});

describe("parseCommentDecision", () => {
  it("reads a chatter decision", () => {
    const text = '```json\n{"category": "chatter", "reply": "Thanks! Closing."}\n```';

    expect(parseCommentDecision(text).category).toBe("chatter");
  });

  it("treats malformed output as substantive", () => {
    expect(parseCommentDecision('{"category": "chatter", "reply": ')).toEqual({
      category: "substantive",
      reply: '{"category": "chatter", "reply":',
    });
  });
});
