import { describe, it, expect } from "vitest";
import { classifyEvent, parseEvent } from "../../src/review/classifier.js";
import { MalformedEventError } from "../../src/utils/errors.js";
import type { RawEvent } from "../../src/review/types.js";
import { commentEvent, issueEvent, pullRequestEvent } from "../fixtures/fakes.js";

const opts = { mentionToken: "@steward", botLogin: "steward[bot]" };

function classify(raw: RawEvent) {
  return classifyEvent(parseEvent(raw), opts);
}

describe("parseEvent", () => {
  it("returns a frozen event", () => {
    const event = parseEvent(pullRequestEvent());

    expect(event.repositoryId).toBe("acme/widgets");
    expect(event.onPullRequest).toBe(false);
    expect(Object.isFrozen(event)).toBe(true);
  });

  it("rejects events missing required fields", () => {
    expect(() => parseEvent(pullRequestEvent({ author: undefined }))).toThrow(MalformedEventError);
  });

  it("rejects a repository id that is not owner/name", () => {
    try {
      parseEvent(pullRequestEvent({ repositoryId: "widgets" }));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedEventError);
      expect(err instanceof MalformedEventError && err.issues).toEqual([
        "repositoryId: expected owner/name",
      ]);
    }
  });

  it("requires a comment id on comment events", () => {
    expect(() => parseEvent(commentEvent({ commentId: undefined }))).toThrow(
      "commentId: comment events need a comment id"
    );
  });

  it("rejects mistyped fields", () => {
    expect(() => parseEvent(pullRequestEvent({ subjectNumber: "7" }))).toThrow(MalformedEventError);
  });
});

describe("classifyEvent", () => {
  it("defers drafts", () => {
    expect(classify(pullRequestEvent({ isDraft: true }))).toBe("DEFER_DRAFT");
  });

  it("reviews opened and ready pull requests", () => {
    expect(classify(pullRequestEvent())).toBe("REVIEW_PR");
    expect(classify(pullRequestEvent({ action: "ready_for_review" }))).toBe("REVIEW_PR");
  });

  it("reviews a ready_for_review event even if the payload still says draft", () => {
    expect(classify(pullRequestEvent({ action: "ready_for_review", isDraft: true }))).toBe("REVIEW_PR");
  });

  it("ignores other pull request actions", () => {
    expect(classify(pullRequestEvent({ action: "synchronize" }))).toBe("IGNORE");
    expect(classify(pullRequestEvent({ action: "edited" }))).toBe("IGNORE");
  });

  it("routes mentions by thread kind", () => {
    expect(classify(commentEvent())).toBe("RE_REVIEW");
    expect(classify(commentEvent({ onPullRequest: false }))).toBe("RESPOND_ISSUE_COMMENT");
  });

  it("matches the mention token case-sensitively", () => {
    expect(classify(commentEvent({ rawBody: "@Steward please look" }))).toBe("IGNORE");
    expect(classify(commentEvent({ rawBody: "thanks, looks good" }))).toBe("IGNORE");
  });

  it("ignores the bot's own comments", () => {
    expect(classify(commentEvent({ author: "steward[bot]" }))).toBe("IGNORE");
  });

  it("ignores edited and deleted comments", () => {
    expect(classify(commentEvent({ action: "edited" }))).toBe("IGNORE");
    expect(classify(commentEvent({ action: "deleted" }))).toBe("IGNORE");
  });

  it("triages opened issues", () => {
    expect(classify(issueEvent())).toBe("TRIAGE_ISSUE");
    expect(classify(issueEvent({ action: "labeled" }))).toBe("IGNORE");
  });

  it("closes threads for closed pull requests and issues", () => {
    expect(classify(pullRequestEvent({ action: "closed" }))).toBe("CLOSE_THREAD");
    expect(classify(issueEvent({ action: "closed" }))).toBe("CLOSE_THREAD");
  });

  it("reopens threads for reopened pull requests and issues", () => {
    expect(classify(pullRequestEvent({ action: "reopened" }))).toBe("REOPEN_THREAD");
    expect(classify(issueEvent({ action: "reopened" }))).toBe("REOPEN_THREAD");
  });
});
