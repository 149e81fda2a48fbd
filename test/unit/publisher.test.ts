import { describe, it, expect, beforeEach } from "vitest";
import { ResponsePublisher } from "../../src/review/publisher.js";
import { MemoryThreadStore } from "../../src/state/memory-store.js";
import { PublishConflictError, PublishFailureError } from "../../src/utils/errors.js";
import { FakeProvider, REPO, httpError } from "../fixtures/fakes.js";

const subject = { repositoryId: REPO, subjectNumber: 7 };
const limits = { maxEntries: 5, maxExcerptChars: 100, maxAgeMs: 86_400_000 };

describe("ResponsePublisher", () => {
  let store: MemoryThreadStore;
  let provider: FakeProvider;
  let publisher: ResponsePublisher;

  beforeEach(() => {
    store = new MemoryThreadStore(limits);
    provider = new FakeProvider();
    publisher = new ResponsePublisher(store, { maxAttempts: 3, retryBaseDelayMs: 1 });
  });

  it("posts after winning the transition and records the comment", async () => {
    const result = await publisher.publish(provider, {
      subject,
      body: "review",
      transition: { expected: "NEW", next: "REVIEWED" },
      entry: { at: new Date().toISOString(), intent: "REVIEW_PR", revision: "sha-1", excerpt: "review" },
    });

    expect(result).toEqual({ commentId: 1000, phase: "REVIEWED" });
    expect(provider.posted.map((p) => p.body)).toEqual(["review"]);
    const state = await store.get(subject);
    expect(state?.initialCommentPosted).toBe(true);
    expect(state?.lastReviewedRevision).toBe("sha-1");
  });

  it("posts nothing when the transition was already taken", async () => {
    await store.compareAndSetPhase(subject, "NEW", "REVIEWED");

    await expect(
      publisher.publish(provider, { subject, body: "review", transition: { expected: "NEW", next: "REVIEWED" } })
    ).rejects.toBeInstanceOf(PublishConflictError);
    expect(provider.posted).toEqual([]);
  });

  it("retries transient post failures", async () => {
    provider.postErrors = [httpError(502), httpError(503)];

    const result = await publisher.publish(provider, { subject, body: "hello" });

    expect(result.commentId).toBe(1000);
    expect(provider.posted).toHaveLength(1);
  });

  it("undoes the transition when posting fails for good", async () => {
    provider.postErrors = [httpError(403)];

    await expect(
      publisher.publish(provider, { subject, body: "review", transition: { expected: "NEW", next: "REVIEWED" } })
    ).rejects.toBeInstanceOf(PublishFailureError);

    expect((await store.get(subject))?.phase).toBe("NEW");
    expect(await store.compareAndSetPhase(subject, "NEW", "REVIEWED")).toBe(true);
  });

  it("releases the marker when posting fails for good", async () => {
    await store.claimMarker(subject, "mention:9");
    provider.postErrors = [httpError(500), httpError(500), httpError(500)];

    await expect(publisher.publish(provider, { subject, body: "reply", marker: "mention:9" })).rejects.toThrow(
      PublishFailureError
    );

    expect(await store.claimMarker(subject, "mention:9")).toBe(true);
  });

  it("closes the subject when asked", async () => {
    const result = await publisher.publish(provider, {
      subject,
      body: "bye",
      transition: { expected: "NEW", next: "CLOSED_AS_CHATTER" },
      close: true,
    });

    expect(result.phase).toBe("CLOSED_AS_CHATTER");
    expect(provider.closed).toEqual([subject]);
  });

  it("keeps the comment recorded when closing fails", async () => {
    provider.closeErrors = [httpError(403)];

    await expect(
      publisher.publish(provider, {
        subject,
        body: "bye",
        transition: { expected: "NEW", next: "CLOSED_AS_CHATTER" },
        close: true,
      })
    ).rejects.toThrow("Comment 1000 posted but closing acme/widgets#7 failed");

    const state = await store.get(subject);
    expect(state?.phase).toBe("CLOSED_AS_CHATTER");
    expect(state?.initialCommentPosted).toBe(true);
  });
});
