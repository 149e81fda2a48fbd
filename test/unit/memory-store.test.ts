import { describe, it, expect, beforeEach } from "vitest";
import { MemoryThreadStore } from "../../src/state/memory-store.js";
import { appendConversation } from "../../src/state/store.js";
import type { ConversationEntry } from "../../src/review/types.js";

const key = { repositoryId: "acme/widgets", subjectNumber: 7 };
const limits = { maxEntries: 3, maxExcerptChars: 10, maxAgeMs: 86_400_000 };

function entry(at: string, excerpt = "ok", revision: string | null = null): ConversationEntry {
  return { at, intent: "REVIEW_PR", revision, excerpt };
}

describe("MemoryThreadStore", () => {
  let now: Date;
  let store: MemoryThreadStore;

  beforeEach(() => {
    now = new Date("2026-03-01T12:00:00.000Z");
    store = new MemoryThreadStore(limits, () => now);
  });

  it("treats an unknown thread as NEW", async () => {
    expect(await store.get(key)).toBeNull();
    expect(await store.compareAndSetPhase(key, "REVIEWED", "CLOSED")).toBe(false);
    expect(await store.compareAndSetPhase(key, "NEW", "REVIEWED")).toBe(true);

    const state = await store.get(key);
    expect(state?.phase).toBe("REVIEWED");
    expect(state?.initialCommentPosted).toBe(false);
    expect(state?.updatedAt).toBe("2026-03-01T12:00:00.000Z");
  });

  it("lets exactly one of many concurrent transitions win", async () => {
    const results = await Promise.all(
      Array.from({ length: 10 }, () => store.compareAndSetPhase(key, "NEW", "REVIEWED"))
    );

    expect(results.filter(Boolean)).toHaveLength(1);
  });

  it("returns copies that callers cannot mutate", async () => {
    await store.compareAndSetPhase(key, "NEW", "AWAITING_READY");
    const copy = await store.get(key);
    if (copy) copy.phase = "CLOSED";

    expect((await store.get(key))?.phase).toBe("AWAITING_READY");
  });

  it("records comments and the reviewed revision", async () => {
    await store.compareAndSetPhase(key, "NEW", "REVIEWED");
    const state = await store.markCommented(key, entry("2026-03-01T11:00:00.000Z", "first", "abc"));

    expect(state.initialCommentPosted).toBe(true);
    expect(state.lastReviewedRevision).toBe("abc");
    expect(state.conversation).toEqual([entry("2026-03-01T11:00:00.000Z", "first", "abc")]);
  });

  it("claims a marker once until it is released", async () => {
    expect(await store.claimMarker(key, "mention:1")).toBe(true);
    expect(await store.claimMarker(key, "mention:1")).toBe(false);
    expect(await store.claimMarker(key, "mention:2")).toBe(true);

    await store.releaseMarker(key, "mention:1");
    expect(await store.claimMarker(key, "mention:1")).toBe(true);
  });

  it("evicts a thread", async () => {
    await store.compareAndSetPhase(key, "NEW", "CLOSED");
    await store.evict(key);

    expect(await store.get(key)).toBeNull();
  });

  it("prunes only closed threads older than the cutoff", async () => {
    const other = { repositoryId: "acme/widgets", subjectNumber: 8 };
    const open = { repositoryId: "acme/widgets", subjectNumber: 9 };
    await store.compareAndSetPhase(key, "NEW", "CLOSED");
    await store.compareAndSetPhase(open, "NEW", "REVIEWED");
    now = new Date("2026-03-05T12:00:00.000Z");
    await store.compareAndSetPhase(other, "NEW", "CLOSED_AS_CHATTER");

    const pruned = await store.pruneClosed(new Date("2026-03-03T00:00:00.000Z"));

    expect(pruned).toBe(1);
    expect(await store.get(key)).toBeNull();
    expect((await store.get(other))?.phase).toBe("CLOSED_AS_CHATTER");
    expect((await store.get(open))?.phase).toBe("REVIEWED");
  });
});

describe("appendConversation", () => {
  const now = new Date("2026-03-02T00:00:00.000Z");

  it("clips long excerpts", () => {
    const [clipped] = appendConversation([], entry("2026-03-01T12:00:00.000Z", "abcdefghijklmno"), limits, now);

    expect(clipped?.excerpt).toBe("abcdefghij…");
  });

  it("keeps only the newest entries", () => {
    const history = [
      entry("2026-03-01T10:00:00.000Z", "a"),
      entry("2026-03-01T11:00:00.000Z", "b"),
      entry("2026-03-01T12:00:00.000Z", "c"),
    ];

    const result = appendConversation(history, entry("2026-03-01T13:00:00.000Z", "d"), limits, now);

    expect(result.map((e) => e.excerpt)).toEqual(["b", "c", "d"]);
  });

  it("ages out entries older than the window", () => {
    const history = [entry("2026-02-27T00:00:00.000Z", "stale")];

    const result = appendConversation(history, entry("2026-03-01T23:00:00.000Z", "fresh"), limits, now);

    expect(result.map((e) => e.excerpt)).toEqual(["fresh"]);
  });
});
