import type { ConversationEntry, Phase, SubjectKey, ThreadState } from "../review/types.js";
import {
  TERMINAL_PHASES,
  appendConversation,
  keyString,
  newThreadState,
  type ConversationLimits,
  type ThreadStateStore,
} from "./store.js";

interface StoredThread {
  state: ThreadState;
  markers: Set<string>;
}

/**
 * In-process store. Each method does its read-check-write without awaiting
 * in between, so concurrent units of work on the event loop cannot interleave
 * inside a compare-and-set.
 */
export class MemoryThreadStore implements ThreadStateStore {
  private readonly records = new Map<string, StoredThread>();

  constructor(
    private readonly limits: ConversationLimits,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async get(key: SubjectKey): Promise<ThreadState | null> {
    const record = this.records.get(keyString(key));
    return record ? structuredClone(record.state) : null;
  }

  async compareAndSetPhase(key: SubjectKey, expected: Phase, next: Phase): Promise<boolean> {
    const record = this.records.get(keyString(key));
    const current = record?.state.phase ?? "NEW";
    if (current !== expected) return false;

    const target = record ?? this.create(key);
    target.state.phase = next;
    target.state.updatedAt = this.clock().toISOString();
    return true;
  }

  async markCommented(key: SubjectKey, entry?: ConversationEntry): Promise<ThreadState> {
    const record = this.records.get(keyString(key)) ?? this.create(key);
    const now = this.clock();
    record.state.initialCommentPosted = true;
    record.state.updatedAt = now.toISOString();
    if (entry) {
      record.state.conversation = appendConversation(
        record.state.conversation,
        entry,
        this.limits,
        now
      );
      if (entry.revision) record.state.lastReviewedRevision = entry.revision;
    }
    return structuredClone(record.state);
  }

  async claimMarker(key: SubjectKey, marker: string): Promise<boolean> {
    const record = this.records.get(keyString(key)) ?? this.create(key);
    if (record.markers.has(marker)) return false;
    record.markers.add(marker);
    return true;
  }

  async releaseMarker(key: SubjectKey, marker: string): Promise<void> {
    this.records.get(keyString(key))?.markers.delete(marker);
  }

  async evict(key: SubjectKey): Promise<void> {
    this.records.delete(keyString(key));
  }

  async pruneClosed(before: Date): Promise<number> {
    let pruned = 0;
    for (const [id, record] of this.records) {
      if (
        TERMINAL_PHASES.includes(record.state.phase) &&
        Date.parse(record.state.updatedAt) < before.getTime()
      ) {
        this.records.delete(id);
        pruned++;
      }
    }
    return pruned;
  }

  private create(key: SubjectKey): StoredThread {
    const record: StoredThread = { state: newThreadState(key, this.clock()), markers: new Set() };
    this.records.set(keyString(key), record);
    return record;
  }
}
