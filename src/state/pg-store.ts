import type pg from "pg";
import { z } from "zod";
import type { ConversationEntry, Phase, SubjectKey, ThreadState } from "../review/types.js";
import {
  TERMINAL_PHASES,
  appendConversation,
  type ConversationLimits,
  type ThreadStateStore,
} from "./store.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "state-pg" });

const phaseSchema = z.enum([
  "NEW",
  "AWAITING_READY",
  "REVIEWED",
  "CLOSED",
  "AWAITING_IMPROVEMENT",
  "CLOSED_AS_CHATTER",
]);

const conversationSchema = z.array(
  z.object({
    at: z.string(),
    intent: z.enum([
      "DEFER_DRAFT",
      "REVIEW_PR",
      "RE_REVIEW",
      "TRIAGE_ISSUE",
      "RESPOND_ISSUE_COMMENT",
      "CLOSE_THREAD",
      "REOPEN_THREAD",
      "IGNORE",
    ]),
    revision: z.string().nullable(),
    excerpt: z.string(),
  })
);

const rowSchema = z.object({
  repository_id: z.string(),
  subject_number: z.number(),
  phase: phaseSchema,
  initial_comment_posted: z.boolean(),
  last_reviewed_revision: z.string().nullable(),
  conversation: conversationSchema,
  updated_at: z.date(),
});

function toState(row: unknown): ThreadState {
  const r = rowSchema.parse(row);
  return {
    repositoryId: r.repository_id,
    subjectNumber: r.subject_number,
    phase: r.phase,
    initialCommentPosted: r.initial_comment_posted,
    lastReviewedRevision: r.last_reviewed_revision,
    conversation: r.conversation,
    updatedAt: r.updated_at.toISOString(),
  };
}

/**
 * PostgreSQL-backed store for multi-instance deployments. Phase changes are a
 * single conditional UPDATE, so two processes cannot both win a transition.
 */
export class PgThreadStore implements ThreadStateStore {
  constructor(
    private readonly pool: pg.Pool,
    private readonly limits: ConversationLimits
  ) {}

  async ensureSchema(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS thread_states (
        repository_id TEXT NOT NULL,
        subject_number INTEGER NOT NULL,
        phase TEXT NOT NULL DEFAULT 'NEW',
        initial_comment_posted BOOLEAN NOT NULL DEFAULT false,
        last_reviewed_revision TEXT,
        conversation JSONB NOT NULL DEFAULT '[]'::jsonb,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        PRIMARY KEY (repository_id, subject_number)
      );

      CREATE TABLE IF NOT EXISTS thread_markers (
        repository_id TEXT NOT NULL,
        subject_number INTEGER NOT NULL,
        marker TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        PRIMARY KEY (repository_id, subject_number, marker)
      );

      CREATE INDEX IF NOT EXISTS idx_thread_states_phase_ts
        ON thread_states(phase, updated_at);
    `);
    log.info("Thread state tables initialized");
  }

  async get(key: SubjectKey): Promise<ThreadState | null> {
    const { rows } = await this.pool.query(
      `SELECT * FROM thread_states WHERE repository_id = $1 AND subject_number = $2`,
      [key.repositoryId, key.subjectNumber]
    );
    return rows.length > 0 ? toState(rows[0]) : null;
  }

  async compareAndSetPhase(key: SubjectKey, expected: Phase, next: Phase): Promise<boolean> {
    await this.ensureRow(key);
    const { rowCount } = await this.pool.query(
      `UPDATE thread_states SET phase = $4, updated_at = NOW()
       WHERE repository_id = $1 AND subject_number = $2 AND phase = $3`,
      [key.repositoryId, key.subjectNumber, expected, next]
    );
    return (rowCount ?? 0) === 1;
  }

  async markCommented(key: SubjectKey, entry?: ConversationEntry): Promise<ThreadState> {
    await this.ensureRow(key);
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const { rows } = await client.query(
        `SELECT * FROM thread_states
         WHERE repository_id = $1 AND subject_number = $2 FOR UPDATE`,
        [key.repositoryId, key.subjectNumber]
      );
      const current = toState(rows[0]);
      const conversation = entry
        ? appendConversation(current.conversation, entry, this.limits, new Date())
        : current.conversation;
      const revision = entry?.revision ?? current.lastReviewedRevision;

      const updated = await client.query(
        `UPDATE thread_states
         SET initial_comment_posted = true, conversation = $3::jsonb,
             last_reviewed_revision = $4, updated_at = NOW()
         WHERE repository_id = $1 AND subject_number = $2
         RETURNING *`,
        [key.repositoryId, key.subjectNumber, JSON.stringify(conversation), revision]
      );
      await client.query("COMMIT");
      return toState(updated.rows[0]);
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }

  async claimMarker(key: SubjectKey, marker: string): Promise<boolean> {
    const { rowCount } = await this.pool.query(
      `INSERT INTO thread_markers (repository_id, subject_number, marker)
       VALUES ($1, $2, $3)
       ON CONFLICT DO NOTHING`,
      [key.repositoryId, key.subjectNumber, marker]
    );
    return (rowCount ?? 0) === 1;
  }

  async releaseMarker(key: SubjectKey, marker: string): Promise<void> {
    await this.pool.query(
      `DELETE FROM thread_markers
       WHERE repository_id = $1 AND subject_number = $2 AND marker = $3`,
      [key.repositoryId, key.subjectNumber, marker]
    );
  }

  async evict(key: SubjectKey): Promise<void> {
    await this.pool.query(
      `DELETE FROM thread_markers WHERE repository_id = $1 AND subject_number = $2`,
      [key.repositoryId, key.subjectNumber]
    );
    await this.pool.query(
      `DELETE FROM thread_states WHERE repository_id = $1 AND subject_number = $2`,
      [key.repositoryId, key.subjectNumber]
    );
  }

  async pruneClosed(before: Date): Promise<number> {
    const { rows } = await this.pool.query(
      `DELETE FROM thread_states
       WHERE phase = ANY($1::text[]) AND updated_at < $2
       RETURNING repository_id, subject_number`,
      [TERMINAL_PHASES, before.toISOString()]
    );
    for (const row of rows) {
      await this.pool.query(
        `DELETE FROM thread_markers WHERE repository_id = $1 AND subject_number = $2`,
        [row.repository_id, row.subject_number]
      );
    }
    return rows.length;
  }

  private async ensureRow(key: SubjectKey): Promise<void> {
    await this.pool.query(
      `INSERT INTO thread_states (repository_id, subject_number)
       VALUES ($1, $2)
       ON CONFLICT DO NOTHING`,
      [key.repositoryId, key.subjectNumber]
    );
  }
}
