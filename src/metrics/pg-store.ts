import pg from "pg";
import { z } from "zod";
import type { BotEvent } from "../review/types.js";
import type { ActivityRecorder } from "../review/orchestrator.js";
import type { InstallationKeyStore } from "../llm/credentials.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "metrics-pg" });

let _pool: pg.Pool | null = null;

/** Opens the shared pool and creates the tables it serves. No-op without a URL. */
export async function initMetricsDb(connectionString?: string): Promise<pg.Pool | null> {
  if (!connectionString) {
    log.warn("POSTGRES_URL not set — activity log and stored API keys disabled");
    return null;
  }

  _pool = new pg.Pool({ connectionString, max: 10 });

  // Verify connectivity and create tables
  const client = await _pool.connect();
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS activity_log (
        id SERIAL PRIMARY KEY,
        timestamp TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        kind TEXT NOT NULL,
        repo TEXT NOT NULL,
        subject_number INTEGER NOT NULL,
        title TEXT NOT NULL,
        author TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_activity_kind_ts ON activity_log(kind, timestamp);

      CREATE TABLE IF NOT EXISTS installations (
        installation_id BIGINT PRIMARY KEY,
        api_key TEXT NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);
    log.info("PostgreSQL tables initialized");
  } finally {
    client.release();
  }
  return _pool;
}

export async function closeMetricsDb(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}

// ─── Activity log ───

export type ActivityKind = "pull_request" | "issue";

export async function recordSubjectOpened(event: BotEvent): Promise<void> {
  if (!_pool) return;
  const kind: ActivityKind = event.platformKind === "pull_request" ? "pull_request" : "issue";
  await _pool.query(
    `INSERT INTO activity_log (kind, repo, subject_number, title, author)
     VALUES ($1, $2, $3, $4, $5)`,
    [kind, event.repositoryId, event.subjectNumber, event.title, event.author]
  );
}

export const pgActivityRecorder: ActivityRecorder = {
  recordOpened: recordSubjectOpened,
};

export interface RecentSubject {
  repo: string;
  number: number;
  title: string;
  author: string;
  openedAt: string;
}

export interface DashboardStats {
  totalPullRequests: number;
  totalIssues: number;
  lastPullRequest: RecentSubject | null;
  lastIssue: RecentSubject | null;
}

const countRowSchema = z.object({ kind: z.string(), total: z.number() });

const recentRowSchema = z.object({
  repo: z.string(),
  subject_number: z.number(),
  title: z.string(),
  author: z.string(),
  timestamp: z.date(),
});

export async function getDashboardStats(): Promise<DashboardStats> {
  const stats: DashboardStats = {
    totalPullRequests: 0,
    totalIssues: 0,
    lastPullRequest: null,
    lastIssue: null,
  };
  if (!_pool) return stats;

  const counts = (await _pool.query(
    `SELECT kind, COUNT(*)::int AS total FROM activity_log GROUP BY kind`
  )).rows;
  for (const row of counts) {
    const { kind, total } = countRowSchema.parse(row);
    if (kind === "pull_request") stats.totalPullRequests = total;
    if (kind === "issue") stats.totalIssues = total;
  }

  stats.lastPullRequest = await latest(_pool, "pull_request");
  stats.lastIssue = await latest(_pool, "issue");
  return stats;
}

async function latest(pool: pg.Pool, kind: ActivityKind): Promise<RecentSubject | null> {
  const { rows } = await pool.query(
    `SELECT repo, subject_number, title, author, timestamp
     FROM activity_log WHERE kind = $1
     ORDER BY timestamp DESC, id DESC LIMIT 1`,
    [kind]
  );
  if (rows.length === 0) return null;
  const r = recentRowSchema.parse(rows[0]);
  return {
    repo: r.repo,
    number: r.subject_number,
    title: r.title,
    author: r.author,
    openedAt: r.timestamp.toISOString(),
  };
}

// ─── Installation API keys ───

export async function saveApiKey(installationId: number, apiKey: string): Promise<void> {
  if (!_pool) throw new Error("Database not initialized");
  await _pool.query(
    `INSERT INTO installations (installation_id, api_key, updated_at)
     VALUES ($1, $2, NOW())
     ON CONFLICT (installation_id) DO UPDATE SET api_key = $2, updated_at = NOW()`,
    [installationId, apiKey]
  );
  log.info({ installationId }, "Saved installation API key");
}

const keyRowSchema = z.object({ api_key: z.string() });

export async function getApiKey(installationId: number): Promise<string | null> {
  if (!_pool) return null;
  const { rows } = await _pool.query(
    "SELECT api_key FROM installations WHERE installation_id = $1",
    [installationId]
  );
  return rows.length > 0 ? keyRowSchema.parse(rows[0]).api_key : null;
}

export const pgKeyStore: InstallationKeyStore = { getApiKey };
