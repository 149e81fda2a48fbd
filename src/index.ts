import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { loadEnv } from "./config/env.js";
import { settingsFromEnv } from "./config/defaults.js";
import { RuleLoader } from "./config-loader/loader.js";
import { installationExists } from "./github/client.js";
import { githubProviderFactory } from "./github/content.js";
import { createCredentialResolver } from "./llm/credentials.js";
import { createAnthropicInference } from "./llm/inference.js";
import {
  closeMetricsDb,
  getDashboardStats,
  initMetricsDb,
  pgActivityRecorder,
  pgKeyStore,
  saveApiKey,
} from "./metrics/pg-store.js";
import { createDashboardRouter, createSetupRouter } from "./dashboard/routes.js";
import { EventDispatcher } from "./review/dispatcher.js";
import { createOrchestrator } from "./review/orchestrator.js";
import { MemoryThreadStore } from "./state/memory-store.js";
import { PgThreadStore } from "./state/pg-store.js";
import type { ThreadStateStore } from "./state/store.js";
import { createWebhookRouter } from "./webhook/handler.js";
import { getLogger } from "./utils/logger.js";

const PRUNE_INTERVAL_MS = 3_600_000;

async function main() {
  const env = loadEnv();
  const log = getLogger();
  const settings = settingsFromEnv(env);

  // Thread state, keys and activity live in PostgreSQL when configured
  const pool = await initMetricsDb(env.POSTGRES_URL);
  let store: ThreadStateStore;
  if (pool) {
    const pgStore = new PgThreadStore(pool, settings.conversation);
    await pgStore.ensureSchema();
    store = pgStore;
  } else {
    log.warn("Using in-memory thread state; it is lost on restart");
    store = new MemoryThreadStore(settings.conversation);
  }

  const ruleLoader = new RuleLoader(settings.rulesPath, {
    fetchTimeoutMs: settings.context.fetchTimeoutMs,
    maxAttempts: settings.context.maxAttempts,
    retryBaseDelayMs: settings.retryBaseDelayMs,
  });
  const dispatcher = new EventDispatcher(
    createOrchestrator({
      store,
      providers: githubProviderFactory,
      rules: ruleLoader,
      inference: createAnthropicInference(settings.inference),
      credentials: createCredentialResolver({
        keys: pool ? pgKeyStore : null,
        fallbackApiKey: env.ANTHROPIC_API_KEY,
      }),
      settings,
      activity: pool ? pgActivityRecorder : undefined,
    })
  );

  const app = new Hono();

  app.get("/health", (c) =>
    c.json({ status: "ok", version: "0.1.0", pending: dispatcher.pending, timestamp: new Date().toISOString() })
  );

  app.route(
    "/webhook",
    createWebhookRouter({
      secret: env.GITHUB_WEBHOOK_SECRET,
      sink: dispatcher,
      ruleLoader,
      rulesPath: settings.rulesPath,
      setupUrl: settings.setupUrl,
    })
  );
  app.route("/dashboard", createDashboardRouter({ getStats: getDashboardStats }));
  app.route("/setup", createSetupRouter({ saveApiKey: pool ? saveApiKey : null, installationExists }));

  // Closed threads are kept for the retention window, then swept
  const prune = setInterval(() => {
    const before = new Date(Date.now() - settings.retentionMs);
    store
      .pruneClosed(before)
      .then((removed) => {
        if (removed > 0) log.info({ removed }, "Pruned closed threads");
      })
      .catch((err: unknown) => log.error({ err }, "Pruning closed threads failed"));
  }, PRUNE_INTERVAL_MS);
  prune.unref();

  const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    log.info({ port: info.port }, "Steward server started");
    if (settings.setupUrl) log.info({ url: settings.setupUrl }, "Setup page available");
  });

  const shutdown = async () => {
    log.info("Shutting down...");
    clearInterval(prune);
    server.close();
    await dispatcher.drain();
    await closeMetricsDb();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      log.error({ err }, "Unclean shutdown");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

main().catch((err) => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
