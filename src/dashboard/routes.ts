import { Hono } from "hono";
import { z } from "zod";
import type { DashboardStats } from "../metrics/pg-store.js";
import { renderDashboard, renderSetupPage, renderSetupSuccess } from "./html.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "dashboard-routes" });

export interface DashboardDeps {
  getStats(): Promise<DashboardStats>;
}

export function createDashboardRouter(deps: DashboardDeps): Hono {
  const app = new Hono();

  app.get("/api/stats", async (c) => c.json(await deps.getStats()));

  app.get("/", (c) => c.html(renderDashboard()));

  return app;
}

// ─── Setup ───

const installationIdSchema = z.coerce.number().int().positive();

const setupFormSchema = z.object({
  installation_id: installationIdSchema,
  api_key: z.string().trim().min(1, "API key is required"),
});

export interface SetupDeps {
  /** Absent when no database is configured. */
  saveApiKey: ((installationId: number, apiKey: string) => Promise<void>) | null;
  /** Whether the app is installed under this id; keys are only stored for live installations. */
  installationExists(installationId: number): Promise<boolean>;
}

export function createSetupRouter(deps: SetupDeps): Hono {
  const app = new Hono();

  app.get("/", (c) => {
    const parsed = installationIdSchema.safeParse(c.req.query("installation_id"));
    if (!parsed.success) {
      return c.text("Missing or invalid installation_id", 400);
    }
    return c.html(renderSetupPage(parsed.data));
  });

  app.post("/save", async (c) => {
    const form = setupFormSchema.safeParse(await c.req.parseBody());
    if (!form.success) {
      return c.text(form.error.issues.map((i) => i.message).join("; "), 400);
    }
    const installationId = form.data.installation_id;
    if (!deps.saveApiKey) {
      log.warn({ installationId }, "Setup submitted without a database");
      return c.text("Key storage is not configured on this server", 503);
    }

    let live: boolean;
    try {
      live = await deps.installationExists(installationId);
    } catch (err) {
      log.error({ err, installationId }, "Could not look up installation");
      return c.text("Could not verify the installation, please try again", 502);
    }
    if (!live) {
      log.warn({ installationId }, "Setup submitted for an unknown installation");
      return c.text("Unknown installation", 404);
    }

    await deps.saveApiKey(installationId, form.data.api_key);
    return c.redirect("/setup/success", 303);
  });

  app.get("/success", (c) => c.html(renderSetupSuccess()));

  return app;
}
