import { describe, it, expect, vi } from "vitest";
import { createDashboardRouter, createSetupRouter } from "../../src/dashboard/routes.js";

function form(fields: Record<string, string>): RequestInit {
  return { method: "POST", body: new URLSearchParams(fields) };
}

const known = async (installationId: number) => installationId === 77;

describe("setup router", () => {
  it("renders the form for a valid installation", async () => {
    const app = createSetupRouter({ saveApiKey: null, installationExists: known });

    const res = await app.request("/?installation_id=77");

    expect(res.status).toBe(200);
    expect(await res.text()).toContain('<input type="hidden" name="installation_id" value="77">');
  });

  it("rejects a missing installation id", async () => {
    const app = createSetupRouter({ saveApiKey: null, installationExists: known });

    const res = await app.request("/?installation_id=abc");

    expect(res.status).toBe(400);
    expect(await res.text()).toBe("Missing or invalid installation_id");
  });

  it("stores the key and redirects", async () => {
    const saveApiKey = vi.fn<(id: number, key: string) => Promise<void>>().mockResolvedValue();
    const app = createSetupRouter({ saveApiKey, installationExists: known });

    const res = await app.request("/save", form({ installation_id: "77", api_key: "  test-key  " }));

    expect(res.status).toBe(303);
    expect(res.headers.get("location")).toBe("/setup/success");
    expect(saveApiKey).toHaveBeenCalledWith(77, "test-key");
  });

  it("refuses an empty key", async () => {
    const saveApiKey = vi.fn<(id: number, key: string) => Promise<void>>();
    const app = createSetupRouter({ saveApiKey, installationExists: known });

    const res = await app.request("/save", form({ installation_id: "77", api_key: "   " }));

    expect(res.status).toBe(400);
    expect(await res.text()).toBe("API key is required");
    expect(saveApiKey).not.toHaveBeenCalled();
  });

  it("refuses installations the app does not know", async () => {
    const saveApiKey = vi.fn<(id: number, key: string) => Promise<void>>();
    const app = createSetupRouter({ saveApiKey, installationExists: known });

    const res = await app.request("/save", form({ installation_id: "78", api_key: "test-key" }));

    expect(res.status).toBe(404);
    expect(await res.text()).toBe("Unknown installation");
    expect(saveApiKey).not.toHaveBeenCalled();
  });

  it("answers 502 when the installation cannot be checked", async () => {
    const saveApiKey = vi.fn<(id: number, key: string) => Promise<void>>();
    const app = createSetupRouter({
      saveApiKey,
      installationExists: async () => {
        throw new Error("HTTP 503");
      },
    });

    const res = await app.request("/save", form({ installation_id: "77", api_key: "test-key" }));

    expect(res.status).toBe(502);
    expect(saveApiKey).not.toHaveBeenCalled();
  });

  it("answers 503 without a database", async () => {
    const app = createSetupRouter({ saveApiKey: null, installationExists: known });

    const res = await app.request("/save", form({ installation_id: "77", api_key: "test-key" }));

    expect(res.status).toBe(503);
  });
});

describe("dashboard router", () => {
  it("serves stats as JSON", async () => {
    const stats = {
      totalPullRequests: 3,
      totalIssues: 1,
      lastPullRequest: null,
      lastIssue: null,
    };
    const app = createDashboardRouter({ getStats: async () => stats });

    const res = await app.request("/api/stats");

    expect(await res.json()).toEqual(stats);
  });
});
