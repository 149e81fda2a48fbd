import { Hono } from "hono";
import { Webhooks } from "@octokit/webhooks";
import type { RuleLoader } from "../config-loader/loader.js";
import type { EventSink } from "../review/dispatcher.js";
import { fromIssue, fromIssueComment, fromPullRequest, pushTouchesPath } from "./events.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "webhook-handler" });

const HANDLED_EVENTS = ["pull_request", "issues", "issue_comment", "push", "installation"] as const;
type HandledEvent = (typeof HANDLED_EVENTS)[number];

function isHandledEvent(name: string): name is HandledEvent {
  return HANDLED_EVENTS.some((e) => e === name);
}

export interface WebhookRouterOptions {
  secret: string;
  sink: EventSink;
  ruleLoader: RuleLoader;
  rulesPath: string;
  setupUrl: string | null;
}

/**
 * Verifies deliveries and hands them to the dispatcher. Responds as soon as
 * the event is queued; the work itself runs after the response.
 */
export function createWebhookRouter(opts: WebhookRouterOptions): Hono {
  const app = new Hono();
  const webhooks = new Webhooks({ secret: opts.secret });

  webhooks.on("pull_request", (event) => opts.sink.submit(fromPullRequest(event)));
  webhooks.on("issues", (event) => opts.sink.submit(fromIssue(event)));
  webhooks.on("issue_comment", (event) => opts.sink.submit(fromIssueComment(event)));

  // Edits to the rules file take effect on the next event
  webhooks.on("push", (event) => {
    if (pushTouchesPath(event, opts.rulesPath)) {
      opts.ruleLoader.invalidate(event.payload.repository.full_name);
    }
  });

  webhooks.on("installation.created", ({ payload }) => {
    const installationId = payload.installation.id;
    const account = payload.installation.account;
    log.info(
      {
        installationId,
        account: account && "login" in account ? account.login : undefined,
        setupUrl: opts.setupUrl ? `${opts.setupUrl}?installation_id=${installationId}` : null,
      },
      "App installed"
    );
  });

  app.post("/", async (c) => {
    const id = c.req.header("x-github-delivery") ?? "";
    const name = c.req.header("x-github-event") ?? "";
    const signature = c.req.header("x-hub-signature-256") ?? "";
    const body = await c.req.text();

    log.debug({ id, event: name }, "Received webhook");

    if (!isHandledEvent(name)) {
      if (!signature || !(await webhooks.verify(body, signature))) {
        log.warn({ id, event: name }, "Rejected webhook with bad signature");
        return c.json({ error: "invalid signature" }, 401);
      }
      return c.json({ ok: true, ignored: name }, 202);
    }

    try {
      await webhooks.verifyAndReceive({ id, name, signature, payload: body });
      return c.json({ ok: true }, 202);
    } catch (err) {
      log.error({ err, id }, "Webhook verification/handling failed");
      return c.json({ error: "webhook processing failed" }, 400);
    }
  });

  return app;
}
