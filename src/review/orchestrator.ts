import type { BotSettings } from "../config/defaults.js";
import { TRIVIAL_PATH_PATTERN } from "../config/defaults.js";
import type { RuleLoader } from "../config-loader/loader.js";
import type { BotComment, ProviderFactory, RepositoryContentProvider } from "../github/content.js";
import type { CredentialResolver, Credentials } from "../llm/credentials.js";
import { parseCommentDecision, parseTriageDecision } from "../llm/decisions.js";
import type { InferenceClient } from "../llm/inference.js";
import { buildPrompt, type PromptInput, type PromptSubject } from "../llm/prompts.js";
import type { ThreadStateStore } from "../state/store.js";
import { TERMINAL_PHASES } from "../state/store.js";
import {
  InferenceFailureError,
  MalformedEventError,
  PublishConflictError,
  PublishFailureError,
  UnitTimeoutError,
  isTransient,
} from "../utils/errors.js";
import { withDeadline, withRetry } from "../utils/retry.js";
import { createChildLogger, createDeliveryLogger } from "../utils/logger.js";
import {
  buildCommentBody,
  questionRedirect,
  setupNotice,
  trivialChangeNote,
} from "./body-builder.js";
import { classifyEvent, parseEvent } from "./classifier.js";
import { assembleContext, type ContextLimits } from "./context.js";
import { ResponsePublisher, type PublishRequest } from "./publisher.js";
import {
  emptyRuleSet,
  subjectKey,
  type BotEvent,
  type ConversationEntry,
  type Intent,
  type Outcome,
  type Phase,
  type PlatformKind,
  type RawEvent,
  type ReviewContext,
  type SubjectKey,
  type ThreadState,
} from "./types.js";

const log = createChildLogger({ module: "orchestrator" });

const SETUP_MARKER = "setup-notice";

/** Records opened pull requests and issues for the dashboard. */
export interface ActivityRecorder {
  recordOpened(event: BotEvent): Promise<void>;
}

export interface OrchestratorDeps {
  store: ThreadStateStore;
  providers: ProviderFactory;
  rules: RuleLoader;
  inference: InferenceClient;
  credentials: CredentialResolver;
  settings: BotSettings;
  activity?: ActivityRecorder;
}

export interface Orchestrator {
  handle(raw: RawEvent): Promise<Outcome>;
}

/** What a unit of work knows once the event is parsed and classified. */
interface Unit {
  event: BotEvent;
  intent: Intent;
  key: SubjectKey;
  signal: AbortSignal;
}

/**
 * Runs one event end to end: classify, consult state, gather context, ask
 * the model, publish. Every outcome is returned, never thrown, so one bad
 * event cannot take down the dispatcher.
 */
export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { store, settings } = deps;
  const publisher = new ResponsePublisher(store, {
    maxAttempts: settings.publish.maxAttempts,
    retryBaseDelayMs: settings.retryBaseDelayMs,
  });
  const contextLimits: ContextLimits = {
    ...settings.context,
    retryBaseDelayMs: settings.retryBaseDelayMs,
  };

  async function handle(raw: RawEvent): Promise<Outcome> {
    let event: BotEvent;
    try {
      event = parseEvent(raw);
    } catch (err) {
      if (err instanceof MalformedEventError) {
        log.warn({ deliveryId: raw.deliveryId, issues: err.issues }, "Dropping malformed event");
        return { status: "dropped", intent: null, reason: err.message };
      }
      throw err;
    }

    const intent = classifyEvent(event, settings);
    const elog = createDeliveryLogger(log, event).child({ intent });

    if (intent === "IGNORE") {
      elog.debug({ kind: event.platformKind, action: event.action }, "Ignoring event");
      return { status: "ignored", intent };
    }

    await recordActivity(event);

    const startTime = Date.now();
    let outcome: Outcome;
    try {
      outcome = await withDeadline(
        settings.unitTimeoutMs,
        (signal) => route({ event, intent, key: subjectKey(event), signal }),
        () => new UnitTimeoutError(settings.unitTimeoutMs)
      );
    } catch (err) {
      outcome = toOutcome(err, intent);
      if (outcome.status === "conflict") {
        elog.info({ reason: outcome.reason }, "Another unit of work already handled this");
      } else {
        elog.error({ err }, "Unit of work failed");
      }
      return outcome;
    }

    elog.info(
      { status: outcome.status, phase: outcome.phase, commentId: outcome.commentId, durationMs: Date.now() - startTime },
      "Unit of work complete"
    );
    return outcome;
  }

  async function recordActivity(event: BotEvent): Promise<void> {
    if (!deps.activity || event.action !== "opened" || event.platformKind === "comment") return;
    try {
      await deps.activity.recordOpened(event);
    } catch (err) {
      log.warn({ err, repo: event.repositoryId, number: event.subjectNumber }, "Could not record activity");
    }
  }

  function route(unit: Unit): Promise<Outcome> {
    switch (unit.intent) {
      case "DEFER_DRAFT":
        return deferDraft(unit);
      case "REVIEW_PR":
        return reviewPullRequest(unit);
      case "RE_REVIEW":
        return reReview(unit);
      case "TRIAGE_ISSUE":
        return triageIssue(unit);
      case "RESPOND_ISSUE_COMMENT":
        return respondToIssueComment(unit);
      case "CLOSE_THREAD":
        return closeThread(unit);
      case "REOPEN_THREAD":
        return reopenThread(unit);
      case "IGNORE":
        return Promise.resolve({ status: "ignored", intent: unit.intent });
    }
  }

  // ─── Pull requests ───

  async function deferDraft(unit: Unit): Promise<Outcome> {
    const { event, intent, key, signal } = unit;
    const state = await store.get(key);
    if (state && state.phase !== "NEW") {
      return noop(intent, state.phase, "draft already acknowledged");
    }

    const plan = buildPrompt("DEFER_DRAFT", basicInput(event, pullSubject(event)));
    if (plan.kind !== "fixed") throw new Error("Draft note must be a fixed message");

    const provider = await deps.providers(event.installationId);
    return publish(unit, provider, {
      subject: key,
      body: buildCommentBody({ kind: "plain", text: plan.body }),
      transition: { expected: "NEW", next: "AWAITING_READY" },
      entry: entry(intent, event.headSha ?? null, plan.body),
    }, signal);
  }

  async function reviewPullRequest(unit: Unit): Promise<Outcome> {
    const { event, intent, key, signal } = unit;

    // 1. Only the first transition into REVIEWED gets a comment
    const state = await store.get(key);
    const phase: Phase = state?.phase ?? "NEW";
    if (phase !== "NEW" && phase !== "AWAITING_READY") {
      return noop(intent, phase, "already reviewed");
    }

    const provider = await deps.providers(event.installationId);
    const credentials = await deps.credentials.resolve({
      installationId: event.installationId,
      repositoryId: event.repositoryId,
    });
    if (!credentials) {
      return postSetupNotice(unit, provider);
    }

    // 2. Gather rules and context at the head revision
    const revision =
      event.headSha ??
      (await withRetry(() => provider.getPullRequest(key, signal), retryOptions("getPullRequest", signal))).headSha;
    const { ruleSet, error: rulesError } = await deps.rules.load(provider, event.repositoryId);
    const context = await assembleContext(
      {
        provider,
        subject: key,
        revision,
        rules: ruleSet,
        conversation: state?.conversation ?? [],
        signal,
      },
      contextLimits
    );

    if (context.diffHunks.length === 0) {
      return noop(intent, phase, "no changed files");
    }

    // 3. Docs-only changes get a thank-you, everything else a model review
    let text: string;
    if (context.diffHunks.every((f) => TRIVIAL_PATH_PATTERN.test(f.filename))) {
      text = trivialChangeNote(event.author);
    } else {
      const plan = buildPrompt("REVIEW_PR", {
        subject: pullSubject(event),
        context,
        rulesUnavailable: rulesError !== null,
        previousRevision: null,
        currentRevision: revision,
      });
      if (plan.kind !== "model") throw new Error("Review must be a model prompt");
      text = await infer(plan, credentials, signal);
    }

    // 4. Publish, claiming the transition into REVIEWED
    const request: PublishRequest = {
      subject: key,
      body: buildCommentBody({
        kind: "review",
        text,
        author: event.author,
        notes: { context, rulesUnavailable: rulesError ? settings.rulesPath : undefined },
      }),
      transition: { expected: phase, next: "REVIEWED" },
      entry: entry(intent, revision, text),
    };
    try {
      return await publish(unit, provider, request, signal);
    } catch (err) {
      if (!(err instanceof PublishConflictError) || phase !== "NEW") throw err;
      // A draft note may have landed while the model was working; the
      // review still owns the move out of AWAITING_READY.
      const current = await store.get(key);
      if (current?.phase !== "AWAITING_READY") throw err;
      return publish(unit, provider, {
        ...request,
        transition: { expected: "AWAITING_READY", next: "REVIEWED" },
      }, signal);
    }
  }

  async function reReview(unit: Unit): Promise<Outcome> {
    const { event, intent, key, signal } = unit;
    const state = await store.get(key);
    if (state?.phase === "CLOSED") {
      return noop(intent, state.phase, "pull request is closed");
    }

    const provider = await deps.providers(event.installationId);
    const credentials = await deps.credentials.resolve({
      installationId: event.installationId,
      repositoryId: event.repositoryId,
    });
    if (!credentials) {
      return postSetupNotice(unit, provider);
    }

    const marker = mentionMarker(event);
    if (!(await store.claimMarker(key, marker))) {
      return { status: "conflict", intent, reason: `${marker} already answered` };
    }

    return withMarker(key, marker, async () => {
      const pr = await withRetry(() => provider.getPullRequest(key, signal), retryOptions("getPullRequest", signal));
      const { ruleSet, error: rulesError } = await deps.rules.load(provider, event.repositoryId);

      let conversation = state?.conversation ?? [];
      if (conversation.length === 0) {
        const earlier = await provider.listBotComments(key, settings.botLogin, signal);
        conversation = fromBotComments(earlier);
      }

      const context = await assembleContext(
        { provider, subject: key, revision: pr.headSha, rules: ruleSet, conversation, signal },
        contextLimits
      );

      const plan = buildPrompt("RE_REVIEW", {
        subject: { repositoryId: event.repositoryId, number: event.subjectNumber, title: pr.title, author: pr.author, body: pr.body },
        context,
        rulesUnavailable: rulesError !== null,
        previousRevision: state?.lastReviewedRevision ?? null,
        currentRevision: pr.headSha,
        trigger: event.rawBody,
      });
      if (plan.kind !== "model") throw new Error("Follow-up must be a model prompt");
      const text = await infer(plan, credentials, signal);

      return publish(unit, provider, {
        subject: key,
        body: buildCommentBody({
          kind: "follow-up",
          text,
          author: event.author,
          notes: { context, rulesUnavailable: rulesError ? settings.rulesPath : undefined },
        }),
        marker,
        entry: entry(intent, pr.headSha, text),
      }, signal);
    });
  }

  async function postSetupNotice(unit: Unit, provider: RepositoryContentProvider): Promise<Outcome> {
    const { key, intent, signal } = unit;
    if (!(await store.claimMarker(key, SETUP_MARKER))) {
      return { status: "noop", intent, reason: "no credentials; setup notice already posted" };
    }

    const outcome = await publish(unit, provider, {
      subject: key,
      body: buildCommentBody({ kind: "plain", text: setupNotice(settings.setupUrl) }),
      marker: SETUP_MARKER,
    }, signal);
    return { ...outcome, reason: "no credentials" };
  }

  // ─── Issues ───

  async function triageIssue(unit: Unit): Promise<Outcome> {
    const { event, intent, key, signal } = unit;
    const state = await store.get(key);
    if (state && state.phase !== "NEW") {
      return noop(intent, state.phase, "already triaged");
    }

    const credentials = await deps.credentials.resolve({
      installationId: event.installationId,
      repositoryId: event.repositoryId,
    });
    if (!credentials) {
      return noop(intent, "NEW", "no credentials");
    }

    const plan = buildPrompt("TRIAGE_ISSUE", basicInput(event, issueSubject(event)));
    if (plan.kind !== "model") throw new Error("Triage must be a model prompt");
    const decision = parseTriageDecision(await infer(plan, credentials, signal));
    const provider = await deps.providers(event.installationId);

    if (decision.category === "social" || decision.category === "question") {
      const text = decision.category === "social" ? decision.reply : questionRedirect(event.author);
      return publish(unit, provider, {
        subject: key,
        body: buildCommentBody({ kind: "plain", text }),
        transition: { expected: "NEW", next: "CLOSED_AS_CHATTER" },
        close: true,
        entry: entry(intent, null, text),
      }, signal);
    }

    return publish(unit, provider, {
      subject: key,
      body: buildCommentBody({ kind: "issue", text: decision.reply, author: event.author }),
      transition: { expected: "NEW", next: "AWAITING_IMPROVEMENT" },
      entry: entry(intent, null, decision.reply),
    }, signal);
  }

  async function respondToIssueComment(unit: Unit): Promise<Outcome> {
    const { event, intent, key, signal } = unit;
    const state = await store.get(key);
    const phase: Phase = state?.phase ?? "NEW";
    if (phase === "CLOSED") {
      return noop(intent, phase, "issue is closed");
    }

    const credentials = await deps.credentials.resolve({
      installationId: event.installationId,
      repositoryId: event.repositoryId,
    });
    if (!credentials) {
      return noop(intent, phase, "no credentials");
    }

    const marker = mentionMarker(event);
    if (!(await store.claimMarker(key, marker))) {
      return { status: "conflict", intent, reason: `${marker} already answered` };
    }

    return withMarker(key, marker, async () => {
      const input = basicInput(event, issueSubject(event), state?.conversation ?? []);
      const plan = buildPrompt("RESPOND_ISSUE_COMMENT", { ...input, trigger: event.rawBody });
      if (plan.kind !== "model") throw new Error("Comment reply must be a model prompt");
      const decision = parseCommentDecision(await infer(plan, credentials, signal));
      const provider = await deps.providers(event.installationId);

      if (decision.category === "chatter") {
        return publish(unit, provider, {
          subject: key,
          body: buildCommentBody({ kind: "plain", text: decision.reply }),
          transition: { expected: phase, next: "CLOSED_AS_CHATTER" },
          marker,
          close: true,
          entry: entry(intent, null, decision.reply),
        }, signal);
      }

      return publish(unit, provider, {
        subject: key,
        body: buildCommentBody({ kind: "issue", text: decision.reply, author: event.author }),
        marker,
        entry: entry(intent, null, decision.reply),
      }, signal);
    });
  }

  // ─── Closure ───

  async function closeThread(unit: Unit): Promise<Outcome> {
    const { intent, key } = unit;
    const state = await store.get(key);
    if (!state) {
      return { status: "noop", intent, reason: "thread not tracked" };
    }

    if (!TERMINAL_PHASES.includes(state.phase)) {
      const won = await store.compareAndSetPhase(key, state.phase, "CLOSED");
      if (!won) {
        return { status: "conflict", intent, reason: `phase changed from ${state.phase}` };
      }
    }

    if (settings.retentionMs === 0) {
      await store.evict(key);
      return { status: "transitioned", intent, phase: "CLOSED", reason: "evicted" };
    }
    return {
      status: "transitioned",
      intent,
      phase: TERMINAL_PHASES.includes(state.phase) ? state.phase : "CLOSED",
    };
  }

  async function reopenThread(unit: Unit): Promise<Outcome> {
    const { event, intent, key } = unit;
    const state = await store.get(key);
    if (!state) {
      return { status: "noop", intent, reason: "thread not tracked" };
    }
    if (!TERMINAL_PHASES.includes(state.phase)) {
      return noop(intent, state.phase, "thread already open");
    }

    const next = reopenedPhase(event.platformKind, state);
    if (!(await store.compareAndSetPhase(key, state.phase, next))) {
      return { status: "conflict", intent, reason: `phase changed from ${state.phase}` };
    }
    return { status: "transitioned", intent, phase: next };
  }

  // ─── Helpers ───

  async function publish(
    unit: Unit,
    provider: RepositoryContentProvider,
    req: PublishRequest,
    signal: AbortSignal
  ): Promise<Outcome> {
    // Nothing is posted once the unit of work is past its deadline.
    signal.throwIfAborted();
    const { commentId, phase } = await publisher.publish(provider, req);
    return { status: "posted", intent: unit.intent, commentId, phase };
  }

  async function infer(
    plan: { system: string; user: string },
    credentials: Credentials,
    signal: AbortSignal
  ): Promise<string> {
    const { timeoutMs, maxAttempts } = settings.inference;
    try {
      return await withRetry(
        () =>
          withDeadline(
            timeoutMs,
            (callSignal) => deps.inference.complete(plan, credentials, { signal: callSignal }),
            () => new InferenceFailureError(`Model call exceeded ${timeoutMs}ms`),
            signal
          ),
        { ...retryOptions("inference", signal), maxAttempts }
      );
    } catch (err) {
      if (signal.aborted || err instanceof InferenceFailureError) throw err;
      throw new InferenceFailureError("Model call failed", { cause: err });
    }
  }

  /** Releases a claimed marker when the work fails before anything is posted. */
  async function withMarker(
    key: SubjectKey,
    marker: string,
    work: () => Promise<Outcome>
  ): Promise<Outcome> {
    try {
      return await work();
    } catch (err) {
      // The publisher undoes its own claims.
      if (!(err instanceof PublishFailureError)) {
        await store.releaseMarker(key, marker);
      }
      throw err;
    }
  }

  function retryOptions(label: string, signal: AbortSignal) {
    return {
      maxAttempts: settings.context.maxAttempts,
      baseDelayMs: settings.retryBaseDelayMs,
      retryOn: isTransient,
      signal,
      label,
    };
  }

  function fromBotComments(comments: BotComment[]): ConversationEntry[] {
    return comments.slice(-settings.conversation.maxEntries).map((c) => ({
      at: c.createdAt,
      intent: "RE_REVIEW",
      revision: null,
      excerpt: clip(c.body, settings.conversation.maxExcerptChars),
    }));
  }

  return { handle };
}

function toOutcome(err: unknown, intent: Intent): Outcome {
  if (err instanceof PublishConflictError) {
    return { status: "conflict", intent, reason: err.message };
  }
  const reason = err instanceof Error ? err.message : String(err);
  return { status: "failed", intent, reason };
}

/** Where a reopened thread resumes, judged by what the bot already posted. */
function reopenedPhase(kind: PlatformKind, state: ThreadState): Phase {
  const posted = new Set(state.conversation.map((e) => e.intent));
  if (kind === "pull_request") {
    if (posted.has("REVIEW_PR") || posted.has("RE_REVIEW")) return "REVIEWED";
    if (posted.has("DEFER_DRAFT")) return "AWAITING_READY";
    return state.initialCommentPosted ? "REVIEWED" : "NEW";
  }
  return state.initialCommentPosted ? "AWAITING_IMPROVEMENT" : "NEW";
}

function noop(intent: Intent, phase: Phase, reason: string): Outcome {
  return { status: "noop", intent, phase, reason };
}

function entry(intent: Intent, revision: string | null, excerpt: string): ConversationEntry {
  return { at: new Date().toISOString(), intent, revision, excerpt: excerpt.trim() };
}

function mentionMarker(event: BotEvent): string {
  return `mention:${event.commentId ?? event.deliveryId}`;
}

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

function pullSubject(event: BotEvent): PromptSubject {
  return {
    repositoryId: event.repositoryId,
    number: event.subjectNumber,
    title: event.title,
    author: event.author,
    body: event.rawBody,
  };
}

function issueSubject(event: BotEvent): PromptSubject {
  if (event.platformKind !== "comment") return pullSubject(event);
  return {
    repositoryId: event.repositoryId,
    number: event.subjectNumber,
    title: event.title,
    author: event.subjectAuthor ?? event.author,
    body: event.subjectBody ?? "",
  };
}

/** Prompt input for intents that need no repository content. */
function basicInput(
  event: BotEvent,
  subject: PromptSubject,
  conversation: ConversationEntry[] = []
): PromptInput {
  return {
    subject,
    context: emptyContext(event.repositoryId, conversation),
    rulesUnavailable: false,
    previousRevision: null,
    currentRevision: event.headSha ?? null,
  };
}

function emptyContext(repositoryId: string, conversation: ConversationEntry[]): ReviewContext {
  return {
    changedFiles: {},
    diffHunks: [],
    rules: emptyRuleSet(repositoryId),
    conversationSummary: conversation,
    truncated: false,
    trimmedPaths: [],
    omittedPaths: [],
    unavailablePaths: [],
  };
}
