import type { RepositoryContentProvider } from "../github/content.js";
import type { ThreadStateStore } from "../state/store.js";
import { PublishConflictError, PublishFailureError, isTransient } from "../utils/errors.js";
import { withRetry } from "../utils/retry.js";
import type { ConversationEntry, Phase, SubjectKey } from "./types.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "publisher" });

export interface PublishRequest {
  subject: SubjectKey;
  body: string;
  /** Phase change this comment represents; must win its compare-and-set. */
  transition?: { expected: Phase; next: Phase };
  /** A marker the caller already claimed; released if the post fails. */
  marker?: string;
  close?: boolean;
  entry?: ConversationEntry;
}

export interface PublishResult {
  commentId: number;
  phase: Phase;
}

export interface PublisherOptions {
  maxAttempts: number;
  retryBaseDelayMs: number;
}

/**
 * The only writer of comments. A comment tied to a transition is posted only
 * after this unit of work won the transition; if posting fails for good the
 * transition is undone so a redelivery can try again.
 */
export class ResponsePublisher {
  constructor(
    private readonly store: ThreadStateStore,
    private readonly opts: PublisherOptions
  ) {}

  async publish(
    provider: RepositoryContentProvider,
    req: PublishRequest
  ): Promise<PublishResult> {
    const { subject, transition } = req;

    if (transition) {
      const won = await this.store.compareAndSetPhase(subject, transition.expected, transition.next);
      if (!won) {
        throw new PublishConflictError(
          `${subject.repositoryId}#${subject.subjectNumber} already left ${transition.expected}`
        );
      }
    }

    let commentId: number;
    try {
      commentId = await this.retry(() => provider.postComment(subject, req.body), "postComment");
    } catch (err) {
      await this.undo(req);
      throw new PublishFailureError(
        `Posting to ${subject.repositoryId}#${subject.subjectNumber} failed`,
        { cause: err }
      );
    }

    const state = await this.store.markCommented(subject, req.entry);

    if (req.close) {
      try {
        await this.retry(() => provider.closeSubject(subject), "closeSubject");
      } catch (err) {
        throw new PublishFailureError(
          `Comment ${commentId} posted but closing ${subject.repositoryId}#${subject.subjectNumber} failed`,
          { cause: err }
        );
      }
    }

    return { commentId, phase: state.phase };
  }

  private retry<T>(fn: () => Promise<T>, label: string): Promise<T> {
    return withRetry(fn, {
      maxAttempts: this.opts.maxAttempts,
      baseDelayMs: this.opts.retryBaseDelayMs,
      retryOn: isTransient,
      label,
    });
  }

  private async undo(req: PublishRequest): Promise<void> {
    const { subject, transition, marker } = req;
    try {
      if (transition) {
        await this.store.compareAndSetPhase(subject, transition.next, transition.expected);
      }
      if (marker) {
        await this.store.releaseMarker(subject, marker);
      }
    } catch (err) {
      log.error(
        { err, repo: subject.repositoryId, number: subject.subjectNumber },
        "Could not undo claim after failed post"
      );
    }
  }
}
