import type { EmitterWebhookEvent } from "@octokit/webhooks";
import type { RawEvent } from "../review/types.js";

type PullRequestEvent = EmitterWebhookEvent<"pull_request">;
type IssuesEvent = EmitterWebhookEvent<"issues">;
type IssueCommentEvent = EmitterWebhookEvent<"issue_comment">;

// Payload fields are read with optional chaining throughout: a delivery that
// lacks one is rejected by the classifier, not here.

export function fromPullRequest(event: PullRequestEvent): RawEvent {
  const { payload } = event;
  const pr = payload.pull_request;
  return {
    deliveryId: event.id,
    installationId: payload.installation?.id,
    platformKind: "pull_request",
    action: payload.action,
    repositoryId: payload.repository?.full_name,
    subjectNumber: pr?.number,
    author: pr?.user?.login,
    rawBody: pr?.body ?? "",
    isDraft: pr?.draft ?? false,
    title: pr?.title,
    headSha: pr?.head?.sha,
  };
}

export function fromIssue(event: IssuesEvent): RawEvent {
  const { payload } = event;
  const issue = payload.issue;
  return {
    deliveryId: event.id,
    installationId: payload.installation?.id,
    platformKind: "issue",
    action: payload.action,
    repositoryId: payload.repository?.full_name,
    subjectNumber: issue?.number,
    author: issue?.user?.login,
    rawBody: issue?.body ?? "",
    isDraft: false,
    title: issue?.title,
  };
}

export function fromIssueComment(event: IssueCommentEvent): RawEvent {
  const { payload } = event;
  const { issue, comment } = payload;
  return {
    deliveryId: event.id,
    installationId: payload.installation?.id,
    platformKind: "comment",
    action: payload.action,
    repositoryId: payload.repository?.full_name,
    subjectNumber: issue?.number,
    author: comment?.user?.login,
    rawBody: comment?.body ?? "",
    isDraft: false,
    title: issue?.title,
    commentId: comment?.id,
    subjectBody: issue?.body ?? "",
    subjectAuthor: issue?.user?.login,
    onPullRequest: issue !== undefined && "pull_request" in issue && Boolean(issue.pull_request),
  };
}

/** True when a push to the default branch touched `path`. */
export function pushTouchesPath(event: EmitterWebhookEvent<"push">, path: string): boolean {
  const { payload } = event;
  if (payload.ref !== `refs/heads/${payload.repository.default_branch}`) return false;
  return payload.commits.some((commit) =>
    [...(commit.added ?? []), ...(commit.modified ?? []), ...(commit.removed ?? [])].includes(path)
  );
}
