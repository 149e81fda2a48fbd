import type { Octokit } from "@octokit/rest";
import { getOctokit } from "./client.js";
import { updateRateLimit, waitIfNeeded } from "../utils/rate-limiter.js";
import { httpStatus } from "../utils/errors.js";
import type { SubjectKey } from "../review/types.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "github-content" });

const PAGE_SIZE = 100;
const MAX_COMMENT_PAGES = 5;

export interface ChangedFile {
  path: string;
  status: string;
  additions: number;
  deletions: number;
  patch?: string;
}

export interface BotComment {
  body: string;
  createdAt: string;
}

export interface PullRequestInfo {
  title: string;
  body: string;
  author: string;
  headSha: string;
  isDraft: boolean;
}

/**
 * Everything the pipeline reads from or writes to the repository host. All
 * calls may fail; callers decide what to retry.
 */
export interface RepositoryContentProvider {
  listChangedFiles(subject: SubjectKey, signal?: AbortSignal): Promise<ChangedFile[]>;
  getPullRequest(subject: SubjectKey, signal?: AbortSignal): Promise<PullRequestInfo>;
  /** Resolves to null when the path does not exist at `revision`. */
  getFileContent(
    repositoryId: string,
    path: string,
    revision?: string,
    signal?: AbortSignal
  ): Promise<string | null>;
  /** Comments `botLogin` left on the thread, oldest first. */
  listBotComments(subject: SubjectKey, botLogin: string, signal?: AbortSignal): Promise<BotComment[]>;
  postComment(subject: SubjectKey, body: string): Promise<number>;
  closeSubject(subject: SubjectKey): Promise<void>;
}

export type ProviderFactory = (installationId: number) => Promise<RepositoryContentProvider>;

export function splitRepositoryId(repositoryId: string): { owner: string; repo: string } {
  const [owner, repo] = repositoryId.split("/");
  if (!owner || !repo) {
    throw new Error(`Invalid repository id: ${repositoryId}`);
  }
  return { owner, repo };
}

export const githubProviderFactory: ProviderFactory = async (installationId) =>
  createGitHubProvider(await getOctokit(installationId), `github:${installationId}`);

export function createGitHubProvider(
  octokit: Octokit,
  rateLimitKey = "github"
): RepositoryContentProvider {
  return {
    async listChangedFiles(subject, signal) {
      const { owner, repo } = splitRepositoryId(subject.repositoryId);
      const files: ChangedFile[] = [];

      for (let page = 1; ; page++) {
        await waitIfNeeded(rateLimitKey);
        const { data, headers } = await octokit.pulls.listFiles({
          owner,
          repo,
          pull_number: subject.subjectNumber,
          per_page: PAGE_SIZE,
          page,
          request: { signal },
        });
        updateRateLimit(rateLimitKey, headers);

        files.push(
          ...data.map((f) => ({
            path: f.filename,
            status: f.status,
            additions: f.additions,
            deletions: f.deletions,
            patch: f.patch,
          }))
        );

        if (data.length < PAGE_SIZE) break;
      }

      log.info(
        { repo: subject.repositoryId, number: subject.subjectNumber, fileCount: files.length },
        "Fetched changed files"
      );
      return files;
    },

    async getPullRequest(subject, signal) {
      const { owner, repo } = splitRepositoryId(subject.repositoryId);
      await waitIfNeeded(rateLimitKey);
      const { data, headers } = await octokit.pulls.get({
        owner,
        repo,
        pull_number: subject.subjectNumber,
        request: { signal },
      });
      updateRateLimit(rateLimitKey, headers);
      return {
        title: data.title,
        body: data.body ?? "",
        author: data.user.login,
        headSha: data.head.sha,
        isDraft: data.draft ?? false,
      };
    },

    async getFileContent(repositoryId, path, revision, signal) {
      const { owner, repo } = splitRepositoryId(repositoryId);
      await waitIfNeeded(rateLimitKey);
      try {
        const { data, headers } = await octokit.repos.getContent({
          owner,
          repo,
          path,
          ref: revision,
          request: { signal },
        });
        updateRateLimit(rateLimitKey, headers);

        if (Array.isArray(data) || !("content" in data) || typeof data.content !== "string") {
          log.debug({ repositoryId, path }, "Path is not a file");
          return null;
        }
        return Buffer.from(data.content, "base64").toString("utf-8");
      } catch (err) {
        if (httpStatus(err) === 404) return null;
        throw err;
      }
    },

    async listBotComments(subject, botLogin, signal) {
      const { owner, repo } = splitRepositoryId(subject.repositoryId);
      const comments: BotComment[] = [];

      for (let page = 1; page <= MAX_COMMENT_PAGES; page++) {
        await waitIfNeeded(rateLimitKey);
        const { data, headers } = await octokit.issues.listComments({
          owner,
          repo,
          issue_number: subject.subjectNumber,
          per_page: PAGE_SIZE,
          page,
          request: { signal },
        });
        updateRateLimit(rateLimitKey, headers);

        for (const comment of data) {
          if (comment.user?.login === botLogin && comment.body) {
            comments.push({ body: comment.body, createdAt: comment.created_at });
          }
        }
        if (data.length < PAGE_SIZE) break;
      }
      return comments;
    },

    async postComment(subject, body) {
      const { owner, repo } = splitRepositoryId(subject.repositoryId);
      await waitIfNeeded(rateLimitKey);
      const { data, headers } = await octokit.issues.createComment({
        owner,
        repo,
        issue_number: subject.subjectNumber,
        body,
      });
      updateRateLimit(rateLimitKey, headers);
      log.info(
        { repo: subject.repositoryId, number: subject.subjectNumber, commentId: data.id },
        "Posted comment"
      );
      return data.id;
    },

    async closeSubject(subject) {
      const { owner, repo } = splitRepositoryId(subject.repositoryId);
      await waitIfNeeded(rateLimitKey);
      const { headers } = await octokit.issues.update({
        owner,
        repo,
        issue_number: subject.subjectNumber,
        state: "closed",
      });
      updateRateLimit(rateLimitKey, headers);
      log.info({ repo: subject.repositoryId, number: subject.subjectNumber }, "Closed subject");
    },
  };
}
