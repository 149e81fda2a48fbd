import { Octokit } from "@octokit/rest";
import { getAppJwt, getInstallationToken } from "./auth.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "github-client" });

const USER_AGENT = "pr-steward";

// Installation tokens last 60 minutes
const TOKEN_TTL_MS = 50 * 60 * 1000;

const clientCache = new Map<number, { octokit: Octokit; expiresAt: number }>();

function createOctokit(auth: string, installationId: number | null): Octokit {
  const octokitLog = log.child({ installationId });
  return new Octokit({
    auth,
    userAgent: USER_AGENT,
    log: {
      debug: (message: string) => octokitLog.debug(message),
      info: (message: string) => octokitLog.info(message),
      warn: (message: string) => octokitLog.warn(message),
      error: (message: string) => octokitLog.error(message),
    },
  });
}

export async function getOctokit(installationId: number): Promise<Octokit> {
  const cached = clientCache.get(installationId);
  if (cached && cached.expiresAt > Date.now()) {
    return cached.octokit;
  }

  const token = await getInstallationToken(installationId);
  const octokit = createOctokit(token, installationId);

  clientCache.set(installationId, {
    octokit,
    expiresAt: Date.now() + TOKEN_TTL_MS,
  });

  return octokit;
}

/** True when the app is currently installed under `installationId`. */
export async function installationExists(installationId: number): Promise<boolean> {
  const octokit = createOctokit(await getAppJwt(), null);
  try {
    await octokit.apps.getInstallation({ installation_id: installationId });
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "status" in err && err.status === 404;
}
