import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "credentials" });

export interface Credentials {
  apiKey: string;
  /** Where the key came from, for logs only. */
  source: "installation" | "fallback";
}

export interface CredentialRef {
  installationId: number;
  repositoryId: string;
}

/** Opaque capability the pipeline asks for model credentials. */
export interface CredentialResolver {
  resolve(ref: CredentialRef): Promise<Credentials | null>;
}

export interface InstallationKeyStore {
  getApiKey(installationId: number): Promise<string | null>;
}

/**
 * Prefers the key an installation saved through the setup page, then the
 * operator's fallback key.
 */
export function createCredentialResolver(opts: {
  keys: InstallationKeyStore | null;
  fallbackApiKey?: string;
}): CredentialResolver {
  return {
    async resolve(ref) {
      const stored = opts.keys ? await opts.keys.getApiKey(ref.installationId) : null;
      if (stored) {
        log.debug({ installationId: ref.installationId }, "Using installation API key");
        return { apiKey: stored, source: "installation" };
      }
      if (opts.fallbackApiKey) {
        log.debug({ installationId: ref.installationId }, "Using fallback API key");
        return { apiKey: opts.fallbackApiKey, source: "fallback" };
      }
      log.info({ installationId: ref.installationId, repo: ref.repositoryId }, "No API key for installation");
      return null;
    },
  };
}
