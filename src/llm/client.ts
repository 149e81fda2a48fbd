import Anthropic from "@anthropic-ai/sdk";

const clients = new Map<string, Anthropic>();

/** One client per API key; installations may bring their own key. */
export function getAnthropicClient(apiKey: string): Anthropic {
  const cached = clients.get(apiKey);
  if (cached) return cached;
  // Retries are handled by the caller so attempts stay bounded in one place
  const client = new Anthropic({ apiKey, maxRetries: 0 });
  clients.set(apiKey, client);
  return client;
}
