import type Anthropic from "@anthropic-ai/sdk";
import { getAnthropicClient } from "./client.js";
import type { Credentials } from "./credentials.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "llm-inference" });

export interface ModelPrompt {
  system: string;
  user: string;
}

export interface InferenceClient {
  complete(
    prompt: ModelPrompt,
    credentials: Credentials,
    options?: { signal?: AbortSignal }
  ): Promise<string>;
}

export interface AnthropicInferenceOptions {
  model: string;
  maxTokens: number;
  temperature: number;
}

export function createAnthropicInference(opts: AnthropicInferenceOptions): InferenceClient {
  return {
    async complete(prompt, credentials, options = {}) {
      const client = getAnthropicClient(credentials.apiKey);
      const response = await client.messages.create(
        {
          model: opts.model,
          max_tokens: opts.maxTokens,
          temperature: opts.temperature,
          system: prompt.system,
          messages: [{ role: "user", content: prompt.user }],
        },
        { signal: options.signal }
      );

      const text = response.content
        .filter((b): b is Anthropic.TextBlock => b.type === "text")
        .map((b) => b.text)
        .join("")
        .trim();

      log.info(
        {
          model: opts.model,
          source: credentials.source,
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
          stopReason: response.stop_reason,
        },
        "Model response received"
      );

      if (!text) {
        throw new Error(`Model returned no text (stop reason: ${response.stop_reason})`);
      }
      return text;
    },
  };
}
