import { getOpenAIClient } from "../../clients/openai.js";
import { config } from "../../config/index.js";
import type { GenerationPort } from "./types.js";

export interface OpenAIGeneratorOptions {
  model?: string;
  timeoutMs?: number;
  getClient?: typeof getOpenAIClient;
}

/** Chat-completions generator forced into JSON mode at temperature 0. */
export const createOpenAIGenerator = (options: OpenAIGeneratorOptions = {}): GenerationPort => {
  const model = options.model ?? config.OPENAI_MODEL;
  const timeoutMs = options.timeoutMs ?? config.GENERATOR_TIMEOUT_MS;
  const getClient = options.getClient ?? getOpenAIClient;

  return {
    async complete(messages, signal) {
      const { client } = await getClient();
      const response = await client.chat.completions.create(
        {
          model,
          temperature: 0,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: messages.system },
            { role: "user", content: messages.user }
          ]
        },
        { signal, timeout: timeoutMs }
      );

      return {
        content: response.choices[0]?.message.content ?? "",
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
              totalTokens: response.usage.total_tokens
            }
          : undefined
      };
    }
  };
};
