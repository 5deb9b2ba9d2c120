import OpenAI from "openai";
import { BatchAbortedError, MalformedResponseError, TransientError } from "../errors";

export interface GenerateOptions {
  signal?: AbortSignal;
}

/**
 * The one capability the pipeline needs from a language model. Rejects with
 * TransientError or MalformedResponseError; anything else is a programming or
 * configuration error and is not retried.
 */
export interface TextGenerator {
  generateText(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface OpenAITextGeneratorConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
  /** Ask the API for a JSON object response. Prompts must then mention JSON. */
  jsonMode?: boolean;
  /** Injected in tests; created from apiKey otherwise. */
  client?: OpenAI;
}

function toPipelineError(err: unknown): unknown {
  if (err instanceof OpenAI.APIUserAbortError) {
    return new BatchAbortedError("Model request aborted");
  }
  // Covers APIConnectionTimeoutError, which extends it.
  if (err instanceof OpenAI.APIConnectionError) {
    return new TransientError(`Model request failed: ${err.message}`, { cause: err });
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status ?? 0;
    if (status === 408 || status === 409 || status === 429 || status >= 500) {
      return new TransientError(`Model API returned ${status}: ${err.message}`, { cause: err });
    }
  }
  return err;
}

export function createOpenAITextGenerator(config: OpenAITextGeneratorConfig): TextGenerator {
  const client =
    config.client ??
    new OpenAI({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      // runStage is the only retry loop
      maxRetries: 0,
    });
  const jsonMode = config.jsonMode ?? true;

  return {
    async generateText(prompt, options = {}) {
      const body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
        model: config.model,
        messages: [{ role: "user", content: prompt }],
        temperature: 0,
      };
      if (jsonMode) body.response_format = { type: "json_object" };

      let response: OpenAI.Chat.Completions.ChatCompletion;
      try {
        response = await client.chat.completions.create(body, { signal: options.signal });
      } catch (err) {
        throw toPipelineError(err);
      }

      const content = response.choices[0]?.message?.content;
      if (!content || !content.trim()) {
        throw new MalformedResponseError("Empty response from model");
      }
      return content.trim();
    },
  };
}
