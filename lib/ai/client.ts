/**
 * AI Client Module
 *
 * One completion call shape over the two supported engines:
 * - claude: Anthropic Messages API (@anthropic-ai/sdk)
 * - openai: any OpenAI-compatible chat completions endpoint (openai),
 *   optionally at AI_BASE_URL
 *
 * The SDKs' own retries are disabled; RetryPolicy decides what is retried.
 * Tests inject a CompletionFn instead of calling createCompletionFn().
 */

import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import type { AIConfig, AIEngine } from "@/lib/config";
import { ConfigurationError } from "@/lib/errors";

export interface AICompletionRequest {
  system: string;
  prompt: string;
  signal?: AbortSignal;
}

export interface AICompletionResult {
  content: string;
  engine: AIEngine;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
  /** Why the model stopped generating, as the provider reports it */
  stopReason?: string;
}

export type CompletionFn = (request: AICompletionRequest) => Promise<AICompletionResult>;

function requireKey(config: AIConfig): string {
  if (!config.apiKey) {
    throw new ConfigurationError(`No API key configured for engine "${config.engine}"`);
  }
  return config.apiKey;
}

function claudeCompletion(config: AIConfig): CompletionFn {
  const client = new Anthropic({
    apiKey: requireKey(config),
    baseURL: config.baseUrl,
    maxRetries: 0,
  });

  return async ({ system, prompt, signal }) => {
    const response = await client.messages.create(
      {
        model: config.model,
        max_tokens: config.maxTokens,
        temperature: config.temperature,
        system,
        messages: [{ role: "user", content: prompt }],
      },
      { signal, timeout: config.timeoutMs },
    );

    const text = response.content.flatMap((block) => (block.type === "text" ? [block.text] : []));

    return {
      content: text.join("\n"),
      engine: "claude",
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      stopReason: response.stop_reason ?? undefined,
    };
  };
}

function openAICompletion(config: AIConfig): CompletionFn {
  const client = new OpenAI({
    apiKey: requireKey(config),
    baseURL: config.baseUrl,
    maxRetries: 0,
  });

  return async ({ system, prompt, signal }) => {
    const response = await client.chat.completions.create(
      {
        model: config.model,
        max_tokens: config.maxTokens,
        temperature: config.temperature,
        messages: [
          { role: "system", content: system },
          { role: "user", content: prompt },
        ],
      },
      { signal, timeout: config.timeoutMs },
    );

    const choice = response.choices[0];

    return {
      content: choice?.message?.content ?? "",
      engine: "openai",
      model: response.model,
      usage: response.usage
        ? {
            inputTokens: response.usage.prompt_tokens,
            outputTokens: response.usage.completion_tokens,
          }
        : undefined,
      stopReason: choice?.finish_reason,
    };
  };
}

/**
 * Build the completion function for the configured engine.
 *
 * @throws ConfigurationError when the engine has no API key
 */
export function createCompletionFn(config: AIConfig): CompletionFn {
  switch (config.engine) {
    case "claude":
      return claudeCompletion(config);
    case "openai":
      return openAICompletion(config);
  }
}
