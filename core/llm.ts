import OpenAI from "openai";
import type { ResponseCreateParamsNonStreaming } from "openai/resources/responses/responses";

import { RateLimitError, isRateLimitError } from "./errors";
import { logger } from "./logger";
import { sleep as defaultSleep } from "./timing";
import type { Sleep } from "./timing";
import type { LlmClient, LlmRequest } from "./llm.types";

const RATE_LIMIT_DELAYS_MS = [30_000, 60_000];
const RATE_LIMIT_MAX_ATTEMPTS = 3;

const buildResponseParams = (request: LlmRequest): ResponseCreateParamsNonStreaming => {
  const params: ResponseCreateParamsNonStreaming = {
    model: request.model,
    instructions: request.systemPrompt,
    input: request.messages.map((message) => ({
      role: message.role,
      content: message.content,
    })),
  };

  if (request.temperature !== undefined) {
    params.temperature = request.temperature;
  }
  if (request.maxTokens !== undefined) {
    params.max_output_tokens = request.maxTokens;
  }
  if (request.responseFormat) {
    params.text = {
      format: {
        type: "json_schema",
        name: request.responseFormat.name,
        schema: request.responseFormat.schema,
        strict: true,
      },
    };
  }
  return params;
};

/**
 * LLM client on the OpenAI Responses API. The SDK's own retries are off so
 * rate limits surface as `RateLimitError` and the backoff wrapper owns the schedule.
 */
const createOpenAiLlmClient = (options: { apiKey: string; baseURL?: string }): LlmClient => {
  const openai = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    maxRetries: 0,
  });

  const complete = async (request: LlmRequest) => {
    let outputText: string;
    try {
      const response = await openai.responses.create(buildResponseParams(request));
      outputText = response.output_text;
    } catch (error) {
      if (error instanceof OpenAI.APIError && error.status === 429) {
        throw new RateLimitError(`Rate limited by model ${request.model}: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    if (!outputText) {
      throw new Error(`Model ${request.model} returned empty output.`);
    }
    return outputText;
  };

  return { complete };
};

interface BackoffOptions {
  sleep?: Sleep;
  delaysMs?: number[];
  maxAttempts?: number;
  onRetry?: (attempt: number, delayMs: number) => void;
}

/**
 * Retries only on `RateLimitError`, sleeping through `delaysMs` between
 * attempts; every other error propagates on the first throw.
 */
const withRateLimitBackoff = (client: LlmClient, options: BackoffOptions = {}): LlmClient => {
  const sleep = options.sleep ?? defaultSleep;
  const delaysMs = options.delaysMs ?? RATE_LIMIT_DELAYS_MS;
  const maxAttempts = options.maxAttempts ?? RATE_LIMIT_MAX_ATTEMPTS;
  const onRetry =
    options.onRetry ??
    ((attempt: number, delayMs: number) => {
      logger.warn(
        `LLM rate limited (attempt ${attempt}/${maxAttempts}); retrying in ${Math.round(delayMs / 1000)}s`
      );
    });

  const complete = async (request: LlmRequest) => {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await client.complete(request);
      } catch (error) {
        if (!isRateLimitError(error) || attempt >= maxAttempts) {
          throw error;
        }
        const delayMs = delaysMs[Math.min(attempt - 1, delaysMs.length - 1)] ?? 0;
        onRetry(attempt, delayMs);
        await sleep(delayMs);
      }
    }
  };

  return { complete };
};

export {
  RATE_LIMIT_DELAYS_MS,
  RATE_LIMIT_MAX_ATTEMPTS,
  buildResponseParams,
  createOpenAiLlmClient,
  withRateLimitBackoff,
};
export type { BackoffOptions };
