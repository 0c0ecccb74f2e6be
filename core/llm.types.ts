type LlmRole = "user" | "assistant" | "developer";

interface LlmMessage {
  role: LlmRole;
  content: string;
}

/** JSON schema handed to providers that support structured output. */
interface LlmResponseFormat {
  name: string;
  schema: Record<string, unknown>;
}

interface LlmRequest {
  systemPrompt: string;
  messages: LlmMessage[];
  model: string;
  temperature?: number;
  maxTokens?: number;
  responseFormat?: LlmResponseFormat;
}

interface LlmClient {
  complete: (request: LlmRequest) => Promise<string>;
}

export type { LlmClient, LlmMessage, LlmRequest, LlmResponseFormat, LlmRole };
