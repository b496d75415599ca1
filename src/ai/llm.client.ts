import fetch, { RequestInit, Response } from "node-fetch";
import { Logger } from "../config/logger";
import { PortError } from "../shared/errors";
import { GenerationOptions, GenerationPort } from "./generation.port";
import { SCREENING_SYSTEM_PROMPT } from "./system/screening.system";

export const DEFAULT_CHAT_MODEL = "gpt-4o-mini";

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  max_tokens?: number;
  max_completion_tokens?: number;
}

interface ChatCompletionsResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

export interface LlmClientConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export class LlmClient implements GenerationPort {
  private readonly chatModel: string;
  private readonly baseUrl: string;

  constructor(
    private readonly config: LlmClientConfig,
    private readonly logger: Logger,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.chatModel = config.model?.trim() || DEFAULT_CHAT_MODEL;
    this.baseUrl = (config.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
  }

  getModelName(): string {
    return this.chatModel;
  }

  async generate(prompt: string, options?: GenerationOptions): Promise<string> {
    const startedAt = Date.now();
    const promptName = options?.promptName ?? "generic";
    const maxTokens = options?.maxTokens ?? 300;
    const requestBody = this.buildRequestBody(prompt, maxTokens, options?.temperature ?? 0.7);

    try {
      const content = await this.postChatCompletion(requestBody);
      this.logger.info("llm.call.completed", {
        promptName,
        modelName: this.chatModel,
        latencyMs: Date.now() - startedAt,
        maxTokens,
        tokenEstimate: estimateTokenCount(prompt, content),
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        promptName,
        modelName: this.chatModel,
        latencyMs: Date.now() - startedAt,
        maxTokens,
        errorCode: error instanceof PortError ? error.code : "unknown",
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw error;
    }
  }

  buildRequestBody(prompt: string, maxTokens: number, temperature: number): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.chatModel,
      temperature,
      messages: [
        {
          role: "system",
          content: SCREENING_SYSTEM_PROMPT,
        },
        {
          role: "user",
          content: prompt,
        },
      ],
    };
    if (usesMaxCompletionTokens(this.chatModel)) {
      body.max_completion_tokens = maxTokens;
    } else {
      body.max_tokens = maxTokens;
    }
    return body;
  }

  private async postChatCompletion(requestBody: ChatCompletionsRequestBody): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.config.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
      });
    } catch (error) {
      throw new PortError(
        "network",
        `OpenAI request failed: ${error instanceof Error ? error.message : "Unknown error"}`,
      );
    }

    if (!response.ok) {
      const body = await response.text();
      throw httpFailure(response.status, body);
    }

    const body = (await response.json()) as ChatCompletionsResponse;
    const content = body.choices?.[0]?.message?.content?.trim();
    if (!content) {
      throw new PortError("empty_response", "OpenAI response does not contain message content");
    }
    return content;
  }
}

export function httpFailure(status: number, body: string): PortError {
  const message = `OpenAI API error: HTTP ${status} - ${body.slice(0, 300)}`;
  if (status === 401 || status === 403) {
    return new PortError("auth_failed", message, status);
  }
  if (status === 429) {
    return new PortError("rate_limited", message, status);
  }
  return new PortError("http_error", message, status);
}

function estimateTokenCount(prompt: string, output: string): number {
  const totalChars = prompt.length + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}

function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return normalized.startsWith("gpt-5") || normalized.startsWith("o1") || normalized.startsWith("o3");
}
