/**
 * Chat-completion client used by the ranking and summarization stages
 */

import OpenAI from "openai";
import { logger } from "../logger";

export interface CompletionRequest {
  system?: string;
  prompt: string;
  maxTokens: number;
  json?: boolean; // Ask the model for a JSON object
  signal?: AbortSignal;
}

export interface CompletionClient {
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}

export class OpenAICompletionClient implements CompletionClient {
  private client: OpenAI | null = null;

  constructor(
    private readonly apiKey: string,
    readonly model: string = "gpt-4o-mini"
  ) {}

  /**
   * Lazy-initialized OpenAI client
   */
  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.apiKey, maxRetries: 1 });
    }
    return this.client;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: "system", content: request.system });
    }
    messages.push({ role: "user", content: request.prompt });

    const response = await this.getClient().chat.completions.create(
      {
        model: this.model,
        max_completion_tokens: request.maxTokens,
        temperature: 0.3,
        messages,
        ...(request.json ? { response_format: { type: "json_object" as const } } : {}),
      },
      { signal: request.signal }
    );

    const content = response.choices[0]?.message.content ?? "";
    logger.debug(`Completion received (${content.length} chars)`, {
      model: this.model,
      tokens: response.usage?.total_tokens,
    });
    return content;
  }
}

/**
 * Returns null when no API key is configured
 */
export function createCompletionClient(apiKey: string | undefined, model: string): CompletionClient | null {
  if (!apiKey) {
    return null;
  }
  return new OpenAICompletionClient(apiKey, model);
}
