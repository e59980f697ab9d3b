import OpenAI from 'openai';
import { BaseLLMProvider } from './base.js';
import type { LLMRequest, LLMResponse, ProviderConfig } from './types.js';

/**
 * The slice of the OpenAI client this provider calls.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
}

export class OpenAIProvider extends BaseLLMProvider {
  readonly name = 'openai';
  readonly defaultModel = 'gpt-4o-mini';

  private client: ChatCompletionsClient | null;

  constructor(config: ProviderConfig = {}, client?: ChatCompletionsClient) {
    super(config);
    this.client = client ?? null;
  }

  private getClient(): ChatCompletionsClient {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.config.apiKey || process.env.OPENAI_API_KEY,
        ...(this.config.baseUrl ? { baseURL: this.config.baseUrl } : {}),
      });
    }
    return this.client;
  }

  async isAvailable(): Promise<boolean> {
    return !!(this.config.apiKey || process.env.OPENAI_API_KEY);
  }

  protected async _complete(request: LLMRequest & { model: string }): Promise<LLMResponse> {
    const response = await this.getClient().chat.completions.create(
      {
        model: request.model,
        messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
        max_tokens: request.maxTokens || 1024,
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      },
      request.signal ? { signal: request.signal } : undefined,
    );

    const choice = response.choices[0];
    return {
      content: choice?.message.content || '',
      model: response.model,
      usage: {
        inputTokens: response.usage?.prompt_tokens || 0,
        outputTokens: response.usage?.completion_tokens || 0,
        totalTokens: response.usage?.total_tokens || 0,
      },
      finishReason: choice?.finish_reason === 'length' ? 'length' : 'stop',
    };
  }
}
