import type { LLMProvider, LLMRequest, LLMResponse, ProviderConfig } from './types.js';
import { componentLogger } from '../core/logger.js';

/**
 * Shared request plumbing for providers. There is no retry here: callers
 * of oracle-backed operations own their retry policy.
 */
export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  abstract readonly defaultModel: string;

  protected logger = componentLogger('provider');
  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}) {
    this.config = { ...config };
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const model = request.model || this.config.defaultModel || this.defaultModel;
    this.logger.debug({ provider: this.name, model }, 'LLM request');

    const started = Date.now();
    const response = await this._complete({ ...request, model });
    this.logger.debug(
      { provider: this.name, model, latencyMs: Date.now() - started, tokens: response.usage.totalTokens },
      'LLM response',
    );
    return response;
  }

  abstract isAvailable(): Promise<boolean>;

  protected abstract _complete(request: LLMRequest & { model: string }): Promise<LLMResponse>;
}
