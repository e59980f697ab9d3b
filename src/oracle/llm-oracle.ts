import { OracleError } from '../core/errors.js';
import type { LLMProvider } from '../providers/types.js';
import { extractJson } from './json-extract.js';
import type { ThoughtOracle } from './types.js';

const CONTINUE_PROMPT =
  'You extend a chain of reasoning. Propose distinct next thoughts that build on the chain. ' +
  'Respond with JSON only: {"continuations": [{"content": "...", "prior": 0.0-1.0}]}';

const EVALUATE_PROMPT =
  'You judge a chain of reasoning for correctness, progress and coherence. ' +
  'Respond with JSON only: {"score": 0.0-1.0}';

export interface LLMOracleOptions {
  model?: string;
  temperature?: number;
}

/**
 * ThoughtOracle backed by a chat-completion provider. Shapes are checked
 * loosely here; GuardedOracle does the strict validation.
 */
export class LLMOracle implements ThoughtOracle {
  constructor(
    private readonly provider: LLMProvider,
    private readonly options: LLMOracleOptions = {},
  ) {}

  async generateContinuations(prefix: string[], n: number, signal: AbortSignal): Promise<unknown> {
    const body = await this.ask(
      CONTINUE_PROMPT,
      `${renderChain(prefix)}\n\nPropose ${n} continuation${n === 1 ? '' : 's'}.`,
      signal,
    );
    if (Array.isArray(body)) return body;
    if (typeof body === 'object' && body !== null && 'continuations' in body) {
      return body.continuations;
    }
    throw new OracleError('Completion has no continuations array', 'malformed');
  }

  async evaluate(prefix: string[], signal: AbortSignal): Promise<unknown> {
    const body = await this.ask(EVALUATE_PROMPT, renderChain(prefix), signal);
    if (typeof body === 'number') return body;
    if (typeof body === 'object' && body !== null && 'score' in body) {
      return body.score;
    }
    throw new OracleError('Completion has no score', 'malformed');
  }

  private async ask(system: string, user: string, signal: AbortSignal): Promise<unknown> {
    const response = await this.provider.complete({
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
      model: this.options.model,
      temperature: this.options.temperature ?? 0.7,
      signal,
    });
    const body = extractJson(response.content);
    if (body === undefined) {
      throw new OracleError(`No JSON in completion: '${response.content.slice(0, 100)}'`, 'malformed');
    }
    return body;
  }
}

function renderChain(prefix: string[]): string {
  if (prefix.length === 0) return 'Reasoning chain: (empty)';
  return ['Reasoning chain:', ...prefix.map((t, i) => `${i + 1}. ${t}`)].join('\n');
}
