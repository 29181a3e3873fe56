/**
 * Scripted Adapter
 * Replays a fixed sequence of turns. Used by tests and offline demos.
 */

import type {
  ProviderAdapter,
  ChatRequest,
  LLMResponse,
  ModelToolCall,
  FinishReason,
  TokenUsage,
} from '../types';
import { AdapterError } from '../types';

export interface ScriptedTurn {
  content?: string;
  toolCalls?: ModelToolCall[];
  finishReason?: FinishReason;
  usage?: Partial<TokenUsage>;
}

export type ScriptedStep = ScriptedTurn | Error | ((request: ChatRequest) => ScriptedTurn);

export interface ScriptedProviderOptions {
  name?: string;
  model?: string;

  /** Turn replayed once the script runs out; without it the adapter throws */
  fallback?: ScriptedStep;
}

export class ScriptedAdapter implements ProviderAdapter {
  readonly name: string;
  displayName = 'Scripted';
  type: 'cloud' | 'local' = 'local';
  readonly defaultModel: string;

  /** Every request received, in order */
  readonly requests: ChatRequest[] = [];

  private cursor = 0;

  constructor(
    private readonly steps: ScriptedStep[],
    private readonly options: ScriptedProviderOptions = {}
  ) {
    this.name = options.name ?? 'scripted';
    this.defaultModel = options.model ?? 'scripted-model';
  }

  get callCount(): number {
    return this.requests.length;
  }

  async chat(request: ChatRequest): Promise<LLMResponse> {
    // Keep a copy: callers keep appending to the same array
    this.requests.push({ ...request, messages: [...request.messages] });

    const step = this.cursor < this.steps.length ? this.steps[this.cursor++] : this.options.fallback;
    if (step === undefined) {
      throw new AdapterError(`Script exhausted after ${this.steps.length} turns`, {
        code: 'SCRIPT_EXHAUSTED',
        provider: this.name,
        retryable: false,
      });
    }
    if (step instanceof Error) {
      throw step;
    }

    const turn = typeof step === 'function' ? step(request) : step;
    const toolCalls = turn.toolCalls ?? [];
    const promptTokens = turn.usage?.promptTokens ?? 10;
    const completionTokens = turn.usage?.completionTokens ?? 5;

    return {
      content: turn.content ?? '',
      model: request.model || this.defaultModel,
      provider: this.name,
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: turn.usage?.totalTokens ?? promptTokens + completionTokens,
      },
      finishReason: turn.finishReason ?? (toolCalls.length > 0 ? 'tool_calls' : 'stop'),
      toolCalls,
      latencyMs: 0,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async dispose(): Promise<void> {
    this.cursor = 0;
    this.requests.length = 0;
  }
}

export function createScriptedProvider(
  steps: ScriptedStep[],
  options: ScriptedProviderOptions = {}
): ScriptedAdapter {
  return new ScriptedAdapter(steps, options);
}
