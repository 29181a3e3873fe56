/**
 * OpenAI Adapter
 * Chat completions with function calling against any OpenAI-compatible endpoint
 */

import type {
  ProviderAdapter,
  ChatRequest,
  ChatMessage,
  LLMResponse,
  ModelToolCall,
  OpenAIConfig,
} from '../types';
import { AdapterError } from '../types';
import { requestJson, isRecord, numberOr } from '../http';
import { normalizeFinishReason } from '../finish-reason';

// ============================================================================
// OpenAI API Types
// ============================================================================

interface OpenAIMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string | null;
  tool_calls?: OpenAIToolCall[];
  tool_call_id?: string;
  name?: string;
}

interface OpenAIToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

// ============================================================================
// OpenAI Provider Adapter
// ============================================================================

export class OpenAIAdapter implements ProviderAdapter {
  name = 'openai';
  displayName = 'OpenAI-compatible';
  type: 'cloud' | 'local' = 'cloud';

  private apiKey: string | null;
  private organization: string | null;
  private baseUrl: string;
  private timeoutMs: number;
  readonly defaultModel: string;

  constructor(config: OpenAIConfig = {}) {
    this.apiKey = config.apiKey || null;
    this.organization = config.organization || null;
    this.baseUrl = (config.baseUrl || 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.defaultModel = config.defaultModel || 'gpt-4o-mini';
    this.timeoutMs = config.timeoutMs ?? 60_000;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.apiKey) return false;

    try {
      await requestJson(`${this.baseUrl}/models`, {
        provider: this.name,
        method: 'GET',
        headers: this.getHeaders(),
        timeoutMs: this.timeoutMs,
      });
      return true;
    } catch {
      return false;
    }
  }

  // ============================================================================
  // Main Completion Method
  // ============================================================================

  async chat(request: ChatRequest): Promise<LLMResponse> {
    if (!this.apiKey) {
      throw new AdapterError('OpenAI API key not configured', {
        code: 'MISSING_API_KEY',
        provider: this.name,
        retryable: false,
      });
    }

    const model = request.model || this.defaultModel;
    const startTime = Date.now();

    const data = await requestJson(`${this.baseUrl}/chat/completions`, {
      provider: this.name,
      headers: this.getHeaders(),
      body: this.buildRequestBody(request, model),
      timeoutMs: this.timeoutMs,
      signal: request.signal,
    });

    return this.parseResponse(data, model, Date.now() - startTime);
  }

  async dispose(): Promise<void> {
    // Stateless
  }

  // ============================================================================
  // Request Building
  // ============================================================================

  private buildRequestBody(request: ChatRequest, model: string): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model,
      messages: request.messages.map(toOpenAIMessage),
      stream: false,
    };

    if (request.tools && request.tools.length > 0) {
      body.tools = request.tools;
      body.tool_choice = 'auto';
    }
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }
    if (request.maxTokens !== undefined) {
      body.max_tokens = request.maxTokens;
    }
    if (request.jsonMode) {
      body.response_format = { type: 'json_object' };
    }

    return body;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Authorization': `Bearer ${this.apiKey ?? ''}`,
    };

    if (this.organization) {
      headers['OpenAI-Organization'] = this.organization;
    }

    return headers;
  }

  // ============================================================================
  // Response Parsing
  // ============================================================================

  private parseResponse(data: unknown, model: string, latencyMs: number): LLMResponse {
    const choice = isRecord(data) && Array.isArray(data.choices) ? data.choices[0] : undefined;
    if (!isRecord(data) || !isRecord(choice) || !isRecord(choice.message)) {
      throw new AdapterError('Response has no choices', {
        code: 'INVALID_RESPONSE',
        provider: this.name,
        retryable: false,
      });
    }

    const message = choice.message;
    const toolCalls = parseToolCalls(message.tool_calls);
    const rawFinishReason = typeof choice.finish_reason === 'string' ? choice.finish_reason : undefined;
    const usage = isRecord(data.usage) ? data.usage : {};
    const promptTokens = numberOr(usage.prompt_tokens, 0);
    const completionTokens = numberOr(usage.completion_tokens, 0);

    return {
      content: typeof message.content === 'string' ? message.content : '',
      model: typeof data.model === 'string' ? data.model : model,
      provider: this.name,
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: numberOr(usage.total_tokens, promptTokens + completionTokens),
      },
      finishReason: normalizeFinishReason(rawFinishReason, toolCalls.length > 0),
      rawFinishReason,
      toolCalls,
      latencyMs,
    };
  }
}

// ============================================================================
// Conversion helpers
// ============================================================================

function toOpenAIMessage(message: ChatMessage): OpenAIMessage {
  switch (message.role) {
    case 'assistant':
      return {
        role: 'assistant',
        // Content must be null rather than empty when only calls are sent
        content: message.content === '' && message.toolCalls?.length ? null : message.content,
        ...(message.toolCalls?.length
          ? {
              tool_calls: message.toolCalls.map(call => ({
                id: call.id,
                type: 'function' as const,
                function: {
                  name: call.name,
                  arguments: typeof call.arguments === 'string' ? call.arguments : JSON.stringify(call.arguments),
                },
              })),
            }
          : {}),
      };
    case 'tool':
      return {
        role: 'tool',
        content: message.content,
        tool_call_id: message.toolCallId,
        ...(message.name ? { name: message.name } : {}),
      };
    default:
      return { role: message.role, content: message.content };
  }
}

function parseToolCalls(value: unknown): ModelToolCall[] {
  if (!Array.isArray(value)) return [];

  const calls: ModelToolCall[] = [];
  value.forEach((entry: unknown, index) => {
    if (!isRecord(entry) || !isRecord(entry.function)) return;
    const fn = entry.function;
    if (typeof fn.name !== 'string') return;

    calls.push({
      id: typeof entry.id === 'string' && entry.id !== '' ? entry.id : `call_${index}`,
      name: fn.name,
      arguments: typeof fn.arguments === 'string' || isRecord(fn.arguments) ? fn.arguments : {},
    });
  });
  return calls;
}
