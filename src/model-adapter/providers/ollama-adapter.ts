/**
 * Ollama Adapter
 * Local models through the /api/chat endpoint, with tools support
 */

import type {
  ProviderAdapter,
  ChatRequest,
  ChatMessage,
  LLMResponse,
  ModelToolCall,
  OllamaConfig,
} from '../types';
import { AdapterError } from '../types';
import { requestJson, isRecord, numberOr } from '../http';
import { normalizeFinishReason } from '../finish-reason';

// ============================================================================
// Ollama API Types
// ============================================================================

interface OllamaMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  tool_calls?: Array<{
    function: {
      name: string;
      arguments: Record<string, unknown>;
    };
  }>;
}

// ============================================================================
// Ollama Provider Adapter
// ============================================================================

export class OllamaAdapter implements ProviderAdapter {
  name = 'ollama';
  displayName = 'Ollama (Local)';
  type: 'cloud' | 'local' = 'local';

  private baseUrl: string;
  private timeoutMs: number;
  readonly defaultModel: string;

  constructor(config: OllamaConfig = {}) {
    this.baseUrl = (config.baseUrl || 'http://localhost:11434').replace(/\/+$/, '');
    this.defaultModel = config.defaultModel || 'llama3.1';
    this.timeoutMs = config.timeoutMs ?? 60_000;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await requestJson(`${this.baseUrl}/api/tags`, {
        provider: this.name,
        method: 'GET',
        timeoutMs: this.timeoutMs,
      });
      return true;
    } catch {
      return false;
    }
  }

  async chat(request: ChatRequest): Promise<LLMResponse> {
    const model = request.model || this.defaultModel;
    const startTime = Date.now();

    const data = await requestJson(`${this.baseUrl}/api/chat`, {
      provider: this.name,
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
      messages: request.messages.map(toOllamaMessage),
      stream: false,
    };

    if (request.tools && request.tools.length > 0) {
      body.tools = request.tools;
    }
    if (request.jsonMode) {
      body.format = 'json';
    }

    const options: Record<string, number> = {};
    if (request.temperature !== undefined) {
      options.temperature = request.temperature;
    }
    if (request.maxTokens !== undefined) {
      options.num_predict = request.maxTokens;
    }
    if (Object.keys(options).length > 0) {
      body.options = options;
    }

    return body;
  }

  // ============================================================================
  // Response Parsing
  // ============================================================================

  private parseResponse(data: unknown, model: string, latencyMs: number): LLMResponse {
    if (!isRecord(data) || !isRecord(data.message)) {
      throw new AdapterError('Response has no message', {
        code: 'INVALID_RESPONSE',
        provider: this.name,
        retryable: false,
      });
    }

    const toolCalls = parseToolCalls(data.message.tool_calls);
    const rawFinishReason = typeof data.done_reason === 'string' ? data.done_reason : undefined;
    const promptTokens = numberOr(data.prompt_eval_count, 0);
    const completionTokens = numberOr(data.eval_count, 0);

    return {
      content: typeof data.message.content === 'string' ? data.message.content : '',
      model: typeof data.model === 'string' ? data.model : model,
      provider: this.name,
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
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

function toOllamaMessage(message: ChatMessage): OllamaMessage {
  if (message.role === 'assistant' && message.toolCalls?.length) {
    return {
      role: 'assistant',
      content: message.content,
      tool_calls: message.toolCalls.map(call => ({
        function: {
          name: call.name,
          arguments: typeof call.arguments === 'string' ? parseArguments(call.arguments) : call.arguments,
        },
      })),
    };
  }
  return { role: message.role, content: message.content };
}

// Ollama returns arguments already parsed and has no call ids
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

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}
