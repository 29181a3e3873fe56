/**
 * Model Adapter - Type Definitions
 * Provider-neutral chat completion with function calling
 */

// ============================================================================
// Messages
// ============================================================================

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ChatMessage {
  role: MessageRole;
  content: string;

  /** Calls requested by the assistant in this turn */
  toolCalls?: ModelToolCall[];

  /** Id of the call a tool message answers */
  toolCallId?: string;

  /** Tool name, for tool messages */
  name?: string;
}

/**
 * A call as requested by the model. Arguments arrive either parsed or as
 * the raw JSON string the provider returned.
 */
export interface ModelToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown> | string;
}

// ============================================================================
// Tools
// ============================================================================

export interface FunctionToolSpec {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

// ============================================================================
// Request / Response
// ============================================================================

export interface ChatRequest {
  messages: ChatMessage[];
  tools?: FunctionToolSpec[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
  jsonMode?: boolean;
  signal?: AbortSignal;
}

export type FinishReason = 'stop' | 'tool_calls' | 'length' | 'error';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  content: string;
  model: string;
  provider: string;
  usage: TokenUsage;
  finishReason: FinishReason;

  /** Raw finish reason as reported by the provider */
  rawFinishReason?: string;

  toolCalls: ModelToolCall[];
  latencyMs: number;
}

// ============================================================================
// Provider
// ============================================================================

export interface ProviderAdapter {
  name: string;
  displayName: string;
  type: 'cloud' | 'local';

  /** Model used when a request names none */
  readonly defaultModel: string;

  chat(request: ChatRequest): Promise<LLMResponse>;
  healthCheck(): Promise<boolean>;
  dispose(): Promise<void>;
}

export interface OpenAIConfig {
  apiKey?: string;
  baseUrl?: string;
  defaultModel?: string;
  organization?: string;
  timeoutMs?: number;
}

export interface OllamaConfig {
  baseUrl?: string;
  defaultModel?: string;
  timeoutMs?: number;
}

// ============================================================================
// Statistics
// ============================================================================

export interface ProviderStats {
  provider: string;
  requests: number;
  successes: number;
  failures: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  averageLatencyMs: number;
  lastError?: string;
}

export interface AdapterStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalTokens: number;
  fallbacks: number;
  byProvider: Record<string, ProviderStats>;
  errorsByType: Record<string, number>;
}

// ============================================================================
// Errors
// ============================================================================

export interface AdapterErrorOptions {
  code: string;
  provider: string;
  retryable: boolean;
  statusCode?: number;
  details?: unknown;
}

export class AdapterError extends Error {
  readonly code: string;
  readonly provider: string;
  readonly retryable: boolean;
  readonly statusCode?: number;
  readonly details?: unknown;

  constructor(message: string, options: AdapterErrorOptions) {
    super(message);
    this.name = 'AdapterError';
    this.code = options.code;
    this.provider = options.provider;
    this.retryable = options.retryable;
    this.statusCode = options.statusCode;
    this.details = options.details;
  }
}
