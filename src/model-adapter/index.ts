/**
 * Model Adapter - Public API
 */

// Main facade
export { ModelAdapter, createModelAdapter } from './ModelAdapter';
export type { ModelAdapterConfig, CreateModelAdapterOptions, HealthCheckResult } from './ModelAdapter';

// Types
export type {
  MessageRole,
  ChatMessage,
  ModelToolCall,
  FunctionToolSpec,
  ChatRequest,
  FinishReason,
  TokenUsage,
  LLMResponse,
  ProviderAdapter,
  OpenAIConfig,
  OllamaConfig,
  ProviderStats,
  AdapterStats,
  AdapterErrorOptions,
} from './types';
export { AdapterError } from './types';

export { normalizeFinishReason } from './finish-reason';
export { requestJson } from './http';
export type { JsonRequestOptions } from './http';

// Usage tracker
export { UsageTracker } from './usage-tracker';

// Middleware
export { FallbackChain } from './middleware/fallback';
export type { FallbackConfig, FallbackAttempt } from './middleware/fallback';

// Individual adapters
export { OpenAIAdapter } from './providers/openai-adapter';
export { OllamaAdapter } from './providers/ollama-adapter';
export { ScriptedAdapter, createScriptedProvider } from './providers/scripted-adapter';
export type { ScriptedTurn, ScriptedStep, ScriptedProviderOptions } from './providers/scripted-adapter';
