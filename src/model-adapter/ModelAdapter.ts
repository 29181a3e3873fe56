/**
 * Model Adapter - Main Facade
 * One chat interface over the configured providers, with fallback and usage tracking
 */

import type { FallbackStrategy, LLMSettings, LLMProviderName } from '../config';
import { createLogger, errorMessage, type Logger } from '../logging';
import type {
  ProviderAdapter,
  ChatRequest,
  LLMResponse,
  AdapterStats,
} from './types';
import { AdapterError } from './types';
import { UsageTracker } from './usage-tracker';
import { FallbackChain } from './middleware/fallback';
import { OpenAIAdapter } from './providers/openai-adapter';
import { OllamaAdapter } from './providers/ollama-adapter';

export interface ModelAdapterConfig {
  /** Name of the adapter tried first; defaults to the first one added */
  primary?: string;

  /** Adapters tried after the primary, in order */
  fallbackProviders?: string[];

  fallbackStrategy?: FallbackStrategy;

  /** Applied when a request leaves them unset */
  temperature?: number;
  maxTokens?: number;

  logger?: Logger;
}

export interface HealthCheckResult {
  provider: string;
  healthy: boolean;
  latencyMs: number;
  error?: string;
}

// ============================================================================
// Main Model Adapter
// ============================================================================

export class ModelAdapter {
  private providers: Map<string, ProviderAdapter> = new Map();
  private usageTracker = new UsageTracker();
  private fallback: FallbackChain;
  private logger: Logger;

  constructor(private config: ModelAdapterConfig = {}) {
    this.logger = config.logger ?? createLogger('model-adapter');
    this.fallback = new FallbackChain({
      strategy: config.fallbackStrategy ?? 'none',
      onFallback: (failed, error, next) => {
        this.usageTracker.trackFallback();
        this.logger.warn('Provider failed, falling back', {
          failed,
          next,
          error: errorMessage(error),
        });
      },
    });
  }

  // ============================================================================
  // Provider Management
  // ============================================================================

  addProvider(name: string, adapter: ProviderAdapter): void {
    this.providers.set(name, adapter);
  }

  getProvider(name: string): ProviderAdapter | null {
    return this.providers.get(name) || null;
  }

  listProviders(): string[] {
    return Array.from(this.providers.keys());
  }

  /**
   * Primary adapter followed by the configured fallbacks, skipping unknown names
   */
  private chain(): Array<{ name: string; adapter: ProviderAdapter }> {
    const primary = this.config.primary ?? this.listProviders()[0];
    const names = [primary, ...(this.config.fallbackProviders ?? [])];
    const seen = new Set<string>();
    const chain: Array<{ name: string; adapter: ProviderAdapter }> = [];

    for (const name of names) {
      if (name === undefined || seen.has(name)) continue;
      seen.add(name);
      const adapter = this.providers.get(name);
      if (adapter) chain.push({ name, adapter });
    }

    return chain;
  }

  // ============================================================================
  // Main Completion Method
  // ============================================================================

  /**
   * Send one chat turn. A model named in the request only applies to the
   * primary adapter; fallbacks use their own default model.
   */
  async chat(request: ChatRequest): Promise<LLMResponse> {
    const chain = this.chain();
    if (chain.length === 0) {
      throw new AdapterError('No model provider configured', {
        code: 'NO_PROVIDER',
        provider: 'model-adapter',
        retryable: false,
      });
    }

    const names = new Map(chain.map(({ name, adapter }) => [adapter, name]));

    return this.fallback.run(chain.map(c => c.adapter), async ({ adapter, index }) => {
      const name = names.get(adapter) ?? adapter.name;
      const startTime = Date.now();

      try {
        const response = await adapter.chat({
          ...request,
          model: index === 0 ? request.model : undefined,
          temperature: request.temperature ?? this.config.temperature,
          maxTokens: request.maxTokens ?? this.config.maxTokens,
        });

        this.usageTracker.trackSuccess(name, response.usage, Date.now() - startTime);
        this.logger.debug('Chat completed', {
          provider: name,
          model: response.model,
          finishReason: response.finishReason,
          toolCalls: response.toolCalls.length,
          totalTokens: response.usage.totalTokens,
        });

        return response;
      } catch (error) {
        this.usageTracker.trackFailure(name, error, Date.now() - startTime);
        throw error;
      }
    });
  }

  /**
   * Single prompt in, text out
   */
  async simpleChat(prompt: string, systemPrompt?: string): Promise<string> {
    const response = await this.chat({
      messages: [
        ...(systemPrompt ? [{ role: 'system' as const, content: systemPrompt }] : []),
        { role: 'user', content: prompt },
      ],
    });
    return response.content;
  }

  // ============================================================================
  // Health Checks
  // ============================================================================

  async healthCheck(): Promise<HealthCheckResult[]> {
    const results: HealthCheckResult[] = [];

    for (const [name, adapter] of this.providers) {
      const startTime = Date.now();
      let healthy = false;
      let error: string | undefined;

      try {
        healthy = await adapter.healthCheck();
      } catch (err) {
        error = errorMessage(err);
      }

      results.push({ provider: name, healthy, latencyMs: Date.now() - startTime, error });
    }

    return results;
  }

  // ============================================================================
  // Statistics
  // ============================================================================

  getStats(): AdapterStats {
    return this.usageTracker.getStats();
  }

  resetStats(): void {
    this.usageTracker.reset();
  }

  // ============================================================================
  // Cleanup
  // ============================================================================

  async dispose(): Promise<void> {
    for (const adapter of this.providers.values()) {
      await adapter.dispose();
    }
    this.providers.clear();
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

export interface CreateModelAdapterOptions {
  requestTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Build an adapter for the configured provider and its fallbacks.
 * Base URL and model apply to the primary provider only.
 */
export function createModelAdapter(
  settings: LLMSettings,
  options: CreateModelAdapterOptions = {}
): ModelAdapter {
  const adapter = new ModelAdapter({
    primary: settings.provider,
    fallbackProviders: settings.fallbackProviders,
    fallbackStrategy: settings.fallbackStrategy,
    temperature: settings.temperature,
    maxTokens: settings.maxTokens,
    logger: options.logger,
  });

  const names = new Set<LLMProviderName>([settings.provider, ...settings.fallbackProviders]);
  for (const name of names) {
    const primary = name === settings.provider;
    adapter.addProvider(
      name,
      createProvider(name, {
        apiKey: settings.apiKey,
        baseUrl: primary ? settings.baseUrl : undefined,
        defaultModel: primary ? settings.model : undefined,
        timeoutMs: options.requestTimeoutMs,
      })
    );
  }

  return adapter;
}

function createProvider(
  name: LLMProviderName,
  options: { apiKey?: string; baseUrl?: string; defaultModel?: string; timeoutMs?: number }
): ProviderAdapter {
  switch (name) {
    case 'openai':
      return new OpenAIAdapter(options);
    case 'ollama':
      return new OllamaAdapter({
        baseUrl: options.baseUrl,
        defaultModel: options.defaultModel,
        timeoutMs: options.timeoutMs,
      });
  }
}
