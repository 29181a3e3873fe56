/**
 * Fallback Chain
 * Try several providers in turn until one answers
 */

import type { FallbackStrategy } from '../../config';
import type { ProviderAdapter } from '../types';
import { AdapterError } from '../types';

// ============================================================================
// Fallback Configuration
// ============================================================================

export interface FallbackConfig {
  strategy: FallbackStrategy;

  /**
   * Called when an adapter fails and another one is about to be tried
   */
  onFallback?: (failed: string, error: unknown, next: string) => void;
}

export interface FallbackAttempt {
  adapter: ProviderAdapter;
  /** Position in the configured order; 0 is the primary */
  index: number;
}

// ============================================================================
// Fallback Chain
// ============================================================================

export class FallbackChain {
  private rotation = 0;

  constructor(private readonly config: FallbackConfig) {}

  /**
   * Order in which the adapters are tried for the next call.
   * `none` only tries the primary; `sequential` always starts at the primary;
   * `round_robin` starts one further on every call and wraps around.
   */
  order(adapters: ProviderAdapter[]): FallbackAttempt[] {
    const attempts = adapters.map((adapter, index) => ({ adapter, index }));
    if (attempts.length === 0) return [];

    switch (this.config.strategy) {
      case 'none':
        return attempts.slice(0, 1);
      case 'sequential':
        return attempts;
      case 'round_robin': {
        const start = this.rotation % attempts.length;
        this.rotation++;
        return [...attempts.slice(start), ...attempts.slice(0, start)];
      }
    }
  }

  /**
   * Run `call` against each adapter in order, returning the first success
   */
  async run<T>(
    adapters: ProviderAdapter[],
    call: (attempt: FallbackAttempt) => Promise<T>
  ): Promise<T> {
    const attempts = this.order(adapters);
    const errors: Array<{ provider: string; error: unknown }> = [];

    for (let i = 0; i < attempts.length; i++) {
      const attempt = attempts[i];
      try {
        return await call(attempt);
      } catch (error) {
        errors.push({ provider: attempt.adapter.name, error });

        // An aborted request is not retried elsewhere
        if (error instanceof AdapterError && error.code === 'REQUEST_ABORTED') {
          throw error;
        }

        const next = attempts[i + 1];
        if (next) {
          this.config.onFallback?.(attempt.adapter.name, error, next.adapter.name);
        }
      }
    }

    if (errors.length === 1) {
      throw errors[0].error;
    }

    const summary = errors
      .map(({ provider, error }) => `${provider}: ${error instanceof Error ? error.message : String(error)}`)
      .join('; ');

    throw new AdapterError(`All providers failed (${summary})`, {
      code: 'ALL_PROVIDERS_FAILED',
      provider: 'fallback',
      retryable: errors.some(({ error }) => error instanceof AdapterError && error.retryable),
      details: errors,
    });
  }
}
