/**
 * Usage Tracker
 * Track token usage and request statistics per provider
 */

import type { AdapterStats, ProviderStats, TokenUsage } from './types';
import { AdapterError } from './types';

// ============================================================================
// Usage Tracker
// ============================================================================

export class UsageTracker {
  private totalRequests = 0;
  private successfulRequests = 0;
  private failedRequests = 0;
  private totalTokens = 0;
  private fallbacks = 0;

  private providerStats = new Map<string, ProviderStats>();
  private errorsByType = new Map<string, number>();

  // ============================================================================
  // Track Request
  // ============================================================================

  /**
   * Track a successful request
   */
  trackSuccess(provider: string, usage: TokenUsage, latencyMs: number): void {
    this.totalRequests++;
    this.successfulRequests++;
    this.totalTokens += usage.totalTokens;

    const stats = this.statsFor(provider);
    stats.successes++;
    stats.promptTokens += usage.promptTokens;
    stats.completionTokens += usage.completionTokens;
    stats.totalTokens += usage.totalTokens;
    this.recordLatency(stats, latencyMs);
  }

  /**
   * Track a failed request
   */
  trackFailure(provider: string, error: unknown, latencyMs: number): void {
    this.totalRequests++;
    this.failedRequests++;

    const errorType = error instanceof AdapterError ? error.code : 'UNKNOWN';
    this.errorsByType.set(errorType, (this.errorsByType.get(errorType) ?? 0) + 1);

    const stats = this.statsFor(provider);
    stats.failures++;
    stats.lastError = error instanceof Error ? error.message : String(error);
    this.recordLatency(stats, latencyMs);
  }

  /**
   * Count a switch to the next provider after a failure
   */
  trackFallback(): void {
    this.fallbacks++;
  }

  // ============================================================================
  // Helper Methods
  // ============================================================================

  private statsFor(provider: string): ProviderStats {
    let stats = this.providerStats.get(provider);
    if (!stats) {
      stats = {
        provider,
        requests: 0,
        successes: 0,
        failures: 0,
        promptTokens: 0,
        completionTokens: 0,
        totalTokens: 0,
        averageLatencyMs: 0,
      };
      this.providerStats.set(provider, stats);
    }
    return stats;
  }

  private recordLatency(stats: ProviderStats, latencyMs: number): void {
    stats.requests++;
    stats.averageLatencyMs =
      (stats.averageLatencyMs * (stats.requests - 1) + latencyMs) / stats.requests;
  }

  // ============================================================================
  // Get Statistics
  // ============================================================================

  getStats(): AdapterStats {
    return {
      totalRequests: this.totalRequests,
      successfulRequests: this.successfulRequests,
      failedRequests: this.failedRequests,
      totalTokens: this.totalTokens,
      fallbacks: this.fallbacks,
      byProvider: Object.fromEntries(
        Array.from(this.providerStats, ([name, stats]) => [name, { ...stats }])
      ),
      errorsByType: Object.fromEntries(this.errorsByType),
    };
  }

  getProviderStats(provider: string): ProviderStats | null {
    const stats = this.providerStats.get(provider);
    return stats ? { ...stats } : null;
  }

  reset(): void {
    this.totalRequests = 0;
    this.successfulRequests = 0;
    this.failedRequests = 0;
    this.totalTokens = 0;
    this.fallbacks = 0;
    this.providerStats.clear();
    this.errorsByType.clear();
  }
}
