/**
 * Tool Call Parser
 *
 * Turns the calls in a model response into tool call records.
 */

import type { LLMResponse, ModelToolCall } from '../model-adapter/types';
import type { ToolCallRecord } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Parser
// ============================================================================

export class ToolCallParser {
  /**
   * Extract tool calls from a model response, in the order the model listed them
   */
  parse(response: LLMResponse, iteration: number): ToolCallRecord[] {
    const seen = new Set<string>();

    return response.toolCalls.map((call, index) => {
      // Ids must be unique within a turn so results pair with their call
      let id = call.id.trim() || `call_${iteration}_${index}`;
      if (seen.has(id)) id = `${id}_${index}`;
      seen.add(id);

      return {
        id,
        name: call.name,
        arguments: this.parseArguments(call.arguments),
        status: 'pending' as const,
        iteration,
      };
    });
  }

  /**
   * Arguments as an object. Unparseable JSON becomes `{}` so the schema
   * validator reports what is missing.
   */
  parseArguments(raw: ModelToolCall['arguments']): Record<string, unknown> {
    if (typeof raw !== 'string') {
      return raw;
    }
    if (raw.trim() === '') {
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      return isRecord(parsed) ? parsed : {};
    } catch {
      return {};
    }
  }
}
