/**
 * Finish reason normalisation
 * Maps provider stop reasons onto the loop's vocabulary
 */

import type { FinishReason } from './types';

const STOP_REASONS = new Set(['stop', 'end_turn', 'end']);
const TOOL_REASONS = new Set(['tool_calls', 'tool_use', 'function_call']);
const LENGTH_REASONS = new Set(['length', 'max_tokens']);

export function normalizeFinishReason(raw: string | null | undefined, hasToolCalls: boolean): FinishReason {
  const reason = (raw ?? '').toLowerCase();

  if (TOOL_REASONS.has(reason)) return 'tool_calls';
  if (LENGTH_REASONS.has(reason)) return 'length';
  // Some servers report "stop" even when the turn carries calls
  if (STOP_REASONS.has(reason) && !hasToolCalls) return 'stop';

  return hasToolCalls ? 'tool_calls' : 'stop';
}
