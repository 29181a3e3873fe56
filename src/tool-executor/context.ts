/**
 * Execution Context
 *
 * Creates the context handed to tool handlers and shapes their results.
 */

import { createLogger } from '../logging';
import type { ToolContext, ContextOptions, ToolResult } from './types';

/**
 * Create a context for one tool invocation
 */
export function createToolContext(options: ContextOptions): ToolContext {
  return {
    sessionId: options.sessionId,
    runId: options.runId,
    toolCallId: options.toolCallId,
    signal: options.signal ?? new AbortController().signal,
    timeout: options.timeout ?? 30000,
    logger: options.logger ?? createLogger('tool-executor')
  };
}

export function isContextAborted(context: ToolContext): boolean {
  return context.signal.aborted;
}

export function createErrorResult(
  code: string,
  message: string,
  details?: unknown
): ToolResult {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined ? { details } : {})
    }
  };
}

export function createSuccessResult(data: Record<string, unknown> = {}): ToolResult {
  return {
    success: true,
    data
  };
}

/**
 * The object the model sees for a result: `success` next to the data
 * fields, or the error code and message.
 */
export function toPayload(result: ToolResult): Record<string, unknown> {
  if (result.success) {
    return { success: true, ...result.data };
  }
  return {
    success: false,
    error: result.error?.message ?? 'Unknown error',
    code: result.error?.code ?? 'UNKNOWN_ERROR'
  };
}

/**
 * Serialise a result for a tool-role message
 */
export function formatResultForModel(result: ToolResult): string {
  return JSON.stringify(toPayload(result));
}
