/**
 * Basic Executor
 *
 * Core execution logic for tools with validation, timeout and
 * cancellation. Every failure comes back as an error result.
 */

import { errorMessage } from '../logging';
import type {
  ToolContext,
  ToolResult,
  ToolHandler,
  ToolExecutorConfig
} from './types';
import {
  ToolExecutorError,
  ToolNotFoundError,
  ToolTimeoutError,
  ToolAbortedError,
  ToolValidationError
} from './types';
import { ToolRegistry } from './registry';
import { validateParameters, formatValidationErrors } from './validation/schema-validator';
import { isContextAborted, createErrorResult } from './context';

/**
 * Execute a single tool
 */
export async function executeTool(
  registry: ToolRegistry,
  name: string,
  params: unknown,
  context: ToolContext,
  config: ToolExecutorConfig
): Promise<ToolResult> {
  const startTime = Date.now();

  try {
    if (isContextAborted(context)) {
      throw new ToolAbortedError(name);
    }

    const tool = registry.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }

    const validation = validateParameters(params, tool.definition.parameters);
    if (!validation.valid || !validation.coerced) {
      const errors = validation.errors ?? [];
      throw new ToolValidationError(
        `Invalid arguments for tool "${name}": ${formatValidationErrors(errors)}`,
        errors
      );
    }

    const toolTimeout = tool.definition.metadata?.timeout ?? config.defaultTimeout;
    const effectiveTimeout = Math.min(toolTimeout, context.timeout, config.maxTimeout);

    const result = await executeWithTimeout(
      tool.handler,
      validation.coerced,
      context,
      effectiveTimeout,
      name
    );

    const duration = Date.now() - startTime;
    registry.recordExecution(name, duration, result.success, result.error?.message);

    context.logger.debug('Tool executed', {
      tool: name,
      toolCallId: context.toolCallId,
      success: result.success,
      durationMs: duration
    });

    return {
      ...result,
      metadata: {
        ...result.metadata,
        duration
      }
    };

  } catch (error) {
    const duration = Date.now() - startTime;

    const result = error instanceof ToolExecutorError
      ? createErrorResult(error.code, error.message, error.details)
      : createErrorResult('EXECUTION_ERROR', errorMessage(error));

    registry.recordExecution(name, duration, false, result.error?.message);

    context.logger.warn('Tool failed', {
      tool: name,
      toolCallId: context.toolCallId,
      code: result.error?.code,
      error: result.error?.message
    });

    return result;
  }
}

/**
 * Execute tool handler with timeout
 */
async function executeWithTimeout(
  handler: ToolHandler,
  params: Record<string, unknown>,
  context: ToolContext,
  timeout: number,
  toolName: string
): Promise<ToolResult> {
  return new Promise<ToolResult>((resolve, reject) => {
    let settled = false;

    const abortListener = () => {
      if (!settled) {
        settled = true;
        clearTimeout(timeoutId);
        reject(new ToolAbortedError(toolName));
      }
    };

    const timeoutId = setTimeout(() => {
      if (!settled) {
        settled = true;
        context.signal.removeEventListener('abort', abortListener);
        reject(new ToolTimeoutError(toolName, timeout));
      }
    }, timeout);

    context.signal.addEventListener('abort', abortListener);

    Promise.resolve()
      .then(() => handler(params, context))
      .then(result => {
        if (!settled) {
          settled = true;
          clearTimeout(timeoutId);
          context.signal.removeEventListener('abort', abortListener);
          resolve(result);
        }
      })
      .catch((error: unknown) => {
        if (!settled) {
          settled = true;
          clearTimeout(timeoutId);
          context.signal.removeEventListener('abort', abortListener);
          reject(error);
        }
      });
  });
}
