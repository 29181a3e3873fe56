/**
 * Basic Tool Executor Tests
 *
 * Tests for core functionality: registration, validation, execution.
 */

import { ToolExecutor } from '../ToolExecutor';
import { validateParameters } from '../validation/schema-validator';
import type { ToolDefinition, ToolHandler, ToolContext, ToolResult } from '../types';

const echoDefinition: ToolDefinition = {
  name: 'echo',
  description: 'Echo back the input',
  parameters: {
    type: 'object',
    properties: {
      message: { type: 'string', description: 'Message to echo' },
      times: { type: 'integer', default: 1 }
    },
    required: ['message']
  }
};

const echoHandler: ToolHandler = (params) => ({
  success: true,
  data: { echoed: params.message, times: params.times }
});

describe('Tool Executor - Basic Functionality', () => {
  let executor: ToolExecutor;
  let context: ToolContext;

  beforeEach(() => {
    executor = new ToolExecutor({ defaultTimeout: 5000 });
    context = executor.createContext({ sessionId: 'session-1', runId: 'run-1', toolCallId: 'call-1' });
  });

  afterEach(() => {
    executor.clear();
  });

  // ========================================================================
  // Tool Registration
  // ========================================================================

  describe('Tool Registration', () => {
    it('should register a simple tool', () => {
      executor.register(echoDefinition, echoHandler);

      expect(executor.has('echo')).toBe(true);
      expect(executor.get('echo')?.definition.name).toBe('echo');
    });

    it('should reject an invalid tool definition', () => {
      const invalid: ToolDefinition = { ...echoDefinition, name: 'Bad Name' };

      expect(() => executor.register(invalid, echoHandler)).toThrow(/Invalid tool definition/);
    });

    it('should reject required parameters that are not declared', () => {
      const invalid: ToolDefinition = {
        ...echoDefinition,
        parameters: { type: 'object', properties: {}, required: ['ghost'] }
      };

      expect(() => executor.register(invalid, echoHandler)).toThrow(/ghost/);
    });

    it('should prevent duplicate registration', () => {
      executor.register(echoDefinition, echoHandler);

      expect(() => executor.register(echoDefinition, echoHandler)).toThrow(/already registered/i);
    });

    it('should unregister a tool', () => {
      executor.register(echoDefinition, echoHandler);

      expect(executor.unregister('echo')).toBe(true);
      expect(executor.has('echo')).toBe(false);
    });
  });

  // ========================================================================
  // Model Formatting
  // ========================================================================

  describe('Model Formatting', () => {
    beforeEach(() => {
      executor.register(echoDefinition, echoHandler);
    });

    it('should expose tools as function specs', () => {
      expect(executor.getForModel()).toEqual([
        {
          type: 'function',
          function: {
            name: 'echo',
            description: 'Echo back the input',
            parameters: {
              type: 'object',
              properties: echoDefinition.parameters.properties,
              required: ['message']
            }
          }
        }
      ]);
    });

    it('should render a markdown tool catalogue', () => {
      expect(executor.buildToolsPrompt()).toBe('## Available tools\n\n### echo\nEcho back the input\n');
    });
  });

  // ========================================================================
  // Parameter Validation
  // ========================================================================

  describe('Parameter Validation', () => {
    it('should coerce strings to numbers and apply defaults', () => {
      const result = validateParameters(
        { position: '7' },
        {
          type: 'object',
          properties: {
            position: { type: 'integer' },
            max_results: { type: 'integer', default: 5 }
          }
        }
      );

      expect(result).toEqual({ valid: true, coerced: { position: 7, max_results: 5 } });
    });

    it('should reject values outside an enum', () => {
      const result = validateParameters(
        { action: 'append' },
        { type: 'object', properties: { action: { type: 'string', enum: ['insert', 'delete'] } } }
      );

      expect(result.valid).toBe(false);
      expect(result.errors?.[0]).toMatchObject({ path: 'action', code: 'ENUM_MISMATCH' });
    });

    it('should report missing required parameters', () => {
      const result = validateParameters({}, echoDefinition.parameters);

      expect(result.errors).toEqual([
        { path: 'message', message: 'Missing required parameter: message', code: 'REQUIRED_FIELD' }
      ]);
    });

    it('should validate array items', () => {
      const result = validateParameters(
        { tags: ['a', { nested: true }] },
        { type: 'object', properties: { tags: { type: 'array', items: { type: 'string' } } } }
      );

      expect(result.errors?.[0]).toMatchObject({ path: 'tags[1]', code: 'INVALID_TYPE' });
    });

    it('should reject non-object parameters', () => {
      expect(validateParameters('oops', echoDefinition.parameters).valid).toBe(false);
    });
  });

  // ========================================================================
  // Execution
  // ========================================================================

  describe('Execution', () => {
    it('should execute with coerced parameters', async () => {
      executor.register(echoDefinition, echoHandler);

      const result = await executor.execute('echo', { message: 42 }, context);

      expect(result.success).toBe(true);
      expect(result.data).toEqual({ echoed: '42', times: 1 });
      expect(result.metadata?.duration).toBeGreaterThanOrEqual(0);
    });

    it('should return INVALID_ARGUMENTS instead of calling the handler', async () => {
      const handler = jest.fn(echoHandler);
      executor.register(echoDefinition, handler);

      const result = await executor.execute('echo', {}, context);

      expect(handler).not.toHaveBeenCalled();
      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('INVALID_ARGUMENTS');
      expect(result.error?.message).toBe('Invalid arguments for tool "echo": message: Missing required parameter: message');
    });

    it('should return TOOL_NOT_FOUND for unknown tools', async () => {
      const result = await executor.execute('missing', {}, context);

      expect(result.error?.code).toBe('TOOL_NOT_FOUND');
    });

    it('should turn handler exceptions into error results', async () => {
      executor.register({ ...echoDefinition, name: 'explode' }, () => {
        throw new Error('kaboom');
      });

      const result = await executor.execute('explode', { message: 'x' }, context);

      expect(result.error).toEqual({ code: 'EXECUTION_ERROR', message: 'kaboom' });
    });

    it('should time out slow handlers', async () => {
      executor.register(
        { ...echoDefinition, name: 'slow', metadata: { timeout: 20 } },
        () => new Promise<ToolResult>(resolve => setTimeout(() => resolve({ success: true }), 200))
      );

      const result = await executor.execute('slow', { message: 'x' }, context);

      expect(result.error?.code).toBe('TIMEOUT');
    });

    it('should not run when the context is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const aborted = executor.createContext({
        sessionId: 's',
        runId: 'r',
        toolCallId: 'c',
        signal: controller.signal
      });
      executor.register(echoDefinition, echoHandler);

      const result = await executor.execute('echo', { message: 'x' }, aborted);

      expect(result.error?.code).toBe('ABORTED');
    });

    it('should track execution statistics', async () => {
      executor.register(echoDefinition, echoHandler);

      await executor.execute('echo', { message: 'a' }, context);
      await executor.execute('echo', {}, context);

      const stats = executor.getStats();
      expect(stats.totalExecutions).toBe(2);
      expect(stats.totalErrors).toBe(1);
      expect(stats.tools[0].lastError?.message).toMatch(/Missing required parameter/);
    });
  });
});
