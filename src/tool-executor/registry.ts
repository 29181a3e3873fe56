/**
 * Tool Registry
 *
 * Manages registration, storage, and discovery of tools.
 */

import type { FunctionToolSpec } from '../model-adapter/types';
import type {
  ToolDefinition,
  ToolHandler,
  RegisteredTool,
  ListOptions,
  ToolRegistryStats
} from './types';
import { ToolExecutorError } from './types';
import { validateToolDefinition } from './validation/definition-validator';

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();

  /**
   * Register a new tool
   */
  register(definition: ToolDefinition, handler: ToolHandler): void {
    const validation = validateToolDefinition(definition);
    if (!validation.valid) {
      const errorMessages = validation.errors.map(e => `${e.path}: ${e.message}`).join('; ');
      throw new ToolExecutorError(
        `Invalid tool definition: ${errorMessages}`,
        'INVALID_DEFINITION',
        { errors: validation.errors }
      );
    }

    if (this.tools.has(definition.name)) {
      throw new ToolExecutorError(
        `Tool already registered: ${definition.name}`,
        'DUPLICATE_TOOL',
        { name: definition.name }
      );
    }

    this.tools.set(definition.name, {
      definition,
      handler,
      registered: new Date(),
      executionCount: 0,
      totalDuration: 0,
      errorCount: 0
    });
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): RegisteredTool | null {
    return this.tools.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * List tool definitions in registration order
   */
  list(options: ListOptions = {}): ToolDefinition[] {
    let tools = Array.from(this.tools.values());

    if (options.category) {
      tools = tools.filter(t => t.definition.metadata?.category === options.category);
    }

    if (options.search) {
      const searchLower = options.search.toLowerCase();
      tools = tools.filter(t =>
        t.definition.name.toLowerCase().includes(searchLower) ||
        t.definition.description.toLowerCase().includes(searchLower)
      );
    }

    return tools.map(t => t.definition);
  }

  /**
   * Tools as function-calling specs for the model
   */
  getForModel(options: ListOptions = {}): FunctionToolSpec[] {
    return this.list(options).map(def => ({
      type: 'function',
      function: {
        name: def.name,
        description: def.description,
        parameters: {
          type: def.parameters.type,
          properties: def.parameters.properties,
          ...(def.parameters.required ? { required: def.parameters.required } : {})
        }
      }
    }));
  }

  /**
   * Markdown catalogue of the tools, for system prompts
   */
  buildToolsPrompt(): string {
    const lines = ['## Available tools', ''];

    for (const def of this.list()) {
      lines.push(`### ${def.name}`);
      lines.push(def.description);
      lines.push('');
    }

    return lines.join('\n');
  }

  clear(): void {
    this.tools.clear();
  }

  getStats(): ToolRegistryStats {
    const tools = Array.from(this.tools.values());

    return {
      totalTools: this.tools.size,
      totalExecutions: tools.reduce((sum, t) => sum + t.executionCount, 0),
      totalErrors: tools.reduce((sum, t) => sum + t.errorCount, 0),
      tools: tools.map(t => ({
        name: t.definition.name,
        executionCount: t.executionCount,
        errorCount: t.errorCount,
        averageDuration: t.executionCount > 0 ? t.totalDuration / t.executionCount : 0,
        lastError: t.lastError
      }))
    };
  }

  /**
   * Update tool stats after execution
   */
  recordExecution(name: string, duration: number, success: boolean, error?: string): void {
    const tool = this.tools.get(name);
    if (!tool) {
      return;
    }

    tool.executionCount++;
    tool.totalDuration += duration;

    if (!success) {
      tool.errorCount++;
      tool.lastError = {
        message: error ?? 'Unknown error',
        timestamp: new Date()
      };
    }
  }
}
