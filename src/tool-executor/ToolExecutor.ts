/**
 * Tool Executor
 *
 * Main facade class that orchestrates tool registration and execution.
 */

import type { FunctionToolSpec } from '../model-adapter/types';
import type {
  Tool,
  ToolDefinition,
  ToolHandler,
  ToolResult,
  ToolExecutorConfig,
  ListOptions,
  ValidationResult,
  ContextOptions,
  ToolContext,
  ToolRegistryStats,
  RegisteredTool
} from './types';

import { ToolRegistry } from './registry';
import { executeTool } from './executor';
import { createToolContext } from './context';
import { validateParameters } from './validation/schema-validator';
import { DocumentProvider } from './document-provider';
import { createDocumentTools } from './document-tools';

const DEFAULT_CONFIG: ToolExecutorConfig = {
  defaultTimeout: 30000,
  maxTimeout: 600000
};

export class ToolExecutor {
  private registry: ToolRegistry;
  private config: ToolExecutorConfig;

  constructor(config?: Partial<ToolExecutorConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.registry = new ToolRegistry();
  }

  // ========================================================================
  // Registry Operations
  // ========================================================================

  register(definition: ToolDefinition, handler: ToolHandler): void {
    this.registry.register(definition, handler);
  }

  registerAll(tools: Tool[]): void {
    for (const tool of tools) {
      this.registry.register(tool.definition, tool.handler);
    }
  }

  unregister(name: string): boolean {
    return this.registry.unregister(name);
  }

  get(name: string): RegisteredTool | null {
    return this.registry.get(name);
  }

  has(name: string): boolean {
    return this.registry.has(name);
  }

  list(options?: ListOptions): ToolDefinition[] {
    return this.registry.list(options);
  }

  /**
   * Tools as function-calling specs for the model
   */
  getForModel(options?: ListOptions): FunctionToolSpec[] {
    return this.registry.getForModel(options);
  }

  buildToolsPrompt(): string {
    return this.registry.buildToolsPrompt();
  }

  // ========================================================================
  // Execution
  // ========================================================================

  /**
   * Execute a tool. Never throws: failures come back as error results.
   */
  async execute(
    name: string,
    params: unknown,
    context: ToolContext
  ): Promise<ToolResult> {
    return executeTool(this.registry, name, params, context, this.config);
  }

  /**
   * Validate parameters without executing
   */
  validate(name: string, params: unknown): ValidationResult {
    const tool = this.registry.get(name);
    if (!tool) {
      return {
        valid: false,
        errors: [{
          path: 'tool',
          message: `Tool not found: ${name}`,
          code: 'TOOL_NOT_FOUND'
        }]
      };
    }

    return validateParameters(params, tool.definition.parameters);
  }

  // ========================================================================
  // Utilities
  // ========================================================================

  createContext(options: ContextOptions): ToolContext {
    return createToolContext({ timeout: this.config.defaultTimeout, ...options });
  }

  getConfig(): ToolExecutorConfig {
    return { ...this.config };
  }

  getStats(): ToolRegistryStats {
    return this.registry.getStats();
  }

  clear(): void {
    this.registry.clear();
  }
}

/**
 * An executor holding the seven document tools bound to one buffer
 */
export function createDocumentToolExecutor(
  document: DocumentProvider,
  config?: Partial<ToolExecutorConfig>
): ToolExecutor {
  const executor = new ToolExecutor(config);
  executor.registerAll(createDocumentTools(document));
  return executor;
}
