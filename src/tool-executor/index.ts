/**
 * Tool Executor Module
 *
 * Registry, validation and execution of the agent's document tools.
 */

// Core types
export type {
  // JSON Schema
  PropertySchema,
  JSONSchema,

  // Tool Definition
  ToolDefinition,
  ToolCategory,
  Tool,

  // Execution
  ToolContext,
  ToolResult,
  ToolError,
  ToolHandler,
  ContextOptions,
  ValidationError,
  ValidationResult,
  ToolExecutorConfig,

  // Registry
  RegisteredTool,
  ListOptions,
  ToolStats,
  ToolRegistryStats
} from './types';

// Error classes
export {
  ToolExecutorError,
  ToolNotFoundError,
  ToolValidationError,
  ToolTimeoutError,
  ToolAbortedError
} from './types';

// Main facade
export { ToolExecutor, createDocumentToolExecutor } from './ToolExecutor';
export { ToolRegistry } from './registry';
export { executeTool } from './executor';

// Context and results
export {
  createToolContext,
  createErrorResult,
  createSuccessResult,
  toPayload,
  formatResultForModel
} from './context';

// Validation
export { validateParameters, formatValidationErrors } from './validation/schema-validator';
export { validateToolDefinition } from './validation/definition-validator';

// Document tools
export { DocumentProvider } from './document-provider';
export type { DocumentEdit } from './document-provider';
export { createDocumentTools, DOCUMENT_TOOL_NAMES } from './document-tools';
export type { DocumentToolName, EditAction } from './document-tools';
