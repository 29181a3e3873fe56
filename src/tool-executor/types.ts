/**
 * Tool Registry & Executor
 *
 * Core type definitions for document tools and their execution.
 */

import type { Logger } from '../logging';

// ============================================================================
// JSON Schema Types
// ============================================================================

export interface PropertySchema {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description?: string;
  default?: unknown;
  enum?: Array<string | number>;
  items?: PropertySchema;              // For array
  properties?: Record<string, PropertySchema>;  // For object
  required?: string[];                 // For nested objects
  minimum?: number;
  minLength?: number;
  nullable?: boolean;
}

export interface JSONSchema {
  type: 'object';
  properties: Record<string, PropertySchema>;
  required?: string[];
  additionalProperties?: boolean;
}

// ============================================================================
// Tool Definition
// ============================================================================

export type ToolCategory = 'document' | 'generation';

export interface ToolDefinition {
  name: string;                         // Unique name: 'read_document', 'summarize'
  description: string;                  // Description for the model
  parameters: JSONSchema;

  metadata?: {
    category?: ToolCategory;
    mutates?: boolean;                  // Changes the document buffer
    timeout?: number;                   // Default timeout in ms
  };
}

// ============================================================================
// Tool Handler
// ============================================================================

export interface ToolContext {
  sessionId: string;
  runId: string;
  toolCallId: string;

  signal: AbortSignal;
  timeout: number;

  logger: Logger;
}

export interface ToolError {
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Outcome of one tool call. `data` holds the fields reported back to the
 * model next to `success`.
 */
export interface ToolResult {
  success: boolean;
  data?: Record<string, unknown>;
  error?: ToolError;
  metadata?: {
    duration?: number;
  };
}

export type ToolHandler = (
  params: Record<string, unknown>,
  context: ToolContext
) => Promise<ToolResult> | ToolResult;

export interface Tool {
  definition: ToolDefinition;
  handler: ToolHandler;
}

// ============================================================================
// Registry Types
// ============================================================================

export interface RegisteredTool extends Tool {
  registered: Date;
  executionCount: number;
  totalDuration: number;
  errorCount: number;
  lastError?: {
    message: string;
    timestamp: Date;
  };
}

export interface ListOptions {
  category?: ToolCategory;
  search?: string;                     // Search by name/description
}

// ============================================================================
// Execution Types
// ============================================================================

export interface ValidationError {
  path: string;                        // 'position', 'focus_points[1]'
  message: string;
  code: string;
}

export interface ValidationResult {
  valid: boolean;
  errors?: ValidationError[];
  coerced?: Record<string, unknown>;   // Parameters after coercion
}

export interface ContextOptions {
  sessionId: string;
  runId: string;
  toolCallId: string;
  timeout?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface ToolExecutorConfig {
  defaultTimeout: number;              // default: 30000
  maxTimeout: number;                  // default: 600000
}

// ============================================================================
// Statistics
// ============================================================================

export interface ToolStats {
  name: string;
  executionCount: number;
  errorCount: number;
  averageDuration: number;
  lastError?: {
    message: string;
    timestamp: Date;
  };
}

export interface ToolRegistryStats {
  totalTools: number;
  totalExecutions: number;
  totalErrors: number;
  tools: ToolStats[];
}

// ============================================================================
// Errors
// ============================================================================

export class ToolExecutorError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ToolExecutorError';
  }
}

export class ToolNotFoundError extends ToolExecutorError {
  constructor(toolName: string) {
    super(`Tool not found: ${toolName}`, 'TOOL_NOT_FOUND', { toolName });
    this.name = 'ToolNotFoundError';
  }
}

export class ToolValidationError extends ToolExecutorError {
  constructor(message: string, public errors: ValidationError[]) {
    super(message, 'INVALID_ARGUMENTS', { errors });
    this.name = 'ToolValidationError';
  }
}

export class ToolTimeoutError extends ToolExecutorError {
  constructor(toolName: string, timeout: number) {
    super(`Tool execution timed out after ${timeout}ms: ${toolName}`, 'TIMEOUT', { toolName, timeout });
    this.name = 'ToolTimeoutError';
  }
}

export class ToolAbortedError extends ToolExecutorError {
  constructor(toolName: string) {
    super(`Tool execution was aborted: ${toolName}`, 'ABORTED', { toolName });
    this.name = 'ToolAbortedError';
  }
}
