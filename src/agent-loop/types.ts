/**
 * Agent Loop Types
 */

import type { Logger } from '../logging';
import type { ChatMessage, ChatRequest, LLMResponse } from '../model-adapter/types';
import type { ToolResult } from '../tool-executor/types';
import type { DocumentEdit } from '../tool-executor/document-provider';

// ============================================================================
// States
// ============================================================================

export type AgentState = 'awaiting_model' | 'executing_tools' | 'done';

export type AgentErrorCode =
  | 'length_exceeded'
  | 'llm_error'
  | 'max_iterations_exceeded';

// ============================================================================
// Dependencies
// ============================================================================

/**
 * Anything that answers a chat turn: the model adapter facade or a single provider
 */
export interface ChatClient {
  chat(request: ChatRequest): Promise<LLMResponse>;
}

export interface AgentProcessorConfig {
  maxIterations: number;

  /** Characters of the document copied into the system prompt */
  documentPreviewLength: number;

  /** Instructions placed before the tool catalogue */
  systemPrompt: string;

  temperature?: number;
  maxTokens?: number;

  /** Per-call tool timeout */
  toolTimeoutMs?: number;
}

// ============================================================================
// Request
// ============================================================================

export interface AgentRequest {
  message: string;
  sessionId?: string;

  /** Earlier user/assistant turns, oldest first */
  history?: ChatMessage[];

  documentContent?: string;
  documentId?: string | null;
  selectedText?: string;

  /** Retrieved knowledge-base passages, already formatted */
  ragContext?: string;

  signal?: AbortSignal;
}

// ============================================================================
// Tool Calls
// ============================================================================

export type ToolCallStatus = 'pending' | 'running' | 'completed' | 'error';

export interface ToolCallRecord {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  status: ToolCallStatus;

  /** Payload as returned to the model */
  result?: Record<string, unknown>;
  error?: string;

  /** Iteration the call was requested in (1-based) */
  iteration: number;
}

// ============================================================================
// Result
// ============================================================================

export interface AgentResult {
  success: boolean;
  message: string;
  toolCalls: ToolCallRecord[];
  iterations: number;
  totalTokens: number;
  sessionId: string;
  runId: string;
  error?: AgentErrorCode;

  /** Detail behind `error`, such as the provider's failure message */
  errorDetail?: string;

  /** Changes made to the document buffer, in order */
  edits: DocumentEdit[];

  /** Document text after the run's edits; absent when nothing changed */
  modifiedContent?: string;
}

// ============================================================================
// Events
// ============================================================================

export type AgentEvent =
  | { type: 'thinking'; iteration: number }
  | { type: 'text'; content: string }
  | { type: 'tool_call'; id: string; name: string; arguments: Record<string, unknown> }
  | { type: 'tool_result'; id: string; name: string; result: ToolResult }
  | { type: 'error'; error: string }
  | { type: 'done'; result: AgentResult };

export interface AgentProcessorOptions {
  config?: Partial<AgentProcessorConfig>;
  logger?: Logger;
}
