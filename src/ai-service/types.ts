/**
 * AI Service Types
 */

import type { Logger } from '../logging';
import type { AgentEvent, AgentProcessorConfig, ChatClient, ToolCallRecord } from '../agent-loop/types';
import type { KnowledgeBaseService, ResourceKey } from '../project-rag/knowledge-base';
import type { RetrievalResult } from '../project-rag/types';

// ============================================================================
// Operations
// ============================================================================

export const OPERATION_TYPES = [
  'none',
  'generate_outline',
  'expand_content',
  'summarize',
  'style_transfer',
  'grammar_check',
  'insert_text',
  'replace_text',
  'delete_text',
] as const;

export type OperationType = typeof OPERATION_TYPES[number];

export interface SelectionRange {
  start: number;
  end: number;
}

/**
 * A change the caller may apply to its document. Operations from one
 * response apply in order; each position refers to the text left by the
 * operations before it.
 */
export interface Operation {
  operationType: OperationType;
  targetFile: string | null;
  content: string;
  position: SelectionRange | null;
  metadata: Record<string, unknown>;
}

// ============================================================================
// Request / Response
// ============================================================================

export type ChatMode = 'simple' | 'agent';

export interface AIRequest {
  message: string;
  projectId?: ResourceKey;
  mode?: ChatMode;
  documentContent?: string;
  documentId?: string;
  selectedText?: string;
  selectionRange?: SelectionRange;
  sessionId?: string;

  /** false skips retrieval even when the project has a knowledge base */
  enableRag?: boolean;

  signal?: AbortSignal;
}

export interface AIResponseMetadata {
  mode: ChatMode;
  iterations?: number;
  agentToolCalls?: ToolCallRecord[];

  /** Document text after agent edits */
  modifiedContent?: string;

  /** Error code when the request did not complete */
  error?: string;
}

export interface AIResponse {
  message: string;
  operations: Operation[];

  /** Top retrieval hits, text shortened for display */
  sources: RetrievalResult[];

  sessionId: string;
  tokensUsed: number;
  requiresConfirmation: boolean;
  metadata: AIResponseMetadata;
}

export type AIStreamEvent =
  | { type: 'sources'; sources: RetrievalResult[] }
  | Exclude<AgentEvent, { type: 'done' }>
  | { type: 'done'; response: AIResponse };

// ============================================================================
// Configuration
// ============================================================================

export interface AIServiceConfig {
  /** User and assistant messages kept per session */
  maxHistoryMessages: number;

  /** Retrieval hits fetched per request */
  topK: number;

  /** Hits returned as sources */
  sourceCount: number;

  /** Character budget for the retrieved context */
  maxContextLength: number;

  /** Characters of the document shown to the model in simple mode */
  documentPreviewLength: number;

  temperature?: number;
  maxTokens?: number;

  agent: Partial<AgentProcessorConfig>;
}

export interface AIServiceOptions {
  llm: ChatClient;
  knowledgeBase?: KnowledgeBaseService;
  config?: Partial<AIServiceConfig>;
  logger?: Logger;
}
