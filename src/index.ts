/**
 * docpilot
 *
 * Main entry point for the document assistant core.
 */

// Configuration and logging
export { loadConfig, ConfigError, DEFAULT_CONFIG, ENV_PREFIX } from './config';
export type { DocpilotConfig, LLMSettings, EmbeddingSettings, RAGSettings, AgentSettings } from './config';
export { createLogger, setLogLevel, setLogSink } from './logging';
export type { Logger, LogEntry, LogSink } from './logging';

// Project knowledge bases
export {
  KnowledgeBaseService,
  TextChunker,
  InMemoryVectorStore,
  createEmbeddingProvider,
  RAGError,
} from './project-rag';
export type { Chunk, RetrievalResult, EmbeddingProvider, KnowledgeBaseInfo } from './project-rag';

// Document tools
export { ToolExecutor, createDocumentToolExecutor, DocumentProvider, ToolExecutorError } from './tool-executor';
export type { DocumentEdit, ToolResult } from './tool-executor';

// Model adapter
export { ModelAdapter, createModelAdapter, AdapterError } from './model-adapter';
export type { ChatMessage, ChatRequest, LLMResponse, ProviderAdapter } from './model-adapter';

// Agent processor
export { AgentProcessor, DEFAULT_AGENT_CONFIG } from './agent-loop';
export type { AgentRequest, AgentResult, AgentEvent, ToolCallRecord } from './agent-loop';

// AI service
export { AIService, createAIService } from './ai-service';
export type { AIRequest, AIResponse, AIStreamEvent, Operation, OperationType } from './ai-service';
