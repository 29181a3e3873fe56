/**
 * AI Service
 *
 * Entry point for chat requests: retrieval from the project's knowledge
 * base, then either the agent loop over the document or a single model call.
 */

import { ConfigError, type DocpilotConfig } from '../config';
import { createLogger, errorMessage, type Logger } from '../logging';
import { AgentProcessor } from '../agent-loop/AgentProcessor';
import { generateSessionId } from '../agent-loop/run-id-generator';
import type { AgentResult, ChatClient } from '../agent-loop/types';
import { AdapterError, type ChatMessage } from '../model-adapter/types';
import { createModelAdapter } from '../model-adapter/ModelAdapter';
import { KnowledgeBaseService } from '../project-rag/knowledge-base';
import { createEmbeddingProvider, type EmbeddingProvider } from '../project-rag/embeddings';
import { RAGError, type RetrievalResult } from '../project-rag/types';
import { ToolExecutorError } from '../tool-executor/types';
import type {
  AIRequest,
  AIResponse,
  AIServiceConfig,
  AIServiceOptions,
  AIStreamEvent,
  ChatMode,
} from './types';
import { buildSimpleSystemPrompt } from './prompts';
import { parseAIResponse } from './response-parser';
import { operationFromReply, operationsFromAgent } from './operations';

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_AI_SERVICE_CONFIG: AIServiceConfig = {
  maxHistoryMessages: 20,
  topK: 5,
  sourceCount: 3,
  maxContextLength: 3000,
  documentPreviewLength: 3000,
  agent: {},
};

const SOURCE_PREVIEW_LENGTH = 200;

interface Retrieval {
  context: string;
  sources: RetrievalResult[];
}

// ============================================================================
// AI Service
// ============================================================================

export class AIService {
  private config: AIServiceConfig;
  private llm: ChatClient;
  private knowledgeBase: KnowledgeBaseService | null;
  private agent: AgentProcessor;
  private logger: Logger;

  private sessions: Map<string, ChatMessage[]> = new Map();

  constructor(options: AIServiceOptions) {
    this.config = { ...DEFAULT_AI_SERVICE_CONFIG, ...options.config };
    this.llm = options.llm;
    this.knowledgeBase = options.knowledgeBase ?? null;
    this.logger = options.logger ?? createLogger('ai-service');
    this.agent = new AgentProcessor(this.llm, {
      config: {
        documentPreviewLength: this.config.documentPreviewLength,
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
        ...this.config.agent,
      },
      logger: this.logger.child('agent'),
    });
  }

  getKnowledgeBase(): KnowledgeBaseService | null {
    return this.knowledgeBase;
  }

  // ============================================================================
  // Chat
  // ============================================================================

  /**
   * Answer one request. Never throws: failures come back as a response
   * whose message explains the problem and whose metadata carries the code.
   */
  async chat(request: AIRequest): Promise<AIResponse> {
    for await (const event of this.chatStream(request)) {
      if (event.type === 'done') {
        return event.response;
      }
    }
    // chatStream always ends with done
    return this.errorResponse(request, request.sessionId ?? generateSessionId(), [], new Error('No response'));
  }

  /**
   * Same as chat(), yielding sources, agent progress and text as they
   * happen. The last event is always `done` with the full response.
   */
  async *chatStream(request: AIRequest): AsyncGenerator<AIStreamEvent> {
    const sessionId = request.sessionId ?? generateSessionId();
    const mode = this.resolveMode(request);
    let sources: RetrievalResult[] = [];

    try {
      const retrieval = await this.retrieve(request);
      sources = retrieval.sources;
      if (sources.length > 0) {
        yield { type: 'sources', sources };
      }

      const history = this.getHistory(sessionId);
      let response: AIResponse;

      if (mode === 'agent') {
        let result: AgentResult | null = null;

        for await (const event of this.agent.processStream({
          message: request.message,
          sessionId,
          history,
          documentContent: request.documentContent,
          documentId: request.documentId ?? null,
          selectedText: request.selectedText,
          ragContext: retrieval.context,
          signal: request.signal,
        })) {
          if (event.type === 'done') {
            result = event.result;
          } else {
            yield event;
          }
        }

        if (!result) {
          throw new Error('Agent run ended without a result');
        }
        response = this.agentResponse(request, sessionId, sources, result);
      } else {
        response = await this.simpleResponse(request, sessionId, sources, retrieval.context, history);
        yield { type: 'text', content: response.message };
      }

      if (response.metadata.error === undefined) {
        this.remember(sessionId, request.message, response.message);
      }

      this.logger.info('Chat completed', {
        sessionId,
        mode,
        operations: response.operations.length,
        sources: sources.length,
        tokensUsed: response.tokensUsed,
        error: response.metadata.error,
      });

      yield { type: 'done', response };
    } catch (error) {
      this.logger.error('Chat failed', { sessionId, mode, error: errorMessage(error) });

      yield { type: 'error', error: errorMessage(error) };
      yield { type: 'done', response: this.errorResponse(request, sessionId, sources, error) };
    }
  }

  // ============================================================================
  // Sessions
  // ============================================================================

  getHistory(sessionId: string): ChatMessage[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  clearSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private remember(sessionId: string, userMessage: string, assistantMessage: string): void {
    if (this.config.maxHistoryMessages <= 0) return;

    const history = this.sessions.get(sessionId) ?? [];
    history.push({ role: 'user', content: userMessage }, { role: 'assistant', content: assistantMessage });
    this.sessions.set(sessionId, history.slice(-this.config.maxHistoryMessages));
  }

  // ============================================================================
  // Steps
  // ============================================================================

  private resolveMode(request: AIRequest): ChatMode {
    // An empty document still counts: the agent may write into it
    return request.mode === 'agent' && typeof request.documentContent === 'string' ? 'agent' : 'simple';
  }

  private async retrieve(request: AIRequest): Promise<Retrieval> {
    const kb = this.knowledgeBase;
    if (!kb || request.projectId === undefined || request.enableRag === false) {
      return { context: '', sources: [] };
    }
    if (!kb.hasKnowledgeBase(request.projectId)) {
      return { context: '', sources: [] };
    }

    const results = await kb.search(request.projectId, request.message, { topK: this.config.topK });

    return {
      context: kb.buildContext(results, this.config.maxContextLength),
      sources: results.slice(0, this.config.sourceCount).map(result => ({
        ...result,
        text: result.text.length > SOURCE_PREVIEW_LENGTH
          ? `${result.text.slice(0, SOURCE_PREVIEW_LENGTH)}...`
          : result.text,
      })),
    };
  }

  private async simpleResponse(
    request: AIRequest,
    sessionId: string,
    sources: RetrievalResult[],
    ragContext: string,
    history: ChatMessage[]
  ): Promise<AIResponse> {
    const systemPrompt = buildSimpleSystemPrompt({
      documentContent: request.documentContent,
      documentPreviewLength: this.config.documentPreviewLength,
      selectedText: request.selectedText,
      ragContext,
    });

    const llmResponse = await this.llm.chat({
      messages: [
        { role: 'system', content: systemPrompt },
        ...history,
        { role: 'user', content: request.message },
      ],
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
      signal: request.signal,
    });

    const reply = parseAIResponse(llmResponse.content);
    const operations = operationFromReply(reply, request.documentId ?? null, request.selectionRange ?? null);

    return {
      message: reply.message.trim() !== '' ? reply.message : 'Done.',
      operations,
      sources,
      sessionId,
      tokensUsed: llmResponse.usage.totalTokens,
      requiresConfirmation: operations.some(op => op.operationType !== 'none'),
      metadata: { mode: 'simple' },
    };
  }

  private agentResponse(
    request: AIRequest,
    sessionId: string,
    sources: RetrievalResult[],
    result: AgentResult
  ): AIResponse {
    const operations = operationsFromAgent(
      result,
      request.documentId ?? null,
      request.documentContent?.length ?? 0
    );

    return {
      message: result.message,
      operations,
      sources,
      sessionId,
      tokensUsed: result.totalTokens,
      requiresConfirmation: operations.some(op => op.operationType !== 'none'),
      metadata: {
        mode: 'agent',
        iterations: result.iterations,
        agentToolCalls: result.toolCalls,
        ...(result.modifiedContent !== undefined ? { modifiedContent: result.modifiedContent } : {}),
        ...(result.error !== undefined ? { error: result.error } : {}),
      },
    };
  }

  private errorResponse(
    request: AIRequest,
    sessionId: string,
    sources: RetrievalResult[],
    error: unknown
  ): AIResponse {
    return {
      message: `Sorry, the request could not be completed: ${errorMessage(error)}`,
      operations: [],
      sources,
      sessionId,
      tokensUsed: 0,
      requiresConfirmation: false,
      metadata: { mode: this.resolveMode(request), error: errorCode(error) },
    };
  }
}

function errorCode(error: unknown): string {
  if (
    error instanceof AdapterError ||
    error instanceof RAGError ||
    error instanceof ToolExecutorError ||
    error instanceof ConfigError
  ) {
    return error.code;
  }
  return 'INTERNAL_ERROR';
}

// ============================================================================
// Convenience Functions
// ============================================================================

export interface CreateAIServiceOptions {
  /** Replaces the configured model providers */
  llm?: ChatClient;

  /** Replaces the configured embedding provider */
  embeddings?: EmbeddingProvider;

  logger?: Logger;
}

/**
 * Wire the model adapter, embeddings and knowledge base from configuration
 */
export function createAIService(config: DocpilotConfig, options: CreateAIServiceOptions = {}): AIService {
  const logger = options.logger ?? createLogger('docpilot');

  const llm = options.llm ?? createModelAdapter(config.llm, {
    requestTimeoutMs: config.requestTimeoutMs,
    logger: logger.child('model-adapter'),
  });

  const knowledgeBase = new KnowledgeBaseService({
    embeddings: options.embeddings
      ?? createEmbeddingProvider(config.embedding, config.requestTimeoutMs, logger.child('embeddings')),
    config: {
      strategy: config.rag.strategy,
      chunkSize: config.rag.chunkSize,
      chunkOverlap: config.rag.chunkOverlap,
      topK: config.rag.topK,
      minScore: config.rag.minScore,
      maxContextLength: config.rag.maxContextLength,
    },
    logger: logger.child('knowledge-base'),
  });

  return new AIService({
    llm,
    knowledgeBase,
    config: {
      maxHistoryMessages: config.maxHistoryMessages,
      topK: config.rag.topK,
      sourceCount: config.rag.sourceCount,
      maxContextLength: config.rag.maxContextLength,
      documentPreviewLength: config.agent.documentPreviewLength,
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      agent: { maxIterations: config.agent.maxIterations },
    },
    logger: logger.child('ai-service'),
  });
}
