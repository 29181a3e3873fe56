/**
 * AI Service
 *
 * Chat requests over a project's knowledge base and the open document.
 */

export { AIService, createAIService, DEFAULT_AI_SERVICE_CONFIG } from './AIService';
export type { CreateAIServiceOptions } from './AIService';
export { parseAIResponse, toOperationType } from './response-parser';
export type { ParsedReply } from './response-parser';
export { operationsFromAgent, operationFromReply } from './operations';
export { buildSimpleSystemPrompt, SIMPLE_SYSTEM_PROMPT } from './prompts';
export { OPERATION_TYPES } from './types';
export type {
  OperationType,
  Operation,
  SelectionRange,
  ChatMode,
  AIRequest,
  AIResponse,
  AIResponseMetadata,
  AIStreamEvent,
  AIServiceConfig,
  AIServiceOptions,
} from './types';
