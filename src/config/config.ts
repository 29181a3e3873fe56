/**
 * Configuration
 * Builds the runtime configuration from environment variables
 */

// ============================================================================
// Types
// ============================================================================

export type LLMProviderName = 'openai' | 'ollama';
export type EmbeddingProviderName = 'local' | 'ollama' | 'openai';
export type FallbackStrategy = 'none' | 'sequential' | 'round_robin';
export type ChunkingStrategy =
  | 'fixed_size'
  | 'sentence'
  | 'paragraph'
  | 'recursive'
  | 'markdown'
  | 'sliding_window';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LLMSettings {
  provider: LLMProviderName;
  model: string;
  baseUrl?: string;
  apiKey?: string;
  temperature: number;
  maxTokens: number;
  fallbackStrategy: FallbackStrategy;
  fallbackProviders: LLMProviderName[];
}

export interface EmbeddingSettings {
  provider: EmbeddingProviderName;
  model: string;
  dimension?: number;
  baseUrl?: string;
  apiKey?: string;
}

export interface RAGSettings {
  chunkSize: number;
  chunkOverlap: number;
  strategy: ChunkingStrategy;
  topK: number;
  minScore: number;
  maxContextLength: number;
  sourceCount: number;
}

export interface AgentSettings {
  maxIterations: number;
  documentPreviewLength: number;
}

export interface DocpilotConfig {
  llm: LLMSettings;
  embedding: EmbeddingSettings;
  rag: RAGSettings;
  agent: AgentSettings;
  requestTimeoutMs: number;
  logLevel: LogLevel;
  maxHistoryMessages: number;
}

export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';

  constructor(message: string, public readonly key?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Defaults
// ============================================================================

export const ENV_PREFIX = 'DOCPILOT';

const LLM_PROVIDERS: readonly LLMProviderName[] = ['openai', 'ollama'];
const EMBEDDING_PROVIDERS: readonly EmbeddingProviderName[] = ['local', 'ollama', 'openai'];
const FALLBACK_STRATEGIES: readonly FallbackStrategy[] = ['none', 'sequential', 'round_robin'];
const CHUNKING_STRATEGIES: readonly ChunkingStrategy[] = [
  'fixed_size',
  'sentence',
  'paragraph',
  'recursive',
  'markdown',
  'sliding_window',
];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export const DEFAULT_CONFIG: DocpilotConfig = {
  llm: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    temperature: 0.7,
    maxTokens: 2000,
    fallbackStrategy: 'none',
    fallbackProviders: [],
  },
  embedding: {
    provider: 'local',
    model: 'Xenova/all-MiniLM-L6-v2',
  },
  rag: {
    chunkSize: 500,
    chunkOverlap: 50,
    strategy: 'recursive',
    topK: 5,
    minScore: 0,
    maxContextLength: 3000,
    sourceCount: 3,
  },
  agent: {
    maxIterations: 10,
    documentPreviewLength: 3000,
  },
  requestTimeoutMs: 60_000,
  logLevel: 'info',
  maxHistoryMessages: 20,
};

// ============================================================================
// Loader
// ============================================================================

type Env = Record<string, string | undefined>;

/** Local models are Hugging Face ids; remote providers name their own */
const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProviderName, string> = {
  local: 'Xenova/all-MiniLM-L6-v2',
  ollama: 'nomic-embed-text',
  openai: 'text-embedding-3-small',
};

/**
 * Load configuration from environment variables.
 *
 * Prefixed variables win over the provider's own variable names
 * (`DOCPILOT_LLM_API_KEY` over `OPENAI_API_KEY`).
 */
export function loadConfig(env: Env = process.env): DocpilotConfig {
  const read = (key: string, ...aliases: string[]): string | undefined => {
    const value = env[`${ENV_PREFIX}_${key}`] ?? aliases.map(a => env[a]).find(v => v !== undefined);
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };

  const llmProvider = oneOf(read('LLM_PROVIDER'), LLM_PROVIDERS, DEFAULT_CONFIG.llm.provider, 'LLM_PROVIDER');

  const embeddingProvider = oneOf(
    read('EMBEDDING_PROVIDER'),
    EMBEDDING_PROVIDERS,
    DEFAULT_CONFIG.embedding.provider,
    'EMBEDDING_PROVIDER'
  );

  const config: DocpilotConfig = {
    llm: {
      provider: llmProvider,
      model: read('LLM_MODEL') ?? (llmProvider === 'ollama' ? 'llama3.1' : DEFAULT_CONFIG.llm.model),
      baseUrl: read('LLM_BASE_URL', llmProvider === 'ollama' ? 'OLLAMA_BASE_URL' : 'OPENAI_BASE_URL'),
      apiKey: read('LLM_API_KEY', 'OPENAI_API_KEY'),
      temperature: number(read('LLM_TEMPERATURE'), DEFAULT_CONFIG.llm.temperature, 'LLM_TEMPERATURE', 0, 2),
      maxTokens: integer(read('LLM_MAX_TOKENS'), DEFAULT_CONFIG.llm.maxTokens, 'LLM_MAX_TOKENS', 1),
      fallbackStrategy: oneOf(
        read('LLM_FALLBACK_STRATEGY'),
        FALLBACK_STRATEGIES,
        DEFAULT_CONFIG.llm.fallbackStrategy,
        'LLM_FALLBACK_STRATEGY'
      ),
      fallbackProviders: list(read('LLM_FALLBACK_PROVIDERS')).map(p =>
        oneOf(p, LLM_PROVIDERS, llmProvider, 'LLM_FALLBACK_PROVIDERS')
      ),
    },
    embedding: {
      provider: embeddingProvider,
      model: read('EMBEDDING_MODEL') ?? DEFAULT_EMBEDDING_MODELS[embeddingProvider],
      dimension: optionalInteger(read('EMBEDDING_DIMENSION'), 'EMBEDDING_DIMENSION'),
      baseUrl: read('EMBEDDING_BASE_URL', embeddingProvider === 'ollama' ? 'OLLAMA_BASE_URL' : 'OPENAI_BASE_URL'),
      apiKey: read('EMBEDDING_API_KEY', 'OPENAI_API_KEY'),
    },
    rag: {
      chunkSize: integer(read('RAG_CHUNK_SIZE'), DEFAULT_CONFIG.rag.chunkSize, 'RAG_CHUNK_SIZE', 1),
      chunkOverlap: integer(read('RAG_CHUNK_OVERLAP'), DEFAULT_CONFIG.rag.chunkOverlap, 'RAG_CHUNK_OVERLAP', 0),
      strategy: oneOf(read('RAG_STRATEGY'), CHUNKING_STRATEGIES, DEFAULT_CONFIG.rag.strategy, 'RAG_STRATEGY'),
      topK: integer(read('RAG_TOP_K'), DEFAULT_CONFIG.rag.topK, 'RAG_TOP_K', 1),
      minScore: number(read('RAG_MIN_SCORE'), DEFAULT_CONFIG.rag.minScore, 'RAG_MIN_SCORE', 0, 1),
      maxContextLength: integer(
        read('RAG_MAX_CONTEXT_LENGTH'),
        DEFAULT_CONFIG.rag.maxContextLength,
        'RAG_MAX_CONTEXT_LENGTH',
        1
      ),
      sourceCount: integer(read('RAG_SOURCE_COUNT'), DEFAULT_CONFIG.rag.sourceCount, 'RAG_SOURCE_COUNT', 0),
    },
    agent: {
      maxIterations: integer(read('AGENT_MAX_ITERATIONS'), DEFAULT_CONFIG.agent.maxIterations, 'AGENT_MAX_ITERATIONS', 1),
      documentPreviewLength: integer(
        read('AGENT_DOCUMENT_PREVIEW_LENGTH'),
        DEFAULT_CONFIG.agent.documentPreviewLength,
        'AGENT_DOCUMENT_PREVIEW_LENGTH',
        0
      ),
    },
    requestTimeoutMs: integer(read('REQUEST_TIMEOUT_MS'), DEFAULT_CONFIG.requestTimeoutMs, 'REQUEST_TIMEOUT_MS', 1),
    logLevel: oneOf(read('LOG_LEVEL'), LOG_LEVELS, DEFAULT_CONFIG.logLevel, 'LOG_LEVEL'),
    maxHistoryMessages: integer(
      read('MAX_HISTORY_MESSAGES'),
      DEFAULT_CONFIG.maxHistoryMessages,
      'MAX_HISTORY_MESSAGES',
      0
    ),
  };

  if (config.rag.chunkOverlap >= config.rag.chunkSize) {
    throw new ConfigError(
      `${ENV_PREFIX}_RAG_CHUNK_OVERLAP (${config.rag.chunkOverlap}) must be smaller than ${ENV_PREFIX}_RAG_CHUNK_SIZE (${config.rag.chunkSize})`,
      'RAG_CHUNK_OVERLAP'
    );
  }

  return config;
}

// ============================================================================
// Parsers
// ============================================================================

function oneOf<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  fallback: T,
  key: string
): T {
  if (value === undefined) return fallback;
  const match = allowed.find(a => a === value.toLowerCase());
  if (!match) {
    throw new ConfigError(`${ENV_PREFIX}_${key} must be one of: ${allowed.join(', ')} (got "${value}")`, key);
  }
  return match;
}

function number(value: string | undefined, fallback: number, key: string, min?: number, max?: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${ENV_PREFIX}_${key} must be a number (got "${value}")`, key);
  }
  if ((min !== undefined && parsed < min) || (max !== undefined && parsed > max)) {
    throw new ConfigError(`${ENV_PREFIX}_${key} out of range: ${parsed}`, key);
  }
  return parsed;
}

function integer(value: string | undefined, fallback: number, key: string, min?: number): number {
  const parsed = number(value, fallback, key, min);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${ENV_PREFIX}_${key} must be an integer (got "${value}")`, key);
  }
  return parsed;
}

function optionalInteger(value: string | undefined, key: string): number | undefined {
  return value === undefined ? undefined : integer(value, 0, key, 1);
}

function list(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(',')
    .map(v => v.trim())
    .filter(v => v.length > 0);
}
