/**
 * Config - Public API
 */

export { loadConfig, ConfigError, DEFAULT_CONFIG, ENV_PREFIX } from './config';
export type {
  DocpilotConfig,
  LLMSettings,
  EmbeddingSettings,
  RAGSettings,
  AgentSettings,
  LLMProviderName,
  EmbeddingProviderName,
  FallbackStrategy,
  ChunkingStrategy,
  LogLevel,
} from './config';
