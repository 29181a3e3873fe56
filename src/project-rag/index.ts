/**
 * Project RAG Module
 *
 * Chunking, embeddings, vector storage and per-project knowledge bases.
 */

// Types
export type {
    Chunk,
    ChunkerConfig,
    ChunkPayload,
    ChunkingStrategy,
    EmbeddedChunk,
    EmbeddingProviderName,
    RetrievalResult,
    QueryOptions,
    CollectionInfo,
    VectorStore,
    KnowledgeBaseConfig,
    IndexResult,
    IndexedResource,
    KnowledgeBaseInfo,
    RAGErrorCode,
} from './types';

export { DEFAULT_KB_CONFIG, RAGError } from './types';

// Chunker
export {
    TextChunker,
    DEFAULT_CHUNKER_CONFIG,
    validateChunkerConfig,
    chunkText,
    reconstructText,
    estimateTokens,
    generateContentHash,
} from './chunker';

// Embeddings
export type { EmbeddingProvider, TransformersLoader } from './embeddings';
export {
    BaseEmbeddingProvider,
    LocalEmbeddingProvider,
    OllamaEmbeddingProvider,
    OpenAIEmbeddingProvider,
    createEmbeddingProvider,
    knownDimension,
    cosineSimilarity,
    normalizeVector,
} from './embeddings';

// Store
export { InMemoryVectorStore } from './vector-store';
export { CollectionLockManager } from './collection-lock';

// Service
export type { KnowledgeBaseOptions, SearchParams, ResourceKey } from './knowledge-base';
export { KnowledgeBaseService } from './knowledge-base';
