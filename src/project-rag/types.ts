/**
 * Project RAG Types
 *
 * Chunks, embedded points, retrieval results and knowledge base configuration.
 */

import type { ChunkingStrategy, EmbeddingProviderName } from '../config';

export type { ChunkingStrategy, EmbeddingProviderName };

// =============================================================================
// Chunk Types
// =============================================================================

/**
 * A contiguous slice of one resource's text
 */
export interface Chunk {
    /** Chunk content, always equal to text.slice(startOffset, endOffset) */
    content: string;

    /** Position of this chunk within the resource */
    index: number;

    /** Character offset in the original text */
    startOffset: number;

    /** Character end offset (exclusive) */
    endOffset: number;

    /** Approximate token count */
    tokenCount: number;

    /** Strategy that produced the chunk */
    strategy: ChunkingStrategy;

    /** Nearest markdown heading, for the markdown strategy */
    section?: string;
}

export interface ChunkerConfig {
    strategy: ChunkingStrategy;
    chunkSize: number;
    chunkOverlap: number;
}

// =============================================================================
// Vector Store Types
// =============================================================================

/**
 * Payload stored next to every vector
 */
export interface ChunkPayload {
    text: string;
    resourceId: string;
    projectId: string;
    filename: string;
    chunkIndex: number;
    startOffset: number;
    endOffset: number;
    section?: string;
}

/**
 * A chunk plus its vector, as held by the store
 */
export interface EmbeddedChunk {
    id: string;
    vector: number[];
    payload: ChunkPayload;
}

/**
 * One ranked hit. Ephemeral, never persisted.
 */
export interface RetrievalResult {
    text: string;

    /** Cosine similarity clamped to [0, 1] */
    score: number;

    resourceId: string;
    chunkId: string;
    metadata: Omit<ChunkPayload, 'text' | 'resourceId'>;
}

export interface QueryOptions {
    topK: number;

    /** Drop results scoring below this value */
    minScore?: number;
}

export interface CollectionInfo {
    name: string;
    dimension: number | null;
    pointCount: number;
    resourceCount: number;
    createdAt: string;
}

/**
 * Store contract. The in-memory store is the only implementation shipped;
 * a networked vector database would sit behind the same interface.
 */
export interface VectorStore {
    upsert(collection: string, point: EmbeddedChunk): void;
    query(collection: string, vector: number[], options: QueryOptions): RetrievalResult[];
    deleteByResource(collection: string, resourceId: string): number;
    deleteByIds(collection: string, ids: string[]): number;
    hasCollection(collection: string): boolean;
    dropCollection(collection: string): boolean;
    listResources(collection: string): string[];
    getCollectionInfo(collection: string): CollectionInfo | null;
}

// =============================================================================
// Knowledge Base Types
// =============================================================================

export interface KnowledgeBaseConfig extends ChunkerConfig {
    /** Default result count for search */
    topK: number;

    /** Minimum similarity for search hits */
    minScore: number;

    /** Character budget for buildContext */
    maxContextLength: number;
}

export const DEFAULT_KB_CONFIG: KnowledgeBaseConfig = {
    strategy: 'recursive',
    chunkSize: 500,
    chunkOverlap: 50,
    topK: 5,
    minScore: 0,
    maxContextLength: 3000,
};

export interface IndexResult {
    chunksIndexed: number;
}

/**
 * Indexed resource bookkeeping
 */
export interface IndexedResource {
    resourceId: string;
    filename: string;
    chunkCount: number;

    /** sha256 of the indexed text */
    contentHash: string;

    indexedAt: string;
}

export interface KnowledgeBaseInfo {
    projectId: string;
    collection: string;
    resourceCount: number;
    chunkCount: number;
    dimension: number | null;
    embeddingModel: string;
    resources: IndexedResource[];
}

// =============================================================================
// Errors
// =============================================================================

export type RAGErrorCode =
    | 'CONFIG_ERROR'
    | 'SERVICE_UNAVAILABLE'
    | 'INDEXING_FAILED'
    | 'DIMENSION_MISMATCH';

export class RAGError extends Error {
    constructor(
        message: string,
        public readonly code: RAGErrorCode,
        public readonly retryable: boolean = false,
        public readonly details?: unknown
    ) {
        super(message);
        this.name = 'RAGError';
    }
}
