/**
 * Knowledge Base Service
 *
 * Ingestion (chunk, embed, upsert) and retrieval (embed query, nearest
 * neighbours) for per-project collections.
 */

import { nanoid } from 'nanoid';
import { createLogger, errorMessage } from '../logging';
import type { Logger } from '../logging';
import { TextChunker, generateContentHash } from './chunker';
import type { EmbeddingProvider } from './embeddings';
import { InMemoryVectorStore } from './vector-store';
import { CollectionLockManager } from './collection-lock';
import { DEFAULT_KB_CONFIG, RAGError } from './types';
import type {
    EmbeddedChunk,
    IndexedResource,
    IndexResult,
    KnowledgeBaseConfig,
    KnowledgeBaseInfo,
    RetrievalResult,
    VectorStore,
} from './types';

export type ResourceKey = string | number;

export interface KnowledgeBaseOptions {
    embeddings: EmbeddingProvider;
    store?: VectorStore;
    config?: Partial<KnowledgeBaseConfig>;
    logger?: Logger;
}

export interface SearchParams {
    topK?: number;
    minScore?: number;
}

interface ResourceRecord extends IndexedResource {
    pointIds: string[];
}

// =============================================================================
// Knowledge Base Service
// =============================================================================

export class KnowledgeBaseService {
    private config: KnowledgeBaseConfig;
    private chunker: TextChunker;
    private embeddings: EmbeddingProvider;
    private store: VectorStore;
    private locks = new CollectionLockManager();
    private logger: Logger;

    // collection -> resourceId -> record
    private resources: Map<string, Map<string, ResourceRecord>> = new Map();

    constructor(options: KnowledgeBaseOptions) {
        this.config = { ...DEFAULT_KB_CONFIG, ...options.config };
        this.chunker = new TextChunker({
            strategy: this.config.strategy,
            chunkSize: this.config.chunkSize,
            chunkOverlap: this.config.chunkOverlap,
        });
        this.embeddings = options.embeddings;
        this.store = options.store ?? new InMemoryVectorStore();
        this.logger = options.logger ?? createLogger('knowledge-base');
    }

    static collectionName(projectId: ResourceKey): string {
        return `project_${projectId}`;
    }

    getEmbeddingModel(): string {
        return this.embeddings.model;
    }

    // =========================================================================
    // Ingestion
    // =========================================================================

    /**
     * Index one resource. All or nothing: on failure no new chunk stays in
     * the store and a previous version of the resource is left untouched.
     */
    async indexResource(
        projectId: ResourceKey,
        resourceId: ResourceKey,
        text: string,
        filename: string
    ): Promise<IndexResult> {
        const collection = KnowledgeBaseService.collectionName(projectId);
        const resourceKey = String(resourceId);

        return this.locks.runExclusive(collection, nanoid(), async () => {
            const startedAt = Date.now();
            const chunks = this.chunker.chunk(text);

            if (chunks.length === 0) {
                this.dropResource(collection, resourceKey);
                this.logger.info('Resource has no content, nothing indexed', { collection, resourceId: resourceKey });
                return { chunksIndexed: 0 };
            }

            const vectors = await this.embeddings.embedBatch(chunks.map(c => c.content));

            const generation = nanoid(8);
            const points: EmbeddedChunk[] = chunks.map((chunk, i) => ({
                id: `${resourceKey}:${generation}:${chunk.index}`,
                vector: vectors[i],
                payload: {
                    text: chunk.content,
                    resourceId: resourceKey,
                    projectId: String(projectId),
                    filename,
                    chunkIndex: chunk.index,
                    startOffset: chunk.startOffset,
                    endOffset: chunk.endOffset,
                    ...(chunk.section ? { section: chunk.section } : {}),
                },
            }));

            // From here to the end nothing awaits, so queries never see a mix
            // of the old and new versions.
            const upserted: string[] = [];
            try {
                for (const point of points) {
                    this.store.upsert(collection, point);
                    upserted.push(point.id);
                }
            } catch (error) {
                this.store.deleteByIds(collection, upserted);
                this.logger.error('Indexing failed, rolled back', {
                    collection,
                    resourceId: resourceKey,
                    rolledBack: upserted.length,
                    error: errorMessage(error),
                });
                throw new RAGError(
                    `Indexing ${filename} failed: ${errorMessage(error)}`,
                    'INDEXING_FAILED',
                    false,
                    error
                );
            }

            const previous = this.getRecords(collection).get(resourceKey);
            if (previous) {
                this.store.deleteByIds(collection, previous.pointIds);
            }

            this.getRecords(collection).set(resourceKey, {
                resourceId: resourceKey,
                filename,
                chunkCount: points.length,
                contentHash: generateContentHash(text),
                indexedAt: new Date().toISOString(),
                pointIds: upserted,
            });

            this.logger.info('Resource indexed', {
                collection,
                resourceId: resourceKey,
                chunks: points.length,
                replaced: previous ? previous.chunkCount : 0,
                durationMs: Date.now() - startedAt,
            });

            return { chunksIndexed: points.length };
        });
    }

    /**
     * Remove a resource. Removing something never indexed is a no-op.
     */
    async removeResource(projectId: ResourceKey, resourceId: ResourceKey): Promise<{ chunksRemoved: number }> {
        const collection = KnowledgeBaseService.collectionName(projectId);
        const resourceKey = String(resourceId);

        return this.locks.runExclusive(collection, nanoid(), async () => {
            const chunksRemoved = this.dropResource(collection, resourceKey);
            if (chunksRemoved > 0) {
                this.logger.info('Resource removed', { collection, resourceId: resourceKey, chunks: chunksRemoved });
            }
            return { chunksRemoved };
        });
    }

    /**
     * Drop a project's whole collection
     */
    async deleteProject(projectId: ResourceKey): Promise<boolean> {
        const collection = KnowledgeBaseService.collectionName(projectId);
        return this.locks.runExclusive(collection, nanoid(), async () => {
            this.resources.delete(collection);
            return this.store.dropCollection(collection);
        });
    }

    // =========================================================================
    // Retrieval
    // =========================================================================

    /**
     * Ranked chunks for a query. A project without a collection yields [].
     */
    async search(projectId: ResourceKey, query: string, params: SearchParams = {}): Promise<RetrievalResult[]> {
        const collection = KnowledgeBaseService.collectionName(projectId);
        if (!this.store.hasCollection(collection) || query.trim() === '') {
            return [];
        }

        const vector = await this.embeddings.embed(query);
        const results = this.store.query(collection, vector, {
            topK: params.topK ?? this.config.topK,
            minScore: params.minScore ?? this.config.minScore,
        });

        this.logger.debug('Search completed', { collection, hits: results.length });
        return results;
    }

    /**
     * Format results as numbered source blocks within a character budget
     */
    buildContext(results: RetrievalResult[], maxLength: number = this.config.maxContextLength): string {
        const blocks: string[] = [];
        let length = 0;

        for (const [i, result] of results.entries()) {
            const block = `[Source ${i + 1}] (relevance: ${result.score.toFixed(2)})\n${result.text}`;
            const added = block.length + (blocks.length > 0 ? 2 : 0);
            if (length + added > maxLength) break;
            blocks.push(block);
            length += added;
        }

        return blocks.join('\n\n');
    }

    // =========================================================================
    // Introspection
    // =========================================================================

    hasKnowledgeBase(projectId: ResourceKey): boolean {
        return this.listResources(projectId).length > 0;
    }

    listResources(projectId: ResourceKey): IndexedResource[] {
        const records = this.resources.get(KnowledgeBaseService.collectionName(projectId));
        if (!records) return [];
        return Array.from(records.values()).map(({ pointIds: _pointIds, ...resource }) => resource);
    }

    getInfo(projectId: ResourceKey): KnowledgeBaseInfo {
        const collection = KnowledgeBaseService.collectionName(projectId);
        const info = this.store.getCollectionInfo(collection);
        const resources = this.listResources(projectId);

        return {
            projectId: String(projectId),
            collection,
            resourceCount: resources.length,
            chunkCount: info?.pointCount ?? 0,
            dimension: info?.dimension ?? this.embeddings.getDimension(),
            embeddingModel: this.embeddings.model,
            resources,
        };
    }

    // =========================================================================
    // Internals
    // =========================================================================

    private getRecords(collection: string): Map<string, ResourceRecord> {
        let records = this.resources.get(collection);
        if (!records) {
            records = new Map();
            this.resources.set(collection, records);
        }
        return records;
    }

    private dropResource(collection: string, resourceKey: string): number {
        this.resources.get(collection)?.delete(resourceKey);
        return this.store.deleteByResource(collection, resourceKey);
    }
}
