/**
 * Knowledge Base Service Tests
 */

import { KnowledgeBaseService } from '../knowledge-base';
import { InMemoryVectorStore } from '../vector-store';
import { RAGError } from '../types';
import type { EmbeddedChunk, RetrievalResult } from '../types';
import { KeywordEmbeddingProvider } from './helpers/keyword-embedding';

const VOCABULARY = ['ai', 'is', 'computer', 'science', 'machine', 'learning', 'data', 'what', 'subset', 'branch'];

const AI_TEXT = 'AI is a branch of computer science.';
const ML_TEXT = 'Machine learning is a subset of AI that learns from data.';

// =============================================================================
// Mocks
// =============================================================================

class FlakyStore extends InMemoryVectorStore {
    upserts = 0;
    failAt: number | null = null;

    upsert(collection: string, point: EmbeddedChunk): void {
        this.upserts++;
        if (this.failAt !== null && this.upserts === this.failAt) {
            throw new Error('disk full');
        }
        super.upsert(collection, point);
    }
}

describe('KnowledgeBaseService', () => {
    let embeddings: KeywordEmbeddingProvider;
    let store: FlakyStore;
    let kb: KnowledgeBaseService;

    beforeEach(() => {
        embeddings = new KeywordEmbeddingProvider(VOCABULARY);
        store = new FlakyStore();
        kb = new KnowledgeBaseService({ embeddings, store });
    });

    // =========================================================================
    // End-to-end
    // =========================================================================

    describe('End-to-end', () => {
        it('should rank the AI definition first for "What is AI?"', async () => {
            await kb.indexResource(5, 1, AI_TEXT, 'ai.txt');
            await kb.indexResource(5, 2, ML_TEXT, 'ml.txt');

            const results = await kb.search(5, 'What is AI?', { topK: 5 });

            expect(results).toHaveLength(2);
            expect(results[0].resourceId).toBe('1');
            expect(results[0].text).toBe(AI_TEXT);
            expect(results[0].metadata.filename).toBe('ai.txt');
            expect(results[0].metadata.projectId).toBe('5');
            expect(results[0].score).toBeCloseTo(2 / Math.sqrt(15), 6);
            expect(results[1].score).toBeCloseTo(2 / Math.sqrt(18), 6);
        });

        it('should report the number of chunks indexed', async () => {
            const small = new KnowledgeBaseService({
                embeddings,
                store,
                config: { chunkSize: 20, chunkOverlap: 0, strategy: 'sentence' },
            });

            const result = await small.indexResource(1, 'doc', 'AI is here. Data is there. Machine runs.', 'doc.txt');

            expect(result).toEqual({ chunksIndexed: 3 });
            expect(small.getInfo(1)).toMatchObject({
                projectId: '1',
                collection: 'project_1',
                resourceCount: 1,
                chunkCount: 3,
                dimension: VOCABULARY.length,
                embeddingModel: 'keyword-test',
            });
        });
    });

    // =========================================================================
    // Removal
    // =========================================================================

    describe('Removal', () => {
        it('should never return chunks of a removed resource', async () => {
            await kb.indexResource(5, 1, AI_TEXT, 'ai.txt');
            await kb.indexResource(5, 2, ML_TEXT, 'ml.txt');

            await expect(kb.removeResource(5, 1)).resolves.toEqual({ chunksRemoved: 1 });

            const results = await kb.search(5, 'What is AI?');
            expect(results.map(r => r.resourceId)).toEqual(['2']);
        });

        it('should treat a second removal as a no-op', async () => {
            await kb.indexResource(5, 1, AI_TEXT, 'ai.txt');

            await kb.removeResource(5, 1);
            await expect(kb.removeResource(5, 1)).resolves.toEqual({ chunksRemoved: 0 });
            await expect(kb.removeResource(99, 'never-indexed')).resolves.toEqual({ chunksRemoved: 0 });
        });

        it('should drop a whole project', async () => {
            await kb.indexResource(5, 1, AI_TEXT, 'ai.txt');

            expect(await kb.deleteProject(5)).toBe(true);
            expect(kb.hasKnowledgeBase(5)).toBe(false);
            expect(await kb.search(5, 'AI')).toEqual([]);
        });
    });

    // =========================================================================
    // Search
    // =========================================================================

    describe('Search', () => {
        it('should return an empty list for a project without a collection', async () => {
            await expect(kb.search(42, 'anything')).resolves.toEqual([]);
            expect(embeddings.calls).toBe(0);
        });

        it('should return an empty list for a blank query', async () => {
            await kb.indexResource(5, 1, AI_TEXT, 'ai.txt');

            await expect(kb.search(5, '   ')).resolves.toEqual([]);
        });

        it('should bound results by topK', async () => {
            await kb.indexResource(5, 1, AI_TEXT, 'ai.txt');
            await kb.indexResource(5, 2, ML_TEXT, 'ml.txt');

            expect(await kb.search(5, 'AI', { topK: 1 })).toHaveLength(1);
        });
    });

    // =========================================================================
    // Atomicity
    // =========================================================================

    describe('Atomicity', () => {
        it('should roll back chunks already upserted when a later upsert fails', async () => {
            const small = new KnowledgeBaseService({
                embeddings,
                store,
                config: { chunkSize: 20, chunkOverlap: 0, strategy: 'sentence' },
            });
            store.failAt = 3;

            await expect(
                small.indexResource(1, 'doc', 'AI is here. Data is there. Machine runs.', 'doc.txt')
            ).rejects.toMatchObject({ code: 'INDEXING_FAILED' });

            expect(store.countPoints('project_1')).toBe(0);
            expect(small.hasKnowledgeBase(1)).toBe(false);
        });

        it('should leave nothing behind when embedding fails', async () => {
            embeddings.failOnCall = 1;

            await expect(kb.indexResource(5, 1, AI_TEXT, 'ai.txt')).rejects.toBeInstanceOf(RAGError);

            expect(store.hasCollection('project_5')).toBe(false);
            expect(kb.listResources(5)).toEqual([]);
        });

        it('should keep the previous version when re-indexing fails', async () => {
            await kb.indexResource(5, 1, AI_TEXT, 'ai.txt');
            embeddings.failOnCall = embeddings.calls + 1;

            await expect(kb.indexResource(5, 1, ML_TEXT, 'ai.txt')).rejects.toMatchObject({
                code: 'SERVICE_UNAVAILABLE',
            });

            embeddings.failOnCall = null;
            const results = await kb.search(5, 'AI');
            expect(results.map(r => r.text)).toEqual([AI_TEXT]);
        });

        it('should replace the previous chunks on re-index', async () => {
            await kb.indexResource(5, 1, AI_TEXT, 'ai.txt');
            await kb.indexResource(5, 1, ML_TEXT, 'ai.txt');

            const results = await kb.search(5, 'AI');
            expect(results.map(r => r.text)).toEqual([ML_TEXT]);
            expect(kb.listResources(5)).toHaveLength(1);
            expect(kb.getInfo(5).chunkCount).toBe(1);
        });

        it('should serialise concurrent writes to one project', async () => {
            await Promise.all([
                kb.indexResource(5, 1, AI_TEXT, 'ai.txt'),
                kb.indexResource(5, 1, ML_TEXT, 'ai.txt'),
                kb.removeResource(5, 2),
            ]);

            expect(store.countPoints('project_5')).toBe(1);
            const results = await kb.search(5, 'AI');
            expect(results.map(r => r.text)).toEqual([ML_TEXT]);
        });

        it('should index empty text as zero chunks and drop the old version', async () => {
            await kb.indexResource(5, 1, AI_TEXT, 'ai.txt');

            await expect(kb.indexResource(5, 1, '', 'ai.txt')).resolves.toEqual({ chunksIndexed: 0 });
            expect(kb.hasKnowledgeBase(5)).toBe(false);
        });
    });

    // =========================================================================
    // Context
    // =========================================================================

    describe('buildContext', () => {
        const results: RetrievalResult[] = [
            { text: 'first text', score: 0.912, resourceId: '1', chunkId: 'a', metadata: meta() },
            { text: 'second text', score: 0.5, resourceId: '2', chunkId: 'b', metadata: meta() },
        ];

        function meta(): RetrievalResult['metadata'] {
            return { projectId: '5', filename: 'f.txt', chunkIndex: 0, startOffset: 0, endOffset: 10 };
        }

        it('should number sources with their relevance', () => {
            expect(kb.buildContext(results)).toBe(
                '[Source 1] (relevance: 0.91)\nfirst text\n\n[Source 2] (relevance: 0.50)\nsecond text'
            );
        });

        it('should stop before exceeding the budget', () => {
            expect(kb.buildContext(results, 40)).toBe('[Source 1] (relevance: 0.91)\nfirst text');
            expect(kb.buildContext(results, 10)).toBe('');
        });
    });

    // =========================================================================
    // Introspection
    // =========================================================================

    describe('Introspection', () => {
        it('should list indexed resources with content hashes', async () => {
            await kb.indexResource(5, 1, AI_TEXT, 'ai.txt');

            const [resource] = kb.listResources(5);
            expect(resource).toMatchObject({ resourceId: '1', filename: 'ai.txt', chunkCount: 1 });
            expect(resource.contentHash).toHaveLength(64);
            expect(kb.hasKnowledgeBase(5)).toBe(true);
            expect(kb.hasKnowledgeBase(6)).toBe(false);
        });
    });
});
