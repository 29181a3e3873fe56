/**
 * In-Memory Vector Store Tests
 */

import { InMemoryVectorStore } from '../vector-store';
import { RAGError } from '../types';
import type { EmbeddedChunk } from '../types';

function point(id: string, resourceId: string, vector: number[], text: string = id): EmbeddedChunk {
    return {
        id,
        vector,
        payload: {
            text,
            resourceId,
            projectId: '1',
            filename: `${resourceId}.txt`,
            chunkIndex: 0,
            startOffset: 0,
            endOffset: text.length,
        },
    };
}

describe('InMemoryVectorStore', () => {
    let store: InMemoryVectorStore;

    beforeEach(() => {
        store = new InMemoryVectorStore();
    });

    // =========================================================================
    // Collections
    // =========================================================================

    describe('Collections', () => {
        it('should create a collection on first upsert', () => {
            expect(store.hasCollection('project_1')).toBe(false);

            store.upsert('project_1', point('a', 'r1', [1, 0]));

            expect(store.hasCollection('project_1')).toBe(true);
            expect(store.getCollectionInfo('project_1')).toMatchObject({
                name: 'project_1',
                dimension: 2,
                pointCount: 1,
                resourceCount: 1,
            });
        });

        it('should return nothing for a missing collection', () => {
            expect(store.query('missing', [1, 0], { topK: 5 })).toEqual([]);
            expect(store.deleteByResource('missing', 'r1')).toBe(0);
            expect(store.getCollectionInfo('missing')).toBeNull();
        });

        it('should keep collections apart', () => {
            store.upsert('project_1', point('a', 'r1', [1, 0]));
            store.upsert('project_2', point('b', 'r2', [1, 0]));

            const hits = store.query('project_1', [1, 0], { topK: 10 });
            expect(hits.map(h => h.chunkId)).toEqual(['a']);
        });

        it('should reject vectors of another dimension', () => {
            store.upsert('project_1', point('a', 'r1', [1, 0]));

            expect(() => store.upsert('project_1', point('b', 'r1', [1, 0, 0]))).toThrow(RAGError);
            expect(() => store.query('project_1', [1, 0, 0], { topK: 1 })).toThrow('does not match');
        });

        it('should drop a collection', () => {
            store.upsert('project_1', point('a', 'r1', [1, 0]));

            expect(store.dropCollection('project_1')).toBe(true);
            expect(store.hasCollection('project_1')).toBe(false);
            expect(store.listCollections()).toEqual([]);
        });
    });

    // =========================================================================
    // Query
    // =========================================================================

    describe('Query', () => {
        beforeEach(() => {
            store.upsert('c', point('east', 'r1', [1, 0]));
            store.upsert('c', point('north', 'r2', [0, 1]));
            store.upsert('c', point('north-east', 'r3', [1, 1]));
            store.upsert('c', point('west', 'r4', [-1, 0]));
        });

        it('should rank by cosine similarity', () => {
            const hits = store.query('c', [1, 0.2], { topK: 4 });

            expect(hits.map(h => h.chunkId)).toEqual(['east', 'north-east', 'north', 'west']);
            for (let i = 1; i < hits.length; i++) {
                expect(hits[i].score).toBeLessThanOrEqual(hits[i - 1].score);
            }
        });

        it('should never return more than topK results', () => {
            for (const topK of [1, 2, 3]) {
                expect(store.query('c', [1, 0], { topK })).toHaveLength(topK);
            }
            expect(store.query('c', [1, 0], { topK: 50 })).toHaveLength(4);
            expect(store.query('c', [1, 0], { topK: 0 })).toEqual([]);
        });

        it('should clamp scores into [0, 1]', () => {
            const hits = store.query('c', [1, 0], { topK: 4 });

            expect(hits[0].score).toBeCloseTo(1);
            expect(hits.find(h => h.chunkId === 'west')?.score).toBe(0);
        });

        it('should break ties by insertion order', () => {
            store.upsert('ties', point('first', 'r1', [0, 1]));
            store.upsert('ties', point('second', 'r2', [0, 2]));
            store.upsert('ties', point('third', 'r3', [0, 3]));

            expect(store.query('ties', [0, 1], { topK: 3 }).map(h => h.chunkId)).toEqual([
                'first',
                'second',
                'third',
            ]);
        });

        it('should filter by minimum score', () => {
            const hits = store.query('c', [1, 0], { topK: 4, minScore: 0.5 });

            expect(hits.map(h => h.chunkId)).toEqual(['east', 'north-east']);
        });

        it('should expose payload fields as metadata', () => {
            const [hit] = store.query('c', [1, 0], { topK: 1 });

            expect(hit).toEqual({
                text: 'east',
                score: 1,
                resourceId: 'r1',
                chunkId: 'east',
                metadata: {
                    projectId: '1',
                    filename: 'r1.txt',
                    chunkIndex: 0,
                    startOffset: 0,
                    endOffset: 4,
                },
            });
        });
    });

    // =========================================================================
    // Mutation
    // =========================================================================

    describe('Mutation', () => {
        it('should replace a point in place on upsert', () => {
            store.upsert('c', point('a', 'r1', [0, 1]));
            store.upsert('c', point('b', 'r1', [0, 1]));
            store.upsert('c', point('a', 'r1', [0, 1], 'updated'));

            const hits = store.query('c', [0, 1], { topK: 2 });
            expect(hits.map(h => h.chunkId)).toEqual(['a', 'b']);
            expect(hits[0].text).toBe('updated');
            expect(store.countPoints('c')).toBe(2);
        });

        it('should delete every chunk of a resource', () => {
            store.upsert('c', point('a1', 'a', [1, 0]));
            store.upsert('c', point('b1', 'b', [1, 0]));
            store.upsert('c', point('a2', 'a', [1, 0]));

            expect(store.deleteByResource('c', 'a')).toBe(2);
            expect(store.query('c', [1, 0], { topK: 10 }).map(h => h.resourceId)).toEqual(['b']);
            expect(store.deleteByResource('c', 'a')).toBe(0);
        });

        it('should delete by id', () => {
            store.upsert('c', point('a1', 'a', [1, 0]));
            store.upsert('c', point('a2', 'a', [1, 0]));

            expect(store.deleteByIds('c', ['a2', 'unknown'])).toBe(1);
            expect(store.countPoints('c')).toBe(1);
        });

        it('should list resources in first-indexed order', () => {
            store.upsert('c', point('b1', 'b', [1, 0]));
            store.upsert('c', point('a1', 'a', [1, 0]));
            store.upsert('c', point('b2', 'b', [1, 0]));

            expect(store.listResources('c')).toEqual(['b', 'a']);
        });

        it('should not let a query snapshot change under deletion', () => {
            store.upsert('c', point('a1', 'a', [1, 0]));
            store.upsert('c', point('a2', 'a', [1, 0]));

            const before = store.query('c', [1, 0], { topK: 10 });
            store.deleteByResource('c', 'a');

            expect(before).toHaveLength(2);
            expect(store.query('c', [1, 0], { topK: 10 })).toEqual([]);
        });
    });
});
