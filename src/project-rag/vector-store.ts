/**
 * In-Memory Vector Store
 *
 * One collection per project, created lazily on the first upsert.
 * Mutations build a new point list and swap it in, so a query always sees
 * either the whole of a resource or none of it.
 */

import { cosineSimilarity } from './embeddings';
import { RAGError } from './types';
import type {
    CollectionInfo,
    EmbeddedChunk,
    QueryOptions,
    RetrievalResult,
    VectorStore,
} from './types';

// =============================================================================
// Collection
// =============================================================================

interface StoredPoint extends EmbeddedChunk {
    /** Insertion sequence, used to break score ties */
    seq: number;
}

interface Collection {
    name: string;
    dimension: number | null;
    createdAt: string;
    points: readonly StoredPoint[];
    nextSeq: number;
}

// =============================================================================
// Store
// =============================================================================

export class InMemoryVectorStore implements VectorStore {
    private collections = new Map<string, Collection>();

    /**
     * Insert or replace a point. A replaced point keeps its original position.
     */
    upsert(collectionName: string, point: EmbeddedChunk): void {
        const collection = this.getOrCreate(collectionName);

        if (point.vector.length === 0) {
            throw new RAGError(`Point ${point.id} has an empty vector`, 'DIMENSION_MISMATCH');
        }
        if (collection.dimension !== null && point.vector.length !== collection.dimension) {
            throw new RAGError(
                `Collection ${collectionName} expects dimension ${collection.dimension}, got ${point.vector.length}`,
                'DIMENSION_MISMATCH'
            );
        }

        const stored: StoredPoint = {
            id: point.id,
            vector: [...point.vector],
            payload: { ...point.payload },
            seq: collection.nextSeq,
        };

        const existing = collection.points.findIndex(p => p.id === point.id);
        const points = [...collection.points];
        if (existing === -1) {
            points.push(stored);
            collection.nextSeq++;
        } else {
            points[existing] = { ...stored, seq: points[existing].seq };
        }

        collection.dimension = point.vector.length;
        collection.points = points;
    }

    /**
     * Nearest neighbours by cosine similarity, best first.
     * Equal scores keep insertion order.
     */
    query(collectionName: string, vector: number[], options: QueryOptions): RetrievalResult[] {
        const collection = this.collections.get(collectionName);
        if (!collection || options.topK < 1) {
            return [];
        }

        if (collection.dimension !== null && vector.length !== collection.dimension) {
            throw new RAGError(
                `Query dimension ${vector.length} does not match collection dimension ${collection.dimension}`,
                'DIMENSION_MISMATCH'
            );
        }

        const minScore = options.minScore ?? 0;
        const snapshot = collection.points;

        return snapshot
            .map(point => ({ point, score: clamp(cosineSimilarity(vector, point.vector)) }))
            .filter(hit => hit.score >= minScore)
            .sort((a, b) => b.score - a.score || a.point.seq - b.point.seq)
            .slice(0, Math.floor(options.topK))
            .map(({ point, score }) => toResult(point, score));
    }

    /**
     * Remove every point of a resource. Returns the number removed.
     */
    deleteByResource(collectionName: string, resourceId: string): number {
        return this.removeWhere(collectionName, point => point.payload.resourceId === resourceId);
    }

    deleteByIds(collectionName: string, ids: string[]): number {
        const idSet = new Set(ids);
        return this.removeWhere(collectionName, point => idSet.has(point.id));
    }

    hasCollection(collectionName: string): boolean {
        return this.collections.has(collectionName);
    }

    dropCollection(collectionName: string): boolean {
        return this.collections.delete(collectionName);
    }

    listCollections(): string[] {
        return Array.from(this.collections.keys());
    }

    /**
     * Resource ids in first-indexed order
     */
    listResources(collectionName: string): string[] {
        const collection = this.collections.get(collectionName);
        if (!collection) return [];
        return Array.from(new Set(collection.points.map(p => p.payload.resourceId)));
    }

    countPoints(collectionName: string): number {
        return this.collections.get(collectionName)?.points.length ?? 0;
    }

    getCollectionInfo(collectionName: string): CollectionInfo | null {
        const collection = this.collections.get(collectionName);
        if (!collection) return null;

        return {
            name: collection.name,
            dimension: collection.dimension,
            pointCount: collection.points.length,
            resourceCount: this.listResources(collectionName).length,
            createdAt: collection.createdAt,
        };
    }

    // =========================================================================
    // Internals
    // =========================================================================

    private getOrCreate(name: string): Collection {
        let collection = this.collections.get(name);
        if (!collection) {
            collection = {
                name,
                dimension: null,
                createdAt: new Date().toISOString(),
                points: [],
                nextSeq: 0,
            };
            this.collections.set(name, collection);
        }
        return collection;
    }

    private removeWhere(collectionName: string, predicate: (point: StoredPoint) => boolean): number {
        const collection = this.collections.get(collectionName);
        if (!collection) return 0;

        const kept = collection.points.filter(point => !predicate(point));
        const removed = collection.points.length - kept.length;
        if (removed > 0) {
            collection.points = kept;
        }
        return removed;
    }
}

function clamp(score: number): number {
    if (Number.isNaN(score)) return 0;
    return Math.min(1, Math.max(0, score));
}

function toResult(point: StoredPoint, score: number): RetrievalResult {
    const { text, resourceId, ...metadata } = point.payload;
    return {
        text,
        score,
        resourceId,
        chunkId: point.id,
        metadata,
    };
}
