/**
 * Embedding Provider Tests
 */

import {
    LocalEmbeddingProvider,
    OllamaEmbeddingProvider,
    OpenAIEmbeddingProvider,
    createEmbeddingProvider,
    cosineSimilarity,
    normalizeVector,
    knownDimension,
} from '../embeddings';
import { RAGError } from '../types';
import { KeywordEmbeddingProvider } from './helpers/keyword-embedding';

// =============================================================================
// Mocks
// =============================================================================

function jsonResponse(body: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

function mockTransformers(vectorFor: (text: string) => number[]) {
    const extractor = jest.fn(async (text: string) => ({ data: Float32Array.from(vectorFor(text)) }));
    const pipeline = jest.fn(async () => extractor);
    const env: Record<string, unknown> = {};
    return { module: { pipeline, env }, pipeline, extractor, env };
}

describe('Embedding Providers', () => {
    let fetchSpy: jest.SpyInstance;

    beforeEach(() => {
        fetchSpy = jest.spyOn(globalThis, 'fetch');
    });

    afterEach(() => {
        fetchSpy.mockRestore();
    });

    // =========================================================================
    // Local
    // =========================================================================

    describe('LocalEmbeddingProvider', () => {
        it('should load the pipeline once and pool with normalisation', async () => {
            const mock = mockTransformers(text => [text.length, 1]);
            const provider = new LocalEmbeddingProvider('Xenova/all-MiniLM-L6-v2', undefined, undefined, async () => mock.module);

            await provider.embed('abc');
            await provider.embedBatch(['a', 'bb']);

            expect(mock.pipeline).toHaveBeenCalledTimes(1);
            expect(mock.pipeline).toHaveBeenCalledWith('feature-extraction', 'Xenova/all-MiniLM-L6-v2');
            expect(mock.extractor).toHaveBeenCalledWith('abc', { pooling: 'mean', normalize: true });
            expect(mock.env.allowLocalModels).toBe(false);
        });

        it('should give the same vector alone and in a batch', async () => {
            const mock = mockTransformers(text => [text.length, text.charCodeAt(0)]);
            const provider = new LocalEmbeddingProvider('custom-model', undefined, undefined, async () => mock.module);

            const single = await provider.embed('hello');
            const batch = await provider.embedBatch(['first', 'hello', 'last']);

            expect(batch[1]).toEqual(single);
            expect(provider.getDimension()).toBe(2);
        });

        it('should read vectors from typed and plain array tensors', async () => {
            const module = {
                pipeline: jest.fn(async () => async (text: string) =>
                    text === 'typed' ? { data: Float32Array.from([0.5, 0.25]) } : { data: [1, 2] }),
            };
            const provider = new LocalEmbeddingProvider('custom-model', undefined, undefined, async () => module);

            expect(await provider.embedBatch(['typed', 'plain'])).toEqual([[0.5, 0.25], [1, 2]]);
        });

        it('should reject pipeline output without numeric data', async () => {
            const module = { pipeline: jest.fn(async () => async () => ({ data: 'not a vector' })) };
            const provider = new LocalEmbeddingProvider('custom-model', undefined, undefined, async () => module);

            await expect(provider.embed('x')).rejects.toMatchObject({
                code: 'SERVICE_UNAVAILABLE',
                message: 'Embedding provider unavailable (local): feature-extraction output has no numeric data',
            });
        });

        it('should surface a model load failure as a non-retryable error', async () => {
            const provider = new LocalEmbeddingProvider('broken', undefined, undefined, async () => {
                throw new Error('model not found');
            });

            await expect(provider.embed('x')).rejects.toMatchObject({
                code: 'SERVICE_UNAVAILABLE',
                retryable: false,
            });
        });

        it('should reject a module without a pipeline export', async () => {
            const provider = new LocalEmbeddingProvider('broken', undefined, undefined, async () => ({}));

            await expect(provider.load()).rejects.toThrow('does not export pipeline()');
        });
    });

    // =========================================================================
    // Ollama
    // =========================================================================

    describe('OllamaEmbeddingProvider', () => {
        it('should post each text to /api/embeddings', async () => {
            fetchSpy.mockImplementation(async () => jsonResponse({ embedding: [0.1, 0.2, 0.3] }));
            const provider = new OllamaEmbeddingProvider('nomic-embed-text', 'http://ollama.test', 1000, 3);

            const vectors = await provider.embedBatch(['one', 'two']);

            expect(vectors).toEqual([[0.1, 0.2, 0.3], [0.1, 0.2, 0.3]]);
            expect(fetchSpy).toHaveBeenCalledTimes(2);
            const [url, init] = fetchSpy.mock.calls[0];
            expect(url).toBe('http://ollama.test/api/embeddings');
            expect(JSON.parse(String(init.body))).toEqual({ model: 'nomic-embed-text', prompt: 'one' });
        });

        it('should report an unreachable server as retryable', async () => {
            fetchSpy.mockRejectedValue(new TypeError('fetch failed'));
            const provider = new OllamaEmbeddingProvider('nomic-embed-text', 'http://ollama.test');

            await expect(provider.embed('x')).rejects.toMatchObject({
                name: 'RAGError',
                code: 'SERVICE_UNAVAILABLE',
                retryable: true,
            });
        });

        it('should reject vectors of an unexpected dimension', async () => {
            fetchSpy.mockImplementation(async () => jsonResponse({ embedding: [1, 2] }));
            const provider = new OllamaEmbeddingProvider('nomic-embed-text', 'http://ollama.test');

            await expect(provider.embed('x')).rejects.toMatchObject({ code: 'DIMENSION_MISMATCH' });
        });
    });

    // =========================================================================
    // OpenAI-compatible
    // =========================================================================

    describe('OpenAIEmbeddingProvider', () => {
        it('should embed a batch in one request, ordered by index', async () => {
            fetchSpy.mockImplementation(async () =>
                jsonResponse({
                    data: [
                        { index: 1, embedding: [0, 1] },
                        { index: 0, embedding: [1, 0] },
                    ],
                })
            );
            const provider = new OpenAIEmbeddingProvider('small', 'test-secret', 'http://llm.test/v1');

            const vectors = await provider.embedBatch(['a', 'b']);

            expect(vectors).toEqual([[1, 0], [0, 1]]);
            const [url, init] = fetchSpy.mock.calls[0];
            expect(url).toBe('http://llm.test/v1/embeddings');
            expect(init.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
        });

        it('should not retry on a client error', async () => {
            fetchSpy.mockImplementation(async () => jsonResponse({ error: { message: 'bad key' } }, 401));
            const provider = new OpenAIEmbeddingProvider('small', 'test-secret', 'http://llm.test/v1');

            await expect(provider.embed('x')).rejects.toMatchObject({
                code: 'SERVICE_UNAVAILABLE',
                retryable: false,
                message: 'Embedding provider unavailable (openai): bad key',
            });
        });
    });

    // =========================================================================
    // Factory and helpers
    // =========================================================================

    describe('Factory and helpers', () => {
        it('should pick the provider from settings', () => {
            expect(createEmbeddingProvider({ provider: 'local', model: 'Xenova/all-MiniLM-L6-v2' })).toBeInstanceOf(
                LocalEmbeddingProvider
            );
            expect(createEmbeddingProvider({ provider: 'ollama', model: 'nomic-embed-text' })).toBeInstanceOf(
                OllamaEmbeddingProvider
            );
            const openai = createEmbeddingProvider({ provider: 'openai', model: 'text-embedding-3-small' });
            expect(openai).toBeInstanceOf(OpenAIEmbeddingProvider);
            expect(openai.getDimension()).toBe(1536);
        });

        it('should know common model dimensions', () => {
            expect(knownDimension('Xenova/all-MiniLM-L6-v2')).toBe(384);
            expect(knownDimension('unknown')).toBeNull();
        });

        it('should compute cosine similarity', () => {
            expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
            expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
            expect(cosineSimilarity([1, 0], [0, 0])).toBe(0);
            expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
        });

        it('should normalise vectors', () => {
            expect(normalizeVector([3, 4])).toEqual([0.6, 0.8]);
            expect(normalizeVector([0, 0])).toEqual([0, 0]);
        });

        it('should return nothing for an empty batch', async () => {
            const provider = new KeywordEmbeddingProvider(['a']);

            expect(await provider.embedBatch([])).toEqual([]);
            expect(provider.calls).toBe(0);
        });

        it('should wrap backend failures in a RAG error', async () => {
            const provider = new KeywordEmbeddingProvider(['a']);
            provider.failOnCall = 1;

            const error = await provider.embed('a').catch((e: unknown) => e);
            expect(error).toBeInstanceOf(RAGError);
            expect(error instanceof RAGError && error.retryable).toBe(false);
        });
    });
});
