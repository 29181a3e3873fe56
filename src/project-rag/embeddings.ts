/**
 * Embedding Providers
 *
 * Maps text to fixed-dimension vectors, either with a local Hugging Face
 * Transformers model (via Xenova) or through a remote API (Ollama or an
 * OpenAI-compatible endpoint). Default is local 'Xenova/all-MiniLM-L6-v2'.
 */

import type { EmbeddingSettings } from '../config';
import { AdapterError } from '../model-adapter/types';
import { requestJson, isRecord } from '../model-adapter/http';
import { createLogger, errorMessage } from '../logging';
import type { Logger } from '../logging';
import { RAGError } from './types';
import type { EmbeddingProviderName } from './types';

// =============================================================================
// Known dimensions
// =============================================================================

const MODEL_DIMENSIONS: Record<string, number> = {
    'Xenova/all-MiniLM-L6-v2': 384,
    'Xenova/bge-small-zh-v1.5': 512,
    'Xenova/bge-base-zh-v1.5': 768,
    'Xenova/bge-large-zh-v1.5': 1024,
    'nomic-embed-text': 768,
    'mxbai-embed-large': 1024,
    'text-embedding-3-small': 1536,
    'text-embedding-3-large': 3072,
    'text-embedding-ada-002': 1536,
};

export function knownDimension(model: string): number | null {
    return MODEL_DIMENSIONS[model] ?? null;
}

// =============================================================================
// Provider contract
// =============================================================================

export interface EmbeddingProvider {
    readonly provider: string;
    readonly model: string;

    /** Remote failures are worth retrying, local ones are not */
    readonly remote: boolean;

    /** Fixed per instance; null until known */
    getDimension(): number | null;

    embed(text: string): Promise<number[]>;
    embedBatch(texts: string[]): Promise<number[][]>;
}

/**
 * Dimension bookkeeping and error mapping shared by all providers
 */
export abstract class BaseEmbeddingProvider implements EmbeddingProvider {
    abstract readonly provider: string;
    abstract readonly remote: boolean;

    protected dimension: number | null;
    protected logger: Logger;

    constructor(readonly model: string, dimension?: number, logger?: Logger) {
        this.dimension = dimension ?? knownDimension(model);
        this.logger = logger ?? createLogger('embeddings');
    }

    getDimension(): number | null {
        return this.dimension;
    }

    async embed(text: string): Promise<number[]> {
        const [vector] = await this.embedBatch([text]);
        return vector;
    }

    async embedBatch(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) return [];

        let vectors: number[][];
        try {
            vectors = await this.computeBatch(texts);
        } catch (error) {
            throw this.unavailable(error);
        }

        if (vectors.length !== texts.length) {
            throw new RAGError(
                `${this.provider} returned ${vectors.length} embeddings for ${texts.length} inputs`,
                'SERVICE_UNAVAILABLE',
                this.remote
            );
        }

        return vectors.map(vector => this.accept(vector));
    }

    protected abstract computeBatch(texts: string[]): Promise<number[][]>;

    private accept(vector: number[]): number[] {
        if (this.dimension === null) {
            this.dimension = vector.length;
        } else if (vector.length !== this.dimension) {
            throw new RAGError(
                `Embedding dimension mismatch: expected ${this.dimension}, got ${vector.length}`,
                'DIMENSION_MISMATCH'
            );
        }
        return vector;
    }

    private unavailable(error: unknown): RAGError {
        if (error instanceof RAGError) return error;
        const message = errorMessage(error);
        const retryable = error instanceof AdapterError ? error.retryable : this.remote;
        this.logger.error('Embedding request failed', { provider: this.provider, model: this.model, error: message });
        return new RAGError(`Embedding provider unavailable (${this.provider}): ${message}`, 'SERVICE_UNAVAILABLE', retryable, error);
    }
}

// =============================================================================
// Local (Transformers.js)
// =============================================================================

/** Loads the transformers.js module; replaceable in tests */
export type TransformersLoader = () => Promise<unknown>;

type Extractor = (text: string, options: { pooling: 'mean'; normalize: boolean }) => Promise<unknown>;

const TRANSFORMERS_PACKAGE = '@xenova/transformers';

/**
 * transformers.js v2 is published as ESM only, so it is loaded with a
 * native import() that the CommonJS build leaves untouched.
 */
const loadTransformers: TransformersLoader = () => {
    const nativeImport = new Function('specifier', 'return import(specifier)');
    return Promise.resolve(nativeImport(TRANSFORMERS_PACKAGE));
};

/**
 * Pooled feature-extraction output is a tensor whose `data` holds the vector
 */
function tensorToVector(output: unknown): number[] {
    const data = isRecord(output) ? output.data : undefined;
    if (data instanceof Float32Array || data instanceof Float64Array) {
        return Array.from(data);
    }
    if (Array.isArray(data) && data.every((value: unknown) => typeof value === 'number')) {
        return data.map((value: unknown) => Number(value));
    }
    throw new Error('feature-extraction output has no numeric data');
}

export class LocalEmbeddingProvider extends BaseEmbeddingProvider {
    readonly provider = 'local';
    readonly remote = false;

    private extractor: Promise<Extractor> | null = null;

    constructor(
        model: string,
        dimension?: number,
        logger?: Logger,
        private readonly loader: TransformersLoader = loadTransformers
    ) {
        super(model, dimension, logger);
    }

    /**
     * Load the model. Called lazily by the first embed; call it at startup
     * to fail fast.
     */
    async load(): Promise<void> {
        await this.getExtractor();
    }

    protected async computeBatch(texts: string[]): Promise<number[][]> {
        const extractor = await this.getExtractor();
        const vectors: number[][] = [];

        // One text per call keeps batch and single results identical
        for (const text of texts) {
            const output = await extractor(text, { pooling: 'mean', normalize: true });
            vectors.push(tensorToVector(output));
        }

        return vectors;
    }

    private getExtractor(): Promise<Extractor> {
        if (!this.extractor) {
            this.logger.info('Loading local embedding model', { model: this.model });
            this.extractor = this.createExtractor().catch((error: unknown) => {
                this.extractor = null;
                throw new RAGError(
                    `Failed to load local embedding model ${this.model}: ${errorMessage(error)}`,
                    'SERVICE_UNAVAILABLE',
                    false,
                    error
                );
            });
        }
        return this.extractor;
    }

    private async createExtractor(): Promise<Extractor> {
        const transformers = await this.loader();
        if (!isRecord(transformers) || typeof transformers.pipeline !== 'function') {
            throw new Error(`${TRANSFORMERS_PACKAGE} does not export pipeline()`);
        }

        // Models are fetched from the hub, never looked up on disk
        if (isRecord(transformers.env)) {
            transformers.env.allowLocalModels = false;
            transformers.env.useBrowserCache = false;
        }

        const pipe: unknown = await transformers.pipeline('feature-extraction', this.model);
        if (typeof pipe !== 'function') {
            throw new Error('feature-extraction pipeline is not callable');
        }

        this.logger.info('Local embedding model loaded', { model: this.model });
        return async (text, options) => {
            const output: unknown = await pipe(text, options);
            return output;
        };
    }
}

// =============================================================================
// Ollama
// =============================================================================

export class OllamaEmbeddingProvider extends BaseEmbeddingProvider {
    readonly provider = 'ollama';
    readonly remote = true;

    constructor(
        model: string,
        private readonly baseUrl: string = 'http://localhost:11434',
        private readonly timeoutMs: number = 60_000,
        dimension?: number,
        logger?: Logger
    ) {
        super(model, dimension, logger);
    }

    protected async computeBatch(texts: string[]): Promise<number[][]> {
        const vectors: number[][] = [];
        for (const text of texts) {
            const data = await requestJson(`${this.baseUrl}/api/embeddings`, {
                provider: this.provider,
                body: { model: this.model, prompt: text },
                timeoutMs: this.timeoutMs,
            });
            vectors.push(readVector(isRecord(data) ? data.embedding : undefined, this.provider));
        }
        return vectors;
    }
}

// =============================================================================
// OpenAI-compatible
// =============================================================================

export class OpenAIEmbeddingProvider extends BaseEmbeddingProvider {
    readonly provider = 'openai';
    readonly remote = true;

    constructor(
        model: string,
        private readonly apiKey: string | undefined,
        private readonly baseUrl: string = 'https://api.openai.com/v1',
        private readonly timeoutMs: number = 60_000,
        dimension?: number,
        logger?: Logger
    ) {
        super(model, dimension, logger);
    }

    protected async computeBatch(texts: string[]): Promise<number[][]> {
        const data = await requestJson(`${this.baseUrl}/embeddings`, {
            provider: this.provider,
            headers: this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {},
            body: { model: this.model, input: texts },
            timeoutMs: this.timeoutMs,
        });

        const items = isRecord(data) && Array.isArray(data.data) ? data.data : null;
        if (!items) {
            throw new AdapterError('Embedding response has no data array', {
                code: 'INVALID_RESPONSE',
                provider: this.provider,
                retryable: false,
            });
        }

        const vectors: number[][] = new Array(items.length);
        items.forEach((item: unknown, position: number) => {
            const index = isRecord(item) && typeof item.index === 'number' ? item.index : position;
            vectors[index] = readVector(isRecord(item) ? item.embedding : undefined, this.provider);
        });
        return vectors;
    }
}

function readVector(value: unknown, provider: string): number[] {
    if (Array.isArray(value) && value.every((v): v is number => typeof v === 'number')) {
        return value;
    }
    throw new AdapterError('Embedding response has no numeric vector', {
        code: 'INVALID_RESPONSE',
        provider,
        retryable: false,
    });
}

// =============================================================================
// Factory
// =============================================================================

export function createEmbeddingProvider(
    settings: EmbeddingSettings,
    timeoutMs: number = 60_000,
    logger?: Logger
): EmbeddingProvider {
    const provider: EmbeddingProviderName = settings.provider;
    switch (provider) {
        case 'ollama':
            return new OllamaEmbeddingProvider(
                settings.model,
                settings.baseUrl,
                timeoutMs,
                settings.dimension,
                logger
            );
        case 'openai':
            return new OpenAIEmbeddingProvider(
                settings.model,
                settings.apiKey,
                settings.baseUrl,
                timeoutMs,
                settings.dimension,
                logger
            );
        case 'local':
            return new LocalEmbeddingProvider(settings.model, settings.dimension, logger);
    }
}

// =============================================================================
// Vector Operations
// =============================================================================

export function cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) return 0;
    let dotProduct = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dotProduct += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) return 0;
    return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function normalizeVector(v: number[]): number[] {
    let norm = 0;
    for (const x of v) norm += x * x;
    norm = Math.sqrt(norm);
    if (norm === 0) return v;
    return v.map(x => x / norm);
}
