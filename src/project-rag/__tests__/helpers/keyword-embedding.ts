/**
 * Deterministic embedding for tests: one dimension per vocabulary word,
 * holding that word's count in the text.
 */

import { BaseEmbeddingProvider } from '../../embeddings';

export class KeywordEmbeddingProvider extends BaseEmbeddingProvider {
    readonly provider = 'keyword';
    readonly remote = false;

    calls = 0;
    failOnCall: number | null = null;

    constructor(private readonly vocabulary: string[]) {
        super('keyword-test', vocabulary.length);
    }

    protected async computeBatch(texts: string[]): Promise<number[][]> {
        this.calls++;
        if (this.failOnCall !== null && this.calls >= this.failOnCall) {
            throw new Error('embedding backend down');
        }
        return texts.map(text => this.vectorize(text));
    }

    private vectorize(text: string): number[] {
        const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
        return this.vocabulary.map(term => words.filter(w => w === term).length);
    }
}
