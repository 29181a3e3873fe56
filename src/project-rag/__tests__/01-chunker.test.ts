/**
 * Text Chunker Tests
 */

import { TextChunker, chunkText, reconstructText, estimateTokens, generateContentHash } from '../chunker';
import { RAGError } from '../types';
import type { ChunkingStrategy } from '../types';

const STRATEGIES: ChunkingStrategy[] = [
    'fixed_size',
    'sentence',
    'paragraph',
    'recursive',
    'markdown',
    'sliding_window',
];

// =============================================================================
// Fixtures
// =============================================================================

function buildDocument(): string {
    const words = ['retrieval', 'vector', 'chunk', 'model', 'agent', 'tool', 'query', 'index'];
    const parts: string[] = [];
    let seed = 7;
    const next = () => {
        seed = (seed * 31 + 11) % 97;
        return seed;
    };

    for (let section = 0; section < 4; section++) {
        parts.push(`## Section ${section}\n`);
        for (let paragraph = 0; paragraph < 3; paragraph++) {
            const sentences: string[] = [];
            for (let s = 0; s < 4; s++) {
                const length = 4 + (next() % 9);
                const sentence = Array.from({ length }, () => words[next() % words.length]).join(' ');
                sentences.push(sentence + (s % 2 === 0 ? '.' : '!'));
            }
            parts.push(sentences.join(' ') + '\n\n');
        }
    }
    parts.push('人工智能是计算机科学的一个分支。机器学习是人工智能的子集！');
    return parts.join('');
}

const DOCUMENT = buildDocument();

describe('TextChunker', () => {
    // =========================================================================
    // Reconstruction
    // =========================================================================

    describe('Reconstruction', () => {
        const configs = [
            { chunkSize: 120, chunkOverlap: 0 },
            { chunkSize: 120, chunkOverlap: 20 },
            { chunkSize: 37, chunkOverlap: 9 },
        ];

        for (const strategy of STRATEGIES) {
            for (const { chunkSize, chunkOverlap } of configs) {
                it(`should rebuild the text exactly (${strategy}, size ${chunkSize}, overlap ${chunkOverlap})`, () => {
                    const chunks = chunkText(DOCUMENT, strategy, chunkSize, chunkOverlap);

                    expect(chunks.length).toBeGreaterThan(1);
                    expect(reconstructText(chunks)).toBe(DOCUMENT);

                    chunks.forEach((chunk, i) => {
                        expect(chunk.index).toBe(i);
                        expect(chunk.content.length).toBeGreaterThan(0);
                        expect(chunk.content.length).toBeLessThanOrEqual(chunkSize);
                        expect(chunk.content).toBe(DOCUMENT.slice(chunk.startOffset, chunk.endOffset));
                        expect(chunk.strategy).toBe(strategy);
                    });

                    // Offsets never move backwards and the last chunk ends the text
                    for (let i = 1; i < chunks.length; i++) {
                        expect(chunks[i].startOffset).toBeGreaterThanOrEqual(chunks[i - 1].startOffset);
                        expect(chunks[i].startOffset).toBeLessThanOrEqual(chunks[i - 1].endOffset);
                        expect(chunks[i - 1].endOffset - chunks[i].startOffset).toBeLessThanOrEqual(
                            strategy === 'sliding_window' ? chunkSize : chunkOverlap
                        );
                    }
                    expect(chunks[0].startOffset).toBe(0);
                    expect(chunks[chunks.length - 1].endOffset).toBe(DOCUMENT.length);
                });
            }
        }
    });

    // =========================================================================
    // Strategies
    // =========================================================================

    describe('Strategies', () => {
        it('should step fixed-size chunks back by the overlap', () => {
            const chunks = chunkText('abcdefghij', 'fixed_size', 4, 1);

            expect(chunks.map(c => c.content)).toEqual(['abcd', 'defg', 'ghij']);
            expect(chunks.map(c => [c.startOffset, c.endOffset])).toEqual([[0, 4], [3, 7], [6, 10]]);
        });

        it('should align the last sliding window to the end of the text', () => {
            expect(chunkText('abcdefghij', 'fixed_size', 4, 0).map(c => c.content)).toEqual([
                'abcd',
                'efgh',
                'ij',
            ]);
            expect(chunkText('abcdefghij', 'sliding_window', 4, 0).map(c => c.content)).toEqual([
                'abcd',
                'efgh',
                'ghij',
            ]);
        });

        it('should cut paragraphs at blank lines', () => {
            const text = 'First paragraph here.\n\nSecond paragraph here.\n\nThird one.';
            const chunks = chunkText(text, 'paragraph', 30, 0);

            expect(chunks.map(c => c.content)).toEqual([
                'First paragraph here.\n\n',
                'Second paragraph here.\n\n',
                'Third one.',
            ]);
        });

        it('should merge sentences up to the chunk size', () => {
            const text = 'Alpha beta. Gamma delta! Epsilon zeta? Eta.';
            const chunks = chunkText(text, 'sentence', 25, 0);

            expect(chunks.map(c => c.content)).toEqual([
                'Alpha beta. Gamma delta! ',
                'Epsilon zeta? Eta.',
            ]);
        });

        it('should prefix later chunks with the overlap', () => {
            const text = 'Alpha beta. Gamma delta! Epsilon zeta? Eta.';
            const chunks = chunkText(text, 'sentence', 30, 5);

            expect(chunks.map(c => c.content)).toEqual([
                'Alpha beta. Gamma delta! ',
                'lta! Epsilon zeta? Eta.',
            ]);
            expect(chunks[1].startOffset).toBe(20);
        });

        it('should keep markdown sections apart and record their headings', () => {
            const text = '# Intro\nSome intro text.\n# Usage\nRun the tool.';
            const chunks = chunkText(text, 'markdown', 20, 0);

            expect(chunks.map(c => c.content)).toEqual([
                '# Intro\n',
                'Some intro text.\n',
                '# Usage\n',
                'Run the tool.',
            ]);
            expect(chunks.map(c => c.section)).toEqual(['Intro', 'Intro', 'Usage', 'Usage']);
        });

        it('should not carry overlap across markdown sections', () => {
            const text = '# Intro\nSome intro text.\n# Usage\nRun the tool.';
            const chunks = chunkText(text, 'markdown', 30, 5);

            expect(chunks.map(c => c.content)).toEqual([
                '# Intro\nSome intro text.\n',
                '# Usage\nRun the tool.',
            ]);
            expect(chunks.map(c => c.section)).toEqual(['Intro', 'Usage']);
        });

        it('should split CJK text on its sentence punctuation', () => {
            const text = '人工智能是计算机科学的一个分支。机器学习是人工智能的子集！';
            const chunks = chunkText(text, 'recursive', 20, 0);

            expect(chunks.map(c => c.content)).toEqual([
                '人工智能是计算机科学的一个分支。',
                '机器学习是人工智能的子集！',
            ]);
        });
    });

    // =========================================================================
    // Edge Cases
    // =========================================================================

    describe('Edge Cases', () => {
        it('should return no chunks for empty input', () => {
            expect(new TextChunker().chunk('')).toEqual([]);
        });

        it('should return a single chunk for short input', () => {
            const chunks = new TextChunker({ chunkSize: 100, chunkOverlap: 10 }).chunk('short text');

            expect(chunks).toHaveLength(1);
            expect(chunks[0]).toMatchObject({ content: 'short text', index: 0, startOffset: 0, endOffset: 10 });
        });

        it('should keep whitespace-only input', () => {
            const chunks = chunkText('   \n\n   ', 'paragraph', 3, 0);

            expect(reconstructText(chunks)).toBe('   \n\n   ');
            expect(chunks.every(c => c.content.length > 0)).toBe(true);
        });

        it('should reject a non-positive chunk size', () => {
            expect(() => new TextChunker({ chunkSize: 0, chunkOverlap: 0 })).toThrow(RAGError);
        });

        it('should reject an overlap not smaller than the chunk size', () => {
            expect(() => chunkText('abc', 'fixed_size', 10, 10)).toThrow('chunkOverlap must be an integer');

            try {
                new TextChunker({ chunkSize: 10, chunkOverlap: -1 });
                throw new Error('expected a configuration error');
            } catch (error) {
                expect(error).toBeInstanceOf(RAGError);
                expect(error instanceof RAGError && error.code).toBe('CONFIG_ERROR');
            }
        });

        it('should validate per-call overrides', () => {
            const chunker = new TextChunker();

            expect(() => chunker.chunk('abc', { chunkOverlap: 900 })).toThrow(RAGError);
        });
    });

    // =========================================================================
    // Helpers
    // =========================================================================

    describe('Helpers', () => {
        it('should estimate tokens with CJK weighting', () => {
            expect(estimateTokens('')).toBe(0);
            expect(estimateTokens('abcd')).toBe(1);
            expect(estimateTokens('你好世')).toBe(2);
            expect(estimateTokens('abcdefgh你好')).toBe(4);
        });

        it('should hash content deterministically', () => {
            expect(generateContentHash('hello')).toBe(generateContentHash('hello'));
            expect(generateContentHash('hello')).not.toBe(generateContentHash('hello!'));
            expect(generateContentHash('hello')).toHaveLength(64);
        });
    });
});
