/**
 * Text Chunker
 *
 * Splits resource text into overlapping chunks. Every strategy cuts the text
 * into contiguous ranges, so chunk contents are exact slices of the input and
 * the original text can be rebuilt from the offsets.
 */

import { createHash } from 'crypto';
import type { Chunk, ChunkerConfig, ChunkingStrategy } from './types';
import { RAGError } from './types';

// =============================================================================
// Constants
// =============================================================================

/** Approximate characters per token for non-CJK text */
const CHARS_PER_TOKEN = 4;

/** Approximate characters per token for CJK text */
const CJK_CHARS_PER_TOKEN = 1.5;

const CJK_PATTERN = /[\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uac00-\ud7af\uf900-\ufaff]/g;

/**
 * Separators for the recursive strategy, largest unit first.
 * Each cut falls right after the separator match.
 */
const RECURSIVE_SEPARATORS: RegExp[] = [
    /\n[ \t]*\n\s*/g,
    /\n/g,
    /[。！？.!?]+\s*/g,
    /[，；：,;:]\s*/g,
    /\s+/g,
];

const SENTENCE_PATTERN = /[。！？.!?]+\s*/g;
const PARAGRAPH_PATTERN = /\n[ \t]*\n\s*/g;
const HEADING_PATTERN = /^(#{1,6})[ \t]+(.+)$/gm;

interface Range {
    start: number;
    end: number;

    /** The range opens a unit that must begin a new chunk */
    hard?: boolean;
}

export const DEFAULT_CHUNKER_CONFIG: ChunkerConfig = {
    strategy: 'recursive',
    chunkSize: 500,
    chunkOverlap: 50,
};

// =============================================================================
// Main Chunker Class
// =============================================================================

export class TextChunker {
    private config: ChunkerConfig;

    constructor(config?: Partial<ChunkerConfig>) {
        this.config = { ...DEFAULT_CHUNKER_CONFIG, ...config };
        validateChunkerConfig(this.config);
    }

    getConfig(): ChunkerConfig {
        return { ...this.config };
    }

    /**
     * Chunk text. Empty input yields an empty array.
     */
    chunk(text: string, overrides?: Partial<ChunkerConfig>): Chunk[] {
        const config = overrides ? { ...this.config, ...overrides } : this.config;
        if (overrides) {
            validateChunkerConfig(config);
        }

        if (text.length === 0) {
            return [];
        }

        const { strategy, chunkSize } = config;

        if (text.length <= chunkSize) {
            return [this.createChunk(text, { start: 0, end: text.length }, 0, strategy)];
        }

        const ranges = strategy === 'fixed_size' || strategy === 'sliding_window'
            ? this.windowRanges(text.length, config)
            : this.boundaryRanges(text, config);

        return ranges.map((range, index) => this.createChunk(text, range, index, strategy));
    }

    // =========================================================================
    // Window strategies
    // =========================================================================

    private windowRanges(length: number, config: ChunkerConfig): Range[] {
        const { chunkSize, chunkOverlap, strategy } = config;
        const ranges: Range[] = [];
        let start = 0;

        while (start < length) {
            if (strategy === 'sliding_window' && start + chunkSize >= length) {
                // Last window is aligned to the end so every window has full size.
                ranges.push({ start: Math.max(0, length - chunkSize), end: length });
                break;
            }

            const end = Math.min(start + chunkSize, length);
            ranges.push({ start, end });
            if (end >= length) break;

            start = strategy === 'sliding_window'
                ? start + (chunkSize - chunkOverlap)
                : end - chunkOverlap;
        }

        return ranges;
    }

    // =========================================================================
    // Boundary strategies
    // =========================================================================

    private boundaryRanges(text: string, config: ChunkerConfig): Range[] {
        const budget = config.chunkSize - config.chunkOverlap;
        const segments = this.segment(text, config.strategy, budget);
        const cores = this.merge(segments, budget);

        return cores.map((core, i) => {
            // A chunk opening a markdown section takes no overlap from the one before
            if (i === 0 || config.chunkOverlap === 0 || core.hard) {
                return core;
            }
            const previous = cores[i - 1];
            return {
                start: Math.max(previous.start, core.start - config.chunkOverlap),
                end: core.end,
            };
        });
    }

    /**
     * Cut the text into contiguous segments no longer than the budget
     */
    private segment(text: string, strategy: ChunkingStrategy, budget: number): Range[] {
        const whole: Range = { start: 0, end: text.length };

        switch (strategy) {
            case 'sentence':
                return this.splitThenRecurse(text, whole, SENTENCE_PATTERN, budget, 3);
            case 'paragraph':
                return this.splitThenRecurse(text, whole, PARAGRAPH_PATTERN, budget, 1);
            case 'markdown':
                return this.splitMarkdown(text, budget);
            case 'recursive':
            default:
                return this.splitRecursive(text, whole, budget, 0);
        }
    }

    private splitThenRecurse(
        text: string,
        range: Range,
        pattern: RegExp,
        budget: number,
        fallbackLevel: number
    ): Range[] {
        return cutAfter(text, range, pattern).flatMap(piece =>
            piece.end - piece.start <= budget
                ? [piece]
                : this.splitRecursive(text, piece, budget, fallbackLevel)
        );
    }

    private splitRecursive(text: string, range: Range, budget: number, level: number): Range[] {
        if (range.end - range.start <= budget) {
            return [range];
        }

        if (level >= RECURSIVE_SEPARATORS.length) {
            return hardCut(text, range, budget);
        }

        const pieces = cutAfter(text, range, RECURSIVE_SEPARATORS[level]);
        if (pieces.length === 1) {
            return this.splitRecursive(text, range, budget, level + 1);
        }

        return pieces.flatMap(piece => this.splitRecursive(text, piece, budget, level + 1));
    }

    /**
     * Sections start at headings and never share a chunk
     */
    private splitMarkdown(text: string, budget: number): Range[] {
        const starts = [0];
        HEADING_PATTERN.lastIndex = 0;
        let match: RegExpExecArray | null;
        while ((match = HEADING_PATTERN.exec(text)) !== null) {
            if (match.index > 0) starts.push(match.index);
        }

        const segments: Range[] = [];
        starts.forEach((start, i) => {
            const end = i + 1 < starts.length ? starts[i + 1] : text.length;
            const pieces = this.splitRecursive(text, { start, end }, budget, 0);
            pieces.forEach((piece, j) => segments.push({ ...piece, hard: j === 0 }));
        });
        return segments;
    }

    /**
     * Greedily join neighbouring segments up to the budget
     */
    private merge(segments: Range[], budget: number): Range[] {
        const cores: Range[] = [];
        let current: Range | null = null;

        for (const segment of segments) {
            if (current && !segment.hard && segment.end - current.start <= budget) {
                current.end = segment.end;
                continue;
            }
            if (current) cores.push(current);
            current = { start: segment.start, end: segment.end, hard: segment.hard };
        }
        if (current) cores.push(current);

        return cores;
    }

    // =========================================================================
    // Helpers
    // =========================================================================

    private createChunk(text: string, range: Range, index: number, strategy: ChunkingStrategy): Chunk {
        const content = text.slice(range.start, range.end);
        const chunk: Chunk = {
            content,
            index,
            startOffset: range.start,
            endOffset: range.end,
            tokenCount: estimateTokens(content),
            strategy,
        };

        if (strategy === 'markdown') {
            const section = findSection(text, range.end - 1);
            if (section) chunk.section = section;
        }

        return chunk;
    }
}

// =============================================================================
// Range cutting
// =============================================================================

function cutAfter(text: string, range: Range, pattern: RegExp): Range[] {
    const slice = text.slice(range.start, range.end);
    const flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g';
    const regex = new RegExp(pattern.source, flags);
    const pieces: Range[] = [];
    let start = range.start;
    let match: RegExpExecArray | null;

    while ((match = regex.exec(slice)) !== null) {
        if (match[0].length === 0) {
            regex.lastIndex++;
            continue;
        }
        const cut = range.start + match.index + match[0].length;
        if (cut > start && cut < range.end) {
            pieces.push({ start, end: cut });
            start = cut;
        }
    }

    pieces.push({ start, end: range.end });
    return pieces;
}

function hardCut(text: string, range: Range, budget: number): Range[] {
    const pieces: Range[] = [];
    let start = range.start;

    while (start < range.end) {
        let end = Math.min(start + budget, range.end);
        // Keep surrogate pairs together
        if (end < range.end && end - start > 1 && isHighSurrogate(text.charCodeAt(end - 1))) {
            end--;
        }
        pieces.push({ start, end });
        start = end;
    }

    return pieces;
}

function isHighSurrogate(code: number): boolean {
    return code >= 0xd800 && code <= 0xdbff;
}

function findSection(text: string, offset: number): string | undefined {
    HEADING_PATTERN.lastIndex = 0;
    let section: string | undefined;
    let match: RegExpExecArray | null;
    while ((match = HEADING_PATTERN.exec(text)) !== null && match.index <= offset) {
        section = match[2].trim();
    }
    return section;
}

// =============================================================================
// Public helpers
// =============================================================================

/**
 * Throws a CONFIG_ERROR for sizes no strategy can honour
 */
export function validateChunkerConfig(config: ChunkerConfig): void {
    const { chunkSize, chunkOverlap } = config;

    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new RAGError(`chunkSize must be a positive integer, got ${chunkSize}`, 'CONFIG_ERROR');
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
        throw new RAGError(
            `chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`,
            'CONFIG_ERROR'
        );
    }
}

/**
 * Chunk text with an explicit policy
 */
export function chunkText(
    text: string,
    strategy: ChunkingStrategy,
    chunkSize: number,
    chunkOverlap: number
): Chunk[] {
    return new TextChunker({ strategy, chunkSize, chunkOverlap }).chunk(text);
}

/**
 * Rebuild the source text, dropping the overlapping prefix of each chunk
 */
export function reconstructText(chunks: Chunk[]): string {
    const ordered = [...chunks].sort((a, b) => a.index - b.index);
    let text = '';
    let covered = 0;

    for (const chunk of ordered) {
        if (chunk.endOffset <= covered) continue;
        const skip = Math.max(0, covered - chunk.startOffset);
        text += chunk.content.slice(skip);
        covered = chunk.endOffset;
    }

    return text;
}

/**
 * Estimate token count (CJK-aware)
 */
export function estimateTokens(text: string): number {
    const cjk = text.match(CJK_PATTERN)?.length ?? 0;
    const other = text.length - cjk;
    return Math.ceil(cjk / CJK_CHARS_PER_TOKEN + other / CHARS_PER_TOKEN);
}

/**
 * Generate content hash for change detection
 */
export function generateContentHash(content: string): string {
    return createHash('sha256').update(content).digest('hex');
}
