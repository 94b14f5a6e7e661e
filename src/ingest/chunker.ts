import type { Tokenizer } from "../utils/tokenEncoder";
import type { Chunk } from "./types";

export interface ChunkingOptions {
    maxTokens: number;
    overlapTokens: number;
}

export const DEFAULT_CHUNKING_OPTIONS: Readonly<ChunkingOptions> = {
    maxTokens: 1000,
    overlapTokens: 200,
};

const PARAGRAPH_SEPARATOR = "\n\n";
const PARAGRAPH_BREAK = /\n[^\S\n]*\n\s*/;
const PAGE_MARKER = /^--- Page (\d+) ---$/;

interface Paragraph {
    text: string;
    start: number;
    end: number;
}

function splitParagraphs(text: string): Paragraph[] {
    const paragraphs: Paragraph[] = [];

    const push = (raw: string, offset: number) => {
        const trimmed = raw.trim();
        if (!trimmed) return;
        const start = offset + (raw.length - raw.trimStart().length);
        paragraphs.push({ text: trimmed, start, end: start + trimmed.length });
    };

    const pattern = new RegExp(PARAGRAPH_BREAK.source, "g");
    let cursor = 0;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(text)) !== null) {
        push(text.slice(cursor, match.index), cursor);
        cursor = match.index + match[0].length;
    }
    push(text.slice(cursor), cursor);

    return paragraphs;
}

function assertOptions({ maxTokens, overlapTokens }: ChunkingOptions): void {
    if (!Number.isInteger(maxTokens) || maxTokens < 1) {
        throw new RangeError(`maxTokens must be a positive integer, got: ${maxTokens}`);
    }
    if (!Number.isInteger(overlapTokens) || overlapTokens < 0) {
        throw new RangeError(`overlapTokens must be a non-negative integer, got: ${overlapTokens}`);
    }
}

/**
 * Seeds the buffer that follows a split: the decoded tail of the finalized chunk, then the
 * paragraph that did not fit. The tail is at most `overlapTokens` long and is shortened
 * further when tail and paragraph together would exceed `maxTokens`.
 */
function seedWithOverlap(
    previous: string,
    paragraph: string,
    tokenizer: Tokenizer,
    { maxTokens, overlapTokens }: ChunkingOptions
): { text: string; overlapLength: number } {
    const tokens = tokenizer.encode(previous);
    let budget = Math.min(overlapTokens, tokens.length);

    while (budget > 0) {
        // A slice can start inside a multi-byte character, which decodes to U+FFFD
        const overlap = tokenizer
            .decode(tokens.slice(tokens.length - budget))
            .replace(/^\uFFFD+/, "")
            .trim();
        if (!overlap) break;

        const seeded = `${overlap} ${paragraph}`;
        const excess = tokenizer.count(seeded) - maxTokens;
        if (excess <= 0) {
            return { text: seeded, overlapLength: overlap.length + 1 };
        }
        budget -= excess;
    }

    return { text: paragraph, overlapLength: 0 };
}

/**
 * Splits cleaned document text into chunks of at most `maxTokens` tokens.
 *
 * Paragraphs (separated by blank lines) are never split: one that alone exceeds the budget
 * becomes its own oversized chunk. Each chunk after a split starts with the last
 * `overlapTokens` tokens of its predecessor. `--- Page N ---` paragraphs set the
 * `pageNumber` of the chunks that follow them.
 */
export function chunkText(
    text: string,
    tokenizer: Tokenizer,
    options: ChunkingOptions = DEFAULT_CHUNKING_OPTIONS
): Chunk[] {
    assertOptions(options);

    const chunks: Chunk[] = [];
    let buffer = "";
    let bufferStart = 0;
    let bufferEnd = 0;
    let bufferPage: number | undefined;
    let currentPage: number | undefined;

    const flush = () => {
        const content = buffer.trim();
        if (!content) return;

        const pageNumber = bufferPage ?? currentPage;
        chunks.push({
            content,
            ...(pageNumber !== undefined ? { pageNumber } : {}),
            startPos: bufferStart,
            endPos: bufferEnd,
        });
    };

    for (const paragraph of splitParagraphs(text)) {
        const marker = PAGE_MARKER.exec(paragraph.text);
        const candidate = buffer ? `${buffer}${PARAGRAPH_SEPARATOR}${paragraph.text}` : paragraph.text;

        if (buffer && tokenizer.count(candidate) > options.maxTokens) {
            flush();

            const previousStart = bufferStart;
            const seeded = seedWithOverlap(buffer.trim(), paragraph.text, tokenizer, options);
            buffer = seeded.text;
            bufferStart = Math.max(previousStart, paragraph.start - seeded.overlapLength);
            bufferPage = undefined;
        } else {
            if (!buffer) {
                bufferStart = paragraph.start;
            }
            buffer = candidate;
        }

        bufferEnd = paragraph.end;

        if (marker) {
            currentPage = Number(marker[1]);
        } else if (bufferPage === undefined) {
            bufferPage = currentPage;
        }
    }

    flush();

    return chunks;
}
