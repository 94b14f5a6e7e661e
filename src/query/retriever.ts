import type { Chunk, EmbeddedChunk } from "../ingest/types";
import type { EmbedOptions, EmbeddingProvider } from "../llm/types";

export const DEFAULT_TOP_K = 5;
export const DEFAULT_CONTEXT_WINDOW = 2;

export interface RankedChunk<C extends EmbeddedChunk = EmbeddedChunk> {
    chunk: C;
    similarity: number;
}

/**
 * Cosine similarity of two vectors of equal length. A zero vector has similarity 0 with
 * everything.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
        throw new RangeError(`Cannot compare vectors of different dimensions (${a.length} and ${b.length}).`);
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) {
        return 0;
    }
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function isZeroVector(vector: readonly number[]): boolean {
    return vector.every((value) => value === 0);
}

/**
 * Scores every chunk against the query vector, most similar first; ties keep document order.
 * Chunks with an all-zero embedding score 0 and rank after every other chunk.
 */
export function rankChunks<C extends EmbeddedChunk>(chunks: readonly C[], queryEmbedding: readonly number[]): RankedChunk<C>[] {
    return chunks
        .map((chunk) => ({
            chunk,
            similarity: cosineSimilarity(queryEmbedding, chunk.embedding),
            zero: isZeroVector(chunk.embedding),
        }))
        .sort((a, b) => Number(a.zero) - Number(b.zero) || b.similarity - a.similarity)
        .map(({ chunk, similarity }) => ({ chunk, similarity }));
}

/**
 * Embeds `query` and returns up to `topK` chunks ranked by cosine similarity.
 * An empty chunk list short-circuits without calling the embedder.
 */
export async function findRelevantChunks<C extends EmbeddedChunk>(
    chunks: readonly C[],
    query: string,
    embedder: EmbeddingProvider,
    topK: number = DEFAULT_TOP_K,
    options?: EmbedOptions
): Promise<C[]> {
    if (chunks.length === 0 || topK <= 0) {
        return [];
    }

    const queryEmbedding = await embedder.embedQuery(query, options);
    return rankChunks(chunks, queryEmbedding)
        .slice(0, topK)
        .map((entry) => entry.chunk);
}

/**
 * Picks `count` chunks spread evenly over the document, in document order: indices
 * 0, step, 2*step, ... with step = floor(chunks / count).
 */
export function selectDiverseChunks<C extends Chunk>(chunks: readonly C[], count: number): C[] {
    if (count <= 0) {
        return [];
    }
    if (chunks.length <= count) {
        return [...chunks];
    }

    const step = Math.floor(chunks.length / count);
    const selected: C[] = [];
    for (let i = 0; i < count; i++) {
        selected.push(chunks[i * step]);
    }
    return selected;
}

/**
 * Text of the target chunk with up to `contextSize` neighbours on each side, joined by
 * blank lines.
 */
export function getChunkContext<C extends Chunk>(
    chunks: readonly C[],
    target: C,
    contextSize: number = DEFAULT_CONTEXT_WINDOW
): string {
    const targetIndex = chunks.indexOf(target);
    if (targetIndex === -1) {
        throw new RangeError("Target chunk is not part of the given chunk sequence.");
    }

    const window = Math.max(0, Math.floor(contextSize));
    const start = Math.max(0, targetIndex - window);
    const end = Math.min(chunks.length, targetIndex + window + 1);

    return chunks
        .slice(start, end)
        .map((chunk) => chunk.content)
        .join("\n\n");
}
