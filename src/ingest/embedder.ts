import type { EmbeddingProvider, EmbedOptions } from "../llm/types";
import { EmbeddingMismatchError } from "../utils/errors";
import type { Chunk, EmbeddedChunk } from "./types";

/**
 * Embeds every chunk of one document in a single batch call. Either all chunks come back
 * embedded (frozen, in input order) or the call rejects.
 */
export async function embedChunks(
    chunks: readonly Chunk[],
    embedder: EmbeddingProvider,
    options?: EmbedOptions
): Promise<EmbeddedChunk[]> {
    if (chunks.length === 0) {
        return [];
    }

    const embeddings = await embedder.embedDocuments(
        chunks.map((chunk) => chunk.content),
        options
    );

    if (embeddings.length !== chunks.length) {
        throw new EmbeddingMismatchError(chunks.length, embeddings.length);
    }

    return chunks.map((chunk, index) =>
        Object.freeze({
            ...chunk,
            embedding: Object.freeze([...embeddings[index]]),
        })
    );
}
