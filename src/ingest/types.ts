/**
 * A token-bounded segment of one document's cleaned text. Offsets point into that text and are
 * approximate once overlap text has been carried over from the previous chunk.
 */
export interface Chunk {
    readonly content: string;
    readonly pageNumber?: number;
    readonly startPos: number;
    readonly endPos: number;
}

/** A chunk whose embedding has been computed. Only these can be retrieved. */
export interface EmbeddedChunk extends Chunk {
    readonly embedding: readonly number[];
}

/** External representation of a chunk: everything except the embedding. */
export interface ChunkView {
    content: string;
    pageNumber: number | null;
    startPos: number;
    endPos: number;
}

export function toChunkView(chunk: Chunk): ChunkView {
    return {
        content: chunk.content,
        pageNumber: chunk.pageNumber ?? null,
        startPos: chunk.startPos,
        endPos: chunk.endPos,
    };
}
