import path from "node:path";
import type { Logger } from "pino";
import type { EmbeddingProvider } from "../llm/types";
import { childLogger } from "../utils/logger";
import type { Tokenizer } from "../utils/tokenEncoder";
import { chunkText, DEFAULT_CHUNKING_OPTIONS, type ChunkingOptions } from "./chunker";
import { embedChunks } from "./embedder";
import { extractText } from "./extractor";
import type { EmbeddedChunk } from "./types";

export interface IngestionDependencies {
    tokenizer: Tokenizer;
    embedding: EmbeddingProvider;
    chunking?: ChunkingOptions;
    logger?: Logger;
    signal?: AbortSignal;
}

export interface IngestionStats {
    characters: number;
    chunks: number;
    oversizedChunks: number;
    pages: number;
}

export interface IngestionResult {
    chunks: EmbeddedChunk[];
    stats: IngestionStats;
}

/**
 * Extracts, cleans, chunks and embeds one document. Resolves only once every chunk has
 * its embedding; any failure rejects the whole ingestion.
 */
export async function ingestDocument(filePath: string, deps: IngestionDependencies): Promise<IngestionResult> {
    const chunking = deps.chunking ?? DEFAULT_CHUNKING_OPTIONS;
    const ingestionLogger = childLogger(deps.logger, { module: "ingest", file: path.basename(filePath) });

    const text = await extractText(filePath, ingestionLogger);
    const chunks = chunkText(text, deps.tokenizer, chunking);

    const pages = new Set(chunks.flatMap((chunk) => (chunk.pageNumber !== undefined ? [chunk.pageNumber] : []))).size;
    const oversizedChunks = chunks.filter((chunk) => deps.tokenizer.count(chunk.content) > chunking.maxTokens).length;

    if (chunks.length === 0) {
        ingestionLogger.warn("No text could be extracted; the document has no chunks.");
    } else {
        ingestionLogger.info(
            `Embedding ${chunks.length} chunk${chunks.length === 1 ? "" : "s"} using ${deps.embedding.config.provider}.`
        );
    }

    const embedded = await embedChunks(chunks, deps.embedding, { signal: deps.signal });

    const stats: IngestionStats = {
        characters: text.length,
        chunks: embedded.length,
        oversizedChunks,
        pages,
    };
    ingestionLogger.info({ stats }, "Document ingested.");

    return { chunks: embedded, stats };
}
