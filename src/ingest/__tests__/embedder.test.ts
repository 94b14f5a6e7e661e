import { describe, expect, it } from "vitest";
import { embedChunks } from "../embedder";
import type { Chunk } from "../types";
import type { EmbeddingProvider } from "../../llm/types";
import { EmbeddingMismatchError } from "../../utils/errors";
import { KeywordEmbeddingProvider } from "../../__tests__/helpers/fakes";

const chunks: Chunk[] = [
    { content: "solar solar wind", startPos: 0, endPos: 16 },
    { content: "wind only", pageNumber: 2, startPos: 18, endPos: 27 },
];

describe("embedChunks", () => {
    it("embeds all chunks in one call and keeps their order", async () => {
        const embedder = new KeywordEmbeddingProvider(["solar", "wind"]);

        const embedded = await embedChunks(chunks, embedder);

        expect(embedder.documentCalls).toEqual([["solar solar wind", "wind only"]]);
        expect(embedded).toEqual([
            { content: "solar solar wind", startPos: 0, endPos: 16, embedding: [2, 1] },
            { content: "wind only", pageNumber: 2, startPos: 18, endPos: 27, embedding: [0, 1] },
        ]);
        expect(Object.isFrozen(embedded[0])).toBe(true);
        expect(Object.isFrozen(embedded[0].embedding)).toBe(true);
    });

    it("does not call the provider for an empty document", async () => {
        const embedder = new KeywordEmbeddingProvider(["solar"]);

        await expect(embedChunks([], embedder)).resolves.toEqual([]);
        expect(embedder.documentCalls).toEqual([]);
    });

    it("rejects when the provider returns the wrong number of vectors", async () => {
        const shortProvider: EmbeddingProvider = {
            config: { provider: "openai", model: "fake-embedding" },
            embedDocuments: async () => [[1, 0]],
            embedQuery: async () => [1, 0],
        };

        await expect(embedChunks(chunks, shortProvider)).rejects.toBeInstanceOf(EmbeddingMismatchError);
    });
});
