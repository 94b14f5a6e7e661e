import { NoObjectGeneratedError } from "ai";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { BaseChatProvider, BaseEmbeddingProvider, type ProviderRateLimits } from "../base";
import type { GenerateObjectOptions, GenerateTextOptions } from "../types";
import { EmbeddingMismatchError, MalformedResponseError } from "../../utils/errors";
import { silentLogger } from "../../__tests__/helpers/fakes";

class LengthEmbeddingProvider extends BaseEmbeddingProvider {
    readonly batches: string[][] = [];
    failuresLeft = 0;
    dropVector = false;

    constructor(limits: ProviderRateLimits) {
        super({ provider: "openai", model: "fake-embedding" }, limits, silentLogger);
    }

    protected async sendEmbeddingRequest(texts: string[]): Promise<number[][]> {
        this.batches.push(texts);
        if (this.failuresLeft > 0) {
            this.failuresLeft -= 1;
            throw new Error("temporary outage");
        }
        // Later batches finish first
        await new Promise((resolve) => setTimeout(resolve, 20 - this.batches.length * 5));
        const vectors = texts.map((text) => [text.length, 1]);
        return this.dropVector ? vectors.slice(1) : vectors;
    }
}

class ScriptedChatProvider extends BaseChatProvider {
    textReply = "  reply  ";
    objectError?: unknown;
    objectReply: unknown = { answer: "yes" };

    constructor() {
        super({ provider: "openai", model: "fake-chat", temperature: 0 }, { retries: 0 }, silentLogger);
    }

    protected async completeText(_options: GenerateTextOptions): Promise<string> {
        return this.textReply;
    }

    protected async completeObject<T>(options: GenerateObjectOptions<T>): Promise<T> {
        if (this.objectError) {
            throw this.objectError;
        }
        return options.schema.parse(this.objectReply);
    }
}

describe("BaseEmbeddingProvider", () => {
    it("batches requests and reassembles vectors in input order", async () => {
        const provider = new LengthEmbeddingProvider({ batchSize: 2, concurrency: 3, retries: 0 });

        const vectors = await provider.embedDocuments(["a", "bb", "ccc", "dddd", "eeeee"]);

        expect(provider.batches).toEqual([["a", "bb"], ["ccc", "dddd"], ["eeeee"]]);
        expect(vectors).toEqual([[1, 1], [2, 1], [3, 1], [4, 1], [5, 1]]);
        await expect(provider.embedQuery("four")).resolves.toEqual([4, 1]);
    });

    it("retries failed requests", async () => {
        const provider = new LengthEmbeddingProvider({ batchSize: 10, retries: 1 });
        provider.failuresLeft = 1;

        await expect(provider.embedDocuments(["x"])).resolves.toEqual([[1, 1]]);
        expect(provider.batches).toHaveLength(2);
    });

    it("rejects batches with a wrong vector count", async () => {
        const provider = new LengthEmbeddingProvider({ batchSize: 10, retries: 0 });
        provider.dropVector = true;

        await expect(provider.embedDocuments(["x", "y"])).rejects.toBeInstanceOf(EmbeddingMismatchError);
    });

    it("returns nothing for no input without calling the API", async () => {
        const provider = new LengthEmbeddingProvider({ retries: 0 });

        await expect(provider.embedDocuments([])).resolves.toEqual([]);
        expect(provider.batches).toEqual([]);
    });
});

describe("BaseChatProvider", () => {
    const schema = z.object({ answer: z.string() });

    it("trims generated text", async () => {
        await expect(new ScriptedChatProvider().generateText({ prompt: "hi" })).resolves.toBe("reply");
    });

    it("returns parsed objects", async () => {
        await expect(new ScriptedChatProvider().generateObject({ prompt: "hi", schema })).resolves.toEqual({
            answer: "yes",
        });
    });

    it("reports schema mismatches as MalformedResponseError", async () => {
        const provider = new ScriptedChatProvider();
        provider.objectError = new NoObjectGeneratedError({
            text: "not json",
            response: { id: "response-1", timestamp: new Date(0), modelId: "fake-chat" },
            usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
            finishReason: "stop",
        });

        const error = await provider
            .generateObject({ prompt: "hi", schema, schemaName: "answer" })
            .catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(MalformedResponseError);
        expect(error).toMatchObject({
            message: "openai returned a response that does not match the answer schema.",
        });
    });

    it("passes other failures through", async () => {
        const provider = new ScriptedChatProvider();
        provider.objectError = new Error("unauthorized");

        await expect(provider.generateObject({ prompt: "hi", schema })).rejects.toThrow("unauthorized");
    });
});
