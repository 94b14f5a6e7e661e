import { describe, expect, it } from "vitest";
import { batchChunks } from "../batchChunks";
import { mergeLimits, resolveBaseUrl } from "../providerUtils";
import { countTokens, TiktokenTokenizer } from "../tokenEncoder";

describe("batchChunks", () => {
    it("splits items into ordered batches", () => {
        expect(batchChunks([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
        expect(batchChunks([], 3)).toEqual([]);
    });

    it("rejects non-positive batch sizes", () => {
        expect(() => batchChunks([1], 0)).toThrow("batchSize must be a positive integer, got: 0");
    });
});

describe("providerUtils", () => {
    it("drops a trailing slash from base URLs", () => {
        expect(resolveBaseUrl("https://llm.example.test/v1/")).toBe("https://llm.example.test/v1");
        expect(resolveBaseUrl(undefined)).toBeUndefined();
    });

    it("overrides only the limits that are set", () => {
        expect(
            mergeLimits({ batchSize: 100, concurrency: 4, retries: 6 }, { concurrency: 2, retries: undefined })
        ).toEqual({ batchSize: 100, concurrency: 2, retries: 6 });
    });
});

describe("TiktokenTokenizer", () => {
    const tokenizer = new TiktokenTokenizer("gpt-3.5-turbo");

    it("decodes what it encodes", () => {
        const tokens = tokenizer.encode("Retrieval keeps answers grounded.");

        expect(tokens.length).toBeGreaterThan(0);
        expect(tokenizer.count("Retrieval keeps answers grounded.")).toBe(tokens.length);
        expect(tokenizer.decode(tokens)).toBe("Retrieval keeps answers grounded.");
    });

    it("handles empty input and special tokens in document text", () => {
        expect(tokenizer.encode("")).toEqual([]);
        expect(tokenizer.decode([])).toBe("");
        expect(tokenizer.count("before <|endoftext|> after")).toBeGreaterThan(3);
        expect(countTokens("")).toBe(0);
    });

    it("falls back to the default encoding for unknown models", () => {
        expect(new TiktokenTokenizer("not-a-real-model").count("hello world")).toBe(2);
    });
});
