import { describe, expect, it } from "vitest";
import { parseIngestArgs } from "../args";

describe("parseIngestArgs", () => {
    it("collects the file, repeated questions and the config path", () => {
        expect(
            parseIngestArgs(["report.pdf", "-q", "What is it about?", "--question", "Who wrote it?", "-c", ".env.local"])
        ).toEqual({
            filePath: "report.pdf",
            configPath: ".env.local",
            questions: ["What is it about?", "Who wrote it?"],
            help: false,
        });
    });

    it("recognizes the help flag", () => {
        expect(parseIngestArgs(["--help"])).toEqual({ questions: [], help: true });
    });

    it("rejects missing option values and unexpected arguments", () => {
        expect(() => parseIngestArgs(["report.pdf", "--question"])).toThrow("The --question option requires a value.");
        expect(() => parseIngestArgs(["a.txt", "b.txt"])).toThrow("Unexpected argument: b.txt");
        expect(() => parseIngestArgs(["--verbose"])).toThrow("Unknown option: --verbose");
    });
});
