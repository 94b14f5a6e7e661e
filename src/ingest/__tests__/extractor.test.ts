import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { extractRawText, extractText, resolveDocumentFormat } from "../extractor";
import { ExtractionError, UnsupportedFormatError } from "../../utils/errors";
import { silentLogger } from "../../__tests__/helpers/fakes";

interface FakeTextItem {
    str: string;
    hasEOL: boolean;
}

const pdfState = vi.hoisted(() => {
    const pages: FakeTextItem[][] = [];
    return { pages, fail: false, destroyed: 0 };
});

vi.mock("pdfjs-dist/legacy/build/pdf.mjs", () => ({
    getDocument: vi.fn(() => ({
        promise: pdfState.fail
            ? Promise.reject(new Error("Invalid PDF structure."))
            : Promise.resolve({
                  numPages: pdfState.pages.length,
                  getPage: async (pageNumber: number) => ({
                      getTextContent: async () => ({ items: pdfState.pages[pageNumber - 1] }),
                      cleanup: () => undefined,
                  }),
              }),
        destroy: async () => {
            pdfState.destroyed += 1;
        },
    })),
}));

describe("extractor", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "extractor-test-"));
        pdfState.pages = [];
        pdfState.fail = false;
        pdfState.destroyed = 0;
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it("resolves formats by extension, case-insensitively", () => {
        expect(resolveDocumentFormat("report.PDF")).toBe(".pdf");
        expect(resolveDocumentFormat("notes.txt")).toBe(".txt");
        expect(() => resolveDocumentFormat("slides.pptx")).toThrow(UnsupportedFormatError);
    });

    it("rejects unsupported files before reading them", async () => {
        const missing = path.join(dir, "missing.docx");
        await expect(extractText(missing)).rejects.toThrow(
            "Unsupported file format: .docx. Only .pdf and .txt files are supported."
        );
    });

    it("reads and cleans UTF-8 text files", async () => {
        const file = path.join(dir, "notes.TXT");
        await fs.writeFile(file, "Hello   world\n\n\nSecond\nparagraph", "utf8");

        await expect(extractText(file, silentLogger)).resolves.toBe("Hello world\n\nSecond paragraph");
    });

    it("falls back to Latin-1 for invalid UTF-8", async () => {
        const file = path.join(dir, "legacy.txt");
        await fs.writeFile(file, Buffer.from([0x63, 0x61, 0x66, 0xe9]));

        await expect(extractText(file, silentLogger)).resolves.toBe("café");
    });

    it("wraps I/O failures in ExtractionError", async () => {
        const error = await extractText(path.join(dir, "absent.txt"), silentLogger).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(ExtractionError);
        expect(error).toMatchObject({ code: "EXTRACTION_FAILED" });
    });

    it("prefixes PDF pages with markers and skips empty pages", async () => {
        pdfState.pages = [
            [
                { str: "First page", hasEOL: true },
                { str: "text.", hasEOL: false },
            ],
            [],
            [
                { str: "Third", hasEOL: false },
                { str: "page", hasEOL: false },
            ],
        ];
        const file = path.join(dir, "doc.pdf");
        await fs.writeFile(file, "%PDF-1.4 placeholder");

        await expect(extractRawText(file, silentLogger)).resolves.toBe(
            "--- Page 1 ---\n\nFirst page\ntext.\n\n--- Page 3 ---\n\nThird page"
        );
        await expect(extractText(file, silentLogger)).resolves.toBe(
            "--- Page 1 ---\n\nFirst page text.\n\n--- Page 3 ---\n\nThird page"
        );
        expect(pdfState.destroyed).toBe(2);
    });

    it("reports corrupt PDFs as ExtractionError", async () => {
        pdfState.fail = true;
        const file = path.join(dir, "broken.pdf");
        await fs.writeFile(file, "not a pdf");

        await expect(extractText(file, silentLogger)).rejects.toBeInstanceOf(ExtractionError);
        expect(pdfState.destroyed).toBe(1);
    });
});
