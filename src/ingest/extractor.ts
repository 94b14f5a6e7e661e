import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { ExtractionError, UnsupportedFormatError } from "../utils/errors";
import { childLogger } from "../utils/logger";
import { cleanText } from "./cleanText";

export const SUPPORTED_EXTENSIONS = [".pdf", ".txt"] as const;

export type DocumentFormat = (typeof SUPPORTED_EXTENSIONS)[number];

export function formatPageMarker(pageNumber: number): string {
    return `--- Page ${pageNumber} ---`;
}

/**
 * Maps a file name to its document format by extension, case-insensitively.
 * Throws `UnsupportedFormatError` for anything but .pdf and .txt.
 */
export function resolveDocumentFormat(filePath: string): DocumentFormat {
    const extension = path.extname(filePath).toLowerCase();
    const format = SUPPORTED_EXTENSIONS.find((candidate) => candidate === extension);
    if (!format) {
        throw new UnsupportedFormatError(extension);
    }
    return format;
}

async function extractPdfPages(data: Uint8Array): Promise<string[]> {
    // The legacy build carries the polyfills Node 20 needs
    const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs");
    const loadingTask = getDocument({ data, useSystemFonts: true, isEvalSupported: false });

    try {
        const pdfDocument = await loadingTask.promise;
        const pages: string[] = [];
        for (let pageNumber = 1; pageNumber <= pdfDocument.numPages; pageNumber++) {
            const page = await pdfDocument.getPage(pageNumber);
            const textContent = await page.getTextContent();
            const pageText = textContent.items
                .map((item) => ("str" in item ? `${item.str}${item.hasEOL ? "\n" : " "}` : ""))
                .join("")
                .trim();

            if (pageText) {
                pages.push(`${formatPageMarker(pageNumber)}\n\n${pageText}`);
            }
            page.cleanup();
        }
        return pages;
    } finally {
        await loadingTask.destroy();
    }
}

function decodePlainText(buffer: Buffer, logger: Logger): string {
    try {
        return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
    } catch {
        logger.debug("File is not valid UTF-8; decoding as Latin-1.");
        return buffer.toString("latin1");
    }
}

/**
 * Reads a .pdf or .txt file and returns its raw text. PDF pages are prefixed with
 * `--- Page N ---` markers; pages without extractable text are skipped.
 */
export async function extractRawText(filePath: string, logger?: Logger): Promise<string> {
    const format = resolveDocumentFormat(filePath);
    const extractLogger = childLogger(logger, { module: "extractor", file: path.basename(filePath) });

    try {
        const buffer = await fs.readFile(filePath);

        if (format === ".txt") {
            return decodePlainText(buffer, extractLogger);
        }

        const pages = await extractPdfPages(new Uint8Array(buffer));
        extractLogger.debug({ pages: pages.length }, "Extracted PDF text.");
        return pages.join("\n\n");
    } catch (error) {
        throw new ExtractionError(filePath, error);
    }
}

export async function extractText(filePath: string, logger?: Logger): Promise<string> {
    return cleanText(await extractRawText(filePath, logger));
}
