import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type { Request, Response } from "express";
import { ingestDocument } from "../../ingest/pipeline";
import { resolveDocumentFormat } from "../../ingest/extractor";
import type { ServerContext } from "../utils/context";
import { respondWithError, sendError } from "../utils/errors";
import { removeUploadDir } from "../utils/uploads";

function readFilename(req: Request): string | undefined {
    const { filename } = req.query;
    if (typeof filename !== "string") {
        return undefined;
    }
    const basename = path.basename(filename.trim());
    return basename.length > 0 ? basename : undefined;
}

/**
 * Stores the uploaded bytes under a fresh session directory, ingests them and summarizes
 * the result. The session only exists once every chunk is embedded and the summary is written.
 */
export async function handleUploadRequest(req: Request, res: Response, context: ServerContext): Promise<void> {
    const filename = readFilename(req);
    if (!filename) {
        sendError(res, 400, "Query parameter 'filename' is required.");
        return;
    }

    const body: unknown = req.body;
    if (!Buffer.isBuffer(body) || body.length === 0) {
        sendError(res, 400, "Request body must contain the file contents.");
        return;
    }

    const sessionId = randomUUID();
    const uploadDir = path.join(context.config.server.uploadDir, sessionId);
    const logger = context.logger.child({ route: "upload", sessionId });

    try {
        resolveDocumentFormat(filename);

        await fs.mkdir(uploadDir, { recursive: true });
        const filePath = path.join(uploadDir, filename);
        await fs.writeFile(filePath, body);

        const startedAt = Date.now();
        const { chunks, stats } = await ingestDocument(filePath, {
            tokenizer: context.tokenizer,
            embedding: context.llm.embedding,
            chunking: context.config.chunking,
            logger,
        });

        const session = context.sessions.create({ id: sessionId, filename, chunks, uploadDir });
        try {
            await context.assistant.generateSummary(session);
        } catch (error) {
            context.sessions.delete(session.id);
            throw error;
        }

        logger.info({ stats, durationMs: Date.now() - startedAt }, "Document uploaded.");
        res.json({
            sessionId: session.id,
            filename: session.filename,
            chunks: session.chunks.length,
            summary: session.summary,
            status: "success",
        });
    } catch (error) {
        await removeUploadDir(uploadDir, logger);
        respondWithError(res, error, logger, "Upload");
    }
}
