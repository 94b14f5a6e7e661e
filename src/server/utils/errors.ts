import type { Response } from "express";
import type { Logger } from "pino";
import { DocumentAssistantError, type DocumentAssistantErrorCode } from "../../utils/errors";

const STATUS_BY_CODE: Record<DocumentAssistantErrorCode, number> = {
    UNSUPPORTED_FORMAT: 400,
    INVALID_QUESTION: 400,
    SESSION_NOT_FOUND: 404,
    EXTRACTION_FAILED: 422,
    EMBEDDING_MISMATCH: 500,
    MALFORMED_RESPONSE: 500,
};

function readHttpStatus(error: unknown): number | undefined {
    // body-parser attaches the status it wants (413 for oversized bodies, 400 for bad JSON)
    if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
        return error.status >= 400 && error.status < 600 ? error.status : undefined;
    }
    return undefined;
}

export function statusForError(error: unknown): number {
    if (error instanceof DocumentAssistantError) {
        return STATUS_BY_CODE[error.code];
    }
    return readHttpStatus(error) ?? 500;
}

export function sendError(res: Response, status: number, message: string): void {
    res.status(status).json({ status: "error", message });
}

/**
 * Answers with the status mapped from `error`. Server-side failures are logged at error
 * level, client mistakes at warn.
 */
export function respondWithError(res: Response, error: unknown, logger: Logger, context: string): void {
    const status = statusForError(error);
    const message = error instanceof Error ? error.message : String(error);

    if (status >= 500) {
        logger.error({ err: error }, `${context} failed.`);
    } else {
        logger.warn({ status, error: message }, `${context} rejected.`);
    }

    sendError(res, status, message);
}
