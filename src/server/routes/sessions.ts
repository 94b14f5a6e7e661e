import type { Request, Response } from "express";
import { SessionNotFoundError } from "../../utils/errors";
import type { ServerContext } from "../utils/context";
import { respondWithError } from "../utils/errors";
import { removeUploadDir } from "../utils/uploads";

export function handleGetSessionRequest(req: Request, res: Response, context: ServerContext): void {
    const { sessionId } = req.params;

    try {
        const session = context.sessions.require(sessionId);
        res.json({
            sessionId: session.id,
            filename: session.filename,
            createdAt: session.createdAt,
            chunks: session.chunks.length,
            summary: session.summary ?? null,
        });
    } catch (error) {
        respondWithError(res, error, context.logger, "Session lookup");
    }
}

export function handleListSessionsRequest(_req: Request, res: Response, context: ServerContext): void {
    res.json({ sessions: context.sessions.list() });
}

export async function handleDeleteSessionRequest(req: Request, res: Response, context: ServerContext): Promise<void> {
    const { sessionId } = req.params;
    const logger = context.logger.child({ route: "deleteSession", sessionId });

    try {
        const session = context.sessions.delete(sessionId);
        if (!session) {
            throw new SessionNotFoundError(sessionId);
        }

        if (session.uploadDir) {
            await removeUploadDir(session.uploadDir, logger);
        }

        logger.info("Session deleted.");
        res.json({ message: "Session deleted successfully" });
    } catch (error) {
        respondWithError(res, error, logger, "Session delete");
    }
}
