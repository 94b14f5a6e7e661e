import type { Request, Response } from "express";
import type { ServerContext } from "../utils/context";
import { readBody, readNonEmptyString } from "../utils/body";
import { respondWithError, sendError } from "../utils/errors";

export async function handleAskRequest(req: Request, res: Response, context: ServerContext): Promise<void> {
    const body = readBody(req);
    const sessionId = readNonEmptyString(body, "sessionId");
    const question = readNonEmptyString(body, "question");

    if (!sessionId || !question) {
        sendError(res, 400, "Request body must include non-empty 'sessionId' and 'question' fields.");
        return;
    }

    try {
        const session = context.sessions.require(sessionId);
        const response = await context.assistant.answerQuestion(session, question);
        res.json(response);
    } catch (error) {
        respondWithError(res, error, context.logger.child({ route: "ask", sessionId }), "Ask");
    }
}
