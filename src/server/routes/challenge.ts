import type { Request, Response } from "express";
import type { ServerContext } from "../utils/context";
import { readBody, readNonEmptyString } from "../utils/body";
import { respondWithError, sendError } from "../utils/errors";

const CHALLENGE_INSTRUCTIONS = "Answer these questions based on the document content.";

export async function handleChallengeRequest(req: Request, res: Response, context: ServerContext): Promise<void> {
    const sessionId = readNonEmptyString(readBody(req), "sessionId");
    if (!sessionId) {
        sendError(res, 400, "Request body must include a non-empty 'sessionId' field.");
        return;
    }

    try {
        const session = context.sessions.require(sessionId);
        const questions = await context.assistant.generateChallengeQuestions(session);
        res.json({ questions, instructions: CHALLENGE_INSTRUCTIONS });
    } catch (error) {
        respondWithError(res, error, context.logger.child({ route: "challenge", sessionId }), "Challenge");
    }
}
