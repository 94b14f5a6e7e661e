import type { Request, Response } from "express";
import type { ServerContext } from "../utils/context";
import { readBody, readNonEmptyString } from "../utils/body";
import { respondWithError, sendError } from "../utils/errors";

function readQuestionId(value: unknown): number | undefined {
    if (typeof value === "number") {
        return value;
    }
    if (typeof value === "string" && /^\d+$/.test(value.trim())) {
        return Number.parseInt(value, 10);
    }
    return undefined;
}

export async function handleEvaluateRequest(req: Request, res: Response, context: ServerContext): Promise<void> {
    const body = readBody(req);
    const sessionId = readNonEmptyString(body, "sessionId");
    const questionId = readQuestionId(body.questionId);
    const answer = readNonEmptyString(body, "answer");

    if (!sessionId || questionId === undefined || !answer) {
        sendError(res, 400, "Request body must include 'sessionId', numeric 'questionId' and non-empty 'answer' fields.");
        return;
    }

    try {
        const session = context.sessions.require(sessionId);
        const evaluation = await context.assistant.evaluateAnswer(session, questionId, answer);
        res.json({
            score: evaluation.score,
            feedback: evaluation.feedback,
            correctAnswer: evaluation.correctAnswer,
            source: evaluation.documentReference,
        });
    } catch (error) {
        respondWithError(res, error, context.logger.child({ route: "evaluate", sessionId }), "Evaluate");
    }
}
