import express, { Router } from "express";
import type { ServerContext } from "../utils/context";
import { handleAskRequest } from "../routes/ask";
import { handleChallengeRequest } from "../routes/challenge";
import { handleEvaluateRequest } from "../routes/evaluate";
import { handleHealthRequest, handleRootRequest } from "../routes/health";
import {
    handleDeleteSessionRequest,
    handleGetSessionRequest,
    handleListSessionsRequest,
} from "../routes/sessions";
import { handleUploadRequest } from "../routes/upload";

export function createApiRouter(context: ServerContext): Router {
    const router = Router();

    router.get("/", (req, res) => {
        handleRootRequest(req, res);
    });

    router.get("/health", (req, res) => {
        handleHealthRequest(req, res, context.sessions);
    });

    router.post(
        "/upload",
        express.raw({ type: () => true, limit: context.config.server.maxUploadBytes }),
        async (req, res) => {
            await handleUploadRequest(req, res, context);
        }
    );

    router.post("/ask", async (req, res) => {
        await handleAskRequest(req, res, context);
    });

    router.post("/challenge", async (req, res) => {
        await handleChallengeRequest(req, res, context);
    });

    router.post("/evaluate", async (req, res) => {
        await handleEvaluateRequest(req, res, context);
    });

    router.get("/sessions", (req, res) => {
        handleListSessionsRequest(req, res, context);
    });

    router.get("/session/:sessionId", (req, res) => {
        handleGetSessionRequest(req, res, context);
    });

    router.delete("/session/:sessionId", async (req, res) => {
        await handleDeleteSessionRequest(req, res, context);
    });

    return router;
}
