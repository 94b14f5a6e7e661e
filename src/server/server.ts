import type { Server } from "node:http";
import express, { type NextFunction, type Request, type Response } from "express";
import { DocumentAssistant } from "../assistant/documentAssistant";
import { loadAppConfig } from "../config/loadConfig";
import { createLLMClient } from "../llm/factory";
import { InMemorySessionStore } from "../session/store";
import { configureLogger } from "../utils/logger";
import { TiktokenTokenizer } from "../utils/tokenEncoder";
import { createApiRouter } from "./routers/api";
import { applyCors } from "./utils/cors";
import type { ServerContext } from "./utils/context";
import { respondWithError } from "./utils/errors";

export interface ServerOptions {
    configPath?: string;
    port?: number;
}

type ExpressApp = ReturnType<typeof express>;

export interface RunningServer {
    app: ExpressApp;
    port: number;
    close(): Promise<void>;
}

async function createContext(configPath?: string): Promise<ServerContext> {
    const config = await loadAppConfig(configPath);

    const logger = configureLogger(config.logging);
    logger.info("Loaded server configuration.");

    const llm = createLLMClient(config.llm, logger);

    return {
        config,
        llm,
        tokenizer: new TiktokenTokenizer(config.chunking.tokenizerModel),
        sessions: new InMemorySessionStore(),
        assistant: new DocumentAssistant({
            chat: llm.chat,
            embedding: llm.embedding,
            assistant: config.assistant,
            retrieval: config.retrieval,
            logger,
        }),
        logger,
    };
}

/** Wires the API onto a fresh Express app around an existing context. */
export function createApp(context: ServerContext): ExpressApp {
    const app = express();
    app.use(express.json());
    app.use(applyCors);
    app.use(createApiRouter(context));

    // Body parser failures (oversized upload, invalid JSON) land here
    app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            next(error);
            return;
        }
        respondWithError(res, error, context.logger, "Request");
    });

    return app;
}

export async function createServer(options: ServerOptions = {}): Promise<{ app: ExpressApp; context: ServerContext }> {
    const context = await createContext(options.configPath);
    return { app: createApp(context), context };
}

export async function listen(app: ExpressApp, port: number): Promise<Server> {
    return new Promise((resolve, reject) => {
        const listener = app
            .listen(port, () => {
                listener.off("error", reject);
                resolve(listener);
            })
            .on("error", reject);
    });
}

export function closeServer(server: Server): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        server.close((error) => {
            if (error) {
                reject(error);
            } else {
                resolve();
            }
        });
    });
}

export async function startServer(options: ServerOptions = {}): Promise<RunningServer> {
    const { app, context } = await createServer(options);
    const port = options.port ?? context.config.server.port;

    const server = await listen(app, port);
    context.logger.info({ port, uploadDir: context.config.server.uploadDir }, "Server listening.");

    return {
        app,
        port,
        close: () => closeServer(server),
    };
}
