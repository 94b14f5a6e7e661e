import { randomUUID } from "node:crypto";
import type { ChunkView, EmbeddedChunk } from "../ingest/types";
import { SessionNotFoundError } from "../utils/errors";
import type { ChallengeQuestion } from "../assistant/types";

export interface ConversationEntry {
    question: string;
    answer: string;
    relevantChunks: ChunkView[];
}

export interface DocumentSession {
    readonly id: string;
    readonly filename: string;
    readonly createdAt: string;
    readonly chunks: readonly EmbeddedChunk[];
    /** Directory holding the uploaded file, removed with the session when set. */
    readonly uploadDir?: string;
    summary?: string;
    challengeQuestions?: ChallengeQuestion[];
    history: ConversationEntry[];
}

export interface CreateSessionInput {
    id?: string;
    filename: string;
    chunks: readonly EmbeddedChunk[];
    uploadDir?: string;
}

export interface SessionStore {
    create(input: CreateSessionInput): DocumentSession;
    get(sessionId: string): DocumentSession | undefined;
    /** Like `get`, but throws `SessionNotFoundError` for unknown ids. */
    require(sessionId: string): DocumentSession;
    list(): string[];
    delete(sessionId: string): DocumentSession | undefined;
    size(): number;
}

/**
 * Sessions held in process memory. Chunk arrays are frozen on creation and never change,
 * so concurrent reads of one session are safe.
 */
export class InMemorySessionStore implements SessionStore {
    private readonly sessions = new Map<string, DocumentSession>();

    create({ id, filename, chunks, uploadDir }: CreateSessionInput): DocumentSession {
        const sessionId = id ?? randomUUID();
        if (this.sessions.has(sessionId)) {
            throw new Error(`Session already exists: ${sessionId}`);
        }

        const session: DocumentSession = {
            id: sessionId,
            filename,
            createdAt: new Date().toISOString(),
            chunks: Object.freeze([...chunks]),
            ...(uploadDir ? { uploadDir } : {}),
            history: [],
        };
        this.sessions.set(sessionId, session);
        return session;
    }

    get(sessionId: string): DocumentSession | undefined {
        return this.sessions.get(sessionId);
    }

    require(sessionId: string): DocumentSession {
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new SessionNotFoundError(sessionId);
        }
        return session;
    }

    list(): string[] {
        return [...this.sessions.keys()];
    }

    delete(sessionId: string): DocumentSession | undefined {
        const session = this.sessions.get(sessionId);
        this.sessions.delete(sessionId);
        return session;
    }

    size(): number {
        return this.sessions.size;
    }
}
