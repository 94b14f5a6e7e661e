export type DocumentAssistantErrorCode =
    | "UNSUPPORTED_FORMAT"
    | "EXTRACTION_FAILED"
    | "EMBEDDING_MISMATCH"
    | "SESSION_NOT_FOUND"
    | "INVALID_QUESTION"
    | "MALFORMED_RESPONSE";

export class DocumentAssistantError extends Error {
    constructor(
        public readonly code: DocumentAssistantErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class UnsupportedFormatError extends DocumentAssistantError {
    constructor(public readonly extension: string) {
        super("UNSUPPORTED_FORMAT", `Unsupported file format: ${extension || "(none)"}. Only .pdf and .txt files are supported.`);
    }
}

export class ExtractionError extends DocumentAssistantError {
    constructor(public readonly filePath: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super("EXTRACTION_FAILED", `Failed to extract text from "${filePath}": ${reason}`, { cause });
    }
}

export class EmbeddingMismatchError extends DocumentAssistantError {
    constructor(expected: number, received: number) {
        super("EMBEDDING_MISMATCH", `Embedding generation returned ${received} vectors for ${expected} inputs.`);
    }
}

export class SessionNotFoundError extends DocumentAssistantError {
    constructor(public readonly sessionId: string) {
        super("SESSION_NOT_FOUND", `Session not found: ${sessionId}`);
    }
}

export class InvalidQuestionError extends DocumentAssistantError {
    constructor(message: string) {
        super("INVALID_QUESTION", message);
    }
}

/** The chat model answered, but not in the shape the schema asked for. */
export class MalformedResponseError extends DocumentAssistantError {
    constructor(message: string, cause?: unknown) {
        super("MALFORMED_RESPONSE", message, { cause });
    }
}
