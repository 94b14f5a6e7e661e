import type { ZodType } from "zod";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";

export interface EmbedOptions {
    signal?: AbortSignal;
}

export interface GenerateTextOptions {
    prompt: string;
    systemPrompt?: string;
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
}

export interface GenerateObjectOptions<T> extends GenerateTextOptions {
    schema: ZodType<T>;
    schemaName?: string;
}

export interface EmbeddingProvider {
    readonly config: EmbeddingModelConfig;
    embedDocuments(texts: readonly string[], options?: EmbedOptions): Promise<number[][]>;
    embedQuery(text: string, options?: EmbedOptions): Promise<number[]>;
}

export interface ChatProvider {
    readonly config: ChatModelConfig;
    generateText(options: GenerateTextOptions): Promise<string>;
    /** Rejects with `MalformedResponseError` when the reply does not match `schema`. */
    generateObject<T>(options: GenerateObjectOptions<T>): Promise<T>;
}

export interface LLMClientBundle {
    embedding: EmbeddingProvider;
    chat: ChatProvider;
}
