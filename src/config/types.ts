export interface LoggingConfig {
    level: "fatal" | "error" | "warn" | "info" | "debug" | "trace";
    pretty: boolean;
}

export interface ServerConfig {
    port: number;
    uploadDir: string;
    maxUploadBytes: number;
}

export interface ChunkingConfig {
    maxTokens: number;
    overlapTokens: number;
    tokenizerModel: string;
}

export interface RetrievalConfig {
    answerTopK: number;
    evaluationTopK: number;
}

export interface AssistantConfig {
    summaryMaxWords: number;
    challengeQuestionCount: number;
    diverseChunkCount: number;
    summaryTemperature: number;
    answerTemperature: number;
    challengeTemperature: number;
    evaluationTemperature: number;
    maxOutputTokens: number;
}

export type LLMProviderName =
    | "openai"
    | "google"

export interface ProviderLimitsConfig {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

interface BaseModelConfig {
    provider: LLMProviderName;
    apiKey?: string;
    baseUrl?: string;
    limits?: ProviderLimitsConfig;
}

export interface EmbeddingModelConfig extends BaseModelConfig {
    model: string;
}

export interface ChatModelConfig extends BaseModelConfig {
    model: string;
    maxOutputTokens?: number;
    temperature: number;
}

export interface LLMConfig {
    embedding: EmbeddingModelConfig;
    chat: ChatModelConfig;
}

export interface AppConfig {
    server: ServerConfig;
    logging: LoggingConfig;
    chunking: ChunkingConfig;
    retrieval: RetrievalConfig;
    assistant: AssistantConfig;
    llm: LLMConfig;
}
