import { config as loadDotenv } from "dotenv";
import path from "node:path";
import type { AppConfig, LLMProviderName, LoggingConfig } from "./types";

type Env = NodeJS.ProcessEnv;

const DEFAULT_ENV_FILENAME = ".env";
const LOG_LEVELS: ReadonlyArray<LoggingConfig["level"]> = ["fatal", "error", "warn", "info", "debug", "trace"];
const PROVIDERS: ReadonlyArray<LLMProviderName> = ["openai", "google"];

function getEnv(env: Env, key: string, required = true): string | undefined {
    const value = env[key]?.trim();
    if (required && !value) {
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value || undefined;
}

function getEnvNumber(env: Env, key: string): number | undefined;
function getEnvNumber(env: Env, key: string, defaultValue: number): number;
function getEnvNumber(env: Env, key: string, defaultValue?: number): number | undefined {
    const value = env[key]?.trim();
    if (!value) {
        return defaultValue;
    }
    const parsed = Number.parseFloat(value);
    if (Number.isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a valid number, got: ${value}`);
    }
    return parsed;
}

function getEnvInteger(env: Env, key: string, defaultValue: number, minimum: number): number {
    const value = getEnvNumber(env, key, defaultValue);
    if (!Number.isInteger(value) || value < minimum) {
        throw new Error(`Environment variable ${key} must be an integer >= ${minimum}, got: ${value}`);
    }
    return value;
}

function getEnvBoolean(env: Env, key: string, defaultValue = false): boolean {
    const value = env[key];
    if (!value) {
        return defaultValue;
    }
    const lowered = value.toLowerCase().trim();
    return lowered === "true" || lowered === "1" || lowered === "yes";
}

function getLogLevel(env: Env, key: string): LoggingConfig["level"] {
    const value = getEnv(env, key, false)?.toLowerCase() ?? "info";
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
        throw new Error(`Environment variable ${key} must be one of ${LOG_LEVELS.join(", ")}, got: ${value}`);
    }
    return level;
}

function getProvider(env: Env, key: string): LLMProviderName {
    const value = getEnv(env, key, false)?.toLowerCase() ?? "openai";
    const provider = PROVIDERS.find((candidate) => candidate === value);
    if (!provider) {
        throw new Error(`Environment variable ${key} must be one of ${PROVIDERS.join(", ")}, got: ${value}`);
    }
    return provider;
}

export function resolveConfigPath(providedPath?: string): string {
    if (providedPath) {
        return path.resolve(process.cwd(), providedPath);
    }

    if (process.env.DOC_ASSISTANT_CONFIG_PATH) {
        return path.resolve(process.cwd(), process.env.DOC_ASSISTANT_CONFIG_PATH);
    }

    return path.resolve(process.cwd(), DEFAULT_ENV_FILENAME);
}

/**
 * Builds the application configuration from environment variables.
 * Every value has a default except the LLM API keys, which fall back to OPENAI_API_KEY.
 */
export function buildAppConfig(env: Env = process.env): AppConfig {
    const maxTokens = getEnvInteger(env, "DOC_ASSISTANT_CHUNK_SIZE", 1000, 1);
    const overlapTokens = getEnvInteger(env, "DOC_ASSISTANT_CHUNK_OVERLAP", 200, 0);

    if (overlapTokens >= maxTokens) {
        throw new Error(
            `DOC_ASSISTANT_CHUNK_OVERLAP (${overlapTokens}) must be smaller than DOC_ASSISTANT_CHUNK_SIZE (${maxTokens}).`
        );
    }

    const sharedApiKey = getEnv(env, "OPENAI_API_KEY", false);

    return {
        server: {
            port: getEnvInteger(env, "PORT", 8000, 0),
            uploadDir: path.resolve(process.cwd(), getEnv(env, "DOC_ASSISTANT_UPLOAD_DIR", false) ?? "./uploads"),
            maxUploadBytes: getEnvInteger(env, "DOC_ASSISTANT_MAX_UPLOAD_BYTES", 20 * 1024 * 1024, 1),
        },
        logging: {
            level: getLogLevel(env, "DOC_ASSISTANT_LOGGING_LEVEL"),
            pretty: getEnvBoolean(env, "DOC_ASSISTANT_LOGGING_PRETTY", false),
        },
        chunking: {
            maxTokens,
            overlapTokens,
            tokenizerModel: getEnv(env, "DOC_ASSISTANT_TOKENIZER_MODEL", false) ?? "gpt-3.5-turbo",
        },
        retrieval: {
            answerTopK: getEnvInteger(env, "DOC_ASSISTANT_ANSWER_TOP_K", 3, 1),
            evaluationTopK: getEnvInteger(env, "DOC_ASSISTANT_EVALUATION_TOP_K", 3, 1),
        },
        assistant: {
            summaryMaxWords: getEnvInteger(env, "DOC_ASSISTANT_SUMMARY_MAX_WORDS", 150, 1),
            challengeQuestionCount: getEnvInteger(env, "DOC_ASSISTANT_CHALLENGE_QUESTIONS_COUNT", 3, 1),
            diverseChunkCount: getEnvInteger(env, "DOC_ASSISTANT_CHALLENGE_CHUNK_COUNT", 5, 1),
            summaryTemperature: getEnvNumber(env, "DOC_ASSISTANT_SUMMARY_TEMPERATURE", 0.3),
            answerTemperature: getEnvNumber(env, "DOC_ASSISTANT_QA_TEMPERATURE", 0.1),
            challengeTemperature: getEnvNumber(env, "DOC_ASSISTANT_CHALLENGE_TEMPERATURE", 0.7),
            evaluationTemperature: getEnvNumber(env, "DOC_ASSISTANT_EVALUATION_TEMPERATURE", 0.1),
            maxOutputTokens: getEnvInteger(env, "DOC_ASSISTANT_MAX_TOKENS", 2000, 1),
        },
        llm: {
            embedding: {
                provider: getProvider(env, "DOC_ASSISTANT_LLM_EMBEDDING_PROVIDER"),
                model: getEnv(env, "DOC_ASSISTANT_LLM_EMBEDDING_MODEL", false) ?? "text-embedding-ada-002",
                apiKey: getEnv(env, "DOC_ASSISTANT_LLM_EMBEDDING_API_KEY", false) ?? sharedApiKey,
                baseUrl: getEnv(env, "DOC_ASSISTANT_LLM_EMBEDDING_BASE_URL", false),
                limits: {
                    batchSize: getEnvNumber(env, "DOC_ASSISTANT_LLM_EMBEDDING_LIMITS_BATCH_SIZE"),
                    concurrency: getEnvNumber(env, "DOC_ASSISTANT_LLM_EMBEDDING_LIMITS_CONCURRENCY"),
                    maxRequestsPerMinute: getEnvNumber(env, "DOC_ASSISTANT_LLM_EMBEDDING_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                    maxTokensPerMinute: getEnvNumber(env, "DOC_ASSISTANT_LLM_EMBEDDING_LIMITS_MAX_TOKENS_PER_MINUTE"),
                    retries: getEnvNumber(env, "DOC_ASSISTANT_LLM_EMBEDDING_LIMITS_RETRIES"),
                },
            },
            chat: {
                provider: getProvider(env, "DOC_ASSISTANT_LLM_CHAT_PROVIDER"),
                model: getEnv(env, "DOC_ASSISTANT_LLM_CHAT_MODEL", false) ?? "gpt-3.5-turbo",
                apiKey: getEnv(env, "DOC_ASSISTANT_LLM_CHAT_API_KEY", false) ?? sharedApiKey,
                baseUrl: getEnv(env, "DOC_ASSISTANT_LLM_CHAT_BASE_URL", false),
                temperature: getEnvNumber(env, "DOC_ASSISTANT_LLM_CHAT_TEMPERATURE", 0),
                maxOutputTokens: getEnvNumber(env, "DOC_ASSISTANT_LLM_CHAT_MAX_OUTPUT_TOKENS", 2000),
                limits: {
                    concurrency: getEnvNumber(env, "DOC_ASSISTANT_LLM_CHAT_LIMITS_CONCURRENCY"),
                    maxRequestsPerMinute: getEnvNumber(env, "DOC_ASSISTANT_LLM_CHAT_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                    maxTokensPerMinute: getEnvNumber(env, "DOC_ASSISTANT_LLM_CHAT_LIMITS_MAX_TOKENS_PER_MINUTE"),
                    retries: getEnvNumber(env, "DOC_ASSISTANT_LLM_CHAT_LIMITS_RETRIES"),
                },
            },
        },
    };
}

export async function loadAppConfig(configPath?: string): Promise<AppConfig> {
    const envPath = resolveConfigPath(configPath);
    const result = loadDotenv({ path: envPath });

    if (result.error) {
        // Only fail if an explicit path was provided, otherwise env vars may already be loaded
        if (configPath) {
            throw new Error(`Failed to load environment file from "${configPath}": ${result.error.message}`);
        }
    }

    return buildAppConfig(process.env);
}
