import type { Logger } from "pino";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { embedMany, generateObject, generateText } from "ai";
import { BaseChatProvider, BaseEmbeddingProvider } from "../base";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import type { EmbedOptions, GenerateObjectOptions, GenerateTextOptions } from "../types";
import { mergeLimits, resolveBaseUrl } from "../../utils/providerUtils";

export class GoogleEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createGoogleGenerativeAI>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("Google Generative AI API key is required for embeddings.");
        }

        super(
            config,
            mergeLimits(
                {
                    batchSize: 16,
                    concurrency: 3,
                    maxRequestsPerMinute: 300,
                    maxTokensPerMinute: 1_000_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createGoogleGenerativeAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl),
        });
    }

    protected async sendEmbeddingRequest(texts: string[], options?: EmbedOptions): Promise<number[][]> {
        const { embeddings } = await embedMany({
            model: this.sdk.textEmbeddingModel(this.config.model),
            values: texts,
            // p-retry in the base class owns retries
            maxRetries: 0,
            abortSignal: options?.signal,
        });

        return embeddings;
    }
}

export class GoogleChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createGoogleGenerativeAI>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("Google Generative AI API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 3,
                    maxRequestsPerMinute: 90,
                    maxTokensPerMinute: 300_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createGoogleGenerativeAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl),
        });
    }

    protected async completeText(options: GenerateTextOptions): Promise<string> {
        const { text } = await generateText({
            model: this.sdk(this.config.model),
            system: options.systemPrompt,
            prompt: options.prompt,
            temperature: options.temperature ?? this.config.temperature,
            maxTokens: options.maxTokens ?? this.config.maxOutputTokens,
            maxRetries: 0,
            abortSignal: options.signal,
        });

        if (!text.trim()) {
            throw new Error("Google returned an empty chat completion response.");
        }
        return text;
    }

    protected async completeObject<T>(options: GenerateObjectOptions<T>): Promise<T> {
        const { object } = await generateObject({
            model: this.sdk(this.config.model),
            schema: options.schema,
            schemaName: options.schemaName,
            system: options.systemPrompt,
            prompt: options.prompt,
            temperature: options.temperature ?? this.config.temperature,
            maxTokens: options.maxTokens ?? this.config.maxOutputTokens,
            maxRetries: 0,
            abortSignal: options.signal,
        });

        return object;
    }
}
