import type { Logger } from "pino";
import { createOpenAI } from "@ai-sdk/openai";
import { embedMany, generateObject, generateText } from "ai";
import { BaseChatProvider, BaseEmbeddingProvider } from "../base";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import type { EmbedOptions, GenerateObjectOptions, GenerateTextOptions } from "../types";
import { mergeLimits, resolveBaseUrl } from "../../utils/providerUtils";

export class OpenAIEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createOpenAI>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("OpenAI API key is required for embeddings.");
        }

        super(
            config,
            mergeLimits(
                {
                    batchSize: 100,
                    concurrency: 4,
                    maxRequestsPerMinute: 1_500,
                    maxTokensPerMinute: 6_250_000,
                    retries: 6,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createOpenAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl),
        });
    }

    protected async sendEmbeddingRequest(texts: string[], options?: EmbedOptions): Promise<number[][]> {
        const { embeddings } = await embedMany({
            model: this.sdk.embedding(this.config.model),
            values: texts,
            // p-retry in the base class owns retries
            maxRetries: 0,
            abortSignal: options?.signal,
        });

        return embeddings;
    }
}

export class OpenAIChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createOpenAI>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("OpenAI API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 3,
                    maxRequestsPerMinute: 500,
                    maxTokensPerMinute: 90_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createOpenAI({
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
            throw new Error("OpenAI returned an empty chat completion response.");
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
