import Bottleneck from "bottleneck";
import pLimit from "p-limit";
import pRetry, { AbortError, type FailedAttemptError } from "p-retry";
import { NoObjectGeneratedError } from "ai";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import { batchChunks } from "../utils/batchChunks";
import { EmbeddingMismatchError, MalformedResponseError } from "../utils/errors";
import { createRateLimiter } from "../utils/rateLimiter";
import { countTokens, countTokensInBatch } from "../utils/tokenEncoder";
import type {
    ChatProvider,
    EmbedOptions,
    EmbeddingProvider,
    GenerateObjectOptions,
    GenerateTextOptions,
} from "./types";

export interface ProviderRateLimits {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

interface ScheduleOptions {
    logPrefix: string;
    signal?: AbortSignal;
}

/**
 * Request and token budgets shared by the embedding and chat providers. Every call
 * reserves its estimated tokens, waits for a request slot, then runs under p-retry.
 */
class ProviderScheduler {
    private readonly requestLimiter: Bottleneck;
    private readonly tokenLimiter?: Bottleneck;
    private readonly maxTokensPerMinute?: number;

    constructor(
        concurrency: number,
        private readonly retries: number,
        limits: ProviderRateLimits,
        private readonly logger?: Logger
    ) {
        this.requestLimiter = createRateLimiter(concurrency, limits.maxRequestsPerMinute);

        if (limits.maxTokensPerMinute && Number.isFinite(limits.maxTokensPerMinute)) {
            // Bottleneck counts job weight against maxConcurrent as well as the reservoir
            this.maxTokensPerMinute = Math.max(1, Math.floor(limits.maxTokensPerMinute));
            this.tokenLimiter = createRateLimiter(this.maxTokensPerMinute, this.maxTokensPerMinute);
        }
    }

    async schedule<T>(tokens: number, task: () => Promise<T>, { logPrefix, signal }: ScheduleOptions): Promise<T> {
        await this.reserveTokens(tokens);
        return this.requestLimiter.schedule(() =>
            pRetry(task, {
                retries: this.retries,
                signal,
                onFailedAttempt: (error: FailedAttemptError) => {
                    this.logger?.warn(
                        {
                            attemptNumber: error.attemptNumber,
                            retriesLeft: error.retriesLeft,
                            error: error.message,
                        },
                        `${logPrefix} failed attempt`
                    );
                },
            })
        );
    }

    private async reserveTokens(tokens: number): Promise<void> {
        if (!this.tokenLimiter || !this.maxTokensPerMinute || tokens <= 0) {
            return;
        }

        const weight = Math.min(this.maxTokensPerMinute, Math.max(1, Math.ceil(tokens)));
        await this.tokenLimiter.schedule({ weight }, async () => undefined);
    }
}

export abstract class BaseEmbeddingProvider implements EmbeddingProvider {
    protected readonly concurrencyLimit: number;
    protected readonly batchSize: number;

    private readonly scheduler: ProviderScheduler;

    constructor(
        public readonly config: EmbeddingModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.batchSize = Math.max(1, Math.floor(limits.batchSize ?? 50));
        this.concurrencyLimit = Math.max(1, limits.concurrency ?? 5);
        this.scheduler = new ProviderScheduler(this.concurrencyLimit, limits.retries ?? 5, limits, logger);
    }

    async embedDocuments(texts: readonly string[], options?: EmbedOptions): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        const batches = batchChunks(texts, this.batchSize).map((batch, idx) => ({
            idx,
            batch,
            tokens: countTokensInBatch(batch, this.config.model),
        }));

        const limit = pLimit(this.concurrencyLimit);
        const logPrefix = `${this.config.provider}:embed`;
        const results = await Promise.all(
            batches.map(({ batch, idx, tokens }) =>
                limit(async () => {
                    const embeddings = await this.scheduler.schedule(
                        tokens,
                        () => this.sendEmbeddingRequest(batch, options),
                        { logPrefix, signal: options?.signal }
                    );
                    if (embeddings.length !== batch.length) {
                        throw new EmbeddingMismatchError(batch.length, embeddings.length);
                    }
                    return { idx, embeddings };
                })
            )
        );

        const ordered = results.sort((a, b) => a.idx - b.idx);
        return ordered.flatMap((entry) => entry.embeddings);
    }

    async embedQuery(text: string, options?: EmbedOptions): Promise<number[]> {
        const embeddings = await this.embedDocuments([text], options);
        const embedding = embeddings[0];
        if (!embedding) {
            throw new EmbeddingMismatchError(1, embeddings.length);
        }
        return embedding;
    }

    protected abstract sendEmbeddingRequest(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}

export abstract class BaseChatProvider implements ChatProvider {
    protected readonly concurrencyLimit: number;

    private readonly scheduler: ProviderScheduler;

    constructor(
        public readonly config: ChatModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.concurrencyLimit = Math.max(1, limits.concurrency ?? 5);
        this.scheduler = new ProviderScheduler(this.concurrencyLimit, limits.retries ?? 5, limits, logger);
    }

    async generateText(options: GenerateTextOptions): Promise<string> {
        const text = await this.scheduler.schedule(
            this.estimateChatTokens(options),
            () => this.completeText(options),
            { logPrefix: `${this.config.provider}:chat`, signal: options.signal }
        );
        return text.trim();
    }

    async generateObject<T>(options: GenerateObjectOptions<T>): Promise<T> {
        return this.scheduler.schedule(
            this.estimateChatTokens(options),
            async () => {
                try {
                    return await this.completeObject(options);
                } catch (error) {
                    if (NoObjectGeneratedError.isInstance(error)) {
                        // Asking again rarely fixes the shape; let the caller fall back instead
                        throw new AbortError(
                            new MalformedResponseError(
                                `${this.config.provider} returned a response that does not match the ${options.schemaName ?? "requested"} schema.`,
                                error
                            )
                        );
                    }
                    throw error;
                }
            },
            { logPrefix: `${this.config.provider}:object`, signal: options.signal }
        );
    }

    protected estimateChatTokens(options: GenerateTextOptions): number {
        const model = this.config.model;
        let tokens = countTokens(options.prompt, model);

        if (options.systemPrompt) {
            tokens += countTokens(options.systemPrompt, model);
        }

        tokens += options.maxTokens ?? this.config.maxOutputTokens ?? 2000;
        return tokens;
    }

    protected abstract completeText(options: GenerateTextOptions): Promise<string>;

    protected abstract completeObject<T>(options: GenerateObjectOptions<T>): Promise<T>;
}
