import pino, { type Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import type {
    ChatProvider,
    EmbedOptions,
    EmbeddingProvider,
    GenerateObjectOptions,
    GenerateTextOptions,
} from "../../llm/types";
import type { Tokenizer } from "../../utils/tokenEncoder";

export const silentLogger: Logger = pino({ level: "silent" });

/** One token per whitespace-separated word; decoding joins words with single spaces. */
export class WordTokenizer implements Tokenizer {
    private readonly vocabulary: string[] = [];
    private readonly ids = new Map<string, number>();

    encode(text: string): number[] {
        return words(text).map((word) => {
            let id = this.ids.get(word);
            if (id === undefined) {
                id = this.vocabulary.length;
                this.vocabulary.push(word);
                this.ids.set(word, id);
            }
            return id;
        });
    }

    decode(tokens: readonly number[]): string {
        return tokens.map((token) => this.vocabulary[token] ?? "").join(" ");
    }

    count(text: string): number {
        return words(text).length;
    }
}

export function words(text: string): string[] {
    return text.split(/\s+/).filter(Boolean);
}

/** `count` space-separated words `${prefix}0 … ${prefix}${count - 1}`. */
export function paragraph(prefix: string, count: number): string {
    return Array.from({ length: count }, (_, index) => `${prefix}${index}`).join(" ");
}

/**
 * Embeds text as keyword occurrence counts, so similarity follows shared vocabulary.
 * Text without any keyword gets the zero vector.
 */
export class KeywordEmbeddingProvider implements EmbeddingProvider {
    readonly config: EmbeddingModelConfig = { provider: "openai", model: "fake-embedding" };
    readonly documentCalls: string[][] = [];
    readonly queryCalls: string[] = [];

    constructor(private readonly keywords: readonly string[]) {}

    embed(text: string): number[] {
        const tokens = words(text.toLowerCase().replace(/[^\p{L}\p{N}\s]/gu, ""));
        return this.keywords.map((keyword) => tokens.filter((token) => token === keyword).length);
    }

    async embedDocuments(texts: readonly string[], _options?: EmbedOptions): Promise<number[][]> {
        this.documentCalls.push([...texts]);
        return texts.map((text) => this.embed(text));
    }

    async embedQuery(text: string, _options?: EmbedOptions): Promise<number[]> {
        this.queryCalls.push(text);
        return this.embed(text);
    }
}

/** Replays queued replies in order; an `Error` reply is thrown instead of returned. */
export class FakeChatProvider implements ChatProvider {
    readonly config: ChatModelConfig = { provider: "openai", model: "fake-chat", temperature: 0 };
    readonly textCalls: GenerateTextOptions[] = [];
    readonly objectCalls: GenerateTextOptions[] = [];

    private readonly textReplies: Array<string | Error> = [];
    private readonly objectReplies: unknown[] = [];

    queueText(...replies: Array<string | Error>): this {
        this.textReplies.push(...replies);
        return this;
    }

    queueObject(...replies: unknown[]): this {
        this.objectReplies.push(...replies);
        return this;
    }

    async generateText(options: GenerateTextOptions): Promise<string> {
        this.textCalls.push(options);
        const reply = this.textReplies.shift();
        if (reply instanceof Error) {
            throw reply;
        }
        if (reply === undefined) {
            throw new Error("No text reply queued.");
        }
        return reply;
    }

    async generateObject<T>(options: GenerateObjectOptions<T>): Promise<T> {
        this.objectCalls.push(options);
        if (this.objectReplies.length === 0) {
            throw new Error("No object reply queued.");
        }
        const reply = this.objectReplies.shift();
        if (reply instanceof Error) {
            throw reply;
        }
        return options.schema.parse(reply);
    }
}
