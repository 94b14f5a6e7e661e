import { get_encoding, encoding_for_model, Tiktoken, type TiktokenModel } from "tiktoken";

const TOKENIZER_FALLBACK = "cl100k_base";
const encoderCache = new Map<string, Tiktoken>();
const utf8Decoder = new TextDecoder("utf-8");

/**
 * Special tokens tiktoken refuses in plain input. Documents may contain them
 * literally, so they are escaped before encoding.
 */
const SPECIAL_TOKENS = [
    "<|endoftext|>",
    "<|endofprompt|>",
    "<|fim_prefix|>",
    "<|fim_middle|>",
    "<|fim_suffix|>",
] as const;

/**
 * Token-level view of a model's tokenizer. The chunker only needs these three operations,
 * so tests can substitute a simpler implementation.
 */
export interface Tokenizer {
    encode(text: string): number[];
    decode(tokens: readonly number[]): string;
    count(text: string): number;
}

function sanitizeSpecialTokens(text: string): string {
    let sanitized = text;
    for (const token of SPECIAL_TOKENS) {
        const placeholder = token
            .replace(/</g, "&lt;")
            .replace(/>/g, "&gt;")
            .replace(/\|/g, "&#124;");
        sanitized = sanitized.split(token).join(placeholder);
    }
    return sanitized;
}

export function getEncoder(model?: string): Tiktoken {
    const key = (model ?? TOKENIZER_FALLBACK).toLocaleLowerCase();
    const cached = encoderCache.get(key);
    if (cached) {
        return cached;
    }

    let encoder: Tiktoken;
    try {
        encoder = encoding_for_model(key as TiktokenModel);
    } catch {
        encoder = get_encoding(TOKENIZER_FALLBACK);
    }

    encoderCache.set(key, encoder);
    return encoder;
}

export class TiktokenTokenizer implements Tokenizer {
    private readonly encoder: Tiktoken;

    constructor(model?: string) {
        this.encoder = getEncoder(model);
    }

    encode(text: string): number[] {
        if (!text) return [];
        return Array.from(this.encoder.encode(sanitizeSpecialTokens(text)));
    }

    decode(tokens: readonly number[]): string {
        if (tokens.length === 0) return "";
        return utf8Decoder.decode(this.encoder.decode(Uint32Array.from(tokens)));
    }

    count(text: string): number {
        return this.encode(text).length;
    }
}

export function countTokens(text: string, model?: string): number {
    if (!text) return 0;
    try {
        return getEncoder(model).encode(sanitizeSpecialTokens(text)).length;
    } catch {
        // Roughly four characters per token for English prose
        return Math.ceil(text.length / 4);
    }
}

export function countTokensInBatch(texts: readonly string[], model?: string): number {
    return texts.reduce((sum, current) => sum + countTokens(current, model), 0);
}
