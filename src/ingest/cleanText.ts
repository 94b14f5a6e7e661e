// Word characters (any script), whitespace and the punctuation allow-list survive
const DISALLOWED_CHARACTERS = /[^\p{L}\p{M}\p{N}_\s.!?,;:\-()]/gu;

/**
 * Normalizes extracted text: drops characters outside the allow-list, collapses whitespace
 * runs to single spaces and keeps blank lines as the only paragraph separator.
 */
export function cleanText(text: string): string {
    return text
        .replace(/\r\n?/g, "\n")
        .replace(DISALLOWED_CHARACTERS, "")
        .replace(/[^\S\n]+/g, " ")
        .replace(/ *\n */g, "\n")
        .replace(/(?<!\n)\n(?!\n)/g, " ")
        .replace(/\n{3,}/g, "\n\n")
        .trim();
}
