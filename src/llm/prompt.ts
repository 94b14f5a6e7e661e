import { z } from "zod";
import type { Chunk } from "../ingest/types";
import type { AnswerEvaluation, ChallengeQuestion, ChallengeSet } from "../assistant/types";

export const DEFAULT_SYSTEM_PROMPT = [
    "You are a meticulous assistant that works strictly from the document excerpts you are given.",
    "Do not rely on outside knowledge.",
    "If the excerpts do not contain the information needed, say so plainly.",
].join(" ");

export const NOT_FOUND_ANSWER = "I cannot find this information in the provided document.";

export const challengeQuestionSchema = z.object({
    id: z.number().int().describe("1-based position of the question"),
    question: z.string().min(1).describe("A question that needs reasoning over the document, not just recall"),
    expectedAnswer: z.string().describe("The correct answer, as supported by the document"),
    explanation: z.string().describe("Why the answer is correct, citing the relevant part of the document"),
});

export const challengeSetSchema: z.ZodType<ChallengeSet> = z.object({
    questions: z.array(challengeQuestionSchema).min(1),
});

export const answerEvaluationSchema: z.ZodType<AnswerEvaluation> = z.object({
    score: z.number().describe("0 to 100 for accuracy and completeness, partial credit allowed"),
    feedback: z.string().describe("Constructive feedback for the user"),
    correctAnswer: z.string().describe("The complete correct answer"),
    documentReference: z.string().describe("Which part of the document supports the correct answer"),
});

function describeChunk(chunk: Chunk): string {
    return chunk.pageNumber !== undefined ? ` (page ${chunk.pageNumber})` : "";
}

export function formatExcerpts(chunks: readonly Chunk[]): string {
    return chunks
        .map((chunk, index) => `Excerpt ${index + 1}${describeChunk(chunk)}:\n${chunk.content.trim()}`)
        .join("\n\n")
        .trim();
}

function joinContent(chunks: readonly Chunk[]): string {
    return chunks.map((chunk) => chunk.content.trim()).join("\n\n");
}

export function buildSummaryPrompt(chunks: readonly Chunk[], maxWords: number): string {
    return [
        `Summarize this document in ${maxWords} words or fewer.`,
        "Cover the main topics, key findings and important conclusions.",
        "",
        "Document content:",
        joinContent(chunks),
        "",
        `Summary (at most ${maxWords} words):`,
    ].join("\n");
}

export function buildAnswerPrompt(chunks: readonly Chunk[], question: string): string {
    return [
        "Answer the question accurately and concisely from the document excerpts below.",
        "",
        "Document excerpts:",
        formatExcerpts(chunks),
        "",
        `Question: ${question.trim()}`,
        "",
        "Instructions:",
        "1. Use ONLY the information in the excerpts.",
        `2. If the excerpts do not contain the answer, reply exactly: "${NOT_FOUND_ANSWER}"`,
        "3. Add a short justification naming the excerpt that supports the answer.",
        "",
        "Answer:",
    ].join("\n");
}

export function buildChallengePrompt(chunks: readonly Chunk[], questionCount: number): string {
    return [
        `Write exactly ${questionCount} challenging questions about the document below.`,
        "",
        "Document content:",
        joinContent(chunks),
        "",
        "Each question must:",
        "- require understanding rather than surface reading;",
        "- test inference, cause and effect, comparison or implication;",
        "- have a clear, specific answer that the document supports.",
        "",
        `Number the questions 1 to ${questionCount} in the id field.`,
    ].join("\n");
}

export function buildEvaluationPrompt(
    chunks: readonly Chunk[],
    question: ChallengeQuestion,
    userAnswer: string
): string {
    return [
        "Evaluate the user's answer to the question using the document context.",
        "",
        "Document context:",
        joinContent(chunks),
        "",
        `Question: ${question.question}`,
        `Expected answer: ${question.expectedAnswer}`,
        `User's answer: ${userAnswer.trim()}`,
        "",
        "Score the answer from 0 to 100 for accuracy and completeness, giving partial credit where due.",
        "Give constructive feedback and point to the part of the document that supports the correct answer.",
    ].join("\n");
}
