import type { Logger } from "pino";
import type { AssistantConfig, RetrievalConfig } from "../config/types";
import { toChunkView, type Chunk } from "../ingest/types";
import {
    answerEvaluationSchema,
    buildAnswerPrompt,
    buildChallengePrompt,
    buildEvaluationPrompt,
    buildSummaryPrompt,
    challengeSetSchema,
    DEFAULT_SYSTEM_PROMPT,
    NOT_FOUND_ANSWER,
} from "../llm/prompt";
import type { ChatProvider, EmbeddingProvider } from "../llm/types";
import { findRelevantChunks, selectDiverseChunks } from "../query/retriever";
import type { DocumentSession } from "../session/store";
import { InvalidQuestionError, MalformedResponseError } from "../utils/errors";
import { childLogger } from "../utils/logger";
import { FALLBACK_CHALLENGE_QUESTIONS } from "./fallbacks";
import type {
    AnswerEvaluation,
    AssistantCallOptions,
    ChallengeQuestion,
    QuestionAnswer,
} from "./types";

const SUMMARY_MAX_OUTPUT_TOKENS = 200;
const EMPTY_DOCUMENT_SUMMARY = "The document does not contain any extractable text.";

export interface DocumentAssistantDependencies {
    chat: ChatProvider;
    embedding: EmbeddingProvider;
    assistant: AssistantConfig;
    retrieval: RetrievalConfig;
    logger?: Logger;
}

/**
 * First two, middle two and last two chunks of a long document; every chunk of a short one.
 */
export function selectSummaryChunks<C extends Chunk>(chunks: readonly C[]): C[] {
    if (chunks.length <= 5) {
        return [...chunks];
    }

    const middleStart = Math.floor(chunks.length / 2) - 1;
    return [
        ...chunks.slice(0, 2),
        ...chunks.slice(middleStart, middleStart + 2),
        ...chunks.slice(-2),
    ];
}

export function limitWords(text: string, maxWords: number): string {
    const words = text.split(/\s+/).filter(Boolean);
    if (words.length <= maxWords) {
        return text.trim();
    }
    return `${words.slice(0, maxWords).join(" ")}...`;
}

export function estimateConfidence(chunks: readonly Chunk[]): number {
    if (chunks.length === 0) {
        return 0;
    }

    const baseConfidence = Math.min(0.8, chunks.length * 0.2);
    const averageLength = chunks.reduce((sum, chunk) => sum + chunk.content.length, 0) / chunks.length;
    const lengthFactor = Math.min(1, averageLength / 500);
    return baseConfidence * lengthFactor;
}

function clampScore(score: number): number {
    if (!Number.isFinite(score)) {
        return 0;
    }
    return Math.round(Math.min(100, Math.max(0, score)));
}

/**
 * Summary, question answering, challenge generation and answer evaluation over one
 * ingested document. Holds no per-document state: everything lives on the session passed in.
 */
export class DocumentAssistant {
    private readonly logger: Logger;

    constructor(private readonly deps: DocumentAssistantDependencies) {
        this.logger = childLogger(deps.logger, { module: "assistant" });
    }

    async generateSummary(session: DocumentSession, options: AssistantCallOptions = {}): Promise<string> {
        const { summaryMaxWords, summaryTemperature } = this.deps.assistant;
        const chunks = selectSummaryChunks(session.chunks);

        if (chunks.length === 0) {
            session.summary = EMPTY_DOCUMENT_SUMMARY;
            return session.summary;
        }

        this.logger.info({ sessionId: session.id, chunks: chunks.length }, "Generating document summary.");
        const summary = await this.deps.chat.generateText({
            prompt: buildSummaryPrompt(chunks, summaryMaxWords),
            systemPrompt: DEFAULT_SYSTEM_PROMPT,
            temperature: summaryTemperature,
            maxTokens: SUMMARY_MAX_OUTPUT_TOKENS,
            signal: options.signal,
        });

        session.summary = limitWords(summary, summaryMaxWords);
        return session.summary;
    }

    async answerQuestion(
        session: DocumentSession,
        question: string,
        options: AssistantCallOptions = {}
    ): Promise<QuestionAnswer> {
        const trimmedQuestion = question.trim();
        if (!trimmedQuestion) {
            throw new InvalidQuestionError("Question cannot be empty.");
        }

        const relevantChunks = await findRelevantChunks(
            session.chunks,
            trimmedQuestion,
            this.deps.embedding,
            this.deps.retrieval.answerTopK,
            { signal: options.signal }
        );

        let answer: string;
        if (relevantChunks.length === 0) {
            this.logger.warn({ sessionId: session.id }, "No chunks available to answer the question.");
            answer = NOT_FOUND_ANSWER;
        } else {
            this.logger.info(
                { sessionId: session.id, matchCount: relevantChunks.length },
                "Generating answer with retrieved context."
            );
            answer = await this.deps.chat.generateText({
                prompt: buildAnswerPrompt(relevantChunks, trimmedQuestion),
                systemPrompt: DEFAULT_SYSTEM_PROMPT,
                temperature: this.deps.assistant.answerTemperature,
                maxTokens: this.deps.assistant.maxOutputTokens,
                signal: options.signal,
            });
        }

        session.history.push({
            question: trimmedQuestion,
            answer,
            relevantChunks: relevantChunks.map(toChunkView),
        });

        return {
            answer,
            source: relevantChunks.length > 0
                ? `Based on ${relevantChunks.length} relevant section${relevantChunks.length === 1 ? "" : "s"} from the document`
                : "No relevant sections found in the document",
            confidence: estimateConfidence(relevantChunks),
        };
    }

    async generateChallengeQuestions(
        session: DocumentSession,
        options: AssistantCallOptions = {}
    ): Promise<ChallengeQuestion[]> {
        const { challengeQuestionCount, challengeTemperature, diverseChunkCount, maxOutputTokens } = this.deps.assistant;
        const chunks = selectDiverseChunks(session.chunks, diverseChunkCount);

        let questions: ChallengeQuestion[];
        if (chunks.length === 0) {
            questions = FALLBACK_CHALLENGE_QUESTIONS.map((entry) => ({ ...entry }));
        } else {
            try {
                const result = await this.deps.chat.generateObject({
                    prompt: buildChallengePrompt(chunks, challengeQuestionCount),
                    systemPrompt: DEFAULT_SYSTEM_PROMPT,
                    schema: challengeSetSchema,
                    schemaName: "challenge questions",
                    temperature: challengeTemperature,
                    maxTokens: maxOutputTokens,
                    signal: options.signal,
                });
                questions = result.questions
                    .slice(0, challengeQuestionCount)
                    .map((entry, index) => ({ ...entry, id: index + 1 }));
            } catch (error) {
                if (!(error instanceof MalformedResponseError)) {
                    throw error;
                }
                this.logger.warn({ err: error, sessionId: session.id }, "Using fallback challenge questions.");
                questions = FALLBACK_CHALLENGE_QUESTIONS.map((entry) => ({ ...entry }));
            }
        }

        session.challengeQuestions = questions;
        return questions;
    }

    async evaluateAnswer(
        session: DocumentSession,
        questionId: number,
        userAnswer: string,
        options: AssistantCallOptions = {}
    ): Promise<AnswerEvaluation> {
        const questions = session.challengeQuestions;
        if (!questions || questions.length === 0) {
            throw new InvalidQuestionError("No challenge questions have been generated for this session.");
        }
        if (!Number.isInteger(questionId) || questionId < 1 || questionId > questions.length) {
            throw new InvalidQuestionError(`Invalid question ID: ${questionId}. Expected 1 to ${questions.length}.`);
        }
        if (!userAnswer.trim()) {
            throw new InvalidQuestionError("Answer cannot be empty.");
        }

        const question = questions[questionId - 1];
        const relevantChunks = await findRelevantChunks(
            session.chunks,
            question.question,
            this.deps.embedding,
            this.deps.retrieval.evaluationTopK,
            { signal: options.signal }
        );

        try {
            const evaluation = await this.deps.chat.generateObject({
                prompt: buildEvaluationPrompt(relevantChunks, question, userAnswer),
                systemPrompt: DEFAULT_SYSTEM_PROMPT,
                schema: answerEvaluationSchema,
                schemaName: "answer evaluation",
                temperature: this.deps.assistant.evaluationTemperature,
                maxTokens: this.deps.assistant.maxOutputTokens,
                signal: options.signal,
            });

            return {
                score: clampScore(evaluation.score),
                feedback: evaluation.feedback || "No feedback available.",
                correctAnswer: evaluation.correctAnswer || question.expectedAnswer,
                documentReference: evaluation.documentReference || "Document reference not available.",
            };
        } catch (error) {
            if (!(error instanceof MalformedResponseError)) {
                throw error;
            }
            this.logger.warn({ err: error, sessionId: session.id, questionId }, "Evaluation response was malformed.");
            return {
                score: 0,
                feedback: "The answer could not be evaluated automatically. Compare it with the expected answer.",
                correctAnswer: question.expectedAnswer,
                documentReference: "Document reference not available.",
            };
        }
    }
}
