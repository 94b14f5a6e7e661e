import type { ChallengeQuestion } from "./types";

/** Served when the chat model cannot produce well-formed challenge questions. */
export const FALLBACK_CHALLENGE_QUESTIONS: ReadonlyArray<Readonly<ChallengeQuestion>> = [
    {
        id: 1,
        question: "What is the main topic discussed in this document?",
        expectedAnswer: "Please refer to the document content.",
        explanation: "Tests basic comprehension of the document's main theme.",
    },
    {
        id: 2,
        question: "What are the key findings or conclusions mentioned?",
        expectedAnswer: "Please refer to the document content.",
        explanation: "Tests understanding of the important results or conclusions.",
    },
    {
        id: 3,
        question: "How do the different sections of the document relate to each other?",
        expectedAnswer: "Please refer to the document content.",
        explanation: "Tests reasoning about the document's structure.",
    },
];
