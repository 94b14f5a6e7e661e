export interface ChallengeQuestion {
    id: number;
    question: string;
    expectedAnswer: string;
    explanation: string;
}

export interface ChallengeSet {
    questions: ChallengeQuestion[];
}

export interface AnswerEvaluation {
    /** 0 to 100. */
    score: number;
    feedback: string;
    correctAnswer: string;
    documentReference: string;
}

export interface QuestionAnswer {
    answer: string;
    source: string;
    /** Heuristic in [0, 0.8] derived from how much context was retrieved. */
    confidence: number;
}

export interface AssistantCallOptions {
    signal?: AbortSignal;
}
