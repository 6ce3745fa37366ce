import type { AnswerValue, SelectStrategy } from '../forms/types.js';

/** What the caller knows about the listing a question belongs to. */
export interface JobContext {
  jobTitle?: string;
  company?: string;
  location?: string;
  description?: string;
}

export interface Question {
  text: string;
  normalizedText: string;
  contextHints: {
    jobTitle?: string;
    company?: string;
    jobDescriptionSnippet?: string;
  };
}

export type AnswerSource = 'learned' | 'generated' | 'static' | 'skipped';

export interface AnsweredQuestion {
  question: Question;
  /** Always '' when source is 'skipped' */
  answer: string;
  source: AnswerSource;
  confidenceScore: number;
  /** Why the question was skipped: low_confidence or no_answer */
  reason?: string;
  /** Row in the learned store backing this answer, for recordSuccess() */
  learnedEntryId?: number;
}

/**
 * Produces an answer for a question the engine has never seen. Returning
 * null or an empty string means "no usable answer".
 */
export type AnswerGenerator = (question: string, context: JobContext) => Promise<string | null>;

export type QuestionStatus = 'answered' | 'skipped' | 'failed';

/** Outcome of answering one on-page question element. */
export interface QuestionElementResult {
  status: QuestionStatus;
  source: AnswerSource;
  question: string;
  value?: AnswerValue;
  score: number;
  reason?: string;
  strategy?: SelectStrategy;
}
