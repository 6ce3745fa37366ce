export { normalizeText, normalizeLabel, jaccard, tokenSet, fingerprint } from './similarity.js';
export { createQuestion, formatJobContext } from './jobContext.js';
export { QuestionMatcher, fillQuestionInput, type QuestionMatcherOptions } from './QuestionMatcher.js';
export {
  LearnedAnswerStore,
  type LearnedAnswerStoreOptions,
  type LearnedEntry,
  type LearnedMatch,
  type UpsertContext,
} from './LearnedAnswerStore.js';
export { AnswerCascade, type AnswerCascadeOptions } from './AnswerCascade.js';
export {
  createAnthropicAnswerGenerator,
  buildAnswerPrompt,
  type AnthropicAnswerGeneratorOptions,
} from './anthropicGenerator.js';
export type {
  AnswerGenerator,
  AnswerSource,
  AnsweredQuestion,
  JobContext,
  Question,
  QuestionElementResult,
  QuestionStatus,
} from './types.js';
