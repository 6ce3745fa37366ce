/**
 * QuestionMatcher — scores free-text questions against configured answers.
 *
 * Scoring is Jaccard similarity over normalized token sets:
 *
 *   |tokens(question) ∩ tokens(key)| / |tokens(question) ∪ tokens(key)|
 *
 * An exact normalized key match short-circuits to 1.0.
 */

import { MATCHING_THRESHOLDS } from '../config/matching.js';
import { describeError } from '../detection/ErrorDetector.js';
import { applyAnswer, fieldTypeOf, type ApplyOutcome } from '../forms/applyAnswer.js';
import type { AnswerCandidate, AnswerMap, AnswerValue, FormElement, QuestionElement } from '../forms/types.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { jaccard, normalizeText } from './similarity.js';
import type { AnswerSource, QuestionElementResult } from './types.js';

/**
 * Fill the control of an on-page question. Selects go by visible text and
 * then by value; anything that is not a select, checkbox, radio or file is
 * typed into.
 */
export async function fillQuestionInput(input: FormElement, value: AnswerValue): Promise<ApplyOutcome> {
  try {
    const tagName = await input.tagName();
    const inputType = (await input.getAttribute('type')) ?? '';
    return applyAnswer(input, fieldTypeOf(tagName, inputType) ?? 'text', value);
  } catch (err) {
    return { ok: false, reason: describeError(err) };
  }
}

export interface QuestionMatcherOptions {
  logger?: Logger;
}

export class QuestionMatcher {
  private logger: Logger;

  constructor(opts: QuestionMatcherOptions = {}) {
    this.logger = opts.logger ?? getLogger().child({ component: 'QuestionMatcher' });
  }

  normalize(text: string): string {
    return normalizeText(text);
  }

  /**
   * Best key/value pair for the question, or null when the map is empty.
   * Ties keep the first key in insertion order.
   */
  matchAnswer(question: string, answers: AnswerMap): AnswerCandidate | null {
    const q = normalizeText(question);
    const entries = Object.entries(answers);

    for (const [key, value] of entries) {
      if (normalizeText(key) === q) return { key, value, score: 1.0 };
    }

    let best: AnswerCandidate | null = null;
    for (const [key, value] of entries) {
      const score = jaccard(q, normalizeText(key));
      if (!best || score > best.score) {
        best = { key, value, score };
      }
    }
    return best;
  }

  /**
   * Answer one on-page question from the static map. Below `minScore` the
   * question is skipped with reason `low_confidence` rather than guessed.
   */
  async answerQuestionElement(
    element: QuestionElement,
    answers: AnswerMap,
    minScore: number = MATCHING_THRESHOLDS.confidenceGate,
  ): Promise<QuestionElementResult> {
    let text: string;
    try {
      text = await element.text();
    } catch (err) {
      return failed('', 0, `unreadable_question: ${describeError(err)}`, 'skipped');
    }

    const match = this.matchAnswer(text, answers);
    if (!match || String(match.value).trim() === '') {
      this.logger.warn('No match for question', { question: text });
      return { status: 'skipped', source: 'skipped', question: text, score: match?.score ?? 0, reason: 'no_answer' };
    }
    if (match.score < minScore) {
      this.logger.warn(`Low confidence match for question (score=${match.score.toFixed(2)})`, { question: text });
      return { status: 'skipped', source: 'skipped', question: text, score: match.score, reason: 'low_confidence' };
    }

    return this.fill(element, text, match.value, match.score, 'static');
  }

  async answerQuestions(
    elements: QuestionElement[],
    answers: AnswerMap,
    minScore: number = MATCHING_THRESHOLDS.confidenceGate,
  ): Promise<QuestionElementResult[]> {
    const results: QuestionElementResult[] = [];
    for (const element of elements) {
      results.push(await this.answerQuestionElement(element, answers, minScore));
    }
    return results;
  }

  /** Locate the question's control and put `value` into it. */
  async fill(
    element: QuestionElement,
    question: string,
    value: AnswerValue,
    score: number,
    source: AnswerSource,
  ): Promise<QuestionElementResult> {
    let input: FormElement | null;
    try {
      input = await element.input();
    } catch (err) {
      return failed(question, score, `no_input: ${describeError(err)}`, source);
    }
    if (!input) {
      this.logger.error('Could not find input for question', { question });
      return failed(question, score, 'no_input', source);
    }

    const outcome = await fillQuestionInput(input, value);
    if (!outcome.ok) {
      this.logger.error('Failed to answer question', { question, reason: outcome.reason });
      return failed(question, score, outcome.reason ?? 'fill_failed', source);
    }
    return { status: 'answered', source, question, value, score, strategy: outcome.strategy };
  }
}

function failed(question: string, score: number, reason: string, source: AnswerSource): QuestionElementResult {
  return { status: 'failed', source, question, score, reason };
}
