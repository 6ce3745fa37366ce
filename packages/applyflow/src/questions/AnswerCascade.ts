/**
 * AnswerCascade — answers a question from the first source that can:
 *
 *   1. learned    stored answer from the LearnedAnswerStore
 *   2. generated  AnswerGenerator output, stored back for next time
 *   3. static     configured answers via QuestionMatcher
 *   4. skipped    nothing usable
 *
 * A source that fails (store error, generator throws or returns nothing)
 * falls through to the next one. Any source whose confidence is below
 * `minScore` is passed over too.
 */

import { MATCHING_THRESHOLDS } from '../config/matching.js';
import { describeError } from '../detection/ErrorDetector.js';
import type { AnswerMap, QuestionElement } from '../forms/types.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { createQuestion, formatJobContext } from './jobContext.js';
import type { LearnedAnswerStore } from './LearnedAnswerStore.js';
import { QuestionMatcher } from './QuestionMatcher.js';
import type { AnswerGenerator, AnsweredQuestion, JobContext, Question, QuestionElementResult } from './types.js';

export interface AnswerCascadeOptions {
  store?: LearnedAnswerStore;
  generator?: AnswerGenerator;
  staticAnswers?: AnswerMap;
  matcher?: QuestionMatcher;
  /** Minimum similarity for reusing a learned answer */
  reuseThreshold?: number;
  /** Confidence reported for generated answers */
  generatedConfidence?: number;
  logger?: Logger;
}

export class AnswerCascade {
  private store: LearnedAnswerStore | undefined;
  private generator: AnswerGenerator | undefined;
  private staticAnswers: AnswerMap;
  private matcher: QuestionMatcher;
  private reuseThreshold: number;
  private generatedConfidence: number;
  private logger: Logger;

  constructor(opts: AnswerCascadeOptions = {}) {
    this.logger = opts.logger ?? getLogger().child({ component: 'AnswerCascade' });
    this.store = opts.store;
    this.generator = opts.generator;
    this.staticAnswers = opts.staticAnswers ?? {};
    this.matcher = opts.matcher ?? new QuestionMatcher({ logger: this.logger });
    this.reuseThreshold = opts.reuseThreshold ?? MATCHING_THRESHOLDS.learnedReuse;
    this.generatedConfidence = opts.generatedConfidence ?? MATCHING_THRESHOLDS.generatedConfidence;
  }

  async answerQuestion(
    question: Question | string,
    context: JobContext = {},
    minScore: number = MATCHING_THRESHOLDS.confidenceGate,
  ): Promise<AnsweredQuestion> {
    const q = typeof question === 'string' ? createQuestion(question, context) : question;
    const log = this.logger.child({ question: q.text });

    if (!q.normalizedText) {
      return skipped(q, 'no_answer');
    }

    const learned = this.fromStore(q, minScore, log);
    if (learned) return learned;

    const generated = await this.fromGenerator(q, context, minScore, log);
    if (generated) return generated;

    const match = this.matcher.matchAnswer(q.text, this.staticAnswers);
    if (match && String(match.value).trim() !== '') {
      if (match.score >= minScore) {
        log.debug('Answered from static answers', { key: match.key, score: match.score });
        return { question: q, answer: String(match.value), source: 'static', confidenceScore: match.score };
      }
      log.warn(`Low confidence match for question (score=${match.score.toFixed(2)})`);
      return { ...skipped(q, 'low_confidence'), confidenceScore: match.score };
    }

    log.warn('No answer found for question');
    return skipped(q, 'no_answer');
  }

  /**
   * Answer an on-page question and fill its control. A skipped answer
   * leaves the control untouched.
   */
  async answerQuestionElement(
    element: QuestionElement,
    context: JobContext = {},
    minScore: number = MATCHING_THRESHOLDS.confidenceGate,
  ): Promise<QuestionElementResult> {
    let text: string;
    try {
      text = await element.text();
    } catch (err) {
      return {
        status: 'failed',
        source: 'skipped',
        question: '',
        score: 0,
        reason: `unreadable_question: ${describeError(err)}`,
      };
    }

    const answered = await this.answerQuestion(text, context, minScore);
    if (answered.source === 'skipped') {
      return {
        status: 'skipped',
        source: 'skipped',
        question: text,
        score: answered.confidenceScore,
        reason: answered.reason,
      };
    }
    return this.matcher.fill(element, text, answered.answer, answered.confidenceScore, answered.source);
  }

  // ── Sources ────────────────────────────────────────────────────────────

  private fromStore(q: Question, minScore: number, log: Logger): AnsweredQuestion | null {
    if (!this.store) return null;
    try {
      const match = this.store.findBestMatch(q.text);
      if (!match || match.score < this.reuseThreshold || match.score < minScore) return null;
      this.store.recordUsage(match.entry.id);
      log.debug('Reusing learned answer', { id: match.entry.id, score: match.score });
      return {
        question: q,
        answer: match.entry.answer,
        source: 'learned',
        confidenceScore: match.score,
        learnedEntryId: match.entry.id,
      };
    } catch (err) {
      log.warn('Learned answer lookup failed', { error: describeError(err) });
      return null;
    }
  }

  private async fromGenerator(
    q: Question,
    context: JobContext,
    minScore: number,
    log: Logger,
  ): Promise<AnsweredQuestion | null> {
    if (!this.generator || this.generatedConfidence < minScore) return null;

    let answer: string;
    try {
      answer = ((await this.generator(q.text, context)) ?? '').trim();
    } catch (err) {
      log.warn('Answer generator failed', { error: describeError(err) });
      return null;
    }
    if (!answer) return null;

    const result: AnsweredQuestion = {
      question: q,
      answer,
      source: 'generated',
      confidenceScore: this.generatedConfidence,
    };

    if (this.store) {
      try {
        const entry = this.store.upsert(q.text, answer, {
          jobTitle: context.jobTitle,
          company: context.company,
          jobContext: formatJobContext(context) || undefined,
        });
        result.learnedEntryId = entry.id;
      } catch (err) {
        log.warn('Could not store generated answer', { error: describeError(err) });
      }
    }

    log.info('Generated answer for question');
    return result;
  }
}

function skipped(question: Question, reason: string): AnsweredQuestion {
  return { question, answer: '', source: 'skipped', confidenceScore: 0, reason };
}
