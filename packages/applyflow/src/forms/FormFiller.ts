/**
 * FormFiller — matches detected fields to an answers map and fills them.
 *
 * Matching a field tries, against every label candidate:
 *   1. exact equality after label normalization (score 1.0)
 *   2. Jaccard token overlap, keeping the best score
 * and fills only when the best score exceeds the field-match threshold.
 *
 * One field failing never stops the pass; every outcome lands in the
 * FillReport.
 */

import { MATCHING_THRESHOLDS } from '../config/matching.js';
import { describeError } from '../detection/ErrorDetector.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { jaccard, normalizeLabel, tokenSet } from '../questions/similarity.js';
import { applyAnswer } from './applyAnswer.js';
import { FieldDetector } from './FieldDetector.js';
import type {
  AnswerCandidate,
  AnswerMap,
  FieldDescriptor,
  FieldFillResult,
  FillReport,
  FormHandle,
} from './types.js';

const RESUME_TOKENS = new Set(['resume', 'résumé', 'cv', 'document', 'documents']);
const RESUME_PHRASES = ['curriculum vitae'];

/** True when any label candidate looks like a resume/CV upload. */
export function isResumeField(field: FieldDescriptor): boolean {
  return field.labelCandidates.some((candidate) => {
    const normalized = normalizeLabel(candidate);
    if (RESUME_PHRASES.some((phrase) => normalized.includes(phrase))) return true;
    for (const token of tokenSet(normalized)) {
      if (RESUME_TOKENS.has(token)) return true;
    }
    return false;
  });
}

export interface FormFillerOptions {
  detector?: FieldDetector;
  fieldMatchThreshold?: number;
  /** Uploaded into resume-like file fields that no answer key matches */
  resumePath?: string;
  pathExists?: (filePath: string) => boolean;
  /** Called with an integer percentage after each field */
  onProgress?: (percent: number) => void;
  logger?: Logger;
}

export class FormFiller {
  private detector: FieldDetector;
  private threshold: number;
  private resumePath: string | undefined;
  private pathExists: ((filePath: string) => boolean) | undefined;
  private onProgress: ((percent: number) => void) | undefined;
  private logger: Logger;

  constructor(opts: FormFillerOptions = {}) {
    this.logger = opts.logger ?? getLogger().child({ component: 'FormFiller' });
    this.detector = opts.detector ?? new FieldDetector({ logger: this.logger });
    this.threshold = opts.fieldMatchThreshold ?? MATCHING_THRESHOLDS.fieldMatch;
    this.resumePath = opts.resumePath;
    this.pathExists = opts.pathExists;
    this.onProgress = opts.onProgress;
  }

  detectFields(form: FormHandle): Promise<FieldDescriptor[]> {
    return this.detector.detectFields(form);
  }

  /**
   * Best-scoring answer for a field across all of its label candidates,
   * or null when the field has no candidates or the map is empty.
   * The threshold is not applied here.
   */
  bestAnswerFor(field: FieldDescriptor, answers: AnswerMap): AnswerCandidate | null {
    const keys = Object.entries(answers).map(([key, value]) => ({ key, value, normalized: normalizeLabel(key) }));
    const labels = field.labelCandidates.map(normalizeLabel).filter(Boolean);

    for (const label of labels) {
      const exact = keys.find((k) => k.normalized === label);
      if (exact) return { key: exact.key, value: exact.value, score: 1.0 };
    }

    let best: AnswerCandidate | null = null;
    for (const label of labels) {
      for (const k of keys) {
        const score = jaccard(label, k.normalized);
        if (!best || score > best.score) {
          best = { key: k.key, value: k.value, score };
        }
      }
    }
    return best;
  }

  async fillForm(form: FormHandle, answers: AnswerMap): Promise<FillReport> {
    let fields: FieldDescriptor[];
    try {
      fields = await this.detector.detectFields(form);
    } catch (err) {
      this.logger.error('Field detection failed', { error: describeError(err) });
      fields = [];
    }

    const results: FieldFillResult[] = [];
    for (const [i, field] of fields.entries()) {
      results.push(await this.fillField(field, answers));
      this.reportProgress(Math.floor(((i + 1) / fields.length) * 100));
    }

    const report: FillReport = {
      results,
      totalFields: fields.length,
      filled: results.filter((r) => r.status === 'filled').length,
      skipped: results.filter((r) => r.status === 'skipped').length,
      failed: results.filter((r) => r.status === 'failed').length,
      unlabeled: results.filter((r) => r.status === 'unlabeled').length,
    };

    this.logger.info('Form fill pass complete', {
      totalFields: report.totalFields,
      filled: report.filled,
      skipped: report.skipped,
      failed: report.failed,
      unlabeled: report.unlabeled,
    });
    return report;
  }

  /** File inputs whose labels look like a resume/CV upload. */
  async findResumeFields(form: FormHandle): Promise<FieldDescriptor[]> {
    const fields = await this.detector.detectFields(form);
    return fields.filter((f) => f.fieldType === 'file' && isResumeField(f));
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private async fillField(field: FieldDescriptor, answers: AnswerMap): Promise<FieldFillResult> {
    const name = field.labelCandidates[0] ?? `field_${field.index}`;
    const base = { field: name, fieldType: field.fieldType };

    if (field.labelCandidates.length === 0) {
      if (field.required) {
        this.logger.warn('Required field has no label candidates', { index: field.index });
      }
      return { ...base, status: 'unlabeled', reason: 'no_label_candidates' };
    }

    const candidate = this.bestAnswerFor(field, answers);
    let match = candidate && candidate.score > this.threshold ? candidate : null;

    if (!match && field.fieldType === 'file' && this.resumePath && isResumeField(field)) {
      match = { key: 'resumePath', value: this.resumePath, score: 1.0 };
    }

    if (!match) {
      if (field.required) {
        this.logger.warn('Required field unmatched', { field: name, bestScore: candidate?.score ?? 0 });
      }
      return {
        ...base,
        status: 'skipped',
        reason: candidate && candidate.score > 0 ? 'low_confidence' : 'no_answer',
        score: candidate?.score ?? 0,
      };
    }

    if (String(match.value).trim() === '') {
      return { ...base, status: 'skipped', matchedKey: match.key, score: match.score, reason: 'empty_answer' };
    }

    const outcome = await applyAnswer(field.element, field.fieldType, match.value, { pathExists: this.pathExists });
    if (!outcome.ok) {
      this.logger.warn('Field fill failed', { field: name, reason: outcome.reason });
      return { ...base, status: 'failed', matchedKey: match.key, score: match.score, reason: outcome.reason };
    }

    return { ...base, status: 'filled', matchedKey: match.key, score: match.score, strategy: outcome.strategy };
  }

  private reportProgress(percent: number): void {
    if (!this.onProgress) return;
    try {
      this.onProgress(percent);
    } catch (err) {
      this.logger.debug('Progress callback threw', { error: describeError(err) });
    }
  }
}
