/**
 * Element capability used by FieldDetector, FormFiller and QuestionMatcher.
 *
 * The engine never talks to a browser directly; it sees forms and fields
 * through these interfaces. playwrightForm.ts provides the Playwright-backed
 * implementation, tests provide in-memory ones.
 */

// ── Element capability ───────────────────────────────────────────────────

export interface FormElement {
  /** Lowercase tag name: input, select, textarea, ... */
  tagName(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  isChecked(): Promise<boolean>;
  fill(value: string): Promise<void>;
  setChecked(checked: boolean): Promise<void>;
  selectByLabel(label: string): Promise<void>;
  selectByValue(value: string): Promise<void>;
  setInputFiles(filePath: string): Promise<void>;
  /** Text of the label attached to this control, or null */
  labelText(): Promise<string | null>;
  /**
   * Every radio sharing this control's name within the same form or
   * question block, in document order. A radio without a name is its own
   * group.
   */
  radioGroup(): Promise<FormElement[]>;
}

export interface FormHandle {
  /** Every input, select and textarea inside the form, in document order */
  elements(): Promise<FormElement[]>;
  /** Text of the <label for="id"> inside the form, or null */
  labelTextFor(id: string): Promise<string | null>;
}

/** A question block on the page: its visible text plus the control that answers it. */
export interface QuestionElement {
  text(): Promise<string>;
  input(): Promise<FormElement | null>;
}

// ── Field model ──────────────────────────────────────────────────────────

export type FieldType = 'text' | 'select' | 'checkbox' | 'radio' | 'file';

export interface FieldDescriptor {
  element: FormElement;
  /** Position among the form's elements */
  index: number;
  /** aria-label, name, id, placeholder, label text (most authoritative first) */
  labelCandidates: string[];
  fieldType: FieldType;
  required: boolean;
}

export type AnswerValue = string | number | boolean;

export type AnswerMap = Record<string, AnswerValue>;

export interface AnswerCandidate {
  key: string;
  value: AnswerValue;
  /** 0..1 */
  score: number;
}

// ── Fill outcomes ────────────────────────────────────────────────────────

export type SelectStrategy = 'visible_text' | 'value';

export type FieldFillStatus = 'filled' | 'skipped' | 'failed' | 'unlabeled';

export interface FieldFillResult {
  /** First label candidate, or field_<index> when there is none */
  field: string;
  fieldType: FieldType;
  status: FieldFillStatus;
  matchedKey?: string;
  score?: number;
  strategy?: SelectStrategy;
  reason?: string;
}

export interface FillReport {
  results: FieldFillResult[];
  totalFields: number;
  filled: number;
  skipped: number;
  failed: number;
  unlabeled: number;
}
