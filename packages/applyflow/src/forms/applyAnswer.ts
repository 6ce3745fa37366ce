import { existsSync } from 'node:fs';
import { describeError } from '../detection/ErrorDetector.js';
import { normalizeLabel } from '../questions/similarity.js';
import type { AnswerValue, FieldType, FormElement, SelectStrategy } from './types.js';

export interface ApplyOutcome {
  ok: boolean;
  strategy?: SelectStrategy;
  reason?: string;
}

export interface ApplyOptions {
  /** Checked before any upload; defaults to fs.existsSync */
  pathExists?: (filePath: string) => boolean;
}

const TRUTHY = new Set(['yes', 'y', 'true', '1', 'on', 'checked', 'agree', 'i agree']);

/** Interpret an answer as a checkbox state. */
export function toChecked(value: AnswerValue): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  return TRUTHY.has(value.trim().toLowerCase());
}

/** Normalized option texts a radio answer may select. */
function radioTargets(value: AnswerValue): string[] {
  if (typeof value === 'boolean') return value ? ['yes', 'true'] : ['no', 'false'];
  return [normalizeLabel(String(value))];
}

/**
 * Check the radio in the element's group whose value attribute or label
 * text equals the answer. Siblings are never unchecked directly.
 */
async function selectRadio(element: FormElement, value: AnswerValue): Promise<ApplyOutcome> {
  const targets = radioTargets(value);
  for (const option of await element.radioGroup()) {
    const texts = [await option.getAttribute('value'), await option.labelText()];
    const matches = texts.some((t) => t !== null && targets.includes(normalizeLabel(t)));
    if (!matches) continue;
    if (!(await option.isChecked())) {
      await option.setChecked(true);
    }
    return { ok: true };
  }
  return { ok: false, reason: 'no_matching_option' };
}

const IGNORED_INPUT_TYPES = new Set(['hidden', 'submit', 'button', 'reset', 'image']);

/**
 * Map a tag/type pair to a FieldType, or null for controls that never
 * take an answer (hidden inputs, buttons).
 */
export function fieldTypeOf(tagName: string, inputType: string): FieldType | null {
  const tag = tagName.toLowerCase();
  const type = inputType.toLowerCase();
  if (tag === 'select') return 'select';
  if (tag === 'textarea') return 'text';
  if (tag !== 'input') return null;
  if (IGNORED_INPUT_TYPES.has(type)) return null;
  if (type === 'checkbox') return 'checkbox';
  if (type === 'radio') return 'radio';
  if (type === 'file') return 'file';
  return 'text';
}

/**
 * Put one answer into one control. Never throws; failures come back as
 * `{ ok: false, reason }`.
 *
 * Selects try the visible option text first and the option value second,
 * reporting which one worked. Radios pick the option of their group that
 * matches the answer.
 */
export async function applyAnswer(
  element: FormElement,
  fieldType: FieldType,
  value: AnswerValue,
  opts: ApplyOptions = {},
): Promise<ApplyOutcome> {
  const text = String(value);

  switch (fieldType) {
    case 'select': {
      let byLabelError: unknown;
      try {
        await element.selectByLabel(text);
        return { ok: true, strategy: 'visible_text' };
      } catch (err) {
        byLabelError = err;
      }
      try {
        await element.selectByValue(text);
        return { ok: true, strategy: 'value' };
      } catch (err) {
        return { ok: false, reason: `select_failed: ${describeError(byLabelError)}; ${describeError(err)}` };
      }
    }

    case 'radio': {
      try {
        return await selectRadio(element, value);
      } catch (err) {
        return { ok: false, reason: `click_failed: ${describeError(err)}` };
      }
    }

    case 'checkbox': {
      try {
        const desired = toChecked(value);
        if ((await element.isChecked()) !== desired) {
          await element.setChecked(desired);
        }
        return { ok: true };
      } catch (err) {
        return { ok: false, reason: `click_failed: ${describeError(err)}` };
      }
    }

    case 'file': {
      const pathExists = opts.pathExists ?? existsSync;
      if (!pathExists(text)) {
        return { ok: false, reason: `file_not_found: ${text}` };
      }
      try {
        await element.setInputFiles(text);
        return { ok: true };
      } catch (err) {
        return { ok: false, reason: `upload_failed: ${describeError(err)}` };
      }
    }

    default: {
      try {
        await element.fill(text);
        return { ok: true };
      } catch (err) {
        return { ok: false, reason: `typing_failed: ${describeError(err)}` };
      }
    }
  }
}
