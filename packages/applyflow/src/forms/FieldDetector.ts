/**
 * FieldDetector — enumerates the answerable controls of a form.
 *
 * For every input/select/textarea it collects each available label source
 * in authority order: aria-label, name, id, placeholder, then the text of
 * an associated <label for=...>. Hidden inputs and buttons are ignored.
 * A named radio group is reported once, at its first radio.
 */

import { describeError } from '../detection/ErrorDetector.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { fieldTypeOf } from './applyAnswer.js';
import type { FieldDescriptor, FormElement, FormHandle } from './types.js';

const ATTRIBUTE_SOURCES = ['aria-label', 'name', 'id', 'placeholder'] as const;

export interface FieldDetectorOptions {
  logger?: Logger;
}

export class FieldDetector {
  private logger: Logger;

  constructor(opts: FieldDetectorOptions = {}) {
    this.logger = opts.logger ?? getLogger().child({ component: 'FieldDetector' });
  }

  async detectFields(form: FormHandle): Promise<FieldDescriptor[]> {
    const elements = await form.elements();
    const fields: FieldDescriptor[] = [];
    const radioGroups = new Set<string>();

    for (const [index, element] of elements.entries()) {
      try {
        const field = await this.describe(form, element, index, radioGroups);
        if (field) fields.push(field);
      } catch (err) {
        this.logger.debug('Skipping unreadable form element', { index, error: describeError(err) });
      }
    }

    this.logger.debug(`Detected ${fields.length} form fields`, {
      fields: fields.map((f) => f.labelCandidates[0] ?? `field_${f.index}`),
    });
    return fields;
  }

  private async describe(
    form: FormHandle,
    element: FormElement,
    index: number,
    radioGroups: Set<string>,
  ): Promise<FieldDescriptor | null> {
    const tagName = await element.tagName();
    const inputType = (await element.getAttribute('type')) ?? '';
    const fieldType = fieldTypeOf(tagName, inputType);
    if (!fieldType) return null;

    if (fieldType === 'radio') {
      const group = (await element.getAttribute('name'))?.trim();
      if (group) {
        if (radioGroups.has(group)) return null;
        radioGroups.add(group);
      }
    }

    const candidates: string[] = [];
    const push = (value: string | null) => {
      const trimmed = value?.trim();
      if (trimmed && !candidates.includes(trimmed)) candidates.push(trimmed);
    };

    let id: string | null = null;
    for (const attr of ATTRIBUTE_SOURCES) {
      const value = await element.getAttribute(attr);
      if (attr === 'id') id = value?.trim() || null;
      push(value);
    }
    if (id) {
      push(await form.labelTextFor(id));
    }

    const required =
      (await element.getAttribute('required')) !== null ||
      (await element.getAttribute('aria-required')) === 'true';

    return { element, index, labelCandidates: candidates, fieldType, required };
  }
}
