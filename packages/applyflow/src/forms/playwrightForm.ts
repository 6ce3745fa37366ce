/**
 * Playwright implementations of the form element capability.
 */

import type { Locator } from 'playwright-core';
import type { FormElement, FormHandle, QuestionElement } from './types.js';

const FIELD_SELECTOR = 'input, select, textarea';

/** Per-action timeout; Playwright's 30s default is far too long for a single field. */
const DEFAULT_ACTION_TIMEOUT_MS = 5_000;

export interface PlaywrightFormOptions {
  actionTimeoutMs?: number;
}

function quoteAttr(value: string): string {
  return `"${value.replace(/["\\]/g, '\\$&')}"`;
}

export class PlaywrightFormElement implements FormElement {
  private timeout: number;

  /**
   * @param scope form or question block that bounds the radio group;
   *   the whole page when omitted
   */
  constructor(
    private readonly locator: Locator,
    private readonly opts: PlaywrightFormOptions = {},
    private readonly scope?: Locator,
  ) {
    this.timeout = opts.actionTimeoutMs ?? DEFAULT_ACTION_TIMEOUT_MS;
  }

  tagName(): Promise<string> {
    return this.locator.evaluate((el) => el.tagName.toLowerCase());
  }

  getAttribute(name: string): Promise<string | null> {
    return this.locator.getAttribute(name, { timeout: this.timeout });
  }

  isChecked(): Promise<boolean> {
    return this.locator.isChecked({ timeout: this.timeout });
  }

  fill(value: string): Promise<void> {
    return this.locator.fill(value, { timeout: this.timeout });
  }

  setChecked(checked: boolean): Promise<void> {
    return this.locator.setChecked(checked, { timeout: this.timeout });
  }

  async selectByLabel(label: string): Promise<void> {
    await this.locator.selectOption({ label }, { timeout: this.timeout });
  }

  async selectByValue(value: string): Promise<void> {
    await this.locator.selectOption({ value }, { timeout: this.timeout });
  }

  setInputFiles(filePath: string): Promise<void> {
    return this.locator.setInputFiles(filePath, { timeout: this.timeout });
  }

  async labelText(): Promise<string | null> {
    const text = await this.locator.evaluate((el) => {
      const label = el instanceof HTMLInputElement ? el.labels?.[0] : undefined;
      return label?.textContent ?? '';
    });
    return text.trim() || null;
  }

  async radioGroup(): Promise<FormElement[]> {
    const name = await this.getAttribute('name');
    if (!name) return [this];
    const selector = `input[type="radio" i][name=${quoteAttr(name)}]`;
    const group = this.scope ? this.scope.locator(selector) : this.locator.page().locator(selector);
    const radios = await group.all();
    return radios.map((l) => new PlaywrightFormElement(l, this.opts, this.scope));
  }
}

export class PlaywrightFormHandle implements FormHandle {
  constructor(private readonly form: Locator, private readonly opts: PlaywrightFormOptions = {}) {}

  async elements(): Promise<FormElement[]> {
    const locators = await this.form.locator(FIELD_SELECTOR).all();
    return locators.map((l) => new PlaywrightFormElement(l, this.opts, this.form));
  }

  async labelTextFor(id: string): Promise<string | null> {
    const label = this.form.locator(`label[for=${quoteAttr(id)}]`).first();
    if ((await label.count()) === 0) return null;
    const text = (await label.innerText()).trim();
    return text || null;
  }
}

export class PlaywrightQuestionElement implements QuestionElement {
  constructor(private readonly container: Locator, private readonly opts: PlaywrightFormOptions = {}) {}

  async text(): Promise<string> {
    return (await this.container.innerText()).trim();
  }

  async input(): Promise<FormElement | null> {
    const control = this.container.locator(FIELD_SELECTOR).first();
    if ((await control.count()) === 0) return null;
    return new PlaywrightFormElement(control, this.opts, this.container);
  }
}
