import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, describe, expect, test, vi } from 'vitest';
import { FormFiller, isResumeField } from '../../../src/forms/FormFiller.js';
import type { FieldDescriptor, FormHandle } from '../../../src/forms/types.js';
import { Logger } from '../../../src/monitoring/logger.js';
import { FakeElement, FakeForm, fakeRadioGroup } from '../../fixtures/fakeForm.js';

// ── Helpers ───────────────────────────────────────────────────────────────

const quietLogger = new Logger({ level: 'error', service: 'test' });

function createFiller(opts: ConstructorParameters<typeof FormFiller>[0] = {}): FormFiller {
  return new FormFiller({ logger: quietLogger, ...opts });
}

function descriptor(labelCandidates: string[], fieldType: FieldDescriptor['fieldType'] = 'text'): FieldDescriptor {
  return { element: new FakeElement(), index: 0, labelCandidates, fieldType, required: false };
}

const ANSWERS = {
  'First Name': 'Ada',
  Email: 'ada@example.com',
  'Phone Number': '555-0100',
  Country: 'Canada',
  'Willing to relocate': 'Yes',
};

// ── Tests ─────────────────────────────────────────────────────────────────

describe('FormFiller', () => {
  describe('fillForm', () => {
    test('fills matched fields and reports every outcome', async () => {
      const firstName = new FakeElement({ attrs: { name: 'firstName' } });
      const email = new FakeElement({ attrs: { type: 'email', 'aria-label': 'Email address' } });
      const phone = new FakeElement({ attrs: { type: 'tel', placeholder: 'Mobile phone number' } });
      const country = new FakeElement({
        tag: 'select',
        attrs: { name: 'country' },
        options: [
          { label: 'United States', value: 'US' },
          { label: 'Canada', value: 'CA' },
        ],
      });
      const relocate = new FakeElement({ attrs: { type: 'checkbox', name: 'willing_to_relocate' } });
      const mystery = new FakeElement();
      const linkedin = new FakeElement({ attrs: { name: 'linkedin' } });
      const progress: number[] = [];
      const filler = createFiller({ onProgress: (p) => progress.push(p) });

      const report = await filler.fillForm(
        new FakeForm([firstName, email, phone, country, relocate, mystery, linkedin]),
        ANSWERS,
      );

      expect(firstName.value).toBe('Ada');
      expect(email.value).toBeNull();
      expect(phone.value).toBe('555-0100');
      expect(country.selected).toBe('CA');
      expect(relocate.checked).toBe(true);
      expect(linkedin.value).toBeNull();

      expect(report.results).toEqual([
        { field: 'firstName', fieldType: 'text', status: 'filled', matchedKey: 'First Name', score: 1, strategy: undefined },
        { field: 'Email address', fieldType: 'text', status: 'skipped', reason: 'low_confidence', score: 0.5 },
        {
          field: 'Mobile phone number',
          fieldType: 'text',
          status: 'filled',
          matchedKey: 'Phone Number',
          score: 2 / 3,
          strategy: undefined,
        },
        { field: 'country', fieldType: 'select', status: 'filled', matchedKey: 'Country', score: 1, strategy: 'visible_text' },
        {
          field: 'willing_to_relocate',
          fieldType: 'checkbox',
          status: 'filled',
          matchedKey: 'Willing to relocate',
          score: 1,
          strategy: undefined,
        },
        { field: 'field_5', fieldType: 'text', status: 'unlabeled', reason: 'no_label_candidates' },
        { field: 'linkedin', fieldType: 'text', status: 'skipped', reason: 'no_answer', score: 0 },
      ]);
      expect(report).toMatchObject({ totalFields: 7, filled: 4, skipped: 2, failed: 0, unlabeled: 1 });
      expect(progress).toEqual([14, 28, 42, 57, 71, 85, 100]);
    });

    test('falls back to the option value when no option has that label', async () => {
      const select = new FakeElement({
        tag: 'select',
        attrs: { name: 'country' },
        options: [{ label: 'Canada', value: 'CA' }],
      });

      const report = await createFiller().fillForm(new FakeForm([select]), { country: 'CA' });

      expect(select.selected).toBe('CA');
      expect(report.results[0]?.strategy).toBe('value');
    });

    test('reports a select with no matching option as failed', async () => {
      const select = new FakeElement({
        tag: 'select',
        attrs: { name: 'country' },
        options: [{ label: 'Canada', value: 'CA' }],
      });

      const report = await createFiller().fillForm(new FakeForm([select]), { country: 'Mars' });

      expect(report.failed).toBe(1);
      expect(report.results[0]?.reason).toBe(
        'select_failed: No option with label "Mars"; No option with value "Mars"',
      );
    });

    test('leaves a checkbox alone when it is already in the desired state', async () => {
      const box = new FakeElement({ attrs: { type: 'checkbox', name: 'terms' }, checked: true });

      await createFiller().fillForm(new FakeForm([box]), { terms: 'I agree' });

      expect(box.checked).toBe(true);
      expect(box.setCheckedCalls).toBe(0);
    });

    test('skips a matched field whose answer is blank', async () => {
      const input = new FakeElement({ attrs: { name: 'first_name' } });

      const report = await createFiller().fillForm(new FakeForm([input]), { 'First Name': '  ' });

      expect(input.value).toBeNull();
      expect(report.results[0]).toEqual({
        field: 'first_name',
        fieldType: 'text',
        status: 'skipped',
        matchedKey: 'First Name',
        score: 1,
        reason: 'empty_answer',
      });
    });

    test('records a failing control and keeps going', async () => {
      const broken = new FakeElement({ attrs: { name: 'city' } });
      vi.spyOn(broken, 'fill').mockRejectedValue(new Error('element is disabled'));
      const zip = new FakeElement({ attrs: { name: 'zip' } });

      const report = await createFiller().fillForm(new FakeForm([broken, zip]), { City: 'Toronto', Zip: 'M5V' });

      expect(report.results[0]?.status).toBe('failed');
      expect(report.results[0]?.reason).toBe('typing_failed: element is disabled');
      expect(zip.value).toBe('M5V');
    });

    test('returns an empty report when the form cannot be read', async () => {
      const form: FormHandle = {
        elements: async () => {
          throw new Error('frame was detached');
        },
        labelTextFor: async () => null,
      };

      const report = await createFiller().fillForm(form, ANSWERS);

      expect(report).toEqual({ results: [], totalFields: 0, filled: 0, skipped: 0, failed: 0, unlabeled: 0 });
    });

    test('honours a custom field-match threshold', async () => {
      const email = new FakeElement({ attrs: { 'aria-label': 'Email address' } });

      await createFiller({ fieldMatchThreshold: 0.4 }).fillForm(new FakeForm([email]), ANSWERS);

      expect(email.value).toBe('ada@example.com');
    });
  });

  describe('radio groups', () => {
    test('checks only the option matching the answer and reports the group once', async () => {
      const [yes, no] = fakeRadioGroup('sponsorship', [{ value: 'Yes' }, { value: 'No' }]);

      const report = await createFiller().fillForm(new FakeForm([yes, no]), { sponsorship: 'Yes' });

      expect(yes.checked).toBe(true);
      expect(no.checked).toBe(false);
      expect(report.results).toEqual([
        { field: 'sponsorship', fieldType: 'radio', status: 'filled', matchedKey: 'sponsorship', score: 1, strategy: undefined },
      ]);
    });

    test('moves the selection to another option', async () => {
      const [yes, no] = fakeRadioGroup('sponsorship', [{ value: 'Yes', checked: true }, { value: 'No' }]);

      const report = await createFiller().fillForm(new FakeForm([yes, no]), { sponsorship: 'No' });

      expect(yes.checked).toBe(false);
      expect(no.checked).toBe(true);
      expect(yes.setCheckedCalls).toBe(0);
      expect(report.filled).toBe(1);
    });

    test('matches options by label text for boolean answers', async () => {
      const [agree, decline] = fakeRadioGroup('relocate', [
        { value: '1', label: 'Yes' },
        { value: '0', label: 'No' },
      ]);

      await createFiller().fillForm(new FakeForm([agree, decline]), { relocate: false });

      expect(agree.checked).toBe(false);
      expect(decline.checked).toBe(true);
    });

    test('fails without touching the group when no option matches', async () => {
      const [yes, no] = fakeRadioGroup('sponsorship', [{ value: 'Yes' }, { value: 'No' }]);

      const report = await createFiller().fillForm(new FakeForm([yes, no]), { sponsorship: 'Maybe' });

      expect(yes.checked).toBe(false);
      expect(no.checked).toBe(false);
      expect(report.results[0]).toMatchObject({ status: 'failed', reason: 'no_matching_option' });
      expect(report.failed).toBe(1);
    });
  });

  describe('file uploads', () => {
    const dir = mkdtempSync(join(tmpdir(), 'applyflow-form-'));
    const resume = join(dir, 'resume.pdf');
    writeFileSync(resume, 'resume');

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    test('uploads a file whose path exists', async () => {
      const upload = new FakeElement({ attrs: { type: 'file', name: 'resume' } });

      const report = await createFiller().fillForm(new FakeForm([upload]), { Resume: resume });

      expect(upload.uploaded).toBe(resume);
      expect(report.filled).toBe(1);
    });

    test('refuses to upload a missing file', async () => {
      const upload = new FakeElement({ attrs: { type: 'file', name: 'resume' } });
      const missing = join(dir, 'missing.pdf');

      const report = await createFiller().fillForm(new FakeForm([upload]), { Resume: missing });

      expect(upload.uploaded).toBeNull();
      expect(report.results[0]?.status).toBe('failed');
      expect(report.results[0]?.reason).toBe(`file_not_found: ${missing}`);
    });

    test('uses the configured resume for an unmatched resume field', async () => {
      const upload = new FakeElement({ attrs: { type: 'file', 'aria-label': 'Upload your CV' } });
      const filler = createFiller({ resumePath: '/profiles/ada.pdf', pathExists: () => true });

      const report = await filler.fillForm(new FakeForm([upload]), {});

      expect(upload.uploaded).toBe('/profiles/ada.pdf');
      expect(report.results[0]).toMatchObject({ status: 'filled', matchedKey: 'resumePath', score: 1 });
    });
  });

  describe('bestAnswerFor', () => {
    const filler = createFiller();

    test('an exact match on any candidate scores 1.0', () => {
      const field = descriptor(['q_1234', 'Years of experience']);
      expect(filler.bestAnswerFor(field, { 'years of experience': '5' })).toEqual({
        key: 'years of experience',
        value: '5',
        score: 1,
      });
    });

    test('returns the best partial match without applying the threshold', () => {
      const field = descriptor(['Email address']);
      expect(filler.bestAnswerFor(field, ANSWERS)).toEqual({ key: 'Email', value: 'ada@example.com', score: 0.5 });
    });

    test('returns null without candidates or answers', () => {
      expect(filler.bestAnswerFor(descriptor([]), ANSWERS)).toBeNull();
      expect(filler.bestAnswerFor(descriptor(['city']), {})).toBeNull();
    });
  });

  describe('resume fields', () => {
    test('isResumeField recognises common labels', () => {
      expect(isResumeField(descriptor(['resumeUpload'], 'file'))).toBe(true);
      expect(isResumeField(descriptor(['Attach CV'], 'file'))).toBe(true);
      expect(isResumeField(descriptor(['Curriculum Vitae (PDF)'], 'file'))).toBe(true);
      expect(isResumeField(descriptor(['cover_letter'], 'file'))).toBe(false);
    });

    test('findResumeFields returns only file inputs with resume-like labels', async () => {
      const form = new FakeForm([
        new FakeElement({ attrs: { type: 'file', name: 'cover_letter' } }),
        new FakeElement({ attrs: { type: 'text', name: 'resume_headline' } }),
        new FakeElement({ attrs: { type: 'file', name: 'cv_upload' } }),
      ]);

      const fields = await createFiller().findResumeFields(form);

      expect(fields.map((f) => f.index)).toEqual([2]);
    });
  });
});
