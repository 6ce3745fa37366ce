import { describe, expect, test } from 'vitest';
import { createQuestion, formatJobContext } from '../../../src/questions/jobContext.js';

describe('createQuestion', () => {
  test('normalizes the text and keeps context hints', () => {
    expect(createQuestion('Why Example Corp?', { jobTitle: 'SRE', company: 'Example Corp', location: 'Remote' })).toEqual({
      text: 'Why Example Corp?',
      normalizedText: 'why example corp',
      contextHints: { jobTitle: 'SRE', company: 'Example Corp', jobDescriptionSnippet: undefined },
    });
  });

  test('cuts the description snippet to 500 characters', () => {
    const question = createQuestion('Why?', { description: 'a'.repeat(501) });
    expect(question.contextHints.jobDescriptionSnippet).toBe('a'.repeat(500));
  });
});

describe('formatJobContext', () => {
  test('renders known fields one per line', () => {
    expect(
      formatJobContext({ jobTitle: 'SRE', company: 'Example Corp', location: 'Remote', description: 'Keep it running.' }),
    ).toBe('Job Title: SRE\nCompany: Example Corp\nLocation: Remote\nJob Description: Keep it running.');
  });

  test('returns an empty string when nothing is known', () => {
    expect(formatJobContext({})).toBe('');
  });
});
