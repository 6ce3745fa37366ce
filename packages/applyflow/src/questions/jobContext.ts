import { normalizeText } from './similarity.js';
import type { JobContext, Question } from './types.js';

const DESCRIPTION_LIMIT = 500;

export function createQuestion(text: string, context: JobContext = {}): Question {
  return {
    text,
    normalizedText: normalizeText(text),
    contextHints: {
      jobTitle: context.jobTitle,
      company: context.company,
      jobDescriptionSnippet: context.description?.slice(0, DESCRIPTION_LIMIT),
    },
  };
}

/**
 * Render job context as the plain-text block handed to the answer
 * generator and stored alongside learned answers. Returns '' when
 * nothing is known.
 */
export function formatJobContext(context: JobContext): string {
  const lines: string[] = [];
  if (context.jobTitle) lines.push(`Job Title: ${context.jobTitle}`);
  if (context.company) lines.push(`Company: ${context.company}`);
  if (context.location) lines.push(`Location: ${context.location}`);
  if (context.description) lines.push(`Job Description: ${context.description.slice(0, DESCRIPTION_LIMIT)}`);
  return lines.join('\n');
}
