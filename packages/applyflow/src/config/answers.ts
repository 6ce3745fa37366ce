import { readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { z } from 'zod';
import type { AnswerMap } from '../forms/types.js';
import { getEnv } from './env.js';

const AnswerValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const StaticAnswersFileSchema = z.object({
  resumePath: z.string().min(1).optional(),
  answers: z.record(AnswerValueSchema).default({}),
});

export type StaticAnswersFile = z.infer<typeof StaticAnswersFileSchema>;

/**
 * Load the configured question/answer pairs from a YAML file.
 *
 * Entries with an empty string answer are dropped so they never reach a form.
 * Without a path the file named by APPLYFLOW_ANSWERS_FILE is read.
 */
export function loadStaticAnswers(
  filePath: string | undefined = getEnv().APPLYFLOW_ANSWERS_FILE,
): StaticAnswersFile {
  if (!filePath) {
    throw new Error('No answers file given and APPLYFLOW_ANSWERS_FILE is not set');
  }
  const raw = readFileSync(filePath, 'utf-8');
  const result = StaticAnswersFileSchema.safeParse(parse(raw) ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new Error(`Invalid answers file ${filePath}: ${issues.join('; ')}`);
  }

  const answers: AnswerMap = {};
  for (const [question, value] of Object.entries(result.data.answers)) {
    if (typeof value === 'string' && value.trim() === '') continue;
    answers[question] = value;
  }
  return { ...result.data, answers };
}
