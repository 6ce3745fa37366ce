import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'success', 'warn', 'error']).optional(),
  APPLYFLOW_QUESTION_DB: z.string().min(1).default('data/questions.db'),
  APPLYFLOW_ANSWERS_FILE: z.string().min(1).optional(),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  APPLYFLOW_ANSWER_MODEL: z.string().min(1).default('claude-haiku-4-5-20251001'),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}
