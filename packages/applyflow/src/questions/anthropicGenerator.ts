import Anthropic from '@anthropic-ai/sdk';
import { getEnv } from '../config/env.js';
import { describeError } from '../detection/ErrorDetector.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { formatJobContext } from './jobContext.js';
import type { AnswerGenerator, JobContext } from './types.js';

const SYSTEM_PROMPT = 'You are an expert at answering job application questions.';

export function buildAnswerPrompt(question: string, context: JobContext): string {
  let prompt = `Answer this job application question professionally and concisely:\n\nQuestion: ${question}`;
  const jobContext = formatJobContext(context);
  if (jobContext) {
    prompt += `\n\nJob Context:\n${jobContext}`;
  }
  prompt += '\n\nProvide only the answer, no explanation.';
  return prompt;
}

export interface AnthropicAnswerGeneratorOptions {
  /** Preconfigured client; otherwise one is built from apiKey / ANTHROPIC_API_KEY */
  client?: Anthropic;
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  logger?: Logger;
}

/**
 * AnswerGenerator backed by the Anthropic Messages API. Errors propagate
 * to the caller; AnswerCascade treats a throwing generator as "no answer".
 */
export function createAnthropicAnswerGenerator(opts: AnthropicAnswerGeneratorOptions = {}): AnswerGenerator {
  const env = getEnv();
  const client = opts.client ?? new Anthropic({ apiKey: opts.apiKey ?? env.ANTHROPIC_API_KEY });
  const model = opts.model ?? env.APPLYFLOW_ANSWER_MODEL;
  const maxTokens = opts.maxTokens ?? 200;
  const logger = opts.logger ?? getLogger().child({ component: 'AnswerGenerator' });

  return async (question, context) => {
    const started = Date.now();
    const response = await client.messages
      .create({
        model,
        max_tokens: maxTokens,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: buildAnswerPrompt(question, context) }],
      })
      .catch((err: unknown) => {
        logger.error('Answer generation request failed', { model, error: describeError(err) });
        throw err;
      });

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') text += block.text;
    }
    if (response.stop_reason === 'max_tokens') {
      logger.warn('Generated answer was truncated (hit max_tokens)', { maxTokens });
    }

    const answer = text.trim();
    logger.debug('Generated answer', {
      model,
      durationMs: Date.now() - started,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    });
    return answer === '' ? null : answer;
  };
}
