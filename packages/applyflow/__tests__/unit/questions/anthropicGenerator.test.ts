import type Anthropic from '@anthropic-ai/sdk';
import { describe, expect, test, vi } from 'vitest';
import { Logger } from '../../../src/monitoring/logger.js';
import { buildAnswerPrompt, createAnthropicAnswerGenerator } from '../../../src/questions/anthropicGenerator.js';

// ── Helpers ───────────────────────────────────────────────────────────────

type ContentBlock = { type: 'text'; text: string } | { type: 'tool_use'; id: string; name: string; input: unknown };

function createMockClient(content: ContentBlock[], stopReason = 'end_turn') {
  const create = vi.fn().mockResolvedValue({
    content,
    stop_reason: stopReason,
    usage: { input_tokens: 42, output_tokens: 7 },
  });
  return { client: { messages: { create } } as unknown as Anthropic, create };
}

const quietLogger = new Logger({ level: 'error', service: 'test' });

// ── Tests ─────────────────────────────────────────────────────────────────

describe('buildAnswerPrompt', () => {
  test('includes the job context when known', () => {
    expect(buildAnswerPrompt('Why us?', { jobTitle: 'Backend Engineer', company: 'Example Corp' })).toBe(
      'Answer this job application question professionally and concisely:\n\n' +
        'Question: Why us?\n\n' +
        'Job Context:\nJob Title: Backend Engineer\nCompany: Example Corp\n\n' +
        'Provide only the answer, no explanation.',
    );
  });

  test('omits the context block when nothing is known', () => {
    expect(buildAnswerPrompt('Why us?', {})).toBe(
      'Answer this job application question professionally and concisely:\n\n' +
        'Question: Why us?\n\n' +
        'Provide only the answer, no explanation.',
    );
  });
});

describe('createAnthropicAnswerGenerator', () => {
  test('sends the prompt and returns the trimmed text', async () => {
    const { client, create } = createMockClient([{ type: 'text', text: '  I enjoy the mission.\n' }]);
    const generate = createAnthropicAnswerGenerator({ client, model: 'test-model', logger: quietLogger });

    const answer = await generate('Why us?', { company: 'Example Corp' });

    expect(answer).toBe('I enjoy the mission.');
    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 200,
      system: 'You are an expert at answering job application questions.',
      messages: [{ role: 'user', content: buildAnswerPrompt('Why us?', { company: 'Example Corp' }) }],
    });
  });

  test('joins text blocks and ignores other content', async () => {
    const { client } = createMockClient([
      { type: 'text', text: 'Yes, ' },
      { type: 'tool_use', id: 'tool_1', name: 'noop', input: {} },
      { type: 'text', text: 'immediately.' },
    ]);
    const generate = createAnthropicAnswerGenerator({ client, model: 'test-model', logger: quietLogger });

    expect(await generate('Can you start soon?', {})).toBe('Yes, immediately.');
  });

  test('returns null for an empty reply', async () => {
    const { client } = createMockClient([{ type: 'text', text: '   ' }]);
    const generate = createAnthropicAnswerGenerator({ client, model: 'test-model', logger: quietLogger });

    expect(await generate('Anything else?', {})).toBeNull();
  });

  test('honours maxTokens and still returns a truncated answer', async () => {
    const { client, create } = createMockClient([{ type: 'text', text: 'I have worked on' }], 'max_tokens');
    const generate = createAnthropicAnswerGenerator({ client, model: 'test-model', maxTokens: 5, logger: quietLogger });

    expect(await generate('Describe a project', {})).toBe('I have worked on');
    expect(create.mock.calls[0]?.[0]).toMatchObject({ max_tokens: 5 });
  });

  test('propagates request failures', async () => {
    const create = vi.fn().mockRejectedValue(new Error('529 overloaded'));
    const client = { messages: { create } } as unknown as Anthropic;
    const generate = createAnthropicAnswerGenerator({ client, model: 'test-model', logger: quietLogger });

    await expect(generate('Why us?', {})).rejects.toThrow('529 overloaded');
  });
});
