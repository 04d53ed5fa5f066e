/**
 * Tests for the LLM client, JSON decoding, prompts and the structured
 * generation protocol
 */

import { describe, it, expect } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import {
  buildFeedbackPrompt,
  buildStructuredPrompt,
  decodeJson,
  LLMClient,
  ResolvedLLMRequest,
  StructuredInvoker,
  toGenerationError,
  truncateText
} from '../shared/llm';
import { GenerationError } from '../shared/errors';
import { ScriptedGenerator } from './fixtures';

function recordingSleep() {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => { delays.push(ms); } };
}

describe('LLMClient', () => {
  it('fills provider defaults into each request', async () => {
    const seen: ResolvedLLMRequest[] = [];
    const client = new LLMClient({ apiKey: 'test-key' }, {
      transport: async request => {
        seen.push(request);
        return { content: 'hi', model: request.model };
      }
    });

    const response = await client.complete({ messages: [{ role: 'user', content: 'Hello' }] });

    expect(response.content).toBe('hi');
    expect(seen[0]).toMatchObject({ model: 'claude-sonnet-4-20250514', temperature: 0.2, maxTokens: 8192 });
  });

  it('lets a request override the model and sampling', async () => {
    const seen: ResolvedLLMRequest[] = [];
    const client = new LLMClient({ apiKey: 'test-key', provider: 'openai' }, {
      transport: async request => {
        seen.push(request);
        return { content: '{}', model: request.model };
      }
    });

    await client.complete({ messages: [{ role: 'user', content: 'x' }], model: 'gpt-4o-mini', temperature: 0, maxTokens: 100 });

    expect(seen[0]).toMatchObject({ model: 'gpt-4o-mini', temperature: 0, maxTokens: 100 });
    expect(client.getConfig().model).toBe('gpt-4o');
  });

  it('retries connection failures with backoff', async () => {
    let calls = 0;
    const { delays, sleep } = recordingSleep();
    const client = new LLMClient({ apiKey: 'test-key' }, {
      sleep,
      transport: async request => {
        calls++;
        if (calls < 3) throw new Error('socket hang up');
        return { content: 'ok', model: request.model };
      }
    });

    const response = await client.complete({ messages: [{ role: 'user', content: 'x' }] });

    expect(response.content).toBe('ok');
    expect(calls).toBe(3);
    expect(delays).toEqual([500, 1000]);
  });

  it('does not retry a request the provider rejected', async () => {
    let calls = 0;
    const client = new LLMClient({ apiKey: 'test-key' }, {
      transport: async () => {
        calls++;
        throw new Error('invalid request body');
      }
    });

    const error = await client.complete({ messages: [{ role: 'user', content: 'x' }] }).catch((e: unknown) => e);

    expect(calls).toBe(1);
    expect(error).toBeInstanceOf(GenerationError);
    expect(error instanceof GenerationError && error.kind).toBe('TRANSPORT');
    expect(error instanceof GenerationError && error.attempts).toBe(1);
  });

  it('requires a user message', async () => {
    const client = new LLMClient({ apiKey: 'test-key' }, { transport: async () => ({ content: '', model: 'm' }) });

    await expect(client.complete({ messages: [] })).rejects.toThrow('Request must include at least one user message');
  });
});

describe('toGenerationError', () => {
  it('treats 429 and 5xx answers as retryable', () => {
    const limited = toGenerationError(new Anthropic.APIError(429, { type: 'error' }, 'rate limited', {}), 2);
    const server = toGenerationError(new Anthropic.APIError(529, { type: 'error' }, 'overloaded', {}), 1);
    const client = toGenerationError(new Anthropic.APIError(400, { type: 'error' }, 'bad request', {}), 1);

    expect([limited.status, limited.recoverable, limited.attempts]).toEqual([429, true, 2]);
    expect([server.status, server.recoverable]).toEqual([529, true]);
    expect([client.status, client.recoverable]).toEqual([400, false]);
  });

  it('passes a GenerationError through', () => {
    const original = new GenerationError({ kind: 'INVALID_OUTPUT', message: 'bad', attempts: 4 });

    expect(toGenerationError(original, 1)).toBe(original);
  });
});

describe('decodeJson', () => {
  it('reads JSON inside Markdown fences', () => {
    expect(decodeJson('```json\n{"a": 1}\n```')).toEqual({ ok: true, value: { a: 1 } });
  });

  it('finds the object inside surrounding prose', () => {
    expect(decodeJson('Here you go: {"a": {"b": 2}} Hope it helps.')).toEqual({ ok: true, value: { a: { b: 2 } } });
  });

  it('repairs trailing commas', () => {
    expect(decodeJson('{"a": [1, 2,],}')).toEqual({ ok: true, value: { a: [1, 2] } });
  });

  it('reports an empty answer', () => {
    expect(decodeJson('  \n ')).toEqual({ ok: false, reason: 'response was empty' });
  });
});

describe('prompts', () => {
  it('builds sectioned prompts and skips empty sections', () => {
    const prompt = buildStructuredPrompt(
      'Do the task.',
      [{ heading: 'Job', body: ' posting text\r\n' }, { heading: 'Notes', body: '   ' }],
      ['first', 'second']
    );

    expect(prompt).toBe('Do the task.\n\nJOB:\nposting text\n\nINSTRUCTIONS:\n1. first\n2. second');
  });

  it('lists every problem in the feedback prompt', () => {
    expect(buildFeedbackPrompt(['title: Required', 'missing repository ids: "x"'])).toBe(
      'Your previous answer could not be accepted:\n- title: Required\n- missing repository ids: "x"\n\n'
        + 'Reply again with the complete JSON object only, fixing every problem listed above.'
    );
  });

  it('truncates on a word boundary', () => {
    expect(truncateText('hello brave new world', 12)).toBe('hello brave...');
    expect(truncateText('short', 12)).toBe('short');
  });
});

describe('StructuredInvoker', () => {
  const TitleSchema = z.object({ title: z.string().min(1) });

  const task = {
    name: 'title',
    systemPrompt: 'Return a title.',
    userPrompt: 'Give me a title.',
    schema: TitleSchema
  };

  it('accepts a valid first answer', async () => {
    const generator = new ScriptedGenerator(['{"title": "Engineer"}']);
    const invoker = new StructuredInvoker(generator);

    expect(await invoker.invoke(task)).toEqual({ title: 'Engineer' });
    expect(generator.requests).toHaveLength(1);
    expect(generator.requests[0]).toMatchObject({ systemPrompt: 'Return a title.', json: true });
  });

  it('re-prompts with the previous answer and the problems found', async () => {
    const generator = new ScriptedGenerator(['{"name": "Engineer"}', '{"title": "Engineer"}']);
    const invoker = new StructuredInvoker(generator);

    expect(await invoker.invoke(task)).toEqual({ title: 'Engineer' });
    expect(generator.requests[1].messages).toEqual([
      { role: 'user', content: 'Give me a title.' },
      { role: 'assistant', content: '{"name": "Engineer"}' },
      { role: 'user', content: buildFeedbackPrompt(['title: Required']) }
    ]);
  });

  it('runs semantic checks after schema validation', async () => {
    const generator = new ScriptedGenerator(['{"title": "x"}', '{"title": "Engineer"}']);
    const invoker = new StructuredInvoker(generator);

    const value = await invoker.invoke({
      ...task,
      check: (v: { title: string }) => (v.title.length < 3 ? ['title is too short'] : [])
    });

    expect(value.title).toBe('Engineer');
    expect(generator.requests[1].messages[2].content).toContain('- title is too short');
  });

  it('fails with INVALID_OUTPUT once the retry budget is spent', async () => {
    const generator = new ScriptedGenerator(['', '{"title": ""}', '{}']);
    const invoker = new StructuredInvoker(generator, { maxRetries: 2 });

    const error = await invoker.invoke(task).catch((e: unknown) => e);

    expect(generator.requests).toHaveLength(3);
    expect(error).toBeInstanceOf(GenerationError);
    if (!(error instanceof GenerationError)) return;
    expect(error.kind).toBe('INVALID_OUTPUT');
    expect(error.attempts).toBe(3);
    expect(error.message).toBe('title: provider output failed validation after 3 attempts');
    expect(error.reasons).toEqual([
      'attempt 1: response was empty',
      'attempt 2: title: String must contain at least 1 character(s)',
      'attempt 3: title: Required'
    ]);
  });

  it('rejects a negative retry budget', () => {
    expect(() => new StructuredInvoker(new ScriptedGenerator([]), { maxRetries: -1 })).toThrow(RangeError);
  });
});
