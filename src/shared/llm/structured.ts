/**
 * Structured Invoker
 *
 * Schema-constrained generation: ask, decode, validate, and re-prompt with
 * the previous answer plus a list of problems until the answer passes or
 * the retry budget runs out.
 *
 * Transport failures are not handled here; the TextGenerator has already
 * retried them and its error propagates unchanged.
 */

import { z } from 'zod';
import { GenerationError } from '../errors';
import { loggers, type Logger } from '../logger';
import { describeValidationErrors, toValidationErrors } from '../validation';
import { decodeJson } from './json';
import { buildFeedbackPrompt } from './prompts';
import { LLMMessage, TextGenerator } from './types';

export interface StructuredTask<T> {
  /** Used in logs and error messages */
  name: string;
  systemPrompt: string;
  userPrompt: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Semantic checks after schema validation; returns problems, empty if fine */
  check?: (value: T) => string[];
}

export interface StructuredInvokerOptions {
  /** Re-prompts after the first answer */
  maxRetries?: number;
  temperature?: number;
  maxTokens?: number;
  logger?: Logger;
}

export const DEFAULT_STRUCTURED_RETRIES = 3;

export class StructuredInvoker {
  private readonly maxRetries: number;
  private readonly log: Logger;

  constructor(
    private readonly generator: TextGenerator,
    private readonly options: StructuredInvokerOptions = {}
  ) {
    this.maxRetries = options.maxRetries ?? DEFAULT_STRUCTURED_RETRIES;
    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${this.maxRetries}`);
    }
    this.log = options.logger ?? loggers.llm;
  }

  async invoke<T>(task: StructuredTask<T>): Promise<T> {
    const reasons: string[] = [];
    let previous: { answer: string; problems: string[] } | undefined;

    for (let attempt = 1; attempt <= this.maxRetries + 1; attempt++) {
      const messages: LLMMessage[] = [{ role: 'user', content: task.userPrompt }];
      if (previous) {
        messages.push(
          { role: 'assistant', content: previous.answer },
          { role: 'user', content: buildFeedbackPrompt(previous.problems) }
        );
      }

      const response = await this.generator.complete({
        systemPrompt: task.systemPrompt,
        messages,
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
        json: true
      });

      const outcome = this.evaluate(task, response.content);
      if (outcome.ok) {
        this.log.debug({ task: task.name, attempt }, 'structured output accepted');
        return outcome.value;
      }

      this.log.warn({ task: task.name, attempt, problems: outcome.reasons }, 'structured output rejected');
      reasons.push(...outcome.reasons.map(r => `attempt ${attempt}: ${r}`));
      previous = { answer: response.content, problems: outcome.reasons };
    }

    throw new GenerationError({
      kind: 'INVALID_OUTPUT',
      message: `${task.name}: provider output failed validation after ${this.maxRetries + 1} attempts`,
      attempts: this.maxRetries + 1,
      reasons
    });
  }

  private evaluate<T>(
    task: StructuredTask<T>,
    content: string
  ): { ok: true; value: T } | { ok: false; reasons: string[] } {
    const decoded = decodeJson(content);
    if (!decoded.ok) {
      return { ok: false, reasons: [decoded.reason] };
    }

    const parsed = task.schema.safeParse(decoded.value);
    if (!parsed.success) {
      return { ok: false, reasons: describeValidationErrors(toValidationErrors(parsed.error)) };
    }

    const problems = task.check ? task.check(parsed.data) : [];
    if (problems.length > 0) {
      return { ok: false, reasons: problems };
    }

    return { ok: true, value: parsed.data };
  }
}
