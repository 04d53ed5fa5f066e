/**
 * LLM Client
 *
 * Unified client for Anthropic and OpenAI-compatible providers.
 * SDK-internal retries are disabled; transient failures (429, 5xx,
 * connection errors) are retried by the shared RetryPolicy and surface as
 * GenerationError(TRANSPORT) once exhausted.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { GenerationError } from '../errors';
import { loggers, serializeError, type Logger } from '../logger';
import { RetryPolicy, type RetryConfig } from '../retry/policy';
import {
  DEFAULT_LLM_CONFIG,
  LLMConfig,
  LLMRequest,
  LLMResponse,
  TextGenerator
} from './types';

/**
 * A request with every tunable resolved against the client config
 */
export interface ResolvedLLMRequest extends LLMRequest {
  temperature: number;
  maxTokens: number;
  model: string;
}

/**
 * Performs one provider call. Replaced in tests.
 */
export type ProviderTransport = (request: ResolvedLLMRequest) => Promise<LLMResponse>;

export interface LLMClientOptions {
  retry?: Partial<RetryConfig>;
  sleep?: (ms: number) => Promise<void>;
  transport?: ProviderTransport;
  logger?: Logger;
}

/**
 * Unified LLM client supporting both Anthropic and OpenAI
 */
export class LLMClient implements TextGenerator {
  private config: LLMConfig;
  private readonly transport: ProviderTransport;
  private readonly policy: RetryPolicy;
  private readonly log: Logger;

  constructor(config: Partial<LLMConfig> & { apiKey: string }, options: LLMClientOptions = {}) {
    const provider = config.provider ?? 'anthropic';

    // Merge with defaults
    this.config = {
      ...DEFAULT_LLM_CONFIG[provider],
      ...config,
      provider
    };
    this.log = options.logger ?? loggers.llm;
    this.transport = options.transport ?? this.createTransport();
    this.policy = new RetryPolicy({
      ...options.retry,
      sleep: options.sleep,
      isRetryable: error => error instanceof GenerationError && error.recoverable,
      onRetry: ({ retry, delayMs, error }) => {
        this.log.warn({ retry: retry + 1, delayMs, err: serializeError(error) }, 'retrying provider call');
      }
    });
  }

  /**
   * Send a completion request to the LLM
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    if (!request.messages.some(m => m.role === 'user')) {
      throw new Error('Request must include at least one user message');
    }

    const resolved: ResolvedLLMRequest = {
      ...request,
      temperature: request.temperature ?? this.config.temperature,
      maxTokens: request.maxTokens ?? this.config.maxTokens,
      model: request.model ?? this.config.model
    };

    const start = Date.now();
    this.log.debug(
      { provider: this.config.provider, model: resolved.model, messages: request.messages.length },
      'request start'
    );

    const response = await this.policy.execute(async attempt => {
      try {
        return await this.transport(resolved);
      } catch (error) {
        throw toGenerationError(error, attempt + 1);
      }
    });

    this.log.debug(
      {
        model: response.model,
        finishReason: response.finishReason,
        elapsedMs: Date.now() - start,
        usage: response.usage
      },
      'request end'
    );

    return response;
  }

  /**
   * Get current configuration
   */
  getConfig(): LLMConfig {
    return { ...this.config };
  }

  private createTransport(): ProviderTransport {
    if (this.config.provider === 'anthropic') {
      const client = new Anthropic({
        apiKey: this.config.apiKey,
        baseURL: this.config.endpoint,
        timeout: this.config.timeout,
        maxRetries: 0
      });
      return request => callAnthropic(client, request);
    }

    const client = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.endpoint,
      timeout: this.config.timeout,
      maxRetries: 0
    });
    const nativeEndpoint = this.config.endpoint === undefined;
    return request => callOpenAI(client, request, nativeEndpoint);
  }
}

// ============================================================================
// Provider calls
// ============================================================================

async function callAnthropic(client: Anthropic, request: ResolvedLLMRequest): Promise<LLMResponse> {
  const response = await client.messages.create({
    model: request.model,
    max_tokens: request.maxTokens,
    temperature: request.temperature,
    system: request.systemPrompt ?? '',
    messages: request.messages.map(m => ({ role: m.role, content: m.content }))
  });

  const parts: string[] = [];
  for (const block of response.content) {
    if (block.type === 'text') {
      parts.push(block.text);
    }
  }

  return {
    content: parts.join(''),
    model: response.model,
    usage: {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens
    },
    finishReason: response.stop_reason ?? undefined
  };
}

async function callOpenAI(
  client: OpenAI,
  request: ResolvedLLMRequest,
  nativeEndpoint: boolean
): Promise<LLMResponse> {
  const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

  if (request.systemPrompt) {
    messages.push({ role: 'system', content: request.systemPrompt });
  }
  for (const message of request.messages) {
    messages.push(
      message.role === 'user'
        ? { role: 'user', content: message.content }
        : { role: 'assistant', content: message.content }
    );
  }

  const requestOptions: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
    model: request.model,
    messages,
    temperature: request.temperature,
    max_tokens: request.maxTokens
  };

  // Third-party compatible endpoints disagree on response_format support
  if (request.json && nativeEndpoint && supportsJsonMode(request.model)) {
    requestOptions.response_format = { type: 'json_object' };
  }

  const response = await client.chat.completions.create(requestOptions);

  const choice = response.choices[0];
  if (!choice) {
    throw new Error('No choices in OpenAI response');
  }

  return {
    content: choice.message.content ?? '',
    model: response.model,
    usage: response.usage ? {
      inputTokens: response.usage.prompt_tokens,
      outputTokens: response.usage.completion_tokens,
      totalTokens: response.usage.total_tokens
    } : undefined,
    finishReason: choice.finish_reason ?? undefined
  };
}

function supportsJsonMode(model: string): boolean {
  return model.includes('gpt-4-turbo')
    || model.includes('gpt-4o')
    || model.includes('gpt-4.1')
    || model.includes('gpt-3.5-turbo-0125');
}

// ============================================================================
// Error classification
// ============================================================================

/**
 * Map SDK and network failures onto GenerationError(TRANSPORT)
 */
export function toGenerationError(error: unknown, attempts: number): GenerationError {
  if (error instanceof GenerationError) {
    return error;
  }

  const status = statusOf(error);
  // A missing status means the request never got an HTTP answer
  const retryable = status === undefined
    ? isConnectionFailure(error)
    : status === 429 || status >= 500;
  const detail = error instanceof Error ? error.message : String(error);

  return new GenerationError({
    kind: 'TRANSPORT',
    message: status !== undefined
      ? `Provider request failed with status ${status}: ${detail}`
      : `Provider request failed: ${detail}`,
    attempts,
    reasons: [detail],
    status,
    retryable
  });
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof Anthropic.APIError || error instanceof OpenAI.APIError) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

function isConnectionFailure(error: unknown): boolean {
  if (error instanceof Anthropic.APIConnectionError || error instanceof OpenAI.APIConnectionError) {
    return true;
  }
  return error instanceof Error && /timeout|network|ECONNRESET|ECONNREFUSED|ETIMEDOUT|socket hang up/i.test(error.message);
}
