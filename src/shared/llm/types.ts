/**
 * LLM Types
 *
 * Type definitions for LLM configuration and responses.
 * Supports Anthropic and any OpenAI-compatible endpoint.
 */

/**
 * Supported LLM providers
 */
export type LLMProvider = 'anthropic' | 'openai';

export const LLM_PROVIDERS: readonly LLMProvider[] = ['anthropic', 'openai'];

/**
 * LLM configuration
 */
export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeout: number; // milliseconds
  /** Base URL override (OpenAI-compatible gateways, proxies) */
  endpoint?: string;
}

/**
 * Default configurations for each provider
 */
export const DEFAULT_LLM_CONFIG: Record<LLMProvider, Omit<LLMConfig, 'apiKey'>> = {
  anthropic: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    temperature: 0.2,
    maxTokens: 8192,
    timeout: 120000
  },
  openai: {
    provider: 'openai',
    model: 'gpt-4o',
    temperature: 0.2,
    maxTokens: 8192,
    timeout: 120000
  }
};

/**
 * Message role for chat-based LLM interactions. The system prompt travels
 * separately in LLMRequest.systemPrompt.
 */
export type MessageRole = 'user' | 'assistant';

/**
 * Message structure for LLM interactions
 */
export interface LLMMessage {
  role: MessageRole;
  content: string;
}

/**
 * LLM request parameters
 */
export interface LLMRequest {
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  model?: string; // Override the default model for this request
  /** Ask for a JSON object where the provider supports it */
  json?: boolean;
}

/**
 * LLM response structure
 */
export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  finishReason?: string;
}

/**
 * Anything that turns a prompt into text. The LLM client implements it;
 * tests substitute scripted generators.
 */
export interface TextGenerator {
  complete(request: LLMRequest): Promise<LLMResponse>;
}
