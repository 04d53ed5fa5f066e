/**
 * Shared Infrastructure
 *
 * Building blocks used by every pipeline stage.
 *
 * Modules:
 * - http: response cache and resilient fetcher
 * - retry: exponential backoff policy
 * - concurrency: bounded worker pool
 * - llm: unified LLM client (Anthropic + OpenAI) and structured generation
 * - validation: zod schemas and validation utilities
 * - errors: error types and handling
 */

export * from './http';
export * from './retry/policy';
export * from './concurrency/pool';
export * from './llm';
export * from './validation';
export * from './errors';
