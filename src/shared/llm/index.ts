/**
 * LLM Module
 *
 * Provider client, JSON decoding and the structured generation protocol.
 */

export * from './types';
export * from './client';
export * from './json';
export * from './prompts';
export * from './structured';
