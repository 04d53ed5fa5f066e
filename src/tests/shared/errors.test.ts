/**
 * Tests for shared error handling utilities
 */

import { describe, it, expect } from 'vitest';
import {
  AppError,
  CompilationError,
  ConfigurationError,
  ErrorCategory,
  ErrorHandler,
  ErrorSeverity,
  FetchError,
  GenerationError,
  PipelineStageError,
  RateLimitedError,
  ResolutionError,
  SelectionError
} from '../../shared/errors';

describe('Shared Error Handler', () => {
  describe('Error Creation', () => {
    it('should create unexpected errors from anything thrown', () => {
      const error = ErrorHandler.createUnexpectedError('plain string', { step: 'x' });

      expect(error).toBeInstanceOf(AppError);
      expect(error.category).toBe(ErrorCategory.UNEXPECTED);
      expect(error.severity).toBe(ErrorSeverity.CRITICAL);
      expect(error.userMessage).toBe('An unexpected error occurred: plain string');
      expect(error.context).toEqual({ step: 'x' });
      expect(error.recoverable).toBe(false);
    });

    it('should keep AppErrors as they are', () => {
      const original = new SelectionError('bad input', 'x');

      expect(ErrorHandler.toAppError(original)).toBe(original);
      expect(ErrorHandler.toAppError(new Error('boom')).category).toBe(ErrorCategory.UNEXPECTED);
    });

    it('should add a wait hint to rate limit errors', () => {
      const withHint = new RateLimitedError({ url: 'https://api.github.com/users/octo', retryAfterMs: 1500 });
      const withoutHint = new RateLimitedError({ url: 'https://api.github.com/users/octo' });

      expect(withHint.userMessage).toBe('Rate limited by api.github.com. Try again in 2s.');
      expect(withoutHint.userMessage).toBe('Rate limited by api.github.com.');
      expect(withHint.category).toBe(ErrorCategory.RATE_LIMITED);
    });

    it('should carry resolution codes', () => {
      const error = new ResolutionError('NOT_FOUND', 'Job file not found: x.txt');

      expect(error.code).toBe('NOT_FOUND');
      expect(error.technicalDetails).toBe('NOT_FOUND: Job file not found: x.txt');
      expect(error.recoverable).toBe(false);
    });

    it('should list configuration problems in the user message', () => {
      const error = new ConfigurationError('Invalid configuration', ['A is wrong', 'B is missing']);

      expect(error.userMessage).toBe('Invalid configuration\n  - A is wrong\n  - B is missing');
      expect(error.technicalDetails).toBe('A is wrong; B is missing');
      expect(new ConfigurationError('Nothing listed').userMessage).toBe('Nothing listed');
    });

    it('should point at the kept source when compilation fails', () => {
      const kept = new CompilationError('! Missing $ inserted.', 'resume.tex');
      const lost = new CompilationError('! Missing $ inserted.');

      expect(kept.suggestedAction).toBe('The document source was kept at resume.tex; fix it and recompile manually.');
      expect(lost.suggestedAction).toBeUndefined();
      expect(kept.technicalDetails).toBe('! Missing $ inserted.');
    });
  });

  describe('Stage wrapping', () => {
    it('should prefix the stage and keep the original failure', () => {
      const cause = new FetchError({ url: 'https://jobs.example.com/1', message: 'HTTP 404', retryable: false });

      const wrapped = ErrorHandler.forStage('Job source', cause);

      expect(wrapped).toBeInstanceOf(PipelineStageError);
      expect(wrapped.userMessage).toBe('Job source failed: Request to https://jobs.example.com/1 failed: HTTP 404');
      expect(wrapped.failure).toBe(cause);
      expect(wrapped.category).toBe(ErrorCategory.FETCH);
      expect(wrapped.context).toEqual({ stage: 'Job source', url: 'https://jobs.example.com/1', status: undefined });
    });

    it('should not wrap twice', () => {
      const inner = ErrorHandler.forStage('Ranking', new Error('boom'));

      expect(ErrorHandler.forStage('Selection', inner)).toBe(inner);
      expect(inner.stage).toBe('Ranking');
    });
  });

  describe('Retry classification', () => {
    it('should retry rate limits and retryable fetch failures', () => {
      expect(ErrorHandler.isRetryable(new RateLimitedError({ url: 'https://api.github.com' }))).toBe(true);
      expect(ErrorHandler.isRetryable(new FetchError({ url: 'u', message: 'HTTP 503', retryable: true }))).toBe(true);
      expect(ErrorHandler.isRetryable(new FetchError({ url: 'u', message: 'HTTP 404', retryable: false }))).toBe(false);
    });

    it('should retry only recoverable transport failures from the provider', () => {
      const transport = new GenerationError({ kind: 'TRANSPORT', message: 'overloaded', attempts: 1, retryable: true });
      const invalid = new GenerationError({ kind: 'INVALID_OUTPUT', message: 'bad', attempts: 4, retryable: true });

      expect(ErrorHandler.isRetryable(transport)).toBe(true);
      expect(ErrorHandler.isRetryable(invalid)).toBe(false);
    });

    it('should retry plain network errors', () => {
      expect(ErrorHandler.isRetryable(new Error('read ECONNRESET'))).toBe(true);
      expect(ErrorHandler.isRetryable(new Error('Request timeout'))).toBe(true);
      expect(ErrorHandler.isRetryable(new Error('invalid request'))).toBe(false);
      expect(ErrorHandler.isRetryable('timeout')).toBe(false);
    });
  });

  describe('User Messages', () => {
    it('should append the suggested action', () => {
      const error = new ResolutionError('INVALID_SOURCE', 'Give only one job source');

      expect(ErrorHandler.formatUserMessage(error)).toBe(
        'Give only one job source\n\nPass either --job-url or --job-file (or neither to use the generic template).'
      );
      expect(ErrorHandler.formatUserMessage(new SelectionError('Bad range'))).toBe('Bad range');
      expect(ErrorHandler.formatUserMessage(new Error('plain'))).toBe('plain');
    });
  });
});
