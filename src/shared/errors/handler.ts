/**
 * Error Handler
 *
 * Standardized error handling utilities shared by every pipeline stage.
 */

import {
  AppError,
  ErrorCategory,
  ErrorSeverity,
  FetchError,
  GenerationError,
  PipelineStageError,
  RateLimitedError
} from './types';

/**
 * Error handler class for classifying and presenting errors
 */
export class ErrorHandler {
  /**
   * Create an unexpected error
   */
  static createUnexpectedError(
    error: unknown,
    context?: Record<string, unknown>
  ): AppError {
    const message = error instanceof Error ? error.message : String(error);
    return new AppError({
      category: ErrorCategory.UNEXPECTED,
      severity: ErrorSeverity.CRITICAL,
      userMessage: `An unexpected error occurred: ${message}`,
      technicalDetails: error instanceof Error && error.stack ? error.stack : message,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Re-run with LOG_LEVEL=debug for details.'
    });
  }

  /**
   * Normalize anything thrown into an AppError
   */
  static toAppError(error: unknown): AppError {
    return error instanceof AppError ? error : this.createUnexpectedError(error);
  }

  /**
   * Wrap an error with the name of the stage it escaped from.
   * Already-wrapped errors keep their original stage.
   */
  static forStage(stage: string, error: unknown): PipelineStageError {
    if (error instanceof PipelineStageError) {
      return error;
    }
    return new PipelineStageError(stage, this.toAppError(error));
  }

  /**
   * Format error message for display to user
   */
  static formatUserMessage(error: AppError | Error): string {
    if (error instanceof AppError) {
      let message = error.userMessage;
      if (error.suggestedAction) {
        message += `\n\n${error.suggestedAction}`;
      }
      return message;
    }
    return error.message;
  }

  /**
   * Determine if an error is worth another attempt
   */
  static isRetryable(error: unknown): boolean {
    if (error instanceof RateLimitedError) return true;
    if (error instanceof FetchError) return error.retryable;
    if (error instanceof GenerationError) return error.kind === 'TRANSPORT' && error.recoverable;
    if (error instanceof AppError) return false;
    return error instanceof Error && /timeout|network|ECONNRESET|ETIMEDOUT/i.test(error.message);
  }
}
