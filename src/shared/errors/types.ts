/**
 * Error Types
 *
 * Error categories and error classes for every stage of the resume pipeline.
 * Every error thrown by the pipeline is an AppError subclass so the CLI can
 * report the category, a user-facing message and a suggested action.
 */

/**
 * Error categories for different types of failures
 */
export enum ErrorCategory {
  FETCH = 'FETCH',
  RATE_LIMITED = 'RATE_LIMITED',
  RESOLUTION = 'RESOLUTION',
  GENERATION = 'GENERATION',
  SELECTION = 'SELECTION',
  ASSEMBLY = 'ASSEMBLY',
  COMPILATION = 'COMPILATION',
  CONFIGURATION = 'CONFIGURATION',
  UNEXPECTED = 'UNEXPECTED'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  userMessage: string;
  technicalDetails: string;
  timestamp: Date;
  context?: Record<string, unknown>;
  recoverable: boolean;
  suggestedAction?: string;
}

/**
 * Custom error class with additional context
 */
export class AppError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly userMessage: string;
  public readonly technicalDetails: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly recoverable: boolean;
  public readonly suggestedAction?: string;

  constructor(info: ErrorInfo) {
    super(info.userMessage);
    this.name = 'AppError';
    this.category = info.category;
    this.severity = info.severity;
    this.userMessage = info.userMessage;
    this.technicalDetails = info.technicalDetails;
    this.timestamp = info.timestamp;
    this.context = info.context;
    this.recoverable = info.recoverable;
    this.suggestedAction = info.suggestedAction;
  }
}

// ============================================================================
// Network
// ============================================================================

/**
 * Transport or HTTP failure from the resilient fetcher
 */
export class FetchError extends AppError {
  public readonly url: string;
  public readonly status?: number;
  public readonly retryable: boolean;

  constructor(options: {
    url: string;
    message: string;
    status?: number;
    retryable: boolean;
    cause?: unknown;
  }) {
    super({
      category: ErrorCategory.FETCH,
      severity: ErrorSeverity.HIGH,
      userMessage: `Request to ${options.url} failed: ${options.message}`,
      technicalDetails: describeCause(options.cause) ?? options.message,
      timestamp: new Date(),
      context: { url: options.url, status: options.status },
      recoverable: options.retryable,
      suggestedAction: options.retryable
        ? 'Please check your internet connection and try again.'
        : undefined
    });
    this.name = 'FetchError';
    this.url = options.url;
    this.status = options.status;
    this.retryable = options.retryable;
  }
}

/**
 * Upstream rate limit; carries a hint for when to try again
 */
export class RateLimitedError extends AppError {
  public readonly url: string;
  public readonly retryAfterMs?: number;

  constructor(options: { url: string; retryAfterMs?: number; message?: string }) {
    const hint = options.retryAfterMs !== undefined
      ? ` Try again in ${Math.ceil(options.retryAfterMs / 1000)}s.`
      : '';
    super({
      category: ErrorCategory.RATE_LIMITED,
      severity: ErrorSeverity.HIGH,
      userMessage: (options.message ?? `Rate limited by ${hostOf(options.url)}.`) + hint,
      technicalDetails: `rate limited: ${options.url}`,
      timestamp: new Date(),
      context: { url: options.url, retryAfterMs: options.retryAfterMs },
      recoverable: true,
      suggestedAction: 'Set GITHUB_TOKEN to raise the GitHub rate limit, or wait and retry.'
    });
    this.name = 'RateLimitedError';
    this.url = options.url;
    this.retryAfterMs = options.retryAfterMs;
  }
}

// ============================================================================
// Job source
// ============================================================================

export type ResolutionErrorCode = 'NOT_FOUND' | 'IO_ERROR' | 'INVALID_SOURCE' | 'EMPTY_SOURCE';

/**
 * Bad or missing job source; never retried
 */
export class ResolutionError extends AppError {
  public readonly code: ResolutionErrorCode;

  constructor(code: ResolutionErrorCode, message: string, context?: Record<string, unknown>) {
    super({
      category: ErrorCategory.RESOLUTION,
      severity: ErrorSeverity.MEDIUM,
      userMessage: message,
      technicalDetails: `${code}: ${message}`,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Pass either --job-url or --job-file (or neither to use the generic template).'
    });
    this.name = 'ResolutionError';
    this.code = code;
  }
}

// ============================================================================
// Generation
// ============================================================================

export type GenerationErrorKind = 'TRANSPORT' | 'INVALID_OUTPUT';

/**
 * Generative provider failure: transport exhaustion or output that never
 * passed schema validation
 */
export class GenerationError extends AppError {
  public readonly kind: GenerationErrorKind;
  public readonly attempts: number;
  public readonly reasons: string[];
  public readonly status?: number;

  constructor(options: {
    kind: GenerationErrorKind;
    message: string;
    attempts: number;
    reasons?: string[];
    status?: number;
    retryable?: boolean;
  }) {
    const reasons = options.reasons ?? [];
    super({
      category: ErrorCategory.GENERATION,
      severity: ErrorSeverity.HIGH,
      userMessage: options.message,
      technicalDetails: reasons.length > 0 ? reasons.join('\n') : options.message,
      timestamp: new Date(),
      context: { kind: options.kind, attempts: options.attempts, status: options.status },
      recoverable: options.retryable ?? false,
      suggestedAction: options.kind === 'INVALID_OUTPUT'
        ? 'Retry the run or switch to a more capable model (LLM_MODEL).'
        : 'Check LLM_API_KEY / LLM_ENDPOINT and your provider status, then retry.'
    });
    this.name = 'GenerationError';
    this.kind = options.kind;
    this.attempts = options.attempts;
    this.reasons = reasons;
    this.status = options.status;
  }
}

// ============================================================================
// Selection, assembly, compilation, configuration
// ============================================================================

/**
 * Invalid interactive input; the selection controller re-prompts on it
 */
export class SelectionError extends AppError {
  constructor(message: string, input?: string) {
    super({
      category: ErrorCategory.SELECTION,
      severity: ErrorSeverity.LOW,
      userMessage: message,
      technicalDetails: input !== undefined ? `input: ${JSON.stringify(input)}` : message,
      timestamp: new Date(),
      context: input !== undefined ? { input } : undefined,
      recoverable: true
    });
    this.name = 'SelectionError';
  }
}

/**
 * Template/field mismatch. Indicates a bug, never bad user input.
 */
export class AssemblyError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      category: ErrorCategory.ASSEMBLY,
      severity: ErrorSeverity.CRITICAL,
      userMessage: message,
      technicalDetails: message,
      timestamp: new Date(),
      context,
      recoverable: false
    });
    this.name = 'AssemblyError';
  }
}

/**
 * LaTeX compilation failure, surfaced verbatim
 */
export class CompilationError extends AppError {
  public readonly diagnostic: string;
  public readonly documentPath?: string;

  constructor(diagnostic: string, documentPath?: string) {
    super({
      category: ErrorCategory.COMPILATION,
      severity: ErrorSeverity.HIGH,
      userMessage: 'LaTeX compilation failed.',
      technicalDetails: diagnostic,
      timestamp: new Date(),
      context: documentPath ? { documentPath } : undefined,
      recoverable: false,
      suggestedAction: documentPath
        ? `The document source was kept at ${documentPath}; fix it and recompile manually.`
        : undefined
    });
    this.name = 'CompilationError';
    this.diagnostic = diagnostic;
    this.documentPath = documentPath;
  }
}

/**
 * Missing or invalid configuration
 */
export class ConfigurationError extends AppError {
  constructor(message: string, problems: string[] = []) {
    super({
      category: ErrorCategory.CONFIGURATION,
      severity: ErrorSeverity.HIGH,
      userMessage: problems.length > 0
        ? `${message}\n${problems.map(p => `  - ${p}`).join('\n')}`
        : message,
      technicalDetails: problems.join('; ') || message,
      timestamp: new Date(),
      context: problems.length > 0 ? { problems } : undefined,
      recoverable: false,
      suggestedAction: 'Check your .env file and profile JSON.'
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Names the pipeline stage an error escaped from
 */
export class PipelineStageError extends AppError {
  public readonly stage: string;
  public readonly failure: AppError;

  constructor(stage: string, cause: AppError) {
    super({
      category: cause.category,
      severity: cause.severity,
      userMessage: `${stage} failed: ${cause.userMessage}`,
      technicalDetails: cause.technicalDetails,
      timestamp: new Date(),
      context: { stage, ...cause.context },
      recoverable: cause.recoverable,
      suggestedAction: cause.suggestedAction
    });
    this.name = 'PipelineStageError';
    this.stage = stage;
    this.failure = cause;
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause.message : String(cause);
}
