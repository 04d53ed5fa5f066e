/**
 * Logger Configuration
 *
 * Configures pino logger with environment-aware formatting:
 * - Interactive terminal: pretty-printed colorized output
 * - Anything else: JSON lines for log aggregation
 *
 * All output goes to stderr; stdout is reserved for the interactive
 * repository selection prompts.
 *
 * Usage:
 *   import { loggers } from './logger';
 *   loggers.github.info({ repos: 12 }, 'listed repositories');
 */

import pino, { Logger, LoggerOptions } from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const isTestRun = process.env.VITEST !== undefined || process.env.NODE_ENV === 'test';

const LOG_LEVEL = process.env.LOG_LEVEL || (isTestRun ? 'silent' : 'info');

/**
 * Base logger options shared across environments
 */
const baseOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
  // API keys and tokens travel through config and request headers
  redact: {
    paths: [
      'apiKey',
      'token',
      'authorization',
      'headers.authorization',
      'headers.Authorization',
      '*.apiKey',
      '*.token',
    ],
    remove: true,
  },
};

/**
 * Terminal options with pretty printing
 */
const prettyOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      destination: 2,
      translateTime: 'SYS:HH:MM:ss',
      ignore: 'component',
      messageFormat: '[{component}] {msg}',
    },
  },
};

/**
 * Structured options - JSON output on stderr
 */
const jsonOptions: LoggerOptions = {
  ...baseOptions,
  formatters: {
    level: (label) => ({ level: label }),
  },
};

// =============================================================================
// Logger Instance
// =============================================================================

const usePretty = !isTestRun && process.stderr.isTTY === true && process.env.LOG_FORMAT !== 'json';

/**
 * Main application logger instance
 */
export const logger: Logger = usePretty
  ? pino(prettyOptions)
  : pino(jsonOptions, pino.destination(2));

/**
 * Create a child logger for a specific component/module
 *
 * @example
 * const cacheLogger = createComponentLogger('cache');
 * cacheLogger.debug({ key }, 'cache hit');
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * Pre-configured loggers for the pipeline stages
 */
export const loggers = {
  /** Outbound HTTP and response cache */
  http: createComponentLogger('http'),
  /** GitHub profile collection */
  github: createComponentLogger('github'),
  /** Job posting resolution */
  job: createComponentLogger('job'),
  /** Generative provider calls */
  llm: createComponentLogger('llm'),
  /** Interactive repository selection */
  selection: createComponentLogger('selection'),
  /** LaTeX assembly and compilation */
  latex: createComponentLogger('latex'),
  /** Stage orchestration */
  pipeline: createComponentLogger('pipeline'),
};

/**
 * Serialize an error for structured logging
 * Extracts useful properties from Error objects
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const extras: Record<string, unknown> = {};
    for (const key of Object.getOwnPropertyNames(err)) {
      if (!['name', 'message', 'stack'].includes(key)) {
        extras[key] = Reflect.get(err, key);
      }
    }
    return {
      type: err.name,
      message: err.message,
      stack: LOG_LEVEL === 'debug' || LOG_LEVEL === 'trace' ? err.stack : undefined,
      ...extras,
    };
  }
  return { message: String(err) };
}

export type { Logger };
