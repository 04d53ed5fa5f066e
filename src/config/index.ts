/**
 * Environment Configuration
 *
 * Loads and validates environment variables into a typed configuration
 * object. Every invalid value is collected and reported at once as a
 * ConfigurationError.
 *
 * Usage:
 *   import { loadConfig } from './config';
 *   const config = loadConfig();
 *   console.log(config.github.concurrency);
 */

import 'dotenv/config';
import { ConfigurationError } from '../shared/errors';
import { LLM_PROVIDERS, LLMProvider } from '../shared/llm/types';
import { LATEX_ENGINES, LatexEngine } from '../latex/compiler';

// =============================================================================
// Types
// =============================================================================

export type Env = Readonly<Record<string, string | undefined>>;

export interface GitHubConfig {
  username: string | null;
  token: string | null;
  apiUrl: string;
  concurrency: number;
  includeForks: boolean;
  readmeMaxChars: number;
}

export interface LLMSettings {
  provider: LLMProvider;
  apiKey: string | null;
  /** null: provider default */
  model: string | null;
  endpoint: string | null;
  maxRetries: number;
  temperature: number;
  maxTokens: number;
}

export interface HttpConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
}

export interface CacheSettings {
  dir: string;
  ttlSeconds: number;
  enabled: boolean;
}

export interface LatexConfig {
  engine: LatexEngine;
  timeoutMs: number;
}

export interface Config {
  github: GitHubConfig;
  llm: LLMSettings;
  http: HttpConfig;
  cache: CacheSettings;
  latex: LatexConfig;
  rankingLimit: number;
}

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Reads variables and records every problem instead of failing on the first
 */
class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: Env) {}

  /**
   * Get an environment variable, or null when unset or blank
   */
  getEnv(key: string): string | null {
    const value = this.env[key]?.trim();
    return value ? value : null;
  }

  /**
   * Get an environment variable with a default value
   */
  getEnvWithDefault(key: string, defaultValue: string): string {
    return this.getEnv(key) ?? defaultValue;
  }

  /**
   * Get an integer environment variable no smaller than `min`
   */
  getEnvNumber(key: string, defaultValue: number, min: number = 0): number {
    const value = this.getEnv(key);
    if (value === null) return defaultValue;
    if (!/^-?\d+$/.test(value)) {
      this.problems.push(`Invalid numeric value for ${key}: "${value}". Expected an integer.`);
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (parsed < min) {
      this.problems.push(`${key} must be at least ${min}, got ${parsed}.`);
      return defaultValue;
    }
    return parsed;
  }

  /**
   * Get a decimal environment variable within [min, max]
   */
  getEnvFloat(key: string, defaultValue: number, min: number, max: number): number {
    const value = this.getEnv(key);
    if (value === null) return defaultValue;
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
      this.problems.push(`Invalid value for ${key}: "${value}". Expected a number between ${min} and ${max}.`);
      return defaultValue;
    }
    return parsed;
  }

  /**
   * Get a boolean environment variable
   */
  getEnvBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.getEnv(key);
    if (value === null) return defaultValue;
    const normalized = value.toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off'].includes(normalized)) return false;
    this.problems.push(`Invalid boolean value for ${key}: "${value}". Expected true or false.`);
    return defaultValue;
  }

  /**
   * Get one of a fixed set of values
   */
  getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
    const value = this.getEnv(key);
    if (value === null) return defaultValue;
    const match = choices.find(choice => choice === value.toLowerCase());
    if (match === undefined) {
      this.problems.push(`Invalid value for ${key}: "${value}". Expected one of: ${choices.join(', ')}.`);
      return defaultValue;
    }
    return match;
  }
}

// =============================================================================
// Configuration Loader
// =============================================================================

export function loadConfig(env: Env = process.env): Config {
  const reader = new EnvReader(env);

  const provider = reader.getEnvChoice('LLM_PROVIDER', LLM_PROVIDERS, 'anthropic');
  const providerKey = provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY';

  const config: Config = {
    github: {
      username: reader.getEnv('GITHUB_USERNAME'),
      token: reader.getEnv('GITHUB_TOKEN'),
      apiUrl: reader.getEnvWithDefault('GITHUB_API_URL', 'https://api.github.com'),
      concurrency: reader.getEnvNumber('GITHUB_CONCURRENCY', 4, 1),
      includeForks: reader.getEnvBoolean('GITHUB_INCLUDE_FORKS', true),
      readmeMaxChars: reader.getEnvNumber('README_MAX_CHARS', 1500, 0)
    },

    llm: {
      provider,
      apiKey: reader.getEnv('LLM_API_KEY') ?? reader.getEnv(providerKey),
      model: reader.getEnv('LLM_MODEL'),
      endpoint: reader.getEnv('LLM_ENDPOINT'),
      maxRetries: reader.getEnvNumber('LLM_MAX_RETRIES', 3, 0),
      temperature: reader.getEnvFloat('LLM_TEMPERATURE', 0.2, 0, 2),
      maxTokens: reader.getEnvNumber('LLM_MAX_TOKENS', 8192, 1)
    },

    http: {
      maxRetries: reader.getEnvNumber('HTTP_MAX_RETRIES', 3, 0),
      baseDelayMs: reader.getEnvNumber('HTTP_BASE_DELAY_MS', 500, 0),
      maxDelayMs: reader.getEnvNumber('HTTP_MAX_DELAY_MS', 8000, 0),
      timeoutMs: reader.getEnvNumber('HTTP_TIMEOUT_MS', 15000, 1)
    },

    cache: {
      dir: reader.getEnvWithDefault('CACHE_DIR', '.resume-cache'),
      ttlSeconds: reader.getEnvNumber('CACHE_TTL_SECONDS', 86400, 0),
      enabled: reader.getEnvBoolean('CACHE_ENABLED', true)
    },

    latex: {
      engine: reader.getEnvChoice('LATEX_ENGINE', LATEX_ENGINES, 'tectonic'),
      timeoutMs: reader.getEnvNumber('LATEX_TIMEOUT_MS', 120000, 1)
    },

    rankingLimit: reader.getEnvNumber('RANKING_LIMIT', 25, 1)
  };

  if (config.llm.endpoint !== null && !isHttpUrl(config.llm.endpoint)) {
    reader.problems.push(`LLM_ENDPOINT must be an http(s) URL, got "${config.llm.endpoint}".`);
  }
  if (!isHttpUrl(config.github.apiUrl)) {
    reader.problems.push(`GITHUB_API_URL must be an http(s) URL, got "${config.github.apiUrl}".`);
  }

  if (reader.problems.length > 0) {
    throw new ConfigurationError('Invalid configuration', reader.problems);
  }

  return config;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Settings a full run cannot do without; returns the problems found
 */
export function validateForRun(config: Config): string[] {
  const errors: string[] = [];

  if (!config.github.username) {
    errors.push('GitHub username is required (--user or GITHUB_USERNAME)');
  }
  if (!config.llm.apiKey) {
    const providerKey = config.llm.provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY';
    errors.push(`LLM API key is required (LLM_API_KEY or ${providerKey})`);
  }

  return errors;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
