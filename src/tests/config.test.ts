/**
 * Tests for environment configuration and the profile file
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, validateForRun } from '../config';
import { loadProfile, parseProfile } from '../config/profile';
import { ConfigurationError } from '../shared/errors';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      github: {
        username: null,
        token: null,
        apiUrl: 'https://api.github.com',
        concurrency: 4,
        includeForks: true,
        readmeMaxChars: 1500
      },
      llm: {
        provider: 'anthropic',
        apiKey: null,
        model: null,
        endpoint: null,
        maxRetries: 3,
        temperature: 0.2,
        maxTokens: 8192
      },
      http: { maxRetries: 3, baseDelayMs: 500, maxDelayMs: 8000, timeoutMs: 15000 },
      cache: { dir: '.resume-cache', ttlSeconds: 86400, enabled: true },
      latex: { engine: 'tectonic', timeoutMs: 120000 },
      rankingLimit: 25
    });
  });

  it('reads overrides and the provider-specific key', () => {
    const config = loadConfig({
      GITHUB_USERNAME: ' octo ',
      LLM_PROVIDER: 'OpenAI',
      OPENAI_API_KEY: 'test-key',
      GITHUB_INCLUDE_FORKS: 'no',
      LATEX_ENGINE: 'pdflatex',
      LLM_TEMPERATURE: '0.7',
      CACHE_ENABLED: 'off'
    });

    expect(config.github.username).toBe('octo');
    expect(config.github.includeForks).toBe(false);
    expect(config.llm).toMatchObject({ provider: 'openai', apiKey: 'test-key', temperature: 0.7 });
    expect(config.latex.engine).toBe('pdflatex');
    expect(config.cache.enabled).toBe(false);
  });

  it('prefers LLM_API_KEY over the provider key', () => {
    const config = loadConfig({ LLM_API_KEY: 'test-primary', ANTHROPIC_API_KEY: 'test-key' });

    expect(config.llm.apiKey).toBe('test-primary');
  });

  it('reports every invalid value at once', () => {
    let error: unknown;
    try {
      loadConfig({
        GITHUB_CONCURRENCY: '0',
        LLM_TEMPERATURE: 'hot',
        HTTP_TIMEOUT_MS: '1.5',
        CACHE_ENABLED: 'maybe',
        LATEX_ENGINE: 'word',
        LLM_ENDPOINT: 'ftp://llm.example.com'
      });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof ConfigurationError && error.userMessage).toBe([
      'Invalid configuration',
      '  - GITHUB_CONCURRENCY must be at least 1, got 0.',
      '  - Invalid value for LLM_TEMPERATURE: "hot". Expected a number between 0 and 2.',
      '  - Invalid numeric value for HTTP_TIMEOUT_MS: "1.5". Expected an integer.',
      '  - Invalid boolean value for CACHE_ENABLED: "maybe". Expected true or false.',
      '  - Invalid value for LATEX_ENGINE: "word". Expected one of: tectonic, pdflatex, latexmk.',
      '  - LLM_ENDPOINT must be an http(s) URL, got "ftp://llm.example.com".'
    ].join('\n'));
  });
});

describe('validateForRun', () => {
  it('requires a username and an API key', () => {
    expect(validateForRun(loadConfig({}))).toEqual([
      'GitHub username is required (--user or GITHUB_USERNAME)',
      'LLM API key is required (LLM_API_KEY or ANTHROPIC_API_KEY)'
    ]);
    expect(validateForRun(loadConfig({ GITHUB_USERNAME: 'octo', LLM_PROVIDER: 'openai' }))).toEqual([
      'LLM API key is required (LLM_API_KEY or OPENAI_API_KEY)'
    ]);
    expect(validateForRun(loadConfig({ GITHUB_USERNAME: 'octo', ANTHROPIC_API_KEY: 'test-key' }))).toEqual([]);
  });
});

describe('profile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'profile-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('parses and freezes a profile with defaults', () => {
    const profile = parseProfile({
      fullName: ' Alex Example ',
      email: 'alex@example.com',
      education: [{ title: 'BSc Computer Science' }]
    });

    expect(profile).toEqual({
      fullName: 'Alex Example',
      city: '',
      country: '',
      email: 'alex@example.com',
      skills: [],
      education: [{ title: 'BSc Computer Science', subtitle: '', location: '', date: '', highlights: [] }],
      experience: []
    });
    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.education[0])).toBe(true);
  });

  it('reads fallback skill groups', () => {
    const profile = parseProfile({
      fullName: 'Alex Example',
      skills: [{ category: ' Languages ', items: ['Go', ' TypeScript '] }]
    });

    expect(profile.skills).toEqual([{ category: 'Languages', items: ['Go', 'TypeScript'] }]);
    expect(Object.isFrozen(profile.skills[0].items)).toBe(true);
    expect(() => parseProfile({ fullName: 'Alex Example', skills: [{ category: 'Tools', items: [] }] })).toThrow(
      'Invalid profile in profile\n  - skills.0.items: a skill group needs at least one item'
    );
  });

  it('lists every invalid field', () => {
    expect(() => parseProfile({ fullName: '', email: 'nope', education: [{}] }, 'me.json')).toThrow([
      'Invalid profile in me.json',
      '  - fullName: fullName is required',
      '  - email: Invalid email',
      '  - education.0.title: Required'
    ].join('\n'));
  });

  it('loads a profile file', async () => {
    const file = path.join(dir, 'profile.json');
    await fs.writeFile(file, JSON.stringify({ fullName: 'Alex Example', city: 'Lisbon' }), 'utf-8');

    const profile = await loadProfile(file);

    expect(profile.fullName).toBe('Alex Example');
    expect(profile.city).toBe('Lisbon');
  });

  it('reports missing and malformed files', async () => {
    const missing = path.join(dir, 'missing.json');
    const malformed = path.join(dir, 'broken.json');
    await fs.writeFile(malformed, '{ "fullName": ', 'utf-8');

    await expect(loadProfile(missing)).rejects.toThrow(`Could not read profile file ${missing}`);
    await expect(loadProfile(malformed)).rejects.toThrow(`Profile file ${malformed} is not valid JSON`);
    await expect(loadProfile(malformed)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
