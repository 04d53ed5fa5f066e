/**
 * GitHub Collector
 *
 * Enumerates a user's public repositories and gathers, per repository, the
 * language breakdown, a README excerpt and the commit count.
 *
 * All requests go through the shared ResilientFetcher, so repeated runs
 * within the cache TTL cost no API budget. Before fetching details the
 * collector checks the remaining rate-limit budget against the number of
 * detail requests the cache cannot serve, and fails early with
 * RateLimitedError instead of running dry half-way.
 */

import { FetchError, RateLimitedError } from '../shared/errors';
import { mapWithConcurrency } from '../shared/concurrency/pool';
import { ResilientFetcher, type FetchRequest, headerOf } from '../shared/http';
import { loggers, serializeError, type Logger } from '../shared/logger';
import {
  GitHubCommitListSchema,
  GitHubLanguagesSchema,
  GitHubRateLimitSchema,
  GitHubReadmeSchema,
  GitHubRepo,
  GitHubRepoListSchema
} from '../shared/validation';
import { Repository } from '../types';

export interface GitHubCollectorOptions {
  apiUrl?: string;
  token?: string;
  concurrency?: number;
  readmeMaxChars?: number;
  includeForks?: boolean;
  now?: () => number;
  logger?: Logger;
}

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';
export const DEFAULT_COLLECTOR_CONCURRENCY = 4;
export const DEFAULT_README_MAX_CHARS = 1500;

/** languages, readme, commits */
const DETAIL_REQUESTS_PER_REPO = 3;

interface RepositoryDetails {
  languageBreakdown: Record<string, number>;
  readmeExcerpt: string | null;
  commitCount: number;
}

export class GitHubCollector {
  private readonly apiUrl: string;
  private readonly concurrency: number;
  private readonly readmeMaxChars: number;
  private readonly includeForks: boolean;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly fetcher: ResilientFetcher,
    private readonly options: GitHubCollectorOptions = {}
  ) {
    this.apiUrl = (options.apiUrl ?? DEFAULT_GITHUB_API_URL).replace(/\/+$/, '');
    this.concurrency = options.concurrency ?? DEFAULT_COLLECTOR_CONCURRENCY;
    this.readmeMaxChars = options.readmeMaxChars ?? DEFAULT_README_MAX_CHARS;
    this.includeForks = options.includeForks ?? true;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? loggers.github;
  }

  /**
   * Collect every public repository of the user, most important first
   */
  async collect(username: string, token?: string): Promise<Repository[]> {
    const headers = this.headers(token ?? this.options.token);

    const listed = await this.listRepositories(username, headers);
    const repos = this.includeForks ? listed : listed.filter(r => !r.fork);
    this.log.info({ username, listed: listed.length, kept: repos.length }, 'listed repositories');

    await this.ensureBudget(repos, headers);

    const collected = await mapWithConcurrency(repos, this.concurrency, async repo => {
      const details = await this.collectDetails(repo, headers);
      return toRepository(repo, details);
    });

    // Array.prototype.sort is stable, so equal importance keeps listing order
    const ordered = [...collected].sort((a, b) => b.importance - a.importance);
    this.log.info({ username, repositories: ordered.length }, 'collected repositories');
    return ordered;
  }

  // ==========================================================================
  // Listing
  // ==========================================================================

  private async listRepositories(username: string, headers: Record<string, string>): Promise<GitHubRepo[]> {
    const repos: GitHubRepo[] = [];
    const visited = new Set<string>();
    let url: string | undefined =
      `${this.apiUrl}/users/${encodeURIComponent(username)}/repos?per_page=100&type=owner&sort=pushed&page=1`;

    while (url !== undefined && !visited.has(url)) {
      visited.add(url);
      const { response, data } = await this.fetcher.fetchJson({ url, headers });

      const page = GitHubRepoListSchema.safeParse(data);
      if (!page.success) {
        throw new FetchError({
          url,
          message: `unexpected repository listing payload: ${page.error.errors[0]?.message ?? 'invalid'}`,
          status: response.status,
          retryable: false
        });
      }

      repos.push(...page.data);
      url = parseLinkHeader(headerOf(response, 'link')).next;
    }

    return repos;
  }

  // ==========================================================================
  // Rate-limit budget
  // ==========================================================================

  private async ensureBudget(repos: GitHubRepo[], headers: Record<string, string>): Promise<void> {
    let required = 0;
    for (const repo of repos) {
      for (const request of this.detailRequests(repo, headers)) {
        if (!(await this.fetcher.isCached(request))) {
          required++;
        }
      }
    }

    if (required === 0) {
      this.log.debug('all repository details are cached');
      return;
    }

    const url = `${this.apiUrl}/rate_limit`;
    let data: unknown;
    try {
      ({ data } = await this.fetcher.fetchJson({ url, headers, cache: false }));
    } catch (error) {
      // GitHub Enterprise answers 404 when rate limiting is disabled
      if (error instanceof FetchError && error.status === 404) {
        this.log.debug('rate limiting disabled on this host');
        return;
      }
      throw error;
    }

    const parsed = GitHubRateLimitSchema.safeParse(data);
    if (!parsed.success) {
      throw new FetchError({ url, message: 'unexpected rate limit payload', retryable: false });
    }

    const { remaining, reset } = parsed.data.resources.core;
    this.log.debug({ remaining, required }, 'rate limit budget');

    if (remaining < required) {
      throw new RateLimitedError({
        url,
        retryAfterMs: Math.max(0, reset * 1000 - this.now()),
        message: `GitHub rate limit too low: ${remaining} requests left, ${required} needed.`
      });
    }
  }

  // ==========================================================================
  // Details
  // ==========================================================================

  private detailRequests(repo: GitHubRepo, headers: Record<string, string>): [FetchRequest, FetchRequest, FetchRequest] {
    const base = `${this.apiUrl}/repos/${repo.full_name.split('/').map(encodeURIComponent).join('/')}`;
    return [
      { url: `${base}/languages`, headers },
      { url: `${base}/readme`, headers },
      { url: `${base}/commits?per_page=1`, headers }
    ];
  }

  /**
   * Sequential within a repository so the pool size bounds in-flight requests
   */
  private async collectDetails(repo: GitHubRepo, headers: Record<string, string>): Promise<RepositoryDetails> {
    const [languages, readme, commits] = this.detailRequests(repo, headers);

    const languageBreakdown = await this.degrade(repo, 'languages', {}, async () => {
      const { data } = await this.fetcher.fetchJson(languages);
      return GitHubLanguagesSchema.parse(data);
    });

    const readmeExcerpt = await this.degrade(repo, 'readme', null, async () => {
      const { data } = await this.fetcher.fetchJson(readme);
      const payload = GitHubReadmeSchema.parse(data);
      return decodeReadme(payload.content, payload.encoding, this.readmeMaxChars);
    });

    const commitCount = await this.degrade(repo, 'commits', 0, async () => {
      try {
        const { response, data } = await this.fetcher.fetchJson(commits);
        return countCommits(headerOf(response, 'link'), GitHubCommitListSchema.parse(data).length);
      } catch (error) {
        // 409: empty repository
        if (error instanceof FetchError && error.status === 409) {
          return 0;
        }
        throw error;
      }
    });

    return { languageBreakdown, readmeExcerpt, commitCount };
  }

  /**
   * Per-repository failures fall back to an empty field; rate limiting
   * fails the whole collection
   */
  private async degrade<T>(repo: GitHubRepo, field: string, fallback: T, lookup: () => Promise<T>): Promise<T> {
    try {
      return await lookup();
    } catch (error) {
      if (error instanceof RateLimitedError) {
        throw error;
      }
      if (error instanceof FetchError && error.status === 404) {
        this.log.debug({ repo: repo.full_name, field }, 'not available');
      } else {
        this.log.warn({ repo: repo.full_name, field, err: serializeError(error) }, 'detail lookup failed');
      }
      return fallback;
    }
  }

  private headers(token: string | undefined): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28'
    };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }
    return headers;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parse an RFC 8288 Link header into rel → URL
 */
export function parseLinkHeader(value: string | undefined): Record<string, string | undefined> {
  const links: Record<string, string | undefined> = {};
  if (!value) return links;

  for (const match of value.matchAll(/<([^>]+)>\s*;\s*rel="([^"]+)"/g)) {
    for (const rel of match[2].split(/\s+/)) {
      links[rel] = match[1];
    }
  }
  return links;
}

/**
 * Commit count from a per_page=1 listing: the page number of rel="last",
 * or the number of returned commits when there is a single page
 */
export function countCommits(link: string | undefined, returned: number): number {
  const last = parseLinkHeader(link).last;
  if (last !== undefined) {
    const page = Number(new URL(last).searchParams.get('page'));
    if (Number.isInteger(page) && page > 0) {
      return page;
    }
  }
  return returned;
}

export function decodeReadme(content: string, encoding: string, maxChars: number): string | null {
  const text = encoding === 'base64'
    ? Buffer.from(content.replace(/\s/g, ''), 'base64').toString('utf-8')
    : content;
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const codePoints = Array.from(trimmed);
  return codePoints.length > maxChars ? codePoints.slice(0, maxChars).join('') : trimmed;
}

/**
 * Profile importance: forks and archived repositories score 0
 */
export function importanceOf(repo: { stars: number; forks: number; size: number; fork: boolean; archived: boolean }): number {
  if (repo.fork || repo.archived) {
    return 0;
  }
  return 3 * Math.min(repo.stars, 1000)
    + 2 * Math.min(repo.forks, 100)
    + Math.floor(Math.min(repo.size, 10000) / 100);
}

function toRepository(repo: GitHubRepo, details: RepositoryDetails): Repository {
  const base = {
    stars: repo.stargazers_count,
    forks: repo.forks_count,
    size: repo.size,
    fork: repo.fork,
    archived: repo.archived
  };

  return Object.freeze({
    kind: 'collected' as const,
    name: repo.name,
    fullName: repo.full_name,
    url: repo.html_url,
    description: repo.description,
    ...base,
    primaryLanguage: repo.language,
    languageBreakdown: Object.freeze({ ...details.languageBreakdown }),
    readmeExcerpt: details.readmeExcerpt,
    lastActivity: repo.pushed_at ?? repo.created_at,
    createdAt: repo.created_at,
    commitCount: details.commitCount,
    topics: Object.freeze([...repo.topics]),
    importance: importanceOf(base)
  });
}
