/**
 * Job Source Resolver
 *
 * Produces the raw posting text from exactly one of: a URL, a local file,
 * or (when neither is given) the built-in generic template.
 */

import * as fs from 'fs/promises';
import { ResolutionError } from '../shared/errors';
import { ResilientFetcher, headerOf } from '../shared/http';
import { loggers, type Logger } from '../shared/logger';
import { JobSource } from '../types';
import { DEFAULT_JOB_TEMPLATE } from './defaultJobTemplate';
import { extractPageHints, extractVisibleText, looksLikeHtml } from './htmlText';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface JobSourceResolverOptions {
  userAgent?: string;
  readFile?: (path: string) => Promise<string>;
  logger?: Logger;
}

export class JobSourceResolver {
  private readonly userAgent: string;
  private readonly readFile: (path: string) => Promise<string>;
  private readonly log: Logger;

  constructor(private readonly fetcher: ResilientFetcher, options: JobSourceResolverOptions = {}) {
    this.userAgent = options.userAgent ?? BROWSER_USER_AGENT;
    this.readFile = options.readFile ?? (path => fs.readFile(path, 'utf-8'));
    this.log = options.logger ?? loggers.job;
  }

  async resolve(source: JobSource): Promise<string> {
    const url = source.url?.trim() || undefined;
    const file = source.file?.trim() || undefined;

    if (url !== undefined && file !== undefined) {
      throw new ResolutionError('INVALID_SOURCE', 'Give either a job URL or a job file, not both.', { url, file });
    }
    if (url !== undefined) {
      return this.fromUrl(url);
    }
    if (file !== undefined) {
      return this.fromFile(file);
    }

    this.log.info('no job source given; using the generic template');
    return DEFAULT_JOB_TEMPLATE;
  }

  private async fromUrl(url: string): Promise<string> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new ResolutionError('INVALID_SOURCE', `Not a valid URL: ${url}`, { url });
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ResolutionError('INVALID_SOURCE', `Job URL must use http or https: ${url}`, { url });
    }

    this.log.info({ url: parsed.href }, 'fetching job posting');
    const response = await this.fetcher.fetch({
      url: parsed.href,
      headers: {
        'User-Agent': this.userAgent,
        Accept: 'text/html,application/xhtml+xml;q=0.9,text/plain;q=0.8,*/*;q=0.5'
      }
    });

    const body = response.body;
    if (!looksLikeHtml(body, headerOf(response, 'content-type'))) {
      return this.nonEmpty(body.trim(), url);
    }

    const text = this.nonEmpty(extractVisibleText(body), url);
    const hints = extractPageHints(body);
    const hintLines: string[] = [];
    if (hints.title) hintLines.push(`Page title: ${hints.title}`);
    if (hints.ogTitle && hints.ogTitle !== hints.title) hintLines.push(`Posting title: ${hints.ogTitle}`);
    if (hints.siteName) hintLines.push(`Site: ${hints.siteName}`);

    this.log.debug({ url, chars: text.length, hints: hintLines.length }, 'extracted posting text');
    return hintLines.length > 0 ? `${hintLines.join('\n')}\n\n${text}` : text;
  }

  private async fromFile(file: string): Promise<string> {
    let content: string;
    try {
      content = await this.readFile(file);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new ResolutionError('NOT_FOUND', `Job file not found: ${file}`, { file });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ResolutionError('IO_ERROR', `Could not read job file ${file}: ${reason}`, { file });
    }

    const text = content.trim();
    if (text.length === 0) {
      throw new ResolutionError('IO_ERROR', `Job file is empty: ${file}`, { file });
    }
    this.log.info({ file, chars: text.length }, 'read job posting file');
    return text;
  }

  private nonEmpty(text: string, url: string): string {
    if (text.length === 0) {
      throw new ResolutionError('EMPTY_SOURCE', `No readable text found at ${url}`, { url });
    }
    return text;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
