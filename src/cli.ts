#!/usr/bin/env node
/**
 * resume-forge command line
 *
 * Usage:
 *   resume-forge --user octocat --job-url https://example.com/jobs/42
 *   resume-forge --job-file posting.txt --language pt --latex
 *
 * Exit codes: 0 when the resume was written or the selection was aborted,
 * 1 on any failure.
 */

import { spawn } from 'child_process';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { parseArgs } from 'util';
import { ContentGenerator } from './agents/contentGenerator';
import { JobExtractor } from './agents/jobExtractor';
import { RepositoryRanker } from './agents/repositoryRanker';
import { Config, loadConfig, validateForRun } from './config';
import { loadProfile } from './config/profile';
import { DocumentAssembler } from './latex/assembler';
import { LatexCompiler } from './latex/compiler';
import { isKnownLanguage, resolveLanguage } from './latex/locale';
import { runPipeline } from './pipeline';
import { TerminalSelectionIO } from './selection/terminalIO';
import { CompilationError, ConfigurationError, ErrorHandler, PipelineStageError } from './shared/errors';
import { FileCacheStore, ResilientFetcher, ResponseCache } from './shared/http';
import { LLMClient, StructuredInvoker } from './shared/llm';
import { logger, serializeError } from './shared/logger';
import { GitHubCollector } from './sources/githubCollector';
import { JobSourceResolver } from './sources/jobSourceResolver';

const HELP = `resume-forge: build a tailored LaTeX resume from a GitHub profile and a job posting

Usage: resume-forge [options]

Options:
  --profile <file>    Personal profile JSON (default: profile.json)
  --user <name>       GitHub username (default: GITHUB_USERNAME)
  --job-url <url>     Job posting URL
  --job-file <file>   Job posting text file
  --language <lang>   Resume language: en or pt (default: en)
  --output <file>     Output PDF path (default: resume.pdf)
  --latex             Also write the LaTeX source next to the PDF
  --edit              Open the LaTeX source in $EDITOR before compiling
  --context <text>    Extra notes for the content generator
  --no-cache          Bypass the response cache for this run
  -h, --help          Show this help

Without --job-url or --job-file a generic software engineering posting is used.
Settings such as API keys are read from the environment or a .env file.`;

export interface CliOptions {
  profile: string;
  user?: string;
  jobUrl?: string;
  jobFile?: string;
  language: string;
  output: string;
  latex: boolean;
  edit: boolean;
  context?: string;
  noCache: boolean;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      profile: { type: 'string', default: 'profile.json' },
      user: { type: 'string' },
      'job-url': { type: 'string' },
      'job-file': { type: 'string' },
      language: { type: 'string', default: 'en' },
      output: { type: 'string', default: 'resume.pdf' },
      latex: { type: 'boolean', default: false },
      edit: { type: 'boolean', default: false },
      context: { type: 'string' },
      'no-cache': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    },
    strict: true,
    allowPositionals: false
  });

  return {
    profile: values.profile ?? 'profile.json',
    user: values.user,
    jobUrl: values['job-url'],
    jobFile: values['job-file'],
    language: values.language ?? 'en',
    output: values.output ?? 'resume.pdf',
    latex: values.latex ?? false,
    edit: values.edit ?? false,
    context: values.context,
    noCache: values['no-cache'] ?? false,
    help: values.help ?? false
  };
}

// =============================================================================
// Review
// =============================================================================

function runEditor(editor: string, filePath: string): Promise<void> {
  const [command, ...args] = editor.split(/\s+/).filter(part => part.length > 0);
  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args, filePath], { stdio: 'inherit' });
    child.on('error', error => reject(new Error(`Could not start editor '${command}': ${error.message}`)));
    child.on('close', code => {
      if (code === 0) {
        resolve();
      } else {
        reject(new Error(`Editor '${command}' exited with code ${code}`));
      }
    });
  });
}

/**
 * Write the source to a temp file, let the user edit it, read it back
 */
async function editInEditor(source: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'resume-forge-edit-'));
  const filePath = path.join(dir, 'resume.tex');
  try {
    await fs.writeFile(filePath, source, 'utf-8');
    await runEditor(process.env.EDITOR || 'vi', filePath);
    return await fs.readFile(filePath, 'utf-8');
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

/**
 * Message for a failed run: "<stage> failed: <message>", the compiler
 * diagnostic when there is one, then the suggested action
 */
export function describeFailure(error: unknown): string {
  const appError = ErrorHandler.toAppError(error);
  const failure = appError instanceof PipelineStageError ? appError.failure : appError;

  let message = appError.userMessage;
  if (failure instanceof CompilationError) {
    message += `\n\n${failure.diagnostic}`;
  }
  if (appError.suggestedAction) {
    message += `\n\n${appError.suggestedAction}`;
  }
  return message;
}

// =============================================================================
// Main
// =============================================================================

function createFetcher(config: Config, noCache: boolean): ResilientFetcher {
  const cache = new ResponseCache(new FileCacheStore(config.cache.dir), {
    enabled: config.cache.enabled && !noCache,
    ttlSeconds: config.cache.ttlSeconds
  });
  return new ResilientFetcher({
    cache,
    retry: {
      maxRetries: config.http.maxRetries,
      baseDelayMs: config.http.baseDelayMs,
      maxDelayMs: config.http.maxDelayMs
    },
    timeoutMs: config.http.timeoutMs
  });
}

function createInvoker(config: Config, apiKey: string): StructuredInvoker {
  const client = new LLMClient(
    {
      provider: config.llm.provider,
      apiKey,
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      ...(config.llm.model ? { model: config.llm.model } : {}),
      ...(config.llm.endpoint ? { endpoint: config.llm.endpoint } : {})
    },
    {
      retry: {
        maxRetries: config.http.maxRetries,
        baseDelayMs: config.http.baseDelayMs,
        maxDelayMs: config.http.maxDelayMs
      }
    }
  );
  return new StructuredInvoker(client, { maxRetries: config.llm.maxRetries });
}

export async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n\n${HELP}\n`);
    return 1;
  }

  if (options.help) {
    process.stdout.write(`${HELP}\n`);
    return 0;
  }

  try {
    const config = loadConfig();
    const username = options.user ?? config.github.username;
    const problems = validateForRun({ ...config, github: { ...config.github, username: username ?? null } });
    if (!isKnownLanguage(options.language)) {
      problems.push(`Unsupported language "${options.language}" (use en or pt)`);
    }
    if (problems.length > 0 || !username || !config.llm.apiKey) {
      throw new ConfigurationError('Cannot start', problems);
    }

    const profile = await loadProfile(options.profile);
    const fetcher = createFetcher(config, options.noCache);
    const invoker = createInvoker(config, config.llm.apiKey);

    const outcome = await runPipeline(
      {
        username,
        job: { url: options.jobUrl, file: options.jobFile },
        profile,
        language: resolveLanguage(options.language),
        outputPath: options.output,
        writeLatex: options.latex,
        context: options.context,
        rankingLimit: config.rankingLimit
      },
      {
        collector: new GitHubCollector(fetcher, {
          apiUrl: config.github.apiUrl,
          token: config.github.token ?? undefined,
          concurrency: config.github.concurrency,
          readmeMaxChars: config.github.readmeMaxChars,
          includeForks: config.github.includeForks
        }),
        resolver: new JobSourceResolver(fetcher),
        extractor: new JobExtractor(invoker),
        ranker: new RepositoryRanker(invoker),
        generator: new ContentGenerator(invoker),
        assembler: new DocumentAssembler(),
        compiler: new LatexCompiler({ engine: config.latex.engine, timeoutMs: config.latex.timeoutMs }),
        openSelectionIO: () => new TerminalSelectionIO(),
        review: options.edit ? editInEditor : undefined
      }
    );

    if (outcome.status === 'aborted') {
      return 0;
    }
    process.stdout.write(`Resume written to ${outcome.outputPath}\n`);
    if (outcome.latexPath) {
      process.stdout.write(`LaTeX source written to ${outcome.latexPath}\n`);
    }
    return 0;
  } catch (error) {
    logger.debug({ err: serializeError(error) }, 'run failed');
    process.stderr.write(`${describeFailure(error)}\n`);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
      process.exitCode = 1;
    }
  );
}
