/**
 * Resume Pipeline
 *
 * Wires the stages in order:
 *
 *   (collect ‖ resolve job) → extract → rank → select → generate
 *     → profile fallback → assemble → review? → compile → write
 *
 * Each stage's failure is wrapped in a PipelineStageError naming the stage.
 * Collaborators are passed in, so the CLI owns construction and tests can
 * substitute any of them.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { applyProfileFallback, ContentGenerator } from './agents/contentGenerator';
import { JobExtractor } from './agents/jobExtractor';
import { RepositoryRanker } from './agents/repositoryRanker';
import { DocumentAssembler } from './latex/assembler';
import { DocumentCompiler } from './latex/compiler';
import { SelectionController, SelectionIO } from './selection/selectionController';
import { CompilationError, ConfigurationError, ErrorHandler } from './shared/errors';
import { loggers, type Logger } from './shared/logger';
import { GitHubCollector } from './sources/githubCollector';
import { JobSourceResolver } from './sources/jobSourceResolver';
import {
  JobDescription,
  JobSource,
  PersonalProfile,
  RankedRepository,
  Repository,
  ResumeLanguage,
  SelectionResult
} from './types';

// =============================================================================
// Types
// =============================================================================

export type PipelineStage =
  | 'GitHub collection'
  | 'Job source'
  | 'Job extraction'
  | 'Ranking'
  | 'Selection'
  | 'Content generation'
  | 'Assembly'
  | 'Review'
  | 'Compilation'
  | 'Output';

export interface PipelineInput {
  username: string;
  job: JobSource;
  profile: PersonalProfile;
  language: ResumeLanguage;
  outputPath: string;
  /** Also write the LaTeX source next to the PDF */
  writeLatex: boolean;
  /** Extra notes for the generator */
  context?: string;
  /** Candidates passed to ranking, most important first */
  rankingLimit: number;
}

export interface PipelineDependencies {
  collector: Pick<GitHubCollector, 'collect'>;
  resolver: Pick<JobSourceResolver, 'resolve'>;
  extractor: Pick<JobExtractor, 'extract'>;
  ranker: Pick<RepositoryRanker, 'rank'>;
  generator: Pick<ContentGenerator, 'generate'>;
  assembler: Pick<DocumentAssembler, 'assemble'>;
  compiler: DocumentCompiler;
  /** Opened when selection starts and closed when it ends */
  openSelectionIO: () => SelectionIO;
  /** Returns the (possibly edited) LaTeX source to compile */
  review?: (source: string) => Promise<string>;
  writeFile?: (filePath: string, data: string | Buffer) => Promise<void>;
  logger?: Logger;
}

export type PipelineOutcome =
  | {
      status: 'completed';
      outputPath: string;
      latexPath: string | null;
      job: JobDescription;
      ranked: readonly RankedRepository[];
      selection: SelectionResult;
    }
  | { status: 'aborted' };

// =============================================================================
// Helpers
// =============================================================================

/**
 * resume.pdf → resume.tex; a path without an extension gets one appended
 */
export function latexPathFor(outputPath: string): string {
  const parsed = path.parse(outputPath);
  return path.join(parsed.dir, `${parsed.name}.tex`);
}

async function stage<T>(name: PipelineStage, log: Logger, run: () => Promise<T>): Promise<T> {
  const started = Date.now();
  try {
    const result = await run();
    log.debug({ stage: name, durationMs: Date.now() - started }, 'stage finished');
    return result;
  } catch (error) {
    throw ErrorHandler.forStage(name, error);
  }
}

async function defaultWriteFile(filePath: string, data: string | Buffer): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.writeFile(filePath, data);
}

// =============================================================================
// Pipeline
// =============================================================================

export async function runPipeline(input: PipelineInput, deps: PipelineDependencies): Promise<PipelineOutcome> {
  const log = deps.logger ?? loggers.pipeline;
  const writeFile = deps.writeFile ?? defaultWriteFile;

  if (path.extname(input.outputPath).toLowerCase() === '.tex') {
    throw new ConfigurationError('Invalid output path', [
      `${input.outputPath} is where the LaTeX source goes; give the PDF a .pdf name`
    ]);
  }

  log.info({ username: input.username, language: input.language }, 'starting resume pipeline');

  const [repositories, rawJob] = await Promise.all([
    stage('GitHub collection', log, () => deps.collector.collect(input.username)),
    stage('Job source', log, () => deps.resolver.resolve(input.job))
  ]);
  log.info({ repositories: repositories.length, jobChars: rawJob.length }, 'inputs gathered');

  const job = await stage('Job extraction', log, () => deps.extractor.extract(rawJob));

  const candidates: readonly Repository[] = repositories.slice(0, input.rankingLimit);
  const ranked = await stage('Ranking', log, () => deps.ranker.rank(candidates, job));

  const outcome = await stage('Selection', log, async () => {
    const io = deps.openSelectionIO();
    try {
      return await new SelectionController(ranked, repositories, io).run();
    } finally {
      io.close?.();
    }
  });
  if (outcome.status === 'aborted') {
    log.info('selection aborted by user');
    return { status: 'aborted' };
  }
  const selection = outcome.selection;

  const content = await stage('Content generation', log, async () =>
    applyProfileFallback(
      await deps.generator.generate({
        job,
        selection,
        profile: input.profile,
        language: input.language,
        context: input.context
      }),
      input.profile
    )
  );

  const document = await stage('Assembly', log, async () =>
    deps.assembler.assemble(input.profile, job, content, input.language)
  );

  const review = deps.review;
  const source = review ? await stage('Review', log, () => review(document.source)) : document.source;

  const texPath = latexPathFor(input.outputPath);
  let latexPath: string | null = null;
  if (input.writeLatex) {
    await stage('Output', log, () => writeFile(texPath, source));
    latexPath = texPath;
    log.info({ path: texPath }, 'wrote LaTeX source');
  }

  const pdf = await stage('Compilation', log, async () => {
    const result = await deps.compiler.compile(source);
    if (!result.ok) {
      await writeFile(texPath, source);
      throw new CompilationError(result.diagnostic, texPath);
    }
    return result.pdf;
  });

  await stage('Output', log, () => writeFile(input.outputPath, pdf));
  log.info({ path: input.outputPath, bytes: pdf.length }, 'generated resume');

  return {
    status: 'completed',
    outputPath: input.outputPath,
    latexPath,
    job,
    ranked,
    selection
  };
}
