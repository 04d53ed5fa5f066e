/**
 * Document Compiler
 *
 * Runs an external LaTeX engine on the assembled source inside a fresh
 * temporary directory and returns the PDF bytes, or the tail of the engine
 * output as a diagnostic. The temporary directory is always removed.
 */

import { spawn, type ChildProcess } from 'child_process';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loggers, type Logger } from '../shared/logger';
import { CompileResult } from '../types';

export type LatexEngine = 'tectonic' | 'pdflatex' | 'latexmk';

export const LATEX_ENGINES: readonly LatexEngine[] = ['tectonic', 'pdflatex', 'latexmk'];

/**
 * Source text in, PDF bytes or a diagnostic out
 */
export interface DocumentCompiler {
  compile(source: string): Promise<CompileResult>;
}

export interface LatexCompilerOptions {
  engine?: LatexEngine;
  /** Default: 120000 = 2 minutes */
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 120_000;
const DIAGNOSTIC_LINES = 40;
const SOURCE_FILE = 'resume.tex';
const PDF_FILE = 'resume.pdf';

function buildCommand(engine: LatexEngine): { cmd: string; args: string[] } {
  if (engine === 'pdflatex') {
    return { cmd: 'pdflatex', args: ['-interaction=nonstopmode', '-halt-on-error', SOURCE_FILE] };
  }
  if (engine === 'latexmk') {
    return { cmd: 'latexmk', args: ['-pdf', '-interaction=nonstopmode', '-halt-on-error', SOURCE_FILE] };
  }
  return { cmd: 'tectonic', args: ['--keep-logs', SOURCE_FILE] };
}

interface RunResult {
  ok: boolean;
  output: string;
  error?: string;
}

export class LatexCompiler implements DocumentCompiler {
  private readonly engine: LatexEngine;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(options: LatexCompilerOptions = {}) {
    this.engine = options.engine ?? 'tectonic';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = options.logger ?? loggers.latex;
  }

  async compile(source: string): Promise<CompileResult> {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'resume-forge-'));
    try {
      await fs.writeFile(path.join(workDir, SOURCE_FILE), source, 'utf-8');

      const run = await this.run(workDir);
      if (!run.ok) {
        return { ok: false, diagnostic: run.error ?? tail(run.output) };
      }

      try {
        const pdf = await fs.readFile(path.join(workDir, PDF_FILE));
        this.log.info({ engine: this.engine, bytes: pdf.length }, 'compiled document');
        return { ok: true, pdf };
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return { ok: false, diagnostic: `${this.engine} finished but produced no PDF (${reason})\n${tail(run.output)}` };
      }
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  private run(workDir: string): Promise<RunResult> {
    return new Promise(resolve => {
      const command = buildCommand(this.engine);
      this.log.debug({ cmd: command.cmd, timeoutMs: this.timeoutMs }, 'running LaTeX engine');

      const child: ChildProcess = spawn(command.cmd, command.args, {
        cwd: workDir,
        env: process.env,
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe']
      });

      let output = '';
      let settled = false;
      const finish = (result: RunResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        resolve(result);
      };

      const timeoutId = setTimeout(() => {
        this.log.warn({ engine: this.engine, timeoutMs: this.timeoutMs }, 'LaTeX engine timed out, killing process');
        child.kill('SIGKILL');
        finish({
          ok: false,
          output,
          error: `${command.cmd} timed out after ${this.timeoutMs / 1000} seconds\n${tail(output)}`
        });
      }, this.timeoutMs);

      child.stdout?.on('data', (data: Buffer) => {
        output += data.toString();
      });
      child.stderr?.on('data', (data: Buffer) => {
        output += data.toString();
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'ENOENT') {
          finish({
            ok: false,
            output: '',
            error: `LaTeX engine '${command.cmd}' not found. Install it or choose another with LATEX_ENGINE (${LATEX_ENGINES.join(', ')}).`
          });
          return;
        }
        finish({ ok: false, output, error: `${command.cmd} failed to start: ${error.message}` });
      });

      child.on('close', code => {
        if (code === 0) {
          finish({ ok: true, output });
          return;
        }
        this.log.warn({ engine: this.engine, code }, 'LaTeX engine failed');
        finish({
          ok: false,
          output,
          error: output.trim().length > 0 ? undefined : `${command.cmd} exited with code ${code}`
        });
      });
    });
  }
}

/**
 * Last lines of engine output, where TeX reports the error
 */
export function tail(output: string, lines: number = DIAGNOSTIC_LINES): string {
  const all = output.trimEnd().split('\n');
  return all.slice(-lines).join('\n');
}
