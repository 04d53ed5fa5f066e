/**
 * Selection Controller
 *
 * Interactive checkpoint between ranking and generation. A small state
 * machine:
 *
 *   presenting → awaitingChoice → (resolvingManualAdds)? → frozen
 *
 * with `aborted` reachable from every prompt (q, quit, abort, or end of
 * input). Invalid input never escapes: it is reported and asked again.
 */

import { SelectionError } from '../shared/errors';
import { loggers, type Logger } from '../shared/logger';
import { ManualRepository, ProjectSource, RankedRepository, Repository, SelectionResult } from '../types';

export type SelectionState = 'presenting' | 'awaitingChoice' | 'resolvingManualAdds' | 'frozen' | 'aborted';

export type SelectionOutcome =
  | { status: 'selected'; selection: SelectionResult }
  | { status: 'aborted' };

/**
 * Terminal seam; `ask` resolves null at end of input
 */
export interface SelectionIO {
  write(text: string): void;
  ask(prompt: string): Promise<string | null>;
  /** Release the terminal once selection is over */
  close?(): void;
}

export interface SelectionControllerOptions {
  defaultSelectionCount?: number;
  logger?: Logger;
}

export const DEFAULT_SELECTION_COUNT = 5;
const MAX_SUGGESTIONS = 3;
const ABORT_WORDS = new Set(['q', 'quit', 'abort']);

/** Thrown out of a prompt to unwind into the aborted state */
class AbortSelection extends Error {}

export class SelectionController {
  private state: SelectionState = 'presenting';
  private readonly defaultSelectionCount: number;
  private readonly log: Logger;
  private readonly chosen: Repository[] = [];
  private readonly manuallyAdded: ProjectSource[] = [];

  constructor(
    private readonly ranked: readonly RankedRepository[],
    private readonly collected: readonly Repository[],
    private readonly io: SelectionIO,
    options: SelectionControllerOptions = {}
  ) {
    this.defaultSelectionCount = options.defaultSelectionCount ?? DEFAULT_SELECTION_COUNT;
    this.log = options.logger ?? loggers.selection;
  }

  get currentState(): SelectionState {
    return this.state;
  }

  /**
   * Run the interaction once; a second call throws
   */
  async run(): Promise<SelectionOutcome> {
    if (this.state !== 'presenting') {
      throw new Error(`Selection already ran (state: ${this.state})`);
    }

    try {
      this.present();
      this.state = 'awaitingChoice';
      await this.awaitChoice();

      if (await this.confirmManualAdds()) {
        this.state = 'resolvingManualAdds';
        await this.resolveManualAdds();
      }
    } catch (error) {
      if (error instanceof AbortSelection) {
        this.state = 'aborted';
        this.io.write('Selection aborted.');
        this.log.info('selection aborted by user');
        return { status: 'aborted' };
      }
      throw error;
    }

    this.state = 'frozen';
    const selection: SelectionResult = Object.freeze({
      chosen: Object.freeze([...this.chosen]),
      manuallyAdded: Object.freeze([...this.manuallyAdded])
    });
    this.log.info(
      { chosen: selection.chosen.length, manuallyAdded: selection.manuallyAdded.length },
      'selection frozen'
    );
    return { status: 'selected', selection };
  }

  // ==========================================================================
  // States
  // ==========================================================================

  private present(): void {
    if (this.ranked.length === 0) {
      this.io.write('No repositories were ranked.');
      return;
    }

    this.io.write('Repositories ranked for this job:\n');
    for (const entry of this.ranked) {
      this.io.write(formatRankedLine(entry, this.ranked.length));
    }
    this.io.write('');
  }

  private async awaitChoice(): Promise<void> {
    if (this.ranked.length === 0) {
      return;
    }

    const defaultCount = Math.min(this.defaultSelectionCount, this.ranked.length);
    for (;;) {
      const answer = await this.prompt(
        `Select repositories (e.g. 1,3,5-7; Enter for the top ${defaultCount}; q to quit): `
      );
      if (ABORT_WORDS.has(answer.toLowerCase())) {
        throw new AbortSelection();
      }
      try {
        const positions = parseSelection(answer, this.ranked.length, this.defaultSelectionCount);
        this.chosen.push(...positions.map(p => this.ranked[p - 1].repository));
        this.io.write(`Selected ${positions.length} repositor${positions.length === 1 ? 'y' : 'ies'}.`);
        return;
      } catch (error) {
        if (error instanceof SelectionError) {
          this.io.write(error.userMessage);
          continue;
        }
        throw error;
      }
    }
  }

  private async confirmManualAdds(): Promise<boolean> {
    for (;;) {
      const answer = (await this.prompt('Add repositories manually? [y/N] ')).toLowerCase();
      if (answer === '' || answer === 'n' || answer === 'no') return false;
      if (answer === 'y' || answer === 'yes') return true;
      this.io.write('Please answer y or n.');
    }
  }

  private async resolveManualAdds(): Promise<void> {
    for (;;) {
      const name = await this.prompt('Repository or project name (Enter to finish): ');
      if (name === '') {
        return;
      }

      const existing = this.findCollected(name);
      if (existing) {
        if (this.isSelected(existing)) {
          this.io.write(`Already selected: ${existing.name}`);
        } else {
          this.manuallyAdded.push(existing);
          this.io.write(`Added: ${existing.name}`);
        }
        continue;
      }

      if (this.manuallyAdded.some(p => p.kind === 'manual' && p.name.toLowerCase() === name.toLowerCase())) {
        this.io.write(`Already selected: ${name}`);
        continue;
      }

      this.io.write(`Not found in profile: ${name}`);
      const suggestions = similarNames(name, this.collected);
      if (suggestions.length > 0) {
        this.io.write(`Did you mean: ${suggestions.join(', ')}?`);
      }

      const manual = await this.describeManual(name);
      if (manual) {
        this.manuallyAdded.push(manual);
        this.io.write(`Added: ${manual.name}`);
      } else {
        this.io.write(`Skipped ${name}: give a URL or a description.`);
      }
    }
  }

  private async describeManual(name: string): Promise<ManualRepository | undefined> {
    let url: string | null = null;
    for (;;) {
      const answer = await this.prompt(`URL for ${name} (optional): `);
      if (answer === '') break;
      if (isHttpUrl(answer)) {
        url = answer;
        break;
      }
      this.io.write('The URL must start with http:// or https://');
    }

    const description = await this.prompt(`Short description of ${name} (optional): `);
    if (url === null && description === '') {
      return undefined;
    }

    return Object.freeze({
      kind: 'manual' as const,
      name,
      url,
      description: description === '' ? null : description
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Ask and trim; end of input unwinds to `aborted` from any prompt
   */
  private async prompt(question: string): Promise<string> {
    const answer = await this.io.ask(question);
    if (answer === null) {
      throw new AbortSelection();
    }
    return answer.trim();
  }

  private findCollected(name: string): Repository | undefined {
    const wanted = name.toLowerCase();
    return this.collected.find(r => r.name.toLowerCase() === wanted || r.fullName.toLowerCase() === wanted);
  }

  private isSelected(repository: Repository): boolean {
    return this.chosen.some(r => r.url === repository.url)
      || this.manuallyAdded.some(p => p.kind === 'collected' && p.url === repository.url);
  }
}

// ============================================================================
// Pure helpers
// ============================================================================

/**
 * Star rating for a 1-based ordinal score out of `total`
 */
export function starsFor(score: number, total: number): number {
  return Math.max(1, 5 - Math.floor(((score - 1) * 5) / total));
}

export function formatRankedLine(entry: RankedRepository, total: number): string {
  const repo = entry.repository;
  const details = repo.primaryLanguage ? `${repo.primaryLanguage}, ★${repo.stars}` : `★${repo.stars}`;
  const stars = '★'.repeat(starsFor(entry.score, total));
  return `${entry.score}. [${stars}] ${repo.name} (${details}) — ${entry.rationale}`;
}

/**
 * Parse a list of 1-based positions and a-b ranges separated by commas or
 * spaces. Order is kept and repeats collapse to their first occurrence.
 * Empty input selects the top `defaultCount`.
 */
export function parseSelection(input: string, total: number, defaultCount: number): number[] {
  const trimmed = input.trim();
  if (trimmed === '') {
    return Array.from({ length: Math.min(defaultCount, total) }, (_, i) => i + 1);
  }

  const positions: number[] = [];
  const seen = new Set<number>();
  const checkRange = (position: number): void => {
    if (position < 1 || position > total) {
      throw new SelectionError(`${position} is out of range; choose between 1 and ${total}.`, input);
    }
  };
  const add = (position: number): void => {
    checkRange(position);
    if (!seen.has(position)) {
      seen.add(position);
      positions.push(position);
    }
  };

  for (const token of trimmed.split(/[\s,]+/).filter(t => t.length > 0)) {
    const single = /^\d+$/.exec(token);
    if (single) {
      add(Number(token));
      continue;
    }

    const range = /^(\d+)-(\d+)$/.exec(token);
    if (!range) {
      throw new SelectionError(`"${token}" is not a number or a range like 2-4.`, input);
    }
    const start = Number(range[1]);
    const end = Number(range[2]);
    if (start > end) {
      throw new SelectionError(`Range ${token} is reversed; write it as ${end}-${start}.`, input);
    }
    // Check both ends before expanding so huge ranges fail fast
    checkRange(start);
    checkRange(end);
    for (let position = start; position <= end; position++) {
      add(position);
    }
  }

  return positions;
}

/**
 * Up to three collected names containing, or contained in, the given name
 */
export function similarNames(name: string, repositories: readonly Repository[]): string[] {
  const wanted = name.toLowerCase();
  return repositories
    .filter(r => {
      const candidate = r.name.toLowerCase();
      return candidate.includes(wanted) || wanted.includes(candidate);
    })
    .slice(0, MAX_SUGGESTIONS)
    .map(r => r.name);
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
