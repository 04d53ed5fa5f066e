/**
 * Repository Ranker
 *
 * Asks the provider to score every repository against the job, then turns
 * the scores into a total order: relevance descending, ties in input order.
 * The answer must mention each repository exactly once; anything else is
 * sent back for another attempt.
 */

import { loggers, type Logger } from '../shared/logger';
import { StructuredInvoker, buildStructuredPrompt, formatList, truncateText } from '../shared/llm';
import { RankingResponse, RankingResponseSchema } from '../shared/validation';
import { JobDescription, RankedRepository, Repository } from '../types';

const RANKING_SYSTEM_PROMPT = `You are a senior engineering hiring manager. You judge how well each of a candidate's GitHub repositories demonstrates fit for a specific job.

For every repository, assign:
- relevance: an integer from 0 (irrelevant) to 100 (directly demonstrates the required skills)
- rationale: one sentence explaining the score in terms of the job requirements

RULES:
1. Rank EVERY repository listed, exactly once, using its id verbatim
2. Weigh required skills above nice-to-have skills
3. Prefer substantial, maintained projects over trivial ones when relevance is otherwise equal
4. Do not add repositories that are not listed

Return a JSON object with this exact structure:
{
  "rankings": [
    { "id": "repository id", "relevance": 0, "rationale": "string" }
  ]
}`;

const README_PROMPT_CHARS = 400;

export interface RepositoryRankerOptions {
  logger?: Logger;
}

export class RepositoryRanker {
  private readonly log: Logger;

  constructor(private readonly invoker: StructuredInvoker, options: RepositoryRankerOptions = {}) {
    this.log = options.logger ?? loggers.llm;
  }

  async rank(repositories: readonly Repository[], job: JobDescription): Promise<RankedRepository[]> {
    if (repositories.length === 0) {
      return [];
    }

    const ids = repositories.map(r => r.url);
    const response = await this.invoker.invoke({
      name: 'repository ranking',
      systemPrompt: RANKING_SYSTEM_PROMPT,
      userPrompt: buildStructuredPrompt(
        `Rank these ${repositories.length} repositories for the job below.`,
        [
          { heading: 'Job', body: describeJob(job) },
          { heading: 'Repositories', body: repositories.map(describeRepository).join('\n\n') }
        ]
      ),
      schema: RankingResponseSchema,
      check: value => checkRankingIds(value, ids)
    });

    const ranked = orderRankings(repositories, response);
    this.log.info(
      { repositories: ranked.length, top: ranked[0]?.repository.name },
      'ranked repositories'
    );
    return ranked;
  }
}

// ============================================================================
// Ranking rules
// ============================================================================

/**
 * Problems with the ids in a ranking answer; empty when every expected id
 * appears exactly once
 */
export function checkRankingIds(response: RankingResponse, expectedIds: readonly string[]): string[] {
  const expected = new Set(expectedIds);
  const seen = new Set<string>();
  const problems: string[] = [];

  for (const { id } of response.rankings) {
    if (!expected.has(id)) {
      problems.push(`unknown repository id "${id}"`);
    } else if (seen.has(id)) {
      problems.push(`repository id "${id}" is ranked more than once`);
    }
    seen.add(id);
  }

  const missing = expectedIds.filter(id => !seen.has(id));
  if (missing.length > 0) {
    problems.push(`missing repository ids: ${missing.map(id => `"${id}"`).join(', ')}`);
  }

  return problems;
}

/**
 * Relevance descending, input order on ties; scores are 1-based ordinals
 */
export function orderRankings(repositories: readonly Repository[], response: RankingResponse): RankedRepository[] {
  const byId = new Map(response.rankings.map(r => [r.id, r]));

  const scored = repositories.map((repository, index) => {
    const ranking = byId.get(repository.url);
    return {
      repository,
      index,
      relevance: ranking?.relevance ?? 0,
      rationale: ranking?.rationale ?? ''
    };
  });

  scored.sort((a, b) => b.relevance - a.relevance || a.index - b.index);

  return scored.map((entry, position) => Object.freeze({
    repository: entry.repository,
    score: position + 1,
    relevance: entry.relevance,
    rationale: entry.rationale
  }));
}

// ============================================================================
// Prompt fragments
// ============================================================================

export function describeJob(job: JobDescription): string {
  const lines = [
    `Title: ${job.title}`,
    job.company ? `Company: ${job.company}` : undefined,
    job.summary ? `Summary: ${job.summary}` : undefined,
    job.requiredSkills.length > 0 ? `Required skills: ${job.requiredSkills.join(', ')}` : undefined,
    job.niceToHave.length > 0 ? `Nice to have: ${job.niceToHave.join(', ')}` : undefined
  ];
  return lines.filter((line): line is string => line !== undefined).join('\n');
}

function describeRepository(repo: Repository): string {
  const languages = Object.entries(repo.languageBreakdown)
    .sort((a, b) => b[1] - a[1])
    .slice(0, 5)
    .map(([language]) => language);

  const facts = [
    `id: ${repo.url}`,
    `name: ${repo.name}`,
    repo.description ? `description: ${repo.description}` : undefined,
    languages.length > 0
      ? `languages: ${languages.join(', ')}`
      : repo.primaryLanguage ? `language: ${repo.primaryLanguage}` : undefined,
    `stars: ${repo.stars}, commits: ${repo.commitCount}`,
    repo.topics.length > 0 ? `topics: ${repo.topics.join(', ')}` : undefined,
    repo.readmeExcerpt ? `readme: ${truncateText(repo.readmeExcerpt.replace(/\s+/g, ' '), README_PROMPT_CHARS)}` : undefined
  ];
  return formatList(facts.filter((fact): fact is string => fact !== undefined));
}
