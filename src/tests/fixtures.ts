/**
 * Shared test fixtures: scripted collaborators and sample records
 */

import { LLMRequest, LLMResponse, TextGenerator } from '../shared/llm';
import { SelectionIO } from '../selection/selectionController';
import { JobDescription, PersonalProfile, Repository } from '../types';

export type ScriptedReply = string | ((request: LLMRequest) => string);

/**
 * TextGenerator that replays canned answers and records every request
 */
export class ScriptedGenerator implements TextGenerator {
  readonly requests: LLMRequest[] = [];

  constructor(private readonly replies: ScriptedReply[]) {}

  async complete(request: LLMRequest): Promise<LLMResponse> {
    this.requests.push(request);
    const reply = this.replies[this.requests.length - 1];
    if (reply === undefined) {
      throw new Error(`No scripted reply for call ${this.requests.length}`);
    }
    return {
      content: typeof reply === 'function' ? reply(request) : reply,
      model: 'scripted-model'
    };
  }
}

/**
 * SelectionIO fed from a list of answers; null means end of input
 */
export class ScriptedIO implements SelectionIO {
  readonly output: string[] = [];
  readonly prompts: string[] = [];
  closed = false;

  constructor(private readonly answers: Array<string | null>) {}

  write(text: string): void {
    this.output.push(text);
  }

  async ask(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    const answer = this.answers.shift();
    return answer === undefined ? null : answer;
  }

  close(): void {
    this.closed = true;
  }
}

export function makeRepository(name: string, overrides: Partial<Omit<Repository, 'kind'>> = {}): Repository {
  return Object.freeze({
    kind: 'collected' as const,
    name,
    fullName: `octo/${name}`,
    url: `https://github.com/octo/${name}`,
    description: `${name} description`,
    stars: 0,
    forks: 0,
    primaryLanguage: 'Go',
    languageBreakdown: { Go: 1000 },
    readmeExcerpt: null,
    lastActivity: '2024-03-01T00:00:00Z',
    createdAt: '2023-01-01T00:00:00Z',
    commitCount: 10,
    size: 100,
    topics: [],
    fork: false,
    archived: false,
    importance: 1,
    ...overrides
  });
}

export function makeJob(overrides: Partial<JobDescription> = {}): JobDescription {
  return Object.freeze({
    title: 'Platform Engineer',
    company: 'Acme',
    summary: 'Runs the container platform.',
    requiredSkills: ['Go', 'Kubernetes'],
    niceToHave: ['Terraform'],
    rawText: 'Platform Engineer at Acme. Go and Kubernetes required.',
    ...overrides
  });
}

export function makeProfile(overrides: Partial<PersonalProfile> = {}): PersonalProfile {
  return Object.freeze({
    fullName: 'Alex Example',
    city: 'Lisbon',
    country: 'Portugal',
    email: 'alex@example.com',
    skills: [],
    education: [],
    experience: [],
    ...overrides
  });
}
