/**
 * Content Generator
 *
 * Writes the resume sections for the selected repositories and the
 * candidate's own context, in the target language.
 *
 * The answer is normalized before use: projects that do not refer to a
 * selected repository are dropped, repeated projects keep the first entry,
 * and skill categories with the same name are merged.
 */

import { loggers, type Logger } from '../shared/logger';
import { StructuredInvoker, buildStructuredPrompt, formatList, truncateText } from '../shared/llm';
import { GeneratedContent, GeneratedContentSchema } from '../shared/validation';
import {
  JobDescription,
  PersonalProfile,
  ProjectEntry,
  ProjectSource,
  ResumeContent,
  ResumeEntry,
  ResumeLanguage,
  SelectionResult,
  SkillGroup
} from '../types';
import { describeJob } from './repositoryRanker';

const GENERATION_SYSTEM_PROMPT = `You are an expert resume writer for software engineers. You write concise, factual resume content tailored to a specific job.

Write:
- skills_by_category: skills grouped under short category names (e.g. "Languages", "Cloud & DevOps")
- projects: one entry per selected project, using its id verbatim, with a title and 2 to 4 achievement bullets
- experience: professional experience entries built from the candidate's experience notes
- education: education entries built from the candidate's education notes

RULES:
1. Only use facts present in the material provided; never invent employers, degrees, dates or metrics
2. Start bullets with a strong verb and mention the technologies that matter for the job
3. Bullets may use **bold** for key technologies and \`code\` for identifiers; no other formatting
4. Leave experience or education empty when there are no notes for them
5. Write every text field in the requested language

Return a JSON object with this exact structure:
{
  "skills_by_category": [ { "category": "string", "items": ["string"] } ],
  "projects": [ { "id": "project id", "title": "string", "highlights": ["string"] } ],
  "experience": [ { "title": "position", "subtitle": "company", "location": "string", "date": "string", "highlights": ["string"] } ],
  "education": [ { "title": "degree", "subtitle": "institution", "location": "string", "date": "string", "highlights": ["string"] } ]
}`;

const LANGUAGE_NAMES: Record<ResumeLanguage, string> = {
  en: 'English',
  pt: 'Brazilian Portuguese'
};

const README_PROMPT_CHARS = 800;

export interface GenerationInput {
  job: JobDescription;
  selection: SelectionResult;
  profile: PersonalProfile;
  language: ResumeLanguage;
  /** Free text from --context */
  context?: string;
}

export interface ContentGeneratorOptions {
  logger?: Logger;
}

export class ContentGenerator {
  private readonly log: Logger;

  constructor(private readonly invoker: StructuredInvoker, options: ContentGeneratorOptions = {}) {
    this.log = options.logger ?? loggers.llm;
  }

  async generate(input: GenerationInput): Promise<ResumeContent> {
    const projects = [...input.selection.chosen, ...input.selection.manuallyAdded];
    const byId = new Map<string, ProjectSource>();
    for (const project of projects) {
      const id = projectId(project);
      if (!byId.has(id)) {
        byId.set(id, project);
      }
    }

    const generated = await this.invoker.invoke({
      name: 'resume content',
      systemPrompt: GENERATION_SYSTEM_PROMPT,
      userPrompt: buildStructuredPrompt(
        `Write the resume content in ${LANGUAGE_NAMES[input.language]}.`,
        [
          { heading: 'Job', body: describeJob(input.job) },
          { heading: 'Selected projects', body: [...byId.values()].map(describeProject).join('\n\n') },
          { heading: 'Skills notes', body: input.profile.skillsContext ?? '' },
          { heading: 'Experience notes', body: input.profile.experienceContext ?? '' },
          { heading: 'Education notes', body: input.profile.educationContext ?? '' },
          { heading: 'Additional context', body: input.context ?? '' }
        ]
      ),
      schema: GeneratedContentSchema
    });

    return normalizeContent(generated, byId, this.log);
  }
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Identity used in prompts: the repository URL, or the name for manual
 * entries without one
 */
export function projectId(project: ProjectSource): string {
  if (project.kind === 'collected') {
    return project.url;
  }
  return project.url ?? `manual:${project.name}`;
}

export function normalizeContent(
  generated: GeneratedContent,
  projectsById: ReadonlyMap<string, ProjectSource>,
  log: Logger = loggers.llm
): ResumeContent {
  const projects: ProjectEntry[] = [];
  const used = new Set<string>();
  for (const project of generated.projects) {
    const source = projectsById.get(project.id);
    if (!source) {
      log.warn({ id: project.id }, 'dropping generated project that was not selected');
      continue;
    }
    if (used.has(project.id)) {
      log.debug({ id: project.id }, 'dropping repeated project');
      continue;
    }
    used.add(project.id);
    projects.push(Object.freeze({
      repository: source,
      title: project.title,
      highlights: Object.freeze(cleanList(project.highlights))
    }));
  }

  return Object.freeze({
    skills: Object.freeze(mergeSkillGroups(generated.skills_by_category)),
    projects: Object.freeze(projects),
    experience: Object.freeze(generated.experience.map(toResumeEntry)),
    education: Object.freeze(generated.education.map(toResumeEntry))
  });
}

/**
 * Merge categories whose names differ only in case; items are
 * de-duplicated case-insensitively, first spelling and order kept
 */
export function mergeSkillGroups(groups: ReadonlyArray<{ category: string; items: readonly string[] }>): SkillGroup[] {
  const merged = new Map<string, { category: string; items: string[]; seen: Set<string> }>();

  for (const group of groups) {
    const key = group.category.trim().toLowerCase();
    let target = merged.get(key);
    if (!target) {
      target = { category: group.category.trim(), items: [], seen: new Set() };
      merged.set(key, target);
    }
    for (const item of cleanList(group.items)) {
      const itemKey = item.toLowerCase();
      if (!target.seen.has(itemKey)) {
        target.seen.add(itemKey);
        target.items.push(item);
      }
    }
  }

  return [...merged.values()]
    .filter(group => group.items.length > 0)
    .map(group => Object.freeze({ category: group.category, items: Object.freeze(group.items) }));
}

/**
 * Use the profile's skills and entries for sections the provider left empty
 */
export function applyProfileFallback(content: ResumeContent, profile: PersonalProfile): ResumeContent {
  const skills = orFallback(content.skills, profile.skills);
  const experience = orFallback(content.experience, profile.experience);
  const education = orFallback(content.education, profile.education);
  if (skills === content.skills && experience === content.experience && education === content.education) {
    return content;
  }
  return Object.freeze({ ...content, skills, experience, education });
}

function orFallback<T>(generated: readonly T[], configured: readonly T[]): readonly T[] {
  return generated.length === 0 && configured.length > 0 ? configured : generated;
}

function toResumeEntry(entry: GeneratedContent['experience'][number]): ResumeEntry {
  return Object.freeze({
    title: entry.title,
    subtitle: entry.subtitle,
    location: entry.location,
    date: entry.date,
    highlights: Object.freeze(cleanList(entry.highlights))
  });
}

function cleanList(items: readonly string[]): string[] {
  return items.map(item => item.trim()).filter(item => item.length > 0);
}

function describeProject(project: ProjectSource): string {
  if (project.kind === 'manual') {
    const facts = [
      `id: ${projectId(project)}`,
      `name: ${project.name}`,
      project.url ? `url: ${project.url}` : undefined,
      project.description ? `description: ${project.description}` : undefined
    ];
    return formatList(facts.filter((fact): fact is string => fact !== undefined));
  }

  const languages = Object.keys(project.languageBreakdown);
  const facts = [
    `id: ${project.url}`,
    `name: ${project.name}`,
    `url: ${project.url}`,
    project.description ? `description: ${project.description}` : undefined,
    languages.length > 0 ? `languages: ${languages.join(', ')}` : undefined,
    `stars: ${project.stars}`,
    project.readmeExcerpt
      ? `readme: ${truncateText(project.readmeExcerpt.replace(/\s+/g, ' '), README_PROMPT_CHARS)}`
      : undefined
  ];
  return formatList(facts.filter((fact): fact is string => fact !== undefined));
}
