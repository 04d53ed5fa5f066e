/**
 * Job Extractor
 *
 * Turns raw posting text into a JobDescription through the structured
 * invoker.
 */

import { loggers, type Logger } from '../shared/logger';
import { StructuredInvoker, buildStructuredPrompt, truncateText } from '../shared/llm';
import { JobExtractionSchema } from '../shared/validation';
import { JobDescription } from '../types';

export const DEFAULT_MAX_JOB_CHARS = 20000;

/**
 * System prompt for job posting extraction
 */
const JOB_EXTRACTION_SYSTEM_PROMPT = `You are an expert technical recruiter. You read job postings and extract the information a candidate needs to tailor a resume.

Extract:
- title: the position title, without company or location
- company: the hiring company, or null when the posting does not name it
- summary: two or three sentences describing the role and its main responsibilities
- requiredSkills: technologies, tools and competences the posting requires
- niceToHave: technologies, tools and competences the posting lists as preferred, bonus or optional

RULES:
1. Use short canonical skill names ("Kubernetes", "PostgreSQL", "TypeScript"), one skill per entry
2. Never invent skills that are not in the posting
3. Page titles and site names given as hints may contain the title and company
4. Ignore navigation, cookie banners and unrelated page text

Return a JSON object with this exact structure:
{
  "title": "string",
  "company": "string or null",
  "summary": "string",
  "requiredSkills": ["string"],
  "niceToHave": ["string"]
}`;

export interface JobExtractorOptions {
  maxJobChars?: number;
  logger?: Logger;
}

export class JobExtractor {
  private readonly maxJobChars: number;
  private readonly log: Logger;

  constructor(private readonly invoker: StructuredInvoker, options: JobExtractorOptions = {}) {
    this.maxJobChars = options.maxJobChars ?? DEFAULT_MAX_JOB_CHARS;
    this.log = options.logger ?? loggers.llm;
  }

  async extract(rawText: string): Promise<JobDescription> {
    const posting = truncateText(rawText, this.maxJobChars);

    const extraction = await this.invoker.invoke({
      name: 'job extraction',
      systemPrompt: JOB_EXTRACTION_SYSTEM_PROMPT,
      userPrompt: buildStructuredPrompt(
        'Extract the structured description of this job posting.',
        [{ heading: 'Job posting', body: posting }]
      ),
      schema: JobExtractionSchema
    });

    const job: JobDescription = Object.freeze({
      title: extraction.title,
      company: extraction.company && extraction.company.length > 0 ? extraction.company : null,
      summary: extraction.summary,
      requiredSkills: Object.freeze(dedupeSkills(extraction.requiredSkills)),
      niceToHave: Object.freeze(dedupeSkills(extraction.niceToHave)),
      rawText
    });

    this.log.info(
      { title: job.title, company: job.company, required: job.requiredSkills.length },
      'extracted job description'
    );
    return job;
  }
}

/**
 * Trim, drop empties, and remove case-insensitive duplicates keeping the
 * first spelling
 */
export function dedupeSkills(skills: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of skills) {
    const skill = raw.trim();
    const key = skill.toLowerCase();
    if (skill.length === 0 || seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(skill);
  }
  return result;
}
