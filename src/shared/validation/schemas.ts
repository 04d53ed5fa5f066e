/**
 * Validation Schemas
 *
 * Zod schemas for everything that crosses a trust boundary:
 * GitHub API payloads, generative provider output and the profile file.
 */

import { z } from 'zod';

// ============================================================================
// GitHub payloads
// ============================================================================

export const GitHubRepoSchema = z.object({
  name: z.string(),
  full_name: z.string(),
  html_url: z.string(),
  description: z.string().nullable().default(null),
  stargazers_count: z.number().int().nonnegative().default(0),
  forks_count: z.number().int().nonnegative().default(0),
  language: z.string().nullable().default(null),
  pushed_at: z.string().nullable().default(null),
  created_at: z.string(),
  size: z.number().int().nonnegative().default(0),
  topics: z.array(z.string()).default([]),
  fork: z.boolean().default(false),
  archived: z.boolean().default(false)
});

export const GitHubRepoListSchema = z.array(GitHubRepoSchema);

export const GitHubLanguagesSchema = z.record(z.number());

export const GitHubReadmeSchema = z.object({
  content: z.string(),
  encoding: z.string()
});

export const GitHubCommitListSchema = z.array(z.unknown());

export const GitHubRateLimitSchema = z.object({
  resources: z.object({
    core: z.object({
      limit: z.number(),
      remaining: z.number(),
      /** epoch seconds */
      reset: z.number()
    })
  })
});

export type GitHubRepo = z.infer<typeof GitHubRepoSchema>;
export type GitHubRateLimit = z.infer<typeof GitHubRateLimitSchema>;

// ============================================================================
// Generative output
// ============================================================================

const trimmedString = z.string().trim();

export const JobExtractionSchema = z.object({
  title: trimmedString.min(1, 'title must not be empty'),
  company: trimmedString.nullable().default(null),
  summary: trimmedString.default(''),
  requiredSkills: z.array(z.string()).default([]),
  niceToHave: z.array(z.string()).default([])
});

export const RankingResponseSchema = z.object({
  rankings: z.array(z.object({
    id: trimmedString.min(1),
    relevance: z.number().min(0).max(100),
    rationale: trimmedString.min(1, 'rationale must not be empty')
  }))
});

export const ResumeEntrySchema = z.object({
  title: trimmedString.min(1),
  subtitle: trimmedString.default(''),
  location: trimmedString.default(''),
  date: trimmedString.default(''),
  highlights: z.array(z.string()).default([])
});

export const SkillGroupSchema = z.object({
  category: trimmedString.min(1),
  items: z.array(trimmedString.min(1)).min(1, 'a skill group needs at least one item')
});

export const GeneratedContentSchema = z.object({
  skills_by_category: z.array(z.object({
    category: trimmedString.min(1),
    items: z.array(z.string())
  })).default([]),
  projects: z.array(z.object({
    id: trimmedString.min(1),
    title: trimmedString.min(1),
    highlights: z.array(z.string()).default([])
  })).default([]),
  experience: z.array(ResumeEntrySchema).default([]),
  education: z.array(ResumeEntrySchema).default([])
});

export type JobExtraction = z.infer<typeof JobExtractionSchema>;
export type RankingResponse = z.infer<typeof RankingResponseSchema>;
export type GeneratedContent = z.infer<typeof GeneratedContentSchema>;

// ============================================================================
// Profile file
// ============================================================================

const optionalText = trimmedString.min(1).optional();

export const ProfileSchema = z.object({
  fullName: trimmedString.min(1, 'fullName is required'),
  city: trimmedString.default(''),
  country: trimmedString.default(''),
  email: trimmedString.email().optional(),
  phone: optionalText,
  linkedin: trimmedString.url().optional(),
  github: trimmedString.url().optional(),
  site: trimmedString.url().optional(),
  educationContext: optionalText,
  experienceContext: optionalText,
  skillsContext: optionalText,
  skills: z.array(SkillGroupSchema).default([]),
  education: z.array(ResumeEntrySchema).default([]),
  experience: z.array(ResumeEntrySchema).default([])
});

export type ProfileInput = z.input<typeof ProfileSchema>;
