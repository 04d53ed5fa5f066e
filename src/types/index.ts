// ============================================================================
// Repositories
// ============================================================================

/**
 * A repository gathered from the GitHub profile. Frozen once collected.
 */
export interface Repository {
  readonly kind: 'collected';
  readonly name: string;
  readonly fullName: string;
  /** html URL; identity of the record */
  readonly url: string;
  readonly description: string | null;
  readonly stars: number;
  readonly forks: number;
  readonly primaryLanguage: string | null;
  /** language name → bytes of code */
  readonly languageBreakdown: Readonly<Record<string, number>>;
  readonly readmeExcerpt: string | null;
  /** ISO timestamp of the last push */
  readonly lastActivity: string;
  readonly createdAt: string;
  readonly commitCount: number;
  /** KB, as reported by GitHub */
  readonly size: number;
  readonly topics: readonly string[];
  readonly fork: boolean;
  readonly archived: boolean;
  readonly importance: number;
}

/**
 * A project the user typed in during selection that was not collected
 */
export interface ManualRepository {
  readonly kind: 'manual';
  readonly name: string;
  readonly url: string | null;
  readonly description: string | null;
}

export type ProjectSource = Repository | ManualRepository;

export interface RankedRepository {
  readonly repository: Repository;
  /** 1-based ordinal, 1 = most relevant */
  readonly score: number;
  /** provider-assigned 0-100 */
  readonly relevance: number;
  readonly rationale: string;
}

// ============================================================================
// Job
// ============================================================================

export interface JobDescription {
  readonly title: string;
  readonly company: string | null;
  readonly summary: string;
  readonly requiredSkills: readonly string[];
  readonly niceToHave: readonly string[];
  readonly rawText: string;
}

export interface JobSource {
  url?: string;
  file?: string;
}

// ============================================================================
// Selection
// ============================================================================

export interface SelectionResult {
  /** From the ranked list, in the order the user typed them */
  readonly chosen: readonly Repository[];
  readonly manuallyAdded: readonly ProjectSource[];
}

// ============================================================================
// Resume content
// ============================================================================

export interface SkillGroup {
  readonly category: string;
  readonly items: readonly string[];
}

export interface ResumeEntry {
  readonly title: string;
  readonly subtitle: string;
  readonly location: string;
  readonly date: string;
  readonly highlights: readonly string[];
}

export interface ProjectEntry {
  readonly repository: ProjectSource;
  readonly title: string;
  readonly highlights: readonly string[];
}

export interface ResumeContent {
  readonly skills: readonly SkillGroup[];
  readonly projects: readonly ProjectEntry[];
  readonly experience: readonly ResumeEntry[];
  readonly education: readonly ResumeEntry[];
}

// ============================================================================
// Profile and documents
// ============================================================================

export interface PersonalProfile {
  readonly fullName: string;
  readonly city: string;
  readonly country: string;
  readonly email?: string;
  readonly phone?: string;
  readonly linkedin?: string;
  readonly github?: string;
  readonly site?: string;
  readonly educationContext?: string;
  readonly experienceContext?: string;
  readonly skillsContext?: string;
  readonly skills: readonly SkillGroup[];
  readonly education: readonly ResumeEntry[];
  readonly experience: readonly ResumeEntry[];
}

export type ResumeLanguage = 'en' | 'pt';

export interface AssembledDocument {
  readonly source: string;
  readonly language: ResumeLanguage;
}

/**
 * Result of a LaTeX compilation
 */
export type CompileResult =
  | { ok: true; pdf: Buffer }
  | { ok: false; diagnostic: string };
