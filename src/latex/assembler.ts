/**
 * Document Assembler
 *
 * Fills the LaTeX template with the profile and generated content.
 *
 * Substitution is a single regex pass over the template, so text inserted
 * for one placeholder is never scanned for another. Every dynamic string is
 * sanitized and escaped exactly once on its way in; section, entry and
 * highlight counts are capped rather than rejected.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AssemblyError } from '../shared/errors';
import { loggers, type Logger } from '../shared/logger';
import {
  AssembledDocument,
  JobDescription,
  PersonalProfile,
  ProjectEntry,
  ResumeContent,
  ResumeEntry,
  ResumeLanguage,
  SkillGroup
} from '../types';
import { displayUrl, escapeLatex, renderInlineMarkup, safeHref, sanitizeText } from './escape';
import { LOCALES } from './locale';

export const DEFAULT_TEMPLATE_PATH = path.resolve(__dirname, '..', '..', 'templates', 'resume.tex');

export interface AssemblerLimits {
  /** Entries per section */
  maxEntries: number;
  /** Bullets per entry */
  maxHighlights: number;
  /** Characters per field */
  maxFieldChars: number;
}

export const DEFAULT_ASSEMBLER_LIMITS: AssemblerLimits = {
  maxEntries: 8,
  maxHighlights: 6,
  maxFieldChars: 300
};

export interface DocumentAssemblerOptions extends Partial<AssemblerLimits> {
  /** Template text; read from DEFAULT_TEMPLATE_PATH when omitted */
  template?: string;
  logger?: Logger;
}

const PLACEHOLDER = /<<([A-Z_]+)>>/g;

/**
 * Replace every <<NAME>> in one pass. A placeholder with no value is a
 * template/assembler mismatch.
 */
export function substitutePlaceholders(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(values, name)) {
      throw new AssemblyError(`Template placeholder <<${name}>> has no value`, { placeholder: name });
    }
    return values[name];
  });
}

/**
 * Render lines joined with forced line breaks; no break after the last
 */
function joinLines(lines: string[]): string {
  return lines.join(' \\\\\n');
}

interface RenderableEntry {
  title: string;
  subtitle: string;
  location: string;
  date: string;
  link?: string;
  highlights: readonly string[];
}

export class DocumentAssembler {
  private readonly limits: AssemblerLimits;
  private readonly template: string;
  private readonly log: Logger;

  constructor(options: DocumentAssemblerOptions = {}) {
    this.limits = {
      maxEntries: options.maxEntries ?? DEFAULT_ASSEMBLER_LIMITS.maxEntries,
      maxHighlights: options.maxHighlights ?? DEFAULT_ASSEMBLER_LIMITS.maxHighlights,
      maxFieldChars: options.maxFieldChars ?? DEFAULT_ASSEMBLER_LIMITS.maxFieldChars
    };
    this.template = options.template ?? fs.readFileSync(DEFAULT_TEMPLATE_PATH, 'utf-8');
    this.log = options.logger ?? loggers.latex;
  }

  assemble(
    profile: PersonalProfile,
    job: JobDescription,
    content: ResumeContent,
    language: ResumeLanguage
  ): AssembledDocument {
    const locale = LOCALES[language];

    const values: Record<string, string> = {
      NAME: this.text(profile.fullName),
      CONTACT: this.contactLine(profile),
      PDF_TITLE: this.text(`${profile.fullName} - ${locale.documentTitle}`),
      PDF_SUBJECT: this.text(
        job.company ? `${job.title} ${locale.atCompany} ${job.company}` : job.title
      ),
      SKILLS_SECTION: this.section(locale.skillsHeader, this.skills(content.skills)),
      EXPERIENCE_SECTION: this.section(locale.experienceHeader, this.entries(content.experience)),
      PROJECTS_SECTION: this.section(locale.projectsHeader, this.projects(content.projects)),
      EDUCATION_SECTION: this.section(locale.educationHeader, this.entries(content.education))
    };

    const source = substitutePlaceholders(this.template, values);
    this.log.debug({ language, chars: source.length }, 'assembled document');
    return Object.freeze({ source, language });
  }

  getLimits(): AssemblerLimits {
    return { ...this.limits };
  }

  // ==========================================================================
  // Sections
  // ==========================================================================

  private section(header: string, body: string): string {
    if (body.length === 0) {
      return '';
    }
    return `\\section*{${escapeLatex(header)}}\n${body}\n`;
  }

  private skills(groups: readonly SkillGroup[]): string {
    const lines = this.cap(groups, 'skill groups').map(group =>
      `\\textbf{${this.text(group.category)}:} ${this.text(group.items.join(', '))}`
    );
    return lines.length > 0 ? `\\noindent ${joinLines(lines)}` : '';
  }

  private entries(entries: readonly ResumeEntry[]): string {
    return this.cap(entries, 'entries')
      .map(entry => this.entry(entry))
      .join('\n');
  }

  private projects(projects: readonly ProjectEntry[]): string {
    return this.cap(projects, 'projects')
      .map(project => {
        const source = project.repository;
        const description = source.description ?? '';
        return this.entry({
          title: project.title,
          subtitle: description,
          location: source.url ? displayUrl(source.url) : '',
          date: '',
          link: source.url ?? undefined,
          highlights: project.highlights
        });
      })
      .join('\n');
  }

  private entry(entry: RenderableEntry): string {
    const lines: string[] = [];

    const href = entry.link ? safeHref(entry.link) : undefined;
    const right = href !== undefined && entry.location
      ? `\\href{${href}}{${this.text(entry.location)}}`
      : this.text(entry.location);
    lines.push(right ? `\\textbf{${this.text(entry.title)}} \\hfill ${right}` : `\\textbf{${this.text(entry.title)}}`);

    const subtitle = this.text(entry.subtitle);
    const date = this.text(entry.date);
    if (subtitle || date) {
      const left = subtitle ? `\\textit{${subtitle}}` : '';
      lines.push(date ? `${left} \\hfill ${date}`.trim() : left);
    }

    let out = `\\noindent ${joinLines(lines)}\n`;

    const highlights = entry.highlights
      .slice(0, this.limits.maxHighlights)
      .map(h => this.inline(h))
      .filter(h => h.length > 0);
    if (highlights.length > 0) {
      out += '\\begin{itemize}[noitemsep,topsep=0pt,leftmargin=*]\n';
      out += highlights.map(h => `    \\item ${h}\n`).join('');
      out += '\\end{itemize}\n';
    }

    return out;
  }

  private contactLine(profile: PersonalProfile): string {
    const parts: string[] = [];

    const location = [profile.city, profile.country].filter(p => p.trim().length > 0).join(', ');
    if (location) {
      parts.push(this.text(location));
    }
    if (profile.email) {
      parts.push(this.link(`mailto:${profile.email}`, profile.email));
    }
    if (profile.phone) {
      parts.push(this.text(profile.phone));
    }
    for (const url of [profile.linkedin, profile.github, profile.site]) {
      if (url) {
        parts.push(this.link(url, displayUrl(url)));
      }
    }

    return parts.join(' \\ $|$ \\ ');
  }

  // ==========================================================================
  // Field helpers
  // ==========================================================================

  private text(value: string): string {
    return escapeLatex(sanitizeText(value, this.limits.maxFieldChars));
  }

  private inline(value: string): string {
    return renderInlineMarkup(sanitizeText(value, this.limits.maxFieldChars));
  }

  private link(url: string, label: string): string {
    const href = safeHref(url);
    return href === undefined ? this.text(label) : `\\href{${href}}{${this.text(label)}}`;
  }

  private cap<T>(items: readonly T[], what: string): readonly T[] {
    if (items.length > this.limits.maxEntries) {
      this.log.debug({ what, count: items.length, kept: this.limits.maxEntries }, 'truncating section');
      return items.slice(0, this.limits.maxEntries);
    }
    return items;
  }
}
