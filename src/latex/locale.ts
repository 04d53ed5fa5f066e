/**
 * Resume languages and their section headers
 */

import { ResumeLanguage } from '../types';

export interface ResumeLocale {
  educationHeader: string;
  skillsHeader: string;
  experienceHeader: string;
  projectsHeader: string;
  documentTitle: string;
  /** Joins job title and company in the PDF subject */
  atCompany: string;
}

export const LOCALES: Record<ResumeLanguage, ResumeLocale> = {
  en: {
    educationHeader: 'Education',
    skillsHeader: 'Technical Skills',
    experienceHeader: 'Professional Experience',
    projectsHeader: 'Key Projects',
    documentTitle: 'Resume',
    atCompany: 'at'
  },
  pt: {
    educationHeader: 'Educação',
    skillsHeader: 'Habilidades Técnicas',
    experienceHeader: 'Experiência Profissional',
    projectsHeader: 'Projetos e Performance',
    documentTitle: 'Currículo',
    atCompany: 'em'
  }
};

const LANGUAGE_ALIASES = new Map<string, ResumeLanguage>([
  ['en', 'en'],
  ['en-us', 'en'],
  ['english', 'en'],
  ['pt', 'pt'],
  ['pt-br', 'pt'],
  ['portuguese', 'pt']
]);

/**
 * Map a user-supplied language name to a supported language; unknown names
 * fall back to English
 */
export function resolveLanguage(input: string | undefined): ResumeLanguage {
  if (input === undefined) return 'en';
  return LANGUAGE_ALIASES.get(input.trim().toLowerCase()) ?? 'en';
}

export function isKnownLanguage(input: string): boolean {
  return LANGUAGE_ALIASES.has(input.trim().toLowerCase());
}
