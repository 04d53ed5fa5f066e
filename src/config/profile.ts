/**
 * Personal profile loading
 *
 * The profile is a JSON file with the candidate's contact details,
 * free-text notes for the generator and fallback skills, education and
 * experience entries.
 */

import * as fs from 'fs/promises';
import { ConfigurationError } from '../shared/errors';
import { ProfileSchema, describeValidationErrors, validateWith } from '../shared/validation';
import { PersonalProfile } from '../types';

export async function loadProfile(filePath: string): Promise<PersonalProfile> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Could not read profile file ${filePath}`, [reason]);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Profile file ${filePath} is not valid JSON`, [reason]);
  }

  return parseProfile(data, filePath);
}

export function parseProfile(data: unknown, source: string = 'profile'): PersonalProfile {
  const result = validateWith(ProfileSchema, data);
  if (!result.isValid) {
    throw new ConfigurationError(`Invalid profile in ${source}`, describeValidationErrors(result.errors));
  }

  const profile = result.data;
  return Object.freeze({
    ...profile,
    skills: Object.freeze(profile.skills.map(group => Object.freeze({ ...group, items: Object.freeze([...group.items]) }))),
    education: Object.freeze(profile.education.map(entry => Object.freeze({ ...entry, highlights: Object.freeze([...entry.highlights]) }))),
    experience: Object.freeze(profile.experience.map(entry => Object.freeze({ ...entry, highlights: Object.freeze([...entry.highlights]) })))
  });
}
