/**
 * Map whatever JSON the Brain produced onto StructuredCV.
 * Missing required sections become SchemaMismatch issues, never errors.
 */

import type { SchemaIssue } from '@folioforge/core';
import { REQUIRED_CV_KEYS, StructuredCvSchema, type StructuredCV } from '@folioforge/schemas';

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First key present with a non-null value. */
function pick(record: JsonRecord, ...keys: string[]): unknown {
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function mapEntries(value: unknown, mapper: (entry: JsonRecord) => JsonRecord): unknown {
  return Array.isArray(value) ? value.map((entry) => (isRecord(entry) ? mapper(entry) : entry)) : value;
}

// Models drift between the requested camelCase keys and snake_case / synonyms.
function remapAliases(raw: JsonRecord): JsonRecord {
  const personal = raw.personal;

  return {
    personal: isRecord(personal)
      ? {
          ...personal,
          name: pick(personal, 'name', 'full_name', 'fullName'),
          summary: pick(personal, 'summary', 'bio', 'profile'),
        }
      : personal,
    links: pick(raw, 'links', 'profiles', 'social'),
    experience: mapEntries(pick(raw, 'experience', 'work_experience', 'workExperience'), (entry) => ({
      company: pick(entry, 'company', 'organization', 'employer'),
      role: pick(entry, 'role', 'title', 'position'),
      period: pick(entry, 'period', 'dates', 'date_range'),
      highlights: pick(entry, 'highlights', 'bullets', 'achievements'),
    })),
    projects: mapEntries(raw.projects, (entry) => ({
      name: pick(entry, 'name', 'title'),
      description: entry.description,
      techStack: pick(entry, 'techStack', 'tech_stack', 'technologies'),
      link: pick(entry, 'link', 'url'),
    })),
    education: mapEntries(raw.education, (entry) => ({
      institution: pick(entry, 'institution', 'school', 'university'),
      degree: entry.degree,
      period: pick(entry, 'period', 'dates', 'date_range'),
    })),
    skills: raw.skills,
    certifications: raw.certifications,
    spokenLanguages: pick(raw, 'spokenLanguages', 'languages_spoken', 'spoken_languages'),
  };
}

export function normalizeCvPayload(raw: JsonRecord): { cv: StructuredCV; issues: SchemaIssue[] } {
  const remapped = remapAliases(raw);

  const issues: SchemaIssue[] = [];
  for (const key of REQUIRED_CV_KEYS) {
    if (remapped[key] === undefined || remapped[key] === null) {
      issues.push({ kind: 'SchemaMismatch', path: key, reason: 'missing' });
    }
  }

  return {
    cv: StructuredCvSchema.parse(remapped),
    issues,
  };
}
