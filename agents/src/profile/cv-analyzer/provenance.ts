/**
 * Extraction, not invention: every value kept in a StructuredCV must occur
 * in the source text. Matching ignores case, whitespace runs, Unicode
 * compatibility forms (ligatures) and dash/quote variants.
 */

import type { SchemaIssue } from '@folioforge/core';
import type { StructuredCV } from '@folioforge/schemas';

export function canonicalize(value: string): string {
  return value
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[\u2010-\u2015\u2212]/g, '-')
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/[\u201C\u201D]/g, '"')
    .replace(/\s+/g, ' ')
    .trim();
}

/** URLs are matched without scheme, `www.` or trailing slash. */
export function canonicalizeLink(url: string): string {
  return canonicalize(url)
    .replace(/^https?:\/\//, '')
    .replace(/^www\./, '')
    .replace(/\/+$/, '');
}

export function enforceProvenance(
  cv: StructuredCV,
  rawText: string,
): { cv: StructuredCV; issues: SchemaIssue[] } {
  const source = canonicalize(rawText);
  const issues: SchemaIssue[] = [];

  const keep = (value: string, path: string, canonical = canonicalize): string => {
    if (!value) return value;
    if (source.includes(canonical(value))) return value;
    issues.push({ kind: 'SchemaMismatch', path, reason: 'not-in-source', value });
    return '';
  };

  const keepList = (values: string[], path: string): string[] =>
    values.filter((value, index) => keep(value, `${path}.${index}`) !== '');

  const personal: StructuredCV['personal'] = {
    name: keep(cv.personal.name, 'personal.name'),
    title: keep(cv.personal.title, 'personal.title'),
    email: keep(cv.personal.email, 'personal.email'),
    phone: keep(cv.personal.phone, 'personal.phone'),
    location: keep(cv.personal.location, 'personal.location'),
    summary: keep(cv.personal.summary, 'personal.summary'),
  };

  const links: StructuredCV['links'] = {};
  for (const [platform, url] of Object.entries(cv.links)) {
    if (keep(url, `links.${platform}`, canonicalizeLink)) {
      links[platform] = url;
    }
  }

  const experience = cv.experience
    .map((entry, index) => ({
      company: keep(entry.company, `experience.${index}.company`),
      role: keep(entry.role, `experience.${index}.role`),
      period: keep(entry.period, `experience.${index}.period`),
      highlights: keepList(entry.highlights, `experience.${index}.highlights`),
    }))
    .filter((entry) => entry.company || entry.role);

  const projects = cv.projects
    .map((entry, index) => ({
      name: keep(entry.name, `projects.${index}.name`),
      description: keep(entry.description, `projects.${index}.description`),
      techStack: keepList(entry.techStack, `projects.${index}.techStack`),
      link: keep(entry.link, `projects.${index}.link`, canonicalizeLink),
    }))
    .filter((entry) => entry.name);

  const education = cv.education
    .map((entry, index) => ({
      institution: keep(entry.institution, `education.${index}.institution`),
      degree: keep(entry.degree, `education.${index}.degree`),
      period: keep(entry.period, `education.${index}.period`),
    }))
    .filter((entry) => entry.institution);

  const skills: StructuredCV['skills'] = {
    languages: keepList(cv.skills.languages, 'skills.languages'),
    frameworks: keepList(cv.skills.frameworks, 'skills.frameworks'),
    tools: keepList(cv.skills.tools, 'skills.tools'),
    specialties: keepList(cv.skills.specialties, 'skills.specialties'),
  };

  return {
    cv: {
      personal,
      links,
      experience,
      projects,
      education,
      skills,
      certifications: keepList(cv.certifications, 'certifications'),
      spokenLanguages: keepList(cv.spokenLanguages, 'spokenLanguages'),
    },
    issues,
  };
}
