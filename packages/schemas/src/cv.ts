import { z } from 'zod';

/**
 * StructuredCV: the record Phase 1 extracts and Phase 2 renders.
 *
 * Every field is lenient and defaulted so that whatever the model returns
 * (nulls, numbers, a string where a list belongs, missing sections) parses
 * into a complete record. Absent facts are `''` or `[]`, never invented.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function toTextList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map(toText).filter((item) => item.length > 0);
  }
  const single = toText(value);
  return single ? [single] : [];
}

const URL_LIKE = /^(https?:\/\/)?[^\s/]+\.[^\s]+$/i;

function toLinks(value: unknown): Record<string, string> {
  if (!isRecord(value)) return {};

  const links: Record<string, string> = {};
  for (const [platform, raw] of Object.entries(value)) {
    if (platform === 'other') {
      toTextList(raw)
        .filter((url) => URL_LIKE.test(url))
        .forEach((url, index) => {
          links[`other-${index + 1}`] = url;
        });
      continue;
    }
    const url = toText(raw);
    if (url && URL_LIKE.test(url)) {
      links[platform.trim().toLowerCase()] = url;
    }
  }
  return links;
}

const text = z.preprocess(toText, z.string());
const textList = z.preprocess(toTextList, z.array(z.string()));

function lenientObject<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess((value) => (isRecord(value) ? value : {}), z.object(shape));
}

function lenientList<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess(
    (value) => (Array.isArray(value) ? value.filter(isRecord) : []),
    z.array(item),
  );
}

export const PersonalInfoSchema = lenientObject({
  name: text,
  title: text,
  email: text,
  phone: text,
  location: text,
  summary: text,
});

export type PersonalInfo = z.infer<typeof PersonalInfoSchema>;

export const ProfileLinksSchema = z.preprocess(toLinks, z.record(z.string(), z.string()));

export type ProfileLinks = z.infer<typeof ProfileLinksSchema>;

export const ExperienceEntrySchema = z.object({
  company: text,
  role: text,
  period: text,
  highlights: textList,
});

export type ExperienceEntry = z.infer<typeof ExperienceEntrySchema>;

export const ProjectEntrySchema = z.object({
  name: text,
  description: text,
  techStack: textList,
  link: text,
});

export type ProjectEntry = z.infer<typeof ProjectEntrySchema>;

export const EducationEntrySchema = z.object({
  institution: text,
  degree: text,
  period: text,
});

export type EducationEntry = z.infer<typeof EducationEntrySchema>;

export const SkillsSchema = lenientObject({
  languages: textList,
  frameworks: textList,
  tools: textList,
  specialties: textList,
});

export type Skills = z.infer<typeof SkillsSchema>;

export const StructuredCvSchema = z.object({
  personal: PersonalInfoSchema,
  links: ProfileLinksSchema,
  experience: lenientList(ExperienceEntrySchema),
  projects: lenientList(ProjectEntrySchema),
  education: lenientList(EducationEntrySchema),
  skills: SkillsSchema,
  certifications: textList,
  spokenLanguages: textList,
});

export type StructuredCV = z.infer<typeof StructuredCvSchema>;

/** Top-level keys the model must return; missing ones are a SchemaMismatch. */
export const REQUIRED_CV_KEYS = ['personal', 'experience'] as const;

export function emptyStructuredCv(): StructuredCV {
  return StructuredCvSchema.parse({});
}

/** Canonical serialisation used for the JSON artifact and the Phase 2 prompt. */
export function serializeStructuredCv(cv: StructuredCV): string {
  return JSON.stringify(cv, null, 2);
}
