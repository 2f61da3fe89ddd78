import { describe, it, expect } from 'vitest';
import {
  StructuredCvSchema,
  emptyStructuredCv,
  serializeStructuredCv,
} from '@folioforge/schemas';

describe('StructuredCvSchema', () => {
  it('turns an empty object into a complete, empty record', () => {
    expect(emptyStructuredCv()).toEqual({
      personal: { name: '', title: '', email: '', phone: '', location: '', summary: '' },
      links: {},
      experience: [],
      projects: [],
      education: [],
      skills: { languages: [], frameworks: [], tools: [], specialties: [] },
      certifications: [],
      spokenLanguages: [],
    });
  });

  it('coerces nulls, numbers and single strings', () => {
    const cv = StructuredCvSchema.parse({
      personal: null,
      experience: 'not a list',
      skills: { languages: 'Go' },
      certifications: [1, null, ' AWS '],
    });

    expect(cv.personal.name).toBe('');
    expect(cv.experience).toEqual([]);
    expect(cv.skills.languages).toEqual(['Go']);
    expect(cv.certifications).toEqual(['1', 'AWS']);
  });

  it('fills missing entry fields and drops non-object entries', () => {
    const cv = StructuredCvSchema.parse({
      experience: [{ company: 'Acme', highlights: 'Shipped the billing service' }, 'junk'],
    });

    expect(cv.experience).toEqual([
      { company: 'Acme', role: '', period: '', highlights: ['Shipped the billing service'] },
    ]);
  });

  it('keeps URL-like links and numbers legacy "other" entries', () => {
    const cv = StructuredCvSchema.parse({
      links: {
        LinkedIn: 'linkedin.com/in/jane',
        github: null,
        website: 'not a url',
        other: ['https://jane.dev', 'nope'],
      },
    });

    expect(cv.links).toEqual({ linkedin: 'linkedin.com/in/jane', 'other-1': 'https://jane.dev' });
  });

  it('serializes canonically with two-space indentation', () => {
    const cv = emptyStructuredCv();
    const json = serializeStructuredCv(cv);

    expect(json.startsWith('{\n  "personal": {\n    "name": ""')).toBe(true);
    expect(JSON.parse(json)).toEqual(cv);
  });
});
