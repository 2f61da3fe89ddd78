import {
  createPromptTemplate,
  executeTemplate,
  structuredExtractionSystem,
  toChatMessages,
  type OllamaChatMessage,
} from '@folioforge/llm';

const ANALYSIS_SYSTEM = `${structuredExtractionSystem(
  'transcribe the facts of a CV into JSON for a portfolio website',
)}

ANTI-HALLUCINATION RULES (these override everything else):
- EXACT TEXT ONLY: copy names, titles, companies and dates character for character.
- NO INVENTION: never add employers, degrees, skills, years of experience or links.
- NO UPGRADES: if the CV says "Junior Game Developer", write "Junior Game Developer", not "Senior" or "Lead".
- NO SUMMARIES: "summary" is a profile paragraph copied from the CV, or null when the CV has none.
- If a field is not in the CV, use null (or [] for lists). Never guess.`;

const ANALYSIS_TEMPLATE = createPromptTemplate(
  `## RAW CV TEXT (THIS IS YOUR ONLY SOURCE OF TRUTH):
---
{cvText}
---

## EXTRACTION TASK
Extract the CV above into this JSON shape. Every string must be copied from the CV text.

{
  "personal": {
    "name": "exact full name",
    "title": "exact job title / headline",
    "email": "exact email or null",
    "phone": "exact phone or null",
    "location": "exact location or null",
    "summary": "profile paragraph copied verbatim, or null"
  },
  "links": {
    "linkedin": "exact URL or null",
    "github": "exact URL or null",
    "website": "exact URL or null"
  },
  "experience": [
    {
      "company": "exact company name",
      "role": "exact job title",
      "period": "exact date range, e.g. 2021-Present",
      "highlights": ["bullet points copied from the CV"]
    }
  ],
  "projects": [
    {
      "name": "exact project name",
      "description": "description copied from the CV",
      "techStack": ["technologies named in the CV"],
      "link": "project URL or null"
    }
  ],
  "education": [
    { "institution": "exact school name", "degree": "exact degree", "period": "exact date range" }
  ],
  "skills": {
    "languages": ["programming languages named in the CV"],
    "frameworks": ["frameworks named in the CV"],
    "tools": ["tools named in the CV"],
    "specialties": ["specialties named in the CV"]
  },
  "certifications": ["exact certification names"],
  "spokenLanguages": ["spoken languages named in the CV"]
}

Output ONLY the JSON object. No explanations, no markdown.`,
  { system: ANALYSIS_SYSTEM },
);

export function buildAnalysisMessages(cvText: string): OllamaChatMessage[] {
  return toChatMessages(executeTemplate(ANALYSIS_TEMPLATE, { cvText }));
}
