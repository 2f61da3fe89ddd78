/**
 * CV Analyzer Agent (Phase 1, "the Brain")
 *
 * Reads the raw CV transcript with a reasoning model at low temperature and
 * returns a StructuredCV. Three layers keep it honest:
 * - the prompt demands verbatim transcription
 * - JSON is located defensively in the completion (fences, prose, <think>)
 * - a provenance filter drops any value that does not occur in the source
 *
 * No JSON at all is fatal (ExtractionParseError). Missing sections and dropped
 * values are SchemaMismatch issues: logged, returned, and the run goes on.
 */

import { z } from 'zod';
import { ExtractionParseError } from '@folioforge/core';
import { extractJsonObject } from '@folioforge/llm';
import { StructuredCvSchema } from '@folioforge/schemas';
import { unwrapAgentResult } from '../../shared/base-agent.js';
import { LlmAgent, excerpt, type LlmAgentDeps } from '../../shared/llm-agent.js';
import type { AgentConfig, AgentContext } from '../../shared/types.js';
import { buildAnalysisMessages } from './prompt.js';
import { normalizeCvPayload } from './normalize.js';
import { enforceProvenance } from './provenance.js';

export const CvAnalyzerInputSchema = z.object({
  rawText: z.string().min(1, 'rawText is required'),
});

export type CvAnalyzerInput = z.infer<typeof CvAnalyzerInputSchema>;

export const SchemaIssueSchema = z.object({
  kind: z.literal('SchemaMismatch'),
  path: z.string(),
  reason: z.enum(['missing', 'not-in-source']),
  value: z.string().optional(),
});

export const CvAnalysisSchema = z.object({
  cv: StructuredCvSchema,
  issues: z.array(SchemaIssueSchema),
});

export type CvAnalysis = z.infer<typeof CvAnalysisSchema>;

export class CvAnalyzerAgent extends LlmAgent<CvAnalyzerInput, CvAnalysis> {
  config: AgentConfig = {
    name: 'CvAnalyzer',
    description: 'Extracts a StructuredCV from raw CV text without inventing facts',
    version: '1.0.0',
  };

  inputSchema = CvAnalyzerInputSchema;
  outputSchema = CvAnalysisSchema;

  protected async run(input: CvAnalyzerInput, _context: AgentContext): Promise<CvAnalysis> {
    const { rawText } = input;

    this.info(`PHASE 1: Activating the Brain (${this.modelName})`);
    this.info('Analyzing CV in strict anti-hallucination mode');
    const completion = await this.complete(buildAnalysisMessages(rawText));

    const payload = extractJsonObject(completion);
    if (!payload) {
      throw new ExtractionParseError(
        `The Brain (${this.modelName}) returned no parsable JSON object`,
        { detail: excerpt(completion) },
      );
    }

    const normalized = normalizeCvPayload(payload);
    const checked = enforceProvenance(normalized.cv, rawText);
    const issues = [...normalized.issues, ...checked.issues];

    if (issues.length > 0) {
      this.warn(`SchemaMismatch: ${issues.length} field(s) defaulted or dropped`, issues);
    }

    this.info('CV analysis complete', {
      name: checked.cv.personal.name || '(none)',
      experience: checked.cv.experience.length,
      projects: checked.cv.projects.length,
      education: checked.cv.education.length,
    });

    return { cv: checked.cv, issues };
  }
}

/**
 * Phase 1 as a plain call: returns the analysis or throws the typed error.
 */
export async function analyzeCv(rawText: string, deps: LlmAgentDeps): Promise<CvAnalysis> {
  const agent = new CvAnalyzerAgent(deps);
  return unwrapAgentResult(await agent.execute({ rawText }));
}

export { buildAnalysisMessages } from './prompt.js';
export { normalizeCvPayload } from './normalize.js';
export { enforceProvenance, canonicalize, canonicalizeLink } from './provenance.js';
