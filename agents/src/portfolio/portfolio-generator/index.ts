/**
 * Portfolio Generator Agent (Phase 2, "the Architect")
 *
 * Renders a StructuredCV into one self-contained HTML page with the code model.
 * The page is not sanitised; it is only isolated from surrounding chatter and
 * patched so AOS animations cannot leave it blank.
 */

import { z } from 'zod';
import { GenerationParseError } from '@folioforge/core';
import { extractHtmlDocument } from '@folioforge/llm';
import { StructuredCvSchema, type StructuredCV } from '@folioforge/schemas';
import { unwrapAgentResult } from '../../shared/base-agent.js';
import { LlmAgent, excerpt, type LlmAgentDeps } from '../../shared/llm-agent.js';
import type { AgentConfig, AgentContext } from '../../shared/types.js';
import { buildGenerationMessages } from './prompt.js';
import { applyVisibilityFixes, hasVisibilityFix } from './visibility-fixes.js';

export const PortfolioGeneratorInputSchema = z.object({
  cv: StructuredCvSchema,
  /** Original transcript, excerpted into the prompt for verification. */
  sourceText: z.string(),
});

export type PortfolioGeneratorInput = z.infer<typeof PortfolioGeneratorInputSchema>;

export const GeneratedSiteSchema = z.object({
  html: z.string().min(1),
  warnings: z.array(z.string()),
});

export type GeneratedSite = z.infer<typeof GeneratedSiteSchema>;

export class PortfolioGeneratorAgent extends LlmAgent<PortfolioGeneratorInput, GeneratedSite> {
  config: AgentConfig = {
    name: 'PortfolioGenerator',
    description: 'Generates a single-page HTML portfolio from a StructuredCV',
    version: '1.0.0',
  };

  inputSchema = PortfolioGeneratorInputSchema;
  outputSchema = GeneratedSiteSchema;

  protected async run(input: PortfolioGeneratorInput, _context: AgentContext): Promise<GeneratedSite> {
    const { cv, sourceText } = input;
    const warnings: string[] = [];

    this.info(`PHASE 2: Activating the Architect (${this.modelName})`);
    if (!cv.personal.name) {
      warnings.push('CV has no name; the page hero will be generic');
    }

    const completion = await this.complete(buildGenerationMessages(cv, sourceText));

    const page = extractHtmlDocument(completion);
    if (!page) {
      throw new GenerationParseError(
        `The Architect (${this.modelName}) returned no complete HTML document`,
        { detail: excerpt(completion) },
      );
    }

    let html = page;
    if (!hasVisibilityFix(html)) {
      warnings.push('Injected AOS visibility fallback');
      html = applyVisibilityFixes(html);
    }
    if (!/^<!doctype/i.test(html)) {
      warnings.push('Document has no <!DOCTYPE html> declaration');
    }

    for (const warning of warnings) {
      this.warn(warning);
    }
    this.info(`Portfolio HTML generated (${html.length} chars)`);

    return { html, warnings };
  }
}

/**
 * Phase 2 as a plain call: returns the page or throws the typed error.
 */
export async function generatePortfolio(
  cv: StructuredCV,
  sourceText: string,
  deps: LlmAgentDeps,
): Promise<GeneratedSite> {
  const agent = new PortfolioGeneratorAgent(deps);
  return unwrapAgentResult(await agent.execute({ cv, sourceText }));
}

export { buildGenerationMessages, SOURCE_EXCERPT_CHARS } from './prompt.js';
export {
  applyVisibilityFixes,
  hasVisibilityFix,
  AOS_FALLBACK_SCRIPT,
  AOS_FALLBACK_STYLE,
} from './visibility-fixes.js';
