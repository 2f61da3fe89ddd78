/**
 * Document Extractor Agent
 *
 * Turns a CV file into the plain-text transcript the Brain reads.
 * No structure is assumed; headers, page breaks and ligature noise pass through.
 */

import * as path from 'node:path';
import { z } from 'zod';
import { BaseAgent } from '../../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../../shared/types.js';
import { extractText } from './extract-text.js';

export const DocumentExtractorInputSchema = z.object({
  filePath: z.string().min(1),
});

export type DocumentExtractorInput = z.infer<typeof DocumentExtractorInputSchema>;

export const ExtractedDocumentSchema = z.object({
  text: z.string(),
  numPages: z.number().int().nonnegative(),
  /** File name without extension; names the archived portfolio. */
  sourceName: z.string(),
});

export type ExtractedDocument = z.infer<typeof ExtractedDocumentSchema>;

export class DocumentExtractorAgent extends BaseAgent<DocumentExtractorInput, ExtractedDocument> {
  config: AgentConfig = {
    name: 'DocumentExtractor',
    description: 'Extracts the plain-text transcript of a CV PDF',
    version: '1.0.0',
  };

  inputSchema = DocumentExtractorInputSchema;
  outputSchema = ExtractedDocumentSchema;

  protected async run(
    input: DocumentExtractorInput,
    _context: AgentContext,
  ): Promise<ExtractedDocument> {
    const { filePath } = input;

    this.info(`Extracting text from: ${path.basename(filePath)}`);
    const extracted = await extractText(filePath);

    const wordCount = extracted.text.split(/\s+/).filter(Boolean).length;
    this.info(`Extracted ${wordCount} words from ${extracted.numPages} page(s)`);

    return {
      text: extracted.text,
      numPages: extracted.numPages,
      sourceName: path.parse(filePath).name,
    };
  }
}

export {
  extractText,
  extractTextFromPdf,
  normalizeExtractedText,
  type ExtractedText,
} from './extract-text.js';
