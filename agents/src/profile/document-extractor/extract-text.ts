/**
 * PDF text extraction using pdf-parse.
 * Code-only step - no LLM involvement.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { DocumentExtractionError } from '@folioforge/core';

type PdfParseResult = {
  text: string;
  numpages: number;
  info?: { Title?: string; Author?: string; Creator?: string };
};
type PdfParseFn = (buffer: Buffer) => Promise<PdfParseResult>;

let pdfParse: PdfParseFn | null = null;

// The package entry point runs a debug harness when loaded as ESM; the lib
// module is the parser itself.
async function getPdfParser(): Promise<PdfParseFn> {
  if (!pdfParse) {
    const mod = await import('pdf-parse/lib/pdf-parse.js');
    pdfParse = mod.default;
  }
  return pdfParse;
}

export interface ExtractedText {
  text: string;
  numPages: number;
  info?: {
    title?: string;
    author?: string;
    creator?: string;
  };
}

/** Unify line endings and drop trailing whitespace per line; content is untouched. */
export function normalizeExtractedText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/\s+$/, ''))
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Extract text content from a PDF file.
 */
export async function extractTextFromPdf(filePath: string): Promise<ExtractedText> {
  const absolutePath = path.resolve(filePath);

  let buffer: Buffer;
  try {
    buffer = await fs.readFile(absolutePath);
  } catch (error) {
    throw new DocumentExtractionError(absolutePath, `CV file not found: ${absolutePath}`, {
      cause: error,
    });
  }

  const parser = await getPdfParser();
  let data: PdfParseResult;
  try {
    data = await parser(buffer);
  } catch (error) {
    throw new DocumentExtractionError(
      absolutePath,
      `Could not read PDF (corrupt or encrypted?): ${path.basename(absolutePath)}`,
      { detail: error instanceof Error ? error.message : String(error), cause: error },
    );
  }

  return {
    text: data.text,
    numPages: data.numpages,
    info: data.info
      ? {
          title: data.info.Title,
          author: data.info.Author,
          creator: data.info.Creator,
        }
      : undefined,
  };
}

/**
 * Extract text from a CV file based on extension. Plain text is accepted so
 * a saved `cv_raw_text.txt` can be fed back in for debugging.
 */
export async function extractText(filePath: string): Promise<ExtractedText> {
  const ext = path.extname(filePath).toLowerCase();

  let extracted: ExtractedText;
  switch (ext) {
    case '.pdf':
      extracted = await extractTextFromPdf(filePath);
      break;
    case '.txt': {
      try {
        const text = await fs.readFile(filePath, 'utf-8');
        extracted = { text, numPages: 1 };
      } catch (error) {
        throw new DocumentExtractionError(filePath, `CV file not found: ${filePath}`, {
          cause: error,
        });
      }
      break;
    }
    default:
      throw new DocumentExtractionError(
        filePath,
        `Unsupported file format: ${ext || '(none)'} - please use PDF`,
      );
  }

  const text = normalizeExtractedText(extracted.text);
  if (!text) {
    throw new DocumentExtractionError(
      filePath,
      `No text could be extracted from ${path.basename(filePath)} (scanned image?)`,
    );
  }

  return { ...extracted, text };
}
