import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

vi.mock('pdf-parse/lib/pdf-parse.js', () => ({ default: vi.fn() }));

import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import { DocumentExtractionError } from '@folioforge/core';
import {
  DocumentExtractorAgent,
  extractText,
  normalizeExtractedText,
  unwrapAgentResult,
} from '@folioforge/agents';

const parseMock = vi.mocked(pdfParse);

function pdfResult(text: string, numpages = 1): Awaited<ReturnType<typeof pdfParse>> {
  return { text, numpages, numrender: numpages, info: {}, metadata: null, version: 'default' };
}

describe('document extraction', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'folioforge-extract-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeFixture(name: string, contents: string): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, contents);
    return file;
  }

  it('returns normalized text and page count from a PDF', async () => {
    const file = await writeFixture('jane.pdf', '%PDF-1.4 placeholder');
    parseMock.mockResolvedValueOnce(pdfResult('Jane Roe  \r\nEngineer\n\n\n\nAcme', 2));

    const result = await extractText(file);

    expect(result.text).toBe('Jane Roe\nEngineer\n\nAcme');
    expect(result.numPages).toBe(2);
  });

  it('fails on a missing file', async () => {
    const missing = path.join(dir, 'nope.pdf');
    await expect(extractText(missing)).rejects.toMatchObject({
      kind: 'DocumentExtractionError',
      message: `CV file not found: ${missing}`,
    });
  });

  it('fails on an unsupported extension', async () => {
    const file = await writeFixture('cv.docx', 'binary');
    await expect(extractText(file)).rejects.toMatchObject({
      message: 'Unsupported file format: .docx - please use PDF',
    });
  });

  it('fails when the parser rejects the file', async () => {
    const file = await writeFixture('broken.pdf', 'not really a pdf');
    parseMock.mockRejectedValueOnce(new Error('Invalid PDF structure'));

    const error = await extractText(file).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DocumentExtractionError);
    expect(error).toMatchObject({
      message: 'Could not read PDF (corrupt or encrypted?): broken.pdf',
      detail: 'Invalid PDF structure',
    });
  });

  it('fails when no text comes out (scanned image)', async () => {
    const file = await writeFixture('scan.pdf', '%PDF-1.4 placeholder');
    parseMock.mockResolvedValueOnce(pdfResult('  \n \n'));

    await expect(extractText(file)).rejects.toMatchObject({
      message: 'No text could be extracted from scan.pdf (scanned image?)',
    });
  });

  it('reads plain text files as-is', async () => {
    const file = await writeFixture('cv_raw_text.txt', 'Jane Roe\nEngineer\n');
    await expect(extractText(file)).resolves.toEqual({ text: 'Jane Roe\nEngineer', numPages: 1 });
    expect(parseMock).not.toHaveBeenCalled();
  });

  it('normalizes line endings without touching content', () => {
    expect(normalizeExtractedText('\n a\tb \r\nc\r\r\r\rd ')).toBe('a\tb\nc\n\nd');
  });

  describe('DocumentExtractorAgent', () => {
    it('names the source after the file', async () => {
      const file = await writeFixture('Jane_Roe_CV.pdf', '%PDF-1.4 placeholder');
      parseMock.mockResolvedValueOnce(pdfResult('Jane Roe'));

      const doc = unwrapAgentResult(await new DocumentExtractorAgent().execute({ filePath: file }));

      expect(doc).toEqual({ text: 'Jane Roe', numPages: 1, sourceName: 'Jane_Roe_CV' });
    });

    it('carries the typed error as the cause', async () => {
      const result = await new DocumentExtractorAgent().execute({ filePath: path.join(dir, 'x.pdf') });

      expect(result.success).toBe(false);
      expect(result.cause).toBeInstanceOf(DocumentExtractionError);
    });
  });
});
