/**
 * Writes run artifacts into one output directory:
 * - cv_raw_text.txt and cv_extracted_data.json (overwritten each run)
 * - {source}_portfolio_{YYYYMMDD_HHMMSS}.html (never overwritten)
 * - index.html (overwritten; same bytes as the newest archive)
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { PersistenceError } from '@folioforge/core';
import { ARTIFACT_FILES, serializeStructuredCv, type StructuredCV } from '@folioforge/schemas';
import type { ArtifactWriter, SavedSite } from './orchestrator/types.js';

const pad = (value: number) => String(value).padStart(2, '0');

/** Local time as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function sanitizeSourceName(name: string): string {
  const safe = name.trim().replace(/[^\w.-]+/g, '_');
  return safe || 'cv';
}

export function archiveFileName(sourceName: string, when: Date, attempt = 1): string {
  const suffix = attempt > 1 ? `_${attempt}` : '';
  return `${sanitizeSourceName(sourceName)}_portfolio_${formatTimestamp(when)}${suffix}.html`;
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

function persistenceError(filePath: string, error: unknown): PersistenceError {
  return new PersistenceError(filePath, `Could not write ${filePath}`, {
    detail: error instanceof Error ? error.message : String(error),
    cause: error,
  });
}

export class LocalArtifactWriter implements ArtifactWriter {
  readonly outputDir: string;
  private readonly maxArchiveAttempts: number;

  constructor(outputDir: string, options: { maxArchiveAttempts?: number } = {}) {
    this.outputDir = path.resolve(outputDir);
    this.maxArchiveAttempts = options.maxArchiveAttempts ?? 100;
  }

  async saveRawText(text: string): Promise<string> {
    return this.write(ARTIFACT_FILES.rawText, text);
  }

  async saveCvData(cv: StructuredCV): Promise<string> {
    return this.write(ARTIFACT_FILES.cvData, serializeStructuredCv(cv));
  }

  async saveSite(html: string, sourceName: string, when: Date): Promise<SavedSite> {
    await this.ensureDir();
    const archiveSitePath = await this.writeArchive(html, sourceName, when);
    const latestSitePath = await this.write(ARTIFACT_FILES.latestSite, html);
    return { latestSitePath, archiveSitePath };
  }

  // 'wx' fails on an existing file, so two runs in the same second never collide.
  private async writeArchive(html: string, sourceName: string, when: Date): Promise<string> {
    let target = '';
    for (let attempt = 1; attempt <= this.maxArchiveAttempts; attempt++) {
      target = path.join(this.outputDir, archiveFileName(sourceName, when, attempt));
      try {
        await writeFile(target, html, { encoding: 'utf8', flag: 'wx' });
        return target;
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') {
          throw persistenceError(target, error);
        }
      }
    }
    throw new PersistenceError(target, `No free archive name for ${sourceName}`, {
      detail: `${this.maxArchiveAttempts} names already taken`,
    });
  }

  private async write(fileName: string, contents: string): Promise<string> {
    await this.ensureDir();
    const target = path.join(this.outputDir, fileName);
    try {
      await writeFile(target, contents, 'utf8');
    } catch (error) {
      throw persistenceError(target, error);
    }
    return target;
  }

  private async ensureDir(): Promise<void> {
    try {
      await mkdir(this.outputDir, { recursive: true });
    } catch (error) {
      throw persistenceError(this.outputDir, error);
    }
  }
}
