import { z } from 'zod';

export const pipelineStageEnum = z.enum([
  'idle',
  'extracting',
  'analyzing',
  'generating',
  'persisting',
  'done',
  'failed',
]);

export type PipelineStage = z.infer<typeof pipelineStageEnum>;

/** Stages that do work; `failed` records which of these was active. */
export type ActiveStage = Extract<PipelineStage, 'extracting' | 'analyzing' | 'generating' | 'persisting'>;

export const STAGE_LABELS: Record<ActiveStage, string> = {
  extracting: 'Document extraction',
  analyzing: 'Analysis',
  generating: 'Generation',
  persisting: 'Persistence',
};

/** Fixed names inside the output directory. */
export const ARTIFACT_FILES = {
  rawText: 'cv_raw_text.txt',
  cvData: 'cv_extracted_data.json',
  latestSite: 'index.html',
} as const;

export interface PipelineArtifacts {
  rawTextPath: string;
  cvDataPath: string;
  latestSitePath: string;
  /** `{source}_portfolio_{YYYYMMDD_HHMMSS}.html`, never overwritten. */
  archiveSitePath: string;
}
