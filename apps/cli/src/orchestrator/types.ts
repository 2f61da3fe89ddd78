import type {
  Agent,
  CvAnalysis,
  CvAnalyzerInput,
  DocumentExtractorInput,
  ExtractedDocument,
  GeneratedSite,
  PortfolioGeneratorInput,
} from '@folioforge/agents';
import type { Logger, SchemaIssue } from '@folioforge/core';
import type {
  ActiveStage,
  PipelineArtifacts,
  PipelineStage,
  StructuredCV,
} from '@folioforge/schemas';

/** The orchestrator only ever calls `execute`. */
export type Runnable<TInput, TOutput> = Pick<Agent<TInput, TOutput>, 'execute'>;

export interface SavedSite {
  latestSitePath: string;
  archiveSitePath: string;
}

export interface ArtifactWriter {
  saveRawText(text: string): Promise<string>;
  saveCvData(cv: StructuredCV): Promise<string>;
  saveSite(html: string, sourceName: string, when: Date): Promise<SavedSite>;
}

export type NotificationKind = 'success' | 'failure';

export interface Notifier {
  notify(kind: NotificationKind, message: string): void | Promise<void>;
}

export interface PipelineDeps {
  extractor: Runnable<DocumentExtractorInput, ExtractedDocument>;
  analyzer: Runnable<CvAnalyzerInput, CvAnalysis>;
  generator: Runnable<PortfolioGeneratorInput, GeneratedSite>;
  writer: ArtifactWriter;
  notifier: Notifier;
  clock?: () => Date;
  logger?: Logger;
}

export interface PipelineSuccess {
  status: 'done';
  artifacts: PipelineArtifacts;
  /** Recoverable SchemaMismatch findings from Phase 1. */
  issues: SchemaIssue[];
  warnings: string[];
}

export interface PipelineFailure {
  status: 'failed';
  stage: ActiveStage;
  /** Error kind, or `Unexpected` for anything outside the taxonomy. */
  kind: string;
  message: string;
  error: unknown;
}

export type PipelineOutcome = PipelineSuccess | PipelineFailure;

export type TransitionListener = (from: PipelineStage, to: PipelineStage) => void;
