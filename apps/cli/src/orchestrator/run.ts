/**
 * Pipeline orchestrator: CV document -> raw text -> StructuredCV -> HTML -> disk.
 *
 * Strictly sequential, one run at a time, no retries. Each stage's output is
 * written as soon as the stage completes, so a failure late in the run still
 * leaves the earlier artifacts on disk. The notifier hears exactly once per run.
 */

import { randomUUID } from 'node:crypto';
import { unwrapAgentResult, type AgentContext } from '@folioforge/agents';
import { createLogger, describeError, isFolioError, type Logger } from '@folioforge/core';
import { STAGE_LABELS, type ActiveStage, type PipelineStage } from '@folioforge/schemas';
import type {
  PipelineDeps,
  PipelineFailure,
  PipelineOutcome,
  PipelineSuccess,
  TransitionListener,
} from './types.js';

const TRANSITIONS: Record<PipelineStage, readonly PipelineStage[]> = {
  idle: ['extracting'],
  extracting: ['analyzing', 'failed'],
  analyzing: ['generating', 'failed'],
  generating: ['persisting', 'failed'],
  persisting: ['done', 'failed'],
  done: ['idle'],
  failed: ['idle'],
};

export function canTransition(from: PipelineStage, to: PipelineStage): boolean {
  return TRANSITIONS[from].includes(to);
}

export function formatFailureMessage(stage: ActiveStage, kind: string, error: unknown): string {
  return `${STAGE_LABELS[stage]} failed [${kind}]: ${describeError(error)}`;
}

export function formatSuccessMessage(outcome: PipelineSuccess): string {
  const { artifacts } = outcome;
  return [
    `Portfolio: ${artifacts.latestSitePath}`,
    `Archive:   ${artifacts.archiveSitePath}`,
    `CV data:   ${artifacts.cvDataPath}`,
    `Raw text:  ${artifacts.rawTextPath}`,
  ].join('\n');
}

export class PortfolioPipeline {
  private stage: PipelineStage = 'idle';
  private listeners: TransitionListener[] = [];
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(private readonly deps: PipelineDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger ?? createLogger('Pipeline');
  }

  get currentStage(): PipelineStage {
    return this.stage;
  }

  /** Observe stage changes. Returns an unsubscribe function. */
  onTransition(listener: TransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async run(documentPath: string): Promise<PipelineOutcome> {
    if (this.stage !== 'idle') {
      if (this.stage !== 'done' && this.stage !== 'failed') {
        throw new Error(`A run is already in progress (stage: ${this.stage})`);
      }
      this.transition('idle');
    }

    const { extractor, analyzer, generator, writer } = this.deps;
    const context: Partial<AgentContext> = {
      runId: randomUUID(),
      metadata: { documentPath },
    };
    let active: ActiveStage = 'extracting';
    const enter = (stage: ActiveStage) => {
      active = stage;
      this.transition(stage);
    };

    let outcome: PipelineOutcome;
    try {
      enter('extracting');
      const document = unwrapAgentResult(await extractor.execute({ filePath: documentPath }, context));
      const rawTextPath = await writer.saveRawText(document.text);

      enter('analyzing');
      const analysis = unwrapAgentResult(await analyzer.execute({ rawText: document.text }, context));
      const cvDataPath = await writer.saveCvData(analysis.cv);

      enter('generating');
      const site = unwrapAgentResult(
        await generator.execute({ cv: analysis.cv, sourceText: document.text }, context),
      );

      enter('persisting');
      const saved = await writer.saveSite(site.html, document.sourceName, this.clock());

      this.transition('done');
      outcome = {
        status: 'done',
        artifacts: { rawTextPath, cvDataPath, ...saved },
        issues: analysis.issues,
        warnings: site.warnings,
      };
      this.logger.info(`Run complete: ${saved.latestSitePath}`);
    } catch (error) {
      this.transition('failed');
      outcome = this.toFailure(active, error);
      this.logger.error(outcome.message);
    }

    await this.notify(outcome);
    return outcome;
  }

  private toFailure(stage: ActiveStage, error: unknown): PipelineFailure {
    const kind = isFolioError(error) ? error.kind : 'Unexpected';
    return {
      status: 'failed',
      stage,
      kind,
      message: formatFailureMessage(stage, kind, error),
      error,
    };
  }

  private transition(to: PipelineStage): void {
    const from = this.stage;
    if (!canTransition(from, to)) {
      throw new Error(`Illegal pipeline transition: ${from} -> ${to}`);
    }
    this.stage = to;
    this.logger.debug(`${from} -> ${to}`);
    for (const listener of this.listeners) {
      try {
        listener(from, to);
      } catch (error) {
        this.logger.warn(`Transition listener failed on ${from} -> ${to}: ${describeError(error)}`);
      }
    }
  }

  // Notifier errors are logged, never rethrown.
  private async notify(outcome: PipelineOutcome): Promise<void> {
    try {
      if (outcome.status === 'done') {
        await this.deps.notifier.notify('success', formatSuccessMessage(outcome));
      } else {
        await this.deps.notifier.notify('failure', outcome.message);
      }
    } catch (error) {
      this.logger.error(`Notifier failed: ${describeError(error)}`);
    }
  }
}
