/**
 * Composition root: the only place concrete collaborators are chosen.
 */

import {
  CvAnalyzerAgent,
  DocumentExtractorAgent,
  PortfolioGeneratorAgent,
  type LlmAgentDeps,
} from '@folioforge/agents';
import { OllamaClient, type InferenceClient } from '@folioforge/llm';
import type { AppConfig, PhaseConfig } from './config.js';
import { ConsoleNotifier } from './notifier.js';
import { PortfolioPipeline } from './orchestrator/run.js';
import type { ArtifactWriter, Notifier } from './orchestrator/types.js';
import { LocalArtifactWriter } from './output-disk.js';

export interface PipelineOverrides {
  client?: InferenceClient;
  writer?: ArtifactWriter;
  notifier?: Notifier;
  clock?: () => Date;
}

export function createOllamaClient(config: AppConfig): OllamaClient {
  return new OllamaClient({ baseUrl: config.baseUrl, timeoutMs: config.timeoutMs });
}

function phaseDeps(client: InferenceClient, config: AppConfig, phase: PhaseConfig): LlmAgentDeps {
  return {
    client,
    model: phase.model,
    completion: {
      temperature: phase.temperature,
      maxOutputTokens: config.maxOutputTokens,
      contextWindow: config.contextWindow,
      timeoutMs: config.timeoutMs,
    },
    unloadAfter: config.unloadBetweenPhases,
  };
}

export function createPipeline(config: AppConfig, overrides: PipelineOverrides = {}): PortfolioPipeline {
  const client = overrides.client ?? createOllamaClient(config);

  return new PortfolioPipeline({
    extractor: new DocumentExtractorAgent(),
    analyzer: new CvAnalyzerAgent(phaseDeps(client, config, config.analysis)),
    generator: new PortfolioGeneratorAgent(phaseDeps(client, config, config.generation)),
    writer: overrides.writer ?? new LocalArtifactWriter(config.outputDir),
    notifier: overrides.notifier ?? new ConsoleNotifier(),
    clock: overrides.clock,
  });
}

/** What `preflight` needs from a client; OllamaClient satisfies it. */
export interface ModelCatalog {
  listModels(): Promise<string[]>;
}

export interface PreflightReport {
  ok: boolean;
  problems: string[];
}

/**
 * Check the server is reachable and both models are pulled.
 * Advisory only; the run still goes ahead and reports its own typed error.
 */
export async function preflight(catalog: ModelCatalog, config: AppConfig): Promise<PreflightReport> {
  let models: string[];
  try {
    models = await catalog.listModels();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, problems: [`Ollama is not reachable at ${config.baseUrl} (${reason})`] };
  }

  const problems = [config.analysis.model, config.generation.model]
    .filter((model) => !models.some((name) => name === model || name === `${model}:latest`))
    .map((model) => `Model "${model}" is not pulled (ollama pull ${model})`);

  return { ok: problems.length === 0, problems };
}
