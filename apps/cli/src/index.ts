/**
 * @folioforge/cli - pipeline orchestration and its local collaborators
 */

export { loadAppConfig, type AppConfig, type PhaseConfig } from './config.js';
export {
  createOllamaClient,
  createPipeline,
  preflight,
  type ModelCatalog,
  type PipelineOverrides,
  type PreflightReport,
} from './container.js';
export { cleanPath, resolveDocumentPath, terminalPrompt, type Prompt } from './file-picker.js';
export { ConsoleNotifier, formatBanner } from './notifier.js';
export {
  LocalArtifactWriter,
  archiveFileName,
  formatTimestamp,
  sanitizeSourceName,
} from './output-disk.js';
export * from './orchestrator/index.js';
