export {
  PortfolioPipeline,
  canTransition,
  formatFailureMessage,
  formatSuccessMessage,
} from './run.js';
export type {
  ArtifactWriter,
  NotificationKind,
  Notifier,
  PipelineDeps,
  PipelineFailure,
  PipelineOutcome,
  PipelineSuccess,
  Runnable,
  SavedSite,
  TransitionListener,
} from './types.js';
