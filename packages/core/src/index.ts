/**
 * @folioforge/core: error taxonomy and logging shared by every package
 */

export const APP_NAME = 'FolioForge';

export {
  FolioError,
  DocumentExtractionError,
  InferenceError,
  ServerUnavailableError,
  ModelNotFoundError,
  InferenceTimeoutError,
  ExtractionParseError,
  GenerationParseError,
  PersistenceError,
  ConfigError,
  isFolioError,
  describeError,
  type ErrorKind,
  type FolioErrorOptions,
  type SchemaIssue,
} from './errors.js';

export {
  createLogger,
  writeLog,
  formatLogLine,
  setLogLevel,
  shouldLog,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from './logger.js';
