/**
 * Error taxonomy for a pipeline run.
 *
 * Every kind except SchemaMismatch aborts the run at the stage where it occurs.
 * SchemaMismatch is never thrown: the analyzer records it as a {@link SchemaIssue}
 * and carries on with defaulted fields.
 */

export type ErrorKind =
  | 'DocumentExtractionError'
  | 'ServerUnavailable'
  | 'ModelNotFound'
  | 'InferenceTimeout'
  | 'ExtractionParseError'
  | 'SchemaMismatch'
  | 'GenerationParseError'
  | 'PersistenceError'
  | 'ConfigError';

export interface FolioErrorOptions {
  /** Raw diagnostic (server body, response excerpt, file path). */
  detail?: string;
  cause?: unknown;
}

export class FolioError extends Error {
  readonly kind: ErrorKind;
  readonly detail?: string;

  constructor(kind: ErrorKind, message: string, options: FolioErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = kind;
    this.kind = kind;
    this.detail = options.detail;
  }
}

export class DocumentExtractionError extends FolioError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: FolioErrorOptions) {
    super('DocumentExtractionError', message, options);
    this.filePath = filePath;
  }
}

/** Base for failures talking to the inference server; always names the model. */
export abstract class InferenceError extends FolioError {
  readonly model: string;

  protected constructor(
    kind: 'ServerUnavailable' | 'ModelNotFound' | 'InferenceTimeout',
    model: string,
    message: string,
    options?: FolioErrorOptions,
  ) {
    super(kind, message, options);
    this.model = model;
  }
}

export class ServerUnavailableError extends InferenceError {
  constructor(model: string, message: string, options?: FolioErrorOptions) {
    super('ServerUnavailable', model, message, options);
  }
}

export class ModelNotFoundError extends InferenceError {
  constructor(model: string, options?: FolioErrorOptions) {
    super('ModelNotFound', model, `Model "${model}" is not available on the inference server`, options);
  }
}

export class InferenceTimeoutError extends InferenceError {
  readonly timeoutMs: number;

  constructor(model: string, timeoutMs: number, options?: FolioErrorOptions) {
    super('InferenceTimeout', model, `No response from "${model}" within ${timeoutMs}ms`, options);
    this.timeoutMs = timeoutMs;
  }
}

export class ExtractionParseError extends FolioError {
  constructor(message: string, options?: FolioErrorOptions) {
    super('ExtractionParseError', message, options);
  }
}

export class GenerationParseError extends FolioError {
  constructor(message: string, options?: FolioErrorOptions) {
    super('GenerationParseError', message, options);
  }
}

export class PersistenceError extends FolioError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: FolioErrorOptions) {
    super('PersistenceError', message, options);
    this.filePath = filePath;
  }
}

export class ConfigError extends FolioError {
  constructor(message: string, options?: FolioErrorOptions) {
    super('ConfigError', message, options);
  }
}

/** A recoverable mismatch between the model's JSON and the StructuredCV shape. */
export interface SchemaIssue {
  kind: 'SchemaMismatch';
  /** Dotted path, e.g. `experience.0.company`. */
  path: string;
  reason: 'missing' | 'not-in-source';
  value?: string;
}

export function isFolioError(error: unknown): error is FolioError {
  return error instanceof FolioError;
}

/** One-line description: message plus detail when present. */
export function describeError(error: unknown): string {
  if (isFolioError(error)) {
    return error.detail ? `${error.message} (${error.detail})` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
