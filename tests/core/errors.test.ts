import { describe, it, expect } from 'vitest';
import {
  DocumentExtractionError,
  FolioError,
  GenerationParseError,
  InferenceTimeoutError,
  ModelNotFoundError,
  PersistenceError,
  ServerUnavailableError,
  describeError,
  isFolioError,
} from '@folioforge/core';

describe('error taxonomy', () => {
  it('tags each error with its kind', () => {
    expect(new DocumentExtractionError('/tmp/cv.pdf', 'gone').kind).toBe('DocumentExtractionError');
    expect(new ServerUnavailableError('m', 'down').kind).toBe('ServerUnavailable');
    expect(new GenerationParseError('no html').kind).toBe('GenerationParseError');
    expect(new PersistenceError('/out/index.html', 'disk full').kind).toBe('PersistenceError');
  });

  it('names the model on inference errors', () => {
    const notFound = new ModelNotFoundError('deepseek-r1:7b');
    expect(notFound.model).toBe('deepseek-r1:7b');
    expect(notFound.message).toBe('Model "deepseek-r1:7b" is not available on the inference server');

    const timeout = new InferenceTimeoutError('qwen2.5-coder:14b', 50);
    expect(timeout.kind).toBe('InferenceTimeout');
    expect(timeout.timeoutMs).toBe(50);
    expect(timeout.message).toBe('No response from "qwen2.5-coder:14b" within 50ms');
  });

  it('keeps detail and cause', () => {
    const root = new Error('ECONNREFUSED');
    const error = new ServerUnavailableError('m', 'Cannot reach Ollama', { detail: 'refused', cause: root });
    expect(error.detail).toBe('refused');
    expect(error.cause).toBe(root);
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(FolioError);
  });

  it('isFolioError narrows only taxonomy errors', () => {
    expect(isFolioError(new GenerationParseError('x'))).toBe(true);
    expect(isFolioError(new Error('x'))).toBe(false);
    expect(isFolioError('x')).toBe(false);
  });

  it('describeError appends detail when present', () => {
    expect(describeError(new ServerUnavailableError('m', 'Ollama chat failed: 500', { detail: 'boom' }))).toBe(
      'Ollama chat failed: 500 (boom)',
    );
    expect(describeError(new GenerationParseError('no html'))).toBe('no html');
    expect(describeError(new Error('plain'))).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
