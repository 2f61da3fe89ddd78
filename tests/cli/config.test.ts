import { describe, it, expect } from 'vitest';
import { ConfigError } from '@folioforge/core';
import { loadAppConfig } from '@folioforge/cli';

describe('loadAppConfig', () => {
  it('falls back to the defaults', () => {
    expect(loadAppConfig({})).toEqual({
      baseUrl: 'http://localhost:11434',
      analysis: { model: 'deepseek-r1:7b', temperature: 0.3 },
      generation: { model: 'qwen2.5-coder:14b', temperature: 0.2 },
      contextWindow: 8192,
      maxOutputTokens: 4096,
      timeoutMs: 300000,
      outputDir: 'outputs',
      unloadBetweenPhases: true,
      logLevel: 'info',
    });
  });

  it('reads overrides and treats blanks as unset', () => {
    const config = loadAppConfig({
      OLLAMA_BASE_URL: 'http://gpu-box:11434/',
      OLLAMA_MODEL_CODE: 'codellama:13b',
      ANALYSIS_TEMPERATURE: '0',
      CONTEXT_WINDOW: '16384',
      UNLOAD_BETWEEN_PHASES: 'FALSE',
      LOG_LEVEL: 'DEBUG',
      OUTPUT_DIR: '  ',
    });

    expect(config.baseUrl).toBe('http://gpu-box:11434');
    expect(config.generation.model).toBe('codellama:13b');
    expect(config.analysis.temperature).toBe(0);
    expect(config.contextWindow).toBe(16384);
    expect(config.unloadBetweenPhases).toBe(false);
    expect(config.logLevel).toBe('debug');
    expect(config.outputDir).toBe('outputs');
  });

  it('names each invalid variable', () => {
    const attempt = () =>
      loadAppConfig({ ANALYSIS_TEMPERATURE: 'warm', CONTEXT_WINDOW: '-1', LOG_LEVEL: 'loud' });

    expect(attempt).toThrow(ConfigError);
    expect(attempt).toThrow(/ANALYSIS_TEMPERATURE: must be a number/);
    expect(attempt).toThrow(/CONTEXT_WINDOW: must be positive/);
    expect(attempt).toThrow(/LOG_LEVEL/);
  });

  it('rejects temperatures outside 0..2', () => {
    expect(() => loadAppConfig({ GENERATION_TEMPERATURE: '3' })).toThrow(
      'Invalid configuration: GENERATION_TEMPERATURE: must be between 0 and 2',
    );
  });
});
