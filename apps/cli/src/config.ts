import { z } from 'zod';
import { ConfigError, LOG_LEVELS, type LogLevel } from '@folioforge/core';
import { OLLAMA_BASE_URL, OllamaModels, defaultModelConfigs } from '@folioforge/llm';

// Unset and blank variables both fall back to the default.
const blankAsUnset = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const envString = (fallback: string) => z.preprocess(blankAsUnset, z.string().trim().default(fallback));

const temperature = (fallback: number) =>
  z.preprocess(
    blankAsUnset,
    z.coerce
      .number({ invalid_type_error: 'must be a number' })
      .min(0, 'must be between 0 and 2')
      .max(2, 'must be between 0 and 2')
      .default(fallback),
  );

const positiveInt = (fallback: number) =>
  z.preprocess(
    blankAsUnset,
    z.coerce
      .number({ invalid_type_error: 'must be a number' })
      .int('must be an integer')
      .positive('must be positive')
      .default(fallback),
  );

const envBoolean = (fallback: boolean) =>
  z.preprocess(
    (value) => (typeof value === 'string' ? blankAsUnset(value.trim().toLowerCase()) : value),
    z
      .enum(['true', 'false', '1', '0', 'yes', 'no'], {
        errorMap: () => ({ message: 'must be true or false' }),
      })
      .transform((value) => value === 'true' || value === '1' || value === 'yes')
      .default(fallback ? 'true' : 'false'),
  );

const reasoning = defaultModelConfigs.REASONING;
const code = defaultModelConfigs.CODE;

const EnvSchema = z.object({
  OLLAMA_BASE_URL: z.preprocess(blankAsUnset, z.string().url('must be a URL').default(OLLAMA_BASE_URL)),
  OLLAMA_MODEL_REASONING: envString(OllamaModels.REASONING),
  OLLAMA_MODEL_CODE: envString(OllamaModels.CODE),
  ANALYSIS_TEMPERATURE: temperature(reasoning.temperature),
  GENERATION_TEMPERATURE: temperature(code.temperature),
  CONTEXT_WINDOW: positiveInt(reasoning.contextWindow),
  MAX_OUTPUT_TOKENS: positiveInt(reasoning.maxTokens),
  INFERENCE_TIMEOUT_MS: positiveInt(reasoning.timeout),
  OUTPUT_DIR: envString('outputs'),
  UNLOAD_BETWEEN_PHASES: envBoolean(true),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? blankAsUnset(value.toLowerCase()) : value),
    z.enum(LOG_LEVELS).default('info'),
  ),
});

export interface PhaseConfig {
  model: string;
  temperature: number;
}

export interface AppConfig {
  baseUrl: string;
  analysis: PhaseConfig;
  generation: PhaseConfig;
  contextWindow: number;
  maxOutputTokens: number;
  timeoutMs: number;
  outputDir: string;
  unloadBetweenPhases: boolean;
  logLevel: LogLevel;
}

/**
 * Read application settings from the environment.
 * @throws ConfigError listing every invalid variable.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`, {
      detail: problems.join('\n'),
    });
  }

  const vars = parsed.data;
  return {
    baseUrl: vars.OLLAMA_BASE_URL.replace(/\/+$/, ''),
    analysis: { model: vars.OLLAMA_MODEL_REASONING, temperature: vars.ANALYSIS_TEMPERATURE },
    generation: { model: vars.OLLAMA_MODEL_CODE, temperature: vars.GENERATION_TEMPERATURE },
    contextWindow: vars.CONTEXT_WINDOW,
    maxOutputTokens: vars.MAX_OUTPUT_TOKENS,
    timeoutMs: vars.INFERENCE_TIMEOUT_MS,
    outputDir: vars.OUTPUT_DIR,
    unloadBetweenPhases: vars.UNLOAD_BETWEEN_PHASES,
    logLevel: vars.LOG_LEVEL,
  };
}
