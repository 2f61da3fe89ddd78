/**
 * Ollama model tiers used by the two pipeline phases.
 * All models run locally via Ollama; at most one is resident at a time.
 */

export const OllamaModels = {
  /** Deep reasoning model for Phase 1 extraction (the Brain) */
  REASONING: 'deepseek-r1:7b',

  /** Code generation model for Phase 2 page building (the Architect) */
  CODE: 'qwen2.5-coder:14b',
} as const;

type OllamaModelType = keyof typeof OllamaModels;

export const OLLAMA_BASE_URL = 'http://localhost:11434';

export interface ModelConfig {
  model: string;
  temperature: number;
  maxTokens: number;
  contextWindow: number;
  timeout: number;
}

export const defaultModelConfigs: Record<OllamaModelType, ModelConfig> = {
  REASONING: {
    model: OllamaModels.REASONING,
    temperature: 0.3, // low: factual extraction
    maxTokens: 4096,
    contextWindow: 8192,
    timeout: 300000, // 5 minutes for deep reasoning
  },
  CODE: {
    model: OllamaModels.CODE,
    temperature: 0.2,
    maxTokens: 4096,
    contextWindow: 8192,
    timeout: 300000,
  },
};
