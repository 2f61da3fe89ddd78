/**
 * @folioforge/llm - Ollama client wrapper for local LLM inference
 */

export {
  OllamaModels,
  OLLAMA_BASE_URL,
  type ModelConfig,
  defaultModelConfigs,
} from './models.js';

export {
  OllamaClient,
  type InferenceClient,
  type CompletionOptions,
  type OllamaClientOptions,
  type OllamaChatMessage,
  type OllamaChatRequest,
  type OllamaChatResponse,
} from './client.js';

export {
  buildPrompt,
  createPromptTemplate,
  executeTemplate,
  toChatMessages,
  structuredExtractionSystem,
  type PromptTemplate,
  type RenderedPrompt,
} from './prompts.js';

export {
  stripThinking,
  findBalancedObjects,
  extractJsonObject,
  extractHtmlDocument,
  jsonFixers,
  defaultFixers,
} from './parse.js';
