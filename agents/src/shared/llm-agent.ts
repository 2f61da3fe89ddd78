/**
 * Base for agents that make exactly one inference call per execution.
 * Handles the sequential-loading rule: the model is unloaded once its call
 * returns (or fails) so the next phase has the accelerator to itself.
 */

import type { CompletionOptions, InferenceClient, OllamaChatMessage } from '@folioforge/llm';
import { BaseAgent } from './base-agent.js';

export interface LlmAgentDeps {
  client: InferenceClient;
  model: string;
  completion: CompletionOptions;
  /** Evict the model after the call. Defaults to true. */
  unloadAfter?: boolean;
}

export abstract class LlmAgent<TInput, TOutput> extends BaseAgent<TInput, TOutput> {
  protected readonly deps: LlmAgentDeps;

  constructor(deps: LlmAgentDeps) {
    super();
    this.deps = deps;
  }

  get modelName(): string {
    return this.deps.model;
  }

  protected async complete(messages: OllamaChatMessage[]): Promise<string> {
    const { client, model, completion } = this.deps;
    this.debug(`Sending ${messages.length} message(s) to ${model}`, {
      temperature: completion.temperature,
      maxOutputTokens: completion.maxOutputTokens,
      contextWindow: completion.contextWindow,
    });

    try {
      const text = await client.complete(messages, model, completion);
      this.debug(`Received ${text.length} chars from ${model}`);
      return text;
    } finally {
      if (this.deps.unloadAfter ?? true) {
        await this.unloadModel();
      }
    }
  }

  private async unloadModel(): Promise<void> {
    const { client, model } = this.deps;
    if (!client.unloadModel) return;
    try {
      await client.unloadModel(model);
    } catch (error) {
      this.warn(`Could not unload ${model}`, error);
    }
  }
}

/** First `max` chars of a completion, for error details. */
export function excerpt(text: string, max = 200): string {
  const trimmed = text.trim();
  return trimmed.length > max ? `${trimmed.substring(0, max)}...` : trimmed;
}
