/**
 * Ollama HTTP client for local LLM inference.
 * Batch (non-streaming) chat completions, model listing and VRAM unloading.
 */

import { z } from 'zod';
import {
  createLogger,
  InferenceTimeoutError,
  ModelNotFoundError,
  ServerUnavailableError,
  type Logger,
} from '@folioforge/core';
import { OLLAMA_BASE_URL } from './models.js';

export interface OllamaChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface OllamaChatRequest {
  model: string;
  messages: OllamaChatMessage[];
  stream?: boolean;
  format?: 'json';
  keep_alive?: number | string;
  options?: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
    num_ctx?: number;
    stop?: string[];
  };
}

const OllamaChatResponseSchema = z.object({
  model: z.string().optional(),
  created_at: z.string().optional(),
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
  total_duration: z.number().optional(),
  load_duration: z.number().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
  eval_duration: z.number().optional(),
});

export type OllamaChatResponse = z.infer<typeof OllamaChatResponseSchema>;

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

export interface CompletionOptions {
  temperature: number;
  maxOutputTokens: number;
  contextWindow: number;
  /** Bounded wait for the whole call; falls back to the client default. */
  timeoutMs?: number;
}

/**
 * The one capability the pipeline needs from an inference backend.
 * `unloadModel` is optional: backends without resident models skip it.
 */
export interface InferenceClient {
  complete(
    messages: OllamaChatMessage[],
    model: string,
    options: CompletionOptions,
  ): Promise<string>;
  unloadModel?(model: string): Promise<boolean>;
}

export interface OllamaClientOptions {
  baseUrl?: string;
  /** Default per-call timeout. */
  timeoutMs?: number;
  /** Pause after an unload so the GPU releases memory before the next load. */
  unloadSettleMs?: number;
  /** Bounded wait for unload and model listing, which should answer quickly. */
  requestTimeoutMs?: number;
  logger?: Logger;
}

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export class OllamaClient implements InferenceClient {
  private baseUrl: string;
  private defaultTimeout: number;
  private unloadSettleMs: number;
  private requestTimeoutMs: number;
  private logger: Logger;

  constructor(options: OllamaClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? OLLAMA_BASE_URL).replace(/\/$/, '');
    this.defaultTimeout = options.timeoutMs ?? 300000; // 5 minutes default for LLM operations
    this.unloadSettleMs = options.unloadSettleMs ?? 2000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10000;
    this.logger = options.logger ?? createLogger('Ollama');
  }

  /**
   * Run a chat conversation and return the full completion text.
   */
  async complete(
    messages: OllamaChatMessage[],
    model: string,
    options: CompletionOptions,
  ): Promise<string> {
    if (messages.length === 0) {
      throw new TypeError('complete() needs at least one message');
    }

    const response = await this.chat(
      {
        model,
        messages,
        options: {
          temperature: options.temperature,
          num_predict: options.maxOutputTokens,
          num_ctx: options.contextWindow,
        },
      },
      options.timeoutMs,
    );

    return response.message.content;
  }

  /**
   * Chat completion using the /api/chat endpoint.
   */
  async chat(request: OllamaChatRequest, timeout?: number): Promise<OllamaChatResponse> {
    const timeoutMs = timeout ?? this.defaultTimeout;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const { model } = request;

    try {
      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}/api/chat`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ ...request, stream: false }),
          signal: controller.signal,
        });
      } catch (error) {
        if (controller.signal.aborted) {
          throw new InferenceTimeoutError(model, timeoutMs, { cause: error });
        }
        throw new ServerUnavailableError(model, `Cannot reach Ollama at ${this.baseUrl}`, {
          detail: error instanceof Error ? error.message : String(error),
          cause: error,
        });
      }

      if (!response.ok) {
        let body: string;
        try {
          body = await response.text();
        } catch (error) {
          if (controller.signal.aborted) {
            throw new InferenceTimeoutError(model, timeoutMs, { cause: error });
          }
          throw new ServerUnavailableError(model, `Ollama chat failed: ${response.status}`, {
            cause: error,
          });
        }
        if (response.status === 404 || /not found/i.test(body)) {
          throw new ModelNotFoundError(model, { detail: body });
        }
        throw new ServerUnavailableError(model, `Ollama chat failed: ${response.status}`, {
          detail: body,
        });
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        if (controller.signal.aborted) {
          throw new InferenceTimeoutError(model, timeoutMs, { cause: error });
        }
        throw new ServerUnavailableError(model, 'Ollama returned a body that is not JSON', {
          cause: error,
        });
      }

      const parsed = OllamaChatResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new ServerUnavailableError(model, 'Ollama returned an unexpected chat response', {
          detail: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
        });
      }

      this.logger.debug(`Chat completed with ${model}`, {
        evalCount: parsed.data.eval_count,
        totalDurationMs:
          parsed.data.total_duration === undefined
            ? undefined
            : Math.round(parsed.data.total_duration / 1e6),
      });

      return parsed.data;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Evict a model from memory (keep_alive: 0). Never throws: a model that was
   * not loaded is not worth failing a run over.
   */
  async unloadModel(model: string): Promise<boolean> {
    try {
      this.logger.info(`Unloading ${model} from VRAM`);
      const status = await this.request(
        '/api/generate',
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ model, keep_alive: 0 }),
        },
        async (response) => response.status,
      );
      if (status < 200 || status >= 300) {
        this.logger.warn(`Unload of ${model} returned ${status}`);
        return false;
      }
      if (this.unloadSettleMs > 0) {
        await wait(this.unloadSettleMs);
      }
      return true;
    } catch (error) {
      this.logger.warn(`Unload of ${model} failed (it may not be loaded)`, error);
      return false;
    }
  }

  /**
   * Check if Ollama is running and a model is available.
   */
  async isAvailable(model?: string): Promise<boolean> {
    try {
      const models = await this.listModels();
      if (model) {
        return models.some((name) => name === model || name.startsWith(model));
      }
      return true;
    } catch {
      return false;
    }
  }

  /**
   * List available models.
   */
  async listModels(): Promise<string[]> {
    return this.request('/api/tags', {}, async (response) => {
      if (!response.ok) {
        throw new Error(`Failed to list models: ${response.status}`);
      }
      const data = OllamaTagsSchema.parse(await response.json());
      return data.models.map((m) => m.name);
    });
  }

  /**
   * Fetch and read within `requestTimeoutMs`. The deadline rejects on its own,
   * so a server that ignores the abort still cannot hold the caller.
   */
  private async request<T>(
    path: string,
    init: RequestInit,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new Error(`No answer from ${path} within ${this.requestTimeoutMs}ms`));
      }, this.requestTimeoutMs);
    });

    try {
      const exchange = fetch(`${this.baseUrl}${path}`, { ...init, signal: controller.signal }).then(read);
      return await Promise.race([exchange, deadline]);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
