/**
 * Prompt templates with `{name}` placeholders.
 *
 * JSON examples inside a template are safe: only `{word}` with no spaces or
 * quotes counts as a placeholder.
 */

import type { OllamaChatMessage } from './client.js';

export interface PromptTemplate {
  system?: string;
  template: string;
  /** Placeholder names in order of first appearance. */
  variables: string[];
}

export interface RenderedPrompt {
  prompt: string;
  system?: string;
}

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Fill placeholders in one pass. Values are inserted literally (`$&` stays
 * `$&`), substituted text is not rescanned, unknown names stay as written.
 */
export function buildPrompt(template: string, variables: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : placeholder,
  );
}

export function createPromptTemplate(template: string, options: { system?: string } = {}): PromptTemplate {
  const variables = [...new Set(Array.from(template.matchAll(PLACEHOLDER), (match) => match[1]))];
  return { system: options.system, template, variables };
}

/**
 * @throws Error naming every placeholder without a value.
 */
export function executeTemplate(template: PromptTemplate, variables: Record<string, string>): RenderedPrompt {
  const missing = template.variables.filter((name) => !(name in variables));
  if (missing.length > 0) {
    throw new Error(`Missing template variables: ${missing.join(', ')}`);
  }
  return { prompt: buildPrompt(template.template, variables), system: template.system };
}

export function toChatMessages(rendered: RenderedPrompt): OllamaChatMessage[] {
  const messages: OllamaChatMessage[] = [];
  if (rendered.system) {
    messages.push({ role: 'system', content: rendered.system });
  }
  messages.push({ role: 'user', content: rendered.prompt });
  return messages;
}

/** System turn for transcription-style extraction into JSON. */
export function structuredExtractionSystem(task: string): string {
  return `You are a meticulous transcriber. Your task is to ${task}.

Rules:
1. Copy every value exactly as it appears in the source text
2. Answer with one JSON object in the requested shape
3. Use null for anything the source does not state
4. Never infer, embellish or complete information`;
}
