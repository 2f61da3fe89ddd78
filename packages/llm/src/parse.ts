/**
 * Pull structured payloads out of free-form LLM completions.
 *
 * Models wrap their output in prose, code fences and (for reasoning models)
 * <think> blocks. These helpers find the payload without trusting any of that.
 */

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/gi;
const UNCLOSED_THINK = /<think>[\s\S]*$/i;
const FENCED_BLOCK = /```[ \t]*([a-zA-Z0-9_-]*)[^\n]*\n([\s\S]*?)```/g;

/**
 * Remove reasoning traces. An unclosed <think> (truncated output) drops
 * everything after it.
 */
export function stripThinking(text: string): string {
  return text.replace(THINK_BLOCK, '').replace(UNCLOSED_THINK, '').trim();
}

/**
 * End index (exclusive) of the balanced `{...}` that opens at `start`, or -1
 * when the text runs out first. Braces inside JSON strings are ignored.
 */
function balancedEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }

  return -1;
}

/**
 * Every balanced top-level `{...}` span in the text, in order. A `{` that never
 * closes is skipped and the scan resumes right after it.
 */
export function findBalancedObjects(text: string): string[] {
  const spans: string[] = [];
  let from = text.indexOf('{');
  while (from >= 0) {
    const end = balancedEnd(text, from);
    if (end < 0) {
      from = text.indexOf('{', from + 1);
    } else {
      spans.push(text.slice(from, end));
      from = text.indexOf('{', end);
    }
  }
  return spans;
}

/** Balanced spans opening at each `{` in turn, nested ones included. */
function spansFromEveryBrace(text: string): string[] {
  const spans: string[] = [];
  for (let from = text.indexOf('{'); from >= 0; from = text.indexOf('{', from + 1)) {
    const end = balancedEnd(text, from);
    if (end >= 0) spans.push(text.slice(from, end));
  }
  return spans;
}

/**
 * Common JSON fixers for LLM output issues.
 */
export const jsonFixers = {
  /** Remove trailing commas in arrays/objects */
  removeTrailingCommas: (input: string): string => {
    return input.replace(/,\s*([}\]])/g, '$1');
  },

  /** Replace typographic quotes some models emit around keys and values */
  straightenQuotes: (input: string): string => {
    return input.replace(/[\u201C\u201D]/g, '"');
  },
};

/**
 * Default set of fixers to apply, in order, when a candidate fails to parse.
 */
export const defaultFixers: Array<(input: string) => string> = [
  jsonFixers.removeTrailingCommas,
  jsonFixers.straightenQuotes,
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseObject(input: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(input);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/** Parse as-is, then after each fixer in turn (fixes accumulate). */
function tryParseObject(
  candidate: string,
  fixers: Array<(input: string) => string>,
): Record<string, unknown> | null {
  let current = candidate;
  let parsed = parseObject(current);
  for (const fixer of fixers) {
    if (parsed) break;
    current = fixer(current);
    parsed = parseObject(current);
  }
  return parsed;
}

/**
 * Locate the first JSON object in a completion.
 * Order: fenced ```json blocks, then balanced `{...}` spans in the whole text.
 * A span that does not parse gives way to the next `{` after its opening,
 * so stray braces in surrounding prose are stepped over.
 * Returns null when nothing parses as an object.
 */
export function extractJsonObject(
  response: string,
  fixers: Array<(input: string) => string> = defaultFixers,
): Record<string, unknown> | null {
  const text = stripThinking(response);

  const candidates: string[] = [];
  for (const match of text.matchAll(FENCED_BLOCK)) {
    const lang = match[1].toLowerCase();
    if (lang === '' || lang === 'json') {
      candidates.push(...spansFromEveryBrace(match[2]));
    }
  }
  candidates.push(...spansFromEveryBrace(text));

  for (const candidate of candidates) {
    const parsed = tryParseObject(candidate, fixers);
    if (parsed) return parsed;
  }
  return null;
}

const HTML_START = /<!DOCTYPE\s+html|<html[\s>]/i;
const HTML_END = /<\/html\s*>/gi;

/**
 * Isolate one complete HTML document: from `<!DOCTYPE html` (or `<html`) to the
 * last `</html>` after it. Surrounding commentary and fences are dropped.
 */
export function extractHtmlDocument(response: string): string | null {
  const text = stripThinking(response);
  const start = text.search(HTML_START);
  if (start < 0) return null;

  let end = -1;
  for (const match of text.matchAll(HTML_END)) {
    if (match.index !== undefined && match.index > start) {
      end = match.index + match[0].length;
    }
  }
  if (end < 0) return null;

  return text.slice(start, end).trim();
}
