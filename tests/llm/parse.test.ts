import { describe, it, expect } from 'vitest';
import {
  extractHtmlDocument,
  extractJsonObject,
  findBalancedObjects,
  stripThinking,
} from '@folioforge/llm';

describe('stripThinking', () => {
  it('removes closed think blocks', () => {
    expect(stripThinking('<think>plan {x}</think>\n{"a":1}')).toBe('{"a":1}');
  });

  it('drops everything after an unclosed think tag', () => {
    expect(stripThinking('answer<think>still going')).toBe('answer');
  });
});

describe('findBalancedObjects', () => {
  it('ignores braces inside strings', () => {
    expect(findBalancedObjects('a {"x": "}"} b {"y": {}}')).toEqual(['{"x": "}"}', '{"y": {}}']);
  });

  it('steps over a brace that never closes', () => {
    expect(findBalancedObjects('a { b {"y": 1}')).toEqual(['{"y": 1}']);
  });
});

describe('extractJsonObject', () => {
  it('reads a fenced json block', () => {
    expect(extractJsonObject('Here you go:\n```json\n{"a": 1}\n```\nDone.')).toEqual({ a: 1 });
  });

  it('returns the first object when prose surrounds several', () => {
    expect(extractJsonObject('First {"a": 1} then {"b": 2}')).toEqual({ a: 1 });
  });

  it('keeps nested objects and braces in strings', () => {
    expect(extractJsonObject('{"s": "a } b", "n": {"m": 2}}')).toEqual({ s: 'a } b', n: { m: 2 } });
  });

  it('ignores JSON inside reasoning traces', () => {
    expect(extractJsonObject('<think>{"draft": true}</think>{"final": true}')).toEqual({ final: true });
  });

  it('skips non-json fences and unparsable spans', () => {
    expect(extractJsonObject('```html\n<div>{x}</div>\n```\n{"ok": true}')).toEqual({ ok: true });
  });

  it('steps over an unmatched brace in leading prose', () => {
    expect(
      extractJsonObject('Note: a { opens here\n{"personal": {"name": "Jane Roe"}, "experience": []}'),
    ).toEqual({ personal: { name: 'Jane Roe' }, experience: [] });
  });

  it('falls back to an object nested in an unparsable span', () => {
    expect(extractJsonObject('{ see: {"a": 1} }')).toEqual({ a: 1 });
  });

  it('repairs trailing commas', () => {
    expect(extractJsonObject('{"a": [1, 2,],}')).toEqual({ a: [1, 2] });
  });

  it('repairs typographic quotes', () => {
    expect(extractJsonObject('{“a”: 1}')).toEqual({ a: 1 });
  });

  it('returns null when there is no object', () => {
    expect(extractJsonObject('I cannot help with that.')).toBeNull();
    expect(extractJsonObject('[1, 2]')).toBeNull();
  });
});

describe('extractHtmlDocument', () => {
  it('isolates the document from fences and commentary', () => {
    const response = 'Sure!\n```html\n<!DOCTYPE html><html><body>Hi</body></html>\n```\nEnjoy.';
    expect(extractHtmlDocument(response)).toBe('<!DOCTYPE html><html><body>Hi</body></html>');
  });

  it('starts at <html when there is no doctype', () => {
    expect(extractHtmlDocument('x <html lang="en"><body></body></html> y')).toBe(
      '<html lang="en"><body></body></html>',
    );
  });

  it('ends at the last closing tag', () => {
    expect(extractHtmlDocument('<html><pre></html></pre></html> trailing')).toBe(
      '<html><pre></html></pre></html>',
    );
  });

  it('returns null without both markers', () => {
    expect(extractHtmlDocument('<!DOCTYPE html><html><body>cut off')).toBeNull();
    expect(extractHtmlDocument('<div>fragment</div>')).toBeNull();
  });
});
