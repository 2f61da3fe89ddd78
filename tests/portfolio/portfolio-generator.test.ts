import { describe, it, expect } from 'vitest';
import { GenerationParseError } from '@folioforge/core';
import {
  AOS_FALLBACK_SCRIPT,
  AOS_FALLBACK_STYLE,
  PortfolioGeneratorAgent,
  applyVisibilityFixes,
  generatePortfolio,
  hasVisibilityFix,
} from '@folioforge/agents';
import { emptyStructuredCv, serializeStructuredCv, type StructuredCV } from '@folioforge/schemas';
import { FakeInferenceClient, completion } from '../helpers/fake-inference.js';

const MODEL = 'qwen2.5-coder:14b';

function janeRoe(): StructuredCV {
  const cv = emptyStructuredCv();
  cv.personal.name = 'Jane Roe';
  cv.personal.title = 'Software Engineer';
  cv.experience = [{ company: 'Acme', role: 'Software Engineer', period: '2021-Present', highlights: [] }];
  return cv;
}

const PAGE = '<!DOCTYPE html>\n<html><head><title>Jane</title></head><body><h1>Jane Roe</h1></body></html>';

describe('PortfolioGeneratorAgent', () => {
  it('isolates the page and injects the visibility fallback', async () => {
    const client = new FakeInferenceClient([`Here is your site:\n\`\`\`html\n${PAGE}\n\`\`\`\nEnjoy!`]);

    const site = await generatePortfolio(janeRoe(), 'Jane Roe', { client, model: MODEL, completion });

    expect(site.html).toBe(
      '<!DOCTYPE html>\n<html><head><title>Jane</title>' +
        `${AOS_FALLBACK_STYLE}\n</head><body><h1>Jane Roe</h1>` +
        `${AOS_FALLBACK_SCRIPT}\n</body></html>`,
    );
    expect(site.warnings).toEqual(['Injected AOS visibility fallback']);
  });

  it('leaves a page that already handles AOS untouched', async () => {
    const page = PAGE.replace('<h1>', '<h1 class="aos-animate">');
    const client = new FakeInferenceClient([page]);

    const site = await generatePortfolio(janeRoe(), 'Jane Roe', { client, model: MODEL, completion });

    expect(site).toEqual({ html: page, warnings: [] });
  });

  it('warns when the record has no name', async () => {
    const client = new FakeInferenceClient([PAGE.replace('<h1>', '<h1 class="aos-animate">')]);

    const site = await generatePortfolio(emptyStructuredCv(), '', { client, model: MODEL, completion });

    expect(site.warnings).toEqual(['CV has no name; the page hero will be generic']);
  });

  it('fails with GenerationParseError when no document comes back', async () => {
    const client = new FakeInferenceClient(['<div>just a fragment</div>']);
    const agent = new PortfolioGeneratorAgent({ client, model: MODEL, completion });

    const result = await agent.execute({ cv: janeRoe(), sourceText: '' });

    expect(result.success).toBe(false);
    expect(result.cause).toBeInstanceOf(GenerationParseError);
    expect(result.cause).toMatchObject({ detail: '<div>just a fragment</div>' });
    expect(client.unloaded).toEqual([MODEL]);
  });

  it('prompts the code model with the record and a source excerpt', async () => {
    const client = new FakeInferenceClient([PAGE]);
    const cv = janeRoe();

    await generatePortfolio(cv, 'A'.repeat(2500), { client, model: MODEL, completion });

    const [call] = client.calls;
    expect(call.model).toBe(MODEL);
    expect(call.options).toEqual(completion);
    const prompt = call.messages[1].content;
    expect(prompt).toContain(serializeStructuredCv(cv));
    expect(prompt).toContain('A'.repeat(2000));
    expect(prompt).not.toContain('A'.repeat(2001));
  });
});

describe('visibility fixes', () => {
  it('detects an existing fallback case-insensitively', () => {
    expect(hasVisibilityFix('<div class="AOS-Animate">')).toBe(true);
    expect(hasVisibilityFix('<div data-aos="fade-up">')).toBe(false);
  });

  it('adds only the script when there is no head', () => {
    expect(applyVisibilityFixes('<html><body>x</body></html>')).toBe(
      `<html><body>x${AOS_FALLBACK_SCRIPT}\n</body></html>`,
    );
  });
});
