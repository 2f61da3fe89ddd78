import { describe, it, expect, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import {
  ConsoleNotifier,
  createPipeline,
  formatBanner,
  loadAppConfig,
  preflight,
  type ArtifactWriter,
} from '@folioforge/cli';
import { FakeInferenceClient } from '../helpers/fake-inference.js';

const config = loadAppConfig({ UNLOAD_BETWEEN_PHASES: 'false', ANALYSIS_TEMPERATURE: '0.1' });

describe('preflight', () => {
  it('passes when both models are pulled', async () => {
    const report = await preflight(
      { listModels: async () => ['deepseek-r1:7b', 'qwen2.5-coder:14b', 'llama3:latest'] },
      config,
    );
    expect(report).toEqual({ ok: true, problems: [] });
  });

  it('names each missing model', async () => {
    const report = await preflight({ listModels: async () => ['deepseek-r1:7b'] }, config);
    expect(report).toEqual({
      ok: false,
      problems: ['Model "qwen2.5-coder:14b" is not pulled (ollama pull qwen2.5-coder:14b)'],
    });
  });

  it('reports an unreachable server', async () => {
    const report = await preflight(
      {
        listModels: async () => {
          throw new TypeError('fetch failed');
        },
      },
      config,
    );
    expect(report).toEqual({
      ok: false,
      problems: ['Ollama is not reachable at http://localhost:11434 (fetch failed)'],
    });
  });
});

describe('createPipeline', () => {
  it('wires each phase to its model, temperature and unload setting', async () => {
    const client = new FakeInferenceClient(['{"personal": {}, "experience": []}', 'no page here']);
    const writer: ArtifactWriter = {
      saveRawText: async () => '/out/cv_raw_text.txt',
      saveCvData: async () => '/out/cv_extracted_data.json',
      saveSite: async () => ({ latestSitePath: '/out/index.html', archiveSitePath: '/out/a.html' }),
    };
    const notify = vi.fn();
    const pipeline = createPipeline(config, { client, writer, notifier: { notify } });

    // a .txt CV skips the PDF parser
    const outcome = await pipeline.run(fileURLToPath(new URL('../fixtures/jane-roe.txt', import.meta.url)));

    expect(outcome).toMatchObject({ status: 'failed', stage: 'generating', kind: 'GenerationParseError' });
    expect(client.calls.map((call) => [call.model, call.options.temperature])).toEqual([
      ['deepseek-r1:7b', 0.1],
      ['qwen2.5-coder:14b', 0.2],
    ]);
    expect(client.unloaded).toEqual([]);
    expect(notify).toHaveBeenCalledTimes(1);
  });
});

describe('ConsoleNotifier', () => {
  it('frames the message in a banner', () => {
    const lines: string[] = [];
    new ConsoleNotifier((text) => lines.push(text)).notify('failure', 'Analysis failed [X]: y');

    expect(lines).toEqual([formatBanner(['FAILED', '', 'Analysis failed [X]: y'])]);
    expect(formatBanner(['A'])).toBe(`${'='.repeat(60)}\n  A\n${'='.repeat(60)}`);
  });
});
