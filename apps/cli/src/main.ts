#!/usr/bin/env node
/**
 * folioforge [cv.pdf]
 *
 * Exit codes: 0 portfolio written, 1 run failed, 2 no file chosen.
 */
import './load-env.js';
import { createLogger, describeError, setLogLevel } from '@folioforge/core';
import { loadAppConfig } from './config.js';
import { createOllamaClient, createPipeline, preflight } from './container.js';
import { resolveDocumentPath } from './file-picker.js';
import { ConsoleNotifier } from './notifier.js';

const logger = createLogger('CLI');

async function main(): Promise<number> {
  const config = loadAppConfig();
  setLogLevel(config.logLevel);

  const notifier = new ConsoleNotifier();
  notifier.banner('CV to portfolio, fully local');

  const documentPath = await resolveDocumentPath(process.argv.slice(2));
  if (!documentPath) {
    logger.warn('No file selected. Exiting.');
    return 2;
  }

  const client = createOllamaClient(config);
  const report = await preflight(client, config);
  for (const problem of report.problems) {
    logger.warn(problem);
  }

  const pipeline = createPipeline(config, { client, notifier });
  const outcome = await pipeline.run(documentPath);
  return outcome.status === 'done' ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error(describeError(error));
    process.exitCode = 1;
  },
);
