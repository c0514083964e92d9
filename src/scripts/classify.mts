#!/usr/bin/env node
import { promises as fs } from 'node:fs';
import { getConfig } from '../config.js';
import { ConfigurationError, describeError } from '../errors.js';
import { logger } from '../logger.js';
import { runBatch } from '../services/batch.js';
import { createEngine } from '../services/engine.js';
import { serializeBatch, type ExportFormat } from '../utils/export.js';
import { splitProfiles } from '../utils/profiles.js';

const FORMATS: readonly ExportFormat[] = ['csv', 'tsv', 'json'];

function parseArgs(argv: string[]): { file: string; format: ExportFormat } {
  let file: string | undefined;
  let format: ExportFormat = 'csv';
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--format') {
      const value = argv[++i];
      const match = FORMATS.find((f) => f === value);
      if (!match) throw new Error(`--format must be one of ${FORMATS.join(', ')}`);
      format = match;
    } else if (!file) {
      file = arg;
    }
  }
  if (!file) {
    throw new Error('Usage: classify <profiles.txt> [--format csv|tsv|json]');
  }
  return { file, format };
}

async function main() {
  const { file, format } = parseArgs(process.argv.slice(2));
  const cfg = getConfig();
  const classifier = await createEngine(cfg);

  const document = await fs.readFile(file, 'utf-8');
  const profiles = splitProfiles(document);
  logger.info({ file, profiles: profiles.length }, 'Profiles loaded');

  const result = await runBatch(profiles, classifier, {
    concurrency: cfg.batch.concurrency,
    onProgress: (completed, total) => logger.info({ completed, total }, `Analyzing profile ${completed}/${total}`),
  });

  process.stdout.write(serializeBatch(result, format));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    logger.fatal({ err }, `Configuration error: ${err.message}`);
  } else {
    logger.error({ err: describeError(err) }, 'Classification run failed');
  }
  process.exit(1);
});
