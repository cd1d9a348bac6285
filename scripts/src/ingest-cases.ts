#!/usr/bin/env tsx
/**
 * Legal Case Ingestion Script
 *
 * Extracts the text of every case PDF in a directory, converts Bijoy-encoded
 * Bengali lines to Unicode, reflows the text into paragraphs, and writes the
 * text plus extracted case metadata.
 *
 * Usage:
 *   npx tsx scripts/src/ingest-cases.ts [options]
 *   # or via npm script:
 *   npm run ingest -- [options]
 *
 * Examples:
 *   npm run ingest -- --input=data/raw_cases --output=data/extracted_cases
 *   npm run ingest -- --no-bijoy --concurrency=4 --verbose
 *   npm run ingest -- --log-file=data/extracted_cases/ingestion.log
 *
 * Exit code is 0 when every document succeeded, 1 otherwise.
 */

import { createBatchIngester, createLogger, loadIngestConfig } from '@legal-ingest/lib';
import {
  CliUsageError,
  HELP_TEXT,
  type ParsedArgs,
  parseArgs,
  toConfigOverrides,
  toLoggerConfig,
} from './cli-args.js';

async function main(): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      console.error(HELP_TEXT);
      return 1;
    }
    throw error;
  }

  if (args.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  const logger = createLogger('ingest-cases', toLoggerConfig(args));
  const config = loadIngestConfig(process.env, toConfigOverrides(args));

  console.log('='.repeat(60));
  console.log('Legal Case Ingestion');
  console.log('='.repeat(60));
  console.log('');

  logger.info('Configuration', {
    input: config.inputDir,
    output: config.outputDir,
    convertBijoy: config.convertBijoy,
    concurrency: config.concurrency,
  });

  const ingester = createBatchIngester({ config, logger });
  const summary = await ingester.ingestDirectory();

  if (summary.failed > 0) {
    logger.warn('Completed with errors', { failed: summary.failed });
    return 1;
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Unexpected error:', error);
    process.exitCode = 1;
  });
