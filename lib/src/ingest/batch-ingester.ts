/**
 * Batch Ingester
 *
 * Runs every PDF of an input directory through extraction and the case
 * processor, writes the cleaned text and metadata of each case, and reduces
 * the per-document outcomes into one run summary.
 *
 * Output layout:
 *   <outputDir>/<stem>.txt
 *   <outputDir>/metadata/<stem>_metadata.json
 *   <outputDir>/processing_summary.json
 */

import { mkdir, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createBijoyCodec } from '../bengali/index.js';
import { toMetadataJson } from '../metadata/index.js';
import { type CaseProcessor, createCaseProcessor } from '../pipeline/index.js';
import { createTextExtractor, withTimeout } from '../pdf/index.js';
import { type Logger, createSilentLogger } from '../logging/index.js';
import { type ProgressEntry, ProgressReporter } from '../progress/index.js';
import {
  type DocumentOutcome,
  type IngestConfig,
  type IngestSummary,
  IngestConfigSchema,
  OUTPUT_LAYOUT,
  createEmptySummary,
  toSummaryJson,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface BatchIngesterOptions {
  config?: Partial<IngestConfig>;
  /** Extraction capability; returns an empty string on total failure */
  extractText?: (filePath: string) => Promise<string>;
  /** Defaults to a processor built from `config` */
  processor?: CaseProcessor;
  logger?: Logger;
  onProgress?: (entry: ProgressEntry) => void;
}

export interface BatchIngester {
  readonly config: IngestConfig;
  /** `*.pdf` files of the input directory, sorted by name */
  discoverPdfs(): Promise<string[]>;
  ingestFile(pdfPath: string): Promise<DocumentOutcome>;
  ingestDirectory(): Promise<IngestSummary>;
}

// =============================================================================
// Summary Reduction
// =============================================================================

/**
 * Fold one document outcome into the run summary
 */
export function accumulateOutcome(summary: IngestSummary, outcome: DocumentOutcome): IngestSummary {
  const { metadata, ...file } = outcome;
  const next: IngestSummary = {
    ...summary,
    files: [...summary.files, file],
    bengaliStats: { ...summary.bengaliStats },
  };

  if (outcome.status === 'failed') {
    next.failed++;
    return next;
  }

  next.successful++;
  next.totalWords += outcome.wordCount;
  next.totalChars += outcome.charCount;

  const encoding = metadata?.originalEncoding;
  if (encoding) {
    next.bengaliStats[encoding]++;
    if (metadata?.convertedToUnicode) {
      next.bengaliStats.converted++;
    }
  } else {
    next.bengaliStats.none++;
  }

  return next;
}

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a batch ingester.
 *
 * @example
 * ```typescript
 * const ingester = createBatchIngester({
 *   config: { inputDir: 'data/raw_cases', outputDir: 'data/extracted_cases' },
 *   logger: createLogger('ingest'),
 * });
 * const summary = await ingester.ingestDirectory();
 * process.exitCode = summary.failed === 0 ? 0 : 1;
 * ```
 */
export function createBatchIngester(options: BatchIngesterOptions = {}): BatchIngester {
  const config = IngestConfigSchema.parse(options.config ?? {});
  const logger = options.logger ?? createSilentLogger();
  const extractText =
    options.extractText ??
    createTextExtractor({ timeoutMs: config.timeoutMs, minCharCount: config.minTextLength });
  const processor =
    options.processor ??
    createCaseProcessor({
      codec: config.convertBijoy ? createBijoyCodec() : null,
      minTextLength: config.minTextLength,
      logger: logger.child('processor'),
    });

  const metadataDir = path.join(config.outputDir, OUTPUT_LAYOUT.metadataDir);

  const discoverPdfs = async (): Promise<string[]> => {
    try {
      const entries = await readdir(config.inputDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === '.pdf')
        .map((entry) => entry.name)
        .sort()
        .map((name) => path.join(config.inputDir, name));
    } catch (error) {
      if (isMissingDirectory(error)) {
        return [];
      }
      throw error;
    }
  };

  const ingestFile = async (pdfPath: string): Promise<DocumentOutcome> => {
    const fileName = path.basename(pdfPath);
    const stem = path.parse(pdfPath).name;
    const failed = (error: string): DocumentOutcome => ({
      input: pdfPath,
      output: null,
      status: 'failed',
      error,
      wordCount: 0,
      charCount: 0,
    });

    logger.info(`Processing: ${fileName}`);

    try {
      const rawText = await withTimeout(
        extractText(pdfPath),
        config.timeoutMs,
        `Extraction of ${fileName}`
      );

      const result = processor.processDocument(rawText, fileName);
      if (!result.ok) {
        return failed(result.failure.reason);
      }

      const { metadata, document } = result.value;
      const textPath = path.join(config.outputDir, `${stem}.txt`);
      const metadataPath = path.join(metadataDir, `${stem}${OUTPUT_LAYOUT.metadataSuffix}`);

      await writeFile(textPath, document.text, 'utf-8');
      await writeFile(metadataPath, JSON.stringify(toMetadataJson(metadata), null, 2), 'utf-8');

      const bengaliInfo = metadata.originalEncoding
        ? ` [Bengali: ${metadata.originalEncoding}${metadata.convertedToUnicode ? ' → Unicode' : ' (preserved)'}]`
        : '';
      logger.info(`✓ Saved: ${path.basename(textPath)}`);
      logger.info(
        `  Stats: ${document.wordCount.toLocaleString()} words, ` +
          `${document.charCount.toLocaleString()} characters${bengaliInfo}`
      );
      logger.info(`  Metadata: Case ${metadata.caseNumber ?? 'Unknown'}`);

      return {
        input: pdfPath,
        output: textPath,
        status: 'success',
        wordCount: document.wordCount,
        charCount: document.charCount,
        metadata,
      };
    } catch (error) {
      const message = errorMessage(error);
      logger.error(
        `Error processing ${fileName}`,
        error instanceof Error ? error : new Error(message)
      );
      return failed(message);
    }
  };

  const ingestDirectory = async (): Promise<IngestSummary> => {
    const pdfFiles = await discoverPdfs();

    if (pdfFiles.length === 0) {
      logger.error(`No PDF files in ${config.inputDir}`);
      return createEmptySummary(0);
    }

    logger.info(`Found ${pdfFiles.length} PDF files`);
    await mkdir(metadataDir, { recursive: true });

    const progress = new ProgressReporter(pdfFiles.length, {
      logger,
      operationName: 'Ingestion',
      onProgress: options.onProgress,
    });
    progress.start();

    let summary = createEmptySummary(pdfFiles.length);

    // Documents are independent; outcomes are folded here, in input order
    for (let i = 0; i < pdfFiles.length; i += config.concurrency) {
      const chunk = pdfFiles.slice(i, i + config.concurrency);
      const outcomes = await Promise.all(chunk.map((pdfPath) => ingestFile(pdfPath)));

      for (const outcome of outcomes) {
        summary = accumulateOutcome(summary, outcome);
        if (outcome.status === 'success') {
          progress.success(outcome.input);
        } else {
          progress.fail(outcome.input, outcome.error);
        }
      }
    }

    progress.complete();

    if (config.writeSummary) {
      const summaryPath = path.join(config.outputDir, OUTPUT_LAYOUT.summaryFile);
      await writeFile(summaryPath, JSON.stringify(toSummaryJson(summary), null, 2), 'utf-8');
    }

    logSummary(logger, summary);
    return summary;
  };

  return { config, discoverPdfs, ingestFile, ingestDirectory };
}

/**
 * Log the end-of-run report
 */
export function logSummary(logger: Logger, summary: IngestSummary): void {
  const rule = '='.repeat(60);
  const { bengaliStats } = summary;

  logger.info(rule);
  logger.info('Processing Complete!');
  logger.info(
    `Total: ${summary.total}, Success: ${summary.successful}, Failed: ${summary.failed}`
  );
  logger.info('Bengali Detection:');
  logger.info(`  Unicode: ${bengaliStats.unicode}`);
  logger.info(`  Bijoy: ${bengaliStats.bijoy}`);
  logger.info(`  Mixed: ${bengaliStats.mixed}`);
  logger.info(`  None: ${bengaliStats.none}`);
  logger.info(`  Converted to Unicode: ${bengaliStats.converted}`);
  logger.info(rule);
}
