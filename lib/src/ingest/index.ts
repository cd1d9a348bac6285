/**
 * Ingest Module
 *
 * Directory-level batch ingestion of case PDFs.
 */

export {
  IngestConfigSchema,
  type IngestConfig,
  OUTPUT_LAYOUT,
  DocumentStatusSchema,
  type DocumentStatus,
  type DocumentOutcome,
  type BengaliStats,
  type IngestSummary,
  type IngestSummaryJson,
  createEmptySummary,
  toSummaryJson,
} from './types.js';

export { loadIngestConfig } from './config.js';

export {
  createBatchIngester,
  accumulateOutcome,
  logSummary,
  type BatchIngester,
  type BatchIngesterOptions,
} from './batch-ingester.js';
