/**
 * Batch Ingestion Types
 *
 * Configuration, per-document outcomes and the run summary of a batch over
 * a directory of case PDFs.
 */

import { z } from 'zod';
import type { CaseMetadata } from '../metadata/index.js';

// =============================================================================
// Configuration
// =============================================================================

export const IngestConfigSchema = z.object({
  /** Directory scanned for `*.pdf` */
  inputDir: z.string().min(1).default('data/raw_cases'),
  /** Receives `<stem>.txt`, `metadata/` and the summary */
  outputDir: z.string().min(1).default('data/extracted_cases'),
  /** Convert Bijoy lines to Unicode Bengali */
  convertBijoy: z.boolean().default(true),
  /** Minimum trimmed length of extracted text */
  minTextLength: z.number().int().nonnegative().default(100),
  /** Documents processed at once */
  concurrency: z.number().int().positive().default(1),
  /** Per-document extraction timeout in milliseconds */
  timeoutMs: z.number().int().positive().default(60000),
  /** Write `processing_summary.json` at the end of a run */
  writeSummary: z.boolean().default(true),
});

export type IngestConfig = z.infer<typeof IngestConfigSchema>;

/**
 * Output layout inside `outputDir`
 */
export const OUTPUT_LAYOUT = {
  metadataDir: 'metadata',
  metadataSuffix: '_metadata.json',
  summaryFile: 'processing_summary.json',
} as const;

// =============================================================================
// Outcomes
// =============================================================================

export const DocumentStatusSchema = z.enum(['success', 'failed']);

export type DocumentStatus = z.infer<typeof DocumentStatusSchema>;

export interface DocumentOutcome {
  /** Path of the source PDF */
  input: string;
  /** Path of the written text file, null on failure */
  output: string | null;
  status: DocumentStatus;
  error?: string;
  wordCount: number;
  charCount: number;
  /** Present on success */
  metadata?: CaseMetadata;
}

export interface BengaliStats {
  unicode: number;
  bijoy: number;
  mixed: number;
  none: number;
  converted: number;
}

export interface IngestSummary {
  total: number;
  successful: number;
  failed: number;
  files: Array<Omit<DocumentOutcome, 'metadata'>>;
  bengaliStats: BengaliStats;
  totalWords: number;
  totalChars: number;
}

/**
 * Persisted form of the summary
 */
export interface IngestSummaryJson {
  total: number;
  successful: number;
  failed: number;
  files: Array<{
    input: string;
    output: string | null;
    status: DocumentStatus;
    error?: string;
    word_count: number;
    char_count: number;
  }>;
  bengali_stats: BengaliStats;
  total_words: number;
  total_chars: number;
}

export function createEmptySummary(total: number = 0): IngestSummary {
  return {
    total,
    successful: 0,
    failed: 0,
    files: [],
    bengaliStats: { unicode: 0, bijoy: 0, mixed: 0, none: 0, converted: 0 },
    totalWords: 0,
    totalChars: 0,
  };
}

export function toSummaryJson(summary: IngestSummary): IngestSummaryJson {
  return {
    total: summary.total,
    successful: summary.successful,
    failed: summary.failed,
    files: summary.files.map((file) => ({
      input: file.input,
      output: file.output,
      status: file.status,
      ...(file.error !== undefined ? { error: file.error } : {}),
      word_count: file.wordCount,
      char_count: file.charCount,
    })),
    bengali_stats: { ...summary.bengaliStats },
    total_words: summary.totalWords,
    total_chars: summary.totalChars,
  };
}
