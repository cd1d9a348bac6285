/**
 * Case Processing Types
 *
 * States, error codes and results of the per-document pipeline.
 */

import { z } from 'zod';
import type { ConversionResult, LegacyCodec, ScriptClassification } from '../bengali/index.js';
import type { CaseMetadata } from '../metadata/index.js';
import type { NormalizedDocument } from '../text/index.js';
import type { Logger } from '../logging/index.js';

// =============================================================================
// Processing State
// =============================================================================

/**
 * Pipeline states in the order a document passes through them
 */
export const ProcessingState = {
  RAW: 'RAW',
  CLASSIFIED: 'CLASSIFIED',
  METADATA_EXTRACTED: 'METADATA_EXTRACTED',
  CONVERTED: 'CONVERTED',
  NORMALIZED: 'NORMALIZED',
  DONE: 'DONE',
  FAILED: 'FAILED',
} as const;

export type ProcessingState = (typeof ProcessingState)[keyof typeof ProcessingState];

export const ProcessingStateSchema = z.enum([
  'RAW',
  'CLASSIFIED',
  'METADATA_EXTRACTED',
  'CONVERTED',
  'NORMALIZED',
  'DONE',
  'FAILED',
]);

// =============================================================================
// Error Codes
// =============================================================================

export const CaseProcessingErrorCode = {
  /** Raw text shorter than the minimum length after trimming */
  EXTRACTION_INSUFFICIENT: 'EXTRACTION_INSUFFICIENT',
  /** Nothing left after reflow and cleanup */
  NORMALIZATION_EMPTY: 'NORMALIZATION_EMPTY',
} as const;

export type CaseProcessingErrorCode =
  (typeof CaseProcessingErrorCode)[keyof typeof CaseProcessingErrorCode];

export const CaseProcessingErrorCodeSchema = z.enum([
  'EXTRACTION_INSUFFICIENT',
  'NORMALIZATION_EMPTY',
]);

/**
 * Default minimum trimmed length of usable raw text
 */
export const DEFAULT_MIN_TEXT_LENGTH = 100;

// =============================================================================
// Error Class
// =============================================================================

export class CaseProcessingError extends Error {
  readonly code: CaseProcessingErrorCode;
  readonly filePath: string | undefined;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: CaseProcessingErrorCode,
    options?: { filePath?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'CaseProcessingError';
    this.code = code;
    this.filePath = options?.filePath;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CaseProcessingError);
    }
  }

  /**
   * Build an error from a failed processing outcome
   */
  static fromFailure(failure: CaseProcessingFailure, filePath?: string): CaseProcessingError {
    return new CaseProcessingError(failure.reason, failure.code, { filePath });
  }
}

export function isCaseProcessingError(error: unknown): error is CaseProcessingError {
  return error instanceof CaseProcessingError;
}

// =============================================================================
// Results
// =============================================================================

export interface ProcessedCase {
  readonly metadata: CaseMetadata;
  readonly document: NormalizedDocument;
  readonly classification: ScriptClassification;
  readonly conversion: ConversionResult;
}

export interface CaseProcessingFailure {
  readonly code: CaseProcessingErrorCode;
  readonly reason: string;
  /** Last state reached before failing */
  readonly state: ProcessingState;
}

export type CaseProcessingResult =
  | { readonly ok: true; readonly value: ProcessedCase }
  | { readonly ok: false; readonly failure: CaseProcessingFailure };

// =============================================================================
// Options
// =============================================================================

export interface CaseProcessorOptions {
  /** Codec for Bijoy lines; `null` leaves Bijoy text unconverted */
  codec: LegacyCodec | null;
  minTextLength?: number;
  logger?: Logger;
  /** Called on every state change, including the move to FAILED */
  onTransition?: (from: ProcessingState, to: ProcessingState) => void;
}

export interface CaseProcessor {
  processDocument(rawText: string, filename: string): CaseProcessingResult;
}
