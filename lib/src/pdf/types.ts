/**
 * PDF Extraction Types
 *
 * Result shapes and error codes for turning case PDFs into raw text.
 */

import { z } from 'zod';

// =============================================================================
// Error Codes (must be defined first for use in schemas)
// =============================================================================

/**
 * Error codes for PDF extraction failures
 */
export const PdfErrorCode = {
  /** File not found or path invalid */
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  /** Invalid or corrupted PDF */
  INVALID_PDF: 'INVALID_PDF',
  /** PDF is password protected */
  PASSWORD_PROTECTED: 'PASSWORD_PROTECTED',
  /** Empty PDF or no extractable text */
  EMPTY_CONTENT: 'EMPTY_CONTENT',
  /** Read error (permissions, etc.) */
  READ_ERROR: 'READ_ERROR',
  /** Unknown extraction error */
  EXTRACTION_ERROR: 'EXTRACTION_ERROR',
  /** Timeout during extraction */
  TIMEOUT: 'TIMEOUT',
} as const;

export type PdfErrorCode = (typeof PdfErrorCode)[keyof typeof PdfErrorCode];

export const PdfErrorCodeSchema = z.enum([
  'FILE_NOT_FOUND',
  'INVALID_PDF',
  'PASSWORD_PROTECTED',
  'EMPTY_CONTENT',
  'READ_ERROR',
  'EXTRACTION_ERROR',
  'TIMEOUT',
]);

// =============================================================================
// Extraction Schemas
// =============================================================================

/**
 * Extraction backend; `fallback` marks a chain result where every backend failed
 */
export const ExtractionMethodSchema = z.enum(['pdf-parse', 'pdfjs', 'fallback']);

export type ExtractionMethod = z.infer<typeof ExtractionMethodSchema>;

export const PdfExtractionResultSchema = z.object({
  /** Extracted text with a page marker line before each page */
  text: z.string(),
  pageCount: z.number().int().nonnegative(),
  /** PDF info dictionary if available */
  info: z.record(z.unknown()).nullable().optional(),
  charCount: z.number().int().nonnegative(),
  success: z.boolean(),
  error: z.string().nullable().optional(),
  errorCode: PdfErrorCodeSchema.optional(),
  method: ExtractionMethodSchema.default('pdf-parse'),
  durationMs: z.number().nonnegative().optional(),
  filePath: z.string().optional(),
});

export type PdfExtractionResult = z.infer<typeof PdfExtractionResultSchema>;

export const PdfExtractionOptionsSchema = z.object({
  /** Maximum number of pages to extract (undefined = all pages) */
  maxPages: z.number().int().positive().optional(),
  /** Prefix each page with a `--- Page N ---` line (default: true) */
  pageMarkers: z.boolean().default(true),
});

export type PdfExtractionOptions = z.input<typeof PdfExtractionOptionsSchema>;

/**
 * Input source for PDF extraction
 */
export type PdfInput = Buffer | string;

// =============================================================================
// Error Classes
// =============================================================================

export class PdfExtractionError extends Error {
  readonly code: PdfErrorCode;
  readonly filePath: string | undefined;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: PdfErrorCode,
    options?: { filePath?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'PdfExtractionError';
    this.code = code;
    this.filePath = options?.filePath;
    this.cause = options?.cause;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PdfExtractionError);
    }
  }

  /**
   * Create a PdfExtractionError from an unknown error
   */
  static fromError(error: unknown, code?: PdfErrorCode, filePath?: string): PdfExtractionError {
    if (error instanceof PdfExtractionError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    return new PdfExtractionError(message, code ?? PdfErrorCode.EXTRACTION_ERROR, {
      filePath,
      cause,
    });
  }
}

export function isPdfExtractionError(error: unknown): error is PdfExtractionError {
  return error instanceof PdfExtractionError;
}

// =============================================================================
// Result Factory Functions
// =============================================================================

export function createSuccessResult(
  text: string,
  pageCount: number,
  options?: {
    info?: Record<string, unknown> | null;
    durationMs?: number;
    method?: ExtractionMethod;
    filePath?: string;
  }
): PdfExtractionResult {
  return {
    text,
    pageCount,
    charCount: text.length,
    success: true,
    error: null,
    method: options?.method ?? 'pdf-parse',
    info: options?.info ?? null,
    durationMs: options?.durationMs,
    filePath: options?.filePath,
  };
}

export function createFailureResult(
  error: string,
  options?: {
    pageCount?: number;
    durationMs?: number;
    errorCode?: PdfErrorCode;
    method?: ExtractionMethod;
    filePath?: string;
  }
): PdfExtractionResult {
  return {
    text: '',
    pageCount: options?.pageCount ?? 0,
    charCount: 0,
    success: false,
    error,
    errorCode: options?.errorCode,
    method: options?.method ?? 'pdf-parse',
    info: null,
    durationMs: options?.durationMs,
    filePath: options?.filePath,
  };
}

// =============================================================================
// Error Classification
// =============================================================================

/**
 * Map a backend error message to an error code
 */
export function classifyErrorMessage(message: string): PdfErrorCode {
  const lower = message.toLowerCase();

  if (lower.includes('password') || lower.includes('encrypted')) {
    return PdfErrorCode.PASSWORD_PROTECTED;
  }
  if (lower.includes('invalid') || lower.includes('corrupt') || lower.includes('xref')) {
    return PdfErrorCode.INVALID_PDF;
  }
  if (lower.includes('timeout') || lower.includes('timed out') || lower.includes('etimedout')) {
    return PdfErrorCode.TIMEOUT;
  }
  return PdfErrorCode.EXTRACTION_ERROR;
}
