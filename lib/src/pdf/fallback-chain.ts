/**
 * PDF Extraction Fallback Chain
 *
 * Implements a fallback chain for PDF text extraction:
 * 1. pdf-parse (primary - fast, good for text-based PDFs)
 * 2. pdf.js (secondary - better compatibility, handles complex PDFs)
 *
 * The chain moves to the next method when the current one fails, throws,
 * times out, or yields fewer than `minCharCount` trimmed characters. When no
 * method reaches `minCharCount`, the last non-empty output is returned and the
 * caller's own length check decides.
 */

import { z } from 'zod';
import {
  type PdfExtractionResult,
  type PdfExtractionOptions,
  type PdfInput,
  type ExtractionMethod,
  ExtractionMethodSchema,
  PdfExtractionError,
  PdfErrorCode,
  classifyErrorMessage,
  createSuccessResult,
  createFailureResult,
  PdfExtractionOptionsSchema,
} from './types.js';
import { extractPdfText, joinPages, readPdfInput } from './extractor.js';

// =============================================================================
// Types and Schemas
// =============================================================================

export const FallbackChainOptionsSchema = z.object({
  /** Enable pdf-parse as the first method (default: true) */
  enablePdfParse: z.boolean().default(true),
  /** Enable pdf.js as fallback (default: true) */
  enablePdfJs: z.boolean().default(true),
  /** Minimum trimmed character count to accept a method's output (default: 100) */
  minCharCount: z.number().int().nonnegative().default(100),
  /** Timeout for each extraction method in milliseconds (default: 60000) */
  timeoutMs: z.number().int().positive().default(60000),
  /** Callback for method attempt notifications */
  onMethodAttempt: z
    .function()
    .args(ExtractionMethodSchema, z.boolean(), z.string().optional())
    .returns(z.void())
    .optional(),
});

export type FallbackChainOptions = z.input<typeof FallbackChainOptionsSchema>;

export interface FallbackChainResult {
  /** The extraction result */
  result: PdfExtractionResult;
  /** Methods attempted in order */
  methodsAttempted: ExtractionMethod[];
  /** Which method ultimately succeeded (or undefined if all failed) */
  successfulMethod: ExtractionMethod | undefined;
  /** Error messages from failed methods */
  failedAttempts: Array<{ method: ExtractionMethod; error: string; durationMs: number }>;
  /** Total duration across all attempts */
  totalDurationMs: number;
}

// =============================================================================
// PDF.js Extractor
// =============================================================================

/**
 * Extract text from a PDF using pdf.js
 *
 * pdf.js is Mozilla's PDF rendering library and provides better
 * compatibility with complex PDFs than pdf-parse. Text items on the same
 * baseline are joined with spaces, a change of baseline starts a new line.
 */
export async function extractWithPdfJs(
  input: PdfInput,
  options?: PdfExtractionOptions
): Promise<PdfExtractionResult> {
  const startTime = performance.now();
  const opts = PdfExtractionOptionsSchema.parse(options ?? {});
  let filePath = typeof input === 'string' ? input : undefined;

  try {
    const pdf = await readPdfInput(input);
    filePath = pdf.filePath;

    // Dynamic import of pdfjs-dist to avoid loading it if not needed
    const pdfjsLib = await import('pdfjs-dist');

    const loadingTask = pdfjsLib.getDocument({
      data: new Uint8Array(pdf.buffer),
      useWorkerFetch: false,
      isEvalSupported: false,
      useSystemFonts: true,
    });

    const pdfDocument = await loadingTask.promise;
    const numPages = pdfDocument.numPages;
    const pagesToProcess = Math.min(opts.maxPages ?? numPages, numPages);

    const pages: string[] = [];

    try {
      for (let pageNum = 1; pageNum <= pagesToProcess; pageNum++) {
        const page = await pdfDocument.getPage(pageNum);
        const textContent = await page.getTextContent();

        let pageText = '';
        let lastY: number | undefined;

        for (const item of textContent.items) {
          if (!('str' in item)) {
            continue;
          }
          const y = item.transform[5];
          if (lastY !== undefined && y !== lastY) {
            pageText += '\n';
          } else if (pageText.length > 0) {
            pageText += ' ';
          }
          pageText += item.str;
          lastY = y;
        }

        pages.push(pageText);
      }
    } finally {
      await pdfDocument.destroy();
    }

    const text = joinPages(pages, opts.pageMarkers);
    const durationMs = performance.now() - startTime;

    if (text.trim().length === 0) {
      return createFailureResult('PDF contains no extractable text using pdf.js (may be image-based)', {
        pageCount: numPages,
        durationMs,
        errorCode: PdfErrorCode.EMPTY_CONTENT,
        method: 'pdfjs',
        filePath,
      });
    }

    return createSuccessResult(text, numPages, {
      durationMs,
      method: 'pdfjs',
      filePath,
    });
  } catch (error) {
    const durationMs = performance.now() - startTime;

    if (error instanceof PdfExtractionError) {
      return createFailureResult(error.message, {
        durationMs,
        errorCode: error.code,
        method: 'pdfjs',
        filePath: error.filePath ?? filePath,
      });
    }

    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorCode = classifyErrorMessage(errorMessage);

    return createFailureResult(
      errorCode === PdfErrorCode.PASSWORD_PROTECTED
        ? 'PDF is password protected'
        : `pdf.js extraction failed: ${errorMessage}`,
      { durationMs, errorCode, method: 'pdfjs', filePath }
    );
  }
}

// =============================================================================
// Fallback Chain
// =============================================================================

type Extractor = (input: PdfInput, options?: PdfExtractionOptions) => Promise<PdfExtractionResult>;

const EXTRACTORS: ReadonlyArray<{ method: ExtractionMethod; extract: Extractor }> = [
  { method: 'pdf-parse', extract: extractPdfText },
  { method: 'pdfjs', extract: extractWithPdfJs },
];

/**
 * Race a promise against a timer; the timer is cleared either way
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () =>
        reject(
          new PdfExtractionError(`${label} timed out after ${timeoutMs}ms`, PdfErrorCode.TIMEOUT)
        ),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Extract text from a PDF, trying pdf-parse first and pdf.js second.
 *
 * @example
 * ```typescript
 * const { result, successfulMethod } = await extractWithFallbackChain(pdfPath);
 * if (result.success) {
 *   console.log(`Extracted using ${successfulMethod}`);
 * }
 * ```
 */
export async function extractWithFallbackChain(
  input: PdfInput,
  extractionOptions?: PdfExtractionOptions,
  chainOptions?: FallbackChainOptions
): Promise<FallbackChainResult> {
  const startTime = performance.now();
  const opts = FallbackChainOptionsSchema.parse(chainOptions ?? {});
  const enabled: Record<ExtractionMethod, boolean> = {
    'pdf-parse': opts.enablePdfParse,
    pdfjs: opts.enablePdfJs,
    fallback: false,
  };

  const methodsAttempted: ExtractionMethod[] = [];
  const failedAttempts: FallbackChainResult['failedAttempts'] = [];
  let shortResult: { method: ExtractionMethod; result: PdfExtractionResult } | undefined;

  const recordFailure = (method: ExtractionMethod, error: string, durationMs: number): void => {
    failedAttempts.push({ method, error, durationMs });
    opts.onMethodAttempt?.(method, false, error);
  };

  for (const { method, extract } of EXTRACTORS) {
    if (!enabled[method]) {
      continue;
    }

    methodsAttempted.push(method);
    const methodStart = performance.now();

    try {
      const result = await withTimeout(
        extract(input, extractionOptions),
        opts.timeoutMs,
        `${method} extraction`
      );

      if (result.success && result.text.trim().length >= opts.minCharCount) {
        opts.onMethodAttempt?.(method, true, undefined);
        return {
          result,
          methodsAttempted,
          successfulMethod: method,
          failedAttempts,
          totalDurationMs: performance.now() - startTime,
        };
      }

      if (result.success && result.text.trim().length > 0) {
        shortResult = { method, result };
      }
      recordFailure(
        method,
        result.error ?? 'Insufficient content extracted',
        performance.now() - methodStart
      );
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      recordFailure(method, errorMessage, performance.now() - methodStart);
    }
  }

  const totalDurationMs = performance.now() - startTime;

  if (shortResult) {
    return {
      result: shortResult.result,
      methodsAttempted,
      successfulMethod: shortResult.method,
      failedAttempts,
      totalDurationMs,
    };
  }

  const lastError = failedAttempts[failedAttempts.length - 1];
  const errorMessage = lastError
    ? `All extraction methods failed. Last error: ${lastError.error}`
    : 'No extraction methods were enabled';

  return {
    result: createFailureResult(errorMessage, {
      durationMs: totalDurationMs,
      errorCode: PdfErrorCode.EXTRACTION_ERROR,
      method: 'fallback',
      filePath: typeof input === 'string' ? input : undefined,
    }),
    methodsAttempted,
    successfulMethod: undefined,
    failedAttempts,
    totalDurationMs,
  };
}

/**
 * Text extraction capability for the batch ingester: the chain's text, or an
 * empty string when every method failed. Pass the ingester's minimum text
 * length as `minCharCount` so both apply the same floor.
 */
export function createTextExtractor(
  chainOptions?: FallbackChainOptions
): (filePath: string) => Promise<string> {
  return async (filePath: string): Promise<string> => {
    const { result } = await extractWithFallbackChain(filePath, undefined, chainOptions);
    return result.success ? result.text : '';
  };
}

/**
 * Format fallback chain result for logging
 */
export function formatFallbackChainResult(result: FallbackChainResult): string {
  const lines: string[] = [];

  if (result.result.success) {
    lines.push(`✓ Success using ${result.successfulMethod ?? 'unknown'}`);
    lines.push(`  Characters: ${result.result.charCount.toLocaleString()}`);
    lines.push(`  Pages: ${result.result.pageCount}`);
  } else {
    lines.push(`✗ All methods failed`);
    lines.push(`  Error: ${result.result.error ?? 'unknown'}`);
  }

  lines.push(`  Duration: ${result.totalDurationMs.toFixed(0)}ms`);
  lines.push(`  Methods attempted: ${result.methodsAttempted.join(' → ')}`);

  if (result.failedAttempts.length > 0) {
    lines.push('  Failed attempts:');
    for (const attempt of result.failedAttempts) {
      lines.push(`    - ${attempt.method}: ${attempt.error} (${attempt.durationMs.toFixed(0)}ms)`);
    }
  }

  return lines.join('\n');
}
