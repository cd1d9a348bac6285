/**
 * PDF Text Extraction
 *
 * Primary extraction backend built on pdf-parse. Each page is preceded by a
 * `--- Page N ---` line so the normalizer keeps page boundaries.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import { formatPageMarker } from '../text/index.js';
import {
  type PdfExtractionResult,
  type PdfExtractionOptions,
  type PdfInput,
  PdfExtractionError,
  PdfErrorCode,
  PdfExtractionOptionsSchema,
  classifyErrorMessage,
  createSuccessResult,
  createFailureResult,
} from './types.js';

/**
 * pdf-parse writes a blank line before every rendered page
 */
const PDF_PARSE_PAGE_SEPARATOR = '\n\n';

/**
 * Join page texts, skipping empty pages, each behind its own marker line
 */
export function joinPages(pages: readonly string[], pageMarkers: boolean = true): string {
  const parts: string[] = [];

  pages.forEach((pageText, index) => {
    if (pageText.trim().length === 0) {
      return;
    }
    if (pageMarkers) {
      parts.push(`\n${formatPageMarker(index + 1)}\n`);
    }
    parts.push(pageText);
  });

  return parts.join('\n');
}

/**
 * Split pdf-parse output back into pages.
 *
 * Returns undefined when the segment count does not match the rendered page
 * count, e.g. when a page itself held a blank line.
 */
export function splitPdfParsePages(text: string, renderedPages: number): string[] | undefined {
  const segments = text.split(PDF_PARSE_PAGE_SEPARATOR);
  if (segments[0] === '') {
    segments.shift();
  }
  return segments.length === renderedPages ? segments : undefined;
}

/**
 * Read and validate the PDF bytes of a file path or buffer
 */
export async function readPdfInput(
  input: PdfInput
): Promise<{ buffer: Buffer; filePath: string | undefined }> {
  let buffer: Buffer;
  let filePath: string | undefined;

  if (typeof input === 'string') {
    filePath = input;

    if (!existsSync(input)) {
      throw new PdfExtractionError(`PDF file not found: ${input}`, PdfErrorCode.FILE_NOT_FOUND, {
        filePath: input,
      });
    }

    try {
      buffer = await readFile(input);
    } catch (readError) {
      throw PdfExtractionError.fromError(readError, PdfErrorCode.READ_ERROR, input);
    }
  } else if (Buffer.isBuffer(input)) {
    buffer = input;
  } else {
    throw new PdfExtractionError(
      'Invalid input: expected file path (string) or Buffer',
      PdfErrorCode.EXTRACTION_ERROR
    );
  }

  if (buffer.length === 0) {
    throw new PdfExtractionError('PDF buffer is empty', PdfErrorCode.EMPTY_CONTENT, { filePath });
  }

  // Check for PDF magic bytes (%PDF-)
  const pdfHeader = buffer.subarray(0, 5).toString('ascii');
  if (!pdfHeader.startsWith('%PDF-')) {
    throw new PdfExtractionError(
      'Invalid PDF: file does not start with PDF header',
      PdfErrorCode.INVALID_PDF,
      { filePath }
    );
  }

  return { buffer, filePath };
}

function toInfoRecord(info: unknown): Record<string, unknown> | null {
  if (typeof info !== 'object' || info === null) {
    return null;
  }
  return Object.fromEntries(Object.entries(info));
}

/**
 * Extract text content from a PDF file or buffer with pdf-parse.
 *
 * @example
 * ```typescript
 * const result = await extractPdfText('data/raw_cases/123_Smith_case.pdf');
 * if (result.success) {
 *   console.log(`Extracted ${result.charCount} characters from ${result.pageCount} pages`);
 * }
 * ```
 */
export async function extractPdfText(
  input: PdfInput,
  options?: PdfExtractionOptions
): Promise<PdfExtractionResult> {
  const startTime = performance.now();
  const opts = PdfExtractionOptionsSchema.parse(options ?? {});
  let filePath = typeof input === 'string' ? input : undefined;

  try {
    const pdf = await readPdfInput(input);
    filePath = pdf.filePath;

    const parseOptions: { max?: number } = {};
    if (opts.maxPages !== undefined) {
      parseOptions.max = opts.maxPages;
    }

    const pdfData = await pdfParse(pdf.buffer, parseOptions);
    const durationMs = performance.now() - startTime;

    if (!pdfData.text || pdfData.text.trim().length === 0) {
      return createFailureResult('PDF contains no extractable text (may be image-based or empty)', {
        pageCount: pdfData.numpages,
        durationMs,
        errorCode: PdfErrorCode.EMPTY_CONTENT,
        filePath,
      });
    }

    const pages = splitPdfParsePages(pdfData.text, pdfData.numrender);
    const text = pages ? joinPages(pages, opts.pageMarkers) : pdfData.text.trim();

    return createSuccessResult(text, pdfData.numpages, {
      info: toInfoRecord(pdfData.info),
      durationMs,
      filePath,
    });
  } catch (error) {
    const durationMs = performance.now() - startTime;

    if (error instanceof PdfExtractionError) {
      return createFailureResult(error.message, {
        durationMs,
        errorCode: error.code,
        filePath: error.filePath ?? filePath,
      });
    }

    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorCode = classifyErrorMessage(errorMessage);

    return createFailureResult(
      errorCode === PdfErrorCode.PASSWORD_PROTECTED
        ? 'PDF is password protected'
        : `PDF extraction failed: ${errorMessage}`,
      { durationMs, errorCode, filePath }
    );
  }
}
