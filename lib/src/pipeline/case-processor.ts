/**
 * Case Processor
 *
 * Runs one document through the pipeline:
 * RAW → CLASSIFIED → METADATA_EXTRACTED → CONVERTED → NORMALIZED → DONE.
 *
 * Classification and metadata always see the raw text; normalization always
 * sees the converted text. Any step may end in FAILED.
 */

import { classifyScript, createLineConverter } from '../bengali/index.js';
import { extractCaseMetadata, withConversionFlag } from '../metadata/index.js';
import { createNormalizedDocument, normalizeText } from '../text/index.js';
import { createSilentLogger } from '../logging/index.js';
import {
  type CaseProcessingErrorCode,
  type CaseProcessingResult,
  type CaseProcessor,
  type CaseProcessorOptions,
  CaseProcessingErrorCode as ErrorCode,
  DEFAULT_MIN_TEXT_LENGTH,
  ProcessingState,
} from './types.js';

/**
 * Create a processor bound to a codec, length floor and logger.
 *
 * @example
 * ```typescript
 * const processor = createCaseProcessor({ codec: createBijoyCodec(), logger });
 * const result = processor.processDocument(rawText, '123_Smith_case.pdf');
 * if (result.ok) {
 *   await writeFile(outPath, result.value.document.text);
 * } else {
 *   logger.warn(result.failure.reason);
 * }
 * ```
 */
export function createCaseProcessor(options: CaseProcessorOptions): CaseProcessor {
  const minTextLength = options.minTextLength ?? DEFAULT_MIN_TEXT_LENGTH;
  const logger = options.logger ?? createSilentLogger();
  const converter = createLineConverter({ codec: options.codec, logger });

  const processDocument = (rawText: string, filename: string): CaseProcessingResult => {
    let state: ProcessingState = ProcessingState.RAW;

    const advance = (next: ProcessingState): void => {
      options.onTransition?.(state, next);
      state = next;
    };

    const fail = (code: CaseProcessingErrorCode, reason: string): CaseProcessingResult => {
      const failedAt = state;
      advance(ProcessingState.FAILED);
      logger.warn(`Failed to process ${filename}: ${reason}`, { code, state: failedAt });
      return { ok: false, failure: { code, reason, state: failedAt } };
    };

    const length = rawText.trim().length;
    if (length < minTextLength) {
      return fail(
        ErrorCode.EXTRACTION_INSUFFICIENT,
        `Insufficient text extracted (${length} < ${minTextLength} characters)`
      );
    }

    const classification = classifyScript(rawText);
    advance(ProcessingState.CLASSIFIED);
    if (classification.hasBengali) {
      logger.debug(`Detected Bengali text (${classification.verdict})`, {
        ...classification.stats,
      });
    }

    const extracted = extractCaseMetadata(rawText, filename, classification);
    advance(ProcessingState.METADATA_EXTRACTED);

    const conversion = converter.convertDocument(rawText);
    const metadata = withConversionFlag(extracted, conversion.converted);
    advance(ProcessingState.CONVERTED);

    const document = createNormalizedDocument(normalizeText(conversion.text));
    advance(ProcessingState.NORMALIZED);

    if (document.text.trim().length === 0) {
      return fail(ErrorCode.NORMALIZATION_EMPTY, 'Normalized text is empty');
    }

    advance(ProcessingState.DONE);
    logger.debug(`Processed ${filename}`, {
      words: document.wordCount,
      chars: document.charCount,
    });

    return { ok: true, value: { metadata, document, classification, conversion } };
  };

  return { processDocument };
}

/**
 * Process a single document without keeping a processor around.
 * Conversion is disabled unless a codec is passed.
 */
export function processDocument(
  rawText: string,
  filename: string,
  options?: Partial<CaseProcessorOptions>
): CaseProcessingResult {
  return createCaseProcessor({ ...options, codec: options?.codec ?? null }).processDocument(
    rawText,
    filename
  );
}
