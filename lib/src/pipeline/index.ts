/**
 * Pipeline Module
 *
 * Per-document orchestration of classification, metadata, conversion and
 * normalization.
 */

export {
  ProcessingState,
  ProcessingStateSchema,
  CaseProcessingErrorCode,
  CaseProcessingErrorCodeSchema,
  CaseProcessingError,
  isCaseProcessingError,
  DEFAULT_MIN_TEXT_LENGTH,
  type ProcessedCase,
  type CaseProcessingFailure,
  type CaseProcessingResult,
  type CaseProcessorOptions,
  type CaseProcessor,
} from './types.js';

export { createCaseProcessor, processDocument } from './case-processor.js';
