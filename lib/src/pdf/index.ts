/**
 * PDF Processing Module
 *
 * Raw text extraction from case PDFs.
 */

// Types and schemas
export {
  PdfExtractionResultSchema,
  PdfExtractionOptionsSchema,
  PdfErrorCodeSchema,
  ExtractionMethodSchema,
  PdfErrorCode,
  PdfExtractionError,
  isPdfExtractionError,
  createSuccessResult,
  createFailureResult,
  classifyErrorMessage,
  type PdfExtractionResult,
  type PdfExtractionOptions,
  type PdfInput,
  type ExtractionMethod,
} from './types.js';

// pdf-parse backend
export { extractPdfText, joinPages, splitPdfParsePages, readPdfInput } from './extractor.js';

// Fallback chain (pdf-parse → pdf.js)
export {
  FallbackChainOptionsSchema,
  type FallbackChainOptions,
  type FallbackChainResult,
  extractWithPdfJs,
  extractWithFallbackChain,
  createTextExtractor,
  withTimeout,
  formatFallbackChainResult,
} from './fallback-chain.js';
