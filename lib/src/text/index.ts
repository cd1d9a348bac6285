/**
 * Text Module
 *
 * Reflow and cleanup of extracted case text.
 */

export {
  NormalizedDocumentSchema,
  type NormalizedDocument,
  PAGE_MARKER_PREFIX,
  formatPageMarker,
  isPageMarker,
  cleanLines,
  mergeParagraphs,
  normalizeText,
  countWords,
  createNormalizedDocument,
} from './normalizer.js';
