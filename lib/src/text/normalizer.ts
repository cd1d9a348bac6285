/**
 * Text Normalizer
 *
 * Reflows raw, page-delimited PDF extraction output into clean paragraphs.
 * Page markers survive as paragraphs of their own; wrapped lines are merged
 * back into sentences.
 */

import { z } from 'zod';

// ============================================================================
// Types and Schemas
// ============================================================================

export const NormalizedDocumentSchema = z.object({
  /** Paragraphs separated by a blank line */
  text: z.string(),
  /** Whitespace-separated word count */
  wordCount: z.number().int().nonnegative(),
  /** Character count (UTF-16 code units) */
  charCount: z.number().int().nonnegative(),
});

export type NormalizedDocument = z.infer<typeof NormalizedDocumentSchema>;

// ============================================================================
// Constants
// ============================================================================

/**
 * Prefix of the synthetic lines the extraction layer inserts between pages
 */
export const PAGE_MARKER_PREFIX = '--- Page';

/** Every line break a PDF text layer may produce */
const LINE_BREAK_PATTERN = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

/** Sentence-terminal punctuation, including the Bengali dari (।) */
const TERMINAL_PUNCTUATION_PATTERN = /[.:;?!।]$/;

const PARAGRAPH_SEPARATOR = '\n\n';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Format the page marker for a 1-based page number
 */
export function formatPageMarker(pageNumber: number): string {
  return `${PAGE_MARKER_PREFIX} ${pageNumber} ---`;
}

export function isPageMarker(line: string): boolean {
  return line.startsWith(PAGE_MARKER_PREFIX);
}

function isLowercaseLetter(char: string | undefined): boolean {
  if (char === undefined) return false;
  return char !== char.toUpperCase() && char === char.toLowerCase();
}

/**
 * Split into trimmed, whitespace-collapsed lines, dropping empty and
 * single-character lines
 */
export function cleanLines(text: string): string[] {
  const lines: string[] = [];

  for (const rawLine of text.split(LINE_BREAK_PATTERN)) {
    const trimmed = rawLine.trim();
    if (!trimmed) continue;

    const line = trimmed.replace(/\s+/g, ' ');
    if ([...line].length > 1) {
      lines.push(line);
    }
  }

  return lines;
}

/**
 * Merge wrapped lines into paragraphs.
 *
 * - A page marker flushes the buffer and becomes its own paragraph.
 * - A buffer ending in terminal punctuation is flushed before the next line.
 * - A buffer ending in a hyphen joins a lowercase continuation without the hyphen.
 * - Otherwise lines are joined with a single space.
 */
export function mergeParagraphs(lines: readonly string[]): string[] {
  const paragraphs: string[] = [];
  let buffer = '';

  for (const line of lines) {
    if (isPageMarker(line)) {
      if (buffer) {
        paragraphs.push(buffer);
        buffer = '';
      }
      paragraphs.push(line);
      continue;
    }

    if (!buffer) {
      buffer = line;
    } else if (TERMINAL_PUNCTUATION_PATTERN.test(buffer)) {
      paragraphs.push(buffer);
      buffer = line;
    } else if (buffer.endsWith('-') && isLowercaseLetter(line[0])) {
      buffer = buffer.slice(0, -1) + line;
    } else {
      buffer = `${buffer} ${line}`;
    }
  }

  if (buffer) {
    paragraphs.push(buffer);
  }

  return paragraphs;
}

// ============================================================================
// Main Functions
// ============================================================================

/**
 * Normalize extracted text into paragraph-structured prose.
 *
 * Empty input yields an empty string; the caller decides whether that is a
 * failure.
 *
 * @example
 * ```typescript
 * normalizeText('--- Page 1 ---\nThe appeal is\nallowed.\nNo costs.');
 * // '--- Page 1 ---\n\nThe appeal is allowed.\n\nNo costs.'
 * ```
 */
export function normalizeText(text: string): string {
  if (!text) {
    return '';
  }

  const paragraphs = mergeParagraphs(cleanLines(text));

  return paragraphs
    .join(PARAGRAPH_SEPARATOR)
    .replace(/\n{3,}/g, PARAGRAPH_SEPARATOR)
    .replace(/\s+([.,;:!?])/g, '$1');
}

/**
 * Count whitespace-separated words
 */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * Wrap normalized text with its derived counts
 */
export function createNormalizedDocument(text: string): NormalizedDocument {
  return Object.freeze({
    text,
    wordCount: countWords(text),
    charCount: text.length,
  });
}
