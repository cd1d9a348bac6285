/**
 * Bengali Script Classifier
 *
 * Classifies the dominant Bengali encoding of extracted text by counting
 * Unicode Bengali code points and Bijoy indicators.
 */

import {
  type ScriptClassification,
  type ScriptStats,
  ScriptVerdict,
  SCRIPT_THRESHOLDS,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Unicode Bengali block
 */
const BENGALI_RANGE = {
  START: 0x0980,
  END: 0x09ff,
};

/**
 * Characters that Bijoy-encoded text renders through.
 *
 * The upper half of Windows-1252 (0x86..0x9F and 0xA0..0xF0) as it appears
 * once the font mapping is lost.
 */
const BIJOY_CHARS: ReadonlySet<string> = new Set([
  ...'†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ',
  '\u00a0',
  ...'¡¢£¤¥¦§¨©ª«¬',
  '\u00ad',
  ...'®¯°±²³´µ¶·¸¹º»¼½¾¿',
  ...'ÀÁÂÃÄÅÆÇÈÉÊËÌÍÎÏÐÑÒÓÔÕÖ×ØÙÚÛÜÝÞß',
  ...'àáâãäåæçèéêëìíîïð',
]);

/**
 * Glyph sequences that spell common Bengali words under the Bijoy mapping
 * (আমার, আে, কে, তারি, করি, ছি, মানুষ, রাত্র, টাকা, ঋণ, আইন, আদালত, আমি, হয়ে, বলে)
 */
const BIJOY_SEQUENCES: readonly string[] = [
  'Avgvi',
  'Av‡',
  '‡K',
  'Zvwi',
  'Kwi',
  'wQ',
  'gvbyl',
  'ivÎ',
  'UvKv',
  'FY',
  'AvBb',
  'Av`vjZ',
  'Avwg',
  'n‡q',
  'e‡j',
];

// ============================================================================
// Counting
// ============================================================================

/**
 * Check if a character is in the Unicode Bengali block
 */
export function isBengaliChar(char: string): boolean {
  const code = char.codePointAt(0);
  if (code === undefined) return false;
  return code >= BENGALI_RANGE.START && code <= BENGALI_RANGE.END;
}

/**
 * Check if a character is one of the Bijoy indicator characters
 */
export function isBijoyChar(char: string): boolean {
  return BIJOY_CHARS.has(char);
}

/**
 * Count Unicode Bengali characters
 */
export function countUnicodeBengali(text: string): number {
  let count = 0;
  for (const char of text) {
    if (isBengaliChar(char)) {
      count++;
    }
  }
  return count;
}

/**
 * Count non-overlapping occurrences of a sequence
 */
function countOccurrences(text: string, sequence: string): number {
  let count = 0;
  let index = text.indexOf(sequence);
  while (index !== -1) {
    count++;
    index = text.indexOf(sequence, index + sequence.length);
  }
  return count;
}

/**
 * Count Bijoy indicators: one per Bijoy character, plus a fixed weight for
 * every occurrence of a known Bijoy sequence
 */
export function countBijoyIndicators(text: string): number {
  let charCount = 0;
  for (const char of text) {
    if (BIJOY_CHARS.has(char)) {
      charCount++;
    }
  }

  let sequenceCount = 0;
  for (const sequence of BIJOY_SEQUENCES) {
    sequenceCount += countOccurrences(text, sequence);
  }

  return charCount + sequenceCount * SCRIPT_THRESHOLDS.sequenceWeight;
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Derive the verdict from statistics. First matching rule wins.
 */
export function verdictFromStats(stats: ScriptStats): ScriptVerdict {
  const { unicodeChars, bijoyIndicators } = stats;

  if (
    unicodeChars > SCRIPT_THRESHOLDS.unicodeChars &&
    bijoyIndicators > SCRIPT_THRESHOLDS.mixedBijoyIndicators
  ) {
    return ScriptVerdict.MIXED;
  }
  if (unicodeChars > SCRIPT_THRESHOLDS.unicodeChars) {
    return ScriptVerdict.NATIVE_UNICODE;
  }
  if (bijoyIndicators > SCRIPT_THRESHOLDS.bijoyIndicators) {
    return ScriptVerdict.LEGACY_ENCODED;
  }
  return ScriptVerdict.NONE;
}

/**
 * Classify the Bengali encoding of a block of text.
 *
 * Pure and total: the same input always yields the same result.
 *
 * @example
 * ```typescript
 * const { hasBengali, verdict, stats } = classifyScript(rawText);
 * if (verdict === 'bijoy') {
 *   console.log(`${stats.bijoyIndicators} Bijoy indicators`);
 * }
 * ```
 */
export function classifyScript(text: string): ScriptClassification {
  const stats: ScriptStats = Object.freeze({
    unicodeChars: countUnicodeBengali(text),
    bijoyIndicators: countBijoyIndicators(text),
    totalChars: text.length,
  });

  const verdict = verdictFromStats(stats);

  return Object.freeze({
    hasBengali: verdict !== ScriptVerdict.NONE,
    verdict,
    stats,
  });
}
