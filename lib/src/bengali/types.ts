/**
 * Bengali Script Types
 *
 * Type definitions for script detection and Bijoy (legacy 8-bit Bengali)
 * conversion in the legal case ingestion pipeline.
 */

import { z } from 'zod';

// =============================================================================
// Script Verdict
// =============================================================================

/**
 * Dominant script encoding of a document
 */
export const ScriptVerdict = {
  /** No Bengali detected */
  NONE: 'none',
  /** Native Unicode Bengali (U+0980..U+09FF) */
  NATIVE_UNICODE: 'unicode',
  /** Legacy Bijoy font encoding */
  LEGACY_ENCODED: 'bijoy',
  /** Both Unicode Bengali and Bijoy present */
  MIXED: 'mixed',
} as const;

export type ScriptVerdict = (typeof ScriptVerdict)[keyof typeof ScriptVerdict];

/**
 * Zod schema for ScriptVerdict validation
 */
export const ScriptVerdictSchema = z.enum(['none', 'unicode', 'bijoy', 'mixed']);

/**
 * Encodings recorded on case metadata (every verdict except NONE)
 */
export const BengaliEncodingSchema = z.enum(['unicode', 'bijoy', 'mixed']);

export type BengaliEncoding = z.infer<typeof BengaliEncodingSchema>;

// =============================================================================
// Script Statistics
// =============================================================================

export const ScriptStatsSchema = z.object({
  /** Characters inside the Unicode Bengali block */
  unicodeChars: z.number().int().nonnegative(),
  /** Bijoy character hits plus weighted sequence hits */
  bijoyIndicators: z.number().int().nonnegative(),
  /** Length of the inspected text */
  totalChars: z.number().int().nonnegative(),
});

export type ScriptStats = Readonly<z.infer<typeof ScriptStatsSchema>>;

export interface ScriptClassification {
  readonly hasBengali: boolean;
  readonly verdict: ScriptVerdict;
  readonly stats: ScriptStats;
}

// =============================================================================
// Thresholds
// =============================================================================

/**
 * Document-level verdict thresholds.
 *
 * Empirical values; recalibrate against a labeled corpus if detection
 * accuracy regresses.
 */
export const SCRIPT_THRESHOLDS = {
  /** Unicode Bengali count above which a document is Unicode (or mixed) */
  unicodeChars: 100,
  /** Bijoy indicators above which a Unicode document is mixed */
  mixedBijoyIndicators: 50,
  /** Bijoy indicators above which a document is Bijoy */
  bijoyIndicators: 30,
  /** Weight of a single legacy sequence occurrence */
  sequenceWeight: 10,
} as const;

/**
 * Minimum marker characters for a line to be treated as Bijoy
 */
export const BIJOY_LINE_THRESHOLD = 2;

// =============================================================================
// Legacy Codec
// =============================================================================

/**
 * Capability that converts legacy-encoded text to Unicode.
 *
 * Implementations may throw for a given input; callers recover per line.
 */
export interface LegacyCodec {
  readonly name: string;
  convertLegacyToUnicode(text: string): string;
}

/**
 * Result of converting a whole document line by line
 */
export const ConversionResultSchema = z.object({
  /** Document text after conversion (identical to input when nothing converted) */
  text: z.string(),
  /** Whether at least one line was converted */
  converted: z.boolean(),
  /** Number of lines converted */
  convertedLines: z.number().int().nonnegative(),
  /** Number of Bijoy lines the codec rejected (kept as-is) */
  failedLines: z.number().int().nonnegative(),
});

export type ConversionResult = z.infer<typeof ConversionResultSchema>;

// =============================================================================
// Errors
// =============================================================================

/**
 * Raised by a codec when a line cannot be converted
 */
export class BijoyConversionError extends Error {
  readonly line: string;

  constructor(message: string, line: string) {
    super(message);
    this.name = 'BijoyConversionError';
    this.line = line;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BijoyConversionError);
    }
  }
}

export function isBijoyConversionError(error: unknown): error is BijoyConversionError {
  return error instanceof BijoyConversionError;
}
