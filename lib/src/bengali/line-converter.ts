/**
 * Bijoy Line Converter
 *
 * Converts only the Bijoy-encoded lines of a document to Unicode Bengali.
 * English and Unicode Bengali lines are passed through byte-for-byte.
 */

import type { Logger } from '../logging/index.js';
import { type ConversionResult, type LegacyCodec, BIJOY_LINE_THRESHOLD } from './types.js';

/**
 * Characters present in Bijoy text and absent from plain English
 */
const BIJOY_LINE_MARKERS: ReadonlySet<string> = new Set([...'†‡¨©¯¶ÎïšŒ‰‹Š']);

/**
 * Check whether a line is Bijoy-encoded: it holds at least `threshold`
 * marker characters.
 */
export function isBijoyLine(line: string, threshold: number = BIJOY_LINE_THRESHOLD): boolean {
  let count = 0;
  for (const char of line) {
    if (BIJOY_LINE_MARKERS.has(char)) {
      count++;
      if (count >= threshold) {
        return true;
      }
    }
  }
  return count >= threshold;
}

export interface LineConverterOptions {
  /** Codec to convert with; `null` disables conversion */
  codec: LegacyCodec | null;
  /** Marker threshold for the per-line gate */
  threshold?: number;
  logger?: Logger;
}

export interface LineConverter {
  /** Whether conversion can run at all */
  readonly enabled: boolean;
  isBijoyLine(line: string): boolean;
  /** Convert a single line already known to be Bijoy */
  convertLine(line: string): string;
  convertDocument(text: string): ConversionResult;
}

/**
 * Create a line converter bound to a codec.
 *
 * @example
 * ```typescript
 * const converter = createLineConverter({ codec: createBijoyCodec() });
 * const { text, converted } = converter.convertDocument(rawText);
 * ```
 */
export function createLineConverter(options: LineConverterOptions): LineConverter {
  const { codec, logger } = options;
  const threshold = options.threshold ?? BIJOY_LINE_THRESHOLD;

  const convertLine = (line: string): string => {
    if (!codec) {
      return line;
    }
    return codec.convertLegacyToUnicode(line);
  };

  const convertDocument = (text: string): ConversionResult => {
    if (!codec) {
      return { text, converted: false, convertedLines: 0, failedLines: 0 };
    }

    let convertedLines = 0;
    let failedLines = 0;

    const lines = text.split('\n').map((line, index) => {
      if (!isBijoyLine(line, threshold)) {
        return line;
      }

      try {
        const converted = codec.convertLegacyToUnicode(line);
        convertedLines++;
        return converted;
      } catch (error) {
        failedLines++;
        logger?.debug('Keeping Bijoy line that failed conversion', {
          line: index + 1,
          codec: codec.name,
          error: error instanceof Error ? error.message : String(error),
        });
        return line;
      }
    });

    if (convertedLines === 0) {
      return { text, converted: false, convertedLines, failedLines };
    }

    logger?.info(`Converted ${convertedLines} Bijoy line(s) to Unicode`, {
      failedLines,
    });

    return {
      text: lines.join('\n'),
      converted: true,
      convertedLines,
      failedLines,
    };
  };

  return {
    enabled: codec !== null,
    isBijoyLine: (line) => isBijoyLine(line, threshold),
    convertLine,
    convertDocument,
  };
}

/**
 * Convert the Bijoy lines of a document with the given codec.
 *
 * Without a codec this is a no-op returning `converted: false`.
 */
export function convertDocument(
  text: string,
  codec: LegacyCodec | null,
  options?: Omit<LineConverterOptions, 'codec'>
): ConversionResult {
  return createLineConverter({ ...options, codec }).convertDocument(text);
}
