/**
 * Tests for per-line Bijoy conversion
 */

import { describe, it, expect, vi } from 'vitest';
import {
  type LegacyCodec,
  convertDocument,
  createBijoyCodec,
  createLineConverter,
  isBijoyLine,
} from '../../lib/src/bengali/index.js';
import { LogLevel, Logger } from '../../lib/src/logging/index.js';

const brokenCodec: LegacyCodec = {
  name: 'broken',
  convertLegacyToUnicode(): string {
    throw new Error('unsupported glyph');
  },
};

describe('isBijoyLine', () => {
  it('should need at least two marker characters', () => {
    expect(isBijoyLine('K‡g© ag©')).toBe(true);
    expect(isBijoyLine('Avgvi ‡K')).toBe(false);
  });

  it('should reject English and Unicode Bengali lines', () => {
    expect(isBijoyLine('Civil Appeal No. 45 of 2020')).toBe(false);
    expect(isBijoyLine('আমার কর্মে ধর্ম')).toBe(false);
  });

  it('should honour a custom threshold', () => {
    expect(isBijoyLine('Avgvi ‡K', 1)).toBe(true);
    expect(isBijoyLine('K‡g© ag©', 4)).toBe(false);
  });
});

describe('createLineConverter', () => {
  const codec = createBijoyCodec();

  it('should convert only Bijoy lines', () => {
    const converter = createLineConverter({ codec });
    const result = converter.convertDocument('Civil Appeal\nK‡g© ag©\nআমার');

    expect(result).toEqual({
      text: 'Civil Appeal\nকর্মে ধর্ম\nআমার',
      converted: true,
      convertedLines: 1,
      failedLines: 0,
    });
  });

  it('should return the input unchanged when no line is Bijoy', () => {
    const text = 'The appeal is allowed.\n\nNo order as to costs.';
    const result = createLineConverter({ codec }).convertDocument(text);

    expect(result).toEqual({ text, converted: false, convertedLines: 0, failedLines: 0 });
  });

  it('should be idempotent on its own output', () => {
    const converter = createLineConverter({ codec });
    const once = converter.convertDocument('K‡g© ag©').text;

    expect(converter.convertDocument(once).text).toBe(once);
  });

  it('should keep lines the codec rejects', () => {
    const output = vi.fn();
    const logger = new Logger({ level: LogLevel.DEBUG, output });
    const text = 'Heading\nK‡g© ag©';
    const result = createLineConverter({ codec: brokenCodec, logger }).convertDocument(text);

    expect(result).toEqual({ text, converted: false, convertedLines: 0, failedLines: 1 });
    expect(output).toHaveBeenCalledTimes(1);
  });

  it('should be a no-op without a codec', () => {
    const converter = createLineConverter({ codec: null });
    const text = 'K‡g© ag©';

    expect(converter.enabled).toBe(false);
    expect(converter.convertLine(text)).toBe(text);
    expect(converter.convertDocument(text)).toEqual({
      text,
      converted: false,
      convertedLines: 0,
      failedLines: 0,
    });
  });

  it('should use its threshold for the line gate', () => {
    const converter = createLineConverter({ codec, threshold: 1 });
    expect(converter.isBijoyLine('Avgvi ‡K')).toBe(true);
    expect(converter.convertDocument('Avgvi ‡K').text).toBe('আমার কে');
  });
});

describe('convertDocument', () => {
  it('should convert with the given codec', () => {
    expect(convertDocument('ag© ‡K', createBijoyCodec()).text).toBe('ধর্ম কে');
  });

  it('should pass through without a codec', () => {
    expect(convertDocument('ag© ‡K', null).converted).toBe(false);
  });
});
