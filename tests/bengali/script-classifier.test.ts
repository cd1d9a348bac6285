/**
 * Tests for Bengali script classification
 */

import { describe, it, expect } from 'vitest';
import {
  ScriptVerdict,
  SCRIPT_THRESHOLDS,
  classifyScript,
  countBijoyIndicators,
  countUnicodeBengali,
  isBengaliChar,
  isBijoyChar,
  verdictFromStats,
} from '../../lib/src/bengali/index.js';

const UNICODE_BENGALI = 'আ'.repeat(101);

describe('isBengaliChar', () => {
  it('should accept code points of the Bengali block', () => {
    expect(isBengaliChar('ক')).toBe(true);
    expect(isBengaliChar('।')).toBe(false);
    expect(isBengaliChar('ঀ')).toBe(true);
    expect(isBengaliChar('৿')).toBe(true);
  });

  it('should reject Latin and empty input', () => {
    expect(isBengaliChar('a')).toBe(false);
    expect(isBengaliChar('')).toBe(false);
  });
});

describe('isBijoyChar', () => {
  it('should recognise legacy glyph characters', () => {
    expect(isBijoyChar('‡')).toBe(true);
    expect(isBijoyChar('©')).toBe(true);
    expect(isBijoyChar('\u00a0')).toBe(true);
  });

  it('should not treat ASCII as Bijoy', () => {
    expect(isBijoyChar('A')).toBe(false);
    expect(isBijoyChar(' ')).toBe(false);
    expect(isBijoyChar('"')).toBe(false);
  });
});

describe('countUnicodeBengali', () => {
  it('should count only Bengali code points', () => {
    expect(countUnicodeBengali('আমার case')).toBe(4);
    expect(countUnicodeBengali('The appeal')).toBe(0);
  });
});

describe('countBijoyIndicators', () => {
  it('should add one per Bijoy character', () => {
    expect(countBijoyIndicators('K‡g©')).toBe(2);
  });

  it('should weight every sequence occurrence', () => {
    expect(countBijoyIndicators('Avgvi')).toBe(SCRIPT_THRESHOLDS.sequenceWeight);
    expect(countBijoyIndicators('Avgvi Avgvi')).toBe(2 * SCRIPT_THRESHOLDS.sequenceWeight);
  });

  it('should count both characters and sequences', () => {
    // '‡' is a Bijoy character and '‡K' a sequence
    expect(countBijoyIndicators('‡K')).toBe(11);
  });

  it('should return zero for English text', () => {
    expect(countBijoyIndicators('The appeal is allowed.')).toBe(0);
  });
});

describe('verdictFromStats', () => {
  it('should apply the first matching rule', () => {
    expect(verdictFromStats({ unicodeChars: 101, bijoyIndicators: 51, totalChars: 200 })).toBe(
      ScriptVerdict.MIXED
    );
    expect(verdictFromStats({ unicodeChars: 101, bijoyIndicators: 50, totalChars: 200 })).toBe(
      ScriptVerdict.NATIVE_UNICODE
    );
    expect(verdictFromStats({ unicodeChars: 100, bijoyIndicators: 31, totalChars: 200 })).toBe(
      ScriptVerdict.LEGACY_ENCODED
    );
    expect(verdictFromStats({ unicodeChars: 100, bijoyIndicators: 30, totalChars: 200 })).toBe(
      ScriptVerdict.NONE
    );
  });
});

describe('classifyScript', () => {
  it('should classify English text as none', () => {
    const text = 'The appeal is allowed.';
    const result = classifyScript(text);

    expect(result.hasBengali).toBe(false);
    expect(result.verdict).toBe('none');
    expect(result.stats).toEqual({ unicodeChars: 0, bijoyIndicators: 0, totalChars: text.length });
  });

  it('should classify Unicode Bengali above the threshold as unicode', () => {
    const result = classifyScript(UNICODE_BENGALI);

    expect(result.verdict).toBe('unicode');
    expect(result.hasBengali).toBe(true);
    expect(result.stats.unicodeChars).toBe(101);
  });

  it('should need more than 100 Bengali characters', () => {
    expect(classifyScript('আ'.repeat(100)).verdict).toBe('none');
  });

  it('should classify Bijoy text as bijoy', () => {
    const result = classifyScript('Avgvi '.repeat(4));

    expect(result.stats.bijoyIndicators).toBe(40);
    expect(result.verdict).toBe('bijoy');
  });

  it('should need more than 30 Bijoy indicators', () => {
    expect(classifyScript('Avgvi '.repeat(3)).verdict).toBe('none');
  });

  it('should classify Unicode with heavy Bijoy as mixed', () => {
    const result = classifyScript(`${UNICODE_BENGALI}\n${'Avgvi '.repeat(6)}`);

    expect(result.stats.bijoyIndicators).toBe(60);
    expect(result.verdict).toBe('mixed');
  });

  it('should keep Unicode when Bijoy indicators stay at 50', () => {
    expect(classifyScript(`${UNICODE_BENGALI}\n${'Avgvi '.repeat(5)}`).verdict).toBe('unicode');
  });

  it('should be deterministic and frozen', () => {
    const text = `${UNICODE_BENGALI} Avgvi`;
    const first = classifyScript(text);

    expect(classifyScript(text)).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.stats)).toBe(true);
  });

  it('should handle empty text', () => {
    expect(classifyScript('')).toEqual({
      hasBengali: false,
      verdict: 'none',
      stats: { unicodeChars: 0, bijoyIndicators: 0, totalChars: 0 },
    });
  });
});
