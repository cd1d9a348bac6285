/**
 * Tests for text normalization
 */

import { describe, it, expect } from 'vitest';
import {
  cleanLines,
  countWords,
  createNormalizedDocument,
  formatPageMarker,
  isPageMarker,
  mergeParagraphs,
  normalizeText,
} from '../../lib/src/text/index.js';

describe('formatPageMarker', () => {
  it('should format 1-based page markers', () => {
    expect(formatPageMarker(3)).toBe('--- Page 3 ---');
    expect(isPageMarker(formatPageMarker(3))).toBe(true);
    expect(isPageMarker('Page 3')).toBe(false);
  });
});

describe('cleanLines', () => {
  it('should trim, collapse whitespace and drop short lines', () => {
    expect(cleanLines('  The   court \t held  \n\na\n5\nstands.')).toEqual([
      'The court held',
      'stands.',
    ]);
  });

  it('should split on every line break style', () => {
    expect(cleanLines('first\r\nsecond\rthird\nfourth')).toEqual([
      'first',
      'second',
      'third',
      'fourth',
    ]);
  });
});

describe('mergeParagraphs', () => {
  it('should keep page markers as their own paragraphs', () => {
    expect(mergeParagraphs(['The appeal', formatPageMarker(2), 'is allowed.'])).toEqual([
      'The appeal',
      '--- Page 2 ---',
      'is allowed.',
    ]);
  });

  it('should start a new paragraph after terminal punctuation', () => {
    expect(mergeParagraphs(['Heard.', 'Allowed:', 'No costs'])).toEqual([
      'Heard.',
      'Allowed:',
      'No costs',
    ]);
  });

  it('should treat the dari as terminal', () => {
    expect(mergeParagraphs(['আদালত রায় দিল।', 'পরবর্তী'])).toEqual([
      'আদালত রায় দিল।',
      'পরবর্তী',
    ]);
  });
});

describe('normalizeText', () => {
  it('should reflow wrapped lines into paragraphs', () => {
    expect(normalizeText('--- Page 1 ---\nThe appeal is\nallowed.\nNo costs.')).toBe(
      '--- Page 1 ---\n\nThe appeal is allowed.\n\nNo costs.'
    );
  });

  it('should join hyphenated words when the next line is lowercase', () => {
    expect(normalizeText('The judg-\nment was delivered')).toBe('The judgment was delivered');
  });

  it('should keep the hyphen before an uppercase line', () => {
    expect(normalizeText('Dhaka-\nBased firm')).toBe('Dhaka- Based firm');
  });

  it('should remove whitespace before punctuation', () => {
    expect(normalizeText('The court held\n, that the order\n; stands')).toBe(
      'The court held, that the order; stands'
    );
  });

  it('should handle carriage returns', () => {
    expect(normalizeText('First line\r\nsecond line.')).toBe('First line second line.');
  });

  it('should return an empty string for empty or blank input', () => {
    expect(normalizeText('')).toBe('');
    expect(normalizeText('   \n \t\n')).toBe('');
    expect(normalizeText('a\nb\nc')).toBe('');
  });

  it('should emit one paragraph per page marker when there is no body text', () => {
    expect(normalizeText('--- Page 1 ---\n\n\n--- Page 2 ---\n\n--- Page 3 ---')).toBe(
      '--- Page 1 ---\n\n--- Page 2 ---\n\n--- Page 3 ---'
    );
  });

  it('should be stable on its own output', () => {
    const once = normalizeText('--- Page 1 ---\nThe appeal is\nallowed.\nNo costs.');
    expect(normalizeText(once)).toBe(once);
  });
});

describe('normalizeText over generated input', () => {
  const FRAGMENTS = [
    'The appeal is',
    'allowed with costs.',
    'the respondent was not',
    're-',
    'heard by the bench;',
    'Civil Appeal No. 45 of 2020',
    'আদালত রায় দিলেন।',
    '   ',
    '',
    'x',
    '( see below )',
  ];
  const SEPARATORS = ['\n', '\r\n', '\r', '\n\n\n\n', '\r\n\r\n\r\n'];

  /** Deterministic pseudo-random sequence so failures reproduce */
  function seededRandom(seed: number): () => number {
    let state = seed;
    return () => {
      state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
      return state / 4294967296;
    };
  }

  function generateDocument(random: () => number): string {
    const pick = <T>(items: readonly T[]): T => {
      const item = items[Math.floor(random() * items.length)];
      if (item === undefined) {
        throw new Error('empty item list');
      }
      return item;
    };

    const lineCount = 1 + Math.floor(random() * 12);
    let text = '';
    let page = 1;
    for (let i = 0; i < lineCount; i++) {
      const line = random() < 0.15 ? `--- Page ${page++} ---` : pick(FRAGMENTS);
      text += i === 0 ? line : `${pick(SEPARATORS)}${line}`;
    }
    return text;
  }

  const random = seededRandom(2024);
  const documents = Array.from({ length: 60 }, () => generateDocument(random));

  it('should never leave more than one blank line between paragraphs', () => {
    for (const input of documents) {
      expect(normalizeText(input)).not.toMatch(/\n{3,}/);
    }
  });

  it('should never produce more paragraphs than input lines', () => {
    for (const input of documents) {
      const paragraphs = normalizeText(input).split('\n\n');
      expect(paragraphs.length).toBeLessThanOrEqual(input.split(/\r\n|\r|\n/).length);
    }
  });
});

describe('countWords', () => {
  it('should count whitespace-separated words', () => {
    expect(countWords('The  appeal\nis allowed.')).toBe(4);
    expect(countWords('')).toBe(0);
    expect(countWords('   ')).toBe(0);
  });
});

describe('createNormalizedDocument', () => {
  it('should derive word and character counts', () => {
    expect(createNormalizedDocument('The appeal is allowed.')).toEqual({
      text: 'The appeal is allowed.',
      wordCount: 4,
      charCount: 22,
    });
  });
});
