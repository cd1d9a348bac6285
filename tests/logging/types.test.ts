/**
 * Tests for logging types and utilities
 */

import { describe, it, expect } from 'vitest';
import {
  LogLevel,
  LogLevelName,
  LogLevelSchema,
  LogFormatSchema,
  LoggerConfigSchema,
  LogColors,
  stripColors,
} from '../../lib/src/logging/types.js';

describe('LogLevelSchema', () => {
  it('should accept the four severities', () => {
    for (const level of [0, 1, 2, 3]) {
      expect(LogLevelSchema.parse(level)).toBe(level);
    }
  });

  it('should reject invalid log levels', () => {
    expect(LogLevelSchema.safeParse(4).success).toBe(false);
    expect(LogLevelSchema.safeParse(-1).success).toBe(false);
    expect(LogLevelSchema.safeParse('INFO').success).toBe(false);
  });
});

describe('LogLevelName', () => {
  it('should name every level', () => {
    expect(Object.values(LogLevel).map((level) => LogLevelName[level])).toEqual([
      'ERROR',
      'WARN',
      'INFO',
      'DEBUG',
    ]);
  });
});

describe('LogFormatSchema', () => {
  it('should validate valid formats', () => {
    expect(LogFormatSchema.options).toEqual(['text', 'json', 'compact', 'pretty']);
  });

  it('should reject invalid formats', () => {
    expect(LogFormatSchema.safeParse('yaml').success).toBe(false);
    expect(LogFormatSchema.safeParse('').success).toBe(false);
  });
});

describe('LoggerConfigSchema', () => {
  it('should apply defaults', () => {
    const config = LoggerConfigSchema.parse({});

    expect(config.level).toBe(LogLevel.INFO);
    expect(config.format).toBe('text');
    expect(config.timestamps).toBe(true);
    expect(config.colors).toBe(true);
    expect(config.console).toBe(true);
    expect(config.output).toBeUndefined();
    expect(config.sinks).toEqual([]);
  });

  it('should reject a sink that is not a function', () => {
    expect(LoggerConfigSchema.safeParse({ sinks: ['ingestion.log'] }).success).toBe(false);
  });
});

describe('stripColors', () => {
  it('should remove ANSI sequences', () => {
    const line = `${LogColors.gray}[t]${LogColors.reset} ${LogColors.red}ERROR${LogColors.reset} Failed`;
    expect(stripColors(line)).toBe('[t] ERROR Failed');
  });

  it('should leave plain text unchanged', () => {
    expect(stripColors('INFO  ✓ Saved: 12_Rahman.txt')).toBe('INFO  ✓ Saved: 12_Rahman.txt');
  });
});
