/**
 * Tests for progress reporting types and utilities
 */

import { describe, it, expect } from 'vitest';
import {
  ProgressState,
  ProgressStateSchema,
  ProgressEntrySchema,
  ProgressReporterConfigSchema,
  createDefaultProgressConfig,
  calculatePercentage,
  estimateRemainingTime,
  formatDuration,
  formatProgress,
  type ProgressEntry,
} from '../../lib/src/progress/types.js';

describe('ProgressStateSchema', () => {
  it('should validate valid states', () => {
    expect(ProgressStateSchema.parse(ProgressState.PENDING)).toBe('pending');
    expect(ProgressStateSchema.parse(ProgressState.RUNNING)).toBe('running');
    expect(ProgressStateSchema.parse(ProgressState.COMPLETED)).toBe('completed');
  });

  it('should reject invalid states', () => {
    expect(ProgressStateSchema.safeParse('paused').success).toBe(false);
  });
});

describe('ProgressEntrySchema', () => {
  it('should require the success and failure counters', () => {
    const entry = { current: 0, total: 12, percentage: 0, state: 'pending', elapsedMs: 0 };

    expect(ProgressEntrySchema.safeParse(entry).success).toBe(false);
    expect(
      ProgressEntrySchema.safeParse({ ...entry, successCount: 0, failedCount: 0 }).success
    ).toBe(true);
  });

  it('should enforce percentage bounds', () => {
    const base = {
      current: 1,
      total: 1,
      state: 'running',
      elapsedMs: 5,
      successCount: 1,
      failedCount: 0,
    };

    expect(ProgressEntrySchema.safeParse({ ...base, percentage: 101 }).success).toBe(false);
    expect(ProgressEntrySchema.safeParse({ ...base, percentage: -1 }).success).toBe(false);
  });
});

describe('ProgressReporterConfigSchema', () => {
  it('should apply defaults', () => {
    const config = ProgressReporterConfigSchema.parse({ total: 12 });

    expect(config.logIntervalPercent).toBe(10);
    expect(config.operationName).toBe('Processing');
    expect(config.onProgress).toBeUndefined();
  });

  it('should reject an interval below one percent', () => {
    expect(ProgressReporterConfigSchema.safeParse({ total: 12, logIntervalPercent: 0 }).success)
      .toBe(false);
  });
});

describe('createDefaultProgressConfig', () => {
  it('should accept overrides', () => {
    const config = createDefaultProgressConfig(40, { operationName: 'Ingestion' });

    expect(config.total).toBe(40);
    expect(config.operationName).toBe('Ingestion');
  });
});

describe('calculatePercentage', () => {
  it('should calculate percentage correctly', () => {
    expect(calculatePercentage(1, 4)).toBe(25);
    expect(calculatePercentage(3, 3)).toBe(100);
  });

  it('should return 100 when total is 0', () => {
    expect(calculatePercentage(0, 0)).toBe(100);
  });

  it('should clamp to 0-100 range', () => {
    expect(calculatePercentage(5, 4)).toBe(100);
  });
});

describe('estimateRemainingTime', () => {
  it('should extrapolate from the average item time', () => {
    expect(estimateRemainingTime(3000, 3, 10)).toBe(7000);
  });

  it('should return undefined before the first item and after the last', () => {
    expect(estimateRemainingTime(3000, 0, 10)).toBeUndefined();
    expect(estimateRemainingTime(3000, 10, 10)).toBeUndefined();
  });
});

describe('formatDuration', () => {
  it('should format each magnitude', () => {
    expect(formatDuration(450)).toBe('450ms');
    expect(formatDuration(2500)).toBe('2.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
    expect(formatDuration(7260000)).toBe('2h 1m');
  });
});

describe('formatProgress', () => {
  it('should include the ETA when known', () => {
    const entry: ProgressEntry = {
      current: 3,
      total: 10,
      percentage: 30,
      state: 'running',
      elapsedMs: 3000,
      estimatedRemainingMs: 7000,
      successCount: 2,
      failedCount: 1,
    };

    expect(formatProgress(entry)).toBe('3/10 (30.0%) - ETA: 7.0s - Elapsed: 3.0s');
  });

  it('should omit the ETA when unknown', () => {
    const entry: ProgressEntry = {
      current: 10,
      total: 10,
      percentage: 100,
      state: 'completed',
      elapsedMs: 800,
      successCount: 10,
      failedCount: 0,
    };

    expect(formatProgress(entry)).toBe('10/10 (100.0%) - Elapsed: 800ms');
  });
});
