/**
 * Progress Reporting Types and Schemas
 *
 * Progress of a batch ingestion run over a directory of case PDFs.
 */

import { z } from 'zod';

// =============================================================================
// Progress State
// =============================================================================

export const ProgressState = {
  /** Not yet started */
  PENDING: 'pending',
  /** Currently running */
  RUNNING: 'running',
  /** Every item has been reported */
  COMPLETED: 'completed',
} as const;

export type ProgressState = (typeof ProgressState)[keyof typeof ProgressState];

export const ProgressStateSchema = z.enum(['pending', 'running', 'completed']);

// =============================================================================
// Progress Entry
// =============================================================================

/**
 * Snapshot of a run
 */
export const ProgressEntrySchema = z.object({
  /** Items reported so far */
  current: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
  /** Percentage complete (0-100) */
  percentage: z.number().min(0).max(100),
  state: ProgressStateSchema,
  elapsedMs: z.number().nonnegative(),
  /** Estimated time remaining in milliseconds */
  estimatedRemainingMs: z.number().nonnegative().optional(),
  successCount: z.number().int().nonnegative(),
  failedCount: z.number().int().nonnegative(),
  /** Last item reported */
  currentItem: z.string().optional(),
});

export type ProgressEntry = z.infer<typeof ProgressEntrySchema>;

// =============================================================================
// Progress Reporter Configuration
// =============================================================================

export const ProgressReporterConfigSchema = z.object({
  /** Total number of items to process */
  total: z.number().int().nonnegative(),

  /** Callback on every progress update */
  onProgress: z.function().args(ProgressEntrySchema).returns(z.void()).optional(),

  /**
   * Log interval in percentage points (e.g., 10 = log every 10%)
   * @default 10
   */
  logIntervalPercent: z.number().min(1).max(100).default(10),

  /** Name used in log lines */
  operationName: z.string().default('Processing'),
});

export type ProgressReporterConfig = z.infer<typeof ProgressReporterConfigSchema>;

export function createDefaultProgressConfig(
  total: number,
  overrides?: Partial<Omit<ProgressReporterConfig, 'total'>>
): ProgressReporterConfig {
  return ProgressReporterConfigSchema.parse({ total, ...overrides });
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Calculate percentage with bounds
 */
export function calculatePercentage(current: number, total: number): number {
  if (total === 0) return 100;
  return Math.min(100, Math.max(0, (current / total) * 100));
}

/**
 * Estimate remaining time based on current progress
 */
export function estimateRemainingTime(
  elapsedMs: number,
  current: number,
  total: number
): number | undefined {
  if (current === 0 || current >= total) return undefined;
  const avgTimePerItem = elapsedMs / current;
  const remaining = total - current;
  return avgTimePerItem * remaining;
}

/**
 * Format duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;

  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);

  if (ms < 3600000) return `${minutes}m ${seconds}s`;

  const hours = Math.floor(ms / 3600000);
  const remainingMinutes = Math.floor((ms % 3600000) / 60000);
  return `${hours}h ${remainingMinutes}m`;
}

/**
 * Format a progress entry as a human-readable string
 */
export function formatProgress(entry: ProgressEntry): string {
  let status = `${entry.current}/${entry.total} (${entry.percentage.toFixed(1)}%)`;

  if (entry.estimatedRemainingMs !== undefined) {
    status += ` - ETA: ${formatDuration(entry.estimatedRemainingMs)}`;
  }

  return `${status} - Elapsed: ${formatDuration(entry.elapsedMs)}`;
}
