/**
 * Progress Module
 *
 * Progress tracking for batch ingestion runs.
 */

export {
  ProgressState,
  ProgressStateSchema,
  ProgressEntrySchema,
  type ProgressEntry,
  ProgressReporterConfigSchema,
  type ProgressReporterConfig,
  createDefaultProgressConfig,
  calculatePercentage,
  estimateRemainingTime,
  formatDuration,
  formatProgress,
} from './types.js';

export { ProgressReporter, createProgressReporter } from './reporter.js';
