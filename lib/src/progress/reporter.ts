/**
 * Progress Reporter Implementation
 *
 * Tracks a batch run and logs its progress every N percent.
 */

import type { Logger } from '../logging/index.js';
import { createSilentLogger } from '../logging/index.js';
import {
  type ProgressEntry,
  type ProgressReporterConfig,
  ProgressState,
  createDefaultProgressConfig,
  calculatePercentage,
  estimateRemainingTime,
  formatProgress,
  formatDuration,
} from './types.js';

// =============================================================================
// Progress Reporter Class
// =============================================================================

export class ProgressReporter {
  private readonly config: ProgressReporterConfig;
  private readonly logger: Logger;
  private current: number = 0;
  private successCount: number = 0;
  private failedCount: number = 0;
  private state: ProgressState = ProgressState.PENDING;
  private startTime: number | null = null;
  private endTime: number | null = null;
  private lastLoggedPercent: number = 0;
  private currentItem: string | undefined;

  constructor(
    total: number,
    options?: Partial<Omit<ProgressReporterConfig, 'total'>> & { logger?: Logger }
  ) {
    const { logger, ...config } = options ?? {};
    this.config = createDefaultProgressConfig(total, config);
    this.logger = logger ?? createSilentLogger();
  }

  start(): void {
    this.startTime = Date.now();
    this.endTime = null;
    this.state = ProgressState.RUNNING;
    this.lastLoggedPercent = 0;

    this.logger.info(`${this.config.operationName}: Starting (${this.config.total} items)`);
    this.emitProgress();
  }

  /**
   * Mark an item as successful
   */
  success(currentItem?: string): void {
    this.advance(true, currentItem);
  }

  /**
   * Mark an item as failed
   */
  fail(currentItem?: string, error?: string): void {
    if (error) {
      this.logger.debug(`${this.config.operationName}: ${currentItem ?? 'item'} failed`, { error });
    }
    this.advance(false, currentItem);
  }

  complete(): void {
    this.endTime = Date.now();
    this.state = ProgressState.COMPLETED;

    this.logger.info(
      `${this.config.operationName}: Completed - ${this.successCount} succeeded, ` +
        `${this.failedCount} failed in ${formatDuration(this.getElapsedMs())}`
    );
    this.emitProgress();
  }

  getProgress(): ProgressEntry {
    const elapsedMs = this.getElapsedMs();

    return {
      current: this.current,
      total: this.config.total,
      percentage: calculatePercentage(this.current, this.config.total),
      state: this.state,
      elapsedMs,
      estimatedRemainingMs: estimateRemainingTime(elapsedMs, this.current, this.config.total),
      successCount: this.successCount,
      failedCount: this.failedCount,
      currentItem: this.currentItem,
    };
  }

  getElapsedMs(): number {
    if (this.startTime === null) return 0;
    return (this.endTime ?? Date.now()) - this.startTime;
  }

  getState(): ProgressState {
    return this.state;
  }

  toString(): string {
    return formatProgress(this.getProgress());
  }

  private advance(success: boolean, currentItem: string | undefined): void {
    if (this.state !== ProgressState.RUNNING) {
      return;
    }

    this.current++;
    if (success) {
      this.successCount++;
    } else {
      this.failedCount++;
    }
    this.currentItem = currentItem;

    this.emitProgress();
  }

  private emitProgress(): void {
    const entry = this.getProgress();
    this.config.onProgress?.(entry);

    if (this.state !== ProgressState.RUNNING || entry.current === 0) {
      return;
    }

    const currentPercent = Math.floor(entry.percentage);
    const interval = this.config.logIntervalPercent;

    if (currentPercent >= this.lastLoggedPercent + interval) {
      this.lastLoggedPercent = currentPercent - (currentPercent % interval);
      this.logger.info(`${this.config.operationName}: ${this.toString()}`);
    }
  }
}

/**
 * Create a progress reporter that logs through the given logger
 */
export function createProgressReporter(
  total: number,
  options?: Partial<Omit<ProgressReporterConfig, 'total'>> & { logger?: Logger }
): ProgressReporter {
  return new ProgressReporter(total, options);
}
