/**
 * Logger Implementation
 *
 * Structured logger passed explicitly to the case processor, the batch
 * ingester and the CLI. There is no process-wide instance.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import path from 'node:path';
import {
  type LoggerConfig,
  LogLevel,
  LogLevelName,
  LogLevelColors,
  LogColors,
  LoggerConfigSchema,
  stripColors,
} from './types.js';

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: Record<string, unknown>;
  source?: string;
  error?: { name: string; message: string; stack?: string };
}

function hasContext(entry: LogEntry): entry is LogEntry & { context: Record<string, unknown> } {
  return entry.context !== undefined && Object.keys(entry.context).length > 0;
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = LoggerConfigSchema.parse(config ?? {});
  }

  /**
   * Logger for a sub-module: same level, format and outputs, source
   * `parent:child`
   */
  child(source: string): Logger {
    return new Logger({
      ...this.config,
      source: this.config.source ? `${this.config.source}:${source}` : source,
    });
  }

  error(message: string, context?: Record<string, unknown>): void;
  error(message: string, error: Error, context?: Record<string, unknown>): void;
  error(
    message: string,
    errorOrContext?: Error | Record<string, unknown>,
    context?: Record<string, unknown>
  ): void {
    if (errorOrContext instanceof Error) {
      this.log(LogLevel.ERROR, message, context, errorOrContext);
    } else {
      this.log(LogLevel.ERROR, message, errorOrContext);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (level > this.config.level) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context,
      source: this.config.source,
      error: error ? { name: error.name, message: error.message, stack: error.stack } : undefined,
    };

    this.write(this.format(entry), level);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case 'json':
        return JSON.stringify({
          timestamp: entry.timestamp.toISOString(),
          level: LogLevelName[entry.level],
          message: entry.message,
          source: entry.source,
          context: entry.context,
          error: entry.error,
        });
      case 'compact':
        return `${entry.timestamp.toISOString().slice(11, 19)} ${LogLevelName[entry.level].charAt(0)} ${entry.message}`;
      case 'pretty':
        return this.config.colors ? this.formatPretty(entry) : this.formatText(entry);
      case 'text':
        return this.formatText(entry);
    }
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }
    parts.push(LogLevelName[entry.level].padEnd(5));
    if (entry.source) {
      parts.push(`[${entry.source}]`);
    }
    parts.push(entry.message);
    if (hasContext(entry)) {
      parts.push(JSON.stringify(entry.context));
    }
    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        parts.push(`\n  ${entry.error.stack.replace(/\n/g, '\n  ')}`);
      }
    }

    return parts.join(' ');
  }

  private formatPretty(entry: LogEntry): string {
    const paint = (color: string, text: string): string => `${color}${text}${LogColors.reset}`;
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(paint(LogColors.gray, `[${entry.timestamp.toISOString()}]`));
    }
    parts.push(paint(LogLevelColors[entry.level], LogLevelName[entry.level].padEnd(5)));
    if (entry.source) {
      parts.push(paint(LogColors.cyan, `[${entry.source}]`));
    }
    parts.push(entry.message);
    if (hasContext(entry)) {
      parts.push(paint(LogColors.dim, JSON.stringify(entry.context)));
    }
    if (entry.error) {
      parts.push(`\n  ${paint(LogColors.red, `Error: ${entry.error.name}: ${entry.error.message}`)}`);
      if (entry.error.stack) {
        parts.push(`\n  ${paint(LogColors.gray, entry.error.stack.replace(/\n/g, '\n  '))}`);
      }
    }

    return parts.join(' ');
  }

  private write(formatted: string, level: LogLevel): void {
    for (const sink of this.config.sinks) {
      sink(formatted, level);
    }

    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }
    if (!this.config.console) {
      return;
    }

    if (level === LogLevel.ERROR) {
      console.error(formatted);
    } else if (level === LogLevel.WARN) {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

// =============================================================================
// Factories
// =============================================================================

export function createLogger(source: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, source });
}

/**
 * Logger that discards everything; the default for library callers that
 * inject none
 */
export function createSilentLogger(): Logger {
  return new Logger({ console: false, level: LogLevel.ERROR });
}

/**
 * Sink that appends each line, without colors, to a log file. The parent
 * directory is created on first use.
 */
export function createFileOutput(filePath: string): (formatted: string, level: LogLevel) => void {
  let ready = false;

  return (formatted: string): void => {
    if (!ready) {
      mkdirSync(path.dirname(filePath), { recursive: true });
      ready = true;
    }
    appendFileSync(filePath, `${stripColors(formatted)}\n`, 'utf-8');
  };
}
