/**
 * Logging Types and Schemas
 *
 * Levels, formats and the configuration shared by the case processor, the
 * batch ingester and the ingest-cases CLI.
 */

import { z } from 'zod';

// =============================================================================
// Levels
// =============================================================================

/**
 * Severity, most severe first. `--quiet` maps to ERROR, `--verbose` to DEBUG.
 */
export const LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  /** Per-line conversion failures and per-document detail */
  DEBUG: 3,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelName: Readonly<Record<LogLevel, string>> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
};

export const LogLevelSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);

// =============================================================================
// Configuration
// =============================================================================

/**
 * `pretty` is the CLI default; `text` is what log files and tests read
 */
export const LogFormatSchema = z.enum(['text', 'json', 'compact', 'pretty']);

export type LogFormat = z.infer<typeof LogFormatSchema>;

const LineHandlerSchema = z.function().args(z.string(), LogLevelSchema).returns(z.void());

export const LoggerConfigSchema = z.object({
  level: LogLevelSchema.default(LogLevel.INFO),
  format: LogFormatSchema.default('text'),
  /** ISO timestamp in front of text and pretty lines */
  timestamps: z.boolean().default(true),
  /** Only `pretty` colors its output */
  colors: z.boolean().default(true),
  /** Module name shown as `[source]`; children append `:name` */
  source: z.string().optional(),
  console: z.boolean().default(true),
  /** Takes the place of the console, e.g. to capture lines in tests */
  output: LineHandlerSchema.optional(),
  /** Receive every line in addition to the console or `output` (the log file) */
  sinks: z.array(LineHandlerSchema).default([]),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

// =============================================================================
// Colors
// =============================================================================

export const LogColors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export const LogLevelColors: Readonly<Record<LogLevel, string>> = {
  [LogLevel.ERROR]: LogColors.red,
  [LogLevel.WARN]: LogColors.yellow,
  [LogLevel.INFO]: LogColors.blue,
  [LogLevel.DEBUG]: LogColors.cyan,
};

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

/**
 * Remove ANSI color codes, for lines written to a file
 */
export function stripColors(line: string): string {
  return line.replace(ANSI_PATTERN, '');
}
