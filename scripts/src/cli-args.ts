/**
 * Argument parsing for the ingest-cases CLI
 */

import {
  type IngestConfig,
  type LogFormat,
  type LoggerConfig,
  LogFormatSchema,
  LogLevel,
  createFileOutput,
} from '@legal-ingest/lib';

export interface ParsedArgs {
  inputDir?: string;
  outputDir?: string;
  convertBijoy?: boolean;
  minTextLength?: number;
  concurrency?: number;
  timeoutMs?: number;
  verbose: boolean;
  quiet: boolean;
  logFormat: LogFormat;
  logFile?: string;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function parsePositiveInt(flag: string, value: string, allowZero: boolean = false): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < (allowZero ? 0 : 1)) {
    throw new CliUsageError(`Invalid value for ${flag}: ${value}`);
  }
  return parsed;
}

function flagValue(arg: string, flag: string): string | undefined {
  const prefix = `${flag}=`;
  return arg.startsWith(prefix) ? arg.slice(prefix.length) : undefined;
}

/**
 * Parse `--flag` and `--flag=value` arguments
 *
 * @throws {CliUsageError} On unknown flags or invalid values
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    verbose: false,
    quiet: false,
    logFormat: 'pretty',
    help: false,
  };

  for (const arg of argv) {
    let value: string | undefined;

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--verbose') {
      result.verbose = true;
    } else if (arg === '--quiet') {
      result.quiet = true;
    } else if (arg === '--no-bijoy') {
      result.convertBijoy = false;
    } else if ((value = flagValue(arg, '--input')) !== undefined) {
      result.inputDir = value;
    } else if ((value = flagValue(arg, '--output')) !== undefined) {
      result.outputDir = value;
    } else if ((value = flagValue(arg, '--min-length')) !== undefined) {
      result.minTextLength = parsePositiveInt('--min-length', value, true);
    } else if ((value = flagValue(arg, '--concurrency')) !== undefined) {
      result.concurrency = parsePositiveInt('--concurrency', value);
    } else if ((value = flagValue(arg, '--timeout')) !== undefined) {
      result.timeoutMs = parsePositiveInt('--timeout', value);
    } else if ((value = flagValue(arg, '--log-format')) !== undefined) {
      const format = LogFormatSchema.safeParse(value);
      if (!format.success) {
        throw new CliUsageError(`Invalid value for --log-format: ${value}`);
      }
      result.logFormat = format.data;
    } else if ((value = flagValue(arg, '--log-file')) !== undefined) {
      result.logFile = value;
    } else {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

/**
 * Config overrides carried by the flags; unset flags leave env values alone
 */
export function toConfigOverrides(args: ParsedArgs): Partial<IngestConfig> {
  const overrides: Partial<IngestConfig> = {};
  if (args.inputDir !== undefined) overrides.inputDir = args.inputDir;
  if (args.outputDir !== undefined) overrides.outputDir = args.outputDir;
  if (args.convertBijoy !== undefined) overrides.convertBijoy = args.convertBijoy;
  if (args.minTextLength !== undefined) overrides.minTextLength = args.minTextLength;
  if (args.concurrency !== undefined) overrides.concurrency = args.concurrency;
  if (args.timeoutMs !== undefined) overrides.timeoutMs = args.timeoutMs;
  return overrides;
}

export function toLoggerConfig(args: ParsedArgs): Partial<LoggerConfig> {
  let level: LogLevel = LogLevel.INFO;
  if (args.verbose) level = LogLevel.DEBUG;
  if (args.quiet) level = LogLevel.ERROR;

  return {
    level,
    format: args.logFormat,
    timestamps: true,
    colors: true,
    sinks: args.logFile ? [createFileOutput(args.logFile)] : [],
  };
}

export const HELP_TEXT = `
Legal Case Ingestion

Usage:
  npm run ingest -- [options]

Options:
  --input=DIR         Directory of case PDFs (default: data/raw_cases)
  --output=DIR        Output directory (default: data/extracted_cases)
  --no-bijoy          Keep Bijoy-encoded lines as they are
  --min-length=N      Minimum extracted text length (default: 100)
  --concurrency=N     Number of PDFs to process in parallel (default: 1)
  --timeout=MS        Per-document extraction timeout (default: 60000)
  --verbose           Show detailed logging
  --quiet             Minimal output (errors only)
  --log-format=FMT    Log format: text, json, compact, pretty (default: pretty)
  --log-file=PATH     Also append log lines to PATH
  --help, -h          Show this help

Environment variables:
  INGEST_INPUT_DIR, INGEST_OUTPUT_DIR, INGEST_CONVERT_BIJOY,
  INGEST_MIN_TEXT_LENGTH, INGEST_CONCURRENCY, INGEST_TIMEOUT_MS
  (flags take precedence)
`;
