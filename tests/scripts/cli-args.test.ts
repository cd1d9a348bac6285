/**
 * Tests for ingest-cases argument parsing
 */

import { describe, it, expect } from 'vitest';
import { LogLevel } from '@legal-ingest/lib';
import {
  CliUsageError,
  HELP_TEXT,
  parseArgs,
  toConfigOverrides,
  toLoggerConfig,
} from '../../scripts/src/cli-args.js';

describe('parseArgs', () => {
  it('should return defaults for no arguments', () => {
    expect(parseArgs([])).toEqual({
      verbose: false,
      quiet: false,
      logFormat: 'pretty',
      help: false,
    });
  });

  it('should parse every value flag', () => {
    const args = parseArgs([
      '--input=cases/in',
      '--output=cases/out',
      '--min-length=0',
      '--concurrency=4',
      '--timeout=30000',
      '--log-format=json',
      '--log-file=cases/out/ingestion.log',
    ]);

    expect(args).toMatchObject({
      inputDir: 'cases/in',
      outputDir: 'cases/out',
      minTextLength: 0,
      concurrency: 4,
      timeoutMs: 30000,
      logFormat: 'json',
      logFile: 'cases/out/ingestion.log',
    });
  });

  it('should parse switches', () => {
    expect(parseArgs(['--no-bijoy', '--verbose', '-h'])).toMatchObject({
      convertBijoy: false,
      verbose: true,
      help: true,
    });
  });

  it('should keep everything after the first = in a value', () => {
    expect(parseArgs(['--input=a=b']).inputDir).toBe('a=b');
  });

  it('should reject unknown arguments', () => {
    expect(() => parseArgs(['--inputs=x'])).toThrow(new CliUsageError('Unknown argument: --inputs=x'));
  });

  it.each([
    ['--concurrency=0', 'Invalid value for --concurrency: 0'],
    ['--timeout=1.5', 'Invalid value for --timeout: 1.5'],
    ['--min-length=-1', 'Invalid value for --min-length: -1'],
    ['--log-format=xml', 'Invalid value for --log-format: xml'],
  ])('should reject %s', (arg, message) => {
    expect(() => parseArgs([arg])).toThrow(message);
  });
});

describe('toConfigOverrides', () => {
  it('should carry only the flags that were given', () => {
    expect(toConfigOverrides(parseArgs(['--output=out', '--no-bijoy']))).toEqual({
      outputDir: 'out',
      convertBijoy: false,
    });
  });

  it('should be empty without flags', () => {
    expect(toConfigOverrides(parseArgs([]))).toEqual({});
  });
});

describe('toLoggerConfig', () => {
  it('should log at info by default', () => {
    expect(toLoggerConfig(parseArgs([]))).toEqual({
      level: LogLevel.INFO,
      format: 'pretty',
      timestamps: true,
      colors: true,
      sinks: [],
    });
  });

  it('should map --verbose and --quiet to levels', () => {
    expect(toLoggerConfig(parseArgs(['--verbose'])).level).toBe(LogLevel.DEBUG);
    expect(toLoggerConfig(parseArgs(['--quiet'])).level).toBe(LogLevel.ERROR);
  });

  it('should add a file sink for --log-file', () => {
    const config = toLoggerConfig(parseArgs(['--log-file=ingestion.log']));

    expect(config.sinks).toHaveLength(1);
    expect(typeof config.sinks?.[0]).toBe('function');
  });
});

describe('HELP_TEXT', () => {
  it('should document every flag', () => {
    for (const flag of [
      '--input',
      '--output',
      '--no-bijoy',
      '--min-length',
      '--concurrency',
      '--timeout',
      '--verbose',
      '--quiet',
      '--log-format',
      '--log-file',
      '--help',
    ]) {
      expect(HELP_TEXT).toContain(flag);
    }
  });
});
