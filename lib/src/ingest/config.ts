/**
 * Ingestion Configuration
 *
 * Configuration values are read from environment variables; explicit
 * overrides (CLI flags) win over the environment.
 */

import { type IngestConfig, IngestConfigSchema } from './types.js';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Parse a boolean flag; unrecognized values are returned as-is so that
 * validation reports them
 */
function parseBooleanEnv(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return value;
}

function parseIntegerEnv(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return Number(value);
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Loads ingestion configuration.
 *
 * Optional environment variables:
 * - INGEST_INPUT_DIR: Directory of PDFs (default: 'data/raw_cases')
 * - INGEST_OUTPUT_DIR: Output directory (default: 'data/extracted_cases')
 * - INGEST_CONVERT_BIJOY: Convert Bijoy lines (default: true)
 * - INGEST_MIN_TEXT_LENGTH: Minimum extracted length (default: 100)
 * - INGEST_CONCURRENCY: Documents processed at once (default: 1)
 * - INGEST_TIMEOUT_MS: Per-document extraction timeout (default: 60000)
 *
 * @throws {z.ZodError} If a value is invalid
 */
export function loadIngestConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<IngestConfig> = {}
): IngestConfig {
  const fromEnv = withoutUndefined({
    inputDir: env['INGEST_INPUT_DIR'] || undefined,
    outputDir: env['INGEST_OUTPUT_DIR'] || undefined,
    convertBijoy: parseBooleanEnv(env['INGEST_CONVERT_BIJOY']),
    minTextLength: parseIntegerEnv(env['INGEST_MIN_TEXT_LENGTH']),
    concurrency: parseIntegerEnv(env['INGEST_CONCURRENCY']),
    timeoutMs: parseIntegerEnv(env['INGEST_TIMEOUT_MS']),
  });

  return IngestConfigSchema.parse({ ...fromEnv, ...withoutUndefined(overrides) });
}
