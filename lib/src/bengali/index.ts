/**
 * Bengali Script Module
 *
 * Script detection and Bijoy to Unicode conversion.
 */

// Types and schemas
export {
  ScriptVerdict,
  ScriptVerdictSchema,
  BengaliEncodingSchema,
  ScriptStatsSchema,
  ConversionResultSchema,
  SCRIPT_THRESHOLDS,
  BIJOY_LINE_THRESHOLD,
  BijoyConversionError,
  isBijoyConversionError,
  type BengaliEncoding,
  type ScriptStats,
  type ScriptClassification,
  type LegacyCodec,
  type ConversionResult,
} from './types.js';

// Document-level classification
export {
  classifyScript,
  verdictFromStats,
  countUnicodeBengali,
  countBijoyIndicators,
  isBengaliChar,
  isBijoyChar,
} from './script-classifier.js';

// Codec
export { createBijoyCodec, convertBijoyToUnicode, loadBijoyMap } from './bijoy-codec.js';

// Per-line conversion
export {
  isBijoyLine,
  createLineConverter,
  convertDocument,
  type LineConverter,
  type LineConverterOptions,
} from './line-converter.js';
