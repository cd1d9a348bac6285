/**
 * Logging Module
 */

export {
  LogLevel,
  LogLevelName,
  LogLevelSchema,
  LogFormatSchema,
  type LogFormat,
  LoggerConfigSchema,
  type LoggerConfig,
  LogColors,
  LogLevelColors,
  stripColors,
} from './types.js';

export { Logger, createLogger, createSilentLogger, createFileOutput } from './logger.js';
