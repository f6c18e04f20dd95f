/**
 * Utils barrel export
 */

export { logger, LogLevel, parseLogLevel } from './logger.js';
export { FileManager, compareText } from './fileManager.js';
export { SettingsError, UnrecognisedHeaderError, NoInputError } from './errors.js';
export { parseUtcDateTime, formatUtcDateTime } from './dates.js';
