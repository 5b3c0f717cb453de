export { Logger, redactSecrets, createSilentLogger } from './logger.js';
export type { LogLevel, LogFormat, LogRecord, LogSink, LoggerOptions } from './logger.js';
