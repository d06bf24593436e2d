export { createLogger, createSilentLogger, serializeError } from './logger';
export type { LogFields, LogLevel, LogSink, Logger, LoggerOptions } from './logger';
