export { createLogger, setLogLevel, getLogLevel, setLogSink, errorMessage } from './logger';
export type { Logger, LogEntry, LogSink } from './logger';
