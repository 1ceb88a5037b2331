export { createLogger, formatLogLine, type Logger, type LogData } from './debug.js';
export { getErrorMessage, isErrnoException } from './error.js';
