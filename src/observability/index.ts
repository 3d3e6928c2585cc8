export { ContextLogger, silentLogger, errorExtra } from './context-logger.js';
export type { ContextLoggerOptions, LogFormat, LogLevel, WritableOutput } from './context-logger.js';
