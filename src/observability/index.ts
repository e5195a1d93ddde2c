export { ContextLogger, silentLogger } from './context-logger.js';
export type { LogLevel, LogFormat, WritableOutput, LoggerBindings, ContextLoggerOptions } from './context-logger.js';
