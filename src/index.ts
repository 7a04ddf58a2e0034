export * from './events';
export * from './config';
export { createLogger, initLogger, getLogger, type LogLevel, type LoggerOptions } from './logging/logger';
