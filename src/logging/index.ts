export {
  logger,
  createLogger,
  createChildLogger,
  parseLogLevel,
  type Logger,
  type LoggerOptions,
} from './logger';
