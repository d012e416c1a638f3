export {
  TetherLogger,
  consoleSink,
  createLogger,
  defaultLogger,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type TetherLoggerConfig,
} from './logger.js';
