export {
  Logger,
  redactSecrets,
  stderrSink,
  createFileSink,
  teeSinks,
  createSilentLogger,
  createRunId,
  type LogLevel,
  type LogFormat,
  type LogSink,
  type LoggerOptions,
  type FileSinkOptions,
} from './logger.js';
