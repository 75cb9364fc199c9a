export {
  initLogger,
  getLogger,
  flushLoggers,
  resetLoggers,
  serializeContext,
  type Logger,
  type LogFields,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
export { initLoggerFromEnv } from './init.js';
export { PinoSink, formatLabel, type PinoSinkOptions } from './sinks/pino-sink.js';
export { MemorySink } from './sinks/memory-sink.js';
