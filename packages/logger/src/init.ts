import { validateLoggerEnv } from './env.schema.js';
import { initLogger } from './logger.js';
import { PinoSink } from './sinks/pino-sink.js';

/**
 * Configure the global logger from LOGGER_* environment variables, writing through pino.
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const config = validateLoggerEnv(env);
  initLogger({
    level: config.LOGGER_LOG_LEVEL,
    sinks: [new PinoSink({ env: config })],
  });
}
