import os from 'node:os';

import pino from 'pino';

import type { LoggerEnvConfig } from '../env.schema.js';
import type { LogEntry, Sink } from '../logger.js';

export interface PinoSinkOptions {
  /** Write JSON lines to this stream instead of configuring a transport. */
  destination?: pino.DestinationStream | undefined;
  env: LoggerEnvConfig;
}

/**
 * Formats a category label to a fixed width, truncating from the left
 * with a horizontal ellipsis (…) when it is too long.
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

function createPinoLogger(options: PinoSinkOptions): pino.Logger {
  const { env } = options;

  const config: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: 'trace',
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options.destination) {
    return pino.pino(config, options.destination);
  }

  // Transports spawn worker threads; never start them under test
  if (env.NODE_ENV === 'test' || !env.LOGGER_CONSOLE_ENABLED) {
    return pino.pino({ ...config, enabled: false });
  }

  if (env.NODE_ENV === 'development') {
    config.transport = {
      target: 'pino-pretty',
      options: {
        ignore: 'pid,hostname,category,categoryLabel,service,environment',
        messageFormat: '[{categoryLabel}] {msg}',
      },
    };
  }

  return pino.pino(config);
}

/**
 * Sink that forwards entries to pino, JSON to stdout in production and
 * pino-pretty in development.
 */
export class PinoSink implements Sink {
  private readonly pinoLogger: pino.Logger;

  constructor(options: PinoSinkOptions) {
    this.pinoLogger = createPinoLogger(options);
  }

  write(entry: LogEntry): void {
    const fields = {
      ...entry.context,
      category: entry.category,
      categoryLabel: formatLabel(entry.category, 25),
    };
    this.pinoLogger[entry.level](fields, entry.msg);
  }

  flush(): void {
    this.pinoLogger.flush();
  }
}
