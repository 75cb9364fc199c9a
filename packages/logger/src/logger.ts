import type { z } from 'zod';

import type { logLevelSchema } from './env.schema.js';

export type LogLevel = z.infer<typeof logLevelSchema>;

export type LogFields = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: LogFields;
}

/**
 * Destination for log entries. The default destination is pino (see PinoSink);
 * tests usually install a MemorySink.
 */
export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface Logger {
  trace(msg: string): void;
  trace(obj: LogFields, msg: string): void;
  debug(msg: string): void;
  debug(obj: LogFields, msg: string): void;
  info(msg: string): void;
  info(obj: LogFields, msg: string): void;
  warn(msg: string): void;
  warn(obj: LogFields, msg: string): void;
  error(msg: string): void;
  error(obj: LogFields, msg: string): void;
  /** Derive a logger that adds `bindings` to every entry it writes. */
  child(bindings: LogFields): Logger;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

const levelOrder: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Make structured fields JSON-safe: errors become {name, message, stack},
 * bigints become strings and repeated references become '[Circular]'.
 */
export function serializeContext(obj: LogFields): LogFields {
  const seen = new WeakSet<object>();

  const replacer = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }

    if (typeof value === 'bigint') {
      return value.toString();
    }

    if (value instanceof RegExp) {
      return value.source;
    }

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };

  try {
    const parsed: unknown = JSON.parse(JSON.stringify(obj, replacer));
    return typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
  } catch {
    return { error: '[unserializable]' };
  }
}

class CategoryLogger implements Logger {
  constructor(
    private readonly category: string,
    private readonly bindings: LogFields = {}
  ) {}

  trace(msgOrObj: string | LogFields, maybeMsg?: string): void {
    this.log('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | LogFields, maybeMsg?: string): void {
    this.log('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | LogFields, maybeMsg?: string): void {
    this.log('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | LogFields, maybeMsg?: string): void {
    this.log('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | LogFields, maybeMsg?: string): void {
    this.log('error', msgOrObj, maybeMsg);
  }

  child(bindings: LogFields): Logger {
    return new CategoryLogger(this.category, { ...this.bindings, ...bindings });
  }

  private log(level: LogLevel, msgOrObj: string | LogFields, maybeMsg?: string): void {
    if (levelOrder[level] < levelOrder[globalConfig.level]) return;

    const msg = typeof msgOrObj === 'string' ? msgOrObj : (maybeMsg ?? '');
    const fields = typeof msgOrObj === 'string' ? this.bindings : { ...this.bindings, ...msgOrObj };
    const context = Object.keys(fields).length > 0 ? serializeContext(fields) : undefined;

    const entry: LogEntry = {
      level,
      category: this.category,
      timestamp: new Date(),
      msg,
      ...(context ? { context } : {}),
    };

    for (const sink of globalConfig.sinks) {
      sink.write(entry);
    }
  }
}

// Silent until initLogger installs sinks
let globalConfig: Required<LoggerConfig> = {
  level: 'info',
  sinks: [],
};

const loggerCache = new Map<string, Logger>();

export function initLogger(config: LoggerConfig): void {
  globalConfig = {
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
  };
}

export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) {
    return cached;
  }

  const logger = new CategoryLogger(category);
  loggerCache.set(category, logger);
  return logger;
}

export function flushLoggers(): void {
  for (const sink of globalConfig.sinks) {
    sink.flush();
  }
}

/**
 * Drop all sinks and cached category loggers.
 */
export function resetLoggers(): void {
  globalConfig = { level: 'info', sinks: [] };
  loggerCache.clear();
}
