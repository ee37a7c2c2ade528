/**
 * Logger - Lightweight logging for provision runs
 *
 * Features:
 * - 5 log levels: silent, errors, warnings, info, debug
 * - Context support for structured logging
 * - Console and file output (or both via MultiLogger)
 * - Safe handling of circular references and symbols (UNKNOWN state)
 *
 * Console output goes to stderr so that `--json` reports on stdout stay parseable.
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Reconciling resource', { id: 'firewall-stealth' });
 *
 *   // Keep a full debug trace of the run on disk:
 *   const logger = createLogger('info', { logFile: '/var/log/provision.log' });
 */

import { createWriteStream, existsSync, writeFileSync, mkdirSync, accessSync, statSync, constants, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import type { Logger, LogLevel } from '@provision/types';

export type { Logger, LogLevel };

type LogMethod = keyof Logger;

/**
 * Log level priorities (higher = more verbose)
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

/**
 * Minimum level required for each method
 */
const METHOD_LEVELS: Record<LogMethod, number> = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

const METHOD_TAGS: Record<LogMethod, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVEL_PRIORITY;
}

/**
 * Safe JSON stringify that handles circular references
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'symbol') {
      return value.description ?? 'symbol';
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

/**
 * Format log message with optional context
 */
export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Shared level filtering; subclasses decide where a line goes.
 */
abstract class LevelFilteredLogger implements Logger {
  private readonly priority: number;

  constructor(logLevel: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[logLevel];
  }

  protected abstract write(method: LogMethod, message: string, context?: Record<string, unknown>): void;

  private emit(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    if (this.priority < METHOD_LEVELS[method]) return;
    this.write(method, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.emit('trace', message, context);
  }
}

/**
 * Console-based Logger implementation
 *
 * Respects log level threshold - methods below threshold are no-ops.
 * Lines look like `[WARN] message {"key":"value"}`.
 */
export class ConsoleLogger extends LevelFilteredLogger {
  private readonly sink: (line: string) => void;

  constructor(logLevel: LogLevel = 'info', sink: (line: string) => void = (line) => console.error(line)) {
    super(logLevel);
    this.sink = sink;
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    this.sink(formatMessage(`[${METHOD_TAGS[method]}] ${message}`, context));
  }
}

/**
 * File-based Logger implementation
 *
 * Writes log messages to a file with ISO timestamps using a write stream
 * (non-blocking I/O). File is truncated on construction (overwritten each run).
 * Parent directories are created automatically.
 *
 * Validates path on construction — throws if the directory is not writable
 * or the path points to a directory.
 */
export class FileLogger extends LevelFilteredLogger {
  private readonly stream: WriteStream;

  constructor(logLevel: LogLevel, filePath: string) {
    super(logLevel);
    const resolvedPath = resolve(filePath);

    const dir = dirname(resolvedPath);
    mkdirSync(dir, { recursive: true });

    try {
      accessSync(dir, constants.W_OK);
    } catch {
      throw new Error(`Cannot write log file: directory '${dir}' is not writable`);
    }

    if (existsSync(resolvedPath) && statSync(resolvedPath).isDirectory()) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    // Truncate/create synchronously (validates writeability),
    // then append through a stream for non-blocking writes
    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    // A broken log file must not abort a reconciliation run
    this.stream.on('error', (err) => {
      console.error(`[WARN] Log file write failed: ${err.message}`);
    });
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    this.stream.write(formatMessage(`${timestamp} [${METHOD_TAGS[method]}] ${message}`, context) + '\n');
  }

  /** Flush and close the write stream. Returns when all data is written. */
  close(): Promise<void> {
    return new Promise((resolve) => {
      this.stream.end(resolve);
    });
  }
}

/**
 * Multi-output Logger that delegates to multiple Logger instances.
 *
 * Each inner logger applies its own level filtering independently.
 */
export class MultiLogger implements Logger {
  private readonly loggers: Logger[];

  constructor(loggers: Logger[]) {
    this.loggers = loggers;
  }

  error(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  /** Close all inner FileLoggers. */
  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Close a logger created by createLogger() if it holds a file stream.
 */
export async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof FileLogger || logger instanceof MultiLogger) {
    await logger.close();
  }
}

/**
 * Create a Logger instance with the specified log level.
 *
 * When logFile is specified, returns a MultiLogger that writes to both
 * console and file. The file logger always captures at 'debug' level
 * for complete post-mortem debugging, regardless of the console level.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    const fileLogger = new FileLogger('debug', options.logFile);
    return new MultiLogger([consoleLogger, fileLogger]);
  }

  return consoleLogger;
}
