/**
 * Logging for the tracker client and CLI.
 *
 * Lines go to stderr so command output on stdout stays clean, and are
 * appended to a log file when one is configured.
 *
 * @module utils/logger
 */

import { appendFile } from 'fs/promises';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;

  /** A logger writing to the same sinks under a nested scope */
  child(scope: string): Logger;

  /** Resolves once pending log file writes have completed */
  flush(): Promise<void>;
}

export interface LoggerOptions {
  /** Scope shown in brackets on every line */
  scope?: string;

  /** Minimum level written (default: info) */
  level?: LogLevel;

  /** Append lines to this file as well */
  logFile?: string | null;

  /** Line sink (default: console.error) */
  write?: (line: string) => void;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Format a timestamp for log lines
 */
export function formatTimestamp(date: Date = new Date()): string {
  return date.toISOString();
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// =============================================================================
// Logger Implementation
// =============================================================================

/**
 * Shared state between a logger and its children
 */
interface LogSink {
  level: LogLevel;
  logFile: string | null;
  write: (line: string) => void;
  pending: Promise<void>;
}

class ScopedLogger implements Logger {
  private readonly sink: LogSink;
  private readonly scope: string | undefined;

  constructor(sink: LogSink, scope: string | undefined) {
    this.sink = sink;
    this.scope = scope;
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  child(scope: string): Logger {
    return new ScopedLogger(this.sink, this.scope ? `${this.scope}:${scope}` : scope);
  }

  flush(): Promise<void> {
    return this.sink.pending;
  }

  private log(level: LogLevel, message: string): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.sink.level]) {
      return;
    }

    const scope = this.scope ? ` [${this.scope}]` : '';
    const formatted = `[${formatTimestamp()}] ${level.toUpperCase()}${scope} ${message}`;
    this.sink.write(formatted);

    const logFile = this.sink.logFile;
    if (logFile) {
      // Chained so lines land in the file in order
      this.sink.pending = this.sink.pending
        .then(() => appendFile(logFile, formatted + '\n'))
        .catch((err: unknown) => {
          this.sink.logFile = null;
          const reason = err instanceof Error ? err.message : String(err);
          this.sink.write(`[${formatTimestamp()}] WARN Log file disabled: ${reason}`);
        });
    }
  }
}

/**
 * Create a logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ scope: 'tracker', level: 'debug' });
 * logger.debug('connecting');
 * // [2024-01-01T00:00:00.000Z] DEBUG [tracker] connecting
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const sink: LogSink = {
    level: options.level ?? 'info',
    logFile: options.logFile ?? null,
    write: options.write ?? ((line) => console.error(line)),
    pending: Promise.resolve(),
  };
  return new ScopedLogger(sink, options.scope);
}
