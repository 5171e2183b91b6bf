/**
 * Tagged, levelled logger.
 *
 * Lines look like `[watch-manager] 2026-01-05T10:00:00.000Z - message`.
 * The console copy goes to stderr, coloured by level; an optional file
 * copy is written uncoloured through a serialized append queue so that
 * lines from concurrent tasks never interleave.
 *
 * @module logging/logger
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: pc.dim,
  info: pc.blue,
  warn: pc.yellow,
  error: pc.red,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Derive a logger with a different tag sharing the same outputs. */
  child(tag: string): Logger;
}

/** Receives a fully formatted line (no trailing newline). */
export type LogSink = (line: string, level: LogLevel) => void;

export interface LoggerOptions {
  tag: string;
  level?: LogLevel;
  /** Append an uncoloured copy of every line to this file. */
  filePath?: string;
  /** Console output; defaults to coloured stderr. */
  sink?: LogSink;
  /** Clock override for tests. */
  now?: () => Date;
}

/** Format one log line without colour. */
export function formatLine(tag: string, time: Date, message: string): string {
  return `[${tag}] ${time.toISOString()} - ${message}`;
}

function stderrSink(line: string, level: LogLevel): void {
  const bracketEnd = line.indexOf(']') + 1;
  const tag = line.slice(0, bracketEnd);
  process.stderr.write(`${LEVEL_COLOR[level](tag)}${line.slice(bracketEnd)}\n`);
}

/**
 * Serialized file appender shared by a logger and all its children.
 */
class FileAppender {
  private queue: Promise<void> = Promise.resolve();
  private dirEnsured = false;
  private failed = false;

  constructor(private readonly filePath: string) {}

  append(line: string): void {
    this.queue = this.queue.then(() => this.write(line));
  }

  /** Resolves once every queued line has been written. */
  flush(): Promise<void> {
    return this.queue;
  }

  private async write(line: string): Promise<void> {
    if (this.failed) return;
    try {
      if (!this.dirEnsured) {
        await mkdir(dirname(this.filePath), { recursive: true });
        this.dirEnsured = true;
      }
      await appendFile(this.filePath, `${line}\n`, 'utf-8');
    } catch (err) {
      // Report once, then keep logging to the console only
      this.failed = true;
      process.stderr.write(
        `[logger] cannot write ${this.filePath}: ${err instanceof Error ? err.message : String(err)}\n`,
      );
    }
  }
}

class TaggedLogger implements Logger {
  constructor(
    private readonly tag: string,
    private readonly threshold: number,
    private readonly sink: LogSink,
    private readonly now: () => Date,
    private readonly appender: FileAppender | null,
  ) {}

  debug(message: string): void {
    this.emit('debug', message);
  }

  info(message: string): void {
    this.emit('info', message);
  }

  warn(message: string): void {
    this.emit('warn', message);
  }

  error(message: string): void {
    this.emit('error', message);
  }

  child(tag: string): Logger {
    return new TaggedLogger(tag, this.threshold, this.sink, this.now, this.appender);
  }

  flush(): Promise<void> {
    return this.appender?.flush() ?? Promise.resolve();
  }

  private emit(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < this.threshold) return;
    const line = formatLine(this.tag, this.now(), message);
    this.sink(line, level);
    this.appender?.append(line);
  }
}

/** A logger whose file output can be awaited (used on shutdown). */
export interface RootLogger extends Logger {
  flush(): Promise<void>;
}

export function createLogger(options: LoggerOptions): RootLogger {
  return new TaggedLogger(
    options.tag,
    LEVEL_ORDER[options.level ?? 'info'],
    options.sink ?? stderrSink,
    options.now ?? (() => new Date()),
    options.filePath ? new FileAppender(options.filePath) : null,
  );
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
