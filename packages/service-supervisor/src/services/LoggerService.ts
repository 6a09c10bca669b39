import chalk from 'chalk';
import type { ILogger, LogQuery } from '../interfaces/ILogger.js';
import type { LogEntry, LogOrigin } from '../types.js';

export interface LoggerOptions {
  /** Entries kept per supervisor; the oldest fall off first. */
  maxLogsPerSource?: number;
  retentionHours?: number;
  /** Echo entries to the terminal. */
  console?: boolean;
}

const MAX_MESSAGE_LENGTH = 1000;

/**
 * Keeps the supervisor's own messages and the lines its child prints,
 * so the shell can show why a backend failed without a log file.
 */
export class LoggerService implements ILogger {
  private readonly buffers = new Map<string, LogEntry[]>();
  private readonly capacity: number;
  private readonly retentionMs: number;
  private readonly echo: boolean;

  constructor(options: LoggerOptions = {}) {
    this.capacity = options.maxLogsPerSource ?? 1000;
    this.retentionMs = (options.retentionHours ?? 24) * 60 * 60 * 1000;
    this.echo = options.console ?? true;
  }

  addLog(sourceId: string, level: LogEntry['level'], message: string, origin?: LogOrigin): void {
    const entry: LogEntry = { timestamp: new Date(), level, message: clean(message), source: origin };

    let buffer = this.buffers.get(sourceId);
    if (!buffer) {
      buffer = [];
      this.buffers.set(sourceId, buffer);
    }
    buffer.push(entry);
    if (buffer.length > this.capacity) {
      buffer.shift();
    }

    if (this.echo) {
      print(sourceId, entry);
    }
  }

  getLogs(sourceId: string, query: LogQuery = {}): LogEntry[] {
    const buffer = this.buffers.get(sourceId) ?? [];
    const { origins, limit } = query;

    const matching = origins
      ? buffer.filter(entry => entry.source !== undefined && origins.includes(entry.source))
      : buffer;

    return limit !== undefined && limit > 0 ? matching.slice(-limit) : [...matching];
  }

  /** Drops entries older than the retention window. */
  cleanup(): void {
    const cutoff = Date.now() - this.retentionMs;

    for (const [sourceId, buffer] of this.buffers) {
      const firstKept = buffer.findIndex(entry => entry.timestamp.getTime() > cutoff);
      if (firstKept === -1) {
        this.buffers.delete(sourceId);
      } else if (firstKept > 0) {
        buffer.splice(0, firstKept);
      }
    }
  }
}

function clean(message: string): string {
  return message.replace(/[\x00-\x1F\x7F]/g, '').slice(0, MAX_MESSAGE_LENGTH).trim();
}

function print(sourceId: string, entry: LogEntry): void {
  const head = `${entry.timestamp.toISOString()} ${sourceId.slice(0, 8)} ${entry.level.toUpperCase().padEnd(5)}`;

  if (entry.source === 'stdout' || entry.source === 'stderr') {
    // Child output
    const line = `${head} ${entry.source}| ${entry.message}`;
    console.log(entry.source === 'stderr' ? chalk.yellow(line) : chalk.gray(line));
    return;
  }

  const line = `${head} ${entry.message}`;
  if (entry.level === 'error') {
    console.error(chalk.red(line));
  } else if (entry.level === 'warn') {
    console.warn(chalk.yellow(line));
  } else if (entry.level === 'info') {
    console.log(line);
  } else if (process.env.DEBUG) {
    console.debug(chalk.gray(line));
  }
}
