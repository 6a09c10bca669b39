import type { LogEntry, LogOrigin } from '../types.js';

export interface LogQuery {
  /** Newest entries only, oldest first. */
  limit?: number;
  origins?: LogOrigin[];
}

export interface ILogger {
  addLog(sourceId: string, level: LogEntry['level'], message: string, origin?: LogOrigin): void;
  getLogs(sourceId: string, query?: LogQuery): LogEntry[];
  cleanup(): void;
}
