import type { ExitInfo } from './types.js';

export type SupervisorErrorCode =
  | 'SPAWN_FAILED'
  | 'HEALTH_TIMEOUT'
  | 'PROCESS_EXITED'
  | 'UNRESPONSIVE'
  | 'RESTART_IN_PROGRESS'
  | 'START_CANCELLED'
  | 'INVALID_CONFIG';

export class SupervisorError extends Error {
  constructor(
    readonly code: SupervisorErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The executable is missing, not permitted, or the OS refused to create
 * the process. Never retried automatically.
 */
export class SpawnError extends SupervisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SPAWN_FAILED', message, options);
  }
}

/**
 * The process was spawned but never answered a health probe in time.
 * It may still be alive.
 */
export class HealthTimeout extends SupervisorError {
  constructor(readonly elapsedMs: number) {
    super('HEALTH_TIMEOUT', `Health check timed out after ${elapsedMs}ms`);
  }
}

export class ProcessExited extends SupervisorError {
  constructor(readonly exit?: ExitInfo) {
    super('PROCESS_EXITED', 'Service process exited');
  }
}

export class Unresponsive extends SupervisorError {
  constructor(readonly failures: number) {
    super('UNRESPONSIVE', 'Service unresponsive');
  }
}

export class RestartAlreadyInProgress extends SupervisorError {
  constructor() {
    super('RESTART_IN_PROGRESS', 'A restart is already in progress');
  }
}

/**
 * A stop request overtook a start or restart before the health gate.
 */
export class StartCancelled extends SupervisorError {
  constructor() {
    super('START_CANCELLED', 'Start cancelled by stop request');
  }
}

export class ConfigError extends SupervisorError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
