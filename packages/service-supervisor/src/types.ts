import type { SupervisorErrorCode } from './errors.js';

export type ServiceState =
  | { kind: 'starting' }
  | { kind: 'running' }
  | { kind: 'restarting' }
  | { kind: 'stopped' }
  | { kind: 'error'; reason: string; code?: SupervisorErrorCode };

export type ServiceStateKind = ServiceState['kind'];

export interface LaunchSpec {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  workingDir?: string;

  // Fixed bind address of the backend
  host?: string;
  port?: number;
}

export interface HealthResponse {
  status: string;
  version: string;
}

export interface StatsSnapshot {
  total: number;
}

export type MonitorPolicy = 'report' | 'respawn';

export interface SupervisorConfig {
  // Backend endpoint; derived from the launch spec's host/port when omitted
  baseUrl?: string;
  healthPath: string;
  statsPath: string;

  probeTimeoutMs: number;
  healthPollIntervalMs: number;
  startupTimeoutMs: number;
  restartGraceMs: number;

  monitorIntervalMs: number;
  monitorInitialDelayMs?: number;
  failureThreshold: number;
  monitorPolicy: MonitorPolicy;

  statusIntervalMs: number;
  statsIntervalMs: number;

  killProcessTree: boolean;
  autoStart: boolean;
}

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export type LogOrigin = 'stdout' | 'stderr' | 'system';

export interface LogEntry {
  timestamp: Date;
  level: 'info' | 'warn' | 'error' | 'debug';
  message: string;
  /** Set for lines captured from the child process. */
  source?: LogOrigin;
}

export interface TrayLabels {
  status: string;
  action: string;
}

export interface StatusSink {
  onStatusChange(state: ServiceState, labels: TrayLabels): void;
  onItemCount(count: number | null, label: string): void;
}
