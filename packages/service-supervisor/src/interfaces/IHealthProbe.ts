import type { HealthResponse, StatsSnapshot } from '../types.js';

export interface IHealthProbe {
  checkOnce(): Promise<HealthResponse | null>;
  waitUntilHealthy(deadlineMs: number): Promise<HealthResponse>;
  fetchStats(): Promise<StatsSnapshot | null>;
}
