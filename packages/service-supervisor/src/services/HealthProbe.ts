import { HealthTimeout, formatError } from '../errors.js';
import type { IHealthProbe } from '../interfaces/IHealthProbe.js';
import type { ILogger } from '../interfaces/ILogger.js';
import type { HealthResponse, StatsSnapshot } from '../types.js';

export interface HealthProbeOptions {
  baseUrl: string;
  healthPath?: string;
  statsPath?: string;
  timeoutMs?: number;
  pollIntervalMs?: number;
  logger?: ILogger;
  sourceId?: string;
}

/**
 * Stateless HTTP client for the backend's health and stats endpoints.
 * Every failure is reported as `null`; only `waitUntilHealthy` throws.
 */
export class HealthProbe implements IHealthProbe {
  private readonly healthUrl: string;
  private readonly statsUrl: string;
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;

  constructor(private readonly options: HealthProbeOptions) {
    this.healthUrl = new URL(options.healthPath ?? '/health', options.baseUrl).toString();
    this.statsUrl = new URL(options.statsPath ?? '/v2/stats', options.baseUrl).toString();
    this.timeoutMs = options.timeoutMs ?? 2000;
    this.pollIntervalMs = options.pollIntervalMs ?? 250;
  }

  get url(): string {
    return this.healthUrl;
  }

  async checkOnce(): Promise<HealthResponse | null> {
    return this.probe(this.timeoutMs);
  }

  async waitUntilHealthy(deadlineMs: number): Promise<HealthResponse> {
    const startedAt = Date.now();
    const deadline = startedAt + deadlineMs;

    this.log('info', `Waiting for health at ${this.healthUrl}...`);

    while (Date.now() < deadline) {
      const health = await this.probe(Math.min(this.timeoutMs, Math.max(deadline - Date.now(), 1)));
      if (health) {
        this.log('info', `Service is healthy (status: ${health.status}, version: ${health.version})`);
        return health;
      }

      const wait = Math.min(this.pollIntervalMs, deadline - Date.now());
      if (wait > 0) {
        await new Promise(resolve => setTimeout(resolve, wait));
      }
    }

    throw new HealthTimeout(Date.now() - startedAt);
  }

  async fetchStats(): Promise<StatsSnapshot | null> {
    const body = await this.getJson(this.statsUrl, this.timeoutMs);
    return parseStats(body);
  }

  private async probe(timeoutMs: number): Promise<HealthResponse | null> {
    const body = await this.getJson(this.healthUrl, timeoutMs);
    const health = parseHealth(body);
    if (body !== null && !health) {
      this.log('debug', 'Health check returned a malformed body');
    }
    return health;
  }

  private async getJson(url: string, timeoutMs: number): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        method: 'GET',
        headers: {
          'User-Agent': 'ServiceSupervisor-HealthProbe/1.0',
          Accept: 'application/json',
        },
      });

      if (!response.ok) {
        this.log('debug', `${url} returned status: ${response.status}`);
        await response.body?.cancel();
        return null;
      }

      return await response.json();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        this.log('debug', `${url} timed out after ${timeoutMs}ms`);
      } else {
        this.log('debug', `${url} failed: ${formatError(error)}`);
      }
      return null;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private log(level: 'info' | 'debug', message: string): void {
    this.options.logger?.addLog(this.options.sourceId ?? 'health', level, message);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseHealth(body: unknown): HealthResponse | null {
  if (!isRecord(body) || typeof body.status !== 'string' || typeof body.version !== 'string') {
    return null;
  }
  return { status: body.status, version: body.version };
}

export function parseStats(body: unknown): StatsSnapshot | null {
  if (!isRecord(body) || !isRecord(body.items)) {
    return null;
  }
  const total = body.items.total;
  if (typeof total !== 'number' || !Number.isInteger(total) || total < 0) {
    return null;
  }
  return { total };
}
