import { formatError } from '../errors.js';
import type { IHealthProbe } from '../interfaces/IHealthProbe.js';
import type { ILogger } from '../interfaces/ILogger.js';
import type { ServiceState, StatusSink } from '../types.js';
import { itemCountLabel, statesEqual, trayLabels } from '../utils/state.js';
import type { ServiceSupervisor } from './ServiceSupervisor.js';

export interface StatusPublisherOptions {
  supervisor: Pick<ServiceSupervisor, 'getStatus'>;
  probe: Pick<IHealthProbe, 'fetchStats'>;
  sink: StatusSink;
  logger?: ILogger;
  /** Log source for refresh failures, normally the supervisor id. */
  sourceId?: string;
  statusIntervalMs?: number;
  statsIntervalMs?: number;
}

/**
 * Read-only view of the supervisor for the tray: pushes label changes when
 * the state changes and refreshes the item count on a slower timer.
 */
export class StatusPublisher {
  private lastState: ServiceState | null = null;
  private statusTimer: NodeJS.Timeout | null = null;
  private statsTimer: NodeJS.Timeout | null = null;
  private statsInFlight = false;

  constructor(private readonly options: StatusPublisherOptions) {}

  start(): void {
    if (this.statusTimer) {
      return;
    }

    this.pollStatus();
    void this.refreshStats();

    this.statusTimer = setInterval(() => this.pollStatus(), this.options.statusIntervalMs ?? 2000);
    this.statsTimer = setInterval(() => {
      void this.refreshStats();
    }, this.options.statsIntervalMs ?? 30000);
  }

  stop(): void {
    if (this.statusTimer) {
      clearInterval(this.statusTimer);
      this.statusTimer = null;
    }
    if (this.statsTimer) {
      clearInterval(this.statsTimer);
      this.statsTimer = null;
    }
  }

  /**
   * Returns true when the observed state differed from the last one and
   * the sink was notified.
   */
  pollStatus(): boolean {
    const state = this.options.supervisor.getStatus();
    if (this.lastState && statesEqual(this.lastState, state)) {
      return false;
    }

    this.lastState = state;
    this.options.sink.onStatusChange(state, trayLabels(state));
    return true;
  }

  async pollStats(): Promise<number | null> {
    const { supervisor, probe, sink } = this.options;

    let count: number | null = null;
    if (supervisor.getStatus().kind === 'running') {
      const stats = await probe.fetchStats();
      // Discard a result that arrived after the service left `running`
      if (supervisor.getStatus().kind === 'running') {
        count = stats?.total ?? null;
      }
    }

    sink.onItemCount(count, itemCountLabel(count));
    return count;
  }

  private async refreshStats(): Promise<void> {
    if (this.statsInFlight) {
      return;
    }

    this.statsInFlight = true;
    try {
      await this.pollStats();
    } catch (error) {
      this.options.logger?.addLog(this.options.sourceId ?? 'status', 'warn', `Stats refresh failed: ${formatError(error)}`);
    } finally {
      this.statsInFlight = false;
    }
  }
}
