import { ProcessExited, SpawnError, SupervisorError, Unresponsive, formatError } from '../errors.js';
import type { IHealthProbe } from '../interfaces/IHealthProbe.js';
import type { ILogger } from '../interfaces/ILogger.js';
import type { LaunchSpec, MonitorPolicy, ServiceState } from '../types.js';
import type { ServiceSupervisor } from './ServiceSupervisor.js';

export interface MonitorLoopOptions {
  supervisor: ServiceSupervisor;
  probe: IHealthProbe;
  logger: ILogger;
  intervalMs?: number;
  initialDelayMs?: number;
  failureThreshold?: number;
  policy?: MonitorPolicy;
  startupTimeoutMs?: number;
  // Only consulted by the `respawn` policy
  getLaunchSpec?: () => LaunchSpec | undefined;
}

export type TickOutcome =
  | 'skipped'
  | 'healthy'
  | 'probe-failed'
  | 'unresponsive'
  | 'process-exited'
  | 'respawned'
  | 'respawn-failed';

export class MonitorLoop {
  private consecutiveFailures = 0;
  private timer: NodeJS.Timeout | null = null;
  private active = false;
  private ticking = false;
  private readonly intervalMs: number;
  private readonly threshold: number;
  private readonly policy: MonitorPolicy;

  constructor(private readonly options: MonitorLoopOptions) {
    this.intervalMs = options.intervalMs ?? 5000;
    this.threshold = options.failureThreshold ?? 3;
    this.policy = options.policy ?? 'report';
  }

  get failures(): number {
    return this.consecutiveFailures;
  }

  get isActive(): boolean {
    return this.active;
  }

  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    this.log('info', `Monitor started (interval: ${this.intervalMs}ms, threshold: ${this.threshold}, policy: ${this.policy})`);
    this.schedule(this.options.initialDelayMs ?? this.intervalMs);
  }

  stop(): void {
    if (!this.active) {
      return;
    }
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.log('info', 'Monitor stopped');
  }

  /**
   * One monitoring pass. A pass that starts while another is still running
   * is skipped.
   */
  async tick(): Promise<TickOutcome> {
    if (this.ticking) {
      return 'skipped';
    }

    this.ticking = true;
    try {
      return await this.evaluate();
    } finally {
      this.ticking = false;
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      void this.runScheduledTick();
    }, delayMs);
  }

  private async runScheduledTick(): Promise<void> {
    try {
      await this.tick();
    } catch (error) {
      this.log('error', `Monitor tick failed: ${formatError(error)}`);
    }

    if (this.active) {
      this.schedule(this.intervalMs);
    }
  }

  private async evaluate(): Promise<TickOutcome> {
    const { supervisor, probe } = this.options;

    // Deliberately stopped
    if (!supervisor.shouldAutoRestart()) {
      return 'skipped';
    }

    // A startup gate owns these windows; `stopped` means never started or stopped on purpose
    const status = supervisor.getStatus();
    if (
      status.kind === 'starting' ||
      status.kind === 'restarting' ||
      status.kind === 'stopped' ||
      supervisor.isRestartInProgress()
    ) {
      return 'skipped';
    }

    if (!supervisor.isRunning()) {
      return this.policy === 'respawn'
        ? this.respawn(status)
        : this.reportExit(status);
    }

    const health = await probe.checkOnce();

    if (!supervisor.shouldAutoRestart()) {
      return 'skipped';
    }

    if (health) {
      // An error state stays until the user starts or restarts
      this.consecutiveFailures = 0;
      return 'healthy';
    }

    this.consecutiveFailures++;
    this.log('warn', `Health check failed (${this.consecutiveFailures}/${this.threshold})`);

    if (this.consecutiveFailures < this.threshold) {
      return 'probe-failed';
    }

    if (supervisor.getStatus().kind !== 'error') {
      this.log('error', 'Too many health check failures, marking as error');
      const error = new Unresponsive(this.consecutiveFailures);
      supervisor.markError(error.message, error.code);
    }
    return 'unresponsive';
  }

  private reportExit(status: ServiceState): TickOutcome {
    if (status.kind !== 'error') {
      this.log('error', 'Service process is not running');
      const error = new ProcessExited();
      this.options.supervisor.markError(error.message, error.code);
    }
    return 'process-exited';
  }

  private async respawn(status: ServiceState): Promise<TickOutcome> {
    const { supervisor, probe } = this.options;
    const spec = this.options.getLaunchSpec?.();

    // Spawn failures are not retried automatically
    if (!spec || (status.kind === 'error' && status.code === 'SPAWN_FAILED')) {
      return this.reportExit(status);
    }

    const lease = supervisor.tryAcquireRestart();
    if (!lease) {
      return 'skipped';
    }

    try {
      this.reportExit(status);
      this.log('warn', 'Attempting to respawn service');

      await supervisor.start(spec);
      await probe.waitUntilHealthy(this.options.startupTimeoutMs ?? 30000);

      if (!supervisor.shouldAutoRestart()) {
        return 'skipped';
      }

      supervisor.markRunning();
      this.consecutiveFailures = 0;
      this.log('info', 'Service respawned and healthy');
      return 'respawned';
    } catch (error) {
      this.log('error', `Respawn failed: ${formatError(error)}`);
      if (error instanceof SupervisorError && !(error instanceof SpawnError) && supervisor.shouldAutoRestart()) {
        supervisor.markError(error.message, error.code);
      }
      return 'respawn-failed';
    } finally {
      lease.release();
    }
  }

  private log(level: 'info' | 'warn' | 'error', message: string): void {
    this.options.logger.addLog(this.options.supervisor.id, level, `[Monitor] ${message}`);
  }
}
