import { RestartAlreadyInProgress, StartCancelled, SupervisorError, formatError } from '../errors.js';
import type { IHealthProbe } from '../interfaces/IHealthProbe.js';
import type { ILogger } from '../interfaces/ILogger.js';
import type { ProcessLauncher } from '../interfaces/IProcessHandle.js';
import type { HealthResponse, LaunchSpec, LogEntry, ServiceState, StatsSnapshot, StatusSink, SupervisorConfig } from '../types.js';
import { DEFAULT_SUPERVISOR_CONFIG, resolveBaseUrl, validateConfig, validateLaunchSpec } from '../utils/config.js';
import { HealthProbe } from './HealthProbe.js';
import { LoggerService } from './LoggerService.js';
import { MonitorLoop } from './MonitorLoop.js';
import { ServiceSupervisor } from './ServiceSupervisor.js';
import { StatusPublisher } from './StatusPublisher.js';

export interface ServiceManagerOptions {
  launchSpec: LaunchSpec;
  config?: Partial<SupervisorConfig>;
  logger?: ILogger;
  probe?: IHealthProbe;
  launcher?: ProcessLauncher;
  sink?: StatusSink;
}

/**
 * What the desktop shell talks to: pairs every start or restart with the
 * health gate, and owns the monitor and tray publisher timers.
 */
export class ServiceManager {
  readonly config: SupervisorConfig;
  readonly supervisor: ServiceSupervisor;
  readonly probe: IHealthProbe;
  readonly monitor: MonitorLoop;
  readonly publisher: StatusPublisher | null;
  private readonly logger: ILogger;
  private launchSpec: LaunchSpec;
  private cleanupInterval: NodeJS.Timeout | null = null;
  private isShutDown = false;

  constructor(options: ServiceManagerOptions) {
    this.config = { ...DEFAULT_SUPERVISOR_CONFIG, ...options.config };
    validateConfig(this.config);
    validateLaunchSpec(options.launchSpec);

    this.launchSpec = options.launchSpec;
    this.logger = options.logger ?? new LoggerService();

    this.supervisor = new ServiceSupervisor({
      logger: this.logger,
      restartGraceMs: this.config.restartGraceMs,
      killProcessTree: this.config.killProcessTree,
      launcher: options.launcher,
    });

    this.probe = options.probe ?? new HealthProbe({
      baseUrl: resolveBaseUrl(this.config, options.launchSpec),
      healthPath: this.config.healthPath,
      statsPath: this.config.statsPath,
      timeoutMs: this.config.probeTimeoutMs,
      pollIntervalMs: this.config.healthPollIntervalMs,
      logger: this.logger,
      sourceId: this.supervisor.id,
    });

    this.monitor = new MonitorLoop({
      supervisor: this.supervisor,
      probe: this.probe,
      logger: this.logger,
      intervalMs: this.config.monitorIntervalMs,
      initialDelayMs: this.config.monitorInitialDelayMs,
      failureThreshold: this.config.failureThreshold,
      policy: this.config.monitorPolicy,
      startupTimeoutMs: this.config.startupTimeoutMs,
      getLaunchSpec: () => this.launchSpec,
    });

    this.publisher = options.sink
      ? new StatusPublisher({
          supervisor: this.supervisor,
          probe: this.probe,
          sink: options.sink,
          logger: this.logger,
          sourceId: this.supervisor.id,
          statusIntervalMs: this.config.statusIntervalMs,
          statsIntervalMs: this.config.statsIntervalMs,
        })
      : null;

    this.logger.addLog(this.supervisor.id, 'info', 'ServiceManager initialized');
  }

  getLaunchSpec(): LaunchSpec {
    return this.launchSpec;
  }

  getStatus(): ServiceState {
    return this.supervisor.getStatus();
  }

  /**
   * Shell startup: start and wait when auto-start is on, otherwise make
   * sure nothing is running.
   */
  async launch(): Promise<void> {
    if (this.config.autoStart) {
      await this.startAndWait();
    } else {
      await this.supervisor.stop();
    }
  }

  async startAndWait(spec?: LaunchSpec): Promise<HealthResponse> {
    if (spec) {
      validateLaunchSpec(spec);
      this.launchSpec = spec;
    }

    await this.supervisor.start(this.launchSpec);
    return this.awaitHealthy();
  }

  async restartAndWait(): Promise<HealthResponse> {
    const lease = this.supervisor.tryAcquireRestart();
    if (!lease) {
      this.logger.addLog(this.supervisor.id, 'warn', 'Restart requested while another restart is running');
      throw new RestartAlreadyInProgress();
    }

    try {
      await this.supervisor.restart(this.launchSpec, lease);
      return await this.awaitHealthy();
    } finally {
      lease.release();
    }
  }

  async stop(): Promise<void> {
    await this.supervisor.stop();
  }

  /** Everything logged for this backend, supervisor messages included. */
  getLogs(limit?: number): LogEntry[] {
    return this.logger.getLogs(this.supervisor.id, { limit });
  }

  /**
   * The last lines the child printed, for showing beside a failed start.
   */
  getRecentOutput(limit = 10): LogEntry[] {
    return this.logger.getLogs(this.supervisor.id, { limit, origins: ['stdout', 'stderr'] });
  }

  async checkHealth(): Promise<HealthResponse | null> {
    return this.probe.checkOnce();
  }

  async getStats(): Promise<StatsSnapshot | null> {
    if (this.supervisor.getStatus().kind !== 'running') {
      return null;
    }
    return this.probe.fetchStats();
  }

  startBackground(): void {
    this.monitor.start();
    this.publisher?.start();

    if (!this.cleanupInterval) {
      this.cleanupInterval = setInterval(() => this.logger.cleanup(), 60000);
      this.cleanupInterval.unref();
    }
  }

  async shutdown(): Promise<void> {
    if (this.isShutDown) {
      return;
    }
    this.isShutDown = true;

    this.logger.addLog(this.supervisor.id, 'info', 'Shutting down ServiceManager...');

    this.monitor.stop();
    this.publisher?.stop();
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }

    await this.supervisor.shutdown();
    this.logger.addLog(this.supervisor.id, 'info', 'ServiceManager shutdown complete');
  }

  private async awaitHealthy(): Promise<HealthResponse> {
    if (!this.isStartPending()) {
      this.logger.addLog(this.supervisor.id, 'info', 'Start cancelled before the health check');
      throw new StartCancelled();
    }

    try {
      const health = await this.probe.waitUntilHealthy(this.config.startupTimeoutMs);

      // A stop issued during the wait wins
      if (this.isStartPending()) {
        this.supervisor.markRunning();
        this.logger.addLog(this.supervisor.id, 'info', 'Service is ready');
      }
      return health;
    } catch (error) {
      this.logger.addLog(this.supervisor.id, 'error', `Service failed to start: ${formatError(error)}`);
      if (this.isStartPending()) {
        const code = error instanceof SupervisorError ? error.code : undefined;
        this.supervisor.markError(formatError(error), code);
      }
      throw error;
    }
  }

  /** Started, and no stop requested since. */
  private isStartPending(): boolean {
    return this.supervisor.getStatus().kind === 'starting' && this.supervisor.shouldAutoRestart();
  }
}
